/**
 * Upstream Error Handling
 * Provider failures and their classification
 */

import { ZodError } from 'zod';

export enum UpstreamErrorType {
  NETWORK_ERROR = 'NETWORK_ERROR',
  TIMEOUT = 'TIMEOUT',
  RATE_LIMITED = 'RATE_LIMITED',
  AUTH_REQUIRED = 'AUTH_REQUIRED',
  NOT_FOUND = 'NOT_FOUND',
  SERVER_ERROR = 'SERVER_ERROR',
  PARSE_ERROR = 'PARSE_ERROR',
  CIRCUIT_OPEN = 'CIRCUIT_OPEN',
  NOT_CONFIGURED = 'NOT_CONFIGURED',
  UNKNOWN = 'UNKNOWN',
}

export interface UpstreamErrorOptions {
  statusCode?: number;
  dataset?: string;
  retryable?: boolean;
  cause?: unknown;
}

const NON_RETRYABLE = new Set<UpstreamErrorType>([
  UpstreamErrorType.AUTH_REQUIRED,
  UpstreamErrorType.NOT_FOUND,
  UpstreamErrorType.PARSE_ERROR,
  UpstreamErrorType.NOT_CONFIGURED,
]);

/**
 * A provider call that failed or timed out. Recovered by serving the stale
 * cache entry when one exists.
 */
export class UpstreamError extends Error {
  readonly type: UpstreamErrorType;
  readonly statusCode?: number;
  readonly dataset?: string;
  readonly retryable: boolean;

  constructor(type: UpstreamErrorType, message: string, options: UpstreamErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'UpstreamError';
    this.type = type;
    this.statusCode = options.statusCode;
    this.dataset = options.dataset;
    this.retryable = options.retryable ?? !NON_RETRYABLE.has(type);
  }

  /**
   * Copy of this error tagged with the dataset it was raised for
   */
  forDataset(dataset: string): UpstreamError {
    if (this.dataset === dataset) {
      return this;
    }
    return new UpstreamError(this.type, this.message, {
      statusCode: this.statusCode,
      dataset,
      retryable: this.retryable,
      cause: this.cause,
    });
  }

  toJSON(): { type: UpstreamErrorType; message: string; statusCode?: number; dataset?: string } {
    return {
      type: this.type,
      message: this.message,
      statusCode: this.statusCode,
      dataset: this.dataset,
    };
  }
}

function readProperty(error: unknown, key: 'code' | 'status' | 'name'): unknown {
  if (typeof error === 'object' && error !== null && key in error) {
    return Reflect.get(error, key);
  }
  return undefined;
}

function statusError(code: number, options: UpstreamErrorOptions): UpstreamError {
  if (code === 429) {
    return new UpstreamError(UpstreamErrorType.RATE_LIMITED, 'Rate limited by provider', options);
  }
  if (code === 401 || code === 403) {
    return new UpstreamError(UpstreamErrorType.AUTH_REQUIRED, 'Provider rejected credentials', options);
  }
  if (code === 404) {
    return new UpstreamError(UpstreamErrorType.NOT_FOUND, 'Provider resource not found', options);
  }
  if (code >= 500) {
    return new UpstreamError(UpstreamErrorType.SERVER_ERROR, 'Provider server error', options);
  }
  return new UpstreamError(UpstreamErrorType.UNKNOWN, `Provider responded with status ${code}`, {
    ...options,
    retryable: false,
  });
}

/**
 * Classify any thrown value into an UpstreamError
 */
export function classifyUpstreamError(error: unknown, statusCode?: number): UpstreamError {
  if (error instanceof UpstreamError) {
    return error;
  }

  const options: UpstreamErrorOptions = { cause: error };
  const message = error instanceof Error ? error.message : String(error);
  const code = readProperty(error, 'code');
  const name = readProperty(error, 'name');
  const status = statusCode ?? readProperty(error, 'status');

  if (typeof status === 'number') {
    return statusError(status, { ...options, statusCode: status });
  }

  // opossum raises these
  if (code === 'EOPENBREAKER') {
    return new UpstreamError(UpstreamErrorType.CIRCUIT_OPEN, 'Provider circuit is open', options);
  }
  if (
    code === 'ETIMEDOUT' ||
    code === 'ESOCKETTIMEDOUT' ||
    name === 'AbortError' ||
    name === 'TimeoutError' ||
    message.includes('timeout') ||
    message.includes('Timed out')
  ) {
    return new UpstreamError(UpstreamErrorType.TIMEOUT, 'Provider request timed out', options);
  }

  if (error instanceof ZodError || error instanceof SyntaxError) {
    return new UpstreamError(UpstreamErrorType.PARSE_ERROR, `Unexpected provider response: ${message}`, options);
  }

  if (
    code === 'ECONNREFUSED' ||
    code === 'ECONNRESET' ||
    code === 'ENOTFOUND' ||
    code === 'EAI_AGAIN' ||
    message.includes('fetch failed') ||
    message.includes('network')
  ) {
    return new UpstreamError(UpstreamErrorType.NETWORK_ERROR, 'Provider connection failed', options);
  }

  return new UpstreamError(UpstreamErrorType.UNKNOWN, message || 'Unknown provider error', options);
}
