/**
 * Upstream Client
 * JSON-over-HTTP calls to a provider: native fetch with a per-call timeout,
 * behind a circuit breaker, validated with a zod schema
 */

import { z } from 'zod';
import { createCircuitBreaker, CircuitBreaker, CircuitBreakerConfig } from '../circuit-breaker';
import { classifyUpstreamError } from '../errors';

export type QueryParams = Record<string, string | number | undefined>;

export interface UpstreamClientOptions {
  name: string;
  baseUrl: string;
  timeoutMs: number;
  breaker?: CircuitBreakerConfig;
}

const USER_AGENT = 'TideGate/1.0';

export class UpstreamClient {
  private readonly breaker: CircuitBreaker<[string, AbortSignal | undefined], unknown>;

  constructor(private readonly options: UpstreamClientOptions) {
    this.breaker = createCircuitBreaker(
      (url: string, signal: AbortSignal | undefined) => this.fetchJson(url, signal),
      { ...options.breaker, name: options.name }
    );
  }

  get name(): string {
    return this.options.name;
  }

  /**
   * Build a request URL. Empty-string params are sent as bare flags ("heights=").
   */
  buildUrl(path: string, params: QueryParams = {}): string {
    const url = new URL(path, this.options.baseUrl);
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }
    return url.toString();
  }

  /**
   * GET a JSON document and validate it
   */
  async getJson<S extends z.ZodTypeAny>(
    path: string,
    params: QueryParams,
    schema: S,
    signal?: AbortSignal
  ): Promise<z.output<S>> {
    const url = this.buildUrl(path, params);
    try {
      const body = await this.breaker.execute(url, signal);
      return schema.parse(body);
    } catch (error) {
      throw classifyUpstreamError(error);
    }
  }

  shutdown(): void {
    this.breaker.shutdown();
  }

  private async fetchJson(url: string, signal: AbortSignal | undefined): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);
    const onAbort = (): void => controller.abort();

    if (signal?.aborted) {
      controller.abort();
    }
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: {
          'Accept': 'application/json',
          'User-Agent': USER_AGENT,
        },
        signal: controller.signal,
      });

      if (!response.ok) {
        throw classifyUpstreamError(
          new Error(`${this.options.name} responded with status ${response.status}`),
          response.status
        );
      }

      const body: unknown = await response.json();
      return body;
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
