/**
 * Request Params
 * Parsing of path and query parameters; invalid input becomes a 400
 */

import { ApiError } from '../../middleware/error-handler';
import { isDateKey } from '../time/local-time';

type QueryValue = unknown;

function single(value: QueryValue): string | undefined {
  if (Array.isArray(value)) {
    return single(value[0]);
  }
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * A YYYY-MM-DD date
 */
export function parseDateKey(value: QueryValue, field: string = 'date'): string {
  const raw = single(value);
  if (!raw) {
    throw new ApiError(400, `${field} is required`);
  }
  if (!isDateKey(raw)) {
    throw new ApiError(400, 'Invalid date format');
  }
  return raw;
}

/**
 * An optional ISO-8601 instant
 */
export function parseInstant(value: QueryValue, field: string): Date | undefined {
  const raw = single(value);
  if (raw === undefined) {
    return undefined;
  }
  const parsed = new Date(raw);
  if (Number.isNaN(parsed.getTime())) {
    throw new ApiError(400, `${field} must be an ISO-8601 timestamp`);
  }
  return parsed;
}

export function parseInteger(
  value: QueryValue,
  field: string,
  fallback: number,
  bounds: { min?: number; max?: number } = {}
): number {
  const raw = single(value);
  if (raw === undefined) {
    return fallback;
  }
  if (!/^-?\d+$/.test(raw)) {
    throw new ApiError(400, `${field} must be an integer`);
  }
  const parsed = parseInt(raw, 10);
  if ((bounds.min !== undefined && parsed < bounds.min) || (bounds.max !== undefined && parsed > bounds.max)) {
    throw new ApiError(400, `${field} is out of range`);
  }
  return parsed;
}

export function parseNumber(
  value: QueryValue,
  field: string,
  fallback: number,
  bounds: { min?: number; max?: number } = {}
): number {
  const raw = single(value);
  if (raw === undefined) {
    return fallback;
  }
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new ApiError(400, `${field} must be a number`);
  }
  if ((bounds.min !== undefined && parsed < bounds.min) || (bounds.max !== undefined && parsed > bounds.max)) {
    throw new ApiError(400, `${field} is out of range`);
  }
  return parsed;
}

export function parseString(value: QueryValue, fallback: string): string {
  return single(value) ?? fallback;
}
