/**
 * Cache Types
 * Type definitions for the dataset cache
 */

import { UpstreamError } from '../errors';

/**
 * One successful fetch. Frozen on creation and replaced wholesale on refresh.
 */
export interface CacheEntry<T> {
  readonly value: T;
  readonly fetchedAt: number; // epoch ms
  readonly ttlMs: number;
}

/**
 * Snapshot handed to callers of get()
 */
export interface CacheReadResult<T> {
  value: T;
  fetchedAt: Date;
  stale: boolean;                 // true when a refresh failed and the previous value is served
  error: UpstreamError | null;    // the failure behind a stale read
}

/**
 * Registration for a named dataset
 */
export interface DatasetDefinition<T> {
  name: string;
  ttlMs: number;
  fetch: (signal: AbortSignal) => Promise<T>;
  timeoutMs?: number;             // defaults to the manager's fetch timeout
}

/**
 * Handle returned from registration
 */
export interface Dataset<T> {
  readonly name: string;
  get(): Promise<CacheReadResult<T>>;
  invalidate(): void;
  getStats(): DatasetStats;
}

export interface DatasetStats {
  name: string;
  ttlMs: number;
  fetchedAt: string | null;
  invalidated: boolean;
  refreshing: boolean;
  hits: number;
  misses: number;
  refreshes: number;
  failures: number;
  coalesced: number;
  lastError: ReturnType<UpstreamError['toJSON']> | null;
}

export interface CacheManagerOptions {
  fetchTimeoutMs: number;
  now?: () => number;
}
