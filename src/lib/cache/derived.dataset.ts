/**
 * Derived Dataset
 * Caches a pure computation over another dataset, recomputed only when the
 * source has been refreshed
 */

import { freezeValue, snapshotValue } from './cache.utils';
import { CacheReadResult, Dataset, DatasetStats } from './cache.types';

interface Memo<T> {
  sourceFetchedAt: number;
  computedAt: number;
  value: T;
}

export interface DerivedDatasetOptions<S, T> {
  name: string;
  source: Dataset<S>;
  compute: (value: S) => T;
  ttlMs: number;
  now?: () => number;
}

export class DerivedDataset<S, T> implements Dataset<T> {
  readonly name: string;
  private readonly source: Dataset<S>;
  private readonly compute: (value: S) => T;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private memo: Memo<T> | null = null;
  private hits = 0;
  private misses = 0;
  private computations = 0;
  private failures = 0;

  constructor(options: DerivedDatasetOptions<S, T>) {
    this.name = options.name;
    this.source = options.source;
    this.compute = options.compute;
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
  }

  async get(): Promise<CacheReadResult<T>> {
    const source = await this.source.get();
    const sourceFetchedAt = source.fetchedAt.getTime();

    let memo = this.memo;
    if (memo && memo.sourceFetchedAt === sourceFetchedAt && this.now() - memo.computedAt < this.ttlMs) {
      this.hits++;
    } else {
      this.misses++;
      memo = this.recompute(source.value, sourceFetchedAt);
    }

    return {
      value: snapshotValue(memo.value),
      fetchedAt: source.fetchedAt,
      stale: source.stale,
      error: source.error,
    };
  }

  invalidate(): void {
    this.memo = null;
  }

  getStats(): DatasetStats {
    const sourceStats = this.source.getStats();
    return {
      name: this.name,
      ttlMs: this.ttlMs,
      fetchedAt: this.memo ? new Date(this.memo.sourceFetchedAt).toISOString() : null,
      invalidated: false,
      refreshing: sourceStats.refreshing,
      hits: this.hits,
      misses: this.misses,
      refreshes: this.computations,
      failures: this.failures,
      coalesced: 0,
      lastError: sourceStats.lastError,
    };
  }

  private recompute(value: S, sourceFetchedAt: number): Memo<T> {
    this.computations++;
    try {
      const memo: Memo<T> = {
        sourceFetchedAt,
        computedAt: this.now(),
        value: freezeValue(this.compute(value)),
      };
      this.memo = memo;
      return memo;
    } catch (error) {
      this.failures++;
      throw error;
    }
  }
}
