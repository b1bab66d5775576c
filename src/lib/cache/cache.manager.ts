/**
 * Cache Manager
 * Named in-memory datasets with TTL refresh, fetch coalescing and
 * stale-on-error reads
 */

import { ConfigError, UnknownDatasetError, UpstreamError, UpstreamErrorType, classifyUpstreamError } from '../errors';
import { freezeValue, snapshotValue } from './cache.utils';
import {
  CacheEntry,
  CacheManagerOptions,
  CacheReadResult,
  Dataset,
  DatasetDefinition,
  DatasetStats,
} from './cache.types';

/**
 * A single registered dataset. Owns its entry and its in-flight refresh.
 */
class CachedDataset<T> implements Dataset<T> {
  private entry: CacheEntry<T> | null = null;
  // Bumped by invalidate(); an entry is only fresh for the generation it was fetched in
  private generation = 0;
  private entryGeneration = -1;
  private inFlight: Promise<CacheReadResult<T>> | null = null;
  private lastError: UpstreamError | null = null;
  private hits = 0;
  private misses = 0;
  private refreshes = 0;
  private failures = 0;
  private coalesced = 0;

  constructor(
    private readonly definition: DatasetDefinition<T>,
    private readonly fetchTimeoutMs: number,
    private readonly now: () => number
  ) {}

  get name(): string {
    return this.definition.name;
  }

  /**
   * Current value, refreshing first when missing, expired or invalidated.
   * Concurrent callers share one refresh.
   */
  get(): Promise<CacheReadResult<T>> {
    const entry = this.entry;
    if (entry && this.isFresh(entry)) {
      this.hits++;
      return Promise.resolve(this.snapshot(entry, null));
    }

    if (this.inFlight) {
      this.coalesced++;
      return this.inFlight;
    }

    this.misses++;
    const refresh = this.refresh(this.generation).finally(() => {
      if (this.inFlight === refresh) {
        this.inFlight = null;
      }
    });
    this.inFlight = refresh;
    return refresh;
  }

  invalidate(): void {
    this.generation++;
  }

  getStats(): DatasetStats {
    return {
      name: this.name,
      ttlMs: this.definition.ttlMs,
      fetchedAt: this.entry ? new Date(this.entry.fetchedAt).toISOString() : null,
      invalidated: this.entry !== null && this.entryGeneration !== this.generation,
      refreshing: this.inFlight !== null,
      hits: this.hits,
      misses: this.misses,
      refreshes: this.refreshes,
      failures: this.failures,
      coalesced: this.coalesced,
      lastError: this.lastError ? this.lastError.toJSON() : null,
    };
  }

  private isFresh(entry: CacheEntry<T>): boolean {
    return this.entryGeneration === this.generation && this.now() - entry.fetchedAt < entry.ttlMs;
  }

  private async refresh(generation: number): Promise<CacheReadResult<T>> {
    this.refreshes++;

    try {
      const value = await this.fetchWithTimeout();
      const entry: CacheEntry<T> = Object.freeze({
        value: freezeValue(value),
        fetchedAt: this.now(),
        ttlMs: this.definition.ttlMs,
      });
      this.entry = entry;
      this.entryGeneration = generation;
      this.lastError = null;
      return this.snapshot(entry, null);
    } catch (error) {
      const upstreamError = classifyUpstreamError(error).forDataset(this.name);
      this.failures++;
      this.lastError = upstreamError;

      const previous = this.entry;
      if (previous) {
        console.warn(`Cache: refresh of "${this.name}" failed (${upstreamError.type}), serving stale value: ${upstreamError.message}`);
        return this.snapshot(previous, upstreamError);
      }

      console.error(`Cache: refresh of "${this.name}" failed (${upstreamError.type}) with no value to fall back on: ${upstreamError.message}`);
      throw upstreamError;
    }
  }

  /**
   * Run the fetch under the dataset's timeout. The fetch is started from a
   * resolved promise so a synchronous throw becomes a rejection.
   */
  private fetchWithTimeout(): Promise<T> {
    const timeoutMs = this.definition.timeoutMs ?? this.fetchTimeoutMs;
    const controller = new AbortController();

    return new Promise<T>((resolve, reject) => {
      const timer = setTimeout(() => {
        controller.abort();
        reject(
          new UpstreamError(UpstreamErrorType.TIMEOUT, `Refresh timed out after ${timeoutMs}ms`, {
            dataset: this.name,
          })
        );
      }, timeoutMs);

      void Promise.resolve()
        .then(() => this.definition.fetch(controller.signal))
        .then(resolve, reject)
        .finally(() => clearTimeout(timer));
    });
  }

  private snapshot(entry: CacheEntry<T>, error: UpstreamError | null): CacheReadResult<T> {
    return {
      value: snapshotValue(entry.value),
      fetchedAt: new Date(entry.fetchedAt),
      stale: error !== null,
      error,
    };
  }
}

export class DatasetCacheManager {
  private readonly datasets = new Map<string, Dataset<unknown>>();
  private readonly fetchTimeoutMs: number;
  private readonly now: () => number;

  constructor(options: CacheManagerOptions) {
    this.fetchTimeoutMs = options.fetchTimeoutMs;
    this.now = options.now ?? Date.now;
  }

  /**
   * Register a dataset backed by an upstream fetch
   */
  register<T>(definition: DatasetDefinition<T>): Dataset<T> {
    if (!Number.isFinite(definition.ttlMs) || definition.ttlMs <= 0) {
      throw new ConfigError([`TTL for dataset "${definition.name}" must be a positive number`]);
    }
    const timeoutMs = definition.timeoutMs ?? this.fetchTimeoutMs;
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new ConfigError([`Fetch timeout for dataset "${definition.name}" must be a positive number`]);
    }

    return this.add(new CachedDataset(definition, this.fetchTimeoutMs, this.now));
  }

  /**
   * Register a dataset implemented elsewhere (e.g. a derived dataset)
   */
  add<T>(dataset: Dataset<T>): Dataset<T> {
    if (this.datasets.has(dataset.name)) {
      throw new Error(`Dataset "${dataset.name}" is already registered`);
    }
    this.datasets.set(dataset.name, dataset);
    return dataset;
  }

  unregister(name: string): boolean {
    return this.datasets.delete(name);
  }

  has(name: string): boolean {
    return this.datasets.has(name);
  }

  names(): string[] {
    return Array.from(this.datasets.keys());
  }

  /**
   * Get a dataset's current value by name
   */
  get(name: string): Promise<CacheReadResult<unknown>> {
    return this.require(name).get();
  }

  /**
   * Force the next get() of a dataset to refresh
   */
  invalidate(name: string): void {
    this.require(name).invalidate();
    console.log(`Cache: invalidated "${name}"`);
  }

  getStats(): DatasetStats[] {
    return Array.from(this.datasets.values(), (dataset) => dataset.getStats());
  }

  private require(name: string): Dataset<unknown> {
    const dataset = this.datasets.get(name);
    if (!dataset) {
      throw new UnknownDatasetError(name);
    }
    return dataset;
  }
}
