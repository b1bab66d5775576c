/**
 * Keyed Datasets
 * A family of parameterised datasets registered on first use under
 * "<prefix>:<key>" and bounded by an LRU limit. Members with a refresh in
 * flight are not evicted.
 */

import { DatasetCacheManager } from './cache.manager';
import { LRUCacheStrategy } from './cache.strategies';
import { CacheReadResult, Dataset } from './cache.types';

export interface KeyedDatasetsOptions<P, T> {
  prefix: string;
  ttlMs: number;
  limit: number;
  key: (params: P) => string;
  fetch: (params: P, signal: AbortSignal) => Promise<T>;
  timeoutMs?: number;
}

export class KeyedDatasets<P, T> {
  private readonly members: LRUCacheStrategy<Dataset<T>>;

  constructor(
    private readonly manager: DatasetCacheManager,
    private readonly options: KeyedDatasetsOptions<P, T>
  ) {
    this.members = new LRUCacheStrategy<Dataset<T>>(options.limit, {
      onEvict: (name) => {
        this.manager.unregister(name);
      },
      // Dropping a member mid-refresh would let a second fetch start under its name
      canEvict: (_name, dataset) => !dataset.getStats().refreshing,
    });
  }

  nameFor(params: P): string {
    return `${this.options.prefix}:${this.options.key(params)}`;
  }

  get(params: P): Promise<CacheReadResult<T>> {
    const name = this.nameFor(params);
    let dataset = this.members.get(name);

    if (!dataset) {
      dataset = this.manager.register<T>({
        name,
        ttlMs: this.options.ttlMs,
        timeoutMs: this.options.timeoutMs,
        fetch: (signal) => this.options.fetch(params, signal),
      });
      this.members.set(name, dataset);
    }

    return dataset.get();
  }

  size(): number {
    return this.members.size();
  }
}
