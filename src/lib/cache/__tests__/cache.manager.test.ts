/**
 * Cache Manager Tests
 */

import { DatasetCacheManager } from '../cache.manager';
import { ConfigError, UnknownDatasetError, UpstreamError, UpstreamErrorType } from '../../errors';
import { deferred, ManualClock, T0 } from '../../../__tests__/helpers/fixtures';

const TTL = 60 * 1000;

describe('DatasetCacheManager', () => {
  let clock: ManualClock;
  let manager: DatasetCacheManager;

  beforeEach(() => {
    clock = new ManualClock();
    manager = new DatasetCacheManager({ fetchTimeoutMs: 1000, now: clock.now });
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('get', () => {
    it('should fetch on first read and serve from cache within the TTL', async () => {
      const fetch = jest.fn().mockResolvedValue({ level: 1 });
      const dataset = manager.register({ name: 'levels', ttlMs: TTL, fetch });

      const first = await dataset.get();
      clock.advance(TTL - 1);
      const second = await dataset.get();

      expect(fetch).toHaveBeenCalledTimes(1);
      expect(first).toEqual({ value: { level: 1 }, fetchedAt: new Date(T0), stale: false, error: null });
      expect(second.value).toEqual(first.value);
      expect(second.value).not.toBe(first.value);
    });

    it('should refresh once the TTL has elapsed', async () => {
      const fetch = jest.fn().mockResolvedValueOnce('old').mockResolvedValueOnce('new');
      const dataset = manager.register({ name: 'levels', ttlMs: TTL, fetch });

      await dataset.get();
      clock.advance(TTL);
      const result = await dataset.get();

      expect(fetch).toHaveBeenCalledTimes(2);
      expect(result.value).toBe('new');
      expect(result.fetchedAt).toEqual(new Date(T0 + TTL));
    });

    it('should share one fetch between concurrent readers', async () => {
      const pending = deferred<number[]>();
      const fetch = jest.fn().mockReturnValue(pending.promise);
      const dataset = manager.register({ name: 'levels', ttlMs: TTL, fetch });

      const reads = Promise.all([dataset.get(), dataset.get(), dataset.get(), dataset.get()]);
      pending.resolve([1, 2, 3]);
      const results = await reads;

      expect(fetch).toHaveBeenCalledTimes(1);
      expect(results.map((result) => result.value)).toEqual([[1, 2, 3], [1, 2, 3], [1, 2, 3], [1, 2, 3]]);
      expect(dataset.getStats()).toMatchObject({ misses: 1, coalesced: 3, refreshes: 1 });
    });

    it('should coalesce concurrent readers of an expired entry', async () => {
      const pending = deferred<string>();
      const fetch = jest.fn().mockResolvedValueOnce('old').mockReturnValueOnce(pending.promise);
      const dataset = manager.register({ name: 'levels', ttlMs: TTL, fetch });

      await dataset.get();
      clock.advance(TTL);
      const reads = Promise.all(Array.from({ length: 10 }, () => dataset.get()));
      pending.resolve('new');

      expect((await reads).every((result) => result.value === 'new')).toBe(true);
      expect(fetch).toHaveBeenCalledTimes(2);
    });

    it('should freeze cached values', async () => {
      const dataset = manager.register({
        name: 'levels',
        ttlMs: TTL,
        fetch: async () => ({ samples: [{ height: 1 }] }),
      });

      const { value } = await dataset.get();

      expect(Object.isFrozen(value)).toBe(true);
      expect(Object.isFrozen(value.samples)).toBe(true);
      expect(Object.isFrozen(value.samples[0])).toBe(true);
    });

    it('should give each reader its own copy of cached dates', async () => {
      const dataset = manager.register({
        name: 'levels',
        ttlMs: TTL,
        fetch: async () => [{ timestamp: new Date(T0), height: 1 }],
      });

      const first = await dataset.get();
      first.value[0].timestamp.setTime(0);
      const second = await dataset.get();

      expect(second.value[0].timestamp).toEqual(new Date(T0));
    });
  });

  describe('failures', () => {
    it('should serve the previous value as stale when a refresh fails', async () => {
      const fetch = jest
        .fn()
        .mockResolvedValueOnce('good')
        .mockRejectedValueOnce(new UpstreamError(UpstreamErrorType.SERVER_ERROR, 'Provider server error'));
      const dataset = manager.register({ name: 'levels', ttlMs: TTL, fetch });

      await dataset.get();
      clock.advance(TTL);
      const result = await dataset.get();

      expect(result.value).toBe('good');
      expect(result.fetchedAt).toEqual(new Date(T0));
      expect(result.stale).toBe(true);
      expect(result.error).toBeInstanceOf(UpstreamError);
      expect(result.error?.type).toBe(UpstreamErrorType.SERVER_ERROR);
      expect(result.error?.dataset).toBe('levels');
    });

    it('should try again on the next read after serving stale', async () => {
      const fetch = jest
        .fn()
        .mockResolvedValueOnce('good')
        .mockRejectedValueOnce(new Error('fetch failed'))
        .mockResolvedValueOnce('better');
      const dataset = manager.register({ name: 'levels', ttlMs: TTL, fetch });

      await dataset.get();
      clock.advance(TTL);
      await dataset.get();
      const result = await dataset.get();

      expect(fetch).toHaveBeenCalledTimes(3);
      expect(result).toMatchObject({ value: 'better', stale: false, error: null });
    });

    it('should reject every waiter when there is nothing to fall back on', async () => {
      const pending = deferred<string>();
      const dataset = manager.register({ name: 'levels', ttlMs: TTL, fetch: () => pending.promise });

      const first = dataset.get();
      const second = dataset.get();
      pending.reject(new Error('fetch failed'));

      await expect(first).rejects.toMatchObject({ type: UpstreamErrorType.NETWORK_ERROR, dataset: 'levels' });
      await expect(second).rejects.toBeInstanceOf(UpstreamError);
      expect(dataset.getStats()).toMatchObject({ failures: 1, fetchedAt: null });
    });

    it('should turn a synchronous throw into a rejection', async () => {
      const dataset = manager.register<string>({
        name: 'levels',
        ttlMs: TTL,
        fetch: () => {
          throw new Error('boom');
        },
      });

      await expect(dataset.get()).rejects.toMatchObject({ type: UpstreamErrorType.UNKNOWN, message: 'boom' });
    });

    it('should abort a fetch that outlives its timeout', async () => {
      let received: AbortSignal | undefined;
      const dataset = manager.register<string>({
        name: 'levels',
        ttlMs: TTL,
        timeoutMs: 20,
        fetch: (signal) => {
          received = signal;
          return new Promise<string>(() => undefined);
        },
      });

      await expect(dataset.get()).rejects.toMatchObject({
        type: UpstreamErrorType.TIMEOUT,
        message: 'Refresh timed out after 20ms',
      });
      expect(received?.aborted).toBe(true);
    });

    it('should keep one failing dataset from affecting another', async () => {
      manager.register({ name: 'broken', ttlMs: TTL, fetch: () => Promise.reject(new Error('fetch failed')) });
      manager.register({ name: 'working', ttlMs: TTL, fetch: async () => 'ok' });

      await expect(manager.get('broken')).rejects.toBeInstanceOf(UpstreamError);
      await expect(manager.get('working')).resolves.toMatchObject({ value: 'ok', stale: false });
    });
  });

  describe('invalidate', () => {
    it('should force the next read to refresh', async () => {
      const fetch = jest.fn().mockResolvedValueOnce(1).mockResolvedValueOnce(2);
      manager.register({ name: 'levels', ttlMs: TTL, fetch });

      await manager.get('levels');
      manager.invalidate('levels');
      const result = await manager.get('levels');

      expect(fetch).toHaveBeenCalledTimes(2);
      expect(result.value).toBe(2);
    });

    it('should refresh again after an invalidation that arrives mid-refresh', async () => {
      const pending = deferred<number>();
      const fetch = jest.fn().mockReturnValueOnce(pending.promise).mockResolvedValueOnce(2);
      const dataset = manager.register({ name: 'levels', ttlMs: TTL, fetch });

      const inFlight = dataset.get();
      dataset.invalidate();
      pending.resolve(1);
      expect((await inFlight).value).toBe(1);

      const next = await dataset.get();
      expect(fetch).toHaveBeenCalledTimes(2);
      expect(next.value).toBe(2);
    });

    it('should be idempotent', async () => {
      const fetch = jest.fn().mockResolvedValue('value');
      const dataset = manager.register({ name: 'levels', ttlMs: TTL, fetch });

      await dataset.get();
      dataset.invalidate();
      dataset.invalidate();
      await dataset.get();

      expect(fetch).toHaveBeenCalledTimes(2);
    });
  });

  describe('registry', () => {
    it('should reject unknown dataset names', () => {
      expect(() => manager.get('missing')).toThrow(UnknownDatasetError);
      expect(() => manager.invalidate('missing')).toThrow('Unknown dataset "missing"');
    });

    it('should reject duplicate names', () => {
      manager.register({ name: 'levels', ttlMs: TTL, fetch: async () => 1 });

      expect(() => manager.register({ name: 'levels', ttlMs: TTL, fetch: async () => 2 })).toThrow(
        'Dataset "levels" is already registered'
      );
    });

    it('should reject a non-positive TTL or timeout', () => {
      expect(() => manager.register({ name: 'a', ttlMs: 0, fetch: async () => 1 })).toThrow(ConfigError);
      expect(() => manager.register({ name: 'b', ttlMs: TTL, timeoutMs: -1, fetch: async () => 1 })).toThrow(
        ConfigError
      );
    });

    it('should list names and stats for every dataset', async () => {
      manager.register({ name: 'a', ttlMs: TTL, fetch: async () => 1 });
      manager.register({ name: 'b', ttlMs: TTL, fetch: async () => 2 });
      await manager.get('a');
      await manager.get('a');

      expect(manager.names()).toEqual(['a', 'b']);
      expect(manager.getStats()).toEqual([
        {
          name: 'a',
          ttlMs: TTL,
          fetchedAt: new Date(T0).toISOString(),
          invalidated: false,
          refreshing: false,
          hits: 1,
          misses: 1,
          refreshes: 1,
          failures: 0,
          coalesced: 0,
          lastError: null,
        },
        expect.objectContaining({ name: 'b', fetchedAt: null, misses: 0 }),
      ]);
    });

    it('should report an invalidated entry until it is refreshed', async () => {
      manager.register({ name: 'a', ttlMs: TTL, fetch: async () => 1 });
      await manager.get('a');
      manager.invalidate('a');

      expect(manager.getStats()[0].invalidated).toBe(true);
    });
  });
});
