/**
 * Keyed Datasets Tests
 */

import { DatasetCacheManager } from '../cache.manager';
import { KeyedDatasets } from '../keyed.datasets';
import { deferred } from '../../../__tests__/helpers/fixtures';

interface Query {
  lat: number;
  lng: number;
}

describe('KeyedDatasets', () => {
  let manager: DatasetCacheManager;
  let fetch: jest.Mock;
  let family: KeyedDatasets<Query, string>;

  beforeEach(() => {
    manager = new DatasetCacheManager({ fetchTimeoutMs: 1000 });
    fetch = jest.fn((query: Query) => Promise.resolve(`${query.lat},${query.lng}`));
    family = new KeyedDatasets<Query, string>(manager, {
      prefix: 'sun',
      ttlMs: 60 * 1000,
      limit: 2,
      key: (query) => `${query.lat}:${query.lng}`,
      fetch,
    });
  });

  it('should register a dataset per key on first use', async () => {
    const result = await family.get({ lat: 53.28, lng: -3.83 });

    expect(result.value).toBe('53.28,-3.83');
    expect(manager.has('sun:53.28:-3.83')).toBe(true);
    expect(family.nameFor({ lat: 1, lng: 2 })).toBe('sun:1:2');
  });

  it('should cache each key independently', async () => {
    await family.get({ lat: 1, lng: 1 });
    await family.get({ lat: 1, lng: 1 });
    await family.get({ lat: 2, lng: 2 });

    expect(fetch).toHaveBeenCalledTimes(2);
    expect(family.size()).toBe(2);
  });

  it('should unregister the least recently used key past the limit', async () => {
    await family.get({ lat: 1, lng: 1 });
    await family.get({ lat: 2, lng: 2 });
    await family.get({ lat: 1, lng: 1 });
    await family.get({ lat: 3, lng: 3 });

    expect(manager.names()).toEqual(['sun:1:1', 'sun:3:3']);
    expect(family.size()).toBe(2);
  });

  it('should keep a member whose refresh is still running past the limit', async () => {
    const pending = deferred<string>();
    fetch.mockReturnValueOnce(pending.promise);

    const slow = family.get({ lat: 1, lng: 1 });
    await family.get({ lat: 2, lng: 2 });
    await family.get({ lat: 3, lng: 3 });
    const again = family.get({ lat: 1, lng: 1 });
    pending.resolve('1,1');

    await expect(slow).resolves.toMatchObject({ value: '1,1' });
    await expect(again).resolves.toMatchObject({ value: '1,1' });
    expect(fetch).toHaveBeenCalledTimes(3);
    expect(manager.names()).toEqual(['sun:1:1', 'sun:3:3']);
  });
});
