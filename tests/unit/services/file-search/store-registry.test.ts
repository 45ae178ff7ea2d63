/**
 * Unit tests for StoreRegistry
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { StoreRegistry, matchesLogicalName } from '../../../../src/services/file-search/store-registry.js';
import { FakeFileSearchService } from '../../helpers/fakes.js';

describe('StoreRegistry', () => {
  let service: FakeFileSearchService;
  let registry: StoreRegistry;

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    service = new FakeFileSearchService();
    registry = new StoreRegistry(service);
  });

  it('should reuse an existing store whose display name contains the logical name', async () => {
    service.stores.push({ name: 'fileSearchStores/old', displayName: 'abstracts_store-2024' });

    const store = await registry.resolve('abstracts_store');

    expect(store.name).toBe('fileSearchStores/old');
    expect(service.createStoreCalls).toBe(0);
  });

  it('should create a store when none matches', async () => {
    service.stores.push({ name: 'fileSearchStores/other', displayName: 'manuscripts_store' });

    const store = await registry.resolve('abstracts_store');

    expect(store).toEqual({ name: 'fileSearchStores/store-1', displayName: 'abstracts_store' });
    expect(service.createStoreCalls).toBe(1);
  });

  it('should list remote stores once per logical name', async () => {
    const [a, b] = await Promise.all([registry.resolve('abstracts_store'), registry.resolve('abstracts_store')]);
    const c = await registry.resolve('abstracts_store');

    expect(a).toBe(b);
    expect(c).toBe(a);
    expect(service.listStoresCalls).toBe(1);
    expect(service.createStoreCalls).toBe(1);
  });

  it('should create a store when listing fails', async () => {
    service.failListStores = true;

    const store = await registry.resolve('abstracts_store');

    expect(store.displayName).toBe('abstracts_store');
    expect(service.createStoreCalls).toBe(1);
  });

  it('should raise STORE_RESOLUTION_FAILED when creation fails and not cache the failure', async () => {
    service.failCreateStore = true;

    await expect(registry.resolve('abstracts_store')).rejects.toMatchObject({
      category: 'STORE_RESOLUTION_FAILED',
    });
    expect(await registry.cached('abstracts_store')).toBeNull();

    service.failCreateStore = false;
    const store = await registry.resolve('abstracts_store');
    expect(store.displayName).toBe('abstracts_store');
  });

  it('should report resolved names and forget them on clear', async () => {
    await registry.resolve('abstracts_store');

    expect(registry.resolvedNames()).toEqual(['abstracts_store']);
    expect(await registry.cached('abstracts_store')).toEqual({
      name: 'fileSearchStores/store-1',
      displayName: 'abstracts_store',
    });

    registry.clear();
    expect(registry.resolvedNames()).toEqual([]);
  });
});

describe('matchesLogicalName', () => {
  it('should match equal or containing display names', () => {
    expect(matchesLogicalName({ name: 'n', displayName: 'abstracts_store' }, 'abstracts_store')).toBe(true);
    expect(matchesLogicalName({ name: 'n', displayName: 'my_abstracts_store_v2' }, 'abstracts_store')).toBe(true);
    expect(matchesLogicalName({ name: 'n', displayName: 'abstracts' }, 'abstracts_store')).toBe(false);
  });
});
