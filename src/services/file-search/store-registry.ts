/**
 * StoreRegistry - resolves logical store names to remote file search stores.
 *
 * Lookup lists the remote stores and takes the first whose displayName equals
 * or contains the logical name; otherwise a store is created. Resolved stores
 * are cached for the process lifetime and never deleted here.
 *
 * Two processes resolving the same name at once can still create two stores;
 * the registry only deduplicates within one process.
 *
 * @module services/file-search/store-registry
 */

import { storeResolutionError } from '../../server/errors.js';
import type { FileSearchService, Store } from './types.js';

export function matchesLogicalName(store: Store, logicalName: string): boolean {
  return store.displayName === logicalName || store.displayName.includes(logicalName);
}

export class StoreRegistry {
  private readonly cache = new Map<string, Promise<Store>>();

  constructor(private readonly service: FileSearchService) {}

  /**
   * Resolve (find or create) the store for a logical name.
   * Concurrent callers for the same name share one lookup.
   *
   * @throws MCPError STORE_RESOLUTION_FAILED when creation fails
   */
  resolve(logicalName: string): Promise<Store> {
    const cached = this.cache.get(logicalName);
    if (cached) return cached;

    const pending = this.lookupOrCreate(logicalName);
    this.cache.set(logicalName, pending);
    // A failed resolution must not stay cached
    void pending.catch(() => {
      if (this.cache.get(logicalName) === pending) this.cache.delete(logicalName);
    });
    return pending;
  }

  /**
   * Store already resolved for a logical name, if any
   */
  async cached(logicalName: string): Promise<Store | null> {
    const pending = this.cache.get(logicalName);
    if (!pending) return null;
    try {
      return await pending;
    } catch {
      return null;
    }
  }

  resolvedNames(): string[] {
    return [...this.cache.keys()];
  }

  clear(): void {
    this.cache.clear();
  }

  private async lookupOrCreate(logicalName: string): Promise<Store> {
    try {
      const stores = await this.service.listStores();
      const match = stores.find((s) => matchesLogicalName(s, logicalName));
      if (match) {
        console.error(`[StoreRegistry] Using existing store ${match.name} for "${logicalName}"`);
        return match;
      }
    } catch (error) {
      console.error(
        `[StoreRegistry] Listing stores failed, creating "${logicalName}": ${error instanceof Error ? error.message : String(error)}`
      );
    }

    try {
      const store = await this.service.createStore(logicalName);
      console.error(`[StoreRegistry] Created store ${store.name} for "${logicalName}"`);
      return store;
    } catch (error) {
      throw storeResolutionError(logicalName, error);
    }
  }
}
