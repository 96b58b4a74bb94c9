/**
 * Correlation Map
 *
 * Cached read side of the correlation entries, which are global across
 * runs. Entries are written by batch commits in the staging store.
 */

import type { EntityType } from '../types.js';
import type { StagingStore } from './store.js';

export class CorrelationMap {
  private readonly cache = new Map<string, string>();

  constructor(private readonly store: StagingStore) {}

  resolve(type: EntityType, sourceId: string): string | undefined {
    const key = cacheKey(type, sourceId);
    const cached = this.cache.get(key);
    if (cached !== undefined) return cached;

    const entry = this.store.findCorrelation(type, sourceId);
    if (entry) this.cache.set(key, entry.destinationId);
    return entry?.destinationId;
  }

  /** Warm the cache after a batch commit wrote entries directly. */
  remember(type: EntityType, sourceId: string, destinationId: string): void {
    this.cache.set(cacheKey(type, sourceId), destinationId);
  }
}

function cacheKey(type: EntityType, sourceId: string): string {
  return `${type}\u0000${sourceId}`;
}
