import { LRUCache } from 'lru-cache';
import type { ContentRef } from '../types.js';

/**
 * Bounded recency window over discovered identifiers.
 *
 * Lookups never refresh an entry's age, so identifiers leave the window in
 * the order they were inserted.
 */
export class SeenUrlTracker {
  private cache: LRUCache<ContentRef, true>;

  constructor(public readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Seen window capacity must be a positive integer, got ${capacity}`);
    }

    this.cache = new LRUCache<ContentRef, true>({
      max: capacity,
      updateAgeOnGet: false,
      updateAgeOnHas: false,
    });
  }

  /**
   * @returns true when `ref` was newly added, false when it was already seen
   */
  markSeen(ref: ContentRef): boolean {
    if (this.cache.has(ref)) {
      return false;
    }
    this.cache.set(ref, true);
    return true;
  }

  isSeen(ref: ContentRef): boolean {
    return this.cache.has(ref);
  }

  /**
   * Trims the window back to capacity, oldest first.
   * @returns how many identifiers were dropped
   */
  pruneIfNeeded(): number {
    let trimmed = 0;
    for (const ref of [...this.cache.rkeys()]) {
      if (this.cache.size <= this.capacity) {
        break;
      }
      this.cache.delete(ref);
      trimmed++;
    }
    return trimmed;
  }

  get size(): number {
    return this.cache.size;
  }

  /** Identifiers in insertion order, oldest first */
  toArray(): ContentRef[] {
    return [...this.cache.rkeys()];
  }
}
