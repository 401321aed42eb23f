import { LRUCache } from 'lru-cache';
import type { MatchStrategy } from '../types.js';
import { createMatcher } from './index.js';
import type { MappingTable, Matcher } from './types.js';

/**
 * Compiled matchers for per-call strategy overrides, keyed by table id and
 * strategy. A table id must change whenever the table's contents do.
 */
export class MatcherCache<V> {
  private readonly cache: LRUCache<string, Matcher<V>>;

  constructor(capacity = 256) {
    const max = Number.isFinite(capacity) && capacity > 0 ? Math.floor(capacity) : 256;
    this.cache = new LRUCache({ max });
  }

  get(tableId: string, strategy: MatchStrategy, build: () => MappingTable<V>): Matcher<V> {
    const cacheKey = `${tableId}:${strategy}`;
    let matcher = this.cache.get(cacheKey);
    if (!matcher) {
      matcher = createMatcher(strategy, build());
      this.cache.set(cacheKey, matcher);
    }
    return matcher;
  }
}
