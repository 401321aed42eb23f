// lipika/matching/prefix - Keys bucketed by first code point, each bucket longest first

import type { Match, MappingTable, Matcher } from './types.js';
import { assertUsableKeys, codePointWidth, scanWithLookup } from './types.js';

export function createPrefixMatcher<V>(table: MappingTable<V>): Matcher<V> {
  assertUsableKeys(table);
  const buckets = new Map<string, Match<V>[]>();
  let maxKeyLength = 0;

  for (const [key, value] of table) {
    const head = key.slice(0, codePointWidth(key, 0));
    let bucket = buckets.get(head);
    if (!bucket) {
      bucket = [];
      buckets.set(head, bucket);
    }
    bucket.push({ key, value, length: key.length });
    maxKeyLength = Math.max(maxKeyLength, key.length);
  }
  for (const bucket of buckets.values()) {
    bucket.sort((a, b) => b.length - a.length);
  }

  const lookup = (text: string, offset: number): Match<V> | null => {
    if (offset >= text.length) return null;
    const bucket = buckets.get(text.slice(offset, offset + codePointWidth(text, offset)));
    if (!bucket) return null;
    for (const candidate of bucket) {
      if (text.startsWith(candidate.key, offset)) return candidate;
    }
    return null;
  };

  return {
    strategy: 'prefix',
    size: table.size,
    maxKeyLength,
    lookup,
    scan: (text) => scanWithLookup(text, (offset) => lookup(text, offset)),
  };
}
