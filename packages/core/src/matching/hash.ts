// lipika/matching/hash - Direct key lookup, longest candidate window first

import type { Match, MappingTable, Matcher } from './types.js';
import { assertUsableKeys, scanWithLookup } from './types.js';

export function createHashMatcher<V>(table: MappingTable<V>): Matcher<V> {
  assertUsableKeys(table);
  const entries = new Map<string, Match<V>>();
  for (const [key, value] of table) {
    entries.set(key, { key, value, length: key.length });
  }
  // Only lengths that occur as keys are tried.
  const lengths = [...new Set([...entries.keys()].map((k) => k.length))].sort((a, b) => b - a);

  const lookup = (text: string, offset: number): Match<V> | null => {
    const remaining = text.length - offset;
    for (const length of lengths) {
      if (length > remaining) continue;
      const match = entries.get(text.slice(offset, offset + length));
      if (match) return match;
    }
    return null;
  };

  return {
    strategy: 'hash',
    size: entries.size,
    maxKeyLength: lengths[0] ?? 0,
    lookup,
    scan: (text) => scanWithLookup(text, (offset) => lookup(text, offset)),
  };
}
