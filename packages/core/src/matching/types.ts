// lipika/matching/types - The lookup contract shared by every matching strategy

import type { MatchStrategy } from '../types.js';

export interface Match<V> {
  key: string;
  value: V;
  /** UTF-16 code units consumed */
  length: number;
}

export type ScanSegment<V> =
  | { kind: 'match'; position: number; match: Match<V> }
  | { kind: 'gap'; position: number; text: string };

export interface Matcher<V> {
  readonly strategy: MatchStrategy;
  readonly size: number;
  readonly maxKeyLength: number;
  /** Longest key that is a prefix of `text` at `offset`, or null */
  lookup(text: string, offset: number): Match<V> | null;
  /**
   * Greedy leftmost-longest segmentation of the whole input. Positions not
   * covered by a key come back as one-code-point gaps.
   */
  scan(text: string): ScanSegment<V>[];
}

export type MappingTable<V> = ReadonlyMap<string, V>;

// Surrogate-pair aware width of the code point at `offset`.
export function codePointWidth(text: string, offset: number): number {
  const cp = text.codePointAt(offset);
  return cp !== undefined && cp > 0xffff ? 2 : 1;
}

/**
 * The scan every table-lookup strategy shares: at each offset take the
 * longest key, otherwise emit one code point as a gap.
 */
export function scanWithLookup<V>(text: string, lookup: (offset: number) => Match<V> | null): ScanSegment<V>[] {
  const segments: ScanSegment<V>[] = [];
  let offset = 0;
  while (offset < text.length) {
    const match = lookup(offset);
    if (match) {
      segments.push({ kind: 'match', position: offset, match });
      offset += match.length;
    } else {
      const width = codePointWidth(text, offset);
      segments.push({ kind: 'gap', position: offset, text: text.slice(offset, offset + width) });
      offset += width;
    }
  }
  return segments;
}

export function assertUsableKeys<V>(table: MappingTable<V>): void {
  for (const key of table.keys()) {
    if (key.length === 0) {
      throw new Error('Mapping tables cannot contain an empty key');
    }
  }
}
