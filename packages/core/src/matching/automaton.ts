/**
 * Multi-pattern automaton (Aho-Corasick) over UTF-16 code units.
 *
 * Built once per table. `scan` makes a single pass over the input, recording
 * for every start offset the longest key found there (every match ending at
 * a position is reached through the dictionary links), then walks those
 * records leftmost-longest so the segmentation agrees with the table-lookup
 * strategies.
 */

import type { Match, MappingTable, Matcher, ScanSegment } from './types.js';
import { assertUsableKeys, codePointWidth } from './types.js';

class AutomatonNode<V> {
  children: Map<number, AutomatonNode<V>> = new Map();
  fail: AutomatonNode<V> | null = null;
  // Nearest node on the fail chain that ends a key.
  dictLink: AutomatonNode<V> | null = null;
  output: Match<V> | null = null;
}

export function createAutomatonMatcher<V>(table: MappingTable<V>): Matcher<V> {
  assertUsableKeys(table);
  const root = new AutomatonNode<V>();
  let maxKeyLength = 0;

  for (const [key, value] of table) {
    let node = root;
    for (let i = 0; i < key.length; i++) {
      const unit = key.charCodeAt(i);
      let child = node.children.get(unit);
      if (!child) {
        child = new AutomatonNode<V>();
        node.children.set(unit, child);
      }
      node = child;
    }
    node.output = { key, value, length: key.length };
    maxKeyLength = Math.max(maxKeyLength, key.length);
  }

  // Breadth-first so every fail target is finished before it is used.
  const queue: AutomatonNode<V>[] = [];
  for (const child of root.children.values()) {
    child.fail = root;
    queue.push(child);
  }
  for (let head = 0; head < queue.length; head++) {
    const node = queue[head];
    for (const [unit, child] of node.children) {
      let fallback = node.fail;
      while (fallback && !fallback.children.has(unit)) {
        fallback = fallback.fail;
      }
      const target = fallback?.children.get(unit) ?? root;
      child.fail = target;
      child.dictLink = target.output ? target : target.dictLink;
      queue.push(child);
    }
  }

  const step = (state: AutomatonNode<V>, unit: number): AutomatonNode<V> => {
    let current: AutomatonNode<V> | null = state;
    while (current && !current.children.has(unit)) {
      current = current.fail;
    }
    return current?.children.get(unit) ?? root;
  };

  const lookup = (text: string, offset: number): Match<V> | null => {
    let node = root;
    let best: Match<V> | null = null;
    for (let i = offset; i < text.length; i++) {
      const child = node.children.get(text.charCodeAt(i));
      if (!child) break;
      node = child;
      if (node.output) best = node.output;
    }
    return best;
  };

  const scan = (text: string): ScanSegment<V>[] => {
    const longestAt: Array<Match<V> | undefined> = new Array(text.length);
    let state = root;
    for (let i = 0; i < text.length; i++) {
      state = step(state, text.charCodeAt(i));
      let hit: AutomatonNode<V> | null = state.output ? state : state.dictLink;
      while (hit) {
        const match = hit.output;
        if (match) {
          const start = i - match.length + 1;
          const current = longestAt[start];
          if (!current || current.length < match.length) {
            longestAt[start] = match;
          }
        }
        hit = hit.dictLink;
      }
    }

    const segments: ScanSegment<V>[] = [];
    let offset = 0;
    while (offset < text.length) {
      const match = longestAt[offset];
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
  };

  return {
    strategy: 'automaton',
    size: table.size,
    maxKeyLength,
    lookup,
    scan,
  };
}
