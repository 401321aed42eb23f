// lipika/matching - Strategy selection and cross-strategy checks

import { InvariantViolationError } from '../errors.js';
import { startTimer } from '../profiling.js';
import type { MatchStrategy } from '../types.js';
import { MATCH_STRATEGIES } from '../types.js';
import { createAutomatonMatcher } from './automaton.js';
import { createHashMatcher } from './hash.js';
import { createPrefixMatcher } from './prefix.js';
import type { MappingTable, Matcher, ScanSegment } from './types.js';

export type { Match, MappingTable, Matcher, ScanSegment } from './types.js';

export function createMatcher<V>(strategy: MatchStrategy, table: MappingTable<V>): Matcher<V> {
  const endTimer = startTimer('compileMatcher');
  try {
    switch (strategy) {
      case 'hash':
        return createHashMatcher(table);
      case 'automaton':
        return createAutomatonMatcher(table);
      case 'prefix':
        return createPrefixMatcher(table);
    }
  } finally {
    endTimer();
  }
}

export function isMatchStrategy(value: string): value is MatchStrategy {
  return MATCH_STRATEGIES.some((s) => s === value);
}

function describeSegments<V>(segments: ScanSegment<V>[]): string {
  return segments
    .map((s) => (s.kind === 'match' ? `${s.position}:${s.match.key}` : `${s.position}:?${s.text}`))
    .join(' ');
}

/**
 * Scan `text` with every strategy and throw InvariantViolationError on the
 * first disagreement in keys, consumed lengths or values.
 */
export function crossCheckMatchers<V>(table: MappingTable<V>, text: string): ScanSegment<V>[] {
  const [reference, ...others] = MATCH_STRATEGIES.map((strategy) => createMatcher(strategy, table));
  const expected = reference.scan(text);
  const expectedShape = describeSegments(expected);

  for (const matcher of others) {
    const actual = matcher.scan(text);
    const actualShape = describeSegments(actual);
    const sameValues =
      actualShape === expectedShape &&
      actual.every((segment, i) => {
        const other = expected[i];
        return segment.kind !== 'match' || (other.kind === 'match' && other.match.value === segment.match.value);
      });
    if (!sameValues) {
      throw new InvariantViolationError(
        `Matching strategies disagree on ${JSON.stringify(text)}: ${reference.strategy} [${expectedShape}] vs ${matcher.strategy} [${actualShape}]`,
      );
    }
  }
  return expected;
}
