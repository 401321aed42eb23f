/**
 * Path optimizer.
 *
 * Flattens a chained path into one source-text -> output table by running
 * the chain on every source grapheme and on every consonant followed by
 * whatever decides its vowel (sign or virama for Brahmic sources, a written
 * vowel for Roman ones). Whether a pair may be flattened is checked once,
 * here, by replaying test inputs through both forms; a pair that disagrees
 * on any of them stays chained.
 */

import { LRUCache } from 'lru-cache';
import { dp } from '../debug.js';
import { PathCompositionError } from '../errors.js';
import { createMatcher } from '../matching/index.js';
import type { Matcher } from '../matching/types.js';
import { startTimer } from '../profiling.js';
import type { GraphemeEntry } from '../schema/compile.js';
import type { MatchStrategy } from '../types.js';
import type { ChainedPath, DirectPath } from './chain.js';
import { runChain } from './chain.js';

export interface PathReportEntry {
  from: string;
  to: string;
  status: 'direct' | 'rejected';
  entries: number;
  /** Composite keys that were already graphemes of the source */
  collisions: number;
  reason: string | null;
  buildMs: number;
}

export type FlattenResult =
  | { ok: true; path: DirectPath; report: PathReportEntry }
  | { ok: false; report: PathReportEntry };

export function runDirect(path: DirectPath, text: string): string {
  const endTimer = startTimer('directScan');
  let output = '';
  for (const segment of path.matcher.scan(text)) {
    output += segment.kind === 'match' ? segment.match.value : segment.text;
  }
  endTimer();
  return output;
}

function contextFollowers(chain: ChainedPath): GraphemeEntry[] {
  const entries = [...chain.from.graphemes.values()];
  return chain.from.hub === 'indic'
    ? entries.filter((e) => e.kind === 'vowel-sign' || e.kind === 'virama')
    : entries.filter((e) => e.kind === 'vowel');
}

export function buildDirectTable(
  chain: ChainedPath,
  sourceMatcher: Matcher<GraphemeEntry>,
): { table: Map<string, string>; collisions: number } {
  const endTimer = startTimer('flatten');
  const table = new Map<string, string>();
  for (const grapheme of chain.from.graphemes.keys()) {
    table.set(grapheme, runChain(chain, grapheme, sourceMatcher));
  }

  let collisions = 0;
  const consonants = [...chain.from.graphemes.values()].filter((e) => e.kind === 'consonant');
  const followers = contextFollowers(chain);
  for (const consonant of consonants) {
    for (const follower of followers) {
      const key = consonant.grapheme + follower.grapheme;
      if (table.has(key)) {
        collisions++;
        continue;
      }
      table.set(key, runChain(chain, key, sourceMatcher));
    }
  }
  endTimer();
  return { table, collisions };
}

function* validationInputs(chain: ChainedPath): Generator<string> {
  const graphemes = [...chain.from.graphemes.keys()];
  yield* graphemes;
  for (const first of graphemes) {
    for (const second of graphemes) {
      yield first + second;
    }
  }
  if (chain.from.sample) yield chain.from.sample;
}

/**
 * First input on which the direct table and the chain disagree, or null.
 */
export function findMismatch(
  path: DirectPath,
  sourceMatcher: Matcher<GraphemeEntry>,
): { input: string; direct: string; chained: string } | null {
  const endTimer = startTimer('validatePath');
  try {
    for (const input of validationInputs(path.chain)) {
      const direct = runDirect(path, input);
      const chained = runChain(path.chain, input, sourceMatcher);
      if (direct !== chained) {
        return { input, direct, chained };
      }
    }
    return null;
  } finally {
    endTimer();
  }
}

// Schemas never change after compile, so a flattened pair can be shared by
// every transliterator built over the same compiled tables.
const flattenCache = new LRUCache<string, FlattenResult>({ max: 512 });

export interface FlattenOptions {
  strategy: MatchStrategy;
  /** Throw PathCompositionError instead of leaving the pair chained */
  forced?: boolean;
}

export function flattenPath(
  chain: ChainedPath,
  sourceMatcher: Matcher<GraphemeEntry>,
  options: FlattenOptions,
): FlattenResult {
  const cacheKey = `${chain.from.tableId}>${chain.to.tableId}:${options.strategy}`;
  let result = flattenCache.get(cacheKey);
  if (!result) {
    result = computeFlatten(chain, sourceMatcher, options.strategy);
    flattenCache.set(cacheKey, result);
  }

  if (!result.ok) {
    dp(`Direct path ${chain.from.id} -> ${chain.to.id} rejected: ${result.report.reason}`);
    if (options.forced) {
      throw new PathCompositionError(chain.from.id, chain.to.id, result.report.reason ?? 'validation failed');
    }
  }
  return result;
}

function computeFlatten(
  chain: ChainedPath,
  sourceMatcher: Matcher<GraphemeEntry>,
  strategy: MatchStrategy,
): FlattenResult {
  const started = performance.now();
  const { table, collisions } = buildDirectTable(chain, sourceMatcher);
  const path: DirectPath = {
    kind: 'direct',
    from: chain.from,
    to: chain.to,
    table,
    tableId: `${chain.from.tableId}>${chain.to.tableId}`,
    matcher: createMatcher(strategy, table),
    chain,
  };

  const mismatch = findMismatch(path, sourceMatcher);
  const report: PathReportEntry = {
    from: chain.from.id,
    to: chain.to.id,
    status: mismatch ? 'rejected' : 'direct',
    entries: table.size,
    collisions,
    reason: mismatch
      ? `input ${JSON.stringify(mismatch.input)}: direct ${JSON.stringify(mismatch.direct)} != chained ${JSON.stringify(mismatch.chained)}`
      : null,
    buildMs: performance.now() - started,
  };
  return mismatch ? { ok: false, report } : { ok: true, path, report };
}
