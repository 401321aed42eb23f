// lipika/paths/profiles - Which (source, target) pairs get a flattened direct path

import type { ScriptSchema } from '../schema/compile.js';
import type { OptimizationProfile } from '../types.js';

export type ScriptPair = readonly [from: string, to: string];

// Curated from the pairs corpus pipelines convert most.
export const COMMON_PAIRS: readonly ScriptPair[] = [
  ['iast', 'slp1'],
  ['slp1', 'iast'],
  ['iast', 'itrans'],
  ['itrans', 'iast'],
  ['iast', 'harvard_kyoto'],
  ['harvard_kyoto', 'iast'],
  ['devanagari', 'iast'],
  ['devanagari', 'slp1'],
  ['telugu', 'iast'],
  ['telugu', 'slp1'],
  ['gujarati', 'iast'],
  ['iast', 'devanagari'],
  ['slp1', 'devanagari'],
  ['iast', 'telugu'],
  ['slp1', 'telugu'],
  ['iast', 'kannada'],
  ['iast', 'gujarati'],
];

export function profilePairs(profile: OptimizationProfile, schemas: readonly ScriptSchema[]): ScriptPair[] {
  const ids = new Set(schemas.map((s) => s.id));
  const indic = schemas.filter((s) => s.hub === 'indic').map((s) => s.id);
  const roman = schemas.filter((s) => s.hub === 'roman').map((s) => s.id);
  const cross = (sources: string[], targets: string[]): ScriptPair[] =>
    sources.flatMap((from) => targets.filter((to) => to !== from).map((to) => [from, to] as const));

  switch (profile) {
    case 'none':
      return [];
    case 'common-pairs':
      return COMMON_PAIRS.filter(([from, to]) => ids.has(from) && ids.has(to));
    case 'all-roman-to-indic':
      return cross(roman, indic);
    case 'all-indic-to-roman':
      return cross(indic, roman);
    case 'all-pairs': {
      const all = schemas.map((s) => s.id);
      return cross(all, all);
    }
  }
}
