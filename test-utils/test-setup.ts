// Shared test setup utilities
import { beforeAll } from 'vitest';
import { initializeTransliterator, resetConfig, type ScriptSchema, type Transliterator } from '@lipika/core';

let setupComplete = false;

// Build the default transliterator once per test file before any test runs
export function setupTests(): void {
  beforeAll(() => {
    if (setupComplete) {
      return;
    }
    resetConfig();
    const start = performance.now();
    const engine = initializeTransliterator();
    const elapsed = performance.now() - start;
    console.log(
      `Transliterator ready in ${elapsed.toFixed(0)}ms (${engine.listSupportedScripts().length} scripts, ${engine.directPairs().length} direct paths)`,
    );
    setupComplete = true;
  });
}

export type Rng = () => number;

/** Deterministic PRNG (mulberry32) so property checks replay identically. */
export function seededRng(seed: number): Rng {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function pick<T>(rng: Rng, items: readonly T[]): T {
  return items[Math.floor(rng() * items.length)];
}

/** Canonical graphemes outside the extension set */
export function baseGraphemes(schema: ScriptSchema): string[] {
  return [...schema.graphemes.values()]
    .filter((entry) => entry.aliasOf === null && !entry.extension)
    .map((entry) => entry.grapheme);
}

export function allGraphemes(schema: ScriptSchema): string[] {
  return [...schema.graphemes.keys()];
}

export const PASSTHROUGH_FILLER = [' ', ',', '-', '\n', '7', '?'];

export interface RandomTextOptions {
  length?: number;
  /** Draw from every grapheme, aliases and extensions included */
  allGraphemes?: boolean;
  /** Chance of inserting passthrough filler instead of a grapheme */
  fillerRate?: number;
}

export function randomText(rng: Rng, schema: ScriptSchema, options: RandomTextOptions = {}): string {
  const pool = options.allGraphemes ? allGraphemes(schema) : baseGraphemes(schema);
  const length = options.length ?? 12;
  const fillerRate = options.fillerRate ?? 0;
  let text = '';
  for (let i = 0; i < length; i++) {
    text += rng() < fillerRate ? pick(rng, PASSTHROUGH_FILLER) : pick(rng, pool);
  }
  return text;
}

export function schemaOf(engine: Transliterator, name: string): ScriptSchema {
  return engine.repository.load(name);
}
