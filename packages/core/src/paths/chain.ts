/**
 * Conversion paths and the general hub chain.
 *
 * A chained path tokenizes with the source schema, moves the phoneme stream
 * onto the target's hub (resolving or composing inherent vowels around the
 * bridge when the families differ) and renders with the target schema.
 * Anything a stage cannot carry is copied through as source text.
 */

import { bridgeToIndic, bridgeToRoman } from '../hub/bridge.js';
import { INDIC_CATALOG, SIGN_TO_VOWEL, isIndicPhoneme } from '../hub/catalog.js';
import type { Matcher } from '../matching/types.js';
import type { UnknownTokenCollector } from '../metadata.js';
import { startTimer } from '../profiling.js';
import type { GraphemeEntry, ScriptSchema } from '../schema/compile.js';
import type { PhonemeUnit } from '../tokenizer/inherent.js';
import { composeInherentVowels, resolveInherentVowels, unitFromToken } from '../tokenizer/inherent.js';
import { tokenize } from '../tokenizer/tokenize.js';

export type ChainStage = 'tokenize' | 'resolve' | 'bridge' | 'compose' | 'render';

export interface IdentityPath {
  kind: 'identity';
  from: ScriptSchema;
  to: ScriptSchema;
}

export interface ChainedPath {
  kind: 'chained';
  from: ScriptSchema;
  to: ScriptSchema;
  stages: readonly ChainStage[];
}

export interface DirectPath {
  kind: 'direct';
  from: ScriptSchema;
  to: ScriptSchema;
  /** source text -> output, evaluated through `chain` */
  table: ReadonlyMap<string, string>;
  tableId: string;
  matcher: Matcher<string>;
  chain: ChainedPath;
}

export type ConversionPath = IdentityPath | ChainedPath | DirectPath;

export function planChain(from: ScriptSchema, to: ScriptSchema): ChainedPath {
  let stages: ChainStage[];
  if (from.hub === to.hub) {
    stages = ['tokenize', 'render'];
  } else if (from.hub === 'indic') {
    stages = ['tokenize', 'resolve', 'bridge', 'render'];
  } else {
    stages = ['tokenize', 'bridge', 'compose', 'render'];
  }
  return { kind: 'chained', from, to, stages };
}

function passesThroughQuietly(phoneme: string): boolean {
  if (!isIndicPhoneme(phoneme)) return false;
  const kind = INDIC_CATALOG[phoneme];
  return kind === 'digit' || kind === 'punctuation';
}

type FailureSink = ((unit: PhonemeUnit) => void) | null;

function bridgeUnits(units: PhonemeUnit[], target: ScriptSchema, onFailure: FailureSink): PhonemeUnit[] {
  const endTimer = startTimer('bridge');
  const bridged: PhonemeUnit[] = [];
  for (const unit of units) {
    if (unit.phoneme === null) {
      bridged.push(unit);
      continue;
    }
    if (target.hub === 'roman') {
      const mapped = bridgeToRoman(unit.phoneme);
      if (!mapped || mapped.length === 0) {
        // Indic digits and dandas have no Roman form but are not unknown text
        if (!passesThroughQuietly(unit.phoneme)) onFailure?.(unit);
        bridged.push({ ...unit, phoneme: null });
        continue;
      }
      mapped.forEach((phoneme, i) => {
        bridged.push(i === 0 ? { ...unit, phoneme } : { ...unit, phoneme, text: '', synthetic: true });
      });
    } else {
      const mapped = bridgeToIndic(unit.phoneme);
      if (mapped === null) onFailure?.(unit);
      bridged.push({ ...unit, phoneme: mapped });
    }
  }
  endTimer();
  return bridged;
}

function renderUnits(units: PhonemeUnit[], target: ScriptSchema, onFailure: FailureSink): string {
  const endTimer = startTimer('render');
  let output = '';
  let lastFailed = false;

  for (const unit of units) {
    if (unit.synthetic && lastFailed) continue;
    if (unit.phoneme === null) {
      output += unit.text;
      lastFailed = false;
      continue;
    }

    let phoneme = unit.phoneme;
    // A sign cannot attach to a consonant that was copied through.
    if (lastFailed && isIndicPhoneme(phoneme) && INDIC_CATALOG[phoneme] === 'vowel-sign') {
      phoneme = SIGN_TO_VOWEL.get(phoneme) ?? phoneme;
    }

    const rendered = target.renderings.get(phoneme);
    if (rendered === undefined) {
      onFailure?.(unit);
      output += unit.text;
      lastFailed = !unit.synthetic;
    } else {
      output += rendered;
      if (!unit.synthetic) lastFailed = false;
    }
  }

  endTimer();
  return output;
}

/**
 * Run the full chain. `collector` is null on the plain convert path.
 */
export function runChain(
  path: ChainedPath,
  text: string,
  matcher: Matcher<GraphemeEntry>,
  collector: UnknownTokenCollector | null = null,
): string {
  const onFailure: FailureSink = collector ? (unit) => collector.recordUnresolved(unit) : null;
  const tokens = tokenize(text, matcher);
  collector?.observeTokens(tokens);

  let units: PhonemeUnit[] = tokens.map(unitFromToken);
  let output = '';
  for (const stage of path.stages) {
    switch (stage) {
      case 'tokenize':
        break;
      case 'resolve':
        units = resolveInherentVowels(tokens);
        break;
      case 'bridge':
        units = bridgeUnits(units, path.to, onFailure);
        break;
      case 'compose':
        units = composeInherentVowels(units);
        break;
      case 'render':
        output = renderUnits(units, path.to, onFailure);
        break;
    }
  }
  return output;
}

export function describePath(path: ConversionPath): { kind: ConversionPath['kind']; stages: string[] } {
  switch (path.kind) {
    case 'identity':
      return { kind: 'identity', stages: [] };
    case 'chained':
      return { kind: 'chained', stages: [...path.stages] };
    case 'direct':
      return { kind: 'direct', stages: ['direct-scan'] };
  }
}
