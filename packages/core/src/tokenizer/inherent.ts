/**
 * Brahmic inherent-vowel handling.
 *
 * Tokens record graphemes as written; a phoneme stream records what is
 * pronounced. A bare consonant carries the inherent vowel A unless the next
 * token is a vowel sign (which replaces it) or a virama (which removes it).
 * Both directions look at most one unit ahead.
 */

import type { IndicPhoneme } from '../hub/catalog.js';
import { INDIC_CATALOG, INHERENT_VOWEL, SIGN_TO_VOWEL, VOWEL_TO_SIGN, isIndicPhoneme } from '../hub/catalog.js';
import { startTimer } from '../profiling.js';
import type { Token } from '../types.js';

export interface PhonemeUnit {
  /** Hub phoneme, or null for content copied through verbatim */
  phoneme: string | null;
  /** Source text this unit stands for; empty for synthesized units */
  text: string;
  position: number;
  /** Token the unit came from, null when synthesized */
  source: Token | null;
  /** Inserted by resolution, composition or a 1:many bridge entry */
  synthetic: boolean;
}

export function unitFromToken(token: Token): PhonemeUnit {
  return { phoneme: token.phoneme, text: token.text, position: token.position, source: token, synthetic: false };
}

function indicKind(phoneme: string | null) {
  return phoneme !== null && isIndicPhoneme(phoneme) ? INDIC_CATALOG[phoneme] : null;
}

function synthesized(phoneme: IndicPhoneme, anchor: PhonemeUnit): PhonemeUnit {
  return { phoneme, text: '', position: anchor.position, source: anchor.source, synthetic: true };
}

/**
 * Raw Indic tokens -> phoneme units with explicit vowels and no signs or
 * viramas after consonants.
 */
export function resolveInherentVowels(tokens: Token[]): PhonemeUnit[] {
  const endTimer = startTimer('resolve');
  const units: PhonemeUnit[] = [];

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    const unit = unitFromToken(token);

    if (token.class === 'consonant') {
      const next = i + 1 < tokens.length ? tokens[i + 1] : null;
      if (next && next.class === 'vowel-sign' && next.phoneme !== null && isIndicPhoneme(next.phoneme)) {
        units.push(unit);
        units.push({ ...unitFromToken(next), phoneme: SIGN_TO_VOWEL.get(next.phoneme) ?? next.phoneme });
        i++;
      } else if (next && next.class === 'virama') {
        // Cluster: the virama is absorbed so passthrough keeps it attached.
        units.push({ ...unit, text: token.text + next.text });
        i++;
      } else {
        units.push(unit);
        units.push(synthesized(INHERENT_VOWEL, unit));
      }
      continue;
    }

    if (token.class === 'vowel-sign' && token.phoneme !== null && isIndicPhoneme(token.phoneme)) {
      units.push({ ...unit, phoneme: SIGN_TO_VOWEL.get(token.phoneme) ?? token.phoneme });
      continue;
    }

    units.push(unit);
  }

  endTimer();
  return units;
}

/**
 * Resolved Indic phoneme units -> units an Indic schema can render: the
 * inherent vowel disappears into its consonant, other vowels after a
 * consonant become signs, and a consonant with no vowel gets a virama.
 */
export function composeInherentVowels(units: PhonemeUnit[]): PhonemeUnit[] {
  const endTimer = startTimer('compose');
  const composed: PhonemeUnit[] = [];

  for (let i = 0; i < units.length; i++) {
    const unit = units[i];
    if (indicKind(unit.phoneme) !== 'consonant') {
      composed.push(unit);
      continue;
    }

    const next = i + 1 < units.length ? units[i + 1] : null;
    const nextPhoneme = next?.phoneme ?? null;
    if (next && nextPhoneme !== null && indicKind(nextPhoneme) === 'vowel' && isIndicPhoneme(nextPhoneme)) {
      if (nextPhoneme === INHERENT_VOWEL) {
        composed.push({ ...unit, text: unit.text + next.text });
      } else {
        composed.push(unit);
        composed.push({ ...next, phoneme: VOWEL_TO_SIGN.get(nextPhoneme) ?? nextPhoneme });
      }
      i++;
    } else {
      composed.push(unit);
      composed.push(synthesized('VIRAMA', unit));
    }
  }

  endTimer();
  return composed;
}
