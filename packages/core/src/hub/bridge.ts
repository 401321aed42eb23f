// lipika/hub/bridge - The fixed correspondence between the Indic and Roman hubs.
// Nothing else in the engine imports both catalogs' phoneme ids.

import type { IndicPhoneme, RomanPhoneme } from './catalog.js';
import { isIndicPhoneme, isRomanPhoneme } from './catalog.js';

const ONE_TO_ONE: ReadonlyArray<readonly [IndicPhoneme, RomanPhoneme]> = [
  ['A', 'a'],
  ['AA', 'aa'],
  ['I', 'i'],
  ['II', 'ii'],
  ['U', 'u'],
  ['UU', 'uu'],
  ['VOC_R', 'r_voc'],
  ['VOC_RR', 'rr_voc'],
  ['VOC_L', 'l_voc'],
  ['VOC_LL', 'll_voc'],
  ['E', 'e'],
  ['AI', 'ai'],
  ['O', 'o'],
  ['AU', 'au'],

  ['KA', 'k'],
  ['KHA', 'kh'],
  ['GA', 'g'],
  ['GHA', 'gh'],
  ['NGA', 'ng'],
  ['CA', 'c'],
  ['CHA', 'ch'],
  ['JA', 'j'],
  ['JHA', 'jh'],
  ['NYA', 'ny'],
  ['TTA', 'tt'],
  ['TTHA', 'tth'],
  ['DDA', 'dd'],
  ['DDHA', 'ddh'],
  ['NNA', 'nn'],
  ['TA', 't'],
  ['THA', 'th'],
  ['DA', 'd'],
  ['DHA', 'dh'],
  ['NA', 'n'],
  ['PA', 'p'],
  ['PHA', 'ph'],
  ['BA', 'b'],
  ['BHA', 'bh'],
  ['MA', 'm'],
  ['YA', 'y'],
  ['RA', 'r'],
  ['LA', 'l'],
  ['LLA', 'lla'],
  ['VA', 'v'],
  ['SHA', 'sh'],
  ['SSA', 'ss'],
  ['SA', 's'],
  ['HA', 'h'],
  ['QA', 'q'],
  ['KHHA', 'khh'],
  ['GHHA', 'ghh'],
  ['ZA', 'z'],
  ['DDDA', 'rra'],
  ['RHA', 'rrha'],
  ['FA', 'f'],
  ['YYA', 'yy'],

  ['ANUSVARA', 'anusvara'],
  ['VISARGA', 'visarga'],
  ['CANDRABINDU', 'candrabindu'],
  ['AVAGRAHA', 'avagraha'],
];

// Decomposed on the Roman side; the reverse direction sees two phonemes.
const ONE_TO_MANY: ReadonlyArray<readonly [IndicPhoneme, readonly RomanPhoneme[]]> = [
  ['OM', ['o', 'anusvara']],
];

const INDIC_TO_ROMAN = new Map<IndicPhoneme, readonly RomanPhoneme[]>([
  ...ONE_TO_ONE.map(([indic, roman]) => [indic, [roman]] as const),
  ...ONE_TO_MANY,
]);

const ROMAN_TO_INDIC = new Map<RomanPhoneme, IndicPhoneme>(
  ONE_TO_ONE.map(([indic, roman]) => [roman, indic]),
);

/**
 * Map a resolved Indic phoneme (independent vowels only) onto the Roman hub.
 * Returns null when the Roman hub has no counterpart (accents, dandas,
 * digits, a stray virama).
 */
export function bridgeToRoman(phoneme: string): readonly RomanPhoneme[] | null {
  if (!isIndicPhoneme(phoneme)) return null;
  return INDIC_TO_ROMAN.get(phoneme) ?? null;
}

export function bridgeToIndic(phoneme: string): IndicPhoneme | null {
  if (!isRomanPhoneme(phoneme)) return null;
  return ROMAN_TO_INDIC.get(phoneme) ?? null;
}

export function bridgeEntries(): Array<{ indic: IndicPhoneme; roman: readonly RomanPhoneme[] }> {
  return [...INDIC_TO_ROMAN].map(([indic, roman]) => ({ indic, roman }));
}
