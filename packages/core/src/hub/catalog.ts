/**
 * Hub phoneme catalogs.
 *
 * Each script family maps its graphemes onto one closed catalog: Brahmic
 * scripts onto the Indic hub (upper-case ids, with dependent vowel signs and
 * a virama), alphabetic schemes onto the Roman hub (lower-case ids, vowels
 * always written out). The two id spaces never overlap.
 */

export type PhonemeKind =
  | 'vowel'
  | 'vowel-sign'
  | 'consonant'
  | 'virama'
  | 'mark'
  | 'digit'
  | 'punctuation';

export const INDIC_CATALOG = {
  A: 'vowel',
  AA: 'vowel',
  I: 'vowel',
  II: 'vowel',
  U: 'vowel',
  UU: 'vowel',
  VOC_R: 'vowel',
  VOC_RR: 'vowel',
  VOC_L: 'vowel',
  VOC_LL: 'vowel',
  E: 'vowel',
  AI: 'vowel',
  O: 'vowel',
  AU: 'vowel',

  SIGN_AA: 'vowel-sign',
  SIGN_I: 'vowel-sign',
  SIGN_II: 'vowel-sign',
  SIGN_U: 'vowel-sign',
  SIGN_UU: 'vowel-sign',
  SIGN_VOC_R: 'vowel-sign',
  SIGN_VOC_RR: 'vowel-sign',
  SIGN_VOC_L: 'vowel-sign',
  SIGN_VOC_LL: 'vowel-sign',
  SIGN_E: 'vowel-sign',
  SIGN_AI: 'vowel-sign',
  SIGN_O: 'vowel-sign',
  SIGN_AU: 'vowel-sign',

  KA: 'consonant',
  KHA: 'consonant',
  GA: 'consonant',
  GHA: 'consonant',
  NGA: 'consonant',
  CA: 'consonant',
  CHA: 'consonant',
  JA: 'consonant',
  JHA: 'consonant',
  NYA: 'consonant',
  TTA: 'consonant',
  TTHA: 'consonant',
  DDA: 'consonant',
  DDHA: 'consonant',
  NNA: 'consonant',
  TA: 'consonant',
  THA: 'consonant',
  DA: 'consonant',
  DHA: 'consonant',
  NA: 'consonant',
  PA: 'consonant',
  PHA: 'consonant',
  BA: 'consonant',
  BHA: 'consonant',
  MA: 'consonant',
  YA: 'consonant',
  RA: 'consonant',
  LA: 'consonant',
  LLA: 'consonant',
  VA: 'consonant',
  SHA: 'consonant',
  SSA: 'consonant',
  SA: 'consonant',
  HA: 'consonant',
  // nukta forms
  QA: 'consonant',
  KHHA: 'consonant',
  GHHA: 'consonant',
  ZA: 'consonant',
  DDDA: 'consonant',
  RHA: 'consonant',
  FA: 'consonant',
  YYA: 'consonant',

  VIRAMA: 'virama',
  ANUSVARA: 'mark',
  VISARGA: 'mark',
  CANDRABINDU: 'mark',
  AVAGRAHA: 'mark',
  UDATTA: 'mark',
  ANUDATTA: 'mark',
  OM: 'mark',

  DANDA: 'punctuation',
  DOUBLE_DANDA: 'punctuation',

  DIGIT_0: 'digit',
  DIGIT_1: 'digit',
  DIGIT_2: 'digit',
  DIGIT_3: 'digit',
  DIGIT_4: 'digit',
  DIGIT_5: 'digit',
  DIGIT_6: 'digit',
  DIGIT_7: 'digit',
  DIGIT_8: 'digit',
  DIGIT_9: 'digit',
} as const satisfies Record<string, PhonemeKind>;

export const ROMAN_CATALOG = {
  a: 'vowel',
  aa: 'vowel',
  i: 'vowel',
  ii: 'vowel',
  u: 'vowel',
  uu: 'vowel',
  r_voc: 'vowel',
  rr_voc: 'vowel',
  l_voc: 'vowel',
  ll_voc: 'vowel',
  e: 'vowel',
  ai: 'vowel',
  o: 'vowel',
  au: 'vowel',

  k: 'consonant',
  kh: 'consonant',
  g: 'consonant',
  gh: 'consonant',
  ng: 'consonant',
  c: 'consonant',
  ch: 'consonant',
  j: 'consonant',
  jh: 'consonant',
  ny: 'consonant',
  tt: 'consonant',
  tth: 'consonant',
  dd: 'consonant',
  ddh: 'consonant',
  nn: 'consonant',
  t: 'consonant',
  th: 'consonant',
  d: 'consonant',
  dh: 'consonant',
  n: 'consonant',
  p: 'consonant',
  ph: 'consonant',
  b: 'consonant',
  bh: 'consonant',
  m: 'consonant',
  y: 'consonant',
  r: 'consonant',
  l: 'consonant',
  lla: 'consonant',
  v: 'consonant',
  sh: 'consonant',
  ss: 'consonant',
  s: 'consonant',
  h: 'consonant',
  q: 'consonant',
  khh: 'consonant',
  ghh: 'consonant',
  z: 'consonant',
  rra: 'consonant',
  rrha: 'consonant',
  f: 'consonant',
  yy: 'consonant',

  anusvara: 'mark',
  visarga: 'mark',
  candrabindu: 'mark',
  avagraha: 'mark',
} as const satisfies Record<string, PhonemeKind>;

export type IndicPhoneme = keyof typeof INDIC_CATALOG;
export type RomanPhoneme = keyof typeof ROMAN_CATALOG;
export type HubPhoneme = IndicPhoneme | RomanPhoneme;
export type HubName = 'indic' | 'roman';

export function isIndicPhoneme(id: string): id is IndicPhoneme {
  return Object.prototype.hasOwnProperty.call(INDIC_CATALOG, id);
}

export function isRomanPhoneme(id: string): id is RomanPhoneme {
  return Object.prototype.hasOwnProperty.call(ROMAN_CATALOG, id);
}

export function isHubPhoneme(hub: HubName, id: string): boolean {
  return hub === 'indic' ? isIndicPhoneme(id) : isRomanPhoneme(id);
}

export function phonemeKind(id: string): PhonemeKind | null {
  if (isIndicPhoneme(id)) return INDIC_CATALOG[id];
  if (isRomanPhoneme(id)) return ROMAN_CATALOG[id];
  return null;
}

// Dependent sign <-> independent vowel. The inherent vowel A has no sign.
export const SIGN_TO_VOWEL: ReadonlyMap<IndicPhoneme, IndicPhoneme> = new Map<IndicPhoneme, IndicPhoneme>([
  ['SIGN_AA', 'AA'],
  ['SIGN_I', 'I'],
  ['SIGN_II', 'II'],
  ['SIGN_U', 'U'],
  ['SIGN_UU', 'UU'],
  ['SIGN_VOC_R', 'VOC_R'],
  ['SIGN_VOC_RR', 'VOC_RR'],
  ['SIGN_VOC_L', 'VOC_L'],
  ['SIGN_VOC_LL', 'VOC_LL'],
  ['SIGN_E', 'E'],
  ['SIGN_AI', 'AI'],
  ['SIGN_O', 'O'],
  ['SIGN_AU', 'AU'],
]);

export const VOWEL_TO_SIGN: ReadonlyMap<IndicPhoneme, IndicPhoneme> = new Map(
  [...SIGN_TO_VOWEL].map(([sign, vowel]) => [vowel, sign]),
);

export const INHERENT_VOWEL: IndicPhoneme = 'A';
