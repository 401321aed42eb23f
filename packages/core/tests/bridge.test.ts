import { describe, test, expect } from 'vitest';
import {
  INDIC_CATALOG,
  ROMAN_CATALOG,
  bridgeEntries,
  bridgeToIndic,
  bridgeToRoman,
  isIndicPhoneme,
  isRomanPhoneme,
} from '@lipika/core';

describe('hub bridge', () => {
  test('consonants, vowels and shared marks map one to one', () => {
    expect(bridgeToRoman('KA')).toEqual(['k']);
    expect(bridgeToRoman('VOC_R')).toEqual(['r_voc']);
    expect(bridgeToRoman('ANUSVARA')).toEqual(['anusvara']);
    expect(bridgeToIndic('ss')).toBe('SSA');
    expect(bridgeToIndic('avagraha')).toBe('AVAGRAHA');
  });

  test('OM decomposes on the Roman side only', () => {
    expect(bridgeToRoman('OM')).toEqual(['o', 'anusvara']);
    expect(bridgeToIndic('o')).toBe('O');
  });

  test('phonemes with no counterpart do not bridge', () => {
    for (const phoneme of ['UDATTA', 'ANUDATTA', 'DANDA', 'DOUBLE_DANDA', 'DIGIT_3', 'VIRAMA', 'SIGN_I']) {
      expect(bridgeToRoman(phoneme)).toBeNull();
    }
  });

  test('ids from the wrong hub are rejected', () => {
    expect(bridgeToRoman('k')).toBeNull();
    expect(bridgeToIndic('KA')).toBeNull();
    expect(bridgeToIndic('nonsense')).toBeNull();
  });

  test('every one-to-one entry round trips', () => {
    for (const { indic, roman } of bridgeEntries()) {
      expect(isIndicPhoneme(indic)).toBe(true);
      roman.forEach((r) => expect(isRomanPhoneme(r)).toBe(true));
      if (roman.length === 1) {
        expect(bridgeToIndic(roman[0])).toBe(indic);
      }
    }
  });

  test('every Roman phoneme has an Indic counterpart', () => {
    for (const phoneme of Object.keys(ROMAN_CATALOG)) {
      expect(bridgeToIndic(phoneme)).not.toBeNull();
    }
  });

  test('the two catalogs share no ids', () => {
    const indic = new Set(Object.keys(INDIC_CATALOG));
    expect(Object.keys(ROMAN_CATALOG).filter((id) => indic.has(id))).toEqual([]);
  });
});
