import { describe, test, expect } from 'vitest';
import {
  SchemaRepository,
  classifyUnmatched,
  composeInherentVowels,
  createMatcher,
  resolveInherentVowels,
  tokenize,
  type PhonemeUnit,
} from '@lipika/core';

const repository = SchemaRepository.create();
const devanagari = repository.load('devanagari');
const iast = repository.load('iast');
const devaMatcher = createMatcher('hash', devanagari.graphemes);
const iastMatcher = createMatcher('automaton', iast.graphemes);

function unit(phoneme: string, text: string, position = 0): PhonemeUnit {
  return { phoneme, text, position, source: null, synthetic: false };
}

describe('tokenize', () => {
  test('records raw graphemes with classes and positions', () => {
    const tokens = tokenize('धर्म', devaMatcher);
    expect(tokens.map((t) => [t.class, t.text, t.phoneme, t.position])).toEqual([
      ['consonant', 'ध', 'DHA', 0],
      ['consonant', 'र', 'RA', 1],
      ['virama', '्', 'VIRAMA', 2],
      ['consonant', 'म', 'MA', 3],
    ]);
  });

  test('prefers the longest grapheme', () => {
    expect(tokenize('khai', iastMatcher).map((t) => t.text)).toEqual(['kh', 'ai']);
    expect(tokenize('saṃskṛtam', iastMatcher).map((t) => t.phoneme)).toEqual([
      's', 'a', 'anusvara', 's', 'k', 'r_voc', 't', 'a', 'm',
    ]);
  });

  test('decomposed nukta consonants match the alias as one token', () => {
    const [token] = tokenize('\u0915\u093C', devaMatcher);
    expect(token).toEqual({ class: 'consonant', text: '\u0915\u093C', phoneme: 'QA', position: 0, extension: true });
  });

  test('classifies unmatched code points', () => {
    const tokens = tokenize('k5 ॓', devaMatcher);
    expect(tokens.map((t) => [t.class, t.phoneme])).toEqual([
      ['unknown', null],
      ['digit', null],
      ['punctuation', null],
      ['unknown', null],
    ]);
    expect(classifyUnmatched('?')).toBe('punctuation');
    expect(classifyUnmatched('\n')).toBe('punctuation');
    expect(classifyUnmatched('٣')).toBe('digit');
    expect(classifyUnmatched('ж')).toBe('unknown');
  });

  test('empty text has no tokens', () => {
    expect(tokenize('', devaMatcher)).toEqual([]);
  });
});

describe('resolveInherentVowels', () => {
  const resolve = (text: string) => resolveInherentVowels(tokenize(text, devaMatcher));

  test('bare consonants carry the inherent vowel, viramas remove it', () => {
    const units = resolve('धर्म');
    expect(units.map((u) => u.phoneme)).toEqual(['DHA', 'A', 'RA', 'MA', 'A']);
    expect(units.map((u) => u.synthetic)).toEqual([false, true, false, false, true]);
    expect(units[2].text).toBe('र्');
  });

  test('a vowel sign replaces the inherent vowel', () => {
    expect(resolve('कि').map((u) => u.phoneme)).toEqual(['KA', 'I']);
    expect(resolve('कौ').map((u) => u.phoneme)).toEqual(['KA', 'AU']);
  });

  test('stray signs and viramas', () => {
    expect(resolve('ि').map((u) => u.phoneme)).toEqual(['I']);
    expect(resolve('्').map((u) => u.phoneme)).toEqual(['VIRAMA']);
  });

  test('marks after a consonant leave the inherent vowel in place', () => {
    expect(resolve('कं').map((u) => u.phoneme)).toEqual(['KA', 'A', 'ANUSVARA']);
  });
});

describe('composeInherentVowels', () => {
  test('the inherent vowel merges into its consonant', () => {
    const composed = composeInherentVowels([unit('KA', 'k'), unit('A', 'a', 1)]);
    expect(composed).toEqual([unit('KA', 'ka')]);
  });

  test('other vowels after a consonant become signs', () => {
    const composed = composeInherentVowels([unit('KA', 'k'), unit('I', 'i', 1)]);
    expect(composed.map((u) => [u.phoneme, u.text])).toEqual([
      ['KA', 'k'],
      ['SIGN_I', 'i'],
    ]);
  });

  test('a consonant without a vowel gets a synthetic virama', () => {
    const composed = composeInherentVowels([unit('KA', 'k'), unit('KA', 'k', 1), unit('A', 'a', 2)]);
    expect(composed.map((u) => [u.phoneme, u.synthetic])).toEqual([
      ['KA', false],
      ['VIRAMA', true],
      ['KA', false],
    ]);
  });

  test('independent vowels elsewhere are left alone', () => {
    const composed = composeInherentVowels([unit('A', 'a'), unit('ANUSVARA', 'ṃ', 1)]);
    expect(composed.map((u) => u.phoneme)).toEqual(['A', 'ANUSVARA']);
  });
});
