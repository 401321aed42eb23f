import { describe, test, expect } from 'vitest';
import { Transliterator, convert, convertWithMetadata, getTransliterator, listSupportedScripts } from '@lipika/core';
import { randomText, schemaOf, seededRng, setupTests } from '@lipika/testing';

setupTests();

const PASSTHROUGH_SUFFIX = ' 0123456789.,;:!?()-\n';

const WORDS: Record<string, string[]> = {
  iast: ['dharma', 'kṣetre', 'rāmaḥ', 'saṃskṛtam', 'oṃ'],
  devanagari: ['धर्म', 'क्षेत्रे', 'रामः', 'संस्कृतम्', 'ॐ'],
  slp1: ['Darma', 'kzetre', 'rAmaH', 'saMskftam'],
  telugu: ['ధర్మ', 'రామః'],
};

describe('conversion properties', () => {
  test('converting to the same script is the identity', () => {
    const engine = getTransliterator();
    const rng = seededRng(7);
    for (const name of listSupportedScripts()) {
      const schema = schemaOf(engine, name);
      for (let i = 0; i < 20; i++) {
        const text = randomText(rng, schema, { allGraphemes: true, fillerRate: 0.2 });
        expect(convert(text, name, name)).toBe(text);
      }
    }
  });

  test('punctuation, spaces and ASCII digits pass through unchanged', () => {
    const engine = getTransliterator();
    const rng = seededRng(11);
    const scripts = listSupportedScripts();
    for (const from of scripts) {
      const text = randomText(rng, schemaOf(engine, from), { length: 8 });
      for (const to of scripts) {
        expect(convert(text + PASSTHROUGH_SUFFIX, from, to)).toBe(convert(text, from, to) + PASSTHROUGH_SUFFIX);
        expect(convert(PASSTHROUGH_SUFFIX, from, to)).toBe(PASSTHROUGH_SUFFIX);
      }
      expect(convertWithMetadata(PASSTHROUGH_SUFFIX, from, 'iast').metadata.unknown_tokens).toEqual([]);
    }
  });

  test('devanagari and telugu round trip', () => {
    const engine = getTransliterator();
    const rng = seededRng(13);
    const devanagari = schemaOf(engine, 'devanagari');
    for (let i = 0; i < 50; i++) {
      const text = randomText(rng, devanagari, { length: 16 });
      expect(convert(convert(text, 'devanagari', 'telugu'), 'telugu', 'devanagari')).toBe(text);
    }
  });

  test('iast and slp1 round trip', () => {
    const engine = getTransliterator();
    const rng = seededRng(17);
    const iast = schemaOf(engine, 'iast');
    for (let i = 0; i < 50; i++) {
      const text = randomText(rng, iast, { length: 16 });
      expect(convert(convert(text, 'iast', 'slp1'), 'slp1', 'iast')).toBe(text);
    }
  });

  test('space-separated words convert independently', () => {
    for (const [from, words] of Object.entries(WORDS)) {
      for (const to of listSupportedScripts()) {
        const joined = convert(words.join(' '), from, to);
        expect(joined).toBe(words.map((w) => convert(w, from, to)).join(' '));
      }
    }
  });

  test('direct paths produce the same output as the chain', () => {
    const engine = getTransliterator();
    const chained = new Transliterator({ profile: 'none' });
    const rng = seededRng(19);
    for (const [from, to] of engine.directPairs()) {
      expect(engine.getPathInfo(from, to).kind).toBe('direct');
      const schema = schemaOf(engine, from);
      for (let i = 0; i < 25; i++) {
        const text = randomText(rng, schema, { allGraphemes: true, fillerRate: 0.15, length: 20 });
        expect(engine.convert(text, from, to)).toBe(chained.convert(text, from, to));
      }
      expect(engine.convert(schema.sample, from, to)).toBe(chained.convert(schema.sample, from, to));
    }
  });
});
