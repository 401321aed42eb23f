import { describe, test, expect } from 'vitest';
import {
  SchemaNotFoundError,
  SchemaRepository,
  SchemaValidationError,
  compileSchema,
  parseSchemaDocument,
  parseSchemaJson,
  validateSchemaDocument,
} from '@lipika/core';

function romanDoc(overrides: Record<string, unknown> = {}) {
  return {
    metadata: { name: 'toy', family: 'other', sample: 'ka' },
    vowels: { a: 'a', i: 'i' },
    consonants: { k: 'k' },
    ...overrides,
  };
}

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected a throw');
}

describe('schema documents', () => {
  test('missing required sections are named', () => {
    const result = validateSchemaDocument({ metadata: { name: 'bare', family: 'roman' } });
    expect(result).toEqual({
      ok: false,
      errors: ['missing required section(s): vowels, consonants'],
      missingSections: ['vowels', 'consonants'],
    });

    const error = thrown(() => parseSchemaDocument({ vowels: {}, consonants: {} }));
    expect(error).toBeInstanceOf(SchemaValidationError);
    if (error instanceof SchemaValidationError) {
      expect(error.missingSections).toEqual(['metadata']);
      expect(error.message).toBe('Invalid schema "(inline)": missing required section(s): metadata');
    }
  });

  test('indic schemas also need vowel signs', () => {
    const result = validateSchemaDocument({
      metadata: { name: 'abugida', family: 'indic' },
      vowels: {},
      consonants: {},
    });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.missingSections).toEqual(['vowel_signs']);
  });

  test('malformed sections fail structural validation', () => {
    const result = validateSchemaDocument(romanDoc({ consonants: { k: 5 } }));
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.errors[0]).toMatch(/^consonants\.k: /);
  });

  test('invalid JSON is a validation error', () => {
    expect(() => parseSchemaJson('{ nope', 'broken.json')).toThrow(SchemaValidationError);
  });
});

describe('compileSchema', () => {
  test('phonemes outside the family catalog are rejected', () => {
    const error = thrown(() => compileSchema(parseSchemaDocument(romanDoc({ consonants: { x: 'KA' } }))));
    expect(error).toBeInstanceOf(SchemaValidationError);
    if (error instanceof SchemaValidationError) {
      expect(error.problems).toEqual(['consonants: "x" maps to "KA", which is not in the roman hub catalog']);
    }
  });

  test('two graphemes for one phoneme need an alias declaration', () => {
    const error = thrown(() => compileSchema(parseSchemaDocument(romanDoc({ consonants: { k: 'k', c: 'k' } }))));
    expect(error).toBeInstanceOf(SchemaValidationError);
    if (error instanceof SchemaValidationError) {
      expect(error.problems).toEqual(['consonants: "c" and "k" both map to "k"; declare one of them under aliases']);
    }

    const schema = compileSchema(parseSchemaDocument(romanDoc({ aliases: { c: 'k' } })));
    expect(schema.graphemes.get('c')).toEqual({
      grapheme: 'c',
      phoneme: 'k',
      kind: 'consonant',
      section: 'aliases',
      extension: false,
      aliasOf: 'k',
    });
    expect(schema.renderings.get('k')).toBe('k');
  });

  test('a grapheme may only be declared once', () => {
    const error = thrown(() => compileSchema(parseSchemaDocument(romanDoc({ marks: { a: 'anusvara' } }))));
    expect(error).toBeInstanceOf(SchemaValidationError);
    if (error instanceof SchemaValidationError) {
      expect(error.problems).toEqual(['marks: grapheme "a" already declared in vowels']);
    }
  });

  test('aliases must point at canonical graphemes', () => {
    expect(() => compileSchema(parseSchemaDocument(romanDoc({ aliases: { q: 'z' } })))).toThrow(
      'aliases: "q" points at "z", which is not a canonical grapheme',
    );
  });

  test('indic schemas need a virama', () => {
    const doc = {
      metadata: { name: 'no-virama', family: 'indic' },
      vowels: { 'अ': 'A' },
      vowel_signs: {},
      consonants: { 'क': 'KA' },
    };
    expect(() => compileSchema(parseSchemaDocument(doc))).toThrow('indic schemas must declare a grapheme for VIRAMA');
  });

  test('extension graphemes are flagged and other-family schemas use the Roman hub', () => {
    const schema = compileSchema(parseSchemaDocument(romanDoc({ extensions: { qq: 'q' } })));
    expect(schema.hub).toBe('roman');
    expect(schema.graphemes.get('qq')?.extension).toBe(true);
    expect(schema.graphemes.get('k')?.extension).toBe(false);
    expect(schema.maxGraphemeLength).toBe(2);
    expect(schema.displayName).toBe('toy');
  });
});

describe('SchemaRepository', () => {
  const repository = SchemaRepository.create();

  test('lists the built-in scripts in order', () => {
    expect(repository.list()).toEqual([
      'bengali',
      'devanagari',
      'gujarati',
      'gurmukhi',
      'harvard_kyoto',
      'iast',
      'iso15919',
      'itrans',
      'kannada',
      'malayalam',
      'odia',
      'slp1',
      'telugu',
      'velthuis',
      'wx',
    ]);
  });

  test('scripts without a letter leave it out of the table', () => {
    expect(repository.load('bengali').renderings.has('VA')).toBe(false);
    expect(repository.load('gurmukhi').renderings.has('VOC_R')).toBe(false);
    expect(repository.load('gurmukhi').renderings.has('AVAGRAHA')).toBe(false);
    expect(repository.load('wx').renderings.has('ll_voc')).toBe(false);
    expect(repository.load('punjabi').id).toBe('gurmukhi');
    expect(repository.load('oriya').id).toBe('odia');
  });

  test('resolves names and aliases case-insensitively', () => {
    expect(repository.load('hk').id).toBe('harvard_kyoto');
    expect(repository.load('Harvard-Kyoto').id).toBe('harvard_kyoto');
    expect(repository.load('DEVA').id).toBe('devanagari');
    expect(repository.resolve('klingon')).toBeNull();
    expect(() => repository.load('klingon')).toThrow(SchemaNotFoundError);
  });

  test('built-in schemas render canonical graphemes', () => {
    const devanagari = repository.load('devanagari');
    expect(devanagari.renderings.get('QA')).toBe('\u0958');
    expect(devanagari.graphemes.get('\u0915\u093C')?.aliasOf).toBe('\u0958');
    expect(repository.load('iast').renderings.get('anusvara')).toBe('ṃ');
    expect(repository.load('itrans').graphemes.get('aa')?.phoneme).toBe('aa');
  });

  test('with() and without() return new repositories', () => {
    const extended = repository.with(romanDoc({ metadata: { name: 'toy', family: 'other', aliases: ['toy-script'] } }));
    expect(extended.has('toy_script')).toBe(true);
    expect(repository.has('toy')).toBe(false);

    const trimmed = extended.without('toy');
    expect(trimmed.has('toy')).toBe(false);
    expect(extended.has('toy')).toBe(true);
  });

  test('built-in schemas cannot be replaced or removed', () => {
    expect(() => repository.with(romanDoc({ metadata: { name: 'iast', family: 'roman' } }))).toThrow(
      SchemaValidationError,
    );
    expect(() => repository.without('iast')).toThrow('built-in schemas cannot be removed');
    expect(() => repository.without('klingon')).toThrow(SchemaNotFoundError);
  });

  test('aliases may not shadow another script', () => {
    expect(() => repository.with(romanDoc({ metadata: { name: 'toy', family: 'other', aliases: ['hk'] } }))).toThrow(
      SchemaValidationError,
    );
  });

  test('validate() compiles without registering', () => {
    const schema = repository.validate(romanDoc());
    expect(schema.id).toBe('toy');
    expect(repository.has('toy')).toBe(false);
  });
});
