import { describe, test, expect } from 'vitest';
import {
  codepointSequence,
  convertWithMetadata,
  formatUnknownToken,
  metadataReport,
  uniqueUnknowns,
  type ConversionMetadata,
} from '@lipika/core';
import { setupTests } from '@lipika/testing';

setupTests();

describe('codepointSequence', () => {
  test('formats each code point', () => {
    expect(codepointSequence('k')).toBe('U+006B');
    expect(codepointSequence('\u0915\u093C')).toBe('U+0915 U+093C');
    expect(codepointSequence('\u{1F600}')).toBe('U+1F600');
  });
});

describe('convertWithMetadata', () => {
  test('unmatched source letters are reported against the source script', () => {
    const result = convertWithMetadata('धर्मkr', 'devanagari', 'iast');
    expect(result.output).toBe('dharmakr');
    expect(result.metadata).toEqual({
      source_script: 'devanagari',
      target_script: 'iast',
      unknown_tokens: [
        { script: 'devanagari', token: 'k', position: 4, codepoint: 'U+006B', is_extension: false },
        { script: 'devanagari', token: 'r', position: 5, codepoint: 'U+0072', is_extension: false },
      ],
      used_extensions: [],
    });
  });

  test('extension graphemes the target cannot render are copied through', () => {
    const result = convertWithMetadata('\u0958', 'devanagari', 'harvard_kyoto');
    expect(result.output).toBe('\u0958');
    expect(result.metadata.unknown_tokens).toEqual([
      { script: 'harvard_kyoto', token: '\u0958', position: 0, codepoint: 'U+0958', is_extension: true },
    ]);
    expect(result.metadata.used_extensions).toEqual(['\u0958']);
  });

  test('extension graphemes the target supports are converted', () => {
    const result = convertWithMetadata('\u0958', 'devanagari', 'iast');
    expect(result.output).toBe('qa');
    expect(result.metadata.unknown_tokens).toEqual([]);
    expect(result.metadata.used_extensions).toEqual(['\u0958']);
  });

  test('accents with no Roman counterpart are recorded against the target', () => {
    const result = convertWithMetadata('॑', 'devanagari', 'iast');
    expect(result.output).toBe('॑');
    expect(result.metadata.unknown_tokens).toEqual([
      { script: 'iast', token: '॑', position: 0, codepoint: 'U+0951', is_extension: false },
    ]);
  });

  test('Indic digits and dandas pass through to a Roman target without being reported', () => {
    const result = convertWithMetadata('धर्म १२।', 'devanagari', 'iast');
    expect(result.output).toBe('dharma १२।');
    expect(result.metadata.unknown_tokens).toEqual([]);
  });

  test('punctuation and spaces are never unknown', () => {
    const result = convertWithMetadata('rāma, sītā!', 'iast', 'devanagari');
    expect(result.output).toBe('राम, सीता!');
    expect(result.metadata.unknown_tokens).toEqual([]);
  });

  test('output matches convert()', () => {
    const result = convertWithMetadata('saṃskṛtam', 'iast', 'slp1');
    expect(result.output).toBe('saMskftam');
  });

  test('identity conversions still report unmatched content', () => {
    const result = convertWithMetadata('kxa', 'slp1', 'slp1');
    expect(result.output).toBe('kxa');
    expect(result.metadata.unknown_tokens).toEqual([]);

    const withUnknown = convertWithMetadata('k\u00E4', 'iast', 'iast');
    expect(withUnknown.output).toBe('k\u00E4');
    expect(withUnknown.metadata.unknown_tokens.map((t) => [t.script, t.token, t.position])).toEqual([
      ['iast', '\u00E4', 1],
    ]);
  });
});

describe('report helpers', () => {
  const metadata: ConversionMetadata = {
    source_script: 'devanagari',
    target_script: 'harvard_kyoto',
    unknown_tokens: [
      { script: 'devanagari', token: 'x', position: 3, codepoint: 'U+0078', is_extension: false },
      { script: 'harvard_kyoto', token: '\u0958', position: 12, codepoint: 'U+0958', is_extension: true },
      { script: 'devanagari', token: 'x', position: 20, codepoint: 'U+0078', is_extension: false },
    ],
    used_extensions: ['\u0958'],
  };

  test('formatUnknownToken tags extensions', () => {
    expect(formatUnknownToken(metadata.unknown_tokens[0])).toBe('[devanagari:x:U+0078]');
    expect(formatUnknownToken(metadata.unknown_tokens[1])).toBe('[ext:\u0958:U+0958]');
  });

  test('uniqueUnknowns keeps first appearance order', () => {
    expect(uniqueUnknowns(metadata)).toEqual(['x', '\u0958']);
  });

  test('metadataReport lists every record', () => {
    expect(metadataReport(metadata)).toBe(
      [
        'devanagari -> harvard_kyoto',
        'Unknown tokens (3):',
        '     3  [devanagari:x:U+0078]',
        '    12  [ext:\u0958:U+0958]',
        '    20  [devanagari:x:U+0078]',
        'Extensions used: \u0958',
      ].join('\n'),
    );
  });

  test('metadataReport for a clean conversion', () => {
    expect(
      metadataReport({ source_script: 'iast', target_script: 'slp1', unknown_tokens: [], used_extensions: [] }),
    ).toBe('iast -> slp1\nNo unknown tokens');
  });
});
