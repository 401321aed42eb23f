// lipika/tokenizer - Greedy longest-match segmentation of text into grapheme tokens

import type { Matcher } from '../matching/types.js';
import { startTimer } from '../profiling.js';
import type { GraphemeEntry } from '../schema/compile.js';
import type { Token, TokenClass } from '../types.js';

const LETTER_OR_MARK = /^[\p{L}\p{M}]/u;
const NUMBER = /^\p{N}/u;

/**
 * Class of a code point no grapheme covers: letters and combining marks are
 * unknown, numbers are digits, everything else passes through as punctuation.
 */
export function classifyUnmatched(text: string): TokenClass {
  if (LETTER_OR_MARK.test(text)) return 'unknown';
  if (NUMBER.test(text)) return 'digit';
  return 'punctuation';
}

/**
 * Segment `text` with a matcher compiled from a schema's grapheme table.
 * Tokens keep the raw graphemes; inherent vowels are resolved later.
 */
export function tokenize(text: string, matcher: Matcher<GraphemeEntry>): Token[] {
  const endTimer = startTimer('tokenize');
  const tokens: Token[] = [];
  for (const segment of matcher.scan(text)) {
    if (segment.kind === 'match') {
      const entry = segment.match.value;
      tokens.push({
        class: entry.kind,
        text: segment.match.key,
        phoneme: entry.phoneme,
        position: segment.position,
        extension: entry.extension,
      });
    } else {
      tokens.push({
        class: classifyUnmatched(segment.text),
        text: segment.text,
        phoneme: null,
        position: segment.position,
        extension: false,
      });
    }
  }
  endTimer();
  return tokens;
}
