// lipika/types - Shared public types

export const MATCH_STRATEGIES = ['hash', 'automaton', 'prefix'] as const;
export type MatchStrategy = (typeof MATCH_STRATEGIES)[number];

export const OPTIMIZATION_PROFILES = [
  'none',
  'common-pairs',
  'all-roman-to-indic',
  'all-indic-to-roman',
  'all-pairs',
] as const;
export type OptimizationProfile = (typeof OPTIMIZATION_PROFILES)[number];

export type ScriptFamily = 'indic' | 'roman' | 'other';

export type TokenClass =
  | 'consonant'
  | 'vowel'
  | 'vowel-sign'
  | 'virama'
  | 'mark'
  | 'digit'
  | 'punctuation'
  | 'unknown';

export interface Token {
  class: TokenClass;
  text: string;
  /** Hub phoneme id, null for passthrough and unknown tokens */
  phoneme: string | null;
  /** UTF-16 offset into the input */
  position: number;
  extension: boolean;
}

export interface ScriptDescription {
  name: string;
  display_name: string;
  family: ScriptFamily;
  code: string;
  aliases: string[];
  description: string;
  sample: string;
}

export interface UnknownTokenRecord {
  script: string;
  token: string;
  position: number;
  /** Space-separated U+XXXX sequence */
  codepoint: string;
  is_extension: boolean;
}

export interface ConversionMetadata {
  source_script: string;
  target_script: string;
  unknown_tokens: UnknownTokenRecord[];
  used_extensions: string[];
}

export interface ConversionResult {
  output: string;
  metadata: ConversionMetadata;
}

export interface ConvertOptions {
  /** Overrides the instance's matching strategy for this call */
  strategy?: MatchStrategy;
}
