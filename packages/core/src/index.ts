// @lipika/core - Hub-and-spoke transliteration between Brahmic scripts and Roman schemes

// Default instance
export {
  initializeTransliterator,
  isInitialized,
  resetInitialization,
  getTransliterator,
  registerSchema,
  removeSchema,
  convert,
  convertWithMetadata,
  listSupportedScripts,
  supportsScript,
  describeScript,
} from './init.js';

// Orchestrator
export {
  Transliterator,
  createTransliterator,
  type TransliteratorOptions,
  type PathInfo,
} from './transliterator.js';

// Errors
export {
  TransliterationError,
  SchemaNotFoundError,
  UnsupportedScriptError,
  SchemaValidationError,
  PathCompositionError,
  InvariantViolationError,
  ConfigurationError,
  type TransliterationErrorCode,
} from './errors.js';

// Schemas
export {
  SchemaRepository,
  normalizeScriptName,
  builtinSchemaDir,
  readSchemaDir,
  type RepositoryOptions,
} from './schema/repository.js';
export {
  compileSchema,
  describeSchema,
  hubForFamily,
  type ScriptSchema,
  type GraphemeEntry,
} from './schema/compile.js';
export {
  validateSchemaDocument,
  parseSchemaDocument,
  parseSchemaJson,
  SchemaDocumentSchema,
  SECTION_NAMES,
  type SchemaDocument,
  type SchemaDocumentInput,
  type SectionName,
  type ValidationResult,
} from './schema/document.js';

// Hubs
export {
  INDIC_CATALOG,
  ROMAN_CATALOG,
  SIGN_TO_VOWEL,
  VOWEL_TO_SIGN,
  isIndicPhoneme,
  isRomanPhoneme,
  phonemeKind,
  type PhonemeKind,
  type IndicPhoneme,
  type RomanPhoneme,
  type HubPhoneme,
  type HubName,
} from './hub/catalog.js';
export { bridgeToRoman, bridgeToIndic, bridgeEntries } from './hub/bridge.js';

// Matching
export { createMatcher, crossCheckMatchers, isMatchStrategy } from './matching/index.js';
export { MatcherCache } from './matching/cache.js';
export type { Match, MappingTable, Matcher, ScanSegment } from './matching/types.js';

// Tokenizer
export { tokenize, classifyUnmatched } from './tokenizer/tokenize.js';
export {
  resolveInherentVowels,
  composeInherentVowels,
  type PhonemeUnit,
} from './tokenizer/inherent.js';

// Paths
export {
  planChain,
  runChain,
  describePath,
  type ChainStage,
  type ConversionPath,
  type ChainedPath,
  type DirectPath,
  type IdentityPath,
} from './paths/chain.js';
export {
  flattenPath,
  buildDirectTable,
  findMismatch,
  runDirect,
  type PathReportEntry,
  type FlattenResult,
} from './paths/optimizer.js';
export { profilePairs, COMMON_PAIRS, type ScriptPair } from './paths/profiles.js';

// Metadata
export {
  UnknownTokenCollector,
  codepointSequence,
  formatUnknownToken,
  uniqueUnknowns,
  metadataReport,
} from './metadata.js';

// Configuration, logging, profiling
export { loadConfig, resetConfig, type LipikaConfig } from './config.js';
export { setDebug, dp, DEBUG } from './debug.js';
export {
  startTimer,
  printPerfCountersAndReset,
  formatPerfCounters,
  resetPerfCounters,
  isProfilingEnabled,
  setProfilingEnabled,
  PERF_COUNTERS,
  type PerfCounter,
} from './profiling.js';

// Shared types
export {
  MATCH_STRATEGIES,
  OPTIMIZATION_PROFILES,
  type MatchStrategy,
  type OptimizationProfile,
  type ScriptFamily,
  type TokenClass,
  type Token,
  type ScriptDescription,
  type UnknownTokenRecord,
  type ConversionMetadata,
  type ConversionResult,
  type ConvertOptions,
} from './types.js';
