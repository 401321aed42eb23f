// lipika/errors - Error taxonomy for schema lookup, setup and invariant failures

export type TransliterationErrorCode =
  | 'SCHEMA_NOT_FOUND'
  | 'UNSUPPORTED_SCRIPT'
  | 'SCHEMA_VALIDATION'
  | 'PATH_COMPOSITION'
  | 'INVARIANT_VIOLATION'
  | 'CONFIGURATION';

export class TransliterationError extends Error {
  code: TransliterationErrorCode;

  constructor(message: string, code: TransliterationErrorCode) {
    super(message);
    this.name = 'TransliterationError';
    this.code = code;
  }
}

/**
 * A script name or alias that resolves to no registered schema.
 */
export class SchemaNotFoundError extends TransliterationError {
  scriptName: string;

  constructor(scriptName: string, code: TransliterationErrorCode = 'SCHEMA_NOT_FOUND') {
    super(`Unknown script: ${scriptName}`, code);
    this.name = 'SchemaNotFoundError';
    this.scriptName = scriptName;
  }
}

/**
 * Raised by convert() when either side of the pair is unregistered.
 */
export class UnsupportedScriptError extends SchemaNotFoundError {
  constructor(scriptName: string) {
    super(scriptName, 'UNSUPPORTED_SCRIPT');
    this.name = 'UnsupportedScriptError';
    this.message = `Unsupported script: ${scriptName}`;
  }
}

export class SchemaValidationError extends TransliterationError {
  schemaName: string;
  missingSections: string[];
  problems: string[];

  constructor(schemaName: string, problems: string[], missingSections: string[] = []) {
    super(`Invalid schema "${schemaName}": ${problems.join('; ')}`, 'SCHEMA_VALIDATION');
    this.name = 'SchemaValidationError';
    this.schemaName = schemaName;
    this.problems = problems;
    this.missingSections = missingSections;
  }
}

export class PathCompositionError extends TransliterationError {
  from: string;
  to: string;

  constructor(from: string, to: string, reason: string) {
    super(`Cannot flatten ${from} -> ${to}: ${reason}`, 'PATH_COMPOSITION');
    this.name = 'PathCompositionError';
    this.from = from;
    this.to = to;
  }
}

// Fatal: two strategies or two paths disagreed on the same input.
export class InvariantViolationError extends TransliterationError {
  constructor(message: string) {
    super(message, 'INVARIANT_VIOLATION');
    this.name = 'InvariantViolationError';
  }
}

export class ConfigurationError extends TransliterationError {
  constructor(message: string) {
    super(message, 'CONFIGURATION');
    this.name = 'ConfigurationError';
  }
}
