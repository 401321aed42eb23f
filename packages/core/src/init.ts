// Default transliterator.
//
// The module-level functions share one Transliterator, built on first use.
// Construction is synchronous, so no caller can observe a half-built instance,
// and a second call never rebuilds it. Registering or removing a schema swaps
// in a new instance; calls already running keep the old one.

import { setDebug } from './debug.js';
import { loadConfig } from './config.js';
import type { ConversionResult, ConvertOptions, ScriptDescription } from './types.js';
import type { TransliteratorOptions } from './transliterator.js';
import { Transliterator } from './transliterator.js';

let instance: Transliterator | null = null;
let instanceOptions: TransliteratorOptions = {};

/**
 * Build the default transliterator. Safe to call multiple times - only
 * initializes once unless `force` is set.
 */
export function initializeTransliterator(options: TransliteratorOptions = {}, force = false): Transliterator {
  if (instance && !force) return instance;

  if (loadConfig().debug) setDebug(true);
  instanceOptions = options;
  instance = new Transliterator(options);
  return instance;
}

export function isInitialized(): boolean {
  return instance !== null;
}

/**
 * Drop the default instance (primarily for testing)
 */
export function resetInitialization(): void {
  instance = null;
  instanceOptions = {};
}

export function getTransliterator(): Transliterator {
  return instance ?? initializeTransliterator();
}

/**
 * Validate and register a schema document, returning its canonical name.
 */
export function registerSchema(document: unknown): string {
  const current = getTransliterator();
  const schema = current.repository.validate(document);
  const repository = current.repository.withSchema(schema);
  instance = new Transliterator({ ...instanceOptions, repository });
  return schema.id;
}

export function removeSchema(name: string): void {
  const repository = getTransliterator().repository.without(name);
  instance = new Transliterator({ ...instanceOptions, repository });
}

export function convert(text: string, from: string, to: string, options?: ConvertOptions): string {
  return getTransliterator().convert(text, from, to, options);
}

export function convertWithMetadata(
  text: string,
  from: string,
  to: string,
  options?: ConvertOptions,
): ConversionResult {
  return getTransliterator().convertWithMetadata(text, from, to, options);
}

export function listSupportedScripts(): string[] {
  return getTransliterator().listSupportedScripts();
}

export function supportsScript(name: string): boolean {
  return getTransliterator().supportsScript(name);
}

export function describeScript(name: string): ScriptDescription {
  return getTransliterator().describeScript(name);
}
