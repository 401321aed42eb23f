/**
 * Conversion orchestrator.
 *
 * A Transliterator is built once (schemas compiled, matchers created, direct
 * paths flattened and validated) and is read-only afterwards, so any number
 * of callers can share it.
 */

import { loadConfig } from './config.js';
import { dp } from './debug.js';
import { InvariantViolationError, SchemaNotFoundError, UnsupportedScriptError } from './errors.js';
import { MatcherCache } from './matching/cache.js';
import { createMatcher } from './matching/index.js';
import type { Matcher } from './matching/types.js';
import { UnknownTokenCollector } from './metadata.js';
import type { ConversionPath, DirectPath } from './paths/chain.js';
import { describePath, planChain, runChain } from './paths/chain.js';
import type { PathReportEntry } from './paths/optimizer.js';
import { flattenPath, runDirect } from './paths/optimizer.js';
import type { ScriptPair } from './paths/profiles.js';
import { profilePairs } from './paths/profiles.js';
import type { GraphemeEntry, ScriptSchema } from './schema/compile.js';
import { describeSchema } from './schema/compile.js';
import type { SchemaDocumentInput } from './schema/document.js';
import { SchemaRepository } from './schema/repository.js';
import type {
  ConversionResult,
  ConvertOptions,
  MatchStrategy,
  OptimizationProfile,
  ScriptDescription,
} from './types.js';

export interface TransliteratorOptions {
  profile?: OptimizationProfile;
  strategy?: MatchStrategy;
  /** Documents registered alongside the built-ins */
  schemas?: SchemaDocumentInput[];
  /** Directory of extra *.json schema documents */
  schemaDir?: string;
  /** Include the built-in schemas (default true) */
  builtins?: boolean;
  /** Pairs that must flatten; setup fails with PathCompositionError otherwise */
  forcePairs?: ScriptPair[];
  /** Cross-check every direct-path conversion against the chain */
  verify?: boolean;
  matcherCacheSize?: number;
  /** Use this repository instead of building one from the options above */
  repository?: SchemaRepository;
}

export interface PathInfo {
  from: string;
  to: string;
  kind: ConversionPath['kind'];
  stages: string[];
}

export class Transliterator {
  readonly repository: SchemaRepository;
  readonly profile: OptimizationProfile;
  readonly strategy: MatchStrategy;
  readonly verify: boolean;

  private readonly matchers = new Map<string, Matcher<GraphemeEntry>>();
  private readonly directPaths = new Map<string, DirectPath>();
  private readonly report: PathReportEntry[] = [];
  private readonly overrideMatchers: MatcherCache<GraphemeEntry>;
  private readonly overrideDirect: MatcherCache<string>;

  constructor(options: TransliteratorOptions = {}) {
    const config = loadConfig();
    this.profile = options.profile ?? config.profile;
    this.strategy = options.strategy ?? config.strategy;
    this.verify = options.verify ?? config.verify;
    this.repository =
      options.repository ??
      SchemaRepository.create({
        builtins: options.builtins,
        schemaDir: options.schemaDir ?? config.schemaDir,
        documents: options.schemas,
      });

    const cacheSize = options.matcherCacheSize ?? config.matcherCacheSize;
    this.overrideMatchers = new MatcherCache(cacheSize);
    this.overrideDirect = new MatcherCache(cacheSize);

    for (const schema of this.repository.all()) {
      this.matchers.set(schema.id, createMatcher(this.strategy, schema.graphemes));
    }
    this.registerDirectPaths(options.forcePairs ?? []);
  }

  private registerDirectPaths(forcePairs: ScriptPair[]): void {
    const forced = new Set<string>();
    for (const [from, to] of forcePairs) {
      // Unknown names in forcePairs are configuration errors too.
      forced.add(pairKey(this.repository.load(from).id, this.repository.load(to).id));
    }

    const pairs = new Map<string, ScriptPair>();
    for (const pair of profilePairs(this.profile, this.repository.all())) {
      pairs.set(pairKey(pair[0], pair[1]), pair);
    }
    for (const [from, to] of forcePairs) {
      const fromId = this.repository.load(from).id;
      const toId = this.repository.load(to).id;
      if (fromId !== toId) pairs.set(pairKey(fromId, toId), [fromId, toId]);
    }

    for (const [key, [from, to]] of pairs) {
      const chain = planChain(this.repository.load(from), this.repository.load(to));
      const result = flattenPath(chain, this.sourceMatcher(chain.from), {
        strategy: this.strategy,
        forced: forced.has(key),
      });
      this.report.push(result.report);
      if (result.ok) {
        this.directPaths.set(key, result.path);
      }
    }
    dp(`Registered ${this.directPaths.size}/${pairs.size} direct paths (profile ${this.profile})`);
  }

  private sourceMatcher(schema: ScriptSchema, strategy: MatchStrategy = this.strategy): Matcher<GraphemeEntry> {
    if (strategy === this.strategy) {
      const matcher = this.matchers.get(schema.id);
      if (matcher) return matcher;
    }
    return this.overrideMatchers.get(schema.tableId, strategy, () => schema.graphemes);
  }

  private resolveScript(name: string): ScriptSchema {
    try {
      return this.repository.load(name);
    } catch (error) {
      if (error instanceof SchemaNotFoundError) {
        throw new UnsupportedScriptError(name);
      }
      throw error;
    }
  }

  /**
   * Pick the registered path for a pair. Both names are resolved before any
   * text is looked at.
   */
  getPath(from: string, to: string): ConversionPath {
    const source = this.resolveScript(from);
    const target = this.resolveScript(to);
    if (source.id === target.id) {
      return { kind: 'identity', from: source, to: target };
    }
    return this.directPaths.get(pairKey(source.id, target.id)) ?? planChain(source, target);
  }

  getPathInfo(from: string, to: string): PathInfo {
    const path = this.getPath(from, to);
    return { from: path.from.id, to: path.to.id, ...describePath(path) };
  }

  convert(text: string, from: string, to: string, options: ConvertOptions = {}): string {
    const path = this.getPath(from, to);
    const strategy = options.strategy ?? this.strategy;

    switch (path.kind) {
      case 'identity':
        return text;
      case 'chained':
        return runChain(path, text, this.sourceMatcher(path.from, strategy));
      case 'direct': {
        const direct = strategy === this.strategy ? path : this.withStrategy(path, strategy);
        const output = runDirect(direct, text);
        if (this.verify) {
          const chained = runChain(path.chain, text, this.sourceMatcher(path.from, strategy));
          if (chained !== output) {
            throw new InvariantViolationError(
              `Direct path ${path.from.id} -> ${path.to.id} disagrees with the chain on ${JSON.stringify(text)}: ${JSON.stringify(output)} != ${JSON.stringify(chained)}`,
            );
          }
        }
        return output;
      }
    }
  }

  /**
   * Always runs the full chain so every token is observed; the output is the
   * same as convert() returns.
   */
  convertWithMetadata(text: string, from: string, to: string, options: ConvertOptions = {}): ConversionResult {
    const path = this.getPath(from, to);
    const collector = new UnknownTokenCollector(path.from.id, path.to.id);
    const chain = path.kind === 'direct' ? path.chain : planChain(path.from, path.to);
    const matcher = this.sourceMatcher(path.from, options.strategy ?? this.strategy);

    if (path.kind === 'identity') {
      // Nothing is converted, but unmatched content is still reported.
      runChain(chain, text, matcher, collector);
      return { output: text, metadata: collector.finish() };
    }
    const output = runChain(chain, text, matcher, collector);
    return { output, metadata: collector.finish() };
  }

  private withStrategy(path: DirectPath, strategy: MatchStrategy): DirectPath {
    return { ...path, matcher: this.overrideDirect.get(path.tableId, strategy, () => path.table) };
  }

  listSupportedScripts(): string[] {
    return this.repository.list();
  }

  supportsScript(name: string): boolean {
    return this.repository.has(name);
  }

  describeScript(name: string): ScriptDescription {
    return describeSchema(this.resolveScript(name));
  }

  optimizationReport(): PathReportEntry[] {
    return this.report.map((entry) => ({ ...entry }));
  }

  directPairs(): ScriptPair[] {
    return [...this.directPaths.values()].map((p) => [p.from.id, p.to.id] as const);
  }
}

function pairKey(from: string, to: string): string {
  return `${from}>${to}`;
}

export function createTransliterator(options: TransliteratorOptions = {}): Transliterator {
  return new Transliterator(options);
}
