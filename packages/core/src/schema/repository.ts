/**
 * Schema repository.
 *
 * Holds every compiled ScriptSchema and resolves names and aliases to them.
 * A repository never changes after construction; registering or removing a
 * schema returns a new repository so in-flight conversions keep the one
 * they started with.
 */

import { readFileSync, readdirSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { SchemaNotFoundError, SchemaValidationError } from '../errors.js';
import { dp } from '../debug.js';
import type { ScriptSchema } from './compile.js';
import { compileSchema } from './compile.js';
import type { SchemaDocumentInput } from './document.js';
import { parseSchemaDocument, parseSchemaJson } from './document.js';

export function normalizeScriptName(name: string): string {
  return name.trim().toLowerCase().replace(/-/g, '_');
}

export function builtinSchemaDir(): string {
  const baseDir = dirname(fileURLToPath(import.meta.url));
  return join(baseDir, '..', '..', 'schemas');
}

export function readSchemaDir(dir: string): ScriptSchema[] {
  const files = readdirSync(dir).filter((f) => f.endsWith('.json')).sort();
  return files.map((f) => {
    const path = join(dir, f);
    return compileSchema(parseSchemaJson(readFileSync(path, 'utf8'), path));
  });
}

let builtinCache: ScriptSchema[] | null = null;

function builtinSchemas(): ScriptSchema[] {
  if (!builtinCache) {
    builtinCache = readSchemaDir(builtinSchemaDir());
    dp(`Loaded ${builtinCache.length} built-in schemas`);
  }
  return builtinCache;
}

export interface RepositoryOptions {
  /** Include the schemas shipped in packages/core/schemas (default true) */
  builtins?: boolean;
  /** Extra directory of *.json schema documents */
  schemaDir?: string;
  /** Documents registered in memory */
  documents?: SchemaDocumentInput[];
}

export class SchemaRepository {
  private readonly schemas: ReadonlyMap<string, ScriptSchema>;
  private readonly names: ReadonlyMap<string, string>;
  private readonly builtinIds: ReadonlySet<string>;

  private constructor(schemas: ScriptSchema[], builtinIds: ReadonlySet<string>) {
    const byId = new Map<string, ScriptSchema>();
    const names = new Map<string, string>();
    const problems: string[] = [];

    for (const schema of schemas) {
      const id = normalizeScriptName(schema.id);
      for (const name of [schema.id, ...schema.aliases].map(normalizeScriptName)) {
        const owner = names.get(name);
        if (owner !== undefined && owner !== id) {
          problems.push(`name "${name}" of ${schema.id} is already used by ${owner}`);
          continue;
        }
        names.set(name, id);
      }
      byId.set(id, schema);
    }
    if (problems.length > 0) {
      throw new SchemaValidationError('repository', problems);
    }

    this.schemas = byId;
    this.names = names;
    this.builtinIds = builtinIds;
  }

  static create(options: RepositoryOptions = {}): SchemaRepository {
    const builtins = options.builtins === false ? [] : builtinSchemas();
    const extra = [
      ...(options.schemaDir ? readSchemaDir(options.schemaDir) : []),
      ...(options.documents ?? []).map((doc) => compileSchema(parseSchemaDocument(doc))),
    ];
    const builtinIds = new Set(builtins.map((s) => normalizeScriptName(s.id)));
    for (const schema of extra) {
      if (builtinIds.has(normalizeScriptName(schema.id))) {
        throw new SchemaValidationError(schema.id, ['cannot replace a built-in schema']);
      }
    }
    return new SchemaRepository([...builtins, ...extra], builtinIds);
  }

  /** Canonical id for a name or alias, or null */
  resolve(name: string): string | null {
    return this.names.get(normalizeScriptName(name)) ?? null;
  }

  has(name: string): boolean {
    return this.resolve(name) !== null;
  }

  load(name: string): ScriptSchema {
    const id = this.resolve(name);
    const schema = id === null ? undefined : this.schemas.get(id);
    if (!schema) {
      throw new SchemaNotFoundError(name);
    }
    return schema;
  }

  list(): string[] {
    return [...this.schemas.values()].map((s) => s.id).sort();
  }

  all(): ScriptSchema[] {
    return this.list().map((id) => this.load(id));
  }

  /**
   * Structural and catalog validation without registering anything.
   */
  validate(document: unknown): ScriptSchema {
    return compileSchema(parseSchemaDocument(document));
  }

  /**
   * A new repository with `document` added, replacing an earlier runtime
   * registration of the same name.
   */
  with(document: unknown): SchemaRepository {
    return this.withSchema(this.validate(document));
  }

  withSchema(schema: ScriptSchema): SchemaRepository {
    const id = normalizeScriptName(schema.id);
    if (this.builtinIds.has(id)) {
      throw new SchemaValidationError(schema.id, ['cannot replace a built-in schema']);
    }
    const kept = [...this.schemas.values()].filter((s) => normalizeScriptName(s.id) !== id);
    return new SchemaRepository([...kept, schema], this.builtinIds);
  }

  without(name: string): SchemaRepository {
    const id = this.resolve(name);
    if (id === null) {
      throw new SchemaNotFoundError(name);
    }
    if (this.builtinIds.has(id)) {
      throw new SchemaValidationError(id, ['built-in schemas cannot be removed']);
    }
    const kept = [...this.schemas.values()].filter((s) => normalizeScriptName(s.id) !== id);
    return new SchemaRepository(kept, this.builtinIds);
  }
}
