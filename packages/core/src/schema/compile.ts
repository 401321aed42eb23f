// lipika/schema/compile - Turn a validated document into an immutable ScriptSchema

import { SchemaValidationError } from '../errors.js';
import type { HubName, PhonemeKind } from '../hub/catalog.js';
import { isHubPhoneme, phonemeKind } from '../hub/catalog.js';
import type { ScriptDescription, ScriptFamily } from '../types.js';
import type { SchemaDocument, SectionName } from './document.js';
import { SECTION_NAMES } from './document.js';

export interface GraphemeEntry {
  grapheme: string;
  phoneme: string;
  kind: PhonemeKind;
  section: SectionName | 'aliases';
  extension: boolean;
  /** Canonical grapheme when this entry is an alias */
  aliasOf: string | null;
}

export interface ScriptSchema {
  readonly id: string;
  readonly family: ScriptFamily;
  readonly hub: HubName;
  readonly aliases: readonly string[];
  readonly displayName: string;
  readonly code: string;
  readonly description: string;
  readonly sample: string;
  /** Canonical graphemes in section order, then aliases */
  readonly graphemes: ReadonlyMap<string, GraphemeEntry>;
  /** phoneme -> canonical grapheme used when rendering */
  readonly renderings: ReadonlyMap<string, string>;
  readonly maxGraphemeLength: number;
  /** Distinguishes re-registered schemas that share an id */
  readonly tableId: string;
}

let tableSerial = 0;

export function hubForFamily(family: ScriptFamily): HubName {
  return family === 'indic' ? 'indic' : 'roman';
}

/**
 * Check catalog membership, duplicates and phoneme collisions, then freeze
 * the document into a ScriptSchema. All problems are reported together.
 */
export function compileSchema(doc: SchemaDocument): ScriptSchema {
  const name = doc.metadata.name;
  const family = doc.metadata.family;
  const hub = hubForFamily(family);
  const problems: string[] = [];

  const graphemes = new Map<string, GraphemeEntry>();
  const renderings = new Map<string, string>();

  for (const section of SECTION_NAMES) {
    const entries = doc[section];
    if (!entries) continue;

    for (const [grapheme, phoneme] of Object.entries(entries)) {
      if (grapheme.length === 0) {
        problems.push(`${section}: empty grapheme for "${phoneme}"`);
        continue;
      }
      const kind = phonemeKind(phoneme);
      if (kind === null || !isHubPhoneme(hub, phoneme)) {
        problems.push(`${section}: "${grapheme}" maps to "${phoneme}", which is not in the ${hub} hub catalog`);
        continue;
      }
      const existing = graphemes.get(grapheme);
      if (existing) {
        problems.push(`${section}: grapheme "${grapheme}" already declared in ${existing.section}`);
        continue;
      }
      const rendered = renderings.get(phoneme);
      if (rendered !== undefined) {
        problems.push(
          `${section}: "${grapheme}" and "${rendered}" both map to "${phoneme}"; declare one of them under aliases`,
        );
        continue;
      }
      graphemes.set(grapheme, {
        grapheme,
        phoneme,
        kind,
        section,
        extension: section === 'extensions',
        aliasOf: null,
      });
      renderings.set(phoneme, grapheme);
    }
  }

  for (const [alias, canonical] of Object.entries(doc.aliases ?? {})) {
    if (alias.length === 0) {
      problems.push(`aliases: empty alias for "${canonical}"`);
      continue;
    }
    if (graphemes.has(alias)) {
      problems.push(`aliases: "${alias}" is already a grapheme`);
      continue;
    }
    const target = graphemes.get(canonical);
    if (!target || target.aliasOf !== null) {
      problems.push(`aliases: "${alias}" points at "${canonical}", which is not a canonical grapheme`);
      continue;
    }
    graphemes.set(alias, { ...target, grapheme: alias, section: 'aliases', aliasOf: canonical });
  }

  if (family === 'indic' && !renderings.has('VIRAMA')) {
    problems.push('indic schemas must declare a grapheme for VIRAMA');
  }

  if (problems.length > 0) {
    throw new SchemaValidationError(name, problems);
  }

  let maxGraphemeLength = 0;
  for (const grapheme of graphemes.keys()) {
    maxGraphemeLength = Math.max(maxGraphemeLength, grapheme.length);
  }

  return Object.freeze({
    id: name,
    family,
    hub,
    aliases: Object.freeze([...doc.metadata.aliases]),
    displayName: doc.metadata.display_name ?? name,
    code: doc.metadata.code,
    description: doc.metadata.description,
    sample: doc.metadata.sample,
    graphemes,
    renderings,
    maxGraphemeLength,
    tableId: `${name}#${++tableSerial}`,
  });
}

export function describeSchema(schema: ScriptSchema): ScriptDescription {
  return {
    name: schema.id,
    display_name: schema.displayName,
    family: schema.family,
    code: schema.code,
    aliases: [...schema.aliases],
    description: schema.description,
    sample: schema.sample,
  };
}
