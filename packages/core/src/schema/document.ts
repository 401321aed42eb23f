/**
 * On-disk schema document format and its structural validation.
 *
 * A document is one JSON object per script: `metadata`, the required
 * `vowels` and `consonants` sections, the optional `vowel_signs`, `marks`,
 * `digits` and `extensions` sections (grapheme -> hub phoneme id), and a
 * top-level `aliases` map (alternate grapheme -> canonical grapheme).
 */

import { z } from 'zod';
import { SchemaValidationError } from '../errors.js';

export const SECTION_NAMES = [
  'vowels',
  'vowel_signs',
  'consonants',
  'marks',
  'digits',
  'extensions',
] as const;
export type SectionName = (typeof SECTION_NAMES)[number];

export const REQUIRED_SECTIONS = ['metadata', 'vowels', 'consonants'] as const;

const GraphemeSection = z.record(z.string(), z.string());

export const SchemaMetadataSchema = z.object({
  name: z.string().min(1, 'metadata.name must not be empty'),
  family: z.enum(['indic', 'roman', 'other']),
  code: z.string().default(''),
  display_name: z.string().optional(),
  aliases: z.array(z.string().min(1)).default([]),
  description: z.string().default(''),
  sample: z.string().default(''),
});

export const SchemaDocumentSchema = z.object({
  metadata: SchemaMetadataSchema,
  vowels: GraphemeSection,
  vowel_signs: GraphemeSection.optional(),
  consonants: GraphemeSection,
  marks: GraphemeSection.optional(),
  digits: GraphemeSection.optional(),
  extensions: GraphemeSection.optional(),
  aliases: GraphemeSection.optional(),
});

export type SchemaDocument = z.infer<typeof SchemaDocumentSchema>;
export type SchemaDocumentInput = z.input<typeof SchemaDocumentSchema>;

export type ValidationResult<T> =
  | { ok: true; value: T }
  | { ok: false; errors: string[]; missingSections: string[] };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function documentName(payload: unknown, fallback: string): string {
  if (isRecord(payload) && isRecord(payload.metadata) && typeof payload.metadata.name === 'string') {
    return payload.metadata.name;
  }
  return fallback;
}

export function validateSchemaDocument(payload: unknown): ValidationResult<SchemaDocument> {
  if (!isRecord(payload)) {
    return { ok: false, errors: ['schema document must be a JSON object'], missingSections: [] };
  }

  const missingSections: string[] = REQUIRED_SECTIONS.filter((section) => payload[section] === undefined);
  if (isRecord(payload.metadata) && payload.metadata.family === 'indic' && payload.vowel_signs === undefined) {
    missingSections.push('vowel_signs');
  }
  if (missingSections.length > 0) {
    return {
      ok: false,
      errors: [`missing required section(s): ${missingSections.join(', ')}`],
      missingSections,
    };
  }

  const parsed = SchemaDocumentSchema.safeParse(payload);
  if (!parsed.success) {
    return {
      ok: false,
      errors: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      missingSections: [],
    };
  }
  return { ok: true, value: parsed.data };
}

/**
 * Validate a document's structure, throwing SchemaValidationError.
 */
export function parseSchemaDocument(payload: unknown, sourceName = '(inline)'): SchemaDocument {
  const result = validateSchemaDocument(payload);
  if (!result.ok) {
    throw new SchemaValidationError(documentName(payload, sourceName), result.errors, result.missingSections);
  }
  return result.value;
}

export function parseSchemaJson(text: string, sourceName = '(inline)'): SchemaDocument {
  let payload: unknown;
  try {
    payload = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SchemaValidationError(sourceName, [`invalid JSON: ${message}`]);
  }
  return parseSchemaDocument(payload, sourceName);
}
