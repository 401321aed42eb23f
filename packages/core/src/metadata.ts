// lipika/metadata - Unknown-token collection for convertWithMetadata

import type { PhonemeUnit } from './tokenizer/inherent.js';
import type { ConversionMetadata, Token, UnknownTokenRecord } from './types.js';

export function codepointSequence(text: string): string {
  return Array.from(text, (ch) => {
    const cp = ch.codePointAt(0) ?? 0;
    return `U+${cp.toString(16).toUpperCase().padStart(4, '0')}`;
  }).join(' ');
}

/**
 * Scoped to a single conversion call. Only created when metadata is
 * requested, so the plain convert path never touches it.
 */
export class UnknownTokenCollector {
  private readonly unknowns: UnknownTokenRecord[] = [];
  private readonly extensions = new Set<string>();

  constructor(
    readonly sourceScript: string,
    readonly targetScript: string,
  ) {}

  /** Unmatched letters and marks of the source, and extension graphemes used */
  observeTokens(tokens: Token[]): void {
    for (const token of tokens) {
      if (token.class === 'unknown') {
        this.record(this.sourceScript, token.text, token.position, token.extension);
      }
      if (token.extension) {
        this.extensions.add(token.text);
      }
    }
  }

  /** A unit the bridge or the target schema could not carry over */
  recordUnresolved(unit: PhonemeUnit): void {
    if (unit.synthetic) return;
    const token = unit.source;
    this.record(this.targetScript, token ? token.text : unit.text, unit.position, token ? token.extension : false);
  }

  private record(script: string, text: string, position: number, isExtension: boolean): void {
    this.unknowns.push({
      script,
      token: text,
      position,
      codepoint: codepointSequence(text),
      is_extension: isExtension,
    });
  }

  finish(): ConversionMetadata {
    return {
      source_script: this.sourceScript,
      target_script: this.targetScript,
      unknown_tokens: [...this.unknowns].sort((a, b) => a.position - b.position),
      used_extensions: [...this.extensions],
    };
  }
}

export function formatUnknownToken(record: UnknownTokenRecord): string {
  const tag = record.is_extension ? 'ext' : record.script;
  return `[${tag}:${record.token}:${record.codepoint}]`;
}

/** Distinct unknown token texts in order of first appearance */
export function uniqueUnknowns(metadata: ConversionMetadata): string[] {
  return [...new Set(metadata.unknown_tokens.map((t) => t.token))];
}

export function metadataReport(metadata: ConversionMetadata): string {
  const lines = [`${metadata.source_script} -> ${metadata.target_script}`];
  if (metadata.unknown_tokens.length === 0) {
    lines.push('No unknown tokens');
  } else {
    lines.push(`Unknown tokens (${metadata.unknown_tokens.length}):`);
    for (const record of metadata.unknown_tokens) {
      lines.push(`  ${String(record.position).padStart(4)}  ${formatUnknownToken(record)}`);
    }
  }
  if (metadata.used_extensions.length > 0) {
    lines.push(`Extensions used: ${metadata.used_extensions.join(' ')}`);
  }
  return lines.join('\n');
}
