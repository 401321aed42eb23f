#!/usr/bin/env node

/**
 * Command line interface for lipika
 */

import { Command } from 'commander';
import { config } from 'dotenv';
import {
  OPTIMIZATION_PROFILES,
  createTransliterator,
  getTransliterator,
  isMatchStrategy,
  metadataReport,
  printPerfCountersAndReset,
  setDebug,
  setProfilingEnabled,
  type OptimizationProfile,
  type Transliterator,
} from '@lipika/core';

// Parse environment variables
config();

export interface CliOptions {
  from?: string;
  to?: string;
  metadata?: boolean;
  report?: boolean;
  list?: boolean;
  describe?: string;
  profile?: string;
  strategy?: string;
  verbose?: boolean;
  perf?: boolean;
}

function isProfile(value: string): value is OptimizationProfile {
  return OPTIMIZATION_PROFILES.some((p) => p === value);
}

function engineFor(options: CliOptions): Transliterator {
  if (!options.profile && !options.strategy) {
    return getTransliterator();
  }
  if (options.profile && !isProfile(options.profile)) {
    throw new Error(`Unknown profile "${options.profile}" (expected one of ${OPTIMIZATION_PROFILES.join(', ')})`);
  }
  if (options.strategy && !isMatchStrategy(options.strategy)) {
    throw new Error(`Unknown strategy "${options.strategy}" (expected hash, automaton or prefix)`);
  }
  return createTransliterator({
    profile: options.profile && isProfile(options.profile) ? options.profile : undefined,
    strategy: options.strategy && isMatchStrategy(options.strategy) ? options.strategy : undefined,
  });
}

/**
 * Programmatic interface for CLI operations
 * Returns the output string that would be printed to stdout
 */
export function runCli(input: string, options: CliOptions = {}): string {
  if (options.verbose) {
    setDebug(true);
  }
  if (options.perf) {
    setProfilingEnabled(true);
  }
  const engine = engineFor(options);

  if (options.list) {
    return engine
      .listSupportedScripts()
      .map((name) => {
        const info = engine.describeScript(name);
        return `${name.padEnd(16)} ${info.family.padEnd(6)} ${info.display_name}`;
      })
      .join('\n');
  }

  if (options.describe) {
    return JSON.stringify(engine.describeScript(options.describe), null, 2);
  }

  if (!options.from || !options.to) {
    throw new Error('Both --from and --to are required');
  }

  if (options.metadata || options.report) {
    const result = engine.convertWithMetadata(input, options.from, options.to);
    if (options.metadata) {
      return JSON.stringify(result, null, 2);
    }
    return `${result.output}\n\n${metadataReport(result.metadata)}`;
  }

  return engine.convert(input, options.from, options.to);
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8').replace(/\r?\n$/, '');
}

async function main(): Promise<void> {
  const program = new Command();

  program
    .name('lipika')
    .description('Transliterate text between Brahmic scripts and Roman schemes')
    .usage('[options] [text...]')
    .version('0.1.0')
    .option('-f, --from <script>', 'source script or alias')
    .option('-t, --to <script>', 'target script or alias')
    .option('-m, --metadata', 'print output and unknown-token metadata as JSON')
    .option('-r, --report', 'print output followed by a readable unknown-token report')
    .option('-l, --list', 'list supported scripts')
    .option('-d, --describe <script>', 'describe one script')
    .option('-p, --profile <name>', `direct-path profile (${OPTIMIZATION_PROFILES.join(', ')})`)
    .option('-s, --strategy <name>', 'matching strategy (hash, automaton, prefix)')
    .option('--verbose', 'debug logging')
    .option('--perf', 'print per-stage timings to stderr (same as LIPIKA_PERF=1)')
    .helpOption('-h, --help', 'print this help text');

  program.parse(process.argv);
  const options = program.opts<CliOptions>();
  const freeArgs = program.args;

  try {
    const needsInput = !options.list && !options.describe;
    const input = freeArgs.length > 0 || !needsInput ? freeArgs.join(' ') : await readStdin();
    const output = runCli(input, options);
    process.stdout.write(output);
    process.stdout.write('\n');

    printPerfCountersAndReset();
  } catch (error) {
    console.error(`ERROR: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(2);
  }
}

// Run main if this is the entry point
if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error) => {
    console.error(`FATAL: ${error}`);
    process.exit(2);
  });
}
