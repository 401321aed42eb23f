// lipika/profiling - Performance counters for the conversion pipeline
// Enable with: LIPIKA_PERF=1 or LIPIKA_PERF=true

import { loadConfig } from './config.js';

const COUNTER_NAMES = [
  'tokenize',
  'resolve',
  'bridge',
  'compose',
  'render',
  'directScan',
  'flatten',
  'validatePath',
  'compileMatcher',
] as const;

export type PerfCounter = (typeof COUNTER_NAMES)[number];

interface PerfStats {
  calls: number;
  time: number;
}

export const PERF_COUNTERS: Record<PerfCounter, PerfStats> = {
  tokenize: { calls: 0, time: 0 },
  resolve: { calls: 0, time: 0 },
  bridge: { calls: 0, time: 0 },
  compose: { calls: 0, time: 0 },
  render: { calls: 0, time: 0 },
  directScan: { calls: 0, time: 0 },
  flatten: { calls: 0, time: 0 },
  validatePath: { calls: 0, time: 0 },
  compileMatcher: { calls: 0, time: 0 },
};

let enabled: boolean | null = null;

export function isProfilingEnabled(): boolean {
  if (enabled === null) {
    enabled = loadConfig().perf;
  }
  return enabled;
}

export function setProfilingEnabled(value: boolean): void {
  enabled = value;
}

// Inline profiling helper - no-op when profiling disabled
export function startTimer(counter: PerfCounter): () => void {
  if (!isProfilingEnabled()) return () => {};

  const start = performance.now();
  PERF_COUNTERS[counter].calls++;

  return () => {
    PERF_COUNTERS[counter].time += performance.now() - start;
  };
}

export function resetPerfCounters() {
  for (const key of COUNTER_NAMES) {
    PERF_COUNTERS[key].calls = 0;
    PERF_COUNTERS[key].time = 0;
  }
}

const NAME_WIDTH = Math.max(...COUNTER_NAMES.map((name) => name.length));

/**
 * One line per counter that ran, slowest first, under a `lipika perf` header.
 * Empty when nothing was counted.
 */
export function formatPerfCounters(): string[] {
  const rows = COUNTER_NAMES
    .map((name) => [name, PERF_COUNTERS[name]] as const)
    .filter(([, stats]) => stats.calls > 0)
    .sort((a, b) => b[1].time - a[1].time);
  if (rows.length === 0) return [];

  const lines = [`lipika perf (${rows.length} stage${rows.length === 1 ? '' : 's'})`];
  for (const [name, stats] of rows) {
    const avg = stats.time / stats.calls;
    lines.push(
      `  ${name.padEnd(NAME_WIDTH)}  ${String(stats.calls).padStart(7)}x  ${stats.time.toFixed(2).padStart(9)}ms  ${avg.toFixed(3).padStart(8)}ms/call`,
    );
  }
  return lines;
}

// Writes to stderr so converted text on stdout stays clean.
export function printPerfCountersAndReset() {
  if (!isProfilingEnabled()) {
    return;
  }
  for (const line of formatPerfCounters()) {
    console.error(line);
  }
  resetPerfCounters();
}
