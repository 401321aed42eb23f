/**
 * Environment configuration.
 *
 * Read once from `process.env` (the CLI and API load `.env` through dotenv
 * before anything else) and validated with zod so a bad value fails at
 * startup instead of surfacing mid-conversion.
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { MATCH_STRATEGIES, OPTIMIZATION_PROFILES } from './types.js';

const booleanString = z
  .union([z.boolean(), z.string()])
  .transform((val, ctx) => {
    if (typeof val === 'boolean') return val;
    const lower = val.toLowerCase().trim();
    if (lower === '' || lower === 'false' || lower === '0' || lower === 'no') return false;
    if (lower === 'true' || lower === '1' || lower === 'yes') return true;
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a boolean, got "${val}"` });
    return z.NEVER;
  });

const ConfigSchema = z.object({
  profile: z.enum(OPTIMIZATION_PROFILES).default('common-pairs'),
  strategy: z.enum(MATCH_STRATEGIES).default('hash'),
  schemaDir: z
    .string()
    .optional()
    .transform((val) => (val && val.trim() !== '' ? val : undefined)),
  matcherCacheSize: z.coerce.number().int().positive().default(256),
  debug: booleanString.default(false),
  verify: booleanString.default(false),
  perf: booleanString.default(false),
});

export type LipikaConfig = z.infer<typeof ConfigSchema>;

type Env = Record<string, string | undefined>;

function parseConfig(env: Env): LipikaConfig {
  const result = ConfigSchema.safeParse({
    profile: env.LIPIKA_PROFILE || undefined,
    strategy: env.LIPIKA_MATCHER || undefined,
    schemaDir: env.LIPIKA_SCHEMA_DIR,
    matcherCacheSize: env.LIPIKA_MATCHER_CACHE_SIZE || undefined,
    debug: env.LIPIKA_DEBUG,
    verify: env.LIPIKA_VERIFY,
    perf: env.LIPIKA_PERF,
  });

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid environment configuration: ${details}`);
  }
  return result.data;
}

let cached: LipikaConfig | null = null;

export function loadConfig(env: Env = process.env): LipikaConfig {
  if (env !== process.env) {
    return parseConfig(env);
  }
  if (!cached) {
    cached = parseConfig(env);
  }
  return cached;
}

// Tests change process.env between cases.
export function resetConfig(): void {
  cached = null;
}
