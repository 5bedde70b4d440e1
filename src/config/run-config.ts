/**
 * Run configuration from environment variables and CLI overrides.
 *
 * Only the CLI reads the environment; core components receive the
 * resulting values explicitly.
 */

import { z } from 'zod';
import { getProfileThresholds } from '@/refinement/thresholds.js';
import type { RunConfig } from '@/types/config.js';

const numberFromEnv = z.coerce.number();

const booleanFromEnv = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform((v) => v === true || v === 'true' || v === '1');

const RunConfigSchema = z
  .object({
    backend: z.enum(['elasticsearch', 'memory']).default('elasticsearch'),
    esUrl: z.string().url().default('http://localhost:9200'),
    esIndex: z
      .string()
      .min(1)
      .regex(/^[a-z0-9][a-z0-9._-]*$/, 'Index names are lowercase without spaces')
      .default('detectloop-eval'),
    esApiKey: z.string().min(1).optional(),
    esUsername: z.string().min(1).optional(),
    esPassword: z.string().min(1).optional(),
    esRequestTimeoutMs: numberFromEnv.pipe(z.number().int().positive()).default(10_000),
    esMaxRetries: numberFromEnv.pipe(z.number().int().min(0).max(10)).default(2),
    healthCheckTimeoutMs: numberFromEnv.pipe(z.number().int().positive()).default(3000),
    concurrency: numberFromEnv.pipe(z.number().int().min(1).max(64)).default(4),
    retainDocuments: booleanFromEnv.default(false),
    profile: z.enum(['dev', 'standard', 'production']).default('standard'),
    minPrecision: numberFromEnv.pipe(z.number().min(0).max(1)).optional(),
    minRecall: numberFromEnv.pipe(z.number().min(0).max(1)).optional(),
    maxIterations: numberFromEnv.pipe(z.number().int().min(1).max(50)).optional(),
    logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  })
  .refine((c) => (c.esUsername === undefined) === (c.esPassword === undefined), {
    message: 'ES_USERNAME and ES_PASSWORD must be set together',
    path: ['esUsername'],
  });

export type RunConfigOverrides = Partial<z.input<typeof RunConfigSchema>>;

const ENV_KEYS: Record<keyof RunConfigOverrides, string> = {
  backend: 'EVAL_BACKEND',
  esUrl: 'ES_URL',
  esIndex: 'ES_INDEX',
  esApiKey: 'ES_API_KEY',
  esUsername: 'ES_USERNAME',
  esPassword: 'ES_PASSWORD',
  esRequestTimeoutMs: 'ES_REQUEST_TIMEOUT_MS',
  esMaxRetries: 'ES_MAX_RETRIES',
  healthCheckTimeoutMs: 'HEALTH_CHECK_TIMEOUT_MS',
  concurrency: 'EVAL_CONCURRENCY',
  retainDocuments: 'RETAIN_EVAL_DOCUMENTS',
  profile: 'QUALITY_PROFILE',
  minPrecision: 'MIN_PRECISION',
  minRecall: 'MIN_RECALL',
  maxIterations: 'MAX_ITERATIONS',
  logLevel: 'LOG_LEVEL',
};

/**
 * Build the run configuration. Overrides win over the environment;
 * empty environment values count as unset. Threshold values left unset
 * come from the quality profile.
 *
 * @throws Error listing every invalid setting.
 */
export function loadRunConfig(env: NodeJS.ProcessEnv = process.env, overrides: RunConfigOverrides = {}): RunConfig {
  const input: Record<string, unknown> = {};
  for (const [key, envKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey];
    if (value !== undefined && value.trim() !== '') input[key] = value.trim();
  }
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) input[key] = value;
  }

  const result = RunConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.errors.map((e) => {
      const field = String(e.path[0] ?? '');
      const envKey = Object.entries(ENV_KEYS).find(([key]) => key === field)?.[1];
      return `  - ${envKey ?? field}: ${e.message}`;
    });
    throw new Error(`Invalid configuration:\n${issues.join('\n')}`);
  }

  const c = result.data;
  const profileDefaults = getProfileThresholds(c.profile);

  return {
    backend: c.backend,
    elasticsearch: {
      url: c.esUrl,
      index: c.esIndex,
      apiKey: c.esApiKey,
      username: c.esUsername,
      password: c.esPassword,
      requestTimeoutMs: c.esRequestTimeoutMs,
      maxRetries: c.esMaxRetries,
    },
    healthCheckTimeoutMs: c.healthCheckTimeoutMs,
    concurrency: c.concurrency,
    retainDocuments: c.retainDocuments,
    profile: c.profile,
    minPrecision: c.minPrecision ?? profileDefaults.minPrecision,
    minRecall: c.minRecall ?? profileDefaults.minRecall,
    maxIterations: c.maxIterations ?? profileDefaults.maxIterations,
    logLevel: c.logLevel,
  };
}
