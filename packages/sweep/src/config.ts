/**
 * Runtime configuration from `QSWEEP_*` environment variables.
 *
 * Usage:
 *   const config = loadConfig(process.env);
 */

import { ConfigError } from '@qsweep/core';
import { z } from 'zod';

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();

const configSchema = z.object({
  apiUrl: z.string().url().optional(),
  apiToken: z.string().min(1).optional(),
  device: z.string().min(1).default('quantum'),
  shots: positiveInt.default(1000),
  maxAttempts: positiveInt.default(3),
  retryDelayMs: nonNegativeInt.default(5000),
  backoffFactor: z.coerce.number().min(1).default(2),
  concurrency: positiveInt.default(1),
  pacingMs: nonNegativeInt.default(2000),
  pollIntervalMs: positiveInt.default(2000),
  jobTimeoutMs: positiveInt.default(600_000),
  decayLaw: z.enum(['halving', 'constant']).default('halving'),
  readout: z.enum(['cascade', 'flat']).default('cascade'),
  logLevel: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
});

export type SweepConfig = z.infer<typeof configSchema>;

const ENV_KEYS: Record<keyof SweepConfig, string> = {
  apiUrl: 'QSWEEP_API_URL',
  apiToken: 'QSWEEP_API_TOKEN',
  device: 'QSWEEP_DEVICE',
  shots: 'QSWEEP_SHOTS',
  maxAttempts: 'QSWEEP_MAX_ATTEMPTS',
  retryDelayMs: 'QSWEEP_RETRY_DELAY_MS',
  backoffFactor: 'QSWEEP_BACKOFF_FACTOR',
  concurrency: 'QSWEEP_CONCURRENCY',
  pacingMs: 'QSWEEP_PACING_MS',
  pollIntervalMs: 'QSWEEP_POLL_INTERVAL_MS',
  jobTimeoutMs: 'QSWEEP_JOB_TIMEOUT_MS',
  decayLaw: 'QSWEEP_DECAY_LAW',
  readout: 'QSWEEP_READOUT',
  logLevel: 'QSWEEP_LOG_LEVEL',
};

/**
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): SweepConfig {
  const raw: Record<string, string> = {};
  for (const [field, key] of Object.entries(ENV_KEYS)) {
    const value = env[key]?.trim();
    if (value) raw[field] = value;
  }

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => {
        const field = String(issue.path[0]);
        const key = Object.entries(ENV_KEYS).find(([name]) => name === field)?.[1];
        return `${key ?? field}: ${issue.message}`;
      })
    );
  }
  return parsed.data;
}
