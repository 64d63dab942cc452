/**
 * Wiring from configuration to a full sweep-and-analyze run.
 */

import {
  analyze,
  ConfigError,
  InsufficientDataError,
  type AnalysisReport,
  type SweepResult,
} from '@qsweep/core';
import type { Clock } from './clock';
import type { SweepConfig } from './config';
import type { ExecutionClient } from './execution-client';
import { HttpExecutionClient } from './http-client';
import { createLogger, type Logger } from './logger';
import { ValidationOrchestrator, type SweepOptions } from './orchestrator';

export interface OrchestratorDeps {
  /** Overrides the HTTP client built from `apiUrl`/`apiToken` */
  client?: ExecutionClient;
  clock?: Clock;
  logger?: Logger;
  fetch?: typeof fetch;
}

/**
 * @throws ConfigError when no client is injected and the service URL or token
 * is missing
 */
export function createOrchestrator(
  config: SweepConfig,
  deps: OrchestratorDeps = {}
): ValidationOrchestrator {
  const logger = deps.logger ?? createLogger({ level: config.logLevel });
  let client = deps.client;
  if (!client) {
    const issues: string[] = [];
    if (!config.apiUrl) issues.push('QSWEEP_API_URL: required');
    if (!config.apiToken) issues.push('QSWEEP_API_TOKEN: required');
    if (!config.apiUrl || !config.apiToken) throw new ConfigError(issues);
    client = new HttpExecutionClient({
      baseUrl: config.apiUrl,
      token: config.apiToken,
      device: config.device,
      pollIntervalMs: config.pollIntervalMs,
      timeoutMs: config.jobTimeoutMs,
      clock: deps.clock,
      fetch: deps.fetch,
      logger: logger.child({ component: 'http-client' }),
    });
  }

  return new ValidationOrchestrator({
    client,
    shots: config.shots,
    retry: {
      maxAttempts: config.maxAttempts,
      initialDelayMs: config.retryDelayMs,
      backoffFactor: config.backoffFactor,
    },
    concurrency: config.concurrency,
    pacingMs: config.pacingMs,
    policy: { decayLaw: config.decayLaw, readout: config.readout },
    clock: deps.clock,
    logger,
  });
}

export type ValidationOutcome =
  | { result: SweepResult; analysis: AnalysisReport }
  | { result: SweepResult; analysis: null; error: InsufficientDataError };

/**
 * Run the sweep, then analyze it. Too few successful entries is reported in
 * the outcome; the sweep result is kept either way.
 */
export async function runValidation(
  orchestrator: ValidationOrchestrator,
  overrides: Partial<Omit<SweepOptions, 'client'>> = {}
): Promise<ValidationOutcome> {
  const result = await orchestrator.runSweep(overrides);
  try {
    return { result, analysis: analyze(result) };
  } catch (error) {
    if (error instanceof InsufficientDataError) {
      return { result, analysis: null, error };
    }
    throw error;
  }
}
