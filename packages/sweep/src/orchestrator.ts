/**
 * Validation Orchestrator
 *
 * Drives a parameter sweep: build the probe circuit, execute it remotely,
 * reduce the histogram to metrics. Transient execution failures are retried
 * per parameter with exponential backoff; a parameter that exhausts its
 * attempts is recorded as failed and the sweep moves on, as is one whose
 * failure is terminal. A failure flagged `halt` or an abort stops new work,
 * and whatever completed is still returned.
 */

import {
  buildCircuit,
  computeMetrics,
  DEFAULT_MOTIFS,
  DEFAULT_SHOTS,
  ExecutionError,
  InvalidHistogramError,
  sweepParameters,
  validateHistogram,
  type CircuitPolicy,
  type SweepEntry,
  type SweepResult,
} from '@qsweep/core';
import { systemClock, type Clock } from './clock';
import { toExecutionError, type ExecutionClient } from './execution-client';
import { silentLogger, type Logger } from './logger';
import { mapPool } from './pool';

export interface RetryPolicy {
  /** Total attempts per parameter, the first one included */
  maxAttempts: number;
  /** Delay before the second attempt */
  initialDelayMs: number;
  backoffFactor: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = Object.freeze({
  maxAttempts: 3,
  initialDelayMs: 5000,
  backoffFactor: 2,
  maxDelayMs: 60_000,
});

export interface SweepOptions {
  client: ExecutionClient;
  /** Swept values (default: 8 evenly spaced over [0.1, 2.0]) */
  parameters?: readonly number[];
  shots?: number;
  retry?: Partial<RetryPolicy>;
  /** Parameters in flight at once */
  concurrency?: number;
  /** Pause a worker takes before starting its next parameter */
  pacingMs?: number;
  policy?: Partial<CircuitPolicy>;
  motifs?: readonly string[];
  clock?: Clock;
  logger?: Logger;
  signal?: AbortSignal;
}

/**
 * Delay before attempt `attempt + 1`, after `attempt` failures (1-based)
 */
export function backoffDelay(retry: RetryPolicy, attempt: number): number {
  const delay = retry.initialDelayMs * Math.pow(retry.backoffFactor, attempt - 1);
  return Math.min(delay, retry.maxDelayMs);
}

export async function runSweep(options: SweepOptions): Promise<SweepResult> {
  const parameters = [...(options.parameters ?? sweepParameters())];
  const shots = options.shots ?? DEFAULT_SHOTS;
  const retry: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...options.retry };
  const clock = options.clock ?? systemClock;
  const logger = (options.logger ?? silentLogger()).child({ component: 'sweep' });
  const motifs = options.motifs ?? DEFAULT_MOTIFS;
  const pacingMs = options.pacingMs ?? 0;
  const signal = options.signal;

  if (retry.maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be at least 1, got ${retry.maxAttempts}`);
  }
  validateParameters(parameters);

  // Written by whichever worker first hits a terminal failure.
  const state: { halted?: SweepResult['halted'] } = {};
  const startedAt = new Date(clock.now()).toISOString();
  const stopped = (): boolean => state.halted !== undefined || signal?.aborted === true;

  logger.info(
    { parameters: parameters.length, shots, concurrency: options.concurrency ?? 1 },
    'sweep started'
  );

  const runParameter = async (parameter: number, index: number): Promise<SweepEntry> => {
    const log = logger.child({ index, parameter });
    const circuit = buildCircuit(parameter, options.policy);
    let attempts = 0;

    for (;;) {
      if (stopped()) {
        return { status: 'cancelled', index, parameter, attempts };
      }

      attempts++;
      log.info({ attempt: attempts }, 'submitting circuit');
      try {
        const raw = await options.client.execute(circuit, shots, signal);
        const histogram = validateHistogram(raw, shots, circuit.numClbits);
        const metrics = computeMetrics(histogram, shots, {
          width: circuit.numClbits,
          motifs,
        });
        log.info({ attempt: attempts, ...metrics }, 'metrics collected');
        return { status: 'succeeded', index, parameter, attempts, metrics, histogram };
      } catch (error) {
        if (signal?.aborted) {
          log.warn({ attempt: attempts }, 'aborted while executing');
          return { status: 'cancelled', index, parameter, attempts };
        }

        if (error instanceof InvalidHistogramError) {
          log.error({ attempt: attempts, issues: error.issues }, 'invalid histogram');
          return {
            status: 'failed',
            index,
            parameter,
            attempts,
            failure: { reason: 'invalid-histogram', message: error.message },
          };
        }

        const failure = toExecutionError(error);
        if (failure.halt) {
          log.error({ attempt: attempts, err: failure }, 'execution failure halts the sweep');
          state.halted ??= { cause: 'terminal-failure', message: failure.message };
          return failedExecution(index, parameter, attempts, failure);
        }

        if (failure.kind === 'terminal') {
          log.error({ attempt: attempts, err: failure }, 'terminal execution failure');
          return failedExecution(index, parameter, attempts, failure);
        }

        if (attempts >= retry.maxAttempts) {
          log.error(
            { attempt: attempts, err: failure },
            'maximum attempts reached, recording failure'
          );
          return failedExecution(index, parameter, attempts, failure);
        }

        const delay = backoffDelay(retry, attempts);
        log.warn({ attempt: attempts, delayMs: delay, err: failure }, 'retrying');
        try {
          await clock.sleep(delay, signal);
        } catch (sleepError) {
          if (!signal?.aborted) throw sleepError;
          return { status: 'cancelled', index, parameter, attempts };
        }
      }
    }
  };

  const entries = await mapPool(
    parameters,
    options.concurrency ?? 1,
    async (parameter, index) => {
      const entry = await runParameter(parameter, index);
      if (pacingMs > 0 && !stopped()) {
        await clock.sleep(pacingMs, signal).catch((error: unknown) => {
          if (!signal?.aborted) throw error;
        });
      }
      return entry;
    },
    {
      shouldStop: stopped,
      onSkipped: (parameter, index): SweepEntry => ({
        status: 'cancelled',
        index,
        parameter,
        attempts: 0,
      }),
    }
  );

  if (state.halted === undefined && signal?.aborted) {
    state.halted = { cause: 'aborted', message: abortMessage(signal) };
  }

  const result: SweepResult = {
    shots,
    entries,
    ...(state.halted ? { halted: state.halted } : {}),
    startedAt,
    finishedAt: new Date(clock.now()).toISOString(),
  };

  const counts = { succeeded: 0, failed: 0, cancelled: 0 };
  for (const entry of entries) counts[entry.status]++;
  logger.info({ ...counts, halted: result.halted?.cause }, 'sweep finished');

  return result;
}

/**
 * Injected-collaborator facade over {@link runSweep}
 */
export class ValidationOrchestrator {
  constructor(private readonly defaults: SweepOptions) {}

  runSweep(overrides: Partial<Omit<SweepOptions, 'client'>> = {}): Promise<SweepResult> {
    return runSweep({ ...this.defaults, ...overrides });
  }
}

/**
 * @throws RangeError unless every parameter is finite and the sequence is
 * strictly increasing
 */
export function validateParameters(parameters: readonly number[]): void {
  parameters.forEach((parameter, i) => {
    if (!Number.isFinite(parameter)) {
      throw new RangeError(`Parameter ${i} must be finite, got ${parameter}`);
    }
    if (i > 0 && parameter <= parameters[i - 1]) {
      throw new RangeError(
        `Parameters must be strictly increasing, got ${parameters[i - 1]} then ${parameter}`
      );
    }
  });
}

function failedExecution(
  index: number,
  parameter: number,
  attempts: number,
  error: ExecutionError
): SweepEntry {
  return {
    status: 'failed',
    index,
    parameter,
    attempts,
    failure: { reason: 'execution', kind: error.kind, message: error.message },
  };
}

function abortMessage(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) return reason.message;
  return reason === undefined ? 'sweep aborted' : String(reason);
}
