/**
 * Boundary to the remote execution service.
 */

import {
  ExecutionError,
  type CircuitDescription,
  type MeasurementHistogram,
} from '@qsweep/core';

/**
 * Runs a circuit remotely and returns its measurement histogram.
 *
 * Implementations reject with {@link ExecutionError}; its `kind` tells the
 * orchestrator whether another attempt may succeed. They never retry on
 * their own.
 */
export interface ExecutionClient {
  execute(
    circuit: CircuitDescription,
    shots: number,
    signal?: AbortSignal
  ): Promise<MeasurementHistogram>;
}

/**
 * Normalize anything a client threw. Unknown errors count as transient.
 */
export function toExecutionError(error: unknown): ExecutionError {
  if (error instanceof ExecutionError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ExecutionError(message, 'transient', { cause: error });
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}
