/**
 * Error taxonomy shared by the sweep pipeline.
 *
 * Retries are decided by the orchestrator from these types alone:
 * only a transient {@link ExecutionError} is ever retried.
 */

/**
 * Base class for all qsweep errors
 */
export class QuantumSweepError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Measurement data that cannot be reduced to metrics
 */
export class InvalidHistogramError extends QuantumSweepError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid histogram: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

/**
 * Whether a failed execution may succeed when submitted again
 */
export type ExecutionFailureKind = 'transient' | 'terminal';

/**
 * Remote execution failed
 */
export class ExecutionError extends QuantumSweepError {
  readonly kind: ExecutionFailureKind;
  /** HTTP status, when the failure came from a response */
  readonly status?: number;
  /**
   * Set when no further job can succeed either (rejected credentials, for
   * example); the sweep stops instead of moving to the next parameter
   */
  readonly halt: boolean;

  constructor(
    message: string,
    kind: ExecutionFailureKind,
    options?: ErrorOptions & { status?: number; halt?: boolean }
  ) {
    super(message, options);
    this.kind = kind;
    this.status = options?.status;
    this.halt = options?.halt ?? false;
  }

  get transient(): boolean {
    return this.kind === 'transient';
  }
}

/**
 * Analysis requested on too few successful sweep entries
 */
export class InsufficientDataError extends QuantumSweepError {
  readonly required: number;
  readonly available: number;

  constructor(required: number, available: number) {
    super(
      `Analysis needs at least ${required} successful entries, got ${available}`
    );
    this.required = required;
    this.available = available;
  }
}

/**
 * Configuration values that failed validation
 */
export class ConfigError extends QuantumSweepError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}
