/**
 * @qsweep/sweep
 *
 * Runs the probe-circuit sweep against a remote execution service.
 *
 * @example
 * ```typescript
 * import { createOrchestrator, loadConfig, runValidation, formatReport } from '@qsweep/sweep';
 *
 * const orchestrator = createOrchestrator(loadConfig());
 * const outcome = await runValidation(orchestrator);
 * if (outcome.analysis) {
 *   console.log(formatReport(outcome.analysis, outcome.result));
 * }
 * ```
 *
 * @packageDocumentation
 */

export { systemClock } from './clock';
export type { Clock } from './clock';

export { loadConfig } from './config';
export type { SweepConfig } from './config';

export { isAbortError, toExecutionError } from './execution-client';
export type { ExecutionClient } from './execution-client';

export { classifyStatus, HttpExecutionClient, isHaltingStatus } from './http-client';
export type { HttpExecutionClientOptions, JobStatus } from './http-client';

export { createLogger, silentLogger } from './logger';
export type { Logger, LoggerOptions } from './logger';

export {
  backoffDelay,
  DEFAULT_RETRY_POLICY,
  runSweep,
  validateParameters,
  ValidationOrchestrator,
} from './orchestrator';
export type { RetryPolicy, SweepOptions } from './orchestrator';

export { mapPool } from './pool';

export { formatReport, metricTitle } from './report';

export { createOrchestrator, runValidation } from './validation';
export type { OrchestratorDeps, ValidationOutcome } from './validation';
