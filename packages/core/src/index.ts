/**
 * @qsweep/core
 *
 * Circuit construction, histogram metrics and sweep analysis. Nothing in
 * this package performs I/O.
 *
 * @example
 * ```typescript
 * import { buildCircuit, computeMetrics, analyze } from '@qsweep/core';
 *
 * const circuit = buildCircuit(0.5);
 * const metrics = computeMetrics({ '00000000': 600, '11111111': 400 }, 1000);
 * console.log(metrics.temporalCorrelation); // 6
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Circuits
// ============================================================================

export { Circuit, gateQubits } from './circuit';
export type {
  Gate,
  GateType,
  BasisChangeGate,
  RotationGate,
  EntanglingGate,
  ControlledRotationGate,
  ToffoliGate,
  MeasureGate,
  CircuitJSON,
  CircuitStats,
} from './circuit';

export {
  buildCircuit,
  correlationAngle,
  DEFAULT_CIRCUIT_POLICY,
  REGISTER_SIZE,
} from './sweep-circuit';
export type {
  CircuitDescription,
  CircuitPolicy,
  DecayLaw,
  ReadoutPolicy,
} from './sweep-circuit';

// ============================================================================
// Histograms and Metrics
// ============================================================================

export {
  DEFAULT_SHOTS,
  histogramSchema,
  histogramTotal,
  topOutcomes,
  validateHistogram,
} from './histogram';
export type { MeasurementHistogram } from './histogram';

export {
  beyondQuantumMetric,
  computeMetrics,
  DEFAULT_MOTIFS,
  falsificationMetric,
  METRIC_NAMES,
  temporalCorrelation,
} from './metrics';
export type { MetricName, MetricOptions, MetricTriple } from './metrics';

// ============================================================================
// Sweep Results and Analysis
// ============================================================================

export {
  cancelledEntries,
  failedEntries,
  successfulEntries,
  sweepParameters,
} from './sweep-result';
export type {
  CancelledEntry,
  EntryFailure,
  FailedEntry,
  FailureReason,
  SucceededEntry,
  SweepEntry,
  SweepEntryStatus,
  SweepResult,
} from './sweep-result';

export { analyze, MIN_ANALYSIS_POINTS } from './analysis';
export type {
  AnalysisReport,
  MetricAnalysis,
  Peak,
  SeriesSummary,
  Spectrum,
} from './analysis';

export {
  dft,
  fftFrequencies,
  findPeaks,
  linearRegression,
  magnitudeSpectrum,
  mean,
  pearson,
  standardError,
  studentTTwoSided,
} from './statistics';
export type { LinearFit } from './statistics';

export type { Complex } from './complex';

// ============================================================================
// Errors
// ============================================================================

export {
  ConfigError,
  ExecutionError,
  InsufficientDataError,
  InvalidHistogramError,
  QuantumSweepError,
} from './errors';
export type { ExecutionFailureKind } from './errors';

export const VERSION = '0.1.0';
