/**
 * Metric Engine
 *
 * Reduces a measurement histogram to three heuristic scalars. Every function
 * validates the histogram against the declared shot total first and is a pure
 * function of its arguments.
 */

import {
  DEFAULT_SHOTS,
  validateHistogram,
  type MeasurementHistogram,
} from './histogram';
import { REGISTER_SIZE } from './sweep-circuit';

export interface MetricTriple {
  temporalCorrelation: number;
  falsification: number;
  beyondQuantum: number;
}

export type MetricName = keyof MetricTriple;

export const METRIC_NAMES: readonly MetricName[] = Object.freeze([
  'temporalCorrelation',
  'falsification',
  'beyondQuantum',
]);

/**
 * Alternating patterns treated as non-classical signatures
 */
export const DEFAULT_MOTIFS: readonly string[] = Object.freeze(['1010', '0101']);

export interface MetricOptions {
  /** Outcome width in bits (default 8) */
  width?: number;
  /** Motifs scanned by {@link beyondQuantumMetric} */
  motifs?: readonly string[];
}

/**
 * Per-shot count of length-3 windows whose bits all agree.
 *
 * Each outcome contributes `count × matchingWindows`; the sum is divided by
 * the shot total, so the value lies in [0, width - 2] (about 1.5 for a
 * uniform distribution over 8 bits).
 */
export function temporalCorrelation(
  histogram: MeasurementHistogram,
  shots: number = DEFAULT_SHOTS,
  options: MetricOptions = {}
): number {
  const counts = validateHistogram(histogram, shots, options.width ?? REGISTER_SIZE);
  let weighted = 0;
  for (const [outcome, count] of Object.entries(counts)) {
    weighted += count * agreeingWindows(outcome);
  }
  return weighted / shots;
}

/**
 * Deviation-weighted Shannon entropy, normalized to [0, 1].
 *
 * Outcome i contributes `-pᵢ·log2(pᵢ)` scaled by `1 - |cᵢ - E| / max(cᵢ, E)`,
 * where E is the count a uniform distribution would give each outcome. The
 * weighted sum is divided by the register width, the maximum entropy.
 */
export function falsificationMetric(
  histogram: MeasurementHistogram,
  shots: number = DEFAULT_SHOTS,
  options: MetricOptions = {}
): number {
  const width = options.width ?? REGISTER_SIZE;
  const counts = validateHistogram(histogram, shots, width);
  const expected = shots / Math.pow(2, width);

  let weighted = 0;
  for (const count of Object.values(counts)) {
    if (count === 0) continue;
    const p = count / shots;
    const entropy = -p * Math.log2(p);
    const weight = 1 - Math.abs(count - expected) / Math.max(count, expected);
    weighted += entropy * weight;
  }

  return clamp01(weighted / width);
}

/**
 * Fraction of shots whose outcome contains at least one motif
 */
export function beyondQuantumMetric(
  histogram: MeasurementHistogram,
  shots: number = DEFAULT_SHOTS,
  options: MetricOptions = {}
): number {
  const counts = validateHistogram(histogram, shots, options.width ?? REGISTER_SIZE);
  const motifs = options.motifs ?? DEFAULT_MOTIFS;

  let matching = 0;
  for (const [outcome, count] of Object.entries(counts)) {
    if (motifs.some((motif) => outcome.includes(motif))) {
      matching += count;
    }
  }
  return matching / shots;
}

/**
 * All three metrics for one histogram
 */
export function computeMetrics(
  histogram: MeasurementHistogram,
  shots: number = DEFAULT_SHOTS,
  options: MetricOptions = {}
): MetricTriple {
  return {
    temporalCorrelation: temporalCorrelation(histogram, shots, options),
    falsification: falsificationMetric(histogram, shots, options),
    beyondQuantum: beyondQuantumMetric(histogram, shots, options),
  };
}

function agreeingWindows(outcome: string): number {
  let matches = 0;
  for (let i = 0; i + 2 < outcome.length; i++) {
    if (outcome[i] === outcome[i + 1] && outcome[i + 1] === outcome[i + 2]) {
      matches++;
    }
  }
  return matches;
}

// Float error in the entropy sum can overshoot by an ulp.
function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}
