/**
 * Analysis Engine
 *
 * Post-processes the successful entries of a sweep: a linear trend per
 * metric, its DFT magnitude spectrum and local maxima, and the Pearson
 * correlation between the three metric series.
 */

import { InsufficientDataError } from './errors';
import { METRIC_NAMES, type MetricName } from './metrics';
import {
  fftFrequencies,
  findPeaks,
  linearRegression,
  magnitudeSpectrum,
  mean,
  pearson,
  standardError,
  type LinearFit,
} from './statistics';
import { successfulEntries, type SweepResult } from './sweep-result';

export const MIN_ANALYSIS_POINTS = 2;

export interface SeriesSummary {
  mean: number;
  /** Standard error of the mean */
  sem: number | null;
  min: number;
  max: number;
}

export interface Spectrum {
  /** Cycles per sample, one per bin */
  frequencies: number[];
  magnitudes: number[];
  /** Frequency of the strongest non-DC bin */
  mainFrequency: number;
}

export interface Peak {
  index: number;
  parameter: number;
  value: number;
}

export interface MetricAnalysis {
  values: number[];
  trend: LinearFit;
  summary: SeriesSummary;
  spectrum: Spectrum;
  peaks: Peak[];
}

export interface AnalysisReport {
  /** Parameters of the successful entries, ascending */
  parameters: number[];
  points: number;
  metrics: Record<MetricName, MetricAnalysis>;
  correlation: {
    labels: readonly MetricName[];
    /** Row/column order follows `labels`; null where a series is constant */
    matrix: (number | null)[][];
  };
}

/**
 * @throws InsufficientDataError with fewer than two successful entries
 */
export function analyze(result: SweepResult): AnalysisReport {
  const entries = successfulEntries(result).sort(
    (a, b) => a.parameter - b.parameter
  );
  if (entries.length < MIN_ANALYSIS_POINTS) {
    throw new InsufficientDataError(MIN_ANALYSIS_POINTS, entries.length);
  }

  const parameters = entries.map((entry) => entry.parameter);
  const seriesOf = (name: MetricName): number[] =>
    entries.map((entry) => entry.metrics[name]);
  const series: Record<MetricName, number[]> = {
    temporalCorrelation: seriesOf('temporalCorrelation'),
    falsification: seriesOf('falsification'),
    beyondQuantum: seriesOf('beyondQuantum'),
  };

  const metrics: Record<MetricName, MetricAnalysis> = {
    temporalCorrelation: analyzeSeries(parameters, series.temporalCorrelation),
    falsification: analyzeSeries(parameters, series.falsification),
    beyondQuantum: analyzeSeries(parameters, series.beyondQuantum),
  };

  const matrix = METRIC_NAMES.map((row) =>
    METRIC_NAMES.map((column) => pearson(series[row], series[column]))
  );

  return {
    parameters,
    points: entries.length,
    metrics,
    correlation: { labels: METRIC_NAMES, matrix },
  };
}

function analyzeSeries(parameters: number[], values: number[]): MetricAnalysis {
  return {
    values,
    trend: linearRegression(parameters, values),
    summary: {
      mean: mean(values),
      sem: standardError(values),
      min: Math.min(...values),
      max: Math.max(...values),
    },
    spectrum: spectrumOf(values),
    peaks: findPeaks(values).map((index) => ({
      index,
      parameter: parameters[index],
      value: values[index],
    })),
  };
}

function spectrumOf(values: number[]): Spectrum {
  const magnitudes = magnitudeSpectrum(values);
  const frequencies = fftFrequencies(values.length);

  let strongest = 1;
  for (let k = 2; k < magnitudes.length; k++) {
    if (magnitudes[k] > magnitudes[strongest]) {
      strongest = k;
    }
  }

  return {
    frequencies,
    magnitudes,
    mainFrequency: frequencies[strongest],
  };
}
