/**
 * Plain-text summary of a sweep and its analysis.
 */

import {
  METRIC_NAMES,
  topOutcomes,
  type AnalysisReport,
  type MetricName,
  type SweepResult,
} from '@qsweep/core';

const TITLES: Record<MetricName, string> = {
  temporalCorrelation: 'Temporal Correlation',
  falsification: 'Falsification',
  beyondQuantum: 'Beyond Quantum',
};

export function metricTitle(name: MetricName): string {
  return TITLES[name];
}

function fixed(value: number | null, digits: number = 3): string {
  return value === null ? 'n/a' : value.toFixed(digits);
}

/**
 * Render the analysis as text, one block per metric. When the sweep result
 * is given, per-parameter outcomes follow.
 */
export function formatReport(report: AnalysisReport, result?: SweepResult): string {
  const lines: string[] = ['Validation Results', '=================='];
  lines.push(`Points analyzed: ${report.points}`);

  for (const name of METRIC_NAMES) {
    const metric = report.metrics[name];
    lines.push('');
    lines.push(`${metricTitle(name)} Results:`);
    lines.push(`Mean ± SEM: ${fixed(metric.summary.mean)} ± ${fixed(metric.summary.sem)}`);
    lines.push(`Slope: ${fixed(metric.trend.slope)} ± ${fixed(metric.trend.stdErr)}`);
    lines.push(`R-squared: ${fixed(metric.trend.rSquared)}`);
    lines.push(`p-value: ${metric.trend.pValue.toExponential(3)}`);
    lines.push(`Main Frequency: ${fixed(metric.spectrum.mainFrequency)}`);
    if (metric.peaks.length > 0) {
      lines.push(`Peak Values: ${metric.peaks.map((peak) => fixed(peak.value)).join(', ')}`);
    }
  }

  lines.push('');
  lines.push('Correlations:');
  const { labels, matrix } = report.correlation;
  for (let i = 0; i < labels.length; i++) {
    for (let j = i + 1; j < labels.length; j++) {
      lines.push(
        `${metricTitle(labels[i])} / ${metricTitle(labels[j])}: ${fixed(matrix[i][j])}`
      );
    }
  }

  if (result) {
    lines.push('');
    lines.push('Parameters:');
    for (const entry of result.entries) {
      const head = `${entry.parameter.toFixed(2)} [${entry.status}, attempts=${entry.attempts}]`;
      switch (entry.status) {
        case 'succeeded': {
          const [top] = topOutcomes(entry.histogram, 1);
          lines.push(top ? `${head} top=${top[0]} (${top[1]})` : head);
          break;
        }
        case 'failed':
          lines.push(`${head} ${entry.failure.reason}: ${entry.failure.message}`);
          break;
        case 'cancelled':
          lines.push(head);
          break;
      }
    }
    if (result.halted) {
      lines.push(`Halted (${result.halted.cause}): ${result.halted.message}`);
    }
  }

  return lines.join('\n');
}
