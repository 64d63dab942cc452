/**
 * Measurement histograms: outcome bit string -> shot count.
 */

import { z } from 'zod';
import { InvalidHistogramError } from './errors';
import { REGISTER_SIZE } from './sweep-circuit';

export type MeasurementHistogram = Readonly<Record<string, number>>;

export const DEFAULT_SHOTS = 1000;

const countSchema = z
  .number({ invalid_type_error: 'count must be a number' })
  .int('count must be an integer')
  .nonnegative('count must be non-negative');

/**
 * Schema for a histogram whose keys are `width`-bit strings
 */
export function histogramSchema(width: number = REGISTER_SIZE) {
  const outcome = new RegExp(`^[01]{${width}}$`);
  return z.record(
    z.string().regex(outcome, `outcome must be a ${width}-bit string`),
    countSchema
  );
}

const schemaCache = new Map<number, ReturnType<typeof histogramSchema>>();

function schemaFor(width: number): ReturnType<typeof histogramSchema> {
  let schema = schemaCache.get(width);
  if (!schema) {
    schema = histogramSchema(width);
    schemaCache.set(width, schema);
  }
  return schema;
}

/**
 * Check shape and total of a histogram.
 *
 * @throws InvalidHistogramError when the histogram is empty, malformed, or its
 * counts do not sum to `shots`
 */
export function validateHistogram(
  histogram: unknown,
  shots: number = DEFAULT_SHOTS,
  width: number = REGISTER_SIZE
): MeasurementHistogram {
  const parsed = schemaFor(width).safeParse(histogram);
  if (!parsed.success) {
    throw new InvalidHistogramError(
      parsed.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
      )
    );
  }

  const counts = parsed.data;
  const outcomes = Object.keys(counts);
  if (outcomes.length === 0) {
    throw new InvalidHistogramError(['histogram is empty']);
  }

  const total = histogramTotal(counts);
  if (total !== shots) {
    throw new InvalidHistogramError([
      `counts sum to ${total}, expected ${shots}`,
    ]);
  }

  return Object.freeze({ ...counts });
}

/**
 * Sum of all counts
 */
export function histogramTotal(histogram: MeasurementHistogram): number {
  let total = 0;
  for (const count of Object.values(histogram)) {
    total += count;
  }
  return total;
}

/**
 * Outcomes ordered by descending count, ties broken by bit string
 */
export function topOutcomes(
  histogram: MeasurementHistogram,
  limit: number = Infinity
): Array<[outcome: string, count: number]> {
  return Object.entries(histogram)
    .sort(([a, ca], [b, cb]) => cb - ca || (a < b ? -1 : a > b ? 1 : 0))
    .slice(0, limit);
}
