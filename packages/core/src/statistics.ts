/**
 * Statistics kernels used by the analysis engine: descriptive statistics,
 * ordinary least squares with a Student-t test on the slope, Pearson
 * correlation, a direct DFT and local-maximum detection.
 */

import { add, exp, magnitude, scale, ZERO, type Complex } from './complex';

// ============================================================================
// Descriptive Statistics
// ============================================================================

export function mean(values: readonly number[]): number {
  if (values.length === 0) {
    throw new Error('mean of an empty series');
  }
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/**
 * Standard error of the mean (sample standard deviation / √n); null for n < 2
 */
export function standardError(values: readonly number[]): number | null {
  const n = values.length;
  if (n < 2) return null;
  const m = mean(values);
  let ss = 0;
  for (const v of values) ss += (v - m) * (v - m);
  return Math.sqrt(ss / (n - 1)) / Math.sqrt(n);
}

// ============================================================================
// Regression
// ============================================================================

export interface LinearFit {
  slope: number;
  intercept: number;
  rValue: number;
  rSquared: number;
  /** Two-sided p-value for the null hypothesis slope = 0 */
  pValue: number;
  /** Standard error of the slope */
  stdErr: number;
  interceptStdErr: number;
}

const TINY = 1e-20;

/**
 * Ordinary least-squares fit of y against x.
 *
 * With two points the line is exact, so both standard errors are 0 and the
 * p-value is 0 (1 when the two y values are equal).
 */
export function linearRegression(
  x: readonly number[],
  y: readonly number[]
): LinearFit {
  const n = x.length;
  if (n !== y.length) {
    throw new Error('x and y must have the same length');
  }
  if (n < 2) {
    throw new Error('linear regression needs at least 2 points');
  }

  const xMean = mean(x);
  const yMean = mean(y);
  let ssxm = 0;
  let ssym = 0;
  let ssxym = 0;
  for (let i = 0; i < n; i++) {
    const dx = x[i] - xMean;
    const dy = y[i] - yMean;
    ssxm += dx * dx;
    ssym += dy * dy;
    ssxym += dx * dy;
  }
  ssxm /= n;
  ssym /= n;
  ssxym /= n;

  if (ssxm === 0) {
    throw new Error('linear regression is undefined when all x values are equal');
  }

  const rDen = Math.sqrt(ssxm * ssym);
  const r = rDen === 0 ? 0 : clamp(ssxym / rDen, -1, 1);
  const slope = ssxym / ssxm;
  const intercept = yMean - slope * xMean;

  let pValue: number;
  let stdErr: number;
  if (n === 2) {
    pValue = y[0] === y[1] ? 1 : 0;
    stdErr = 0;
  } else {
    const df = n - 2;
    const t = r * Math.sqrt(df / ((1 - r + TINY) * (1 + r + TINY)));
    pValue = studentTTwoSided(t, df);
    stdErr = Math.sqrt(((1 - r * r) * ssym) / ssxm / df);
  }

  return {
    slope,
    intercept,
    rValue: r,
    rSquared: r * r,
    pValue,
    stdErr,
    interceptStdErr: stdErr * Math.sqrt(ssxm + xMean * xMean),
  };
}

/**
 * Pearson correlation coefficient; null when either series has zero variance
 */
export function pearson(a: readonly number[], b: readonly number[]): number | null {
  if (a.length !== b.length) {
    throw new Error('series must have the same length');
  }
  if (a.length < 2) return null;
  const ma = mean(a);
  const mb = mean(b);
  let sab = 0;
  let saa = 0;
  let sbb = 0;
  for (let i = 0; i < a.length; i++) {
    const da = a[i] - ma;
    const db = b[i] - mb;
    sab += da * db;
    saa += da * da;
    sbb += db * db;
  }
  if (saa === 0 || sbb === 0) return null;
  return clamp(sab / Math.sqrt(saa * sbb), -1, 1);
}

// ============================================================================
// Student's t Distribution
// ============================================================================

/**
 * P(|T| ≥ |t|) for Student's t with `df` degrees of freedom
 */
export function studentTTwoSided(t: number, df: number): number {
  if (!(df > 0)) {
    throw new Error(`degrees of freedom must be positive, got ${df}`);
  }
  if (!Number.isFinite(t)) return 0;
  return regularizedIncompleteBeta(df / 2, 0.5, df / (df + t * t));
}

const LANCZOS = [
  76.18009172947146, -86.50532032941677, 24.01409824083091,
  -1.231739572450155, 0.1208650973866179e-2, -0.5395239384953e-5,
];

/**
 * ln Γ(x) for x > 0 (Lanczos approximation)
 */
export function lnGamma(x: number): number {
  let y = x;
  let tmp = x + 5.5;
  tmp -= (x + 0.5) * Math.log(tmp);
  let ser = 1.000000000190015;
  for (const c of LANCZOS) {
    y += 1;
    ser += c / y;
  }
  return -tmp + Math.log((2.5066282746310005 * ser) / x);
}

/**
 * Regularized incomplete beta function I_x(a, b)
 */
export function regularizedIncompleteBeta(a: number, b: number, x: number): number {
  if (x <= 0) return 0;
  if (x >= 1) return 1;
  const front = Math.exp(
    lnGamma(a + b) - lnGamma(a) - lnGamma(b) + a * Math.log(x) + b * Math.log(1 - x)
  );
  if (x < (a + 1) / (a + b + 2)) {
    return (front * betaContinuedFraction(a, b, x)) / a;
  }
  return 1 - (front * betaContinuedFraction(b, a, 1 - x)) / b;
}

const MAX_ITERATIONS = 300;
const EPSILON = 1e-15;
const FPMIN = 1e-300;

// Modified Lentz evaluation of the continued fraction for I_x(a, b).
function betaContinuedFraction(a: number, b: number, x: number): number {
  const qab = a + b;
  const qap = a + 1;
  const qam = a - 1;
  let c = 1;
  let d = 1 - (qab * x) / qap;
  if (Math.abs(d) < FPMIN) d = FPMIN;
  d = 1 / d;
  let h = d;

  for (let m = 1; m <= MAX_ITERATIONS; m++) {
    const m2 = 2 * m;
    let aa = (m * (b - m) * x) / ((qam + m2) * (a + m2));
    d = 1 + aa * d;
    if (Math.abs(d) < FPMIN) d = FPMIN;
    c = 1 + aa / c;
    if (Math.abs(c) < FPMIN) c = FPMIN;
    d = 1 / d;
    h *= d * c;

    aa = (-(a + m) * (qab + m) * x) / ((a + m2) * (qap + m2));
    d = 1 + aa * d;
    if (Math.abs(d) < FPMIN) d = FPMIN;
    c = 1 + aa / c;
    if (Math.abs(c) < FPMIN) c = FPMIN;
    d = 1 / d;
    const delta = d * c;
    h *= delta;
    if (Math.abs(delta - 1) < EPSILON) break;
  }

  return h;
}

// ============================================================================
// Spectrum
// ============================================================================

/**
 * Discrete Fourier transform X_k = Σ x_n e^(-2πi kn/N)
 */
export function dft(values: readonly number[]): Complex[] {
  const n = values.length;
  const out: Complex[] = [];
  for (let k = 0; k < n; k++) {
    let acc: Complex = ZERO;
    for (let t = 0; t < n; t++) {
      acc = add(acc, scale(exp((-2 * Math.PI * k * t) / n), values[t]));
    }
    out.push(acc);
  }
  return out;
}

/**
 * Magnitude of each DFT bin
 */
export function magnitudeSpectrum(values: readonly number[]): number[] {
  return dft(values).map(magnitude);
}

/**
 * Bin frequencies in cycles per sample: 0, 1/N, ..., then the negative half
 */
export function fftFrequencies(n: number): number[] {
  const freqs: number[] = [];
  const positive = Math.floor((n - 1) / 2);
  for (let k = 0; k < n; k++) {
    freqs.push((k <= positive ? k : k - n) / n);
  }
  return freqs;
}

// ============================================================================
// Peaks
// ============================================================================

/**
 * Indices of local maxima. A sample qualifies when it is strictly greater
 * than its left neighbour and than the first differing sample to its right;
 * a flat top reports its middle index (rounded down). Endpoints never qualify.
 */
export function findPeaks(values: readonly number[]): number[] {
  const peaks: number[] = [];
  const last = values.length - 1;
  let i = 1;
  while (i < last) {
    if (values[i - 1] < values[i]) {
      let ahead = i + 1;
      while (ahead < last && values[ahead] === values[i]) {
        ahead++;
      }
      if (values[ahead] < values[i]) {
        peaks.push(Math.floor((i + ahead - 1) / 2));
        i = ahead;
      }
    }
    i++;
  }
  return peaks;
}

function clamp(value: number, lo: number, hi: number): number {
  return Math.min(hi, Math.max(lo, value));
}
