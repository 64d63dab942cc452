/**
 * Complex number utilities for spectral analysis of metric series.
 */

/**
 * Complex number interface
 */
export interface Complex {
  real: number;
  imag: number;
}

/**
 * Complex zero
 */
export const ZERO: Complex = Object.freeze({ real: 0, imag: 0 });

/**
 * Calculate magnitude (absolute value) |z| = sqrt(a² + b²)
 */
export function magnitude(c: Complex): number {
  return Math.hypot(c.real, c.imag);
}

/**
 * Complex addition z1 + z2
 */
export function add(a: Complex, b: Complex): Complex {
  return {
    real: a.real + b.real,
    imag: a.imag + b.imag,
  };
}

/**
 * Scalar multiplication s * z
 */
export function scale(c: Complex, s: number): Complex {
  return {
    real: c.real * s,
    imag: c.imag * s,
  };
}

/**
 * Unit phasor e^(iθ) = cos(θ) + i*sin(θ)
 */
export function exp(theta: number): Complex {
  return {
    real: Math.cos(theta),
    imag: Math.sin(theta),
  };
}
