/**
 * Tests for complex number utilities
 */

import { describe, it, expect } from 'vitest';
import { add, exp, magnitude, scale, ZERO } from '../complex';

describe('Complex Constants', () => {
  it('provides a frozen zero', () => {
    expect(ZERO).toEqual({ real: 0, imag: 0 });
    expect(Object.isFrozen(ZERO)).toBe(true);
  });
});

describe('Complex Arithmetic', () => {
  it('calculates magnitude correctly', () => {
    // 3-4-5 triangle
    expect(magnitude({ real: 3, imag: 4 })).toBe(5);
    expect(magnitude({ real: 0, imag: 1 })).toBe(1);
    expect(magnitude(ZERO)).toBe(0);
  });

  it('adds complex numbers', () => {
    expect(add({ real: 1, imag: 2 }, { real: 3, imag: -4 })).toEqual({ real: 4, imag: -2 });
  });

  it('leaves its operands untouched', () => {
    const a = { real: 1, imag: 1 };
    add(a, a);
    scale(a, 3);
    expect(a).toEqual({ real: 1, imag: 1 });
  });

  it('scales both parts', () => {
    expect(scale({ real: 2, imag: -3 }, -2)).toEqual({ real: -4, imag: 6 });
  });
});

describe('Unit Phasor', () => {
  it('computes e^(iθ) correctly', () => {
    expect(exp(0)).toEqual({ real: 1, imag: 0 });
    const quarter = exp(Math.PI / 2);
    expect(quarter.real).toBeCloseTo(0, 12);
    expect(quarter.imag).toBeCloseTo(1, 12);
    const half = exp(Math.PI);
    expect(half.real).toBeCloseTo(-1, 12);
    expect(half.imag).toBeCloseTo(0, 12);
  });

  it('has unit magnitude', () => {
    expect(magnitude(exp(1.234))).toBeCloseTo(1, 12);
  });
});
