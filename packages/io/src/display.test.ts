import { describe, it, expect } from 'vitest';
import { Matrix } from '@densemat/core';
import { formatG, formatMatrixDisplay } from './display';

describe('formatG', () => {
  it('should use fixed notation for moderate exponents', () => {
    expect(formatG(2 / 3, 4)).toBe('0.6667');
    expect(formatG(-0.5, 4)).toBe('-0.5');
    expect(formatG(100, 4)).toBe('100');
    expect(formatG(0.0001, 4)).toBe('0.0001');
    expect(formatG(-6, 12)).toBe('-6');
    expect(formatG(1 / 3, 12)).toBe('0.333333333333');
  });

  it('should use exponent notation for large and small magnitudes', () => {
    expect(formatG(123456, 4)).toBe('1.235e+05');
    expect(formatG(0.00001234, 4)).toBe('1.234e-05');
    expect(formatG(1e100, 4)).toBe('1e+100');
  });

  it('should format zero and non-finite values', () => {
    expect(formatG(0, 4)).toBe('0');
    expect(formatG(-0, 4)).toBe('-0');
    expect(formatG(Number.NaN, 4)).toBe('nan');
    expect(formatG(Number.NEGATIVE_INFINITY, 4)).toBe('-inf');
    expect(formatG(Number.POSITIVE_INFINITY, 4)).toBe('inf');
  });
});

describe('formatMatrixDisplay', () => {
  it('should right-align each value in ten columns', () => {
    const m = Matrix.fromArray([
      [4, 3],
      [-0.5, 2 / 3],
    ]);
    expect(formatMatrixDisplay(m)).toBe(
      [
        'Matrix 2x2:',
        `${' '.repeat(9)}4 ${' '.repeat(9)}3 `,
        `${' '.repeat(6)}-0.5 ${' '.repeat(4)}0.6667 `,
      ].join('\n'),
    );
  });

  it('should print only the header for an empty matrix', () => {
    expect(formatMatrixDisplay(Matrix.zeros(0, 0))).toBe('Matrix 0x0:');
  });
});
