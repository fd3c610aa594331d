/**
 * Elementwise and product benchmarks
 */

import { bench, describe } from 'vitest';
import { add, multiply, subtract, transpose } from '@densemat/core';
import { CUBIC_SIZES, MATRIX_SIZES } from '../utils/sizes';
import { benchmarkMatrix } from '../utils/data';

describe('add / subtract', () => {
  for (const size of MATRIX_SIZES) {
    const a = benchmarkMatrix(size.order, `a-${size.name}`);
    const b = benchmarkMatrix(size.order, `b-${size.name}`);

    bench(`add ${size.name} ${size.order}x${size.order}`, () => {
      add(a, b);
    });

    bench(`subtract ${size.name} ${size.order}x${size.order}`, () => {
      subtract(a, b);
    });
  }
});

describe('transpose', () => {
  for (const size of MATRIX_SIZES) {
    const a = benchmarkMatrix(size.order, `t-${size.name}`);

    bench(`transpose ${size.name} ${size.order}x${size.order}`, () => {
      transpose(a);
    });
  }
});

describe('multiply', () => {
  for (const size of CUBIC_SIZES) {
    const a = benchmarkMatrix(size.order, `a-${size.name}`);
    const b = benchmarkMatrix(size.order, `b-${size.name}`);

    bench(`multiply ${size.name} ${size.order}x${size.order}`, () => {
      multiply(a, b);
    });
  }
});
