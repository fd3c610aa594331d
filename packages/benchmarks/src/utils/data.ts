/**
 * Data generation utilities for benchmarks
 */

import { Matrix } from '@densemat/core';
import { randomMatrix } from '@densemat/io';

/**
 * Square matrix of uniform values in [-1, 1)
 */
export function benchmarkMatrix(order: number, seed: string): Matrix {
  return randomMatrix(order, order, { min: -1, max: 1, seed });
}

/**
 * Strictly diagonally dominant, hence invertible, matrix
 */
export function invertibleMatrix(order: number, seed: string): Matrix {
  const m = benchmarkMatrix(order, seed);
  for (let i = 0; i < order; i++) {
    m.set(i, i, m.get(i, i) + order);
  }
  return m;
}
