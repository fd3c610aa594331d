/**
 * Reproducible matrix fixtures for tests
 *
 * Every fixture is derived from a seed so a failing property can be replayed.
 */

import { Matrix } from '@densemat/core';
import { randomMatrix } from '@densemat/io';

/**
 * Uniform values in [-10, 10]
 */
export function seededMatrix(rows: number, cols: number, seed: string): Matrix {
  return randomMatrix(rows, cols, { min: -10, max: 10, seed });
}

/**
 * Strictly diagonally dominant, hence invertible and well conditioned
 */
export function diagonallyDominant(n: number, seed: string): Matrix {
  const m = randomMatrix(n, n, { min: -1, max: 1, seed });
  for (let i = 0; i < n; i++) {
    m.set(i, i, m.get(i, i) >= 0 ? m.get(i, i) + n : m.get(i, i) - n);
  }
  return m;
}

/**
 * Random square matrix whose last row repeats its first, so it is singular
 */
export function withDuplicateRow(n: number, seed: string): Matrix {
  const m = seededMatrix(n, n, seed);
  for (let j = 0; j < n; j++) {
    m.set(n - 1, j, m.get(0, j));
  }
  return m;
}

/**
 * Relative closeness used by the property suites
 */
export function relativelyClose(actual: number, expected: number, tolerance = 1e-9): boolean {
  return Math.abs(actual - expected) <= tolerance * Math.max(1, Math.abs(expected));
}
