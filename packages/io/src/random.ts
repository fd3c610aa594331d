/**
 * Random matrix generation
 */

import seedrandom from 'seedrandom';
import { Matrix } from '@densemat/core';

export interface RandomMatrixOptions {
  /** Lower bound (default 0) */
  readonly min?: number;
  /** Upper bound (default 1) */
  readonly max?: number;
  /** Fixes the sequence; omitted means auto-seeded */
  readonly seed?: string;
}

/**
 * Normalize a bound pair so that min <= max
 */
export function orderedRange(min: number, max: number): readonly [number, number] {
  return max < min ? [max, min] : [min, max];
}

/**
 * Matrix of uniform values in [min, max)
 *
 * Bounds given in reverse are swapped.
 *
 * @example
 * randomMatrix(3, 3, { min: -1, max: 1, seed: 'fixture' });
 */
export function randomMatrix(rows: number, cols: number, options: RandomMatrixOptions = {}): Matrix {
  const [min, max] = orderedRange(options.min ?? 0, options.max ?? 1);
  const rng = options.seed === undefined ? seedrandom() : seedrandom(options.seed);
  const m = Matrix.zeros(rows, cols);
  for (let k = 0; k < m.data.length; k++) {
    m.data[k] = min + (max - min) * rng();
  }
  return m;
}
