/**
 * Shared types for test generators
 */

import type { Matrix, MatrixResult } from '@densemat/core';

/**
 * The subset of a test framework the generators need
 *
 * Structural, so vitest, jest or node:test adapters can be passed in.
 */
export interface TestFramework {
  describe: (name: string, fn: () => void) => void;
  it: (name: string, fn: () => void | Promise<void>) => void;
  expect: (actual: unknown) => {
    toBe: (expected: unknown) => void;
    toEqual: (expected: unknown) => void;
    toBeCloseTo: (expected: number, precision?: number) => void;
    toBeInstanceOf: (constructor: abstract new (...args: never[]) => unknown) => void;
  };
}

/**
 * Linear algebra operations under test
 */
export interface LinalgOperations {
  readonly name: string;
  determinant(a: Matrix): MatrixResult<number>;
  inverse(a: Matrix): MatrixResult<Matrix>;
  multiply(a: Matrix, b: Matrix): MatrixResult<Matrix>;
  transpose(a: Matrix): Matrix;
}

/**
 * Elementwise operations under test
 */
export interface ElementwiseOperations {
  readonly name: string;
  addSub(a: Matrix, b: Matrix, subtract: boolean): MatrixResult<Matrix>;
  multiply(a: Matrix, b: Matrix): MatrixResult<Matrix>;
  transpose(a: Matrix): Matrix;
}
