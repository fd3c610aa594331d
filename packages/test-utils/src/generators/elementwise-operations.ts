/**
 * Property test generator for add/subtract, multiply and transpose
 */

import { Matrix, ShapeMismatchError, unwrap } from '@densemat/core';
import type { ElementwiseOperations, TestFramework } from '../types';
import { seededMatrix } from '../fixtures';

const SHAPES = [
  [1, 1],
  [2, 3],
  [4, 4],
  [7, 2],
] as const;

/**
 * Generates property tests for elementwise and product operations
 *
 * @param ops - Operations under test
 * @param testFramework - Test framework object with describe/it/expect functions
 */
export function generateElementwiseOperationTests(
  ops: ElementwiseOperations,
  testFramework: TestFramework,
): void {
  const { describe, it, expect } = testFramework;

  describe(`Elementwise operation properties (${ops.name})`, () => {
    it('should undo an addition with a subtraction', () => {
      for (const [rows, cols] of SHAPES) {
        const a = seededMatrix(rows, cols, `a-${rows}x${cols}`);
        const b = seededMatrix(rows, cols, `b-${rows}x${cols}`);
        const roundTrip = unwrap(ops.addSub(unwrap(ops.addSub(a, b, false)), b, true));
        expect(roundTrip.approxEquals(a, 1e-12)).toBe(true);
      }
    });

    it('should give zeros when subtracting a matrix from itself', () => {
      for (const [rows, cols] of SHAPES) {
        const a = seededMatrix(rows, cols, `self-${rows}x${cols}`);
        expect(unwrap(ops.addSub(a, a, true)).equals(Matrix.zeros(rows, cols))).toBe(true);
      }
    });

    it('should satisfy (A·B)ᵀ = Bᵀ·Aᵀ', () => {
      for (const [rows, cols] of SHAPES) {
        const a = seededMatrix(rows, cols, `left-${rows}x${cols}`);
        const b = seededMatrix(cols, rows, `right-${cols}x${rows}`);
        const lhs = ops.transpose(unwrap(ops.multiply(a, b)));
        const rhs = unwrap(ops.multiply(ops.transpose(b), ops.transpose(a)));
        expect(lhs.approxEquals(rhs, 1e-12)).toBe(true);
      }
    });

    it('should swap the shape on transpose', () => {
      for (const [rows, cols] of SHAPES) {
        const t = ops.transpose(Matrix.zeros(rows, cols));
        expect(t.shape).toEqual([cols, rows]);
      }
    });

    it('should reject incompatible shapes', () => {
      const a = Matrix.zeros(2, 3);
      const b = Matrix.zeros(3, 2);
      const sum = ops.addSub(a, b, false);
      const product = ops.multiply(a, a);
      expect(sum.success).toBe(false);
      expect(product.success).toBe(false);
      if (!sum.success) expect(sum.error).toBeInstanceOf(ShapeMismatchError);
      if (!product.success) expect(product.error).toBeInstanceOf(ShapeMismatchError);
    });
  });
}
