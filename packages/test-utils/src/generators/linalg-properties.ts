/**
 * Property test generator for determinant and inverse
 *
 * Checks algebraic identities over seeded random matrices:
 * - det(Aᵀ) = det(A)
 * - A·A⁻¹ = A⁻¹·A = I for invertible A
 * - det(A·B) = det(A)·det(B)
 * - det(A⁻¹) = 1 / det(A)
 * - singular input: det 0, inverse fails with SingularMatrixError
 */

import { Matrix, SingularMatrixError, unwrap } from '@densemat/core';
import type { LinalgOperations, TestFramework } from '../types';
import { diagonallyDominant, relativelyClose, seededMatrix, withDuplicateRow } from '../fixtures';

const ORDERS = [1, 2, 3, 4, 6, 8] as const;
const SEEDS = ['alpha', 'beta', 'gamma'] as const;

/**
 * Generates property tests for a set of linear algebra operations
 *
 * @param ops - Operations under test
 * @param testFramework - Test framework object with describe/it/expect functions
 */
export function generateLinalgPropertyTests(ops: LinalgOperations, testFramework: TestFramework): void {
  const { describe, it, expect } = testFramework;

  describe(`Linear algebra properties (${ops.name})`, () => {
    describe('determinant', () => {
      it('should equal the determinant of the transpose', () => {
        for (const n of ORDERS) {
          for (const seed of SEEDS) {
            const a = seededMatrix(n, n, `${seed}-${n}`);
            const det = unwrap(ops.determinant(a));
            const detT = unwrap(ops.determinant(ops.transpose(a)));
            expect(relativelyClose(detT, det)).toBe(true);
          }
        }
      });

      it('should be multiplicative', () => {
        for (const n of ORDERS) {
          const a = diagonallyDominant(n, `left-${n}`);
          const b = diagonallyDominant(n, `right-${n}`);
          const product = unwrap(ops.determinant(unwrap(ops.multiply(a, b))));
          const separate = unwrap(ops.determinant(a)) * unwrap(ops.determinant(b));
          expect(relativelyClose(product, separate, 1e-8)).toBe(true);
        }
      });

      it('should be 1 for identity matrices', () => {
        for (const n of ORDERS) {
          expect(unwrap(ops.determinant(Matrix.identity(n)))).toBe(1);
        }
      });

      it('should be 0 for matrices with a repeated row', () => {
        for (const n of ORDERS.filter((order) => order > 1)) {
          expect(unwrap(ops.determinant(withDuplicateRow(n, `dup-${n}`)))).toBe(0);
        }
      });
    });

    describe('inverse', () => {
      it('should satisfy A·A⁻¹ = I and A⁻¹·A = I', () => {
        for (const n of ORDERS) {
          for (const seed of SEEDS) {
            const a = diagonallyDominant(n, `${seed}-${n}`);
            const inv = unwrap(ops.inverse(a));
            const identity = Matrix.identity(n);
            expect(unwrap(ops.multiply(a, inv)).approxEquals(identity)).toBe(true);
            expect(unwrap(ops.multiply(inv, a)).approxEquals(identity)).toBe(true);
          }
        }
      });

      it('should round-trip through a second inversion', () => {
        for (const n of ORDERS) {
          const a = diagonallyDominant(n, `twice-${n}`);
          expect(unwrap(ops.inverse(unwrap(ops.inverse(a)))).approxEquals(a)).toBe(true);
        }
      });

      it('should invert the determinant', () => {
        for (const n of ORDERS) {
          const a = diagonallyDominant(n, `recip-${n}`);
          const det = unwrap(ops.determinant(a));
          const detInv = unwrap(ops.determinant(unwrap(ops.inverse(a))));
          expect(relativelyClose(detInv, 1 / det)).toBe(true);
        }
      });

      it('should reject matrices with a repeated row', () => {
        for (const n of ORDERS.filter((order) => order > 1)) {
          const result = ops.inverse(withDuplicateRow(n, `dup-${n}`));
          expect(result.success).toBe(false);
          if (!result.success) {
            expect(result.error).toBeInstanceOf(SingularMatrixError);
          }
        }
      });
    });
  });
}
