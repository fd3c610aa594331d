import { describe, it, expect } from 'vitest';
import { augmentWithIdentity, inverse } from './inverse';
import { Matrix } from '../matrix/matrix';
import { multiply } from '../operations/elementwise';
import { NotSquareError, SingularMatrixError } from '../errors';
import { unwrap } from '../result';

describe('augmentWithIdentity', () => {
  it('should place the identity to the right of the input', () => {
    const aug = unwrap(
      augmentWithIdentity(
        Matrix.fromArray([
          [1, 2],
          [3, 4],
        ]),
      ),
    );
    expect(aug.toNestedArray()).toEqual([
      [1, 2, 1, 0],
      [3, 4, 0, 1],
    ]);
  });
});

describe('inverse', () => {
  it('should invert a 2x2 matrix', () => {
    const inv = unwrap(
      inverse(
        Matrix.fromArray([
          [4, 3],
          [6, 3],
        ]),
      ),
    );
    expect(inv.shape).toEqual([2, 2]);
    expect(inv.get(0, 0)).toBeCloseTo(-0.5, 12);
    expect(inv.get(0, 1)).toBeCloseTo(0.5, 12);
    expect(inv.get(1, 0)).toBeCloseTo(1, 12);
    expect(inv.get(1, 1)).toBeCloseTo(-2 / 3, 12);
  });

  it('should invert a 3x3 matrix', () => {
    // inverse is [[3, 2, 1], [2, 4, 2], [1, 2, 3]] / 4
    const m = Matrix.fromArray([
      [2, -1, 0],
      [-1, 2, -1],
      [0, -1, 2],
    ]);
    const expected = Matrix.fromArray([
      [0.75, 0.5, 0.25],
      [0.5, 1, 0.5],
      [0.25, 0.5, 0.75],
    ]);
    expect(unwrap(inverse(m)).approxEquals(expected, 1e-12)).toBe(true);
  });

  it('should return the identity for the identity', () => {
    for (const n of [1, 3, 6]) {
      expect(unwrap(inverse(Matrix.identity(n))).equals(Matrix.identity(n))).toBe(true);
    }
  });

  it('should produce A·A⁻¹ = I', () => {
    const m = Matrix.fromArray([
      [3, 0, 2],
      [2, 0, -2],
      [0, 1, 1],
    ]);
    const product = unwrap(multiply(m, unwrap(inverse(m))));
    expect(product.approxEquals(Matrix.identity(3), 1e-12)).toBe(true);
  });

  it('should invert the empty matrix to the empty matrix', () => {
    const inv = unwrap(inverse(Matrix.zeros(0, 0)));
    expect(inv.shape).toEqual([0, 0]);
  });

  it('should fail with SingularMatrixError for proportional rows', () => {
    const result = inverse(
      Matrix.fromArray([
        [1, 2],
        [2, 4],
      ]),
    );
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBeInstanceOf(SingularMatrixError);
    expect(result.error.code).toBe('SINGULAR_MATRIX');
    expect(result.error.category).toBe('numeric');
    expect(result.error.context).toEqual({ column: 1, epsilon: 1e-12 });
  });

  it('should fail with SingularMatrixError for a zero matrix', () => {
    const result = inverse(Matrix.zeros(3, 3));
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe(
      'Matrix is singular: no pivot with magnitude >= 1e-12 in column 0',
    );
  });

  it('should fail with NotSquareError for non-square input', () => {
    const rectangular: Matrix = Matrix.zeros(3, 2);
    const result = inverse(rectangular);
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBeInstanceOf(NotSquareError);
    expect(result.error.message).toBe('inverse requires a square matrix, got 3x2');
  });

  it('should not modify its input', () => {
    const m = Matrix.fromArray([
      [4, 3],
      [6, 3],
    ]);
    unwrap(inverse(m));
    expect(m.toNestedArray()).toEqual([
      [4, 3],
      [6, 3],
    ]);
  });
});
