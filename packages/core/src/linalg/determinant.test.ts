import { describe, it, expect } from 'vitest';
import { determinant } from './determinant';
import { Matrix } from '../matrix/matrix';
import { NotSquareError } from '../errors';
import { unwrap } from '../result';

describe('determinant', () => {
  it('should compute a 2x2 determinant with a row swap', () => {
    // 4*3 - 3*6
    const det = unwrap(
      determinant(
        Matrix.fromArray([
          [4, 3],
          [6, 3],
        ]),
      ),
    );
    expect(det).toBeCloseTo(-6, 12);
  });

  it('should flip the sign for each row swap', () => {
    expect(
      unwrap(
        determinant(
          Matrix.fromArray([
            [0, 1],
            [1, 0],
          ]),
        ),
      ),
    ).toBe(-1);
  });

  it('should multiply the diagonal of a triangular matrix', () => {
    const upper = Matrix.fromArray([
      [2, 5, 1],
      [0, 3, 7],
      [0, 0, 4],
    ]);
    expect(unwrap(determinant(upper))).toBe(24);
  });

  it('should compute a 3x3 determinant', () => {
    const m = Matrix.fromArray([
      [2, -1, 0],
      [-1, 2, -1],
      [0, -1, 2],
    ]);
    expect(unwrap(determinant(m))).toBeCloseTo(4, 10);
  });

  it('should return 1 for identity matrices of any order', () => {
    for (const n of [1, 2, 5, 10]) {
      expect(unwrap(determinant(Matrix.identity(n)))).toBe(1);
    }
  });

  it('should return 1 for the empty matrix', () => {
    expect(unwrap(determinant(Matrix.zeros(0, 0)))).toBe(1);
  });

  it('should return the single element of a 1x1 matrix', () => {
    expect(unwrap(determinant(Matrix.fromArray([[-7]])))).toBe(-7);
  });

  it('should return 0 for a singular matrix as a successful result', () => {
    const result = determinant(
      Matrix.fromArray([
        [1, 2],
        [2, 4],
      ]),
    );
    expect(result).toEqual({ success: true, value: 0 });
  });

  it('should treat pivots below epsilon as zero', () => {
    expect(unwrap(determinant(Matrix.fromArray([[1e-13]])))).toBe(0);
    expect(unwrap(determinant(Matrix.fromArray([[1e-12]])))).toBe(1e-12);
  });

  it('should fail with NotSquareError for non-square input', () => {
    const result = determinant(Matrix.zeros(2, 3));
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBeInstanceOf(NotSquareError);
    expect(result.error.code).toBe('NOT_SQUARE');
    expect(result.error.message).toBe('determinant requires a square matrix, got 2x3');
  });

  it('should not modify its input', () => {
    const m = Matrix.fromArray([
      [4, 3],
      [6, 3],
    ]);
    determinant(m);
    expect(m.toNestedArray()).toEqual([
      [4, 3],
      [6, 3],
    ]);
  });
});
