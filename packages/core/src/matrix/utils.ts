/**
 * Internal utilities for matrix storage
 */

import { AllocationError, IndexError, InvalidShapeError } from '../errors';
import { fail, ok, type MatrixResult } from '../result';

/**
 * Largest element count a single matrix may hold
 */
export const MAX_MATRIX_ELEMENTS = 2 ** 31 - 1;

/**
 * Format a shape as `RxC`
 */
export function formatShape(rows: number, cols: number): string {
  return `${rows}x${cols}`;
}

/**
 * Check that a dimension is a non-negative integer
 */
export function isValidDimension(dim: number): boolean {
  return Number.isInteger(dim) && dim >= 0;
}

/**
 * Allocate zero-filled row-major storage for a rows×cols matrix
 */
export function allocateStorage(rows: number, cols: number): MatrixResult<Float64Array> {
  if (!isValidDimension(rows) || !isValidDimension(cols)) {
    return fail(
      new InvalidShapeError(`dimensions must be non-negative integers, got ${rows} and ${cols}`, {
        rows,
        cols,
      }),
    );
  }

  const length = rows * cols;
  if (length > MAX_MATRIX_ELEMENTS) {
    return fail(
      new AllocationError(rows, cols, `${length} elements exceeds the limit of ${MAX_MATRIX_ELEMENTS}`),
    );
  }

  try {
    return ok(new Float64Array(length));
  } catch (error) {
    if (error instanceof RangeError) {
      return fail(new AllocationError(rows, cols, error.message));
    }
    throw error;
  }
}

/**
 * Compute the flat offset of (row, col), throwing IndexError when outside the matrix
 */
export function checkedOffset(row: number, col: number, rows: number, cols: number): number {
  if (!Number.isInteger(row) || !Number.isInteger(col) || row < 0 || col < 0 || row >= rows || col >= cols) {
    throw new IndexError(row, col, rows, cols);
  }
  return row * cols + col;
}
