/**
 * Dense row-major matrix storage
 *
 * A Matrix owns one contiguous Float64Array of rows*cols elements, with
 * element (i, j) at index i*cols + j. Shape is fixed for the lifetime of an
 * instance; anything that changes shape produces a new Matrix.
 */

import { IndexError, InvalidShapeError } from '../errors';
import { fail, ok, unwrap, type MatrixResult } from '../result';
import type { ElementCount, MatrixShape } from './types';
import { allocateStorage, checkedOffset, formatShape } from './utils';

/**
 * Default relative tolerance for approximate comparisons
 */
export const DEFAULT_TOLERANCE = 1e-9;

export class Matrix<R extends number = number, C extends number = number> {
  readonly rows: R;
  readonly cols: C;

  /**
   * Row-major element storage, exclusively owned by this instance
   */
  readonly data: Float64Array;

  private constructor(rows: R, cols: C, data: Float64Array) {
    this.rows = rows;
    this.cols = cols;
    this.data = data;
  }

  /**
   * Allocate a zero-filled rows×cols matrix
   *
   * Fails with InvalidShapeError for negative or fractional dimensions and
   * with AllocationError when the storage cannot be obtained.
   */
  static create<R extends number, C extends number>(rows: R, cols: C): MatrixResult<Matrix<R, C>> {
    const storage = allocateStorage(rows, cols);
    if (!storage.success) {
      return fail(storage.error);
    }
    return ok(new Matrix(rows, cols, storage.value));
  }

  /**
   * Throwing variant of {@link Matrix.create}
   */
  static zeros<R extends number, C extends number>(rows: R, cols: C): Matrix<R, C> {
    return unwrap(Matrix.create(rows, cols));
  }

  /**
   * Identity matrix of order n
   */
  static identity<N extends number>(n: N): Matrix<N, N> {
    const m = Matrix.zeros(n, n);
    for (let i = 0; i < n; i++) {
      m.data[i * n + i] = 1;
    }
    return m;
  }

  /**
   * Build a matrix from nested row arrays
   *
   * @example
   * const m = Matrix.fromArray([
   *   [1, 2],
   *   [3, 4],
   * ]);
   */
  static fromArray(values: readonly (readonly number[])[]): Matrix {
    const rows = values.length;
    const cols = values[0]?.length ?? 0;
    const m = Matrix.zeros(rows, cols);

    values.forEach((row, i) => {
      if (row.length !== cols) {
        throw new InvalidShapeError(`row ${i} has ${row.length} values, expected ${cols}`, {
          row: i,
        });
      }
      m.data.set(row, i * cols);
    });

    return m;
  }

  /**
   * Build a matrix from flat row-major values; the values are copied
   */
  static fromFlat<R extends number, C extends number>(
    rows: R,
    cols: C,
    values: ArrayLike<number>,
  ): Matrix<R, C> {
    const m = Matrix.zeros(rows, cols);
    if (values.length !== m.data.length) {
      throw new InvalidShapeError(
        `${formatShape(rows, cols)} matrix needs ${m.data.length} values, got ${values.length}`,
      );
    }
    m.data.set(values);
    return m;
  }

  get shape(): readonly [R, C] {
    return [this.rows, this.cols];
  }

  /**
   * Total number of elements
   */
  get size(): ElementCount<R, C> {
    return this.data.length as ElementCount<R, C>;
  }

  get isSquare(): boolean {
    const rows: number = this.rows;
    return rows === this.cols;
  }

  /**
   * Read element (i, j); throws IndexError outside the matrix
   */
  get(i: number, j: number): number {
    const value = this.data[checkedOffset(i, j, this.rows, this.cols)];
    if (value === undefined) {
      throw new InvalidShapeError(`storage shorter than ${formatShape(this.rows, this.cols)}`);
    }
    return value;
  }

  /**
   * Write element (i, j); throws IndexError outside the matrix
   */
  set(i: number, j: number, value: number): void {
    this.data[checkedOffset(i, j, this.rows, this.cols)] = value;
  }

  /**
   * Copy of row i
   */
  row(i: number): number[] {
    if (!Number.isInteger(i) || i < 0 || i >= this.rows) {
      throw new IndexError(i, 0, this.rows, this.cols);
    }
    return Array.from(this.data.subarray(i * this.cols, (i + 1) * this.cols));
  }

  /**
   * Deep copy with independent storage
   */
  clone(): Matrix<R, C> {
    return new Matrix(this.rows, this.cols, this.data.slice());
  }

  /**
   * Row-major copy of the values
   */
  toArray(): number[] {
    return Array.from(this.data);
  }

  toNestedArray(): number[][] {
    return Array.from({ length: this.rows }, (_, i) =>
      Array.from(this.data.subarray(i * this.cols, (i + 1) * this.cols)),
    );
  }

  /**
   * Same shape and identical values (NaN matches NaN)
   */
  equals(other: Matrix): boolean {
    if (!this.hasShape(other.shape)) {
      return false;
    }
    return this.data.every((value, k) => {
      const otherValue = other.data[k];
      return value === otherValue || (Number.isNaN(value) && Number.isNaN(otherValue));
    });
  }

  /**
   * Same shape and every pair of elements within `tolerance`, relative to the
   * larger magnitude (absolute below 1)
   */
  approxEquals(other: Matrix, tolerance: number = DEFAULT_TOLERANCE): boolean {
    if (!this.hasShape(other.shape)) {
      return false;
    }
    return this.data.every((value, k) => {
      const otherValue = other.data[k] ?? Number.NaN;
      const scale = Math.max(1, Math.abs(value), Math.abs(otherValue));
      return Math.abs(value - otherValue) <= tolerance * scale;
    });
  }

  hasShape(shape: MatrixShape): boolean {
    return this.rows === shape[0] && this.cols === shape[1];
  }
}

/**
 * Allocate a zero-filled rows×cols matrix
 */
export function createMatrix<R extends number, C extends number>(
  rows: R,
  cols: C,
): MatrixResult<Matrix<R, C>> {
  return Matrix.create(rows, cols);
}
