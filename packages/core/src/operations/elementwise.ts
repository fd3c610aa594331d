/**
 * Elementwise and product operations
 *
 * Pure functions over matrices: inputs are never modified and every result
 * is a freshly allocated Matrix.
 */

import { ShapeMismatchError } from '../errors';
import { Matrix } from '../matrix/matrix';
import { fail, ok, type MatrixResult } from '../result';

/**
 * Add or subtract two matrices of identical shape
 *
 * @param subtract - compute a - b instead of a + b
 */
export function addSub<R extends number, C extends number>(
  a: Matrix<R, C>,
  b: Matrix<number, number>,
  subtract: boolean,
): MatrixResult<Matrix<R, C>> {
  if (!a.hasShape(b.shape)) {
    return fail(
      new ShapeMismatchError(
        subtract ? 'subtract' : 'add',
        a.shape,
        b.shape,
        'shapes must be identical',
      ),
    );
  }

  const result = Matrix.create(a.rows, a.cols);
  if (!result.success) {
    return result;
  }

  const out = result.value.data;
  const sign = subtract ? -1 : 1;
  for (let k = 0; k < out.length; k++) {
    out[k] = a.data[k]! + sign * b.data[k]!;
  }
  return result;
}

export function add<R extends number, C extends number>(
  a: Matrix<R, C>,
  b: Matrix<number, number>,
): MatrixResult<Matrix<R, C>> {
  return addSub(a, b, false);
}

export function subtract<R extends number, C extends number>(
  a: Matrix<R, C>,
  b: Matrix<number, number>,
): MatrixResult<Matrix<R, C>> {
  return addSub(a, b, true);
}

/**
 * Matrix product a·b
 *
 * The inner dimensions are checked at compile time when both are literal
 * types, and always at run time.
 *
 * @example
 * const c = unwrap(multiply(a, b)); // a: 2x3, b: 3x4 → c: 2x4
 */
export function multiply<R extends number, K extends number, C extends number>(
  a: Matrix<R, K>,
  b: Matrix<K, C>,
): MatrixResult<Matrix<R, C>> {
  const inner: number = a.cols;
  if (inner !== b.rows) {
    return fail(
      new ShapeMismatchError(
        'multiply',
        a.shape,
        b.shape,
        `left column count (${a.cols}) must match right row count (${b.rows})`,
      ),
    );
  }

  const result = Matrix.create(a.rows, b.cols);
  if (!result.success) {
    return result;
  }

  const out = result.value.data;
  const n = b.cols;
  // i-k-j order: each a[i][k] is scaled across a full row of b
  for (let i = 0; i < a.rows; i++) {
    for (let k = 0; k < inner; k++) {
      const aik = a.data[i * inner + k]!;
      const outRow = i * n;
      const bRow = k * n;
      for (let j = 0; j < n; j++) {
        out[outRow + j] = out[outRow + j]! + aik * b.data[bRow + j]!;
      }
    }
  }
  return result;
}

/**
 * Transpose: result[j][i] = a[i][j]
 */
export function transpose<R extends number, C extends number>(a: Matrix<R, C>): Matrix<C, R> {
  const t = Matrix.zeros(a.cols, a.rows);
  const rows = a.rows;
  const cols = a.cols;
  for (let i = 0; i < rows; i++) {
    for (let j = 0; j < cols; j++) {
      t.data[j * rows + i] = a.data[i * cols + j]!;
    }
  }
  return t;
}
