import { NotSquareError } from '../errors';
import type { Matrix } from '../matrix/matrix';
import { fail, ok, type MatrixResult } from '../result';
import { rowReduce } from './reduction';

/**
 * Determinant by reduction to upper-triangular form with partial pivoting
 *
 * A numerically singular matrix (some pivot below EPSILON) has determinant 0;
 * that is a successful result, not an error. The empty 0x0 matrix has
 * determinant 1. The input is left untouched.
 *
 * @example
 * determinant(Matrix.fromArray([[4, 3], [6, 3]])) // { success: true, value: -6 }
 */
export function determinant(a: Matrix): MatrixResult<number> {
  if (!a.isSquare) {
    return fail(new NotSquareError('determinant', a.rows, a.cols));
  }

  const outcome = rowReduce(a.clone(), a.rows, 'triangular');
  if (outcome.singular) {
    return ok(0);
  }
  return ok(outcome.swaps % 2 === 0 ? outcome.pivotProduct : -outcome.pivotProduct);
}
