import { NotSquareError, SingularMatrixError } from '../errors';
import { Matrix } from '../matrix/matrix';
import { fail, ok, type MatrixResult } from '../result';
import { EPSILON, rowReduce } from './reduction';

/**
 * Build the n × 2n augmented matrix [A | I]
 */
export function augmentWithIdentity(a: Matrix): MatrixResult<Matrix> {
  const n = a.rows;
  const width = 2 * n;
  const created = Matrix.create(n, width);
  if (!created.success) {
    return created;
  }

  const aug = created.value;
  for (let i = 0; i < n; i++) {
    aug.data.set(a.data.subarray(i * n, (i + 1) * n), i * width);
    aug.data[i * width + n + i] = 1;
  }
  return ok(aug);
}

/**
 * Inverse by Gauss-Jordan elimination on [A | I]
 *
 * Fails with NotSquareError for non-square input and SingularMatrixError when
 * a pivot falls below EPSILON; no partial result is ever returned.
 *
 * @example
 * const inv = unwrap(inverse(Matrix.fromArray([[4, 3], [6, 3]])));
 * inv.toNestedArray(); // [[-0.5, 0.5], [1, -0.666...]]
 */
export function inverse<N extends number>(a: Matrix<N, N>): MatrixResult<Matrix<N, N>>;
export function inverse(a: Matrix): MatrixResult<Matrix> {
  if (!a.isSquare) {
    return fail(new NotSquareError('inverse', a.rows, a.cols));
  }

  const n = a.rows;
  const augmented = augmentWithIdentity(a);
  if (!augmented.success) {
    return augmented;
  }

  const aug = augmented.value;
  const outcome = rowReduce(aug, n, 'reduced');
  if (outcome.singular) {
    return fail(new SingularMatrixError(outcome.column, EPSILON));
  }

  const created = Matrix.create(n, n);
  if (!created.success) {
    return created;
  }
  const inv = created.value;
  for (let i = 0; i < n; i++) {
    inv.data.set(aug.data.subarray(i * 2 * n + n, (i + 1) * 2 * n), i * n);
  }
  return ok(inv);
}
