/**
 * Row reduction with partial pivoting
 *
 * The single elimination routine behind both determinant and inverse, so the
 * two always agree on pivot selection and on what counts as singular.
 */

import type { Matrix } from '../matrix/matrix';

/**
 * Pivot magnitudes below this are treated as zero
 */
export const EPSILON = 1e-12;

/**
 * How far to reduce
 * - 'triangular': eliminate below each pivot only (row echelon form)
 * - 'reduced': normalise each pivot row and eliminate above and below it
 */
export type ReductionMode = 'triangular' | 'reduced';

export type ReductionOutcome =
  | {
      readonly singular: false;
      /** Product of the pivots in the order they were used */
      readonly pivotProduct: number;
      /** Number of row swaps performed */
      readonly swaps: number;
    }
  | {
      readonly singular: true;
      /** Column whose best pivot fell below EPSILON */
      readonly column: number;
    };

/**
 * Row with the largest magnitude in `column`, searching rows [column, rows)
 *
 * Ties keep the first (lowest) row.
 */
export function selectPivotRow(work: Matrix, column: number): number {
  const { rows, cols, data } = work;
  let pivot = column;
  let best = Math.abs(data[column * cols + column]!);
  for (let r = column + 1; r < rows; r++) {
    const magnitude = Math.abs(data[r * cols + column]!);
    if (magnitude > best) {
      best = magnitude;
      pivot = r;
    }
  }
  return pivot;
}

/**
 * Swap two whole rows in place
 */
export function swapRows(work: Matrix, a: number, b: number): void {
  const { cols, data } = work;
  const rowA = data.slice(a * cols, (a + 1) * cols);
  data.copyWithin(a * cols, b * cols, (b + 1) * cols);
  data.set(rowA, b * cols);
}

/**
 * Reduce the first `columns` columns of `work` in place
 *
 * `work` must have at least `columns` rows and columns; any further columns
 * (the right half of an augmented matrix) are carried along by every row
 * operation. Stops at the first column with no usable pivot, leaving `work`
 * partially reduced.
 */
export function rowReduce(work: Matrix, columns: number, mode: ReductionMode): ReductionOutcome {
  const { rows, cols, data } = work;
  let pivotProduct = 1;
  let swaps = 0;

  for (let i = 0; i < columns; i++) {
    const pivotRow = selectPivotRow(work, i);
    if (Math.abs(data[pivotRow * cols + i]!) < EPSILON) {
      return { singular: true, column: i };
    }

    if (pivotRow !== i) {
      swapRows(work, i, pivotRow);
      swaps++;
    }

    const pivotOffset = i * cols;
    const pivot = data[pivotOffset + i]!;
    pivotProduct *= pivot;

    if (mode === 'triangular') {
      for (let r = i + 1; r < rows; r++) {
        const rowOffset = r * cols;
        const factor = data[rowOffset + i]! / pivot;
        for (let c = i; c < cols; c++) {
          data[rowOffset + c] = data[rowOffset + c]! - factor * data[pivotOffset + c]!;
        }
      }
      continue;
    }

    for (let c = 0; c < cols; c++) {
      data[pivotOffset + c] = data[pivotOffset + c]! / pivot;
    }

    for (let r = 0; r < rows; r++) {
      if (r === i) continue;
      const rowOffset = r * cols;
      const factor = data[rowOffset + i]!;
      if (Math.abs(factor) < EPSILON) continue;
      for (let c = 0; c < cols; c++) {
        data[rowOffset + c] = data[rowOffset + c]! - factor * data[pivotOffset + c]!;
      }
    }
  }

  return { singular: false, pivotProduct, swaps };
}
