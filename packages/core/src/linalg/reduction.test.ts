import { describe, it, expect } from 'vitest';
import { EPSILON, rowReduce, selectPivotRow, swapRows } from './reduction';
import { Matrix } from '../matrix/matrix';

describe('selectPivotRow', () => {
  it('should pick the largest magnitude at or below the diagonal', () => {
    const m = Matrix.fromArray([
      [0, 9, 0],
      [0, 1, 0],
      [0, -2, 0],
    ]);
    expect(selectPivotRow(m, 1)).toBe(2);
  });

  it('should keep the first row on ties', () => {
    const m = Matrix.fromArray([
      [1, 0],
      [-3, 0],
      [3, 0],
    ]);
    expect(selectPivotRow(m, 0)).toBe(1);
  });
});

describe('swapRows', () => {
  it('should exchange whole rows', () => {
    const m = Matrix.fromArray([
      [1, 2, 3],
      [4, 5, 6],
    ]);
    swapRows(m, 0, 1);
    expect(m.toNestedArray()).toEqual([
      [4, 5, 6],
      [1, 2, 3],
    ]);
  });
});

describe('rowReduce', () => {
  it('should reach upper-triangular form in triangular mode', () => {
    const work = Matrix.fromArray([
      [2, 1],
      [4, 5],
    ]);
    const outcome = rowReduce(work, 2, 'triangular');
    // pivot 4 after one swap, then 1 - (2/4)*5 = -1.5
    expect(outcome).toEqual({ singular: false, pivotProduct: -6, swaps: 1 });
    expect(work.toNestedArray()).toEqual([
      [4, 5],
      [0, -1.5],
    ]);
  });

  it('should reach the identity in reduced mode', () => {
    const work = Matrix.fromArray([
      [2, 4],
      [1, 3],
    ]);
    const outcome = rowReduce(work, 2, 'reduced');
    expect(outcome).toEqual({ singular: false, pivotProduct: 2, swaps: 0 });
    expect(work.toNestedArray()).toEqual([
      [1, 0],
      [0, 1],
    ]);
  });

  it('should carry extra columns through every row operation', () => {
    const work = Matrix.fromArray([
      [0, 1, 1, 0],
      [1, 0, 0, 1],
    ]);
    rowReduce(work, 2, 'reduced');
    expect(work.toNestedArray()).toEqual([
      [1, 0, 0, 1],
      [0, 1, 1, 0],
    ]);
  });

  it('should report the first column without a usable pivot', () => {
    const work = Matrix.fromArray([
      [1, 2, 3],
      [2, 4, 6],
      [3, 6, 9],
    ]);
    expect(rowReduce(work, 3, 'triangular')).toEqual({ singular: true, column: 1 });
  });

  it('should share the same singularity threshold in both modes', () => {
    const tiny = EPSILON / 10;
    expect(rowReduce(Matrix.fromArray([[tiny]]), 1, 'triangular')).toEqual({
      singular: true,
      column: 0,
    });
    expect(rowReduce(Matrix.fromArray([[tiny]]), 1, 'reduced')).toEqual({
      singular: true,
      column: 0,
    });
    expect(rowReduce(Matrix.fromArray([[EPSILON]]), 1, 'reduced').singular).toBe(false);
  });

  it('should succeed trivially with no columns', () => {
    expect(rowReduce(Matrix.zeros(0, 0), 0, 'triangular')).toEqual({
      singular: false,
      pivotProduct: 1,
      swaps: 0,
    });
  });
});
