/**
 * Linear algebra exports
 *
 * @module linalg
 */

export { determinant } from './determinant';
export { inverse, augmentWithIdentity } from './inverse';
export { EPSILON, rowReduce, selectPivotRow, swapRows } from './reduction';
export type { ReductionMode, ReductionOutcome } from './reduction';
