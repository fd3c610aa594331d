/**
 * Matrix storage exports
 *
 * @module matrix
 */

export { Matrix, createMatrix, DEFAULT_TOLERANCE } from './matrix';
export { MAX_MATRIX_ELEMENTS, formatShape, isValidDimension } from './utils';
export type {
  MatrixShape,
  ShapeError,
  IsDynamic,
  ElementCount,
  TransposeShape,
  MatmulShape,
} from './types';
