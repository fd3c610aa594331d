/**
 * Shared test generators and fixtures
 *
 * @module @densemat/test-utils
 */

export { generateLinalgPropertyTests } from './generators/linalg-properties';
export { generateElementwiseOperationTests } from './generators/elementwise-operations';
export { seededMatrix, diagonallyDominant, withDuplicateRow, relativelyClose } from './fixtures';
export type { TestFramework, LinalgOperations, ElementwiseOperations } from './types';
