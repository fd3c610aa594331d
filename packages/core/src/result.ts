/**
 * Tagged results for fallible matrix operations
 *
 * A zero determinant and a failed computation must never look alike, so
 * operations that can fail return one of these instead of a sentinel value.
 */

import type { MatrixError } from './errors';

/**
 * Result of a matrix operation
 */
export type MatrixResult<T> =
  | {
      readonly success: true;
      readonly value: T;
    }
  | {
      readonly success: false;
      readonly error: MatrixError;
    };

export function ok<T>(value: T): MatrixResult<T> {
  return { success: true, value };
}

export function fail<T = never>(error: MatrixError): MatrixResult<T> {
  return { success: false, error };
}

export function isOk<T>(result: MatrixResult<T>): result is { readonly success: true; readonly value: T } {
  return result.success;
}

/**
 * Return the value of a successful result or throw the error it carries
 *
 * @example
 * const inv = unwrap(inverse(m)); // throws SingularMatrixError for singular m
 */
export function unwrap<T>(result: MatrixResult<T>): T {
  if (!result.success) {
    throw result.error;
  }
  return result.value;
}
