/**
 * Type-level matrix shapes
 *
 * A Matrix<R, C> carries its row and column counts as literal types when they
 * are known at compile time, and falls back to `number` otherwise. These
 * helpers compute result shapes and element counts from those literals.
 */

import type { Multiply } from 'ts-arithmetic';

/**
 * Row and column count pair
 */
export type MatrixShape = readonly [rows: number, cols: number];

/**
 * Error type produced by type-level shape checks
 */
export interface ShapeError<Message extends string, Context = unknown> {
  readonly __error: 'ShapeError';
  readonly message: Message;
  readonly context: Context;
}

/**
 * True when the type is the wide `number` rather than a literal
 */
export type IsDynamic<N extends number> = number extends N ? true : false;

/**
 * Number of elements in an R×C matrix
 *
 * @example
 * type Size = ElementCount<3, 4> // 12
 * type Unknown = ElementCount<number, 4> // number
 */
export type ElementCount<R extends number, C extends number> =
  IsDynamic<R> extends true
    ? number
    : IsDynamic<C> extends true
      ? number
      : R extends 0
        ? 0
        : C extends 0
          ? 0
          : Multiply<R, C>;

/**
 * Shape after transposition
 *
 * @example
 * type T = TransposeShape<readonly [2, 3]> // readonly [3, 2]
 */
export type TransposeShape<S extends MatrixShape> = readonly [S[1], S[0]];

/**
 * Shape of a matrix product, or a ShapeError when the inner dimensions differ
 *
 * Dynamic dimensions are assumed compatible; the runtime check decides.
 *
 * @example
 * type Ok = MatmulShape<readonly [2, 3], readonly [3, 4]> // readonly [2, 4]
 * type Bad = MatmulShape<readonly [2, 3], readonly [4, 5]> // ShapeError<...>
 */
export type MatmulShape<A extends MatrixShape, B extends MatrixShape> =
  IsDynamic<A[1]> extends true
    ? readonly [A[0], B[1]]
    : IsDynamic<B[0]> extends true
      ? readonly [A[0], B[1]]
      : A[1] extends B[0]
        ? readonly [A[0], B[1]]
        : ShapeError<
            `Cannot multiply matrices with shapes ${A[0]}x${A[1]} and ${B[0]}x${B[1]}: left column count (${A[1]}) must match right row count (${B[0]})`,
            { left: A; right: B }
          >;
