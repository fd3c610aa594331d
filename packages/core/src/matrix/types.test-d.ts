/**
 * Type-level tests for matrix shapes
 */

import type { ElementCount, MatmulShape, ShapeError, TransposeShape } from './types';
import { Matrix } from './matrix';
import { multiply, transpose } from '../operations/elementwise';
import { inverse } from '../linalg/inverse';
import { unwrap } from '../result';
import { expectTypeOf } from 'expect-type';

// =============================================================================
// Element counts
// =============================================================================

{
  expectTypeOf<ElementCount<3, 4>>().toEqualTypeOf<12>();
  expectTypeOf<ElementCount<0, 7>>().toEqualTypeOf<0>();
  expectTypeOf<ElementCount<number, 4>>().toEqualTypeOf<number>();
  expectTypeOf<ElementCount<2, number>>().toEqualTypeOf<number>();
}

// =============================================================================
// Shape arithmetic
// =============================================================================

{
  expectTypeOf<TransposeShape<readonly [2, 3]>>().toEqualTypeOf<readonly [3, 2]>();
  expectTypeOf<MatmulShape<readonly [2, 3], readonly [3, 4]>>().toEqualTypeOf<readonly [2, 4]>();
  expectTypeOf<MatmulShape<readonly [2, number], readonly [5, 4]>>().toEqualTypeOf<
    readonly [2, 4]
  >();

  type Bad = MatmulShape<readonly [2, 3], readonly [4, 5]>;
  expectTypeOf<Bad>().toMatchTypeOf<ShapeError<string>>();
  expectTypeOf<Bad['message']>().toEqualTypeOf<'Cannot multiply matrices with shapes 2x3 and 4x5: left column count (3) must match right row count (4)'>();
}

// =============================================================================
// Literal shapes flow through operations
// =============================================================================

{
  const a = Matrix.zeros(2, 3);
  const b = Matrix.zeros(3, 4);

  expectTypeOf(a).toEqualTypeOf<Matrix<2, 3>>();
  expectTypeOf(a.size).toEqualTypeOf<6>();
  expectTypeOf(transpose(a)).toEqualTypeOf<Matrix<3, 2>>();
  expectTypeOf(unwrap(multiply(a, b))).toEqualTypeOf<Matrix<2, 4>>();
  expectTypeOf(unwrap(inverse(Matrix.identity(5)))).toEqualTypeOf<Matrix<5, 5>>();

  const dynamic = Matrix.fromArray([[1, 2]]);
  expectTypeOf(dynamic).toEqualTypeOf<Matrix<number, number>>();
  expectTypeOf(dynamic.size).toEqualTypeOf<number>();
}
