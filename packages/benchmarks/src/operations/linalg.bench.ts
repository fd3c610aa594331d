/**
 * Elimination benchmarks
 *
 * Determinant and inverse on diagonally dominant inputs of growing order.
 */

import { bench, describe } from 'vitest';
import { determinant, inverse } from '@densemat/core';
import { CUBIC_SIZES } from '../utils/sizes';
import { invertibleMatrix } from '../utils/data';

describe('determinant', () => {
  for (const size of CUBIC_SIZES) {
    const m = invertibleMatrix(size.order, `det-${size.name}`);

    bench(`determinant ${size.name} ${size.order}x${size.order}`, () => {
      determinant(m);
    });
  }
});

describe('inverse', () => {
  for (const size of CUBIC_SIZES) {
    const m = invertibleMatrix(size.order, `inv-${size.name}`);

    bench(`inverse ${size.name} ${size.order}x${size.order}`, () => {
      inverse(m);
    });
  }
});
