import { describe, it, expect } from 'vitest';
import { NotSquareError } from './errors';
import { fail, isOk, ok, unwrap } from './result';

describe('MatrixResult helpers', () => {
  it('should tag successes and failures', () => {
    expect(ok(0)).toEqual({ success: true, value: 0 });
    const error = new NotSquareError('determinant', 2, 3);
    expect(fail(error)).toEqual({ success: false, error });
  });

  it('should narrow with isOk', () => {
    const good = ok(5);
    const bad = fail<number>(new NotSquareError('inverse', 1, 2));
    expect(isOk(good)).toBe(true);
    expect(isOk(bad)).toBe(false);
    if (isOk(good)) {
      expect(good.value).toBe(5);
    }
  });

  it('should unwrap a value or throw the carried error', () => {
    const error = new NotSquareError('inverse', 1, 2);
    expect(unwrap(ok('value'))).toBe('value');
    expect(() => unwrap(fail(error))).toThrow(error);
  });
});
