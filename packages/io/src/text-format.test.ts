import { describe, it, expect } from 'vitest';
import { Matrix, MatrixParseError, unwrap } from '@densemat/core';
import { formatMatrixText, parseMatrixText, parseNumberToken } from './text-format';
import { randomMatrix } from './random';

describe('formatMatrixText', () => {
  it('should write a header line and one line per row', () => {
    const m = Matrix.fromArray([
      [1, 2.5],
      [-3, 0.1],
    ]);
    expect(formatMatrixText(m)).toBe('2 2\n1 2.5\n-3 0.1\n');
  });

  it('should write only the header for an empty matrix', () => {
    expect(formatMatrixText(Matrix.zeros(0, 0))).toBe('0 0\n');
  });
});

describe('parseMatrixText', () => {
  it('should read rows and columns in row-major order', () => {
    const m = unwrap(parseMatrixText('2 3\n1 2 3\n4 5 6\n'));
    expect(m.toNestedArray()).toEqual([
      [1, 2, 3],
      [4, 5, 6],
    ]);
  });

  it('should not depend on line structure', () => {
    const m = unwrap(parseMatrixText('  2 3 1 2\n3 4\t5\r\n6'));
    expect(m.toNestedArray()).toEqual([
      [1, 2, 3],
      [4, 5, 6],
    ]);
  });

  it('should ignore tokens after the last value', () => {
    expect(unwrap(parseMatrixText('1 1\n5\n6 7')).toNestedArray()).toEqual([[5]]);
  });

  it('should accept infinities and NaN', () => {
    const m = unwrap(parseMatrixText('1 3\ninf -Infinity nan\n'));
    expect(m.get(0, 0)).toBe(Number.POSITIVE_INFINITY);
    expect(m.get(0, 1)).toBe(Number.NEGATIVE_INFINITY);
    expect(Number.isNaN(m.get(0, 2))).toBe(true);
  });

  it('should fail on a missing header', () => {
    for (const text of ['', '   \n', '3']) {
      const result = parseMatrixText(text);
      expect(result.success).toBe(false);
      if (result.success) continue;
      expect(result.error).toBeInstanceOf(MatrixParseError);
      expect(result.error.message).toBe('Cannot parse matrix: missing "rows cols" header');
    }
  });

  it('should fail on a malformed header', () => {
    const result = parseMatrixText('2 -1\n');
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe(
      "Cannot parse matrix: header must be two non-negative integers, got '2 -1'",
    );
  });

  it('should fail on short input', () => {
    const result = parseMatrixText('2 2\n1 2\n3\n');
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBeInstanceOf(MatrixParseError);
    expect(result.error.code).toBe('PARSE_FAILED');
    expect(result.error.message).toBe('Cannot parse matrix: expected 4 values, found 3');
    expect(result.error.context).toEqual({ expected: 4, found: 3 });
  });

  it('should fail on a non-numeric value', () => {
    const result = parseMatrixText('2 2\n1 x\n3 4\n');
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe("Cannot parse matrix: invalid number 'x' at row 1, column 2");
  });
});

describe('text round trip', () => {
  it('should reproduce values exactly', () => {
    const m = Matrix.fromArray([
      [1 / 3, Math.PI, -1e-300],
      [-1.7976931348623157e308, 123456789.12345679, 5e-324],
    ]);
    expect(unwrap(parseMatrixText(formatMatrixText(m))).equals(m)).toBe(true);
  });

  it('should keep the sign of negative zero', () => {
    const m = Matrix.fromArray([[-0, 1]]);
    const text = formatMatrixText(m);
    expect(text).toBe('1 2\n-0 1\n');
    expect(Object.is(unwrap(parseMatrixText(text)).get(0, 0), -0)).toBe(true);
  });

  it('should reproduce random matrices exactly', () => {
    for (const seed of ['one', 'two', 'three']) {
      const m = randomMatrix(4, 5, { min: -1000, max: 1000, seed });
      expect(unwrap(parseMatrixText(formatMatrixText(m))).equals(m)).toBe(true);
    }
  });
});

describe('parseNumberToken', () => {
  it('should accept decimal forms', () => {
    expect(parseNumberToken('1e3')).toBe(1000);
    expect(parseNumberToken('.5')).toBe(0.5);
    expect(parseNumberToken('5.')).toBe(5);
    expect(parseNumberToken('-2.5E-1')).toBe(-0.25);
    expect(parseNumberToken('+7')).toBe(7);
  });

  it('should reject anything else', () => {
    for (const token of ['', '0x10', '1,5', 'abc', '1e', '--1']) {
      expect(parseNumberToken(token)).toBeUndefined();
    }
  });
});
