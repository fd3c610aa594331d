/**
 * Plain-text matrix format
 *
 * ```
 * rows cols
 * v00 v01 ...
 * v10 v11 ...
 * ```
 *
 * Values are written in the shortest decimal form that reads back as the
 * same double. Reading treats all whitespace alike, so line breaks inside
 * the value block are not significant.
 */

import { Matrix, MatrixParseError, fail, ok, type MatrixResult } from '@densemat/core';

const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const SPECIAL = /^([+-]?)(inf|infinity|nan)$/i;
const COUNT = /^\d+$/;

/**
 * Parse one numeric token, or return undefined when it is not a number
 */
export function parseNumberToken(token: string): number | undefined {
  if (DECIMAL.test(token)) {
    return Number(token);
  }
  const special = SPECIAL.exec(token);
  if (!special) {
    return undefined;
  }
  if (special[2]?.toLowerCase() === 'nan') {
    return Number.NaN;
  }
  return special[1] === '-' ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
}

// String(-0) drops the sign
function formatValue(value: number): string {
  return Object.is(value, -0) ? '-0' : String(value);
}

/**
 * Serialize a matrix to the text format, ending with a newline
 */
export function formatMatrixText(m: Matrix): string {
  const lines = [`${m.rows} ${m.cols}`];
  for (let i = 0; i < m.rows; i++) {
    lines.push(m.row(i).map(formatValue).join(' '));
  }
  return `${lines.join('\n')}\n`;
}

/**
 * Parse the text format
 *
 * Fails with MatrixParseError when the header is missing or malformed, when
 * a value is not a number, or when fewer than rows*cols values follow.
 * Tokens after the last expected value are ignored.
 */
export function parseMatrixText(text: string): MatrixResult<Matrix> {
  const tokens = text.split(/\s+/).filter((token) => token.length > 0);
  const [rowsToken, colsToken] = tokens;

  if (rowsToken === undefined || colsToken === undefined) {
    return fail(new MatrixParseError('missing "rows cols" header'));
  }
  if (!COUNT.test(rowsToken) || !COUNT.test(colsToken)) {
    return fail(
      new MatrixParseError(`header must be two non-negative integers, got '${rowsToken} ${colsToken}'`),
    );
  }

  const created = Matrix.create(Number(rowsToken), Number(colsToken));
  if (!created.success) {
    return created;
  }

  const m = created.value;
  const expected = m.rows * m.cols;
  for (let k = 0; k < expected; k++) {
    const token = tokens[k + 2];
    if (token === undefined) {
      return fail(
        new MatrixParseError(`expected ${expected} values, found ${k}`, { expected, found: k }),
      );
    }
    const value = parseNumberToken(token);
    if (value === undefined) {
      const row = Math.floor(k / m.cols) + 1;
      const col = (k % m.cols) + 1;
      return fail(
        new MatrixParseError(`invalid number '${token}' at row ${row}, column ${col}`, { row, col }),
      );
    }
    m.data[k] = value;
  }

  return ok(m);
}
