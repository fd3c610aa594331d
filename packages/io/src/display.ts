/**
 * Human-readable matrix formatting
 */

import type { Matrix } from '@densemat/core';

/**
 * `%.<precision>g`-style formatting
 *
 * Uses `precision` significant digits, drops trailing zeros, and switches to
 * exponent form when the decimal exponent is below -4 or at least `precision`.
 *
 * @example
 * formatG(2 / 3, 4) // '0.6667'
 * formatG(12345, 4) // '1.235e+04'
 * formatG(-6, 12) // '-6'
 */
export function formatG(value: number, precision: number): string {
  if (Number.isNaN(value)) {
    return 'nan';
  }
  if (!Number.isFinite(value)) {
    return value < 0 ? '-inf' : 'inf';
  }
  if (value === 0) {
    return Object.is(value, -0) ? '-0' : '0';
  }

  const p = Math.max(1, precision);
  const exponential = value.toExponential(p - 1);
  const [mantissa = '', exponentText = '0'] = exponential.split('e');
  const exponent = Number(exponentText);

  if (exponent < -4 || exponent >= p) {
    const sign = exponent < 0 ? '-' : '+';
    const digits = String(Math.abs(exponent)).padStart(2, '0');
    return `${stripTrailingZeros(mantissa)}e${sign}${digits}`;
  }
  return stripTrailingZeros(value.toFixed(p - 1 - exponent));
}

function stripTrailingZeros(text: string): string {
  if (!text.includes('.')) {
    return text;
  }
  return text.replace(/0+$/, '').replace(/\.$/, '');
}

/**
 * Multi-line display: a `Matrix RxC:` header, then each value as `%10.4g`
 * followed by a space
 */
export function formatMatrixDisplay(m: Matrix): string {
  const lines = [`Matrix ${m.rows}x${m.cols}:`];
  for (let i = 0; i < m.rows; i++) {
    lines.push(m.row(i).map((value) => `${formatG(value, 4).padStart(10)} `).join(''));
  }
  return lines.join('\n');
}
