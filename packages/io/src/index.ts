/**
 * Text persistence, display and random generation for densemat matrices
 *
 * @module @densemat/io
 */

export { formatMatrixText, parseMatrixText, parseNumberToken } from './text-format';
export { saveMatrix, loadMatrix } from './files';
export { randomMatrix, orderedRange } from './random';
export type { RandomMatrixOptions } from './random';
export { formatG, formatMatrixDisplay } from './display';
