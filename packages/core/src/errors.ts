/**
 * Error types for matrix operations
 *
 * Every failure the toolbox can report is a MatrixError with a stable code,
 * a category and optional structured context. Fallible operations hand these
 * back inside a MatrixResult rather than throwing them.
 */

export type MatrixErrorCategory = 'allocation' | 'shape' | 'numeric' | 'bounds' | 'io';

/**
 * Base matrix error class with error categories and context
 */
export class MatrixError extends Error {
  public readonly code: string;
  public readonly category: MatrixErrorCategory;

  constructor(
    message: string,
    code: string,
    category: MatrixErrorCategory,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'MatrixError';
    this.code = code;
    this.category = category;
  }

  getFormattedMessage(): string {
    const lines = [`${this.name}: ${this.message}`];
    if (this.context && Object.keys(this.context).length > 0) {
      lines.push('Context:');
      for (const [key, value] of Object.entries(this.context)) {
        lines.push(`  ${key}: ${String(value)}`);
      }
    }
    return lines.join('\n');
  }
}

/**
 * Storage for a matrix could not be obtained
 */
export class AllocationError extends MatrixError {
  constructor(rows: number, cols: number, reason: string, context?: Record<string, unknown>) {
    super(`Allocation failed for ${rows}x${cols} matrix: ${reason}`, 'ALLOCATION_FAILED', 'allocation', {
      rows,
      cols,
      ...context,
    });
    this.name = 'AllocationError';
  }
}

/**
 * Dimensions or input data that cannot describe a matrix
 */
export class InvalidShapeError extends MatrixError {
  constructor(reason: string, context?: Record<string, unknown>) {
    super(`Invalid matrix shape: ${reason}`, 'INVALID_SHAPE', 'shape', context);
    this.name = 'InvalidShapeError';
  }
}

/**
 * Operand shapes incompatible for add, subtract or multiply
 */
export class ShapeMismatchError extends MatrixError {
  constructor(
    operation: string,
    left: readonly [number, number],
    right: readonly [number, number],
    requirement: string,
  ) {
    super(
      `Cannot ${operation} matrices with shapes ${left[0]}x${left[1]} and ${right[0]}x${right[1]}: ${requirement}`,
      'SHAPE_MISMATCH',
      'shape',
      { operation, left: left.join('x'), right: right.join('x') },
    );
    this.name = 'ShapeMismatchError';
  }
}

/**
 * Determinant or inverse requested on a non-square matrix
 */
export class NotSquareError extends MatrixError {
  constructor(operation: string, rows: number, cols: number) {
    super(`${operation} requires a square matrix, got ${rows}x${cols}`, 'NOT_SQUARE', 'shape', {
      operation,
      rows,
      cols,
    });
    this.name = 'NotSquareError';
  }
}

/**
 * Elimination met a pivot whose magnitude is below the singularity threshold
 */
export class SingularMatrixError extends MatrixError {
  constructor(
    public readonly column: number,
    epsilon: number,
  ) {
    super(
      `Matrix is singular: no pivot with magnitude >= ${epsilon} in column ${column}`,
      'SINGULAR_MATRIX',
      'numeric',
      { column, epsilon },
    );
    this.name = 'SingularMatrixError';
  }
}

/**
 * Element access outside the matrix
 */
export class IndexError extends MatrixError {
  constructor(row: number, col: number, rows: number, cols: number) {
    super(
      `Index (${row}, ${col}) is out of bounds for ${rows}x${cols} matrix`,
      'INDEX_OUT_OF_BOUNDS',
      'bounds',
      { row, col },
    );
    this.name = 'IndexError';
  }
}

/**
 * Text input that does not describe a matrix
 */
export class MatrixParseError extends MatrixError {
  constructor(reason: string, context?: Record<string, unknown>) {
    super(`Cannot parse matrix: ${reason}`, 'PARSE_FAILED', 'io', context);
    this.name = 'MatrixParseError';
  }
}

/**
 * File read or write failure
 */
export class MatrixIOError extends MatrixError {
  constructor(operation: 'read' | 'write', path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to ${operation} '${path}': ${reason}`, 'IO_FAILED', 'io', { path });
    this.name = 'MatrixIOError';
  }
}
