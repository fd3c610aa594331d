/**
 * Interactive menu over a single current matrix
 */

import {
  add,
  determinant,
  inverse,
  isOk,
  multiply,
  subtract,
  transpose,
  type Matrix,
  type MatrixResult,
} from '@densemat/core';
import { formatG, formatMatrixDisplay, saveMatrix } from '@densemat/io';
import { askChoice, askPath } from './prompt';
import {
  readManualMatrix,
  readMatrixFile,
  readOperand,
  readRandomMatrix,
  reportError,
  type CliContext,
} from './operands';
import { emptySession, withCurrent, type MatrixSession } from './session';

// =============================================================================
// Menu definition
// =============================================================================

export type MenuAction = (session: MatrixSession, ctx: CliContext) => Promise<MatrixSession>;

export interface MenuEntry {
  readonly key: number;
  readonly label: string;
  readonly run: MenuAction;
}

export const MENU_TITLE = '=== Matrix Toolbox ===';
export const EXIT_KEY = 0;

function showMatrix(ctx: CliContext, m: Matrix): void {
  ctx.output.log(formatMatrixDisplay(m));
}

function replaceWith(read: (ctx: CliContext) => Promise<Matrix | null>): MenuAction {
  return async (session, ctx) => {
    const m = await read(ctx);
    return m ? withCurrent(session, m) : session;
  };
}

function binary(
  title: string,
  operation: (a: Matrix, b: Matrix) => MatrixResult<Matrix>,
): MenuAction {
  return async (session, ctx) => {
    if (!session.current) {
      ctx.output.log('No current matrix.');
      return session;
    }
    const other = await readOperand(ctx);
    if (!other) {
      ctx.output.log('Operation cancelled.');
      return session;
    }
    const result = operation(session.current, other);
    if (!result.success) {
      reportError(ctx.output, result.error);
      return session;
    }
    ctx.output.log(`Result (${title}):`);
    showMatrix(ctx, result.value);
    return session;
  };
}

const show: MenuAction = async (session, ctx) => {
  if (session.current) {
    showMatrix(ctx, session.current);
  } else {
    ctx.output.log('There is no current matrix.');
  }
  return session;
};

const save: MenuAction = async (session, ctx) => {
  if (!session.current) {
    ctx.output.log('No matrix to save.');
    return session;
  }
  const path = await askPath(ctx.prompter, 'File to save to: ');
  if (path === null) {
    return session;
  }
  const saved = await saveMatrix(path, session.current);
  if (saved.success) {
    ctx.output.log(`Saved to '${path}'`);
  } else {
    ctx.output.error(`Could not save to '${path}': ${saved.error.message}`);
  }
  return session;
};

const transposeCurrent: MenuAction = async (session, ctx) => {
  if (!session.current) {
    ctx.output.log('No current matrix.');
    return session;
  }
  const t = transpose(session.current);
  ctx.output.log(`Transposed. The matrix is now ${t.rows}x${t.cols}`);
  return withCurrent(session, t);
};

const showDeterminant: MenuAction = async (session, ctx) => {
  if (!session.current) {
    ctx.output.log('No current matrix.');
    return session;
  }
  if (!session.current.isSquare) {
    ctx.output.log('Not a square matrix.');
    return session;
  }
  const det = determinant(session.current);
  if (isOk(det)) {
    ctx.output.log(`Determinant = ${formatG(det.value, 12)}`);
  } else {
    reportError(ctx.output, det.error);
  }
  return session;
};

const showInverse: MenuAction = async (session, ctx) => {
  if (!session.current) {
    ctx.output.log('No current matrix.');
    return session;
  }
  if (!session.current.isSquare) {
    ctx.output.log('Not a square matrix.');
    return session;
  }
  const inv = inverse(session.current);
  if (!inv.success) {
    ctx.output.log('The matrix is not invertible.');
    reportError(ctx.output, inv.error);
    return session;
  }
  ctx.output.log('Inverse matrix:');
  showMatrix(ctx, inv.value);
  return session;
};

const clear: MenuAction = async (session, ctx) => {
  if (session.current) {
    ctx.output.log('Matrix cleared.');
    return withCurrent(session, null);
  }
  ctx.output.log('There is no matrix to clear.');
  return session;
};

export const MENU: readonly MenuEntry[] = [
  { key: 1, label: 'Create a new matrix manually', run: replaceWith(readManualMatrix) },
  { key: 2, label: 'Create a new random matrix', run: replaceWith(readRandomMatrix) },
  { key: 3, label: 'Load a matrix from a file', run: replaceWith(readMatrixFile) },
  { key: 4, label: 'Show the current matrix', run: show },
  { key: 5, label: 'Save the current matrix to a file', run: save },
  { key: 6, label: 'Add another matrix', run: binary('addition', add) },
  { key: 7, label: 'Subtract another matrix', run: binary('subtraction', subtract) },
  { key: 8, label: 'Multiply by another matrix', run: binary('multiplication', multiply) },
  { key: 9, label: 'Transpose the current matrix', run: transposeCurrent },
  { key: 10, label: 'Determinant (square matrices)', run: showDeterminant },
  { key: 11, label: 'Inverse (square, non-singular matrices)', run: showInverse },
  { key: 12, label: 'Clear the current matrix', run: clear },
];

// =============================================================================
// Loop
// =============================================================================

export function menuLines(): string[] {
  return [
    '',
    MENU_TITLE,
    ...MENU.map((entry) => `${entry.key}) ${entry.label}`),
    `${EXIT_KEY}) Exit`,
  ];
}

/**
 * Run the menu until the user exits or input ends
 *
 * @returns The session as it stood when the loop stopped
 */
export async function runMenu(
  ctx: CliContext,
  initial: MatrixSession = emptySession(),
): Promise<MatrixSession> {
  let session = initial;
  for (;;) {
    for (const line of menuLines()) {
      ctx.output.log(line);
    }
    const choice = await askChoice(ctx.prompter, 'Choose an action: ');
    if (choice === null || choice === EXIT_KEY) {
      break;
    }
    const entry = MENU.find((candidate) => candidate.key === choice);
    if (!entry) {
      ctx.output.log('Unknown menu item.');
      continue;
    }
    session = await entry.run(session, ctx);
  }
  ctx.output.log('Goodbye!');
  return session;
}
