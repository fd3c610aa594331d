/**
 * Interactive matrix sources: manual entry, random generation and files
 *
 * Each reader resolves to null when the user runs out of input or the matrix
 * cannot be produced; failures are reported on the way out.
 */

import { Matrix, MatrixError } from '@densemat/core';
import { loadMatrix, randomMatrix } from '@densemat/io';
import { askChoice, askCount, askNumber, askPath, type Prompter } from './prompt';
import type { Output } from './output';

export interface CliContext {
  readonly prompter: Prompter;
  readonly output: Output;
  /** Seed for the next random matrix */
  readonly nextSeed: () => string | undefined;
}

export function reportError(output: Output, error: MatrixError): void {
  output.error(error.getFormattedMessage());
}

async function askShape(prompter: Prompter): Promise<readonly [number, number] | null> {
  const rows = await askCount(prompter, 'Number of rows: ');
  if (rows === null) {
    return null;
  }
  const cols = await askCount(prompter, 'Number of columns: ');
  return cols === null ? null : [rows, cols];
}

export async function readManualMatrix(ctx: CliContext): Promise<Matrix | null> {
  const shape = await askShape(ctx.prompter);
  if (!shape) {
    return null;
  }
  const created = Matrix.create(...shape);
  if (!created.success) {
    reportError(ctx.output, created.error);
    return null;
  }

  const m = created.value;
  ctx.output.log(`Enter the ${m.rows}x${m.cols} matrix element by element:`);
  for (let i = 0; i < m.rows; i++) {
    for (let j = 0; j < m.cols; j++) {
      const value = await askNumber(ctx.prompter, `A[${i}][${j}] = `, 'Invalid input. Try again: ');
      if (value === null) {
        return null;
      }
      m.set(i, j, value);
    }
  }
  return m;
}

export async function readRandomMatrix(ctx: CliContext): Promise<Matrix | null> {
  const shape = await askShape(ctx.prompter);
  if (!shape) {
    return null;
  }
  const min = await askNumber(ctx.prompter, 'Minimum random value: ');
  if (min === null) {
    return null;
  }
  const max = await askNumber(ctx.prompter, 'Maximum random value: ');
  if (max === null) {
    return null;
  }

  try {
    return randomMatrix(shape[0], shape[1], { min, max, seed: ctx.nextSeed() });
  } catch (error) {
    if (error instanceof MatrixError) {
      reportError(ctx.output, error);
      return null;
    }
    throw error;
  }
}

export async function readMatrixFile(ctx: CliContext): Promise<Matrix | null> {
  const path = await askPath(ctx.prompter, 'File to load: ');
  if (path === null) {
    return null;
  }
  const loaded = await loadMatrix(path);
  if (!loaded.success) {
    ctx.output.error(`Could not load a matrix from '${path}': ${loaded.error.message}`);
    return null;
  }
  return loaded.value;
}

/**
 * Ask how the second operand of a binary operation should be provided
 */
export async function readOperand(ctx: CliContext): Promise<Matrix | null> {
  ctx.output.log('Choose how to provide the second matrix:');
  ctx.output.log('1) Enter manually');
  ctx.output.log('2) Generate randomly');
  ctx.output.log('3) Load from file');

  switch (await askChoice(ctx.prompter, 'Choice: ')) {
    case 1:
      return readManualMatrix(ctx);
    case 2:
      return readRandomMatrix(ctx);
    case 3:
      return readMatrixFile(ctx);
    default:
      return null;
  }
}
