/**
 * File persistence for the text format
 */

import { readFile, writeFile } from 'node:fs/promises';
import { MatrixIOError, fail, ok, type Matrix, type MatrixResult } from '@densemat/core';
import { formatMatrixText, parseMatrixText } from './text-format';

export async function saveMatrix(path: string, m: Matrix): Promise<MatrixResult<void>> {
  try {
    await writeFile(path, formatMatrixText(m), 'utf-8');
    return ok(undefined);
  } catch (error) {
    return fail(new MatrixIOError('write', path, error));
  }
}

export async function loadMatrix(path: string): Promise<MatrixResult<Matrix>> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    return fail(new MatrixIOError('read', path, error));
  }
  return parseMatrixText(text);
}
