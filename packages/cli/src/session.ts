/**
 * Menu session state
 */

import type { Matrix } from '@densemat/core';

/**
 * What the menu is working on between actions
 *
 * Actions never mutate a session; they return the next one.
 */
export interface MatrixSession {
  readonly current: Matrix | null;
}

export function emptySession(): MatrixSession {
  return { current: null };
}

export function withCurrent(session: MatrixSession, current: Matrix | null): MatrixSession {
  return { ...session, current };
}
