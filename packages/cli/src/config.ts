/**
 * Environment configuration for the menu
 */

export interface CliConfig {
  /** Seed for random matrices; unset means a fresh sequence every run */
  readonly seed?: string;
}

export const SEED_ENV_VAR = 'DENSEMAT_SEED';

export function loadConfig(env: Record<string, string | undefined> = process.env): CliConfig {
  const seed = env[SEED_ENV_VAR]?.trim();
  return seed ? { seed } : {};
}

/**
 * Per-call seeds derived from one base seed, so that two random matrices in
 * the same run differ while the run as a whole stays reproducible
 */
export function createSeedSequence(seed?: string): () => string | undefined {
  if (seed === undefined) {
    return () => undefined;
  }
  let counter = 0;
  return () => `${seed}-${counter++}`;
}
