#!/usr/bin/env tsx
/**
 * densemat - interactive dense matrix toolbox
 */

import { createSeedSequence, loadConfig } from './config';
import { runMenu } from './menu';
import { consoleOutput } from './output';
import { ReadlinePrompter } from './prompt';

async function main(): Promise<void> {
  const config = loadConfig();
  const prompter = new ReadlinePrompter();
  try {
    await runMenu({ prompter, output: consoleOutput, nextSeed: createSeedSequence(config.seed) });
  } finally {
    prompter.close();
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exitCode = 1;
});
