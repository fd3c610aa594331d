/**
 * Line-oriented prompting
 *
 * Every helper resolves to null once input is exhausted, and re-asks instead
 * of failing when an answer does not parse.
 */

import { createInterface, type Interface } from 'node:readline/promises';
import { parseNumberToken } from '@densemat/io';

export interface Prompter {
  /** Show the question and resolve with the next line, or null at end of input */
  ask(question: string): Promise<string | null>;
}

const COUNT = /^\d+$/;
const INTEGER = /^[+-]?\d+$/;

/**
 * Prompter over a readable stream
 *
 * Lines are consumed through the interface's async iterator so that input
 * arriving ahead of a question (piped stdin) is buffered rather than dropped.
 */
export class ReadlinePrompter implements Prompter {
  private readonly rl: Interface;
  private readonly lines: AsyncIterator<string>;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout,
  ) {
    this.rl = createInterface({ input, terminal: false });
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  async ask(question: string): Promise<string | null> {
    this.output.write(question);
    const next = await this.lines.next();
    return next.done ? null : next.value;
  }

  close(): void {
    this.rl.close();
  }
}

async function askUntil<T>(
  prompter: Prompter,
  question: string,
  retry: string,
  parse: (answer: string) => T | undefined,
): Promise<T | null> {
  let prompt = question;
  for (;;) {
    const answer = await prompter.ask(prompt);
    if (answer === null) {
      return null;
    }
    const parsed = parse(answer.trim());
    if (parsed !== undefined) {
      return parsed;
    }
    prompt = retry;
  }
}

/**
 * Ask for a non-negative integer
 */
export function askCount(prompter: Prompter, question: string): Promise<number | null> {
  return askUntil(prompter, question, `Invalid input. ${question}`, (answer) =>
    COUNT.test(answer) ? Number(answer) : undefined,
  );
}

/**
 * Ask for a real number; accepts the same tokens as the text format
 */
export function askNumber(
  prompter: Prompter,
  question: string,
  retry = 'Invalid input. Enter a number: ',
): Promise<number | null> {
  return askUntil(prompter, question, retry, parseNumberToken);
}

/**
 * Ask for a non-empty path
 */
export function askPath(prompter: Prompter, question: string): Promise<string | null> {
  return askUntil(prompter, question, question, (answer) => (answer.length > 0 ? answer : undefined));
}

/**
 * Ask once for a menu choice; undefined when the answer is not an integer
 */
export async function askChoice(
  prompter: Prompter,
  question: string,
): Promise<number | null | undefined> {
  const answer = await prompter.ask(question);
  if (answer === null) {
    return null;
  }
  const trimmed = answer.trim();
  return INTEGER.test(trimmed) ? Number(trimmed) : undefined;
}
