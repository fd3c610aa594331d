/**
 * In-process stand-ins for the terminal
 */

import type { Output } from './output';
import type { Prompter } from './prompt';

/**
 * Prompter that replays a fixed list of answers, then reports end of input
 */
export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];
  private index = 0;

  constructor(private readonly answers: readonly string[]) {}

  async ask(question: string): Promise<string | null> {
    this.questions.push(question);
    const answer = this.answers[this.index];
    this.index++;
    return answer ?? null;
  }
}

export class RecordingOutput implements Output {
  readonly logs: string[] = [];
  readonly errors: string[] = [];

  log(line: string): void {
    this.logs.push(line);
  }

  error(line: string): void {
    this.errors.push(line);
  }
}
