/**
 * Abstraction over the interactive terminal for dependency injection.
 * Allows testing the intake session with scripted answers.
 */

import { createInterface } from "readline";
import type { Interface } from "readline";
import type { Readable, Writable } from "stream";

export interface IntakePrompter {
  /**
   * Show `prompt` and wait for one line of input.
   * Resolves null once input has ended.
   */
  ask(prompt: string): Promise<string | null>;

  /** Write one line of output */
  print(line: string): void;

  /**
   * Clean up resources.
   */
  close?(): void;
}

/**
 * Line-oriented prompter over a readable/writable pair (stdin/stdout by
 * default). Lines are pulled from readline's async iterator, so piped
 * input works the same as a terminal.
 */
export class ReadlinePrompter implements IntakePrompter {
  private readonly rl: Interface;
  private readonly lines: AsyncIterator<string>;
  private readonly output: Writable;

  constructor(input: Readable = process.stdin, output: Writable = process.stdout) {
    this.output = output;
    this.rl = createInterface({ input, terminal: false });
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  async ask(prompt: string): Promise<string | null> {
    this.output.write(prompt);
    const next = await this.lines.next();
    return next.done ? null : next.value;
  }

  print(line: string): void {
    this.output.write(`${line}\n`);
  }

  close(): void {
    this.rl.close();
  }
}
