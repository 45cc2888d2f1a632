/**
 * Readline prompts for the interactive flows.
 *
 * One line reader serves every prompt, so piped input such as
 * `printf 'text\n.\ny\n' | letterbox wording` reaches each question in order.
 */

import * as readline from 'readline';
import type { Readable, Writable } from 'stream';
import chalk from 'chalk';
import { InputClosedError } from '../errors.js';

export interface Choice<T> {
  label: string;
  value: T;
}

export class Prompter {
  private rl: readline.Interface;
  private pending: string[] = [];
  private waiters: Array<(line: string | null) => void> = [];
  private closed = false;

  constructor(
    input: Readable,
    private readonly output: Writable
  ) {
    this.rl = readline.createInterface({ input, terminal: false });
    this.rl.on('line', (line) => {
      const waiter = this.waiters.shift();
      if (waiter) waiter(line);
      else this.pending.push(line);
    });
    this.rl.on('close', () => {
      this.closed = true;
      for (const waiter of this.waiters.splice(0)) waiter(null);
    });
  }

  private nextLine(): Promise<string | null> {
    const line = this.pending.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (this.closed) return Promise.resolve(null);
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  private print(text: string): void {
    this.output.write(`${text}\n`);
  }

  private async ask(question: string): Promise<string> {
    this.output.write(question);
    const line = await this.nextLine();
    if (line === null) throw new InputClosedError();
    return line.trim();
  }

  async input(prompt: string): Promise<string> {
    return this.ask(`  ${prompt} `);
  }

  async number(prompt: string, fallback: number): Promise<number> {
    for (;;) {
      const answer = await this.ask(`  ${prompt} ${chalk.dim(`[${fallback}]`)} `);
      if (!answer) return fallback;
      const value = Number(answer.replace(/[$,]/g, ''));
      if (Number.isFinite(value)) return value;
      this.print(chalk.yellow(`  ⚠ "${answer}" is not a number`));
    }
  }

  async confirm(prompt: string): Promise<boolean> {
    const answer = await this.ask(`  ${prompt} ${chalk.dim('[y/N]')} `);
    return /^y(es)?$/i.test(answer);
  }

  async choice<T>(prompt: string, choices: Array<Choice<T>>): Promise<T> {
    this.print(`  ${prompt}`);
    choices.forEach((c, i) => {
      this.print(chalk.dim(`    ${i + 1}. ${c.label}`));
    });

    for (;;) {
      const answer = await this.ask('  Select number: ');
      const idx = parseInt(answer, 10) - 1;
      if (idx >= 0 && idx < choices.length) {
        return choices[idx].value;
      }
      this.print(chalk.yellow(`  ⚠ Pick a number between 1 and ${choices.length}`));
    }
  }

  /**
   * Read lines until one containing only "." (or end of input).
   */
  async multiline(prompt: string): Promise<string> {
    this.print(`  ${prompt}`);
    this.print(chalk.dim('  Finish with a line containing only "."'));

    const lines: string[] = [];
    for (;;) {
      const line = await this.nextLine();
      if (line === null || line.trim() === '.') break;
      lines.push(line);
    }
    return lines.join('\n');
  }

  close(): void {
    this.rl.close();
  }
}

// Created on first use: an open reader on stdin keeps the process alive.
let stdinPrompter: Prompter | null = null;

function prompter(): Prompter {
  stdinPrompter ??= new Prompter(process.stdin, process.stdout);
  return stdinPrompter;
}

export function closePrompts(): void {
  stdinPrompter?.close();
  stdinPrompter = null;
}

export const promptInput = (prompt: string) => prompter().input(prompt);
export const promptNumber = (prompt: string, fallback: number) => prompter().number(prompt, fallback);
export const promptConfirm = (prompt: string) => prompter().confirm(prompt);
export const promptMultiline = (prompt: string) => prompter().multiline(prompt);

export function promptChoice<T>(prompt: string, choices: Array<Choice<T>>): Promise<T> {
  return prompter().choice(prompt, choices);
}
