/**
 * Interactive prompts
 *
 * A single readline interface serves the whole run. Lines are queued as
 * they arrive, so answers piped on stdin are not lost between questions,
 * and every question resolves to '' once stdin is closed.
 */

import * as readline from 'node:readline';
import type { Prompter, SelectOption } from '../rewrite/types.js';
import { palette } from './render.js';

export interface ConsolePrompter extends Prompter {
  close(): void;
}

export function createConsolePrompter(
  useColors: boolean,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): ConsolePrompter {
  const c = palette(useColors);
  const buffered: string[] = [];
  const waiting: Array<(line: string) => void> = [];
  let closed = false;
  let rl: readline.Interface | null = null;

  function open(): readline.Interface {
    if (rl) return rl;

    rl = readline.createInterface({ input, output, terminal: false });
    rl.on('line', (line) => {
      const next = waiting.shift();
      if (next) {
        next(line);
      } else {
        buffered.push(line);
      }
    });
    rl.on('close', () => {
      closed = true;
      for (const next of waiting.splice(0)) {
        next('');
      }
    });
    return rl;
  }

  function readLine(question: string): Promise<string> {
    open();
    output.write(`${question} `);

    const line = buffered.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (closed) return Promise.resolve('');

    return new Promise((resolve) => waiting.push(resolve));
  }

  return {
    ask(question) {
      return readLine(`${c.blue}${question}${c.reset}`);
    },

    async confirm(question, defaultValue = false) {
      const hint = defaultValue ? '(Y/n)' : '(y/N)';
      const answer = (await readLine(`${c.blue}${question} ${hint}${c.reset}`)).trim().toLowerCase();

      if (answer === '') {
        return defaultValue;
      }
      return answer === 'y' || answer === 'yes';
    },

    async select<T>(message: string, options: readonly SelectOption<T>[]): Promise<T | null> {
      output.write(`\n${c.bold}${message}${c.reset}\n`);
      options.forEach((option, index) => {
        output.write(`  ${c.cyan}${index + 1})${c.reset} ${option.label}\n`);
      });

      const answer = await readLine(`Enter your choice (${options.map((_, i) => i + 1).join('/')}):`);
      const num = parseInt(answer.trim(), 10);

      if (isNaN(num) || num < 1 || num > options.length) {
        return null;
      }
      return options[num - 1]?.value ?? null;
    },

    close() {
      rl?.close();
    },
  };
}

/**
 * Wrap a prompter so yes/no questions are answered "yes" without asking
 */
export function withAutoConfirm(prompter: Prompter): Prompter {
  return {
    ask: (question) => prompter.ask(question),
    confirm: async () => true,
    select: (message, options) => prompter.select(message, options),
  };
}
