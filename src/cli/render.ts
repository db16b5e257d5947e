/**
 * Terminal output for the rewrite workflow
 */

import type { Reporter } from '../rewrite/types.js';
import { toShellLiteral } from '../rewrite/strategies.js';

// ============================================
// ANSI COLOR CODES
// ============================================

export const COLORS = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
} as const;

export type Palette = { readonly [K in keyof typeof COLORS]: string };

const NO_COLORS: Palette = {
  reset: '',
  bold: '',
  dim: '',
  red: '',
  green: '',
  yellow: '',
  blue: '',
  cyan: '',
};

export function palette(useColors: boolean): Palette {
  return useColors ? COLORS : NO_COLORS;
}

// ============================================
// COMMAND FORMATTING
// ============================================

/**
 * Render git arguments as a command line a user could paste into a shell
 */
export function formatCommand(args: readonly string[]): string {
  const quoted = args.map((arg) => (/^[A-Za-z0-9_@%+=:,./-]+$/.test(arg) ? arg : toShellLiteral(arg)));
  return ['git', ...quoted].join(' ');
}

// ============================================
// CONSOLE REPORTER
// ============================================

/**
 * Reporter that writes to stdout, one line per call
 */
export function createConsoleReporter(
  useColors: boolean,
  write: (line: string) => void = (line) => console.log(line)
): Reporter {
  const c = palette(useColors);

  return {
    step(title) {
      write('');
      write(`${c.yellow}=== ${title} ===${c.reset}`);
    },
    info(message) {
      write(message);
    },
    detail(message) {
      write(`  ${message}`);
    },
    success(message) {
      write(`${c.green}✓ ${message}${c.reset}`);
    },
    warn(message) {
      write(`${c.yellow}Warning:${c.reset} ${message}`);
    },
    error(message) {
      write(`${c.red}${message}${c.reset}`);
    },
    command(args) {
      write(`Executing: ${c.dim}${formatCommand(args)}${c.reset}`);
    },
  };
}

/**
 * Opening banner
 */
export function renderBanner(useColors: boolean): string {
  const c = palette(useColors);
  return [
    `${c.bold}${c.yellow}reauthor - Git Commit Identity Rewrite${c.reset}`,
    'This will change the email address and/or name for all previous commits.',
    `${c.red}WARNING: This rewrites Git history and changes commit hashes!${c.reset}`,
  ].join('\n');
}
