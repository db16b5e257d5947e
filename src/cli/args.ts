/**
 * Command-line and environment parsing
 *
 * Kept free of process globals so it can be tested directly; the entry
 * point passes in argv and env.
 */

import type { RewriteRequest, StrategyName } from '../rewrite/types.js';

export interface CliArgs {
  command: 'rewrite' | 'help' | 'version';
  path?: string;
  yes: boolean;
  dryRun: boolean;
  /** undefined: ask */
  push?: boolean;
  strategy?: StrategyName;
  /** Seconds allowed for fetch and push */
  timeoutSeconds?: number;
  gitPath?: string;
  noColor: boolean;
  oldEmail?: string;
  newEmail?: string;
  oldName?: string;
  newName?: string;
}

export class ArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ArgumentError';
  }
}

const STRATEGY_NAMES: readonly StrategyName[] = ['filter-repo', 'filter-branch'];

function isStrategyName(value: string): value is StrategyName {
  return STRATEGY_NAMES.some((name) => name === value);
}

/**
 * Parse argv (without the node and script entries)
 *
 * @throws ArgumentError on an unknown flag or a flag missing its value
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = {
    command: 'rewrite',
    yes: false,
    dryRun: false,
    noColor: false,
  };

  let i = 0;

  const value = (flag: string): string => {
    i++;
    const next = argv[i];
    if (next === undefined) {
      throw new ArgumentError(`${flag} requires a value`);
    }
    return next;
  };

  while (i < argv.length) {
    const arg = argv[i] ?? '';

    switch (arg) {
      case '-h':
      case '--help':
        args.command = 'help';
        return args;

      case '-v':
      case '--version':
        args.command = 'version';
        return args;

      case '-y':
      case '--yes':
        args.yes = true;
        break;

      case '--dry-run':
        args.dryRun = true;
        break;

      case '--push':
        args.push = true;
        break;

      case '--no-push':
        args.push = false;
        break;

      case '--no-color':
        args.noColor = true;
        break;

      case '--strategy': {
        const name = value(arg);
        if (!isStrategyName(name)) {
          throw new ArgumentError(`Unknown strategy '${name}' (expected ${STRATEGY_NAMES.join(' or ')})`);
        }
        args.strategy = name;
        break;
      }

      case '--timeout': {
        const raw = value(arg);
        const seconds = Number(raw);
        if (!Number.isFinite(seconds) || seconds <= 0) {
          throw new ArgumentError(`Invalid timeout '${raw}'`);
        }
        args.timeoutSeconds = seconds;
        break;
      }

      case '--git':
        args.gitPath = value(arg);
        break;

      case '--old-email':
        args.oldEmail = value(arg);
        break;

      case '--new-email':
        args.newEmail = value(arg);
        break;

      case '--old-name':
        args.oldName = value(arg);
        break;

      case '--new-name':
        args.newName = value(arg);
        break;

      default:
        if (arg.startsWith('-')) {
          throw new ArgumentError(`Unknown option '${arg}'`);
        }
        if (args.path !== undefined) {
          throw new ArgumentError(`Unexpected argument '${arg}'`);
        }
        args.path = arg;
        break;
    }

    i++;
  }

  return args;
}

/**
 * Build the request seed: identity flags first, then environment variables
 * (OLD_EMAIL, NEW_EMAIL, OLD_NAME, NEW_NAME). The repository path is the
 * other way round: REPO_PATH, then the positional path.
 */
export function toRequestSeed(args: CliArgs, env: NodeJS.ProcessEnv): RewriteRequest {
  const fromEnv = (name: string): string | undefined => {
    const value = env[name];
    return value === undefined || value === '' ? undefined : value;
  };
  const pick = (flag: string | undefined, name: string): string | undefined => flag ?? fromEnv(name);

  const seed: { -readonly [K in keyof RewriteRequest]: RewriteRequest[K] } = {};
  const repositoryPath = fromEnv('REPO_PATH') ?? args.path;
  const oldEmail = pick(args.oldEmail, 'OLD_EMAIL');
  const newEmail = pick(args.newEmail, 'NEW_EMAIL');
  const oldName = pick(args.oldName, 'OLD_NAME');
  const newName = pick(args.newName, 'NEW_NAME');

  if (repositoryPath !== undefined) seed.repositoryPath = repositoryPath;
  if (oldEmail !== undefined) seed.oldEmail = oldEmail;
  if (newEmail !== undefined) seed.newEmail = newEmail;
  if (oldName !== undefined) seed.oldName = oldName;
  if (newName !== undefined) seed.newName = newName;

  return seed;
}

/**
 * Colors only on a terminal, and never when NO_COLOR is set
 */
export function shouldUseColors(args: CliArgs, env: NodeJS.ProcessEnv, isTTY: boolean): boolean {
  return !args.noColor && isTTY && !env['NO_COLOR'];
}
