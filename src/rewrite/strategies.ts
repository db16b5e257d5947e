/**
 * History rewrite strategies
 *
 * Two interchangeable external tools rewrite identities across every
 * branch and tag:
 *
 * - git filter-repo (preferred): one pass with email/name callbacks doing
 *   byte-substring replacement; tags are updated as part of the pass.
 * - git filter-branch (fallback): an env-filter that replaces a field only
 *   when it equals the old value; backup refs are deleted afterwards.
 *
 * The two do NOT agree on fields that contain the old value inside a
 * longer string. Each strategy exposes its semantics and a pure model of
 * what it does to one identity so callers can preview the difference.
 */

import type { GitExecutor } from '../git/executor.js';
import { GitCommands } from '../git/executor.js';
import type { GitIdentity, RawGitOutput, GitResult } from '../git/types.js';
import { readBackupRefs } from '../git/repository.js';
import type {
  IdentityRewrite,
  Replacement,
  ReplacementSemantics,
  Reporter,
  RewriteResult,
  StrategyName,
} from './types.js';
import { failure, success } from './types.js';

// ============================================
// STRATEGY CONTRACT
// ============================================

export interface StrategyRunOptions {
  readonly cwd: string;
  readonly timeout: number;
  readonly reporter: Reporter;
}

export interface RewriteStrategy {
  readonly name: StrategyName;
  readonly semantics: ReplacementSemantics;

  /** Whether the underlying tool can be run */
  isAvailable(): Promise<boolean>;

  /** The exact git command the rewrite pass runs */
  buildCommand(rewrite: IdentityRewrite): readonly string[];

  /** What the pass does to a single author or committer identity */
  applyToIdentity(identity: GitIdentity, rewrite: IdentityRewrite): GitIdentity;

  /** Rewrite history in place; a non-zero tool exit is RewriteToolFailed */
  run(rewrite: IdentityRewrite, options: StrategyRunOptions): Promise<RewriteResult<void>>;
}

// ============================================
// QUOTING
// ============================================

/**
 * Python bytes literal for a string's UTF-8 encoding
 * Non-printable and non-ASCII bytes are written as \xNN escapes
 */
export function toPythonBytes(value: string): string {
  let literal = "b'";
  for (const byte of Buffer.from(value, 'utf-8')) {
    if (byte === 0x5c) {
      literal += '\\\\';
    } else if (byte === 0x27) {
      literal += "\\'";
    } else if (byte >= 0x20 && byte < 0x7f) {
      literal += String.fromCharCode(byte);
    } else {
      literal += `\\x${byte.toString(16).padStart(2, '0')}`;
    }
  }
  return `${literal}'`;
}

/**
 * POSIX shell single-quoted string
 */
export function toShellLiteral(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

// ============================================
// SHARED HELPERS
// ============================================

function substitute(value: string, replacement: Replacement | undefined, semantics: ReplacementSemantics): string {
  if (!replacement) {
    return value;
  }
  if (semantics === 'exact') {
    return value === replacement.from ? replacement.to : value;
  }
  return value.replaceAll(replacement.from, replacement.to);
}

function toolResult(
  tool: string,
  result: GitResult<RawGitOutput>
): RewriteResult<void> {
  if (!result.ok) {
    const details = result.error.stderr?.trim() ? [result.error.stderr.trim()] : undefined;
    return failure('RewriteToolFailed', `${tool} failed: ${result.error.message}`, details);
  }

  if (result.value.exitCode !== 0) {
    const output = (result.value.stderr || result.value.stdout).trim();
    return failure(
      'RewriteToolFailed',
      `${tool} exited with code ${result.value.exitCode}`,
      output ? output.split('\n') : undefined
    );
  }

  return success(undefined);
}

// ============================================
// FILTER-REPO
// ============================================

export class FilterRepoStrategy implements RewriteStrategy {
  readonly name = 'filter-repo';
  readonly semantics = 'substring';

  constructor(private readonly executor: GitExecutor) {}

  isAvailable(): Promise<boolean> {
    return this.executor.isToolAvailable('filter-repo');
  }

  buildCommand(rewrite: IdentityRewrite): readonly string[] {
    const args = ['filter-repo', '--force'];

    if (rewrite.email) {
      args.push(
        '--email-callback',
        `return email.replace(${toPythonBytes(rewrite.email.from)}, ${toPythonBytes(rewrite.email.to)})`
      );
    }

    if (rewrite.name) {
      args.push(
        '--name-callback',
        `return name.replace(${toPythonBytes(rewrite.name.from)}, ${toPythonBytes(rewrite.name.to)})`
      );
    }

    return args;
  }

  applyToIdentity(identity: GitIdentity, rewrite: IdentityRewrite): GitIdentity {
    return {
      name: substitute(identity.name, rewrite.name, this.semantics),
      email: substitute(identity.email, rewrite.email, this.semantics),
    };
  }

  async run(rewrite: IdentityRewrite, options: StrategyRunOptions): Promise<RewriteResult<void>> {
    const args = this.buildCommand(rewrite);
    options.reporter.info('Using git filter-repo (recommended method)...');
    options.reporter.command(args);

    const result = await this.executor.mutate(args, { cwd: options.cwd, timeout: options.timeout });
    const outcome = toolResult('git filter-repo', result);
    if (outcome.ok) {
      options.reporter.info('git filter-repo automatically updated tags to point to new commits.');
    }
    return outcome;
  }
}

// ============================================
// FILTER-BRANCH
// ============================================

/**
 * Environment variables filter-branch exposes for each identity field
 */
const ENV_FIELDS = {
  email: ['GIT_COMMITTER_EMAIL', 'GIT_AUTHOR_EMAIL'],
  name: ['GIT_COMMITTER_NAME', 'GIT_AUTHOR_NAME'],
} as const;

export class FilterBranchStrategy implements RewriteStrategy {
  readonly name = 'filter-branch';
  readonly semantics = 'exact';

  constructor(private readonly executor: GitExecutor) {}

  /**
   * filter-branch ships with git itself
   */
  isAvailable(): Promise<boolean> {
    return this.executor.isGitAvailable();
  }

  /**
   * Shell snippet run for every commit by --env-filter
   */
  buildEnvFilter(rewrite: IdentityRewrite): string {
    const blocks: string[] = [];

    for (const key of ['email', 'name'] as const) {
      const replacement = rewrite[key];
      if (!replacement) continue;

      for (const variable of ENV_FIELDS[key]) {
        blocks.push(
          [
            `if [ "$${variable}" = ${toShellLiteral(replacement.from)} ]; then`,
            `    ${variable}=${toShellLiteral(replacement.to)}`,
            `    export ${variable}`,
            'fi',
          ].join('\n')
        );
      }
    }

    return blocks.join('\n');
  }

  buildCommand(rewrite: IdentityRewrite): readonly string[] {
    return [
      'filter-branch',
      '-f',
      '--env-filter',
      this.buildEnvFilter(rewrite),
      '--tag-name-filter',
      'cat',
      '--',
      '--branches',
      '--tags',
    ];
  }

  applyToIdentity(identity: GitIdentity, rewrite: IdentityRewrite): GitIdentity {
    return {
      name: substitute(identity.name, rewrite.name, this.semantics),
      email: substitute(identity.email, rewrite.email, this.semantics),
    };
  }

  async run(rewrite: IdentityRewrite, options: StrategyRunOptions): Promise<RewriteResult<void>> {
    const args = this.buildCommand(rewrite);
    options.reporter.info('Using git filter-branch (git filter-repo not found)...');
    options.reporter.command(args);

    const result = await this.executor.mutate(args, {
      cwd: options.cwd,
      timeout: options.timeout,
      // Skip the deprecation notice and its 10 second pause
      env: { FILTER_BRANCH_SQUELCH_WARNING: '1' },
    });

    const outcome = toolResult('git filter-branch', result);
    if (!outcome.ok) {
      return outcome;
    }

    // Backup refs keep the old history reachable
    const backups = await readBackupRefs(this.executor, { cwd: options.cwd });
    if (!backups.ok) {
      return failure('RewriteToolFailed', `Could not list filter-branch backup refs: ${backups.error.message}`);
    }

    for (const ref of backups.value) {
      const deleted = await this.executor.mutate(GitCommands.deleteRef(ref), { cwd: options.cwd });
      const deleteOutcome = toolResult(`git update-ref -d ${ref}`, deleted);
      if (!deleteOutcome.ok) {
        return deleteOutcome;
      }
    }

    options.reporter.info('git filter-branch updated tags to point to new commits.');
    return success(undefined);
  }
}

// ============================================
// SELECTION
// ============================================

/**
 * Strategies in order of preference
 */
export function createStrategies(executor: GitExecutor): RewriteStrategy[] {
  return [new FilterRepoStrategy(executor), new FilterBranchStrategy(executor)];
}

/**
 * Pick the first available strategy, or the named one if forced
 */
export async function selectStrategy(
  strategies: readonly RewriteStrategy[],
  preferred?: StrategyName
): Promise<RewriteResult<RewriteStrategy>> {
  if (preferred) {
    const strategy = strategies.find((s) => s.name === preferred);
    if (!strategy || !(await strategy.isAvailable())) {
      return failure('RewriteToolFailed', `git ${preferred} is not available`);
    }
    return success(strategy);
  }

  for (const strategy of strategies) {
    if (await strategy.isAvailable()) {
      return success(strategy);
    }
  }

  return failure('RewriteToolFailed', 'Neither git filter-repo nor git filter-branch is available');
}
