/**
 * Safe Git command executor
 *
 * This module provides a sandboxed interface for executing Git commands.
 * Read-only commands and history-rewriting commands go through two
 * separate allowlists, so a caller can never mutate by accident.
 */

import { spawn } from 'node:child_process';
import type { ExecuteOptions, GitError, GitResult, RawGitOutput } from './types.js';
import { err, ok } from './types.js';

// ============================================
// COMMAND SAFETY
// ============================================

/**
 * Allowlist of read-only Git subcommands
 */
const SAFE_SUBCOMMANDS = new Set([
  // Repository inspection
  'rev-parse',
  'rev-list',
  'status',

  // History and refs
  'log',
  'for-each-ref',
  'tag',

  // Remote inspection (read-only)
  'remote',
]);

/**
 * Allowlist of Git subcommands that modify the repository or a remote
 */
const MUTATING_SUBCOMMANDS = new Set([
  'filter-repo',
  'filter-branch',
  'fetch',
  'push',
  'remote',
  'update-ref',
]);

/**
 * Flags that make otherwise safe commands dangerous
 */
const DANGEROUS_FLAGS = new Set([
  '--delete',
  '-d',
  '-D',
  '--force',
  '-f',
  '--move',
  '-m',
  '-M',
  '--set-upstream',
  '-u',
]);

/**
 * Validate that a read-only command is safe to execute
 * Throws if command is not allowlisted
 */
function validateCommand(args: readonly string[]): void {
  if (args.length === 0) {
    throw new GitExecutorError('unsafe_command', 'Empty command');
  }

  const subcommand = args[0];
  if (!subcommand || !SAFE_SUBCOMMANDS.has(subcommand)) {
    throw new GitExecutorError(
      'unsafe_command',
      `Git subcommand not allowlisted: ${subcommand}`,
      { args }
    );
  }

  // Check for dangerous flags
  for (const arg of args) {
    if (DANGEROUS_FLAGS.has(arg)) {
      throw new GitExecutorError(
        'unsafe_command',
        `Dangerous flag not allowed: ${arg}`,
        { args }
      );
    }
  }

  // Special case: 'remote' is only safe without add/remove/set-url
  if (subcommand === 'remote') {
    const unsafeRemoteOps = ['add', 'remove', 'rm', 'rename', 'set-url', 'set-head', 'set-branches', 'prune'];
    if (args.some((a) => unsafeRemoteOps.includes(a))) {
      throw new GitExecutorError(
        'unsafe_command',
        'git remote modification operations are not allowed',
        { args }
      );
    }
  }

  // Special case: 'tag' is only safe for listing
  if (subcommand === 'tag' && !args.includes('-l') && !args.includes('--list')) {
    throw new GitExecutorError('unsafe_command', 'git tag is only allowed with --list', { args });
  }
}

/**
 * Validate that a mutating command is one the rewrite workflow is allowed to run
 * Throws if command is not allowlisted
 */
function validateMutation(args: readonly string[]): void {
  if (args.length === 0) {
    throw new GitExecutorError('unsafe_command', 'Empty command');
  }

  const subcommand = args[0];
  if (!subcommand || !MUTATING_SUBCOMMANDS.has(subcommand)) {
    throw new GitExecutorError(
      'unsafe_command',
      `Git mutation not allowlisted: ${subcommand}`,
      { args }
    );
  }

  // Pushes may only overwrite remote history with a lease
  if (subcommand === 'push' && args.some((a) => a === '--force' || a === '-f' || a.startsWith('+'))) {
    throw new GitExecutorError(
      'unsafe_command',
      'Plain force push is not allowed; use --force-with-lease',
      { args }
    );
  }

  if (subcommand === 'remote') {
    const op = args[1];
    if (op !== 'add') {
      throw new GitExecutorError(
        'unsafe_command',
        `git remote ${op ?? ''} is not allowed`.trimEnd(),
        { args }
      );
    }
  }

  if (subcommand === 'update-ref' && args[1] !== '-d') {
    throw new GitExecutorError(
      'unsafe_command',
      'git update-ref is only allowed for deleting refs',
      { args }
    );
  }
}

// ============================================
// ERROR HANDLING
// ============================================

/**
 * Custom error class for Git executor errors
 */
export class GitExecutorError extends Error {
  readonly type: GitError['type'];
  readonly command?: string;
  readonly args?: readonly string[];
  readonly stderr?: string;
  readonly exitCode?: number;

  constructor(
    type: GitError['type'],
    message: string,
    details?: {
      command?: string;
      args?: readonly string[];
      stderr?: string;
      exitCode?: number;
    }
  ) {
    super(message);
    this.name = 'GitExecutorError';
    this.type = type;
    this.command = details?.command;
    this.args = details?.args;
    this.stderr = details?.stderr;
    this.exitCode = details?.exitCode;
  }

  toGitError(): GitError {
    return {
      type: this.type,
      message: this.message,
      command: this.command,
      args: this.args,
      stderr: this.stderr,
      exitCode: this.exitCode,
    };
  }
}

// ============================================
// EXECUTOR IMPLEMENTATION
// ============================================

/**
 * Default timeout for git commands (30 seconds)
 */
const DEFAULT_TIMEOUT_MS = 30_000;

/**
 * Maximum output size to prevent memory issues (50MB)
 */
const MAX_OUTPUT_SIZE = 50 * 1024 * 1024;

/**
 * Interface for the Git executor
 */
export interface GitExecutor {
  /**
   * Execute a git command and return raw output
   * Only safe, read-only commands are allowed
   */
  execute(args: readonly string[], options: ExecuteOptions): Promise<GitResult<RawGitOutput>>;

  /**
   * Execute an allowlisted mutating command (history rewrite, fetch, push, remote add)
   */
  mutate(args: readonly string[], options: ExecuteOptions): Promise<GitResult<RawGitOutput>>;

  /**
   * Check if git is available on the system
   */
  isGitAvailable(): Promise<boolean>;

  /**
   * Check if an external git subcommand (e.g. filter-repo) is installed
   */
  isToolAvailable(subcommand: string): Promise<boolean>;
}

/**
 * Create a new GitExecutor instance
 */
export function createGitExecutor(gitPath: string = 'git'): GitExecutor {
  return new GitExecutorImpl(gitPath);
}

class GitExecutorImpl implements GitExecutor {
  private readonly gitPath: string;
  private gitAvailable: boolean | null = null;

  constructor(gitPath: string) {
    this.gitPath = gitPath;
  }

  async execute(args: readonly string[], options: ExecuteOptions): Promise<GitResult<RawGitOutput>> {
    try {
      validateCommand(args);
    } catch (e) {
      if (e instanceof GitExecutorError) {
        return err(e.toGitError());
      }
      throw e;
    }

    return this.run(args, options);
  }

  async mutate(args: readonly string[], options: ExecuteOptions): Promise<GitResult<RawGitOutput>> {
    try {
      validateMutation(args);
    } catch (e) {
      if (e instanceof GitExecutorError) {
        return err(e.toGitError());
      }
      throw e;
    }

    return this.run(args, options);
  }

  private async run(args: readonly string[], options: ExecuteOptions): Promise<GitResult<RawGitOutput>> {
    // Check git availability on first call
    if (this.gitAvailable === null) {
      this.gitAvailable = await this.isGitAvailable();
    }

    if (!this.gitAvailable) {
      return err({
        type: 'git_not_found',
        message: `Git executable not found: ${this.gitPath}`,
      });
    }

    const timeout = options.timeout ?? DEFAULT_TIMEOUT_MS;
    const startTime = Date.now();

    return new Promise((resolve) => {
      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];
      let stdoutSize = 0;
      let stderrSize = 0;
      let killed = false;
      let forceKillId: NodeJS.Timeout | undefined;

      const child = spawn(this.gitPath, [...args], {
        cwd: options.cwd,
        stdio: ['ignore', 'pipe', 'pipe'],
        // Don't inherit environment to avoid leaking sensitive data
        env: {
          PATH: process.env['PATH'],
          HOME: process.env['HOME'],
          // Pushes over ssh need the agent
          SSH_AUTH_SOCK: process.env['SSH_AUTH_SOCK'],
          // Disable git prompts
          GIT_TERMINAL_PROMPT: '0',
          // Use English for consistent output parsing
          LANG: 'C',
          LC_ALL: 'C',
          ...options.env,
        },
      });

      const terminate = (): void => {
        killed = true;
        child.kill('SIGTERM');
        // Force kill after 5 seconds if SIGTERM doesn't work
        forceKillId = setTimeout(() => child.kill('SIGKILL'), 5000);
      };

      const timeoutId = setTimeout(terminate, timeout);

      child.stdout.on('data', (chunk: Buffer) => {
        stdoutSize += chunk.length;
        if (stdoutSize <= MAX_OUTPUT_SIZE) {
          stdoutChunks.push(chunk);
        } else if (!killed) {
          terminate();
        }
      });

      child.stderr.on('data', (chunk: Buffer) => {
        stderrSize += chunk.length;
        if (stderrSize <= MAX_OUTPUT_SIZE) {
          stderrChunks.push(chunk);
        }
      });

      child.on('error', (error) => {
        clearTimeout(timeoutId);
        clearTimeout(forceKillId);
        resolve(
          err({
            type: 'command_failed',
            message: `Failed to spawn git: ${error.message}`,
            command: this.gitPath,
            args,
          })
        );
      });

      child.on('close', (code, signal) => {
        clearTimeout(timeoutId);
        clearTimeout(forceKillId);
        const durationMs = Date.now() - startTime;

        const stdout = Buffer.concat(stdoutChunks).toString('utf-8');
        const stderr = Buffer.concat(stderrChunks).toString('utf-8');
        const exitCode = code ?? (signal ? 128 : 1);

        if (stdoutSize > MAX_OUTPUT_SIZE) {
          resolve(
            err({
              type: 'command_failed',
              message: `Git output exceeded maximum size (${MAX_OUTPUT_SIZE} bytes)`,
              command: this.gitPath,
              args,
            })
          );
          return;
        }

        if (killed && signal) {
          resolve(
            err({
              type: 'timeout',
              message: `Git command timed out after ${timeout}ms`,
              command: this.gitPath,
              args,
              stderr,
            })
          );
          return;
        }

        // Return raw output - let caller decide if exitCode !== 0 is an error
        resolve(
          ok({
            stdout,
            stderr,
            exitCode,
            command: this.gitPath,
            args,
            durationMs,
          })
        );
      });
    });
  }

  async isGitAvailable(): Promise<boolean> {
    return this.probe(['--version']);
  }

  async isToolAvailable(subcommand: string): Promise<boolean> {
    return this.probe([subcommand, '--version']);
  }

  private probe(args: readonly string[]): Promise<boolean> {
    return new Promise((resolve) => {
      const child = spawn(this.gitPath, [...args], {
        stdio: ['ignore', 'ignore', 'ignore'],
      });

      child.on('error', () => resolve(false));
      child.on('close', (code) => resolve(code === 0));
    });
  }
}

// ============================================
// PREDEFINED COMMAND BUILDERS
// ============================================

/**
 * Field separator used in formatted git output (NULL byte)
 */
export const FIELD_SEPARATOR = '\x00';

/**
 * Record separator used in formatted git output
 */
export const RECORD_SEPARATOR = '\x01';

/**
 * Common Git command configurations
 * These ensure consistent, well-formed commands
 */
export const GitCommands = {
  /**
   * Absolute path of the working tree root
   */
  topLevel(): readonly string[] {
    return ['rev-parse', '--show-toplevel'];
  },

  /**
   * Get current HEAD commit hash (fails on an unborn branch)
   */
  headCommit(): readonly string[] {
    return ['rev-parse', '--verify', '--quiet', 'HEAD'];
  },

  /**
   * Current branch name ("HEAD" when detached)
   */
  currentBranch(): readonly string[] {
    return ['rev-parse', '--abbrev-ref', 'HEAD'];
  },

  /**
   * Upstream of the current branch, e.g. "origin/main"
   */
  upstream(): readonly string[] {
    return ['rev-parse', '--abbrev-ref', '--symbolic-full-name', '@{u}'];
  },

  /**
   * Uncommitted changes to tracked files, one file per line
   */
  status(): readonly string[] {
    return ['status', '--porcelain', '--untracked-files=no'];
  },

  /**
   * Resolve a revision to an object id, printing nothing if it does not exist
   */
  resolve(revision: string): readonly string[] {
    return ['rev-parse', '--verify', '--quiet', revision];
  },

  /**
   * Identity fields of every commit reachable from any ref
   */
  identities(): readonly string[] {
    return [
      'log',
      '--all',
      `--format=%H%x00%an%x00%ae%x00%cn%x00%ce%x01`,
    ];
  },

  /**
   * All tags with the object they point at
   */
  tags(): readonly string[] {
    return ['tag', '--list', '--format=%(refname:short)%00%(objectname)%00%(objecttype)'];
  },

  /**
   * Configured remotes with fetch and push URLs
   */
  remotes(): readonly string[] {
    return ['remote', '-v'];
  },

  /**
   * Number of commits in a revision range
   */
  countCommits(range: string = 'HEAD'): readonly string[] {
    return ['rev-list', '--count', range];
  },

  /**
   * Refs left behind by filter-branch
   */
  backupRefs(): readonly string[] {
    return ['for-each-ref', '--format=%(refname)', 'refs/original/'];
  },

  fetch(remote: string): readonly string[] {
    return ['fetch', remote];
  },

  deleteRef(ref: string): readonly string[] {
    return ['update-ref', '-d', ref];
  },

  addRemote(name: string, url: string): readonly string[] {
    return ['remote', 'add', name, url];
  },

  /**
   * Force push that only succeeds if the remote branch is still where we last saw it
   *
   * Also records the upstream again, since filter-repo drops the branch's
   * tracking configuration along with its remotes.
   *
   * @param expected - Remote branch id observed before the rewrite; without it
   *   git compares against the remote-tracking ref
   */
  pushWithLease(remote: string, localBranch: string, remoteBranch: string, expected?: string): readonly string[] {
    const lease = expected ? `--force-with-lease=${remoteBranch}:${expected}` : '--force-with-lease';
    return ['push', '--set-upstream', lease, remote, `${localBranch}:${remoteBranch}`];
  },

  pushTagsWithLease(remote: string): readonly string[] {
    return ['push', '--force-with-lease', remote, '--tags'];
  },

  pushSetUpstream(remote: string, branch: string): readonly string[] {
    return ['push', '--set-upstream', remote, branch];
  },
} as const;
