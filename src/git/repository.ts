/**
 * Repository readers
 *
 * High-level read operations that pair a GitCommands builder with its
 * parser. Every reader returns a GitResult; none of them mutate.
 */

import type {
  CommitIdentity,
  ExecuteOptions,
  GitResult,
  ObjectId,
  RawGitOutput,
  RemoteEntry,
  StatusEntry,
  TagEntry,
} from './types.js';
import { err, ok } from './types.js';
import type { GitExecutor } from './executor.js';
import { GitCommands } from './executor.js';
import {
  parseCount,
  parseIdentities,
  parseObjectId,
  parseRemotes,
  parseStatus,
  parseTags,
} from './parser.js';

/**
 * Run a read-only command and treat a non-zero exit code as an error
 */
async function readCommand(
  executor: GitExecutor,
  args: readonly string[],
  options: ExecuteOptions,
  description: string
): Promise<GitResult<RawGitOutput>> {
  const result = await executor.execute(args, options);
  if (!result.ok) {
    return result;
  }

  if (result.value.exitCode !== 0) {
    return err({
      type: 'command_failed',
      message: `Failed to ${description}`,
      command: 'git',
      args,
      stderr: result.value.stderr,
      exitCode: result.value.exitCode,
    });
  }

  return result;
}

/**
 * Absolute path of the working tree root
 * Fails with not_a_repo when the path is not inside a repository
 */
export async function readTopLevel(
  executor: GitExecutor,
  options: ExecuteOptions
): Promise<GitResult<string>> {
  const result = await executor.execute(GitCommands.topLevel(), options);
  if (!result.ok) {
    return result;
  }

  if (result.value.exitCode !== 0) {
    return err({
      type: 'not_a_repo',
      message: `Not a git repository: ${options.cwd}`,
      stderr: result.value.stderr,
      exitCode: result.value.exitCode,
    });
  }

  return ok(result.value.stdout.trim());
}

/**
 * Current HEAD commit, or null on an unborn branch
 */
export async function readHeadCommit(
  executor: GitExecutor,
  options: ExecuteOptions
): Promise<GitResult<ObjectId | null>> {
  const result = await executor.execute(GitCommands.headCommit(), options);
  if (!result.ok) {
    return result;
  }

  return ok(result.value.exitCode === 0 ? parseObjectId(result.value.stdout) : null);
}

/**
 * Current branch name ("HEAD" when detached)
 */
export async function readCurrentBranch(
  executor: GitExecutor,
  options: ExecuteOptions
): Promise<GitResult<string>> {
  const result = await readCommand(executor, GitCommands.currentBranch(), options, 'read current branch');
  return result.ok ? ok(result.value.stdout.trim()) : result;
}

/**
 * Upstream of the current branch, or null when it tracks nothing
 */
export async function readUpstream(
  executor: GitExecutor,
  options: ExecuteOptions
): Promise<GitResult<string | null>> {
  const result = await executor.execute(GitCommands.upstream(), options);
  if (!result.ok) {
    return result;
  }

  const upstream = result.value.stdout.trim();
  return ok(result.value.exitCode === 0 && upstream.length > 0 ? upstream : null);
}

export async function readStatus(
  executor: GitExecutor,
  options: ExecuteOptions
): Promise<GitResult<StatusEntry[]>> {
  const result = await readCommand(executor, GitCommands.status(), options, 'read working tree status');
  return result.ok ? ok(parseStatus(result.value.stdout)) : result;
}

export async function readTags(
  executor: GitExecutor,
  options: ExecuteOptions
): Promise<GitResult<TagEntry[]>> {
  const result = await readCommand(executor, GitCommands.tags(), options, 'list tags');
  return result.ok ? ok(parseTags(result.value.stdout)) : result;
}

export async function readRemotes(
  executor: GitExecutor,
  options: ExecuteOptions
): Promise<GitResult<RemoteEntry[]>> {
  const result = await readCommand(executor, GitCommands.remotes(), options, 'list remotes');
  return result.ok ? ok(parseRemotes(result.value.stdout)) : result;
}

/**
 * Identity fields of every commit reachable from any ref
 * Malformed records are reported as warnings, not failures
 */
export async function readIdentities(
  executor: GitExecutor,
  options: ExecuteOptions
): Promise<GitResult<{ commits: CommitIdentity[]; warnings: string[] }>> {
  const result = await readCommand(executor, GitCommands.identities(), options, 'read commit log');
  if (!result.ok) {
    return result;
  }

  const { commits, errors } = parseIdentities(result.value.stdout);
  return ok({
    commits,
    warnings: errors.map((e) => `Commit parse error: ${e.message}`),
  });
}

/**
 * Number of commits in a revision range
 */
export async function countCommits(
  executor: GitExecutor,
  range: string,
  options: ExecuteOptions
): Promise<GitResult<number>> {
  const result = await readCommand(executor, GitCommands.countCommits(range), options, `count commits in ${range}`);
  if (!result.ok) {
    return result;
  }

  const count = parseCount(result.value.stdout);
  if (count === null) {
    return err({
      type: 'parse_error',
      message: `Unexpected rev-list output: ${result.value.stdout.trim()}`,
      args: GitCommands.countCommits(range),
    });
  }

  return ok(count);
}

/**
 * Refs under refs/original/ left by filter-branch
 */
export async function readBackupRefs(
  executor: GitExecutor,
  options: ExecuteOptions
): Promise<GitResult<string[]>> {
  const result = await readCommand(executor, GitCommands.backupRefs(), options, 'list backup refs');
  if (!result.ok) {
    return result;
  }

  return ok(
    result.value.stdout
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0)
  );
}
