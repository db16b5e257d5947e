/**
 * Repository validation
 *
 * Confirms the target is an existing, non-empty git repository and that
 * the user accepts rewriting over uncommitted changes.
 */

import { stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import type { GitExecutor } from '../git/executor.js';
import type { GitError } from '../git/types.js';
import { readHeadCommit, readStatus, readTopLevel } from '../git/repository.js';
import type { Prompter, Reporter, RewriteResult } from './types.js';
import { failure, success } from './types.js';

export interface ValidatedRepository {
  readonly topLevelPath: string;
  /** Files listed by `git status --porcelain` that the user agreed to keep */
  readonly dirtyFiles: readonly string[];
}

/**
 * Map an unexpected git failure onto the workflow's error taxonomy
 */
export function gitFailure<T>(error: GitError): RewriteResult<T> {
  const details = error.stderr?.trim() ? [error.stderr.trim()] : undefined;
  return failure('GitFailed', error.message, details);
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (e) {
    if (e instanceof Error && 'code' in e && (e.code === 'ENOENT' || e.code === 'ENOTDIR')) {
      return false;
    }
    throw e;
  }
}

/**
 * Resolve and check the repository a rewrite will run against
 *
 * @param repositoryPath - Path from the request; relative paths resolve against cwd
 * @param cwd - Directory used when no path was given
 */
export async function validateRepository(
  executor: GitExecutor,
  repositoryPath: string | undefined,
  cwd: string,
  prompter: Prompter,
  reporter: Reporter
): Promise<RewriteResult<ValidatedRepository>> {
  const path = resolve(cwd, repositoryPath ?? '.');

  if (!(await isDirectory(path))) {
    return failure('PathNotFound', `Directory does not exist: ${path}`);
  }

  const topLevel = await readTopLevel(executor, { cwd: path });
  if (!topLevel.ok) {
    if (topLevel.error.type === 'not_a_repo') {
      return failure('NotARepository', `Not a git repository: ${path}`);
    }
    return gitFailure(topLevel.error);
  }

  const options = { cwd: topLevel.value };

  const head = await readHeadCommit(executor, options);
  if (!head.ok) {
    return gitFailure(head.error);
  }
  if (head.value === null) {
    return failure('EmptyRepository', 'No commits found in this repository. Nothing to rewrite.');
  }

  const status = await readStatus(executor, options);
  if (!status.ok) {
    return gitFailure(status.error);
  }

  const dirtyFiles = status.value.map((entry) => `${entry.code} ${entry.path}`);

  if (dirtyFiles.length > 0) {
    reporter.warn('You have uncommitted changes in your working directory!');
    reporter.info('Uncommitted files:');
    for (const file of dirtyFiles) {
      reporter.detail(file);
    }
    reporter.info("It's recommended to commit or stash these changes before rewriting history.");

    const proceed = await prompter.confirm('Do you want to continue anyway?', false);
    if (!proceed) {
      return failure('UserCancelled', 'Operation cancelled. Please commit or stash your changes first.');
    }
  }

  return success({ topLevelPath: topLevel.value, dirtyFiles });
}
