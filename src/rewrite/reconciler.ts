/**
 * Post-flight reconciliation
 *
 * Everything here runs after history has already been rewritten, so it is
 * best-effort: problems become warnings, never a failed rewrite.
 */

import type { GitExecutor } from '../git/executor.js';
import { GitCommands } from '../git/executor.js';
import type { ExecuteOptions, GitResult, RawGitOutput, RemoteEntry, TagEntry } from '../git/types.js';
import { countCommits, readRemotes, readTags } from '../git/repository.js';
import { pickRemote, splitUpstream } from './inspector.js';
import type {
  Prompter,
  Reporter,
  RepositorySnapshot,
  RewriteConfig,
  RewriteError,
} from './types.js';

// ============================================
// TAGS
// ============================================

export interface TagChange {
  readonly name: string;
  readonly before: string;
  readonly after: string;
}

export interface TagVerification {
  /** Tags whose target changed */
  readonly recreated: readonly TagChange[];
  /** Tags that still point at the same object */
  readonly unchanged: readonly string[];
  /** Tags that existed before but are gone now */
  readonly missing: readonly string[];
}

/**
 * Compare tag lists from before and after a rewrite
 */
export function compareTags(before: readonly TagEntry[], after: readonly TagEntry[]): TagVerification {
  const afterByName = new Map(after.map((tag) => [tag.name, tag]));
  const recreated: TagChange[] = [];
  const unchanged: string[] = [];
  const missing: string[] = [];

  for (const tag of before) {
    const current = afterByName.get(tag.name);
    if (!current) {
      missing.push(tag.name);
    } else if (current.objectId !== tag.objectId) {
      recreated.push({ name: tag.name, before: tag.objectId, after: current.objectId });
    } else {
      unchanged.push(tag.name);
    }
  }

  return { recreated, unchanged, missing };
}

export async function verifyTags(
  executor: GitExecutor,
  snapshot: RepositorySnapshot,
  reporter: Reporter
): Promise<TagVerification> {
  reporter.step('Verifying tags after rewrite...');

  const after = await readTags(executor, { cwd: snapshot.topLevelPath });
  if (!after.ok) {
    reporter.warn(`Could not list tags after rewrite: ${after.error.message}`);
    return { recreated: [], unchanged: [], missing: [] };
  }

  const verification = compareTags(snapshot.tags, after.value);

  if (after.value.length === 0) {
    reporter.info('No tags to update.');
  } else {
    reporter.success(`${after.value.length} tags successfully updated:`);
    for (const tag of after.value) {
      reporter.detail(`${tag.name} -> ${tag.objectId.slice(0, 7)}`);
    }
  }

  for (const name of verification.missing) {
    reporter.warn(`Tag '${name}' no longer exists after the rewrite.`);
  }

  return verification;
}

// ============================================
// REMOTES
// ============================================

/**
 * Re-add remotes the rewrite tool removed
 *
 * Restoration uses one URL per remote (the fetch URL). If no remotes
 * existed before, the user may add one.
 *
 * @returns Names of remotes that were re-added
 */
export async function restoreRemotes(
  executor: GitExecutor,
  snapshot: RepositorySnapshot,
  prompter: Prompter,
  reporter: Reporter
): Promise<string[]> {
  const options: ExecuteOptions = { cwd: snapshot.topLevelPath };
  reporter.step('Restoring remote configuration...');

  if (snapshot.remotes.length === 0) {
    const addRemote = await prompter.confirm(
      'No remotes were configured before. Would you like to add one now?',
      false
    );
    if (addRemote) {
      await promptForRemote(executor, options, prompter, reporter);
    }
    return [];
  }

  const current = await readRemotes(executor, options);
  const existing = new Set(current.ok ? current.value.map((r) => r.name) : []);
  const restored: string[] = [];

  for (const remote of snapshot.remotes) {
    if (existing.has(remote.name)) continue;

    const args = GitCommands.addRemote(remote.name, remote.fetchUrl);
    reporter.command(args);
    const result = await executor.mutate(args, options);

    if (result.ok && result.value.exitCode === 0) {
      restored.push(remote.name);
    } else {
      const reason = result.ok ? result.value.stderr.trim() : result.error.message;
      reporter.warn(`Could not restore remote '${remote.name}': ${reason}`);
    }
  }

  if (restored.length > 0) {
    reporter.success(`Remotes restored: ${restored.join(', ')}`);
  } else {
    reporter.success('Remotes unchanged.');
  }

  return restored;
}

async function promptForRemote(
  executor: GitExecutor,
  options: ExecuteOptions,
  prompter: Prompter,
  reporter: Reporter
): Promise<void> {
  const name = (await prompter.ask('Enter remote name (default: origin):')).trim() || 'origin';
  const url = (await prompter.ask('Enter repository URL (e.g., https://github.com/username/repo.git):')).trim();

  if (!url) {
    reporter.info('No URL provided, skipping remote setup.');
    return;
  }

  const args = GitCommands.addRemote(name, url);
  reporter.command(args);
  const result = await executor.mutate(args, options);

  if (result.ok && result.value.exitCode === 0) {
    reporter.success(`Added remote '${name}': ${url}`);
  } else {
    const reason = result.ok ? result.value.stderr.trim() : result.error.message;
    reporter.warn(`Could not add remote '${name}': ${reason}`);
  }
}

// ============================================
// PUSH
// ============================================

export interface PushOptions {
  /** true/false decides without asking; undefined asks */
  readonly push?: boolean;
  readonly upstreamId: string | null;
}

export interface PushReport {
  readonly pushed: boolean;
  readonly tagsPushed: boolean;
  readonly warnings: readonly RewriteError[];
}

interface PushPlan {
  readonly remote: string;
  readonly branchArgs: readonly string[];
}

/**
 * Decide how the current branch should be pushed
 *
 * A branch that already tracks a remote branch needs a leased force push;
 * one that tracks nothing gets a plain push that sets its upstream.
 */
export function planPush(
  snapshot: RepositorySnapshot,
  remotes: readonly RemoteEntry[],
  config: RewriteConfig,
  upstreamId: string | null
): PushPlan | null {
  const tracked = snapshot.upstream ? splitUpstream(snapshot.upstream, remotes) : null;

  if (tracked) {
    return {
      remote: tracked.remote,
      branchArgs: GitCommands.pushWithLease(
        tracked.remote,
        snapshot.currentBranch,
        tracked.branch,
        upstreamId ?? undefined
      ),
    };
  }

  const remote = pickRemote(remotes, config.preferredRemote);
  if (!remote || snapshot.currentBranch === 'HEAD') {
    return null;
  }

  return {
    remote: remote.name,
    branchArgs: GitCommands.pushSetUpstream(remote.name, snapshot.currentBranch),
  };
}

function pushFailed(remote: string, message: string): RewriteError {
  return {
    kind: 'PushFailed',
    message,
    details: [
      'You may need to:',
      '1. Set up authentication (SSH keys, personal access tokens)',
      '2. Check if the remote URL is correct: git remote -v',
      `3. Try pushing manually: git push --force-with-lease ${remote}`,
      `4. Push tags separately: git push --force-with-lease ${remote} --tags`,
    ],
  };
}

function describeFailure(result: GitResult<RawGitOutput>): string | null {
  if (!result.ok) {
    return result.error.message;
  }
  if (result.value.exitCode !== 0) {
    return result.value.stderr.trim() || `exit code ${result.value.exitCode}`;
  }
  return null;
}

/**
 * Print the commands to run later
 */
function reportManualPush(plan: PushPlan | null, snapshot: RepositorySnapshot, reporter: Reporter): void {
  reporter.warn('Remember to push your changes when ready.');

  if (!plan) {
    reporter.info('No remotes configured. Add one first:');
    reporter.detail('git remote add origin <your-repository-url>');
    reporter.detail(`git push --set-upstream origin ${snapshot.currentBranch}`);
    return;
  }

  reporter.detail(`git ${plan.branchArgs.join(' ')}`);
  if (snapshot.tags.length > 0) {
    reporter.detail(`git ${GitCommands.pushTagsWithLease(plan.remote).join(' ')}`);
  }
}

/**
 * Optionally push the rewritten branch and tags
 * Failures are returned as PushFailed warnings
 */
export async function pushChanges(
  executor: GitExecutor,
  snapshot: RepositorySnapshot,
  config: RewriteConfig,
  options: PushOptions,
  prompter: Prompter,
  reporter: Reporter
): Promise<PushReport> {
  const execOptions: ExecuteOptions = { cwd: snapshot.topLevelPath, timeout: config.remoteTimeoutMs };
  const remotes = await readRemotes(executor, execOptions);
  const plan = planPush(snapshot, remotes.ok ? remotes.value : [], config, options.upstreamId);

  const wantsPush = options.push ?? (await prompter.confirm('Do you want to push the changes to remote now?', false));

  if (!wantsPush) {
    reportManualPush(plan, snapshot, reporter);
    return { pushed: false, tagsPushed: false, warnings: [] };
  }

  if (!plan) {
    reporter.warn('No remotes configured in this repository.');
    reportManualPush(plan, snapshot, reporter);
    return { pushed: false, tagsPushed: false, warnings: [] };
  }

  reporter.info(`Using remote: ${plan.remote}`);
  reporter.command(plan.branchArgs);
  const pushed = await executor.mutate(plan.branchArgs, execOptions);
  const pushError = describeFailure(pushed);

  if (pushError !== null) {
    const warning = pushFailed(plan.remote, `Failed to push changes: ${pushError}`);
    return { pushed: false, tagsPushed: false, warnings: [warning] };
  }

  reporter.success(`Successfully pushed commits to remote '${plan.remote}'!`);

  if (snapshot.tags.length === 0) {
    return { pushed: true, tagsPushed: false, warnings: [] };
  }

  const pushTags = options.push ?? (await prompter.confirm('Push updated tags as well?', true));
  if (!pushTags) {
    reporter.detail(`git ${GitCommands.pushTagsWithLease(plan.remote).join(' ')}`);
    return { pushed: true, tagsPushed: false, warnings: [] };
  }

  const tagArgs = GitCommands.pushTagsWithLease(plan.remote);
  reporter.command(tagArgs);
  const tagsResult = await executor.mutate(tagArgs, execOptions);
  const tagError = describeFailure(tagsResult);

  if (tagError !== null) {
    const warning = pushFailed(plan.remote, `Failed to push tags: ${tagError}`);
    return { pushed: true, tagsPushed: false, warnings: [warning] };
  }

  reporter.success(`Successfully pushed tags to remote '${plan.remote}'!`);
  return { pushed: true, tagsPushed: true, warnings: [] };
}

// ============================================
// SUMMARY
// ============================================

/**
 * Report the post-rewrite commit count and the force-push warning
 */
export async function reportRewrittenHistory(
  executor: GitExecutor,
  snapshot: RepositorySnapshot,
  reporter: Reporter
): Promise<number | null> {
  reporter.step('POST-CHANGE REPOSITORY STATUS');

  const total = await countCommits(executor, 'HEAD', { cwd: snapshot.topLevelPath });
  if (!total.ok) {
    reporter.warn(`Could not count commits: ${total.error.message}`);
    return null;
  }

  reporter.warn(
    `IMPORTANT: Commit hashes on this branch (${total.value} commits) have changed and need to be force-pushed!`
  );
  reporter.info('Any earlier push of this history has now diverged. Use git push --force-with-lease, never a plain push.');
  reporter.info('Next steps:');
  reporter.detail("1. Verify the changes: git log --pretty=format:'%h %an <%ae> %s'");
  reporter.detail('2. Push changes to remote: git push --force-with-lease');
  reporter.detail('3. Notify collaborators to re-clone or rebase their work');

  return total.value;
}
