/**
 * Pre-flight inspection
 *
 * Reads everything the rewrite will disturb (tags, remotes, the current
 * branch and its upstream), counts matching commits and surfaces the risks
 * before asking for the final go-ahead. Nothing here mutates the
 * repository; the only side effect is a best-effort fetch.
 */

import type { GitExecutor } from '../git/executor.js';
import { GitCommands } from '../git/executor.js';
import type { CommitIdentity, ExecuteOptions, RemoteEntry } from '../git/types.js';
import {
  countCommits,
  readCurrentBranch,
  readHeadCommit,
  readIdentities,
  readRemotes,
  readTags,
  readUpstream,
} from '../git/repository.js';
import { parseObjectId } from '../git/parser.js';
import type {
  IdentityRewrite,
  MatchCounts,
  Prompter,
  Replacement,
  ReplacementSemantics,
  Reporter,
  RepositorySnapshot,
  RewriteConfig,
  RewriteResult,
} from './types.js';
import { failure, success } from './types.js';
import { gitFailure } from './validator.js';

// ============================================
// REMOTE HELPERS
// ============================================

/**
 * The remote used for fetch and push: the preferred one if configured,
 * otherwise the first listed
 */
export function pickRemote(
  remotes: readonly RemoteEntry[],
  preferred: string
): RemoteEntry | undefined {
  return remotes.find((r) => r.name === preferred) ?? remotes[0];
}

/**
 * Split an upstream like "origin/feature/x" into remote and branch,
 * matching the longest configured remote name
 */
export function splitUpstream(
  upstream: string,
  remotes: readonly RemoteEntry[]
): { remote: string; branch: string } | null {
  const candidates = remotes
    .map((r) => r.name)
    .filter((name) => upstream.startsWith(`${name}/`))
    .sort((a, b) => b.length - a.length);

  const remote = candidates[0];
  if (!remote) {
    return null;
  }

  return { remote, branch: upstream.slice(remote.length + 1) };
}

// ============================================
// SNAPSHOT
// ============================================

export interface SnapshotResult {
  readonly snapshot: RepositorySnapshot;
  /** Upstream branch id before the rewrite, used as the push lease */
  readonly upstreamId: string | null;
}

/**
 * Capture the state a rewrite may disturb
 *
 * When a remote exists it is fetched (bounded by config.remoteTimeoutMs);
 * a failed fetch is reported as a warning and leaves aheadCount unset.
 */
export async function captureSnapshot(
  executor: GitExecutor,
  topLevelPath: string,
  config: RewriteConfig,
  reporter: Reporter
): Promise<RewriteResult<SnapshotResult>> {
  const options: ExecuteOptions = { cwd: topLevelPath };

  const [head, branch, upstream, tags, remotes] = await Promise.all([
    readHeadCommit(executor, options),
    readCurrentBranch(executor, options),
    readUpstream(executor, options),
    readTags(executor, options),
    readRemotes(executor, options),
  ]);

  if (!head.ok) return gitFailure(head.error);
  if (!branch.ok) return gitFailure(branch.error);
  if (!upstream.ok) return gitFailure(upstream.error);
  if (!tags.ok) return gitFailure(tags.error);
  if (!remotes.ok) return gitFailure(remotes.error);

  let aheadCount: number | undefined;
  const remote = pickRemote(remotes.value, config.preferredRemote);

  if (!remote) {
    reporter.warn('No remotes configured.');
  } else {
    reporter.info('Checking remote status...');
    const fetched = await executor.mutate(GitCommands.fetch(remote.name), {
      ...options,
      timeout: config.remoteTimeoutMs,
    });

    if (fetched.ok && fetched.value.exitCode === 0) {
      if (branch.value !== 'HEAD') {
        const ahead = await countCommits(
          executor,
          `${remote.name}/${branch.value}..${branch.value}`,
          options
        );
        // No remote counterpart for this branch: leave aheadCount unset
        if (ahead.ok) {
          aheadCount = ahead.value;
          if (ahead.value > 0) {
            reporter.warn(`Your local branch is ${ahead.value} commits ahead of remote.`);
            reporter.detail('These unpushed commits will have their metadata changed.');
          }
        }
      }
    } else if (!fetched.ok && fetched.error.type === 'timeout') {
      reporter.warn(`Fetching from '${remote.name}' timed out; continuing without remote status.`);
    } else {
      reporter.warn('Could not fetch from remote (network issue or no tracking branch).');
    }
  }

  let upstreamId: string | null = null;
  if (upstream.value) {
    const resolved = await executor.execute(GitCommands.resolve(upstream.value), options);
    if (resolved.ok && resolved.value.exitCode === 0) {
      upstreamId = parseObjectId(resolved.value.stdout);
    }
  }

  return success({
    snapshot: {
      topLevelPath,
      hasCommits: head.value !== null,
      currentBranch: branch.value,
      upstream: upstream.value,
      tags: tags.value,
      remotes: remotes.value,
      aheadCount,
    },
    upstreamId,
  });
}

// ============================================
// MATCHING
// ============================================

type IdentityRole = 'author' | 'committer';

/**
 * Does the given identity of this commit carry the old value?
 */
function fieldMatches(
  commit: CommitIdentity,
  role: IdentityRole,
  key: 'email' | 'name',
  replacement: Replacement,
  semantics: ReplacementSemantics
): boolean {
  const value = commit[role][key];
  return semantics === 'exact' ? value === replacement.from : value.includes(replacement.from);
}

function anyFieldMatches(
  commit: CommitIdentity,
  role: IdentityRole,
  rewrite: IdentityRewrite,
  semantics: ReplacementSemantics
): boolean {
  return (
    (rewrite.email !== undefined && fieldMatches(commit, role, 'email', rewrite.email, semantics)) ||
    (rewrite.name !== undefined && fieldMatches(commit, role, 'name', rewrite.name, semantics))
  );
}

/**
 * Count commits whose author identity matches the old values
 *
 * Matching is exact and case-sensitive. Commits that carry the old value
 * only as committer are counted separately and never make a rewrite
 * necessary on their own.
 */
export function countMatches(
  commits: readonly CommitIdentity[],
  rewrite: IdentityRewrite
): MatchCounts {
  let emailMatches = 0;
  let nameMatches = 0;
  let partialEmailMatches = 0;
  let partialNameMatches = 0;
  let committerOnlyMatches = 0;

  for (const commit of commits) {
    if (rewrite.email) {
      if (fieldMatches(commit, 'author', 'email', rewrite.email, 'exact')) {
        emailMatches++;
      } else if (fieldMatches(commit, 'author', 'email', rewrite.email, 'substring')) {
        partialEmailMatches++;
      }
    }

    if (rewrite.name) {
      if (fieldMatches(commit, 'author', 'name', rewrite.name, 'exact')) {
        nameMatches++;
      } else if (fieldMatches(commit, 'author', 'name', rewrite.name, 'substring')) {
        partialNameMatches++;
      }
    }

    if (!anyFieldMatches(commit, 'author', rewrite, 'exact') && anyFieldMatches(commit, 'committer', rewrite, 'exact')) {
      committerOnlyMatches++;
    }
  }

  return { emailMatches, nameMatches, partialEmailMatches, partialNameMatches, committerOnlyMatches };
}

/**
 * Number of distinct commits a strategy with the given semantics would rewrite
 *
 * Both identities are rewritten, so committer matches count here.
 */
export function countAffectedCommits(
  commits: readonly CommitIdentity[],
  rewrite: IdentityRewrite,
  semantics: ReplacementSemantics
): number {
  return commits.filter(
    (commit) =>
      anyFieldMatches(commit, 'author', rewrite, semantics) ||
      anyFieldMatches(commit, 'committer', rewrite, semantics)
  ).length;
}

// ============================================
// INSPECTION
// ============================================

export interface Inspection {
  readonly snapshot: RepositorySnapshot;
  readonly upstreamId: string | null;
  readonly counts: MatchCounts;
  /** Commits the selected strategy is expected to rewrite */
  readonly affectedCommits: number;
}

/**
 * Run all pre-flight checks
 *
 * Fails with NoMatchingCommits when no commit's author carries the old
 * email or name exactly.
 */
export async function inspect(
  executor: GitExecutor,
  topLevelPath: string,
  rewrite: IdentityRewrite,
  semantics: ReplacementSemantics,
  config: RewriteConfig,
  reporter: Reporter
): Promise<RewriteResult<Inspection>> {
  const captured = await captureSnapshot(executor, topLevelPath, config, reporter);
  if (!captured.ok) {
    return captured;
  }

  const { snapshot, upstreamId } = captured.value;

  if (snapshot.tags.length > 0) {
    reporter.warn(`Found ${snapshot.tags.length} tags in repository:`);
    for (const tag of snapshot.tags) {
      reporter.detail(`${tag.name} -> ${tag.objectId.slice(0, 7)}`);
    }
    reporter.warn('Tags will be recreated to point to new commit SHAs after rewrite!');
    reporter.info("Tag names will remain the same, but they'll point to the new commits.");
  } else {
    reporter.info('No tags found in repository.');
  }

  const identities = await readIdentities(executor, { cwd: topLevelPath });
  if (!identities.ok) {
    return gitFailure(identities.error);
  }

  for (const warning of identities.value.warnings) {
    reporter.warn(warning);
  }

  const commits = identities.value.commits;
  const counts = countMatches(commits, rewrite);

  if (rewrite.email) {
    if (counts.emailMatches === 0) {
      reporter.warn(`No commits found with email: ${rewrite.email.from}`);
    } else {
      reporter.info(`Found ${counts.emailMatches} commits with the old email address.`);
    }
  }

  if (rewrite.name) {
    if (counts.nameMatches === 0) {
      reporter.warn(`No commits found with name: ${rewrite.name.from}`);
    } else {
      reporter.info(`Found ${counts.nameMatches} commits with the old name.`);
    }
  }

  const partial = counts.partialEmailMatches + counts.partialNameMatches;
  if (partial > 0) {
    reporter.warn(
      `${partial} author fields contain the old value inside a longer email or name; ` +
        (semantics === 'substring'
          ? 'they will be rewritten too.'
          : 'the selected strategy leaves them unchanged.')
    );
  }

  if (counts.committerOnlyMatches > 0) {
    reporter.warn(
      `${counts.committerOnlyMatches} commits carry the old value only as committer; they do not count as matches.`
    );
  }

  if (counts.emailMatches === 0 && counts.nameMatches === 0) {
    return failure('NoMatchingCommits', 'No commits found to modify.');
  }

  return success({
    snapshot,
    upstreamId,
    counts,
    affectedCommits: countAffectedCommits(commits, rewrite, semantics),
  });
}

/**
 * Final go-ahead before any history is rewritten
 */
export async function confirmRewrite(prompter: Prompter): Promise<RewriteResult<void>> {
  const confirmed = await prompter.confirm('This will rewrite Git history. Continue?', false);
  return confirmed ? success(undefined) : failure('UserCancelled', 'Operation cancelled.');
}
