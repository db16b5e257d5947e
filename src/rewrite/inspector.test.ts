import { describe, it, expect, beforeAll } from 'vitest';
import { realpath } from 'node:fs/promises';
import { createGitExecutor } from '../git/executor.js';
import type { CommitIdentity, RemoteEntry } from '../git/types.js';
import { toObjectId } from '../git/types.js';
import {
  confirmRewrite,
  countAffectedCommits,
  countMatches,
  inspect,
  pickRemote,
  splitUpstream,
} from './inspector.js';
import type { IdentityRewrite } from './types.js';
import { DEFAULT_REWRITE_CONFIG } from './types.js';
import {
  RecordingReporter,
  ScriptedPrompter,
  commit,
  createBareRepo,
  createRepo,
  git,
  removeDir,
} from '../testing/fixtures.js';

const remote = (name: string): RemoteEntry => ({ name, fetchUrl: `/srv/${name}.git`, pushUrl: `/srv/${name}.git` });

const identity = (
  seed: string,
  author: { name: string; email: string },
  committer: { name: string; email: string } = author
): CommitIdentity => ({ hash: toObjectId(seed.repeat(40)), author, committer });

const OLD = { name: 'Old Name', email: 'old@example.com' };
const BOTH: IdentityRewrite = {
  email: { from: 'old@example.com', to: 'new@example.com' },
  name: { from: 'Old Name', to: 'New Name' },
};

describe('pickRemote', () => {
  it('prefers the configured remote', () => {
    expect(pickRemote([remote('upstream'), remote('origin')], 'origin')?.name).toBe('origin');
  });

  it('falls back to the first remote', () => {
    expect(pickRemote([remote('upstream'), remote('mirror')], 'origin')?.name).toBe('upstream');
  });

  it('returns undefined with no remotes', () => {
    expect(pickRemote([], 'origin')).toBeUndefined();
  });
});

describe('splitUpstream', () => {
  it('splits on the remote name, keeping slashes in the branch', () => {
    expect(splitUpstream('origin/feature/login', [remote('origin')])).toEqual({
      remote: 'origin',
      branch: 'feature/login',
    });
  });

  it('matches the longest remote name', () => {
    expect(splitUpstream('team/a/main', [remote('team'), remote('team/a')])).toEqual({
      remote: 'team/a',
      branch: 'main',
    });
  });

  it('returns null for an unknown remote', () => {
    expect(splitUpstream('gone/main', [remote('origin')])).toBeNull();
  });
});

describe('countMatches', () => {
  const commits = [
    identity('1', OLD),
    identity('2', { name: 'Two', email: 'two@example.com' }, OLD),
    identity('3', { name: 'Old Name Jr', email: 'bot+old@example.com' }),
    identity('4', { name: 'Someone', email: 'someone@example.com' }),
  ];

  it('counts exact author matches and committer-only matches separately', () => {
    expect(countMatches(commits, BOTH)).toEqual({
      emailMatches: 1,
      nameMatches: 1,
      partialEmailMatches: 1,
      partialNameMatches: 1,
      committerOnlyMatches: 1,
    });
  });

  it('is case-sensitive', () => {
    const upper = [identity('5', { name: 'OLD NAME', email: 'OLD@example.com' })];
    expect(countMatches(upper, BOTH)).toEqual({
      emailMatches: 0,
      nameMatches: 0,
      partialEmailMatches: 0,
      partialNameMatches: 0,
      committerOnlyMatches: 0,
    });
  });

  it('does not count a commit whose old value is only in the committer', () => {
    const committed = [identity('6', { name: 'Someone', email: 'someone@example.com' }, OLD)];
    expect(countMatches(committed, BOTH)).toEqual({
      emailMatches: 0,
      nameMatches: 0,
      partialEmailMatches: 0,
      partialNameMatches: 0,
      committerOnlyMatches: 1,
    });
  });

  it('ignores fields that were not requested', () => {
    const emailOnly: IdentityRewrite = { email: { from: 'old@example.com', to: 'new@example.com' } };
    expect(countMatches(commits, emailOnly).nameMatches).toBe(0);
  });

  it('counts affected commits according to the strategy semantics', () => {
    expect(countAffectedCommits(commits, BOTH, 'exact')).toBe(2);
    expect(countAffectedCommits(commits, BOTH, 'substring')).toBe(3);
  });
});

describe('inspect', () => {
  const executor = createGitExecutor();
  const emailOnly: IdentityRewrite = { email: { from: 'old@example.com', to: 'new@example.com' } };

  describe('a repository tracking a remote', () => {
    let repo: string;
    let bare: string;
    let pushedHash: string;

    beforeAll(async () => {
      bare = await createBareRepo();
      repo = await createRepo();
      await commit(repo, 'first', OLD);
      pushedHash = await commit(repo, 'second', { name: 'Someone', email: 'someone@example.com' });
      git(repo, ['remote', 'add', 'origin', bare]);
      git(repo, ['push', '--quiet', '--set-upstream', 'origin', 'main']);
      await commit(repo, 'third', { name: 'Old Name', email: 'bot+old@example.com' }, OLD);
      git(repo, ['tag', 'v1']);

      return async () => {
        await removeDir(repo);
        await removeDir(bare);
      };
    });

    it('captures branch, upstream, remotes and tags', async () => {
      const topLevel = await realpath(repo);
      const reporter = new RecordingReporter();
      const result = await inspect(executor, topLevel, emailOnly, 'exact', DEFAULT_REWRITE_CONFIG, reporter);

      expect(result.ok).toBe(true);
      if (!result.ok) return;

      const { snapshot, upstreamId, counts, affectedCommits } = result.value;
      expect(snapshot.topLevelPath).toBe(topLevel);
      expect(snapshot.hasCommits).toBe(true);
      expect(snapshot.currentBranch).toBe('main');
      expect(snapshot.upstream).toBe('origin/main');
      expect(snapshot.remotes).toEqual([{ name: 'origin', fetchUrl: bare, pushUrl: bare }]);
      expect(snapshot.tags.map((t) => t.name)).toEqual(['v1']);
      expect(snapshot.aheadCount).toBe(1);
      expect(upstreamId).toBe(pushedHash);
      expect(counts).toEqual({
        emailMatches: 1,
        nameMatches: 0,
        partialEmailMatches: 1,
        partialNameMatches: 0,
        committerOnlyMatches: 1,
      });
      expect(affectedCommits).toBe(2);
    });

    it('warns about unpushed commits and tags', async () => {
      const reporter = new RecordingReporter();
      await inspect(executor, await realpath(repo), emailOnly, 'exact', DEFAULT_REWRITE_CONFIG, reporter);

      expect(reporter.messages('warn')).toEqual([
        'Your local branch is 1 commits ahead of remote.',
        'Found 1 tags in repository:',
        'Tags will be recreated to point to new commit SHAs after rewrite!',
        '1 author fields contain the old value inside a longer email or name; the selected strategy leaves them unchanged.',
        '1 commits carry the old value only as committer; they do not count as matches.',
      ]);
      expect(reporter.messages('info')).toContain('Found 1 commits with the old email address.');
    });

    it('explains how partial matches are treated', async () => {
      const exact = new RecordingReporter();
      const rewrite: IdentityRewrite = { email: { from: 'old@example.com', to: 'new@example.com' } };
      const nameRewrite: IdentityRewrite = { ...rewrite, name: { from: 'Old', to: 'New' } };

      await inspect(executor, await realpath(repo), nameRewrite, 'exact', DEFAULT_REWRITE_CONFIG, exact);
      expect(exact.messages('warn')).toContain(
        '3 author fields contain the old value inside a longer email or name; the selected strategy leaves them unchanged.'
      );

      const substring = new RecordingReporter();
      await inspect(executor, await realpath(repo), nameRewrite, 'substring', DEFAULT_REWRITE_CONFIG, substring);
      expect(substring.messages('warn')).toContain(
        '3 author fields contain the old value inside a longer email or name; they will be rewritten too.'
      );
    });
  });

  describe('a repository without remotes', () => {
    let repo: string;

    beforeAll(async () => {
      repo = await createRepo();
      await commit(repo, 'only', { name: 'Someone', email: 'someone@example.com' });

      return async () => {
        await removeDir(repo);
      };
    });

    it('fails with NoMatchingCommits when nothing matches exactly', async () => {
      const reporter = new RecordingReporter();
      const result = await inspect(executor, await realpath(repo), emailOnly, 'exact', DEFAULT_REWRITE_CONFIG, reporter);

      expect(result).toEqual({
        ok: false,
        error: { kind: 'NoMatchingCommits', message: 'No commits found to modify.' },
      });
      expect(reporter.messages('warn')).toEqual([
        'No remotes configured.',
        'No commits found with email: old@example.com',
      ]);
      expect(reporter.messages('info')).toEqual(['No tags found in repository.']);
    });
  });
});

describe('confirmRewrite', () => {
  it('proceeds on yes', async () => {
    expect(await confirmRewrite(new ScriptedPrompter({ confirms: [true] }))).toEqual({ ok: true, value: undefined });
  });

  it('cancels by default', async () => {
    expect(await confirmRewrite(new ScriptedPrompter())).toEqual({
      ok: false,
      error: { kind: 'UserCancelled', message: 'Operation cancelled.' },
    });
  });
});
