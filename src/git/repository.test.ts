import { describe, it, expect, beforeAll } from 'vitest';
import { realpath } from 'node:fs/promises';
import { createGitExecutor } from './executor.js';
import {
  countCommits,
  readBackupRefs,
  readCurrentBranch,
  readHeadCommit,
  readIdentities,
  readRemotes,
  readStatus,
  readTags,
  readTopLevel,
  readUpstream,
} from './repository.js';
import { commit, createRepo, git, makeTempDir, removeDir } from '../testing/fixtures.js';

describe('repository readers', () => {
  const executor = createGitExecutor();
  let repo: string;
  let empty: string;
  let plain: string;
  let firstHash: string;
  let secondHash: string;

  beforeAll(async () => {
    repo = await createRepo();
    firstHash = await commit(repo, 'first', { name: 'Old Name', email: 'old@example.com' });
    secondHash = await commit(
      repo,
      'second',
      { name: 'Author Two', email: 'two@example.com' },
      { name: 'Old Name', email: 'old@example.com' }
    );
    git(repo, ['tag', 'light']);
    git(repo, ['tag', '-a', 'v1.0', '-m', 'release', firstHash]);
    git(repo, ['remote', 'add', 'origin', '/tmp/reauthor-origin.git']);

    empty = await createRepo();
    plain = await makeTempDir('reauthor-plain-');

    return async () => {
      await removeDir(repo);
      await removeDir(empty);
      await removeDir(plain);
    };
  });

  it('reads the top level path', async () => {
    const result = await readTopLevel(executor, { cwd: repo });
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value).toBe(await realpath(repo));
    }
  });

  it('reports not_a_repo outside a repository', async () => {
    const result = await readTopLevel(executor, { cwd: plain });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.type).toBe('not_a_repo');
    }
  });

  it('reads HEAD, or null on an unborn branch', async () => {
    const head = await readHeadCommit(executor, { cwd: repo });
    expect(head).toEqual({ ok: true, value: secondHash });

    const unborn = await readHeadCommit(executor, { cwd: empty });
    expect(unborn).toEqual({ ok: true, value: null });
  });

  it('reads the current branch and a missing upstream', async () => {
    expect(await readCurrentBranch(executor, { cwd: repo })).toEqual({ ok: true, value: 'main' });
    expect(await readUpstream(executor, { cwd: repo })).toEqual({ ok: true, value: null });
  });

  it('reads a clean status', async () => {
    expect(await readStatus(executor, { cwd: repo })).toEqual({ ok: true, value: [] });
  });

  it('reads tags with their kind', async () => {
    const result = await readTags(executor, { cwd: repo });
    expect(result.ok).toBe(true);
    if (result.ok) {
      const byName = new Map(result.value.map((t) => [t.name, t]));
      expect(byName.get('light')).toEqual({ name: 'light', objectId: secondHash, isAnnotated: false });
      expect(byName.get('v1.0')?.isAnnotated).toBe(true);
      // Annotated tags point at the tag object, not the commit
      expect(byName.get('v1.0')?.objectId).not.toBe(firstHash);
    }
  });

  it('reads remotes', async () => {
    expect(await readRemotes(executor, { cwd: repo })).toEqual({
      ok: true,
      value: [{ name: 'origin', fetchUrl: '/tmp/reauthor-origin.git', pushUrl: '/tmp/reauthor-origin.git' }],
    });
  });

  it('reads the identities of every commit', async () => {
    const result = await readIdentities(executor, { cwd: repo });
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.warnings).toEqual([]);
      expect(result.value.commits).toEqual([
        {
          hash: secondHash,
          author: { name: 'Author Two', email: 'two@example.com' },
          committer: { name: 'Old Name', email: 'old@example.com' },
        },
        {
          hash: firstHash,
          author: { name: 'Old Name', email: 'old@example.com' },
          committer: { name: 'Old Name', email: 'old@example.com' },
        },
      ]);
    }
  });

  it('counts commits in a range', async () => {
    expect(await countCommits(executor, 'HEAD', { cwd: repo })).toEqual({ ok: true, value: 2 });
    expect(await countCommits(executor, `${firstHash}..HEAD`, { cwd: repo })).toEqual({ ok: true, value: 1 });
  });

  it('fails to count an unknown range', async () => {
    const result = await countCommits(executor, 'origin/main..main', { cwd: repo });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Failed to count commits in origin/main..main');
    }
  });

  it('lists no backup refs in an untouched repository', async () => {
    expect(await readBackupRefs(executor, { cwd: repo })).toEqual({ ok: true, value: [] });
  });
});
