/**
 * Git output parsers
 *
 * Transforms raw git command output into typed data structures.
 * All parsers are pure functions with no side effects.
 */

import type {
  CommitIdentity,
  ObjectId,
  RemoteEntry,
  StatusEntry,
  TagEntry,
} from './types.js';
import { isObjectId } from './types.js';
import { FIELD_SEPARATOR, RECORD_SEPARATOR } from './executor.js';

// ============================================
// PARSE ERRORS
// ============================================

/**
 * A parsing error with context
 */
export interface ParseError {
  readonly type: 'malformed_record' | 'invalid_hash';
  readonly message: string;
  readonly record?: string;
}

// ============================================
// IDENTITY PARSING
// ============================================

/**
 * Number of fields per identity record:
 * hash, author name, author email, committer name, committer email
 */
const IDENTITY_FIELDS = 5;

/**
 * Result of parsing commit identities
 */
export interface ParseIdentitiesResult {
  readonly commits: CommitIdentity[];
  readonly errors: ParseError[];
}

/**
 * Parse git log output into CommitIdentity objects
 *
 * Expects output from:
 * git log --all --format=%H%x00%an%x00%ae%x00%cn%x00%ce%x01
 *
 * @param raw - Raw stdout from git log command
 */
export function parseIdentities(raw: string): ParseIdentitiesResult {
  const commits: CommitIdentity[] = [];
  const errors: ParseError[] = [];

  if (!raw || raw.trim().length === 0) {
    return { commits, errors };
  }

  // git puts a newline between records, so it leads every record after the first
  const records = raw
    .split(RECORD_SEPARATOR)
    .map((r) => r.replace(/^\n/, ''))
    .filter((r) => r.trim().length > 0);

  for (const record of records) {
    const fields = record.split(FIELD_SEPARATOR);

    if (fields.length !== IDENTITY_FIELDS) {
      errors.push({
        type: 'malformed_record',
        message: `Expected ${IDENTITY_FIELDS} fields, got ${fields.length}`,
        record: record.substring(0, 100),
      });
      continue;
    }

    const [hashRaw = '', authorName = '', authorEmail = '', committerName = '', committerEmail = ''] = fields;
    const hash = hashRaw.trim().toLowerCase();

    if (!isObjectId(hash)) {
      errors.push({
        type: 'invalid_hash',
        message: `Invalid commit hash: ${hash}`,
        record: record.substring(0, 100),
      });
      continue;
    }

    commits.push({
      hash,
      author: { name: authorName, email: authorEmail },
      committer: { name: committerName, email: committerEmail },
    });
  }

  return { commits, errors };
}

// ============================================
// TAG PARSING
// ============================================

/**
 * Parse `git tag --list` output into TagEntry objects
 *
 * Expects output from:
 * git tag --list --format=%(refname:short)%00%(objectname)%00%(objecttype)
 */
export function parseTags(raw: string): TagEntry[] {
  const tags: TagEntry[] = [];

  for (const line of raw.split('\n')) {
    if (line.trim().length === 0) continue;

    const [name, objectName, objectType] = line.split(FIELD_SEPARATOR);
    const objectId = objectName?.trim().toLowerCase() ?? '';

    if (!name || !isObjectId(objectId)) continue;

    tags.push({
      name,
      objectId,
      // objecttype 'tag' means annotated tag, 'commit' means lightweight
      isAnnotated: objectType?.trim() === 'tag',
    });
  }

  return tags;
}

// ============================================
// REMOTE PARSING
// ============================================

/**
 * Parse `git remote -v` output
 *
 * Lines look like:
 *   origin\thttps://example.com/repo.git (fetch)
 *   origin\thttps://example.com/repo.git (push)
 *
 * Remotes are returned in first-seen order. A remote with only one
 * direction listed uses that URL for both.
 */
export function parseRemotes(raw: string): RemoteEntry[] {
  const order: string[] = [];
  const urls = new Map<string, { fetch?: string; push?: string }>();

  for (const line of raw.split('\n')) {
    const match = /^(\S+)\s+(.+?)\s+\((fetch|push)\)\s*$/.exec(line);
    if (!match) continue;

    const [, name = '', url = '', direction] = match;
    let entry = urls.get(name);
    if (!entry) {
      entry = {};
      urls.set(name, entry);
      order.push(name);
    }

    if (direction === 'fetch') {
      entry.fetch = url;
    } else {
      entry.push = url;
    }
  }

  return order.flatMap((name) => {
    const entry = urls.get(name);
    const fetchUrl = entry?.fetch ?? entry?.push;
    if (!fetchUrl) return [];
    return [{ name, fetchUrl, pushUrl: entry?.push ?? fetchUrl }];
  });
}

// ============================================
// STATUS PARSING
// ============================================

/**
 * Parse `git status --porcelain` output
 */
export function parseStatus(raw: string): StatusEntry[] {
  return raw
    .split('\n')
    .filter((line) => line.trim().length > 0)
    .map((line) => ({
      code: line.slice(0, 2).trim(),
      path: line.slice(3),
    }));
}

// ============================================
// SCALAR PARSING
// ============================================

/**
 * Parse the output of `git rev-list --count`
 * Returns null when the output is not a count
 */
export function parseCount(raw: string): number | null {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    return null;
  }
  return parseInt(trimmed, 10);
}

/**
 * Parse a single object id (e.g. from `git rev-parse HEAD`)
 */
export function parseObjectId(raw: string): ObjectId | null {
  const trimmed = raw.trim().toLowerCase();
  return isObjectId(trimmed) ? trimmed : null;
}
