/**
 * Core Git data types for reauthor
 * These types are UI-agnostic and represent parsed Git state
 */

// ============================================
// BRANDED TYPES
// ============================================

/**
 * Git object id (full 40-char SHA-1 or 64-char SHA-256)
 * Branded type prevents accidental string mixing
 */
export type ObjectId = string & { readonly __brand: 'ObjectId' };

/**
 * Type guard to validate an object id
 */
export function isObjectId(value: string): value is ObjectId {
  return /^(?:[a-f0-9]{40}|[a-f0-9]{64})$/.test(value);
}

/**
 * Create an ObjectId from a string (validates format)
 */
export function toObjectId(value: string): ObjectId {
  const trimmed = value.trim().toLowerCase();
  if (!isObjectId(trimmed)) {
    throw new Error(`Invalid object id: ${value}`);
  }
  return trimmed;
}

// ============================================
// GIT ENTITIES
// ============================================

/**
 * Author/committer identity
 */
export interface GitIdentity {
  readonly name: string;
  readonly email: string;
}

/**
 * The identity fields of one commit, as read from `git log`
 */
export interface CommitIdentity {
  readonly hash: ObjectId;
  readonly author: GitIdentity;
  readonly committer: GitIdentity;
}

/**
 * A tag and the object it points at
 * For annotated tags objectId is the tag object, not the commit
 */
export interface TagEntry {
  readonly name: string;
  readonly objectId: ObjectId;
  readonly isAnnotated: boolean;
}

/**
 * A configured remote
 */
export interface RemoteEntry {
  readonly name: string;
  readonly fetchUrl: string;
  readonly pushUrl: string;
}

/**
 * One line of `git status --porcelain`
 */
export interface StatusEntry {
  readonly code: string;
  readonly path: string;
}

// ============================================
// COMMAND EXECUTION TYPES
// ============================================

/**
 * Raw output from git commands before parsing
 */
export interface RawGitOutput {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly command: string;
  readonly args: readonly string[];
  readonly durationMs: number;
}

/**
 * Git error categories
 */
export type GitErrorType =
  | 'not_a_repo'
  | 'command_failed'
  | 'parse_error'
  | 'timeout'
  | 'unsafe_command'
  | 'git_not_found';

/**
 * Structured Git error
 */
export interface GitError {
  readonly type: GitErrorType;
  readonly message: string;
  readonly command?: string;
  readonly args?: readonly string[];
  readonly stderr?: string;
  readonly exitCode?: number;
}

/**
 * Result type for Git operations
 */
export type GitResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: GitError };

/**
 * Helper to create success result
 */
export function ok<T>(value: T): GitResult<T> {
  return { ok: true, value };
}

/**
 * Helper to create error result
 */
export function err<T>(error: GitError): GitResult<T> {
  return { ok: false, error };
}

// ============================================
// CONFIGURATION
// ============================================

/**
 * Options for command execution
 */
export interface ExecuteOptions {
  readonly cwd: string;
  readonly timeout?: number;
  /** Extra environment variables layered over the minimal git environment */
  readonly env?: Readonly<Record<string, string>>;
}
