/**
 * Data types for the identity rewrite workflow
 *
 * Everything here lives for one invocation only; the durable state is the
 * repository itself.
 */

import type { RemoteEntry, TagEntry } from '../git/types.js';

// ============================================
// REQUEST
// ============================================

/**
 * Raw rewrite parameters, as collected from flags, environment or prompts
 * Empty strings are treated the same as missing values
 */
export interface RewriteRequest {
  readonly repositoryPath?: string;
  readonly oldEmail?: string;
  readonly newEmail?: string;
  readonly oldName?: string;
  readonly newName?: string;
}

/**
 * A single old → new substitution
 */
export interface Replacement {
  readonly from: string;
  readonly to: string;
}

/**
 * A validated request: every replacement present is fully paired
 * and at least one of them is present
 */
export type IdentityRewrite =
  | { readonly email: Replacement; readonly name?: Replacement }
  | { readonly email?: Replacement; readonly name: Replacement };

// ============================================
// INSPECTION
// ============================================

export interface RepositorySnapshot {
  readonly topLevelPath: string;
  readonly hasCommits: boolean;
  /** "HEAD" when detached */
  readonly currentBranch: string;
  /** Upstream of the current branch, e.g. "origin/main" */
  readonly upstream: string | null;
  readonly tags: readonly TagEntry[];
  readonly remotes: readonly RemoteEntry[];
  /** Commits on the current branch not yet on its remote counterpart */
  readonly aheadCount?: number;
}

/**
 * Commits whose author identity matches the requested old values
 *
 * Exact counts drive the proceed / nothing-to-do decision. Partial counts
 * are authors that contain the old value inside a longer field; only a
 * substring-replacing strategy touches those.
 */
export interface MatchCounts {
  readonly emailMatches: number;
  readonly nameMatches: number;
  readonly partialEmailMatches: number;
  readonly partialNameMatches: number;
  /** Commits matched exactly by their committer but not their author */
  readonly committerOnlyMatches: number;
}

// ============================================
// OUTCOME
// ============================================

export type StrategyName = 'filter-repo' | 'filter-branch';

/**
 * How a strategy decides whether a field is rewritten
 * - substring: every occurrence of the old value inside the field is replaced
 * - exact: the field is replaced only when it equals the old value
 */
export type ReplacementSemantics = 'substring' | 'exact';

export interface RewriteOutcome {
  readonly strategyUsed: StrategyName;
  readonly commitsRewritten: number;
  readonly tagsRecreated: readonly string[];
}

// ============================================
// ERRORS
// ============================================

export type RewriteErrorKind =
  | 'PathNotFound'
  | 'NotARepository'
  | 'EmptyRepository'
  | 'InvalidInput'
  | 'InvalidEmailFormat'
  | 'UserCancelled'
  | 'NoMatchingCommits'
  | 'RewriteToolFailed'
  | 'PushFailed'
  | 'GitFailed';

export interface RewriteError {
  readonly kind: RewriteErrorKind;
  readonly message: string;
  /** Extra lines shown under the message (tool output, remediation steps) */
  readonly details?: readonly string[];
}

/**
 * Result type for workflow phases
 */
export type RewriteResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: RewriteError };

export function success<T>(value: T): RewriteResult<T> {
  return { ok: true, value };
}

export function failure<T>(
  kind: RewriteErrorKind,
  message: string,
  details?: readonly string[]
): RewriteResult<T> {
  return { ok: false, error: details ? { kind, message, details } : { kind, message } };
}

/**
 * Kinds that end the workflow early without it being an error
 */
const INFORMATIONAL_KINDS: ReadonlySet<RewriteErrorKind> = new Set([
  'EmptyRepository',
  'NoMatchingCommits',
  'UserCancelled',
  'PushFailed',
]);

export function isInformational(kind: RewriteErrorKind): boolean {
  return INFORMATIONAL_KINDS.has(kind);
}

/**
 * Process exit code for a workflow that stopped with this error
 */
export function exitCodeFor(kind: RewriteErrorKind): 0 | 1 {
  return isInformational(kind) ? 0 : 1;
}

// ============================================
// CONFIGURATION
// ============================================

export interface RewriteConfig {
  /** Remote used for fetch and push when several are configured */
  readonly preferredRemote: string;
  /** Upper bound on fetch and push; expiry is reported as a warning */
  readonly remoteTimeoutMs: number;
  /** Upper bound on the history rewrite itself */
  readonly rewriteTimeoutMs: number;
}

export const DEFAULT_REWRITE_CONFIG: RewriteConfig = Object.freeze({
  preferredRemote: 'origin',
  remoteTimeoutMs: 60_000,
  rewriteTimeoutMs: 60 * 60 * 1000,
});

// ============================================
// EDGE ADAPTERS
// ============================================

export interface SelectOption<T> {
  readonly label: string;
  readonly value: T;
}

/**
 * Interactive input, kept at the edge so the workflow runs without a terminal
 */
export interface Prompter {
  /** Read one line of free text */
  ask(question: string): Promise<string>;
  /** Yes/no question */
  confirm(question: string, defaultValue?: boolean): Promise<boolean>;
  /** Numbered menu; null when the answer matches no option */
  select<T>(message: string, options: readonly SelectOption<T>[]): Promise<T | null>;
}

/**
 * Status output sink
 */
export interface Reporter {
  /** Section header */
  step(title: string): void;
  info(message: string): void;
  /** Indented secondary line */
  detail(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Echo a git command before it runs */
  command(args: readonly string[]): void;
}
