/**
 * Identity rewrite workflow
 *
 * Collector → Validator → Inspector → Strategy → Reconciler, strictly in
 * sequence. Validation and inspection never mutate; once the strategy
 * starts, its failure is fatal, and everything after it is best-effort.
 *
 * Running two workflows against the same repository at once is not
 * supported.
 */

import type { GitExecutor } from '../git/executor.js';
import { collectRequest, describeRewrite, validateRequest } from './request.js';
import { validateRepository } from './validator.js';
import { confirmRewrite, inspect } from './inspector.js';
import type { RewriteStrategy } from './strategies.js';
import { createStrategies, selectStrategy } from './strategies.js';
import { pushChanges, reportRewrittenHistory, restoreRemotes, verifyTags } from './reconciler.js';
import type {
  Prompter,
  Reporter,
  RewriteConfig,
  RewriteError,
  RewriteOutcome,
  RewriteRequest,
  StrategyName,
} from './types.js';
import { DEFAULT_REWRITE_CONFIG, exitCodeFor } from './types.js';

export interface WorkflowDependencies {
  readonly executor: GitExecutor;
  readonly prompter: Prompter;
  readonly reporter: Reporter;
  /** Defaults to filter-repo then filter-branch */
  readonly strategies?: readonly RewriteStrategy[];
  readonly config?: RewriteConfig;
}

export interface WorkflowOptions {
  /** Directory a relative or missing repository path resolves against */
  readonly cwd: string;
  /** Force one strategy instead of probing */
  readonly strategy?: StrategyName;
  /** Stop after inspection */
  readonly dryRun?: boolean;
  /** true/false decides whether to push without asking */
  readonly push?: boolean;
}

export type WorkflowStatus = 'completed' | 'noop' | 'cancelled' | 'failed' | 'dry-run';

export interface WorkflowResult {
  readonly status: WorkflowStatus;
  readonly exitCode: 0 | 1;
  readonly outcome?: RewriteOutcome;
  /** The error that stopped the workflow early */
  readonly error?: RewriteError;
  /** Non-fatal problems after the rewrite (e.g. PushFailed) */
  readonly warnings: readonly RewriteError[];
}

function statusFor(error: RewriteError): WorkflowStatus {
  switch (error.kind) {
    case 'EmptyRepository':
    case 'NoMatchingCommits':
      return 'noop';
    case 'UserCancelled':
      return 'cancelled';
    default:
      return 'failed';
  }
}

function stop(error: RewriteError, reporter: Reporter): WorkflowResult {
  const exitCode = exitCodeFor(error.kind);

  if (exitCode === 0) {
    reporter.warn(error.message);
  } else {
    reporter.error(`Error: ${error.message}`);
  }
  for (const line of error.details ?? []) {
    reporter.detail(line);
  }

  return { status: statusFor(error), exitCode, error, warnings: [] };
}

/**
 * Run one complete rewrite
 *
 * @param seed - Values already known (flags, environment, or a caller);
 *   anything missing is asked for through the prompter
 */
export async function runRewriteWorkflow(
  deps: WorkflowDependencies,
  seed: RewriteRequest,
  options: WorkflowOptions
): Promise<WorkflowResult> {
  const { executor, prompter, reporter } = deps;
  const config = deps.config ?? DEFAULT_REWRITE_CONFIG;
  const strategies = deps.strategies ?? createStrategies(executor);

  // 1. Collect and validate input
  const collected = await collectRequest(seed, prompter);
  if (!collected.ok) return stop(collected.error, reporter);

  const validated = validateRequest(collected.value);
  if (!validated.ok) return stop(validated.error, reporter);
  const rewrite = validated.value;

  // 2. Validate the repository
  reporter.step('REPOSITORY STATUS CHECK');
  const repository = await validateRepository(
    executor,
    collected.value.repositoryPath,
    options.cwd,
    prompter,
    reporter
  );
  if (!repository.ok) return stop(repository.error, reporter);
  const topLevelPath = repository.value.topLevelPath;
  reporter.info(`Repository: ${topLevelPath}`);

  // 3. Pick the strategy up front so inspection can explain its semantics
  const selected = await selectStrategy(strategies, options.strategy);
  if (!selected.ok) return stop(selected.error, reporter);
  const strategy = selected.value;

  // 4. Inspect
  for (const line of describeRewrite(rewrite)) {
    reporter.info(line);
  }

  const inspection = await inspect(executor, topLevelPath, rewrite, strategy.semantics, config, reporter);
  if (!inspection.ok) return stop(inspection.error, reporter);
  const { snapshot, upstreamId, affectedCommits } = inspection.value;

  if (options.dryRun) {
    reporter.info(`Dry run: git ${strategy.name} would rewrite ${affectedCommits} commits with:`);
    reporter.command(strategy.buildCommand(rewrite));
    return { status: 'dry-run', exitCode: 0, warnings: [] };
  }

  const confirmed = await confirmRewrite(prompter);
  if (!confirmed.ok) return stop(confirmed.error, reporter);

  // 5. Rewrite
  reporter.step('Starting email/name replacement...');
  const rewritten = await strategy.run(rewrite, {
    cwd: topLevelPath,
    timeout: config.rewriteTimeoutMs,
    reporter,
  });
  if (!rewritten.ok) return stop(rewritten.error, reporter);
  reporter.success('Email/name replacement completed!');

  // 6. Reconcile
  const tags = await verifyTags(executor, snapshot, reporter);
  await restoreRemotes(executor, snapshot, prompter, reporter);
  await reportRewrittenHistory(executor, snapshot, reporter);
  const pushed = await pushChanges(
    executor,
    snapshot,
    config,
    { push: options.push, upstreamId },
    prompter,
    reporter
  );

  for (const warning of pushed.warnings) {
    reporter.warn(warning.message);
    for (const line of warning.details ?? []) {
      reporter.detail(line);
    }
  }

  reporter.warn('Note: Commit hashes have changed due to metadata rewriting!');

  return {
    status: 'completed',
    exitCode: 0,
    outcome: {
      strategyUsed: strategy.name,
      commitsRewritten: affectedCommits,
      tagsRecreated: tags.recreated.map((t) => t.name),
    },
    warnings: pushed.warnings,
  };
}
