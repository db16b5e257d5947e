#!/usr/bin/env node
/**
 * reauthor CLI
 *
 * Rewrites the author/committer email and name across a repository's
 * history, then restores tags and remotes and offers to force-push.
 *
 * Usage:
 *   reauthor [options] [path]
 */

import { createGitExecutor } from '../git/executor.js';
import { runRewriteWorkflow } from '../rewrite/workflow.js';
import type { RewriteConfig } from '../rewrite/types.js';
import { DEFAULT_REWRITE_CONFIG } from '../rewrite/types.js';
import { ArgumentError, parseArgs, shouldUseColors, toRequestSeed } from './args.js';
import type { CliArgs } from './args.js';
import { createConsolePrompter, withAutoConfirm } from './prompts.js';
import { createConsoleReporter, renderBanner } from './render.js';

// ============================================
// HELP TEXT
// ============================================

const HELP_TEXT = `
reauthor - Rewrite commit author/committer identities

Usage:
  reauthor [options] [path]

Identity Options:
  --old-email <email>   Email to replace (env: OLD_EMAIL)
  --new-email <email>   Replacement email (env: NEW_EMAIL)
  --old-name <name>     Name to replace (env: OLD_NAME)
  --new-name <name>     Replacement name (env: NEW_NAME)

  Anything not given is asked for interactively. The repository is
  REPO_PATH when set, otherwise [path], otherwise the current directory.

Rewrite Options:
  --strategy <name>     filter-repo or filter-branch (default: filter-repo
                        when installed, otherwise filter-branch)
  --dry-run             Inspect and show the rewrite command, change nothing
  -y, --yes             Answer yes to every confirmation
  --push                Force-push (with lease) after the rewrite
  --no-push             Never push; --yes implies this unless --push is given
  --timeout <seconds>   Limit for fetch and push (default: 60)
  --git <path>          git executable to use

General Options:
  --no-color            Disable colors
  -h, --help            Show this help message
  -v, --version         Show version

Only one rewrite may run against a repository at a time.

Examples:
  reauthor --old-email old@example.com --new-email new@example.com
  OLD_NAME="Old Name" NEW_NAME="New Name" reauthor ~/projects/myrepo
  reauthor --dry-run --old-email old@example.com --new-email new@example.com
`;

const VERSION = '0.1.0';

// ============================================
// MAIN
// ============================================

function configFrom(args: CliArgs): RewriteConfig {
  if (args.timeoutSeconds === undefined) {
    return DEFAULT_REWRITE_CONFIG;
  }
  return { ...DEFAULT_REWRITE_CONFIG, remoteTimeoutMs: Math.round(args.timeoutSeconds * 1000) };
}

async function main(): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof ArgumentError) {
      console.error(`Error: ${error.message}`);
      console.error(`Run 'reauthor --help' for usage.`);
      return 1;
    }
    throw error;
  }

  if (args.command === 'help') {
    console.log(HELP_TEXT);
    return 0;
  }

  if (args.command === 'version') {
    console.log(`reauthor v${VERSION}`);
    return 0;
  }

  const useColors = shouldUseColors(args, process.env, process.stdout.isTTY === true);
  const reporter = createConsoleReporter(useColors);
  const consolePrompter = createConsolePrompter(useColors);
  const prompter = args.yes ? withAutoConfirm(consolePrompter) : consolePrompter;

  console.log(renderBanner(useColors));

  try {
    const result = await runRewriteWorkflow(
      {
        executor: createGitExecutor(args.gitPath),
        prompter,
        reporter,
        config: configFrom(args),
      },
      toRequestSeed(args, process.env),
      {
        cwd: process.cwd(),
        strategy: args.strategy,
        dryRun: args.dryRun,
        push: args.push ?? (args.yes ? false : undefined),
      }
    );
    return result.exitCode;
  } finally {
    consolePrompter.close();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
