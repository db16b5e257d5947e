/**
 * Shared helpers for tests: throwaway repositories, a scripted prompter
 * and a reporter that records what it was told
 */

import { execFileSync } from 'node:child_process';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { Prompter, Reporter, SelectOption } from '../rewrite/types.js';

// ============================================
// TEMP REPOSITORIES
// ============================================

export interface Identity {
  readonly name: string;
  readonly email: string;
}

export const DEFAULT_IDENTITY: Identity = { name: 'Test User', email: 'test@example.com' };

/**
 * Run git synchronously and return trimmed stdout
 */
export function git(cwd: string, args: readonly string[], env: Record<string, string> = {}): string {
  return execFileSync('git', [...args], {
    cwd,
    encoding: 'utf-8',
    stdio: ['ignore', 'pipe', 'pipe'],
    env: { ...process.env, ...env },
  }).trim();
}

export async function makeTempDir(prefix = 'reauthor-test-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Fresh repository on branch "main" with no commits
 */
export async function createRepo(): Promise<string> {
  const path = await makeTempDir();
  git(path, ['init', '--quiet']);
  git(path, ['symbolic-ref', 'HEAD', 'refs/heads/main']);
  git(path, ['config', 'user.name', DEFAULT_IDENTITY.name]);
  git(path, ['config', 'user.email', DEFAULT_IDENTITY.email]);
  git(path, ['config', 'commit.gpgsign', 'false']);
  git(path, ['config', 'tag.gpgsign', 'false']);
  return path;
}

/**
 * Bare repository usable as a local remote
 */
export async function createBareRepo(): Promise<string> {
  const path = await makeTempDir('reauthor-remote-');
  git(path, ['init', '--quiet', '--bare']);
  git(path, ['symbolic-ref', 'HEAD', 'refs/heads/main']);
  return path;
}

let fileCounter = 0;

/**
 * Commit a new file with the given author and committer
 * @returns The new commit's hash
 */
export async function commit(
  repo: string,
  message: string,
  author: Identity = DEFAULT_IDENTITY,
  committer: Identity = author
): Promise<string> {
  fileCounter++;
  const file = `file-${fileCounter}.txt`;
  await writeFile(join(repo, file), `${message}\n`);
  git(repo, ['add', file]);
  git(repo, ['commit', '--quiet', '-m', message], {
    GIT_AUTHOR_NAME: author.name,
    GIT_AUTHOR_EMAIL: author.email,
    GIT_COMMITTER_NAME: committer.name,
    GIT_COMMITTER_EMAIL: committer.email,
  });
  return git(repo, ['rev-parse', 'HEAD']);
}

/**
 * "name <email>" for author and committer of every commit, newest first
 */
export function identities(repo: string, ref = '--all'): string[] {
  const out = git(repo, ['log', ref, '--format=%an <%ae>|%cn <%ce>']);
  return out.length > 0 ? out.split('\n') : [];
}

// ============================================
// PROMPTER
// ============================================

export interface PromptScript {
  /** Answers to ask(), in order */
  answers?: string[];
  /** Answers to confirm(), in order; defaultValue is used once exhausted */
  confirms?: boolean[];
  /** Option index chosen at each select(); null picks nothing */
  selections?: Array<number | null>;
}

export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];
  private readonly answers: string[];
  private readonly confirms: boolean[];
  private readonly selections: Array<number | null>;

  constructor(script: PromptScript = {}) {
    this.answers = [...(script.answers ?? [])];
    this.confirms = [...(script.confirms ?? [])];
    this.selections = [...(script.selections ?? [])];
  }

  async ask(question: string): Promise<string> {
    this.questions.push(question);
    return this.answers.shift() ?? '';
  }

  async confirm(question: string, defaultValue = false): Promise<boolean> {
    this.questions.push(question);
    return this.confirms.shift() ?? defaultValue;
  }

  async select<T>(message: string, options: readonly SelectOption<T>[]): Promise<T | null> {
    this.questions.push(message);
    const index = this.selections.shift();
    if (index === undefined || index === null) {
      return null;
    }
    return options[index]?.value ?? null;
  }
}

// ============================================
// REPORTER
// ============================================

export type ReportLevel = 'step' | 'info' | 'detail' | 'success' | 'warn' | 'error' | 'command';

export interface ReportLine {
  readonly level: ReportLevel;
  readonly message: string;
}

export class RecordingReporter implements Reporter {
  readonly lines: ReportLine[] = [];
  readonly commands: Array<readonly string[]> = [];

  step(title: string): void {
    this.lines.push({ level: 'step', message: title });
  }

  info(message: string): void {
    this.lines.push({ level: 'info', message });
  }

  detail(message: string): void {
    this.lines.push({ level: 'detail', message });
  }

  success(message: string): void {
    this.lines.push({ level: 'success', message });
  }

  warn(message: string): void {
    this.lines.push({ level: 'warn', message });
  }

  error(message: string): void {
    this.lines.push({ level: 'error', message });
  }

  command(args: readonly string[]): void {
    this.commands.push(args);
    this.lines.push({ level: 'command', message: args.join(' ') });
  }

  messages(level: ReportLevel): string[] {
    return this.lines.filter((line) => line.level === level).map((line) => line.message);
  }
}
