import { simpleGit, type SimpleGit } from 'simple-git';
import type { PullStrategy } from '../config/schema.js';
import type { GitBackend, RepoGit } from './git-backend.js';

/** Receives one line per git invocation when tracing is on. */
export type CommandTracer = (line: string) => void;

export interface SimpleGitBackendOptions {
  gitPath?: string;
  trace?: CommandTracer;
}

/**
 * Git backend that shells out to the git executable through simple-git.
 * Any non-zero exit is an error, including the silent ones (`show-ref --quiet`,
 * `config --get`), so callers can tell "absent" from "empty".
 */
export class SimpleGitBackend implements GitBackend {
  readonly gitPath: string;
  private readonly trace?: CommandTracer;
  private instances: Map<string, GitOperations> = new Map();

  constructor(options: SimpleGitBackendOptions = {}) {
    this.gitPath = options.gitPath ?? 'git';
    this.trace = options.trace;
  }

  open(dir: string): GitOperations {
    let ops = this.instances.get(dir);
    if (!ops) {
      ops = new GitOperations(this.createGit(dir), this.gitPath, this.trace);
      this.instances.set(dir, ops);
    }
    return ops;
  }

  async clone(url: string, dir: string, options: { depth?: number } = {}): Promise<void> {
    const args = ['clone'];
    if (options.depth !== undefined) args.push('--depth', String(options.depth));
    args.push(url, dir);
    await runTraced(this.createGit(), this.gitPath, args, this.trace);
  }

  async workTreeRoot(dir: string): Promise<string | null> {
    try {
      return await runTraced(this.createGit(dir), this.gitPath, ['rev-parse', '--show-toplevel'], this.trace);
    } catch {
      return null;
    }
  }

  async version(): Promise<string> {
    const out = await runTraced(this.createGit(), this.gitPath, ['--version'], this.trace);
    return out.split('\n')[0] ?? '';
  }

  private createGit(baseDir?: string): SimpleGit {
    return simpleGit({
      baseDir: baseDir ?? process.cwd(),
      binary: this.gitPath,
      maxConcurrentProcesses: 1,
      errors(error, result) {
        if (error) return error;
        if (result.exitCode === 0) return undefined;
        const stderr = Buffer.concat(result.stdErr).toString('utf-8').trim();
        return new Error(stderr || `git exited with code ${result.exitCode}`);
      },
    });
  }
}

/**
 * Git operations for a single checkout.
 * Wraps simple-git's raw runner; read methods map failures to null.
 */
export class GitOperations implements RepoGit {
  private git: SimpleGit;
  private gitPath: string;
  private trace?: CommandTracer;

  constructor(git: SimpleGit, gitPath: string, trace?: CommandTracer) {
    this.git = git;
    this.gitPath = gitPath;
    this.trace = trace;
  }

  private run(args: string[]): Promise<string> {
    return runTraced(this.git, this.gitPath, args, this.trace);
  }

  private async tryRun(args: string[]): Promise<string | null> {
    try {
      return await this.run(args);
    } catch {
      return null;
    }
  }

  // ─── State Inspection ──────────────────────────────────────────────

  currentBranch(): Promise<string | null> {
    return this.tryRun(['rev-parse', '--abbrev-ref', 'HEAD']);
  }

  shortHash(): Promise<string | null> {
    return this.tryRun(['rev-parse', '--short', 'HEAD']);
  }

  headHash(): Promise<string | null> {
    return this.revParse('HEAD');
  }

  revParse(ref: string): Promise<string | null> {
    return this.tryRun(['rev-parse', ref]);
  }

  async remoteHash(branch: string): Promise<string | null> {
    const out = await this.tryRun(['ls-remote', 'origin', `refs/heads/${branch}`]);
    return out === null ? null : parseLsRemote(out);
  }

  async countCommits(from: string, to: string): Promise<number | null> {
    const out = await this.tryRun(['rev-list', '--count', `${from}..${to}`]);
    return out === null ? null : parseCount(out);
  }

  remoteUrl(): Promise<string> {
    return this.run(['config', '--get', 'remote.origin.url']);
  }

  async originUrl(): Promise<string | null> {
    return (await this.tryRun(['remote', 'get-url', 'origin']))
      ?? this.tryRun(['config', '--get', 'remote.origin.url']);
  }

  async mergeBase(a: string, b: string): Promise<string | null> {
    const out = await this.tryRun(['merge-base', a, b]);
    return out ? out : null;
  }

  async mergeConflicts(base: string, ours: string, theirs: string): Promise<boolean> {
    const out = await this.tryRun(['merge-tree', base, ours, theirs]);
    return out !== null && out.includes('<<<<<<<');
  }

  async refExists(ref: string): Promise<boolean> {
    return (await this.tryRun(['show-ref', '--verify', '--quiet', ref])) !== null;
  }

  async verifyRev(rev: string): Promise<boolean> {
    return (await this.tryRun(['rev-parse', '--verify', '--quiet', rev])) !== null;
  }

  // ─── Write ────────────────────────────────────────────────────────

  async fetch(ref?: string): Promise<void> {
    await this.run(ref === undefined ? ['fetch', 'origin'] : ['fetch', 'origin', ref]);
  }

  async checkout(ref: string, options: { create?: boolean; startPoint?: string } = {}): Promise<void> {
    if (options.startPoint) {
      await this.run(['checkout', '-B', ref, options.startPoint]);
    } else if (options.create) {
      await this.run(['checkout', '-b', ref]);
    } else {
      await this.run(['checkout', ref]);
    }
  }

  pull(strategy: PullStrategy): Promise<string> {
    const args = ['pull'];
    if (strategy === 'merge') args.push('--no-rebase');
    if (strategy === 'rebase') args.push('--rebase');
    return this.run(args);
  }

  push(branch: string): Promise<string> {
    return this.run(['push', 'origin', branch]);
  }

  async setUpstream(branch: string): Promise<void> {
    await this.run(['branch', `--set-upstream-to=origin/${branch}`, branch]);
  }

  async reset(target: string): Promise<void> {
    await this.run(['reset', target]);
  }
}

// ─── Output parsing ─────────────────────────────────────────────────

/** First whitespace-separated token of `ls-remote` output, or null when empty. */
export function parseLsRemote(output: string): string | null {
  const [hash] = output.trim().split(/\s+/);
  return hash ? hash : null;
}

export function parseCount(output: string): number | null {
  const n = Number.parseInt(output.trim(), 10);
  return Number.isNaN(n) ? null : n;
}

async function runTraced(git: SimpleGit, gitPath: string, args: string[], trace?: CommandTracer): Promise<string> {
  const start = Date.now();
  try {
    return (await git.raw(args)).trim();
  } finally {
    trace?.(`[CMD] ${gitPath} ${args.join(' ')} (${(Date.now() - start).toLocaleString('en-US')}ms)`);
  }
}
