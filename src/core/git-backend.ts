import type { PullStrategy } from '../config/schema.js';

/**
 * Git operations scoped to one checkout.
 *
 * Read methods resolve to `null` (or `false`) when the underlying git command fails,
 * so one repository's transient error never aborts a multi-repo scan. Write methods
 * reject with the git error.
 */
export interface RepoGit {
  // ─── Read ──────────────────────────────────────────────────────────

  /** `rev-parse --abbrev-ref HEAD`; the literal `HEAD` when detached. */
  currentBranch(): Promise<string | null>;
  /** `rev-parse --short HEAD` */
  shortHash(): Promise<string | null>;
  /** `rev-parse HEAD` */
  headHash(): Promise<string | null>;
  /** `rev-parse <ref>` */
  revParse(ref: string): Promise<string | null>;
  /** Head of `refs/heads/<branch>` on origin via ls-remote; `null` when absent. */
  remoteHash(branch: string): Promise<string | null>;
  /** `rev-list --count <from>..<to>` */
  countCommits(from: string, to: string): Promise<number | null>;
  /** `config --get remote.origin.url`. Rejects when unset. */
  remoteUrl(): Promise<string>;
  /** `remote get-url origin`, falling back to the config value. */
  originUrl(): Promise<string | null>;
  mergeBase(a: string, b: string): Promise<string | null>;
  /** Whether a three-way merge of `ours` and `theirs` from `base` leaves conflict markers. */
  mergeConflicts(base: string, ours: string, theirs: string): Promise<boolean>;
  /** `show-ref --verify --quiet <ref>` */
  refExists(ref: string): Promise<boolean>;
  /** `rev-parse --verify <rev>`: whether any revision (branch, tag, hash) resolves. */
  verifyRev(rev: string): Promise<boolean>;

  // ─── Write ─────────────────────────────────────────────────────────

  /** `fetch origin [<ref>]` */
  fetch(ref?: string): Promise<void>;
  /** Check out `ref`; `create` uses `-b`, `startPoint` uses `-B <ref> <startPoint>`. */
  checkout(ref: string, options?: { create?: boolean; startPoint?: string }): Promise<void>;
  pull(strategy: PullStrategy): Promise<string>;
  push(branch: string): Promise<string>;
  setUpstream(branch: string): Promise<void>;
  /** Mixed reset: moves HEAD and the index, keeps the working tree. */
  reset(target: string): Promise<void>;
}

export interface GitBackend {
  /** Path of the git executable this backend runs. */
  readonly gitPath: string;
  /** Operations for an existing checkout directory. */
  open(dir: string): RepoGit;
  clone(url: string, dir: string, options?: { depth?: number }): Promise<void>;
  /** `rev-parse --show-toplevel` from `dir`; `null` outside a work tree. */
  workTreeRoot(dir: string): Promise<string | null>;
  /** `git --version` first line; rejects when git cannot be run. */
  version(): Promise<string>;
}
