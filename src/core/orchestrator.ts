import { existsSync } from 'node:fs';
import type { OperationResult, PullStrategy, Repository, StatusRow } from '../config/schema.js';
import type { GitBackend, RepoGit } from './git-backend.js';
import { FleetError, errorMessage } from './errors.js';
import { validateIntegrity } from './integrity.js';
import { runPool } from './pool.js';
import { repoPath, resolveRepoDir } from './repo-dir.js';
import { StatusCollector, compareNames, type CollectOptions } from './status-collector.js';

export interface OrchestratorOptions {
  /** Directory the checkouts live in. Defaults to the working directory. */
  baseDir?: string;
  /** Maximum concurrent repositories. */
  parallel?: number;
}

export type ProgressCallback = (repo: string, message: string) => void;

// ─── Plans ──────────────────────────────────────────────────────────

export interface SyncPlan {
  conflicts: StatusRow[];
  pullable: StatusRow[];
  /** Some pullable checkout also has unpushed commits, so merge vs. rebase matters. */
  needsStrategy: boolean;
  /** Checkouts whose branch does not exist on the remote. */
  skipped: StatusRow[];
}

export type PushPlan =
  | { kind: 'conflict'; rows: StatusRow[] }
  | { kind: 'sync-required'; rows: StatusRow[] }
  | { kind: 'nothing' }
  | { kind: 'push'; rows: StatusRow[] };

export interface SwitchCheck {
  repo: Repository;
  name: string;
  dir: string;
  checkoutExists: boolean;
  currentBranch: string | null;
  /** Branch exists locally or on origin. */
  hasBranch: boolean;
}

export interface ResetPlan {
  name: string;
  dir: string;
  /** Current branch, or `HEAD (detached)`. */
  localBranch: string;
  /** Resolved reset target: the configured ref, or `origin/<ref>` when only the remote has it. */
  target: string;
}

export interface SwitchPlan {
  /** Checkouts where the branch will be created. */
  toCreate: SwitchCheck[];
  /** Current branches differ across checkouts (only checked when creating). */
  branchesDiffer: boolean;
}

/**
 * Coordinates multi-repo operations: init (clone + checkout), sync (pull),
 * push and branch switching. Prompts stay with the command handlers; this class
 * plans and executes.
 */
export class Orchestrator {
  private backend: GitBackend;
  private baseDir: string;
  private parallel: number;
  private collector: StatusCollector;

  constructor(backend: GitBackend, options: OrchestratorOptions = {}) {
    this.backend = backend;
    this.baseDir = options.baseDir ?? process.cwd();
    this.parallel = options.parallel ?? 1;
    this.collector = new StatusCollector(backend, this.baseDir);
  }

  // ─── Status ───────────────────────────────────────────────────────

  validate(repos: readonly Repository[]): Promise<void> {
    return validateIntegrity(repos, this.backend, this.baseDir);
  }

  collect(repos: readonly Repository[], options: CollectOptions = {}): Promise<StatusRow[]> {
    return this.collector.collectAll(repos, this.parallel, options);
  }

  // ─── Init ─────────────────────────────────────────────────────────

  /** Clone missing checkouts and check out each configured ref. Failures are per repo. */
  async init(repos: readonly Repository[], options: { depth?: number } = {}, onProgress?: ProgressCallback): Promise<OperationResult[]> {
    return runPool(repos, this.parallel, async (repo): Promise<OperationResult> => {
      const name = resolveRepoDir(repo);
      try {
        return { repo: name, status: 'success', message: await this.initRepo(repo, options.depth, onProgress) };
      } catch (err) {
        return { repo: name, status: 'error', message: errorMessage(err) };
      }
    });
  }

  private async initRepo(repo: Repository, depth: number | undefined, onProgress?: ProgressCallback): Promise<string> {
    const name = resolveRepoDir(repo);
    const dir = repoPath(this.baseDir, repo);
    const steps: string[] = [];

    if (existsSync(dir)) {
      steps.push('already cloned');
    } else {
      onProgress?.(name, `cloning ${repo.url}...`);
      await this.backend.clone(repo.url, dir, { depth });
      steps.push(depth !== undefined ? `cloned (depth ${depth})` : 'cloned');
    }

    const git = this.backend.open(dir);
    if (repo.revision) {
      onProgress?.(name, `checking out ${repo.revision}...`);
      if (repo.branch) {
        await git.checkout(repo.branch, { startPoint: repo.revision });
        steps.push(`branch ${repo.branch} at ${repo.revision}`);
      } else {
        await git.checkout(repo.revision);
        steps.push(`detached at ${repo.revision}`);
      }
    } else if (repo.branch) {
      onProgress?.(name, `switching to ${repo.branch}...`);
      await git.checkout(repo.branch);
      steps.push(`on ${repo.branch}`);
    }
    return steps.join(', ');
  }

  // ─── Sync ─────────────────────────────────────────────────────────

  static planSync(rows: readonly StatusRow[]): SyncPlan {
    const pullable = rows.filter((r) => r.isPullable);
    return {
      conflicts: rows.filter((r) => r.hasConflict),
      pullable,
      needsStrategy: pullable.some((r) => r.sync === 'unpushed'),
      skipped: rows.filter((r) => isOnBranch(r) && r.remoteHead === ''),
    };
  }

  /** Pull each row in order, stopping at the first failure. */
  async pullAll(rows: readonly StatusRow[], strategy: PullStrategy, onProgress?: ProgressCallback): Promise<OperationResult[]> {
    const results: OperationResult[] = [];
    for (const row of rows) {
      onProgress?.(row.repo, 'pulling...');
      try {
        await this.backend.open(row.repoDir).pull(strategy);
        results.push({ repo: row.repo, status: 'success', message: `Pulled ${row.branchName}` });
      } catch (err) {
        results.push({ repo: row.repo, status: 'error', message: errorMessage(err) });
        break;
      }
    }
    return results;
  }

  // ─── Push ─────────────────────────────────────────────────────────

  static planPush(rows: readonly StatusRow[]): PushPlan {
    const conflicts = rows.filter((r) => r.hasConflict);
    if (conflicts.length > 0) return { kind: 'conflict', rows: conflicts };

    const behind = rows.filter((r) => r.isPullable);
    if (behind.length > 0) return { kind: 'sync-required', rows: behind };

    const pushable = rows.filter((r) => r.sync === 'unpushed' && isOnBranch(r));
    return pushable.length === 0 ? { kind: 'nothing' } : { kind: 'push', rows: pushable };
  }

  /** Push every row; a failed push does not stop the others. */
  async pushAll(rows: readonly StatusRow[], onProgress?: ProgressCallback): Promise<OperationResult[]> {
    const results: OperationResult[] = [];
    for (const row of rows) {
      onProgress?.(row.repo, `pushing ${row.branchName}...`);
      try {
        await this.backend.open(row.repoDir).push(row.branchName);
        results.push({ repo: row.repo, status: 'success', message: `Pushed origin/${row.branchName}` });
      } catch (err) {
        results.push({ repo: row.repo, status: 'error', message: errorMessage(err) });
      }
    }
    return results;
  }

  // ─── Reset ────────────────────────────────────────────────────────

  /**
   * Resolve every reset target and check it shares history with HEAD.
   * All checkouts are examined; the first problem found is rethrown, prefixed with the repo name.
   */
  async planReset(repos: readonly Repository[]): Promise<ResetPlan[]> {
    const plans = await runPool(repos, this.parallel, async (repo): Promise<ResetPlan> => {
      const name = resolveRepoDir(repo);
      const dir = repoPath(this.baseDir, repo);
      try {
        if (!existsSync(dir)) throw new FleetError(`Repository directory ${dir} does not exist.`);
        const git = this.backend.open(dir);
        const target = await resolveRevision(git, resolveResetTarget(repo));

        let localBranch = 'HEAD (detached)';
        const head = await git.headHash();
        if (head) {
          if (!(await git.mergeBase(head, target))) {
            throw new FleetError(`Incompatible history between HEAD and '${target}'.`);
          }
          const branch = await git.currentBranch();
          if (branch && branch !== 'HEAD') localBranch = branch;
        }
        return { name, dir, localBranch, target };
      } catch (err) {
        throw new FleetError(`[${name}] ${errorMessage(err)}`);
      }
    });
    return plans.sort((a, b) => compareNames(a.name, b.name));
  }

  /** Mixed-reset each checkout in plan order, stopping at the first failure. */
  async resetAll(plans: readonly ResetPlan[], onProgress?: ProgressCallback): Promise<OperationResult[]> {
    const results: OperationResult[] = [];
    for (const plan of plans) {
      onProgress?.(plan.name, `resetting to ${plan.target}...`);
      try {
        await this.backend.open(plan.dir).reset(plan.target);
        results.push({ repo: plan.name, status: 'success', message: `Reset to ${plan.target}` });
      } catch (err) {
        results.push({ repo: plan.name, status: 'error', message: errorMessage(err) });
        break;
      }
    }
    return results;
  }

  // ─── Switch ───────────────────────────────────────────────────────

  /** Current branch and branch availability per checkout, gathered in parallel. */
  precheckSwitch(repos: readonly Repository[], branch: string): Promise<SwitchCheck[]> {
    return runPool(repos, this.parallel, async (repo) => {
      const dir = repoPath(this.baseDir, repo);
      const check: SwitchCheck = {
        repo, name: resolveRepoDir(repo), dir,
        checkoutExists: existsSync(dir), currentBranch: null, hasBranch: false,
      };
      if (!check.checkoutExists) return check;

      const git = this.backend.open(dir);
      check.currentBranch = await git.currentBranch();
      check.hasBranch = (await git.refExists(`refs/heads/${branch}`)) || (await remoteBranchAvailable(git, branch));
      return check;
    });
  }

  static planSwitch(checks: readonly SwitchCheck[], branch: string, create: boolean): SwitchPlan {
    const absent = checks.find((c) => !c.checkoutExists);
    if (absent) {
      throw new FleetError(`Repository directory ${absent.dir} does not exist.`);
    }

    if (!create) {
      const missing = checks.filter((c) => !c.hasBranch);
      if (missing.length > 0) {
        const lines = missing.map((c) => ` - ${c.repo.url} (${c.dir})`);
        throw new FleetError([`Branch '${branch}' missing in repositories:`, ...lines].join('\n'));
      }
    }

    const currentBranches = new Set(checks.map((c) => c.currentBranch ?? ''));
    return {
      toCreate: create ? checks.filter((c) => !c.hasBranch) : [],
      branchesDiffer: create && currentBranches.size > 1,
    };
  }

  /** Check out (or create) the branch everywhere, then track origin where that is safe. */
  switchBranch(checks: readonly SwitchCheck[], branch: string, onProgress?: ProgressCallback): Promise<OperationResult[]> {
    return runPool(checks, this.parallel, async (check): Promise<OperationResult> => {
      const git = this.backend.open(check.dir);
      try {
        if (check.hasBranch) {
          onProgress?.(check.name, `switching to branch ${branch}...`);
          await git.checkout(branch);
        } else {
          onProgress?.(check.name, `creating and switching to branch ${branch}...`);
          await git.checkout(branch, { create: true });
        }
      } catch (err) {
        return { repo: check.name, status: 'error', message: `Error switching branch for ${check.dir}: ${errorMessage(err)}` };
      }

      const verb = check.hasBranch ? 'Switched to' : 'Created';
      const upstream = await configureUpstreamIfSafe(git, branch);
      return { repo: check.name, status: 'success', message: `${verb} ${branch}${upstream}` };
    });
  }
}

/** Reset target by priority: revision, then base branch, then branch. */
export function resolveResetTarget(repo: Repository): string {
  const target = repo.revision || repo['base-branch'] || repo.branch;
  if (!target) {
    throw new FleetError(`No target (revision, base-branch, or branch) specified for repository ${resolveRepoDir(repo)}`);
  }
  return target;
}

/** Make `target` resolvable locally, fetching from origin when needed. */
async function resolveRevision(git: RepoGit, target: string): Promise<string> {
  if (await git.verifyRev(target)) return target;

  let fetchError: string | undefined;
  try {
    await git.fetch(target);
  } catch {
    // not a fetchable ref name (e.g. an abbreviated hash): fetch everything instead
    try {
      await git.fetch();
    } catch (err) {
      fetchError = errorMessage(err);
    }
  }
  if (await git.verifyRev(target)) return target;

  const remoteTarget = `origin/${target}`;
  if (await git.verifyRev(remoteTarget)) return remoteTarget;
  const detail = fetchError ? ` (fetch failed: ${fetchError})` : '';
  throw new FleetError(`Target '${target}' (or '${remoteTarget}') not found.${detail}`);
}

function isOnBranch(row: StatusRow): boolean {
  return row.branchName !== '' && row.branchName !== 'HEAD';
}

/** Fetch the branch from origin and report whether a remote-tracking ref now exists. */
async function remoteBranchAvailable(git: RepoGit, branch: string): Promise<boolean> {
  try {
    await git.fetch(branch);
  } catch {
    return false;
  }
  return git.refExists(`refs/remotes/origin/${branch}`);
}

/**
 * Track origin/<branch> when the remote branch exists and is either identical to
 * HEAD or merges into it without conflicts. Returns a suffix for the result message.
 */
export async function configureUpstreamIfSafe(git: RepoGit, branch: string): Promise<string> {
  if (!(await remoteBranchAvailable(git, branch))) return '';

  const local = await git.headHash();
  const remote = await git.revParse(`refs/remotes/origin/${branch}`);
  if (!local || !remote) return '';

  if (local !== remote) {
    const base = await git.mergeBase(local, remote);
    if (!base || (await git.mergeConflicts(base, local, remote))) {
      return ' (upstream not set: diverges from origin)';
    }
  }

  try {
    await git.setUpstream(branch);
  } catch (err) {
    return ` (upstream not set: ${errorMessage(err)})`;
  }
  return ` (tracking origin/${branch})`;
}
