import { existsSync } from 'node:fs';
import type { Repository, StatusRow, SyncState } from '../config/schema.js';
import type { GitBackend, RepoGit } from './git-backend.js';
import { repoPath, resolveRepoDir } from './repo-dir.js';
import { runPool } from './pool.js';

const SHORT_HASH_LENGTH = 7;

export interface CollectOptions {
  /** Fetch the remote branch and compute pullable/conflict flags. */
  refine?: boolean;
}

/**
 * Computes a StatusRow per repository from read-only git queries.
 * Checkouts that do not exist yet are skipped.
 */
export class StatusCollector {
  private backend: GitBackend;
  private baseDir: string;

  constructor(backend: GitBackend, baseDir: string = process.cwd()) {
    this.backend = backend;
    this.baseDir = baseDir;
  }

  /** Collect every repository with a bounded pool; rows sorted by display name. */
  async collectAll(repos: readonly Repository[], parallel: number, options: CollectOptions = {}): Promise<StatusRow[]> {
    const collected = await runPool(repos, parallel, (repo) => this.collect(repo, options));
    const rows = collected.filter((row): row is StatusRow => row !== null);
    return rows.sort((a, b) => compareNames(a.repo, b.repo));
  }

  /** Status of one checkout, or null when its directory is missing. */
  async collect(repo: Repository, options: CollectOptions = {}): Promise<StatusRow | null> {
    const dir = repoPath(this.baseDir, repo);
    if (!existsSync(dir)) return null;

    const git = this.backend.open(dir);

    const branchName = (await git.currentBranch()) ?? '';
    const isDetached = branchName === 'HEAD';
    const shortHash = (await git.shortHash()) ?? '';
    const localHead = (await git.headHash()) ?? '';

    let remoteHead = '';
    if (!isDetached && branchName !== '') {
      remoteHead = (await git.remoteHash(branchName)) ?? '';
    }

    let sync: SyncState = 'clean';
    if (remoteHead !== '' && localHead !== '') {
      if (remoteHead !== localHead) {
        const ahead = await git.countCommits(remoteHead, localHead);
        if (ahead !== null && ahead > 0) sync = 'unpushed';
      }
    } else if (!isDetached && remoteHead === '') {
      // Nothing on the remote yet: every local commit is unpublished
      sync = 'unpushed';
    }

    const row: StatusRow = {
      repo: resolveRepoDir(repo),
      configRef: joinRef(repo.branch, repo.revision),
      localBranchRev: joinRef(branchName, shortHash),
      remoteRev: remoteHead.slice(0, SHORT_HASH_LENGTH),
      branchName,
      localHead,
      remoteHead,
      sync,
      isPullable: false,
      hasConflict: false,
      repoDir: dir,
    };

    if (options.refine) await refine(git, row);
    return row;
  }
}

/**
 * Pullable/conflict detection. Fetches the branch first so the remote commit is
 * available locally; any failure leaves both flags false.
 */
async function refine(git: RepoGit, row: StatusRow): Promise<void> {
  if (row.branchName === '' || row.branchName === 'HEAD') return;
  if (row.remoteHead === '' || row.localHead === '' || row.remoteHead === row.localHead) return;

  try {
    await git.fetch(row.branchName);
  } catch {
    return;
  }

  // Recount now that the remote commit is local
  if (row.sync === 'clean') {
    const ahead = await git.countCommits(row.remoteHead, row.localHead);
    if (ahead !== null && ahead > 0) row.sync = 'unpushed';
  }

  const behind = await git.countCommits(row.localHead, row.remoteHead);
  if (behind === null || behind === 0) return;
  row.isPullable = true;

  const base = await git.mergeBase(row.localHead, row.remoteHead);
  if (base) {
    row.hasConflict = await git.mergeConflicts(base, row.localHead, row.remoteHead);
  }
}

/** `a/b` when both parts are set, else whichever is set. */
export function joinRef(first: string | null | undefined, second: string | null | undefined): string {
  if (first && second) return `${first}/${second}`;
  return first || second || '';
}

/** Plain code-unit ordering, independent of locale. */
export function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
