import { join, posix } from 'node:path';
import type { Repository } from '../config/schema.js';

/**
 * Checkout directory name for a manifest entry: the explicit id, or the URL's last
 * path segment without a trailing `.git`. Used as a map key, so it must stay pure.
 */
export function resolveRepoDir(repo: Pick<Repository, 'id' | 'url'>): string {
  if (repo.id) return repo.id;
  const url = repo.url.replace(/\/+$/, '');
  // URLs always use forward slashes, whatever the host platform
  return posix.basename(url).replace(/\.git$/, '');
}

/** Absolute checkout path under the workspace base directory. */
export function repoPath(baseDir: string, repo: Pick<Repository, 'id' | 'url'>): string {
  return join(baseDir, resolveRepoDir(repo));
}
