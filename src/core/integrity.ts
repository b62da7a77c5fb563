import { existsSync, statSync } from 'node:fs';
import { join } from 'node:path';
import type { Repository } from '../config/schema.js';
import type { GitBackend } from './git-backend.js';
import { IntegrityError, errorMessage } from './errors.js';
import { repoPath } from './repo-dir.js';

/**
 * Every existing checkout must be a git directory whose origin is the manifest URL.
 * The first mismatch aborts the run: once one path holds the wrong repository,
 * no path can be trusted.
 */
export async function validateIntegrity(repos: readonly Repository[], backend: GitBackend, baseDir: string = process.cwd()): Promise<void> {
  for (const repo of repos) {
    const dir = repoPath(baseDir, repo);
    if (!existsSync(dir)) continue;

    if (!statSync(dir).isDirectory()) {
      throw new IntegrityError(dir, `Target ${dir} exists and is not a directory.`);
    }
    if (!existsSync(join(dir, '.git'))) {
      throw new IntegrityError(dir, `Directory ${dir} exists but is not a git repository.`);
    }

    let currentUrl: string;
    try {
      currentUrl = await backend.open(dir).remoteUrl();
    } catch (err) {
      throw new IntegrityError(dir, `Directory ${dir} is a git repository but failed to get remote origin: ${errorMessage(err)}`);
    }

    if (currentUrl !== repo.url) {
      throw new IntegrityError(dir, `Directory ${dir} exists with different remote origin: ${currentUrl} (expected ${repo.url})`);
    }
  }
}
