import { existsSync } from 'node:fs';
import { dirname, join } from 'node:path';
import type { GitBackend } from '../core/git-backend.js';
import { errorMessage } from '../core/errors.js';
import { repoPath, resolveRepoDir } from '../core/repo-dir.js';
import { MANIFEST_FILENAME } from './branding.js';
import { ManifestManager } from './manifest.js';

export type ParentManifestSearch =
  | { kind: 'none' }
  | { kind: 'invalid'; path: string; reason: string }
  | { kind: 'found'; path: string; baseDir: string };

/**
 * When the working directory has no default manifest but sits inside a checkout,
 * look for one next to that checkout (in the git root's parent). The candidate only
 * counts when every repository it lists is already checked out there with the
 * expected origin.
 */
export async function findParentManifest(backend: GitBackend, cwd: string = process.cwd()): Promise<ParentManifestSearch> {
  if (existsSync(join(cwd, MANIFEST_FILENAME))) return { kind: 'none' };

  const root = await backend.workTreeRoot(cwd);
  if (!root) return { kind: 'none' };

  const baseDir = dirname(root);
  const path = join(baseDir, MANIFEST_FILENAME);
  if (!existsSync(path)) return { kind: 'none' };

  const reason = await checkParentManifest(backend, path, baseDir);
  return reason === null ? { kind: 'found', path, baseDir } : { kind: 'invalid', path, reason };
}

/** First reason the manifest at `path` does not describe `baseDir`, or null when it does. */
async function checkParentManifest(backend: GitBackend, path: string, baseDir: string): Promise<string | null> {
  let manifest: ManifestManager;
  try {
    manifest = ManifestManager.load(path);
  } catch (err) {
    return errorMessage(err);
  }

  for (const repo of manifest.repositories) {
    const name = resolveRepoDir(repo);
    const dir = repoPath(baseDir, repo);
    if (!existsSync(dir)) return `directory ${name} not found`;
    if (!existsSync(join(dir, '.git'))) return `${name} is not a git repository`;

    const origin = await backend.open(dir).originUrl();
    if (origin === null) return `failed to get remote url for ${name}`;
    if (stripGitSuffix(origin) !== stripGitSuffix(repo.url)) {
      return `URL mismatch for ${name}: expected ${repo.url}, got ${origin}`;
    }
  }
  return null;
}

function stripGitSuffix(url: string): string {
  return url.trim().replace(/\.git$/, '');
}
