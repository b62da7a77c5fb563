import { readdirSync, statSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import type { Manifest, Repository } from '../config/schema.js';
import type { GitBackend } from './git-backend.js';

/**
 * Result of scanning a workspace for checkouts.
 */
export interface SnapshotResult {
  manifest: Manifest;
  /** Directories that were skipped, with the reason. */
  warnings: string[];
}

/**
 * Builds a manifest from the git checkouts found directly under a workspace directory.
 */
export class Snapshotter {
  private readonly rootDir: string;
  private readonly backend: GitBackend;

  constructor(backend: GitBackend, rootDir: string = process.cwd()) {
    this.backend = backend;
    this.rootDir = rootDir;
  }

  /** Immediate subdirectories that contain `.git`, sorted by name. */
  findCheckouts(): string[] {
    const found: string[] = [];
    for (const entry of readdirSync(this.rootDir).sort()) {
      const fullPath = join(this.rootDir, entry);
      try {
        if (!statSync(fullPath).isDirectory()) continue;
      } catch {
        continue; // vanished or unreadable
      }
      if (existsSync(join(fullPath, '.git'))) found.push(entry);
    }
    return found;
  }

  async capture(onProgress?: (dir: string) => void): Promise<SnapshotResult> {
    const repositories: Repository[] = [];
    const warnings: string[] = [];

    for (const dirName of this.findCheckouts()) {
      onProgress?.(dirName);
      const git = this.backend.open(join(this.rootDir, dirName));

      const url = await git.originUrl();
      if (!url) {
        warnings.push(`Could not get remote origin for ${dirName}, skipping.`);
        continue;
      }

      const repo: Repository = { id: dirName, url };
      const branch = await git.currentBranch();
      if (branch === null) {
        warnings.push(`Could not get current branch for ${dirName}.`);
      } else if (branch === 'HEAD') {
        const revision = await git.headHash();
        if (revision) repo.revision = revision;
        else warnings.push(`Could not get revision for ${dirName}.`);
      } else {
        repo.branch = branch;
      }
      repositories.push({ ...repo, labels: [] });
    }

    return { manifest: { repositories }, warnings };
  }
}
