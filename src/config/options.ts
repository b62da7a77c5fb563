import { join } from 'node:path';
import { InvalidArgumentError } from 'commander';
import { ENV_GIT_EXEC_PATH } from './branding.js';

export const MIN_PARALLEL = 1;
export const MAX_PARALLEL = 128;
export const DEFAULT_PARALLEL = 1;

/** Commander argParser for `-p, --parallel <n>`. */
export function parseParallel(value: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new InvalidArgumentError('Parallel must be an integer.');
  }
  const n = Number.parseInt(value, 10);
  if (n < MIN_PARALLEL) throw new InvalidArgumentError(`Parallel must be at least ${MIN_PARALLEL}.`);
  if (n > MAX_PARALLEL) throw new InvalidArgumentError(`Parallel must be at most ${MAX_PARALLEL}.`);
  return n;
}

/** Commander argParser for `--depth <n>`. */
export function parseDepth(value: string): number {
  const n = Number.parseInt(value, 10);
  if (!/^\d+$/.test(value.trim()) || n < 1) {
    throw new InvalidArgumentError('Depth must be a positive integer.');
  }
  return n;
}

/**
 * Effective worker count. `undefined` means the flag was not given.
 * Verbose runs are serialized so command traces stay readable.
 */
export function resolveParallel(requested: number | undefined, verbose: boolean): number {
  if (verbose) return 1;
  return requested ?? DEFAULT_PARALLEL;
}

/** The git executable: `$GIT_EXEC_PATH/git` when set, else `git` from PATH. */
export function resolveGitPath(env: NodeJS.ProcessEnv = process.env): string {
  const dir = env[ENV_GIT_EXEC_PATH];
  return dir ? join(dir, 'git') : 'git';
}
