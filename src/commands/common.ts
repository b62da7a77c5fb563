import type { Command } from 'commander';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { confirm } from '@inquirer/prompts';
import { MANIFEST_FILENAME } from '../config/branding.js';
import { ManifestManager, parseLabels } from '../config/manifest.js';
import { findParentManifest } from '../config/manifest-search.js';
import { parseParallel, resolveGitPath, resolveParallel } from '../config/options.js';
import type { Repository } from '../config/schema.js';
import { FleetError, GitUnavailableError, errorMessage } from '../core/errors.js';
import type { GitBackend } from '../core/git-backend.js';
import { SimpleGitBackend } from '../core/git-operations.js';
import { Orchestrator } from '../core/orchestrator.js';

export interface CommonOptions {
  file?: string;
  parallel?: number;
  labels?: string;
  verbose?: boolean;
  yes?: boolean;
}

export interface CommandContext {
  repos: Repository[];
  orchestrator: Orchestrator;
  /** Start a spinner; disabled under --verbose so traces stay readable. */
  spinner(text: string): Ora;
}

let activeSpinner: Ora | undefined;

export function addManifestOptions(cmd: Command): Command {
  return cmd
    .option('-f, --file <path>', 'Manifest file (`-` reads standard input)')
    .option('-p, --parallel <n>', 'Repositories processed concurrently (1-128)', parseParallel)
    .option('-l, --labels <labels>', 'Only repositories with any of these comma-separated labels')
    .option('-v, --verbose', 'Print every git command with its duration');
}

export function addYesOption(cmd: Command): Command {
  return cmd.option('-y, --yes', 'Assume yes on prompts');
}

/** Git backend for the resolved executable, tracing to stderr when verbose. */
export function createBackend(verbose: boolean): SimpleGitBackend {
  return new SimpleGitBackend({
    gitPath: resolveGitPath(),
    trace: verbose ? (line) => console.error(chalk.dim(line)) : undefined,
  });
}

export async function ensureGit(backend: GitBackend): Promise<string> {
  try {
    return await backend.version();
  } catch (err) {
    throw new GitUnavailableError(backend.gitPath, errorMessage(err));
  }
}

export interface ManifestSource {
  /** Path for `ManifestManager.load`; undefined means the default in the working directory. */
  file: string | undefined;
  /** Directory the checkouts are resolved against. */
  baseDir: string;
}

export interface LocateOptions {
  yes?: boolean;
  verbose?: boolean;
  cwd?: string;
  ask?: (message: string) => Promise<boolean>;
}

/**
 * Pick the manifest to load. Without `-f`, a manifest beside the enclosing checkout is
 * offered when the working directory has none; its directory then holds the checkouts.
 */
export async function locateManifest(file: string | undefined, backend: GitBackend, options: LocateOptions = {}): Promise<ManifestSource> {
  const cwd = options.cwd ?? process.cwd();
  if (file !== undefined) return { file, baseDir: cwd };

  const search = await findParentManifest(backend, cwd);
  if (search.kind === 'invalid' && options.verbose) {
    console.error(chalk.dim(`Ignoring ${search.path}: ${search.reason}`));
  }
  if (search.kind !== 'found') return { file: undefined, baseDir: cwd };

  const ask = options.ask ?? ((message: string) => confirm({ message, default: true }));
  const accepted = options.yes || await ask(`No ${MANIFEST_FILENAME} here, but found one in ${search.baseDir}/. Use it?`);
  return accepted ? { file: search.path, baseDir: search.baseDir } : { file: undefined, baseDir: cwd };
}

/** Locate, load and filter the manifest, check git, and build the orchestrator. */
export async function prepareContext(opts: CommonOptions): Promise<CommandContext> {
  const verbose = opts.verbose ?? false;
  const backend = createBackend(verbose);
  const source = await locateManifest(opts.file, backend, { yes: opts.yes, verbose });
  const manifest = ManifestManager.load(source.file);
  const repos = manifest.filterByLabels(parseLabels(opts.labels));
  await ensureGit(backend);

  return {
    repos,
    orchestrator: new Orchestrator(backend, { baseDir: source.baseDir, parallel: resolveParallel(opts.parallel, verbose) }),
    spinner(text: string): Ora {
      activeSpinner = ora({ text, isEnabled: !verbose }).start();
      return activeSpinner;
    },
  };
}

/**
 * Wrap a command action: any error stops the spinner, is printed in red on stderr,
 * and ends the process with the error's exit code (1 when it has none).
 */
export function runAction<A extends unknown[]>(action: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await action(...args);
    } catch (err) {
      if (activeSpinner?.isSpinning) activeSpinner.stop();
      console.error(chalk.red(errorMessage(err)));
      process.exit(err instanceof FleetError ? err.exitCode : 1);
    }
  };
}
