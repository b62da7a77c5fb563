import type { Command } from 'commander';
import { resolve } from 'node:path';
import chalk from 'chalk';
import ora from 'ora';
import { MANIFEST_FILENAME } from '../config/branding.js';
import { ManifestManager } from '../config/manifest.js';
import { Snapshotter } from '../core/snapshot.js';
import { createBackend, ensureGit, runAction } from './common.js';

interface FreezeOptions {
  file: string;
  verbose?: boolean;
}

export function registerFreeze(program: Command): void {
  program
    .command('freeze')
    .description('Write a manifest describing the checkouts in the current directory')
    .option('-f, --file <path>', 'Output manifest (.json, .yaml or .yml)', MANIFEST_FILENAME)
    .option('-v, --verbose', 'Print every git command with its duration')
    .action(runAction(async (opts: FreezeOptions) => {
      const verbose = opts.verbose ?? false;
      const backend = createBackend(verbose);
      await ensureGit(backend);

      const target = resolve(opts.file);
      const spinner = ora({ text: 'Scanning checkouts...', isEnabled: !verbose }).start();
      const { manifest, warnings } = await new Snapshotter(backend).capture((dir) => {
        spinner.text = `Scanning ${dir}...`;
      });
      spinner.stop();

      for (const w of warnings) console.error(chalk.yellow(w));
      ManifestManager.write(manifest, target);
      console.log(chalk.green(`✓ Wrote ${manifest.repositories.length} repo(s) to ${target}`));
    }));
}
