import type { Command } from 'commander';
import chalk from 'chalk';
import { APP_NAME, APP_VERSION } from '../config/branding.js';
import { errorMessage } from '../core/errors.js';
import { createBackend } from './common.js';

export function registerVersion(program: Command): void {
  program
    .command('version')
    .description('Show tool version, git path and git version')
    .action(async () => {
      const backend = createBackend(false);
      console.log(`${APP_NAME} ${APP_VERSION}`);
      console.log(`git path: ${backend.gitPath}`);
      try {
        console.log(await backend.version());
      } catch (err) {
        console.log(chalk.yellow(`git not callable: ${errorMessage(err)}`));
      }
    });
}
