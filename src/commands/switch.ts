import type { Command } from 'commander';
import chalk from 'chalk';
import { confirm } from '@inquirer/prompts';
import { isValidGitRef } from '../config/manifest.js';
import { AbortedError, ConfigError, FleetError } from '../core/errors.js';
import { Orchestrator } from '../core/orchestrator.js';
import { renderOperationResults, renderStatusTable } from '../ui/status-table.js';
import { addManifestOptions, addYesOption, prepareContext, runAction, type CommonOptions } from './common.js';

interface SwitchOptions extends CommonOptions {
  create?: string;
}

export function registerSwitch(program: Command): void {
  addYesOption(addManifestOptions(
    program
      .command('switch')
      .description('Switch every repository to the same branch')
      .argument('[branch]', 'Branch to switch to'),
  ))
    .option('-c, --create <branch>', 'Create the branch where it does not exist')
    .action(runAction(async (branchArg: string | undefined, opts: SwitchOptions) => {
      const branch = opts.create ?? branchArg;
      if (!branch) throw new ConfigError('invalid-option', 'Specify a branch, or -c <branch> to create one.');
      if (opts.create && branchArg && branchArg !== opts.create) {
        throw new ConfigError('invalid-option', 'Give the branch either as an argument or with -c, not both.');
      }
      if (!isValidGitRef(branch)) throw new ConfigError('invalid-ref', `Invalid git reference: ${branch}`);
      const create = opts.create !== undefined;

      const ctx = await prepareContext(opts);
      await ctx.orchestrator.validate(ctx.repos);

      const spinner = ctx.spinner(`Checking branch ${branch}...`);
      const checks = await ctx.orchestrator.precheckSwitch(ctx.repos, branch);
      spinner.stop();

      const plan = Orchestrator.planSwitch(checks, branch, create);
      if (plan.branchesDiffer) {
        const rows = await ctx.orchestrator.collect(ctx.repos);
        console.log(renderStatusTable(rows));
        console.log(chalk.yellow('Current branches differ across repositories.'));
        const ok = opts.yes || await confirm({ message: `Create ${branch} from these branches anyway?`, default: false });
        if (!ok) throw new AbortedError();
      }

      const switchSpinner = ctx.spinner(`Switching to ${branch}...`);
      const results = await ctx.orchestrator.switchBranch(checks, branch, (repo, message) => {
        switchSpinner.text = `${repo}: ${message}`;
      });
      const failed = results.filter((r) => r.status === 'error').length;
      if (failed > 0) switchSpinner.fail(`${failed} repo(s) failed to switch`);
      else switchSpinner.succeed(`Switched ${results.length} repo(s) to ${branch}`);

      console.log(renderOperationResults(results, 'switch'));
      if (failed > 0) throw new FleetError(`Some repositories could not switch to ${branch}.`);
    }));
}
