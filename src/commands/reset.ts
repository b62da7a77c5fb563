import type { Command } from 'commander';
import chalk from 'chalk';
import { confirm } from '@inquirer/prompts';
import { FleetError } from '../core/errors.js';
import { renderOperationResults, renderResetPlan } from '../ui/status-table.js';
import { addManifestOptions, addYesOption, prepareContext, runAction, type CommonOptions } from './common.js';

export function registerReset(program: Command): void {
  addYesOption(addManifestOptions(
    program
      .command('reset')
      .description('Reset every repository to its configured revision, base branch or branch (mixed reset)'),
  ))
    .action(runAction(async (opts: CommonOptions) => {
      const ctx = await prepareContext(opts);
      await ctx.orchestrator.validate(ctx.repos);

      const spinner = ctx.spinner('Resolving reset targets...');
      const plans = await ctx.orchestrator.planReset(ctx.repos);
      spinner.stop();

      if (opts.yes) {
        console.log(chalk.dim('Skipping confirmation due to --yes.'));
      } else {
        console.log(renderResetPlan(plans));
        const ok = await confirm({
          message: 'Reset these repositories? Working tree changes are kept (mixed reset).',
          default: false,
        });
        if (!ok) {
          console.log('Aborted.');
          return;
        }
      }

      const resetSpinner = ctx.spinner(`Resetting ${plans.length} repo(s)...`);
      const results = await ctx.orchestrator.resetAll(plans, (repo, message) => {
        resetSpinner.text = `${repo}: ${message}`;
      });
      const failure = results.find((r) => r.status === 'error');
      if (failure) resetSpinner.fail(`Reset failed in ${failure.repo}`);
      else resetSpinner.succeed(`Reset ${results.length} repo(s)`);

      console.log(renderOperationResults(results, 'reset'));
      if (failure) throw new FleetError(`Reset stopped at ${failure.repo}.`);
    }));
}
