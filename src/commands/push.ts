import type { Command } from 'commander';
import chalk from 'chalk';
import { confirm } from '@inquirer/prompts';
import { AbortedError, FleetError } from '../core/errors.js';
import { Orchestrator } from '../core/orchestrator.js';
import { renderOperationResults, renderStatusTable } from '../ui/status-table.js';
import { addManifestOptions, addYesOption, prepareContext, runAction, type CommonOptions } from './common.js';

export function registerPush(program: Command): void {
  addYesOption(addManifestOptions(
    program
      .command('push')
      .description('Push unpushed commits of every repository to origin'),
  ))
    .action(runAction(async (opts: CommonOptions) => {
      const ctx = await prepareContext(opts);
      await ctx.orchestrator.validate(ctx.repos);

      const spinner = ctx.spinner('Fetching and collecting status...');
      const rows = await ctx.orchestrator.collect(ctx.repos, { refine: true });
      spinner.stop();
      console.log(renderStatusTable(rows));

      const plan = Orchestrator.planPush(rows);
      if (plan.kind === 'conflict') throw new FleetError('Conflicts detected. Cannot push.');
      if (plan.kind === 'sync-required') throw new FleetError('Sync required.');
      if (plan.kind === 'nothing') {
        console.log(chalk.green('No repositories to push.'));
        return;
      }

      console.log(chalk.bold('\n  Push Plan:'));
      for (const row of plan.rows) console.log(chalk.dim(`    ${row.repo}: ${row.branchName} → origin/${row.branchName}`));

      const ok = opts.yes || await confirm({ message: `Push ${plan.rows.length} repo(s)?`, default: true });
      if (!ok) throw new AbortedError('Push aborted.', 0);

      const pushSpinner = ctx.spinner(`Pushing ${plan.rows.length} repo(s)...`);
      const results = await ctx.orchestrator.pushAll(plan.rows, (repo, message) => {
        pushSpinner.text = `${repo}: ${message}`;
      });
      const failed = results.filter((r) => r.status === 'error').length;
      if (failed > 0) pushSpinner.fail(`${failed} push(es) failed`);
      else pushSpinner.succeed(`Pushed ${results.length} repo(s)`);

      console.log(renderOperationResults(results, 'push'));
      if (failed > 0) throw new FleetError('Some pushes failed.');
    }));
}
