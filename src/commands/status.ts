import type { Command } from 'commander';
import { renderStatusTable } from '../ui/status-table.js';
import { addManifestOptions, prepareContext, runAction, type CommonOptions } from './common.js';

interface StatusOptions extends CommonOptions {
  fetch?: boolean;
}

export function registerStatus(program: Command): void {
  addManifestOptions(
    program
      .command('status')
      .description('Show local vs. remote state of every repository'),
  )
    .option('--fetch', 'Fetch remote branches to detect pullable commits and conflicts', false)
    .action(runAction(async (opts: StatusOptions) => {
      const ctx = await prepareContext(opts);
      await ctx.orchestrator.validate(ctx.repos);

      const spinner = ctx.spinner(opts.fetch ? 'Fetching and collecting status...' : 'Collecting status...');
      const rows = await ctx.orchestrator.collect(ctx.repos, { refine: opts.fetch });
      spinner.stop();

      console.log(renderStatusTable(rows));
    }));
}
