import type { Command } from 'commander';
import { parseDepth } from '../config/options.js';
import { FleetError } from '../core/errors.js';
import { renderOperationResults } from '../ui/status-table.js';
import { addManifestOptions, prepareContext, runAction, type CommonOptions } from './common.js';

interface InitOptions extends CommonOptions {
  depth?: number;
}

export function registerInit(program: Command): void {
  addManifestOptions(
    program
      .command('init')
      .description('Clone missing repositories and check out their configured refs'),
  )
    .option('--depth <n>', 'Create shallow clones with this many commits', parseDepth)
    .action(runAction(async (opts: InitOptions) => {
      const ctx = await prepareContext(opts);
      await ctx.orchestrator.validate(ctx.repos);

      const spinner = ctx.spinner(`Initializing ${ctx.repos.length} repo(s)...`);
      const results = await ctx.orchestrator.init(ctx.repos, { depth: opts.depth }, (repo, message) => {
        spinner.text = `${repo}: ${message}`;
      });

      const failed = results.filter((r) => r.status === 'error').length;
      if (failed > 0) spinner.fail(`${failed} of ${results.length} repo(s) failed`);
      else spinner.succeed(`Initialized ${results.length} repo(s)`);

      console.log(renderOperationResults(results, 'init'));
      if (failed > 0) throw new FleetError('Some repositories could not be initialized.');
    }));
}
