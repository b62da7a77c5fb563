import type { Command } from 'commander';
import chalk from 'chalk';
import { select } from '@inquirer/prompts';
import type { OperationResult, PullStrategy } from '../config/schema.js';
import { AbortedError, FleetError } from '../core/errors.js';
import { Orchestrator, type SyncPlan } from '../core/orchestrator.js';
import { renderOperationResults, renderStatusTable } from '../ui/status-table.js';
import { addManifestOptions, addYesOption, prepareContext, runAction, type CommonOptions } from './common.js';

type StrategyChoice = 'merge' | 'rebase' | 'abort';

function askStrategy(): Promise<StrategyChoice> {
  return select({
    message: 'Some repositories have both local and remote changes. How should they be pulled?',
    choices: [
      { name: 'Merge', value: 'merge' },
      { name: 'Rebase', value: 'rebase' },
      { name: 'Abort', value: 'abort' },
    ] as const,
  });
}

/**
 * Pull strategy for a sync plan. Diverged checkouts need an explicit choice;
 * `--yes` picks merge (`pull --no-rebase`).
 */
export async function resolvePullStrategy(
  plan: SyncPlan,
  yes: boolean,
  ask: () => Promise<StrategyChoice> = askStrategy,
): Promise<PullStrategy> {
  if (!plan.needsStrategy) return 'default';
  if (yes) return 'merge';
  const choice = await ask();
  if (choice === 'abort') throw new AbortedError();
  return choice;
}

export function registerSync(program: Command): void {
  addYesOption(addManifestOptions(
    program
      .command('sync')
      .description('Pull remote changes into every repository that is behind'),
  ))
    .action(runAction(async (opts: CommonOptions) => {
      const ctx = await prepareContext(opts);
      await ctx.orchestrator.validate(ctx.repos);

      const spinner = ctx.spinner('Fetching and collecting status...');
      const rows = await ctx.orchestrator.collect(ctx.repos, { refine: true });
      spinner.stop();

      const plan = Orchestrator.planSync(rows);
      if (plan.conflicts.length > 0) {
        console.log(renderStatusTable(rows));
        throw new FleetError('Conflicts detected. Cannot sync.');
      }

      const skipped: OperationResult[] = plan.skipped.map((row) => ({
        repo: row.repo, status: 'skipped', message: 'No remote branch',
      }));

      if (plan.pullable.length === 0) {
        console.log(chalk.green('Everything is up to date.'));
        if (skipped.length > 0) console.log(renderOperationResults(skipped, 'sync'));
        return;
      }

      if (plan.needsStrategy) console.log(renderStatusTable(rows));
      const strategy = await resolvePullStrategy(plan, opts.yes ?? false);

      const pullSpinner = ctx.spinner(`Pulling ${plan.pullable.length} repo(s)...`);
      const results = await ctx.orchestrator.pullAll(plan.pullable, strategy, (repo, message) => {
        pullSpinner.text = `${repo}: ${message}`;
      });
      const failure = results.find((r) => r.status === 'error');
      if (failure) pullSpinner.fail(`Pull failed in ${failure.repo}`);
      else pullSpinner.succeed(`Pulled ${results.length} repo(s)`);

      console.log(renderOperationResults([...results, ...skipped], 'sync'));
      if (failure) throw new FleetError(`Sync stopped at ${failure.repo}.`);
    }));
}
