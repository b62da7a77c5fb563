import chalk from 'chalk';
import Table from 'cli-table3';
import type { OperationResult, StatusRow } from '../config/schema.js';
import type { ResetPlan } from '../core/orchestrator.js';

export const STATUS_LEGEND = 'Status Legend: < Pullable, > Unpushed, ! Conflict';

const STATUS_HEAD = ['Repository', 'Config Ref', 'Local Branch/Rev', 'Remote Rev', 'Status'];

/** Status cell symbols; the conflict marker takes the place of the pullable one. */
export function statusSymbols(row: StatusRow): string {
  const parts: string[] = [];
  if (row.sync === 'unpushed') parts.push(chalk.green('>'));
  if (row.hasConflict) parts.push(chalk.yellow('!'));
  else if (row.isPullable) parts.push(chalk.yellow('<'));
  return parts.length === 0 ? '-' : parts.join(' ');
}

/** Bordered status table followed by the legend line. */
export function renderStatusTable(rows: readonly StatusRow[]): string {
  const table = new Table({
    head: STATUS_HEAD.map((h) => chalk.bold(h)),
    style: { head: [], border: [] },
  });

  for (const row of rows) {
    const remoteRev = row.isPullable ? chalk.yellow(row.remoteRev) : row.remoteRev;
    table.push([row.repo, row.configRef, row.localBranchRev, remoteRev, statusSymbols(row)]);
  }

  return `${table.toString()}\n${chalk.dim(STATUS_LEGEND)}`;
}

/** Where each checkout stands and where `reset` will move it. */
export function renderResetPlan(plans: readonly ResetPlan[]): string {
  const table = new Table({
    head: ['Repository', 'Local Branch', 'Target Branch/Revision'].map((h) => chalk.bold(h)),
    style: { head: [], border: [] },
  });
  for (const p of plans) table.push([p.name, p.localBranch, chalk.cyan(p.target)]);
  return table.toString();
}

/** Results of a mutating operation (init, sync, push, switch) as a table. */
export function renderOperationResults(results: readonly OperationResult[], operation: string): string {
  const table = new Table({
    head: [chalk.dim('Repo'), chalk.dim('Status'), chalk.dim('Details')],
    chars: {
      top: '', 'top-mid': '', 'top-left': '', 'top-right': '',
      bottom: '', 'bottom-mid': '', 'bottom-left': '', 'bottom-right': '',
      left: '  ', 'left-mid': '', mid: '', 'mid-mid': '',
      right: '', 'right-mid': '', middle: chalk.dim(' │ '),
    },
    style: { head: [], border: [] },
  });

  for (const r of results) {
    const statusStr = r.status === 'success' ? chalk.green('✓ Success')
      : r.status === 'error' ? chalk.red('✗ Error')
      : chalk.dim('- Skipped');
    table.push([r.repo, statusStr, r.message]);
  }

  return `${chalk.bold(`\n  ${operation.toUpperCase()} RESULTS\n`)}\n${table.toString()}\n`;
}
