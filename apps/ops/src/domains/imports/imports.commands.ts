import { Command } from 'commander';
import chalk from 'chalk';
import Table from 'cli-table3';
import { DebtorReportStatus } from '@pharmaops/shared/constants/imports.constants.js';
import { reconciliationOptionsSchema } from '@pharmaops/shared/schemas/validation/imports.validation.js';
import type { ImportBatch } from './repos/debtor-import.repo.js';
import type { ServiceRunner } from '../../context.js';
import { parseInput, toNumber } from '../../lib/validate.js';
import { formatAmount, formatTimestamp, heading } from '../../lib/format.js';

function statusCell(status: string | null): string {
  switch (status) {
    case DebtorReportStatus.COMPLETED:
      return chalk.green(status);
    case DebtorReportStatus.PROCESSING:
      return chalk.yellow(status);
    case DebtorReportStatus.FAILED:
      return chalk.red(status);
    default:
      return status ?? '-';
  }
}

function batchTable(batches: ImportBatch[]): string {
  const table = new Table({
    head: [
      chalk.bold('Batch'),
      chalk.bold('Pharmacy'),
      chalk.bold('File'),
      chalk.bold('Uploaded'),
      chalk.bold('Status'),
      chalk.bold('Claimed'),
      chalk.bold('Linked'),
    ],
    style: { head: [], border: [] },
  });
  for (const batch of batches) {
    table.push([
      String(batch.id),
      `${batch.pharmacyName ?? '?'} (${batch.pharmacyId})`,
      batch.filename,
      formatTimestamp(batch.uploadedAt),
      statusCell(batch.status),
      String(batch.claimedCount),
      batch.derivedCount === 0 ? chalk.red('0') : String(batch.derivedCount),
    ]);
  }
  return table.toString();
}

/**
 * `imports` command group: debtor import batches against the debtor rows
 * linked to them.
 */
export function createImportsCommand(run: ServiceRunner): Command {
  const imports = new Command('imports').description(
    'Reconcile debtor import batches against imported debtor rows',
  );

  imports
    .command('check')
    .description('Batches that claimed accounts but linked none, and the last good batch')
    .option('--limit <n>', 'Problematic batches to show (1-100, default 5)', toNumber)
    .action(async (options: { limit?: number }) => {
      const { limit } = parseInput(reconciliationOptionsSchema, options);
      const report = await run((services) => services.reconciliation.check(limit));

      console.log(heading('Problematic batches'));
      if (report.problematic.length === 0) {
        console.log(chalk.green('None: every batch that claimed accounts has linked debtor rows.'));
      } else {
        console.log(batchTable(report.problematic));
      }

      console.log('');
      console.log(heading('Last successful batch'));
      if (report.lastSuccessful) {
        console.log(batchTable([report.lastSuccessful]));
      } else {
        console.log(chalk.red('No import batch has any linked debtor rows.'));
      }
    });

  imports
    .command('recent')
    .description('The newest import batches with claimed and linked counts')
    .option('--limit <n>', 'Batches to show (1-100, default 5)', toNumber)
    .action(async (options: { limit?: number }) => {
      const { limit } = parseInput(reconciliationOptionsSchema, options);
      const batches = await run((services) => services.reconciliation.listRecentBatches(limit));

      console.log(heading(`Recent import batches (last ${limit})`));
      if (batches.length === 0) {
        console.log(chalk.yellow('No debtor import batches found.'));
        return;
      }
      console.log(batchTable(batches));

      for (const batch of batches) {
        if (batch.errorMessage) {
          console.log(chalk.red(`Batch ${batch.id} error: ${batch.errorMessage}`));
        }
        if (batch.unlinked) {
          console.log(
            chalk.yellow(
              `Batch ${batch.id} claims ${batch.claimedCount} accounts but has no linked debtor rows.`,
            ),
          );
        }
      }
    });

  imports
    .command('last')
    .description('The most recent import batch, batches per pharmacy and debtor totals')
    .action(async () => {
      const summary = await run((services) => services.reconciliation.getImportSummary());

      console.log(heading('Last import'));
      const latest = summary.latest;
      if (!latest) {
        console.log(chalk.yellow('No debtor import batches found.'));
      } else {
        console.log(batchTable([latest]));
        console.log(`Uploaded by: ${latest.uploadedByUsername ?? '-'}`);
        console.log(`Outstanding: ${formatAmount(latest.totalOutstanding)}`);
        if (latest.errorMessage) {
          console.log(chalk.red(`Error: ${latest.errorMessage}`));
        }
      }

      console.log('');
      console.log(heading('Batches by pharmacy'));
      const byPharmacy = new Table({
        head: [chalk.bold('Pharmacy'), chalk.bold('Batches'), chalk.bold('Last import')],
        style: { head: [], border: [] },
      });
      for (const entry of summary.byPharmacy) {
        byPharmacy.push([
          `${entry.pharmacyName} (${entry.pharmacyId})`,
          String(entry.batchCount),
          formatTimestamp(entry.lastImport),
        ]);
      }
      console.log(byPharmacy.toString());

      console.log('');
      console.log(heading('Debtor totals'));
      console.log(`Pharmacies with debtors: ${summary.totals.pharmacyCount}`);
      console.log(`Debtor accounts: ${summary.totals.debtorCount}`);
      console.log(`Outstanding: ${formatAmount(summary.totals.totalOutstanding)}`);
    });

  imports
    .command('schema')
    .description('Columns and constraints of the debtor table')
    .action(async () => {
      const description = await run((services) => services.reconciliation.describeDerivedTable());

      console.log(heading(`${description.table} columns`));
      const columns = new Table({
        head: [chalk.bold('Column'), chalk.bold('Type'), chalk.bold('Nullable')],
        style: { head: [], border: [] },
      });
      for (const column of description.columns) {
        columns.push([column.name, column.dataType, column.nullable ? 'yes' : 'no']);
      }
      console.log(columns.toString());

      console.log('');
      console.log(heading(`${description.table} constraints`));
      if (description.constraints.length === 0) {
        console.log(chalk.dim('No constraints found.'));
        return;
      }
      for (const constraint of description.constraints) {
        console.log(`${constraint.name} (${constraint.type}): ${constraint.definition}`);
      }
    });

  return imports;
}
