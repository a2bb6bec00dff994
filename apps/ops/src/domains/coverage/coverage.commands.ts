import { Command } from 'commander';
import chalk from 'chalk';
import Table from 'cli-table3';
import {
  REPORT_KINDS,
  REPORT_KIND_DEFINITIONS,
  CoverageSortOrder,
} from '@pharmaops/shared/constants/coverage.constants.js';
import { coverageExportSchema } from '@pharmaops/shared/schemas/validation/coverage.validation.js';
import type { CoverageRow } from './services/coverage.service.js';
import { writeCoverageExports, type FileStorage } from './services/coverage-export.service.js';
import type { ServiceRunner } from '../../context.js';
import { parseInput, toNumber } from '../../lib/validate.js';

interface CoverageCliOptions {
  daysBack?: number;
  since?: string;
  until?: string;
  pharmacyId?: number;
  pharmacyLike?: string;
  missingOnly?: boolean;
  orderAsc?: boolean;
  csv?: string;
  json?: string;
}

function flagCell(received: boolean): string {
  return received ? chalk.green('yes') : chalk.red('no');
}

function missingCell(row: CoverageRow): string {
  if (row.missing.length === 0) {
    return chalk.dim('-');
  }
  return chalk.yellow(row.missing.map((kind) => REPORT_KIND_DEFINITIONS[kind].label).join(', '));
}

/**
 * `coverage`: the report logbook. Which daily reports arrived per pharmacy
 * and business date, optionally exported to CSV or JSON.
 */
export function createCoverageCommand(
  run: ServiceRunner,
  storage?: FileStorage,
): Command {
  return new Command('coverage')
    .description('Show which daily reports were received per pharmacy and date')
    .option('--days-back <n>', 'Look back N days ending on --until (default 30)', toNumber)
    .option('--since <date>', 'Start date YYYY-MM-DD (inclusive)')
    .option('--until <date>', 'End date YYYY-MM-DD for --since or --days-back (inclusive, default today)')
    .option('--pharmacy-id <id>', 'Only this pharmacy', toNumber)
    .option('--pharmacy-like <text>', 'Pharmacy name contains text (case-insensitive)')
    .option('--missing-only', 'Only rows with at least one report missing')
    .option('--order-asc', 'Oldest first (default newest first)')
    .option('--csv <path>', 'Also write the rows to a CSV file')
    .option('--json <path>', 'Also write the rows to a JSON file')
    .action(async (options: CoverageCliOptions) => {
      const targets = parseInput(coverageExportSchema, { csv: options.csv, json: options.json });
      const result = await run((services) =>
        services.coverage.getCoverage({
          daysBack: options.daysBack,
          since: options.since,
          until: options.until,
          pharmacyId: options.pharmacyId,
          pharmacyLike: options.pharmacyLike,
          missingOnly: options.missingOnly ?? false,
          order: options.orderAsc ? CoverageSortOrder.ASC : CoverageSortOrder.DESC,
        }),
      );

      if (result.rows.length === 0) {
        console.log('No rows found for the chosen filters.');
        return;
      }

      const table = new Table({
        head: [
          chalk.bold('Date'),
          chalk.bold('Pharmacy'),
          ...REPORT_KINDS.map((k) => chalk.bold(k.label)),
          chalk.bold('Missing'),
        ],
        style: { head: [], border: [] },
      });
      for (const row of result.rows) {
        table.push([
          row.businessDate,
          `${row.pharmacyName} (${row.pharmacyId})`,
          ...REPORT_KINDS.map((k) => flagCell(row.kinds[k.kind])),
          missingCell(row),
        ]);
      }
      console.log(table.toString());
      console.log(
        chalk.dim(`\n${result.startDate} to ${result.endDate}: ${result.rows.length} row(s)`),
      );

      const written = await writeCoverageExports(result.rows, targets, storage);
      for (const path of written) {
        console.log(chalk.green(`Wrote ${path}`));
      }
    });
}
