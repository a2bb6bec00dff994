import { Command } from 'commander';
import chalk from 'chalk';
import Table from 'cli-table3';
import {
  USAGE_WINDOWS_DAYS,
  USAGE_LOOKBACK_DAYS,
} from '@pharmaops/shared/constants/usage.constants.js';
import {
  usageRefreshOptionsSchema,
  topUsageOptionsSchema,
  productUsageOptionsSchema,
} from '@pharmaops/shared/schemas/validation/usage.validation.js';
import type { UsageAverages } from './repos/product-usage.repo.js';
import type { ServiceRunner } from '../../context.js';
import { parseInput } from '../../lib/validate.js';
import { formatTimestamp } from '../../lib/format.js';

interface RefreshCliOptions {
  all?: boolean;
  product?: string;
  pharmacy?: string;
}

interface TopCliOptions {
  pharmacy?: string;
  limit?: string;
}

interface ShowCliOptions {
  product?: string;
  pharmacy?: string;
}

function windowHeads(): string[] {
  return USAGE_WINDOWS_DAYS.map((days) => chalk.bold(`${days}d avg`));
}

function windowCells(averages: UsageAverages): string[] {
  return USAGE_WINDOWS_DAYS.map((days) => averages[days]);
}

function averagesTable(averages: UsageAverages, lastRecalc: Date): string {
  const table = new Table({
    head: [...windowHeads(), chalk.bold('Last recalc')],
    style: { head: [], border: [] },
  });
  table.push([...windowCells(averages), formatTimestamp(lastRecalc)]);
  return table.toString();
}

/**
 * `usage` command group: refresh stored averages and read them back.
 */
export function createUsageCommand(run: ServiceRunner): Command {
  const usage = new Command('usage').description(
    'Rolling average daily sold quantity per pharmacy and product',
  );

  usage
    .command('refresh')
    .description('Recompute and store usage averages')
    .option('--all', 'Refresh every pharmacy and product with recent sales')
    .option('--product <code>', 'Refresh a single product code')
    .option('--pharmacy <id>', 'Pharmacy for --product (default 1)')
    .action(async (options: RefreshCliOptions) => {
      const opts = parseInput(usageRefreshOptionsSchema, options);

      if (opts.product === undefined) {
        const result = await run((services) => services.usage.refreshAll());
        console.log(
          chalk.green(`Refreshed ${result.keysRefreshed} product usage row(s) as of ${result.asOf}`),
        );
        console.log(chalk.dim(`Rows in product_usage: ${result.totalRows} (${result.durationMs} ms)`));
        return;
      }

      const productCode = opts.product;
      const result = await run((services) =>
        services.usage.refreshProduct(opts.pharmacy, productCode),
      );
      if (!result.usage) {
        console.log(
          chalk.yellow(
            `No sales of ${result.productCode} at pharmacy ${result.pharmacyId} in the last ${USAGE_LOOKBACK_DAYS} days; nothing written.`,
          ),
        );
        return;
      }
      console.log(
        chalk.green(`Refreshed ${result.productCode} at pharmacy ${result.pharmacyId} as of ${result.asOf}`),
      );
      console.log(averagesTable(result.usage.averages, result.usage.lastRecalc));
    });

  usage
    .command('top')
    .description('Products with the highest 180-day average')
    .option('--pharmacy <id>', 'Pharmacy id; 100 for the whole group (default 1)')
    .option('--limit <n>', 'Number of products (1-200, default 10)')
    .action(async (options: TopCliOptions) => {
      const opts = parseInput(topUsageOptionsSchema, options);
      const listings = await run((services) =>
        services.usage.getTopUsage(opts.pharmacy, opts.limit),
      );

      if (listings.length === 0) {
        console.log(chalk.yellow(`No usage rows for pharmacy ${opts.pharmacy}.`));
        return;
      }

      const table = new Table({
        head: [chalk.bold('Product'), chalk.bold('Description'), ...windowHeads()],
        style: { head: [], border: [] },
      });
      for (const listing of listings) {
        table.push([
          chalk.cyan(listing.productCode),
          listing.description ?? '-',
          ...windowCells(listing.averages),
        ]);
      }
      console.log(table.toString());
      console.log(chalk.dim(`\nPharmacy ${opts.pharmacy}: ${listings.length} product(s)`));
    });

  usage
    .command('show')
    .description('Usage averages for one product')
    .requiredOption('--product <code>', 'Product code')
    .option('--pharmacy <id>', 'Pharmacy id; 100 for the whole group (default 1)')
    .action(async (options: ShowCliOptions) => {
      const opts = parseInput(productUsageOptionsSchema, options);
      const view = await run((services) =>
        services.usage.getProductUsage(opts.pharmacy, opts.product),
      );

      const label = view.description
        ? `${chalk.cyan(view.productCode)} ${view.description}`
        : chalk.cyan(view.productCode);
      console.log(`${label} (pharmacy ${view.pharmacyId})`);
      console.log(averagesTable(view.averages, view.lastRecalc));
    });

  return usage;
}
