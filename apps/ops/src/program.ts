import { Command } from 'commander';
import type { Logger } from './lib/logger.js';
import { AppError, ExitCode } from './lib/errors.js';
import type { ServiceRunner } from './context.js';
import { createUsageCommand } from './domains/usage/usage.commands.js';
import { createCoverageCommand } from './domains/coverage/coverage.commands.js';
import { createImportsCommand } from './domains/imports/imports.commands.js';

export function createProgram(run: ServiceRunner): Command {
  const program = new Command('pharmaops')
    .description('Derived metrics and import reconciliation for the pharmacy database')
    .version('0.1.0')
    .addHelpText(
      'after',
      `
Examples:
  $ pharmaops usage refresh --all                   Recompute every usage row
  $ pharmaops usage refresh --product 12345         Recompute one product at pharmacy 1
  $ pharmaops usage top --pharmacy 100 --limit 20   Group-wide top sellers
  $ pharmaops coverage --days-back 7 --missing-only Last week's missing reports
  $ pharmaops imports check                         Batches with no imported debtors
  $ pharmaops imports recent --limit 10             Newest batches with their counts
`,
    );

  program.addCommand(createUsageCommand(run));
  program.addCommand(createCoverageCommand(run));
  program.addCommand(createImportsCommand(run));

  return program;
}

/** Log one diagnostic line and pick the exit code for a failed command. */
export function reportFailure(error: unknown, logger: Logger): number {
  if (error instanceof AppError) {
    logger.error({ code: error.code, details: error.details }, error.message);
    return error.exitCode;
  }
  logger.error({ err: error }, 'Unexpected failure');
  return ExitCode.FAILURE;
}
