#!/usr/bin/env tsx
import { getEnv } from './lib/env.js';
import { createLogger } from './lib/logger.js';
import { createServiceRunner, type ServiceRunner } from './context.js';
import { createProgram, reportFailure } from './program.js';

const logger = createLogger('info');

// Configuration is loaded on first database use so --help works without it.
const run: ServiceRunner = (fn) => {
  const env = getEnv();
  logger.level = env.LOG_LEVEL;
  return createServiceRunner(env, logger)(fn);
};

createProgram(run)
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    process.exitCode = reportFailure(error, logger);
  });
