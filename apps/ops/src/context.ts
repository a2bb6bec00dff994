// ============================================================================
// Service wiring
// Each command runs against a freshly opened pool that is closed when the
// command's work settles.
// ============================================================================

import type { Env } from './lib/env.js';
import type { Logger } from './lib/logger.js';
import { withDatabase, type Database } from './lib/db.js';
import { createProductUsageRepository } from './domains/usage/repos/product-usage.repo.js';
import {
  createUsageRefreshService,
  type UsageRefreshService,
} from './domains/usage/services/usage-refresh.service.js';
import { createReportCoverageRepository } from './domains/coverage/repos/report-coverage.repo.js';
import {
  createCoverageService,
  type CoverageService,
} from './domains/coverage/services/coverage.service.js';
import { createDebtorImportRepository } from './domains/imports/repos/debtor-import.repo.js';
import {
  createReconciliationService,
  type ReconciliationService,
} from './domains/imports/services/reconciliation.service.js';

export interface OpsServices {
  usage: UsageRefreshService;
  coverage: CoverageService;
  reconciliation: ReconciliationService;
}

/** Runs `fn` with services bound to an open database; releases it afterwards. */
export type ServiceRunner = <T>(fn: (services: OpsServices) => Promise<T>) => Promise<T>;

export function buildServices(db: Database, env: Env, logger: Logger): OpsServices {
  return {
    usage: createUsageRefreshService({
      usageRepo: createProductUsageRepository(db),
      logger: logger.child({ domain: 'usage' }),
      timeoutMs: env.USAGE_REFRESH_TIMEOUT_MS,
    }),
    coverage: createCoverageService({
      coverageRepo: createReportCoverageRepository(db),
    }),
    reconciliation: createReconciliationService({
      importRepo: createDebtorImportRepository(db),
      logger: logger.child({ domain: 'imports' }),
    }),
  };
}

export function createServiceRunner(env: Env, logger: Logger): ServiceRunner {
  return (fn) => withDatabase(env, (db) => fn(buildServices(db, env, logger)));
}
