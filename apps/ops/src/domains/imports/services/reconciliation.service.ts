// ============================================================================
// Reconciliation Service
// Compares what each debtor import batch claimed against the rows actually
// linked to it. Reports only; never repairs or deletes.
// ============================================================================

import { reconciliationOptionsSchema } from '@pharmaops/shared/schemas/validation/imports.validation.js';
import {
  DERIVED_TABLE_NAME,
  type ColumnDescription,
  type ConstraintDescription,
  type DebtorImportRepository,
  type DebtorTotals,
  type ImportBatch,
  type LatestImportBatch,
  type PharmacyImportCount,
} from '../repos/debtor-import.repo.js';
import { toStoreError } from '../../../lib/errors.js';
import { parseInput } from '../../../lib/validate.js';
import type { Logger } from '../../../lib/logger.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

interface ReconciliationDeps {
  importRepo: DebtorImportRepository;
  logger: Logger;
}

export interface ReconciliationReport {
  problematic: ImportBatch[];
  lastSuccessful: ImportBatch | null;
  /** false when no batch has ever produced linked rows. */
  hasSuccessfulBatch: boolean;
}

export interface ImportSummary {
  latest: LatestImportBatch | null;
  byPharmacy: PharmacyImportCount[];
  totals: DebtorTotals;
}

export interface RecentImportBatch extends ImportBatch {
  /** Claimed accounts but no linked debtor rows. */
  unlinked: boolean;
}

export interface DerivedTableDescription {
  table: string;
  columns: ColumnDescription[];
  constraints: ConstraintDescription[];
}

export function isUnlinkedBatch(batch: ImportBatch): boolean {
  return batch.claimedCount > 0 && batch.derivedCount === 0;
}

// ---------------------------------------------------------------------------
// Service Factory
// ---------------------------------------------------------------------------

export function createReconciliationService(deps: ReconciliationDeps) {
  const { importRepo, logger } = deps;

  return {
    async check(limit?: number): Promise<ReconciliationReport> {
      const { limit: batchLimit } = parseInput(reconciliationOptionsSchema, { limit });

      try {
        const problematic = await importRepo.findProblematicBatches(batchLimit);
        const lastSuccessful = await importRepo.findLastSuccessfulBatch();

        if (problematic.length > 0) {
          logger.warn(
            { problematic: problematic.map((b) => b.id) },
            'Import batches with no linked debtor rows',
          );
        }
        if (!lastSuccessful) {
          logger.warn('No import batch has linked debtor rows');
        }

        return {
          problematic,
          lastSuccessful,
          hasSuccessfulBatch: lastSuccessful !== null,
        };
      } catch (error) {
        throw toStoreError(error, 'Import reconciliation');
      }
    },

    /** Newest batches with claimed and linked counts, unlinked ones flagged. */
    async listRecentBatches(limit?: number): Promise<RecentImportBatch[]> {
      const { limit: batchLimit } = parseInput(reconciliationOptionsSchema, { limit });

      let batches: ImportBatch[];
      try {
        batches = await importRepo.findRecentBatches(batchLimit);
      } catch (error) {
        throw toStoreError(error, 'Recent import listing');
      }

      const recent = batches.map((b) => ({ ...b, unlinked: isUnlinkedBatch(b) }));
      const unlinked = recent.filter((b) => b.unlinked).map((b) => b.id);
      if (unlinked.length > 0) {
        logger.warn({ unlinked }, 'Recent import batches with no linked debtor rows');
      }
      return recent;
    },

    async getImportSummary(): Promise<ImportSummary> {
      try {
        const latest = await importRepo.findLatestBatch();
        const byPharmacy = await importRepo.countBatchesByPharmacy();
        const totals = await importRepo.getDebtorTotals();
        return { latest, byPharmacy, totals };
      } catch (error) {
        throw toStoreError(error, 'Import summary');
      }
    },

    async describeDerivedTable(): Promise<DerivedTableDescription> {
      try {
        const columns = await importRepo.describeColumns();
        const constraints = await importRepo.describeConstraints();
        return {
          table: DERIVED_TABLE_NAME,
          columns,
          constraints,
        };
      } catch (error) {
        throw toStoreError(error, 'Debtor table description');
      }
    },
  };
}

export type ReconciliationService = ReturnType<typeof createReconciliationService>;
