// ============================================================================
// Debtor Import Repository
// Import batches (pharma.debtor_reports) against the debtor rows actually
// linked to each batch (pharma.debtors). Read only.
// ============================================================================

import { eq, desc, sql, type SQL } from 'drizzle-orm';
import { getTableConfig } from 'drizzle-orm/pg-core';
import { type NodePgDatabase } from 'drizzle-orm/node-postgres';
import {
  pharmacies,
  users,
} from '@pharmaops/shared/schemas/db/pharmacy.schema.js';
import {
  debtorReports,
  debtors,
} from '@pharmaops/shared/schemas/db/debtor.schema.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ImportBatch {
  id: number;
  pharmacyId: number;
  pharmacyName: string | null;
  filename: string;
  uploadedAt: Date;
  status: string | null;
  errorMessage: string | null;
  /** total_accounts as declared by the importer. */
  claimedCount: number;
  /** debtors rows whose report_id references this batch. */
  derivedCount: number;
  totalOutstanding: string;
}

export interface LatestImportBatch extends ImportBatch {
  uploadedByUsername: string | null;
}

export interface PharmacyImportCount {
  pharmacyId: number;
  pharmacyName: string;
  batchCount: number;
  lastImport: Date;
}

export interface DebtorTotals {
  pharmacyCount: number;
  debtorCount: number;
  totalOutstanding: string;
}

export interface ColumnDescription {
  name: string;
  dataType: string;
  nullable: boolean;
}

export interface ConstraintDescription {
  name: string;
  type: string;
  definition: string;
}

// ---------------------------------------------------------------------------
// Query parts
// ---------------------------------------------------------------------------

const derivedTableConfig = getTableConfig(debtors);

/** Schema-qualified name of the table holding the linked debtor rows. */
export const DERIVED_TABLE_NAME = `${derivedTableConfig.schema ?? 'public'}.${derivedTableConfig.name}`;

const claimedCount = sql<number>`COALESCE(${debtorReports.totalAccounts}, 0)`.mapWith(Number);
const derivedCount = sql<number>`COUNT(${debtors.id})::INT`.mapWith(Number);

const batchColumns = {
  id: debtorReports.id,
  pharmacyId: debtorReports.pharmacyId,
  pharmacyName: pharmacies.name,
  filename: debtorReports.filename,
  uploadedAt: debtorReports.uploadedAt,
  status: debtorReports.status,
  errorMessage: debtorReports.errorMessage,
  claimedCount,
  derivedCount,
  totalOutstanding: sql<string>`COALESCE(${debtorReports.totalOutstanding}, 0)::TEXT`,
};

// ---------------------------------------------------------------------------
// Repository factory
// ---------------------------------------------------------------------------

export function createDebtorImportRepository(db: NodePgDatabase) {
  /** Batches with their linked-row counts, newest first; `having` filters on the counts. */
  async function findBatches(having: SQL | undefined, limit: number): Promise<ImportBatch[]> {
    return db
      .select(batchColumns)
      .from(debtorReports)
      .leftJoin(pharmacies, eq(pharmacies.pharmacyId, debtorReports.pharmacyId))
      .leftJoin(debtors, eq(debtors.reportId, debtorReports.id))
      .groupBy(debtorReports.id, pharmacies.name)
      .having(having)
      .orderBy(desc(debtorReports.uploadedAt), desc(debtorReports.id))
      .limit(limit);
  }

  return {
    /** Newest batches regardless of outcome. */
    async findRecentBatches(limit: number): Promise<ImportBatch[]> {
      return findBatches(undefined, limit);
    },

    /** Batches that claimed accounts but have no linked debtor rows, newest first. */
    async findProblematicBatches(limit: number): Promise<ImportBatch[]> {
      return findBatches(sql`${claimedCount} > 0 AND ${derivedCount} = 0`, limit);
    },

    /** Newest batch with at least one linked debtor row. */
    async findLastSuccessfulBatch(): Promise<ImportBatch | null> {
      const rows = await findBatches(sql`${derivedCount} > 0`, 1);
      return rows[0] ?? null;
    },

    async findLatestBatch(): Promise<LatestImportBatch | null> {
      const rows = await db
        .select({ ...batchColumns, uploadedByUsername: users.username })
        .from(debtorReports)
        .leftJoin(pharmacies, eq(pharmacies.pharmacyId, debtorReports.pharmacyId))
        .leftJoin(debtors, eq(debtors.reportId, debtorReports.id))
        .leftJoin(users, eq(users.userId, debtorReports.uploadedBy))
        .groupBy(debtorReports.id, pharmacies.name, users.username)
        .orderBy(desc(debtorReports.uploadedAt), desc(debtorReports.id))
        .limit(1);
      return rows[0] ?? null;
    },

    async countBatchesByPharmacy(): Promise<PharmacyImportCount[]> {
      const lastImport = sql`MAX(${debtorReports.uploadedAt})`.mapWith(debtorReports.uploadedAt);
      return db
        .select({
          pharmacyId: debtorReports.pharmacyId,
          pharmacyName: pharmacies.name,
          batchCount: sql<number>`COUNT(*)::INT`.mapWith(Number),
          lastImport,
        })
        .from(debtorReports)
        .innerJoin(pharmacies, eq(pharmacies.pharmacyId, debtorReports.pharmacyId))
        .groupBy(debtorReports.pharmacyId, pharmacies.name)
        .orderBy(desc(lastImport));
    },

    async getDebtorTotals(): Promise<DebtorTotals> {
      const rows = await db
        .select({
          pharmacyCount: sql<number>`COUNT(DISTINCT ${debtors.pharmacyId})::INT`.mapWith(Number),
          debtorCount: sql<number>`COUNT(*)::INT`.mapWith(Number),
          totalOutstanding: sql<string>`COALESCE(SUM(${debtors.balance}), 0)::TEXT`,
        })
        .from(debtors);
      return rows[0] ?? { pharmacyCount: 0, debtorCount: 0, totalOutstanding: '0' };
    },

    async describeColumns(): Promise<ColumnDescription[]> {
      const result = await db.execute<{
        column_name: string;
        data_type: string;
        is_nullable: string;
      }>(sql`
        SELECT column_name, data_type, is_nullable
        FROM information_schema.columns
        WHERE table_schema = ${derivedTableConfig.schema ?? 'public'}
          AND table_name = ${derivedTableConfig.name}
        ORDER BY ordinal_position
      `);
      return result.rows.map((r) => ({
        name: r.column_name,
        dataType: r.data_type,
        nullable: r.is_nullable === 'YES',
      }));
    },

    async describeConstraints(): Promise<ConstraintDescription[]> {
      const result = await db.execute<{
        constraint_name: string;
        constraint_type: string;
        definition: string;
      }>(sql`
        SELECT
          conname AS constraint_name,
          contype::TEXT AS constraint_type,
          pg_get_constraintdef(oid) AS definition
        FROM pg_constraint
        WHERE conrelid = ${DERIVED_TABLE_NAME}::regclass
        ORDER BY conname
      `);
      return result.rows.map((r) => ({
        name: r.constraint_name,
        type: r.constraint_type,
        definition: r.definition,
      }));
    },
  };
}

export type DebtorImportRepository = ReturnType<typeof createDebtorImportRepository>;
