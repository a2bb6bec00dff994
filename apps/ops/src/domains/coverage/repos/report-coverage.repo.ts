// ============================================================================
// Report Coverage Repository
// Read-only projection of pharma.report_coverage joined to pharmacy names.
// ============================================================================

import { eq, and, asc, desc, between, ilike, sql, type SQL } from 'drizzle-orm';
import { type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { reportCoverage } from '@pharmaops/shared/schemas/db/coverage.schema.js';
import { pharmacies } from '@pharmaops/shared/schemas/db/pharmacy.schema.js';
import {
  REPORT_KINDS,
  CoverageSortOrder,
  byReportKind,
  type ReportKind,
} from '@pharmaops/shared/constants/coverage.constants.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface CoverageFilters {
  startDate: string;
  endDate: string;
  pharmacyId?: number;
  /** Case-insensitive substring of the pharmacy name. */
  pharmacyLike?: string;
  missingOnly: boolean;
  order: CoverageSortOrder;
}

export interface CoverageRecord {
  businessDate: string;
  pharmacyId: number;
  pharmacyName: string;
  kinds: Record<ReportKind, boolean>;
  lastUpdated: Date;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Make LIKE wildcards in user input match literally. */
export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

const flagColumns = REPORT_KINDS.map((k) => reportCoverage[k.column]);

// Rows with every flag false are not coverage.
const anyReceived = sql`(${sql.join(flagColumns, sql` OR `)})`;
const notAllReceived = sql`NOT (${sql.join(flagColumns, sql` AND `)})`;

// ---------------------------------------------------------------------------
// Repository factory
// ---------------------------------------------------------------------------

export function createReportCoverageRepository(db: NodePgDatabase) {
  return {
    async findCoverage(filters: CoverageFilters): Promise<CoverageRecord[]> {
      const conditions: SQL[] = [
        between(reportCoverage.businessDate, filters.startDate, filters.endDate),
        anyReceived,
      ];

      if (filters.pharmacyId !== undefined) {
        conditions.push(eq(reportCoverage.pharmacyId, filters.pharmacyId));
      }
      if (filters.pharmacyLike) {
        conditions.push(
          ilike(pharmacies.name, `%${escapeLikePattern(filters.pharmacyLike)}%`),
        );
      }
      if (filters.missingOnly) {
        conditions.push(notAllReceived);
      }

      const dateOrder =
        filters.order === CoverageSortOrder.ASC
          ? asc(reportCoverage.businessDate)
          : desc(reportCoverage.businessDate);

      const rows = await db
        .select({
          coverage: reportCoverage,
          pharmacyName: pharmacies.name,
        })
        .from(reportCoverage)
        .innerJoin(pharmacies, eq(pharmacies.pharmacyId, reportCoverage.pharmacyId))
        .where(and(...conditions))
        .orderBy(dateOrder, asc(reportCoverage.pharmacyId));

      return rows.map((r) => ({
        businessDate: r.coverage.businessDate,
        pharmacyId: r.coverage.pharmacyId,
        pharmacyName: r.pharmacyName,
        kinds: byReportKind((k) => r.coverage[k.column]),
        lastUpdated: r.coverage.lastUpdated,
      }));
    },
  };
}

export type ReportCoverageRepository = ReturnType<typeof createReportCoverageRepository>;
