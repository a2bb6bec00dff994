// ============================================================================
// Coverage Service
// The report logbook: which daily reports arrived per pharmacy and business
// date inside a window, and which are still missing. Pure read.
// ============================================================================

import {
  DEFAULT_COVERAGE_DAYS,
  REPORT_KINDS,
  type ReportKind,
} from '@pharmaops/shared/constants/coverage.constants.js';
import {
  coverageQuerySchema,
  type CoverageQuery,
  type CoverageQueryInput,
} from '@pharmaops/shared/schemas/validation/coverage.validation.js';
import {
  compareIsoDates,
  formatDate,
  windowStart,
} from '@pharmaops/shared/utils/date.utils.js';
import type {
  CoverageRecord,
  ReportCoverageRepository,
} from '../repos/report-coverage.repo.js';
import { ValidationError, toStoreError } from '../../../lib/errors.js';
import { parseInput } from '../../../lib/validate.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

interface CoverageDeps {
  coverageRepo: ReportCoverageRepository;
  now?: () => Date;
}

export interface CoverageRange {
  startDate: string;
  endDate: string;
}

export interface CoverageRow extends CoverageRecord {
  /** Kinds not yet received, in REPORT_KINDS order. Empty when complete. */
  missing: ReportKind[];
}

export interface CoverageResult extends CoverageRange {
  rows: CoverageRow[];
}

// ---------------------------------------------------------------------------
// Range resolution
// ---------------------------------------------------------------------------

/**
 * Inclusive [start, end] for a coverage query.
 * - daysBack N: the N days ending on `until` (or today)
 * - since S: S through `until` (or today)
 * - neither: the default 30 days ending today; `until` alone is ignored
 */
export function resolveCoverageRange(
  query: Pick<CoverageQuery, 'daysBack' | 'since' | 'until'>,
  today: string,
): CoverageRange {
  if (query.daysBack !== undefined && query.since !== undefined) {
    throw new ValidationError('--days-back and --since cannot be combined');
  }

  let startDate: string;
  let endDate: string;
  if (query.since !== undefined) {
    startDate = query.since;
    endDate = query.until ?? today;
  } else if (query.daysBack !== undefined) {
    endDate = query.until ?? today;
    startDate = windowStart(endDate, query.daysBack);
  } else {
    endDate = today;
    startDate = windowStart(endDate, DEFAULT_COVERAGE_DAYS);
  }

  if (compareIsoDates(startDate, endDate) > 0) {
    throw new ValidationError(`Start date ${startDate} is after end date ${endDate}`);
  }

  return { startDate, endDate };
}

export function missingKinds(record: CoverageRecord): ReportKind[] {
  return REPORT_KINDS.filter((k) => !record.kinds[k.kind]).map((k) => k.kind);
}

// ---------------------------------------------------------------------------
// Service Factory
// ---------------------------------------------------------------------------

export function createCoverageService(deps: CoverageDeps) {
  const { coverageRepo } = deps;
  const getNow = deps.now ?? (() => new Date());

  return {
    async getCoverage(input: CoverageQueryInput): Promise<CoverageResult> {
      const query = parseInput(coverageQuerySchema, input);
      const range = resolveCoverageRange(query, formatDate(getNow()));

      let records: CoverageRecord[];
      try {
        records = await coverageRepo.findCoverage({
          ...range,
          pharmacyId: query.pharmacyId,
          pharmacyLike: query.pharmacyLike,
          missingOnly: query.missingOnly,
          order: query.order,
        });
      } catch (error) {
        throw toStoreError(error, 'Coverage query');
      }

      return {
        ...range,
        rows: records.map((record) => ({ ...record, missing: missingKinds(record) })),
      };
    },
  };
}

export type CoverageService = ReturnType<typeof createCoverageService>;
