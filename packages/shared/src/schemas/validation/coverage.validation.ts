// ============================================================================
// Report Coverage (Logbook) — Zod Validation Schemas
// ============================================================================

import { z } from 'zod';
import { CoverageSortOrder } from '../../constants/coverage.constants.js';
import { isIsoDate } from '../../utils/date.utils.js';

// --- Helpers ---

const isoDateString = z
  .string()
  .refine(isIsoDate, 'Must be an ISO 8601 date (YYYY-MM-DD)');

const SORT_ORDERS = [CoverageSortOrder.ASC, CoverageSortOrder.DESC] as const;

// --- Query ---

export const coverageQuerySchema = z
  .object({
    daysBack: z.coerce.number().int().min(1).max(3650).optional(),
    since: isoDateString.optional(),
    until: isoDateString.optional(),
    pharmacyId: z.coerce.number().int().positive().optional(),
    pharmacyLike: z.string().trim().min(1).max(100).optional(),
    missingOnly: z.boolean().default(false),
    order: z.enum(SORT_ORDERS).default(CoverageSortOrder.DESC),
  })
  .refine((data) => !(data.daysBack !== undefined && data.since !== undefined), {
    message: '--days-back and --since cannot be combined',
    path: ['since'],
  });

export type CoverageQuery = z.infer<typeof coverageQuerySchema>;
export type CoverageQueryInput = z.input<typeof coverageQuerySchema>;

// --- Export targets ---

export const coverageExportSchema = z.object({
  csv: z.string().trim().min(1).optional(),
  json: z.string().trim().min(1).optional(),
});

export type CoverageExportTargets = z.infer<typeof coverageExportSchema>;
