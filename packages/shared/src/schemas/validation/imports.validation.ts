// ============================================================================
// Debtor Imports — Zod Validation Schemas
// ============================================================================

import { z } from 'zod';
import {
  DEFAULT_BATCH_LIMIT,
  MAX_BATCH_LIMIT,
} from '../../constants/imports.constants.js';

export const reconciliationOptionsSchema = z.object({
  limit: z.coerce
    .number()
    .int()
    .min(1)
    .max(MAX_BATCH_LIMIT)
    .default(DEFAULT_BATCH_LIMIT),
});

export type ReconciliationOptions = z.infer<typeof reconciliationOptionsSchema>;
