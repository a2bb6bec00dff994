// ============================================================================
// Product Usage — Zod Validation Schemas
// ============================================================================

import { z } from 'zod';
import {
  DEFAULT_PHARMACY_ID,
  TOP_USAGE_DEFAULT_LIMIT,
  TOP_USAGE_MAX_LIMIT,
} from '../../constants/usage.constants.js';

// --- Helpers ---

const pharmacyId = z.coerce
  .number()
  .int('Pharmacy id must be a whole number')
  .positive('Pharmacy id must be positive');

const productCode = z.string().trim().min(1, 'Product code is required').max(50);

// --- Refresh ---

export const usageRefreshOptionsSchema = z
  .object({
    all: z.boolean().optional().default(false),
    product: productCode.optional(),
    pharmacy: pharmacyId.default(DEFAULT_PHARMACY_ID),
  })
  .refine((data) => data.all !== (data.product !== undefined), {
    message: 'Choose exactly one of --all or --product <code>',
    path: ['all'],
  });

export type UsageRefreshOptions = z.infer<typeof usageRefreshOptionsSchema>;

// --- Read ---

export const topUsageOptionsSchema = z.object({
  pharmacy: pharmacyId.default(DEFAULT_PHARMACY_ID),
  limit: z.coerce
    .number()
    .int()
    .min(1)
    .max(TOP_USAGE_MAX_LIMIT)
    .default(TOP_USAGE_DEFAULT_LIMIT),
});

export type TopUsageOptions = z.infer<typeof topUsageOptionsSchema>;

export const productUsageOptionsSchema = z.object({
  product: productCode,
  pharmacy: pharmacyId.default(DEFAULT_PHARMACY_ID),
});

export type ProductUsageOptions = z.infer<typeof productUsageOptionsSchema>;
