// ============================================================================
// Report Coverage (Logbook) — Drizzle DB Schema
// ============================================================================

import {
  integer,
  date,
  boolean,
  timestamp,
  primaryKey,
} from 'drizzle-orm/pg-core';

import { pharmaSchema, pharmacies } from './pharmacy.schema.js';

// --- Report Coverage ---
// One row per pharmacy + business date once any of the four daily reports
// has been received. A missing row means nothing arrived for that day.
// Maintained by the ingestion side; read-only here.

export const reportCoverage = pharmaSchema.table(
  'report_coverage',
  {
    pharmacyId: integer('pharmacy_id')
      .notNull()
      .references(() => pharmacies.pharmacyId),
    businessDate: date('business_date', { mode: 'string' }).notNull(),
    inv249Turnover: boolean('inv249_turnover').notNull().default(false),
    stk261Trading: boolean('stk261_trading').notNull().default(false),
    phm080Scripts: boolean('phm080_scripts').notNull().default(false),
    stk260Gp: boolean('stk260_gp').notNull().default(false),
    lastUpdated: timestamp('last_updated', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    primaryKey({ columns: [table.pharmacyId, table.businessDate] }),
  ],
);

// --- Inferred Types ---

export type SelectReportCoverage = typeof reportCoverage.$inferSelect;
