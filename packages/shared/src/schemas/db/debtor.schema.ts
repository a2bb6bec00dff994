// ============================================================================
// Debtor Imports — Drizzle DB Schema
// ============================================================================

import {
  bigserial,
  bigint,
  integer,
  varchar,
  text,
  numeric,
  boolean,
  timestamp,
  unique,
  index,
} from 'drizzle-orm/pg-core';

import { pharmaSchema, pharmacies, users } from './pharmacy.schema.js';

// --- Debtor Reports (import batch manifest) ---
// One row per uploaded debtor report. total_accounts is the number of
// accounts the importer claims the file contained; the number actually
// persisted is counted from pharma.debtors on demand.

export const debtorReports = pharmaSchema.table(
  'debtor_reports',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    pharmacyId: integer('pharmacy_id')
      .notNull()
      .references(() => pharmacies.pharmacyId, { onDelete: 'cascade' }),
    filename: varchar('filename', { length: 255 }).notNull(),
    filePath: varchar('file_path', { length: 500 }),
    uploadedAt: timestamp('uploaded_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    uploadedBy: bigint('uploaded_by', { mode: 'number' }).references(
      () => users.userId,
      { onDelete: 'set null' },
    ),
    totalAccounts: integer('total_accounts').default(0),
    totalOutstanding: numeric('total_outstanding', { precision: 15, scale: 2 })
      .default('0.00'),
    status: varchar('status', { length: 20 }).default('processing'),
    errorMessage: text('error_message'),
  },
  (table) => [
    index('idx_pharmacy_uploaded').on(table.pharmacyId, table.uploadedAt),
  ],
);

// --- Debtors (derived rows linked to a batch) ---

export const debtors = pharmaSchema.table(
  'debtors',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    pharmacyId: integer('pharmacy_id')
      .notNull()
      .references(() => pharmacies.pharmacyId, { onDelete: 'cascade' }),
    reportId: bigint('report_id', { mode: 'number' }).references(
      () => debtorReports.id,
      { onDelete: 'set null' },
    ),
    accNo: varchar('acc_no', { length: 20 }).notNull(),
    name: varchar('name', { length: 255 }).notNull(),
    balance: numeric('balance', { precision: 15, scale: 2 }).default('0.00'),
    email: varchar('email', { length: 255 }),
    phone: varchar('phone', { length: 20 }),
    isMedicalAidControl: boolean('is_medical_aid_control').default(false),
    createdAt: timestamp('created_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    unique('debtors_pharmacy_id_acc_no_key').on(table.pharmacyId, table.accNo),
    index('idx_debtors_pharmacy_acc').on(table.pharmacyId, table.accNo),
  ],
);

// --- Inferred Types ---

export type SelectDebtorReport = typeof debtorReports.$inferSelect;
export type SelectDebtor = typeof debtors.$inferSelect;
