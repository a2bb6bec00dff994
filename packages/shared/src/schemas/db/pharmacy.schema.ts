// ============================================================================
// Pharmacy Reference Data — Drizzle DB Schema
// ============================================================================

import {
  pgSchema,
  integer,
  bigserial,
  bigint,
  text,
  boolean,
  timestamp,
} from 'drizzle-orm/pg-core';

// Every table lives in the `pharma` Postgres schema. Tables are created and
// migrated by the ingestion side; these definitions only describe them.
export const pharmaSchema = pgSchema('pharma');

// --- Pharmacies ---

export const pharmacies = pharmaSchema.table('pharmacies', {
  pharmacyId: integer('pharmacy_id').primaryKey(),
  name: text('name').notNull(),
  isActive: boolean('is_active').notNull().default(true),
});

// --- Products ---
// Keyed by product code across all pharmacies.

export const products = pharmaSchema.table('products', {
  productId: bigserial('product_id', { mode: 'number' }).primaryKey(),
  productCode: text('product_code').notNull().unique(),
  description: text('description'),
  departmentId: bigint('department_id', { mode: 'number' }),
});

// --- Users ---
// Only read to resolve who uploaded an import batch.

export const users = pharmaSchema.table('users', {
  userId: bigserial('user_id', { mode: 'number' }).primaryKey(),
  username: text('username').notNull().unique(),
  email: text('email').notNull().unique(),
  isActive: boolean('is_active').notNull().default(true),
  createdAt: timestamp('created_at', { withTimezone: true })
    .notNull()
    .defaultNow(),
});

// --- Inferred Types ---

export type SelectPharmacy = typeof pharmacies.$inferSelect;
export type SelectProduct = typeof products.$inferSelect;
export type SelectUser = typeof users.$inferSelect;
