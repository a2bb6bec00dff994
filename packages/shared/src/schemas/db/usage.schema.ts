// ============================================================================
// Stock Activity & Product Usage — Drizzle DB Schema
// ============================================================================

import {
  integer,
  bigint,
  date,
  numeric,
  timestamp,
  primaryKey,
  index,
} from 'drizzle-orm/pg-core';

import { pharmaSchema, pharmacies, products } from './pharmacy.schema.js';

// --- Stock Activity Facts ---
// One row per pharmacy, business date and product, written by the report
// ingestion pipeline. Read-only here: the raw input to usage averages.

export const factStockActivity = pharmaSchema.table(
  'fact_stock_activity',
  {
    pharmacyId: integer('pharmacy_id')
      .notNull()
      .references(() => pharmacies.pharmacyId),
    businessDate: date('business_date', { mode: 'string' }).notNull(),
    productId: bigint('product_id', { mode: 'number' })
      .notNull()
      .references(() => products.productId),
    departmentId: bigint('department_id', { mode: 'number' }),
    qtySold: numeric('qty_sold', { precision: 18, scale: 3 }),
    salesVal: numeric('sales_val', { precision: 18, scale: 2 }),
    costOfSales: numeric('cost_of_sales', { precision: 18, scale: 2 }),
    gpValue: numeric('gp_value', { precision: 18, scale: 2 }),
    gpPct: numeric('gp_pct', { precision: 9, scale: 2 }),
    onHand: numeric('on_hand', { precision: 18, scale: 3 }),
    lastUpdatedAt: timestamp('last_updated_at', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    primaryKey({
      columns: [table.pharmacyId, table.businessDate, table.productId],
    }),
    index('fact_stock_activity_lookup').on(table.businessDate),
  ],
);

// --- Product Usage ---
// Rolling average daily sold quantity per pharmacy + product.
// Upsert target: (pharmacy_id, product_id). Rows exist only for keys that had
// sales inside the lookback window at their last refresh.

export const productUsage = pharmaSchema.table(
  'product_usage',
  {
    pharmacyId: integer('pharmacy_id')
      .notNull()
      .references(() => pharmacies.pharmacyId),
    productId: bigint('product_id', { mode: 'number' })
      .notNull()
      .references(() => products.productId),
    avgQty30d: numeric('avg_qty_30d', { precision: 18, scale: 3 }),
    avgQty90d: numeric('avg_qty_90d', { precision: 18, scale: 3 }),
    avgQty180d: numeric('avg_qty_180d', { precision: 18, scale: 3 }),
    lastRecalc: timestamp('last_recalc', { withTimezone: true })
      .notNull()
      .defaultNow(),
  },
  (table) => [
    primaryKey({ columns: [table.pharmacyId, table.productId] }),
  ],
);

// --- Inferred Types ---

export type SelectFactStockActivity = typeof factStockActivity.$inferSelect;

export type InsertProductUsage = typeof productUsage.$inferInsert;
export type SelectProductUsage = typeof productUsage.$inferSelect;
