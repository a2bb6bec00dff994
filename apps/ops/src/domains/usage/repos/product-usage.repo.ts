// ============================================================================
// Product Usage Repository
// Window sums over pharma.fact_stock_activity and the product_usage upsert.
// ============================================================================

import { eq, and, desc, sql, inArray, isNotNull } from 'drizzle-orm';
import { type NodePgDatabase } from 'drizzle-orm/node-postgres';
import {
  pharmacies,
  products,
  type SelectPharmacy,
  type SelectProduct,
} from '@pharmaops/shared/schemas/db/pharmacy.schema.js';
import { productUsage } from '@pharmaops/shared/schemas/db/usage.schema.js';
import {
  USAGE_WINDOWS_DAYS,
  USAGE_LOOKBACK_DAYS,
  GROUP_PHARMACY_ID,
  byWindow,
  type UsageWindowDays,
} from '@pharmaops/shared/constants/usage.constants.js';
import { windowStart } from '@pharmaops/shared/utils/date.utils.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * Which (pharmacy, product) keys a computation covers.
 * `group` sums every pharmacy per product and reports the totals under
 * GROUP_PHARMACY_ID; group figures are never stored.
 */
export type UsageScope =
  | { type: 'all' }
  | { type: 'key'; pharmacyId: number; productId: number }
  | { type: 'group'; productId?: number };

/** Average daily quantity per window, as 3-decimal strings. */
export type UsageAverages = Record<UsageWindowDays, string>;

export interface UsageWindowSums {
  pharmacyId: number;
  productId: number;
  daysWithSales: number;
  /** Sold quantity per window, decimal strings straight from numeric columns. */
  sums: Record<UsageWindowDays, string>;
}

export interface UsageSummary {
  pharmacyId: number;
  productId: number;
  averages: UsageAverages;
  lastRecalc: Date;
}

export interface UsageListing {
  productId: number;
  productCode: string;
  description: string | null;
  averages: UsageAverages;
  lastRecalc: Date;
}

type UsageRow = typeof productUsage.$inferSelect;

// product_usage has one column per window; a new window is a schema change.
function averagesFromRow(row: UsageRow): UsageAverages {
  return {
    30: row.avgQty30d ?? '0.000',
    90: row.avgQty90d ?? '0.000',
    180: row.avgQty180d ?? '0.000',
  };
}

function sumAlias(days: UsageWindowDays): string {
  return `qty_${days}d`;
}

function scopeCondition(scope: UsageScope) {
  switch (scope.type) {
    case 'all':
      return sql``;
    case 'key':
      return sql`AND f.pharmacy_id = ${scope.pharmacyId} AND f.product_id = ${scope.productId}`;
    case 'group':
      return scope.productId === undefined
        ? sql``
        : sql`AND f.product_id = ${scope.productId}`;
  }
}

// ---------------------------------------------------------------------------
// Repository factory
// ---------------------------------------------------------------------------

export function createProductUsageRepository(db: NodePgDatabase) {
  return {
    /**
     * Per-key day count and per-window quantity sums for facts inside the
     * lookback window ending on `asOf` (inclusive) with qty_sold > 0.
     * Keys without qualifying facts produce no row.
     */
    async fetchWindowSums(
      scope: UsageScope,
      asOf: string,
    ): Promise<UsageWindowSums[]> {
      const lookbackStart = windowStart(asOf, USAGE_LOOKBACK_DAYS);
      const isGroup = scope.type === 'group';

      const pharmacyColumn = isGroup
        ? sql`${GROUP_PHARMACY_ID}::INT`
        : sql`f.pharmacy_id`;
      const groupBy = isGroup
        ? sql`f.product_id`
        : sql`f.pharmacy_id, f.product_id`;

      const windowSums = sql.join(
        USAGE_WINDOWS_DAYS.map(
          (days) => sql`COALESCE(SUM(f.qty_sold) FILTER (
            WHERE f.business_date >= ${windowStart(asOf, days)}::DATE
          ), 0)::TEXT AS ${sql.raw(sumAlias(days))}`,
        ),
        sql`,
          `,
      );

      const result = await db.execute<Record<string, string | number | null>>(sql`
        SELECT
          ${pharmacyColumn} AS pharmacy_id,
          f.product_id,
          COUNT(DISTINCT f.business_date)::TEXT AS days_with_sales,
          ${windowSums}
        FROM pharma.fact_stock_activity f
        WHERE f.business_date BETWEEN ${lookbackStart}::DATE AND ${asOf}::DATE
          AND f.qty_sold > 0
          ${scopeCondition(scope)}
        GROUP BY ${groupBy}
        ORDER BY ${groupBy}
      `);

      return result.rows.map((r) => ({
        pharmacyId: Number(r.pharmacy_id),
        productId: Number(r.product_id),
        daysWithSales: parseInt(String(r.days_with_sales ?? '0'), 10),
        sums: byWindow((days) => String(r[sumAlias(days)] ?? '0')),
      }));
    },

    /**
     * Insert or overwrite usage rows. Upsert target: (pharmacy_id, product_id).
     * One statement per call, atomic per key; racing writers converge on the
     * last one. last_recalc always moves forward, even against a clock that
     * lags the stored value.
     */
    async upsertUsage(
      entries: Array<{ pharmacyId: number; productId: number; averages: UsageAverages }>,
      recalculatedAt: Date,
    ): Promise<UsageSummary[]> {
      if (entries.length === 0) {
        return [];
      }

      const values = entries.map((entry) => ({
        pharmacyId: entry.pharmacyId,
        productId: entry.productId,
        avgQty30d: entry.averages[30],
        avgQty90d: entry.averages[90],
        avgQty180d: entry.averages[180],
        lastRecalc: recalculatedAt,
      }));

      const rows = await db
        .insert(productUsage)
        .values(values)
        .onConflictDoUpdate({
          target: [productUsage.pharmacyId, productUsage.productId],
          set: {
            avgQty30d: sql`excluded.avg_qty_30d`,
            avgQty90d: sql`excluded.avg_qty_90d`,
            avgQty180d: sql`excluded.avg_qty_180d`,
            lastRecalc: sql`GREATEST(excluded.last_recalc, product_usage.last_recalc + INTERVAL '1 millisecond')`,
          },
        })
        .returning();

      return rows.map((row) => ({
        pharmacyId: row.pharmacyId,
        productId: row.productId,
        averages: averagesFromRow(row),
        lastRecalc: row.lastRecalc,
      }));
    },

    async countUsageRows(): Promise<number> {
      const rows = await db
        .select({ total: sql<string>`COUNT(*)::TEXT` })
        .from(productUsage);
      return parseInt(rows[0]?.total ?? '0', 10);
    },

    async findPharmacy(pharmacyId: number): Promise<SelectPharmacy | null> {
      const rows = await db
        .select()
        .from(pharmacies)
        .where(eq(pharmacies.pharmacyId, pharmacyId))
        .limit(1);
      return rows[0] ?? null;
    },

    async findProductByCode(productCode: string): Promise<SelectProduct | null> {
      const rows = await db
        .select()
        .from(products)
        .where(eq(products.productCode, productCode))
        .limit(1);
      return rows[0] ?? null;
    },

    async findProductsByIds(productIds: number[]): Promise<SelectProduct[]> {
      if (productIds.length === 0) {
        return [];
      }
      return db
        .select()
        .from(products)
        .where(inArray(products.productId, productIds));
    },

    /** Stored summary for one key, or null when none has been written. */
    async getUsage(
      pharmacyId: number,
      productId: number,
    ): Promise<UsageSummary | null> {
      const rows = await db
        .select()
        .from(productUsage)
        .where(
          and(
            eq(productUsage.pharmacyId, pharmacyId),
            eq(productUsage.productId, productId),
          ),
        )
        .limit(1);

      const row = rows[0];
      if (!row) {
        return null;
      }
      return {
        pharmacyId: row.pharmacyId,
        productId: row.productId,
        averages: averagesFromRow(row),
        lastRecalc: row.lastRecalc,
      };
    },

    /** Stored summaries for a pharmacy, highest 180-day average first. */
    async listTopUsage(pharmacyId: number, limit: number): Promise<UsageListing[]> {
      const rows = await db
        .select({
          usage: productUsage,
          productCode: products.productCode,
          description: products.description,
        })
        .from(productUsage)
        .innerJoin(products, eq(products.productId, productUsage.productId))
        .where(
          and(
            eq(productUsage.pharmacyId, pharmacyId),
            isNotNull(productUsage.avgQty180d),
          ),
        )
        .orderBy(desc(productUsage.avgQty180d))
        .limit(limit);

      return rows.map((r) => ({
        productId: r.usage.productId,
        productCode: r.productCode,
        description: r.description,
        averages: averagesFromRow(r.usage),
        lastRecalc: r.usage.lastRecalc,
      }));
    },
  };
}

export type ProductUsageRepository = ReturnType<typeof createProductUsageRepository>;
