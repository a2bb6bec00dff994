// ============================================================================
// Usage Refresh Service
// Rolling 30/90/180-day average daily sold quantity per pharmacy + product.
// Full refresh, single-key refresh and on-the-fly group figures all go
// through computeUsageAverages so the numbers cannot drift apart.
// ============================================================================

import {
  GROUP_PHARMACY_ID,
  USAGE_UPSERT_CHUNK_SIZE,
  byWindow,
} from '@pharmaops/shared/constants/usage.constants.js';
import {
  averagePerDay,
  formatThousandths,
  toThousandths,
} from '@pharmaops/shared/utils/quantity.utils.js';
import { formatDate } from '@pharmaops/shared/utils/date.utils.js';
import type {
  ProductUsageRepository,
  UsageAverages,
  UsageListing,
  UsageScope,
  UsageSummary,
  UsageWindowSums,
} from '../repos/product-usage.repo.js';
import {
  DataUnavailableError,
  StoreOperationError,
  toStoreError,
} from '../../../lib/errors.js';
import type { Logger } from '../../../lib/logger.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

interface UsageRefreshDeps {
  usageRepo: ProductUsageRepository;
  logger: Logger;
  /** Wall-clock allowance for a full refresh. */
  timeoutMs: number;
  now?: () => Date;
}

export interface RefreshAllResult {
  asOf: string;
  keysRefreshed: number;
  totalRows: number;
  durationMs: number;
}

export interface RefreshProductResult {
  pharmacyId: number;
  productCode: string;
  productId: number;
  asOf: string;
  /** null when the key had no sales in the lookback window; nothing was written. */
  usage: UsageSummary | null;
}

export interface ProductUsageView {
  pharmacyId: number;
  productCode: string;
  description: string | null;
  averages: UsageAverages;
  lastRecalc: Date;
}

interface UsageEntry {
  pharmacyId: number;
  productId: number;
  averages: UsageAverages;
}

const ZERO_AVERAGES: UsageAverages = byWindow(() => formatThousandths(0));

// ---------------------------------------------------------------------------
// Computation
// ---------------------------------------------------------------------------

/**
 * avg_W = round(sum_W / W, 3) for every window W. The divisor is the window
 * length, so sparse sellers are diluted toward zero. Returns null for a key
 * with no days of sales, which must not be written.
 */
export function computeUsageAverages(sums: UsageWindowSums): UsageAverages | null {
  if (sums.daysWithSales < 1) {
    return null;
  }
  return byWindow((days) =>
    formatThousandths(averagePerDay(toThousandths(sums.sums[days]), days)),
  );
}

function compareByLongestWindow(a: UsageEntry, b: UsageEntry): number {
  const diff = toThousandths(b.averages[180]) - toThousandths(a.averages[180]);
  return diff !== 0 ? diff : a.productId - b.productId;
}

// ---------------------------------------------------------------------------
// Service Factory
// ---------------------------------------------------------------------------

export function createUsageRefreshService(deps: UsageRefreshDeps) {
  const { usageRepo, logger, timeoutMs } = deps;
  const getNow = deps.now ?? (() => new Date());

  async function summarize(scope: UsageScope, asOf: string): Promise<UsageEntry[]> {
    const windowSums = await usageRepo.fetchWindowSums(scope, asOf);
    const entries: UsageEntry[] = [];
    for (const sums of windowSums) {
      const averages = computeUsageAverages(sums);
      if (averages) {
        entries.push({ pharmacyId: sums.pharmacyId, productId: sums.productId, averages });
      }
    }
    return entries;
  }

  async function requireProduct(productCode: string) {
    const product = await usageRepo.findProductByCode(productCode);
    if (!product) {
      throw new DataUnavailableError(`Product ${productCode}`);
    }
    return product;
  }

  return {
    /**
     * Recompute every key with sales in the lookback window and upsert in
     * chunks. Not one transaction: an abort leaves finished chunks refreshed
     * and the rest as they were. Returns the summary row count afterwards.
     */
    async refreshAll(): Promise<RefreshAllResult> {
      const startedAt = getNow();
      const deadline = startedAt.getTime() + timeoutMs;
      const asOf = formatDate(startedAt);

      try {
        const entries = await summarize({ type: 'all' }, asOf);
        logger.debug({ scope: 'all', asOf, keys: entries.length }, 'Usage averages computed');

        let keysRefreshed = 0;
        for (let i = 0; i < entries.length; i += USAGE_UPSERT_CHUNK_SIZE) {
          if (getNow().getTime() > deadline) {
            throw new StoreOperationError(
              `Product usage refresh exceeded ${timeoutMs} ms after ${keysRefreshed} of ${entries.length} keys`,
            );
          }
          const written = await usageRepo.upsertUsage(
            entries.slice(i, i + USAGE_UPSERT_CHUNK_SIZE),
            getNow(),
          );
          keysRefreshed += written.length;
        }

        const totalRows = await usageRepo.countUsageRows();
        const durationMs = getNow().getTime() - startedAt.getTime();

        logger.info(
          { scope: 'all', asOf, keysRefreshed, totalRows, durationMs },
          'Product usage refreshed',
        );

        return { asOf, keysRefreshed, totalRows, durationMs };
      } catch (error) {
        throw toStoreError(error, 'Product usage refresh');
      }
    },

    /**
     * Recompute one (pharmacy, product code) key with the same computation
     * as refreshAll.
     */
    async refreshProduct(
      pharmacyId: number,
      productCode: string,
    ): Promise<RefreshProductResult> {
      const asOf = formatDate(getNow());

      try {
        const pharmacy = await usageRepo.findPharmacy(pharmacyId);
        if (!pharmacy) {
          throw new DataUnavailableError(`Pharmacy ${pharmacyId}`);
        }
        const product = await requireProduct(productCode);

        const entries = await summarize(
          { type: 'key', pharmacyId, productId: product.productId },
          asOf,
        );

        const [usage = null] =
          entries.length > 0 ? await usageRepo.upsertUsage(entries, getNow()) : [];

        logger.info(
          { scope: 'key', pharmacyId, productCode, asOf, written: usage !== null },
          usage ? 'Product usage refreshed' : 'No sales in lookback window',
        );

        return { pharmacyId, productCode, productId: product.productId, asOf, usage };
      } catch (error) {
        throw toStoreError(error, `Product usage refresh for ${productCode}`);
      }
    },

    /**
     * Highest 180-day averages for a pharmacy. The group pseudo-pharmacy is
     * computed on the fly across every pharmacy instead of read back.
     */
    async getTopUsage(pharmacyId: number, limit: number): Promise<UsageListing[]> {
      try {
        if (pharmacyId !== GROUP_PHARMACY_ID) {
          return await usageRepo.listTopUsage(pharmacyId, limit);
        }

        const now = getNow();
        const top = (await summarize({ type: 'group' }, formatDate(now)))
          .sort(compareByLongestWindow)
          .slice(0, limit);

        const productsById = new Map(
          (await usageRepo.findProductsByIds(top.map((e) => e.productId))).map((p) => [
            p.productId,
            p,
          ]),
        );

        return top.flatMap((entry) => {
          const product = productsById.get(entry.productId);
          if (!product) {
            return [];
          }
          return [
            {
              productId: entry.productId,
              productCode: product.productCode,
              description: product.description,
              averages: entry.averages,
              lastRecalc: now,
            },
          ];
        });
      } catch (error) {
        throw toStoreError(error, 'Top usage lookup');
      }
    },

    /**
     * Usage for one product. Stored summary for a real pharmacy; for the group
     * pseudo-pharmacy the figures are computed now, and a known product with
     * no sales reads as zeros.
     */
    async getProductUsage(
      pharmacyId: number,
      productCode: string,
    ): Promise<ProductUsageView> {
      try {
        const product = await requireProduct(productCode);

        if (pharmacyId === GROUP_PHARMACY_ID) {
          const now = getNow();
          const [entry] = await summarize(
            { type: 'group', productId: product.productId },
            formatDate(now),
          );
          return {
            pharmacyId,
            productCode: product.productCode,
            description: product.description,
            averages: entry?.averages ?? ZERO_AVERAGES,
            lastRecalc: now,
          };
        }

        const usage = await usageRepo.getUsage(pharmacyId, product.productId);
        if (!usage) {
          throw new DataUnavailableError(
            `Usage for product ${productCode} at pharmacy ${pharmacyId}`,
          );
        }

        return {
          pharmacyId,
          productCode: product.productCode,
          description: product.description,
          averages: usage.averages,
          lastRecalc: usage.lastRecalc,
        };
      } catch (error) {
        throw toStoreError(error, `Usage lookup for ${productCode}`);
      }
    },
  };
}

export type UsageRefreshService = ReturnType<typeof createUsageRefreshService>;
