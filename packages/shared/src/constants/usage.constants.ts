// ============================================================================
// Product Usage — Constants
// ============================================================================

// --- Trailing windows (days) for average daily sold quantity ---
// Each window W ending on the processing date D covers [D - (W - 1), D].
// Order matters: it is the column order used in tables and exports.

export const USAGE_WINDOWS_DAYS = [30, 90, 180] as const;

export type UsageWindowDays = (typeof USAGE_WINDOWS_DAYS)[number];

// Facts older than the widest window never contribute to any average.
export const USAGE_LOOKBACK_DAYS: number = Math.max(...USAGE_WINDOWS_DAYS);

// --- Pharmacy scoping ---

// Pseudo-pharmacy for group-level figures summed across every pharmacy.
// Group figures are computed on the fly and never written to product_usage.
export const GROUP_PHARMACY_ID = 100;

export const DEFAULT_PHARMACY_ID = 1;

// --- Top usage listing ---

export const TOP_USAGE_DEFAULT_LIMIT = 10;
export const TOP_USAGE_MAX_LIMIT = 200;

// --- Refresh job ---

// Rows per INSERT ... ON CONFLICT statement during a full refresh.
export const USAGE_UPSERT_CHUNK_SIZE = 500;

/** Build a per-window record; the compiler checks every window is covered. */
export function byWindow<T>(
  fn: (days: UsageWindowDays) => T,
): Record<UsageWindowDays, T> {
  return { 30: fn(30), 90: fn(90), 180: fn(180) };
}
