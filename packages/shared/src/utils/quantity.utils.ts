// ============================================================================
// Fixed-point Quantity Utilities
// ============================================================================

/**
 * Quantities are numeric(18,3) in the database and arrive from the driver as
 * decimal strings. Averages are computed on integer thousandths so rounding
 * matches Postgres ROUND(numeric, 3): exact, half away from zero.
 */

const DECIMAL_RE = /^(-?)(\d+)(?:\.(\d+))?$/;

const SCALE = 1000;

/**
 * Parse a decimal string into integer thousandths. Digits past the third
 * fractional place are rounded half away from zero. null/undefined read as 0.
 */
export function toThousandths(value: string | null | undefined): number {
  if (value === null || value === undefined || value === '') {
    return 0;
  }

  const match = DECIMAL_RE.exec(value.trim());
  if (!match) {
    throw new RangeError(`Not a decimal quantity: ${value}`);
  }

  const [, sign, whole, fraction = ''] = match;
  const kept = Number(fraction.slice(0, 3).padEnd(3, '0'));
  const roundUp = fraction.length > 3 && Number(fraction[3]) >= 5 ? 1 : 0;
  const magnitude = Number(whole) * SCALE + kept + roundUp;

  return sign === '-' ? -magnitude : magnitude;
}

/** Render integer thousandths with exactly three fractional digits. */
export function formatThousandths(value: number): string {
  const sign = value < 0 ? '-' : '';
  const abs = Math.abs(value);
  const whole = Math.floor(abs / SCALE);
  const fraction = String(abs % SCALE).padStart(3, '0');
  return `${sign}${whole}.${fraction}`;
}

/**
 * Average daily quantity over a fixed-length window, in thousandths.
 * The divisor is the window length, not the number of days with sales.
 */
export function averagePerDay(sumThousandths: number, windowDays: number): number {
  if (!Number.isInteger(windowDays) || windowDays <= 0) {
    throw new RangeError(`Window must be a positive whole number of days: ${windowDays}`);
  }
  if (sumThousandths <= 0) {
    return 0;
  }
  // floor(n / W + 1/2) on integers
  return Math.floor((2 * sumThousandths + windowDays) / (2 * windowDays));
}
