// ============================================================================
// Business Date Utilities
// Business dates travel as ISO calendar strings (YYYY-MM-DD), the same shape
// Postgres `date` columns use in string mode. Arithmetic is done in UTC so a
// DST change never shifts a day.
// ============================================================================

const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * True when the string is a real calendar date in YYYY-MM-DD form
 * (rejects 2026-02-30 and friends).
 */
export function isIsoDate(value: string): boolean {
  const match = ISO_DATE_RE.exec(value);
  if (!match) {
    return false;
  }
  const [, y, m, d] = match;
  const parsed = new Date(Date.UTC(Number(y), Number(m) - 1, Number(d)));
  return (
    parsed.getUTCFullYear() === Number(y) &&
    parsed.getUTCMonth() === Number(m) - 1 &&
    parsed.getUTCDate() === Number(d)
  );
}

function parseIsoDate(value: string): Date {
  if (!isIsoDate(value)) {
    throw new RangeError(`Not an ISO date: ${value}`);
  }
  const [y, m, d] = value.split('-').map(Number);
  return new Date(Date.UTC(y, m - 1, d));
}

function formatUtcDate(d: Date): string {
  const year = d.getUTCFullYear();
  const month = String(d.getUTCMonth() + 1).padStart(2, '0');
  const day = String(d.getUTCDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/** The local calendar date of `d`, as the pharmacies see it. */
export function formatDate(d: Date): string {
  const year = d.getFullYear();
  const month = String(d.getMonth() + 1).padStart(2, '0');
  const day = String(d.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

export function addDays(isoDate: string, days: number): string {
  const base = parseIsoDate(isoDate);
  return formatUtcDate(new Date(base.getTime() + days * MS_PER_DAY));
}

/** First day of the trailing window of `windowDays` days ending on `endDate`. */
export function windowStart(endDate: string, windowDays: number): string {
  return addDays(endDate, -(windowDays - 1));
}

/** Compare two ISO dates; negative when a < b. */
export function compareIsoDates(a: string, b: string): number {
  return parseIsoDate(a).getTime() - parseIsoDate(b).getTime();
}
