import { describe, it, expect } from 'vitest';
import {
  isIsoDate,
  formatDate,
  addDays,
  windowStart,
  compareIsoDates,
} from '@pharmaops/shared/utils/date.utils.js';

describe('isIsoDate', () => {
  it('accepts real calendar dates', () => {
    expect(isIsoDate('2026-03-31')).toBe(true);
    expect(isIsoDate('2024-02-29')).toBe(true);
  });

  it('rejects impossible dates and other shapes', () => {
    expect(isIsoDate('2026-02-30')).toBe(false);
    expect(isIsoDate('2025-02-29')).toBe(false);
    expect(isIsoDate('2026-3-1')).toBe(false);
    expect(isIsoDate('31/03/2026')).toBe(false);
  });
});

describe('formatDate', () => {
  it('uses the local calendar date', () => {
    expect(formatDate(new Date(2026, 0, 5, 23, 30))).toBe('2026-01-05');
  });
});

describe('addDays', () => {
  it('crosses month and year boundaries', () => {
    expect(addDays('2026-03-01', -1)).toBe('2026-02-28');
    expect(addDays('2025-12-31', 1)).toBe('2026-01-01');
  });

  it('throws on a malformed date', () => {
    expect(() => addDays('2026-13-01', 1)).toThrow(RangeError);
  });
});

describe('windowStart', () => {
  it('returns the first day of an inclusive trailing window', () => {
    expect(windowStart('2026-03-31', 1)).toBe('2026-03-31');
    expect(windowStart('2026-03-31', 30)).toBe('2026-03-02');
    expect(windowStart('2026-03-31', 90)).toBe('2026-01-01');
    expect(windowStart('2026-03-31', 180)).toBe('2025-10-03');
  });
});

describe('compareIsoDates', () => {
  it('orders dates chronologically', () => {
    expect(compareIsoDates('2026-01-01', '2026-01-02')).toBeLessThan(0);
    expect(compareIsoDates('2026-01-02', '2026-01-01')).toBeGreaterThan(0);
    expect(compareIsoDates('2026-01-01', '2026-01-01')).toBe(0);
  });
});
