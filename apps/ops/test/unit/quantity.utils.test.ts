import { describe, it, expect } from 'vitest';
import {
  toThousandths,
  formatThousandths,
  averagePerDay,
} from '@pharmaops/shared/utils/quantity.utils.js';

describe('toThousandths', () => {
  it('parses whole and fractional quantities', () => {
    expect(toThousandths('12')).toBe(12000);
    expect(toThousandths('1.5')).toBe(1500);
    expect(toThousandths('0.125')).toBe(125);
  });

  it('rounds a fourth fractional digit half away from zero', () => {
    expect(toThousandths('1.2345')).toBe(1235);
    expect(toThousandths('1.2344')).toBe(1234);
    expect(toThousandths('-1.2345')).toBe(-1235);
    expect(toThousandths('0.0005')).toBe(1);
  });

  it('reads null, undefined and empty as zero', () => {
    expect(toThousandths(null)).toBe(0);
    expect(toThousandths(undefined)).toBe(0);
    expect(toThousandths('')).toBe(0);
  });

  it('rejects non-decimal input', () => {
    expect(() => toThousandths('abc')).toThrow(RangeError);
    expect(() => toThousandths('1e3')).toThrow(RangeError);
  });
});

describe('formatThousandths', () => {
  it('always prints three fractional digits', () => {
    expect(formatThousandths(0)).toBe('0.000');
    expect(formatThousandths(333)).toBe('0.333');
    expect(formatThousandths(1222)).toBe('1.222');
    expect(formatThousandths(12000)).toBe('12.000');
    expect(formatThousandths(-5)).toBe('-0.005');
  });
});

describe('averagePerDay', () => {
  it('divides by the window length, not the days with sales', () => {
    // 10 units in a 30 day window
    expect(averagePerDay(10000, 30)).toBe(333);
    expect(averagePerDay(110000, 90)).toBe(1222);
    expect(averagePerDay(110000, 180)).toBe(611);
  });

  it('rounds an exact half up', () => {
    // 0.015 / 30 = 0.0005
    expect(averagePerDay(15, 30)).toBe(1);
    expect(averagePerDay(14, 30)).toBe(0);
  });

  it('returns zero for no sales', () => {
    expect(averagePerDay(0, 30)).toBe(0);
  });

  it('rejects a window that is not a positive whole number', () => {
    expect(() => averagePerDay(1000, 0)).toThrow(RangeError);
    expect(() => averagePerDay(1000, 2.5)).toThrow(RangeError);
  });
});
