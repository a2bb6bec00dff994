import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  createCoverageService,
  resolveCoverageRange,
  missingKinds,
} from './coverage.service.js';
import type {
  CoverageRecord,
  ReportCoverageRepository,
} from '../repos/report-coverage.repo.js';
import { ValidationError } from '../../../lib/errors.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const TODAY = '2026-03-31';
const NOW = new Date(2026, 2, 31, 9, 0, 0);

function record(kinds: Partial<CoverageRecord['kinds']> = {}): CoverageRecord {
  return {
    businessDate: '2026-03-30',
    pharmacyId: 2,
    pharmacyName: 'Hillside Pharmacy',
    kinds: {
      turnover: true,
      'trading-stock': true,
      'scripts-dispensed': true,
      'gross-profit': true,
      ...kinds,
    },
    lastUpdated: new Date('2026-03-30T18:00:00.000Z'),
  };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('resolveCoverageRange', () => {
  it('defaults to today and the preceding 29 days', () => {
    expect(resolveCoverageRange({}, TODAY)).toEqual({
      startDate: '2026-03-02',
      endDate: '2026-03-31',
    });
  });

  it('ignores until without since or daysBack', () => {
    expect(resolveCoverageRange({ until: '2026-03-10' }, TODAY)).toEqual({
      startDate: '2026-03-02',
      endDate: '2026-03-31',
    });
  });

  it('counts daysBack back from until', () => {
    expect(resolveCoverageRange({ daysBack: 7, until: '2026-03-10' }, TODAY)).toEqual({
      startDate: '2026-03-04',
      endDate: '2026-03-10',
    });
  });

  it('runs since through today when until is absent', () => {
    expect(resolveCoverageRange({ since: '2026-03-01' }, TODAY)).toEqual({
      startDate: '2026-03-01',
      endDate: '2026-03-31',
    });
  });

  it('takes a single day when since equals until', () => {
    expect(
      resolveCoverageRange({ since: '2026-03-15', until: '2026-03-15' }, TODAY),
    ).toEqual({ startDate: '2026-03-15', endDate: '2026-03-15' });
  });

  it('rejects daysBack combined with since', () => {
    expect(() => resolveCoverageRange({ daysBack: 7, since: '2026-03-01' }, TODAY)).toThrow(
      ValidationError,
    );
  });

  it('rejects a start after the end', () => {
    expect(() =>
      resolveCoverageRange({ since: '2026-04-01', until: '2026-03-31' }, TODAY),
    ).toThrow('Start date 2026-04-01 is after end date 2026-03-31');
  });
});

describe('missingKinds', () => {
  it('lists absent kinds in fixed order', () => {
    expect(
      missingKinds(record({ 'gross-profit': false, 'trading-stock': false })),
    ).toEqual(['trading-stock', 'gross-profit']);
  });

  it('is empty for a complete day', () => {
    expect(missingKinds(record())).toEqual([]);
  });
});

describe('CoverageService', () => {
  let findCoverage: ReturnType<typeof vi.fn>;
  let service: ReturnType<typeof createCoverageService>;

  beforeEach(() => {
    findCoverage = vi.fn().mockResolvedValue([]);
    service = createCoverageService({
      coverageRepo: { findCoverage } as unknown as ReportCoverageRepository,
      now: () => NOW,
    });
  });

  it('passes the resolved range and defaults to the repository', async () => {
    await service.getCoverage({ daysBack: 7, missingOnly: true });

    expect(findCoverage).toHaveBeenCalledWith({
      startDate: '2026-03-25',
      endDate: '2026-03-31',
      pharmacyId: undefined,
      pharmacyLike: undefined,
      missingOnly: true,
      order: 'desc',
    });
  });

  it('annotates each row with its missing kinds', async () => {
    findCoverage.mockResolvedValueOnce([record({ turnover: false })]);

    const result = await service.getCoverage({});

    expect(result.startDate).toBe('2026-03-02');
    expect(result.endDate).toBe('2026-03-31');
    expect(result.rows).toHaveLength(1);
    expect(result.rows[0].missing).toEqual(['turnover']);
  });

  it('returns an empty list when nothing matches', async () => {
    const result = await service.getCoverage({ pharmacyLike: 'nowhere' });

    expect(result.rows).toEqual([]);
  });

  it('rejects a malformed date before querying', async () => {
    await expect(service.getCoverage({ since: '2026-02-30' })).rejects.toBeInstanceOf(
      ValidationError,
    );
    expect(findCoverage).not.toHaveBeenCalled();
  });

  it('rejects daysBack together with since', async () => {
    await expect(
      service.getCoverage({ daysBack: 3, since: '2026-03-01' }),
    ).rejects.toThrow('--days-back and --since cannot be combined');
  });

  it('wraps driver failures', async () => {
    findCoverage.mockRejectedValueOnce(new Error('connection refused'));

    await expect(service.getCoverage({})).rejects.toThrow(
      'Coverage query failed: connection refused',
    );
  });
});
