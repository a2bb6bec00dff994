import { describe, it, expect, vi, beforeEach } from 'vitest';
import { pino } from 'pino';
import {
  createReconciliationService,
  isUnlinkedBatch,
} from './reconciliation.service.js';
import type {
  DebtorImportRepository,
  ImportBatch,
} from '../repos/debtor-import.repo.js';
import { ValidationError } from '../../../lib/errors.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function batch(overrides: Partial<ImportBatch> = {}): ImportBatch {
  return {
    id: 1,
    pharmacyId: 3,
    pharmacyName: 'Hillside Pharmacy',
    filename: 'debtors.pdf',
    uploadedAt: new Date('2026-03-30T08:00:00.000Z'),
    status: 'completed',
    errorMessage: null,
    claimedCount: 50,
    derivedCount: 50,
    totalOutstanding: '1000.00',
    ...overrides,
  };
}

function createMockRepo() {
  return {
    findRecentBatches: vi.fn().mockResolvedValue([]),
    findProblematicBatches: vi.fn().mockResolvedValue([]),
    findLastSuccessfulBatch: vi.fn().mockResolvedValue(null),
    findLatestBatch: vi.fn().mockResolvedValue(null),
    countBatchesByPharmacy: vi.fn().mockResolvedValue([]),
    getDebtorTotals: vi
      .fn()
      .mockResolvedValue({ pharmacyCount: 0, debtorCount: 0, totalOutstanding: '0' }),
    describeColumns: vi.fn().mockResolvedValue([]),
    describeConstraints: vi.fn().mockResolvedValue([]),
  };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('ReconciliationService', () => {
  let repo: ReturnType<typeof createMockRepo>;
  let service: ReturnType<typeof createReconciliationService>;

  beforeEach(() => {
    repo = createMockRepo();
    service = createReconciliationService({
      importRepo: repo as unknown as DebtorImportRepository,
      logger: pino({ level: 'silent' }),
    });
  });

  describe('check', () => {
    it('reports a batch that claimed accounts but linked none', async () => {
      const problem = batch({ id: 9, claimedCount: 50, derivedCount: 0 });
      const good = batch({ id: 8, derivedCount: 48 });
      repo.findProblematicBatches.mockResolvedValueOnce([problem]);
      repo.findLastSuccessfulBatch.mockResolvedValueOnce(good);

      const report = await service.check(5);

      expect(repo.findProblematicBatches).toHaveBeenCalledWith(5);
      expect(report).toEqual({
        problematic: [problem],
        lastSuccessful: good,
        hasSuccessfulBatch: true,
      });
    });

    it('flags the absence of any successful batch explicitly', async () => {
      const report = await service.check();

      expect(repo.findProblematicBatches).toHaveBeenCalledWith(5);
      expect(report).toEqual({
        problematic: [],
        lastSuccessful: null,
        hasSuccessfulBatch: false,
      });
    });

    it('rejects a limit outside 1..100', async () => {
      await expect(service.check(0)).rejects.toBeInstanceOf(ValidationError);
      await expect(service.check(101)).rejects.toBeInstanceOf(ValidationError);
      expect(repo.findProblematicBatches).not.toHaveBeenCalled();
    });

    it('wraps driver failures', async () => {
      repo.findProblematicBatches.mockRejectedValueOnce(new Error('connection reset'));

      await expect(service.check(5)).rejects.toThrow(
        'Import reconciliation failed: connection reset',
      );
    });
  });

  describe('listRecentBatches', () => {
    it('flags batches that claimed accounts but linked none', async () => {
      const unlinked = batch({ id: 9, claimedCount: 50, derivedCount: 0 });
      const linked = batch({ id: 8, claimedCount: 50, derivedCount: 50 });
      repo.findRecentBatches.mockResolvedValueOnce([unlinked, linked]);

      const recent = await service.listRecentBatches();

      expect(repo.findRecentBatches).toHaveBeenCalledWith(5);
      expect(recent).toEqual([
        { ...unlinked, unlinked: true },
        { ...linked, unlinked: false },
      ]);
    });

    it('passes an explicit limit through', async () => {
      await service.listRecentBatches(20);

      expect(repo.findRecentBatches).toHaveBeenCalledWith(20);
    });

    it('wraps driver failures', async () => {
      repo.findRecentBatches.mockRejectedValueOnce(new Error('connection reset'));

      await expect(service.listRecentBatches()).rejects.toThrow(
        'Recent import listing failed: connection reset',
      );
    });
  });

  describe('isUnlinkedBatch', () => {
    it('needs claimed accounts and no linked rows', () => {
      expect(isUnlinkedBatch(batch({ claimedCount: 50, derivedCount: 0 }))).toBe(true);
      expect(isUnlinkedBatch(batch({ claimedCount: 50, derivedCount: 50 }))).toBe(false);
      expect(isUnlinkedBatch(batch({ claimedCount: 0, derivedCount: 0 }))).toBe(false);
    });
  });

  describe('getImportSummary', () => {
    it('combines the latest batch, per-pharmacy counts and totals', async () => {
      const latest = { ...batch(), uploadedByUsername: 'test-user' };
      const byPharmacy = [
        {
          pharmacyId: 3,
          pharmacyName: 'Hillside Pharmacy',
          batchCount: 2,
          lastImport: latest.uploadedAt,
        },
      ];
      const totals = { pharmacyCount: 1, debtorCount: 50, totalOutstanding: '1000.00' };
      repo.findLatestBatch.mockResolvedValueOnce(latest);
      repo.countBatchesByPharmacy.mockResolvedValueOnce(byPharmacy);
      repo.getDebtorTotals.mockResolvedValueOnce(totals);

      expect(await service.getImportSummary()).toEqual({ latest, byPharmacy, totals });
    });
  });

  describe('describeDerivedTable', () => {
    it('names the debtor table alongside its columns and constraints', async () => {
      const columns = [{ name: 'id', dataType: 'bigint', nullable: false }];
      repo.describeColumns.mockResolvedValueOnce(columns);

      expect(await service.describeDerivedTable()).toEqual({
        table: 'pharma.debtors',
        columns,
        constraints: [],
      });
    });
  });
});
