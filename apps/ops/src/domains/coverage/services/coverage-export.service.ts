// ============================================================================
// Coverage Export
// CSV and JSON serialisations of the logbook rows, written to caller-chosen
// paths. Both carry exactly the rows the table shows.
// ============================================================================

import { writeFile } from 'node:fs/promises';
import {
  REPORT_KINDS,
  REPORT_KIND_DEFINITIONS,
} from '@pharmaops/shared/constants/coverage.constants.js';
import type { CoverageExportTargets } from '@pharmaops/shared/schemas/validation/coverage.validation.js';
import type { CoverageRow } from './coverage.service.js';

/** Abstraction over where exports land (local FS in production). */
export interface FileStorage {
  writeFile(path: string, content: string): Promise<void>;
}

export const localFileStorage: FileStorage = {
  async writeFile(path, content) {
    await writeFile(path, content, 'utf-8');
  },
};

export interface CoverageExportRecord {
  business_date: string;
  pharmacy_id: number;
  pharmacy: string;
  [reportColumn: string]: string | number | boolean | string[];
  missing: string[];
}

// ---------------------------------------------------------------------------
// Serialisation
// ---------------------------------------------------------------------------

function reportColumn(label: string): string {
  return label.toLowerCase();
}

const COVERAGE_CSV_HEADERS = [
  'business_date',
  'pharmacy_id',
  'pharmacy',
  ...REPORT_KINDS.map((k) => reportColumn(k.label)),
  'missing',
];

function escapeCsvField(value: string): string {
  if (/[,"\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function missingLabels(row: CoverageRow): string[] {
  return row.missing.map((kind) => REPORT_KIND_DEFINITIONS[kind].label);
}

export function toExportRecord(row: CoverageRow): CoverageExportRecord {
  const reports: Record<string, boolean> = {};
  for (const k of REPORT_KINDS) {
    reports[reportColumn(k.label)] = row.kinds[k.kind];
  }
  return {
    business_date: row.businessDate,
    pharmacy_id: row.pharmacyId,
    pharmacy: row.pharmacyName,
    ...reports,
    missing: missingLabels(row),
  };
}

export function buildCoverageCsv(rows: CoverageRow[]): string {
  const lines = rows.map((row) =>
    [
      row.businessDate,
      String(row.pharmacyId),
      row.pharmacyName,
      ...REPORT_KINDS.map((k) => String(row.kinds[k.kind])),
      missingLabels(row).join(';'),
    ]
      .map(escapeCsvField)
      .join(','),
  );
  return [COVERAGE_CSV_HEADERS.join(','), ...lines].join('\n') + '\n';
}

export function buildCoverageJson(rows: CoverageRow[]): string {
  return JSON.stringify(rows.map(toExportRecord), null, 2) + '\n';
}

// ---------------------------------------------------------------------------
// Writer
// ---------------------------------------------------------------------------

/** Write each requested export; returns the paths written, CSV first. */
export async function writeCoverageExports(
  rows: CoverageRow[],
  targets: CoverageExportTargets,
  storage: FileStorage = localFileStorage,
): Promise<string[]> {
  const written: string[] = [];
  if (targets.csv) {
    await storage.writeFile(targets.csv, buildCoverageCsv(rows));
    written.push(targets.csv);
  }
  if (targets.json) {
    await storage.writeFile(targets.json, buildCoverageJson(rows));
    written.push(targets.json);
  }
  return written;
}
