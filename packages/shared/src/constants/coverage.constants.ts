// ============================================================================
// Report Coverage (Logbook) — Constants
// ============================================================================

// --- Report kinds ---
// Closed set of the four daily reports each pharmacy sends. Every caller
// derives its columns, labels and missing-lists from REPORT_KINDS; adding a
// kind is a schema change on pharma.report_coverage.

export const ReportKind = {
  TURNOVER: 'turnover',
  TRADING_STOCK: 'trading-stock',
  SCRIPTS_DISPENSED: 'scripts-dispensed',
  GROSS_PROFIT: 'gross-profit',
} as const;

export type ReportKind = (typeof ReportKind)[keyof typeof ReportKind];

export interface ReportKindDefinition {
  kind: ReportKind;
  /** Source system report code, as printed on the report itself. */
  label: string;
  /** Property name of the flag column on the reportCoverage table. */
  column: 'inv249Turnover' | 'stk261Trading' | 'phm080Scripts' | 'stk260Gp';
}

export const REPORT_KIND_DEFINITIONS: Record<ReportKind, ReportKindDefinition> = {
  [ReportKind.TURNOVER]: {
    kind: ReportKind.TURNOVER,
    label: 'INV249',
    column: 'inv249Turnover',
  },
  [ReportKind.TRADING_STOCK]: {
    kind: ReportKind.TRADING_STOCK,
    label: 'STK261',
    column: 'stk261Trading',
  },
  [ReportKind.SCRIPTS_DISPENSED]: {
    kind: ReportKind.SCRIPTS_DISPENSED,
    label: 'PHM080',
    column: 'phm080Scripts',
  },
  [ReportKind.GROSS_PROFIT]: {
    kind: ReportKind.GROSS_PROFIT,
    label: 'STK260_GP',
    column: 'stk260Gp',
  },
};

// Display and missing-list order.
export const REPORT_KINDS: readonly ReportKindDefinition[] = [
  REPORT_KIND_DEFINITIONS[ReportKind.TURNOVER],
  REPORT_KIND_DEFINITIONS[ReportKind.TRADING_STOCK],
  REPORT_KIND_DEFINITIONS[ReportKind.SCRIPTS_DISPENSED],
  REPORT_KIND_DEFINITIONS[ReportKind.GROSS_PROFIT],
];

/** Build a per-kind record; the compiler checks every kind is covered. */
export function byReportKind<T>(
  fn: (definition: ReportKindDefinition) => T,
): Record<ReportKind, T> {
  return {
    [ReportKind.TURNOVER]: fn(REPORT_KIND_DEFINITIONS[ReportKind.TURNOVER]),
    [ReportKind.TRADING_STOCK]: fn(REPORT_KIND_DEFINITIONS[ReportKind.TRADING_STOCK]),
    [ReportKind.SCRIPTS_DISPENSED]: fn(REPORT_KIND_DEFINITIONS[ReportKind.SCRIPTS_DISPENSED]),
    [ReportKind.GROSS_PROFIT]: fn(REPORT_KIND_DEFINITIONS[ReportKind.GROSS_PROFIT]),
  };
}

// --- Range & ordering ---

// Default window: today and the preceding 29 days.
export const DEFAULT_COVERAGE_DAYS = 30;

export const CoverageSortOrder = {
  ASC: 'asc',
  DESC: 'desc',
} as const;

export type CoverageSortOrder =
  (typeof CoverageSortOrder)[keyof typeof CoverageSortOrder];
