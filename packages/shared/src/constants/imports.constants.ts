// ============================================================================
// Debtor Imports — Constants
// ============================================================================

// --- Import batch status (pharma.debtor_reports.status) ---
// Set by the importer; the reconciliation check only reads it.

export const DebtorReportStatus = {
  PROCESSING: 'processing',
  COMPLETED: 'completed',
  FAILED: 'failed',
} as const;

export type DebtorReportStatus =
  (typeof DebtorReportStatus)[keyof typeof DebtorReportStatus];

// --- Reconciliation ---

export const DEFAULT_BATCH_LIMIT = 5;
export const MAX_BATCH_LIMIT = 100;

