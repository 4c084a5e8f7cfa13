import type { LedgerTransaction } from "@shared/schema";

// A row as a statement format emits it, before validation
export interface RawStatementRow {
  file: string;
  // 1-based position among the file's data rows
  row: number;
  date: string;
  description: string;
  // null when the source text could not be read as a number
  amount: number | null;
  period: string;
  notes: string;
  origin: string;
}

export interface ValidatedTransaction {
  date: string;
  description: string;
  amount: number;
  period: string;
  notes: string;
  origin: string;
}

export interface HashedTransaction extends ValidatedTransaction {
  identityHash: string;
}

export type RejectionReason = "invalid_date" | "invalid_amount" | "missing_description";

export interface RejectedRow {
  file: string;
  row: number;
  reason: RejectionReason;
  detail: string;
}

export interface SkippedFile {
  file: string;
  code: "UNRECOGNIZED_FILE" | "FILE_READ_FAILED" | "MISSING_COLUMNS";
  reason: string;
}

export interface ParsedFile {
  file: string;
  format: string;
  origin: string;
  period: string;
  rows: number;
}

export interface MergeReport {
  considered: number;
  inserted: number;
  duplicates: number;
  total: number;
}

export interface LedgerSummary {
  totalRows: number;
  totalAmount: number;
  rowsByOrigin: Record<string, number>;
  periods: string[];
  uncategorizedRows: number;
  amountByCategory: Record<string, number>;
}

export interface IngestionResult {
  files: ParsedFile[];
  skippedFiles: SkippedFile[];
  rejected: RejectedRow[];
  merge: MergeReport;
  summary: LedgerSummary;
  inserted: LedgerTransaction[];
}

export interface IngestionOptions {
  // Keep rows whose amount failed to parse, with amount 0
  tolerateUnparseableAmounts?: boolean;
  now?: () => Date;
}
