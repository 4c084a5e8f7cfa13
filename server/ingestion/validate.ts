import { format, isValid, parse } from "date-fns";
import { DATE_FORMAT } from "@shared/schema";
import type { RawStatementRow, RejectedRow, ValidatedTransaction } from "./types";

const DATE_SHAPE = /^\d{1,2}\/\d{1,2}\/\d{4}$/;
const MISSING_TEXT = "nan";

// Amounts are stored as fixed two-decimal text, so cents must stay exact
function isStorableAmount(amount: number | null): amount is number {
  return amount !== null && Number.isFinite(amount) && Math.abs(amount) * 100 <= Number.MAX_SAFE_INTEGER;
}

export type ValidationOutcome =
  | { ok: true; transaction: ValidatedTransaction }
  | { ok: false; rejection: RejectedRow };

export interface ValidationOptions {
  tolerateUnparseableAmounts?: boolean;
}

/**
 * Renders a d/M/yyyy date zero-padded, or returns null when the text is not a
 * real calendar date in that layout.
 */
export function canonicalizeDate(value: string): string | null {
  const trimmed = value.trim();
  if (!DATE_SHAPE.test(trimmed)) {
    return null;
  }
  const parsed = parse(trimmed, "d/M/yyyy", new Date(2000, 0, 1));
  if (!isValid(parsed)) {
    return null;
  }
  return format(parsed, DATE_FORMAT);
}

export function validateRow(
  row: RawStatementRow,
  options: ValidationOptions = {}
): ValidationOutcome {
  const reject = (reason: RejectedRow["reason"], detail: string): ValidationOutcome => ({
    ok: false,
    rejection: { file: row.file, row: row.row, reason, detail },
  });

  const date = canonicalizeDate(row.date);
  if (date === null) {
    return reject("invalid_date", `unreadable date "${row.date}"`);
  }

  let amount = row.amount;
  if (!isStorableAmount(amount)) {
    if (!options.tolerateUnparseableAmounts) {
      return reject(
        "invalid_amount",
        amount === null || !Number.isFinite(amount) ? "amount is not a finite number" : `amount ${amount} is out of range`
      );
    }
    amount = 0;
  }

  const description = row.description.trim();
  if (!description || description === MISSING_TEXT) {
    return reject("missing_description", "description is empty");
  }

  return {
    ok: true,
    transaction: {
      date,
      description,
      amount,
      period: row.period,
      notes: row.notes.trim(),
      origin: row.origin.trim(),
    },
  };
}

export function validateRows(
  rows: RawStatementRow[],
  options: ValidationOptions = {}
): { valid: ValidatedTransaction[]; rejected: RejectedRow[] } {
  const valid: ValidatedTransaction[] = [];
  const rejected: RejectedRow[] = [];

  for (const row of rows) {
    const outcome = validateRow(row, options);
    if (outcome.ok) {
      valid.push(outcome.transaction);
    } else {
      rejected.push(outcome.rejection);
    }
  }

  return { valid, rejected };
}
