import type { LedgerTransaction } from "@shared/schema";
import type { LedgerSummary } from "./ingestion/types";
import { createError } from "./errors";

const MISSING_TEXT = "nan";

export function isBlankCategory(category: string): boolean {
  const trimmed = category.trim();
  return trimmed === "" || trimmed.toLowerCase() === MISSING_TEXT;
}

function roundCents(value: number): number {
  return Math.round(value * 100) / 100;
}

function periodSortKey(period: string): number {
  const [month, year] = period.split("/");
  return Number(year) * 100 + Number(month);
}

/**
 * In-memory view of the persisted ledger: ordered rows plus the identity hash
 * index. Rows are only ever appended; only category fields change afterwards.
 */
export class Ledger {
  private rows: LedgerTransaction[] = [];
  private index: Map<string, number> = new Map();

  constructor(rows: LedgerTransaction[] = []) {
    this.append(rows);
  }

  get size(): number {
    return this.rows.length;
  }

  all(): readonly LedgerTransaction[] {
    return this.rows;
  }

  hashIndex(): ReadonlySet<string> {
    return new Set(this.index.keys());
  }

  append(rows: LedgerTransaction[]): void {
    for (const row of rows) {
      if (this.index.has(row.identityHash)) {
        throw createError("STORE_CORRUPT", { identityHash: row.identityHash }, `Duplicate identity hash ${row.identityHash}`);
      }
      this.index.set(row.identityHash, this.rows.length);
      this.rows.push(row);
    }
  }

  uncategorized(): LedgerTransaction[] {
    return this.rows.filter((row) => isBlankCategory(row.category));
  }

  setCategory(identityHash: string, category: string): boolean {
    const position = this.index.get(identityHash);
    if (position === undefined) {
      return false;
    }
    const current = this.rows[position];
    this.rows[position] = {
      ...current,
      category,
    };
    return true;
  }

  summary(): LedgerSummary {
    let totalAmount = 0;
    let uncategorizedRows = 0;
    const rowsByOrigin: Record<string, number> = {};
    const amountByCategory: Record<string, number> = {};
    const periods = new Set<string>();

    for (const row of this.rows) {
      totalAmount += row.amount;
      rowsByOrigin[row.origin] = (rowsByOrigin[row.origin] || 0) + 1;
      periods.add(row.period);

      if (isBlankCategory(row.category)) {
        uncategorizedRows++;
      } else {
        amountByCategory[row.category] = (amountByCategory[row.category] || 0) + row.amount;
      }
    }

    for (const category of Object.keys(amountByCategory)) {
      amountByCategory[category] = roundCents(amountByCategory[category]);
    }

    return {
      totalRows: this.rows.length,
      totalAmount: roundCents(totalAmount),
      rowsByOrigin,
      periods: Array.from(periods).sort((a, b) => periodSortKey(a) - periodSortKey(b)),
      uncategorizedRows,
      amountByCategory,
    };
  }
}
