import fs from "fs";
import path from "path";
import Papa from "papaparse";
import { STORE_COLUMNS, storeRowSchema, toStoreRow } from "@shared/schema";
import type { LedgerTransaction } from "@shared/schema";
import { Ledger } from "./ledger";
import { createError, isLedgerError } from "./errors";
import { log } from "./log";

export interface ILedgerStorage {
  exists(): Promise<boolean>;
  // Missing store -> empty ledger
  load(): Promise<Ledger>;
  // Replaces the whole store; on failure the previous version stays intact
  persist(ledger: Ledger): Promise<void>;
}

export function serializeLedger(rows: readonly LedgerTransaction[]): string {
  return Papa.unparse(
    {
      fields: [...STORE_COLUMNS],
      data: rows.map((row) => {
        const record = toStoreRow(row);
        return STORE_COLUMNS.map((column) => record[column]);
      }),
    },
    { newline: "\n" }
  );
}

export function deserializeLedger(content: string, source = "ledger"): Ledger {
  const results = Papa.parse<Record<string, string>>(content, {
    header: true,
    skipEmptyLines: "greedy",
  });

  const fields = results.meta.fields ?? [];
  const missing = STORE_COLUMNS.filter((column) => !fields.includes(column));
  if (missing.length > 0) {
    throw createError("STORE_CORRUPT", { source, missingColumns: missing }, `Ledger header is missing: ${missing.join(", ")}`);
  }

  const rows: LedgerTransaction[] = [];
  results.data.forEach((raw, index) => {
    const parsed = storeRowSchema.safeParse(raw);
    if (!parsed.success) {
      throw createError(
        "STORE_CORRUPT",
        { source, row: index + 1, issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`) },
        `Ledger row ${index + 1} does not match the canonical schema`
      );
    }
    rows.push(parsed.data);
  });

  return new Ledger(rows);
}

export class FileLedgerStorage implements ILedgerStorage {
  constructor(private readonly filePath: string) {}

  get location(): string {
    return this.filePath;
  }

  async exists(): Promise<boolean> {
    try {
      await fs.promises.access(this.filePath);
      return true;
    } catch {
      return false;
    }
  }

  async load(): Promise<Ledger> {
    if (!(await this.exists())) {
      log(`No ledger at ${this.filePath}, starting empty`, "storage");
      return new Ledger();
    }

    let content: string;
    try {
      content = await fs.promises.readFile(this.filePath, "utf8");
    } catch (error) {
      throw createError("STORE_READ_FAILED", { path: this.filePath }, undefined, error);
    }

    const ledger = deserializeLedger(content, this.filePath);
    log(`Ledger loaded: ${ledger.size} rows`, "storage");
    return ledger;
  }

  async persist(ledger: Ledger): Promise<void> {
    const content = serializeLedger(ledger.all());
    const tempPath = `${this.filePath}.${process.pid}.${Date.now()}.tmp`;

    try {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      const handle = await fs.promises.open(tempPath, "w");
      try {
        await handle.writeFile(content, "utf8");
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.promises.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.promises.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        console.warn(`[storage] Could not remove ${tempPath}:`, cleanupError);
      });
      throw isLedgerError(error)
        ? error
        : createError("STORE_WRITE_FAILED", { path: this.filePath }, undefined, error);
    }

    log(`Ledger saved: ${ledger.size} rows -> ${this.filePath}`, "storage");
  }
}

// In-process stand-in used where no file is wanted
export class MemoryLedgerStorage implements ILedgerStorage {
  private content: string | null;
  persistCount = 0;

  constructor(rows?: LedgerTransaction[]) {
    this.content = rows ? serializeLedger(rows) : null;
  }

  async exists(): Promise<boolean> {
    return this.content !== null;
  }

  async load(): Promise<Ledger> {
    return this.content === null ? new Ledger() : deserializeLedger(this.content, "memory");
  }

  async persist(ledger: Ledger): Promise<void> {
    this.content = serializeLedger(ledger.all());
    this.persistCount++;
  }
}
