import { format } from "date-fns";
import { INGESTED_AT_FORMAT } from "@shared/schema";
import type { LedgerTransaction } from "@shared/schema";
import type {
  IngestionOptions,
  IngestionResult,
  ParsedFile,
  RawStatementRow,
  SkippedFile,
} from "./types";
import type { StatementFormatRegistry } from "./formats";
import type { ILedgerStorage } from "../storage";
import { formatRegistry } from "./formats";
import { readStatementFile } from "./csv";
import { validateRows } from "./validate";
import { withIdentityHash } from "./hash";
import { partitionByIdentity } from "./dedupe";
import { log, warn } from "../log";

export async function ingestRows(
  rows: RawStatementRow[],
  storage: ILedgerStorage,
  options: IngestionOptions = {}
): Promise<Omit<IngestionResult, "files" | "skippedFiles">> {
  const now = options.now ?? (() => new Date());

  const storeExisted = await storage.exists();
  const ledger = await storage.load();
  const priorTotal = ledger.size;

  const { valid, rejected } = validateRows(rows, {
    tolerateUnparseableAmounts: options.tolerateUnparseableAmounts,
  });
  for (const rejection of rejected) {
    warn(`${rejection.file} row ${rejection.row} dropped (${rejection.reason}): ${rejection.detail}`, "validate");
  }

  const candidates = valid.map(withIdentityHash);
  const { fresh, duplicates } = partitionByIdentity(candidates, ledger.hashIndex());

  const ingestedAt = format(now(), INGESTED_AT_FORMAT);
  const inserted: LedgerTransaction[] = fresh.map((txn) => ({
    date: txn.date,
    description: txn.description,
    amount: txn.amount,
    category: "",
    subcategory: "",
    period: txn.period,
    notes: txn.notes,
    origin: txn.origin,
    identityHash: txn.identityHash,
    ingestedAt,
  }));

  ledger.append(inserted);

  if (inserted.length > 0 || !storeExisted) {
    await storage.persist(ledger);
  }

  if (inserted.length > 0) {
    log(`${inserted.length} new record(s) inserted`, "ingest");
  } else {
    log("No new records to insert", "ingest");
  }
  if (duplicates.length > 0) {
    log(`${duplicates.length} duplicate(s) skipped`, "ingest");
  }

  return {
    rejected,
    merge: {
      considered: candidates.length,
      inserted: inserted.length,
      duplicates: duplicates.length,
      total: priorTotal + inserted.length,
    },
    summary: ledger.summary(),
    inserted,
  };
}

export async function ingestStatements(
  filePaths: string[],
  storage: ILedgerStorage,
  options: IngestionOptions & { registry?: StatementFormatRegistry } = {}
): Promise<IngestionResult> {
  const registry = options.registry ?? formatRegistry;
  const files: ParsedFile[] = [];
  const skippedFiles: SkippedFile[] = [];
  const rows: RawStatementRow[] = [];

  for (const filePath of filePaths) {
    const result = await readStatementFile(filePath, registry);
    if (!result.ok) {
      warn(`Skipping ${result.skipped.file}: ${result.skipped.reason}`, "parser");
      skippedFiles.push(result.skipped);
      continue;
    }

    log(
      `Processing ${result.file.file} (format: ${result.file.format}, period: ${result.file.period}) -> ${result.file.rows} row(s)`,
      "parser"
    );
    files.push(result.file);
    rows.push(...result.rows);
  }

  const merged = await ingestRows(rows, storage, options);
  return { files, skippedFiles, ...merged };
}
