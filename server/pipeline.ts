import fs from "fs";
import path from "path";
import type { IngestionOptions, IngestionResult, LedgerSummary } from "./ingestion/types";
import type { ILedgerStorage } from "./storage";
import type { CategorizationService } from "./categorization/service";
import type { CategorizationOptions, ClassificationReport } from "./categorization/gate";
import { ingestStatements } from "./ingestion/ingest";
import { CategorizationGate } from "./categorization/gate";
import { log, warn } from "./log";

export interface PipelineOptions {
  ingestion?: IngestionOptions;
  // null skips the categorization stage
  categorizer?: CategorizationService | null;
  categorization?: CategorizationOptions;
}

export interface PipelineResult {
  ingestion: IngestionResult;
  classification: ClassificationReport | null;
  summary: LedgerSummary;
}

export async function discoverStatementFiles(directory: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await fs.promises.readdir(directory);
  } catch (error) {
    warn(`Statements folder ${directory} not readable: ${error instanceof Error ? error.message : String(error)}`, "pipeline");
    return [];
  }

  return entries
    .filter((entry) => entry.toLowerCase().endsWith(".csv"))
    .sort()
    .map((entry) => path.join(directory, entry));
}

export async function runPipeline(
  filePaths: string[],
  storage: ILedgerStorage,
  options: PipelineOptions = {}
): Promise<PipelineResult> {
  log(`Stage 1: ingesting ${filePaths.length} file(s)`, "pipeline");
  const ingestion = await ingestStatements(filePaths, storage, options.ingestion);

  let classification: ClassificationReport | null = null;
  let summary = ingestion.summary;

  if (options.categorizer) {
    log("Stage 2: categorizing uncategorized records", "pipeline");
    const gate = new CategorizationGate(storage, options.categorizer, options.categorization);
    classification = await gate.run();
    if (classification.considered > 0) {
      summary = (await storage.load()).summary();
    }
  } else {
    log("Stage 2 skipped: no categorization service", "pipeline");
  }

  return { ingestion, classification, summary };
}
