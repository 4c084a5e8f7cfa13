import { loadConfig } from "./config";
import { FileLedgerStorage } from "./storage";
import { OpenAICategorizer } from "./categorization/service";
import { discoverStatementFiles, runPipeline } from "./pipeline";
import type { PipelineResult } from "./pipeline";
import { logError } from "./errors";
import { log } from "./log";

function formatMoney(value: number): string {
  return `R$ ${value.toFixed(2)}`;
}

function printReport(result: PipelineResult): void {
  const { ingestion, classification, summary } = result;

  log(`Files processed: ${ingestion.files.length}, skipped: ${ingestion.skippedFiles.length}`, "report");
  for (const skipped of ingestion.skippedFiles) {
    log(`  ${skipped.file}: ${skipped.code} (${skipped.reason})`, "report");
  }
  log(`Rows rejected by validation: ${ingestion.rejected.length}`, "report");
  log(
    `Considered: ${ingestion.merge.considered}, new: ${ingestion.merge.inserted}, duplicates: ${ingestion.merge.duplicates}, total: ${ingestion.merge.total}`,
    "report"
  );

  if (classification) {
    log(
      `Categorized: ${classification.classified}/${classification.considered} in ${(classification.durationMs / 1000).toFixed(1)}s, soft failures: ${classification.softFailures.length}`,
      "report"
    );
    for (const failure of classification.softFailures.slice(0, 5)) {
      log(`  "${failure.description.slice(0, 40)}" -> ${failure.reason}`, "report");
    }
    if (classification.softFailures.length > 5) {
      log(`  ... and ${classification.softFailures.length - 5} more`, "report");
    }
  }

  log(`Total amount: ${formatMoney(summary.totalAmount)}`, "report");
  log(
    `Origins: ${Object.entries(summary.rowsByOrigin)
      .map(([origin, count]) => `${origin} (${count})`)
      .join(", ") || "none"}`,
    "report"
  );
  log(`Periods: ${summary.periods.join(", ") || "none"}`, "report");
  log(`Uncategorized rows: ${summary.uncategorizedRows}`, "report");

  if (summary.uncategorizedRows === 0) {
    for (const [category, amount] of Object.entries(summary.amountByCategory).sort((a, b) => b[1] - a[1]).slice(0, 5)) {
      log(`  ${category}: ${formatMoney(amount)}`, "report");
    }
  }
}

export async function main(env: Record<string, string | undefined> = process.env): Promise<number> {
  try {
    const config = loadConfig(env);
    const storage = new FileLedgerStorage(config.storePath);

    // Built before ingestion so a missing key fails the run before anything is written
    const categorizer = config.skipCategorization
      ? null
      : new OpenAICategorizer({
          apiKey: config.categorizer.apiKey,
          baseURL: config.categorizer.baseURL,
          model: config.categorizer.model,
        });

    const files = await discoverStatementFiles(config.statementsDir);
    const result = await runPipeline(files, storage, {
      ingestion: { tolerateUnparseableAmounts: config.tolerateUnparseableAmounts },
      categorizer,
      categorization: {
        batchSize: config.categorizer.batchSize,
        concurrency: config.categorizer.concurrency,
        delayMs: config.categorizer.delayMs,
        timeoutMs: config.categorizer.timeoutMs,
        retries: config.categorizer.retries,
      },
    });

    printReport(result);
    return 0;
  } catch (error) {
    logError(error, "pipeline");
    return 1;
  }
}
