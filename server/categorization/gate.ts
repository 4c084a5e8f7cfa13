import pLimit from "p-limit";
import pRetry, { AbortError } from "p-retry";
import OpenAI from "openai";
import { UNCATEGORIZED_OTHER } from "@shared/schema";
import type { LedgerTransaction } from "@shared/schema";
import type { ILedgerStorage } from "../storage";
import type { CategorizationService } from "./service";
import { normalizeCategory } from "./labels";
import { createError, describeError, isLedgerError } from "../errors";
import { log, warn } from "../log";

export interface CategorizationOptions {
  batchSize?: number;
  concurrency?: number;
  // Pause after every service call
  delayMs?: number;
  timeoutMs?: number;
  retries?: number;
  retryDelayMs?: number;
}

export interface SoftFailure {
  identityHash: string;
  description: string;
  reason: string;
  rawLabel: string | null;
}

export interface ClassificationReport {
  considered: number;
  classified: number;
  softFailures: SoftFailure[];
  distribution: Record<string, number>;
  serviceCalls: number;
  durationMs: number;
}

interface RowOutcome {
  identityHash: string;
  category: string;
  failure?: SoftFailure;
}

const DEFAULT_OPTIONS: Required<CategorizationOptions> = {
  batchSize: 5,
  concurrency: 1,
  delayMs: 500,
  timeoutMs: 30000,
  retries: 2,
  retryDelayMs: 1000,
};

async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Rate limits, server errors, network drops and our own timeout are worth
 * another attempt; anything else goes straight to the fallback label.
 */
export function isRetryableError(error: unknown): boolean {
  if (isLedgerError(error, "CATEGORIZER_TIMEOUT")) return true;

  if (error instanceof OpenAI.APIError) {
    const status = error.status;
    if (status === undefined) return true;
    return status === 429 || (status >= 500 && status < 600);
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes("timeout") ||
      message.includes("rate limit") ||
      message.includes("econnreset") ||
      message.includes("etimedout")
    );
  }

  return false;
}

export class CategorizationGate {
  private readonly options: Required<CategorizationOptions>;
  private serviceCalls = 0;

  constructor(
    private readonly storage: ILedgerStorage,
    private readonly service: CategorizationService,
    options: CategorizationOptions = {}
  ) {
    this.options = {
      batchSize: options.batchSize ?? DEFAULT_OPTIONS.batchSize,
      concurrency: options.concurrency ?? DEFAULT_OPTIONS.concurrency,
      delayMs: options.delayMs ?? DEFAULT_OPTIONS.delayMs,
      timeoutMs: options.timeoutMs ?? DEFAULT_OPTIONS.timeoutMs,
      retries: options.retries ?? DEFAULT_OPTIONS.retries,
      retryDelayMs: options.retryDelayMs ?? DEFAULT_OPTIONS.retryDelayMs,
    };
    const { batchSize, concurrency } = this.options;
    if (!Number.isInteger(batchSize) || batchSize < 1 || !Number.isInteger(concurrency) || concurrency < 1) {
      throw createError("CONFIG_INVALID", { batchSize: this.options.batchSize, concurrency: this.options.concurrency });
    }
  }

  async run(): Promise<ClassificationReport> {
    const startedAt = Date.now();
    this.serviceCalls = 0;

    const ledger = await this.storage.load();
    const pending = ledger.uncategorized();

    if (pending.length === 0) {
      log("All records already categorized", "categorize");
      return {
        considered: 0,
        classified: 0,
        softFailures: [],
        distribution: {},
        serviceCalls: 0,
        durationMs: Date.now() - startedAt,
      };
    }

    log(`Categorizing ${pending.length} record(s)`, "categorize");

    const { batchSize, concurrency } = this.options;
    const totalBatches = Math.ceil(pending.length / batchSize);
    const limit = pLimit(concurrency);
    const outcomes: RowOutcome[] = [];

    for (let i = 0; i < pending.length; i += batchSize) {
      const batch = pending.slice(i, i + batchSize);
      log(`Batch ${i / batchSize + 1}/${totalBatches} (${batch.length} record(s))`, "categorize");
      const results = await Promise.all(batch.map((row) => limit(() => this.classifyRow(row))));
      outcomes.push(...results);
    }

    const softFailures: SoftFailure[] = [];
    const distribution: Record<string, number> = {};
    for (const outcome of outcomes) {
      ledger.setCategory(outcome.identityHash, outcome.category);
      if (outcome.failure) {
        softFailures.push(outcome.failure);
      } else {
        distribution[outcome.category] = (distribution[outcome.category] || 0) + 1;
      }
    }

    await this.storage.persist(ledger);

    const report: ClassificationReport = {
      considered: pending.length,
      classified: outcomes.length - softFailures.length,
      softFailures,
      distribution,
      serviceCalls: this.serviceCalls,
      durationMs: Date.now() - startedAt,
    };

    log(
      `${report.classified}/${report.considered} categorized, ${softFailures.length} fell back to ${UNCATEGORIZED_OTHER}`,
      "categorize"
    );
    return report;
  }

  private async classifyRow(row: LedgerTransaction): Promise<RowOutcome> {
    const fallback = (reason: string, rawLabel: string | null): RowOutcome => {
      warn(`"${row.description.slice(0, 50)}" -> ${UNCATEGORIZED_OTHER} (${reason})`, "categorize");
      return {
        identityHash: row.identityHash,
        category: UNCATEGORIZED_OTHER,
        failure: { identityHash: row.identityHash, description: row.description, reason, rawLabel },
      };
    };

    try {
      const rawLabel = await pRetry(
        async () => {
          try {
            return await this.requestLabel(row.description);
          } catch (error) {
            if (isRetryableError(error)) {
              throw error;
            }
            throw new AbortError(error instanceof Error ? error : String(error));
          }
        },
        {
          retries: this.options.retries,
          minTimeout: this.options.retryDelayMs,
          factor: 2,
        }
      );

      const normalized = normalizeCategory(rawLabel);
      if (!normalized.recognized) {
        return fallback(rawLabel ? `unrecognized label "${rawLabel}"` : "empty response", rawLabel);
      }
      return { identityHash: row.identityHash, category: normalized.category };
    } catch (error) {
      const failure = isLedgerError(error)
        ? error
        : createError("CATEGORIZER_UNAVAILABLE", undefined, error instanceof Error ? error.message : undefined, error);
      const { code, message } = describeError(failure);
      return fallback(`${code}: ${message}`, null);
    } finally {
      if (this.options.delayMs > 0) {
        await sleep(this.options.delayMs);
      }
    }
  }

  private async requestLabel(description: string): Promise<string | null> {
    this.serviceCalls++;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(createError("CATEGORIZER_TIMEOUT", { timeoutMs: this.options.timeoutMs }));
      }, this.options.timeoutMs);
    });

    try {
      return await Promise.race([
        this.service.categorize(description, { signal: controller.signal }),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }
}
