import { z } from "zod";
import { createError } from "./errors";

const flag = z
  .string()
  .trim()
  .toLowerCase()
  .pipe(z.enum(["true", "false", "1", "0", ""]))
  .optional()
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  LEDGER_STATEMENTS_DIR: z.string().min(1).default("./statements"),
  LEDGER_STORE_PATH: z.string().min(1).default("./data/ledger.csv"),
  LEDGER_TOLERATE_BAD_AMOUNTS: flag,
  LEDGER_SKIP_CATEGORIZATION: flag,

  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  LEDGER_CATEGORIZER_MODEL: z.string().min(1).default("gpt-4.1-mini"),
  LEDGER_CATEGORIZE_BATCH_SIZE: z.coerce.number().int().min(1).default(5),
  LEDGER_CATEGORIZE_CONCURRENCY: z.coerce.number().int().min(1).max(16).default(1),
  LEDGER_CATEGORIZE_DELAY_MS: z.coerce.number().int().min(0).default(500),
  LEDGER_CATEGORIZE_TIMEOUT_MS: z.coerce.number().int().min(1).default(30000),
  LEDGER_CATEGORIZE_RETRIES: z.coerce.number().int().min(0).max(5).default(2),
});

export interface LedgerConfig {
  statementsDir: string;
  storePath: string;
  tolerateUnparseableAmounts: boolean;
  skipCategorization: boolean;
  categorizer: {
    apiKey?: string;
    baseURL?: string;
    model: string;
    batchSize: number;
    concurrency: number;
    delayMs: number;
    timeoutMs: number;
    retries: number;
  };
}

export function loadConfig(env: Record<string, string | undefined> = process.env): LedgerConfig {
  // Empty variables count as unset
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ""));
  const parsed = envSchema.safeParse(present);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw createError("CONFIG_INVALID", { issues }, `Invalid configuration: ${issues.join("; ")}`);
  }

  const vars = parsed.data;
  return {
    statementsDir: vars.LEDGER_STATEMENTS_DIR,
    storePath: vars.LEDGER_STORE_PATH,
    tolerateUnparseableAmounts: vars.LEDGER_TOLERATE_BAD_AMOUNTS,
    skipCategorization: vars.LEDGER_SKIP_CATEGORIZATION,
    categorizer: {
      apiKey: vars.OPENAI_API_KEY,
      baseURL: vars.OPENAI_BASE_URL,
      model: vars.LEDGER_CATEGORIZER_MODEL,
      batchSize: vars.LEDGER_CATEGORIZE_BATCH_SIZE,
      concurrency: vars.LEDGER_CATEGORIZE_CONCURRENCY,
      delayMs: vars.LEDGER_CATEGORIZE_DELAY_MS,
      timeoutMs: vars.LEDGER_CATEGORIZE_TIMEOUT_MS,
      retries: vars.LEDGER_CATEGORIZE_RETRIES,
    },
  };
}
