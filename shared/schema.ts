import { z } from "zod";

// Column order of the persisted ledger document
export const STORE_COLUMNS = [
  "date",
  "description",
  "amount",
  "category",
  "subcategory",
  "period",
  "notes",
  "origin",
  "identity_hash",
  "ingested_at",
] as const;

export type StoreColumn = (typeof STORE_COLUMNS)[number];

export const DATE_FORMAT = "dd/MM/yyyy";
export const PERIOD_FORMAT = "MM/yyyy";
export const INGESTED_AT_FORMAT = "yyyy-MM-dd HH:mm:ss";

export const CATEGORIES = [
  "Alimentação",
  "Transporte",
  "Moradia",
  "Saúde",
  "Educação",
  "Lazer",
  "Compras",
  "Serviços",
  "Investimentos",
  "Outros",
] as const;

export type Category = (typeof CATEGORIES)[number];

// Fallback label for soft categorization failures
export const UNCATEGORIZED_OTHER: Category = "Outros";

const amountText = z
  .string()
  .trim()
  .regex(/^-?\d+(\.\d+)?$/, "amount must be a plain decimal")
  .transform((value) => Number(value));

export const ledgerTransactionSchema = z.object({
  date: z.string().regex(/^\d{2}\/\d{2}\/\d{4}$/),
  description: z.string().min(1),
  amount: z.number().finite(),
  category: z.string(),
  subcategory: z.string(),
  period: z.string().regex(/^\d{2}\/\d{4}$/),
  notes: z.string(),
  origin: z.string().min(1),
  identityHash: z.string().regex(/^[0-9a-f]{32}$/),
  ingestedAt: z.string(),
});

export type LedgerTransaction = z.infer<typeof ledgerTransactionSchema>;

// One CSV row of the ledger as papaparse hands it over (all strings)
export const storeRowSchema = z
  .object({
    date: z.string(),
    description: z.string(),
    amount: amountText,
    category: z.string().default(""),
    subcategory: z.string().default(""),
    period: z.string(),
    notes: z.string().default(""),
    origin: z.string(),
    identity_hash: z.string(),
    ingested_at: z.string().default(""),
  })
  .transform((row) => ({
    date: row.date,
    description: row.description,
    amount: row.amount,
    category: row.category,
    subcategory: row.subcategory,
    period: row.period,
    notes: row.notes,
    origin: row.origin,
    identityHash: row.identity_hash,
    ingestedAt: row.ingested_at,
  }))
  .pipe(ledgerTransactionSchema);

export function toStoreRow(txn: LedgerTransaction): Record<StoreColumn, string> {
  return {
    date: txn.date,
    description: txn.description,
    amount: txn.amount.toFixed(2),
    category: txn.category,
    subcategory: txn.subcategory,
    period: txn.period,
    notes: txn.notes,
    origin: txn.origin,
    identity_hash: txn.identityHash,
    ingested_at: txn.ingestedAt,
  };
}
