import crypto from "crypto";
import type { HashedTransaction, ValidatedTransaction } from "./types";

const FIELD_DELIMITER = "|";

export function identityKey(
  txn: Pick<ValidatedTransaction, "date" | "description" | "amount" | "origin">
): string {
  return [
    txn.date.trim(),
    txn.description.trim().toUpperCase(),
    txn.amount.toFixed(2),
    txn.origin.trim().toUpperCase(),
  ].join(FIELD_DELIMITER);
}

// Dedup fingerprint only; collision resistance is not a security concern here
export function computeIdentityHash(
  txn: Pick<ValidatedTransaction, "date" | "description" | "amount" | "origin">
): string {
  return crypto.createHash("md5").update(identityKey(txn), "utf8").digest("hex");
}

export function withIdentityHash(txn: ValidatedTransaction): HashedTransaction {
  return { ...txn, identityHash: computeIdentityHash(txn) };
}
