import type { HashedTransaction } from "./types";

export interface DedupePartition {
  fresh: HashedTransaction[];
  duplicates: HashedTransaction[];
}

/**
 * Splits candidates into rows not yet in the index and rows already seen.
 * A repeat inside the same batch counts as a duplicate of its first occurrence.
 * The index itself is left untouched.
 */
export function partitionByIdentity(
  candidates: HashedTransaction[],
  index: ReadonlySet<string>
): DedupePartition {
  const fresh: HashedTransaction[] = [];
  const duplicates: HashedTransaction[] = [];
  const seenInBatch = new Set<string>();

  for (const candidate of candidates) {
    if (index.has(candidate.identityHash) || seenInBatch.has(candidate.identityHash)) {
      duplicates.push(candidate);
    } else {
      seenInBatch.add(candidate.identityHash);
      fresh.push(candidate);
    }
  }

  return { fresh, duplicates };
}
