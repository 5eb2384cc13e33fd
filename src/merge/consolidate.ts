import { compareRecords, recordKey } from "../records";
import { ResultRecord } from "../types";

export interface Consolidation {
  records: ResultRecord[];
  duplicates: number;
}

/**
 * Folds staged batches over the master records. On a key collision the later
 * record wins and takes the later encounter position; the result is sorted
 * stably by date, race name and athlete name.
 */
export function consolidateRecords(
  master: readonly ResultRecord[],
  stagedBatches: readonly (readonly ResultRecord[])[],
): Consolidation {
  const byKey = new Map<string, ResultRecord>();
  let duplicates = 0;

  for (const batch of [master, ...stagedBatches]) {
    for (const record of batch) {
      const key = recordKey(record);
      if (byKey.has(key)) {
        duplicates += 1;
        byKey.delete(key);
      }
      byKey.set(key, record);
    }
  }

  const records = [...byKey.values()].sort(compareRecords);
  return { records, duplicates };
}
