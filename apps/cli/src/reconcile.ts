import type { PromptRecord } from '@promptlink/types';

/**
 * Merge record lists in argument order into one collection keyed by id.
 * The first record seen for an id is kept; later duplicates are dropped.
 * Output order is merge order, not timestamp order.
 */
export function reconcile(...sources: PromptRecord[][]): PromptRecord[] {
  const seen = new Set<string>();
  const merged: PromptRecord[] = [];

  for (const records of sources) {
    for (const record of records) {
      if (seen.has(record.id)) {
        continue;
      }
      seen.add(record.id);
      merged.push(record);
    }
  }

  return merged;
}
