import type { BillRecord } from '../bills/types.js';

export interface MergeResult<T> {
  merged: T[];
  /** Input items replaced by a later layer: sum of layer sizes minus merged size. */
  deduped: number;
}

/**
 * Last writer wins by identity. Later layers override earlier ones; an
 * overridden item keeps its first-seen position.
 */
export function mergeByIdentity<T>(layers: ReadonlyArray<readonly T[]>, key: (item: T) => string): MergeResult<T> {
  const byKey = new Map<string, T>();
  let inputSize = 0;
  for (const layer of layers) {
    for (const item of layer) {
      inputSize += 1;
      byKey.set(key(item), item);
    }
  }
  const merged = [...byKey.values()];
  return { merged, deduped: inputSize - merged.length };
}

export function mergeBills(layers: ReadonlyArray<readonly BillRecord[]>): MergeResult<BillRecord> {
  return mergeByIdentity(layers, bill => bill.billId);
}

/** Stored bills that have not become law yet, so their status may still move. */
export function selectPendingBills(stored: readonly BillRecord[]): BillRecord[] {
  return stored.filter(bill => bill.enactment === null);
}

/**
 * Re-fetched pending bills whose latest action date differs from the stored
 * value. Bills that have not moved are dropped so they are neither merged
 * nor written again.
 */
export function diffRefreshed(pending: readonly BillRecord[], fetched: readonly BillRecord[]): BillRecord[] {
  const storedDates = new Map(pending.map(bill => [bill.billId, bill.latestActionDate ?? '']));
  return fetched.filter(bill => {
    const stored = storedDates.get(bill.billId);
    return stored !== undefined && stored !== (bill.latestActionDate ?? '');
  });
}
