import type { EquivalenceClass, Partition } from "../../types/data-model.js";

export function classSize(equivalenceClass: EquivalenceClass): number {
  return equivalenceClass.size;
}

/**
 * k-anonymity: smallest equivalence class size, 0 for an empty partition
 */
export function kAnonymity(partition: Partition): number {
  if (partition.classes.length === 0) return 0;
  return partition.classes.reduce(
    (min, c) => Math.min(min, classSize(c)),
    Infinity,
  );
}
