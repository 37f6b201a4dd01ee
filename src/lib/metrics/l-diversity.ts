import type { EquivalenceClass, Partition } from "../../types/data-model.js";
import { countDistinct } from "../../utils/frequency-map.js";

export function distinctSensitiveCount(
  equivalenceClass: EquivalenceClass,
): number {
  return countDistinct(equivalenceClass.sensitiveValues);
}

/**
 * Distinct l-diversity: fewest distinct SA values found in any class,
 * 0 for an empty partition
 */
export function lDiversity(partition: Partition): number {
  if (partition.classes.length === 0) return 0;
  return partition.classes.reduce(
    (min, c) => Math.min(min, distinctSensitiveCount(c)),
    Infinity,
  );
}
