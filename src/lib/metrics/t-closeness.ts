/**
 * t-closeness under total variation distance
 */

import type {
  Distribution,
  EquivalenceClass,
  Partition,
  ScalarValue,
} from "../../types/data-model.js";
import { InvalidInputError } from "../../utils/errors.js";
import {
  encodeValue,
  relativeFrequencies,
  totalVariationDistance,
} from "../../utils/frequency-map.js";

/**
 * Distribution of raw SA values, keyed the way the metrics expect
 *
 * @example
 * distributionOf(["Asthma", "Asthma", "Cancer"])
 * // Map { '"Asthma"' => 0.666…, '"Cancer"' => 0.333… }
 */
export function distributionOf(values: readonly ScalarValue[]): Distribution {
  return relativeFrequencies(values);
}

function isEncodedKey(key: string): boolean {
  let decoded: unknown;
  try {
    decoded = JSON.parse(key);
  } catch {
    return false;
  }
  return (
    (decoded === null ||
      typeof decoded === "string" ||
      typeof decoded === "number" ||
      typeof decoded === "boolean") &&
    encodeValue(decoded) === key
  );
}

/**
 * Fail with InvalidInputError when a distribution is keyed by raw values
 * instead of encoded ones
 */
export function assertEncodedDistribution(distribution: Distribution): void {
  const raw = [...distribution.keys()].filter((key) => !isEncodedKey(key));
  if (raw.length > 0) {
    throw new InvalidInputError(
      `Distribution keys must be encoded SA values (see distributionOf), got ${raw
        .slice(0, 3)
        .map((key) => JSON.stringify(key))
        .join(", ")}`,
      { keys: raw },
    );
  }
}

export function classDistance(
  equivalenceClass: EquivalenceClass,
  globalDistribution: Distribution,
): number {
  return totalVariationDistance(
    relativeFrequencies(equivalenceClass.sensitiveValues),
    globalDistribution,
  );
}

/**
 * Largest TV distance between a class's SA distribution and the global one.
 * 0 for an empty partition.
 */
export function tCloseness(
  partition: Partition,
  globalDistribution: Distribution,
): number {
  assertEncodedDistribution(globalDistribution);
  let max = 0;
  for (const equivalenceClass of partition.classes) {
    const distance = classDistance(equivalenceClass, globalDistribution);
    if (distance > max) {
      max = distance;
    }
  }
  return max;
}
