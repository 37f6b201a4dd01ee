/**
 * Frequency distribution utilities for sensitive-attribute values
 */

import type { Distribution, ScalarValue } from "../types/data-model.js";

/**
 * FrequencyDistribution - Encoded value → occurrence count
 */
export type FrequencyDistribution = Map<string, number>;

/**
 * Encode a scalar so that values of different types never collide
 *
 * @example
 * encodeValue(1)    // '1'
 * encodeValue("1")  // '"1"'
 * encodeValue(null) // 'null'
 */
export function encodeValue(value: ScalarValue): string {
  return JSON.stringify(value);
}

/**
 * Encode a key tuple, component by component
 */
export function encodeTuple(values: readonly ScalarValue[]): string {
  return JSON.stringify(values);
}

const TYPE_RANK: Record<string, number> = {
  null: 0,
  boolean: 1,
  number: 2,
  string: 3,
};

function rankOf(value: ScalarValue): number {
  return TYPE_RANK[value === null ? "null" : typeof value] ?? 4;
}

/**
 * Total order over scalars: null < booleans < numbers < strings,
 * natural order within a type
 */
export function compareScalars(a: ScalarValue, b: ScalarValue): number {
  const rankDiff = rankOf(a) - rankOf(b);
  if (rankDiff !== 0) return rankDiff;

  if (typeof a === "number" && typeof b === "number") return a - b;
  if (typeof a === "string" && typeof b === "string") {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (typeof a === "boolean" && typeof b === "boolean") {
    return Number(a) - Number(b);
  }
  return 0;
}

/**
 * Lexicographic order over key tuples
 */
export function compareTuples(
  a: readonly ScalarValue[],
  b: readonly ScalarValue[],
): number {
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const diff = compareScalars(a[i] ?? null, b[i] ?? null);
    if (diff !== 0) return diff;
  }
  return a.length - b.length;
}

/**
 * Calculate frequency distribution from an array of values
 *
 * @example
 * calculateFrequencies(["Asthma", "Asthma", "Cancer"])
 * // Map { '"Asthma"' => 2, '"Cancer"' => 1 }
 */
export function calculateFrequencies(
  values: readonly ScalarValue[],
): FrequencyDistribution {
  const distribution: FrequencyDistribution = new Map();

  for (const value of values) {
    updateFrequencies(distribution, value);
  }

  return distribution;
}

/**
 * Update a frequency distribution with a new value
 */
export function updateFrequencies(
  distribution: FrequencyDistribution,
  value: ScalarValue,
): void {
  const key = encodeValue(value);
  distribution.set(key, (distribution.get(key) ?? 0) + 1);
}

/**
 * Number of distinct values
 */
export function countDistinct(values: readonly ScalarValue[]): number {
  return calculateFrequencies(values).size;
}

/**
 * Relative frequency of each value: count / total.
 * Empty input yields an empty mapping.
 */
export function relativeFrequencies(
  values: readonly ScalarValue[],
): Distribution {
  const counts = calculateFrequencies(values);
  const total = values.length;
  const distribution = new Map<string, number>();

  if (total === 0) {
    return distribution;
  }

  for (const [key, count] of counts) {
    distribution.set(key, count / total);
  }
  return distribution;
}

/**
 * Total variation distance: 0.5 × Σ |p(v) − q(v)| over the union of both
 * supports, an absent value counting as 0. Result lies in [0, 1].
 */
export function totalVariationDistance(
  p: Distribution,
  q: Distribution,
): number {
  const keys = new Set<string>([...p.keys(), ...q.keys()]);

  let sum = 0;
  for (const key of keys) {
    sum += Math.abs((p.get(key) ?? 0) - (q.get(key) ?? 0));
  }

  return Math.min(1, Math.max(0, 0.5 * sum));
}
