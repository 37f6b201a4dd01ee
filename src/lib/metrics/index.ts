/**
 * Metrics module - k-anonymity, l-diversity and t-closeness over a partition
 */

import type {
  ClassMeasurement,
  Distribution,
  MetricAssessment,
  MetricResult,
  Partition,
} from "../../types/data-model.js";
import { relativeFrequencies } from "../../utils/frequency-map.js";
import { distinctSensitiveCount } from "./l-diversity.js";
import { assertEncodedDistribution, classDistance } from "./t-closeness.js";

export * from "./k-anonymity.js";
export * from "./l-diversity.js";
export * from "./t-closeness.js";

/**
 * SA distribution over every record of the partition
 */
export function partitionDistribution(partition: Partition): Distribution {
  return relativeFrequencies(
    partition.classes.flatMap((c) => [...c.sensitiveValues]),
  );
}

/**
 * Per-class size, distinct SA count and distance from the global distribution
 */
export function measureClasses(
  partition: Partition,
  globalDistribution: Distribution,
): ClassMeasurement[] {
  assertEncodedDistribution(globalDistribution);
  return partition.classes.map((equivalenceClass) => ({
    equivalenceClass,
    size: equivalenceClass.size,
    distinctSensitive: distinctSensitiveCount(equivalenceClass),
    distance: classDistance(equivalenceClass, globalDistribution),
  }));
}

/**
 * Reduce measurements to the three metrics (min size, min distinct, max distance)
 */
export function summarizeMeasurements(
  measurements: readonly ClassMeasurement[],
): MetricResult {
  if (measurements.length === 0) {
    return { k: 0, l: 0, t: 0 };
  }

  let k = Infinity;
  let l = Infinity;
  let t = 0;
  for (const m of measurements) {
    k = Math.min(k, m.size);
    l = Math.min(l, m.distinctSensitive);
    t = Math.max(t, m.distance);
  }
  return { k, l, t };
}

/**
 * Compute all three metrics for a partition. Without an explicit global
 * distribution, the partition's own records supply it.
 */
export function computeMetrics(
  partition: Partition,
  globalDistribution: Distribution = partitionDistribution(partition),
): MetricAssessment {
  const measurements = measureClasses(partition, globalDistribution);
  return {
    partition,
    metrics: summarizeMeasurements(measurements),
    measurements,
  };
}
