/**
 * Reporter module - applies thresholds to metric results and lists violating classes
 */

import type {
  ClassMeasurement,
  MetricAssessment,
  Thresholds,
  Violation,
  ViolationReport,
} from "../../types/data-model.js";
import { InvalidInputError } from "../../utils/errors.js";

export * from "./format.js";

/**
 * Fail with InvalidInputError unless kMin and lMin are non-negative integers
 * and tMax lies in [0, 1]
 */
export function validateThresholds(thresholds: Thresholds): void {
  const problems: string[] = [];

  if (!Number.isInteger(thresholds.kMin) || thresholds.kMin < 0) {
    problems.push(`kMin must be a non-negative integer, got ${thresholds.kMin}`);
  }
  if (!Number.isInteger(thresholds.lMin) || thresholds.lMin < 0) {
    problems.push(`lMin must be a non-negative integer, got ${thresholds.lMin}`);
  }
  if (
    !Number.isFinite(thresholds.tMax) ||
    thresholds.tMax < 0 ||
    thresholds.tMax > 1
  ) {
    problems.push(`tMax must be a number between 0 and 1, got ${thresholds.tMax}`);
  }

  if (problems.length > 0) {
    throw new InvalidInputError(`Invalid thresholds: ${problems.join("; ")}`, {
      thresholds,
      problems,
    });
  }
}

function toViolation(measurement: ClassMeasurement, value: number): Violation {
  return {
    key: measurement.equivalenceClass.label,
    size: measurement.size,
    value,
  };
}

/**
 * Compare metrics against thresholds: k ≥ kMin, l ≥ lMin, t ≤ tMax.
 *
 * An empty partition never violates: there is no record to protect, so all
 * three metrics pass whatever the thresholds, and `empty` flags the report.
 */
export function reportViolations(
  assessment: MetricAssessment,
  thresholds: Thresholds,
): ViolationReport {
  validateThresholds(thresholds);

  const { metrics, measurements } = assessment;
  const empty = measurements.length === 0;

  if (empty) {
    return {
      metrics,
      thresholds,
      passed: { k: true, l: true, t: true },
      overallPassed: true,
      empty,
      violations: { k: [], l: [], t: [] },
    };
  }

  const violations = {
    k: measurements
      .filter((m) => m.size < thresholds.kMin)
      .map((m) => toViolation(m, m.size)),
    l: measurements
      .filter((m) => m.distinctSensitive < thresholds.lMin)
      .map((m) => toViolation(m, m.distinctSensitive)),
    t: measurements
      .filter((m) => m.distance > thresholds.tMax)
      .map((m) => toViolation(m, m.distance)),
  };

  const passed = {
    k: metrics.k >= thresholds.kMin,
    l: metrics.l >= thresholds.lMin,
    t: metrics.t <= thresholds.tMax,
  };

  return {
    metrics,
    thresholds,
    passed,
    overallPassed: passed.k && passed.l && passed.t,
    empty,
    violations,
  };
}
