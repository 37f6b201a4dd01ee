/**
 * Plain-text rendering of scenario reports, comparisons and partitions
 */

import type {
  MetricAssessment,
  ScalarValue,
  ScenarioOutcome,
  ScenarioReport,
  Violation,
} from "../../types/data-model.js";

export function formatScalar(value: ScalarValue): string {
  return value === null ? "null" : String(value);
}

export function formatKey(key: Readonly<Record<string, ScalarValue>>): string {
  return Object.entries(key)
    .map(([name, value]) => `${name}=${formatScalar(value)}`)
    .join(" ");
}

export function formatDistance(value: number): string {
  return value.toFixed(3);
}

function verdict(passed: boolean): string {
  return passed ? "PASS" : "FAIL";
}

function violationLines(
  title: string,
  violations: readonly Violation[],
  describe: (v: Violation) => string,
): string[] {
  if (violations.length === 0) return [];
  return [
    `  Groups violating ${title}:`,
    ...violations.map((v) => `    ${formatKey(v.key)}  ${describe(v)}`),
  ];
}

/**
 * Console report for one scenario
 */
export function formatScenarioReport(report: ScenarioReport): string {
  const { metrics, thresholds, passed, violations } = report;
  const generalized = Object.entries(report.generalizations);

  const lines = [
    `--- Privacy report for QI=[${report.quasiIdentifiers.join(", ")}] (scenario: ${report.scenario}) ---`,
    `records = ${report.recordCount}, equivalence classes = ${report.classCount}, sensitive attribute = ${report.sensitiveAttribute}`,
  ];

  if (generalized.length > 0) {
    lines.push(
      `generalizations: ${generalized.map(([name, label]) => `${name}=${label}`).join(", ")}`,
    );
  }

  lines.push(
    `k-anonymity = ${metrics.k}  (require k ≥ ${thresholds.kMin})  ${verdict(passed.k)}`,
    ...violationLines("k", violations.k, (v) => `size=${v.size}`),
    `l-diversity = ${metrics.l}  (require l ≥ ${thresholds.lMin})  ${verdict(passed.l)}`,
    ...violationLines("l", violations.l, (v) => `size=${v.size}  l=${v.value}`),
    `t-closeness (TV) = ${formatDistance(metrics.t)}  (require t ≤ ${thresholds.tMax})  ${verdict(passed.t)}`,
    ...violationLines(
      "t",
      violations.t,
      (v) => `size=${v.size}  tv=${formatDistance(v.value)}`,
    ),
  );

  if (report.empty) {
    lines.push("  (empty dataset: no equivalence classes, thresholds treated as met)");
  }

  return lines.join("\n");
}

/**
 * Side-by-side table of every scenario's metrics
 */
export function formatComparison(outcomes: readonly ScenarioOutcome[]): string {
  const header = ["scenario", "quasi-identifiers", "k", "l", "t", "result"];
  const rows = outcomes.map((outcome) => {
    if (outcome.status === "error") {
      return [outcome.scenario, "-", "-", "-", "-", `ERROR: ${outcome.error.message}`];
    }
    const { report } = outcome;
    return [
      report.scenario,
      report.quasiIdentifiers.join(", "),
      String(report.metrics.k),
      String(report.metrics.l),
      formatDistance(report.metrics.t),
      verdict(report.overallPassed),
    ];
  });

  const widths = header.map((title, column) =>
    Math.max(title.length, ...rows.map((row) => (row[column] ?? "").length)),
  );

  const render = (cells: readonly string[]): string =>
    cells
      .map((cell, column) =>
        column === cells.length - 1 ? cell : cell.padEnd(widths[column] ?? 0),
      )
      .join("  ");

  return [
    render(header),
    render(widths.map((w) => "-".repeat(w))),
    ...rows.map(render),
  ].join("\n");
}

/**
 * Equivalence class listing with per-class measurements
 */
export function formatPartition(assessment: MetricAssessment): string {
  const { partition, metrics, measurements } = assessment;

  return [
    `QI=[${partition.quasiIdentifiers.join(", ")}]  SA=${partition.sensitiveAttribute}  records=${partition.recordCount}  classes=${partition.classes.length}`,
    ...measurements.map(
      (m) =>
        `${formatKey(m.equivalenceClass.label)}  size=${m.size}  distinct=${m.distinctSensitive}  tv=${formatDistance(m.distance)}`,
    ),
    `k=${metrics.k}  l=${metrics.l}  t=${formatDistance(metrics.t)}`,
  ].join("\n");
}
