/**
 * Comparator module - runs partition → metrics → report for each scenario
 * against one shared, read-only record store
 */

import type {
  ComparisonRow,
  Distribution,
  QuasiIdentifierSpec,
  ScenarioConfig,
  ScenarioOutcome,
  ScenarioReport,
} from "../../types/data-model.js";
import type { RecordStore } from "../store/index.js";
import {
  createGeneralizer,
  describeGeneralization,
} from "../generalizer/index.js";
import { partitionRecords } from "../partitioner/index.js";
import { computeMetrics } from "../metrics/index.js";
import { reportViolations } from "../reporter/index.js";
import { InvalidInputError, toReidRiskError } from "../../utils/errors.js";
import { relativeFrequencies } from "../../utils/frequency-map.js";
import { logger } from "../../utils/logger.js";

export interface CompareOptions {
  failFast?: boolean; // Rethrow the first scenario error instead of recording it
}

/**
 * Column name a QI spec contributes to the partition
 */
export function quasiIdentifierName(spec: QuasiIdentifierSpec): string {
  return typeof spec === "string" ? spec : (spec.as ?? spec.attribute);
}

/**
 * Apply the scenario's generalizations to a scenario-local copy of the store
 */
export function applyGeneralizations(
  store: RecordStore,
  quasiIdentifiers: readonly QuasiIdentifierSpec[],
): { store: RecordStore; generalizations: Record<string, string> } {
  let local = store;
  const generalizations: Record<string, string> = {};

  for (const spec of quasiIdentifiers) {
    if (typeof spec === "string") {
      continue;
    }
    if (!spec.generalization) {
      if (spec.as !== undefined && spec.as !== spec.attribute) {
        throw new InvalidInputError(
          `Quasi-identifier "${spec.attribute}" is renamed to "${spec.as}" without a generalization`,
          { attribute: spec.attribute, as: spec.as },
        );
      }
      continue;
    }
    const target = quasiIdentifierName(spec);
    local = local.withGeneralized(
      spec.attribute,
      createGeneralizer(spec.generalization),
      target,
    );
    generalizations[target] = describeGeneralization(spec.generalization);
  }

  return { store: local, generalizations };
}

/**
 * Run one scenario. The global SA distribution is taken from the store, so it
 * is the same for every scenario of a comparison.
 */
export function runScenario(
  store: RecordStore,
  scenario: ScenarioConfig,
  globalDistribution: Distribution = relativeFrequencies(store.sensitiveValues()),
): ScenarioReport {
  const { store: local, generalizations } = applyGeneralizations(
    store,
    scenario.quasiIdentifiers,
  );
  const quasiIdentifiers = scenario.quasiIdentifiers.map(quasiIdentifierName);

  const partition = partitionRecords(local, quasiIdentifiers);
  const assessment = computeMetrics(partition, globalDistribution);
  const report = reportViolations(assessment, scenario.thresholds);

  if (report.empty) {
    logger.warn("Scenario ran on an empty dataset; thresholds treated as met", {
      scenario: scenario.name,
    });
  }

  return {
    scenario: scenario.name,
    quasiIdentifiers,
    generalizations,
    sensitiveAttribute: store.sensitiveAttribute,
    recordCount: partition.recordCount,
    classCount: partition.classes.length,
    ...report,
  };
}

/**
 * Run scenarios in list order. A failing scenario becomes an error outcome
 * and its siblings still run, unless failFast is set.
 */
export function compareScenarios(
  store: RecordStore,
  scenarios: readonly ScenarioConfig[],
  options: CompareOptions = {},
): ScenarioOutcome[] {
  const names = scenarios.map((s) => s.name);
  const duplicates = names.filter((name, i) => names.indexOf(name) !== i);
  if (duplicates.length > 0) {
    throw new InvalidInputError(
      `Scenario names must be unique: ${[...new Set(duplicates)].join(", ")}`,
      { duplicates },
    );
  }

  const globalDistribution = relativeFrequencies(store.sensitiveValues());
  const outcomes: ScenarioOutcome[] = [];

  for (const scenario of scenarios) {
    logger.info("Running scenario", {
      scenario: scenario.name,
      quasiIdentifiers: scenario.quasiIdentifiers.map(quasiIdentifierName),
    });

    try {
      const report = runScenario(store, scenario, globalDistribution);
      outcomes.push({ status: "success", scenario: scenario.name, report });
    } catch (error) {
      if (options.failFast) {
        throw error;
      }
      const failure = toReidRiskError(error);
      logger.warn("Scenario failed", {
        scenario: scenario.name,
        code: failure.code,
        message: failure.message,
      });
      outcomes.push({
        status: "error",
        scenario: scenario.name,
        error: {
          code: failure.code,
          message: failure.message,
          ...(failure.details !== undefined ? { details: failure.details } : {}),
        },
      });
    }
  }

  return outcomes;
}

/**
 * One row per scenario for side-by-side display
 */
export function summarizeComparison(
  outcomes: readonly ScenarioOutcome[],
): ComparisonRow[] {
  return outcomes.map((outcome) => {
    if (outcome.status === "error") {
      return {
        scenario: outcome.scenario,
        quasiIdentifiers: [],
        k: null,
        l: null,
        t: null,
        passed: false,
        error: outcome.error.message,
      };
    }
    const { report } = outcome;
    return {
      scenario: report.scenario,
      quasiIdentifiers: report.quasiIdentifiers,
      k: report.metrics.k,
      l: report.metrics.l,
      t: report.metrics.t,
      passed: report.overallPassed,
    };
  });
}

/**
 * True when every scenario ran and met its thresholds
 */
export function allScenariosPassed(outcomes: readonly ScenarioOutcome[]): boolean {
  return outcomes.every(
    (outcome) => outcome.status === "success" && outcome.report.overallPassed,
  );
}
