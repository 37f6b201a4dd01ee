/**
 * Assess command - run every configured scenario against one dataset
 */

import { Command } from "commander";
import { parseConfigFile } from "../config/parser.js";
import type { AssessCommandOptions, OutputFormat } from "../config/types.js";
import { EXIT_FAILED, EXIT_OK, exitCodeFor, parseOutputFormat, writeOutput } from "../output.js";
import type { AssessmentConfig } from "../../types/config.js";
import type { RawRow, ScenarioOutcome } from "../../types/data-model.js";
import { loadRecordsFromFile } from "../../lib/loader/index.js";
import { sampleRecords } from "../../lib/sampler/index.js";
import { RecordStore } from "../../lib/store/index.js";
import {
  allScenariosPassed,
  compareScenarios,
  summarizeComparison,
} from "../../lib/comparator/index.js";
import {
  formatComparison,
  formatScenarioReport,
} from "../../lib/reporter/index.js";
import { renderNDJSON } from "../../lib/emitter/index.js";
import { ConfigError, toReidRiskError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

const OUTPUT_FORMATS: readonly OutputFormat[] = ["json", "ndjson", "text"];
const DEFAULT_SAMPLE_SIZE = 1000;

export interface AssessmentResult {
  output: string;
  outcomes: ScenarioOutcome[];
  exitCode: number;
}

/**
 * Merge CLI options with the config file (CLI options take precedence)
 */
export function mergeAssessConfig(
  options: AssessCommandOptions,
  configFile: AssessmentConfig,
): AssessmentConfig {
  const dataset = options.input
    ? {
        ...configFile.dataset,
        path: options.input,
        // A format in the file described the file's own dataset
        format: undefined,
        mongo: undefined,
      }
    : configFile.dataset;

  return {
    ...configFile,
    dataset,
    sensitiveAttribute: options.sensitive ?? configFile.sensitiveAttribute,
    failFast: options.failFast || configFile.failFast || false,
  };
}

async function loadRows(config: AssessmentConfig): Promise<RawRow[]> {
  const dataset = config.dataset;

  if (dataset?.path) {
    return loadRecordsFromFile(dataset.path, dataset.format);
  }

  if (dataset?.mongo) {
    const result = await sampleRecords({
      uri: dataset.mongo.uri,
      database: dataset.mongo.database,
      collection: dataset.mongo.collection,
      sampleSize: dataset.mongo.sampleSize ?? DEFAULT_SAMPLE_SIZE,
      strategy: dataset.mongo.strategy ?? "random",
      attributes: dataset.attributes,
    });
    return result.rows;
  }

  throw new ConfigError(
    "No dataset source: set dataset.path or dataset.mongo in the config file, or pass --input",
  );
}

async function render(
  outcomes: ScenarioOutcome[],
  format: OutputFormat,
): Promise<string> {
  switch (format) {
    case "ndjson":
      return renderNDJSON(outcomes);
    case "text": {
      const sections = outcomes.map((outcome) =>
        outcome.status === "success"
          ? formatScenarioReport(outcome.report)
          : `--- Scenario ${outcome.scenario} failed ---\n${outcome.error.code}: ${outcome.error.message}`,
      );
      return [...sections, formatComparison(outcomes)].join("\n\n");
    }
    case "json":
      return JSON.stringify(
        {
          status: "success",
          phase: "assessment",
          overallPassed: allScenariosPassed(outcomes),
          summary: summarizeComparison(outcomes),
          outcomes,
        },
        null,
        2,
      );
  }
}

/**
 * Load the dataset, compare scenarios and render the report
 */
export async function runAssessment(
  options: AssessCommandOptions,
): Promise<AssessmentResult> {
  const format = parseOutputFormat(options.format, OUTPUT_FORMATS);
  const config = mergeAssessConfig(options, parseConfigFile(options.config));

  const rows = await loadRows(config);
  const store = RecordStore.from(rows, {
    sensitiveAttribute: config.sensitiveAttribute,
    attributes: config.dataset?.attributes,
  });

  const outcomes = compareScenarios(store, config.scenarios, {
    failFast: config.failFast,
  });

  const passed = allScenariosPassed(outcomes);
  logger.info("Assessment finished", {
    scenarios: outcomes.length,
    overallPassed: passed,
  });

  return {
    output: await render(outcomes, format),
    outcomes,
    exitCode: passed ? EXIT_OK : EXIT_FAILED,
  };
}

export function createAssessCommand(): Command {
  return new Command("assess")
    .description(
      "Measure k-anonymity, l-diversity and t-closeness for every scenario in a config file",
    )
    .requiredOption("--config <path>", "Path to assessment config (.yaml, .yml or .json)")
    .option("--input <path>", "Dataset file (.json, .ndjson, .jsonl or .csv), overrides dataset in config")
    .option("--sensitive <name>", "Sensitive attribute, overrides sensitiveAttribute in config")
    .option("--format <format>", "Output format: json, ndjson or text", "json")
    .option("--output-path <path>", "Path for the report (default: stdout)")
    .option("--fail-fast", "Stop at the first scenario error")
    .action(async (options: AssessCommandOptions) => {
      try {
        const result = await runAssessment(options);
        await writeOutput(result.output, options.outputPath);
        process.exit(result.exitCode);
      } catch (error) {
        const failure = toReidRiskError(error);
        console.error(JSON.stringify(failure.toResponse("assessment"), null, 2));
        process.exit(exitCodeFor(failure));
      }
    });
}
