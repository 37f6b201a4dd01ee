/**
 * Inspect command - list the equivalence classes of one QI selection
 */

import { Command } from "commander";
import { parseQuasiIdentifierExpression } from "../config/qi-expression.js";
import type { InspectCommandOptions, OutputFormat } from "../config/types.js";
import { exitCodeFor, parseOutputFormat, writeOutput } from "../output.js";
import type { MetricAssessment } from "../../types/data-model.js";
import { loadRecordsFromFile } from "../../lib/loader/index.js";
import { RecordStore } from "../../lib/store/index.js";
import {
  applyGeneralizations,
  quasiIdentifierName,
} from "../../lib/comparator/index.js";
import { partitionRecords } from "../../lib/partitioner/index.js";
import { computeMetrics } from "../../lib/metrics/index.js";
import { formatPartition } from "../../lib/reporter/index.js";
import { relativeFrequencies } from "../../utils/frequency-map.js";
import { toReidRiskError } from "../../utils/errors.js";

const OUTPUT_FORMATS: readonly OutputFormat[] = ["json", "text"];

function toJSON(assessment: MetricAssessment): string {
  const { partition, metrics, measurements } = assessment;
  return JSON.stringify(
    {
      status: "success",
      phase: "inspection",
      quasiIdentifiers: partition.quasiIdentifiers,
      sensitiveAttribute: partition.sensitiveAttribute,
      recordCount: partition.recordCount,
      metrics,
      classes: measurements.map((m) => ({
        key: m.equivalenceClass.label,
        size: m.size,
        distinctSensitive: m.distinctSensitive,
        distance: m.distance,
      })),
    },
    null,
    2,
  );
}

/**
 * Partition a dataset file under a QI expression and render the classes
 */
export async function runInspection(
  options: InspectCommandOptions,
): Promise<string> {
  const format = parseOutputFormat(options.format, OUTPUT_FORMATS);
  const quasiIdentifiers = parseQuasiIdentifierExpression(options.qi);

  const rows = await loadRecordsFromFile(options.input);
  const store = RecordStore.from(rows, {
    sensitiveAttribute: options.sensitive,
  });

  const { store: local } = applyGeneralizations(store, quasiIdentifiers);
  const partition = partitionRecords(
    local,
    quasiIdentifiers.map(quasiIdentifierName),
  );
  const assessment = computeMetrics(
    partition,
    relativeFrequencies(store.sensitiveValues()),
  );

  return format === "text" ? formatPartition(assessment) : toJSON(assessment);
}

export function createInspectCommand(): Command {
  return new Command("inspect")
    .description("Show the equivalence classes of a dataset under one quasi-identifier selection")
    .requiredOption("--input <path>", "Dataset file (.json, .ndjson, .jsonl or .csv)")
    .requiredOption("--sensitive <name>", "Sensitive attribute")
    .requiredOption(
      "--qi <expression>",
      'Quasi-identifiers, e.g. "Age|band:10=AgeBand,ZIP|prefix:3:**,Gender"',
    )
    .option("--format <format>", "Output format: json or text", "text")
    .action(async (options: InspectCommandOptions) => {
      try {
        await writeOutput(await runInspection(options), undefined);
      } catch (error) {
        const failure = toReidRiskError(error);
        console.error(JSON.stringify(failure.toResponse("inspection"), null, 2));
        process.exit(exitCodeFor(failure));
      }
    });
}
