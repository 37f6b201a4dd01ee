/**
 * Loader module - reads dataset rows from JSON, NDJSON or CSV files
 */

import { createReadStream, type ReadStream } from "fs";
import { access, readFile } from "fs/promises";
import { once } from "events";
import * as readline from "readline";
import { CsvError, parse as parseCsv, type CastingContext } from "csv-parse";
import type { RawRow, ScalarValue } from "../../types/data-model.js";
import type { DatasetFormat } from "../../types/config.js";
import {
  ConfigError,
  FileIOError,
  InputReadError,
  ReidRiskError,
} from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { normalizeRow } from "./normalize.js";

export * from "./normalize.js";

function isMissingFile(err: unknown): boolean {
  return (
    err instanceof Error && "code" in err && err.code === "ENOENT"
  );
}

/**
 * Pick the dataset format from the file extension
 */
export function detectFormat(path: string): DatasetFormat {
  const lower = path.toLowerCase();
  if (lower.endsWith(".json")) return "json";
  if (lower.endsWith(".ndjson") || lower.endsWith(".jsonl")) return "ndjson";
  if (lower.endsWith(".csv")) return "csv";

  throw new ConfigError(
    `Unsupported dataset file format: ${path}. Must be .json, .ndjson, .jsonl or .csv`,
    { path },
  );
}

async function assertReadable(path: string): Promise<void> {
  try {
    await access(path);
  } catch (err) {
    throw new FileIOError(`Dataset not found at: ${path}`, { path }, {
      cause: err,
    });
  }
}

/**
 * Release the file descriptor, including when reading stopped early
 */
async function closeInput(input: ReadStream): Promise<void> {
  if (input.closed) return;
  input.destroy();
  await once(input, "close");
}

/**
 * Stream NDJSON rows from a file, one object per non-empty line
 */
export async function* streamNDJSONRows(
  path: string,
): AsyncIterableIterator<RawRow> {
  await assertReadable(path);

  const input = createReadStream(path, { encoding: "utf8" });

  const rl = readline.createInterface({
    input,
    crlfDelay: Infinity, // Handle all line endings
  });

  let lineNumber = 0;
  let rowIndex = 0;
  try {
    for await (const line of rl) {
      lineNumber++;
      const trimmed = line.trim();
      if (trimmed === "") continue;

      let parsed: unknown;
      try {
        parsed = JSON.parse(trimmed);
      } catch (err) {
        throw new InputReadError(
          `Failed to parse NDJSON line ${lineNumber}: ${trimmed.substring(0, 100)}`,
          { path, line: lineNumber },
          { cause: err },
        );
      }
      yield normalizeRow(parsed, rowIndex++);
    }
  } finally {
    rl.close();
    await closeInput(input);
  }
}

const NUMERIC_CELL = /^-?(?:\d+|\d*\.\d+)(?:[eE][-+]?\d+)?$/;

/**
 * CSV cell typing: quoted cells stay text, unquoted numeric cells become
 * numbers, unquoted empty cells become null
 */
function castCsvCell(value: string, context: CastingContext): ScalarValue {
  if (context.header || context.quoting) return value;
  const trimmed = value.trim();
  if (trimmed === "") return null;
  if (NUMERIC_CELL.test(trimmed)) return Number(trimmed);
  return value;
}

/**
 * Stream CSV rows from a file. The header row names the attributes.
 */
export async function* streamCSVRows(
  path: string,
): AsyncIterableIterator<RawRow> {
  await assertReadable(path);

  const input = createReadStream(path, { encoding: "utf8" });
  const parser = input.pipe(
    parseCsv({
      columns: true,
      bom: true,
      skip_empty_lines: true,
      cast: castCsvCell,
    }),
  );
  // pipe() does not forward source errors
  input.on("error", (err) => parser.destroy(err));

  let rowIndex = 0;
  try {
    for await (const record of parser) {
      const row: unknown = record;
      yield normalizeRow(row, rowIndex++);
    }
  } catch (err) {
    if (err instanceof CsvError) {
      throw new InputReadError(
        `Failed to parse CSV ${path}: ${err.message}`,
        { path, code: err.code },
        { cause: err },
      );
    }
    if (err instanceof ReidRiskError) {
      throw err;
    }
    throw new FileIOError(`Failed to read dataset from ${path}`, { path }, {
      cause: err,
    });
  } finally {
    parser.destroy();
    await closeInput(input);
  }
}

async function readJSONRows(path: string): Promise<RawRow[]> {
  let content: string;
  try {
    content = await readFile(path, "utf8");
  } catch (err) {
    if (isMissingFile(err)) {
      throw new FileIOError(`Dataset not found at: ${path}`, { path }, {
        cause: err,
      });
    }
    throw new FileIOError(`Failed to read dataset from ${path}`, { path }, {
      cause: err,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    throw new InputReadError(`Dataset at ${path} is not valid JSON`, { path }, {
      cause: err,
    });
  }

  if (!Array.isArray(parsed)) {
    throw new InputReadError(`Dataset at ${path} must be a JSON array of objects`, {
      path,
    });
  }

  return parsed.map((row: unknown, index) => normalizeRow(row, index));
}

/**
 * Load every row of a dataset file
 */
export async function loadRecordsFromFile(
  path: string,
  format: DatasetFormat = detectFormat(path),
): Promise<RawRow[]> {
  logger.info("Loading dataset", { path, format });

  let rows: RawRow[];
  if (format === "json") {
    rows = await readJSONRows(path);
  } else {
    rows = [];
    const stream =
      format === "csv" ? streamCSVRows(path) : streamNDJSONRows(path);
    for await (const row of stream) {
      rows.push(row);
    }
  }

  logger.info("Dataset loaded", { path, rows: rows.length });
  return rows;
}
