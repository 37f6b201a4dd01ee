/**
 * Shared CLI output helpers
 */

import { mkdir, writeFile } from "fs/promises";
import { dirname } from "path";
import type { OutputFormat } from "./config/types.js";
import {
  ConfigError,
  ErrorCode,
  FileIOError,
  ReidRiskError,
} from "../utils/errors.js";

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;

/**
 * Exit code for an error reaching the command boundary
 */
export function exitCodeFor(error: ReidRiskError): number {
  switch (error.code) {
    case ErrorCode.CONFIG_ERROR:
      return 2;
    case ErrorCode.DATA_SOURCE_ERROR:
      return 3;
    case ErrorCode.FILE_IO_ERROR:
    case ErrorCode.INPUT_READ_ERROR:
      return 4;
    default:
      return EXIT_FAILED;
  }
}

export function parseOutputFormat(
  value: string | undefined,
  allowed: readonly OutputFormat[],
): OutputFormat {
  const format = value ?? "json";
  const match = allowed.find((candidate) => candidate === format);
  if (!match) {
    throw new ConfigError(
      `Unsupported output format "${format}". Use one of: ${allowed.join(", ")}`,
    );
  }
  return match;
}

/**
 * Write to a file, or stdout when no path (or "stdout") is given
 */
export async function writeOutput(
  output: string,
  outputPath: string | undefined,
): Promise<void> {
  if (!outputPath || outputPath === "stdout") {
    process.stdout.write(output.endsWith("\n") ? output : output + "\n");
    return;
  }

  try {
    await mkdir(dirname(outputPath), { recursive: true });
    await writeFile(outputPath, output, "utf8");
  } catch (error) {
    throw new FileIOError(`Failed to write report to ${outputPath}`, undefined, {
      cause: error,
    });
  }
  process.stderr.write(`Report written to: ${outputPath}\n`);
}
