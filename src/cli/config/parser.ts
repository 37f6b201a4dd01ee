/**
 * Configuration file parser - supports JSON and YAML
 */

import { readFileSync } from "fs";
import { dirname, isAbsolute, resolve } from "path";
import { parse as parseYaml } from "yaml";
import type { AssessmentConfig } from "../../types/config.js";
import { ConfigError, FileIOError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { validateAssessmentConfig } from "./schema.js";

/**
 * Parse configuration text by format
 */
export function parseConfigText(
  content: string,
  format: "json" | "yaml",
  source = "configuration",
): AssessmentConfig {
  let parsed: unknown;
  try {
    parsed = format === "yaml" ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse ${source}`, undefined, {
      cause: error,
    });
  }

  return validateAssessmentConfig(parsed, source);
}

/**
 * Parse configuration file (JSON or YAML). A relative dataset path is
 * resolved against the directory of the configuration file.
 */
export function parseConfigFile(filePath: string): AssessmentConfig {
  logger.info("Parsing configuration file", { filePath });

  // Determine format from file extension
  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new ConfigError(
      `Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`,
    );
  }

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new FileIOError(`Failed to read config file: ${filePath}`, undefined, {
      cause: error,
    });
  }

  const config = parseConfigText(
    content,
    isYaml ? "yaml" : "json",
    `config file ${filePath}`,
  );

  if (config.dataset?.path && !isAbsolute(config.dataset.path)) {
    config.dataset.path = resolve(dirname(filePath), config.dataset.path);
  }

  logger.info("Configuration file parsed successfully", {
    scenarios: config.scenarios.length,
    hasDatasetPath: !!config.dataset?.path,
    hasMongoSource: !!config.dataset?.mongo,
  });

  return config;
}
