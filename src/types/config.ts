/**
 * Assessment configuration types
 */

import type { ScenarioConfig } from "./data-model.js";

export type DatasetFormat = "json" | "ndjson" | "csv";

export type SamplingStrategyName = "random" | "firstN";

/**
 * MongoDB collection to read the dataset from
 */
export interface MongoSourceConfig {
  uri: string;
  database: string;
  collection: string;
  sampleSize?: number;
  strategy?: SamplingStrategyName;
}

export interface DatasetConfig {
  path?: string;
  format?: DatasetFormat;
  mongo?: MongoSourceConfig;
  attributes?: string[]; // Explicit schema, otherwise inferred from the rows
}

/**
 * Complete assessment file structure
 */
export interface AssessmentConfig {
  dataset?: DatasetConfig;
  sensitiveAttribute: string;
  failFast?: boolean;
  scenarios: ScenarioConfig[];
}
