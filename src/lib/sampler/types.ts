/**
 * Sampler module types
 */

import type { SamplingStrategyName } from "../../types/config.js";
import type { RawRow } from "../../types/data-model.js";

export interface MongoConnection {
  uri: string;
  database: string;
}

export interface SamplerOptions extends MongoConnection {
  collection: string;
  sampleSize: number;
  strategy: SamplingStrategyName;
  attributes?: readonly string[]; // Projection; _id is left out unless listed
}

export interface SamplerResult {
  rows: RawRow[];
  metadata: {
    totalSampled: number;
    collectionName: string;
    sampledAt: Date;
  };
}
