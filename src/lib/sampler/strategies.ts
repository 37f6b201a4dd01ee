/**
 * Sampling strategies for MongoDB collections
 */

import type { Document, FindOptions } from "mongodb";
import type { SamplingStrategyName } from "../../types/config.js";
import { logger } from "../../utils/logger.js";

/**
 * The part of a driver Collection the strategies read through
 */
export interface SampleSource {
  aggregate(pipeline: Document[]): { toArray(): Promise<Document[]> };
  find(
    filter: Document,
    options?: FindOptions,
  ): { limit(size: number): { toArray(): Promise<Document[]> } };
}

export interface SamplingStrategy {
  name: SamplingStrategyName;
  sample(
    collection: SampleSource,
    size: number,
    projection?: Document,
  ): Promise<Document[]>;
}

/**
 * Random sampling using the $sample aggregation stage
 */
export class RandomSamplingStrategy implements SamplingStrategy {
  name = "random" as const;

  async sample(
    collection: SampleSource,
    size: number,
    projection?: Document,
  ): Promise<Document[]> {
    logger.debug("Executing random sampling strategy", { size });

    const pipeline: Document[] = [{ $sample: { size } }];
    if (projection) {
      pipeline.push({ $project: projection });
    }
    return collection.aggregate(pipeline).toArray();
  }
}

/**
 * First-N sampling (reads first N documents in natural order)
 */
export class FirstNSamplingStrategy implements SamplingStrategy {
  name = "firstN" as const;

  async sample(
    collection: SampleSource,
    size: number,
    projection?: Document,
  ): Promise<Document[]> {
    logger.debug("Executing first-N sampling strategy", { size });

    return collection
      .find({}, projection ? { projection } : {})
      .limit(size)
      .toArray();
  }
}

export function createStrategy(name: SamplingStrategyName): SamplingStrategy {
  switch (name) {
    case "random":
      return new RandomSamplingStrategy();
    case "firstN":
      return new FirstNSamplingStrategy();
  }
}

/**
 * Projection keeping only the listed attributes; _id is dropped unless listed
 */
export function buildProjection(
  attributes: readonly string[] | undefined,
): Document | undefined {
  if (!attributes || attributes.length === 0) {
    return undefined;
  }

  const projection: Document = {};
  for (const attribute of attributes) {
    projection[attribute] = 1;
  }
  if (!attributes.includes("_id")) {
    projection._id = 0;
  }
  return projection;
}
