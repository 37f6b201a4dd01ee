/**
 * Sampler module - reads dataset rows from a MongoDB collection
 */

import type { Document } from "mongodb";
import { createConnector, MongoConnector } from "./connector.js";
import { buildProjection, createStrategy } from "./strategies.js";
import type { SamplerOptions, SamplerResult } from "./types.js";
import type { RawRow } from "../../types/data-model.js";
import { normalizeRow } from "../loader/normalize.js";
import { logger } from "../../utils/logger.js";
import { DataSourceError, ReidRiskError } from "../../utils/errors.js";

export * from "./types.js";
export * from "./connector.js";
export * from "./strategies.js";

/**
 * Normalize sampled documents; without a projection the driver's _id is dropped
 */
export function documentsToRows(
  documents: readonly Document[],
  keepId: boolean,
): RawRow[] {
  return documents.map((doc, index) => {
    if (keepId) {
      return normalizeRow(doc, index);
    }
    const { _id, ...rest } = doc;
    return normalizeRow(rest, index);
  });
}

/**
 * Sample rows from a collection. The connection is always closed.
 */
export async function sampleRecords(
  options: SamplerOptions,
): Promise<SamplerResult> {
  const startTime = Date.now();
  const strategy = createStrategy(options.strategy);
  let connector: MongoConnector | null = null;

  try {
    connector = await createConnector({
      uri: options.uri,
      database: options.database,
    });

    logger.info("Starting record sampling", {
      collection: options.collection,
      strategy: options.strategy,
      sampleSize: options.sampleSize,
    });

    const collection = connector.getCollection(options.collection);
    const documents = await strategy.sample(
      collection,
      options.sampleSize,
      buildProjection(options.attributes),
    );
    const rows = documentsToRows(
      documents,
      options.attributes?.includes("_id") ?? false,
    );

    logger.info("Sampling completed", {
      rowsRetrieved: rows.length,
      durationMs: Date.now() - startTime,
    });

    return {
      rows,
      metadata: {
        totalSampled: rows.length,
        collectionName: options.collection,
        sampledAt: new Date(),
      },
    };
  } catch (error) {
    logger.error("Sampling failed", error);
    if (error instanceof ReidRiskError) {
      throw error;
    }
    throw new DataSourceError(
      `Sampling from collection ${options.collection} failed: ` +
        (error instanceof Error ? error.message : String(error)),
      { collection: options.collection },
      { cause: error },
    );
  } finally {
    if (connector) {
      await connector.close();
    }
  }
}
