/**
 * MongoDB connection management with pooling
 */

import { MongoClient, Db, Collection } from "mongodb";
import { logger } from "../../utils/logger.js";
import { DataSourceError } from "../../utils/errors.js";
import type { MongoConnection } from "./types.js";

export class MongoConnector {
  private client: MongoClient | null = null;
  private db: Db | null = null;

  /**
   * Connect to MongoDB with connection pooling
   */
  async connect(config: MongoConnection): Promise<void> {
    const sanitized = sanitizeUri(config.uri);
    try {
      logger.info("Connecting to MongoDB", { uri: sanitized });

      this.client = new MongoClient(config.uri, {
        maxPoolSize: 10,
        minPoolSize: 2,
        serverSelectionTimeoutMS: 5000,
        socketTimeoutMS: 45000,
      });

      await this.client.connect();
      this.db = this.client.db(config.database);

      logger.info("Connected to database", { database: config.database });
    } catch (error) {
      logger.error("MongoDB connection failed", error);
      throw new DataSourceError(
        "Failed to connect to MongoDB: " +
          (error instanceof Error ? error.message : String(error)),
        { uri: sanitized, database: config.database },
        { cause: error },
      );
    }
  }

  /**
   * Get collection instance
   */
  getCollection(collectionName: string): Collection {
    if (!this.db) {
      throw new DataSourceError("Not connected to MongoDB. Call connect() first.");
    }

    return this.db.collection(collectionName);
  }

  async close(): Promise<void> {
    if (this.client) {
      await this.client.close();
      this.client = null;
      this.db = null;
      logger.info("MongoDB connection closed");
    }
  }

  isConnected(): boolean {
    return this.client !== null && this.db !== null;
  }
}

/**
 * Mask credentials in a connection string for logging
 */
export function sanitizeUri(uri: string): string {
  try {
    const url = new URL(uri);
    if (url.username || url.password) {
      return uri.replace(/:\/\/[^@]+@/, "://***:***@");
    }
    return uri;
  } catch {
    return "mongodb://***";
  }
}

/**
 * Factory function for creating connector instances
 */
export async function createConnector(
  config: MongoConnection,
): Promise<MongoConnector> {
  const connector = new MongoConnector();
  await connector.connect(config);
  return connector;
}
