/**
 * Emitter module - stream writers for assessment output
 */
export * from "./ndjson-writer.js";
