/**
 * reid-risk: re-identification risk assessment for quasi-identified datasets
 *
 * @packageDocumentation
 */

// Core types
export * from "./types/index.js";

// Privacy-metric engine
export * from "./lib/store/index.js";
export * from "./lib/generalizer/index.js";
export * from "./lib/partitioner/index.js";
export * from "./lib/metrics/index.js";
export * from "./lib/reporter/index.js";
export * from "./lib/comparator/index.js";

// Dataset sources and output
export * from "./lib/loader/index.js";
export * from "./lib/sampler/index.js";
export * from "./lib/emitter/index.js";

// Utilities
export * from "./utils/logger.js";
export * from "./utils/errors.js";
export * from "./utils/frequency-map.js";
