// Core re-exports for the reid-risk type system
// This file provides a single import point for all project types

export * from "./data-model.js";
export * from "./config.js";
