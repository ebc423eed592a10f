/**
 * Core module - graph model, configuration and impact analysis
 */

// Re-export error classes
export * from "./errors.js";

export * from "./config.js";
export * from "./dependency-graph/index.js";
export * from "./impact/index.js";
