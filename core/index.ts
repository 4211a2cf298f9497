/**
 * Core module exports for basketstats.
 */

export * from "./errors.ts";
export * from "./registry/index.ts";
export * from "./corpus.ts";
export * from "./pairs.ts";
export * from "./config.ts";
export * from "./datasets.ts";
export * from "./ranking.ts";
export * from "./analysis/index.ts";

// Association measures and their registry
export * from "./association/index.ts";
