/**
 * Analysis module: score summaries and null-hypothesis simulation.
 */

export * from "./statistics.ts";
export * from "./simulate.ts";
