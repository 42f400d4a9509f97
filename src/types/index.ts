/**
 * Shared type foundations for the row pipeline.
 */

export * from "./row.js";
export * from "./pipeline.js";
