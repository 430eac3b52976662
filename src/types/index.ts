/**
 * Shared types of the dispatch core.
 */

export * from "./mode.js";
export * from "./pipeline.js";
