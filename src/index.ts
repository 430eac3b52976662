/**
 * Configuration resolution and multi-sample dispatch for the anchor/DHS
 * correlation pipeline.
 *
 * The CLI lives in ./cli/run-pipeline.ts; everything it uses is exported here.
 */

export * from "./errors/index.js";
export * from "./types/index.js";
export * from "./config/index.js";
export * from "./modes/index.js";
export * from "./samples/index.js";
export * from "./dispatch/index.js";
export * from "./pipeline/index.js";
export * from "./logging/index.js";
