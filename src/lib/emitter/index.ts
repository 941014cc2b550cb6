/**
 * Emitter module - bundle envelopes and JSON output
 */
export type * from "./types.js";
export * from "./bundle-emitter.js";
export * from "./json-writer.js";
