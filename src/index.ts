/**
 * miabis-synth: seeded MIABIS on FHIR transaction bundle generation
 *
 * @packageDocumentation
 */

// Core types
export type * from "./types/index.js";

// Modules
export * from "./lib/random/index.js";
export * from "./lib/registries/index.js";
export * from "./lib/identity/index.js";
export * from "./lib/builders/index.js";
export * from "./lib/assembler/index.js";
export * from "./lib/emitter/index.js";
export * from "./lib/reporter/index.js";
export * from "./lib/generator/index.js";

// Utilities
export * from "./utils/logger.js";
export * from "./utils/errors.js";
export * from "./utils/seed-manager.js";
export * from "./utils/config-loader.js";
