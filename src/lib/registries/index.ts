/**
 * Coded value registries - fixed vocabularies and canonical URIs
 */
export * from "./systems.js";
export * from "./value-sets.js";
export * from "./mappings.js";
export * from "./places.js";
