// Single import point for the project's types

export type * from "./fhir.js";
export type * from "./records.js";
export type * from "./bundle.js";
export type * from "./config.js";
