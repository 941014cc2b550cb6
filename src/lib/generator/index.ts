/**
 * Generator module - end-to-end bundle generation
 */
export * from "./bundle-generator.js";
