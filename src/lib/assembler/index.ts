/**
 * Assembler module - orders builders into one record sequence
 */
export * from "./distribution.js";
export * from "./hierarchy-assembler.js";
