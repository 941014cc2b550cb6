/**
 * Entity builders - one pure builder per record kind
 */
export * from "./common.js";
export * from "./sites.js";
export * from "./organizations.js";
export * from "./groups.js";
export * from "./donor.js";
export * from "./donor-branch.js";
