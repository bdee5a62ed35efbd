/**
 * Registry module — bundle loading, validation and lookup.
 */

export * from "./errors.js";
export * from "./sections.js";
export * from "./build.js";
export * from "./registry.js";
