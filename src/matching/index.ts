/**
 * Matching module — relevance scoring and ranking.
 */

export * from "./tokenize.js";
export * from "./matcher.js";
