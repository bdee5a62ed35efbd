/**
 * Sources module — bundle definition stores and the front-matter adapter.
 */

export * from "./source.js";
export * from "./frontmatter.js";
export * from "./directory.js";
export * from "./inline.js";
