/**
 * Skill composer
 *
 * Selects guidance bundles relevant to a task and composes them into one
 * deduplicated payload. Registry → Matcher → Resolver → Composer.
 * Scoring is deterministic (no model calls).
 */

export * from './schemas/index.js';
export * from './sources/index.js';
export * from './registry/index.js';
export * from './matching/index.js';
export * from './resolver/index.js';
export * from './compose/index.js';
export * from './engine/index.js';
export * from './events/index.js';
export * from './config/index.js';
