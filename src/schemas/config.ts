/**
 * Engine configuration schema.
 *
 * Stored as a single YAML file (skills.config.yaml) and validated here.
 * Every scoring weight lives in config; there are no hidden heuristics.
 */

import { z } from "zod";
import { BundleId } from "./bundle.js";

/** Matcher weights. */
export const MatcherConfig = z.object({
  /** Score floor for any bundle with at least one trigger hit; kept above every description score. */
  triggerBaseline: z.number().min(0.5).max(1).default(0.8),
  /** Added per distinct trigger matched beyond the first. */
  triggerBonus: z.number().min(0).max(1).default(0.05),
  /** Upper bound for description-overlap scores; must stay below 0.5. */
  descriptionCeiling: z.number().min(0).lt(0.5).default(0.45),
});
export type MatcherConfig = z.infer<typeof MatcherConfig>;

/** Resolver settings. */
export const ResolverConfig = z.object({
  /** Minimum score for a bundle to be activated. */
  minScore: z.number().min(0).max(1).default(0.05),
  /** Cap on activated bundles (unbounded when absent). */
  maxBundles: z.number().int().positive().optional(),
});
export type ResolverConfig = z.infer<typeof ResolverConfig>;

/** Composer settings. */
export const ComposerConfig = z.object({
  /** Expand each bundle's references into sub-document content. */
  expandReferences: z.boolean().default(true),
});
export type ComposerConfig = z.infer<typeof ComposerConfig>;

/** Event log settings. */
export const EventLogConfig = z.object({
  enabled: z.boolean().default(false),
  /** Directory for daily JSONL files (relative to the config file). */
  dir: z.string().default(".skills-events"),
});
export type EventLogConfig = z.infer<typeof EventLogConfig>;

/** Settings consumed by the engine itself. */
export const EngineSettings = z.object({
  matcher: MatcherConfig.default({}),
  resolver: ResolverConfig.default({}),
  composer: ComposerConfig.default({}),
  /** Bundles activated when a query matches nothing. */
  fallbackBundles: z.array(BundleId).default([]),
});
export type EngineSettings = z.infer<typeof EngineSettings>;
export type EngineSettingsInput = z.input<typeof EngineSettings>;

/** Top-level configuration file. */
export const EngineConfig = EngineSettings.extend({
  schemaVersion: z.literal(1),
  /** Root of the bundle directory (relative to the config file). */
  sourceDir: z.string().default("skills"),
  eventLog: EventLogConfig.default({}),
});
export type EngineConfig = z.infer<typeof EngineConfig>;
