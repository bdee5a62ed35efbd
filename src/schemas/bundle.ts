/**
 * Bundle schemas — definitions, front-matter, subtopic table, queries.
 *
 * Every bundle source normalizes into `BundleDefinition` at the boundary;
 * nothing downstream branches on the front-matter dialect a file used.
 */

import { z } from "zod";

/** Bundle ids: lowercase slug (letters, digits, dot, dash, underscore). */
export const BUNDLE_ID_PATTERN = /^[a-z0-9][a-z0-9._-]*$/;

export const BundleId = z
  .string()
  .regex(BUNDLE_ID_PATTERN, "bundle id must be a lowercase slug (a-z, 0-9, '.', '_', '-')");

/** A string or a list of strings; scalars are promoted to one-element lists. */
const StringList = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (typeof value === "string" ? [value] : value));

/**
 * Front-matter accepted on a SKILL.md document.
 *
 * Two dialects occur in the wild: `name` + `description`, and a bare
 * `triggers` list. Deference may be spelled `defersTo`, `defers-to` or
 * `defers_to`. Unknown keys are kept but ignored.
 */
export const BundleFrontmatter = z
  .object({
    id: z.string().optional(),
    name: z.string().optional(),
    description: z.string().optional(),
    triggers: StringList.optional(),
    references: StringList.optional(),
    defersTo: StringList.optional(),
    "defers-to": StringList.optional(),
    defers_to: StringList.optional(),
  })
  .passthrough();
export type BundleFrontmatter = z.infer<typeof BundleFrontmatter>;

/** Normalized bundle definition, the single shape every source produces. */
export const BundleDefinition = z.object({
  id: BundleId,
  triggers: z.array(z.string()).default([]),
  description: z.string().default(""),
  /** Sub-document ids, in presentation order. */
  references: z.array(z.string().min(1)).default([]),
  /** Bundle ids this bundle hands overlapping subtopics to. */
  defersTo: z.array(z.string()).default([]),
  /** Opaque guidance body. */
  content: z.string().default(""),
});
export type BundleDefinition = z.infer<typeof BundleDefinition>;
export type BundleDefinitionInput = z.input<typeof BundleDefinition>;

/**
 * Subtopic table: bundle id → subtopic tag → section headings.
 *
 * This is the only place overlap between bundles is declared.
 */
export const SubtopicTable = z.record(
  z.string(),
  z.record(z.string().min(1), z.array(z.string().min(1))),
);
export type SubtopicTable = z.infer<typeof SubtopicTable>;

/** A request for guidance. */
export const Query = z.object({
  text: z.string().default(""),
  /** Bundle ids requested explicitly; they bypass matching. */
  hints: z.array(z.string()).default([]),
});
export type Query = z.infer<typeof Query>;
export type QueryInput = z.input<typeof Query>;
