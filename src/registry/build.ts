/**
 * Snapshot builder — validates a source snapshot and freezes its bundles.
 *
 * Validates:
 * - Every definition parses (schema)
 * - Bundle ids are unique
 * - `defersTo` targets exist and are not the bundle itself
 * - `references` name existing sub-documents
 * - The subtopic table names existing bundles and headings
 * - No deference cycle exists on any shared subtopic
 *
 * All issues are collected before failing so a single load reports
 * everything wrong with the bundle set.
 */

import type { ZodError } from "zod";
import { BundleDefinition, SubtopicTable } from "../schemas/bundle.js";
import type { SourceSnapshot } from "../sources/source.js";
import { RegistryError, type RegistryIssue } from "./errors.js";
import { normalizeHeading, splitSections, type BundleSection } from "./sections.js";

/** An immutable, validated bundle. */
export interface Bundle {
  readonly id: string;
  readonly triggers: readonly string[];
  readonly description: string;
  readonly references: readonly string[];
  readonly defersTo: readonly string[];
  readonly content: string;
  readonly sections: readonly BundleSection[];
  /** Subtopic tags this bundle covers. */
  readonly subtopics: readonly string[];
  readonly origin: string;
}

/** Output of a successful build. */
export interface BuiltBundleSet {
  /** Bundles sorted by ascending id. */
  bundles: Bundle[];
  documents: ReadonlyMap<string, string>;
  subtopics: SubtopicTable;
}

/** Extra checks applied while building. */
export interface BuildOptions {
  /** Bundle ids that must be present (e.g. configured fallbacks). */
  required?: readonly string[];
}

interface Draft {
  definition: BundleDefinition;
  origin: string;
}

/** Ascending code-unit order; independent of locale. */
export function compareIds(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Build a frozen bundle set from a source snapshot.
 *
 * @throws RegistryError listing every structural issue found
 */
export function buildBundleSet(source: SourceSnapshot, options: BuildOptions = {}): BuiltBundleSet {
  const issues: RegistryIssue[] = [];

  const drafts = parseEntries(source, issues);
  const unique = dedupe(drafts, issues);
  const table = parseSubtopics(source.subtopics, issues);

  validateLinks(unique, source.documents, issues);

  const bundles = new Map<string, Bundle>();
  for (const [id, draft] of unique) {
    bundles.set(id, freezeBundle(draft, table[id] ?? {}, issues));
  }

  validateSubtopicBundles(table, bundles, issues);

  for (const id of options.required ?? []) {
    if (!bundles.has(id)) {
      issues.push({
        rule: "missing-required-bundle",
        message: `Required bundle '${id}' is not defined`,
        target: id,
      });
    }
  }

  // Cycle detection assumes every edge resolves; skip it when links are broken
  if (!issues.some((i) => i.rule === "dangling-defers-to")) {
    detectDeferenceCycles(bundles, issues);
  }

  if (issues.length > 0) {
    throw new RegistryError(issues);
  }

  return {
    bundles: [...bundles.values()],
    documents: source.documents,
    subtopics: table,
  };
}

/** Parse every entry; adapter and schema failures become issues. */
function parseEntries(source: SourceSnapshot, issues: RegistryIssue[]): Draft[] {
  const drafts: Draft[] = [];

  for (const entry of source.entries) {
    if (entry.error !== undefined || entry.definition === undefined) {
      issues.push({
        rule: "invalid-definition",
        message: `Invalid bundle definition in ${entry.origin}: ${entry.error ?? "missing definition"}`,
        origin: entry.origin,
      });
      continue;
    }

    const result = BundleDefinition.safeParse(entry.definition);
    if (!result.success) {
      issues.push({
        rule: "invalid-definition",
        message: `Invalid bundle definition in ${entry.origin}: ${formatZodError(result.error)}`,
        origin: entry.origin,
      });
      continue;
    }

    drafts.push({ definition: result.data, origin: entry.origin });
  }

  return drafts.sort(
    (a, b) => compareIds(a.definition.id, b.definition.id) || compareIds(a.origin, b.origin),
  );
}

/** Keep the first definition per id; report the rest. */
function dedupe(drafts: Draft[], issues: RegistryIssue[]): Map<string, Draft> {
  const unique = new Map<string, Draft>();

  for (const draft of drafts) {
    const { id } = draft.definition;
    const existing = unique.get(id);
    if (existing) {
      issues.push({
        rule: "duplicate-id",
        message: `Duplicate bundle id '${id}' (${existing.origin}, ${draft.origin})`,
        bundleId: id,
        target: id,
        origin: draft.origin,
      });
      continue;
    }
    unique.set(id, draft);
  }

  return unique;
}

function parseSubtopics(raw: unknown, issues: RegistryIssue[]): SubtopicTable {
  const result = SubtopicTable.safeParse(raw ?? {});
  if (!result.success) {
    issues.push({
      rule: "invalid-subtopics",
      message: `Invalid subtopic table: ${formatZodError(result.error)}`,
    });
    return {};
  }
  return result.data;
}

/** Check `defersTo` and `references` targets. */
function validateLinks(
  drafts: Map<string, Draft>,
  documents: ReadonlyMap<string, string>,
  issues: RegistryIssue[],
): void {
  for (const [id, { definition, origin }] of drafts) {
    for (const target of definition.defersTo) {
      if (target === id) {
        issues.push({
          rule: "self-deference",
          message: `Bundle '${id}' defers to itself`,
          bundleId: id,
          target,
          origin,
        });
      } else if (!drafts.has(target)) {
        issues.push({
          rule: "dangling-defers-to",
          message: `Bundle '${id}' defers to unknown bundle '${target}'`,
          bundleId: id,
          target,
          origin,
        });
      }
    }

    for (const ref of definition.references) {
      if (!documents.has(ref)) {
        issues.push({
          rule: "dangling-reference",
          message: `Bundle '${id}' references unknown sub-document '${ref}'`,
          bundleId: id,
          target: ref,
          origin,
        });
      }
    }
  }
}

/** Slice sections, tag them, and freeze the result. */
function freezeBundle(
  draft: Draft,
  tags: Record<string, string[]>,
  issues: RegistryIssue[],
): Bundle {
  const { definition, origin } = draft;
  const sections = splitSections(definition.content);
  const headings = new Set(sections.map((s) => normalizeHeading(s.heading)));

  const tagsByHeading = new Map<string, string[]>();
  for (const tag of Object.keys(tags).sort()) {
    for (const heading of tags[tag] ?? []) {
      const key = normalizeHeading(heading);
      if (!headings.has(key) || key === "") {
        issues.push({
          rule: "unknown-subtopic-section",
          message: `Subtopic '${tag}' of bundle '${definition.id}' names unknown section '${heading}'`,
          bundleId: definition.id,
          target: heading,
          origin,
        });
        continue;
      }
      const list = tagsByHeading.get(key) ?? [];
      if (!list.includes(tag)) list.push(tag);
      tagsByHeading.set(key, list);
    }
  }

  const tagged = sections.map((section) =>
    Object.freeze({
      ...section,
      subtopics: Object.freeze([...(tagsByHeading.get(normalizeHeading(section.heading)) ?? [])]),
    }),
  );

  return Object.freeze({
    id: definition.id,
    triggers: Object.freeze([...definition.triggers]),
    description: definition.description,
    references: Object.freeze([...definition.references]),
    defersTo: Object.freeze([...new Set(definition.defersTo)].sort(compareIds)),
    content: definition.content,
    sections: Object.freeze(tagged),
    subtopics: Object.freeze(Object.keys(tags).sort(compareIds)),
    origin,
  });
}

function validateSubtopicBundles(
  table: SubtopicTable,
  bundles: Map<string, Bundle>,
  issues: RegistryIssue[],
): void {
  for (const id of Object.keys(table).sort(compareIds)) {
    if (!bundles.has(id)) {
      issues.push({
        rule: "unknown-subtopic-bundle",
        message: `Subtopic table names unknown bundle '${id}'`,
        target: id,
      });
    }
  }
}

/**
 * Detect deference cycles, one subtopic at a time.
 *
 * An edge A → B exists for subtopic T when A defers to B and both cover T.
 * The first cycle found per subtopic is reported.
 */
export function detectDeferenceCycles(
  bundles: ReadonlyMap<string, Bundle>,
  issues: RegistryIssue[],
): void {
  const tags = new Set<string>();
  for (const bundle of bundles.values()) {
    for (const tag of bundle.subtopics) tags.add(tag);
  }

  for (const tag of [...tags].sort(compareIds)) {
    const nodes = [...bundles.values()]
      .filter((b) => b.subtopics.includes(tag))
      .map((b) => b.id)
      .sort(compareIds);

    const edges = (id: string): string[] =>
      (bundles.get(id)?.defersTo ?? []).filter(
        (target) => target !== id && bundles.get(target)?.subtopics.includes(tag) === true,
      );

    const cycle = findCycle(nodes, edges);
    if (cycle) {
      const [first] = cycle;
      issues.push({
        rule: "deference-cycle",
        message: `Deference cycle on subtopic '${tag}': ${cycle.join(" -> ")}`,
        bundleId: first,
        target: tag,
      });
    }
  }
}

/** Depth-first search; returns the first cycle as a closed path. */
function findCycle(nodes: string[], edges: (id: string) => string[]): string[] | undefined {
  const state = new Map<string, "visiting" | "done">();
  const path: string[] = [];

  const visit = (id: string): string[] | undefined => {
    state.set(id, "visiting");
    path.push(id);

    for (const next of edges(id)) {
      const seen = state.get(next);
      if (seen === "visiting") {
        return [...path.slice(path.indexOf(next)), next];
      }
      if (seen === undefined) {
        const found = visit(next);
        if (found) return found;
      }
    }

    path.pop();
    state.set(id, "done");
    return undefined;
  };

  for (const node of nodes) {
    if (state.has(node)) continue;
    const found = visit(node);
    if (found) return found;
  }
  return undefined;
}

function formatZodError(err: ZodError): string {
  return err.errors.map((e) => `${e.path.join(".") || "(root)"}: ${e.message}`).join("; ");
}
