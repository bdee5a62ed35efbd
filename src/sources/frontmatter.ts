/**
 * Front-matter adapter — turns a SKILL.md document into a BundleDefinition.
 *
 * Skill documents use informal front-matter: some carry `name` +
 * `description`, some only a `triggers` list, and deference is spelled three
 * ways. All of it is folded into one shape here.
 */

import matter from "gray-matter";
import type { ZodError } from "zod";
import { BundleFrontmatter, type BundleDefinitionInput } from "../schemas/bundle.js";
import type { SourceEntry } from "./source.js";

export interface AdaptOptions {
  /** Id used when the front-matter names none (usually the directory name). */
  fallbackId: string;
  /** Origin recorded on the entry. */
  origin: string;
  /** References used when the front-matter lists none. */
  defaultReferences?: readonly string[];
}

export const normalizeString = (value: unknown): string | undefined =>
  typeof value === "string" && value.trim() ? value.trim() : undefined;

/** Trim, drop empties, dedupe; keeps first-seen order. */
export const normalizeList = (values: readonly string[] | undefined): string[] => {
  if (!values) return [];
  const seen = new Set<string>();
  for (const value of values) {
    const trimmed = value.trim();
    if (trimmed) seen.add(trimmed);
  }
  return [...seen];
};

/** Lowercased, whitespace-collapsed, deduped and sorted trigger terms. */
export const normalizeTriggers = (values: readonly string[] | undefined): string[] =>
  [...new Set(normalizeList(values).map((t) => t.toLowerCase().replace(/\s+/g, " ")))].sort();

/**
 * First prose paragraph of a Markdown body, whitespace collapsed.
 * Headings, list items and fenced code are skipped.
 */
export function firstParagraph(body: string): string | undefined {
  const paragraph: string[] = [];
  let inFence = false;

  for (const line of body.split("\n")) {
    const trimmed = line.trim();
    const isFence = /^(```|~~~)/.test(trimmed);
    if (isFence) inFence = !inFence;

    const isProse =
      !isFence &&
      !inFence &&
      trimmed !== "" &&
      !trimmed.startsWith("#") &&
      !/^([-*+>]\s|\||\d+\.\s)/.test(trimmed);

    if (isProse) {
      paragraph.push(trimmed);
    } else if (paragraph.length > 0) {
      break;
    }
  }

  return paragraph.length > 0 ? paragraph.join(" ").replace(/\s+/g, " ") : undefined;
}

/**
 * Adapt a raw SKILL.md document.
 *
 * Never throws: problems are reported on the entry so the registry can
 * collect them alongside every other structural issue.
 */
export function adaptSkillDocument(raw: string, options: AdaptOptions): SourceEntry {
  const { fallbackId, origin, defaultReferences = [] } = options;

  let parsed: matter.GrayMatterFile<string>;
  try {
    parsed = matter(raw);
  } catch (err) {
    return {
      origin,
      error: `Unreadable front-matter: ${err instanceof Error ? err.message : String(err)}`,
    };
  }

  const result = BundleFrontmatter.safeParse(parsed.data);
  if (!result.success) {
    return { origin, error: formatZodError(result.error) };
  }

  const fm = result.data;
  const content = parsed.content.trim();

  const definition: BundleDefinitionInput = {
    id: normalizeString(fm.id) ?? normalizeString(fm.name) ?? fallbackId,
    description: normalizeString(fm.description) ?? firstParagraph(content) ?? "",
    triggers: normalizeTriggers(fm.triggers),
    references: fm.references ? normalizeList(fm.references) : [...defaultReferences],
    defersTo: normalizeList([
      ...(fm.defersTo ?? []),
      ...(fm["defers-to"] ?? []),
      ...(fm.defers_to ?? []),
    ]),
    content,
  };

  return { origin, definition };
}

function formatZodError(err: ZodError): string {
  return `Validation failed: ${err.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join("; ")}`;
}
