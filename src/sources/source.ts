/**
 * Bundle sources — where bundle definitions come from.
 *
 * A source is read once per registry load. It reports what it found and
 * leaves every structural judgement to the registry.
 */

import type { BundleDefinitionInput } from "../schemas/bundle.js";

/** One bundle definition as read from a source. */
export interface SourceEntry {
  /** Where the definition came from (file path, "inline:<id>", ...). */
  origin: string;
  /** Normalized definition (absent when the source could not adapt it). */
  definition?: BundleDefinitionInput;
  /** Adapter error (front-matter unreadable or invalid). */
  error?: string;
}

/** Everything a source yields for one load. */
export interface SourceSnapshot {
  entries: SourceEntry[];
  /** Sub-document id → opaque text. */
  documents: ReadonlyMap<string, string>;
  /** Raw subtopic table; validated by the registry. */
  subtopics: unknown;
}

/**
 * Bundle source interface.
 *
 * Implementations read from different stores (a directory tree, inline
 * definitions, ...). They never write back.
 */
export interface BundleSource {
  /** Source type identifier (e.g. 'directory', 'inline'). */
  readonly type: string;

  /**
   * Read every definition, sub-document and the subtopic table.
   *
   * @throws Error if the underlying store cannot be read
   */
  read(): Promise<SourceSnapshot>;
}
