/**
 * Inline source — bundle definitions held in memory.
 *
 * Useful for embedding a fixed bundle set, and for tests.
 */

import type { BundleDefinitionInput } from "../schemas/bundle.js";
import type { BundleSource, SourceSnapshot } from "./source.js";

export interface InlineSourceInput {
  bundles: readonly BundleDefinitionInput[];
  /** Sub-document id → content. */
  documents?: Readonly<Record<string, string>>;
  /** Subtopic table (bundle → tag → headings). */
  subtopics?: unknown;
}

export class InlineSource implements BundleSource {
  readonly type = "inline";
  private readonly input: InlineSourceInput;

  constructor(input: InlineSourceInput) {
    this.input = input;
  }

  async read(): Promise<SourceSnapshot> {
    return {
      entries: this.input.bundles.map((definition) => ({
        origin: `inline:${definition.id}`,
        definition,
      })),
      documents: new Map(Object.entries(this.input.documents ?? {})),
      subtopics: this.input.subtopics ?? {},
    };
  }
}
