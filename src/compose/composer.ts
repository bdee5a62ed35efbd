/**
 * Composer — assembles activated bundles into the guidance payload.
 *
 * For each activation, in order:
 * - drop sections tagged with a suppressed subtopic
 * - expand references into sub-document content, each sub-document at most
 *   once across the whole composition (first inclusion wins)
 *
 * Pure: reads the registry snapshot, never mutates it.
 */

import type { BundleLookup } from "../registry/registry.js";
import { joinSections } from "../registry/sections.js";
import type { Activation } from "../resolver/resolver.js";

/** A sub-document included in the composition. */
export interface ReferenceDocument {
  id: string;
  content: string;
}

/** One bundle's contribution. */
export interface CompositionEntry {
  id: string;
  /** Bundle body minus suppressed sections. */
  content: string;
  /** Sub-documents expanded for this bundle (empty when expansion is off). */
  includedReferences: ReferenceDocument[];
  /** Subtopics stripped from this bundle. */
  suppressed: string[];
}

export type Composition = CompositionEntry[];

export interface ComposeOptions {
  /** Expand references into sub-document content (default true). */
  expandReferences?: boolean;
}

/**
 * Compose activations into an ordered, deduplicated payload.
 *
 * @throws NotFoundError if an activation names a bundle the lookup lacks
 */
export function compose(
  activations: readonly Activation[],
  registry: BundleLookup,
  options: ComposeOptions = {},
): Composition {
  const { expandReferences = true } = options;
  const seenBundles = new Set<string>();
  const seenDocuments = new Set<string>();
  const composition: Composition = [];

  for (const activation of activations) {
    if (seenBundles.has(activation.bundleId)) continue;
    seenBundles.add(activation.bundleId);

    const bundle = registry.get(activation.bundleId);
    const suppressed = new Set(activation.suppressed);
    const kept = bundle.sections.filter(
      (section) => !section.subtopics.some((tag) => suppressed.has(tag)),
    );

    const includedReferences: ReferenceDocument[] = [];
    if (expandReferences) {
      for (const ref of bundle.references) {
        if (seenDocuments.has(ref)) continue;
        seenDocuments.add(ref);
        includedReferences.push({ id: ref, content: registry.document(ref) });
      }
    }

    composition.push({
      id: bundle.id,
      content: kept.length === bundle.sections.length ? bundle.content : joinSections(kept),
      includedReferences,
      suppressed: [...activation.suppressed],
    });
  }

  return composition;
}

/**
 * Render a composition as one Markdown document.
 *
 * Each bundle and sub-document is introduced by an HTML comment marker so
 * the payload stays readable and its parts stay attributable.
 */
export function renderComposition(composition: Composition): string {
  const parts: string[] = [];

  for (const entry of composition) {
    parts.push(`<!-- skill: ${entry.id} -->\n${entry.content.trim()}`);
    for (const ref of entry.includedReferences) {
      parts.push(`<!-- reference: ${ref.id} -->\n${ref.content.trim()}`);
    }
  }

  return parts.length > 0 ? `${parts.join("\n\n")}\n` : "";
}
