/**
 * Resolver — turns a ranking into an activation list.
 *
 * Bundles below the relevance threshold are dropped. Among the rest, a
 * bundle that defers to another active bundle loses only the subtopics the
 * two share; the bundle itself always stays active.
 *
 * The registry guarantees the deference graph is acyclic per subtopic, so
 * nothing here re-validates it.
 */

import { compareIds } from "../registry/build.js";
import type { RankedBundle } from "../matching/matcher.js";

/** A subtopic handed to another active bundle. */
export interface Deferral {
  subtopic: string;
  /** Bundle whose coverage of the subtopic wins. */
  to: string;
}

/** Per-bundle activation decision. */
export interface Activation {
  bundleId: string;
  score: number;
  /** Subtopic tags whose sections are dropped from this bundle. */
  suppressed: string[];
  deferrals: Deferral[];
}

export interface ResolveOptions {
  /** Minimum score to activate (default 0.05). */
  minScore?: number;
  /** Keep at most this many activations. */
  maxBundles?: number;
}

export interface Resolution {
  activations: Activation[];
  /** True when no bundle reached the threshold. */
  lowConfidence: boolean;
}

export const DEFAULT_MIN_SCORE = 0.05;

/**
 * Resolve a ranking into activations, highest score first.
 */
export function resolveActivations(
  ranked: readonly RankedBundle[],
  options: ResolveOptions = {},
): Resolution {
  const { minScore = DEFAULT_MIN_SCORE, maxBundles } = options;

  let kept = ranked
    .filter((r) => r.score > 0 && r.score >= minScore)
    .sort((a, b) => b.score - a.score || compareIds(a.bundle.id, b.bundle.id));

  if (maxBundles !== undefined) {
    kept = kept.slice(0, maxBundles);
  }

  const active = new Map(kept.map((r) => [r.bundle.id, r.bundle]));

  const activations = kept.map(({ bundle, score }): Activation => {
    const deferrals: Deferral[] = [];

    for (const targetId of bundle.defersTo) {
      const target = active.get(targetId);
      if (!target) continue;
      for (const subtopic of bundle.subtopics) {
        if (target.subtopics.includes(subtopic)) {
          deferrals.push({ subtopic, to: targetId });
        }
      }
    }

    deferrals.sort((a, b) => compareIds(a.subtopic, b.subtopic) || compareIds(a.to, b.to));
    const suppressed = [...new Set(deferrals.map((d) => d.subtopic))];

    return { bundleId: bundle.id, score, suppressed, deferrals };
  });

  return { activations, lowConfidence: activations.length === 0 };
}
