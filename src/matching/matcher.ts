/**
 * Matcher — scores bundles against a query.
 *
 * Scoring tiers (highest wins):
 * 1. Explicit hint: 1.0
 * 2. Trigger hit: baseline + bonus per extra distinct trigger, capped at 1.0
 * 3. Description overlap: share of description keywords present in the
 *    query, scaled into [0, descriptionCeiling] with the ceiling below 0.5
 *
 * No I/O, no randomness; the same query and bundle set always rank the same.
 */

import { MatcherConfig } from "../schemas/config.js";
import type { Query } from "../schemas/bundle.js";
import { compareIds, type Bundle } from "../registry/build.js";
import { NotFoundError } from "../registry/errors.js";
import { containsPhrase, extractKeywords, tokenize } from "./tokenize.js";

/** What produced a score. */
export type ScoreSource = "hint" | "trigger" | "description" | "none";

/** Score with the evidence behind it. */
export interface ScoreBreakdown {
  score: number;
  source: ScoreSource;
  /** Triggers found in the query text. */
  matchedTriggers: string[];
  /** Description keywords found in the query text (description tier only). */
  matchedKeywords: string[];
}

/** A ranked bundle. */
export interface RankedBundle {
  bundle: Bundle;
  score: number;
  breakdown: ScoreBreakdown;
}

/** Query with its text tokenized once. */
interface PreparedQuery {
  tokens: string[];
  tokenSet: Set<string>;
  hints: Set<string>;
}

export class Matcher {
  readonly weights: MatcherConfig;

  /**
   * @param weights - Partial weights; missing values take the defaults
   */
  constructor(weights: Partial<MatcherConfig> = {}) {
    this.weights = MatcherConfig.parse(weights);
  }

  /** Relevance of one bundle, in [0, 1]. */
  score(query: Query, bundle: Bundle): number {
    return this.evaluate(prepare(query), bundle).score;
  }

  /** Relevance of one bundle, with the matched evidence. */
  explain(query: Query, bundle: Bundle): ScoreBreakdown {
    return this.evaluate(prepare(query), bundle);
  }

  /**
   * Score every bundle and order by descending score. On equal scores a
   * hinted bundle comes first, then ascending id.
   *
   * @throws NotFoundError if a hint names a bundle not in `bundles`
   */
  rank(query: Query, bundles: Iterable<Bundle>): RankedBundle[] {
    const prepared = prepare(query);
    const ranked: RankedBundle[] = [];
    const seen = new Set<string>();

    for (const bundle of bundles) {
      seen.add(bundle.id);
      const breakdown = this.evaluate(prepared, bundle);
      ranked.push({ bundle, score: breakdown.score, breakdown });
    }

    for (const hint of prepared.hints) {
      if (!seen.has(hint)) {
        throw new NotFoundError("bundle", hint);
      }
    }

    return ranked.sort(
      (a, b) =>
        b.score - a.score ||
        hintRank(a) - hintRank(b) ||
        compareIds(a.bundle.id, b.bundle.id),
    );
  }

  private evaluate(query: PreparedQuery, bundle: Bundle): ScoreBreakdown {
    const matchedTriggers = bundle.triggers.filter((trigger) =>
      containsPhrase(query.tokens, tokenize(trigger)),
    );

    if (query.hints.has(bundle.id)) {
      return { score: 1, source: "hint", matchedTriggers, matchedKeywords: [] };
    }

    if (matchedTriggers.length > 0) {
      const { triggerBaseline, triggerBonus } = this.weights;
      const score = Math.min(1, triggerBaseline + triggerBonus * (matchedTriggers.length - 1));
      return { score, source: "trigger", matchedTriggers, matchedKeywords: [] };
    }

    const keywords = extractKeywords(bundle.description);
    const matchedKeywords = keywords.filter((k) => query.tokenSet.has(k));
    if (matchedKeywords.length === 0) {
      return { score: 0, source: "none", matchedTriggers, matchedKeywords };
    }

    const score = (matchedKeywords.length / keywords.length) * this.weights.descriptionCeiling;
    return { score, source: "description", matchedTriggers, matchedKeywords };
  }
}

/** 0 for hinted bundles, 1 otherwise. */
function hintRank(entry: RankedBundle): number {
  return entry.breakdown.source === "hint" ? 0 : 1;
}

function prepare(query: Query): PreparedQuery {
  const tokens = tokenize(query.text);
  return {
    tokens,
    tokenSet: new Set(tokens),
    hints: new Set(query.hints.map((h) => h.trim()).filter((h) => h.length > 0)),
  };
}
