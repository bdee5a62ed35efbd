/**
 * Skill engine — Registry → Matcher → Resolver → Composer.
 *
 * Loading is the only asynchronous step. A query captures the active
 * snapshot once and runs to completion against it, so a concurrent refresh
 * never produces a result mixing two generations.
 */

import { Query, type QueryInput } from "../schemas/bundle.js";
import { EngineSettings, type EngineSettingsInput } from "../schemas/config.js";
import type { BundleSource } from "../sources/source.js";
import { BundleRegistry, type RegistrySnapshot } from "../registry/registry.js";
import { RegistryError } from "../registry/errors.js";
import { Matcher, type RankedBundle } from "../matching/matcher.js";
import { resolveActivations, type Activation } from "../resolver/resolver.js";
import { compose, type Composition } from "../compose/composer.js";
import type { EventLogger, SkillEvent, SkillEventType } from "../events/logger.js";

export interface SkillEngineOptions {
  /** Where bundle definitions are read from. */
  source: BundleSource;
  /** Matcher/resolver/composer settings (defaults applied). */
  settings?: EngineSettingsInput;
  /** Receives registry.loaded / registry.rejected events. */
  eventLogger?: EventLogger;
  /** Actor recorded on events (default "skill-engine"). */
  actor?: string;
}

/** Outcome of a load or refresh. */
export type LoadOutcome =
  | { ok: true; snapshot: RegistrySnapshot }
  | { ok: false; error: RegistryError };

/** Everything the engine decided for one query. */
export interface QueryExplanation {
  /** Snapshot generation the query ran against. */
  version: number;
  ranking: RankedBundle[];
  activations: Activation[];
  /** No bundle reached the relevance threshold. */
  lowConfidence: boolean;
  /** Fallback bundles were used because of low confidence. */
  usedFallback: boolean;
  composition: Composition;
}

export class SkillEngine {
  readonly settings: EngineSettings;
  readonly registry: BundleRegistry;
  private readonly matcher: Matcher;
  private readonly eventLogger: EventLogger | undefined;
  private readonly actor: string;

  constructor(options: SkillEngineOptions) {
    this.settings = EngineSettings.parse(options.settings ?? {});
    this.registry = new BundleRegistry(options.source, {
      required: this.settings.fallbackBundles,
    });
    this.matcher = new Matcher(this.settings.matcher);
    this.eventLogger = options.eventLogger;
    this.actor = options.actor ?? "skill-engine";
  }

  /** Load the source (same as refresh; named for the first call). */
  load(): Promise<LoadOutcome> {
    return this.refresh();
  }

  /**
   * Re-read the source and swap in a new snapshot.
   *
   * Structural problems come back as `{ ok: false }` with the previous
   * snapshot still active; anything else propagates. Event logging is
   * non-fatal: the outcome reflects the load alone.
   */
  async refresh(): Promise<LoadOutcome> {
    let snapshot: RegistrySnapshot;
    try {
      snapshot = await this.registry.refresh();
    } catch (err) {
      if (!(err instanceof RegistryError)) throw err;
      const error = err;
      await this.recordEvent("registry.rejected", (logger) =>
        logger.logRegistryRejected(this.actor, {
          message: error.message,
          issues: error.issues.map((i) => ({ rule: i.rule, message: i.message })),
        }),
      );
      return { ok: false, error };
    }

    await this.recordEvent("registry.loaded", (logger) =>
      logger.logRegistryLoaded(this.actor, {
        version: snapshot.version,
        bundles: snapshot.size,
        documents: snapshot.documentCount,
        sourceType: snapshot.sourceType,
      }),
    );
    return { ok: true, snapshot };
  }

  /**
   * Compose guidance for a query.
   *
   * @throws NotFoundError if a hint names an unknown bundle
   */
  query(input: QueryInput): Composition {
    return this.explain(input).composition;
  }

  /**
   * Run a query and return every intermediate decision.
   *
   * @throws NotFoundError if a hint names an unknown bundle
   */
  explain(input: QueryInput): QueryExplanation {
    const snapshot = this.registry.snapshot();
    const query = Query.parse(input);

    const ranking = this.matcher.rank(query, snapshot.all());
    const resolution = resolveActivations(ranking, this.settings.resolver);

    let activations = resolution.activations;
    const usedFallback = resolution.lowConfidence && this.settings.fallbackBundles.length > 0;
    if (usedFallback) {
      activations = this.settings.fallbackBundles.map((bundleId) => ({
        bundleId,
        score: 0,
        suppressed: [],
        deferrals: [],
      }));
    }

    const composition = compose(activations, snapshot, this.settings.composer);

    return {
      version: snapshot.version,
      ranking,
      activations,
      lowConfidence: resolution.lowConfidence,
      usedFallback,
      composition,
    };
  }

  /** Log an event; a logging failure never changes the load outcome. */
  private async recordEvent(
    type: SkillEventType,
    write: (logger: EventLogger) => Promise<SkillEvent>,
  ): Promise<void> {
    if (!this.eventLogger) return;
    try {
      await write(this.eventLogger);
    } catch (logErr) {
      console.error(
        `Failed to log ${type}: ${logErr instanceof Error ? logErr.message : String(logErr)}`,
      );
    }
  }
}
