/**
 * Bundle Registry — loads, validates and serves guidance bundles.
 *
 * The registry holds one immutable snapshot at a time. A load builds a
 * complete new snapshot off to the side and swaps it in with a single
 * assignment; readers that captured the previous snapshot keep using it.
 * Loads are serialized, so a refresh is exclusive with other loads.
 */

import type { SubtopicTable } from "../schemas/bundle.js";
import type { BundleSource, SourceSnapshot } from "../sources/source.js";
import { buildBundleSet, type Bundle, type BuildOptions } from "./build.js";
import { NotFoundError, RegistryError } from "./errors.js";

/** Read access the matcher, resolver and composer need. */
export interface BundleLookup {
  get(id: string): Bundle;
  has(id: string): boolean;
  all(): Iterable<Bundle>;
  document(id: string): string;
}

/** One validated, immutable generation of the bundle set. */
export class RegistrySnapshot implements BundleLookup {
  /** Monotonic generation number (1 for the first successful load). */
  readonly version: number;
  /** ISO timestamp of the load. */
  readonly loadedAt: string;
  readonly sourceType: string;
  readonly subtopics: Readonly<SubtopicTable>;
  private readonly ordered: readonly Bundle[];
  private readonly byId: ReadonlyMap<string, Bundle>;
  private readonly documents: ReadonlyMap<string, string>;

  constructor(params: {
    version: number;
    sourceType: string;
    bundles: readonly Bundle[];
    documents: ReadonlyMap<string, string>;
    subtopics: SubtopicTable;
  }) {
    this.version = params.version;
    this.loadedAt = new Date().toISOString();
    this.sourceType = params.sourceType;
    this.ordered = Object.freeze([...params.bundles]);
    this.byId = new Map(params.bundles.map((b) => [b.id, b]));
    this.documents = new Map(params.documents);
    this.subtopics = Object.freeze(params.subtopics);
    Object.freeze(this);
  }

  /** Number of bundles. */
  get size(): number {
    return this.ordered.length;
  }

  /** Number of sub-documents. */
  get documentCount(): number {
    return this.documents.size;
  }

  /**
   * Get a bundle by id.
   *
   * @throws NotFoundError if the id is not in this snapshot
   */
  get(id: string): Bundle {
    const bundle = this.byId.get(id);
    if (!bundle) {
      throw new NotFoundError("bundle", id);
    }
    return bundle;
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  /**
   * All bundles in ascending id order.
   *
   * The returned iterable is lazy and can be iterated any number of times.
   */
  all(): Iterable<Bundle> {
    const ordered = this.ordered;
    return {
      *[Symbol.iterator]() {
        yield* ordered;
      },
    };
  }

  /**
   * Sub-document content by id.
   *
   * @throws NotFoundError if the id is not in this snapshot
   */
  document(id: string): string {
    const content = this.documents.get(id);
    if (content === undefined) {
      throw new NotFoundError("document", id);
    }
    return content;
  }
}

/**
 * Registry of guidance bundles.
 *
 * `load`/`refresh` are the only mutating operations and only ever replace
 * the whole snapshot. A failed load leaves the previous snapshot active.
 */
export class BundleRegistry implements BundleLookup {
  private current: RegistrySnapshot | undefined;
  private generation = 0;
  private pending: Promise<unknown> = Promise.resolve();
  private readonly source: BundleSource | undefined;
  private readonly buildOptions: BuildOptions;

  /**
   * @param source - Default source used by `refresh()`
   * @param options - Checks applied to every load
   */
  constructor(source?: BundleSource, options: BuildOptions = {}) {
    this.source = source;
    this.buildOptions = options;
  }

  /** Whether a snapshot has been installed. */
  get loaded(): boolean {
    return this.current !== undefined;
  }

  /**
   * Read a source, validate it, and install the result.
   *
   * @throws RegistryError on any structural problem (previous snapshot kept)
   */
  load(source: BundleSource): Promise<RegistrySnapshot> {
    const run = this.pending.then(() => this.install(source));
    // Keep the queue alive past a failed load; the caller still sees the rejection
    this.pending = run.catch(() => undefined);
    return run;
  }

  /**
   * Re-read the source given at construction.
   *
   * @throws RegistryError on any structural problem (previous snapshot kept)
   */
  refresh(): Promise<RegistrySnapshot> {
    if (!this.source) {
      return Promise.reject(new Error("Registry has no source to refresh from"));
    }
    return this.load(this.source);
  }

  /**
   * The active snapshot. Capture it once per query so every step of the
   * query sees the same generation.
   *
   * @throws Error if nothing has been loaded yet
   */
  snapshot(): RegistrySnapshot {
    if (!this.current) {
      throw new Error("Registry has not been loaded");
    }
    return this.current;
  }

  get(id: string): Bundle {
    return this.snapshot().get(id);
  }

  has(id: string): boolean {
    return this.current?.has(id) ?? false;
  }

  all(): Iterable<Bundle> {
    return this.snapshot().all();
  }

  document(id: string): string {
    return this.snapshot().document(id);
  }

  private async install(source: BundleSource): Promise<RegistrySnapshot> {
    let read: SourceSnapshot;
    try {
      read = await source.read();
    } catch (err) {
      throw new RegistryError(
        [
          {
            rule: "source-unreadable",
            message: `Failed to read ${source.type} source: ${err instanceof Error ? err.message : String(err)}`,
          },
        ],
        { cause: err },
      );
    }

    const built = buildBundleSet(read, this.buildOptions);
    const snapshot = new RegistrySnapshot({
      version: this.generation + 1,
      sourceType: source.type,
      bundles: built.bundles,
      documents: built.documents,
      subtopics: built.subtopics,
    });

    this.generation = snapshot.version;
    this.current = snapshot;
    return snapshot;
  }
}
