/**
 * Registry error taxonomy.
 */

/** Structural rule a bundle set can violate at load time. */
export type RegistryRule =
  | "source-unreadable"
  | "invalid-definition"
  | "duplicate-id"
  | "dangling-defers-to"
  | "self-deference"
  | "dangling-reference"
  | "invalid-subtopics"
  | "unknown-subtopic-bundle"
  | "unknown-subtopic-section"
  | "deference-cycle"
  | "missing-required-bundle";

/** Single structural problem found while building a snapshot. */
export interface RegistryIssue {
  rule: RegistryRule;
  message: string;
  /** Bundle the issue belongs to, when there is one. */
  bundleId?: string;
  /** The id (bundle, sub-document, heading) the issue is about. */
  target?: string;
  /** Where the offending definition came from. */
  origin?: string;
}

/**
 * Load or refresh failed. The message names the first issue; every issue
 * found is kept on `issues`.
 */
export class RegistryError extends Error {
  readonly issues: readonly RegistryIssue[];

  constructor(issues: readonly RegistryIssue[], options?: { cause?: unknown }) {
    const [first] = issues;
    const summary = first ? first.message : "Registry load failed";
    const extra = issues.length > 1 ? ` (+${issues.length - 1} more)` : "";
    super(`${summary}${extra}`, options);
    this.name = "RegistryError";
    this.issues = issues;
  }
}

/** Kind of thing a lookup failed to find. */
export type LookupKind = "bundle" | "document";

/** A lookup named an id the current snapshot does not contain. */
export class NotFoundError extends Error {
  readonly kind: LookupKind;
  readonly id: string;

  constructor(kind: LookupKind, id: string) {
    super(`Unknown ${kind}: ${id}`);
    this.name = "NotFoundError";
    this.kind = kind;
    this.id = id;
  }
}
