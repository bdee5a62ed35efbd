/**
 * Section slicing for bundle bodies.
 *
 * A body is cut at level-1 and level-2 ATX headings (outside fenced code).
 * Sections are contiguous line ranges, so joining them back with "\n"
 * reproduces the body exactly.
 */

export interface BundleSection {
  /** Heading text ("" for the preamble before the first heading). */
  heading: string;
  /** Heading depth (0 for the preamble). */
  level: number;
  /** Raw lines of the section, heading included. */
  text: string;
  /** Subtopic tags assigned from the subtopic table. */
  subtopics: readonly string[];
}

const HEADING_REGEX = /^(#{1,2})\s+(.+)$/;
const FENCE_REGEX = /^\s*(`{3,}|~{3,})/;

/** Split a body into untagged sections. */
export function splitSections(content: string): BundleSection[] {
  const lines = content.split("\n");
  const sections: BundleSection[] = [];
  let current: { heading: string; level: number; lines: string[] } | null = null;
  let fence: string | null = null;

  const flush = (): void => {
    if (current) {
      sections.push({
        heading: current.heading,
        level: current.level,
        text: current.lines.join("\n"),
        subtopics: [],
      });
    }
  };

  for (const line of lines) {
    const fenceMatch = FENCE_REGEX.exec(line);
    if (fenceMatch?.[1]) {
      const marker = fenceMatch[1];
      if (fence === null) {
        fence = marker;
      } else if (marker[0] === fence[0] && marker.length >= fence.length) {
        fence = null;
      }
    }

    const match = fence === null ? HEADING_REGEX.exec(line) : null;
    if (match?.[1] && match[2]) {
      flush();
      current = { heading: match[2].trim(), level: match[1].length, lines: [line] };
      continue;
    }

    if (!current) {
      current = { heading: "", level: 0, lines: [] };
    }
    current.lines.push(line);
  }

  flush();
  return sections;
}

/** Case- and whitespace-insensitive heading key. */
export function normalizeHeading(value: string): string {
  return value.trim().replace(/\s+/g, " ").toLowerCase();
}

/** Rejoin sections into a body. */
export function joinSections(sections: readonly BundleSection[]): string {
  return sections.map((section) => section.text).join("\n");
}
