import { describe, it, expect } from "vitest";
import { buildBundleSet, type Bundle } from "../../registry/build.js";
import type { RankedBundle } from "../../matching/matcher.js";
import { resolveActivations } from "../resolver.js";

const built = buildBundleSet({
  entries: [
    {
      origin: "inline:a11y",
      definition: {
        id: "a11y",
        defersTo: ["testing"],
        content: "## Color Contrast\nRatios\n## Testing Tools\nAxe",
      },
    },
    {
      origin: "inline:css-styling",
      definition: { id: "css-styling", defersTo: ["a11y"], content: "## Layout\nGrid\n## Color Contrast\nTokens" },
    },
    {
      origin: "inline:testing",
      definition: { id: "testing", content: "## Accessibility Queries\ngetByRole" },
    },
  ],
  documents: new Map(),
  subtopics: {
    a11y: { contrast: ["Color Contrast"], tooling: ["Testing Tools"] },
    "css-styling": { contrast: ["Color Contrast"] },
    testing: { tooling: ["Accessibility Queries"] },
  },
});

const bundle = (id: string): Bundle => {
  const found = built.bundles.find((b) => b.id === id);
  if (!found) throw new Error(`no fixture ${id}`);
  return found;
};

const ranked = (id: string, score: number): RankedBundle => ({
  bundle: bundle(id),
  score,
  breakdown: { score, source: score > 0 ? "trigger" : "none", matchedTriggers: [], matchedKeywords: [] },
});

describe("resolveActivations", () => {
  it("keeps bundles at or above the threshold, highest score first", () => {
    const { activations, lowConfidence } = resolveActivations([
      ranked("testing", 0.04),
      ranked("css-styling", 0.05),
      ranked("a11y", 0.8),
    ]);

    expect(activations.map((a) => [a.bundleId, a.score])).toEqual([
      ["a11y", 0.8],
      ["css-styling", 0.05],
    ]);
    expect(lowConfidence).toBe(false);
  });

  it("suppresses only the subtopics shared with an active deference target", () => {
    const { activations } = resolveActivations([
      ranked("css-styling", 0.8),
      ranked("a11y", 0.8),
    ]);

    expect(activations).toEqual([
      { bundleId: "a11y", score: 0.8, suppressed: [], deferrals: [] },
      {
        bundleId: "css-styling",
        score: 0.8,
        suppressed: ["contrast"],
        deferrals: [{ subtopic: "contrast", to: "a11y" }],
      },
    ]);
  });

  it("applies deference along each edge independently", () => {
    const { activations } = resolveActivations([
      ranked("a11y", 0.8),
      ranked("css-styling", 0.8),
      ranked("testing", 0.85),
    ]);

    expect(activations.map((a) => [a.bundleId, a.suppressed])).toEqual([
      ["testing", []],
      ["a11y", ["tooling"]],
      ["css-styling", ["contrast"]],
    ]);
  });

  it("does not defer to a bundle that is not active", () => {
    const { activations } = resolveActivations([ranked("css-styling", 0.8), ranked("a11y", 0)]);

    expect(activations).toEqual([
      { bundleId: "css-styling", score: 0.8, suppressed: [], deferrals: [] },
    ]);
  });

  it("caps the activation list at maxBundles before resolving deference", () => {
    const { activations } = resolveActivations(
      [ranked("a11y", 0.7), ranked("css-styling", 0.9)],
      { maxBundles: 1 },
    );

    expect(activations).toEqual([
      { bundleId: "css-styling", score: 0.9, suppressed: [], deferrals: [] },
    ]);
  });

  it("never activates a zero score, even with a zero threshold", () => {
    const result = resolveActivations([ranked("a11y", 0), ranked("testing", 0)], { minScore: 0 });

    expect(result).toEqual({ activations: [], lowConfidence: true });
  });
});
