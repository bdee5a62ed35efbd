import { describe, it, expect, beforeAll } from "vitest";
import { InlineSource } from "../../sources/inline.js";
import { BundleRegistry, type RegistrySnapshot } from "../../registry/registry.js";
import { NotFoundError } from "../../registry/errors.js";
import type { Activation } from "../../resolver/resolver.js";
import { compose, renderComposition } from "../composer.js";

const activation = (bundleId: string, suppressed: string[] = []): Activation => ({
  bundleId,
  score: 0.8,
  suppressed,
  deferrals: suppressed.map((subtopic) => ({ subtopic, to: "a11y" })),
});

describe("compose", () => {
  let snapshot: RegistrySnapshot;

  beforeAll(async () => {
    const registry = new BundleRegistry();
    snapshot = await registry.load(
      new InlineSource({
        bundles: [
          {
            id: "a11y",
            content: "# A11y\n\n## Color Contrast\n\nUse 4.5:1.",
            references: ["shared/checklist.md"],
          },
          {
            id: "css-styling",
            content: "# CSS\n\n## Layout\n\nUse grid.\n\n## Color Contrast\n\nUse tokens.",
            references: ["css-styling/references/patterns.md", "shared/checklist.md"],
          },
        ],
        documents: {
          "shared/checklist.md": "Checklist\n",
          "css-styling/references/patterns.md": "Patterns",
        },
        subtopics: {
          a11y: { contrast: ["Color Contrast"] },
          "css-styling": { contrast: ["Color Contrast"] },
        },
      }),
    );
  });

  it("removes suppressed sections from the deferring bundle only", () => {
    const composition = compose([activation("a11y"), activation("css-styling", ["contrast"])], snapshot);

    expect(composition.map((e) => [e.id, e.content, e.suppressed])).toEqual([
      ["a11y", "# A11y\n\n## Color Contrast\n\nUse 4.5:1.", []],
      ["css-styling", "# CSS\n\n## Layout\n\nUse grid.\n", ["contrast"]],
    ]);
  });

  it("includes each sub-document once, with the first bundle that references it", () => {
    const composition = compose([activation("a11y"), activation("css-styling")], snapshot);

    expect(composition.map((e) => [e.id, e.includedReferences.map((r) => r.id)])).toEqual([
      ["a11y", ["shared/checklist.md"]],
      ["css-styling", ["css-styling/references/patterns.md"]],
    ]);
  });

  it("skips reference expansion when disabled", () => {
    const composition = compose([activation("a11y")], snapshot, { expandReferences: false });
    expect(composition[0]?.includedReferences).toEqual([]);
  });

  it("ignores a repeated activation", () => {
    const composition = compose([activation("a11y"), activation("a11y", ["contrast"])], snapshot);
    expect(composition.map((e) => e.id)).toEqual(["a11y"]);
  });

  it("is idempotent", () => {
    const activations = [activation("css-styling", ["contrast"]), activation("a11y")];
    expect(compose(activations, snapshot)).toEqual(compose(activations, snapshot));
  });

  it("returns an empty composition for no activations", () => {
    expect(compose([], snapshot)).toEqual([]);
  });

  it("throws NotFoundError for an activation of an unknown bundle", () => {
    expect(() => compose([activation("ghost")], snapshot)).toThrow(NotFoundError);
  });
});

describe("renderComposition", () => {
  it("marks each bundle and reference", () => {
    const output = renderComposition([
      {
        id: "a11y",
        content: "# A11y\n",
        includedReferences: [{ id: "shared/checklist.md", content: "Checklist\n" }],
        suppressed: [],
      },
      { id: "testing", content: "# Testing", includedReferences: [], suppressed: [] },
    ]);

    expect(output).toBe(
      "<!-- skill: a11y -->\n# A11y\n\n" +
        "<!-- reference: shared/checklist.md -->\nChecklist\n\n" +
        "<!-- skill: testing -->\n# Testing\n",
    );
  });

  it("renders nothing for an empty composition", () => {
    expect(renderComposition([])).toBe("");
  });
});
