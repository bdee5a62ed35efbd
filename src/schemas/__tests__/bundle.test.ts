import { describe, it, expect } from "vitest";
import { BundleDefinition, BundleFrontmatter, Query, SubtopicTable } from "../bundle.js";

describe("BundleDefinition", () => {
  it("applies defaults for optional fields", () => {
    const result = BundleDefinition.parse({ id: "css-styling" });

    expect(result).toEqual({
      id: "css-styling",
      triggers: [],
      description: "",
      references: [],
      defersTo: [],
      content: "",
    });
  });

  it("rejects ids that are not lowercase slugs", () => {
    expect(() => BundleDefinition.parse({ id: "CSS Styling" })).toThrow(/lowercase slug/);
  });

  it("rejects empty reference ids", () => {
    const result = BundleDefinition.safeParse({ id: "a11y", references: [""] });
    expect(result.success).toBe(false);
  });
});

describe("BundleFrontmatter", () => {
  it("promotes scalar trigger and reference values to lists", () => {
    const result = BundleFrontmatter.parse({ triggers: "vitest", references: "testing/references/mocks.md" });

    expect(result.triggers).toEqual(["vitest"]);
    expect(result.references).toEqual(["testing/references/mocks.md"]);
  });

  it("accepts every deference spelling", () => {
    const result = BundleFrontmatter.parse({
      defersTo: ["a11y"],
      "defers-to": "testing",
      defers_to: ["clean-code"],
    });

    expect(result.defersTo).toEqual(["a11y"]);
    expect(result["defers-to"]).toEqual(["testing"]);
    expect(result.defers_to).toEqual(["clean-code"]);
  });

  it("keeps unknown keys", () => {
    const result = BundleFrontmatter.parse({ name: "a11y", license: "MIT" });
    expect(result["license"]).toBe("MIT");
  });

  it("rejects a non-string trigger", () => {
    expect(BundleFrontmatter.safeParse({ triggers: [42] }).success).toBe(false);
  });
});

describe("SubtopicTable", () => {
  it("parses bundle → tag → headings", () => {
    const table = SubtopicTable.parse({ a11y: { contrast: ["Color Contrast"] } });
    expect(table["a11y"]?.["contrast"]).toEqual(["Color Contrast"]);
  });

  it("rejects headings that are not lists", () => {
    expect(SubtopicTable.safeParse({ a11y: { contrast: "Color Contrast" } }).success).toBe(false);
  });
});

describe("Query", () => {
  it("defaults text and hints", () => {
    expect(Query.parse({})).toEqual({ text: "", hints: [] });
  });
});
