import { describe, it, expect } from "vitest";
import { createProgram } from "../program.js";

describe("createProgram", () => {
  it("registers the skill commands and global options", () => {
    const program = createProgram();

    expect(program.name()).toBe("skills");
    expect(program.commands.map((c) => c.name())).toEqual(["list", "validate", "query", "explain"]);
    expect(program.options.map((o) => o.long)).toEqual(["--version", "--config", "--dir"]);
  });
});
