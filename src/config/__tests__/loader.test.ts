import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { loadEngineConfig, validateEngineConfig } from "../loader.js";

describe("validateEngineConfig", () => {
  it("accepts a minimal config and fills defaults", () => {
    const result = validateEngineConfig({ schemaVersion: 1 });

    expect(result.success).toBe(true);
    expect(result.config?.sourceDir).toBe("skills");
    expect(result.config?.matcher).toEqual({
      triggerBaseline: 0.8,
      triggerBonus: 0.05,
      descriptionCeiling: 0.45,
    });
  });

  it("reports each problem with its path", () => {
    const result = validateEngineConfig({
      schemaVersion: 1,
      matcher: { descriptionCeiling: 0.6 },
      fallbackBundles: ["Not A Slug"],
    });

    expect(result.success).toBe(false);
    expect(result.errors?.map((e) => e.path)).toEqual(["matcher.descriptionCeiling", "fallbackBundles.0"]);
  });
});

describe("loadEngineConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "skills-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("resolves relative directories against the config file", async () => {
    const path = join(dir, "skills.config.yaml");
    await writeFile(
      path,
      "schemaVersion: 1\nsourceDir: ./library\neventLog:\n  enabled: true\n  dir: logs\nresolver:\n  maxBundles: 3\n",
    );

    const result = await loadEngineConfig(path);

    expect(result.success).toBe(true);
    expect(result.config?.sourceDir).toBe(join(dir, "library"));
    expect(result.config?.eventLog).toEqual({ enabled: true, dir: join(dir, "logs") });
    expect(result.config?.resolver).toEqual({ minScore: 0.05, maxBundles: 3 });
  });

  it("keeps absolute directories as given", async () => {
    const path = join(dir, "skills.config.yaml");
    const library = join(dir, "elsewhere");
    await writeFile(path, `schemaVersion: 1\nsourceDir: ${library}\n`);

    const result = await loadEngineConfig(path);

    expect(result.config?.sourceDir).toBe(library);
  });

  it("returns validation errors without throwing", async () => {
    const path = join(dir, "skills.config.yaml");
    await writeFile(path, "schemaVersion: 2\n");

    const result = await loadEngineConfig(path);

    expect(result.success).toBe(false);
    expect(result.errors?.[0]?.path).toBe("schemaVersion");
  });

  it("throws for a missing file", async () => {
    await expect(loadEngineConfig(join(dir, "missing.yaml"))).rejects.toThrow("Failed to read config");
  });

  it("throws for invalid YAML", async () => {
    const path = join(dir, "skills.config.yaml");
    await writeFile(path, "schemaVersion: [1\n");

    await expect(loadEngineConfig(path)).rejects.toThrow("Invalid YAML in config");
  });
});
