/**
 * Tests for the event logger: daily JSONL files and the event callback.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, readdir, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { EventLogger, type SkillEvent } from "../logger.js";

async function readEvents(eventsDir: string): Promise<SkillEvent[]> {
  const [file] = await readdir(eventsDir);
  if (!file) return [];
  const content = await readFile(join(eventsDir, file), "utf-8");
  return content
    .trim()
    .split("\n")
    .map((line): SkillEvent => JSON.parse(line));
}

describe("EventLogger", () => {
  let root: string;
  let eventsDir: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "skills-events-"));
    eventsDir = join(root, "events");
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("appends registry.loaded events to a file named for the day", async () => {
    const logger = new EventLogger(eventsDir);

    const event = await logger.logRegistryLoaded("cli", {
      version: 1,
      bundles: 4,
      documents: 3,
      sourceType: "directory",
    });

    const files = await readdir(eventsDir);
    expect(files).toEqual([`${event.timestamp.slice(0, 10)}.jsonl`]);

    const [stored] = await readEvents(eventsDir);
    expect(stored).toEqual(event);
    expect(stored?.type).toBe("registry.loaded");
    expect(stored?.payload).toEqual({ version: 1, bundles: 4, documents: 3, sourceType: "directory" });
  });

  it("appends one line per event with increasing ids", async () => {
    const logger = new EventLogger(eventsDir);

    await logger.logRegistryLoaded("cli", { version: 1, bundles: 1, documents: 0, sourceType: "inline" });
    await logger.logRegistryRejected("cli", {
      message: "Bundle 'a' defers to itself",
      issues: [{ rule: "self-deference", message: "Bundle 'a' defers to itself" }],
    });

    const events = await readEvents(eventsDir);
    expect(events.map((e) => [e.eventId, e.type])).toEqual([
      [1, "registry.loaded"],
      [2, "registry.rejected"],
    ]);
    expect(logger.lastEventId).toBe(2);
  });

  it("calls onEvent before persisting", async () => {
    const seen: string[] = [];
    const logger = new EventLogger(eventsDir, { onEvent: (e) => seen.push(e.type) });

    await logger.log("registry.loaded", "engine");

    expect(seen).toEqual(["registry.loaded"]);
  });

  it("writes nothing when persistence is off", async () => {
    const seen: SkillEvent[] = [];
    const logger = new EventLogger(eventsDir, { persist: false, onEvent: (e) => seen.push(e) });

    await logger.log("registry.loaded", "engine", { payload: { version: 3 } });

    expect(seen.map((e) => e.payload)).toEqual([{ version: 3 }]);
    await expect(readdir(eventsDir)).rejects.toThrow();
  });
});
