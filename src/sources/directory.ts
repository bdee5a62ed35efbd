/**
 * Directory source — reads a tree of guidance documents.
 *
 * Layout:
 *   <root>/subtopics.yaml            optional subtopic table
 *   <root>/<bundle>/SKILL.md         one bundle per immediate subdirectory
 *   <root>/<bundle>/references/*.md  default references for that bundle
 *   <root>/**\/*.md                  every other Markdown file is a sub-document
 *
 * Sub-document ids are POSIX paths relative to the root.
 */

import { readFile, readdir } from "node:fs/promises";
import { join, normalize } from "node:path";
import { parse as parseYaml } from "yaml";
import { adaptSkillDocument } from "./frontmatter.js";
import type { BundleSource, SourceEntry, SourceSnapshot } from "./source.js";

export const SKILL_ENTRYPOINT = "SKILL.md";
export const SUBTOPICS_FILE = "subtopics.yaml";

export class DirectorySource implements BundleSource {
  readonly type = "directory";
  readonly rootDir: string;

  /**
   * @param rootDir - Directory containing bundle subdirectories
   */
  constructor(rootDir: string) {
    this.rootDir = normalize(rootDir);
  }

  async read(): Promise<SourceSnapshot> {
    let files: string[];
    try {
      files = await listMarkdownFiles(this.rootDir);
    } catch (err) {
      throw new Error(`Failed to read bundle directory: ${this.rootDir}`, { cause: err });
    }

    const entrypoints = files.filter((f) => isEntrypoint(f));
    const documentIds = files.filter((f) => !isEntrypoint(f));

    const documents = new Map<string, string>();
    for (const id of documentIds) {
      documents.set(id, await this.readText(id));
    }

    const entries: SourceEntry[] = [];
    for (const entrypoint of entrypoints) {
      const dirName = entrypoint.slice(0, entrypoint.indexOf("/"));
      const referencePrefix = `${dirName}/references/`;
      entries.push(
        adaptSkillDocument(await this.readText(entrypoint), {
          fallbackId: dirName,
          origin: entrypoint,
          defaultReferences: documentIds.filter((id) => id.startsWith(referencePrefix)),
        }),
      );
    }

    return { entries, documents, subtopics: await this.readSubtopics() };
  }

  private async readText(id: string): Promise<string> {
    try {
      return await readFile(join(this.rootDir, ...id.split("/")), "utf-8");
    } catch (err) {
      throw new Error(`Failed to read ${id}`, { cause: err });
    }
  }

  private async readSubtopics(): Promise<unknown> {
    let content: string;
    try {
      content = await readFile(join(this.rootDir, SUBTOPICS_FILE), "utf-8");
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === "ENOENT") {
        return {};
      }
      throw new Error(`Failed to read ${SUBTOPICS_FILE}`, { cause: err });
    }

    try {
      return (parseYaml(content) as unknown) ?? {};
    } catch (err) {
      throw new Error(`Invalid YAML in ${SUBTOPICS_FILE}`, { cause: err });
    }
  }
}

/** `<bundle>/SKILL.md`, exactly one level below the root. */
function isEntrypoint(id: string): boolean {
  const parts = id.split("/");
  return parts.length === 2 && parts[1] === SKILL_ENTRYPOINT;
}

/** All .md files below `root`, as sorted POSIX-relative paths. */
async function listMarkdownFiles(root: string, prefix = ""): Promise<string[]> {
  const entries = await readdir(prefix ? join(root, ...prefix.split("/")) : root, {
    withFileTypes: true,
  });
  const files: string[] = [];

  for (const entry of entries) {
    if (entry.name.startsWith(".")) continue;
    const rel = prefix ? `${prefix}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      files.push(...(await listMarkdownFiles(root, rel)));
    } else if (entry.isFile() && entry.name.endsWith(".md")) {
      files.push(rel);
    }
  }

  return files.sort();
}
