/**
 * Engine construction for CLI commands.
 */

import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { DEFAULT_CONFIG_FILE, loadEngineConfig } from "../config/loader.js";
import { EngineConfig } from "../schemas/config.js";
import { DirectorySource } from "../sources/directory.js";
import { EventLogger } from "../events/logger.js";
import { SkillEngine } from "../engine/engine.js";

/** Options every command accepts. */
export interface GlobalOptions {
  /** Path to skills.config.yaml. */
  config?: string;
  /** Bundle directory; overrides the config's sourceDir. */
  dir?: string;
}

export interface EngineContext {
  engine: SkillEngine;
  config: EngineConfig;
  /** Config file used, if any. */
  configPath?: string;
}

/**
 * Build an engine from CLI options.
 *
 * Uses `--config` when given, else ./skills.config.yaml when present, else
 * defaults. `--dir` always wins over the config's sourceDir.
 *
 * @throws Error if the config file is invalid
 */
export async function createEngineFromOptions(
  opts: GlobalOptions,
  overrides: { expandReferences?: boolean } = {},
): Promise<EngineContext> {
  const candidate = opts.config ?? resolve(process.cwd(), DEFAULT_CONFIG_FILE);
  const configPath = opts.config !== undefined || existsSync(candidate) ? candidate : undefined;

  let config: EngineConfig;
  if (configPath) {
    const result = await loadEngineConfig(configPath);
    if (!result.config) {
      const details = (result.errors ?? []).map((e) => `${e.path || "(root)"}: ${e.message}`).join("; ");
      throw new Error(`Invalid config ${configPath}: ${details}`);
    }
    config = result.config;
  } else {
    config = EngineConfig.parse({ schemaVersion: 1 });
    config.sourceDir = resolve(process.cwd(), config.sourceDir);
  }

  if (opts.dir) {
    config = { ...config, sourceDir: resolve(opts.dir) };
  }

  if (overrides.expandReferences !== undefined) {
    config = { ...config, composer: { ...config.composer, expandReferences: overrides.expandReferences } };
  }

  const engine = new SkillEngine({
    source: new DirectorySource(config.sourceDir),
    settings: config,
    eventLogger: config.eventLog.enabled ? new EventLogger(config.eventLog.dir) : undefined,
    actor: "cli",
  });

  return { engine, config, configPath };
}
