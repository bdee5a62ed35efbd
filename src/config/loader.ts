/**
 * Config loader — reads and validates skills.config.yaml.
 */

import { readFile } from "node:fs/promises";
import { dirname, isAbsolute, resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import { EngineConfig } from "../schemas/config.js";

export const DEFAULT_CONFIG_FILE = "skills.config.yaml";

export interface ConfigLoadResult {
  success: boolean;
  config?: EngineConfig;
  errors?: Array<{ path: string; message: string }>;
}

/**
 * Validate a raw (already parsed) config object.
 */
export function validateEngineConfig(raw: unknown): ConfigLoadResult {
  const result = EngineConfig.safeParse(raw);

  if (result.success) {
    return { success: true, config: result.data };
  }

  return {
    success: false,
    errors: result.error.issues.map((i) => ({
      path: i.path.join("."),
      message: i.message,
    })),
  };
}

/**
 * Load and validate an engine config from a YAML file.
 *
 * Relative `sourceDir` and `eventLog.dir` are resolved against the
 * directory holding the config file.
 *
 * @throws Error if the file cannot be read or is not valid YAML
 */
export async function loadEngineConfig(path: string): Promise<ConfigLoadResult> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (err) {
    throw new Error(`Failed to read config: ${path}`, { cause: err });
  }

  let raw: unknown;
  try {
    raw = parseYaml(content) as unknown;
  } catch (err) {
    throw new Error(`Invalid YAML in config: ${path}`, { cause: err });
  }

  const result = validateEngineConfig(raw);
  if (!result.config) {
    return result;
  }

  const baseDir = dirname(resolve(path));
  return {
    success: true,
    config: {
      ...result.config,
      sourceDir: resolveFrom(baseDir, result.config.sourceDir),
      eventLog: {
        ...result.config.eventLog,
        dir: resolveFrom(baseDir, result.config.eventLog.dir),
      },
    },
  };
}

function resolveFrom(baseDir: string, target: string): string {
  return isAbsolute(target) ? target : resolve(baseDir, target);
}
