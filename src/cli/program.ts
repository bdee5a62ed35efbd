/**
 * CLI program definition.
 */

import { Command } from "commander";
import { registerSkillCommands } from "./commands/skills.js";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("skills")
    .description("Select and compose guidance bundles for a task")
    .version("0.1.0")
    .option("--config <path>", "Path to skills.config.yaml")
    .option("--dir <path>", "Bundle directory (overrides the config's sourceDir)");

  registerSkillCommands(program);
  return program;
}
