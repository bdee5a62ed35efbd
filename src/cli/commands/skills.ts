/**
 * Skill commands — list, validate, query, explain.
 */

import type { Command } from "commander";
import { renderComposition } from "../../compose/composer.js";
import { NotFoundError } from "../../registry/errors.js";
import type { LoadOutcome, SkillEngine } from "../../engine/engine.js";
import { createEngineFromOptions, type GlobalOptions } from "../engine-utils.js";

interface QueryOptions {
  hint?: string[];
  json: boolean;
  references: boolean;
}

/**
 * Register skill commands with the CLI program.
 */
export function registerSkillCommands(program: Command): void {
  // --- list ---
  program
    .command("list")
    .description("List every bundle in the registry")
    .option("--json", "Output as JSON", false)
    .action(async (opts: { json: boolean }) => {
      const engine = await loadEngine(program);
      if (!engine) return;

      const bundles = [...engine.registry.all()];

      if (opts.json) {
        console.log(
          JSON.stringify(
            bundles.map((b) => ({
              id: b.id,
              triggers: b.triggers,
              description: b.description,
              references: b.references,
              defersTo: b.defersTo,
              subtopics: b.subtopics,
            })),
            null,
            2,
          ),
        );
        return;
      }

      if (bundles.length === 0) {
        console.log("No bundles found.");
        return;
      }

      console.log(`\nBundles (${bundles.length}):\n`);
      for (const b of bundles) {
        const triggers = b.triggers.length > 0 ? b.triggers.join(", ") : "(description only)";
        console.log(`  ${b.id} -- ${triggers}`);
        if (b.defersTo.length > 0) {
          console.log(`    defers to: ${b.defersTo.join(", ")}`);
        }
        if (b.subtopics.length > 0) {
          console.log(`    subtopics: ${b.subtopics.join(", ")}`);
        }
      }
      console.log("");
    });

  // --- validate ---
  program
    .command("validate")
    .description("Load the bundle source and report structural problems")
    .action(async () => {
      const engine = await createEngine(program, {});
      if (!engine) return;

      const outcome = await engine.load();
      if (outcome.ok) {
        console.log(
          `✅ ${outcome.snapshot.size} bundles, ${outcome.snapshot.documentCount} sub-documents`,
        );
        return;
      }

      reportLoadFailure(outcome);
    });

  // --- query ---
  program
    .command("query <text...>")
    .description("Compose guidance for a task description")
    .option("--hint <ids...>", "Bundle ids to include regardless of text")
    .option("--json", "Output the composition as JSON", false)
    .option("--no-references", "Do not expand referenced sub-documents")
    .action(async (words: string[], opts: QueryOptions, command: Command) => {
      // Only an explicit --no-references overrides the config
      const expandReferences =
        command.getOptionValueSource("references") === "cli" ? opts.references : undefined;
      const engine = await loadEngine(program, { expandReferences });
      if (!engine) return;

      try {
        const composition = engine.query({ text: words.join(" "), hints: opts.hint ?? [] });

        if (opts.json) {
          console.log(JSON.stringify(composition, null, 2));
        } else if (composition.length === 0) {
          console.log("No guidance matched.");
        } else {
          process.stdout.write(renderComposition(composition));
        }
      } catch (error) {
        reportQueryError(error);
      }
    });

  // --- explain ---
  program
    .command("explain <text...>")
    .description("Show scores, activations and suppressed subtopics for a query")
    .option("--hint <ids...>", "Bundle ids to include regardless of text")
    .action(async (words: string[], opts: { hint?: string[] }) => {
      const engine = await loadEngine(program);
      if (!engine) return;

      try {
        const result = engine.explain({ text: words.join(" "), hints: opts.hint ?? [] });

        console.log(`\nRanking (snapshot v${result.version}):\n`);
        for (const r of result.ranking) {
          const evidence = [...r.breakdown.matchedTriggers, ...r.breakdown.matchedKeywords].join(", ");
          console.log(`  ${r.score.toFixed(3)}  ${r.bundle.id} [${r.breakdown.source}]${evidence ? ` ${evidence}` : ""}`);
        }

        console.log("\nActivations:\n");
        if (result.activations.length === 0) {
          console.log("  (none -- low confidence)");
        }
        for (const a of result.activations) {
          const deferrals = a.deferrals.map((d) => `${d.subtopic} -> ${d.to}`).join(", ");
          console.log(`  ${a.bundleId}${deferrals ? `  (defers ${deferrals})` : ""}`);
        }
        if (result.usedFallback) {
          console.log("\n  Fallback bundles used.");
        }
        console.log("");
      } catch (error) {
        reportQueryError(error);
      }
    });
}

async function createEngine(
  program: Command,
  overrides: { expandReferences?: boolean },
): Promise<SkillEngine | undefined> {
  try {
    const { engine } = await createEngineFromOptions(program.opts<GlobalOptions>(), overrides);
    return engine;
  } catch (error) {
    console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
    return undefined;
  }
}

/** Create and load an engine; reports and returns undefined on failure. */
async function loadEngine(
  program: Command,
  overrides: { expandReferences?: boolean } = {},
): Promise<SkillEngine | undefined> {
  const engine = await createEngine(program, overrides);
  if (!engine) return undefined;

  const outcome = await engine.load();
  if (!outcome.ok) {
    reportLoadFailure(outcome);
    return undefined;
  }
  return engine;
}

function reportLoadFailure(outcome: Extract<LoadOutcome, { ok: false }>): void {
  console.error(`❌ Registry load failed (${outcome.error.issues.length} issues):`);
  for (const issue of outcome.error.issues) {
    console.error(`  • [${issue.rule}] ${issue.message}`);
  }
  process.exitCode = 1;
}

function reportQueryError(error: unknown): void {
  if (error instanceof NotFoundError) {
    console.error(`❌ ${error.message}`);
    process.exitCode = 1;
    return;
  }
  throw error;
}
