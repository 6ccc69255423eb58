#!/usr/bin/env node
import { Command, Option } from "commander";
import { TextSourceInput, resolveSource } from "./adapters";
import { ConfigOptions, DEFAULT_STORE_DIR, parsePositiveInt, resolveConfig } from "./config";
import { describeError } from "./errors";
import { ingest } from "./ingest";
import { MIN_BLOCK_LENGTH, SkipReason } from "./pipeline";
import { renderRecipe, renderRecipeList, loadStoredRecipe } from "./render";
import { JsonFileRecordStore } from "./store";

type IngestCommandOptions = ConfigOptions & {
  text?: string;
};

const skipReasonLabels: Record<SkipReason, string> = {
  "too-short": `block shorter than ${MIN_BLOCK_LENGTH} characters`,
  "no-ingredients-or-instructions": "empty ingredients/instructions",
};

export async function ingestCommand(
  source: string | undefined,
  options: IngestCommandOptions = {},
): Promise<void> {
  if (source !== undefined && options.text !== undefined) {
    throw new Error("Provide either a source path/URL or --text, but not both.");
  }
  const config = resolveConfig(options);
  let input: TextSourceInput;
  if (options.text !== undefined) {
    input = { kind: "text", text: options.text };
  } else if (source !== undefined) {
    input = await resolveSource(source);
  } else {
    throw new Error("Provide a source path/URL or --text.");
  }

  const report = await ingest(input, {
    store: new JsonFileRecordStore(config.storeDir),
    fetchTimeoutMs: config.fetchTimeoutMs,
  });

  if (report.stored.length === 0) {
    const skipReasons = new Map<string, number>();
    for (const block of report.skipped) {
      const label = skipReasonLabels[block.reason];
      skipReasons.set(label, (skipReasons.get(label) ?? 0) + 1);
    }
    if (report.failures.length > 0) {
      skipReasons.set("store failure", report.failures.length);
    }
    const sortedReasons = [...skipReasons.entries()].sort((a, b) => b[1] - a[1]);
    console.log("Skip summary:");
    if (sortedReasons.length === 0) {
      console.log("- No skip reasons recorded.");
    } else {
      for (const [reason, count] of sortedReasons) {
        console.log(`- ${reason}: ${count}`);
      }
    }
    process.exitCode = 1;
  }
}

export async function listCommand(options: ConfigOptions = {}): Promise<void> {
  const config = resolveConfig(options);
  const store = new JsonFileRecordStore(config.storeDir);
  console.log(renderRecipeList(await store.listRecipes()));
}

export async function showCommand(id: string, options: ConfigOptions = {}): Promise<void> {
  const config = resolveConfig(options);
  const recipeId = parsePositiveInt(id);
  const recipe = await loadStoredRecipe(new JsonFileRecordStore(config.storeDir), recipeId);
  if (!recipe) {
    throw new Error(`No recipe with id ${recipeId} in ${config.storeDir}`);
  }
  console.log(renderRecipe(recipe));
}

function storeOption(): Option {
  return new Option("--store <dir>", "Record store directory")
    .env("RECIPE_INGEST_STORE")
    .default(DEFAULT_STORE_DIR);
}

export function buildProgram(): Command {
  const program = new Command();
  program.name("recipe-ingest").description("Extract recipes from text, files and web pages");

  program
    .command("ingest")
    .description("Segment a source into recipes and store them")
    .argument("[source]", "Path to a .txt, .md, .docx or .pdf file, or an http(s) URL")
    .option("--text <text>", "Literal recipe text to ingest instead of a source")
    .addOption(storeOption())
    .addOption(
      new Option("--timeout <ms>", "Timeout for fetching URLs")
        .env("RECIPE_INGEST_FETCH_TIMEOUT")
        .argParser(parsePositiveInt),
    )
    .action(async (source: string | undefined, options: IngestCommandOptions) => {
      await ingestCommand(source, options);
    });

  program
    .command("list")
    .description("List stored recipes")
    .addOption(storeOption())
    .action(async (options: ConfigOptions) => {
      await listCommand(options);
    });

  program
    .command("show")
    .description("Print one stored recipe")
    .argument("<id>", "Recipe id as printed by list")
    .addOption(storeOption())
    .action(async (id: string, options: ConfigOptions) => {
      await showCommand(id, options);
    });

  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(`Error: ${describeError(error)}`);
      process.exitCode = 1;
    });
}
