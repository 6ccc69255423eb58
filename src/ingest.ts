import { LoadOptions, TextSourceInput, loadSource } from "./adapters";
import { StoreWriteError } from "./errors";
import { SkipReason, SkippedBlock, parseRecipes } from "./pipeline";
import { RecordStore, RecipeSummary, persistRecipe } from "./store";

export type IngestLog = {
  info(message: string): void;
  warn(message: string): void;
};

export const consoleLog: IngestLog = {
  info: (message) => console.log(message),
  warn: (message) => console.error(`Warning: ${message}`),
};

export type IngestContext = {
  store: RecordStore;
  fetchTimeoutMs?: number;
  log?: IngestLog;
};

export type StoreFailure = {
  blockIndex: number;
  title: string;
  message: string;
};

export type IngestReport = {
  origin: string;
  blocksFound: number;
  stored: RecipeSummary[];
  skipped: SkippedBlock[];
  failures: StoreFailure[];
};

function countSkipped(skipped: SkippedBlock[], reason: SkipReason): number {
  return skipped.filter((block) => block.reason === reason).length;
}

export async function ingest(input: TextSourceInput, context: IngestContext): Promise<IngestReport> {
  const log = context.log ?? consoleLog;
  const loadOptions: LoadOptions = { fetchTimeoutMs: context.fetchTimeoutMs };
  const adapterOutput = await loadSource(input, loadOptions);
  const { blocksFound, recipes, skipped } = parseRecipes(adapterOutput.text);

  const stored: RecipeSummary[] = [];
  const failures: StoreFailure[] = [];

  for (const recipe of recipes) {
    try {
      const id = await persistRecipe(context.store, recipe);
      stored.push({ id, title: recipe.title });
    } catch (error) {
      if (!(error instanceof StoreWriteError)) {
        throw error;
      }
      log.warn(error.message);
      failures.push({ blockIndex: recipe.blockIndex, title: recipe.title, message: error.message });
    }
  }

  log.info(
    [
      `Blocks found: ${blocksFound}`,
      `Skipped too short: ${countSkipped(skipped, "too-short")}`,
      `Skipped empty ingredients/instructions: ${countSkipped(skipped, "no-ingredients-or-instructions")}`,
      `Store failures: ${failures.length}`,
      `Stored: ${stored.length}`,
    ].join("\n"),
  );
  log.info(`Ingested ${stored.length} recipe(s) from ${adapterOutput.meta.origin}.`);

  return {
    origin: adapterOutput.meta.origin,
    blocksFound,
    stored,
    skipped,
    failures,
  };
}
