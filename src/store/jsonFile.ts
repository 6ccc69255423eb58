import { promises as fs } from "fs";
import path from "path";
import { StoreReadError } from "../errors";
import { InstructionStep, MacroEntry } from "../pipeline";
import { RecordStore, RecipeSummary, StoredRecipeRecord } from "./types";
import { RecipeIndexEntry, parseRecipeIndex, parseStoredRecipe } from "./validate";

type StoredEntry = {
  path: string;
  record: StoredRecipeRecord;
};

function slugify(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/(^-|-$)+/g, "")
    .slice(0, 80) || "recipe";
}

async function readJson(filePath: string): Promise<unknown> {
  const raw = await fs.readFile(filePath, "utf-8");
  try {
    return JSON.parse(raw) as unknown;
  } catch (error) {
    throw new StoreReadError(`${filePath} is not valid JSON`, { cause: error });
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Keeps one JSON document per recipe under `recipes/` and an `index.json` listing
 * them in creation order. Every write rewrites the touched document.
 */
export class JsonFileRecordStore implements RecordStore {
  private entries: Promise<Map<number, StoredEntry>> | null = null;

  constructor(private readonly rootDir: string) {}

  async createRecipe(title: string): Promise<number> {
    const entries = await this.load();
    const id = Math.max(0, ...entries.keys()) + 1;
    const entry: StoredEntry = {
      path: `recipes/${id}-${slugify(title)}.json`,
      record: { id, title, ingredients: [], instructions: [], macros: [] },
    };
    entries.set(id, entry);
    await this.writeEntry(entry);
    await this.writeIndex(entries);
    return id;
  }

  async addIngredient(recipeId: number, text: string): Promise<void> {
    const entry = await this.entryFor(recipeId);
    entry.record.ingredients.push(text);
    await this.writeEntry(entry);
  }

  async addInstruction(recipeId: number, stepNumber: number, text: string): Promise<void> {
    const entry = await this.entryFor(recipeId);
    entry.record.instructions.push({ step: stepNumber, text });
    await this.writeEntry(entry);
  }

  async addMacro(recipeId: number, name: string, value: number): Promise<void> {
    if (!Number.isFinite(value)) {
      throw new Error(`Macro value for ${name} must be a finite number, got ${value}`);
    }
    const entry = await this.entryFor(recipeId);
    entry.record.macros.push({ name, value });
    await this.writeEntry(entry);
  }

  async listRecipes(): Promise<RecipeSummary[]> {
    const entries = await this.load();
    return [...entries.values()].map(({ record }) => ({ id: record.id, title: record.title }));
  }

  async getIngredients(recipeId: number): Promise<string[]> {
    const entries = await this.load();
    return [...(entries.get(recipeId)?.record.ingredients ?? [])];
  }

  async getInstructions(recipeId: number): Promise<InstructionStep[]> {
    const entries = await this.load();
    return (entries.get(recipeId)?.record.instructions ?? []).map((step) => ({ ...step }));
  }

  async getMacros(recipeId: number): Promise<MacroEntry[]> {
    const entries = await this.load();
    return (entries.get(recipeId)?.record.macros ?? []).map((macro) => ({ ...macro }));
  }

  private load(): Promise<Map<number, StoredEntry>> {
    if (!this.entries) {
      const pending = this.readAll();
      this.entries = pending;
      void pending.catch(() => {
        if (this.entries === pending) {
          this.entries = null;
        }
      });
    }
    return this.entries;
  }

  private async readAll(): Promise<Map<number, StoredEntry>> {
    const indexPath = path.join(this.rootDir, "index.json");
    let index: RecipeIndexEntry[];
    try {
      index = parseRecipeIndex(await readJson(indexPath), indexPath);
    } catch (error) {
      if (isMissingFile(error)) {
        return new Map();
      }
      throw error;
    }

    const entries = new Map<number, StoredEntry>();
    for (const item of index) {
      const filePath = path.join(this.rootDir, item.path);
      let document: unknown;
      try {
        document = await readJson(filePath);
      } catch (error) {
        if (error instanceof StoreReadError) {
          throw error;
        }
        throw new StoreReadError(`Could not read ${filePath} listed in ${indexPath}`, { cause: error });
      }
      const record = parseStoredRecipe(document, filePath);
      if (record.id !== item.id) {
        throw new StoreReadError(`${filePath} holds recipe ${record.id}, index expects ${item.id}`);
      }
      entries.set(item.id, { path: item.path, record });
    }
    return entries;
  }

  private async entryFor(recipeId: number): Promise<StoredEntry> {
    const entries = await this.load();
    const entry = entries.get(recipeId);
    if (!entry) {
      throw new Error(`Unknown recipe id: ${recipeId}`);
    }
    return entry;
  }

  private async writeEntry(entry: StoredEntry): Promise<void> {
    const filePath = path.join(this.rootDir, entry.path);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(entry.record, null, 2), "utf-8");
  }

  private async writeIndex(entries: Map<number, StoredEntry>): Promise<void> {
    const indexPayload: RecipeIndexEntry[] = [...entries.values()].map(({ path: entryPath, record }) => ({
      id: record.id,
      title: record.title,
      path: entryPath,
    }));
    await fs.mkdir(this.rootDir, { recursive: true });
    await fs.writeFile(
      path.join(this.rootDir, "index.json"),
      JSON.stringify(indexPayload, null, 2),
      "utf-8",
    );
  }
}
