import { InstructionStep, MacroEntry } from "../pipeline";
import { RecordStore, RecipeSummary, StoredRecipeRecord } from "./types";

export class MemoryRecordStore implements RecordStore {
  private records = new Map<number, StoredRecipeRecord>();
  private nextId = 1;

  async createRecipe(title: string): Promise<number> {
    const id = this.nextId;
    this.nextId += 1;
    this.records.set(id, { id, title, ingredients: [], instructions: [], macros: [] });
    return id;
  }

  async addIngredient(recipeId: number, text: string): Promise<void> {
    this.recordFor(recipeId).ingredients.push(text);
  }

  async addInstruction(recipeId: number, stepNumber: number, text: string): Promise<void> {
    this.recordFor(recipeId).instructions.push({ step: stepNumber, text });
  }

  async addMacro(recipeId: number, name: string, value: number): Promise<void> {
    if (!Number.isFinite(value)) {
      throw new Error(`Macro value for ${name} must be a finite number, got ${value}`);
    }
    this.recordFor(recipeId).macros.push({ name, value });
  }

  async listRecipes(): Promise<RecipeSummary[]> {
    return [...this.records.values()].map(({ id, title }) => ({ id, title }));
  }

  async getIngredients(recipeId: number): Promise<string[]> {
    return [...(this.records.get(recipeId)?.ingredients ?? [])];
  }

  async getInstructions(recipeId: number): Promise<InstructionStep[]> {
    return (this.records.get(recipeId)?.instructions ?? []).map((step) => ({ ...step }));
  }

  async getMacros(recipeId: number): Promise<MacroEntry[]> {
    return (this.records.get(recipeId)?.macros ?? []).map((entry) => ({ ...entry }));
  }

  private recordFor(recipeId: number): StoredRecipeRecord {
    const record = this.records.get(recipeId);
    if (!record) {
      throw new Error(`Unknown recipe id: ${recipeId}`);
    }
    return record;
  }
}
