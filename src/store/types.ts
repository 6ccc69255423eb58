import { InstructionStep, MacroEntry } from "../pipeline";

export type RecipeSummary = {
  id: number;
  title: string;
};

export interface RecordStore {
  createRecipe(title: string): Promise<number>;
  addIngredient(recipeId: number, text: string): Promise<void>;
  addInstruction(recipeId: number, stepNumber: number, text: string): Promise<void>;
  addMacro(recipeId: number, name: string, value: number): Promise<void>;
  listRecipes(): Promise<RecipeSummary[]>;
  getIngredients(recipeId: number): Promise<string[]>;
  getInstructions(recipeId: number): Promise<InstructionStep[]>;
  getMacros(recipeId: number): Promise<MacroEntry[]>;
}

export type StoredRecipeRecord = {
  id: number;
  title: string;
  ingredients: string[];
  instructions: InstructionStep[];
  macros: MacroEntry[];
};
