import { InstructionStep, MacroEntry } from "./pipeline";
import { RecordStore, RecipeSummary } from "./store";

export type StoredRecipe = RecipeSummary & {
  ingredients: string[];
  instructions: InstructionStep[];
  macros: MacroEntry[];
};

export async function loadStoredRecipe(
  store: RecordStore,
  recipeId: number,
): Promise<StoredRecipe | null> {
  const summary = (await store.listRecipes()).find((recipe) => recipe.id === recipeId);
  if (!summary) {
    return null;
  }
  const [ingredients, instructions, macros] = await Promise.all([
    store.getIngredients(recipeId),
    store.getInstructions(recipeId),
    store.getMacros(recipeId),
  ]);
  return { ...summary, ingredients, instructions, macros };
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

export function renderRecipe(recipe: StoredRecipe): string {
  const lines = [recipe.title, "Ingredients:"];
  lines.push(...recipe.ingredients.map((ingredient) => `- ${ingredient}`));
  lines.push("Instructions:");
  lines.push(...recipe.instructions.map(({ step, text }) => `${step}. ${text}`));
  if (recipe.macros.length > 0) {
    lines.push("Macros:");
    lines.push(...recipe.macros.map(({ name, value }) => `${capitalize(name)}: ${value}`));
  }
  return lines.join("\n");
}

export function renderRecipeList(recipes: RecipeSummary[]): string {
  if (recipes.length === 0) {
    return "No recipes stored.";
  }
  return recipes.map(({ id, title }) => `${id}. ${title}`).join("\n");
}
