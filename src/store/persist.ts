import { StoreWriteError, describeError } from "../errors";
import { Recipe } from "../pipeline";
import { RecordStore } from "./types";

/**
 * Writes one recipe as a sequence of store operations. A failure part-way leaves
 * the records already written in place.
 */
export async function persistRecipe(store: RecordStore, recipe: Recipe): Promise<number> {
  try {
    const recipeId = await store.createRecipe(recipe.title);
    for (const ingredient of recipe.ingredients) {
      await store.addIngredient(recipeId, ingredient);
    }
    for (const instruction of recipe.instructions) {
      await store.addInstruction(recipeId, instruction.step, instruction.text);
    }
    for (const [name, value] of Object.entries(recipe.macros)) {
      if (value !== undefined) {
        await store.addMacro(recipeId, name, value);
      }
    }
    return recipeId;
  } catch (error) {
    throw new StoreWriteError(
      recipe.title,
      `Failed to store "${recipe.title}": ${describeError(error)}`,
      { cause: error },
    );
  }
}
