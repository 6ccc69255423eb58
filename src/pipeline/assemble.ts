import {
  extractIngredients,
  extractInstructions,
  extractMacros,
  extractTitle,
} from "./extract";
import { normalize } from "./normalize";
import { segment } from "./segment";
import { AssembleResult, AssembledBlock, RecipeBlock, Recipe, SkippedBlock } from "./types";

export const MIN_BLOCK_LENGTH = 20;

export function assembleRecipe(block: RecipeBlock): AssembledBlock {
  // Counted in code points, not UTF-16 units.
  if (Array.from(block.text.trim()).length < MIN_BLOCK_LENGTH) {
    return { kind: "skipped", skipped: { blockIndex: block.index, reason: "too-short" } };
  }

  const ingredients = extractIngredients(block.text);
  const instructions = extractInstructions(block.text).map((text, index) => ({
    step: index + 1,
    text,
  }));

  if (ingredients.length === 0 && instructions.length === 0) {
    return {
      kind: "skipped",
      skipped: { blockIndex: block.index, reason: "no-ingredients-or-instructions" },
    };
  }

  return {
    kind: "recipe",
    recipe: {
      blockIndex: block.index,
      title: extractTitle(block.text),
      ingredients,
      instructions,
      macros: extractMacros(block.text),
    },
  };
}

export function assemble(blocks: RecipeBlock[]): AssembleResult {
  const recipes: Recipe[] = [];
  const skipped: SkippedBlock[] = [];

  for (const block of blocks) {
    const result = assembleRecipe(block);
    if (result.kind === "recipe") {
      recipes.push(result.recipe);
    } else {
      skipped.push(result.skipped);
    }
  }

  return { blocksFound: blocks.length, recipes, skipped };
}

export function parseRecipes(rawText: string): AssembleResult {
  return assemble(segment(normalize(rawText)));
}
