export { normalize } from "./normalize";
export { segment } from "./segment";
export {
  DEFAULT_TITLE,
  extractTitle,
  extractIngredients,
  extractInstructions,
  extractMacros,
  hasMeasuredUnit,
  mentionsUnit,
  isIngredientLine,
} from "./extract";
export { MIN_BLOCK_LENGTH, assemble, assembleRecipe, parseRecipes } from "./assemble";
export * from "./types";
