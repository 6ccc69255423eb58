import { RecipeBlock } from "./types";

// A delimiter sits at the start of the text or right after a newline. "Recipe" needs
// a colon; rules of = or - must fill the line.
const blockDelimiter =
  /(?:^|\n)(?:recipe[ \t]?:|={3,}(?=[ \t]*(?:\n|$))|-{3,}(?=[ \t]*(?:\n|$)))/gi;

export function segment(text: string): RecipeBlock[] {
  return text.split(blockDelimiter).map((blockText, index) => ({
    index,
    text: blockText,
  }));
}
