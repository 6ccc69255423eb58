export type RecipeBlock = {
  index: number;
  text: string;
};

export const MACRO_NAMES = [
  "calories",
  "protein",
  "fat",
  "carbs",
  "carbohydrates",
  "fiber",
  "sugar",
  "cholesterol",
  "sodium",
] as const;

export type MacroName = (typeof MACRO_NAMES)[number];

export type Macros = Partial<Record<MacroName, number>>;

export type MacroEntry = {
  name: string;
  value: number;
};

export type InstructionStep = {
  step: number;
  text: string;
};

export type Recipe = {
  blockIndex: number;
  title: string;
  ingredients: string[];
  instructions: InstructionStep[];
  macros: Macros;
};

export type SkipReason = "too-short" | "no-ingredients-or-instructions";

export type SkippedBlock = {
  blockIndex: number;
  reason: SkipReason;
};

export type AssembledBlock =
  | { kind: "recipe"; recipe: Recipe }
  | { kind: "skipped"; skipped: SkippedBlock };

export type AssembleResult = {
  blocksFound: number;
  recipes: Recipe[];
  skipped: SkippedBlock[];
};

export type AdapterOutput = {
  kind: "text";
  text: string;
  meta: {
    origin: string;
  };
};
