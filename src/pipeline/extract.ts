import { MACRO_NAMES, MacroName, Macros } from "./types";

export const DEFAULT_TITLE = "Untitled Recipe";

const titleRegex = /^(?:recipe\s*[:\-])?\s*([A-Za-z ,]+)/i;

const measuredUnits = [
  "cup",
  "tsp",
  "tbsp",
  "g",
  "gram",
  "oz",
  "ml",
  "kg",
  "lb",
  "teaspoon",
  "tablespoon",
  "clove",
  "slice",
  "scoop",
  "packet",
  "can",
  "stick",
];

// Matched as substrings: "eggs" mentions "g".
const mentionedUnits = ["cup", "tsp", "tbsp", "oz", "g", "ml", "kg", "lb"];

const measuredUnitRegex = new RegExp(
  `^[-*•]?\\s*\\d+(?:\\.\\d+)?\\s?(?:${measuredUnits.join("|")})(?![a-z])`,
  "i",
);
const quantityPrefixRegex = /^[-*•]?\s*\d+\s/;

const instructionHeaders = ["instructions", "directions", "method"];
const instructionTerminators = ["macros", "nutrition", "course", "calories", "psst"];

const macroRegex = new RegExp(`(${MACRO_NAMES.join("|")})\\D*(\\d+\\.?\\d*)`, "gi");

function isMacroName(value: string): value is MacroName {
  return (MACRO_NAMES as readonly string[]).includes(value);
}

function splitLines(text: string): string[] {
  return text.split(/\r\n|\r|\n/);
}

export function extractTitle(text: string): string {
  const match = text.trim().match(titleRegex);
  const title = match?.[1]?.trim();
  return title ? title : DEFAULT_TITLE;
}

export function hasMeasuredUnit(line: string): boolean {
  return measuredUnitRegex.test(line.trim());
}

export function mentionsUnit(line: string): boolean {
  const trimmed = line.trim();
  if (!quantityPrefixRegex.test(trimmed)) {
    return false;
  }
  const lower = trimmed.toLowerCase();
  return mentionedUnits.some((unit) => lower.includes(unit));
}

export function isIngredientLine(line: string): boolean {
  return hasMeasuredUnit(line) || mentionsUnit(line);
}

export function extractIngredients(text: string): string[] {
  return splitLines(text)
    .map((line) => line.trim())
    .filter((line) => isIngredientLine(line));
}

export function extractInstructions(text: string): string[] {
  const instructions: string[] = [];
  let state: "not-found" | "capturing" = "not-found";

  for (const line of splitLines(text)) {
    const trimmed = line.trim();
    const lower = trimmed.toLowerCase();

    if (state === "not-found") {
      if (instructionHeaders.some((header) => lower.includes(header))) {
        state = "capturing";
      }
      continue;
    }

    if (instructionTerminators.some((terminator) => lower.includes(terminator))) {
      break;
    }
    if (!trimmed || lower.startsWith("tag us")) {
      continue;
    }
    if (trimmed.split(/\s+/).length > 2) {
      instructions.push(trimmed);
    }
  }

  return instructions;
}

export function extractMacros(text: string): Macros {
  const macros: Macros = {};
  for (const match of text.matchAll(macroRegex)) {
    const name = match[1].toLowerCase();
    if (isMacroName(name)) {
      macros[name] = Number.parseFloat(match[2]);
    }
  }
  return macros;
}
