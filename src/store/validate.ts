import Ajv, { ErrorObject, JSONSchemaType } from "ajv";

import { StoreReadError } from "../errors";
import { StoredRecipeRecord } from "./types";

const storedRecipeSchema: JSONSchemaType<StoredRecipeRecord> = {
  type: "object",
  required: ["id", "title", "ingredients", "instructions", "macros"],
  properties: {
    id: { type: "integer", minimum: 1 },
    title: { type: "string" },
    ingredients: { type: "array", items: { type: "string" } },
    instructions: {
      type: "array",
      items: {
        type: "object",
        required: ["step", "text"],
        properties: {
          step: { type: "integer", minimum: 1 },
          text: { type: "string" },
        },
      },
    },
    macros: {
      type: "array",
      items: {
        type: "object",
        required: ["name", "value"],
        properties: {
          name: { type: "string", minLength: 1 },
          value: { type: "number" },
        },
      },
    },
  },
  additionalProperties: true,
};

const ajv = new Ajv({ allErrors: true });
const validateSchema = ajv.compile(storedRecipeSchema);

function toJsonPathSegment(segment: string): string {
  if (/^\d+$/.test(segment)) {
    return `[${segment}]`;
  }
  if (/^[A-Za-z_$][A-Za-z0-9_$]*$/.test(segment)) {
    return `.${segment}`;
  }
  return `['${segment.replace(/'/g, "\\'")}']`;
}

function toJsonPath(instancePath: string, missingProperty?: string): string {
  const parts = instancePath
    .split("/")
    .filter(Boolean)
    .map((part) => part.replace(/~1/g, "/").replace(/~0/g, "~"));

  let jsonPath = "$";
  for (const part of parts) {
    jsonPath += toJsonPathSegment(part);
  }
  if (missingProperty) {
    jsonPath += toJsonPathSegment(missingProperty);
  }
  return jsonPath;
}

function missingPropertyOf(error: ErrorObject): string | undefined {
  const value: unknown = error.params.missingProperty;
  return typeof value === "string" ? value : undefined;
}

export function formatAjvError(error: ErrorObject): string {
  const path = toJsonPath(error.instancePath, missingPropertyOf(error));
  const message = error.message ?? "is invalid";
  return `${path} ${message}`.trim();
}

export function parseStoredRecipe(value: unknown, source: string): StoredRecipeRecord {
  if (validateSchema(value)) {
    return value;
  }
  const errors = (validateSchema.errors ?? []).map((error) => formatAjvError(error));
  throw new StoreReadError(`Invalid recipe record in ${source}: ${errors.join("; ")}`);
}

export type RecipeIndexEntry = {
  id: number;
  title: string;
  path: string;
};

const recipeIndexSchema: JSONSchemaType<RecipeIndexEntry[]> = {
  type: "array",
  items: {
    type: "object",
    required: ["id", "title", "path"],
    properties: {
      id: { type: "integer", minimum: 1 },
      title: { type: "string" },
      path: { type: "string", minLength: 1 },
    },
  },
};

const validateIndex = ajv.compile(recipeIndexSchema);

export function parseRecipeIndex(value: unknown, source: string): RecipeIndexEntry[] {
  if (validateIndex(value)) {
    return value;
  }
  const errors = (validateIndex.errors ?? []).map((error) => formatAjvError(error));
  throw new StoreReadError(`Invalid recipe index ${source}: ${errors.join("; ")}`);
}
