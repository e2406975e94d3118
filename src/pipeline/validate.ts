import Ajv, { type ErrorObject } from "ajv";

import type { ValidationResult } from "./types";

const textFieldSchema = {
  anyOf: [{ type: "string" }, { type: "array" }, { type: "null" }],
};

export const recipePayloadSchema = {
  type: "object",
  required: ["id", "name", "ingredients", "servings"],
  properties: {
    id: { type: ["string", "integer"] },
    name: { type: "string", minLength: 1 },
    ingredients: {
      type: "array",
      items: {
        type: "object",
        required: ["name", "quantity"],
        properties: {
          name: { type: "string", minLength: 1 },
          quantity: { type: ["string", "number"] },
          unit: { type: ["string", "null"] },
        },
      },
    },
    servings: { type: "integer", minimum: 1 },
    nutritional_info: {
      anyOf: [
        {
          type: "object",
          properties: {
            calories: { type: ["number", "string"] },
          },
        },
        { type: "null" },
      ],
    },
    detailed_instructions: textFieldSchema,
    cooking_tips: textFieldSchema,
    equipment_needed: textFieldSchema,
  },
  additionalProperties: true,
};

function toJsonPathSegment(segment: string): string {
  if (/^\d+$/.test(segment)) {
    return `[${segment}]`;
  }
  if (/^[A-Za-z_$][A-Za-z0-9_$]*$/.test(segment)) {
    return `.${segment}`;
  }
  return `['${segment.replace(/'/g, "\\'")}']`;
}

function toJsonPath(instancePath: string): string {
  const parts = instancePath
    .split("/")
    .filter(Boolean)
    .map((part) => part.replace(/~1/g, "/").replace(/~0/g, "~"));

  let jsonPath = "$";
  for (const part of parts) {
    jsonPath += toJsonPathSegment(part);
  }
  return jsonPath;
}

function formatAjvError(error: ErrorObject): string {
  const message = error.message ?? "is invalid";
  return `${toJsonPath(error.instancePath)} ${message}`.trim();
}

const ajv = new Ajv({ allErrors: true, strict: false });
const validateSchema = ajv.compile(recipePayloadSchema);

/**
 * Checks a fetched payload against the recipe contract. Advisory only:
 * assembly accepts anything and falls back to defaults.
 */
export function validateRecipePayload(payload: unknown): ValidationResult {
  if (validateSchema(payload)) {
    return { ok: true, errors: [] };
  }
  const errors = (validateSchema.errors ?? []).map((error) => formatAjvError(error));
  return { ok: false, errors };
}
