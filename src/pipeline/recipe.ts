import { isRecord } from "./decode";
import type { Ingredient, NutritionInfo, OptionalNutrient, Recipe } from "./types";

export const UNTITLED_RECIPE = "Untitled Recipe";

export const OPTIONAL_NUTRIENTS: readonly OptionalNutrient[] = [
  "protein",
  "carbs",
  "fat",
  "fiber",
  "sugar",
  "sodium",
];

function toNumber(value: unknown): number | undefined {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === "string" && value.trim()) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

function toOptionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

function toOptionalInteger(value: unknown): number | undefined {
  return typeof value === "number" && Number.isInteger(value) ? value : undefined;
}

function toText(value: unknown): string | undefined {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return String(value);
  }
  return undefined;
}

function parseIngredient(value: unknown): Ingredient | null {
  if (!isRecord(value)) {
    return null;
  }
  const name = toText(value.name);
  if (!name) {
    return null;
  }
  const ingredient: Ingredient = { name, quantity: toText(value.quantity) ?? "" };
  const unit = toOptionalString(value.unit);
  if (unit !== undefined) {
    ingredient.unit = unit;
  }
  return ingredient;
}

export function parseNutrition(value: unknown): NutritionInfo | undefined {
  if (!isRecord(value)) {
    return undefined;
  }
  const nutrition: NutritionInfo = { calories: toNumber(value.calories) ?? 0 };
  for (const nutrient of OPTIONAL_NUTRIENTS) {
    const amount = toNumber(value[nutrient]);
    if (amount !== undefined) {
      nutrition[nutrient] = amount;
    }
  }
  return nutrition;
}

/**
 * Reads the base recipe out of a fetched payload. Unknown or malformed fields
 * fall back to defaults instead of failing the whole recipe.
 */
export function parseRecipe(payload: unknown, warnings: string[] = []): Recipe {
  const json: Record<string, unknown> = isRecord(payload) ? payload : {};
  if (!isRecord(payload)) {
    warnings.push("recipe: payload is not an object, using defaults");
  }

  const rawIngredients = Array.isArray(json.ingredients) ? json.ingredients : [];
  const ingredients: Ingredient[] = [];
  rawIngredients.forEach((entry, index) => {
    const ingredient = parseIngredient(entry);
    if (ingredient) {
      ingredients.push(ingredient);
    } else {
      warnings.push(`ingredients[${index}]: missing name, dropped`);
    }
  });

  const servings = toNumber(json.servings);
  const name = toText(json.name);

  const recipe: Recipe = {
    id: toText(json.id) ?? "",
    name: name && name.trim() ? name : UNTITLED_RECIPE,
    ingredients,
    servings: servings !== undefined && servings > 0 ? servings : 1,
  };

  const nutrition = parseNutrition(json.nutritional_info);
  if (nutrition) {
    recipe.nutrition = nutrition;
  }

  const description = toOptionalString(json.description);
  const instructions = toOptionalString(json.instructions);
  const cuisineType = toOptionalString(json.cuisine_type);
  const mealType = toOptionalString(json.meal_type);
  const prepTimeMinutes = toOptionalInteger(json.prep_time_minutes);
  const cookTimeMinutes = toOptionalInteger(json.cook_time_minutes);
  const totalTimeMinutes = toOptionalInteger(json.total_time_minutes);
  const difficultyLevel = toOptionalString(json.difficulty_level);
  const imageUrl = toOptionalString(json.image_url);
  const sourceUrl = toOptionalString(json.source_url);

  return {
    ...recipe,
    ...(description !== undefined ? { description } : {}),
    ...(instructions !== undefined ? { instructions } : {}),
    ...(cuisineType !== undefined ? { cuisineType } : {}),
    ...(mealType !== undefined ? { mealType } : {}),
    ...(prepTimeMinutes !== undefined ? { prepTimeMinutes } : {}),
    ...(cookTimeMinutes !== undefined ? { cookTimeMinutes } : {}),
    ...(totalTimeMinutes !== undefined ? { totalTimeMinutes } : {}),
    ...(difficultyLevel !== undefined ? { difficultyLevel } : {}),
    ...(imageUrl !== undefined ? { imageUrl } : {}),
    ...(sourceUrl !== undefined ? { sourceUrl } : {}),
  };
}
