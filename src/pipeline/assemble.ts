import { isRecord } from "./decode";
import { parseEquipment, parseTips } from "./extras";
import { normalizeInstructions } from "./normalize";
import { scaleQuantity } from "./quantity";
import { OPTIONAL_NUTRIENTS, parseRecipe } from "./recipe";
import type {
  IngredientView,
  NutritionInfo,
  RecipeDetail,
  ScaledRecipeView,
  Step,
} from "./types";

export const MAX_SCALE_FACTOR = 10;

export const COMMON_SCALE_FACTORS: readonly number[] = [0.5, 1, 1.5, 2, 3, 4];

const SCALE_FACTOR_LABELS = new Map<number, string>([
  [0.5, "½x (Half)"],
  [1, "1x (Original)"],
  [1.5, "1½x"],
  [2, "2x (Double)"],
  [3, "3x (Triple)"],
  [4, "4x"],
]);

export function isValidScaleFactor(factor: number): boolean {
  return Number.isFinite(factor) && factor > 0 && factor <= MAX_SCALE_FACTOR;
}

export function scaleFactorLabel(factor: number): string {
  return SCALE_FACTOR_LABELS.get(factor) ?? `${factor}x`;
}

/**
 * Builds the detail view for a fetched recipe payload. Steps, tips and
 * equipment are parsed once here and shared by every scaled copy.
 */
export function assembleRecipeDetail(payload: unknown): RecipeDetail {
  const warnings: string[] = [];
  const json: Record<string, unknown> = isRecord(payload) ? payload : {};
  const baseRecipe = parseRecipe(payload, warnings);

  const detail: RecipeDetail = {
    baseRecipe: Object.freeze(baseRecipe),
    steps: Object.freeze(
      normalizeInstructions(json.detailed_instructions, { warnings }).map((step) => Object.freeze(step)),
    ),
    tips: Object.freeze(parseTips(json.cooking_tips, { warnings }).map((tip) => Object.freeze(tip))),
    equipment: Object.freeze(parseEquipment(json.equipment_needed, { warnings })),
    currentScaleFactor: 1,
    warnings: Object.freeze(warnings),
  };
  return Object.freeze(detail);
}

export function withScale(detail: RecipeDetail, factor: number): RecipeDetail {
  if (!Number.isFinite(factor) || factor <= 0) {
    return detail;
  }
  return Object.freeze({ ...detail, currentScaleFactor: factor });
}

export function scaledIngredients(detail: RecipeDetail): IngredientView[] {
  return detail.baseRecipe.ingredients.map((ingredient) => {
    const view: IngredientView = {
      name: ingredient.name,
      quantity: scaleQuantity(ingredient.quantity, detail.currentScaleFactor),
      // Reserved until substitutions are served alongside the recipe.
      substitutions: [],
    };
    if (ingredient.unit !== undefined) {
      view.unit = ingredient.unit;
    }
    return view;
  });
}

export function scaledNutrition(detail: RecipeDetail): NutritionInfo | null {
  const base = detail.baseRecipe.nutrition;
  if (!base) {
    return null;
  }
  const factor = detail.currentScaleFactor;
  const scaled: NutritionInfo = { calories: base.calories * factor };
  for (const nutrient of OPTIONAL_NUTRIENTS) {
    const amount = base[nutrient];
    if (amount !== undefined) {
      scaled[nutrient] = amount * factor;
    }
  }
  return scaled;
}

export function scaledServings(detail: RecipeDetail): number {
  return Math.round(detail.baseRecipe.servings * detail.currentScaleFactor);
}

export function formatIngredient(ingredient: Pick<IngredientView, "name" | "quantity" | "unit">): string {
  if (ingredient.unit && ingredient.unit.trim()) {
    return `${ingredient.quantity} ${ingredient.unit} ${ingredient.name}`;
  }
  return `${ingredient.quantity} ${ingredient.name}`;
}

export function formatStepDuration(step: Step): string {
  return step.durationMinutes === null ? "" : `${step.durationMinutes}min`;
}

export function toScaledView(detail: RecipeDetail): ScaledRecipeView {
  return {
    id: detail.baseRecipe.id,
    name: detail.baseRecipe.name,
    scale_factor: detail.currentScaleFactor,
    servings: scaledServings(detail),
    ingredients: scaledIngredients(detail).map((ingredient) => ({
      name: ingredient.name,
      quantity: ingredient.quantity,
      unit: ingredient.unit ?? null,
      display: formatIngredient(ingredient),
    })),
    nutritional_info: scaledNutrition(detail),
    steps: detail.steps.map((step) => ({
      step: step.stepNumber,
      instruction: step.instruction,
      duration_minutes: step.durationMinutes,
      tips: step.tips ?? null,
    })),
    cooking_tips: detail.tips.map((tip) => ({ ...tip })),
    equipment_needed: [...detail.equipment],
  };
}
