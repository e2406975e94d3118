import { formatIngredient, scaledIngredients, scaledNutrition, scaledServings } from "./assemble";
import type { RecipeDetail } from "./types";

export function buildShareText(detail: RecipeDetail): string {
  const recipe = detail.baseRecipe;
  const sections: string[][] = [];

  const header = [recipe.name];
  if (recipe.description) {
    header.push("", recipe.description);
  }
  sections.push(header);

  const info: string[] = [];
  const times: string[] = [];
  if (recipe.prepTimeMinutes !== undefined) {
    times.push(`Prep: ${recipe.prepTimeMinutes}min`);
  }
  if (recipe.cookTimeMinutes !== undefined) {
    times.push(`Cook: ${recipe.cookTimeMinutes}min`);
  }
  if (times.length > 0) {
    info.push(times.join(" | "));
  }
  info.push(`Serves ${scaledServings(detail)}`);
  if (recipe.difficultyLevel) {
    info.push(`Difficulty: ${recipe.difficultyLevel}`);
  }
  sections.push(info);

  sections.push([
    "Ingredients:",
    ...scaledIngredients(detail).map((ingredient) => `- ${formatIngredient(ingredient)}`),
  ]);

  sections.push([
    "Instructions:",
    ...detail.steps.map((step) => `${step.stepNumber}. ${step.instruction}`),
  ]);

  const nutrition = scaledNutrition(detail);
  if (nutrition) {
    const lines = ["Nutrition (per serving):", `Calories: ${Math.round(nutrition.calories)}`];
    if (nutrition.protein !== undefined) {
      lines.push(`Protein: ${Math.round(nutrition.protein)}g`);
    }
    if (nutrition.carbs !== undefined) {
      lines.push(`Carbs: ${Math.round(nutrition.carbs)}g`);
    }
    if (nutrition.fat !== undefined) {
      lines.push(`Fat: ${Math.round(nutrition.fat)}g`);
    }
    sections.push(lines);
  }

  return `${sections.map((lines) => lines.join("\n")).join("\n\n")}\n`;
}
