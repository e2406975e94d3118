export type Ingredient = {
  name: string;
  quantity: string;
  unit?: string;
};

export type NutritionInfo = {
  calories: number;
  protein?: number;
  carbs?: number;
  fat?: number;
  fiber?: number;
  sugar?: number;
  sodium?: number;
};

export type OptionalNutrient = Exclude<keyof NutritionInfo, "calories">;

export type Recipe = {
  id: string;
  name: string;
  description?: string;
  instructions?: string;
  ingredients: readonly Ingredient[];
  servings: number;
  nutrition?: NutritionInfo;
  cuisineType?: string;
  mealType?: string;
  prepTimeMinutes?: number;
  cookTimeMinutes?: number;
  totalTimeMinutes?: number;
  difficultyLevel?: string;
  imageUrl?: string;
  sourceUrl?: string;
};

export type Step = {
  stepNumber: number;
  instruction: string;
  /** `null` means no estimate, or a step whose time varies (resting, chilling). */
  durationMinutes: number | null;
  tips?: string;
};

export type Tip = {
  text: string;
  category: string;
};

export type RecipeDetail = {
  readonly baseRecipe: Recipe;
  readonly steps: readonly Step[];
  readonly tips: readonly Tip[];
  readonly equipment: readonly string[];
  readonly currentScaleFactor: number;
  readonly warnings: readonly string[];
};

export type IngredientView = {
  name: string;
  quantity: string;
  unit?: string;
  substitutions: string[];
};

export type ScaledRecipeView = {
  id: string;
  name: string;
  scale_factor: number;
  servings: number;
  ingredients: Array<{ name: string; quantity: string; unit: string | null; display: string }>;
  nutritional_info: NutritionInfo | null;
  steps: Array<{ step: number; instruction: string; duration_minutes: number | null; tips: string | null }>;
  cooking_tips: Tip[];
  equipment_needed: string[];
};

export type CookingSession = {
  readonly recipeId: string;
  readonly stepCompletions: readonly boolean[];
  readonly startTime: Date;
  readonly endTime?: Date;
  readonly isPaused: boolean;
};

export type SessionState = "active" | "paused" | "completed" | "ended";

export type CookingSessionSnapshot = {
  recipe_id: string;
  step_completions: boolean[];
  start_time: string;
  end_time?: string;
  is_paused: boolean;
};

/**
 * A raw recipe field after decoding. `list` items come either straight from the
 * payload or from a JSON-encoded string; `text` is prose that was not a JSON array.
 */
export type Payload =
  | { kind: "none" }
  | { kind: "list"; items: readonly unknown[]; source: "array" | "json" }
  | { kind: "text"; text: string; reason: "not-json" | "not-array" };

export type ValidationResult = {
  ok: boolean;
  errors: string[];
};
