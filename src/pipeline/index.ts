export { scaleQuantity } from "./quantity";
export { estimateDuration } from "./duration";
export { segment, withTerminalPunctuation } from "./segment";
export type { SegmentedText, SegmentationMode } from "./segment";
export { decodePayload } from "./decode";
export { normalizeInstructions } from "./normalize";
export type { NormalizeOptions } from "./normalize";
export {
  parseTips,
  parseEquipment,
  groupTipsByCategory,
  groupEquipmentByType,
  DEFAULT_TIP_CATEGORY,
} from "./extras";
export type { EquipmentType } from "./extras";
export { parseRecipe, parseNutrition, UNTITLED_RECIPE } from "./recipe";
export {
  assembleRecipeDetail,
  withScale,
  scaledIngredients,
  scaledNutrition,
  scaledServings,
  isValidScaleFactor,
  scaleFactorLabel,
  formatIngredient,
  formatStepDuration,
  toScaledView,
  COMMON_SCALE_FACTORS,
  MAX_SCALE_FACTOR,
} from "./assemble";
export {
  startSession,
  setStepCompletion,
  pauseSession,
  resumeSession,
  finishSession,
  completedStepCount,
  progressPercentage,
  isSessionCompleted,
  elapsedMs,
  sessionState,
  toSessionSnapshot,
  fromSessionSnapshot,
} from "./session";
export { buildShareText } from "./share";
export { validateRecipePayload, recipePayloadSchema } from "./validate";
export * from "./types";
