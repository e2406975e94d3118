import { decodePayload, isRecord } from "./decode";
import type { NormalizeOptions } from "./normalize";
import type { Tip } from "./types";

export const DEFAULT_TIP_CATEGORY = "general";

export type EquipmentType = "Cookware" | "Tools" | "Other";

const cookwareKeywords = ["pot", "pan", "skillet", "saucepan", "baking", "sheet", "dish"];
const toolKeywords = ["whisk", "spatula", "spoon", "knife", "cutting", "measuring", "mixer"];

function tipFromEntry(entry: unknown): Tip | null {
  if (typeof entry === "string") {
    return entry.trim() ? { text: entry, category: DEFAULT_TIP_CATEGORY } : null;
  }
  if (!isRecord(entry) || typeof entry.tip !== "string") {
    return null;
  }
  const category =
    typeof entry.category === "string" && entry.category.trim()
      ? entry.category
      : DEFAULT_TIP_CATEGORY;
  return { text: entry.tip, category };
}

export function parseTips(raw: unknown, options: NormalizeOptions = {}): Tip[] {
  const field = options.field ?? "cooking_tips";
  const payload = decodePayload(raw);

  switch (payload.kind) {
    case "none":
      return [];
    case "list": {
      const tips: Tip[] = [];
      payload.items.forEach((entry, index) => {
        const tip = tipFromEntry(entry);
        if (tip) {
          tips.push(tip);
        } else {
          options.warnings?.push(`${field}: dropped entry ${index + 1} without tip text`);
        }
      });
      return tips;
    }
    case "text":
      if (!payload.text.trim()) {
        return [];
      }
      if (payload.reason === "not-array") {
        options.warnings?.push(`${field}: JSON value is not a list, kept as a single tip`);
      }
      return [{ text: payload.text, category: DEFAULT_TIP_CATEGORY }];
  }
}

export function parseEquipment(raw: unknown, options: NormalizeOptions = {}): string[] {
  const field = options.field ?? "equipment_needed";
  const payload = decodePayload(raw);

  switch (payload.kind) {
    case "none":
      return [];
    case "list":
      return payload.items.filter((item): item is string => typeof item === "string");
    case "text":
      if (!payload.text.trim()) {
        return [];
      }
      if (payload.reason === "not-array") {
        options.warnings?.push(`${field}: JSON value is not a list, ignored`);
        return [];
      }
      return [payload.text];
  }
}

export function groupTipsByCategory(tips: readonly Tip[]): Record<string, Tip[]> {
  const grouped: Record<string, Tip[]> = {};
  for (const tip of tips) {
    const bucket = grouped[tip.category] ?? [];
    bucket.push(tip);
    grouped[tip.category] = bucket;
  }
  return grouped;
}

export function groupEquipmentByType(
  equipment: readonly string[],
): Partial<Record<EquipmentType, string[]>> {
  const grouped: Partial<Record<EquipmentType, string[]>> = {};
  for (const item of equipment) {
    const lower = item.toLowerCase();
    let type: EquipmentType = "Other";
    if (cookwareKeywords.some((keyword) => lower.includes(keyword))) {
      type = "Cookware";
    } else if (toolKeywords.some((keyword) => lower.includes(keyword))) {
      type = "Tools";
    }
    grouped[type] = [...(grouped[type] ?? []), item];
  }
  return grouped;
}
