import type { Payload } from "./types";

function tryParseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) as unknown };
  } catch {
    return { ok: false };
  }
}

/**
 * Recipe text fields arrive as arrays, as JSON-encoded arrays inside a string,
 * or as plain prose. Anything else (numbers, objects, null) decodes to `none`.
 */
export function decodePayload(raw: unknown): Payload {
  if (Array.isArray(raw)) {
    return { kind: "list", items: raw, source: "array" };
  }
  if (typeof raw !== "string") {
    return { kind: "none" };
  }

  const parsed = tryParseJson(raw);
  if (!parsed.ok) {
    return { kind: "text", text: raw, reason: "not-json" };
  }
  if (Array.isArray(parsed.value)) {
    return { kind: "list", items: parsed.value, source: "json" };
  }
  return { kind: "text", text: raw, reason: "not-array" };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
