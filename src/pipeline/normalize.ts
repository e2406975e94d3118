import { decodePayload, isRecord } from "./decode";
import { estimateDuration } from "./duration";
import { segment, withTerminalPunctuation } from "./segment";
import type { Step } from "./types";

export type NormalizeOptions = {
  /** Field name used as the prefix of recorded warnings. */
  field?: string;
  /** Degradations are appended here; the result itself never signals them. */
  warnings?: string[];
};

function toPositiveInteger(value: unknown): number | null {
  return typeof value === "number" && Number.isInteger(value) && value > 0 ? value : null;
}

function toDurationMinutes(value: unknown): number | null {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 ? value : null;
}

function stepFromEntry(entry: unknown, position: number): Step | null {
  if (typeof entry === "string") {
    const trimmed = entry.trim();
    if (!trimmed) {
      return null;
    }
    const instruction = withTerminalPunctuation(trimmed);
    return {
      stepNumber: position,
      instruction,
      durationMinutes: estimateDuration(instruction),
    };
  }

  if (!isRecord(entry)) {
    return null;
  }
  const instruction = entry.instruction;
  if (typeof instruction !== "string" || instruction.trim().length === 0) {
    return null;
  }

  const step: Step = {
    stepNumber: toPositiveInteger(entry.step) ?? position,
    instruction: instruction.trim(),
    durationMinutes: toDurationMinutes(entry.duration_minutes),
  };
  if (typeof entry.tips === "string") {
    step.tips = entry.tips;
  }
  return step;
}

export function normalizeInstructions(raw: unknown, options: NormalizeOptions = {}): Step[] {
  const field = options.field ?? "detailed_instructions";
  const warn = (message: string) => options.warnings?.push(`${field}: ${message}`);
  const payload = decodePayload(raw);

  switch (payload.kind) {
    case "none":
      return [];
    case "list": {
      const steps: Step[] = [];
      payload.items.forEach((entry, index) => {
        // Numbered among the kept steps so dropped entries leave no gaps.
        const step = stepFromEntry(entry, steps.length + 1);
        if (step) {
          steps.push(step);
        } else {
          warn(`dropped entry ${index + 1} without instruction text`);
        }
      });
      return steps;
    }
    case "text": {
      const segmented = segment(payload.text);
      if (payload.reason === "not-json" && segmented.steps.length > 0 && /^\s*[[{]/.test(payload.text)) {
        warn("not valid JSON, segmented as plain text");
      }
      if (segmented.fallback) {
        warn("no fragment long enough to stand alone, kept the full text as one step");
      }
      return segmented.steps;
    }
  }
}
