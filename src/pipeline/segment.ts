import { estimateDuration } from "./duration";
import type { Step } from "./types";

export type SegmentationMode = "numbered" | "sentences";

export type SegmentedText = {
  steps: Step[];
  mode: SegmentationMode;
  /** True when every fragment was dropped as noise and the whole text became one step. */
  fallback: boolean;
};

const numberedMarker = /\d+\.\s*/;
const pureNumberedMarker = /^\d+\.\s*$/;
const sentenceBoundary = /[.!]\s+/;
const terminalPunctuation = /[.!?]$/;

// Fragments shorter than this are stray numbering or punctuation left by the split.
const MIN_FRAGMENT_LENGTH = 10;

export function withTerminalPunctuation(text: string): string {
  return terminalPunctuation.test(text) ? text : `${text}.`;
}

function splitFragments(text: string, mode: SegmentationMode): string[] {
  const pieces = mode === "numbered" ? text.split(numberedMarker) : text.split(sentenceBoundary);
  return pieces
    .filter((piece) => piece.trim().length > 0)
    .filter((piece) => mode !== "numbered" || !pureNumberedMarker.test(piece))
    .map((piece) => piece.trim());
}

export function segment(input: string): SegmentedText {
  const text = input.trim();
  const mode: SegmentationMode = numberedMarker.test(text) ? "numbered" : "sentences";
  if (!text) {
    return { steps: [], mode, fallback: false };
  }

  const instructions = splitFragments(text, mode)
    .map((fragment) => withTerminalPunctuation(fragment))
    .filter((fragment) => fragment.length >= MIN_FRAGMENT_LENGTH);

  if (instructions.length === 0) {
    return {
      steps: [{ stepNumber: 1, instruction: withTerminalPunctuation(text), durationMinutes: null }],
      mode,
      fallback: true,
    };
  }

  const steps = instructions.map((instruction, index) => ({
    stepNumber: index + 1,
    instruction,
    durationMinutes: estimateDuration(instruction),
  }));

  return { steps, mode, fallback: false };
}
