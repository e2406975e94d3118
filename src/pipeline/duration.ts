type DurationRule = {
  keywords: readonly string[];
  minutes: number | null;
};

// Evaluated in order, first match wins: "heat and simmer" is a simmer step.
const DURATION_RULES: readonly DurationRule[] = [
  { keywords: ["boil", "simmer"], minutes: 10 },
  { keywords: ["cook", "bake"], minutes: 15 },
  { keywords: ["mix", "combine", "stir"], minutes: 2 },
  { keywords: ["chop", "dice", "slice"], minutes: 5 },
  { keywords: ["heat", "preheat"], minutes: 5 },
  { keywords: ["rest", "chill", "cool"], minutes: null },
];

export function estimateDuration(instruction: string): number | null {
  const lower = instruction.toLowerCase();
  const rule = DURATION_RULES.find((candidate) =>
    candidate.keywords.some((keyword) => lower.includes(keyword)),
  );
  return rule ? rule.minutes : null;
}
