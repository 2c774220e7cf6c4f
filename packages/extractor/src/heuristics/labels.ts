import type { ClearerPrompt } from "@promptsmith/contracts";

// Checked in order; the first keyword present wins.
export const COMPLEXITY_KEYWORDS = ["simple", "moderate", "complex", "high", "low"] as const;

export const DEFAULT_COMPLEXITY = "Moderate";

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

/**
 * "prompt a" is looked for before "prompt b", so text naming both resolves to "A".
 */
export function extractClearerLabel(text: string): ClearerPrompt {
  const lower = text.toLowerCase();
  if (lower.includes("prompt a")) {
    return "A";
  }
  if (lower.includes("prompt b")) {
    return "B";
  }
  return "Unclear";
}

export function extractComplexityLabel(text: string): string {
  const lower = text.toLowerCase();
  const keyword = COMPLEXITY_KEYWORDS.find((candidate) => lower.includes(candidate));
  return keyword ? capitalize(keyword) : DEFAULT_COMPLEXITY;
}
