export const SUGGESTION_KEYWORDS = ["suggest", "improve", "better", "consider"] as const;
export const RECOMMENDATION_KEYWORDS = ["recommend", "improve", "better"] as const;

export function filterLinesByKeywords(
  text: string,
  keywords: readonly string[],
): string[] {
  const kept: string[] = [];
  for (const line of text.split("\n")) {
    const lower = line.toLowerCase();
    if (keywords.some((keyword) => lower.includes(keyword))) {
      kept.push(line.trim());
    }
  }
  return kept;
}

export function extractSuggestions(text: string): string[] {
  return filterLinesByKeywords(text, SUGGESTION_KEYWORDS);
}

export function extractRecommendations(text: string): string[] {
  return filterLinesByKeywords(text, RECOMMENDATION_KEYWORDS);
}
