import {
  EVALUATION_METRICS,
  type IndividualScores,
} from "@promptsmith/contracts";

const OVERALL_SCORE_REGEX = /overall[^\n]*?(\d+)\/50/i;

function escapeRegExp(input: string): string {
  return input.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function firstCapturedInt(match: RegExpMatchArray | null): number {
  const digits = match?.[1];
  return digits ? Number.parseInt(digits, 10) : 0;
}

/**
 * First run of digits following `metricName` before the next "\n", case-insensitive.
 * The digits need not be adjacent: "Clarity (1-10): 7" yields 1.
 */
export function extractScore(text: string, metricName: string): number {
  const pattern = new RegExp(`${escapeRegExp(metricName)}[^\\n]*?(\\d+)`, "i");
  return firstCapturedInt(text.match(pattern));
}

export function extractOverallScore(text: string): number {
  return firstCapturedInt(text.match(OVERALL_SCORE_REGEX));
}

export function extractIndividualScores(text: string): IndividualScores {
  const scores: IndividualScores = {
    relevance: 0,
    completeness: 0,
    accuracy: 0,
    clarity: 0,
    creativity: 0,
  };
  for (const metric of EVALUATION_METRICS) {
    scores[metric] = extractScore(text, metric);
  }
  return scores;
}
