import type {
  DevelopmentEstimate,
  PromptAnalysis,
  PromptComparison,
  ResponseEvaluation,
} from "@promptsmith/contracts";
import { extractHoursAndTimeline } from "../heuristics/estimates.js";
import { extractClearerLabel, extractComplexityLabel } from "../heuristics/labels.js";
import { extractRecommendations, extractSuggestions } from "../heuristics/lines.js";
import {
  extractIndividualScores,
  extractOverallScore,
  extractScore,
} from "../heuristics/scores.js";

export function parseAnalysisResponse(text: string): PromptAnalysis {
  return {
    analysis: text,
    clarityScore: extractScore(text, "clarity"),
    specificityScore: extractScore(text, "specificity"),
    suggestions: extractSuggestions(text),
  };
}

export function parseComparisonResponse(text: string): PromptComparison {
  return {
    comparison: text,
    clearerPrompt: extractClearerLabel(text),
    recommendations: extractRecommendations(text),
  };
}

export function parseEvaluationResponse(text: string): ResponseEvaluation {
  return {
    evaluation: text,
    overallScore: extractOverallScore(text),
    individualScores: extractIndividualScores(text),
  };
}

export function parseEstimateResponse(text: string): DevelopmentEstimate {
  const { hours, timelineDays } = extractHoursAndTimeline(text);
  return {
    rawResponse: text,
    estimatedHours: hours,
    timelineDays,
    complexityAnalysis: extractComplexityLabel(text),
  };
}
