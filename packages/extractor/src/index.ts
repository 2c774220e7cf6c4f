export {
  extractScore,
  extractOverallScore,
  extractIndividualScores,
} from "./heuristics/scores.js";
export {
  SUGGESTION_KEYWORDS,
  RECOMMENDATION_KEYWORDS,
  filterLinesByKeywords,
  extractSuggestions,
  extractRecommendations,
} from "./heuristics/lines.js";
export {
  COMPLEXITY_KEYWORDS,
  DEFAULT_COMPLEXITY,
  extractClearerLabel,
  extractComplexityLabel,
} from "./heuristics/labels.js";
export { extractHoursAndTimeline, type HoursAndTimeline } from "./heuristics/estimates.js";
export {
  parseAnalysisResponse,
  parseComparisonResponse,
  parseEvaluationResponse,
  parseEstimateResponse,
} from "./parsers/parse-responses.js";
