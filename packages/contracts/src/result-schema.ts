import { z } from "zod";

export const EVALUATION_METRICS = [
  "relevance",
  "completeness",
  "accuracy",
  "clarity",
  "creativity",
] as const;

export const EvaluationMetricSchema = z.enum(EVALUATION_METRICS);

export const ClearerPromptSchema = z.enum(["A", "B", "Unclear"]);

const ScoreSchema = z.number().int().nonnegative();

export const IndividualScoresSchema = z.object({
  relevance: ScoreSchema,
  completeness: ScoreSchema,
  accuracy: ScoreSchema,
  clarity: ScoreSchema,
  creativity: ScoreSchema,
});

export const PromptAnalysisSchema = z.object({
  analysis: z.string(),
  clarityScore: ScoreSchema,
  specificityScore: ScoreSchema,
  suggestions: z.array(z.string()),
});

export const PromptComparisonSchema = z.object({
  comparison: z.string(),
  clearerPrompt: ClearerPromptSchema,
  recommendations: z.array(z.string()),
});

export const ResponseEvaluationSchema = z.object({
  evaluation: z.string(),
  overallScore: ScoreSchema,
  individualScores: IndividualScoresSchema,
});

export const DevelopmentEstimateSchema = z.object({
  rawResponse: z.string(),
  estimatedHours: ScoreSchema,
  timelineDays: ScoreSchema,
  complexityAnalysis: z.string(),
});

export const ExtractedResultSchema = z.union([
  PromptAnalysisSchema,
  PromptComparisonSchema,
  ResponseEvaluationSchema,
  DevelopmentEstimateSchema,
]);

export type EvaluationMetric = z.infer<typeof EvaluationMetricSchema>;
export type IndividualScores = z.infer<typeof IndividualScoresSchema>;
export type ClearerPrompt = z.infer<typeof ClearerPromptSchema>;
export type PromptAnalysis = z.infer<typeof PromptAnalysisSchema>;
export type PromptComparison = z.infer<typeof PromptComparisonSchema>;
export type ResponseEvaluation = z.infer<typeof ResponseEvaluationSchema>;
export type DevelopmentEstimate = z.infer<typeof DevelopmentEstimateSchema>;
export type ExtractedResult = z.infer<typeof ExtractedResultSchema>;
