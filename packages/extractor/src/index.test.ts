import { describe, expect, it } from "vitest";
import {
  DevelopmentEstimateSchema,
  PromptAnalysisSchema,
  PromptComparisonSchema,
  ResponseEvaluationSchema,
} from "@promptsmith/contracts";
import {
  extractClearerLabel,
  extractSuggestions,
  parseAnalysisResponse,
  parseComparisonResponse,
  parseEstimateResponse,
  parseEvaluationResponse,
} from "./index.js";

const analysisText = [
  "1. Clarity assessment: 6/10",
  "2. Specificity assessment: 4/10",
  "3. Potential ambiguities: the audience is not stated.",
  "4. Suggested improvements: name the audience.",
  "5. Consider giving an example output.",
].join("\n");

const comparisonText = [
  "Prompt B is clearer because it names the audience.",
  "Prompt A is shorter.",
  "I recommend adding a length limit to Prompt B.",
  "Both would be better with examples.",
].join("\n");

const evaluationText = [
  "Relevance: 9/10",
  "Completeness: 7/10",
  "Accuracy: 8/10",
  "Clarity: 9/10",
  "Creativity: 6/10",
  "Overall Score: 39/50",
].join("\n");

const estimateText = [
  "Development Hours: 80 hours",
  "Testing Hours: 20 hours",
  "Total Timeline: 3 weeks",
  "This is a moderate task with low risk.",
].join("\n");

describe("response parsers", () => {
  it("parses a prompt analysis", () => {
    const result = parseAnalysisResponse(analysisText);

    expect(result).toEqual({
      analysis: analysisText,
      clarityScore: 6,
      specificityScore: 4,
      suggestions: [
        "4. Suggested improvements: name the audience.",
        "5. Consider giving an example output.",
      ],
    });
    expect(PromptAnalysisSchema.parse(result)).toEqual(result);
  });

  it("parses a prompt comparison with first-match labelling", () => {
    const result = parseComparisonResponse(comparisonText);

    expect(result).toEqual({
      comparison: comparisonText,
      clearerPrompt: "A",
      recommendations: [
        "I recommend adding a length limit to Prompt B.",
        "Both would be better with examples.",
      ],
    });
    expect(PromptComparisonSchema.parse(result)).toEqual(result);
  });

  it("parses a response evaluation", () => {
    const result = parseEvaluationResponse(evaluationText);

    expect(result).toEqual({
      evaluation: evaluationText,
      overallScore: 39,
      individualScores: {
        relevance: 9,
        completeness: 7,
        accuracy: 8,
        clarity: 9,
        creativity: 6,
      },
    });
    expect(ResponseEvaluationSchema.parse(result)).toEqual(result);
  });

  it("parses a development estimate", () => {
    const result = parseEstimateResponse(estimateText);

    expect(result).toEqual({
      rawResponse: estimateText,
      estimatedHours: 80,
      timelineDays: 3,
      complexityAnalysis: "Moderate",
    });
    expect(DevelopmentEstimateSchema.parse(result)).toEqual(result);
  });

  it("degrades to defaults on empty text", () => {
    expect(parseAnalysisResponse("")).toEqual({
      analysis: "",
      clarityScore: 0,
      specificityScore: 0,
      suggestions: [],
    });
    expect(parseEstimateResponse("")).toEqual({
      rawResponse: "",
      estimatedHours: 0,
      timelineDays: 0,
      complexityAnalysis: "Moderate",
    });
  });

  it("gives the same answer on repeated calls", () => {
    expect(parseEvaluationResponse(evaluationText)).toEqual(parseEvaluationResponse(evaluationText));
    expect(extractSuggestions(analysisText)).toEqual(extractSuggestions(analysisText));
    expect(extractClearerLabel(comparisonText)).toBe(extractClearerLabel(comparisonText));
  });
});
