import type {
  AnalyzePromptRequest,
  ComparePromptsRequest,
  EvaluateResponseRequest,
  OptimizeContextRequest,
  OptimizePromptRequest,
  PromptAnalysis,
  PromptComparison,
  ResponseEvaluation,
  SlotValues,
} from "@promptsmith/contracts";
import {
  parseAnalysisResponse,
  parseComparisonResponse,
  parseEvaluationResponse,
} from "@promptsmith/extractor";
import { PROMPT_ENGINEERING_TEMPLATES } from "../domain/templates/prompt-engineering.js";
import { UnknownTemplateError } from "../errors.js";
import type { PromptClient } from "../orchestrator/prompt-client.js";

const TECHNIQUES: ReadonlySet<string> = new Set(
  PROMPT_ENGINEERING_TEMPLATES.map((template) => template.name),
);

/**
 * Prompt-engineering operations: each renders one catalog template, sends it,
 * and where a shape is expected, scrapes it out of the reply.
 */
export class PromptAgent {
  constructor(private readonly client: PromptClient) {}

  async analyzePrompt(req: AnalyzePromptRequest): Promise<PromptAnalysis> {
    const response = await this.client.run("prompt_analyzer", {
      prompt: req.prompt,
      context: req.context ?? "",
    });
    return parseAnalysisResponse(response);
  }

  async optimizePrompt(req: OptimizePromptRequest): Promise<string> {
    return this.client.run("prompt_optimizer", {
      original_prompt: req.originalPrompt,
      issues: req.issues,
      goal: req.goal,
    });
  }

  async comparePrompts(req: ComparePromptsRequest): Promise<PromptComparison> {
    const response = await this.client.run("ab_test_comparison", {
      prompt_a: req.promptA,
      prompt_b: req.promptB,
      test_input: req.testInput,
    });
    return parseComparisonResponse(response);
  }

  /** Runs one of the prompt-engineering templates by name; other names throw UnknownTemplateError. */
  async generatePrompt(technique: string, slots: SlotValues): Promise<string> {
    if (!TECHNIQUES.has(technique)) {
      throw new UnknownTemplateError(technique);
    }
    return this.client.run(technique, slots);
  }

  async evaluateResponse(req: EvaluateResponseRequest): Promise<ResponseEvaluation> {
    const response = await this.client.run("evaluation_metrics", {
      prompt: req.prompt,
      response: req.response,
      criteria: req.criteria,
    });
    return parseEvaluationResponse(response);
  }

  async optimizeContext(req: OptimizeContextRequest): Promise<string> {
    return this.client.run("context_optimizer", {
      long_prompt: req.longPrompt,
      constraints: req.constraints,
    });
  }
}
