import OpenAI from "openai";
import type { CompletionRequest, CompletionResult, LlmProvider } from "../../orchestrator/types.js";

export class OpenAIProvider implements LlmProvider {
  private readonly client: OpenAI;

  constructor(apiKey: string) {
    this.client = new OpenAI({ apiKey });
  }

  async execute(req: CompletionRequest): Promise<CompletionResult> {
    const completion = await this.client.responses.create({
      model: req.model,
      input: req.prompt,
      ...(req.temperature !== undefined ? { temperature: req.temperature } : {}),
      ...(req.maxTokens !== undefined ? { max_output_tokens: req.maxTokens } : {}),
    });

    return {
      text: completion.output_text,
      meta: {
        id: completion.id,
        model: completion.model,
      },
    };
  }
}
