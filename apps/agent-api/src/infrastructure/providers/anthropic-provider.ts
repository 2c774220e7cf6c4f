import Anthropic from "@anthropic-ai/sdk";
import type { CompletionRequest, CompletionResult, LlmProvider } from "../../orchestrator/types.js";

const DEFAULT_MAX_TOKENS = 2000;

export class AnthropicProvider implements LlmProvider {
  private readonly client: Anthropic;

  constructor(apiKey: string) {
    this.client = new Anthropic({ apiKey });
  }

  async execute(req: CompletionRequest): Promise<CompletionResult> {
    const completion = await this.client.messages.create({
      model: req.model,
      max_tokens: req.maxTokens ?? DEFAULT_MAX_TOKENS,
      ...(req.temperature !== undefined ? { temperature: req.temperature } : {}),
      messages: [{ role: "user", content: req.prompt }],
    });

    const text = completion.content
      .map((block) => (block.type === "text" ? block.text : ""))
      .join("");

    return {
      text,
      meta: {
        id: completion.id,
        model: completion.model,
        stopReason: completion.stop_reason,
      },
    };
  }
}
