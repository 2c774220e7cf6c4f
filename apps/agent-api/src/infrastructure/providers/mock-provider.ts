import type { CompletionRequest, CompletionResult, LlmProvider } from "../../orchestrator/types.js";

export type MockReply = string | ((prompt: string) => string);

const DEFAULT_REPLY = [
  "Clarity: 7/10",
  "Specificity: 6/10",
  "Prompt A is clearer.",
  "I suggest naming the target audience.",
  "I recommend adding an example of the expected output.",
  "Estimated effort: 24 hours over 5 days; moderate complexity.",
  "Overall Score: 35/50",
].join("\n");

/**
 * Deterministic in-process stand-in for a model endpoint.
 */
export class MockProvider implements LlmProvider {
  static readonly DEFAULT_REPLY = DEFAULT_REPLY;

  constructor(private readonly reply: MockReply = DEFAULT_REPLY) {}

  async execute(req: CompletionRequest): Promise<CompletionResult> {
    const text = typeof this.reply === "string" ? this.reply : this.reply(req.prompt);
    return {
      text,
      meta: { provider: "mock", model: req.model },
    };
  }
}
