import type { ModelPolicy } from "@promptsmith/contracts";
import { createDefaultCatalog } from "../domain/template-catalog.js";
import { MockProvider, type MockReply } from "../infrastructure/providers/mock-provider.js";
import { createLogger } from "../logger.js";
import { PromptClient } from "../orchestrator/prompt-client.js";

export const TEST_MODEL_POLICY: ModelPolicy = {
  provider: "mock",
  model: "mock-v1",
  temperature: 0,
  maxTokens: 128,
};

/**
 * Client over the default catalog whose provider records every prompt it receives.
 */
export function createRecordingClient(reply?: MockReply): {
  client: PromptClient;
  prompts: string[];
} {
  const prompts: string[] = [];
  const provider = new MockProvider((prompt) => {
    prompts.push(prompt);
    if (reply === undefined) {
      return MockProvider.DEFAULT_REPLY;
    }
    return typeof reply === "string" ? reply : reply(prompt);
  });

  return {
    client: new PromptClient({
      catalog: createDefaultCatalog(),
      provider,
      modelPolicy: TEST_MODEL_POLICY,
      logger: createLogger("silent"),
    }),
    prompts,
  };
}
