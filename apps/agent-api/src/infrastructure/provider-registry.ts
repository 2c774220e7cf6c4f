import type { ModelProvider } from "@promptsmith/contracts";
import type { AppConfig } from "../config.js";
import { ProviderNotConfiguredError } from "../errors.js";
import type { LlmProvider } from "../orchestrator/types.js";
import { AnthropicProvider } from "./providers/anthropic-provider.js";
import { MockProvider } from "./providers/mock-provider.js";
import { OpenAIProvider } from "./providers/openai-provider.js";

export interface ProviderStatus {
  available: boolean;
  reason: string | null;
}

export type ProviderStatusSnapshot = Record<ModelProvider, ProviderStatus>;

export type ProviderRegistry = Partial<Record<ModelProvider, LlmProvider>>;

type ProviderCredentials = Pick<AppConfig, "openaiApiKey" | "anthropicApiKey">;

export function createProviderRegistry(config: ProviderCredentials): ProviderRegistry {
  const providers: ProviderRegistry = {
    mock: new MockProvider(),
  };

  if (config.openaiApiKey) {
    providers.openai = new OpenAIProvider(config.openaiApiKey);
  }

  if (config.anthropicApiKey) {
    providers.anthropic = new AnthropicProvider(config.anthropicApiKey);
  }

  return providers;
}

export function resolveProvider(registry: ProviderRegistry, name: ModelProvider): LlmProvider {
  const provider = registry[name];
  if (!provider) {
    throw new ProviderNotConfiguredError(name);
  }
  return provider;
}

export function getProviderStatusSnapshot(config: ProviderCredentials): ProviderStatusSnapshot {
  return {
    mock: { available: true, reason: null },
    openai: config.openaiApiKey
      ? { available: true, reason: null }
      : { available: false, reason: "OPENAI_API_KEY is not set." },
    anthropic: config.anthropicApiKey
      ? { available: true, reason: null }
      : { available: false, reason: "ANTHROPIC_API_KEY is not set." },
  };
}
