import { describe, expect, it } from "vitest";
import { ProviderNotConfiguredError } from "../errors.js";
import {
  createProviderRegistry,
  getProviderStatusSnapshot,
  resolveProvider,
} from "./provider-registry.js";
import { AnthropicProvider } from "./providers/anthropic-provider.js";
import { MockProvider } from "./providers/mock-provider.js";
import { OpenAIProvider } from "./providers/openai-provider.js";

describe("provider registry", () => {
  it("always registers the mock provider", () => {
    const registry = createProviderRegistry({});

    expect(resolveProvider(registry, "mock")).toBeInstanceOf(MockProvider);
    expect(() => resolveProvider(registry, "openai")).toThrow(ProviderNotConfiguredError);
    expect(() => resolveProvider(registry, "anthropic")).toThrow(
      "Provider 'anthropic' is not configured.",
    );
  });

  it("registers remote providers that have keys", () => {
    const registry = createProviderRegistry({
      openaiApiKey: "test-key",
      anthropicApiKey: "test-key",
    });

    expect(resolveProvider(registry, "openai")).toBeInstanceOf(OpenAIProvider);
    expect(resolveProvider(registry, "anthropic")).toBeInstanceOf(AnthropicProvider);
  });

  it("reports why a provider is unavailable", () => {
    expect(getProviderStatusSnapshot({ openaiApiKey: "test-key" })).toEqual({
      mock: { available: true, reason: null },
      openai: { available: true, reason: null },
      anthropic: { available: false, reason: "ANTHROPIC_API_KEY is not set." },
    });
  });
});
