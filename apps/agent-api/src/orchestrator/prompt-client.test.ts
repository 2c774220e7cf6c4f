import { pino } from "pino";
import { describe, expect, it, vi } from "vitest";
import type { ModelPolicy } from "@promptsmith/contracts";
import { TemplateCatalog } from "../domain/template-catalog.js";
import { ModelUnavailableError, UnknownTemplateError } from "../errors.js";
import { MockProvider } from "../infrastructure/providers/mock-provider.js";
import { createLogger } from "../logger.js";
import { PromptClient } from "./prompt-client.js";
import type { LlmProvider } from "./types.js";

const policy: ModelPolicy = {
  provider: "mock",
  model: "mock-v1",
  temperature: 0.2,
  maxTokens: 256,
};

const logger = createLogger("silent");

const catalog = new TemplateCatalog([
  {
    name: "summary",
    slots: ["topic"],
    body: "Summarize {{topic}}.",
  },
]);

describe("PromptClient", () => {
  it("sends the prompt text unchanged with the model policy", async () => {
    const execute = vi.fn<LlmProvider["execute"]>().mockResolvedValue({
      text: "done",
      meta: {},
    });
    const client = new PromptClient({ catalog, provider: { execute }, modelPolicy: policy, logger });

    await expect(client.complete("  raw {{prompt}}  ")).resolves.toBe("done");
    expect(execute).toHaveBeenCalledTimes(1);
    expect(execute).toHaveBeenCalledWith({
      prompt: "  raw {{prompt}}  ",
      model: "mock-v1",
      temperature: 0.2,
      maxTokens: 256,
    });
  });

  it("returns empty completions as they are", async () => {
    const client = new PromptClient({
      catalog,
      provider: new MockProvider(""),
      modelPolicy: policy,
      logger,
    });

    await expect(client.complete("anything")).resolves.toBe("");
  });

  it("wraps endpoint failures in ModelUnavailableError without retrying", async () => {
    const failure = new Error("rate limited");
    const execute = vi.fn<LlmProvider["execute"]>().mockRejectedValue(failure);
    const client = new PromptClient({ catalog, provider: { execute }, modelPolicy: policy, logger });

    const error = await client.complete("hello").catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ModelUnavailableError);
    if (!(error instanceof ModelUnavailableError)) {
      return;
    }
    expect(error.code).toBe("MODEL_UNAVAILABLE");
    expect(error.message).toBe("rate limited");
    expect(error.cause).toBe(failure);
    expect(execute).toHaveBeenCalledTimes(1);
  });

  it("keeps non-error rejections as the message", async () => {
    const execute = vi.fn<LlmProvider["execute"]>().mockRejectedValue("socket hang up");
    const client = new PromptClient({ catalog, provider: { execute }, modelPolicy: policy, logger });

    await expect(client.complete("hello")).rejects.toThrow("socket hang up");
  });

  it("renders a catalog template and completes it", async () => {
    const client = new PromptClient({
      catalog,
      provider: new MockProvider((prompt) => `echo: ${prompt}`),
      modelPolicy: policy,
      logger,
    });

    expect(client.render("summary", { topic: "zod" })).toBe("Summarize zod.");
    await expect(client.run("summary", { topic: "zod" })).resolves.toBe("echo: Summarize zod.");
  });

  it("does not call the provider for unknown templates", async () => {
    const execute = vi.fn<LlmProvider["execute"]>();
    const client = new PromptClient({ catalog, provider: { execute }, modelPolicy: policy, logger });

    await expect(client.run("missing", {})).rejects.toThrow(UnknownTemplateError);
    expect(execute).not.toHaveBeenCalled();
  });

  it("logs dispatch and completion at debug level", async () => {
    const lines: string[] = [];
    const debugLogger = pino({ level: "debug" }, { write: (line: string) => lines.push(line) });
    const client = new PromptClient({
      catalog,
      provider: new MockProvider("four"),
      modelPolicy: policy,
      logger: debugLogger,
    });

    await client.complete("2+2");

    const entries = lines.map((line) => JSON.parse(line) as { msg: string; module: string });
    expect(entries.map((entry) => entry.msg)).toEqual(["dispatching prompt", "received completion"]);
    expect(entries[0]?.module).toBe("prompt-client");
  });
});
