import type { ModelPolicy, SlotValues } from "@promptsmith/contracts";
import type { TemplateCatalog } from "../domain/template-catalog.js";
import { ModelUnavailableError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { LlmProvider } from "./types.js";

export interface PromptClientOptions {
  catalog: TemplateCatalog;
  provider: LlmProvider;
  modelPolicy: ModelPolicy;
  logger: Logger;
}

export class PromptClient {
  readonly catalog: TemplateCatalog;
  private readonly provider: LlmProvider;
  private readonly modelPolicy: ModelPolicy;
  private readonly log: Logger;

  constructor(options: PromptClientOptions) {
    this.catalog = options.catalog;
    this.provider = options.provider;
    this.modelPolicy = options.modelPolicy;
    this.log = options.logger.child({ module: "prompt-client" });
  }

  render(templateName: string, slots: SlotValues = {}): string {
    return this.catalog.render(templateName, slots);
  }

  async complete(promptText: string): Promise<string> {
    const { provider, model, temperature, maxTokens } = this.modelPolicy;
    this.log.debug({ provider, model, promptLength: promptText.length }, "dispatching prompt");

    let text: string;
    try {
      const result = await this.provider.execute({
        prompt: promptText,
        model,
        temperature,
        maxTokens,
      });
      text = result.text;
    } catch (error) {
      this.log.error({ err: error, provider, model }, "model endpoint failed");
      throw new ModelUnavailableError(error);
    }

    this.log.debug({ provider, model, responseLength: text.length }, "received completion");
    return text;
  }

  async run(templateName: string, slots: SlotValues = {}): Promise<string> {
    const prompt = this.render(templateName, slots);
    this.log.debug({ template: templateName }, "rendered template");
    return this.complete(prompt);
  }
}
