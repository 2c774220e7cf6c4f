import type { ModelPolicy } from "@promptsmith/contracts";
import { PromptAgent } from "./application/prompt-agent.js";
import { SoftwareHouseAgent } from "./application/software-house-agent.js";
import { getModelPolicy, type AppConfig } from "./config.js";
import { loadCategoryCatalog, type CategoryCatalog } from "./domain/categories.js";
import { createDefaultCatalog, type TemplateCatalog } from "./domain/template-catalog.js";
import {
  createProviderRegistry,
  getProviderStatusSnapshot,
  resolveProvider,
  type ProviderStatusSnapshot,
} from "./infrastructure/provider-registry.js";
import { createLogger, type Logger } from "./logger.js";
import { PromptClient } from "./orchestrator/prompt-client.js";
import type { LlmProvider } from "./orchestrator/types.js";

export interface Services {
  config: AppConfig;
  logger: Logger;
  modelPolicy: ModelPolicy;
  catalog: TemplateCatalog;
  categories: CategoryCatalog;
  client: PromptClient;
  promptAgent: PromptAgent;
  softwareHouseAgent: SoftwareHouseAgent;
  providerStatus: ProviderStatusSnapshot;
}

export interface ServiceOverrides {
  provider?: LlmProvider | undefined;
  catalog?: TemplateCatalog | undefined;
  categories?: CategoryCatalog | undefined;
}

export async function createServices(
  config: AppConfig,
  overrides: ServiceOverrides = {},
): Promise<Services> {
  const logger = createLogger(config.logLevel);
  const modelPolicy = getModelPolicy(config);
  const catalog = overrides.catalog ?? createDefaultCatalog();
  const categories = overrides.categories ?? (await loadCategoryCatalog());
  const provider =
    overrides.provider ?? resolveProvider(createProviderRegistry(config), modelPolicy.provider);

  const client = new PromptClient({ catalog, provider, modelPolicy, logger });

  return {
    config,
    logger,
    modelPolicy,
    catalog,
    categories,
    client,
    promptAgent: new PromptAgent(client),
    softwareHouseAgent: new SoftwareHouseAgent(client),
    providerStatus: getProviderStatusSnapshot(config),
  };
}
