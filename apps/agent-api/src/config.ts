import { z } from "zod";
import type { ModelPolicy, ModelProvider } from "@promptsmith/contracts";
import { ModelProviderSchema } from "@promptsmith/contracts";
import { ConfigError } from "./errors.js";

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

const optionalSecret = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

const EnvSchema = z
  .object({
    LLM_PROVIDER: ModelProviderSchema.default("openai"),
    OPENAI_API_KEY: optionalSecret,
    OPENAI_MODEL_NAME: z.string().trim().min(1).default("gpt-4"),
    ANTHROPIC_API_KEY: optionalSecret,
    ANTHROPIC_MODEL_NAME: z.string().trim().min(1).default("claude-3-5-haiku-latest"),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
    LLM_MAX_TOKENS: z.coerce.number().int().positive().default(2000),
    DEBUG: z
      .enum(["true", "false"])
      .default("false")
      .transform((value) => value === "true"),
    LOG_LEVEL: z.string().trim().toLowerCase().pipe(z.enum(LOG_LEVELS)).optional(),
    OUTPUT_DIR: z.string().trim().min(1).default("output"),
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  })
  .superRefine((env, ctx) => {
    if (env.LLM_PROVIDER === "openai" && !env.OPENAI_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["OPENAI_API_KEY"],
        message: "OPENAI_API_KEY is required when LLM_PROVIDER is 'openai'.",
      });
    }
    if (env.LLM_PROVIDER === "anthropic" && !env.ANTHROPIC_API_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["ANTHROPIC_API_KEY"],
        message: "ANTHROPIC_API_KEY is required when LLM_PROVIDER is 'anthropic'.",
      });
    }
  });

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  provider: ModelProvider;
  openaiApiKey?: string | undefined;
  openaiModel: string;
  anthropicApiKey?: string | undefined;
  anthropicModel: string;
  temperature: number;
  maxTokens: number;
  logLevel: LogLevel;
  outputDir: string;
  port: number;
}

const MOCK_MODEL = "mock-v1";

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }

  const data = parsed.data;
  return {
    provider: data.LLM_PROVIDER,
    openaiApiKey: data.OPENAI_API_KEY,
    openaiModel: data.OPENAI_MODEL_NAME,
    anthropicApiKey: data.ANTHROPIC_API_KEY,
    anthropicModel: data.ANTHROPIC_MODEL_NAME,
    temperature: data.LLM_TEMPERATURE,
    maxTokens: data.LLM_MAX_TOKENS,
    logLevel: data.LOG_LEVEL ?? (data.DEBUG ? "debug" : "info"),
    outputDir: data.OUTPUT_DIR,
    port: data.PORT,
  };
}

export function getModelPolicy(config: AppConfig): ModelPolicy {
  const model =
    config.provider === "openai"
      ? config.openaiModel
      : config.provider === "anthropic"
        ? config.anthropicModel
        : MOCK_MODEL;

  return {
    provider: config.provider,
    model,
    temperature: config.temperature,
    maxTokens: config.maxTokens,
  };
}
