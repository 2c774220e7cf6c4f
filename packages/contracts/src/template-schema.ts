import { z } from "zod";

export const SlotNameSchema = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, {
  message: "Slot names must be identifiers.",
});

export const TemplateDefinitionSchema = z.object({
  name: z.string().min(1),
  description: z.string().default(""),
  slots: z.array(SlotNameSchema),
  defaults: z.record(z.string(), z.string()).optional(),
  body: z.string().min(1),
});

export const SlotValuesSchema = z.record(z.string(), z.string());

export const ModelProviderSchema = z.enum(["openai", "anthropic", "mock"]);

export const ModelPolicySchema = z.object({
  provider: ModelProviderSchema,
  model: z.string().min(1),
  temperature: z.number().min(0).max(2),
  maxTokens: z.number().int().positive(),
});

export type TemplateDefinition = z.infer<typeof TemplateDefinitionSchema>;
export type TemplateDefinitionInput = z.input<typeof TemplateDefinitionSchema>;
export type SlotValues = z.infer<typeof SlotValuesSchema>;
export type ModelProvider = z.infer<typeof ModelProviderSchema>;
export type ModelPolicy = z.infer<typeof ModelPolicySchema>;
