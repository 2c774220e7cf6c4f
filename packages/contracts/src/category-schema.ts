import { z } from "zod";
import { SlotNameSchema } from "./template-schema.js";

export const CategoryFieldSchema = z.object({
  name: SlotNameSchema,
  question: z.string().min(1),
  default: z.string().default(""),
});

export const CategorySchema = z.object({
  id: z.string().min(1),
  label: z.string().min(1),
  fields: z.array(CategoryFieldSchema),
  options: z.array(z.string().min(1)).length(3),
});

export const CategoryCatalogSchema = z.object({
  categories: z.array(CategorySchema).min(1),
});

export type CategoryField = z.infer<typeof CategoryFieldSchema>;
export type Category = z.infer<typeof CategorySchema>;
