import { readFile } from "node:fs/promises";
import {
  CategoryCatalogSchema,
  type Category,
  type Refinement,
  type SlotValues,
} from "@promptsmith/contracts";
import { InvalidTemplateError, UnknownCategoryError } from "../errors.js";
import {
  collectTemplateTokens,
  interpolateTemplate,
} from "../orchestrator/interpolate-template.js";

export const DEFAULT_CATEGORIES_PATH = new URL("../../data/categories.json", import.meta.url);

export const PROMPT_ENGINEERING_CATEGORY = "prompt-engineering";

export class CategoryCatalog {
  private readonly categories: ReadonlyMap<string, Category>;

  constructor(categories: readonly Category[]) {
    const byId = new Map<string, Category>();
    for (const category of categories) {
      const fieldNames = new Set(category.fields.map((field) => field.name));
      for (const option of category.options) {
        for (const token of collectTemplateTokens(option)) {
          if (!fieldNames.has(token)) {
            throw new InvalidTemplateError(
              category.id,
              `option placeholder '{{${token}}}' is not a category field.`,
            );
          }
        }
      }
      if (byId.has(category.id)) {
        throw new InvalidTemplateError(category.id, "duplicate category id.");
      }
      byId.set(category.id, category);
    }
    this.categories = byId;
  }

  list(): Category[] {
    return [...this.categories.values()];
  }

  get(id: string): Category {
    const category = this.categories.get(id);
    if (!category) {
      throw new UnknownCategoryError(id);
    }
    return category;
  }

  buildPromptOptions(id: string, details: SlotValues): string[] {
    const category = this.get(id);
    const defaults: Record<string, string> = {};
    for (const field of category.fields) {
      defaults[field.name] = field.default;
    }
    return category.options.map((option) => interpolateTemplate(option, details, defaults));
  }
}

export async function loadCategoryCatalog(
  path: string | URL = DEFAULT_CATEGORIES_PATH,
): Promise<CategoryCatalog> {
  const raw = await readFile(path, "utf8");
  const parsed = CategoryCatalogSchema.parse(JSON.parse(raw));
  return new CategoryCatalog(parsed.categories);
}

export function refinePrompt(prompt: string, refinement: Refinement): string {
  switch (refinement.kind) {
    case "details":
      return `${prompt} Additional details: ${refinement.text}`;
    case "tone":
      return `${prompt} Use a ${refinement.text} tone/style.`;
    case "requirements":
      return `${prompt} Specific requirements: ${refinement.text}`;
    case "none":
      return prompt;
  }
}
