import {
  TemplateDefinitionSchema,
  type SlotValues,
  type TemplateDefinition,
  type TemplateDefinitionInput,
} from "@promptsmith/contracts";
import { InvalidTemplateError, UnknownTemplateError } from "../errors.js";
import {
  collectTemplateTokens,
  interpolateTemplate,
} from "../orchestrator/interpolate-template.js";
import { PROMPT_ENGINEERING_TEMPLATES } from "./templates/prompt-engineering.js";
import { SOFTWARE_HOUSE_TEMPLATES } from "./templates/software-house.js";

export type RegisteredTemplate = Readonly<
  Omit<TemplateDefinition, "slots" | "defaults"> & {
    slots: readonly string[];
    defaults?: Readonly<Record<string, string>> | undefined;
  }
>;

function validateDefinition(input: TemplateDefinitionInput): RegisteredTemplate {
  const parsed = TemplateDefinitionSchema.safeParse(input);
  if (!parsed.success) {
    const reason = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "definition"}: ${issue.message}`)
      .join("; ");
    throw new InvalidTemplateError(input.name || "<unnamed>", reason);
  }

  const definition = parsed.data;
  const slots = new Set(definition.slots);
  if (slots.size !== definition.slots.length) {
    throw new InvalidTemplateError(definition.name, "slot names must be unique.");
  }

  for (const token of collectTemplateTokens(definition.body)) {
    if (!slots.has(token)) {
      throw new InvalidTemplateError(
        definition.name,
        `placeholder '{{${token}}}' is not a declared slot.`,
      );
    }
  }

  for (const key of Object.keys(definition.defaults ?? {})) {
    if (!slots.has(key)) {
      throw new InvalidTemplateError(definition.name, `default '${key}' is not a declared slot.`);
    }
  }

  const { defaults, ...rest } = definition;
  return Object.freeze({
    ...rest,
    slots: Object.freeze([...definition.slots]),
    ...(defaults ? { defaults: Object.freeze({ ...defaults }) } : {}),
  });
}

/**
 * Immutable registry of named templates. Built once; every definition it returns is frozen.
 */
export class TemplateCatalog {
  private readonly templates: ReadonlyMap<string, RegisteredTemplate>;

  constructor(definitions: readonly TemplateDefinitionInput[]) {
    const templates = new Map<string, RegisteredTemplate>();
    for (const input of definitions) {
      const definition = validateDefinition(input);
      if (templates.has(definition.name)) {
        throw new InvalidTemplateError(definition.name, "duplicate template name.");
      }
      templates.set(definition.name, definition);
    }
    this.templates = templates;
  }

  has(name: string): boolean {
    return this.templates.has(name);
  }

  get(name: string): RegisteredTemplate {
    const template = this.templates.get(name);
    if (!template) {
      throw new UnknownTemplateError(name);
    }
    return template;
  }

  names(): string[] {
    return [...this.templates.keys()];
  }

  list(): RegisteredTemplate[] {
    return [...this.templates.values()];
  }

  render(templateName: string, slotValues: SlotValues = {}): string {
    const template = this.get(templateName);
    return interpolateTemplate(template.body, slotValues, template.defaults ?? {});
  }
}

export function createDefaultCatalog(): TemplateCatalog {
  return new TemplateCatalog([...PROMPT_ENGINEERING_TEMPLATES, ...SOFTWARE_HOUSE_TEMPLATES]);
}
