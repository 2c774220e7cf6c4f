export type PromptsmithErrorCode =
  | "UNKNOWN_TEMPLATE"
  | "INVALID_TEMPLATE"
  | "MODEL_UNAVAILABLE"
  | "PROVIDER_NOT_CONFIGURED"
  | "UNKNOWN_CATEGORY"
  | "CONFIG_INVALID";

export class PromptsmithError extends Error {
  constructor(
    public readonly code: PromptsmithErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UnknownTemplateError extends PromptsmithError {
  constructor(public readonly templateName: string) {
    super("UNKNOWN_TEMPLATE", `Unknown template '${templateName}'.`);
  }
}

export class InvalidTemplateError extends PromptsmithError {
  constructor(
    public readonly templateName: string,
    reason: string,
  ) {
    super("INVALID_TEMPLATE", `Template '${templateName}' is invalid: ${reason}`);
  }
}

/**
 * Wraps whatever the model endpoint threw. The message is the endpoint's own.
 */
export class ModelUnavailableError extends PromptsmithError {
  constructor(cause: unknown) {
    super(
      "MODEL_UNAVAILABLE",
      cause instanceof Error ? cause.message : String(cause),
      { cause },
    );
  }
}

export class ProviderNotConfiguredError extends PromptsmithError {
  constructor(public readonly provider: string) {
    super("PROVIDER_NOT_CONFIGURED", `Provider '${provider}' is not configured.`);
  }
}

export class UnknownCategoryError extends PromptsmithError {
  constructor(public readonly categoryId: string) {
    super("UNKNOWN_CATEGORY", `Unknown category '${categoryId}'.`);
  }
}

export class ConfigError extends PromptsmithError {
  constructor(public readonly issues: string[]) {
    super("CONFIG_INVALID", `Invalid configuration: ${issues.join("; ")}`);
  }
}
