const TEMPLATE_TOKEN_REGEX = /{{\s*([^}]+?)\s*}}/g;

export function collectTemplateTokens(template: string): string[] {
  const tokens: string[] = [];
  for (const match of template.matchAll(TEMPLATE_TOKEN_REGEX)) {
    const raw = match[1];
    if (raw && !tokens.includes(raw.trim())) {
      tokens.push(raw.trim());
    }
  }
  return tokens;
}

function ownValue(record: Readonly<Record<string, string>>, key: string): string | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}

/**
 * Fills `{{ slot }}` tokens in one pass. A slot missing from `variables` takes its
 * entry in `defaults`, or the empty string.
 */
export function interpolateTemplate(
  template: string,
  variables: Readonly<Record<string, string>>,
  defaults: Readonly<Record<string, string>> = {},
): string {
  return template.replace(TEMPLATE_TOKEN_REGEX, (_match, rawKey: string) => {
    const key = rawKey.trim();
    return ownValue(variables, key) ?? ownValue(defaults, key) ?? "";
  });
}
