import { ConfigError } from '../shared/errors';

export type TemplateVariables = ReadonlyMap<string, string>;

/**
 * `{{ name }}` placeholders. Names are letters, digits, `_`, `-` and `.`;
 * whitespace inside the braces is ignored.
 */
const PLACEHOLDER_PATTERN = /\{\{\s*([A-Za-z0-9_.-]+)\s*\}\}/g;

/**
 * Replace `{{name}}` placeholders with values from the mapping.
 * Unknown names are left verbatim, braces included.
 */
export function renderTemplate(input: string, vars: TemplateVariables): string {
  if (vars.size === 0) {
    return input;
  }

  return input.replace(PLACEHOLDER_PATTERN, (match: string, name: string) => vars.get(name) ?? match);
}

/**
 * Builds the variable mapping from repeated `key=value` entries.
 *
 * Each entry splits on the first `=`; the key is trimmed and must not be
 * empty, the value is kept verbatim. Later keys overwrite earlier ones.
 */
export function parseTemplateVariables(entries: readonly string[]): TemplateVariables {
  const vars = new Map<string, string>();

  for (const entry of entries) {
    const separator = entry.indexOf('=');
    if (separator === -1) {
      throw new ConfigError(`invalid --var "${entry}", expected key=value`);
    }

    const key = entry.slice(0, separator).trim();
    if (!key) {
      throw new ConfigError('template variable names cannot be empty');
    }

    vars.set(key, entry.slice(separator + 1));
  }

  return vars;
}
