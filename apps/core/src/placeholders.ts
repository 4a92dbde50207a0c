import { PlaceholderMissingError } from "./errors.js";

/** `{identifier}`; brace text that is not a bare identifier is left untouched. */
const PLACEHOLDER_PATTERN = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

export type SubstitutionValues = Readonly<Record<string, string>>;

/** Placeholder keys referenced by a template, in order of first appearance. */
export function listPlaceholders(template: string): string[] {
  const keys: string[] = [];
  for (const match of template.matchAll(PLACEHOLDER_PATTERN)) {
    if (!keys.includes(match[1])) keys.push(match[1]);
  }
  return keys;
}

/**
 * Replace every `{key}` in the template with its value.
 * Values are inserted verbatim and are not scanned again.
 */
export function resolvePlaceholders(template: string, values: SubstitutionValues, field: string): string {
  return template.replace(PLACEHOLDER_PATTERN, (_whole, key: string) => {
    if (!Object.hasOwn(values, key)) {
      throw new PlaceholderMissingError(key, field);
    }
    return values[key];
  });
}
