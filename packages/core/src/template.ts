const PLACEHOLDER = /\{\{(\w+)\}\}/g;

/** Placeholder names in order of first appearance */
export function placeholders(template: string): string[] {
  return [...new Set([...template.matchAll(PLACEHOLDER)].map((m) => m[1]))];
}

/**
 * Fills every `{{name}}` from `values`. Values are inserted literally; a
 * placeholder without a value throws.
 */
export function fillTemplate(template: string, values: Readonly<Record<string, string>>): string {
  const missing = placeholders(template).filter((name) => values[name] === undefined);
  if (missing.length > 0) {
    throw new Error(`Missing template values: ${missing.join(', ')}`);
  }
  return template.replace(PLACEHOLDER, (_, name: string) => values[name]);
}
