const PLACEHOLDER = /\{\{\s*([a-zA-Z]+)\s*\}\}/g;

/**
 * Substitutes `{{name}}` placeholders. An unknown placeholder is an error
 * rather than an empty string, so a typo never renders a broken path.
 */
export function renderTemplate(template: string, values: Readonly<Record<string, string>>): string {
  return template.replace(PLACEHOLDER, (_match, name: string) => {
    const value = values[name];
    if (value === undefined) {
      throw new Error(`Unknown placeholder {{${name}}} in template`);
    }
    return value;
  });
}
