export type TemplateValues = Record<string, string | number>;

/**
 * Replace `{name}` placeholders; unknown placeholders are left as written
 */
export function renderTemplate(template: string, values: TemplateValues): string {
  return template.replace(/\{([a-zA-Z][a-zA-Z0-9_]*)\}/g, (placeholder, name: string) => {
    const value = values[name];
    return value === undefined ? placeholder : String(value);
  });
}
