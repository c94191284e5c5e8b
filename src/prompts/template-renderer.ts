/**
 * Template rendering for the research prompts.
 * Placeholders are Mustache-style: {{variableName}}
 *
 * Values render as:
 * - strings and numbers as is
 * - string arrays one item per line
 * - other objects as pretty JSON
 */

export type TemplateValue = string | number | boolean | readonly string[] | object;

export type TemplateVariables = Record<string, TemplateValue>;

const PLACEHOLDER = /\{\{\s*([\w.]+)\s*\}\}/g;

function formatValue(value: TemplateValue): string {
  if (Array.isArray(value)) {
    return value.join('\n');
  }
  if (typeof value === 'object') {
    return JSON.stringify(value, null, 2);
  }
  return String(value);
}

/**
 * Replaces every {{name}} placeholder with its value.
 * @throws Error if a placeholder has no value
 */
export function renderTemplate(template: string, variables: TemplateVariables): string {
  return template.replace(PLACEHOLDER, (_match: string, name: string) => {
    const value = variables[name];
    if (value === undefined) {
      throw new Error(
        `Template variable '${name}' is not defined. Available variables: ${Object.keys(variables).join(', ')}`
      );
    }
    return formatValue(value);
  });
}
