/**
 * Template variable interpolation utility
 *
 * Replaces {{variableName}} patterns (whitespace inside the braces allowed)
 * with values from a variables object. Every placeholder must be supplied.
 */

import { TemplateError } from "../../errors.js";

const PLACEHOLDER = /\{\{\s*(\w+)\s*\}\}/g;

/**
 * Names of all placeholders in a template, in first-appearance order.
 */
export function findPlaceholders(template: string): string[] {
  const names = new Set<string>();
  for (const match of template.matchAll(PLACEHOLDER)) {
    names.add(match[1]);
  }
  return [...names];
}

/**
 * Render a template by explicit key lookup.
 *
 * @throws TemplateError listing every placeholder absent from `variables`
 *
 * @example
 * renderTemplate("Hi {{ recipient_name }}", { recipient_name: "Jane" }) // "Hi Jane"
 */
export function renderTemplate(template: string, variables: Readonly<Record<string, string>>): string {
  const missing = findPlaceholders(template).filter((name) => !Object.hasOwn(variables, name));
  if (missing.length > 0) {
    throw new TemplateError(missing);
  }

  return template.replace(PLACEHOLDER, (_match, key: string) => variables[key]);
}
