/**
 * Placeholder substitution for prompts and templates.
 *
 * Prompts use single braces naming a context variable (`{source_material}`). Templates use double braces around a
 * dotted path into a data object (`{{ temp_state.topic }}`).
 */

import { getPath, stringifyValue, type JSONObject } from '../types/json.js'

const PROMPT_VARIABLE = /\{([a-z_]+)\}/g
const TEMPLATE_EXPRESSION = /\{\{\s*([a-zA-Z_][\w.]*)\s*\}\}/g

/**
 * Extracts the variable names a prompt refers to.
 *
 * @param prompt - Prompt with `{name}` placeholders
 * @returns Unique names in order of first appearance
 */
export function extractPromptVariables(prompt: string): string[] {
  return unique([...prompt.matchAll(PROMPT_VARIABLE)].map((match) => match[1] ?? ''))
}

/**
 * Replaces `{name}` placeholders. Placeholders without a value are left unchanged.
 *
 * @param prompt - Prompt with placeholders
 * @param values - Value per variable name
 * @returns The formatted prompt
 */
export function formatPrompt(prompt: string, values: Readonly<Record<string, string>>): string {
  return prompt.replace(PROMPT_VARIABLE, (match, name: string) => values[name] ?? match)
}

/**
 * Extracts the paths a template refers to.
 *
 * @param template - Template with `{{ path }}` expressions
 * @returns Unique paths in order of first appearance
 */
export function extractTemplatePaths(template: string): string[] {
  return unique([...template.matchAll(TEMPLATE_EXPRESSION)].map((match) => match[1] ?? ''))
}

/**
 * Renders `{{ path }}` expressions against a data object. Missing paths render as an empty string, objects as JSON.
 *
 * @param template - Template with expressions
 * @param data - Root object paths are resolved against
 * @returns The rendered text
 */
export function renderTemplate(template: string, data: JSONObject): string {
  return template.replace(TEMPLATE_EXPRESSION, (_match, path: string) => stringifyValue(getPath(data, path)))
}

function unique(values: string[]): string[] {
  return Array.from(new Set(values))
}
