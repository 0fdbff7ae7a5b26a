import { z } from 'zod'

/**
 * Converts a Zod schema to JSON Schema format.
 * Strips the $schema property to reduce token usage.
 *
 * @param schema - The Zod schema to convert
 * @returns JSON Schema representation
 */
export function zodSchemaToJsonSchema(schema: z.ZodType): Record<string, unknown> {
  const { $schema: _$schema, ...jsonSchema } = z.toJSONSchema(schema)
  return jsonSchema
}

/**
 * Flattens a Zod error into one line naming each offending field.
 *
 * @param error - Validation error
 * @returns e.g. `keywords: Too small; prompt: Required`
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.map(String).join('.')
      return path ? `${path}: ${issue.message}` : issue.message
    })
    .join('; ')
}
