/**
 * JSON value types and helpers shared by state, repository records and tools.
 */

/**
 * Any value that survives a JSON round trip.
 */
export type JSONValue = string | number | boolean | null | { [key: string]: JSONValue } | JSONValue[]

/**
 * A JSON object.
 */
export type JSONObject = { [key: string]: JSONValue }

/**
 * Type guard for plain JSON objects (not arrays, not null).
 *
 * @param value - Value to test
 * @returns True when the value is a JSON object
 */
export function isJSONObject(value: unknown): value is JSONObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Creates a deep copy of a value by round-tripping it through JSON.
 *
 * @param value - Value to copy
 * @returns The copied value
 * @throws Error if the value cannot be serialized
 */
export function deepCopy(value: unknown): JSONValue {
  try {
    const serialized = JSON.stringify(value)
    if (serialized === undefined) {
      throw new Error(`${typeof value} has no JSON representation`)
    }
    const parsed: JSONValue = JSON.parse(serialized)
    return parsed
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error)
    throw new Error(`Unable to serialize value: ${errorMessage}`)
  }
}

/**
 * Deep copies a JSON object.
 *
 * @param value - Object to copy
 * @returns The copied object
 */
export function copyObject(value: JSONObject): JSONObject {
  const copy = deepCopy(value)
  return isJSONObject(copy) ? copy : {}
}

/**
 * Converts an arbitrary value into a JSON value, throwing when it contains something JSON cannot express.
 *
 * @param value - Value to convert
 * @param contextPath - Name used in error messages
 * @returns The JSON value
 */
export function toJSONValue(value: unknown, contextPath: string = 'value'): JSONValue {
  const replacer = (key: string, val: unknown): unknown => {
    if (typeof val === 'function' || typeof val === 'symbol') {
      throw new Error(`${contextPath}${key ? `.${key}` : ''} contains a ${typeof val} which cannot be serialized`)
    }
    if (typeof val === 'bigint') {
      return val.toString()
    }
    return val
  }
  const serialized = JSON.stringify(value ?? null, replacer)
  const parsed: JSONValue = JSON.parse(serialized)
  return parsed
}

/**
 * Looks up a dotted path (`a.b.0.c`) inside a JSON value.
 *
 * @param value - Root value
 * @param path - Dotted path; an empty path returns the root
 * @returns The value found, or undefined
 */
export function getPath(value: JSONValue | undefined, path: string): JSONValue | undefined {
  if (path === '') return value
  let current: JSONValue | undefined = value
  for (const segment of path.split('.')) {
    if (Array.isArray(current)) {
      const index = Number(segment)
      current = Number.isInteger(index) ? current[index] : undefined
    } else if (isJSONObject(current)) {
      current = current[segment]
    } else {
      return undefined
    }
  }
  return current
}

/**
 * Renders a JSON value as text: strings unchanged, everything else as JSON.
 *
 * @param value - Value to render
 * @returns Text form
 */
export function stringifyValue(value: JSONValue | undefined): string {
  if (value === undefined || value === null) return ''
  return typeof value === 'string' ? value : JSON.stringify(value)
}
