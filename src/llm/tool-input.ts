import { createLogger } from '../logging/logger.js'
import { toJSONValue, type JSONValue } from '../types/json.js'

const log = createLogger('llm')

/**
 * Parses the JSON arguments of a tool call. Arguments that are not valid JSON are passed on as the raw string so
 * the tool can report the problem back to the model.
 *
 * @param raw - Argument string as sent by the provider
 * @returns Parsed input
 */
export function parseToolInput(raw: string): JSONValue {
  if (raw.trim() === '') return {}
  try {
    return toJSONValue(JSON.parse(raw))
  } catch (error) {
    log.warn('tool call arguments are not valid JSON', { raw, error })
    return raw
  }
}
