/**
 * Built-in tools, selected by slug in a response node's `tools` parameter.
 */

import { evaluate, format } from 'mathjs'
import { z } from 'zod'
import { AbortPipelineSignal } from '../flow-control.js'
import { getPath, type JSONValue } from '../types/json.js'
import { tool, type PipelineTool } from './tool.js'

const JsonValueSchema: z.ZodType<JSONValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ])
)

export const BUILT_IN_TOOL_SLUGS = [
  'update-user-data',
  'append-to-participant-data',
  'increment-counter',
  'set-session-state',
  'get-session-state',
  'calculator',
  'end-session',
] as const

export type BuiltInToolSlug = (typeof BUILT_IN_TOOL_SLUGS)[number]

export const updateParticipantData = tool({
  name: 'update-user-data',
  description: 'Update a value in the stored data about the user.',
  inputSchema: z.object({
    key: z.string().min(1).describe('Key of the value to update'),
    value: JsonValueSchema.describe('New value'),
  }),
  callback: ({ key, value }, { draft }) => {
    draft.setParticipantData({ ...draft.participantData, [key]: value })
    return `${key} updated`
  },
})

export const appendToParticipantData = tool({
  name: 'append-to-participant-data',
  description: 'Append a value to a list in the stored data about the user. Creates the list when missing.',
  inputSchema: z.object({
    key: z.string().min(1),
    value: JsonValueSchema,
  }),
  callback: ({ key, value }, { draft }) => {
    const current = draft.participantData[key]
    const list: JSONValue[] = Array.isArray(current) ? [...current] : current === undefined ? [] : [current]
    list.push(value)
    draft.setParticipantData({ ...draft.participantData, [key]: list })
    return list
  },
})

export const incrementCounter = tool({
  name: 'increment-counter',
  description: 'Increment a named counter stored in the session state and return its new value.',
  inputSchema: z.object({
    counter: z.string().min(1),
    value: z.number().int().default(1),
  }),
  callback: ({ counter, value }, { draft }) => {
    const key = `counter_${counter}`
    const current = draft.sessionState[key]
    const next = (typeof current === 'number' ? current : 0) + value
    draft.setSessionStateKey(key, next)
    return next
  },
})

export const setSessionState = tool({
  name: 'set-session-state',
  description: 'Store a value in the session state.',
  inputSchema: z.object({
    key: z.string().min(1),
    value: JsonValueSchema,
  }),
  callback: ({ key, value }, { draft }) => {
    draft.setSessionStateKey(key, value)
    return `${key} stored`
  },
})

export const getSessionState = tool({
  name: 'get-session-state',
  description: 'Read a value from the session state. Dotted keys read nested values.',
  inputSchema: z.object({
    key: z.string().min(1),
  }),
  callback: ({ key }, { draft }) => getPath(draft.sessionState, key) ?? null,
})

export const calculator = tool({
  name: 'calculator',
  description: 'Evaluate a mathematical expression, e.g. "2 + 3 * 4" or "sqrt(16) / 2".',
  inputSchema: z.object({
    expression: z.string().min(1),
    precision: z.number().int().positive().max(64).default(14),
  }),
  callback: ({ expression, precision }) => {
    const result: unknown = evaluate(expression)
    return format(result, { precision })
  },
})

export const endSession = tool({
  name: 'end-session',
  description: 'End the conversation, replying with a final message to the user.',
  inputSchema: z.object({
    message: z.string().min(1).describe('Final message to the user'),
  }),
  callback: ({ message }) => {
    throw new AbortPipelineSignal(message, 'end-session')
  },
})

const BUILT_IN_TOOLS: Record<BuiltInToolSlug, PipelineTool> = {
  'update-user-data': updateParticipantData,
  'append-to-participant-data': appendToParticipantData,
  'increment-counter': incrementCounter,
  'set-session-state': setSessionState,
  'get-session-state': getSessionState,
  calculator,
  'end-session': endSession,
}

/**
 * Looks up built-in tools by slug.
 *
 * @param slugs - Slugs in the order the node lists them
 * @returns The tools, without duplicates
 */
export function getBuiltInTools(slugs: readonly BuiltInToolSlug[]): PipelineTool[] {
  return [...new Set(slugs)].map((slug) => BUILT_IN_TOOLS[slug])
}
