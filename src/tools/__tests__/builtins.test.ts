import { describe, it, expect, beforeEach } from 'vitest'
import { ZodError } from 'zod'
import {
  BUILT_IN_TOOL_SLUGS,
  appendToParticipantData,
  calculator,
  endSession,
  getBuiltInTools,
  getSessionState,
  incrementCounter,
  setSessionState,
  updateParticipantData,
} from '../builtins.js'
import { formatToolResult, type ToolContext } from '../tool.js'
import { AbortPipelineSignal } from '../../flow-control.js'
import { PipelineState, StateDraft } from '../../pipeline/state.js'
import { InMemoryRepository } from '../../repository/in-memory-repository.js'
import { createSession } from '../../__fixtures__/pipeline-helpers.js'

function createContext(init: { participantData?: Record<string, string>; sessionState?: Record<string, number> } = {}) {
  const session = createSession()
  const state = PipelineState.create({
    session,
    input: 'hello',
    participantData: init.participantData ?? {},
    sessionState: init.sessionState ?? {},
  })
  const context: ToolContext = { draft: new StateDraft(state), repository: new InMemoryRepository(), session }
  return context
}

describe('built-in tools', () => {
  let context: ToolContext

  beforeEach(() => {
    context = createContext({ participantData: { name: 'Ada' }, sessionState: { counter_visits: 2 } })
  })

  describe('update-user-data', () => {
    it('sets a key of the participant data', async () => {
      const result = await updateParticipantData.invoke({ key: 'city', value: 'Paris' }, context)

      expect(result).toBe('city updated')
      expect(context.draft.toUpdate().participantData).toStrictEqual({ name: 'Ada', city: 'Paris' })
    })

    it('rejects invalid input', async () => {
      await expect(updateParticipantData.invoke({ key: '' }, context)).rejects.toThrow(ZodError)
    })
  })

  describe('append-to-participant-data', () => {
    it('turns a scalar into a list', async () => {
      const result = await appendToParticipantData.invoke({ key: 'name', value: 'Lovelace' }, context)

      expect(result).toStrictEqual(['Ada', 'Lovelace'])
    })

    it('creates the list when the key is missing', async () => {
      const result = await appendToParticipantData.invoke({ key: 'tags', value: 'vip' }, context)

      expect(result).toStrictEqual(['vip'])
    })
  })

  describe('increment-counter', () => {
    it('adds one by default', async () => {
      expect(await incrementCounter.invoke({ counter: 'visits' }, context)).toBe(3)
      expect(context.draft.toUpdate().sessionState).toStrictEqual({ counter_visits: 3 })
    })

    it('starts a new counter from zero', async () => {
      expect(await incrementCounter.invoke({ counter: 'errors', value: 5 }, context)).toBe(5)
    })
  })

  describe('session state', () => {
    it('stores and reads values', async () => {
      expect(await setSessionState.invoke({ key: 'plan', value: { tier: 'gold' } }, context)).toBe('plan stored')
      expect(await getSessionState.invoke({ key: 'plan.tier' }, context)).toBe('gold')
    })

    it('reads missing keys as null', async () => {
      expect(await getSessionState.invoke({ key: 'missing' }, context)).toBeNull()
    })
  })

  describe('calculator', () => {
    it('evaluates expressions', async () => {
      expect(await calculator.invoke({ expression: '2 + 3 * 4' }, context)).toBe('14')
      expect(await calculator.invoke({ expression: 'sqrt(16) / 2' }, context)).toBe('2')
    })

    it('applies the precision', async () => {
      expect(await calculator.invoke({ expression: '1 / 3', precision: 3 }, context)).toBe('0.333')
    })

    it('surfaces syntax errors', async () => {
      await expect(calculator.invoke({ expression: '2 +' }, context)).rejects.toThrow()
    })
  })

  describe('end-session', () => {
    it('aborts the run with the message', async () => {
      const result = endSession.invoke({ message: 'Goodbye!' }, context)

      await expect(result).rejects.toBeInstanceOf(AbortPipelineSignal)
      await expect(result).rejects.toMatchObject({ message: 'Goodbye!', tag: 'end-session' })
    })
  })
})

describe('getBuiltInTools', () => {
  it('returns tools in the requested order without duplicates', () => {
    const tools = getBuiltInTools(['calculator', 'end-session', 'calculator'])

    expect(tools.map((tool) => tool.name)).toStrictEqual(['calculator', 'end-session'])
  })

  it('knows every slug', () => {
    expect(getBuiltInTools(BUILT_IN_TOOL_SLUGS).map((tool) => tool.name)).toStrictEqual([...BUILT_IN_TOOL_SLUGS])
  })

  it('publishes a JSON schema for the model', () => {
    const [tool] = getBuiltInTools(['get-session-state'])

    expect(tool?.toolSpec.inputSchema).toMatchObject({ type: 'object', required: ['key'] })
  })
})

describe('formatToolResult', () => {
  it('passes strings through and serialises everything else', () => {
    expect(formatToolResult('done')).toBe('done')
    expect(formatToolResult({ ok: true })).toBe('{"ok":true}')
    expect(formatToolResult(null)).toBe('null')
  })
})
