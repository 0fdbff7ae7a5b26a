import { describe, it, expect } from 'vitest'
import { PipelineNodeBuildError, PipelineNodeRunError } from '../../errors.js'
import { AbortPipelineSignal } from '../../flow-control.js'
import { assistantMessage } from '../../types/messages.js'
import { NodeKind } from '../params.js'
import {
  createRepository,
  createSession,
  createState,
  createTestNode,
  llmParams,
  runNode,
} from '../../__fixtures__/pipeline-helpers.js'

const DEFAULT_REPLY = 'Sorry, something went wrong while generating a response.'

function seedHandbook(repository: ReturnType<typeof createRepository>['repository']) {
  return repository.addCollection({ id: 1, name: 'Handbook', summary: 'HR policies', isIndex: true }, [
    {
      id: 11,
      name: 'leave.md',
      summary: 'Leave policy',
      contentType: 'text/markdown',
      content: 'Annual leave is 25 days',
    },
  ])
}

describe('LlmResponseNode', () => {
  it('answers with the model reply', async () => {
    const { repository, model } = createRepository()
    model.addTurn('Hello!')
    const node = createTestNode({ id: 'llm', type: NodeKind.LLM_RESPONSE, params: llmParams() }, repository)

    const update = await runNode(node, createState({ input: 'hi' }))

    expect(update).toStrictEqual({ output: 'Hello!', message: assistantMessage('Hello!') })
    expect(model.requests).toStrictEqual([
      { systemPrompt: 'You are a helpful assistant.', messages: [{ role: 'user', content: 'hi' }] },
    ])
  })

  it('passes model parameters to the provider', async () => {
    const { repository, model, service } = createRepository()
    model.addTurn('ok')
    const node = createTestNode(
      { id: 'llm', type: NodeKind.LLM_RESPONSE, params: llmParams({ llmModelParameters: { temperature: 0.2 } }) },
      repository
    )

    await runNode(node, createState())

    expect(service.modelRequests).toStrictEqual([{ modelName: 'test-model', parameters: { temperature: 0.2 } }])
  })

  it('fills prompt variables from the state', async () => {
    const { repository, model } = createRepository()
    model.addTurn('ok')
    const node = createTestNode(
      {
        id: 'llm',
        type: NodeKind.LLM_RESPONSE,
        params: llmParams({ prompt: 'Data: {participant_data}. Session: {session_state}. Input: {input}' }),
      },
      repository
    )

    await runNode(node, createState({ input: 'hi', participantData: { name: 'Ada' }, sessionState: { step: 2 } }))

    expect(model.requests[0]?.systemPrompt).toBe('Data: {"name":"Ada"}. Session: {"step":2}. Input: hi')
  })

  it('lists collection files for {media}', async () => {
    const { repository, model } = createRepository()
    seedHandbook(repository)
    model.addTurn('ok')
    const node = createTestNode(
      { id: 'llm', type: NodeKind.LLM_RESPONSE, params: llmParams({ prompt: 'Files:\n{media}', collectionId: 1 }) },
      repository
    )

    await runNode(node, createState())

    expect(model.requests[0]?.systemPrompt).toBe('Files:\n* File (id=11, content_type=text/markdown): Leave policy')
  })

  describe('tools', () => {
    it('runs requested tools and returns their effects', async () => {
      const { repository, model } = createRepository()
      model
        .addTurn({ toolCalls: [{ id: 't1', name: 'increment-counter', input: { counter: 'visits' } }] })
        .addTurn('Counted')
      const node = createTestNode(
        { id: 'llm', type: NodeKind.LLM_RESPONSE, params: llmParams({ tools: ['increment-counter'] }) },
        repository
      )

      const update = await runNode(node, createState({ input: 'count me' }))

      expect(update).toStrictEqual({
        output: 'Counted',
        message: assistantMessage('Counted'),
        sessionState: { counter_visits: 1 },
      })
      expect(model.requests[1]?.messages).toStrictEqual([
        { role: 'user', content: 'count me' },
        {
          role: 'assistant',
          content: '',
          toolCalls: [{ id: 't1', name: 'increment-counter', input: { counter: 'visits' } }],
        },
        { role: 'tool', toolCallId: 't1', toolName: 'increment-counter', content: '1' },
      ])
      expect(model.requests.map((request) => request.tools?.map((tool) => tool.name))).toStrictEqual([
        ['increment-counter'],
        ['increment-counter'],
      ])
    })

    it('reports unknown tools and tool errors back to the model', async () => {
      const { repository, model } = createRepository()
      model
        .addTurn({
          toolCalls: [
            { id: 't1', name: 'nope', input: {} },
            { id: 't2', name: 'calculator', input: { expression: 42 } },
          ],
        })
        .addTurn('Sorry')
      const node = createTestNode(
        { id: 'llm', type: NodeKind.LLM_RESPONSE, params: llmParams({ tools: ['calculator'] }) },
        repository
      )

      await runNode(node, createState())

      const toolMessages = model.requests[1]?.messages.filter((message) => message.role === 'tool')
      expect(toolMessages?.[0]).toStrictEqual({
        role: 'tool',
        toolCallId: 't1',
        toolName: 'nope',
        content: "Error: unknown tool 'nope'",
      })
      expect(toolMessages?.[1]?.content).toMatch(/^Error: /)
    })

    it('makes the last call without tools once the iteration budget is spent', async () => {
      const { repository, model } = createRepository()
      model
        .addTurn({ toolCalls: [{ id: 't1', name: 'calculator', input: { expression: '1 + 1' } }] })
        .addTurn({ toolCalls: [{ id: 't2', name: 'calculator', input: { expression: '2 + 2' } }], text: 'It is 2' })
      const node = createTestNode(
        { id: 'llm', type: NodeKind.LLM_RESPONSE, params: llmParams({ tools: ['calculator'] }) },
        repository
      )

      const update = await runNode(node, createState(), { config: { maxToolIterations: 1 } })

      expect(update.output).toBe('It is 2')
      expect(model.requests[1]?.tools).toBeUndefined()
    })

    it('lets the end-session tool abort the run', async () => {
      const { repository, model } = createRepository()
      model.addTurn({ toolCalls: [{ id: 't1', name: 'end-session', input: { message: 'Goodbye' } }] })
      const node = createTestNode(
        { id: 'llm', type: NodeKind.LLM_RESPONSE, params: llmParams({ tools: ['end-session'] }) },
        repository
      )

      await expect(runNode(node, createState())).rejects.toBeInstanceOf(AbortPipelineSignal)
    })

    it('attaches cited files to the session', async () => {
      const { repository, model } = createRepository()
      seedHandbook(repository)
      model.addTurn({ toolCalls: [{ id: 't1', name: 'file-search', input: { query: 'leave' } }] }).addTurn('25 days')
      const node = createTestNode(
        { id: 'llm', type: NodeKind.LLM_RESPONSE, params: llmParams({ collectionIndexIds: [1] }) },
        repository
      )

      await runNode(node, createState())

      expect(model.requests[1]?.messages.at(-1)).toStrictEqual({
        role: 'tool',
        toolCallId: 't1',
        toolName: 'file-search',
        content: '<file id="11" name="leave.md">\nAnnual leave is 25 days\n</file>',
      })
      expect(repository.attachments).toStrictEqual([{ sessionId: 'session-1', type: 'file_citation', fileIds: [11] }])
    })

    it('skips citations when they are disabled', async () => {
      const { repository, model } = createRepository()
      seedHandbook(repository)
      model.addTurn({ toolCalls: [{ id: 't1', name: 'file-search', input: { query: 'leave' } }] }).addTurn('25 days')
      const node = createTestNode(
        {
          id: 'llm',
          type: NodeKind.LLM_RESPONSE,
          params: llmParams({ collectionIndexIds: [1], generateCitations: false }),
        },
        repository
      )

      await runNode(node, createState())

      expect(repository.attachments).toStrictEqual([])
    })
  })

  describe('history', () => {
    it('replays global history, then messages from earlier nodes', async () => {
      const { repository, model } = createRepository()
      const session = createSession()
      repository.addSessionMessage(session, { role: 'user', content: 'earlier' })
      repository.addSessionMessage(session, { role: 'assistant', content: 'earlier reply' })
      const inbound = repository.addSessionMessage(session, { role: 'user', content: 'hello' })
      model.addTurn('ok')
      const node = createTestNode(
        { id: 'llm', type: NodeKind.LLM_RESPONSE, params: llmParams({ historyType: 'global' }) },
        repository
      )
      const state = createState({ input: 'hello', inputMessageId: inbound.id })
      state.apply('greeter', 'greeter', { output: 'Welcome back', message: assistantMessage('Welcome back') })

      await runNode(node, state, { incoming: ['greeter'] })

      expect(model.requests[0]?.messages).toStrictEqual([
        { role: 'user', content: 'earlier' },
        { role: 'assistant', content: 'earlier reply' },
        { role: 'assistant', content: 'Welcome back' },
        { role: 'user', content: 'Welcome back' },
      ])
    })

    it('keeps node history across runs', async () => {
      const { repository, model } = createRepository()
      model.addTurn('First answer').addTurn('Second answer')
      const node = createTestNode(
        { id: 'llm', type: NodeKind.LLM_RESPONSE, params: llmParams({ historyType: 'node' }) },
        repository
      )

      await runNode(node, createState({ input: 'first' }))
      await runNode(node, createState({ input: 'second' }))

      expect(model.requests[1]?.messages).toStrictEqual([
        { role: 'user', content: 'first' },
        { role: 'assistant', content: 'First answer' },
        { role: 'user', content: 'second' },
      ])
    })

    it('summarises history beyond the maximum length', async () => {
      const { repository, model } = createRepository()
      model.addTurn('First answer').addTurn('Second answer').addTurn('They said hello.').addTurn('Third answer')
      const node = createTestNode(
        {
          id: 'llm',
          type: NodeKind.LLM_RESPONSE,
          params: llmParams({ historyType: 'named', historyName: 'support', maxHistoryLength: 1 }),
        },
        repository
      )

      await runNode(node, createState({ input: 'first' }))
      await runNode(node, createState({ input: 'second' }))
      await runNode(node, createState({ input: 'third' }))

      expect(model.requests[2]?.messages).toStrictEqual([{ role: 'user', content: 'Human: first\nAI: First answer' }])
      expect(model.requests[3]?.messages).toStrictEqual([
        { role: 'system', content: 'They said hello.' },
        { role: 'user', content: 'second' },
        { role: 'assistant', content: 'Second answer' },
        { role: 'user', content: 'third' },
      ])
      const checkpoint = repository.calls.find((call) => call.method === 'saveCompressionCheckpoint')
      expect(checkpoint?.args[1]).toStrictEqual({ kind: 'summary', text: 'They said hello.' })
    })
  })

  describe('model failures', () => {
    it('replies with the configured fallback', async () => {
      const { repository, model } = createRepository()
      model.addTurn(new Error('timeout'))
      const node = createTestNode({ id: 'llm', type: NodeKind.LLM_RESPONSE, params: llmParams() }, repository)

      const update = await runNode(node, createState())

      expect(update).toStrictEqual({ output: DEFAULT_REPLY, message: assistantMessage(DEFAULT_REPLY) })
    })

    it('fails the node when fallback replies are off', async () => {
      const { repository, model } = createRepository()
      model.addTurn(new Error('timeout'))
      const node = createTestNode({ id: 'llm', type: NodeKind.LLM_RESPONSE, params: llmParams() }, repository)

      const result = runNode(node, createState(), { config: { replyOnLlmError: false } })

      await expect(result).rejects.toBeInstanceOf(PipelineNodeRunError)
      await expect(result).rejects.toThrow('Model call failed: timeout')
    })
  })

  describe('configuration errors', () => {
    it('rejects unsupported prompt variables', () => {
      const { repository } = createRepository()

      expect(() =>
        createTestNode(
          { id: 'llm', type: NodeKind.LLM_RESPONSE, params: llmParams({ prompt: 'Hi {name}' }) },
          repository
        )
      ).toThrow(new PipelineNodeBuildError('llm', 'Prompt variable {name} is not supported'))
    })

    it('requires source material for {source_material}', () => {
      const { repository } = createRepository()

      expect(() =>
        createTestNode(
          { id: 'llm', type: NodeKind.LLM_RESPONSE, params: llmParams({ prompt: 'Use {source_material}' }) },
          repository
        )
      ).toThrow('The prompt uses {source_material} but no source material is selected')
    })

    it('reports missing resources as build errors', async () => {
      const { repository } = createRepository()
      const node = createTestNode(
        {
          id: 'llm',
          type: NodeKind.LLM_RESPONSE,
          params: llmParams({ prompt: 'Use {source_material}', sourceMaterialId: 5 }),
        },
        repository
      )

      const result = runNode(node, createState())

      await expect(result).rejects.toBeInstanceOf(PipelineNodeBuildError)
      await expect(result).rejects.toMatchObject({ nodeId: 'llm', message: 'Source material with id 5 not found' })
    })

    it('reports an unknown provider', async () => {
      const { repository } = createRepository()
      const node = createTestNode(
        { id: 'llm', type: NodeKind.LLM_RESPONSE, params: llmParams({ llmProviderId: 99 }) },
        repository
      )

      await expect(runNode(node, createState())).rejects.toThrow(
        new PipelineNodeBuildError('llm', 'LLM provider with id 99 not found')
      )
    })

    it('rejects a model of another provider type', async () => {
      const { repository } = createRepository()
      repository.addLlmProviderModel({ id: 11, type: 'anthropic', name: 'claude-test', maxTokenLimit: 0 })
      const node = createTestNode(
        { id: 'llm', type: NodeKind.LLM_RESPONSE, params: llmParams({ llmProviderModelId: 11 }) },
        repository
      )

      await expect(runNode(node, createState())).rejects.toThrow(
        "Model 'claude-test' belongs to provider type 'anthropic', not 'openai'"
      )
    })
  })
})
