import { describe, it, expect } from 'vitest'
import { NodeKind } from '../../nodes/params.js'
import { PipelineExecutor, runPipeline } from '../executor.js'
import {
  RunStatus,
  type AbortedRun,
  type CompletedRun,
  type FailedRun,
  type PipelineRunResult,
  type SuspendedRun,
} from '../result.js'
import { MockChatModel } from '../../__fixtures__/mock-chat-model.js'
import {
  buildDefinition,
  createRepository,
  createSession,
  llmParams,
  type EdgeSpec,
  type NodeSpec,
} from '../../__fixtures__/pipeline-helpers.js'

const DEFAULT_REPLY = 'Sorry, something went wrong while generating a response.'

const start: NodeSpec = { id: 'start', type: NodeKind.START }
const end: NodeSpec = { id: 'end', type: NodeKind.END }

function code(id: string, source: string): NodeSpec {
  return { id, type: NodeKind.CODE, params: { code: source } }
}

function render(id: string, templateString: string): NodeSpec {
  return { id, type: NodeKind.RENDER_TEMPLATE, params: { templateString } }
}

function linear(...middle: NodeSpec[]): [NodeSpec[], EdgeSpec[]] {
  const nodes = [start, ...middle, end]
  const edges: EdgeSpec[] = []
  for (let i = 1; i < nodes.length; i++) {
    const source = nodes[i - 1]
    const target = nodes[i]
    if (source && target) edges.push([source.id, target.id])
  }
  return [nodes, edges]
}

function asCompleted(result: PipelineRunResult): CompletedRun {
  if (result.status !== RunStatus.COMPLETED) throw new Error(`Expected a completed run, got ${summarize(result)}`)
  return result
}

function asAborted(result: PipelineRunResult): AbortedRun {
  if (result.status !== RunStatus.ABORTED) throw new Error(`Expected an aborted run, got ${summarize(result)}`)
  return result
}

function asSuspended(result: PipelineRunResult): SuspendedRun {
  if (result.status !== RunStatus.SUSPENDED) throw new Error(`Expected a suspended run, got ${summarize(result)}`)
  return result
}

function asFailed(result: PipelineRunResult): FailedRun {
  if (result.status !== RunStatus.FAILED) throw new Error(`Expected a failed run, got ${summarize(result)}`)
  return result
}

function summarize(result: PipelineRunResult): string {
  return result.status === RunStatus.FAILED ? `failed: ${result.error.message}` : result.status
}

describe('PipelineExecutor', () => {
  it('runs a linear pipeline', async () => {
    const { repository, model } = createRepository()
    model.addTurn('Hello there')
    const executor = new PipelineExecutor(repository)

    const result = await executor.run(
      buildDefinition(...linear({ id: 'llm', type: NodeKind.LLM_RESPONSE, params: llmParams() })),
      { session: createSession(), input: 'hi' }
    )

    const completed = asCompleted(result)
    expect(completed.output).toBe('Hello there')
    expect(completed.lastAssistantMessage).toBe('Hello there')
    expect(completed.state.path).toStrictEqual(['start', 'llm', 'end'])
    expect(completed.state.messages).toStrictEqual([
      { role: 'user', content: 'hi', nodeId: 'start' },
      { role: 'assistant', content: 'Hello there', nodeId: 'llm' },
    ])
  })

  it('follows the branch a router picks', async () => {
    const { repository, model } = createRepository()
    model.addTurn('maybe')
    const definition = buildDefinition(
      [
        start,
        {
          id: 'router',
          type: NodeKind.ROUTER,
          params: llmParams({ prompt: 'Does the user agree?', keywords: ['yes', 'no'], defaultKeywordIndex: 1 }),
        },
        render('yes', 'Great!'),
        render('no', 'Okay, maybe later.'),
        end,
      ],
      [
        ['start', 'router'],
        ['router', 'yes', 'output_0'],
        ['router', 'no', 'output_1'],
        ['yes', 'end'],
        ['no', 'end'],
      ]
    )

    const result = await runPipeline(definition, { session: createSession(), input: 'hmm' }, repository)

    const completed = asCompleted(result)
    expect(completed.output).toBe('Okay, maybe later.')
    expect(completed.state.path).toStrictEqual(['start', 'router', 'no', 'end'])
    expect(completed.state.outputs.has('yes')).toBe(false)
    expect(completed.state.outputs.get('router')?.route).toBe('output_1')
  })

  it('skips every node behind an inactive branch', async () => {
    const { repository } = createRepository()
    const definition = buildDefinition(
      [
        start,
        { id: 'check', type: NodeKind.BOOLEAN, params: { inputEquals: 'yes' } },
        { id: 'yesBranch', type: NodeKind.PASSTHROUGH },
        render('yesFollow', 'follow'),
        render('noBranch', 'no'),
        end,
      ],
      [
        ['start', 'check'],
        ['check', 'yesBranch', 'output_0'],
        ['yesBranch', 'yesFollow'],
        ['yesFollow', 'end'],
        ['check', 'noBranch', 'output_1'],
        ['noBranch', 'end'],
      ]
    )

    const result = await runPipeline(definition, { session: createSession(), input: 'nope' }, repository)

    const completed = asCompleted(result)
    expect(completed.output).toBe('no')
    expect(completed.state.path).toStrictEqual(['start', 'check', 'noBranch', 'end'])
  })

  it('completes with the last output when the end node is skipped', async () => {
    const { repository } = createRepository()
    const definition = buildDefinition(
      [
        start,
        { id: 'check', type: NodeKind.BOOLEAN, params: { inputEquals: 'yes' } },
        render('other', 'dead end'),
        end,
      ],
      [
        ['start', 'check'],
        ['check', 'end', 'output_0'],
        ['check', 'other', 'output_1'],
      ]
    )

    const result = await runPipeline(definition, { session: createSession(), input: 'no' }, repository)

    const completed = asCompleted(result)
    expect(completed.output).toBe('dead end')
    expect(completed.state.outputs.has('end')).toBe(false)
  })

  it('takes the default route when the chosen keyword has no edge', async () => {
    const { repository } = createRepository()
    const definition = buildDefinition(
      [
        start,
        {
          id: 'router',
          type: NodeKind.STATIC_ROUTER,
          params: { keywords: ['a', 'b'], routeKey: 'choice', tagOutputMessage: true },
        },
        end,
      ],
      [
        ['start', 'router'],
        ['router', 'end', 'output_0'],
      ]
    )

    const result = await runPipeline(
      definition,
      { session: createSession(), input: 'go', participantData: { choice: 'b' } },
      repository
    )

    const completed = asCompleted(result)
    expect(completed.state.path).toStrictEqual(['start', 'router', 'end'])
    expect(completed.output).toBe('go')
    expect(completed.state.outputs.get('router')?.route).toBe('output_0')
    expect(completed.state.messageTags).toStrictEqual(['router:A:default'])
  })

  it('runs branches still pending when the end node finishes', async () => {
    const { repository } = createRepository()
    const definition = buildDefinition(
      [
        start,
        { id: 'a', type: NodeKind.PASSTHROUGH },
        code('b', `function main() { setSessionStateKey('visited', true); return 'b done' }`),
        end,
      ],
      [
        ['start', 'end'],
        ['start', 'a'],
        ['a', 'b'],
      ]
    )

    const result = await runPipeline(definition, { session: createSession(), input: 'go' }, repository)

    const completed = asCompleted(result)
    expect(completed.state.path).toStrictEqual(['start', 'end', 'a', 'b'])
    expect(completed.state.sessionState).toStrictEqual({ visited: true })
    expect(completed.state.outputs.get('b')?.output).toBe('b done')
    expect(completed.output).toBe('go')
  })

  it('isolates parallel branches within a step', async () => {
    const { repository } = createRepository()
    const definition = buildDefinition(
      [
        start,
        code(
          'left',
          `function main() { setTempStateKey('a', 1); addMessageTag('left'); return 'A saw ' + getTempStateKey('b') }`
        ),
        code('right', `function main() { setTempStateKey('b', 2); return 'B saw ' + getTempStateKey('a') }`),
        end,
      ],
      [
        ['start', 'left'],
        ['start', 'right'],
        ['left', 'end'],
        ['right', 'end'],
      ]
    )

    for (const maxParallelNodes of [undefined, 1]) {
      const result = await runPipeline(definition, { session: createSession(), input: 'go' }, repository, {
        config: maxParallelNodes === undefined ? {} : { maxParallelNodes },
      })

      const completed = asCompleted(result)
      expect(completed.state.outputs.get('left')?.output).toBe('A saw null')
      expect(completed.state.outputs.get('right')?.output).toBe('B saw null')
      expect(completed.state.tempState).toStrictEqual({ a: 1, b: 2 })
      expect(completed.state.messageTags).toStrictEqual(['left'])
      expect(completed.output).toBe('B saw null')
    }
  })

  it('passes state written by one node to the next', async () => {
    const { repository } = createRepository()
    const definition = buildDefinition(
      ...linear(
        code('writer', `function main() { setSessionStateKey('step', 2); return 'written' }`),
        render('reader', 'Step {{ session_state.step }} after {{ input }}')
      )
    )

    const result = await runPipeline(definition, { session: createSession(), input: 'go' }, repository)

    const completed = asCompleted(result)
    expect(completed.output).toBe('Step 2 after written')
    expect(completed.state.sessionState).toStrictEqual({ step: 2 })
    expect(completed.state.messages).toStrictEqual([{ role: 'user', content: 'go', nodeId: 'start' }])
    expect(completed.lastAssistantMessage).toBeUndefined()
  })

  it('aborts without running later nodes', async () => {
    const { repository, model } = createRepository()
    const definition = buildDefinition(
      ...linear(
        code('guard', `function main() { abortWithMessage("Sorry, I can't help with that", 'policy') }`),
        { id: 'llm', type: NodeKind.LLM_RESPONSE, params: llmParams() }
      )
    )

    const result = await runPipeline(definition, { session: createSession(), input: 'hi' }, repository)

    const aborted = asAborted(result)
    expect(aborted.message).toBe("Sorry, I can't help with that")
    expect(aborted.tag).toBe('policy')
    expect(aborted.nodeId).toBe('guard')
    expect(aborted.state.outputs.has('llm')).toBe(false)
    expect(model.callCount).toBe(0)
  })

  it('suspends when a node waits for the next input', async () => {
    const { repository } = createRepository()
    const definition = buildDefinition(...linear(code('ask', `function main() { waitForNextInput('Tell me more') }`)))

    const result = await runPipeline(definition, { session: createSession(), input: 'hi' }, repository)

    const suspended = asSuspended(result)
    expect(suspended.message).toBe('Tell me more')
    expect(suspended.nodeId).toBe('ask')
    expect(suspended.state.path).toStrictEqual(['start'])
  })

  it('fails when required outputs are missing', async () => {
    const { repository } = createRepository()
    const definition = buildDefinition(...linear(code('needs', `function main() { requireNodeOutputs('summary') }`)))

    const result = await runPipeline(definition, { session: createSession(), input: 'hi' }, repository)

    const failed = asFailed(result)
    expect(failed.error).toStrictEqual({
      errorName: 'PipelineNodeBuildError',
      message: 'Required outputs are missing from: summary',
      nodeId: 'needs',
    })
  })

  it('replies with the fallback message when the model fails', async () => {
    const { repository, model } = createRepository()
    model.addTurn(new Error('upstream unavailable'))
    const definition = buildDefinition(...linear({ id: 'llm', type: NodeKind.LLM_RESPONSE, params: llmParams() }))

    const result = await runPipeline(definition, { session: createSession(), input: 'hi' }, repository)

    const completed = asCompleted(result)
    expect(completed.output).toBe(DEFAULT_REPLY)
    expect(completed.lastAssistantMessage).toBe(DEFAULT_REPLY)
  })

  it('fails the run when fallback replies are off', async () => {
    const { repository, model } = createRepository()
    model.addTurn(new Error('upstream unavailable'))
    const definition = buildDefinition(...linear({ id: 'llm', type: NodeKind.LLM_RESPONSE, params: llmParams() }))

    const result = await runPipeline(definition, { session: createSession(), input: 'hi' }, repository, {
      config: { replyOnLlmError: false },
    })

    const failed = asFailed(result)
    expect(failed.error).toStrictEqual({
      errorName: 'PipelineNodeRunError',
      message: 'Model call failed: upstream unavailable',
      nodeId: 'llm',
    })
  })

  it('reports a missing collection as a node build error', async () => {
    const { repository } = createRepository(new MockChatModel().replyAlways('unused'))
    const definition = buildDefinition(
      ...linear({
        id: 'llm',
        type: NodeKind.LLM_RESPONSE,
        params: llmParams({ prompt: 'Files: {media}', collectionId: 999 }),
      })
    )

    const result = await runPipeline(definition, { session: createSession(), input: 'hi' }, repository)

    const failed = asFailed(result)
    expect(failed.error).toStrictEqual({
      errorName: 'PipelineNodeBuildError',
      message: 'Collection with id 999 not found',
      nodeId: 'llm',
    })
  })

  it('reports compilation failures without a state', async () => {
    const { repository } = createRepository()

    const result = await runPipeline(
      buildDefinition([start], []),
      { session: createSession(), input: 'hi' },
      repository
    )

    const failed = asFailed(result)
    expect(failed.state).toBeUndefined()
    expect(failed.error).toStrictEqual({
      errorName: 'PipelineBuildError',
      message: 'There should be exactly 1 End node',
      nodeId: undefined,
    })
  })

  it('loads participant data when the caller does not supply it', async () => {
    const { repository } = createRepository()
    const session = createSession()
    repository.setParticipantData(session, { name: 'Ada' })
    const definition = buildDefinition(...linear(render('greet', 'Hi {{ participant_data.name }}')))

    const loaded = await runPipeline(definition, { session, input: 'hi' }, repository)
    const supplied = await runPipeline(
      definition,
      { session, input: 'hi', participantData: { name: 'Grace' } },
      repository
    )

    expect(asCompleted(loaded).output).toBe('Hi Ada')
    expect(asCompleted(supplied).output).toBe('Hi Grace')
    expect(repository.calls.filter((call) => call.method === 'getParticipantGlobalData')).toHaveLength(1)
  })

  it('returns updated participant data in the final state', async () => {
    const { repository } = createRepository()
    const definition = buildDefinition(
      ...linear(code('track', `function main() { setParticipantData({ ...getParticipantData(), seen: true }) }`))
    )

    const result = await runPipeline(
      definition,
      { session: createSession(), input: 'hi', participantData: { name: 'Ada' } },
      repository
    )

    expect(asCompleted(result).state.participantData).toStrictEqual({ name: 'Ada', seen: true })
  })
})
