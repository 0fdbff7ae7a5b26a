import { describe, it, expect } from 'vitest'
import { CodeNodeRunError, PipelineNodeBuildError } from '../../errors.js'
import { AbortPipelineSignal, RequiredOutputsMissingSignal, WaitForNextInputSignal } from '../../flow-control.js'
import { ValidationCache } from '../../pipeline/validation-cache.js'
import { InMemoryRepository } from '../../repository/in-memory-repository.js'
import { createNode } from '../factory.js'
import { NodeKind } from '../params.js'
import { createSession, createState, createTestNode, runNode } from '../../__fixtures__/pipeline-helpers.js'

function codeNode(code: string, repository = new InMemoryRepository()) {
  return createTestNode({ id: 'code', name: 'shout', type: NodeKind.CODE, params: { code } }, repository)
}

describe('CodeNode', () => {
  it('returns the input when there is no code', async () => {
    expect(await runNode(codeNode(''), createState({ input: 'as is' }))).toStrictEqual({ output: 'as is' })
  })

  it('calls main with the input and the node context', async () => {
    const node = codeNode(`
      function main(input, context) {
        return input.toUpperCase() + ' from ' + context.nodeName + ' in ' + context.sessionId
      }
    `)

    const update = await runNode(node, createState({ input: 'hello' }))

    expect(update).toStrictEqual({ output: 'HELLO from shout in session-1' })
  })

  it('serialises non-string return values', async () => {
    const node = codeNode('function main() { return { ok: true, items: [1, 2] } }')

    expect((await runNode(node, createState())).output).toBe('{"ok":true,"items":[1,2]}')
  })

  it('renders an undefined return value as empty output', async () => {
    const node = codeNode('function main() {}')

    expect((await runNode(node, createState())).output).toBe('')
  })

  it('records state changes in the update', async () => {
    const node = codeNode(`
      function main(input) {
        const data = getParticipantData()
        data.visits = (data.visits || 0) + 1
        setParticipantData(data)
        setTempStateKey('topic', 'billing')
        setSessionStateKey('seen', true)
        addMessageTag('coded')
        addSessionTag('vip')
        return { visits: data.visits, input: getTempStateKey('user_input') }
      }
    `)

    const update = await runNode(node, createState({ input: 'hello', participantData: { visits: 2 } }))

    expect(update).toStrictEqual({
      output: '{"visits":3,"input":"hello"}',
      participantData: { visits: 3 },
      sessionState: { seen: true },
      tempState: { topic: 'billing' },
      messageTags: ['coded'],
      sessionTags: ['vip'],
    })
  })

  it('reads missing state keys as null', async () => {
    const node = codeNode(`
      function main() {
        return [getTempStateKey('nothing'), getSessionStateKey('nothing'), getNodeOutput('nobody')]
      }
    `)

    expect((await runNode(node, createState())).output).toBe('[null,null,null]')
  })

  it('reads other node outputs by name', async () => {
    const state = createState()
    state.apply('llm', 'answer', { output: 'Hi there' })
    const node = codeNode(
      `function main() { return getNodeOutput('answer') + '|' + getTempStateKey('outputs').answer }`
    )

    expect((await runNode(node, state)).output).toBe('Hi there|Hi there')
  })

  it('refuses to overwrite reserved temporary state keys', async () => {
    const node = codeNode(`function main() { setTempStateKey('outputs', {}) }`)

    const result = runNode(node, createState())

    await expect(result).rejects.toBeInstanceOf(CodeNodeRunError)
    await expect(result).rejects.toThrow("Error running code: Cannot set the 'outputs' key of the temporary state")
  })

  it('rejects participant data that is not an object', async () => {
    const node = codeNode(`function main() { setParticipantData(['a']) }`)

    await expect(runNode(node, createState())).rejects.toThrow(
      'Error running code: Participant data must be an object'
    )
  })

  it('wraps errors thrown by the code', async () => {
    const node = codeNode(`function main() { throw new Error('bad input') }`)

    const result = runNode(node, createState())

    await expect(result).rejects.toBeInstanceOf(CodeNodeRunError)
    await expect(result).rejects.toMatchObject({ nodeId: 'code', message: 'Error running code: bad input' })
  })

  it('raises the missing outputs signal', async () => {
    const state = createState()
    state.apply('llm', 'answer', { output: 'Hi' })
    const node = codeNode(`function main() { requireNodeOutputs('answer', 'summary') }`)

    const result = runNode(node, state)

    await expect(result).rejects.toBeInstanceOf(RequiredOutputsMissingSignal)
    await expect(result).rejects.toMatchObject({ missing: ['summary'] })
  })

  it('aborts the pipeline with a message and tag', async () => {
    const node = codeNode(`function main() { abortWithMessage("Sorry, I can't help with that", 'policy') }`)

    const result = runNode(node, createState())

    await expect(result).rejects.toBeInstanceOf(AbortPipelineSignal)
    await expect(result).rejects.toMatchObject({ message: "Sorry, I can't help with that", tag: 'policy' })
  })

  it('suspends until the next input', async () => {
    const node = codeNode(`function main() { waitForNextInput() }`)

    const result = runNode(node, createState())

    await expect(result).rejects.toBeInstanceOf(WaitForNextInputSignal)
    await expect(result).rejects.toThrow('Waiting for the next input')
  })

  it('awaits async functions and the schedule lookup', async () => {
    const repository = new InMemoryRepository().setParticipantSchedules(createSession(), [
      { id: 'sch-1', name: 'Check-in', prompt: 'How are you?', nextTriggerDate: null, isComplete: false },
    ])
    const node = codeNode(
      `async function main() { const schedules = await getParticipantSchedules(); return schedules[0].name }`,
      repository
    )

    expect((await runNode(node, createState())).output).toBe('Check-in')
  })

  it('stores attached files and attaches them to the session', async () => {
    const repository = new InMemoryRepository()
    const node = codeNode(`function main() { attachFile('report.csv', 'a,b', 'text/csv'); return 'done' }`, repository)

    await runNode(node, createState())

    expect(repository.files).toHaveLength(1)
    const [file] = repository.files
    expect(file).toMatchObject({ name: 'report.csv', contentType: 'text/csv', purpose: 'code_interpreter', size: 3 })
    expect(repository.attachments).toStrictEqual([
      { sessionId: 'session-1', type: 'code_interpreter', fileIds: [file?.id] },
    ])
  })

  it('times out long running code', async () => {
    const node = codeNode('function main() { while (true) {} }')

    await expect(runNode(node, createState(), { config: { codeTimeoutMs: 50 } })).rejects.toThrow(
      /^Error running code: Script execution timed out/
    )
  })

  it('times out code that never resolves', async () => {
    const node = codeNode('async function main() { await new Promise(() => {}) }')

    await expect(runNode(node, createState(), { config: { codeTimeoutMs: 50 } })).rejects.toThrow(
      'Error running code: Code execution timed out after 50ms'
    )
  })

  describe('validation', () => {
    it('requires a main function', () => {
      expect(() => codeNode('const x = 1')).toThrow(
        new PipelineNodeBuildError('code', "The code must define a top-level function named 'main'")
      )
    })

    it('rejects other top-level functions', () => {
      expect(() => codeNode('function helper() {}\nfunction main() {}')).toThrow(
        "Only the 'main' function may be defined at the top level; found 'helper'"
      )
    })

    it('rejects code that throws while evaluating', () => {
      expect(() => codeNode("throw new Error('nope')\nfunction main() {}")).toThrow(
        'Error while evaluating the code: nope'
      )
    })

    it('rejects syntax errors', () => {
      expect(() => codeNode('function main( {')).toThrow(PipelineNodeBuildError)
    })

    it('compiles identical code once per cache', () => {
      const cache = new ValidationCache()
      const definition = { id: 'code', data: { type: NodeKind.CODE, params: { code: 'function main() {}' } } }

      createNode(definition).validate(cache)
      createNode({ ...definition, id: 'other' }).validate(cache)

      expect(cache.size).toBe(1)
      expect(cache.hits).toBe(1)
    })
  })
})
