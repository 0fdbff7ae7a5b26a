/**
 * Node that runs a user-written `main(input, context)` function.
 */

import vm from 'node:vm'
import { CodeNodeRunError, PipelineNodeBuildError } from '../errors.js'
import {
  AbortPipelineSignal,
  RequiredOutputsMissingSignal,
  WaitForNextInputSignal,
  isFlowControlSignal,
} from '../flow-control.js'
import { createLogger } from '../logging/logger.js'
import { RESERVED_TEMP_STATE_KEYS, StateDraft, type PipelineState, type StateUpdate } from '../pipeline/state.js'
import type { ValidationCache } from '../pipeline/validation-cache.js'
import { deepCopy, isJSONObject, stringifyValue, toJSONValue, type JSONValue } from '../types/json.js'
import { compileCode, runCode, sandboxErrorMessage, type SandboxApi, type SandboxInvocation } from './code-sandbox.js'
import { PipelineNode, type NodeContext } from './node.js'
import { NodeKind, type CodeParams } from './params.js'

const log = createLogger('code-node')

const RESERVED_KEYS: ReadonlySet<string> = new Set(RESERVED_TEMP_STATE_KEYS)

interface PendingFile {
  name: string
  content: string
  contentType: string
}

/** Budget for evaluating top-level statements while validating, before any engine config is known. */
const VALIDATION_TIMEOUT_MS = 1000

function isScript(value: unknown): value is vm.Script {
  return value instanceof vm.Script
}

function requireString(value: unknown, what: string): string {
  if (typeof value !== 'string') {
    throw new TypeError(`${what} must be a string`)
  }
  return value
}

export class CodeNode extends PipelineNode<CodeParams> {
  readonly kind = NodeKind.CODE
  private _script: vm.Script | undefined

  validate(cache: ValidationCache): void {
    if (this.params.code.trim() === '') return
    this._script = cache.getOrCompute('code', this.params.code, () => this._compile(VALIDATION_TIMEOUT_MS), isScript)
  }

  protected async handle(context: NodeContext): Promise<StateUpdate> {
    const { state, config, input } = context
    if (this.params.code.trim() === '') {
      return { output: input }
    }
    const script = this._script ?? this._compile(config.codeTimeoutMs)

    const draft = new StateDraft(state)
    const files: PendingFile[] = []
    const invocation: SandboxInvocation = {
      api: this._api(state, draft, files),
      console: this._console(),
      input,
      context: { nodeId: this.id, nodeName: this.name, sessionId: state.session.id },
      timeoutMs: config.codeTimeoutMs,
    }

    let result: unknown
    try {
      result = await runCode(script, invocation)
    } catch (error) {
      if (isFlowControlSignal(error)) throw error
      throw new CodeNodeRunError(this.id, `Error running code: ${sandboxErrorMessage(error)}`, { cause: error })
    }

    let output: string
    try {
      output = typeof result === 'string' ? result : stringifyValue(toJSONValue(result, 'return value'))
    } catch (error) {
      throw new CodeNodeRunError(this.id, `Error running code: ${sandboxErrorMessage(error)}`, { cause: error })
    }

    await this._attachFiles(state, files)
    return { output, ...draft.toUpdate() }
  }

  private _compile(timeoutMs: number): vm.Script {
    try {
      return compileCode(this.params.code, timeoutMs)
    } catch (error) {
      throw new PipelineNodeBuildError(this.id, sandboxErrorMessage(error))
    }
  }

  private _api(state: PipelineState, draft: StateDraft, files: PendingFile[]): SandboxApi {
    return {
      getParticipantData: () => deepCopy(draft.participantData),
      setParticipantData: (data) => {
        const value = toJSONValue(data, 'participant data')
        if (!isJSONObject(value)) {
          throw new TypeError('Participant data must be an object')
        }
        draft.setParticipantData(value)
      },
      getParticipantSchedules: async () => {
        const schedules = await this.repository.getParticipantSchedules(state.session)
        return deepCopy(schedules)
      },
      getTempStateKey: (key) => {
        const name = requireString(key, 'The key')
        const value: JSONValue | undefined = RESERVED_KEYS.has(name)
          ? state.tempStateView()[name]
          : draft.tempState[name]
        return value === undefined ? null : deepCopy(value)
      },
      setTempStateKey: (key, value) => {
        const name = requireString(key, 'The key')
        if (RESERVED_KEYS.has(name)) {
          throw new Error(`Cannot set the '${name}' key of the temporary state`)
        }
        draft.setTempStateKey(name, toJSONValue(value, name))
      },
      getSessionStateKey: (key) => {
        const value = draft.sessionState[requireString(key, 'The key')]
        return value === undefined ? null : deepCopy(value)
      },
      setSessionStateKey: (key, value) => {
        const name = requireString(key, 'The key')
        draft.setSessionStateKey(name, toJSONValue(value, name))
      },
      getNodeOutput: (name) => state.getNodeOutput(requireString(name, 'The node name'))?.output ?? null,
      requireNodeOutputs: (...names) => {
        const missing = names
          .map((name) => requireString(name, 'The node name'))
          .filter((name) => state.getNodeOutput(name) === undefined)
        if (missing.length > 0) {
          throw new RequiredOutputsMissingSignal(missing)
        }
      },
      addMessageTag: (tag) => {
        draft.messageTags.push(requireString(tag, 'The tag'))
      },
      addSessionTag: (tag) => {
        draft.sessionTags.push(requireString(tag, 'The tag'))
      },
      attachFile: (name, content, contentType) => {
        files.push({
          name: requireString(name, 'The file name'),
          content: requireString(content, 'The file content'),
          contentType: contentType === undefined ? 'text/plain' : requireString(contentType, 'The content type'),
        })
      },
      abortWithMessage: (message, tag) => {
        throw new AbortPipelineSignal(
          requireString(message, 'The message'),
          tag === undefined ? undefined : requireString(tag, 'The tag')
        )
      },
      waitForNextInput: (message) => {
        throw new WaitForNextInputSignal(message === undefined ? undefined : requireString(message, 'The message'))
      },
    }
  }

  private _console(): SandboxInvocation['console'] {
    const format = (args: unknown[]): string => args.map((arg) => String(arg)).join(' ')
    return {
      log: (...args: unknown[]) => log.info(format(args), { nodeId: this.id }),
      info: (...args: unknown[]) => log.info(format(args), { nodeId: this.id }),
      debug: (...args: unknown[]) => log.debug(format(args), { nodeId: this.id }),
      warn: (...args: unknown[]) => log.warn(format(args), { nodeId: this.id }),
      error: (...args: unknown[]) => log.error(format(args), { nodeId: this.id }),
    }
  }

  private async _attachFiles(state: PipelineState, files: PendingFile[]): Promise<void> {
    if (files.length === 0) return
    const ids: number[] = []
    for (const file of files) {
      const stored = await this.repository.createFile({
        teamId: state.session.teamId,
        name: file.name,
        content: Buffer.from(file.content),
        contentType: file.contentType,
        purpose: 'code_interpreter',
      })
      ids.push(stored.id)
    }
    await this.repository.attachFilesToSession(state.session, 'code_interpreter', ids)
  }
}
