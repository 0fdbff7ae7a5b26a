/**
 * State container threaded through a pipeline run.
 *
 * Nodes receive a snapshot and return a {@link StateUpdate}; only the executor applies updates, in a fixed order,
 * so parallel branches never observe each other's writes within one step.
 */

import type { ChatMessage, PipelineMessage } from '../types/messages.js'
import { copyObject, type JSONObject, type JSONValue } from '../types/json.js'
import type { SessionRef } from '../types/session.js'

/**
 * Keys of the temporary state managed by the engine.
 */
export const RESERVED_TEMP_STATE_KEYS = ['user_input', 'outputs', 'attachments'] as const

/**
 * A file the user sent with the inbound message.
 */
export interface Attachment {
  fileId: number
  name: string
  contentType: string
  size?: number
}

/**
 * Output recorded for one node.
 */
export interface NodeOutput {
  nodeId: string
  /** Node name, used by code nodes to address outputs. */
  name: string
  output: string
  /** Handle selected by a router node. */
  route?: string
}

/**
 * Changes a node asks the executor to apply.
 */
export interface StateUpdate {
  output: string
  route?: string
  /** Appended to the run's ephemeral messages. */
  message?: ChatMessage
  /** Keys merged into the temporary state. */
  tempState?: JSONObject
  /** Keys merged into the session state. */
  sessionState?: JSONObject
  /** Replaces the participant data. */
  participantData?: JSONObject
  messageTags?: string[]
  sessionTags?: string[]
}

/**
 * Values the caller supplies for a run.
 */
export interface PipelineStateInit {
  session: SessionRef
  /** Text of the inbound user message. */
  input: string
  /** Id of the inbound message when the caller already stored it in the session log. */
  inputMessageId?: number
  attachments?: Attachment[]
  /** Loaded through the repository when absent. */
  participantData?: JSONObject
  sessionState?: JSONObject
  tempState?: JSONObject
}

export class PipelineState {
  readonly session: SessionRef
  readonly input: string
  readonly inputMessageId: number | undefined
  readonly messages: PipelineMessage[]
  readonly outputs: Map<string, NodeOutput>
  readonly attachments: Attachment[]
  /** Node ids in execution order. */
  readonly path: string[]
  readonly messageTags: string[]
  readonly sessionTags: string[]
  tempState: JSONObject
  sessionState: JSONObject
  participantData: JSONObject

  private constructor(data: {
    session: SessionRef
    input: string
    inputMessageId: number | undefined
    messages: PipelineMessage[]
    outputs: Map<string, NodeOutput>
    attachments: Attachment[]
    path: string[]
    messageTags: string[]
    sessionTags: string[]
    tempState: JSONObject
    sessionState: JSONObject
    participantData: JSONObject
  }) {
    this.session = data.session
    this.input = data.input
    this.inputMessageId = data.inputMessageId
    this.messages = data.messages
    this.outputs = data.outputs
    this.attachments = data.attachments
    this.path = data.path
    this.messageTags = data.messageTags
    this.sessionTags = data.sessionTags
    this.tempState = data.tempState
    this.sessionState = data.sessionState
    this.participantData = data.participantData
  }

  /**
   * Creates the state for a new run.
   */
  static create(init: PipelineStateInit & { participantData: JSONObject }): PipelineState {
    return new PipelineState({
      session: init.session,
      input: init.input,
      inputMessageId: init.inputMessageId,
      messages: [],
      outputs: new Map(),
      attachments: [...(init.attachments ?? [])],
      path: [],
      messageTags: [],
      sessionTags: [],
      tempState: copyObject(init.tempState ?? {}),
      sessionState: copyObject(init.sessionState ?? {}),
      participantData: copyObject(init.participantData),
    })
  }

  /**
   * Independent copy handed to a node.
   */
  snapshot(): PipelineState {
    return new PipelineState({
      session: this.session,
      input: this.input,
      inputMessageId: this.inputMessageId,
      messages: this.messages.map((message) => ({ ...message })),
      outputs: new Map([...this.outputs].map(([id, output]) => [id, { ...output }])),
      attachments: this.attachments.map((attachment) => ({ ...attachment })),
      path: [...this.path],
      messageTags: [...this.messageTags],
      sessionTags: [...this.sessionTags],
      tempState: copyObject(this.tempState),
      sessionState: copyObject(this.sessionState),
      participantData: copyObject(this.participantData),
    })
  }

  /**
   * Records a node's update. Called by the executor only.
   *
   * @param nodeId - Node that produced the update
   * @param name - Node name
   * @param update - The update
   */
  apply(nodeId: string, name: string, update: StateUpdate): void {
    this.outputs.set(nodeId, {
      nodeId,
      name,
      output: update.output,
      ...(update.route !== undefined ? { route: update.route } : {}),
    })
    this.path.push(nodeId)
    if (update.message) {
      this.messages.push({ ...update.message, nodeId })
    }
    if (update.tempState) {
      this.tempState = { ...this.tempState, ...update.tempState }
    }
    if (update.sessionState) {
      this.sessionState = { ...this.sessionState, ...update.sessionState }
    }
    if (update.participantData) {
      this.participantData = copyObject(update.participantData)
    }
    this.messageTags.push(...(update.messageTags ?? []))
    this.sessionTags.push(...(update.sessionTags ?? []))
  }

  /**
   * Finds an output by node name, falling back to node id.
   */
  getNodeOutput(nameOrId: string): NodeOutput | undefined {
    for (const output of this.outputs.values()) {
      if (output.name === nameOrId) return output
    }
    return this.outputs.get(nameOrId)
  }

  /**
   * Temporary state as user code sees it, including the engine-managed keys.
   */
  tempStateView(): JSONObject {
    const outputs: JSONObject = {}
    for (const output of this.outputs.values()) {
      outputs[output.name] = output.output
    }
    const attachments: JSONValue[] = this.attachments.map((attachment) => ({
      fileId: attachment.fileId,
      name: attachment.name,
      contentType: attachment.contentType,
    }))
    return { ...copyObject(this.tempState), user_input: this.input, outputs, attachments }
  }

  /**
   * Latest assistant message appended during the run.
   */
  lastAssistantMessage(): string | undefined {
    for (let i = this.messages.length - 1; i >= 0; i--) {
      const message = this.messages[i]
      if (message?.role === 'assistant') return message.content
    }
    return undefined
  }
}

/**
 * Mutable scratch copy of the writable parts of the state, used while one node runs.
 *
 * Tools and sandboxed code write here; the node turns the draft into its {@link StateUpdate}.
 */
export class StateDraft {
  participantData: JSONObject
  readonly sessionState: JSONObject
  readonly tempState: JSONObject
  readonly messageTags: string[] = []
  readonly sessionTags: string[] = []
  /** File ids to attach to the session, keyed by how they are presented. */
  readonly citedFileIds = new Set<number>()
  readonly attachedFileIds = new Set<number>()
  private _participantDataChanged = false
  private readonly _sessionKeys = new Set<string>()
  private readonly _tempKeys = new Set<string>()

  constructor(state: PipelineState) {
    this.participantData = copyObject(state.participantData)
    this.sessionState = copyObject(state.sessionState)
    this.tempState = copyObject(state.tempState)
  }

  setParticipantData(data: JSONObject): void {
    this.participantData = copyObject(data)
    this._participantDataChanged = true
  }

  setSessionStateKey(key: string, value: JSONValue): void {
    this.sessionState[key] = value
    this._sessionKeys.add(key)
  }

  setTempStateKey(key: string, value: JSONValue): void {
    this.tempState[key] = value
    this._tempKeys.add(key)
  }

  /**
   * The changes recorded so far, in {@link StateUpdate} form.
   */
  toUpdate(): Omit<StateUpdate, 'output'> {
    const pick = (source: JSONObject, keys: Set<string>): JSONObject => {
      const picked: JSONObject = {}
      for (const key of keys) {
        const value = source[key]
        if (value !== undefined) picked[key] = value
      }
      return picked
    }
    return {
      ...(this._participantDataChanged ? { participantData: copyObject(this.participantData) } : {}),
      ...(this._sessionKeys.size > 0 ? { sessionState: pick(this.sessionState, this._sessionKeys) } : {}),
      ...(this._tempKeys.size > 0 ? { tempState: pick(this.tempState, this._tempKeys) } : {}),
      ...(this.messageTags.length > 0 ? { messageTags: [...this.messageTags] } : {}),
      ...(this.sessionTags.length > 0 ? { sessionTags: [...this.sessionTags] } : {}),
    }
  }
}
