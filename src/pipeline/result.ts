import type { PipelineState } from './state.js'

/**
 * How a run ended.
 */
export const RunStatus = {
  COMPLETED: 'completed',
  ABORTED: 'aborted',
  SUSPENDED: 'suspended',
  FAILED: 'failed',
} as const

export type RunStatus = (typeof RunStatus)[keyof typeof RunStatus]

/**
 * The end node ran, or no further node could run.
 */
export interface CompletedRun {
  status: typeof RunStatus.COMPLETED
  state: PipelineState
  /** Output of the end node, or of the last node to run when the end node was never reached. */
  output: string
  lastAssistantMessage: string | undefined
}

/**
 * A node stopped the run with a final message.
 */
export interface AbortedRun {
  status: typeof RunStatus.ABORTED
  state: PipelineState
  message: string
  tag: string | undefined
  nodeId: string
}

/**
 * A node asked to wait for the next user message.
 */
export interface SuspendedRun {
  status: typeof RunStatus.SUSPENDED
  state: PipelineState
  message: string
  nodeId: string
}

export interface RunFailure {
  errorName: string
  message: string
  nodeId: string | undefined
}

/**
 * Compilation, a node or the repository failed. `state` is absent when the run never started.
 */
export interface FailedRun {
  status: typeof RunStatus.FAILED
  state: PipelineState | undefined
  error: RunFailure
  cause: Error
}

export type PipelineRunResult = CompletedRun | AbortedRun | SuspendedRun | FailedRun
