import type { StateUpdate } from '../pipeline/state.js'
import { userMessage } from '../types/messages.js'
import { PipelineNode, type NodeContext } from './node.js'
import { NodeKind } from './params.js'

/**
 * Entry of the graph. Seeds the run's messages with the inbound user message.
 */
export class StartNode extends PipelineNode<Record<string, never>> {
  readonly kind = NodeKind.START

  protected async handle({ state }: NodeContext): Promise<StateUpdate> {
    return { output: state.input, message: userMessage(state.input) }
  }
}

/**
 * Exit of the graph. Its output is the run's terminal output.
 */
export class EndNode extends PipelineNode<Record<string, never>> {
  readonly kind = NodeKind.END

  protected async handle({ input }: NodeContext): Promise<StateUpdate> {
    return { output: input }
  }
}

/**
 * Forwards its input unchanged.
 */
export class PassthroughNode extends PipelineNode<Record<string, never>> {
  readonly kind = NodeKind.PASSTHROUGH

  protected async handle({ input }: NodeContext): Promise<StateUpdate> {
    return { output: input }
  }
}
