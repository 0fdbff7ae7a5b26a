import type { StateUpdate } from '../pipeline/state.js'
import { renderTemplate } from '../utils/template.js'
import { PipelineNode, type NodeContext } from './node.js'
import { NodeKind, type RenderTemplateParams } from './params.js'

/**
 * Renders a `{{ path }}` template against the input and the run's state.
 *
 * Available roots: `input`, `temp_state`, `session_state`, `participant_data`. The result is node output only; no
 * message is added to the conversation.
 */
export class RenderTemplateNode extends PipelineNode<RenderTemplateParams> {
  readonly kind = NodeKind.RENDER_TEMPLATE

  protected async handle({ state, input }: NodeContext): Promise<StateUpdate> {
    const output = renderTemplate(this.params.templateString, {
      input,
      temp_state: state.tempStateView(),
      session_state: state.sessionState,
      participant_data: state.participantData,
    })
    return { output }
  }
}
