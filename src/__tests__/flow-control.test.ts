import { describe, it, expect } from 'vitest'
import {
  AbortPipelineSignal,
  FlowControlSignal,
  RequiredOutputsMissingSignal,
  WaitForNextInputSignal,
  isFlowControlSignal,
} from '../flow-control.js'

describe('AbortPipelineSignal', () => {
  it('carries the final message and tag', () => {
    const signal = new AbortPipelineSignal("Sorry, I can't help with that", 'policy')

    expect(signal.message).toBe("Sorry, I can't help with that")
    expect(signal.tag).toBe('policy')
    expect(signal.kind).toBe('abort')
    expect(signal.name).toBe('AbortPipelineSignal')
  })

  it('has no tag by default', () => {
    expect(new AbortPipelineSignal('bye').tag).toBeUndefined()
  })
})

describe('WaitForNextInputSignal', () => {
  it('uses a default message', () => {
    const signal = new WaitForNextInputSignal()

    expect(signal.message).toBe('Waiting for the next input')
    expect(signal.kind).toBe('wait')
  })
})

describe('RequiredOutputsMissingSignal', () => {
  it('lists the missing nodes', () => {
    const signal = new RequiredOutputsMissingSignal(['a', 'b'])

    expect(signal.message).toBe('Required outputs are missing from: a, b')
    expect(signal.missing).toStrictEqual(['a', 'b'])
    expect(signal.kind).toBe('requireOutputs')
  })
})

describe('isFlowControlSignal', () => {
  it('recognises every signal', () => {
    expect(isFlowControlSignal(new AbortPipelineSignal('x'))).toBe(true)
    expect(isFlowControlSignal(new WaitForNextInputSignal())).toBe(true)
    expect(isFlowControlSignal(new RequiredOutputsMissingSignal(['a']))).toBe(true)
  })

  it('rejects ordinary errors and other values', () => {
    expect(isFlowControlSignal(new Error('x'))).toBe(false)
    expect(isFlowControlSignal('abort')).toBe(false)
  })

  it('signals are errors so they can be thrown', () => {
    const signal = new AbortPipelineSignal('x')

    expect(signal).toBeInstanceOf(Error)
    expect(signal).toBeInstanceOf(FlowControlSignal)
  })
})
