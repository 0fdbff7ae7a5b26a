/**
 * Runs user code in a separate V8 context.
 *
 * `node:vm` isolates globals, not privileges: code can still reach the host through the functions it is given.
 * Only pipeline authors write this code.
 */

import vm from 'node:vm'

/**
 * Names of the functions user code can call.
 */
export const SANDBOX_API_NAMES = [
  'getParticipantData',
  'setParticipantData',
  'getParticipantSchedules',
  'getTempStateKey',
  'setTempStateKey',
  'getSessionStateKey',
  'setSessionStateKey',
  'getNodeOutput',
  'requireNodeOutputs',
  'addMessageTag',
  'addSessionTag',
  'attachFile',
  'abortWithMessage',
  'waitForNextInput',
] as const

export type SandboxApiName = (typeof SANDBOX_API_NAMES)[number]

export type SandboxApi = Record<SandboxApiName, (...args: unknown[]) => unknown>

const ENTRY_POINT = 'main'
const SANDBOX_FILENAME = 'main.js'
const INVOKE_MAIN = new vm.Script(`${ENTRY_POINT}(__input, __context)`, { filename: 'invoke.js' })

/**
 * Reads the message of an error thrown inside the sandbox. Errors from another context fail `instanceof Error`.
 */
export function sandboxErrorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message
  }
  return String(error)
}

/**
 * Compiles user code and checks that it defines `main` as its only top-level function.
 *
 * Top-level statements are evaluated once against inert API stubs to collect the declarations.
 *
 * @throws Error describing the first problem found
 */
export function compileCode(source: string, timeoutMs: number): vm.Script {
  const script = new vm.Script(source, { filename: SANDBOX_FILENAME })
  const stubs: Record<string, unknown> = {}
  for (const name of SANDBOX_API_NAMES) {
    stubs[name] = () => undefined
  }
  const sandbox: Record<string, unknown> = { ...stubs, console: silentConsole() }
  const context = vm.createContext(sandbox)
  try {
    script.runInContext(context, { timeout: timeoutMs })
  } catch (error) {
    throw new Error(`Error while evaluating the code: ${sandboxErrorMessage(error)}`)
  }

  if (typeof sandbox[ENTRY_POINT] !== 'function') {
    throw new Error(`The code must define a top-level function named '${ENTRY_POINT}'`)
  }
  for (const [name, value] of Object.entries(sandbox)) {
    if (name === ENTRY_POINT || name in stubs || typeof value !== 'function') continue
    throw new Error(`Only the '${ENTRY_POINT}' function may be defined at the top level; found '${name}'`)
  }
  return script
}

export interface SandboxInvocation {
  api: SandboxApi
  console: Pick<Console, 'log' | 'info' | 'warn' | 'error' | 'debug'>
  input: string
  context: Record<string, unknown>
  timeoutMs: number
}

/**
 * Evaluates the compiled code in a fresh context and calls `main(input, context)`.
 *
 * Synchronous work is bounded by the vm timeout; a returned promise is raced against the same budget.
 *
 * @returns What `main` returned, awaited
 * @throws Whatever the code or the API functions throw
 */
export async function runCode(script: vm.Script, invocation: SandboxInvocation): Promise<unknown> {
  const { timeoutMs } = invocation
  const sandbox: Record<string, unknown> = {
    ...invocation.api,
    console: invocation.console,
    __input: invocation.input,
    __context: invocation.context,
  }
  const context = vm.createContext(sandbox)
  script.runInContext(context, { timeout: timeoutMs })
  const result: unknown = INVOKE_MAIN.runInContext(context, { timeout: timeoutMs })
  return withTimeout(Promise.resolve(result), timeoutMs)
}

async function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`Code execution timed out after ${timeoutMs}ms`)), timeoutMs)
  })
  try {
    return await Promise.race([promise, timeout])
  } finally {
    clearTimeout(timer)
  }
}

function silentConsole(): SandboxInvocation['console'] {
  const noop = (): void => {}
  return { log: noop, info: noop, warn: noop, error: noop, debug: noop }
}
