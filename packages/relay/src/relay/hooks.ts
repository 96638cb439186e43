import type { Replacement } from '../channels/multiplexer'
import type { Direction } from '../channels/types'
import type { Diagnostics } from '../diagnostics'
import { HookTimeoutError } from '../errors'

/** What a hook sees: one complete channel message in one direction. */
export interface InterceptedMessage {
  readonly direction: Direction
  readonly channel: string
  readonly channelType: string
  /** Absent for opaque messages and after an undecodable byte replacement. */
  readonly event?: unknown
  readonly data: Uint8Array
}

export type HookDecision =
  | { readonly action: 'pass' }
  | { readonly action: 'drop' }
  | { readonly action: 'replace'; readonly replacement: Replacement }

export type HookResult = HookDecision | undefined | void

export type HookPredicate = (message: InterceptedMessage) => boolean
export type HookCallback = (message: InterceptedMessage) => HookResult | PromiseLike<HookResult>

export const pass = (): HookDecision => ({ action: 'pass' })
export const drop = (): HookDecision => ({ action: 'drop' })
export const replaceEvent = (event: unknown): HookDecision => ({
  action: 'replace',
  replacement: { event },
})
export const replaceData = (data: Uint8Array): HookDecision => ({
  action: 'replace',
  replacement: { data },
})

/** Turns replacements into the other representation for later hooks. */
export interface MessageCodec {
  encode(event: unknown): Uint8Array
  decode(data: Uint8Array): unknown
}

export type HookOutcome =
  | { readonly action: 'pass' }
  | { readonly action: 'drop'; readonly hookId: number }
  | {
      readonly action: 'replace'
      readonly message: InterceptedMessage
      readonly replacement: Replacement
    }
  | { readonly action: 'timeout'; readonly error: HookTimeoutError }

interface RegisteredHook {
  readonly id: number
  readonly predicate: HookPredicate
  readonly callback: HookCallback
}

type Settled =
  | { readonly status: 'done'; readonly result: HookResult }
  | { readonly status: 'timeout' }

/**
 * Ordered list of interception hooks. Each matching hook sees the message as
 * left by the hooks before it; a drop ends the run and a timeout discards
 * every replacement made so far.
 */
export class HookRegistry {
  readonly #hooks: RegisteredHook[] = []
  readonly #timeoutMs: number
  readonly #diagnostics: Diagnostics | undefined
  #nextId = 1

  constructor(options: { timeoutMs: number; diagnostics?: Diagnostics }) {
    this.#timeoutMs = options.timeoutMs
    this.#diagnostics = options.diagnostics
  }

  get size(): number {
    return this.#hooks.length
  }

  register(predicate: HookPredicate, callback: HookCallback): () => void {
    const hook = { id: this.#nextId++, predicate, callback }
    this.#hooks.push(hook)
    return () => {
      const index = this.#hooks.indexOf(hook)
      if (index >= 0) this.#hooks.splice(index, 1)
    }
  }

  async run(initial: InterceptedMessage, codec: MessageCodec): Promise<HookOutcome> {
    let message = initial
    let replacement: Replacement | undefined
    for (const hook of [...this.#hooks]) {
      if (!this.#matches(hook, message)) continue
      const settled = await this.#invoke(hook, message)
      if (settled.status === 'timeout') {
        const error = new HookTimeoutError(hook.id, this.#timeoutMs)
        this.#diagnostics?.warn('hook-timeout', error.message, {
          channel: message.channel,
          direction: message.direction,
        })
        return { action: 'timeout', error }
      }
      const decision = settled.result
      if (!decision || decision.action === 'pass') continue
      if (decision.action === 'drop') {
        return { action: 'drop', hookId: hook.id }
      }
      const next = this.#apply(message, decision.replacement, codec)
      if (!next) continue
      message = next
      replacement = decision.replacement
    }
    return replacement ? { action: 'replace', message, replacement } : { action: 'pass' }
  }

  #matches(hook: RegisteredHook, message: InterceptedMessage): boolean {
    try {
      return hook.predicate(message)
    } catch (error) {
      this.#reportFailure(hook, 'hook-predicate-failed', error)
      return false
    }
  }

  #apply(
    message: InterceptedMessage,
    replacement: Replacement,
    codec: MessageCodec,
  ): InterceptedMessage | undefined {
    if ('data' in replacement) {
      return { ...message, data: replacement.data, event: tryDecode(codec, replacement.data) }
    }
    try {
      return { ...message, event: replacement.event, data: codec.encode(replacement.event) }
    } catch (error) {
      this.#diagnostics?.error(
        'hook-replacement-invalid',
        `Replacement on ${message.channel} could not be encoded`,
        { error },
      )
      return undefined
    }
  }

  async #invoke(hook: RegisteredHook, message: InterceptedMessage): Promise<Settled> {
    let result: HookResult | PromiseLike<HookResult>
    try {
      result = hook.callback(message)
    } catch (error) {
      this.#reportFailure(hook, 'hook-failed', error)
      return { status: 'done', result: undefined }
    }
    if (!isPromiseLike(result)) {
      return { status: 'done', result }
    }
    const pending = Promise.resolve(result)
    let timer: ReturnType<typeof setTimeout> | undefined
    const timeout = new Promise<Settled>((resolve) => {
      timer = setTimeout(() => resolve({ status: 'timeout' }), this.#timeoutMs)
    })
    const completion = pending.then(
      (value): Settled => ({ status: 'done', result: value }),
      (error: unknown): Settled => {
        this.#reportFailure(hook, 'hook-failed', error)
        return { status: 'done', result: undefined }
      },
    )
    try {
      return await Promise.race([completion, timeout])
    } finally {
      clearTimeout(timer)
    }
  }

  #reportFailure(hook: RegisteredHook, code: string, error: unknown): void {
    this.#diagnostics?.error(
      code,
      `Hook ${hook.id} failed: ${error instanceof Error ? error.message : String(error)}`,
      { hookId: hook.id },
    )
  }
}

function isPromiseLike(value: unknown): value is PromiseLike<HookResult> {
  return typeof value === 'object' && value !== null && 'then' in value && typeof value.then === 'function'
}

function tryDecode(codec: MessageCodec, data: Uint8Array): unknown {
  try {
    return codec.decode(data)
  } catch {
    return undefined
  }
}
