import { afterEach, describe, expect, it, vi } from 'vitest'

import { CollectingDiagnostics, Diagnostics } from '../src/diagnostics'
import { HookTimeoutError } from '../src/errors'
import {
  drop,
  HookRegistry,
  type HookResult,
  type InterceptedMessage,
  type MessageCodec,
  pass,
  replaceData,
  replaceEvent,
} from '../src/relay/hooks'

const encoder = new TextEncoder()
const decoder = new TextDecoder()

const textCodec: MessageCodec = {
  encode(event) {
    if (typeof event !== 'string') throw new Error('not text')
    return encoder.encode(event)
  },
  decode: (data) => decoder.decode(data),
}

const message: InterceptedMessage = {
  direction: 'client-to-server',
  channel: 'cliprdr',
  channelType: 'cliprdr',
  event: 'original',
  data: encoder.encode('original'),
}

const any = (): boolean => true

function flush(): Promise<void> {
  return new Promise((resolve) => queueMicrotask(resolve))
}

function createRegistry(timeoutMs = 50) {
  const sink = new CollectingDiagnostics()
  const hooks = new HookRegistry({ timeoutMs, diagnostics: new Diagnostics(sink, 'hooks') })
  return { hooks, sink }
}

afterEach(() => {
  vi.useRealTimers()
})

describe('HookRegistry', () => {
  it('passes when nothing matches', async () => {
    const { hooks } = createRegistry()
    const callback = vi.fn(pass)
    hooks.register((candidate) => candidate.channel === 'rdpdr', callback)

    await expect(hooks.run(message, textCodec)).resolves.toEqual({ action: 'pass' })
    expect(callback).not.toHaveBeenCalled()
  })

  it('shows each hook the message as the previous hook left it', async () => {
    const { hooks } = createRegistry()
    const seen: InterceptedMessage[] = []
    hooks.register(any, () => replaceEvent('first'))
    hooks.register(any, (current) => {
      seen.push(current)
      return replaceEvent(`${String(current.event)} second`)
    })

    const outcome = await hooks.run(message, textCodec)

    expect(seen).toEqual([{ ...message, event: 'first', data: encoder.encode('first') }])
    expect(outcome).toEqual({
      action: 'replace',
      message: { ...message, event: 'first second', data: encoder.encode('first second') },
      replacement: { event: 'first second' },
    })
  })

  it('decodes byte replacements for later hooks', async () => {
    const { hooks } = createRegistry()
    const events: unknown[] = []
    hooks.register(any, () => replaceData(encoder.encode('bytes')))
    hooks.register(any, (current) => {
      events.push(current.event)
    })

    const outcome = await hooks.run(message, textCodec)

    expect(events).toEqual(['bytes'])
    expect(outcome).toMatchObject({ action: 'replace', replacement: { data: encoder.encode('bytes') } })
  })

  it('stops at the first drop', async () => {
    const { hooks } = createRegistry()
    const later = vi.fn(pass)
    hooks.register(any, pass)
    hooks.register(any, drop)
    hooks.register(any, later)

    await expect(hooks.run(message, textCodec)).resolves.toEqual({ action: 'drop', hookId: 2 })
    expect(later).not.toHaveBeenCalled()
  })

  it('ignores a replacement that cannot be encoded', async () => {
    const { hooks, sink } = createRegistry()
    hooks.register(any, () => replaceEvent(42))

    await expect(hooks.run(message, textCodec)).resolves.toEqual({ action: 'pass' })
    await flush()
    expect(sink.records).toMatchObject([
      {
        level: 'error',
        component: 'hooks',
        code: 'hook-replacement-invalid',
        message: 'Replacement on cliprdr could not be encoded',
      },
    ])
  })

  it('skips hooks that throw or reject', async () => {
    const { hooks, sink } = createRegistry()
    hooks.register(any, () => {
      throw new Error('boom')
    })
    hooks.register(any, () => Promise.reject(new Error('later boom')))
    hooks.register(
      () => {
        throw new Error('bad predicate')
      },
      drop,
    )
    hooks.register(any, () => replaceEvent('survived'))

    const outcome = await hooks.run(message, textCodec)
    await flush()

    expect(outcome).toMatchObject({ action: 'replace', replacement: { event: 'survived' } })
    expect(sink.records.map((record) => [record.code, record.message])).toEqual([
      ['hook-failed', 'Hook 1 failed: boom'],
      ['hook-failed', 'Hook 2 failed: later boom'],
      ['hook-predicate-failed', 'Hook 3 failed: bad predicate'],
    ])
  })

  it('waits for async hooks within the budget', async () => {
    const { hooks } = createRegistry()
    hooks.register(any, async () => replaceEvent('async'))

    await expect(hooks.run(message, textCodec)).resolves.toMatchObject({
      action: 'replace',
      replacement: { event: 'async' },
    })
  })

  it('abandons earlier replacements when a hook times out', async () => {
    vi.useFakeTimers()
    const { hooks, sink } = createRegistry(50)
    const later = vi.fn(pass)
    hooks.register(any, () => replaceEvent('lost'))
    hooks.register(any, () => new Promise<undefined>(() => undefined))
    hooks.register(any, later)

    const run = hooks.run(message, textCodec)
    await vi.advanceTimersByTimeAsync(50)
    const outcome = await run

    expect(outcome.action).toBe('timeout')
    if (outcome.action !== 'timeout') throw new Error('expected a timeout')
    expect(outcome.error).toBeInstanceOf(HookTimeoutError)
    expect(outcome.error.message).toBe('Hook 2 exceeded its 50ms budget')
    expect(later).not.toHaveBeenCalled()

    await flush()
    expect(sink.records).toMatchObject([
      {
        level: 'warn',
        code: 'hook-timeout',
        detail: { channel: 'cliprdr', direction: 'client-to-server' },
      },
    ])
  })

  it('bounds hooks that return a bare thenable', async () => {
    vi.useFakeTimers()
    const { hooks } = createRegistry(50)
    const never = new Promise<HookResult>(() => undefined)
    const thenable: PromiseLike<HookResult> = {
      then: (onfulfilled, onrejected) => never.then(onfulfilled, onrejected),
    }
    hooks.register(any, () => thenable)

    const run = hooks.run(message, textCodec)
    await vi.advanceTimersByTimeAsync(50)
    const outcome = await run

    expect(outcome.action).toBe('timeout')
    if (outcome.action !== 'timeout') throw new Error('expected a timeout')
    expect(outcome.error.hookId).toBe(1)
    expect(outcome.error.budgetMs).toBe(50)
  })

  it('takes the decision a thenable resolves to', async () => {
    const { hooks } = createRegistry()
    const settled = Promise.resolve<HookResult>(replaceEvent('thenable'))
    const thenable: PromiseLike<HookResult> = {
      then: (onfulfilled, onrejected) => settled.then(onfulfilled, onrejected),
    }
    hooks.register(any, () => thenable)

    await expect(hooks.run(message, textCodec)).resolves.toMatchObject({
      action: 'replace',
      replacement: { event: 'thenable' },
    })
  })

  it('unregisters hooks', async () => {
    const { hooks } = createRegistry()
    const unregister = hooks.register(any, drop)
    expect(hooks.size).toBe(1)

    unregister()
    unregister()

    expect(hooks.size).toBe(0)
    await expect(hooks.run(message, textCodec)).resolves.toEqual({ action: 'pass' })
  })
})
