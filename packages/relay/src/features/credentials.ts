import type { InputEventRecord } from '@rdp-relay/recording'
import { z } from 'zod'

import { IO_CHANNEL } from '../channels/types'
import type { Diagnostics } from '../diagnostics'
import type { RelaySession } from '../relay/session'
import { inputFromIoEvent } from './input'
import scancodeTable from './scancodes.json'

const SCANCODES = z.record(z.tuple([z.string(), z.string()])).parse(scancodeTable)

const Scancode = {
  Backspace: 0x0e,
  Enter: 0x1c,
  LeftShift: 0x2a,
  RightShift: 0x36,
} as const

/**
 * Rebuilds typed lines from key events on a US layout. Extended keys and
 * unmapped scancodes are ignored.
 */
export class KeystrokeTranscriber {
  #line = ''
  #shift = false

  feed(event: InputEventRecord): string | undefined {
    if (event.type === 'unicode') {
      if (!event.released) this.#line += String.fromCharCode(event.code)
      return undefined
    }
    if (event.type !== 'scancode' || event.extended) return undefined
    if (event.code === Scancode.LeftShift || event.code === Scancode.RightShift) {
      this.#shift = !event.released
      return undefined
    }
    if (event.released) return undefined
    if (event.code === Scancode.Enter) {
      return this.flush()
    }
    if (event.code === Scancode.Backspace) {
      this.#line = this.#line.slice(0, -1)
      return undefined
    }
    const keys = SCANCODES[String(event.code)]
    if (keys) this.#line += this.#shift ? keys[1] : keys[0]
    return undefined
  }

  /** Returns and clears the pending line, if any. */
  flush(): string | undefined {
    const line = this.#line
    this.#line = ''
    return line.length > 0 ? line : undefined
  }
}

export interface CredentialCaptureOptions {
  readonly diagnostics?: Diagnostics
}

/**
 * Records client input and the credentials from the client info PDU, and
 * reports typed lines as they are completed.
 */
export function installCredentialCapture(
  session: RelaySession,
  options: CredentialCaptureOptions = {},
): () => void {
  const diagnostics = options.diagnostics
  const transcriber = new KeystrokeTranscriber()
  const reportLine = (line: string | undefined) => {
    if (line !== undefined) {
      diagnostics?.info('typed-text', 'Client typed a line', { sessionId: session.sessionId, line })
    }
  }

  const unsubscribe = session.subscribe((event) => {
    if (event.type === 'client-info') {
      diagnostics?.info('credentials', 'Client credentials captured', {
        sessionId: session.sessionId,
        domain: event.original.domain,
        username: event.original.username,
        replaced: event.original.username !== event.forwarded.username,
      })
    } else if (event.type === 'closed') {
      reportLine(transcriber.flush())
    }
  })

  const unregister = session.registerHook(
    (message) => message.channel === IO_CHANNEL && message.direction === 'client-to-server',
    (message) => {
      const batch = inputFromIoEvent(message.event)
      if (!batch || batch.events.length === 0) return
      const { direction } = message
      session.record((recorder) =>
        recorder.input({ direction, source: batch.source, events: batch.events }),
      )
      for (const event of batch.events) {
        reportLine(transcriber.feed(event))
      }
    },
  )

  return () => {
    unregister()
    unsubscribe()
  }
}
