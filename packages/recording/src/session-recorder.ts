import type { RecordingEncoder } from './encoder'
import {
  type ChannelDecodeErrorPayload,
  type ChannelOpaquePayload,
  type ClientInfoPayload,
  type ClipboardPayload,
  type Direction,
  encodeJsonPayload,
  encodeTaggedBytes,
  type HookTimeoutPayload,
  type InputPayload,
  type NegotiationPayload,
  type SessionEndPayload,
  type SessionStartPayload,
} from './events'
import { EventKind, type RecordedEvent } from './format'

export type ChannelRecordKind = 'observed' | 'modified' | 'suppressed'

const CHANNEL_KIND_CODES: Record<ChannelRecordKind, number> = {
  observed: EventKind.ChannelObserved,
  modified: EventKind.ChannelModified,
  suppressed: EventKind.ChannelSuppressed,
}

export function microsecondClock(): number {
  return Date.now() * 1000
}

/**
 * Typed front for one session's slice of a recording. Once `sessionEnd` has
 * been written every further call is ignored and returns `undefined`.
 */
export class SessionRecorder {
  readonly sessionId: string
  #encoder: RecordingEncoder
  #clock: () => number
  #ended = false

  constructor(
    encoder: RecordingEncoder,
    sessionId: string,
    clock: () => number = microsecondClock,
  ) {
    this.#encoder = encoder
    this.sessionId = sessionId
    this.#clock = clock
  }

  get ended(): boolean {
    return this.#ended
  }

  sessionStart(value: SessionStartPayload): RecordedEvent | undefined {
    return this.#appendJson(EventKind.SessionStart, value)
  }

  sessionEnd(value: SessionEndPayload): RecordedEvent | undefined {
    const event = this.#appendJson(EventKind.SessionEnd, value)
    this.#ended = true
    return event
  }

  pdu(
    direction: Direction,
    framing: string,
    data: Uint8Array,
  ): RecordedEvent | undefined {
    return this.#append(
      EventKind.Pdu,
      encodeTaggedBytes({ direction, tag: framing, data }),
    )
  }

  negotiation(value: NegotiationPayload): RecordedEvent | undefined {
    return this.#appendJson(EventKind.Negotiation, value)
  }

  clientInfo(value: ClientInfoPayload): RecordedEvent | undefined {
    return this.#appendJson(EventKind.ClientInfo, value)
  }

  channel(
    kind: ChannelRecordKind,
    direction: Direction,
    channel: string,
    data: Uint8Array,
  ): RecordedEvent | undefined {
    return this.#append(
      CHANNEL_KIND_CODES[kind],
      encodeTaggedBytes({ direction, tag: channel, data }),
    )
  }

  opaqueChannel(value: ChannelOpaquePayload): RecordedEvent | undefined {
    return this.#appendJson(EventKind.ChannelOpaque, value)
  }

  decodeError(value: ChannelDecodeErrorPayload): RecordedEvent | undefined {
    return this.#appendJson(EventKind.ChannelDecodeError, value)
  }

  hookTimeout(value: HookTimeoutPayload): RecordedEvent | undefined {
    return this.#appendJson(EventKind.HookTimeout, value)
  }

  input(value: InputPayload): RecordedEvent | undefined {
    return this.#appendJson(EventKind.Input, value)
  }

  clipboard(value: ClipboardPayload): RecordedEvent | undefined {
    return this.#appendJson(EventKind.Clipboard, value)
  }

  #appendJson(kind: number, value: unknown): RecordedEvent | undefined {
    return this.#append(kind, encodeJsonPayload(value))
  }

  #append(kind: number, payload: Uint8Array): RecordedEvent | undefined {
    if (this.#ended || this.#encoder.closed) {
      return undefined
    }
    return this.#encoder.append(this.#clock(), this.sessionId, kind, payload)
  }
}
