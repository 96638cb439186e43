import { crc32 } from './crc32'
import { RecordingClosedError, RecordingError } from './errors'
import {
  EventKind,
  MAX_PAYLOAD_LENGTH,
  MAX_SESSION_ID_LENGTH,
  RECORD_FORMAT_VERSION,
  RECORD_MAGIC,
  RECORD_OVERHEAD,
  type RecordedEvent,
} from './format'

const UTF8_ENCODER = new TextEncoder()

/**
 * Destination for encoded records. A sink is owned by exactly one encoder;
 * `write` must keep call order and must not block the caller.
 */
export interface RecordingSink {
  write(chunk: Uint8Array): void
  close(): Promise<void>
}

export class MemoryRecordingSink implements RecordingSink {
  #chunks: Uint8Array[] = []
  #closed = false

  get closed(): boolean {
    return this.#closed
  }

  write(chunk: Uint8Array): void {
    if (this.#closed) {
      throw new RecordingClosedError('Cannot write to a closed memory sink')
    }
    this.#chunks.push(chunk)
  }

  async close(): Promise<void> {
    this.#closed = true
  }

  toUint8Array(): Uint8Array {
    const total = this.#chunks.reduce((sum, chunk) => sum + chunk.length, 0)
    const result = new Uint8Array(total)
    let offset = 0
    for (const chunk of this.#chunks) {
      result.set(chunk, offset)
      offset += chunk.length
    }
    return result
  }
}

export function encodeRecord(event: RecordedEvent): Uint8Array {
  const sessionId = UTF8_ENCODER.encode(event.sessionId)
  if (sessionId.length === 0 || sessionId.length > MAX_SESSION_ID_LENGTH) {
    throw new RecordingError(
      `Session id must encode to 1..${MAX_SESSION_ID_LENGTH} bytes (got ${sessionId.length})`,
    )
  }
  if (event.payload.length > MAX_PAYLOAD_LENGTH) {
    throw new RecordingError(
      `Payload of ${event.payload.length} bytes exceeds ${MAX_PAYLOAD_LENGTH}`,
    )
  }
  if (!Number.isSafeInteger(event.timestamp) || event.timestamp < 0) {
    throw new RecordingError(`Invalid timestamp ${event.timestamp}`)
  }
  if (!Number.isInteger(event.kind) || event.kind < 0 || event.kind > 0xffff) {
    throw new RecordingError(`Invalid event kind ${event.kind}`)
  }

  const total = RECORD_OVERHEAD + sessionId.length + event.payload.length
  const record = new Uint8Array(total)
  const view = new DataView(record.buffer)
  let offset = 0
  view.setUint32(offset, RECORD_MAGIC, false)
  offset += 4
  view.setUint8(offset, RECORD_FORMAT_VERSION)
  offset += 1
  view.setUint8(offset, sessionId.length)
  offset += 1
  record.set(sessionId, offset)
  offset += sessionId.length
  view.setBigUint64(offset, BigInt(event.timestamp), false)
  offset += 8
  view.setUint16(offset, event.kind, false)
  offset += 2
  view.setUint32(offset, event.payload.length, false)
  offset += 4
  record.set(event.payload, offset)
  offset += event.payload.length
  view.setUint32(offset, crc32(record, 4, offset), false)
  return record
}

export interface RecordingEncoderOptions {
  /** Called with every event after it has been handed to the sink. */
  readonly onAppend?: (event: RecordedEvent) => void
}

/**
 * Append-only writer. Timestamps are clamped so that each session's events
 * are strictly increasing; nothing may follow a session's end event.
 */
export class RecordingEncoder {
  #sink: RecordingSink
  #options: RecordingEncoderOptions
  #lastTimestamp = new Map<string, number>()
  #endedSessions = new Set<string>()
  #closed = false
  #appended = 0

  constructor(sink: RecordingSink, options: RecordingEncoderOptions = {}) {
    this.#sink = sink
    this.#options = options
  }

  get closed(): boolean {
    return this.#closed
  }

  get appendedCount(): number {
    return this.#appended
  }

  hasEnded(sessionId: string): boolean {
    return this.#endedSessions.has(sessionId)
  }

  append(
    timestamp: number,
    sessionId: string,
    eventKind: number,
    payload: Uint8Array,
  ): RecordedEvent {
    if (this.#closed) {
      throw new RecordingClosedError('Cannot append to a closed recording')
    }
    if (this.#endedSessions.has(sessionId)) {
      throw new RecordingClosedError(
        `Session ${sessionId} has already ended; recording is immutable`,
      )
    }
    const previous = this.#lastTimestamp.get(sessionId)
    const normalized = Math.max(0, Math.floor(timestamp))
    const effective =
      previous !== undefined && normalized <= previous
        ? previous + 1
        : normalized
    const event: RecordedEvent = {
      sessionId,
      timestamp: effective,
      kind: eventKind,
      payload,
    }
    this.#sink.write(encodeRecord(event))
    this.#lastTimestamp.set(sessionId, effective)
    this.#appended += 1
    if (eventKind === EventKind.SessionEnd) {
      this.#endedSessions.add(sessionId)
    }
    this.#options.onAppend?.(event)
    return event
  }

  async close(): Promise<void> {
    if (this.#closed) return
    this.#closed = true
    await this.#sink.close()
  }
}
