import { crc32 } from './crc32'
import { CorruptRecordError } from './errors'
import {
  MAX_PAYLOAD_LENGTH,
  RECORD_FORMAT_VERSION,
  RECORD_MAGIC,
  RECORD_OVERHEAD,
  type RecordedEvent,
} from './format'

const UTF8_DECODER = new TextDecoder('utf-8', { fatal: true })
const MAGIC_BYTES = Uint8Array.of(0x52, 0x52, 0x45, 0x43)

export type RecordEntry =
  | {
      readonly type: 'event'
      readonly offset: number
      readonly event: RecordedEvent
    }
  | {
      readonly type: 'corrupt'
      readonly offset: number
      readonly error: CorruptRecordError
    }

type ParseResult =
  | {
      readonly status: 'ok'
      readonly event: RecordedEvent
      readonly end: number
    }
  | { readonly status: 'truncated' }
  | { readonly status: 'corrupt'; readonly reason: string }

/**
 * Lazily walks the records of a recording held in memory. Every call to
 * `entries()` starts again from the first byte.
 */
export class RecordingDecoder implements Iterable<RecordEntry> {
  readonly #bytes: Uint8Array
  readonly #view: DataView

  constructor(bytes: Uint8Array) {
    this.#bytes = bytes
    this.#view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  }

  get byteLength(): number {
    return this.#bytes.length
  }

  *entries(): Generator<RecordEntry, void, undefined> {
    let offset = 0
    while (offset < this.#bytes.length) {
      const result = this.#parseAt(offset)
      if (result.status === 'ok') {
        yield { type: 'event', offset, event: result.event }
        offset = result.end
        continue
      }

      const next = this.#findNextRecord(offset + 1)
      if (result.status === 'truncated' && next === -1) {
        // A partially written tail: the last whole record has been read.
        return
      }
      const reason =
        result.status === 'truncated'
          ? 'Record extends beyond the end of the data'
          : result.reason
      yield {
        type: 'corrupt',
        offset,
        error: new CorruptRecordError(`${reason} at offset ${offset}`, offset),
      }
      if (next === -1) {
        return
      }
      offset = next
    }
  }

  /** Well-formed events only; `onCorrupt` sees every skipped record. */
  *events(
    onCorrupt?: (error: CorruptRecordError) => void,
  ): Generator<RecordedEvent, void, undefined> {
    for (const entry of this.entries()) {
      if (entry.type === 'event') {
        yield entry.event
      } else {
        onCorrupt?.(entry.error)
      }
    }
  }

  [Symbol.iterator](): Iterator<RecordEntry> {
    return this.entries()
  }

  #parseAt(offset: number): ParseResult {
    const bytes = this.#bytes
    const view = this.#view
    if (bytes.length - offset < 6) {
      return { status: 'truncated' }
    }
    if (view.getUint32(offset, false) !== RECORD_MAGIC) {
      return { status: 'corrupt', reason: 'Missing record marker' }
    }
    const version = bytes[offset + 4] ?? 0
    const idLength = bytes[offset + 5] ?? 0
    if (idLength === 0) {
      return { status: 'corrupt', reason: 'Empty session id' }
    }
    const headerEnd = offset + RECORD_OVERHEAD - 4 + idLength
    if (headerEnd > bytes.length) {
      return { status: 'truncated' }
    }
    const payloadLength = view.getUint32(headerEnd - 4, false)
    if (payloadLength > MAX_PAYLOAD_LENGTH) {
      return {
        status: 'corrupt',
        reason: `Declared payload length ${payloadLength} exceeds ${MAX_PAYLOAD_LENGTH}`,
      }
    }
    const end = headerEnd + payloadLength + 4
    if (end > bytes.length) {
      return { status: 'truncated' }
    }
    const stored = view.getUint32(end - 4, false)
    if (stored !== crc32(bytes, offset + 4, end - 4)) {
      return { status: 'corrupt', reason: 'Checksum mismatch' }
    }
    if (version !== RECORD_FORMAT_VERSION) {
      return {
        status: 'corrupt',
        reason: `Unsupported record version ${version}`,
      }
    }

    let sessionId: string
    try {
      sessionId = UTF8_DECODER.decode(
        bytes.subarray(offset + 6, offset + 6 + idLength),
      )
    } catch {
      return { status: 'corrupt', reason: 'Session id is not valid UTF-8' }
    }
    const timestamp = view.getBigUint64(offset + 6 + idLength, false)
    if (timestamp > BigInt(Number.MAX_SAFE_INTEGER)) {
      return { status: 'corrupt', reason: 'Timestamp out of range' }
    }
    const kind = view.getUint16(offset + 14 + idLength, false)
    return {
      status: 'ok',
      end,
      event: {
        sessionId,
        timestamp: Number(timestamp),
        kind,
        payload: bytes.slice(headerEnd, headerEnd + payloadLength),
      },
    }
  }

  #findNextRecord(from: number): number {
    let candidate = this.#indexOfMagic(from)
    while (candidate !== -1) {
      if (this.#parseAt(candidate).status === 'ok') {
        return candidate
      }
      candidate = this.#indexOfMagic(candidate + 1)
    }
    return -1
  }

  #indexOfMagic(from: number): number {
    const bytes = this.#bytes
    const first = MAGIC_BYTES[0] ?? 0
    let index = bytes.indexOf(first, from)
    while (index !== -1 && index + 4 <= bytes.length) {
      if (
        bytes[index + 1] === MAGIC_BYTES[1] &&
        bytes[index + 2] === MAGIC_BYTES[2] &&
        bytes[index + 3] === MAGIC_BYTES[3]
      ) {
        return index
      }
      index = bytes.indexOf(first, index + 1)
    }
    return -1
  }
}

export function decodeRecords(bytes: Uint8Array): RecordingDecoder {
  return new RecordingDecoder(bytes)
}
