import { RecordingDecoder } from './decoder'
import type { CorruptRecordError } from './errors'
import {
  type ClientInfoPayload,
  decodeEventPayload,
  type DecodedEventPayload,
  PayloadDecodeError,
} from './events'
import { type EventKindName, eventKindName, type RecordedEvent } from './format'

export interface RecordingQuery {
  readonly sessionId?: string
  readonly kinds?: ReadonlyArray<number>
  /** Inclusive lower bound, microseconds. */
  readonly from?: number
  /** Inclusive upper bound, microseconds. */
  readonly until?: number
}

export interface SessionSummary {
  readonly sessionId: string
  readonly eventCount: number
  readonly firstTimestamp: number
  readonly lastTimestamp: number
  readonly kinds: Readonly<Record<string, number>>
  readonly ended: boolean
  readonly endReason?: string
  readonly credentials: ReadonlyArray<ClientInfoPayload>
}

interface MutableSummary {
  sessionId: string
  eventCount: number
  firstTimestamp: number
  lastTimestamp: number
  kinds: Record<string, number>
  ended: boolean
  endReason?: string
  credentials: ClientInfoPayload[]
}

export function matchesQuery(
  event: RecordedEvent,
  query: RecordingQuery,
): boolean {
  if (query.sessionId !== undefined && event.sessionId !== query.sessionId) {
    return false
  }
  if (query.kinds && !query.kinds.includes(event.kind)) {
    return false
  }
  if (query.from !== undefined && event.timestamp < query.from) {
    return false
  }
  if (query.until !== undefined && event.timestamp > query.until) {
    return false
  }
  return true
}

/**
 * Read-side surface over a finalized recording, used by replay and analysis
 * tooling. Every method walks the underlying bytes again.
 */
export class RecordingReader {
  readonly #decoder: RecordingDecoder

  constructor(bytes: Uint8Array) {
    this.#decoder = new RecordingDecoder(bytes)
  }

  get decoder(): RecordingDecoder {
    return this.#decoder
  }

  *select(query: RecordingQuery = {}): Generator<RecordedEvent, void, undefined> {
    for (const event of this.#decoder.events()) {
      if (matchesQuery(event, query)) {
        yield event
      }
    }
  }

  corruptRecords(): CorruptRecordError[] {
    const errors: CorruptRecordError[] = []
    for (const entry of this.#decoder.entries()) {
      if (entry.type === 'corrupt') {
        errors.push(entry.error)
      }
    }
    return errors
  }

  sessions(): SessionSummary[] {
    const summaries = new Map<string, MutableSummary>()
    for (const event of this.#decoder.events()) {
      let summary = summaries.get(event.sessionId)
      if (!summary) {
        summary = {
          sessionId: event.sessionId,
          eventCount: 0,
          firstTimestamp: event.timestamp,
          lastTimestamp: event.timestamp,
          kinds: {},
          ended: false,
          credentials: [],
        }
        summaries.set(event.sessionId, summary)
      }
      summary.eventCount += 1
      summary.lastTimestamp = event.timestamp
      const name = eventKindName(event.kind) ?? `kind-${event.kind}`
      summary.kinds[name] = (summary.kinds[name] ?? 0) + 1
      const decoded = safeDecode(event)
      if (decoded?.kind === 'SessionEnd') {
        summary.ended = true
        summary.endReason = decoded.value.reason
      } else if (decoded?.kind === 'ClientInfo') {
        summary.credentials.push(decoded.value)
      }
    }
    return Array.from(summaries.values())
  }

  /** One JSON document per event; binary bodies are base64 encoded. */
  *toJsonLines(query: RecordingQuery = {}): Generator<string, void, undefined> {
    for (const event of this.select(query)) {
      yield JSON.stringify(toJsonRecord(event))
    }
  }
}

function safeDecode(event: RecordedEvent): DecodedEventPayload | undefined {
  try {
    return decodeEventPayload(event)
  } catch (error) {
    if (error instanceof PayloadDecodeError) {
      return undefined
    }
    throw error
  }
}

interface JsonRecord {
  readonly sessionId: string
  readonly timestamp: number
  readonly kind: EventKindName | number
  readonly payload: unknown
  readonly error?: string
}

export function toJsonRecord(event: RecordedEvent): JsonRecord {
  const base = {
    sessionId: event.sessionId,
    timestamp: event.timestamp,
    kind: eventKindName(event.kind) ?? event.kind,
  }
  let decoded: DecodedEventPayload
  try {
    decoded = decodeEventPayload(event)
  } catch (error) {
    if (!(error instanceof PayloadDecodeError)) {
      throw error
    }
    return {
      ...base,
      payload: Buffer.from(event.payload).toString('base64'),
      error: error.message,
    }
  }
  switch (decoded.kind) {
    case 'unknown':
      return { ...base, payload: Buffer.from(decoded.payload).toString('base64') }
    case 'Pdu':
    case 'ChannelObserved':
    case 'ChannelModified':
    case 'ChannelSuppressed':
      return {
        ...base,
        payload: {
          direction: decoded.value.direction,
          tag: decoded.value.tag,
          data: Buffer.from(decoded.value.data).toString('base64'),
        },
      }
    default:
      return { ...base, payload: decoded.value }
  }
}
