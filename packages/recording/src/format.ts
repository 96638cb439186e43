/**
 * Binary layout of one record (all integers big-endian):
 *
 *   magic        u32   'RREC'
 *   version      u8
 *   idLength     u8
 *   sessionId    idLength bytes, UTF-8
 *   timestamp    u64   microseconds since the Unix epoch
 *   kind         u16
 *   length       u32
 *   payload      length bytes
 *   checksum     u32   CRC-32 of everything between magic and checksum
 *
 * Records are self-delimiting; there is no file header or trailing index, so
 * a file cut short mid-write is still readable up to its last whole record.
 */
export const RECORD_MAGIC = 0x52524543
export const RECORD_FORMAT_VERSION = 1
export const RECORD_MAGIC_LENGTH = 4
/** Bytes of a record excluding the session id and payload. */
export const RECORD_OVERHEAD = 24
export const MAX_SESSION_ID_LENGTH = 255
export const MAX_PAYLOAD_LENGTH = 64 * 1024 * 1024

export const EventKind = {
  SessionStart: 0x0001,
  SessionEnd: 0x0002,
  Pdu: 0x0010,
  Negotiation: 0x0011,
  ClientInfo: 0x0012,
  ChannelObserved: 0x0020,
  ChannelModified: 0x0021,
  ChannelSuppressed: 0x0022,
  ChannelOpaque: 0x0023,
  ChannelDecodeError: 0x0024,
  HookTimeout: 0x0025,
  Input: 0x0030,
  Clipboard: 0x0031,
} as const

export type EventKindName = keyof typeof EventKind
export type EventKindCode = (typeof EventKind)[EventKindName]

function isEventKindName(name: string): name is EventKindName {
  return Object.hasOwn(EventKind, name)
}

const NAMES_BY_CODE = new Map<number, EventKindName>()
for (const name of Object.keys(EventKind)) {
  if (isEventKindName(name)) {
    NAMES_BY_CODE.set(EventKind[name], name)
  }
}

export function eventKindName(kind: number): EventKindName | undefined {
  return NAMES_BY_CODE.get(kind)
}

export function isKnownEventKind(kind: number): kind is EventKindCode {
  return NAMES_BY_CODE.has(kind)
}

/**
 * One persisted event. `kind` stays numeric so events written by a newer
 * encoder survive a round trip through an older decoder.
 */
export interface RecordedEvent {
  readonly sessionId: string
  readonly timestamp: number
  readonly kind: number
  readonly payload: Uint8Array
}
