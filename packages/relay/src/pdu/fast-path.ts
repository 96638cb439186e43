import { RdpDecodeError } from '../errors'
import { BinaryReader } from '../internal/binary/binary-reader'
import { BinaryWriter } from '../internal/binary/binary-writer'

/** Security bits of the fast-path header byte. */
export const FastPathSecurityFlag = {
  SecureChecksum: 0x40,
  Encrypted: 0x80,
} as const

export const FAST_PATH_SECURITY_MASK = 0xc0

export const FastPathInputCode = {
  Scancode: 0,
  Mouse: 1,
  MouseX: 2,
  Sync: 3,
  Unicode: 4,
  RelativeMouse: 5,
  QoeTimestamp: 6,
} as const

export const FastPathKeyboardFlag = {
  Release: 0x01,
  Extended: 0x02,
  Extended1: 0x04,
} as const

export type FastPathInputEvent =
  | { readonly type: 'scancode'; readonly flags: number; readonly keyCode: number }
  | { readonly type: 'unicode'; readonly flags: number; readonly unicode: number }
  | {
      readonly type: 'mouse' | 'mousex'
      readonly flags: number
      readonly pointerFlags: number
      readonly x: number
      readonly y: number
    }
  | {
      readonly type: 'relative-mouse'
      readonly flags: number
      readonly pointerFlags: number
      readonly dx: number
      readonly dy: number
    }
  | { readonly type: 'sync'; readonly flags: number }
  | { readonly type: 'qoe'; readonly flags: number; readonly timestamp: number }

export function fastPathEventCount(header: number): number {
  return (header >> 2) & 0x0f
}

/**
 * Decodes the input events of a client fast-path PDU. `body` is the
 * plaintext after any signature, starting with the optional count byte.
 */
export function decodeFastPathInput(header: number, body: Uint8Array): FastPathInputEvent[] {
  const reader = new BinaryReader(body)
  let count = fastPathEventCount(header)
  if (count === 0) {
    count = reader.readUint8()
  }
  const events: FastPathInputEvent[] = []
  for (let i = 0; i < count; i += 1) {
    const eventHeader = reader.readUint8()
    const flags = eventHeader & 0x1f
    const code = eventHeader >> 5
    switch (code) {
      case FastPathInputCode.Scancode:
        events.push({ type: 'scancode', flags, keyCode: reader.readUint8() })
        break
      case FastPathInputCode.Mouse:
      case FastPathInputCode.MouseX:
        events.push({
          type: code === FastPathInputCode.Mouse ? 'mouse' : 'mousex',
          flags,
          pointerFlags: reader.readUint16LE(),
          x: reader.readUint16LE(),
          y: reader.readUint16LE(),
        })
        break
      case FastPathInputCode.Sync:
        events.push({ type: 'sync', flags })
        break
      case FastPathInputCode.Unicode:
        events.push({ type: 'unicode', flags, unicode: reader.readUint16LE() })
        break
      case FastPathInputCode.RelativeMouse: {
        const pointerFlags = reader.readUint16LE()
        const dx = toInt16(reader.readUint16LE())
        const dy = toInt16(reader.readUint16LE())
        events.push({ type: 'relative-mouse', flags, pointerFlags, dx, dy })
        break
      }
      case FastPathInputCode.QoeTimestamp:
        events.push({ type: 'qoe', flags, timestamp: reader.readUint32LE() })
        break
      default:
        throw new RdpDecodeError(`Unknown fast-path input event code ${code}`)
    }
  }
  if (reader.remaining > 0) {
    throw new RdpDecodeError(`${reader.remaining} bytes follow the fast-path input events`)
  }
  return events
}

/**
 * Returns the header byte without its security bits, and the plaintext body,
 * for a list of input events.
 */
export function encodeFastPathInput(
  events: ReadonlyArray<FastPathInputEvent>,
): { header: number; body: Uint8Array } {
  const writer = new BinaryWriter()
  let header = 0
  if (events.length <= 0x0f) {
    header = events.length << 2
  } else {
    writer.writeUint8(events.length)
  }
  for (const event of events) {
    switch (event.type) {
      case 'scancode':
        writer.writeUint8(eventHeader(FastPathInputCode.Scancode, event.flags))
        writer.writeUint8(event.keyCode)
        break
      case 'mouse':
      case 'mousex':
        writer.writeUint8(
          eventHeader(
            event.type === 'mouse' ? FastPathInputCode.Mouse : FastPathInputCode.MouseX,
            event.flags,
          ),
        )
        writer.writeUint16LE(event.pointerFlags)
        writer.writeUint16LE(event.x)
        writer.writeUint16LE(event.y)
        break
      case 'relative-mouse':
        writer.writeUint8(eventHeader(FastPathInputCode.RelativeMouse, event.flags))
        writer.writeUint16LE(event.pointerFlags)
        writer.writeUint16LE(event.dx & 0xffff)
        writer.writeUint16LE(event.dy & 0xffff)
        break
      case 'sync':
        writer.writeUint8(eventHeader(FastPathInputCode.Sync, event.flags))
        break
      case 'unicode':
        writer.writeUint8(eventHeader(FastPathInputCode.Unicode, event.flags))
        writer.writeUint16LE(event.unicode)
        break
      case 'qoe':
        writer.writeUint8(eventHeader(FastPathInputCode.QoeTimestamp, event.flags))
        writer.writeUint32LE(event.timestamp)
        break
    }
  }
  return { header, body: writer.toUint8Array() }
}

function eventHeader(code: number, flags: number): number {
  return ((code & 0x07) << 5) | (flags & 0x1f)
}

function toInt16(value: number): number {
  return value >= 0x8000 ? value - 0x10000 : value
}

const FASTPATH_OUTPUT_COMPRESSION_USED = 0x2

export interface FastPathUpdate {
  readonly code: number
  readonly fragmentation: number
  readonly compression: number
  readonly compressionFlags?: number
  readonly data: Uint8Array
}

/** Splits a server fast-path output body into its updates, leaving each opaque. */
export function decodeFastPathOutput(body: Uint8Array): FastPathUpdate[] {
  const reader = new BinaryReader(body)
  const updates: FastPathUpdate[] = []
  while (reader.remaining > 0) {
    const header = reader.readUint8()
    const compression = (header >> 6) & 0x03
    const compressionFlags =
      compression & FASTPATH_OUTPUT_COMPRESSION_USED ? reader.readUint8() : undefined
    const size = reader.readUint16LE()
    updates.push({
      code: header & 0x0f,
      fragmentation: (header >> 4) & 0x03,
      compression,
      ...(compressionFlags === undefined ? {} : { compressionFlags }),
      data: reader.readBytes(size).slice(),
    })
  }
  return updates
}

export function encodeFastPathOutput(updates: ReadonlyArray<FastPathUpdate>): Uint8Array {
  const writer = new BinaryWriter()
  for (const update of updates) {
    writer.writeUint8(
      (update.code & 0x0f) | ((update.fragmentation & 0x03) << 4) | ((update.compression & 0x03) << 6),
    )
    if (update.compression & FASTPATH_OUTPUT_COMPRESSION_USED) {
      writer.writeUint8(update.compressionFlags ?? 0)
    }
    writer.writeUint16LE(update.data.length)
    writer.writeBytes(update.data)
  }
  return writer.toUint8Array()
}
