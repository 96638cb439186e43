import { RdpDecodeError } from '../../errors'
import { BinaryReader, decodeAnsi, decodeUtf16 } from '../../internal/binary/binary-reader'
import { BinaryWriter, encodeAnsi, encodeUtf16 } from '../../internal/binary/binary-writer'
import { type ChannelHandler, type Direction, oppositeDirection } from '../types'

export const ClipboardMessageType = {
  MonitorReady: 0x0001,
  FormatList: 0x0002,
  FormatListResponse: 0x0003,
  FormatDataRequest: 0x0004,
  FormatDataResponse: 0x0005,
  TempDirectory: 0x0006,
  Capabilities: 0x0007,
  FileContentsRequest: 0x0008,
  FileContentsResponse: 0x0009,
  LockClipData: 0x000a,
  UnlockClipData: 0x000b,
} as const

export const ClipboardMessageFlag = {
  ResponseOk: 0x0001,
  ResponseFail: 0x0002,
  AsciiNames: 0x0004,
} as const

export const ClipboardFormat = {
  Text: 1,
  UnicodeText: 13,
} as const

const CB_USE_LONG_FORMAT_NAMES = 0x00000002
const CB_CAPSTYPE_GENERAL = 0x0001
const SHORT_FORMAT_NAME_LENGTH = 32

export interface ClipboardFormatEntry {
  readonly id: number
  readonly name: string
}

export type ClipboardPdu =
  | {
      readonly type: 'format-list'
      readonly msgFlags: number
      readonly longNames: boolean
      readonly formats: ReadonlyArray<ClipboardFormatEntry>
    }
  | { readonly type: 'format-data-request'; readonly msgFlags: number; readonly formatId: number }
  | {
      readonly type: 'format-data-response'
      readonly msgFlags: number
      /** Format the matching request asked for, when it was seen. */
      readonly formatId?: number
      readonly data: Uint8Array
      /** Decoded text for text formats; takes precedence over `data` on encode. */
      readonly text?: string
    }
  | {
      readonly type: 'capabilities'
      readonly msgFlags: number
      readonly generalFlags: number
      readonly body: Uint8Array
    }
  | {
      readonly type: 'other'
      readonly msgType: number
      readonly msgFlags: number
      readonly body: Uint8Array
    }

export function isClipboardPdu(value: unknown): value is ClipboardPdu {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    typeof value.type === 'string' &&
    'msgFlags' in value
  )
}

export function decodeClipboardText(formatId: number | undefined, data: Uint8Array): string | undefined {
  switch (formatId) {
    case ClipboardFormat.UnicodeText:
      return decodeUtf16(data)
    case ClipboardFormat.Text:
      return decodeAnsi(data)
    default:
      return undefined
  }
}

export function encodeClipboardText(formatId: number, text: string): Uint8Array {
  const writer = new BinaryWriter()
  if (formatId === ClipboardFormat.UnicodeText) {
    writer.writeBytes(encodeUtf16(text))
    writer.writeUint16LE(0)
  } else {
    writer.writeBytes(encodeAnsi(text))
    writer.writeUint8(0)
  }
  return writer.toUint8Array()
}

/**
 * Clipboard virtual channel. Remembers the format each side last asked for
 * so that data responses can be decoded as text.
 */
export class ClipboardHandler implements ChannelHandler<ClipboardPdu> {
  readonly type = 'cliprdr'
  readonly #requested = new Map<Direction, number>()
  readonly #longNames = new Map<Direction, boolean>()

  get longFormatNames(): boolean {
    return (
      this.#longNames.get('client-to-server') === true &&
      this.#longNames.get('server-to-client') === true
    )
  }

  decode(data: Uint8Array, direction: Direction): ClipboardPdu {
    return this.#read(data, direction, true)
  }

  peek(data: Uint8Array, direction: Direction): ClipboardPdu {
    return this.#read(data, direction, false)
  }

  #read(data: Uint8Array, direction: Direction, commit: boolean): ClipboardPdu {
    const reader = new BinaryReader(data)
    const msgType = reader.readUint16LE()
    const msgFlags = reader.readUint16LE()
    const dataLength = reader.readUint32LE()
    if (dataLength > reader.remaining) {
      throw new RdpDecodeError(
        `Clipboard message declares ${dataLength} bytes but carries ${reader.remaining}`,
      )
    }
    const body = reader.readBytes(dataLength)
    switch (msgType) {
      case ClipboardMessageType.Capabilities: {
        const generalFlags = readGeneralFlags(body)
        if (commit) this.#longNames.set(direction, (generalFlags & CB_USE_LONG_FORMAT_NAMES) !== 0)
        return { type: 'capabilities', msgFlags, generalFlags, body: body.slice() }
      }
      case ClipboardMessageType.FormatList: {
        const longNames = this.longFormatNames
        return {
          type: 'format-list',
          msgFlags,
          longNames,
          formats: longNames ? readLongFormatNames(body) : readShortFormatNames(body, msgFlags),
        }
      }
      case ClipboardMessageType.FormatDataRequest: {
        const formatId = new BinaryReader(body).readUint32LE()
        if (commit) this.#requested.set(direction, formatId)
        return { type: 'format-data-request', msgFlags, formatId }
      }
      case ClipboardMessageType.FormatDataResponse: {
        const formatId = this.#requested.get(oppositeDirection(direction))
        const text =
          msgFlags & ClipboardMessageFlag.ResponseOk ? decodeClipboardText(formatId, body) : undefined
        return {
          type: 'format-data-response',
          msgFlags,
          ...(formatId === undefined ? {} : { formatId }),
          data: body.slice(),
          ...(text === undefined ? {} : { text }),
        }
      }
      default:
        return { type: 'other', msgType, msgFlags, body: body.slice() }
    }
  }

  encode(event: ClipboardPdu): Uint8Array {
    switch (event.type) {
      case 'capabilities':
        return frame(ClipboardMessageType.Capabilities, event.msgFlags, event.body)
      case 'format-list':
        return frame(
          ClipboardMessageType.FormatList,
          event.msgFlags,
          event.longNames
            ? writeLongFormatNames(event.formats)
            : writeShortFormatNames(event.formats, event.msgFlags),
        )
      case 'format-data-request': {
        const writer = new BinaryWriter()
        writer.writeUint32LE(event.formatId)
        return frame(ClipboardMessageType.FormatDataRequest, event.msgFlags, writer.toUint8Array())
      }
      case 'format-data-response': {
        const body =
          event.text !== undefined && event.formatId !== undefined
            ? encodeClipboardText(event.formatId, event.text)
            : event.data
        return frame(ClipboardMessageType.FormatDataResponse, event.msgFlags, body)
      }
      case 'other':
        return frame(event.msgType, event.msgFlags, event.body)
    }
  }
}

export function createClipboardHandler(): ClipboardHandler {
  return new ClipboardHandler()
}

function frame(msgType: number, msgFlags: number, body: Uint8Array): Uint8Array {
  const writer = new BinaryWriter()
  writer.writeUint16LE(msgType)
  writer.writeUint16LE(msgFlags)
  writer.writeUint32LE(body.length)
  writer.writeBytes(body)
  return writer.toUint8Array()
}

function readGeneralFlags(body: Uint8Array): number {
  const reader = new BinaryReader(body)
  const count = reader.readUint16LE()
  reader.skip(2)
  for (let i = 0; i < count; i += 1) {
    const type = reader.readUint16LE()
    const length = reader.readUint16LE()
    if (type === CB_CAPSTYPE_GENERAL) {
      reader.skip(4)
      return reader.readUint32LE()
    }
    reader.skip(length - 4)
  }
  return 0
}

function readShortFormatNames(body: Uint8Array, msgFlags: number): ClipboardFormatEntry[] {
  const reader = new BinaryReader(body)
  const formats: ClipboardFormatEntry[] = []
  while (reader.remaining >= 4 + SHORT_FORMAT_NAME_LENGTH) {
    const id = reader.readUint32LE()
    const name =
      msgFlags & ClipboardMessageFlag.AsciiNames
        ? reader.readFixedAnsi(SHORT_FORMAT_NAME_LENGTH)
        : reader.readFixedUtf16(SHORT_FORMAT_NAME_LENGTH)
    formats.push({ id, name })
  }
  return formats
}

function readLongFormatNames(body: Uint8Array): ClipboardFormatEntry[] {
  const reader = new BinaryReader(body)
  const formats: ClipboardFormatEntry[] = []
  while (reader.remaining >= 4) {
    const id = reader.readUint32LE()
    const start = reader.position
    let length = 0
    while (reader.readUint16LE() !== 0) {
      length += 2
    }
    formats.push({ id, name: decodeUtf16(body.subarray(start, start + length)) })
  }
  return formats
}

function writeShortFormatNames(
  formats: ReadonlyArray<ClipboardFormatEntry>,
  msgFlags: number,
): Uint8Array {
  const writer = new BinaryWriter()
  for (const format of formats) {
    writer.writeUint32LE(format.id)
    if (msgFlags & ClipboardMessageFlag.AsciiNames) {
      writer.writeFixedAnsi(format.name, SHORT_FORMAT_NAME_LENGTH)
    } else {
      writer.writeFixedUtf16(format.name, SHORT_FORMAT_NAME_LENGTH)
    }
  }
  return writer.toUint8Array()
}

function writeLongFormatNames(formats: ReadonlyArray<ClipboardFormatEntry>): Uint8Array {
  const writer = new BinaryWriter()
  for (const format of formats) {
    writer.writeUint32LE(format.id)
    writer.writeBytes(encodeUtf16(format.name))
    writer.writeUint16LE(0)
  }
  return writer.toUint8Array()
}
