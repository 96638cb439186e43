import { RdpDecodeError } from '../../errors'
import { BinaryReader } from '../../internal/binary/binary-reader'
import { BinaryWriter } from '../../internal/binary/binary-writer'
import type { ChannelHandler, ChannelNotice, Direction } from '../types'

export const DynamicChannelCommand = {
  Create: 0x01,
  DataFirst: 0x02,
  Data: 0x03,
  Close: 0x04,
  Capability: 0x05,
  DataFirstCompressed: 0x06,
  DataCompressed: 0x07,
  SoftSyncRequest: 0x08,
  SoftSyncResponse: 0x09,
} as const

export type DynamicChannelPdu =
  | {
      readonly type: 'create-request'
      readonly header: number
      readonly channelId: number
      readonly name: string
    }
  | {
      readonly type: 'create-response'
      readonly header: number
      readonly channelId: number
      readonly status: number
      readonly channelName?: string
    }
  | {
      readonly type: 'data-first'
      readonly header: number
      readonly channelId: number
      readonly totalLength: number
      readonly data: Uint8Array
      readonly channelName?: string
    }
  | {
      readonly type: 'data'
      readonly header: number
      readonly channelId: number
      readonly data: Uint8Array
      readonly channelName?: string
    }
  | {
      readonly type: 'close'
      readonly header: number
      readonly channelId: number
      readonly channelName?: string
    }
  | { readonly type: 'other'; readonly header: number; readonly body: Uint8Array }

function fieldWidth(code: number): 1 | 2 | 4 {
  switch (code & 0x03) {
    case 0:
      return 1
    case 1:
      return 2
    default:
      return 4
  }
}

function readVariable(reader: BinaryReader, width: 1 | 2 | 4): number {
  switch (width) {
    case 1:
      return reader.readUint8()
    case 2:
      return reader.readUint16LE()
    case 4:
      return reader.readUint32LE()
  }
}

function writeVariable(writer: BinaryWriter, width: 1 | 2 | 4, value: number): void {
  switch (width) {
    case 1:
      writer.writeUint8(value)
      return
    case 2:
      writer.writeUint16LE(value)
      return
    case 4:
      writer.writeUint32LE(value)
  }
}

function readName(reader: BinaryReader): string {
  let name = ''
  for (;;) {
    const byte = reader.readUint8()
    if (byte === 0) return name
    name += String.fromCharCode(byte)
  }
}

/**
 * Dynamic virtual channel framing. Payloads of individual dynamic channels
 * stay opaque; the handler tracks channel names so events can be attributed.
 */
export class DynamicChannelHandler implements ChannelHandler<DynamicChannelPdu> {
  readonly type = 'drdynvc'
  readonly #names = new Map<number, string>()
  readonly #announced = new Set<number>()

  channelName(channelId: number): string | undefined {
    return this.#names.get(channelId)
  }

  decode(data: Uint8Array, direction: Direction): DynamicChannelPdu {
    return this.#read(data, direction, true)
  }

  peek(data: Uint8Array, direction: Direction): DynamicChannelPdu {
    return this.#read(data, direction, false)
  }

  #read(data: Uint8Array, direction: Direction, commit: boolean): DynamicChannelPdu {
    const reader = new BinaryReader(data)
    const header = reader.readUint8()
    const command = header >> 4
    const idWidth = fieldWidth(header)
    switch (command) {
      case DynamicChannelCommand.Create: {
        const channelId = readVariable(reader, idWidth)
        if (direction === 'client-to-server') {
          const status = reader.readInt32LE()
          const channelName = this.#names.get(channelId)
          if (commit && status < 0) this.#forget(channelId)
          return {
            type: 'create-response',
            header,
            channelId,
            status,
            ...(channelName === undefined ? {} : { channelName }),
          }
        }
        const name = readName(reader)
        if (commit) {
          this.#names.set(channelId, name)
          this.#announced.delete(channelId)
        }
        return { type: 'create-request', header, channelId, name }
      }
      case DynamicChannelCommand.DataFirst: {
        const channelId = readVariable(reader, idWidth)
        const totalLength = readVariable(reader, fieldWidth(header >> 2))
        return {
          type: 'data-first',
          header,
          channelId,
          totalLength,
          data: reader.readRemaining().slice(),
          ...this.#nameOf(channelId),
        }
      }
      case DynamicChannelCommand.Data: {
        const channelId = readVariable(reader, idWidth)
        return {
          type: 'data',
          header,
          channelId,
          data: reader.readRemaining().slice(),
          ...this.#nameOf(channelId),
        }
      }
      case DynamicChannelCommand.Close: {
        const channelId = readVariable(reader, idWidth)
        if (reader.remaining > 0) {
          throw new RdpDecodeError(`${reader.remaining} bytes follow a dynamic channel close`)
        }
        const named = this.#nameOf(channelId)
        if (commit) this.#forget(channelId)
        return { type: 'close', header, channelId, ...named }
      }
      default:
        return { type: 'other', header, body: reader.readRemaining().slice() }
    }
  }

  encode(event: DynamicChannelPdu): Uint8Array {
    const writer = new BinaryWriter()
    writer.writeUint8(event.header)
    if (event.type === 'other') {
      writer.writeBytes(event.body)
      return writer.toUint8Array()
    }
    writeVariable(writer, fieldWidth(event.header), event.channelId)
    switch (event.type) {
      case 'create-request':
        for (let i = 0; i < event.name.length; i += 1) {
          writer.writeUint8(event.name.charCodeAt(i) & 0xff)
        }
        writer.writeUint8(0)
        break
      case 'create-response':
        writer.writeInt32LE(event.status)
        break
      case 'data-first':
        writeVariable(writer, fieldWidth(event.header >> 2), event.totalLength)
        writer.writeBytes(event.data)
        break
      case 'data':
        writer.writeBytes(event.data)
        break
      case 'close':
        break
    }
    return writer.toUint8Array()
  }

  /** Reports each dynamic channel once, on its first payload. */
  notices(event: DynamicChannelPdu): ReadonlyArray<ChannelNotice> {
    if (event.type !== 'data-first' && event.type !== 'data') return []
    if (this.#announced.has(event.channelId)) return []
    this.#announced.add(event.channelId)
    return [
      {
        kind: 'opaque',
        channel: `drdynvc:${event.channelName ?? `#${event.channelId}`}`,
        channelId: event.channelId,
        reason: 'dynamic channel payloads are relayed without decoding',
      },
    ]
  }

  #nameOf(channelId: number): { channelName?: string } {
    const channelName = this.#names.get(channelId)
    return channelName === undefined ? {} : { channelName }
  }

  #forget(channelId: number): void {
    this.#names.delete(channelId)
    this.#announced.delete(channelId)
  }
}

export function createDynamicChannelHandler(): DynamicChannelHandler {
  return new DynamicChannelHandler()
}
