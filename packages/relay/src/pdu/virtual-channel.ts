import { RdpDecodeError } from '../errors'
import { BinaryReader } from '../internal/binary/binary-reader'
import { BinaryWriter } from '../internal/binary/binary-writer'
import { concatBytes } from '../internal/bytes'

export const ChannelFlag = {
  First: 0x00000001,
  Last: 0x00000002,
  ShowProtocol: 0x00000010,
  Suspend: 0x00000020,
  Resume: 0x00000040,
  ShadowPersistent: 0x00000080,
  PacketCompressed: 0x00200000,
  PacketAtFront: 0x00400000,
  PacketFlushed: 0x00800000,
} as const

export const CHANNEL_PDU_HEADER_LENGTH = 8

export const DEFAULT_MAX_CHANNEL_MESSAGE_SIZE = 16 * 1024 * 1024

export interface ChannelChunk {
  /** Length of the whole reassembled message. */
  readonly totalLength: number
  readonly flags: number
  readonly data: Uint8Array
}

export function decodeChannelChunk(body: Uint8Array): ChannelChunk {
  const reader = new BinaryReader(body)
  const totalLength = reader.readUint32LE()
  const flags = reader.readUint32LE()
  return { totalLength, flags, data: reader.readRemaining().slice() }
}

export function encodeChannelChunk(chunk: ChannelChunk): Uint8Array {
  const writer = new BinaryWriter()
  writer.writeUint32LE(chunk.totalLength)
  writer.writeUint32LE(chunk.flags)
  writer.writeBytes(chunk.data)
  return writer.toUint8Array()
}

/**
 * Splits a channel message into encoded chunks of at most `chunkSize` data
 * bytes. `extraFlags` (such as show-protocol) is set on every chunk.
 */
export function chunkChannelMessage(
  data: Uint8Array,
  chunkSize: number,
  extraFlags = 0,
): Uint8Array[] {
  if (chunkSize <= 0) {
    throw new RdpDecodeError(`Invalid channel chunk size ${chunkSize}`)
  }
  const chunks: Uint8Array[] = []
  let offset = 0
  do {
    const end = Math.min(offset + chunkSize, data.length)
    let flags = extraFlags
    if (offset === 0) flags |= ChannelFlag.First
    if (end === data.length) flags |= ChannelFlag.Last
    chunks.push(
      encodeChannelChunk({
        totalLength: data.length,
        flags,
        data: data.subarray(offset, end),
      }),
    )
    offset = end
  } while (offset < data.length)
  return chunks
}

/**
 * Collects the chunks of one channel in one direction until a complete
 * message is available.
 */
export class ChannelReassembler {
  readonly #maxMessageSize: number
  #parts: Uint8Array[] = []
  #received = 0
  #expected = 0
  #active = false

  constructor(maxMessageSize = DEFAULT_MAX_CHANNEL_MESSAGE_SIZE) {
    this.#maxMessageSize = maxMessageSize
  }

  get pending(): boolean {
    return this.#active
  }

  /** Returns the complete message once its last chunk has been pushed. */
  push(chunk: ChannelChunk): Uint8Array | undefined {
    if (chunk.flags & ChannelFlag.First) {
      this.reset()
      if (chunk.totalLength > this.#maxMessageSize) {
        throw new RdpDecodeError(
          `Channel message declares ${chunk.totalLength} bytes, above the ${this.#maxMessageSize} byte limit`,
        )
      }
      this.#active = true
      this.#expected = chunk.totalLength
    } else if (!this.#active) {
      throw new RdpDecodeError('Channel chunk arrived without a first chunk')
    }
    this.#parts.push(chunk.data)
    this.#received += chunk.data.length
    if (this.#received > this.#expected) {
      this.reset()
      throw new RdpDecodeError(
        `Channel chunks exceed the declared length ${chunk.totalLength}`,
      )
    }
    if (!(chunk.flags & ChannelFlag.Last)) {
      return undefined
    }
    const expected = this.#expected
    const message = concatBytes(...this.#parts)
    this.reset()
    if (message.length !== expected) {
      throw new RdpDecodeError(
        `Channel message is ${message.length} bytes, header declared ${expected}`,
      )
    }
    return message
  }

  reset(): void {
    this.#parts = []
    this.#received = 0
    this.#expected = 0
    this.#active = false
  }
}
