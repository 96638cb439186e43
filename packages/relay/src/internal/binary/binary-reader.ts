import { RdpDecodeError } from '../../errors'

const UTF16_DECODER = new TextDecoder('utf-16le', { fatal: false })

/**
 * Cursor over a PDU body. RDP mixes byte orders: MCS and TPKT are big-endian,
 * everything from the security layer up is little-endian.
 */
export class BinaryReader {
  #buffer: Uint8Array
  #view: DataView
  #offset = 0

  constructor(buffer: Uint8Array) {
    this.#buffer = buffer
    this.#view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength)
  }

  get position(): number {
    return this.#offset
  }

  get remaining(): number {
    return this.#buffer.length - this.#offset
  }

  peekUint8(): number {
    this.#ensureAvailable(1)
    return this.#view.getUint8(this.#offset)
  }

  readUint8(): number {
    this.#ensureAvailable(1)
    const value = this.#view.getUint8(this.#offset)
    this.#offset += 1
    return value
  }

  readUint16BE(): number {
    this.#ensureAvailable(2)
    const value = this.#view.getUint16(this.#offset, false)
    this.#offset += 2
    return value
  }

  readUint16LE(): number {
    this.#ensureAvailable(2)
    const value = this.#view.getUint16(this.#offset, true)
    this.#offset += 2
    return value
  }

  readUint32BE(): number {
    this.#ensureAvailable(4)
    const value = this.#view.getUint32(this.#offset, false)
    this.#offset += 4
    return value
  }

  readUint32LE(): number {
    this.#ensureAvailable(4)
    const value = this.#view.getUint32(this.#offset, true)
    this.#offset += 4
    return value
  }

  readInt32LE(): number {
    this.#ensureAvailable(4)
    const value = this.#view.getInt32(this.#offset, true)
    this.#offset += 4
    return value
  }

  readBytes(length: number): Uint8Array {
    if (length < 0) {
      throw new RdpDecodeError(`Cannot read negative byte length (${length})`)
    }
    this.#ensureAvailable(length)
    const slice = this.#buffer.subarray(this.#offset, this.#offset + length)
    this.#offset += length
    return slice
  }

  /** Fixed-width UTF-16LE field, cut at the first NUL. */
  readFixedUtf16(byteLength: number): string {
    return decodeUtf16(this.readBytes(byteLength))
  }

  /** Fixed-width single-byte field, cut at the first NUL. */
  readFixedAnsi(byteLength: number): string {
    return decodeAnsi(this.readBytes(byteLength))
  }

  skip(length: number): void {
    if (length < 0) {
      throw new RdpDecodeError(`Cannot skip negative length (${length})`)
    }
    this.#ensureAvailable(length)
    this.#offset += length
  }

  readRemaining(): Uint8Array {
    const slice = this.#buffer.subarray(this.#offset)
    this.#offset = this.#buffer.length
    return slice
  }

  expectBytes(expected: Uint8Array, what: string): void {
    const actual = this.readBytes(expected.length)
    for (let i = 0; i < expected.length; i += 1) {
      if (actual[i] !== expected[i]) {
        throw new RdpDecodeError(`Unexpected ${what}`)
      }
    }
  }

  #ensureAvailable(length: number): void {
    if (this.remaining < length) {
      throw new RdpDecodeError(
        `Insufficient data: need ${length} byte(s), have ${this.remaining}`,
      )
    }
  }
}

export function decodeUtf16(bytes: Uint8Array): string {
  let end = 0
  while (end + 1 < bytes.length && (bytes[end] !== 0 || bytes[end + 1] !== 0)) {
    end += 2
  }
  return UTF16_DECODER.decode(bytes.subarray(0, end))
}

export function decodeAnsi(bytes: Uint8Array): string {
  let out = ''
  for (const byte of bytes) {
    if (byte === 0) break
    out += String.fromCharCode(byte)
  }
  return out
}
