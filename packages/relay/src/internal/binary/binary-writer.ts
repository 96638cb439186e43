/**
 * Accumulates bytes for PDU encoding.
 */
export class BinaryWriter {
  #chunks: Uint8Array[] = []
  #length = 0

  get length(): number {
    return this.#length
  }

  writeUint8(value: number): void {
    this.#chunks.push(Uint8Array.of(value & 0xff))
    this.#length += 1
  }

  writeUint16BE(value: number): void {
    const view = new DataView(new ArrayBuffer(2))
    view.setUint16(0, value & 0xffff, false)
    this.#push(view)
  }

  writeUint16LE(value: number): void {
    const view = new DataView(new ArrayBuffer(2))
    view.setUint16(0, value & 0xffff, true)
    this.#push(view)
  }

  writeUint32BE(value: number): void {
    const view = new DataView(new ArrayBuffer(4))
    view.setUint32(0, value >>> 0, false)
    this.#push(view)
  }

  writeUint32LE(value: number): void {
    const view = new DataView(new ArrayBuffer(4))
    view.setUint32(0, value >>> 0, true)
    this.#push(view)
  }

  writeInt32LE(value: number): void {
    const view = new DataView(new ArrayBuffer(4))
    view.setInt32(0, value | 0, true)
    this.#push(view)
  }

  writeBytes(bytes: Uint8Array): void {
    if (bytes.length === 0) {
      return
    }
    this.#chunks.push(bytes)
    this.#length += bytes.length
  }

  writeZeros(count: number): void {
    if (count > 0) {
      this.writeBytes(new Uint8Array(count))
    }
  }

  /** UTF-16LE into a fixed-width field, NUL padded and truncated to fit. */
  writeFixedUtf16(value: string, byteLength: number): void {
    const field = new Uint8Array(byteLength)
    field.set(encodeUtf16(value).subarray(0, Math.max(0, byteLength - 2)))
    this.writeBytes(field)
  }

  writeFixedAnsi(value: string, byteLength: number): void {
    const field = new Uint8Array(byteLength)
    field.set(encodeAnsi(value).subarray(0, Math.max(0, byteLength - 1)))
    this.writeBytes(field)
  }

  toUint8Array(): Uint8Array {
    const result = new Uint8Array(this.#length)
    let offset = 0
    for (const chunk of this.#chunks) {
      result.set(chunk, offset)
      offset += chunk.length
    }
    return result
  }

  #push(view: DataView): void {
    const bytes = new Uint8Array(view.buffer, view.byteOffset, view.byteLength)
    this.#chunks.push(bytes)
    this.#length += bytes.length
  }
}

export function encodeUtf16(value: string): Uint8Array {
  const out = new Uint8Array(value.length * 2)
  for (let i = 0; i < value.length; i += 1) {
    const code = value.charCodeAt(i)
    out[i * 2] = code & 0xff
    out[i * 2 + 1] = code >>> 8
  }
  return out
}

export function encodeAnsi(value: string): Uint8Array {
  const out = new Uint8Array(value.length)
  for (let i = 0; i < value.length; i += 1) {
    out[i] = value.charCodeAt(i) & 0xff
  }
  return out
}
