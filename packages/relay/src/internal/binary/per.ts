import type { BinaryReader } from './binary-reader'
import type { BinaryWriter } from './binary-writer'

/**
 * Aligned PER length determinant as used by T.124 and the MCS domain PDUs.
 */
export function readPerLength(reader: BinaryReader): number {
  const first = reader.readUint8()
  if ((first & 0x80) === 0) {
    return first
  }
  return ((first & 0x7f) << 8) | reader.readUint8()
}

export function writePerLength(writer: BinaryWriter, length: number): void {
  if (length > 0x7f) {
    writer.writeUint16BE(length | 0x8000)
  } else {
    writer.writeUint8(length)
  }
}

export function perLengthSize(length: number): number {
  return length > 0x7f ? 2 : 1
}
