import { RdpDecodeError } from '../../errors'
import type { BinaryReader } from './binary-reader'
import type { BinaryWriter } from './binary-writer'

/**
 * The slice of X.690 BER that MCS connect PDUs use (T.125 §7).
 */
export const BER_TAG_BOOLEAN = 0x01
export const BER_TAG_INTEGER = 0x02
export const BER_TAG_OCTET_STRING = 0x04
export const BER_TAG_ENUMERATED = 0x0a
export const BER_TAG_SEQUENCE = 0x30

export function readBerLength(reader: BinaryReader): number {
  const first = reader.readUint8()
  if ((first & 0x80) === 0) {
    return first
  }
  const count = first & 0x7f
  if (count === 0 || count > 2) {
    throw new RdpDecodeError(`Unsupported BER length form 0x${first.toString(16)}`)
  }
  return count === 1 ? reader.readUint8() : reader.readUint16BE()
}

export function writeBerLength(writer: BinaryWriter, length: number): void {
  if (length < 0x80) {
    writer.writeUint8(length)
  } else if (length <= 0xff) {
    writer.writeUint8(0x81)
    writer.writeUint8(length)
  } else {
    writer.writeUint8(0x82)
    writer.writeUint16BE(length)
  }
}

/** Application tags above 30 use the two-byte form (0x7f, tag). */
export function readBerApplicationTag(reader: BinaryReader, tag: number): number {
  const first = reader.readUint8()
  const second = reader.readUint8()
  if (first !== 0x7f || second !== tag) {
    throw new RdpDecodeError(`Expected BER application tag ${tag}`)
  }
  return readBerLength(reader)
}

export function writeBerApplicationTag(
  writer: BinaryWriter,
  tag: number,
  length: number,
): void {
  writer.writeUint8(0x7f)
  writer.writeUint8(tag)
  writeBerLength(writer, length)
}

export function readBerTag(reader: BinaryReader, tag: number): number {
  const actual = reader.readUint8()
  if (actual !== tag) {
    throw new RdpDecodeError(
      `Expected BER tag 0x${tag.toString(16)}, got 0x${actual.toString(16)}`,
    )
  }
  return readBerLength(reader)
}

/** Integers are read unsigned; MCS peers encode 0xffff as two bytes. */
export function readBerInteger(reader: BinaryReader): number {
  const length = readBerTag(reader, BER_TAG_INTEGER)
  if (length < 1 || length > 4) {
    throw new RdpDecodeError(`Unsupported BER integer length ${length}`)
  }
  let value = 0
  for (const byte of reader.readBytes(length)) {
    value = value * 256 + byte
  }
  return value
}

export function writeBerInteger(writer: BinaryWriter, value: number): void {
  writer.writeUint8(BER_TAG_INTEGER)
  if (value < 0x80) {
    writer.writeUint8(1)
    writer.writeUint8(value)
  } else if (value < 0x8000) {
    writer.writeUint8(2)
    writer.writeUint16BE(value)
  } else if (value < 0x800000) {
    writer.writeUint8(3)
    writer.writeUint8(value >>> 16)
    writer.writeUint16BE(value & 0xffff)
  } else {
    writer.writeUint8(4)
    writer.writeUint32BE(value)
  }
}

export function readBerBoolean(reader: BinaryReader): boolean {
  const length = readBerTag(reader, BER_TAG_BOOLEAN)
  if (length !== 1) {
    throw new RdpDecodeError(`Unsupported BER boolean length ${length}`)
  }
  return reader.readUint8() !== 0
}

export function writeBerBoolean(writer: BinaryWriter, value: boolean): void {
  writer.writeUint8(BER_TAG_BOOLEAN)
  writer.writeUint8(1)
  writer.writeUint8(value ? 0xff : 0)
}

export function readBerEnumerated(reader: BinaryReader): number {
  const length = readBerTag(reader, BER_TAG_ENUMERATED)
  if (length !== 1) {
    throw new RdpDecodeError(`Unsupported BER enumerated length ${length}`)
  }
  return reader.readUint8()
}

export function writeBerEnumerated(writer: BinaryWriter, value: number): void {
  writer.writeUint8(BER_TAG_ENUMERATED)
  writer.writeUint8(1)
  writer.writeUint8(value)
}

export function readBerOctetString(reader: BinaryReader): Uint8Array {
  const length = readBerTag(reader, BER_TAG_OCTET_STRING)
  return reader.readBytes(length)
}

export function writeBerOctetString(writer: BinaryWriter, value: Uint8Array): void {
  writer.writeUint8(BER_TAG_OCTET_STRING)
  writeBerLength(writer, value.length)
  writer.writeBytes(value)
}
