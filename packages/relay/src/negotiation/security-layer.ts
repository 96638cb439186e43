import { RdpDecodeError } from '../errors'
import { BinaryReader } from '../internal/binary/binary-reader'
import { BinaryWriter } from '../internal/binary/binary-writer'
import { concatBytes } from '../internal/bytes'
import {
  MAC_SIGNATURE_LENGTH,
  type StandardCipher,
} from '../internal/crypto/session-keys'
import { FAST_PATH_SECURITY_MASK, FastPathSecurityFlag } from '../pdu/fast-path'
import { readSecurityHeader, SecurityFlag, writeSecurityHeader } from '../pdu/security'
import type { Frame } from '../transport/framer'

export type SecurityVariant = 'plain' | 'tls' | 'standard'

/** A slow-path body with the flags of the security header it travelled under. */
export interface SlowPathBody {
  readonly flags: number
  readonly body: Uint8Array
}

export interface SecurityLayer {
  readonly variant: SecurityVariant
  /** Whether a Security Exchange round trip precedes the client info. */
  readonly requiresKeyExchange: boolean
  /** Whether every slow-path PDU carries a security header. */
  readonly encrypting: boolean
  unwrapSlowPath(data: Uint8Array, expectHeader: boolean): SlowPathBody
  wrapSlowPath(payload: SlowPathBody, withHeader: boolean): Uint8Array
  unwrapFastPath(header: number, payload: Uint8Array): Uint8Array
  wrapFastPath(header: number, body: Uint8Array): Frame
}

function writeHeaderAndBody(flags: number, ...parts: Uint8Array[]): Uint8Array {
  const writer = new BinaryWriter()
  writeSecurityHeader(writer, { flags, flagsHi: 0 })
  for (const part of parts) writer.writeBytes(part)
  return writer.toUint8Array()
}

/**
 * Encryption level NONE, with or without TLS underneath. Only client info and
 * licensing PDUs carry a (flags-only) security header.
 */
export class PlainSecurityLayer implements SecurityLayer {
  readonly variant: 'plain' | 'tls'
  readonly requiresKeyExchange = false
  readonly encrypting = false

  constructor(variant: 'plain' | 'tls') {
    this.variant = variant
  }

  unwrapSlowPath(data: Uint8Array, expectHeader: boolean): SlowPathBody {
    if (!expectHeader) {
      return { flags: 0, body: data }
    }
    const reader = new BinaryReader(data)
    const { flags } = readSecurityHeader(reader)
    if (flags & SecurityFlag.Encrypt) {
      throw new RdpDecodeError('Encrypted PDU on a connection without RDP encryption')
    }
    return { flags, body: reader.readRemaining() }
  }

  wrapSlowPath(payload: SlowPathBody, withHeader: boolean): Uint8Array {
    if (!withHeader) return payload.body
    const flags = payload.flags & ~(SecurityFlag.Encrypt | SecurityFlag.SecureChecksum)
    return writeHeaderAndBody(flags, payload.body)
  }

  unwrapFastPath(header: number, payload: Uint8Array): Uint8Array {
    if (header & FastPathSecurityFlag.Encrypted) {
      throw new RdpDecodeError('Encrypted fast-path PDU on a connection without RDP encryption')
    }
    return payload
  }

  wrapFastPath(header: number, body: Uint8Array): Frame {
    return { kind: 'fast-path', header: header & ~FAST_PATH_SECURITY_MASK, payload: body }
  }
}

/**
 * 128-bit standard RDP security. Before `activate` only the Security Exchange
 * and unencrypted licensing PDUs can pass.
 */
export class StandardSecurityLayer implements SecurityLayer {
  readonly variant = 'standard'
  readonly requiresKeyExchange = true
  readonly encrypting = true
  #cipher: StandardCipher | undefined

  get active(): boolean {
    return this.#cipher !== undefined
  }

  activate(cipher: StandardCipher): void {
    this.#cipher = cipher
  }

  unwrapSlowPath(data: Uint8Array): SlowPathBody {
    const reader = new BinaryReader(data)
    const { flags } = readSecurityHeader(reader)
    if (!(flags & SecurityFlag.Encrypt)) {
      return { flags, body: reader.readRemaining() }
    }
    const signature = reader.readBytes(MAC_SIGNATURE_LENGTH)
    const body = this.#requireCipher().decrypt(
      signature,
      reader.readRemaining(),
      (flags & SecurityFlag.SecureChecksum) !== 0,
    )
    return { flags: flags & ~(SecurityFlag.Encrypt | SecurityFlag.SecureChecksum), body }
  }

  wrapSlowPath(payload: SlowPathBody): Uint8Array {
    const cipher = this.#cipher
    const licensePlain =
      (payload.flags & SecurityFlag.LicensePkt) !== 0 &&
      (payload.flags & SecurityFlag.Encrypt) === 0
    if (!cipher || licensePlain || payload.flags & SecurityFlag.Exchange) {
      return writeHeaderAndBody(payload.flags & ~SecurityFlag.Encrypt, payload.body)
    }
    const { signature, ciphertext } = cipher.encrypt(payload.body)
    const flags = (payload.flags | SecurityFlag.Encrypt) & ~SecurityFlag.SecureChecksum
    return writeHeaderAndBody(flags, signature, ciphertext)
  }

  unwrapFastPath(header: number, payload: Uint8Array): Uint8Array {
    if (!(header & FastPathSecurityFlag.Encrypted)) {
      return payload
    }
    if (payload.length < MAC_SIGNATURE_LENGTH) {
      throw new RdpDecodeError('Encrypted fast-path PDU is shorter than its signature')
    }
    return this.#requireCipher().decrypt(
      payload.subarray(0, MAC_SIGNATURE_LENGTH),
      payload.subarray(MAC_SIGNATURE_LENGTH),
      (header & FastPathSecurityFlag.SecureChecksum) !== 0,
    )
  }

  wrapFastPath(header: number, body: Uint8Array): Frame {
    const { signature, ciphertext } = this.#requireCipher().encrypt(body)
    return {
      kind: 'fast-path',
      header: (header & ~FAST_PATH_SECURITY_MASK) | FastPathSecurityFlag.Encrypted,
      payload: concatBytes(signature, ciphertext),
    }
  }

  #requireCipher(): StandardCipher {
    if (!this.#cipher) {
      throw new RdpDecodeError('Encrypted PDU received before the key exchange completed')
    }
    return this.#cipher
  }
}
