import { createHash } from 'node:crypto'

import { RdpDecodeError } from '../../errors'
import { concatBytes, equalBytes } from '../bytes'
import { Rc4 } from './rc4'

const PAD1 = new Uint8Array(40).fill(0x36)
const PAD2 = new Uint8Array(48).fill(0x5c)
const KEY_UPDATE_INTERVAL = 4096
export const MAC_SIGNATURE_LENGTH = 8

function md5(...parts: Uint8Array[]): Uint8Array {
  const hash = createHash('md5')
  for (const part of parts) hash.update(part)
  return new Uint8Array(hash.digest())
}

function sha1(...parts: Uint8Array[]): Uint8Array {
  const hash = createHash('sha1')
  for (const part of parts) hash.update(part)
  return new Uint8Array(hash.digest())
}

function u32le(value: number): Uint8Array {
  const out = new Uint8Array(4)
  new DataView(out.buffer).setUint32(0, value >>> 0, true)
  return out
}

function saltedHash(
  secret: Uint8Array,
  salt: Uint8Array,
  clientRandom: Uint8Array,
  serverRandom: Uint8Array,
): Uint8Array {
  return md5(secret, sha1(salt, secret, clientRandom, serverRandom))
}

function saltedTriple(
  secret: Uint8Array,
  clientRandom: Uint8Array,
  serverRandom: Uint8Array,
  letter: number,
): Uint8Array {
  return concatBytes(
    saltedHash(secret, Uint8Array.of(letter), clientRandom, serverRandom),
    saltedHash(secret, Uint8Array.of(letter + 1, letter + 1), clientRandom, serverRandom),
    saltedHash(
      secret,
      Uint8Array.of(letter + 2, letter + 2, letter + 2),
      clientRandom,
      serverRandom,
    ),
  )
}

export interface SessionKeys {
  readonly macKey: Uint8Array
  /** Key the client encrypts with and the server decrypts with. */
  readonly clientToServer: Uint8Array
  /** Key the server encrypts with and the client decrypts with. */
  readonly serverToClient: Uint8Array
}

/**
 * 128-bit standard security keys (MS-RDPBCGR 5.3.5.1).
 */
export function deriveSessionKeys(
  clientRandom: Uint8Array,
  serverRandom: Uint8Array,
): SessionKeys {
  const preMaster = concatBytes(
    clientRandom.subarray(0, 24),
    serverRandom.subarray(0, 24),
  )
  const master = saltedTriple(preMaster, clientRandom, serverRandom, 0x41)
  const blob = saltedTriple(master, clientRandom, serverRandom, 0x58)
  const finalHash = (key: Uint8Array) => md5(key, clientRandom, serverRandom)
  return {
    macKey: blob.slice(0, 16),
    serverToClient: finalHash(blob.subarray(16, 32)),
    clientToServer: finalHash(blob.subarray(32, 48)),
  }
}

export function macSignature(
  macKey: Uint8Array,
  data: Uint8Array,
  saltCount?: number,
): Uint8Array {
  const inner =
    saltCount === undefined
      ? sha1(macKey, PAD1, u32le(data.length), data)
      : sha1(macKey, PAD1, u32le(data.length), data, u32le(saltCount))
  return md5(macKey, PAD2, inner).slice(0, MAC_SIGNATURE_LENGTH)
}

function updateKey(initial: Uint8Array, current: Uint8Array): Uint8Array {
  const shaComponent = sha1(initial, PAD1, current)
  const temp = md5(initial, PAD2, shaComponent)
  return new Rc4(temp).process(temp)
}

/**
 * One direction of RC4 traffic keyed from a session key, rotating every 4096
 * packets.
 */
export class Rc4Stream {
  readonly #initialKey: Uint8Array
  #currentKey: Uint8Array
  #rc4: Rc4
  #useCount = 0
  #totalCount = 0

  constructor(key: Uint8Array) {
    this.#initialKey = key
    this.#currentKey = key
    this.#rc4 = new Rc4(key)
  }

  /** Packets processed so far; used as the salted checksum counter. */
  get count(): number {
    return this.#totalCount
  }

  process(data: Uint8Array): Uint8Array {
    if (this.#useCount === KEY_UPDATE_INTERVAL) {
      this.#currentKey = updateKey(this.#initialKey, this.#currentKey)
      this.#rc4 = new Rc4(this.#currentKey)
      this.#useCount = 0
    }
    this.#useCount += 1
    this.#totalCount += 1
    return this.#rc4.process(data)
  }
}

/**
 * Encrypts and signs outgoing bodies, decrypts and verifies incoming ones for
 * one side of a standard-security connection.
 */
export class StandardCipher {
  readonly #macKey: Uint8Array
  readonly #encrypt: Rc4Stream
  readonly #decrypt: Rc4Stream

  constructor(keys: SessionKeys, role: 'client' | 'server') {
    this.#macKey = keys.macKey
    this.#encrypt = new Rc4Stream(
      role === 'client' ? keys.clientToServer : keys.serverToClient,
    )
    this.#decrypt = new Rc4Stream(
      role === 'client' ? keys.serverToClient : keys.clientToServer,
    )
  }

  encrypt(data: Uint8Array): { signature: Uint8Array; ciphertext: Uint8Array } {
    const signature = macSignature(this.#macKey, data)
    return { signature, ciphertext: this.#encrypt.process(data) }
  }

  decrypt(
    signature: Uint8Array,
    ciphertext: Uint8Array,
    salted: boolean,
  ): Uint8Array {
    const saltCount = salted ? this.#decrypt.count : undefined
    const plaintext = this.#decrypt.process(ciphertext)
    const expected = macSignature(this.#macKey, plaintext, saltCount)
    if (!equalBytes(expected, signature)) {
      throw new RdpDecodeError('Security header MAC signature mismatch')
    }
    return plaintext
  }
}
