import { createPrivateKey, generateKeyPairSync, type KeyObject } from 'node:crypto'

import { RelayInvariantViolation } from '../../errors'
import {
  bigEndianToBigInt,
  bigIntToLittleEndian,
  littleEndianToBigInt,
} from '../bytes'

export interface RsaPublicKey {
  readonly modulus: bigint
  readonly publicExponent: number
  /** Modulus length in bytes. */
  readonly size: number
}

export interface RsaPrivateKey extends RsaPublicKey {
  readonly privateExponent: bigint
}

export function modPow(base: bigint, exponent: bigint, modulus: bigint): bigint {
  if (modulus === 1n) {
    return 0n
  }
  let result = 1n
  let b = base % modulus
  let e = exponent
  while (e > 0n) {
    if (e & 1n) {
      result = (result * b) % modulus
    }
    e >>= 1n
    b = (b * b) % modulus
  }
  return result
}

/**
 * Raw RSA over little-endian integers, the convention of the security
 * exchange and proprietary certificates. Output is `outputLength` bytes.
 */
export function rsaRawLittleEndian(
  input: Uint8Array,
  exponent: bigint,
  modulus: bigint,
  outputLength: number,
): Uint8Array {
  const value = littleEndianToBigInt(input)
  if (value >= modulus) {
    throw new RelayInvariantViolation('RSA input is not smaller than the modulus')
  }
  return bigIntToLittleEndian(modPow(value, exponent, modulus), outputLength)
}

function base64UrlToBigInt(value: string | undefined, field: string): bigint {
  if (!value) {
    throw new RelayInvariantViolation(`RSA key is missing its ${field} component`)
  }
  return bigEndianToBigInt(new Uint8Array(Buffer.from(value, 'base64url')))
}

export function rsaKeyFromKeyObject(key: KeyObject): RsaPrivateKey {
  const jwk = key.export({ format: 'jwk' })
  if (jwk.kty !== 'RSA') {
    throw new RelayInvariantViolation(`Expected an RSA key, got ${jwk.kty}`)
  }
  const modulus = base64UrlToBigInt(jwk.n, 'n')
  const publicExponent = Number(base64UrlToBigInt(jwk.e, 'e'))
  const privateExponent = base64UrlToBigInt(jwk.d, 'd')
  return {
    modulus,
    publicExponent,
    privateExponent,
    size: Math.ceil(modulus.toString(16).length / 2),
  }
}

export function rsaKeyFromPem(pem: string): RsaPrivateKey {
  return rsaKeyFromKeyObject(createPrivateKey(pem))
}

/** 512-bit keys are what proprietary server certificates carry. */
export function generateRsaKey(modulusBits = 512): RsaPrivateKey {
  const { privateKey } = generateKeyPairSync('rsa', {
    modulusLength: modulusBits,
    publicExponent: 0x10001,
  })
  return rsaKeyFromKeyObject(privateKey)
}
