import { createHash } from 'node:crypto'

import { RdpDecodeError } from '../errors'
import { BinaryReader, decodeAnsi, decodeUtf16 } from '../internal/binary/binary-reader'
import { BinaryWriter, encodeAnsi, encodeUtf16 } from '../internal/binary/binary-writer'
import {
  bigEndianToBigInt,
  bigIntToLittleEndian,
  littleEndianToBigInt,
} from '../internal/bytes'
import { type RsaPrivateKey, type RsaPublicKey, rsaRawLittleEndian } from '../internal/crypto/rsa'

export const SecurityFlag = {
  Exchange: 0x0001,
  TransportReq: 0x0002,
  TransportRsp: 0x0004,
  Encrypt: 0x0008,
  ResetSeqno: 0x0010,
  IgnoreSeqno: 0x0020,
  InfoPkt: 0x0040,
  LicensePkt: 0x0080,
  LicenseEncryptCs: 0x0200,
  RedirectionPkt: 0x0400,
  SecureChecksum: 0x0800,
  AutodetectReq: 0x1000,
  AutodetectRsp: 0x2000,
  HeartbeatPkt: 0x4000,
  FlagsHiValid: 0x8000,
} as const

export const InfoFlag = {
  Mouse: 0x00000001,
  DisableCtrlAltDel: 0x00000002,
  Autologon: 0x00000008,
  Unicode: 0x00000010,
  MaximizeShell: 0x00000020,
  LogonNotify: 0x00000040,
  EnableWindowsKey: 0x00000100,
} as const

export interface SecurityHeader {
  readonly flags: number
  readonly flagsHi: number
}

export function readSecurityHeader(reader: BinaryReader): SecurityHeader {
  return { flags: reader.readUint16LE(), flagsHi: reader.readUint16LE() }
}

export function writeSecurityHeader(writer: BinaryWriter, header: SecurityHeader): void {
  writer.writeUint16LE(header.flags)
  writer.writeUint16LE(header.flagsHi)
}

/** Body of the Security Exchange PDU, after the security header. */
export function decodeSecurityExchange(body: Uint8Array): Uint8Array {
  const reader = new BinaryReader(body)
  const length = reader.readUint32LE()
  return reader.readBytes(length).slice()
}

export function encodeSecurityExchange(encryptedClientRandom: Uint8Array): Uint8Array {
  const writer = new BinaryWriter()
  writer.writeUint32LE(encryptedClientRandom.length)
  writer.writeBytes(encryptedClientRandom)
  return writer.toUint8Array()
}

export interface ClientInfo {
  readonly codePage: number
  readonly flags: number
  readonly domain: string
  readonly username: string
  readonly password: string
  readonly alternateShell: string
  readonly workingDir: string
  /** Extended info packet, kept verbatim. */
  readonly extraInfo: Uint8Array
}

export function decodeClientInfo(body: Uint8Array): ClientInfo {
  const reader = new BinaryReader(body)
  const codePage = reader.readUint32LE()
  const flags = reader.readUint32LE()
  const lengths = [
    reader.readUint16LE(),
    reader.readUint16LE(),
    reader.readUint16LE(),
    reader.readUint16LE(),
    reader.readUint16LE(),
  ]
  const unicode = (flags & InfoFlag.Unicode) !== 0
  const terminator = unicode ? 2 : 1
  const fields = lengths.map((length) => {
    const bytes = reader.readBytes(length + terminator)
    return unicode ? decodeUtf16(bytes) : decodeAnsi(bytes)
  })
  return {
    codePage,
    flags,
    domain: fields[0] ?? '',
    username: fields[1] ?? '',
    password: fields[2] ?? '',
    alternateShell: fields[3] ?? '',
    workingDir: fields[4] ?? '',
    extraInfo: reader.readRemaining().slice(),
  }
}

export function encodeClientInfo(info: ClientInfo): Uint8Array {
  const unicode = (info.flags & InfoFlag.Unicode) !== 0
  const encode = unicode ? encodeUtf16 : encodeAnsi
  const fields = [
    info.domain,
    info.username,
    info.password,
    info.alternateShell,
    info.workingDir,
  ].map(encode)
  const writer = new BinaryWriter()
  writer.writeUint32LE(info.codePage)
  writer.writeUint32LE(info.flags)
  for (const field of fields) {
    writer.writeUint16LE(field.length)
  }
  for (const field of fields) {
    writer.writeBytes(field)
    writer.writeZeros(unicode ? 2 : 1)
  }
  writer.writeBytes(info.extraInfo)
  return writer.toUint8Array()
}

export const LicenseMessageType = {
  LicenseRequest: 0x01,
  PlatformChallenge: 0x02,
  NewLicense: 0x03,
  UpgradeLicense: 0x04,
  LicenseInfo: 0x12,
  NewLicenseRequest: 0x13,
  PlatformChallengeResponse: 0x15,
  ErrorAlert: 0xff,
} as const

export const STATUS_VALID_CLIENT = 0x00000007

export interface LicensePreamble {
  readonly messageType: number
  readonly flags: number
  readonly size: number
}

export function decodeLicensePreamble(body: Uint8Array): LicensePreamble {
  const reader = new BinaryReader(body)
  return {
    messageType: reader.readUint8(),
    flags: reader.readUint8(),
    size: reader.readUint16LE(),
  }
}

/** Error alert that tells the client no licensing round trip is needed. */
export function encodeValidClientLicense(): Uint8Array {
  const writer = new BinaryWriter()
  writer.writeUint8(LicenseMessageType.ErrorAlert)
  writer.writeUint8(0x03)
  writer.writeUint16LE(16)
  writer.writeUint32LE(STATUS_VALID_CLIENT)
  writer.writeUint32LE(0x00000002)
  writer.writeUint16LE(0x0004)
  writer.writeUint16LE(0)
  return writer.toUint8Array()
}

export function isValidClientLicense(body: Uint8Array): boolean {
  if (body.length < 8) return false
  const reader = new BinaryReader(body)
  const preamble = decodeLicensePreamble(body)
  reader.skip(4)
  return (
    preamble.messageType === LicenseMessageType.ErrorAlert &&
    reader.readUint32LE() === STATUS_VALID_CLIENT
  )
}

const CERT_CHAIN_VERSION_1 = 0x00000001
const CERT_CHAIN_VERSION_MASK = 0x7fffffff
const SIGNATURE_ALG_RSA = 0x00000001
const KEY_EXCHANGE_ALG_RSA = 0x00000001
const BB_RSA_KEY_BLOB = 0x0006
const BB_RSA_SIGNATURE_BLOB = 0x0008
const RSA1_MAGIC = 0x31415352
const SIGNATURE_LENGTH = 64

/**
 * Key that signs proprietary certificates. Clients verify against the public
 * half they ship with, so the private half must be supplied by the operator.
 */
export interface CertificateSigningKey {
  readonly modulus: bigint
  readonly privateExponent: bigint
}

export interface ProprietaryCertificate {
  readonly publicKey: RsaPublicKey
}

export function decodeServerCertificate(data: Uint8Array): ProprietaryCertificate {
  const reader = new BinaryReader(data)
  const version = reader.readUint32LE() & CERT_CHAIN_VERSION_MASK
  if (version !== CERT_CHAIN_VERSION_1) {
    throw new RdpDecodeError(`Unsupported server certificate version ${version}`)
  }
  reader.skip(8)
  const blobType = reader.readUint16LE()
  const blobLength = reader.readUint16LE()
  if (blobType !== BB_RSA_KEY_BLOB) {
    throw new RdpDecodeError(`Unexpected public key blob type ${blobType}`)
  }
  const blob = new BinaryReader(reader.readBytes(blobLength))
  if (blob.readUint32LE() !== RSA1_MAGIC) {
    throw new RdpDecodeError('Public key blob is missing its RSA1 magic')
  }
  const keyLength = blob.readUint32LE()
  blob.skip(8)
  const publicExponent = blob.readUint32LE()
  const modulusBytes = blob.readBytes(keyLength)
  const modulus = littleEndianToBigInt(modulusBytes)
  return {
    publicKey: { modulus, publicExponent, size: keyLength - 8 },
  }
}

export function encodeProprietaryCertificate(
  key: RsaPublicKey,
  signingKey?: CertificateSigningKey,
): Uint8Array {
  const keyLength = key.size + 8
  const blob = new BinaryWriter()
  blob.writeUint32LE(RSA1_MAGIC)
  blob.writeUint32LE(keyLength)
  blob.writeUint32LE(key.size * 8)
  blob.writeUint32LE(key.size - 1)
  blob.writeUint32LE(key.publicExponent)
  blob.writeBytes(bigIntToLittleEndian(key.modulus, keyLength))
  const publicKeyBlob = blob.toUint8Array()

  const signed = new BinaryWriter()
  signed.writeUint32LE(CERT_CHAIN_VERSION_1)
  signed.writeUint32LE(SIGNATURE_ALG_RSA)
  signed.writeUint32LE(KEY_EXCHANGE_ALG_RSA)
  signed.writeUint16LE(BB_RSA_KEY_BLOB)
  signed.writeUint16LE(publicKeyBlob.length)
  signed.writeBytes(publicKeyBlob)
  const signedPart = signed.toUint8Array()

  const writer = new BinaryWriter()
  writer.writeBytes(signedPart)
  writer.writeUint16LE(BB_RSA_SIGNATURE_BLOB)
  writer.writeUint16LE(SIGNATURE_LENGTH + 8)
  writer.writeBytes(signCertificate(signedPart, signingKey))
  writer.writeZeros(8)
  return writer.toUint8Array()
}

function signCertificate(
  signedPart: Uint8Array,
  signingKey: CertificateSigningKey | undefined,
): Uint8Array {
  if (!signingKey) {
    return new Uint8Array(SIGNATURE_LENGTH)
  }
  const digest = new Uint8Array(createHash('md5').update(signedPart).digest())
  const padded = new Uint8Array(SIGNATURE_LENGTH - 1).fill(0xff)
  padded.set(digest, 0)
  padded[16] = 0x00
  padded[SIGNATURE_LENGTH - 2] = 0x01
  return rsaRawLittleEndian(
    padded,
    signingKey.privateExponent,
    signingKey.modulus,
    SIGNATURE_LENGTH,
  )
}

export function parseSigningKey(modulusHex: string, exponentHex: string): CertificateSigningKey {
  return {
    modulus: bigEndianToBigInt(hexBytes(modulusHex)),
    privateExponent: bigEndianToBigInt(hexBytes(exponentHex)),
  }
}

function hexBytes(hex: string): Uint8Array {
  return new Uint8Array(Buffer.from(hex.replace(/\s+/g, ''), 'hex'))
}

/** Encrypted client random as carried in the Security Exchange PDU. */
export function encryptClientRandom(random: Uint8Array, key: RsaPublicKey): Uint8Array {
  return rsaRawLittleEndian(random, BigInt(key.publicExponent), key.modulus, key.size + 8)
}

export function decryptClientRandom(encrypted: Uint8Array, key: RsaPrivateKey): Uint8Array {
  const decrypted = rsaRawLittleEndian(
    encrypted.subarray(0, key.size),
    key.privateExponent,
    key.modulus,
    key.size,
  )
  return decrypted.slice(0, 32)
}
