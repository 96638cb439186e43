import { RdpDecodeError } from '../errors'
import { BinaryReader } from '../internal/binary/binary-reader'
import { BinaryWriter } from '../internal/binary/binary-writer'
import { readPerLength, writePerLength } from '../internal/binary/per'

const T124_PREFIX = Uint8Array.of(0x00, 0x05, 0x00, 0x14, 0x7c, 0x00, 0x01)
const CREATE_REQUEST_HEADER = Uint8Array.of(
  0x00, 0x08, 0x00, 0x10, 0x00, 0x01, 0xc0, 0x00, 0x44, 0x75, 0x63, 0x61,
)
const CREATE_RESPONSE_TRAILER = Uint8Array.of(0x01, 0xc0, 0x00, 0x4d, 0x63, 0x44, 0x6e)

export const UserDataType = {
  ClientCore: 0xc001,
  ClientSecurity: 0xc002,
  ClientNetwork: 0xc003,
  ServerCore: 0x0c01,
  ServerSecurity: 0x0c02,
  ServerNetwork: 0x0c03,
} as const

export const EncryptionMethod = {
  None: 0x00000000,
  Bit40: 0x00000001,
  Bit128: 0x00000002,
  Bit56: 0x00000008,
  Fips: 0x00000010,
} as const

export const EncryptionLevel = {
  None: 0,
  Low: 1,
  ClientCompatible: 2,
  High: 3,
  Fips: 4,
} as const

export const EarlyCapabilityFlag = {
  SupportErrInfoPdu: 0x0001,
  Want32Bpp: 0x0002,
  SupportStatusInfoPdu: 0x0004,
  StrongAsymmetricKeys: 0x0008,
  ValidConnectionType: 0x0020,
  SupportMonitorLayoutPdu: 0x0040,
  SupportNetcharAutodetect: 0x0080,
  SupportDynvcGfxProtocol: 0x0100,
  SupportDynamicTimeZone: 0x0200,
  SupportHeartbeatPdu: 0x0400,
  SupportSkipChannelJoin: 0x0800,
} as const

export const HighColorDepth = {
  Bpp4: 0x0004,
  Bpp8: 0x0008,
  Bpp15: 0x000f,
  Bpp16: 0x0010,
  Bpp24: 0x0018,
} as const

export function decodeConferenceCreateRequest(data: Uint8Array): Uint8Array {
  const reader = new BinaryReader(data)
  reader.expectBytes(T124_PREFIX, 'T.124 object identifier')
  readPerLength(reader)
  reader.expectBytes(CREATE_REQUEST_HEADER, 'conference create request header')
  const length = readPerLength(reader)
  return reader.readBytes(length).slice()
}

export function encodeConferenceCreateRequest(userData: Uint8Array): Uint8Array {
  const inner = new BinaryWriter()
  inner.writeBytes(CREATE_REQUEST_HEADER)
  writePerLength(inner, userData.length)
  inner.writeBytes(userData)
  const body = inner.toUint8Array()
  const writer = new BinaryWriter()
  writer.writeBytes(T124_PREFIX)
  writePerLength(writer, body.length)
  writer.writeBytes(body)
  return writer.toUint8Array()
}

export interface ConferenceCreateResponse {
  readonly nodeId: number
  readonly tag: Uint8Array
  readonly result: number
  readonly userData: Uint8Array
}

export function decodeConferenceCreateResponse(data: Uint8Array): ConferenceCreateResponse {
  const reader = new BinaryReader(data)
  reader.expectBytes(T124_PREFIX, 'T.124 object identifier')
  readPerLength(reader)
  const choice = reader.readUint8()
  if (choice !== 0x14) {
    throw new RdpDecodeError(`Unexpected conference create response choice ${choice}`)
  }
  const nodeId = reader.readUint16BE()
  const tagLength = reader.readUint8()
  const tag = reader.readBytes(tagLength).slice()
  const result = reader.readUint8()
  reader.expectBytes(CREATE_RESPONSE_TRAILER, 'conference create response header')
  const length = readPerLength(reader)
  return { nodeId, tag, result, userData: reader.readBytes(length).slice() }
}

export function encodeConferenceCreateResponse(response: ConferenceCreateResponse): Uint8Array {
  const inner = new BinaryWriter()
  inner.writeUint8(0x14)
  inner.writeUint16BE(response.nodeId)
  inner.writeUint8(response.tag.length)
  inner.writeBytes(response.tag)
  inner.writeUint8(response.result)
  inner.writeBytes(CREATE_RESPONSE_TRAILER)
  writePerLength(inner, response.userData.length)
  inner.writeBytes(response.userData)
  const body = inner.toUint8Array()
  const writer = new BinaryWriter()
  writer.writeBytes(T124_PREFIX)
  writePerLength(writer, body.length)
  writer.writeBytes(body)
  return writer.toUint8Array()
}

export interface ClientCoreData {
  readonly version: number
  readonly desktopWidth: number
  readonly desktopHeight: number
  readonly colorDepth: number
  readonly sasSequence: number
  readonly keyboardLayout: number
  readonly clientBuild: number
  readonly clientName: string
  readonly keyboardType: number
  readonly keyboardSubType: number
  readonly keyboardFunctionKey: number
  readonly imeFileName: string
  readonly postBeta2ColorDepth?: number
  readonly clientProductId?: number
  readonly serialNumber?: number
  readonly highColorDepth?: number
  readonly supportedColorDepths?: number
  readonly earlyCapabilityFlags?: number
  readonly clientDigProductId?: string
  readonly connectionType?: number
  readonly pad1Octet?: number
  readonly serverSelectedProtocol?: number
  /** Fields past serverSelectedProtocol, kept verbatim. */
  readonly trailer?: Uint8Array
}

export interface ClientSecurityData {
  readonly encryptionMethods: number
  readonly extEncryptionMethods: number
}

export interface ChannelDefinition {
  readonly name: string
  readonly options: number
}

export interface ClientNetworkData {
  readonly channels: ReadonlyArray<ChannelDefinition>
}

export interface ServerCoreData {
  readonly version: number
  readonly clientRequestedProtocols?: number
  readonly earlyCapabilityFlags?: number
  readonly trailer?: Uint8Array
}

export interface ServerSecurityData {
  readonly encryptionMethod: number
  readonly encryptionLevel: number
  readonly serverRandom?: Uint8Array
  readonly serverCertificate?: Uint8Array
}

export interface ServerNetworkData {
  readonly ioChannelId: number
  readonly channelIds: ReadonlyArray<number>
}

export type UserDataBlock =
  | { readonly type: 'client-core'; readonly data: ClientCoreData }
  | { readonly type: 'client-security'; readonly data: ClientSecurityData }
  | { readonly type: 'client-network'; readonly data: ClientNetworkData }
  | { readonly type: 'server-core'; readonly data: ServerCoreData }
  | { readonly type: 'server-security'; readonly data: ServerSecurityData }
  | { readonly type: 'server-network'; readonly data: ServerNetworkData }
  | { readonly type: 'unknown'; readonly blockType: number; readonly body: Uint8Array }

export function decodeUserData(data: Uint8Array): UserDataBlock[] {
  const reader = new BinaryReader(data)
  const blocks: UserDataBlock[] = []
  while (reader.remaining >= 4) {
    const blockType = reader.readUint16LE()
    const length = reader.readUint16LE()
    if (length < 4) {
      throw new RdpDecodeError(`User data block 0x${blockType.toString(16)} has length ${length}`)
    }
    const body = reader.readBytes(length - 4)
    blocks.push(decodeBlock(blockType, body))
  }
  if (reader.remaining !== 0) {
    throw new RdpDecodeError('Trailing bytes after the last user data block')
  }
  return blocks
}

export function encodeUserData(blocks: ReadonlyArray<UserDataBlock>): Uint8Array {
  const writer = new BinaryWriter()
  for (const block of blocks) {
    const { blockType, body } = encodeBlock(block)
    writer.writeUint16LE(blockType)
    writer.writeUint16LE(body.length + 4)
    writer.writeBytes(body)
  }
  return writer.toUint8Array()
}

function decodeBlock(blockType: number, body: Uint8Array): UserDataBlock {
  const reader = new BinaryReader(body)
  switch (blockType) {
    case UserDataType.ClientCore:
      return { type: 'client-core', data: decodeClientCore(reader) }
    case UserDataType.ClientSecurity:
      return {
        type: 'client-security',
        data: {
          encryptionMethods: reader.readUint32LE(),
          extEncryptionMethods: reader.remaining >= 4 ? reader.readUint32LE() : 0,
        },
      }
    case UserDataType.ClientNetwork: {
      const count = reader.readUint32LE()
      const channels: ChannelDefinition[] = []
      for (let i = 0; i < count; i += 1) {
        channels.push({ name: reader.readFixedAnsi(8), options: reader.readUint32LE() })
      }
      return { type: 'client-network', data: { channels } }
    }
    case UserDataType.ServerCore: {
      const version = reader.readUint32LE()
      const clientRequestedProtocols = reader.remaining >= 4 ? reader.readUint32LE() : undefined
      const earlyCapabilityFlags = reader.remaining >= 4 ? reader.readUint32LE() : undefined
      const trailer = reader.readRemaining()
      return {
        type: 'server-core',
        data: {
          version,
          ...(clientRequestedProtocols === undefined ? {} : { clientRequestedProtocols }),
          ...(earlyCapabilityFlags === undefined ? {} : { earlyCapabilityFlags }),
          ...(trailer.length > 0 ? { trailer: trailer.slice() } : {}),
        },
      }
    }
    case UserDataType.ServerSecurity: {
      const encryptionMethod = reader.readUint32LE()
      const encryptionLevel = reader.readUint32LE()
      if (reader.remaining < 8) {
        return { type: 'server-security', data: { encryptionMethod, encryptionLevel } }
      }
      const randomLength = reader.readUint32LE()
      const certificateLength = reader.readUint32LE()
      return {
        type: 'server-security',
        data: {
          encryptionMethod,
          encryptionLevel,
          serverRandom: reader.readBytes(randomLength).slice(),
          serverCertificate: reader.readBytes(certificateLength).slice(),
        },
      }
    }
    case UserDataType.ServerNetwork: {
      const ioChannelId = reader.readUint16LE()
      const count = reader.readUint16LE()
      const channelIds: number[] = []
      for (let i = 0; i < count; i += 1) {
        channelIds.push(reader.readUint16LE())
      }
      return { type: 'server-network', data: { ioChannelId, channelIds } }
    }
    default:
      return { type: 'unknown', blockType, body: body.slice() }
  }
}

function decodeClientCore(reader: BinaryReader): ClientCoreData {
  const fixed = {
    version: reader.readUint32LE(),
    desktopWidth: reader.readUint16LE(),
    desktopHeight: reader.readUint16LE(),
    colorDepth: reader.readUint16LE(),
    sasSequence: reader.readUint16LE(),
    keyboardLayout: reader.readUint32LE(),
    clientBuild: reader.readUint32LE(),
    clientName: reader.readFixedUtf16(32),
    keyboardType: reader.readUint32LE(),
    keyboardSubType: reader.readUint32LE(),
    keyboardFunctionKey: reader.readUint32LE(),
    imeFileName: reader.readFixedUtf16(64),
  }
  const optional: Mutable<Omit<ClientCoreData, keyof typeof fixed>> = {}
  if (reader.remaining < 2) return fixed
  optional.postBeta2ColorDepth = reader.readUint16LE()
  if (reader.remaining >= 2) optional.clientProductId = reader.readUint16LE()
  if (reader.remaining >= 4) optional.serialNumber = reader.readUint32LE()
  if (reader.remaining >= 2) optional.highColorDepth = reader.readUint16LE()
  if (reader.remaining >= 2) optional.supportedColorDepths = reader.readUint16LE()
  if (reader.remaining >= 2) optional.earlyCapabilityFlags = reader.readUint16LE()
  if (reader.remaining >= 64) optional.clientDigProductId = reader.readFixedUtf16(64)
  if (reader.remaining >= 1) optional.connectionType = reader.readUint8()
  if (reader.remaining >= 1) optional.pad1Octet = reader.readUint8()
  if (reader.remaining >= 4) optional.serverSelectedProtocol = reader.readUint32LE()
  if (reader.remaining > 0) optional.trailer = reader.readRemaining().slice()
  return { ...fixed, ...optional }
}

type Mutable<T> = { -readonly [K in keyof T]: T[K] }

function encodeClientCore(core: ClientCoreData): Uint8Array {
  const writer = new BinaryWriter()
  writer.writeUint32LE(core.version)
  writer.writeUint16LE(core.desktopWidth)
  writer.writeUint16LE(core.desktopHeight)
  writer.writeUint16LE(core.colorDepth)
  writer.writeUint16LE(core.sasSequence)
  writer.writeUint32LE(core.keyboardLayout)
  writer.writeUint32LE(core.clientBuild)
  writer.writeFixedUtf16(core.clientName, 32)
  writer.writeUint32LE(core.keyboardType)
  writer.writeUint32LE(core.keyboardSubType)
  writer.writeUint32LE(core.keyboardFunctionKey)
  writer.writeFixedUtf16(core.imeFileName, 64)

  // Optional fields are positional: stop at the first one that is absent.
  const steps: Array<() => boolean> = [
    () => writeOptional(core.postBeta2ColorDepth, (v) => writer.writeUint16LE(v)),
    () => writeOptional(core.clientProductId, (v) => writer.writeUint16LE(v)),
    () => writeOptional(core.serialNumber, (v) => writer.writeUint32LE(v)),
    () => writeOptional(core.highColorDepth, (v) => writer.writeUint16LE(v)),
    () => writeOptional(core.supportedColorDepths, (v) => writer.writeUint16LE(v)),
    () => writeOptional(core.earlyCapabilityFlags, (v) => writer.writeUint16LE(v)),
    () => writeOptional(core.clientDigProductId, (v) => writer.writeFixedUtf16(v, 64)),
    () => writeOptional(core.connectionType, (v) => writer.writeUint8(v)),
    () => writeOptional(core.pad1Octet, (v) => writer.writeUint8(v)),
    () => writeOptional(core.serverSelectedProtocol, (v) => writer.writeUint32LE(v)),
    () => writeOptional(core.trailer, (v) => writer.writeBytes(v)),
  ]
  for (const step of steps) {
    if (!step()) break
  }
  return writer.toUint8Array()
}

function writeOptional<T>(value: T | undefined, write: (value: T) => void): boolean {
  if (value === undefined) return false
  write(value)
  return true
}

function encodeBlock(block: UserDataBlock): { blockType: number; body: Uint8Array } {
  const writer = new BinaryWriter()
  switch (block.type) {
    case 'client-core':
      return { blockType: UserDataType.ClientCore, body: encodeClientCore(block.data) }
    case 'client-security':
      writer.writeUint32LE(block.data.encryptionMethods)
      writer.writeUint32LE(block.data.extEncryptionMethods)
      return { blockType: UserDataType.ClientSecurity, body: writer.toUint8Array() }
    case 'client-network':
      writer.writeUint32LE(block.data.channels.length)
      for (const channel of block.data.channels) {
        writer.writeFixedAnsi(channel.name, 8)
        writer.writeUint32LE(channel.options)
      }
      return { blockType: UserDataType.ClientNetwork, body: writer.toUint8Array() }
    case 'server-core':
      writer.writeUint32LE(block.data.version)
      if (block.data.clientRequestedProtocols !== undefined) {
        writer.writeUint32LE(block.data.clientRequestedProtocols)
        if (block.data.earlyCapabilityFlags !== undefined) {
          writer.writeUint32LE(block.data.earlyCapabilityFlags)
          if (block.data.trailer) writer.writeBytes(block.data.trailer)
        }
      }
      return { blockType: UserDataType.ServerCore, body: writer.toUint8Array() }
    case 'server-security':
      writer.writeUint32LE(block.data.encryptionMethod)
      writer.writeUint32LE(block.data.encryptionLevel)
      if (block.data.serverRandom && block.data.serverCertificate) {
        writer.writeUint32LE(block.data.serverRandom.length)
        writer.writeUint32LE(block.data.serverCertificate.length)
        writer.writeBytes(block.data.serverRandom)
        writer.writeBytes(block.data.serverCertificate)
      }
      return { blockType: UserDataType.ServerSecurity, body: writer.toUint8Array() }
    case 'server-network':
      writer.writeUint16LE(block.data.ioChannelId)
      writer.writeUint16LE(block.data.channelIds.length)
      for (const id of block.data.channelIds) {
        writer.writeUint16LE(id)
      }
      if (block.data.channelIds.length % 2 === 1) {
        writer.writeUint16LE(0)
      }
      return { blockType: UserDataType.ServerNetwork, body: writer.toUint8Array() }
    case 'unknown':
      return { blockType: block.blockType, body: block.body }
  }
}

export function findBlock<T extends UserDataBlock['type']>(
  blocks: ReadonlyArray<UserDataBlock>,
  type: T,
): Extract<UserDataBlock, { type: T }> | undefined {
  for (const block of blocks) {
    if (isBlockOfType(block, type)) return block
  }
  return undefined
}

function isBlockOfType<T extends UserDataBlock['type']>(
  block: UserDataBlock,
  type: T,
): block is Extract<UserDataBlock, { type: T }> {
  return block.type === type
}
