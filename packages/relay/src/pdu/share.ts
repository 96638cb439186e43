import { RdpDecodeError } from '../errors'
import { BinaryReader } from '../internal/binary/binary-reader'
import { BinaryWriter } from '../internal/binary/binary-writer'

export const SharePduType = {
  DemandActive: 0x1,
  ConfirmActive: 0x3,
  DeactivateAll: 0x6,
  Data: 0x7,
  ServerRedirect: 0xa,
} as const

export const ShareDataType = {
  Update: 2,
  Control: 20,
  Pointer: 27,
  Input: 28,
  Synchronize: 31,
  RefreshRect: 33,
  PlaySound: 34,
  SuppressOutput: 35,
  ShutdownRequest: 36,
  ShutdownDenied: 37,
  SaveSessionInfo: 38,
  FontList: 39,
  FontMap: 40,
  SetErrorInfo: 47,
} as const

export const CapabilitySetType = {
  General: 1,
  Bitmap: 2,
  Order: 3,
  Pointer: 8,
  Input: 13,
  VirtualChannel: 20,
} as const

const PROTOCOL_VERSION = 0x10
const FLOW_PDU_MARKER = 0x8000

export const DEFAULT_VC_CHUNK_SIZE = 1600

export interface CapabilitySet {
  readonly type: number
  readonly data: Uint8Array
}

export type SharePdu =
  | {
      readonly type: 'demand-active'
      readonly source: number
      readonly shareId: number
      readonly sourceDescriptor: Uint8Array
      readonly capabilities: ReadonlyArray<CapabilitySet>
      readonly sessionId: number
    }
  | {
      readonly type: 'confirm-active'
      readonly source: number
      readonly shareId: number
      readonly originatorId: number
      readonly sourceDescriptor: Uint8Array
      readonly capabilities: ReadonlyArray<CapabilitySet>
    }
  | {
      readonly type: 'deactivate-all'
      readonly source: number
      readonly body: Uint8Array
    }
  | {
      readonly type: 'data'
      readonly source: number
      readonly shareId: number
      readonly streamId: number
      readonly dataType: number
      readonly compressedType: number
      readonly body: Uint8Array
    }
  | { readonly type: 'flow'; readonly raw: Uint8Array }
  | {
      readonly type: 'other'
      readonly pduType: number
      readonly source: number
      readonly body: Uint8Array
    }

export function decodeSharePdu(data: Uint8Array): SharePdu {
  const reader = new BinaryReader(data)
  const totalLength = reader.readUint16LE()
  if (totalLength === FLOW_PDU_MARKER) {
    return { type: 'flow', raw: data.slice() }
  }
  if (totalLength > data.length || totalLength < 6) {
    throw new RdpDecodeError(
      `Share control length ${totalLength} does not fit ${data.length} bytes`,
    )
  }
  const pduType = reader.readUint16LE() & 0x0f
  const source = reader.readUint16LE()
  const body = new BinaryReader(data.subarray(6, totalLength))

  switch (pduType) {
    case SharePduType.DemandActive: {
      const shareId = body.readUint32LE()
      const sourceLength = body.readUint16LE()
      body.readUint16LE()
      const sourceDescriptor = body.readBytes(sourceLength).slice()
      const capabilities = readCapabilitySets(body)
      const sessionId = body.remaining >= 4 ? body.readUint32LE() : 0
      return { type: 'demand-active', source, shareId, sourceDescriptor, capabilities, sessionId }
    }
    case SharePduType.ConfirmActive: {
      const shareId = body.readUint32LE()
      const originatorId = body.readUint16LE()
      const sourceLength = body.readUint16LE()
      body.readUint16LE()
      const sourceDescriptor = body.readBytes(sourceLength).slice()
      const capabilities = readCapabilitySets(body)
      return {
        type: 'confirm-active',
        source,
        shareId,
        originatorId,
        sourceDescriptor,
        capabilities,
      }
    }
    case SharePduType.DeactivateAll:
      return { type: 'deactivate-all', source, body: body.readRemaining().slice() }
    case SharePduType.Data: {
      const shareId = body.readUint32LE()
      body.readUint8()
      const streamId = body.readUint8()
      body.readUint16LE()
      const dataType = body.readUint8()
      const compressedType = body.readUint8()
      body.readUint16LE()
      return {
        type: 'data',
        source,
        shareId,
        streamId,
        dataType,
        compressedType,
        body: body.readRemaining().slice(),
      }
    }
    default:
      return { type: 'other', pduType, source, body: body.readRemaining().slice() }
  }
}

function readCapabilitySets(reader: BinaryReader): CapabilitySet[] {
  const count = reader.readUint16LE()
  reader.readUint16LE()
  const sets: CapabilitySet[] = []
  for (let i = 0; i < count; i += 1) {
    const type = reader.readUint16LE()
    const length = reader.readUint16LE()
    if (length < 4) {
      throw new RdpDecodeError(`Capability set ${type} has length ${length}`)
    }
    sets.push({ type, data: reader.readBytes(length - 4).slice() })
  }
  return sets
}

function encodeCapabilitySets(sets: ReadonlyArray<CapabilitySet>): Uint8Array {
  const writer = new BinaryWriter()
  writer.writeUint16LE(sets.length)
  writer.writeUint16LE(0)
  for (const set of sets) {
    writer.writeUint16LE(set.type)
    writer.writeUint16LE(set.data.length + 4)
    writer.writeBytes(set.data)
  }
  return writer.toUint8Array()
}

export function encodeSharePdu(pdu: SharePdu): Uint8Array {
  if (pdu.type === 'flow') {
    return pdu.raw
  }
  const body = new BinaryWriter()
  let pduType: number
  switch (pdu.type) {
    case 'demand-active': {
      pduType = SharePduType.DemandActive
      const capabilities = encodeCapabilitySets(pdu.capabilities)
      body.writeUint32LE(pdu.shareId)
      body.writeUint16LE(pdu.sourceDescriptor.length)
      body.writeUint16LE(capabilities.length)
      body.writeBytes(pdu.sourceDescriptor)
      body.writeBytes(capabilities)
      body.writeUint32LE(pdu.sessionId)
      break
    }
    case 'confirm-active': {
      pduType = SharePduType.ConfirmActive
      const capabilities = encodeCapabilitySets(pdu.capabilities)
      body.writeUint32LE(pdu.shareId)
      body.writeUint16LE(pdu.originatorId)
      body.writeUint16LE(pdu.sourceDescriptor.length)
      body.writeUint16LE(capabilities.length)
      body.writeBytes(pdu.sourceDescriptor)
      body.writeBytes(capabilities)
      break
    }
    case 'deactivate-all':
      pduType = SharePduType.DeactivateAll
      body.writeBytes(pdu.body)
      break
    case 'data':
      pduType = SharePduType.Data
      body.writeUint32LE(pdu.shareId)
      body.writeUint8(0)
      body.writeUint8(pdu.streamId)
      body.writeUint16LE(pdu.body.length + 4)
      body.writeUint8(pdu.dataType)
      body.writeUint8(pdu.compressedType)
      body.writeUint16LE(0)
      body.writeBytes(pdu.body)
      break
    case 'other':
      pduType = pdu.pduType
      body.writeBytes(pdu.body)
      break
  }
  const content = body.toUint8Array()
  const writer = new BinaryWriter()
  writer.writeUint16LE(content.length + 6)
  writer.writeUint16LE(pduType | PROTOCOL_VERSION)
  writer.writeUint16LE(pdu.source)
  writer.writeBytes(content)
  return writer.toUint8Array()
}

export function findCapability(
  sets: ReadonlyArray<CapabilitySet>,
  type: number,
): CapabilitySet | undefined {
  return sets.find((set) => set.type === type)
}

export interface BitmapCapability {
  readonly preferredBitsPerPixel: number
  readonly desktopWidth: number
  readonly desktopHeight: number
}

export function readBitmapCapability(set: CapabilitySet): BitmapCapability {
  const reader = new BinaryReader(set.data)
  const preferredBitsPerPixel = reader.readUint16LE()
  reader.skip(6)
  return {
    preferredBitsPerPixel,
    desktopWidth: reader.readUint16LE(),
    desktopHeight: reader.readUint16LE(),
  }
}

export function readVirtualChannelChunkSize(set: CapabilitySet | undefined): number {
  if (!set || set.data.length < 8) {
    return DEFAULT_VC_CHUNK_SIZE
  }
  const size = new BinaryReader(set.data.subarray(4)).readUint32LE()
  return size > 0 ? size : DEFAULT_VC_CHUNK_SIZE
}

export const SlowPathInputType = {
  Sync: 0x0000,
  Scancode: 0x0004,
  Unicode: 0x0005,
  Mouse: 0x8001,
  MouseX: 0x8002,
} as const

export const KeyboardFlag = {
  Extended: 0x0100,
  Extended1: 0x0200,
  Down: 0x4000,
  Release: 0x8000,
} as const

export type SlowPathInputEvent =
  | { readonly type: 'sync'; readonly time: number; readonly toggleFlags: number }
  | {
      readonly type: 'scancode'
      readonly time: number
      readonly flags: number
      readonly keyCode: number
    }
  | {
      readonly type: 'unicode'
      readonly time: number
      readonly flags: number
      readonly unicode: number
    }
  | {
      readonly type: 'mouse' | 'mousex'
      readonly time: number
      readonly flags: number
      readonly x: number
      readonly y: number
    }
  | {
      readonly type: 'other'
      readonly time: number
      readonly messageType: number
      readonly data: Uint8Array
    }

export function decodeSlowPathInput(body: Uint8Array): SlowPathInputEvent[] {
  const reader = new BinaryReader(body)
  const count = reader.readUint16LE()
  reader.readUint16LE()
  const events: SlowPathInputEvent[] = []
  for (let i = 0; i < count; i += 1) {
    const time = reader.readUint32LE()
    const messageType = reader.readUint16LE()
    switch (messageType) {
      case SlowPathInputType.Sync:
        reader.readUint16LE()
        events.push({ type: 'sync', time, toggleFlags: reader.readUint32LE() })
        break
      case SlowPathInputType.Scancode:
      case SlowPathInputType.Unicode: {
        const flags = reader.readUint16LE()
        const code = reader.readUint16LE()
        reader.readUint16LE()
        events.push(
          messageType === SlowPathInputType.Scancode
            ? { type: 'scancode', time, flags, keyCode: code }
            : { type: 'unicode', time, flags, unicode: code },
        )
        break
      }
      case SlowPathInputType.Mouse:
      case SlowPathInputType.MouseX:
        events.push({
          type: messageType === SlowPathInputType.Mouse ? 'mouse' : 'mousex',
          time,
          flags: reader.readUint16LE(),
          x: reader.readUint16LE(),
          y: reader.readUint16LE(),
        })
        break
      default:
        events.push({ type: 'other', time, messageType, data: reader.readBytes(6).slice() })
    }
  }
  return events
}

export function encodeSlowPathInput(events: ReadonlyArray<SlowPathInputEvent>): Uint8Array {
  const writer = new BinaryWriter()
  writer.writeUint16LE(events.length)
  writer.writeUint16LE(0)
  for (const event of events) {
    writer.writeUint32LE(event.time)
    switch (event.type) {
      case 'sync':
        writer.writeUint16LE(SlowPathInputType.Sync)
        writer.writeUint16LE(0)
        writer.writeUint32LE(event.toggleFlags)
        break
      case 'scancode':
        writer.writeUint16LE(SlowPathInputType.Scancode)
        writer.writeUint16LE(event.flags)
        writer.writeUint16LE(event.keyCode)
        writer.writeUint16LE(0)
        break
      case 'unicode':
        writer.writeUint16LE(SlowPathInputType.Unicode)
        writer.writeUint16LE(event.flags)
        writer.writeUint16LE(event.unicode)
        writer.writeUint16LE(0)
        break
      case 'mouse':
      case 'mousex':
        writer.writeUint16LE(
          event.type === 'mouse' ? SlowPathInputType.Mouse : SlowPathInputType.MouseX,
        )
        writer.writeUint16LE(event.flags)
        writer.writeUint16LE(event.x)
        writer.writeUint16LE(event.y)
        break
      case 'other':
        writer.writeUint16LE(event.messageType)
        writer.writeBytes(event.data)
        break
    }
  }
  return writer.toUint8Array()
}
