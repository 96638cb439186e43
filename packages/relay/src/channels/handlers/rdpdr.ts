import { BinaryReader } from '../../internal/binary/binary-reader'
import { BinaryWriter } from '../../internal/binary/binary-writer'
import type { ChannelHandler } from '../types'

export const DeviceRedirectionComponent = {
  Core: 0x4472,
  Printer: 0x5052,
} as const

const PACKET_NAMES: ReadonlyMap<number, string> = new Map([
  [0x496e, 'server-announce'],
  [0x4343, 'client-id-confirm'],
  [0x434e, 'client-name'],
  [0x4441, 'device-list-announce'],
  [0x6472, 'device-reply'],
  [0x4952, 'device-io-request'],
  [0x4943, 'device-io-completion'],
  [0x5350, 'server-capability'],
  [0x4350, 'client-capability'],
  [0x444d, 'device-list-remove'],
  [0x5043, 'printer-cache-data'],
  [0x554c, 'user-logged-on'],
])

const DEVICE_LIST_ANNOUNCE = 0x4441

export const DeviceType = {
  Serial: 0x01,
  Parallel: 0x02,
  Print: 0x04,
  Filesystem: 0x08,
  Smartcard: 0x20,
} as const

export interface AnnouncedDevice {
  readonly deviceType: number
  readonly deviceId: number
  readonly dosName: string
  readonly data: Uint8Array
}

export interface DeviceRedirectionPdu {
  readonly component: number
  readonly packetId: number
  readonly packet: string
  /** Everything after the shared header; authoritative on encode. */
  readonly body: Uint8Array
  readonly devices?: ReadonlyArray<AnnouncedDevice>
}

export class DeviceRedirectionHandler implements ChannelHandler<DeviceRedirectionPdu> {
  readonly type = 'rdpdr'

  decode(data: Uint8Array): DeviceRedirectionPdu {
    const reader = new BinaryReader(data)
    const component = reader.readUint16LE()
    const packetId = reader.readUint16LE()
    const body = reader.readRemaining().slice()
    const isCore = component === DeviceRedirectionComponent.Core
    return {
      component,
      packetId,
      packet: (isCore ? PACKET_NAMES.get(packetId) : undefined) ?? 'unknown',
      body,
      ...(isCore && packetId === DEVICE_LIST_ANNOUNCE ? { devices: readDevices(body) } : {}),
    }
  }

  encode(event: DeviceRedirectionPdu): Uint8Array {
    const writer = new BinaryWriter()
    writer.writeUint16LE(event.component)
    writer.writeUint16LE(event.packetId)
    writer.writeBytes(event.body)
    return writer.toUint8Array()
  }
}

export function createDeviceRedirectionHandler(): DeviceRedirectionHandler {
  return new DeviceRedirectionHandler()
}

function readDevices(body: Uint8Array): AnnouncedDevice[] {
  const reader = new BinaryReader(body)
  const count = reader.readUint32LE()
  const devices: AnnouncedDevice[] = []
  for (let i = 0; i < count; i += 1) {
    const deviceType = reader.readUint32LE()
    const deviceId = reader.readUint32LE()
    const dosName = reader.readFixedAnsi(8)
    const length = reader.readUint32LE()
    devices.push({ deviceType, deviceId, dosName, data: reader.readBytes(length).slice() })
  }
  return devices
}
