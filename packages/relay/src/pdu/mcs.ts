import { RdpDecodeError } from '../errors'
import {
  BER_TAG_SEQUENCE,
  readBerApplicationTag,
  readBerBoolean,
  readBerEnumerated,
  readBerInteger,
  readBerOctetString,
  readBerTag,
  writeBerApplicationTag,
  writeBerBoolean,
  writeBerEnumerated,
  writeBerInteger,
  writeBerLength,
  writeBerOctetString,
} from '../internal/binary/ber'
import { BinaryReader } from '../internal/binary/binary-reader'
import { BinaryWriter } from '../internal/binary/binary-writer'
import { readPerLength, writePerLength } from '../internal/binary/per'

const MCS_CONNECT_INITIAL = 101
const MCS_CONNECT_RESPONSE = 102

/** Channel and user ids travel on the wire as offsets from this base. */
export const MCS_BASE_CHANNEL_ID = 1001
export const MCS_GLOBAL_CHANNEL_ID = 1003
export const MCS_SERVER_USER_ID = 1002

const DomainMcsPdu = {
  ErectDomainRequest: 1,
  DisconnectProviderUltimatum: 8,
  AttachUserRequest: 10,
  AttachUserConfirm: 11,
  ChannelJoinRequest: 14,
  ChannelJoinConfirm: 15,
  SendDataRequest: 25,
  SendDataIndication: 26,
} as const

export interface DomainParameters {
  readonly maxChannelIds: number
  readonly maxUserIds: number
  readonly maxTokenIds: number
  readonly numPriorities: number
  readonly minThroughput: number
  readonly maxHeight: number
  readonly maxMcsPduSize: number
  readonly protocolVersion: number
}

export const DEFAULT_TARGET_PARAMETERS: DomainParameters = {
  maxChannelIds: 34,
  maxUserIds: 2,
  maxTokenIds: 0,
  numPriorities: 1,
  minThroughput: 0,
  maxHeight: 1,
  maxMcsPduSize: 0xffff,
  protocolVersion: 2,
}

export const DEFAULT_MIN_PARAMETERS: DomainParameters = {
  maxChannelIds: 1,
  maxUserIds: 1,
  maxTokenIds: 1,
  numPriorities: 1,
  minThroughput: 0,
  maxHeight: 1,
  maxMcsPduSize: 0x420,
  protocolVersion: 2,
}

export const DEFAULT_MAX_PARAMETERS: DomainParameters = {
  maxChannelIds: 0xffff,
  maxUserIds: 0xfc17,
  maxTokenIds: 0xffff,
  numPriorities: 1,
  minThroughput: 0,
  maxHeight: 1,
  maxMcsPduSize: 0xffff,
  protocolVersion: 2,
}

export interface ConnectInitial {
  readonly callingDomainSelector: Uint8Array
  readonly calledDomainSelector: Uint8Array
  readonly upwardFlag: boolean
  readonly targetParameters: DomainParameters
  readonly minimumParameters: DomainParameters
  readonly maximumParameters: DomainParameters
  /** GCC conference create request. */
  readonly userData: Uint8Array
}

export interface ConnectResponse {
  readonly result: number
  readonly calledConnectId: number
  readonly domainParameters: DomainParameters
  /** GCC conference create response. */
  readonly userData: Uint8Array
}

function readDomainParameters(reader: BinaryReader): DomainParameters {
  readBerTag(reader, BER_TAG_SEQUENCE)
  return {
    maxChannelIds: readBerInteger(reader),
    maxUserIds: readBerInteger(reader),
    maxTokenIds: readBerInteger(reader),
    numPriorities: readBerInteger(reader),
    minThroughput: readBerInteger(reader),
    maxHeight: readBerInteger(reader),
    maxMcsPduSize: readBerInteger(reader),
    protocolVersion: readBerInteger(reader),
  }
}

function encodeDomainParameters(params: DomainParameters): Uint8Array {
  const body = new BinaryWriter()
  writeBerInteger(body, params.maxChannelIds)
  writeBerInteger(body, params.maxUserIds)
  writeBerInteger(body, params.maxTokenIds)
  writeBerInteger(body, params.numPriorities)
  writeBerInteger(body, params.minThroughput)
  writeBerInteger(body, params.maxHeight)
  writeBerInteger(body, params.maxMcsPduSize)
  writeBerInteger(body, params.protocolVersion)
  const content = body.toUint8Array()
  const writer = new BinaryWriter()
  writer.writeUint8(BER_TAG_SEQUENCE)
  writeBerLength(writer, content.length)
  writer.writeBytes(content)
  return writer.toUint8Array()
}

export function isConnectInitial(payload: Uint8Array): boolean {
  return payload[0] === 0x7f && payload[1] === MCS_CONNECT_INITIAL
}

export function isConnectResponse(payload: Uint8Array): boolean {
  return payload[0] === 0x7f && payload[1] === MCS_CONNECT_RESPONSE
}

export function decodeConnectInitial(payload: Uint8Array): ConnectInitial {
  const reader = new BinaryReader(payload)
  readBerApplicationTag(reader, MCS_CONNECT_INITIAL)
  return {
    callingDomainSelector: readBerOctetString(reader).slice(),
    calledDomainSelector: readBerOctetString(reader).slice(),
    upwardFlag: readBerBoolean(reader),
    targetParameters: readDomainParameters(reader),
    minimumParameters: readDomainParameters(reader),
    maximumParameters: readDomainParameters(reader),
    userData: readBerOctetString(reader).slice(),
  }
}

export function encodeConnectInitial(pdu: ConnectInitial): Uint8Array {
  const body = new BinaryWriter()
  writeBerOctetString(body, pdu.callingDomainSelector)
  writeBerOctetString(body, pdu.calledDomainSelector)
  writeBerBoolean(body, pdu.upwardFlag)
  body.writeBytes(encodeDomainParameters(pdu.targetParameters))
  body.writeBytes(encodeDomainParameters(pdu.minimumParameters))
  body.writeBytes(encodeDomainParameters(pdu.maximumParameters))
  writeBerOctetString(body, pdu.userData)
  const content = body.toUint8Array()
  const writer = new BinaryWriter()
  writeBerApplicationTag(writer, MCS_CONNECT_INITIAL, content.length)
  writer.writeBytes(content)
  return writer.toUint8Array()
}

export function decodeConnectResponse(payload: Uint8Array): ConnectResponse {
  const reader = new BinaryReader(payload)
  readBerApplicationTag(reader, MCS_CONNECT_RESPONSE)
  return {
    result: readBerEnumerated(reader),
    calledConnectId: readBerInteger(reader),
    domainParameters: readDomainParameters(reader),
    userData: readBerOctetString(reader).slice(),
  }
}

export function encodeConnectResponse(pdu: ConnectResponse): Uint8Array {
  const body = new BinaryWriter()
  writeBerEnumerated(body, pdu.result)
  writeBerInteger(body, pdu.calledConnectId)
  body.writeBytes(encodeDomainParameters(pdu.domainParameters))
  writeBerOctetString(body, pdu.userData)
  const content = body.toUint8Array()
  const writer = new BinaryWriter()
  writeBerApplicationTag(writer, MCS_CONNECT_RESPONSE, content.length)
  writer.writeBytes(content)
  return writer.toUint8Array()
}

export type DomainPdu =
  | { readonly type: 'erect-domain-request'; readonly subHeight: number; readonly subInterval: number }
  | { readonly type: 'disconnect-provider-ultimatum'; readonly reason: number }
  | { readonly type: 'attach-user-request' }
  | { readonly type: 'attach-user-confirm'; readonly result: number; readonly userId?: number }
  | { readonly type: 'channel-join-request'; readonly userId: number; readonly channelId: number }
  | {
      readonly type: 'channel-join-confirm'
      readonly result: number
      readonly userId: number
      readonly requested: number
      readonly channelId?: number
    }
  | {
      readonly type: 'send-data-request' | 'send-data-indication'
      readonly userId: number
      readonly channelId: number
      readonly priority: number
      readonly payload: Uint8Array
    }

function readPerInteger(reader: BinaryReader): number {
  const length = readPerLength(reader)
  let value = 0
  for (const byte of reader.readBytes(length)) {
    value = value * 256 + byte
  }
  return value
}

function writePerInteger(writer: BinaryWriter, value: number): void {
  if (value <= 0xff) {
    writer.writeUint8(1)
    writer.writeUint8(value)
  } else if (value <= 0xffff) {
    writer.writeUint8(2)
    writer.writeUint16BE(value)
  } else {
    writer.writeUint8(4)
    writer.writeUint32BE(value)
  }
}

export function decodeDomainPdu(payload: Uint8Array): DomainPdu {
  const reader = new BinaryReader(payload)
  const header = reader.readUint8()
  const choice = header >> 2
  switch (choice) {
    case DomainMcsPdu.ErectDomainRequest:
      return {
        type: 'erect-domain-request',
        subHeight: readPerInteger(reader),
        subInterval: readPerInteger(reader),
      }
    case DomainMcsPdu.DisconnectProviderUltimatum: {
      const next = reader.remaining > 0 ? reader.readUint8() : 0
      return {
        type: 'disconnect-provider-ultimatum',
        reason: ((header & 0x01) << 1) | (next >> 7),
      }
    }
    case DomainMcsPdu.AttachUserRequest:
      return { type: 'attach-user-request' }
    case DomainMcsPdu.AttachUserConfirm: {
      const result = reader.readUint8()
      const initiatorPresent = (header & 0x02) !== 0
      return {
        type: 'attach-user-confirm',
        result,
        ...(initiatorPresent
          ? { userId: reader.readUint16BE() + MCS_BASE_CHANNEL_ID }
          : {}),
      }
    }
    case DomainMcsPdu.ChannelJoinRequest:
      return {
        type: 'channel-join-request',
        userId: reader.readUint16BE() + MCS_BASE_CHANNEL_ID,
        channelId: reader.readUint16BE(),
      }
    case DomainMcsPdu.ChannelJoinConfirm: {
      const result = reader.readUint8()
      const userId = reader.readUint16BE() + MCS_BASE_CHANNEL_ID
      const requested = reader.readUint16BE()
      const channelPresent = (header & 0x02) !== 0 && reader.remaining >= 2
      return {
        type: 'channel-join-confirm',
        result,
        userId,
        requested,
        ...(channelPresent ? { channelId: reader.readUint16BE() } : {}),
      }
    }
    case DomainMcsPdu.SendDataRequest:
    case DomainMcsPdu.SendDataIndication: {
      const userId = reader.readUint16BE() + MCS_BASE_CHANNEL_ID
      const channelId = reader.readUint16BE()
      const priority = reader.readUint8()
      const length = readPerLength(reader)
      const data = reader.readBytes(length)
      return {
        type:
          choice === DomainMcsPdu.SendDataRequest
            ? 'send-data-request'
            : 'send-data-indication',
        userId,
        channelId,
        priority,
        payload: data.slice(),
      }
    }
    default:
      throw new RdpDecodeError(`Unsupported MCS domain PDU choice ${choice}`)
  }
}

export function encodeDomainPdu(pdu: DomainPdu): Uint8Array {
  const writer = new BinaryWriter()
  switch (pdu.type) {
    case 'erect-domain-request':
      writer.writeUint8(DomainMcsPdu.ErectDomainRequest << 2)
      writePerInteger(writer, pdu.subHeight)
      writePerInteger(writer, pdu.subInterval)
      break
    case 'disconnect-provider-ultimatum':
      writer.writeUint8((DomainMcsPdu.DisconnectProviderUltimatum << 2) | ((pdu.reason >> 1) & 0x01))
      writer.writeUint8((pdu.reason & 0x01) << 7)
      break
    case 'attach-user-request':
      writer.writeUint8(DomainMcsPdu.AttachUserRequest << 2)
      break
    case 'attach-user-confirm':
      writer.writeUint8(
        (DomainMcsPdu.AttachUserConfirm << 2) | (pdu.userId === undefined ? 0 : 0x02),
      )
      writer.writeUint8(pdu.result)
      if (pdu.userId !== undefined) {
        writer.writeUint16BE(pdu.userId - MCS_BASE_CHANNEL_ID)
      }
      break
    case 'channel-join-request':
      writer.writeUint8(DomainMcsPdu.ChannelJoinRequest << 2)
      writer.writeUint16BE(pdu.userId - MCS_BASE_CHANNEL_ID)
      writer.writeUint16BE(pdu.channelId)
      break
    case 'channel-join-confirm':
      writer.writeUint8(
        (DomainMcsPdu.ChannelJoinConfirm << 2) | (pdu.channelId === undefined ? 0 : 0x02),
      )
      writer.writeUint8(pdu.result)
      writer.writeUint16BE(pdu.userId - MCS_BASE_CHANNEL_ID)
      writer.writeUint16BE(pdu.requested)
      if (pdu.channelId !== undefined) {
        writer.writeUint16BE(pdu.channelId)
      }
      break
    case 'send-data-request':
    case 'send-data-indication':
      writer.writeUint8(
        (pdu.type === 'send-data-request'
          ? DomainMcsPdu.SendDataRequest
          : DomainMcsPdu.SendDataIndication) << 2,
      )
      writer.writeUint16BE(pdu.userId - MCS_BASE_CHANNEL_ID)
      writer.writeUint16BE(pdu.channelId)
      writer.writeUint8(pdu.priority)
      writePerLength(writer, pdu.payload.length)
      writer.writeBytes(pdu.payload)
      break
  }
  return writer.toUint8Array()
}
