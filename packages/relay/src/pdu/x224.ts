import { RdpDecodeError } from '../errors'
import { BinaryReader } from '../internal/binary/binary-reader'
import { BinaryWriter } from '../internal/binary/binary-writer'

const X224_TPDU_CONNECTION_REQUEST = 0xe0
const X224_TPDU_CONNECTION_CONFIRM = 0xd0
const X224_TPDU_DISCONNECT_REQUEST = 0x80
const X224_TPDU_DATA = 0xf0
const X224_EOT = 0x80

const TYPE_RDP_NEG_REQ = 0x01
const TYPE_RDP_NEG_RSP = 0x02
const TYPE_RDP_NEG_FAILURE = 0x03

export const Protocol = {
  Rdp: 0x00000000,
  Ssl: 0x00000001,
  Hybrid: 0x00000002,
  Rdstls: 0x00000004,
  HybridEx: 0x00000008,
} as const

export function describeProtocols(mask: number): string[] {
  const names: string[] = []
  if (mask & Protocol.Ssl) names.push('ssl')
  if (mask & Protocol.Hybrid) names.push('hybrid')
  if (mask & Protocol.Rdstls) names.push('rdstls')
  if (mask & Protocol.HybridEx) names.push('hybrid-ex')
  return names.length === 0 ? ['rdp'] : names
}

export interface NegotiationRequest {
  readonly flags: number
  readonly requestedProtocols: number
}

export interface ConnectionRequest {
  readonly type: 'connection-request'
  /** Cookie or routing token line, without its CRLF. */
  readonly cookie?: string
  readonly negotiation?: NegotiationRequest
  /** Anything after the negotiation request, such as correlation info. */
  readonly trailing?: Uint8Array
}

export type ConnectionConfirmBody =
  | {
      readonly response?: {
        readonly flags: number
        readonly selectedProtocol: number
      }
    }
  | { readonly failure: { readonly flags: number; readonly code: number } }

export type ConnectionConfirm = { readonly type: 'connection-confirm' } & ConnectionConfirmBody

export interface DataTpdu {
  readonly type: 'data'
  readonly payload: Uint8Array
}

export interface DisconnectRequest {
  readonly type: 'disconnect-request'
  readonly reason: number
}

export type X224Pdu = ConnectionRequest | ConnectionConfirm | DataTpdu | DisconnectRequest

const ASCII_DECODER = new TextDecoder('utf-8', { fatal: false })
const ASCII_ENCODER = new TextEncoder()

export function decodeX224(payload: Uint8Array): X224Pdu {
  const reader = new BinaryReader(payload)
  const lengthIndicator = reader.readUint8()
  const code = reader.readUint8()

  if (code === X224_TPDU_DATA) {
    if (lengthIndicator !== 2) {
      throw new RdpDecodeError(`Unexpected X.224 data length indicator ${lengthIndicator}`)
    }
    reader.readUint8()
    return { type: 'data', payload: reader.readRemaining() }
  }

  if (lengthIndicator + 1 !== payload.length) {
    throw new RdpDecodeError(
      `X.224 length indicator ${lengthIndicator} does not match ${payload.length} bytes`,
    )
  }

  switch (code & 0xf0) {
    case X224_TPDU_CONNECTION_REQUEST:
      reader.skip(5)
      return decodeConnectionRequest(reader)
    case X224_TPDU_CONNECTION_CONFIRM:
      reader.skip(5)
      return decodeConnectionConfirm(reader)
    case X224_TPDU_DISCONNECT_REQUEST: {
      reader.skip(4)
      const reason = reader.remaining > 0 ? reader.readUint8() : 0
      return { type: 'disconnect-request', reason }
    }
    default:
      throw new RdpDecodeError(`Unsupported X.224 TPDU code 0x${code.toString(16)}`)
  }
}

function decodeConnectionRequest(reader: BinaryReader): ConnectionRequest {
  let cookie: string | undefined
  let negotiation: NegotiationRequest | undefined
  let rest = reader.readRemaining()

  if (rest.length > 0 && rest[0] !== TYPE_RDP_NEG_REQ) {
    const end = findCrlf(rest)
    if (end === -1) {
      throw new RdpDecodeError('X.224 connection request cookie is not terminated')
    }
    cookie = ASCII_DECODER.decode(rest.subarray(0, end))
    rest = rest.subarray(end + 2)
  }
  if (rest.length >= 8 && rest[0] === TYPE_RDP_NEG_REQ) {
    const neg = new BinaryReader(rest)
    neg.skip(1)
    const flags = neg.readUint8()
    const length = neg.readUint16LE()
    if (length !== 8) {
      throw new RdpDecodeError(`RDP_NEG_REQ length ${length} is not 8`)
    }
    negotiation = { flags, requestedProtocols: neg.readUint32LE() }
    rest = rest.subarray(8)
  }
  return {
    type: 'connection-request',
    ...(cookie === undefined ? {} : { cookie }),
    ...(negotiation ? { negotiation } : {}),
    ...(rest.length > 0 ? { trailing: rest.slice() } : {}),
  }
}

function decodeConnectionConfirm(reader: BinaryReader): ConnectionConfirm {
  if (reader.remaining < 8) {
    return { type: 'connection-confirm' }
  }
  const kind = reader.readUint8()
  const flags = reader.readUint8()
  const length = reader.readUint16LE()
  if (length !== 8) {
    throw new RdpDecodeError(`Negotiation response length ${length} is not 8`)
  }
  const value = reader.readUint32LE()
  if (kind === TYPE_RDP_NEG_RSP) {
    return { type: 'connection-confirm', response: { flags, selectedProtocol: value } }
  }
  if (kind === TYPE_RDP_NEG_FAILURE) {
    return { type: 'connection-confirm', failure: { flags, code: value } }
  }
  throw new RdpDecodeError(`Unknown negotiation response type ${kind}`)
}

function findCrlf(bytes: Uint8Array): number {
  for (let i = 0; i + 1 < bytes.length; i += 1) {
    if (bytes[i] === 0x0d && bytes[i + 1] === 0x0a) return i
  }
  return -1
}

export function encodeConnectionRequest(request: Omit<ConnectionRequest, 'type'>): Uint8Array {
  const variable = new BinaryWriter()
  if (request.cookie !== undefined) {
    variable.writeBytes(ASCII_ENCODER.encode(`${request.cookie}\r\n`))
  }
  if (request.negotiation) {
    variable.writeUint8(TYPE_RDP_NEG_REQ)
    variable.writeUint8(request.negotiation.flags)
    variable.writeUint16LE(8)
    variable.writeUint32LE(request.negotiation.requestedProtocols)
  }
  if (request.trailing) {
    variable.writeBytes(request.trailing)
  }
  return encodeConnectionTpdu(X224_TPDU_CONNECTION_REQUEST, variable.toUint8Array())
}

export function encodeConnectionConfirm(confirm: ConnectionConfirmBody): Uint8Array {
  const variable = new BinaryWriter()
  if ('failure' in confirm) {
    variable.writeUint8(TYPE_RDP_NEG_FAILURE)
    variable.writeUint8(confirm.failure.flags)
    variable.writeUint16LE(8)
    variable.writeUint32LE(confirm.failure.code)
  } else if (confirm.response) {
    variable.writeUint8(TYPE_RDP_NEG_RSP)
    variable.writeUint8(confirm.response.flags)
    variable.writeUint16LE(8)
    variable.writeUint32LE(confirm.response.selectedProtocol)
  }
  return encodeConnectionTpdu(X224_TPDU_CONNECTION_CONFIRM, variable.toUint8Array())
}

function encodeConnectionTpdu(code: number, variable: Uint8Array): Uint8Array {
  const writer = new BinaryWriter()
  writer.writeUint8(6 + variable.length)
  writer.writeUint8(code)
  writer.writeUint16BE(0)
  writer.writeUint16BE(code === X224_TPDU_CONNECTION_CONFIRM ? 0x1234 : 0)
  writer.writeUint8(0)
  writer.writeBytes(variable)
  return writer.toUint8Array()
}

export function encodeDataTpdu(payload: Uint8Array): Uint8Array {
  const out = new Uint8Array(3 + payload.length)
  out[0] = 2
  out[1] = X224_TPDU_DATA
  out[2] = X224_EOT
  out.set(payload, 3)
  return out
}

export function encodeDisconnectRequest(reason = 0): Uint8Array {
  return Uint8Array.of(6, X224_TPDU_DISCONNECT_REQUEST, 0, 0, 0, 0, reason)
}
