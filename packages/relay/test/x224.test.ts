import { describe, expect, it } from 'vitest'

import { RdpDecodeError } from '../src/errors'
import {
  decodeX224,
  describeProtocols,
  encodeConnectionConfirm,
  encodeConnectionRequest,
  encodeDataTpdu,
  encodeDisconnectRequest,
  Protocol,
} from '../src/pdu/x224'

describe('x224', () => {
  it('decodes a connection request with a cookie and negotiation request', () => {
    const encoded = encodeConnectionRequest({
      cookie: 'Cookie: mstshash=operator',
      negotiation: { flags: 0, requestedProtocols: Protocol.Ssl | Protocol.Hybrid },
    })

    expect(encoded[0]).toBe(encoded.length - 1)
    expect(encoded[1]).toBe(0xe0)
    expect(decodeX224(encoded)).toEqual({
      type: 'connection-request',
      cookie: 'Cookie: mstshash=operator',
      negotiation: { flags: 0, requestedProtocols: 3 },
    })
  })

  it('keeps bytes after the negotiation request', () => {
    const trailing = Uint8Array.of(0x06, 0x00, 0x24, 0x00, 0xaa)
    const decoded = decodeX224(
      encodeConnectionRequest({
        negotiation: { flags: 0x08, requestedProtocols: Protocol.Ssl },
        trailing,
      }),
    )

    expect(decoded).toEqual({
      type: 'connection-request',
      negotiation: { flags: 0x08, requestedProtocols: 1 },
      trailing,
    })
  })

  it('accepts a request with nothing after the fixed header', () => {
    expect(decodeX224(encodeConnectionRequest({}))).toEqual({ type: 'connection-request' })
  })

  it('rejects an unterminated cookie', () => {
    const bytes = Uint8Array.of(8, 0xe0, 0, 0, 0, 0, 0, 0x43, 0x6f)
    expect(() => decodeX224(bytes)).toThrow('X.224 connection request cookie is not terminated')
  })

  it('decodes confirm responses and failures', () => {
    expect(
      decodeX224(encodeConnectionConfirm({ response: { flags: 0x1f, selectedProtocol: Protocol.Ssl } })),
    ).toEqual({ type: 'connection-confirm', response: { flags: 0x1f, selectedProtocol: 1 } })
    expect(decodeX224(encodeConnectionConfirm({ failure: { flags: 0, code: 5 } }))).toEqual({
      type: 'connection-confirm',
      failure: { flags: 0, code: 5 },
    })
    expect(decodeX224(encodeConnectionConfirm({}))).toEqual({ type: 'connection-confirm' })
  })

  it('frames data and disconnect TPDUs', () => {
    expect(encodeDataTpdu(Uint8Array.of(9, 8))).toEqual(Uint8Array.of(0x02, 0xf0, 0x80, 9, 8))
    expect(decodeX224(Uint8Array.of(0x02, 0xf0, 0x80, 9, 8))).toEqual({
      type: 'data',
      payload: Uint8Array.of(9, 8),
    })
    expect(decodeX224(encodeDisconnectRequest(1))).toEqual({ type: 'disconnect-request', reason: 1 })
  })

  it('rejects length indicators that disagree with the payload', () => {
    expect(() => decodeX224(Uint8Array.of(9, 0xe0, 0, 0, 0, 0, 0))).toThrow(
      new RdpDecodeError('X.224 length indicator 9 does not match 7 bytes'),
    )
    expect(() => decodeX224(Uint8Array.of(3, 0xf0, 0x80))).toThrow(
      'Unexpected X.224 data length indicator 3',
    )
  })

  it('rejects unsupported TPDU codes', () => {
    expect(() => decodeX224(Uint8Array.of(1, 0x70))).toThrow('Unsupported X.224 TPDU code 0x70')
  })

  it('names requested protocols', () => {
    expect(describeProtocols(0)).toEqual(['rdp'])
    expect(describeProtocols(Protocol.Ssl | Protocol.HybridEx)).toEqual(['ssl', 'hybrid-ex'])
  })
})
