import { describe, expect, it } from 'vitest'

import {
  ClipboardFormat,
  ClipboardHandler,
  ClipboardMessageFlag,
  ClipboardMessageType,
  encodeClipboardText,
} from '../src/channels/handlers/cliprdr'
import { ChannelMultiplexer, type ChannelMessage, type InboundResult } from '../src/channels/multiplexer'
import { ChannelRegistry, createDefaultRegistry } from '../src/channels/registry'
import type { ChannelHandler } from '../src/channels/types'
import { ChannelDecodeError, RelayInvariantViolation } from '../src/errors'
import type { ApplicationMessage, ChannelLayout } from '../src/negotiation/messages'
import { encodeFastPathInput } from '../src/pdu/fast-path'
import { ChannelFlag, chunkChannelMessage, encodeChannelChunk } from '../src/pdu/virtual-channel'
import { HookRegistry, replaceData } from '../src/relay/hooks'

const SHOW_PROTOCOL_OPTION = 0x00200000

const clientLayout: ChannelLayout = {
  userId: 1007,
  ioChannelId: 1003,
  channels: [
    { name: 'CLIPRDR', id: 1004, options: SHOW_PROTOCOL_OPTION },
    { name: 'drdynvc', id: 1005, options: 0 },
    { name: 'rdpsnd', id: 1006, options: 0 },
    { name: 'rdpdr', id: 0, options: 0 },
  ],
}

const serverLayout: ChannelLayout = {
  userId: 1013,
  ioChannelId: 1003,
  channels: [
    { name: 'cliprdr', id: 1010, options: 0 },
    { name: 'drdynvc', id: 1011, options: 0 },
    { name: 'rdpsnd', id: 1012, options: 0 },
  ],
}

function createMultiplexer(): ChannelMultiplexer {
  const multiplexer = new ChannelMultiplexer(createDefaultRegistry())
  multiplexer.configure('client', clientLayout)
  multiplexer.configure('server', serverLayout)
  return multiplexer
}

function slow(channelId: number, data: Uint8Array): ApplicationMessage {
  return { kind: 'slow-path', channelId, flags: 0, data }
}

function completed(result: InboundResult): ChannelMessage {
  if (result.status !== 'complete') throw new Error('expected a complete message')
  return result.message
}

const monitorReady = Uint8Array.of(ClipboardMessageType.MonitorReady, 0, 0, 0, 0, 0, 0, 0)

describe('ChannelMultiplexer', () => {
  it('needs both layouts before it can route', () => {
    const multiplexer = new ChannelMultiplexer(createDefaultRegistry())
    expect(multiplexer.ready).toBe(false)
    expect(multiplexer.channels()).toEqual([])
    expect(() => multiplexer.inbound('client-to-server', slow(1004, monitorReady))).toThrow(
      'No channel layout for the client leg',
    )

    multiplexer.configure('client', clientLayout)
    multiplexer.configure('server', serverLayout)
    expect(multiplexer.ready).toBe(true)
    expect(multiplexer.channels()).toEqual(['io', 'cliprdr', 'drdynvc', 'rdpsnd'])
    expect(multiplexer.handler('CLIPRDR')?.type).toBe('cliprdr')
    expect(multiplexer.handler('rdpsnd')).toBeUndefined()
  })

  it('reassembles chunks and forwards them under the other leg ids', () => {
    const multiplexer = createMultiplexer()
    const [first, last] = chunkChannelMessage(monitorReady, 4).map((chunk) => slow(1004, chunk))
    if (!first || !last) throw new Error('expected two chunks')

    expect(multiplexer.inbound('client-to-server', first)).toEqual({ status: 'pending' })
    const message = completed(multiplexer.inbound('client-to-server', last))

    expect(message).toMatchObject({
      direction: 'client-to-server',
      channel: 'cliprdr',
      channelId: 1004,
      channelType: 'cliprdr',
      data: monitorReady,
      event: { type: 'other', msgType: ClipboardMessageType.MonitorReady, msgFlags: 0 },
      originals: [first, last],
      notices: [],
    })
    expect(multiplexer.forward(message)).toEqual([
      { ...first, channelId: 1010 },
      { ...last, channelId: 1010 },
    ])
  })

  it('re-chunks replacements with the destination chunk size', () => {
    const multiplexer = createMultiplexer()
    const message = completed(
      multiplexer.inbound('client-to-server', slow(1004, chunkChannelMessage(monitorReady, 1600)[0] ?? new Uint8Array(0))),
    )
    const replacement = Uint8Array.of(1, 2, 3, 4, 5, 6)
    multiplexer.setChunkSize('server', 4)

    expect(multiplexer.replace(message, { data: replacement })).toEqual([
      slow(1010, encodeChannelChunk({ totalLength: 6, flags: ChannelFlag.First, data: Uint8Array.of(1, 2, 3, 4) })),
      slow(1010, encodeChannelChunk({ totalLength: 6, flags: ChannelFlag.Last, data: Uint8Array.of(5, 6) })),
    ])
  })

  it('encodes event replacements with the channel handler', () => {
    const multiplexer = createMultiplexer()
    const message = completed(
      multiplexer.inbound('server-to-client', slow(1010, chunkChannelMessage(monitorReady, 1600)[0] ?? new Uint8Array(0))),
    )
    const request = { type: 'format-data-request', msgFlags: 0, formatId: 13 }
    const encoded = Uint8Array.of(ClipboardMessageType.FormatDataRequest, 0, 0, 0, 4, 0, 0, 0, 13, 0, 0, 0)

    expect(multiplexer.replace(message, { event: request })).toEqual(
      chunkChannelMessage(encoded, 1600).map((chunk) => slow(1004, chunk)),
    )
    expect(multiplexer.codecFor(message).encode(request)).toEqual(encoded)
    expect(multiplexer.codecFor(message).decode(encoded)).toEqual(request)
  })

  it('relays unnamed and unhandled channels opaquely', () => {
    const multiplexer = createMultiplexer()
    const unknown = completed(multiplexer.inbound('client-to-server', slow(2000, Uint8Array.of(9))))
    expect(unknown).toMatchObject({
      channel: '#2000',
      channelType: 'opaque',
      opaqueReason: 'unknown channel id',
    })
    expect(multiplexer.forward(unknown)).toEqual([slow(2000, Uint8Array.of(9))])

    const chunk = chunkChannelMessage(Uint8Array.of(7, 7), 1600)[0] ?? new Uint8Array(0)
    const sound = completed(multiplexer.inbound('client-to-server', slow(1006, chunk)))
    expect(sound).toMatchObject({
      channel: 'rdpsnd',
      channelType: 'opaque',
      data: chunk,
      opaqueReason: 'no handler for channel',
    })
    expect(multiplexer.forward(sound)).toEqual([slow(1012, chunk)])

    const codec = multiplexer.codecFor(sound)
    expect(codec.decode(chunk)).toBeUndefined()
    expect(() => codec.encode({})).toThrow('Channel rdpsnd is relayed opaquely')
  })

  it('does not decode compressed channel data', () => {
    const multiplexer = createMultiplexer()
    const chunk = encodeChannelChunk({
      totalLength: 1,
      flags: ChannelFlag.First | ChannelFlag.Last | ChannelFlag.PacketCompressed,
      data: Uint8Array.of(0x55),
    })
    expect(completed(multiplexer.inbound('server-to-client', slow(1010, chunk)))).toMatchObject({
      channel: 'cliprdr',
      channelType: 'opaque',
      opaqueReason: 'compressed channel data',
    })
  })

  it('reports undecodable messages without losing them', () => {
    const multiplexer = createMultiplexer()
    const truncated = Uint8Array.of(ClipboardMessageType.MonitorReady, 0, 0, 0, 10, 0, 0, 0)
    const original = slow(1004, chunkChannelMessage(truncated, 1600)[0] ?? new Uint8Array(0))
    const message = completed(multiplexer.inbound('client-to-server', original))

    expect(message.event).toBeUndefined()
    expect(message.channelType).toBe('cliprdr')
    expect(message.decodeError).toBeInstanceOf(ChannelDecodeError)
    expect(message.decodeError?.message).toBe('Clipboard message declares 10 bytes but carries 0')
    expect(message.decodeError?.channel).toBe('cliprdr')
    expect(multiplexer.forward(message)).toEqual([{ ...original, channelId: 1010 }])

    const headerless = completed(multiplexer.inbound('client-to-server', slow(1004, Uint8Array.of(1, 2, 3))))
    expect(headerless.channelType).toBe('opaque')
    expect(headerless.decodeError?.message).toBe('Insufficient data: need 4 byte(s), have 3')
  })

  it('passes along handler notices', () => {
    const multiplexer = createMultiplexer()
    const data = chunkChannelMessage(Uint8Array.of(0x30, 0x07, 0xaa), 1600)[0] ?? new Uint8Array(0)

    expect(completed(multiplexer.inbound('server-to-client', slow(1011, data))).notices).toEqual([
      {
        kind: 'opaque',
        channel: 'drdynvc:#7',
        channelId: 7,
        reason: 'dynamic channel payloads are relayed without decoding',
      },
    ])
    expect(completed(multiplexer.inbound('server-to-client', slow(1011, data))).notices).toEqual([])
  })

  it('routes fast-path and io channel traffic to the io codec', () => {
    const multiplexer = createMultiplexer()
    const { header, body } = encodeFastPathInput([{ type: 'sync', flags: 2 }])
    const fast = completed(multiplexer.inbound('client-to-server', { kind: 'fast-path', header, data: body }))

    expect(fast).toMatchObject({
      channel: 'io',
      channelId: 1003,
      channelType: 'io',
      event: { type: 'fast-path-input', header, events: [{ type: 'sync', flags: 2 }] },
    })
    expect(multiplexer.forward(fast)).toEqual([{ kind: 'fast-path', header, data: body }])

    const broken = completed(multiplexer.inbound('client-to-server', slow(1003, Uint8Array.of(1))))
    expect(broken.channel).toBe('io')
    expect(broken.decodeError).toBeInstanceOf(ChannelDecodeError)
    expect(() => multiplexer.replace(broken, { event: { type: 'nothing' } })).toThrow(
      'Replacement for the io channel is not an io event',
    )
  })

  it('composes relay messages for the destination leg', () => {
    const multiplexer = createMultiplexer()
    const data = Uint8Array.of(1, 2, 3)

    expect(multiplexer.compose('server-to-client', 'CLIPRDR', { data })).toEqual(
      chunkChannelMessage(data, 1600, ChannelFlag.ShowProtocol).map((chunk) => slow(1004, chunk)),
    )
    expect(multiplexer.compose('client-to-server', 'io', { data })).toEqual([slow(1003, data)])
    expect(() => multiplexer.compose('client-to-server', 'rdpdr', { data })).toThrow(
      'Channel rdpdr is not open on the server leg',
    )
    expect(() => multiplexer.compose('client-to-server', 'rdpsnd', { event: {} })).toThrow(
      'Channel rdpsnd has no handler to encode an event',
    )
  })
})

describe('ChannelMultiplexer handler failures', () => {
  const customLayouts: Record<'client' | 'server', ChannelLayout> = {
    client: { userId: 1007, ioChannelId: 1003, channels: [{ name: 'custom', id: 1004, options: 0 }] },
    server: { userId: 1008, ioChannelId: 1003, channels: [{ name: 'custom', id: 1010, options: 0 }] },
  }

  function withHandler(handler: Partial<ChannelHandler>): ChannelMultiplexer {
    const registry = new ChannelRegistry().register('custom', () => ({
      type: 'custom',
      decode: () => 'decoded',
      encode: () => new Uint8Array(0),
      ...handler,
    }))
    const multiplexer = new ChannelMultiplexer(registry)
    multiplexer.configure('client', customLayouts.client)
    multiplexer.configure('server', customLayouts.server)
    return multiplexer
  }

  const chunk = chunkChannelMessage(Uint8Array.of(1, 2, 3), 1600)[0] ?? new Uint8Array(0)

  it('contains a handler that throws while decoding', () => {
    const multiplexer = withHandler({
      decode: () => {
        throw new TypeError('bug')
      },
    })
    const message = completed(multiplexer.inbound('client-to-server', slow(1004, chunk)))

    expect(message.decodeError).toBeInstanceOf(ChannelDecodeError)
    expect(message.decodeError?.message).toBe('Channel handler failed: bug')
    expect(message.decodeError?.cause).toBeInstanceOf(TypeError)
    expect(message.event).toBeUndefined()
    expect(multiplexer.forward(message)).toEqual([slow(1010, chunk)])
  })

  it('contains non-error values thrown from notices', () => {
    const multiplexer = withHandler({
      notices: () => {
        throw 'no notices'
      },
    })
    const message = completed(multiplexer.inbound('client-to-server', slow(1004, chunk)))

    expect(message.decodeError?.message).toBe('Channel handler failed: no notices')
    expect(message.decodeError?.cause).toBe('no notices')
  })

  it('still raises invariant violations', () => {
    const multiplexer = withHandler({
      decode: () => {
        throw new RelayInvariantViolation('broken relay state')
      },
    })
    expect(() => multiplexer.inbound('client-to-server', slow(1004, chunk))).toThrow('broken relay state')
  })

  it('relays messages above the size limit without buffering them', () => {
    const multiplexer = new ChannelMultiplexer(createDefaultRegistry(), { maxMessageSize: 10 })
    multiplexer.configure('client', clientLayout)
    multiplexer.configure('server', serverLayout)
    const first = encodeChannelChunk({ totalLength: 100, flags: ChannelFlag.First, data: new Uint8Array(8) })
    const last = encodeChannelChunk({ totalLength: 100, flags: ChannelFlag.Last, data: new Uint8Array(92) })

    const head = completed(multiplexer.inbound('client-to-server', slow(1004, first)))
    expect(head.decodeError?.message).toBe('Channel message declares 100 bytes, above the 10 byte limit')
    expect(multiplexer.forward(head)).toEqual([slow(1010, first)])

    const tail = completed(multiplexer.inbound('client-to-server', slow(1004, last)))
    expect(tail.decodeError?.message).toBe('Channel chunk arrived without a first chunk')
    expect(multiplexer.forward(tail)).toEqual([slow(1010, last)])
  })
})

describe('ChannelMultiplexer clipboard state', () => {
  const clipboard = new ClipboardHandler()
  const request = clipboard.encode({
    type: 'format-data-request',
    msgFlags: 0,
    formatId: ClipboardFormat.UnicodeText,
  })
  const response = (text: string) =>
    clipboard.encode({
      type: 'format-data-response',
      msgFlags: ClipboardMessageFlag.ResponseOk,
      formatId: ClipboardFormat.UnicodeText,
      data: new Uint8Array(0),
      text,
    })
  const wire = (channelId: number, data: Uint8Array) =>
    slow(channelId, chunkChannelMessage(data, 1600)[0] ?? new Uint8Array(0))

  it('lets later hooks read a byte replacement as the requested format', async () => {
    const multiplexer = createMultiplexer()
    multiplexer.inbound('server-to-client', wire(1010, request))
    const message = completed(multiplexer.inbound('client-to-server', wire(1004, response('hi'))))
    const hooks = new HookRegistry({ timeoutMs: 50 })
    const seen: unknown[] = []
    hooks.register(() => true, () => replaceData(response('HI')))
    hooks.register(
      () => true,
      (intercepted) => {
        seen.push(intercepted.event)
      },
    )

    const outcome = await hooks.run(
      {
        direction: message.direction,
        channel: message.channel,
        channelType: message.channelType,
        event: message.event,
        data: message.data,
      },
      multiplexer.codecFor(message),
    )

    expect(seen).toEqual([
      {
        type: 'format-data-response',
        msgFlags: ClipboardMessageFlag.ResponseOk,
        formatId: ClipboardFormat.UnicodeText,
        data: encodeClipboardText(ClipboardFormat.UnicodeText, 'HI'),
        text: 'HI',
      },
    ])
    expect(outcome).toMatchObject({ action: 'replace', message: { event: { text: 'HI' } } })
    expect(
      completed(multiplexer.inbound('client-to-server', wire(1004, response('again')))).event,
    ).toMatchObject({ formatId: ClipboardFormat.UnicodeText, text: 'again' })
  })

  it('decodes replies to injected requests', () => {
    const multiplexer = createMultiplexer()
    multiplexer.compose('server-to-client', 'cliprdr', {
      event: { type: 'format-data-request', msgFlags: 0, formatId: ClipboardFormat.UnicodeText },
    })

    expect(
      completed(multiplexer.inbound('client-to-server', wire(1004, response('copied')))).event,
    ).toMatchObject({ formatId: ClipboardFormat.UnicodeText, text: 'copied' })
  })
})
