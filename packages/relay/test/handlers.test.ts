import { describe, expect, it } from 'vitest'

import {
  ClipboardFormat,
  ClipboardHandler,
  ClipboardMessageFlag,
  ClipboardMessageType,
  encodeClipboardText,
  isClipboardPdu,
} from '../src/channels/handlers/cliprdr'
import { DynamicChannelHandler } from '../src/channels/handlers/drdynvc'
import { decodeIoMessage, encodeIoEvent, isIoEvent } from '../src/channels/handlers/io'
import {
  DeviceRedirectionComponent,
  DeviceRedirectionHandler,
  DeviceType,
} from '../src/channels/handlers/rdpdr'
import { createDefaultRegistry } from '../src/channels/registry'
import { encodeUtf16 } from '../src/internal/binary/binary-writer'
import { encodeFastPathInput } from '../src/pdu/fast-path'
import { encodeSharePdu, encodeSlowPathInput, ShareDataType } from '../src/pdu/share'

function clipboardMessage(msgType: number, msgFlags: number, body: Uint8Array): Uint8Array {
  const out = new Uint8Array(8 + body.length)
  const view = new DataView(out.buffer)
  view.setUint16(0, msgType, true)
  view.setUint16(2, msgFlags, true)
  view.setUint32(4, body.length, true)
  out.set(body, 8)
  return out
}

function clipboardCapabilities(generalFlags: number): Uint8Array {
  const body = new Uint8Array(16)
  const view = new DataView(body.buffer)
  view.setUint16(0, 1, true)
  view.setUint16(4, 0x0001, true)
  view.setUint16(6, 12, true)
  view.setUint32(8, 2, true)
  view.setUint32(12, generalFlags, true)
  return clipboardMessage(ClipboardMessageType.Capabilities, 0, body)
}

function u32(value: number): Uint8Array {
  const out = new Uint8Array(4)
  new DataView(out.buffer).setUint32(0, value, true)
  return out
}

describe('ClipboardHandler', () => {
  it('uses long format names once both sides advertise them', () => {
    const handler = new ClipboardHandler()
    expect(handler.decode(clipboardCapabilities(0x02), 'server-to-client')).toMatchObject({
      type: 'capabilities',
      generalFlags: 0x02,
    })
    expect(handler.longFormatNames).toBe(false)
    handler.decode(clipboardCapabilities(0x02), 'client-to-server')
    expect(handler.longFormatNames).toBe(true)

    const list = clipboardMessage(
      ClipboardMessageType.FormatList,
      0,
      Uint8Array.of(...u32(13), 0, 0, ...u32(0xc004), ...encodeUtf16('HTML Format'), 0, 0),
    )
    const decoded = handler.decode(list, 'client-to-server')

    expect(decoded).toEqual({
      type: 'format-list',
      msgFlags: 0,
      longNames: true,
      formats: [
        { id: 13, name: '' },
        { id: 0xc004, name: 'HTML Format' },
      ],
    })
    expect(handler.encode(decoded)).toEqual(list)
  })

  it('reads fixed width names without the long name capability', () => {
    const handler = new ClipboardHandler()
    const name = new Uint8Array(32)
    name.set(encodeUtf16('Rich Text'))
    const list = clipboardMessage(ClipboardMessageType.FormatList, 0, Uint8Array.of(...u32(0xc010), ...name))

    expect(handler.decode(list, 'server-to-client')).toEqual({
      type: 'format-list',
      msgFlags: 0,
      longNames: false,
      formats: [{ id: 0xc010, name: 'Rich Text' }],
    })
  })

  it('decodes a data response as the format its peer requested', () => {
    const handler = new ClipboardHandler()
    handler.decode(
      clipboardMessage(ClipboardMessageType.FormatDataRequest, 0, u32(ClipboardFormat.UnicodeText)),
      'server-to-client',
    )
    const text = encodeClipboardText(ClipboardFormat.UnicodeText, 'hello')
    const response = handler.decode(
      clipboardMessage(ClipboardMessageType.FormatDataResponse, ClipboardMessageFlag.ResponseOk, text),
      'client-to-server',
    )

    expect(response).toEqual({
      type: 'format-data-response',
      msgFlags: ClipboardMessageFlag.ResponseOk,
      formatId: ClipboardFormat.UnicodeText,
      data: text,
      text: 'hello',
    })
    if (response.type !== 'format-data-response') throw new Error('expected a data response')
    expect(handler.encode({ ...response, text: 'HELLO' })).toEqual(
      clipboardMessage(
        ClipboardMessageType.FormatDataResponse,
        ClipboardMessageFlag.ResponseOk,
        Uint8Array.of(...encodeUtf16('HELLO'), 0, 0),
      ),
    )
  })

  it('keeps the requested format for later responses and peeks without recording requests', () => {
    const handler = new ClipboardHandler()
    const textRequest = clipboardMessage(ClipboardMessageType.FormatDataRequest, 0, u32(ClipboardFormat.Text))
    const unicodeRequest = clipboardMessage(
      ClipboardMessageType.FormatDataRequest,
      0,
      u32(ClipboardFormat.UnicodeText),
    )
    const response = (text: string) =>
      clipboardMessage(
        ClipboardMessageType.FormatDataResponse,
        ClipboardMessageFlag.ResponseOk,
        encodeClipboardText(ClipboardFormat.UnicodeText, text),
      )
    handler.decode(unicodeRequest, 'server-to-client')

    expect(handler.peek(textRequest, 'server-to-client')).toEqual({
      type: 'format-data-request',
      msgFlags: 0,
      formatId: ClipboardFormat.Text,
    })
    expect(handler.decode(response('one'), 'client-to-server')).toMatchObject({
      formatId: ClipboardFormat.UnicodeText,
      text: 'one',
    })
    expect(handler.peek(response('two'), 'client-to-server')).toMatchObject({
      formatId: ClipboardFormat.UnicodeText,
      text: 'two',
    })
  })

  it('leaves failed and unrequested responses undecoded', () => {
    const handler = new ClipboardHandler()
    expect(
      handler.decode(
        clipboardMessage(ClipboardMessageType.FormatDataResponse, ClipboardMessageFlag.ResponseFail, new Uint8Array(0)),
        'client-to-server',
      ),
    ).toEqual({
      type: 'format-data-response',
      msgFlags: ClipboardMessageFlag.ResponseFail,
      data: new Uint8Array(0),
    })
  })

  it('rejects a message shorter than its declared length', () => {
    const truncated = clipboardMessage(ClipboardMessageType.MonitorReady, 0, new Uint8Array(10)).subarray(0, 8)
    expect(() => new ClipboardHandler().decode(truncated, 'server-to-client')).toThrow(
      'Clipboard message declares 10 bytes but carries 0',
    )
  })

  it('keeps other messages opaque', () => {
    const ready = clipboardMessage(ClipboardMessageType.MonitorReady, 0, new Uint8Array(0))
    const handler = new ClipboardHandler()
    const decoded = handler.decode(ready, 'server-to-client')

    expect(decoded).toEqual({ type: 'other', msgType: 1, msgFlags: 0, body: new Uint8Array(0) })
    expect(isClipboardPdu(decoded)).toBe(true)
    expect(isClipboardPdu({ type: 'other' })).toBe(false)
    expect(handler.encode(decoded)).toEqual(ready)
  })
})

describe('DynamicChannelHandler', () => {
  const encoder = new TextEncoder()

  it('attributes payloads to the channel the server created', () => {
    const handler = new DynamicChannelHandler()
    const create = Uint8Array.of(0x10, 0x03, ...encoder.encode('echo'), 0)
    expect(handler.decode(create, 'server-to-client')).toEqual({
      type: 'create-request',
      header: 0x10,
      channelId: 3,
      name: 'echo',
    })
    expect(handler.decode(Uint8Array.of(0x10, 0x03, 0, 0, 0, 0), 'client-to-server')).toEqual({
      type: 'create-response',
      header: 0x10,
      channelId: 3,
      status: 0,
      channelName: 'echo',
    })

    const data = handler.decode(Uint8Array.of(0x30, 0x03, 0xaa, 0xbb), 'client-to-server')
    expect(data).toEqual({
      type: 'data',
      header: 0x30,
      channelId: 3,
      data: Uint8Array.of(0xaa, 0xbb),
      channelName: 'echo',
    })
    expect(handler.notices(data)).toEqual([
      {
        kind: 'opaque',
        channel: 'drdynvc:echo',
        channelId: 3,
        reason: 'dynamic channel payloads are relayed without decoding',
      },
    ])
    expect(handler.notices(data)).toEqual([])
  })

  it('forgets a channel when it closes or its creation fails', () => {
    const handler = new DynamicChannelHandler()
    handler.decode(Uint8Array.of(0x10, 0x05, 0x61, 0), 'server-to-client')
    expect(handler.decode(Uint8Array.of(0x40, 0x05), 'server-to-client')).toEqual({
      type: 'close',
      header: 0x40,
      channelId: 5,
      channelName: 'a',
    })
    expect(handler.channelName(5)).toBeUndefined()

    handler.decode(Uint8Array.of(0x10, 0x06, 0x62, 0), 'server-to-client')
    handler.decode(Uint8Array.of(0x10, 0x06, 0xff, 0xff, 0xff, 0xff), 'client-to-server')
    expect(handler.channelName(6)).toBeUndefined()
  })

  it('peeks at creations and closes without changing channel names', () => {
    const handler = new DynamicChannelHandler()
    handler.decode(Uint8Array.of(0x10, 0x05, 0x61, 0), 'server-to-client')

    expect(handler.peek(Uint8Array.of(0x40, 0x05), 'server-to-client')).toEqual({
      type: 'close',
      header: 0x40,
      channelId: 5,
      channelName: 'a',
    })
    expect(handler.peek(Uint8Array.of(0x10, 0x06, 0x62, 0), 'server-to-client')).toMatchObject({
      type: 'create-request',
      name: 'b',
    })
    expect(handler.channelName(5)).toBe('a')
    expect(handler.channelName(6)).toBeUndefined()
  })

  it('sizes ids and lengths from the header bits', () => {
    const handler = new DynamicChannelHandler()
    const first = Uint8Array.of(0x25, 0x34, 0x12, 0x00, 0x01, 0x09)
    const decoded = handler.decode(first, 'server-to-client')

    expect(decoded).toEqual({
      type: 'data-first',
      header: 0x25,
      channelId: 0x1234,
      totalLength: 0x100,
      data: Uint8Array.of(0x09),
    })
    expect(handler.encode(decoded)).toEqual(first)
  })

  it('rejects bytes after a close', () => {
    expect(() =>
      new DynamicChannelHandler().decode(Uint8Array.of(0x40, 0x01, 0x00), 'client-to-server'),
    ).toThrow('1 bytes follow a dynamic channel close')
  })

  it('keeps capability messages opaque', () => {
    const caps = Uint8Array.of(0x50, 0x00, 0x01, 0x00)
    const handler = new DynamicChannelHandler()
    const decoded = handler.decode(caps, 'server-to-client')

    expect(decoded).toEqual({ type: 'other', header: 0x50, body: Uint8Array.of(0x00, 0x01, 0x00) })
    expect(handler.encode(decoded)).toEqual(caps)
    expect(handler.notices(decoded)).toEqual([])
  })
})

describe('DeviceRedirectionHandler', () => {
  it('lists announced devices', () => {
    const dosName = new Uint8Array(8)
    dosName.set([0x43, 0x3a])
    const body = Uint8Array.of(
      ...u32(1),
      ...u32(DeviceType.Filesystem),
      ...u32(1),
      ...dosName,
      ...u32(2),
      0x43,
      0x00,
    )
    const pdu = Uint8Array.of(0x72, 0x44, 0x41, 0x44, ...body)
    const handler = new DeviceRedirectionHandler()
    const decoded = handler.decode(pdu)

    expect(decoded).toEqual({
      component: DeviceRedirectionComponent.Core,
      packetId: 0x4441,
      packet: 'device-list-announce',
      body,
      devices: [{ deviceType: DeviceType.Filesystem, deviceId: 1, dosName: 'C:', data: Uint8Array.of(0x43, 0x00) }],
    })
    expect(handler.encode(decoded)).toEqual(pdu)
  })

  it('names only core packets', () => {
    expect(new DeviceRedirectionHandler().decode(Uint8Array.of(0x52, 0x50, 0x43, 0x50, 1))).toEqual({
      component: DeviceRedirectionComponent.Printer,
      packetId: 0x5043,
      packet: 'unknown',
      body: Uint8Array.of(1),
    })
  })
})

describe('I/O channel codec', () => {
  it('decodes slow-path input and re-encodes edited events', () => {
    const input = encodeSlowPathInput([{ type: 'scancode', time: 0, flags: 0, keyCode: 0x1e }])
    const data = encodeSharePdu({
      type: 'data',
      source: 1007,
      shareId: 0x103ea,
      streamId: 1,
      dataType: ShareDataType.Input,
      compressedType: 0,
      body: input,
    })
    const event = decodeIoMessage({ kind: 'slow-path', channelId: 1003, flags: 0, data }, 'client-to-server')

    expect(event).toMatchObject({
      type: 'share',
      input: [{ type: 'scancode', time: 0, flags: 0, keyCode: 0x1e }],
    })
    if (event.type !== 'share') throw new Error('expected a share event')
    expect(encodeIoEvent({ ...event, input: [{ type: 'scancode', time: 0, flags: 0, keyCode: 0x30 }] })).toEqual({
      kind: 'slow-path',
      data: encodeSharePdu({
        type: 'data',
        source: 1007,
        shareId: 0x103ea,
        streamId: 1,
        dataType: ShareDataType.Input,
        compressedType: 0,
        body: encodeSlowPathInput([{ type: 'scancode', time: 0, flags: 0, keyCode: 0x30 }]),
      }),
    })
  })

  it('reads fast-path by direction', () => {
    const { header, body } = encodeFastPathInput([{ type: 'scancode', flags: 0, keyCode: 0x1e }])
    const input = decodeIoMessage({ kind: 'fast-path', header, data: body }, 'client-to-server')
    expect(input).toEqual({
      type: 'fast-path-input',
      header: 0x04,
      events: [{ type: 'scancode', flags: 0, keyCode: 0x1e }],
    })
    expect(isIoEvent(input)).toBe(true)

    const output = decodeIoMessage(
      { kind: 'fast-path', header: 0, data: Uint8Array.of(0x01, 0x01, 0x00, 0xff) },
      'server-to-client',
    )
    expect(output).toEqual({
      type: 'fast-path-output',
      header: 0,
      updates: [{ code: 1, fragmentation: 0, compression: 0, data: Uint8Array.of(0xff) }],
    })
    expect(encodeIoEvent(output)).toEqual({
      kind: 'fast-path',
      header: 0,
      data: Uint8Array.of(0x01, 0x01, 0x00, 0xff),
    })
  })

  it('recounts fast-path events when the list changes', () => {
    expect(
      encodeIoEvent({
        type: 'fast-path-input',
        header: 0x04,
        events: [
          { type: 'scancode', flags: 0, keyCode: 0x1e },
          { type: 'scancode', flags: 1, keyCode: 0x1e },
        ],
      }),
    ).toEqual({ kind: 'fast-path', header: 0x08, data: Uint8Array.of(0x00, 0x1e, 0x01, 0x1e) })
  })
})

describe('ChannelRegistry', () => {
  it('matches channel names without regard to case', () => {
    const registry = createDefaultRegistry()

    expect(registry.has('CLIPRDR')).toBe(true)
    expect(registry.create('cliprdr')?.type).toBe('cliprdr')
    expect(registry.create('rdpsnd')).toBeUndefined()
    expect(registry.unregister('rdpdr')).toBe(true)
    expect(registry.has('rdpdr')).toBe(false)
  })
})
