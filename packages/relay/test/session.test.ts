import { afterEach, describe, expect, it, vi } from 'vitest'

import { ClipboardMessageFlag, ClipboardMessageType } from '../src/channels/handlers/cliprdr'
import { CollectingDiagnostics, Diagnostics } from '../src/diagnostics'
import { installActiveClipboard } from '../src/features/active-clipboard'
import { installClipboardCapture } from '../src/features/clipboard'
import { installCredentialCapture } from '../src/features/credentials'
import { installPayloadInjection, openRunDialog, typeCommand } from '../src/features/payload'
import { encodeUtf16 } from '../src/internal/binary/binary-writer'
import { encodeFastPathInput, type FastPathInputEvent } from '../src/pdu/fast-path'
import { ShareDataType, encodeSlowPathInput } from '../src/pdu/share'
import { ChannelFlag, decodeChannelChunk } from '../src/pdu/virtual-channel'
import { drop, replaceEvent } from '../src/relay/hooks'
import type { SessionEvent } from '../src/relay/session'
import {
  CLIENT_CHANNEL_IDS,
  CLIENT_USER_ID,
  chunkData,
  createHarness,
  encodeShareData,
  establish,
  IO_CHANNEL_ID,
  recordedEvents,
  recordedKinds,
  SERVER_CHANNEL_IDS,
  settle,
} from './helpers/rdp-fixtures'

const [CLIENT_CLIPRDR, CLIENT_DRDYNVC, CLIENT_RDPSND] = CLIENT_CHANNEL_IDS
const [SERVER_CLIPRDR, SERVER_DRDYNVC, SERVER_RDPSND] = SERVER_CHANNEL_IDS

function clipboard(msgType: number, msgFlags: number, body: Uint8Array): Uint8Array {
  const out = new Uint8Array(8 + body.length)
  const view = new DataView(out.buffer)
  view.setUint16(0, msgType, true)
  view.setUint16(2, msgFlags, true)
  view.setUint32(4, body.length, true)
  out.set(body, 8)
  return out
}

const UNICODE_TEXT = 13
const formatDataRequest = clipboard(ClipboardMessageType.FormatDataRequest, 0, Uint8Array.of(UNICODE_TEXT, 0, 0, 0))

function textResponse(text: string): Uint8Array {
  return clipboard(
    ClipboardMessageType.FormatDataResponse,
    ClipboardMessageFlag.ResponseOk,
    Uint8Array.of(...encodeUtf16(text), 0, 0),
  )
}

const monitorReady = clipboard(ClipboardMessageType.MonitorReady, 0, new Uint8Array(0))

function scancodes(...codes: number[]): FastPathInputEvent[] {
  return codes.flatMap((keyCode): FastPathInputEvent[] => [
    { type: 'scancode', flags: 0, keyCode },
    { type: 'scancode', flags: 1, keyCode },
  ])
}

afterEach(() => {
  vi.useRealTimers()
})

describe('RelaySession', () => {
  it('activates once both legs finish negotiating', async () => {
    const harness = createHarness()
    const events: SessionEvent[] = []
    harness.session.subscribe((event) => events.push(event))

    const { forwardedClientInfo } = establish(harness)

    expect(harness.session.active).toBe(true)
    expect(harness.session.engine('client').state).toBe('Active')
    expect(harness.session.engine('server').state).toBe('Active')
    expect(forwardedClientInfo.username).toBe('operator')
    expect(events.map((event) => event.type)).toEqual(['client-info', 'active'])

    harness.session.close()
    expect(recordedKinds(harness.sink)[0]).toBe('SessionStart')
    expect(recordedEvents(harness.sink).filter((event) => event.kind === 'ClientInfo')).toEqual([
      {
        kind: 'ClientInfo',
        value: { domain: 'LAB', username: 'operator', password: 'test-secret', replaced: false },
      },
    ])
    await settle()
    expect(harness.diagnostics.records.map((record) => record.code)).toContain('active')
  })

  it('records the session start details', () => {
    const harness = createHarness({
      sensorId: 'sensor-a',
      client: { address: '192.0.2.10', port: 50123 },
    })
    harness.session.close()

    expect(recordedEvents(harness.sink)[0]).toEqual({
      kind: 'SessionStart',
      value: {
        startedAt: '2026-01-02T03:04:05.000Z',
        sensorId: 'sensor-a',
        client: { address: '192.0.2.10', port: 50123 },
        target: { host: 'rdp.test', port: 3389 },
      },
    })
  })

  it('forwards channel messages under the other leg ids', async () => {
    const harness = createHarness()
    establish(harness)

    harness.client.sendChannel(CLIENT_CLIPRDR, monitorReady, 4)
    await harness.session.waitForIdle()

    expect(harness.server.slowPath().map((message) => [message.channelId, chunkData(message.body)])).toEqual([
      [SERVER_CLIPRDR, monitorReady.subarray(0, 4)],
      [SERVER_CLIPRDR, monitorReady.subarray(4)],
    ])
    expect(recordedEvents(harness.sink).filter((event) => event.kind === 'ChannelObserved')).toEqual([
      {
        kind: 'ChannelObserved',
        value: { direction: 'client-to-server', tag: 'cliprdr', data: monitorReady },
      },
    ])
  })

  it('re-encodes clipboard text a hook replaces', async () => {
    const harness = createHarness()
    establish(harness)
    harness.session.registerHook(
      (message) => message.channel === 'cliprdr' && message.direction === 'client-to-server',
      (message) => {
        const event = message.event
        if (typeof event !== 'object' || event === null || !('text' in event)) return
        return replaceEvent({ ...event, text: 'HELLO' })
      },
    )

    harness.server.sendChannel(SERVER_CLIPRDR, formatDataRequest)
    await harness.session.waitForIdle()
    expect(harness.client.slowPath().map((message) => chunkData(message.body))).toEqual([formatDataRequest])

    harness.client.sendChannel(CLIENT_CLIPRDR, textResponse('hello'))
    await harness.session.waitForIdle()

    expect(harness.server.slowPath().map((message) => [message.channelId, chunkData(message.body)])).toEqual([
      [SERVER_CLIPRDR, textResponse('HELLO')],
    ])
    expect(recordedEvents(harness.sink).filter((event) => event.kind === 'ChannelModified')).toEqual([
      {
        kind: 'ChannelModified',
        value: { direction: 'client-to-server', tag: 'cliprdr', data: textResponse('HELLO') },
      },
    ])
  })

  it('suppresses dropped messages', async () => {
    const harness = createHarness()
    establish(harness)
    harness.session.registerHook((message) => message.channel === 'cliprdr', drop)

    harness.client.sendChannel(CLIENT_CLIPRDR, monitorReady)
    await harness.session.waitForIdle()

    expect(harness.server.slowPath()).toEqual([])
    expect(recordedKinds(harness.sink).slice(-2)).toEqual(['ChannelObserved', 'ChannelSuppressed'])
  })

  it('forwards the original when a hook runs out of time', async () => {
    const harness = createHarness({ hookTimeoutMs: 20 })
    establish(harness)
    harness.session.registerHook(
      (message) => message.channel === 'cliprdr',
      () => new Promise<undefined>(() => undefined),
    )

    harness.client.sendChannel(CLIENT_CLIPRDR, monitorReady)
    await harness.session.waitForIdle()

    expect(harness.server.slowPath().map((message) => chunkData(message.body))).toEqual([monitorReady])
    expect(recordedEvents(harness.sink).filter((event) => event.kind === 'HookTimeout')).toEqual([
      {
        kind: 'HookTimeout',
        value: { direction: 'client-to-server', channel: 'cliprdr', hookId: 1, budgetMs: 20 },
      },
    ])
  })

  it('relays undecodable channel messages and records the failure', async () => {
    const harness = createHarness()
    establish(harness)
    const truncated = clipboard(ClipboardMessageType.MonitorReady, 0, new Uint8Array(4)).subarray(0, 8)

    harness.client.sendChannel(CLIENT_CLIPRDR, truncated)
    await harness.session.waitForIdle()
    await settle()

    expect(harness.server.slowPath().map((message) => chunkData(message.body))).toEqual([truncated])
    expect(recordedEvents(harness.sink).filter((event) => event.kind === 'ChannelDecodeError')).toEqual([
      {
        kind: 'ChannelDecodeError',
        value: {
          direction: 'client-to-server',
          channel: 'cliprdr',
          message: 'Clipboard message declares 4 bytes but carries 0',
        },
      },
    ])
    expect(harness.diagnostics.records.find((record) => record.code === 'channel-decode-error')).toMatchObject({
      level: 'warn',
      component: 'session',
    })
  })

  it('reports each opaque channel once per direction', async () => {
    const harness = createHarness()
    establish(harness)
    const sound = Uint8Array.of(0x02, 0x00, 0x00, 0x00)
    const dynamic = Uint8Array.of(0x30, 0x07, 0xaa)

    harness.server.sendChannel(SERVER_RDPSND, sound)
    harness.server.sendChannel(SERVER_RDPSND, sound)
    harness.server.sendChannel(SERVER_DRDYNVC, dynamic)
    harness.server.sendChannel(SERVER_DRDYNVC, dynamic)
    await harness.session.waitForIdle()

    const received = harness.client.slowPath()
    expect(received.map((message) => message.channelId)).toEqual([
      CLIENT_RDPSND,
      CLIENT_RDPSND,
      CLIENT_DRDYNVC,
      CLIENT_DRDYNVC,
    ])
    expect(received.map((message) => chunkData(message.body))).toEqual([sound, sound, dynamic, dynamic])
    expect(recordedEvents(harness.sink).filter((event) => event.kind === 'ChannelOpaque')).toEqual([
      {
        kind: 'ChannelOpaque',
        value: {
          direction: 'server-to-client',
          channel: 'rdpsnd',
          channelId: SERVER_RDPSND,
          reason: 'no handler for channel',
        },
      },
      {
        kind: 'ChannelOpaque',
        value: {
          direction: 'server-to-client',
          channel: 'drdynvc:#7',
          channelId: 7,
          reason: 'dynamic channel payloads are relayed without decoding',
        },
      },
    ])
  })

  it('relays fast-path input over standard RDP security', async () => {
    const harness = createHarness()
    establish(harness, { encrypted: true })
    const { header, body } = encodeFastPathInput(scancodes(0x23, 0x17))

    harness.client.sendFastPath(header, body)
    await harness.session.waitForIdle()

    expect(harness.server.fastPath()).toEqual([{ header, body }])
    expect(recordedEvents(harness.sink).filter((event) => event.kind === 'Pdu')).toEqual([
      { kind: 'Pdu', value: { direction: 'client-to-server', tag: 'fast-path', data: body } },
    ])
  })

  it('relays slow-path share data on the io channel', async () => {
    const harness = createHarness()
    establish(harness)
    const synchronize = encodeShareData(ShareDataType.Synchronize, Uint8Array.of(1, 0, 0xea, 0x03))

    harness.server.sendSlowPath(IO_CHANNEL_ID, { flags: 0, body: synchronize })
    await harness.session.waitForIdle()

    expect(harness.client.slowPath()).toEqual([{ channelId: IO_CHANNEL_ID, flags: 0, body: synchronize }])
  })

  it('forwards replacement credentials and records the originals', () => {
    const harness = createHarness({
      replacementCredentials: { username: 'administrator', password: 'test-secret-2' },
    })

    const { forwardedClientInfo } = establish(harness)

    expect(forwardedClientInfo).toMatchObject({
      domain: 'LAB',
      username: 'administrator',
      password: 'test-secret-2',
    })
    expect(recordedEvents(harness.sink).filter((event) => event.kind === 'ClientInfo')).toEqual([
      {
        kind: 'ClientInfo',
        value: {
          domain: 'LAB',
          username: 'operator',
          password: 'test-secret',
          replaced: true,
          forwardedUsername: 'administrator',
        },
      },
    ])
  })

  it('injects relay messages without running hooks', async () => {
    const harness = createHarness()
    await expect(harness.session.inject('server-to-client', 'cliprdr', { data: monitorReady })).rejects.toThrow(
      'Cannot inject on cliprdr before both legs are active',
    )
    establish(harness)
    const hook = vi.fn(drop)
    harness.session.registerHook(() => true, hook)

    await harness.session.inject('server-to-client', 'cliprdr', { data: monitorReady })

    const [message] = harness.client.slowPath()
    expect(message?.channelId).toBe(CLIENT_CLIPRDR)
    expect(decodeChannelChunk(message?.body ?? new Uint8Array(0))).toEqual({
      totalLength: monitorReady.length,
      flags: ChannelFlag.First | ChannelFlag.Last | ChannelFlag.ShowProtocol,
      data: monitorReady,
    })
    expect(hook).not.toHaveBeenCalled()
  })

  it('closes both legs when one side hangs up', async () => {
    const harness = createHarness()
    const events: SessionEvent[] = []
    harness.session.subscribe((event) => events.push(event))
    establish(harness)

    harness.server.transport.end('reset by peer')
    await settle()

    expect(harness.session.closed).toBe(true)
    expect(harness.session.closeReason).toBe('reset by peer')
    expect(harness.client.transport.closed).toBe(true)
    expect(harness.server.transport.closed).toBe(true)
    expect(events.at(-1)).toEqual({ type: 'closed', reason: 'reset by peer' })
    expect(recordedEvents(harness.sink).at(-1)).toEqual({
      kind: 'SessionEnd',
      value: { reason: 'reset by peer' },
    })
    expect(harness.diagnostics.records.find((record) => record.code === 'connection-closed')).toMatchObject({
      level: 'info',
      message: 'reset by peer',
    })
  })

  it('ends with only start and end records when the client leaves first', () => {
    const harness = createHarness()

    harness.client.transport.end()

    expect(harness.session.closeReason).toBe('client connection closed')
    expect(recordedKinds(harness.sink)).toEqual(['SessionStart', 'SessionEnd'])
  })

  it('tears the session down on an unexpected PDU', async () => {
    const harness = createHarness()

    harness.client.sendDomain({ type: 'erect-domain-request', subHeight: 0, subInterval: 0 })
    await settle()

    const reason = 'Unexpected MCS erect-domain-request from the client in state Idle'
    expect(harness.session.closeReason).toBe(reason)
    expect(harness.server.transport.closed).toBe(true)
    expect(recordedEvents(harness.sink).at(-1)).toEqual({
      kind: 'SessionEnd',
      value: { reason, detail: 'UnexpectedPduError' },
    })
    expect(
      harness.diagnostics.records.filter((record) => record.component === 'session' && record.level === 'error'),
    ).toMatchObject([
      {
        code: 'UnexpectedPduError',
        message: `Session ${harness.session.sessionId} failed on the client leg: ${reason}`,
      },
    ])
  })

  it('assigns the client a user id after its static channels', () => {
    const harness = createHarness()
    establish(harness)
    expect(harness.client.userId).toBe(CLIENT_USER_ID)
  })

  it('keeps relaying when the recording fails', async () => {
    const harness = createHarness()
    establish(harness)
    await harness.sink.close()

    harness.client.sendChannel(CLIENT_CLIPRDR, monitorReady)
    harness.client.sendChannel(CLIENT_CLIPRDR, monitorReady)
    await harness.session.waitForIdle()
    await settle()

    expect(harness.server.slowPath()).toHaveLength(2)
    expect(harness.diagnostics.records.filter((record) => record.code === 'recording-failed')).toMatchObject([
      { level: 'error', message: 'Cannot write to a closed memory sink' },
    ])
  })
})

describe('session features', () => {
  it('records clipboard text transfers', async () => {
    const harness = createHarness()
    establish(harness)
    installClipboardCapture(harness.session)

    harness.server.sendChannel(SERVER_CLIPRDR, formatDataRequest)
    await harness.session.waitForIdle()
    harness.client.sendChannel(CLIENT_CLIPRDR, textResponse('hello'))
    await harness.session.waitForIdle()

    expect(harness.server.slowPath().map((message) => chunkData(message.body))).toEqual([textResponse('hello')])
    expect(recordedEvents(harness.sink).filter((event) => event.kind === 'Clipboard')).toEqual([
      { kind: 'Clipboard', value: { direction: 'client-to-server', formatId: UNICODE_TEXT, text: 'hello' } },
    ])
  })

  it('asks the client for its clipboard once the server acknowledges a copy', async () => {
    const harness = createHarness()
    const collected = new CollectingDiagnostics()
    establish(harness)
    installClipboardCapture(harness.session)
    installActiveClipboard(harness.session, { diagnostics: new Diagnostics(collected, 'features') })
    const formatList = clipboard(
      ClipboardMessageType.FormatList,
      0,
      Uint8Array.of(UNICODE_TEXT, 0, 0, 0, ...new Uint8Array(32)),
    )
    const formatListResponse = clipboard(
      ClipboardMessageType.FormatListResponse,
      ClipboardMessageFlag.ResponseOk,
      new Uint8Array(0),
    )

    harness.client.sendChannel(CLIENT_CLIPRDR, formatList)
    await harness.session.waitForIdle()
    harness.server.sendChannel(SERVER_CLIPRDR, formatListResponse)
    await harness.session.waitForIdle()

    expect(harness.server.slowPath().map((message) => chunkData(message.body))).toEqual([formatList])
    expect(harness.client.slowPath().map((message) => chunkData(message.body))).toEqual([
      formatListResponse,
      formatDataRequest,
    ])

    harness.client.sendChannel(CLIENT_CLIPRDR, textResponse('copied'))
    await harness.session.waitForIdle()
    await settle()

    expect(harness.server.slowPath()).toEqual([])
    expect(recordedEvents(harness.sink).filter((event) => event.kind === 'Clipboard')).toEqual([
      { kind: 'Clipboard', value: { direction: 'client-to-server', formatId: UNICODE_TEXT, text: 'copied' } },
    ])
    expect(collected.records.map((record) => record.code)).toEqual(['clipboard-request'])
  })

  it('records client input and reports typed lines', async () => {
    const harness = createHarness()
    const collected = new CollectingDiagnostics()
    establish(harness)
    installCredentialCapture(harness.session, { diagnostics: new Diagnostics(collected, 'features') })

    const { header, body } = encodeFastPathInput(scancodes(0x23, 0x17, 0x1c))
    harness.client.sendFastPath(header, body)
    const slow = encodeShareData(
      ShareDataType.Input,
      encodeSlowPathInput([{ type: 'scancode', time: 0, flags: 0, keyCode: 0x1e }]),
    )
    harness.client.sendSlowPath(IO_CHANNEL_ID, { flags: 0, body: slow })
    await harness.session.waitForIdle()
    harness.session.close()
    await settle()

    expect(recordedEvents(harness.sink).filter((event) => event.kind === 'Input')).toEqual([
      {
        kind: 'Input',
        value: {
          direction: 'client-to-server',
          source: 'fast-path',
          events: [
            { type: 'scancode', code: 0x23, released: false, extended: false },
            { type: 'scancode', code: 0x23, released: true, extended: false },
            { type: 'scancode', code: 0x17, released: false, extended: false },
            { type: 'scancode', code: 0x17, released: true, extended: false },
            { type: 'scancode', code: 0x1c, released: false, extended: false },
            { type: 'scancode', code: 0x1c, released: true, extended: false },
          ],
        },
      },
      {
        kind: 'Input',
        value: {
          direction: 'client-to-server',
          source: 'slow-path',
          events: [{ type: 'scancode', code: 0x1e, released: false, extended: false }],
        },
      },
    ])
    expect(
      collected.records.filter((record) => record.code === 'typed-text').map((record) => record.detail),
    ).toEqual([
      { sessionId: harness.session.sessionId, line: 'hi' },
      { sessionId: harness.session.sessionId, line: 'a' },
    ])
  })

  it('types the payload and withholds user traffic while it runs', async () => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout'] })
    const harness = createHarness()
    establish(harness)
    installPayloadInjection(harness.session, {
      command: 'calc',
      delayMs: 100,
      stepDelayMs: 50,
      blockDurationMs: 500,
    })

    await vi.advanceTimersByTimeAsync(100)
    await harness.session.waitForIdle()
    expect(harness.server.fastPath()).toEqual([encodeFastPathInput(openRunDialog())])

    const { header, body } = encodeFastPathInput(scancodes(0x1e))
    harness.client.sendFastPath(header, body)
    await harness.session.waitForIdle()
    expect(harness.server.fastPath()).toEqual([])

    await vi.advanceTimersByTimeAsync(50)
    await harness.session.waitForIdle()
    expect(harness.server.fastPath()).toEqual([encodeFastPathInput(typeCommand('calc'))])

    await vi.advanceTimersByTimeAsync(450)
    harness.client.sendFastPath(header, body)
    await harness.session.waitForIdle()
    expect(harness.server.fastPath()).toEqual([{ header, body }])
    expect(
      recordedEvents(harness.sink).flatMap((event) =>
        event.kind === 'Input' ? [[event.value.source, event.value.events.length]] : [],
      ),
    ).toEqual([
      ['injected', 4],
      ['injected', 10],
    ])
  })
})
