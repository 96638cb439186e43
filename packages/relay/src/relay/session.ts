import { RecordingError, type SessionRecorder } from '@rdp-relay/recording'

import {
  type ChannelMessage,
  ChannelMultiplexer,
  type Replacement,
} from '../channels/multiplexer'
import { type ChannelRegistry, createDefaultRegistry } from '../channels/registry'
import { type Direction, IO_CHANNEL } from '../channels/types'
import { Diagnostics, type DiagnosticsSink } from '../diagnostics'
import { ConnectionClosedError, RelayError, RelayInvariantViolation } from '../errors'
import type { RsaPrivateKey } from '../internal/crypto/rsa'
import { ClientFacingEngine } from '../negotiation/client-facing'
import type { ConnectionEngine } from '../negotiation/engine'
import type {
  ApplicationMessage,
  EngineOutput,
  EngineSide,
  PeerMessage,
} from '../negotiation/messages'
import { type ReplacementCredentials, ServerFacingEngine } from '../negotiation/server-facing'
import type { CertificateSigningKey, ClientInfo } from '../pdu/security'
import { type HookCallback, type HookPredicate, HookRegistry } from './hooks'

export const DEFAULT_HOOK_TIMEOUT_MS = 1000

/** One leg's byte stream, bound by the runtime. */
export interface RelayTransport {
  send(payload: Uint8Array): void
  onData(listener: (payload: Uint8Array) => void): () => void
  onClose(listener: (reason: string | undefined) => void): () => void
  onError?(listener: (error: unknown) => void): (() => void) | undefined
  /** Upgrades the stream in place; later `send`s and data are protected. */
  startTls?(role: 'server' | 'client'): void
  close(): void
}

export interface RelaySessionOptions {
  readonly sessionId: string
  readonly rsaKey: RsaPrivateKey
  readonly certificateSigningKey?: CertificateSigningKey
  readonly tlsAvailable: boolean
  readonly downgrade?: boolean
  readonly replacementCredentials?: ReplacementCredentials
  readonly hookTimeoutMs?: number
  readonly maxPduSize?: number
  readonly maxChannelMessageSize?: number
  readonly target: { readonly host: string; readonly port: number }
  readonly client?: { readonly address: string; readonly port: number }
  readonly sensorId?: string
  readonly recorder?: SessionRecorder
  readonly registry?: ChannelRegistry
  readonly diagnostics?: DiagnosticsSink
  readonly randomBytes?: (length: number) => Uint8Array
  readonly now?: () => Date
}

export type SessionEvent =
  | { readonly type: 'active' }
  | {
      readonly type: 'client-info'
      readonly original: ClientInfo
      readonly forwarded: ClientInfo
    }
  | { readonly type: 'closed'; readonly reason: string }

export type SessionListener = (event: SessionEvent) => void

const DIRECTIONS: Record<EngineSide, Direction> = {
  client: 'client-to-server',
  server: 'server-to-client',
}

function otherSide(side: EngineSide): EngineSide {
  return side === 'client' ? 'server' : 'client'
}

function destinationOf(direction: Direction): EngineSide {
  return direction === 'client-to-server' ? 'server' : 'client'
}

/**
 * Pairs a client-facing and a server-facing engine. Engines are drained
 * synchronously as bytes arrive; application data is processed on one
 * promise chain per direction so each direction stays in receipt order.
 */
export class RelaySession {
  readonly sessionId: string
  readonly multiplexer: ChannelMultiplexer
  readonly hooks: HookRegistry
  readonly #options: RelaySessionOptions
  readonly #diagnostics: Diagnostics
  readonly #recorder: SessionRecorder | undefined
  readonly #engines: Record<EngineSide, ConnectionEngine>
  readonly #transports: Partial<Record<EngineSide, RelayTransport>> = {}
  readonly #held: Record<EngineSide, ApplicationMessage[]> = { client: [], server: [] }
  readonly #queues: Record<Direction, Promise<void>> = {
    'client-to-server': Promise.resolve(),
    'server-to-client': Promise.resolve(),
  }
  readonly #listeners = new Set<SessionListener>()
  readonly #disposers: Array<() => void> = []
  readonly #reportedOpaque = new Set<string>()
  #started = false
  #active = false
  #closed = false
  #closeReason: string | undefined
  #recordingFailed = false

  constructor(options: RelaySessionOptions) {
    this.#options = options
    this.sessionId = options.sessionId
    this.#recorder = options.recorder
    this.#diagnostics = new Diagnostics(options.diagnostics, 'session')
    this.multiplexer = new ChannelMultiplexer(
      options.registry ?? createDefaultRegistry(),
      options.maxChannelMessageSize === undefined
        ? {}
        : { maxMessageSize: options.maxChannelMessageSize },
    )
    this.hooks = new HookRegistry({
      timeoutMs: options.hookTimeoutMs ?? DEFAULT_HOOK_TIMEOUT_MS,
      diagnostics: this.#diagnostics.child('hooks'),
    })
    const shared = {
      ...(options.maxPduSize === undefined ? {} : { maxPduSize: options.maxPduSize }),
      ...(options.randomBytes ? { randomBytes: options.randomBytes } : {}),
    }
    this.#engines = {
      client: new ClientFacingEngine({
        ...shared,
        diagnostics: this.#diagnostics.child('client-facing'),
        rsaKey: options.rsaKey,
        ...(options.certificateSigningKey
          ? { certificateSigningKey: options.certificateSigningKey }
          : {}),
      }),
      server: new ServerFacingEngine({
        ...shared,
        diagnostics: this.#diagnostics.child('server-facing'),
        tlsAvailable: options.tlsAvailable,
        downgrade: options.downgrade ?? false,
        ...(options.replacementCredentials
          ? { replacementCredentials: options.replacementCredentials }
          : {}),
      }),
    }
  }

  get active(): boolean {
    return this.#active
  }

  get closed(): boolean {
    return this.#closed
  }

  get closeReason(): string | undefined {
    return this.#closeReason
  }

  get recorder(): SessionRecorder | undefined {
    return this.#recorder
  }

  engine(side: EngineSide): ConnectionEngine {
    return this.#engines[side]
  }

  /**
   * Runs `write` against the recorder, if any. A failing recording is
   * reported once and disabled; the relay keeps forwarding.
   */
  record(write: (recorder: SessionRecorder) => void): void {
    const recorder = this.#recorder
    if (!recorder || this.#recordingFailed) return
    try {
      write(recorder)
    } catch (error) {
      if (!(error instanceof RecordingError)) throw error
      this.#recordingFailed = true
      this.#diagnostics.error('recording-failed', error.message, { sessionId: this.sessionId })
    }
  }

  subscribe(listener: SessionListener): () => void {
    this.#listeners.add(listener)
    return () => {
      this.#listeners.delete(listener)
    }
  }

  registerHook(predicate: HookPredicate, callback: HookCallback): () => void {
    return this.hooks.register(predicate, callback)
  }

  start(client: RelayTransport, server: RelayTransport): void {
    if (this.#started) {
      throw new RelayInvariantViolation(`Session ${this.sessionId} already started`)
    }
    this.#started = true
    this.#transports.client = client
    this.#transports.server = server
    const startedAt = (this.#options.now ?? (() => new Date()))().toISOString()
    this.record((recorder) =>
      recorder.sessionStart({
        startedAt,
        ...(this.#options.sensorId ? { sensorId: this.#options.sensorId } : {}),
        ...(this.#options.client ? { client: this.#options.client } : {}),
        target: this.#options.target,
      }),
    )
    for (const side of ['client', 'server'] as const) {
      const transport = side === 'client' ? client : server
      this.#disposers.push(transport.onData((payload) => this.#receive(side, payload)))
      this.#disposers.push(
        transport.onClose((reason) =>
          this.#fail(side, new ConnectionClosedError(side, reason ?? `${side} connection closed`)),
        ),
      )
      const disposeError = transport.onError?.((error) => {
        this.#diagnostics.warn('transport-error', `${side} transport error`, { error })
      })
      if (disposeError) this.#disposers.push(disposeError)
    }
  }

  /**
   * Entry point for every decoded application PDU. Held while either leg is
   * still negotiating, then processed in receipt order per direction.
   */
  onApplicationData(side: EngineSide, message: ApplicationMessage): void {
    if (this.#closed) return
    if (!this.#active) {
      this.#held[side].push(message)
      return
    }
    const direction = DIRECTIONS[side]
    this.#enqueue(direction, () => this.#process(direction, message))
  }

  /** Sends a relay-originated message on `channel` towards the destination of `direction`. */
  inject(direction: Direction, channel: string, replacement: Replacement): Promise<void> {
    if (!this.#active || this.#closed) {
      return Promise.reject(
        new RelayInvariantViolation(`Cannot inject on ${channel} before both legs are active`),
      )
    }
    let messages: ApplicationMessage[]
    try {
      messages = this.multiplexer.compose(direction, channel, replacement)
    } catch (error) {
      return Promise.reject(error)
    }
    return new Promise((resolve) => {
      this.#enqueue(direction, () => {
        this.#send(destinationOf(direction), messages)
        resolve()
      })
    })
  }

  close(reason = 'closed by relay'): void {
    this.#shutdown(reason)
  }

  /** Resolves once both direction queues have nothing in flight. */
  async waitForIdle(): Promise<void> {
    for (;;) {
      const client = this.#queues['client-to-server']
      const server = this.#queues['server-to-client']
      await Promise.all([client, server])
      if (
        client === this.#queues['client-to-server'] &&
        server === this.#queues['server-to-client']
      ) {
        return
      }
    }
  }

  #receive(side: EngineSide, payload: Uint8Array): void {
    if (this.#closed) return
    try {
      this.#engines[side].receive(payload)
    } catch (error) {
      this.#fail(side, error)
      return
    }
    this.#pump(side)
  }

  #pump(side: EngineSide): void {
    const engine = this.#engines[side]
    let output: EngineOutput | undefined
    while ((output = engine.nextOutput())) {
      if (this.#closed && output.type !== 'send') continue
      this.#handleOutput(side, output)
    }
  }

  #handleOutput(side: EngineSide, output: EngineOutput): void {
    switch (output.type) {
      case 'send':
        this.#transports[side]?.send(output.data)
        return
      case 'peer':
        this.#deliverPeer(otherSide(side), output.message)
        return
      case 'start-tls':
        this.#startTls(side, output.role)
        return
      case 'state':
        if (output.to === 'Active') this.#maybeActivate()
        return
      case 'negotiation':
        this.record((recorder) =>
          recorder.negotiation({ side, stage: output.stage, detail: output.detail }),
        )
        return
      case 'client-info':
        this.#recordClientInfo(output.original, output.forwarded)
        return
      case 'channels':
        this.multiplexer.configure(side, output.layout)
        return
      case 'chunk-size':
        this.multiplexer.setChunkSize(side, output.size)
        return
      case 'application-data':
        this.onApplicationData(side, output.message)
        return
      case 'closed':
        this.#shutdown(`${side} connection closed: ${output.reason}`)
        return
    }
  }

  #deliverPeer(side: EngineSide, message: PeerMessage): void {
    try {
      this.#engines[side].handlePeer(message)
    } catch (error) {
      this.#fail(side, error)
      return
    }
    this.#pump(side)
  }

  #startTls(side: EngineSide, role: 'server' | 'client'): void {
    const transport = this.#transports[side]
    if (!transport?.startTls) {
      this.#fail(side, new RelayInvariantViolation(`The ${side} transport cannot start TLS`))
      return
    }
    this.#diagnostics.info('start-tls', `Upgrading the ${side} leg to TLS`, { role })
    try {
      transport.startTls(role)
    } catch (error) {
      this.#fail(side, error)
    }
  }

  #recordClientInfo(original: ClientInfo, forwarded: ClientInfo): void {
    const replaced =
      original.username !== forwarded.username ||
      original.password !== forwarded.password ||
      original.domain !== forwarded.domain
    this.record((recorder) =>
      recorder.clientInfo({
        domain: original.domain,
        username: original.username,
        password: original.password,
        replaced,
        ...(replaced ? { forwardedUsername: forwarded.username } : {}),
      }),
    )
    this.#emit({ type: 'client-info', original, forwarded })
  }

  #maybeActivate(): void {
    if (this.#active) return
    if (this.#engines.client.state !== 'Active' || this.#engines.server.state !== 'Active') return
    this.#active = true
    this.#diagnostics.info('active', `Session ${this.sessionId} is active on both legs`)
    this.#emit({ type: 'active' })
    for (const side of ['client', 'server'] as const) {
      for (const message of this.#held[side].splice(0)) {
        this.onApplicationData(side, message)
      }
    }
  }

  async #process(direction: Direction, wire: ApplicationMessage): Promise<void> {
    if (this.#closed) return
    const result = this.multiplexer.inbound(direction, wire)
    if (result.status === 'pending') return
    const message = result.message
    this.#recordInbound(message, wire)

    const decodeError = message.decodeError
    if (decodeError) {
      this.#diagnostics.warn('channel-decode-error', decodeError.message, {
        channel: message.channel,
        direction,
      })
      this.record((recorder) =>
        recorder.decodeError({ direction, channel: message.channel, message: decodeError.message }),
      )
      this.#forward(message)
      return
    }
    if (this.hooks.size === 0) {
      this.#forward(message)
      return
    }

    const outcome = await this.hooks.run(
      {
        direction,
        channel: message.channel,
        channelType: message.channelType,
        ...(message.event === undefined ? {} : { event: message.event }),
        data: message.data,
      },
      this.multiplexer.codecFor(message),
    )
    if (this.#closed) return
    switch (outcome.action) {
      case 'pass':
        this.#forward(message)
        return
      case 'timeout': {
        const { hookId, budgetMs } = outcome.error
        this.record((recorder) =>
          recorder.hookTimeout({ direction, channel: message.channel, hookId, budgetMs }),
        )
        this.#forward(message)
        return
      }
      case 'drop':
        this.record((recorder) =>
          recorder.channel('suppressed', direction, message.channel, message.data),
        )
        return
      case 'replace': {
        let replaced: ApplicationMessage[]
        try {
          replaced = this.multiplexer.replace(message, outcome.replacement)
        } catch (error) {
          if (!(error instanceof RelayError)) throw error
          this.#diagnostics.error('hook-replacement-failed', error.message, {
            channel: message.channel,
          })
          this.#forward(message)
          return
        }
        const modified = outcome.message.data
        this.record((recorder) => recorder.channel('modified', direction, message.channel, modified))
        this.#send(destinationOf(direction), replaced)
        return
      }
    }
  }

  #recordInbound(message: ChannelMessage, wire: ApplicationMessage): void {
    if (message.channel === IO_CHANNEL) {
      this.record((recorder) => recorder.pdu(message.direction, wire.kind, wire.data))
    } else {
      this.record((recorder) =>
        recorder.channel('observed', message.direction, message.channel, message.data),
      )
    }
    const notices = [...message.notices]
    if (message.opaqueReason !== undefined) {
      notices.push({
        kind: 'opaque',
        channel: message.channel,
        channelId: message.channelId,
        reason: message.opaqueReason,
      })
    }
    for (const notice of notices) {
      const key = `${message.direction}:${notice.channel}`
      if (this.#reportedOpaque.has(key)) continue
      this.#reportedOpaque.add(key)
      this.#diagnostics.info('channel-opaque', `${notice.channel}: ${notice.reason}`)
      this.record((recorder) =>
        recorder.opaqueChannel({
          direction: message.direction,
          channel: notice.channel,
          channelId: notice.channelId,
          reason: notice.reason,
        }),
      )
    }
  }

  #forward(message: ChannelMessage): void {
    this.#send(destinationOf(message.direction), this.multiplexer.forward(message))
  }

  #send(side: EngineSide, messages: ReadonlyArray<ApplicationMessage>): void {
    if (this.#closed) return
    const engine = this.#engines[side]
    try {
      for (const message of messages) {
        engine.sendApplication(message)
      }
    } catch (error) {
      this.#fail(side, error)
      return
    }
    this.#pump(side)
  }

  #enqueue(direction: Direction, task: () => void | Promise<void>): void {
    this.#queues[direction] = this.#queues[direction].then(task).catch((error: unknown) => {
      this.#fail(destinationOf(direction), error)
    })
  }

  #fail(side: EngineSide, error: unknown): void {
    if (this.#closed) return
    if (error instanceof ConnectionClosedError) {
      this.#diagnostics.info('connection-closed', error.message)
      this.#shutdown(error.message)
      return
    }
    const message = error instanceof Error ? error.message : String(error)
    this.#diagnostics.error(
      error instanceof Error ? error.name : 'session-error',
      `Session ${this.sessionId} failed on the ${side} leg: ${message}`,
    )
    this.#shutdown(message, error instanceof Error ? error.name : undefined)
  }

  #shutdown(reason: string, detail?: string): void {
    if (this.#closed) return
    this.#closed = true
    this.#closeReason = reason
    for (const side of ['client', 'server'] as const) {
      this.#engines[side].close(reason)
      this.#pump(side)
      this.#held[side].length = 0
    }
    while (this.#disposers.length > 0) {
      this.#disposers.pop()?.()
    }
    for (const side of ['client', 'server'] as const) {
      this.#transports[side]?.close()
    }
    this.record((recorder) => recorder.sessionEnd({ reason, ...(detail ? { detail } : {}) }))
    this.#emit({ type: 'closed', reason })
  }

  #emit(event: SessionEvent): void {
    for (const listener of [...this.#listeners]) {
      try {
        listener(event)
      } catch (error) {
        this.#diagnostics.error(
          'listener-failed',
          `Session listener failed on ${event.type}: ${error instanceof Error ? error.message : String(error)}`,
        )
      }
    }
  }
}
