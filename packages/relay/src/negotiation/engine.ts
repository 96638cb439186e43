import type { Diagnostics } from '../diagnostics'
import {
  ConnectionClosedError,
  MalformedFrameError,
  RdpDecodeError,
  RelayError,
  RelayInvariantViolation,
  UnexpectedPduError,
} from '../errors'
import { FAST_PATH_SECURITY_MASK } from '../pdu/fast-path'
import {
  decodeDomainPdu,
  type DomainPdu,
  encodeDomainPdu,
  isConnectInitial,
  isConnectResponse,
} from '../pdu/mcs'
import {
  type ConnectionConfirm,
  type ConnectionRequest,
  decodeX224,
  encodeDataTpdu,
} from '../pdu/x224'
import { type Frame, TransportFramer } from '../transport/framer'
import type {
  ApplicationMessage,
  ChannelLayout,
  EngineOutput,
  EngineSide,
  PeerMessage,
} from './messages'
import { PlainSecurityLayer, type SecurityLayer, type SlowPathBody } from './security-layer'
import { assertTransition, type ConnectionState } from './states'

export const MCS_SEND_PRIORITY = 0x70

export interface EngineOptions {
  /** Upper bound for a TPKT frame on this connection. */
  readonly maxPduSize?: number
  readonly diagnostics?: Diagnostics
  readonly randomBytes?: (length: number) => Uint8Array
}

/**
 * Sans-IO half of the relay: owns one connection's framer, state and
 * security layer. Callers feed bytes and peer messages in and drain
 * `EngineOutput`s; nothing here touches a socket.
 */
export abstract class ConnectionEngine {
  abstract readonly side: EngineSide
  protected readonly diagnostics: Diagnostics | undefined
  protected readonly randomBytes: (length: number) => Uint8Array
  protected security: SecurityLayer = new PlainSecurityLayer('plain')
  protected layout: ChannelLayout | undefined
  protected licensingComplete = false
  #state: ConnectionState = 'Idle'
  readonly #framer: TransportFramer
  readonly #outputs: EngineOutput[] = []

  constructor(options: EngineOptions, randomBytes: (length: number) => Uint8Array) {
    this.diagnostics = options.diagnostics
    this.randomBytes = options.randomBytes ?? randomBytes
    this.#framer = new TransportFramer(
      options.maxPduSize === undefined ? {} : { maxPduSize: options.maxPduSize },
    )
  }

  get state(): ConnectionState {
    return this.#state
  }

  get securityVariant(): SecurityLayer['variant'] {
    return this.security.variant
  }

  get channelLayout(): ChannelLayout | undefined {
    return this.layout
  }

  nextOutput(): EngineOutput | undefined {
    return this.#outputs.shift()
  }

  drainOutputs(): EngineOutput[] {
    return this.#outputs.splice(0)
  }

  /**
   * Feeds bytes read from this connection's socket. Throws one of
   * `MalformedFrameError`, `UnexpectedPduError`, `ConnectionClosedError` or
   * `RelayInvariantViolation`; the engine is closed afterwards.
   */
  receive(chunk: Uint8Array): void {
    if (this.#state === 'Closed') return
    this.#guard(() => {
      for (const frame of this.#framer.feed(chunk)) {
        this.#handleFrame(frame)
        if (this.#state === 'Closed') break
      }
    })
  }

  handlePeer(message: PeerMessage): void {
    if (this.#state === 'Closed') return
    this.#guard(() => this.onPeerMessage(message))
  }

  /** Re-encodes an application message for this connection. */
  sendApplication(message: ApplicationMessage): void {
    if (this.#state !== 'Active') {
      throw new RelayInvariantViolation(
        `Application data sent to the ${this.side} connection in state ${this.#state}`,
      )
    }
    this.#guard(() => {
      if (message.kind === 'fast-path') {
        this.#sendFrame(this.security.wrapFastPath(message.header, message.data))
        return
      }
      this.sendSlowPath(
        message.channelId,
        { flags: message.flags, body: message.data },
        this.security.encrypting,
      )
    })
  }

  close(reason: string): void {
    if (this.#state === 'Closed') return
    this.transition('Closed')
    this.emit({ type: 'closed', reason })
  }

  protected abstract onConnectionPdu(pdu: ConnectionRequest | ConnectionConfirm): void
  protected abstract onMcsConnect(payload: Uint8Array): void
  protected abstract onDomainPdu(pdu: DomainPdu): void
  protected abstract onSlowPath(channelId: number, payload: SlowPathBody): void
  protected abstract onPeerMessage(message: PeerMessage): void
  protected abstract sendDataPdu(channelId: number, payload: Uint8Array): DomainPdu

  protected emit(output: EngineOutput): void {
    this.#outputs.push(output)
  }

  protected transition(to: ConnectionState): void {
    const from = this.#state
    assertTransition(from, to)
    this.#state = to
    this.emit({ type: 'state', from, to })
    this.diagnostics?.debug('state', `${this.side} connection ${from} -> ${to}`)
  }

  protected report(stage: string, detail: Readonly<Record<string, unknown>> = {}): void {
    this.emit({ type: 'negotiation', stage, detail })
  }

  protected unexpected(what: string): never {
    throw new UnexpectedPduError(
      `Unexpected ${what} from the ${this.side} in state ${this.#state}`,
      this.#state,
    )
  }

  protected sendTpkt(payload: Uint8Array): void {
    this.#sendFrame({ kind: 'tpkt', payload })
  }

  protected sendMcs(payload: Uint8Array): void {
    this.sendTpkt(encodeDataTpdu(payload))
  }

  protected sendDomainPdu(pdu: DomainPdu): void {
    this.sendMcs(encodeDomainPdu(pdu))
  }

  protected sendSlowPath(channelId: number, payload: SlowPathBody, withHeader: boolean): void {
    const wrapped = this.security.wrapSlowPath(payload, withHeader)
    this.sendDomainPdu(this.sendDataPdu(channelId, wrapped))
  }

  protected requireLayout(): ChannelLayout {
    if (!this.layout) {
      throw new RelayInvariantViolation(`${this.side} connection has no channel layout yet`)
    }
    return this.layout
  }

  #sendFrame(frame: Frame): void {
    this.emit({ type: 'send', data: this.#framer.wrap(frame) })
  }

  #handleFrame(frame: Frame): void {
    if (frame.kind === 'fast-path') {
      if (this.#state !== 'Active') this.unexpected('fast-path PDU')
      this.emit({
        type: 'application-data',
        message: {
          kind: 'fast-path',
          header: frame.header & ~FAST_PATH_SECURITY_MASK,
          data: this.security.unwrapFastPath(frame.header, frame.payload),
        },
      })
      return
    }
    const tpdu = decodeX224(frame.payload)
    switch (tpdu.type) {
      case 'connection-request':
      case 'connection-confirm':
        this.onConnectionPdu(tpdu)
        return
      case 'disconnect-request':
        throw new ConnectionClosedError(this.side, `${this.side} sent an X.224 disconnect request`)
      case 'data':
        this.#handleMcs(tpdu.payload)
        return
    }
  }

  #handleMcs(payload: Uint8Array): void {
    if (isConnectInitial(payload) || isConnectResponse(payload)) {
      if (this.#state !== 'ChannelConnection') this.unexpected('MCS connect PDU')
      this.onMcsConnect(payload)
      return
    }
    const pdu = decodeDomainPdu(payload)
    if (pdu.type === 'disconnect-provider-ultimatum') {
      throw new ConnectionClosedError(
        this.side,
        `${this.side} sent a disconnect provider ultimatum (reason ${pdu.reason})`,
      )
    }
    if (pdu.type !== 'send-data-request' && pdu.type !== 'send-data-indication') {
      this.onDomainPdu(pdu)
      return
    }
    if (this.#state === 'Active') {
      const body = this.security.unwrapSlowPath(pdu.payload, this.security.encrypting)
      this.emit({
        type: 'application-data',
        message: { kind: 'slow-path', channelId: pdu.channelId, flags: body.flags, data: body.body },
      })
      return
    }
    const expectHeader = this.security.encrypting || !this.licensingComplete
    this.onSlowPath(pdu.channelId, this.security.unwrapSlowPath(pdu.payload, expectHeader))
  }

  #guard(action: () => void): void {
    try {
      action()
    } catch (error) {
      const translated = this.#translate(error)
      this.diagnostics?.record(
        translated instanceof ConnectionClosedError ? 'info' : 'error',
        translated.name,
        translated.message,
      )
      this.close(translated.message)
      throw translated
    }
  }

  #translate(error: unknown): RelayError {
    if (
      error instanceof MalformedFrameError ||
      error instanceof UnexpectedPduError ||
      error instanceof ConnectionClosedError ||
      error instanceof RelayInvariantViolation
    ) {
      return error
    }
    if (error instanceof RdpDecodeError) {
      return new UnexpectedPduError(
        `Undecodable PDU from the ${this.side} in state ${this.#state}: ${error.message}`,
        this.#state,
        { cause: error },
      )
    }
    return new RelayInvariantViolation(
      `${this.side} connection failed: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    )
  }
}
