import { randomBytes as nodeRandomBytes } from 'node:crypto'

import type { RsaPublicKey } from '../internal/crypto/rsa'
import { deriveSessionKeys, StandardCipher } from '../internal/crypto/session-keys'
import {
  type ChannelDefinition,
  decodeConferenceCreateResponse,
  decodeUserData,
  EarlyCapabilityFlag,
  EncryptionMethod,
  encodeConferenceCreateRequest,
  encodeUserData,
  findBlock,
  type UserDataBlock,
} from '../pdu/gcc'
import {
  type ConnectInitial,
  decodeConnectResponse,
  type DomainPdu,
  encodeConnectInitial,
} from '../pdu/mcs'
import {
  type ClientInfo,
  decodeLicensePreamble,
  decodeServerCertificate,
  encodeClientInfo,
  encodeSecurityExchange,
  encryptClientRandom,
  InfoFlag,
  isValidClientLicense,
  LicenseMessageType,
  SecurityFlag,
} from '../pdu/security'
import {
  CapabilitySetType,
  decodeSharePdu,
  findCapability,
  readVirtualChannelChunkSize,
} from '../pdu/share'
import {
  type ConnectionConfirm,
  type ConnectionRequest,
  describeProtocols,
  encodeConnectionRequest,
  Protocol,
} from '../pdu/x224'
import { ConnectionEngine, type EngineOptions, MCS_SEND_PRIORITY } from './engine'
import type { NegotiatedChannel, PeerMessage } from './messages'
import {
  PlainSecurityLayer,
  type SlowPathBody,
  StandardSecurityLayer,
} from './security-layer'

const CLIENT_RANDOM_LENGTH = 32
const UNSUPPORTED_PROTOCOLS = Protocol.Hybrid | Protocol.Rdstls | Protocol.HybridEx

export interface ReplacementCredentials {
  readonly username?: string
  readonly password?: string
  readonly domain?: string
}

export interface ServerFacingOptions extends EngineOptions {
  /** Whether the relay holds certificate material for a TLS client leg. */
  readonly tlsAvailable: boolean
  /** Clear the graphics pipeline early capability so the server falls back. */
  readonly downgrade?: boolean
  readonly replacementCredentials?: ReplacementCredentials
}

/** Removes the protocols the relay cannot terminate on both legs. */
export function filterRequestedProtocols(requested: number, tlsAvailable: boolean): number {
  let filtered = requested & ~UNSUPPORTED_PROTOCOLS
  if (!tlsAvailable) filtered &= ~Protocol.Ssl
  return filtered
}

/**
 * Drives the real server's handshake on behalf of the client, substituting
 * the values that must differ between the two legs.
 */
export class ServerFacingEngine extends ConnectionEngine {
  readonly side = 'server'
  readonly #tlsAvailable: boolean
  readonly #downgrade: boolean
  readonly #replacement: ReplacementCredentials | undefined
  #selectedProtocol: number = Protocol.Rdp
  #clientChannels: ReadonlyArray<ChannelDefinition> = []
  #connectInitialSent = false
  #serverKey: RsaPublicKey | undefined
  #serverRandom: Uint8Array | undefined
  #standard: StandardSecurityLayer | undefined
  #pendingJoins: number[] = []
  #joinsComplete = false
  #pendingClientInfo: ClientInfo | undefined
  #clientInfoSent = false

  constructor(options: ServerFacingOptions) {
    super(options, (length) => new Uint8Array(nodeRandomBytes(length)))
    this.#tlsAvailable = options.tlsAvailable
    this.#downgrade = options.downgrade ?? false
    this.#replacement = options.replacementCredentials
  }

  protected onConnectionPdu(pdu: ConnectionRequest | ConnectionConfirm): void {
    if (pdu.type !== 'connection-confirm' || this.state !== 'TransportHandshake') {
      this.unexpected(`X.224 ${pdu.type}`)
    }
    if ('failure' in pdu) {
      this.report('connection-failure', { code: pdu.failure.code })
      this.emit({
        type: 'peer',
        message: {
          type: 'server-connection-failure',
          code: pdu.failure.code,
          flags: pdu.failure.flags,
        },
      })
      this.close('server refused the protocol negotiation')
      return
    }
    const selected = pdu.response?.selectedProtocol ?? Protocol.Rdp
    if (selected & UNSUPPORTED_PROTOCOLS) {
      this.unexpected(`selection of ${describeProtocols(selected).join('+')}`)
    }
    this.#selectedProtocol = selected
    this.transition('ChannelConnection')
    if (selected & Protocol.Ssl) {
      this.security = new PlainSecurityLayer('tls')
      this.emit({ type: 'start-tls', role: 'client' })
    }
    this.report('connection-confirm', { selectedProtocols: describeProtocols(selected) })
    this.emit({
      type: 'peer',
      message: {
        type: 'server-connection-confirm',
        selectedProtocol: selected,
        flags: pdu.response?.flags ?? 0,
        negotiated: pdu.response !== undefined,
      },
    })
  }

  protected onMcsConnect(payload: Uint8Array): void {
    if (!this.#connectInitialSent || this.layout) this.unexpected('MCS connect PDU')
    const connectResponse = decodeConnectResponse(payload)
    if (connectResponse.result !== 0) {
      this.unexpected(`MCS connect response with result ${connectResponse.result}`)
    }
    const gcc = decodeConferenceCreateResponse(connectResponse.userData)
    const userData = decodeUserData(gcc.userData)
    const security = findBlock(userData, 'server-security')?.data
    const method = security?.encryptionMethod ?? EncryptionMethod.None
    if (method === EncryptionMethod.Bit128) {
      if (!security?.serverRandom || !security.serverCertificate) {
        this.unexpected('encrypted connect response without a server random')
      }
      this.#serverKey = decodeServerCertificate(security.serverCertificate).publicKey
      this.#serverRandom = security.serverRandom
      this.#standard = new StandardSecurityLayer()
      this.security = this.#standard
    } else if (method !== EncryptionMethod.None) {
      this.unexpected(`encryption method 0x${method.toString(16)}`)
    }
    const network = findBlock(userData, 'server-network')?.data
    const channels: NegotiatedChannel[] = this.#clientChannels.map((channel, index) => ({
      name: channel.name,
      options: channel.options,
      id: network?.channelIds[index] ?? 0,
    }))
    // userId is filled in by the attach user confirm.
    this.layout = { userId: 0, ioChannelId: network?.ioChannelId ?? 0, channels }
    this.report('connect-response', {
      encryption: this.security.variant,
      encryptionLevel: security?.encryptionLevel ?? 0,
      channels: channels.map((channel) => `${channel.name}:${channel.id}`),
    })
    this.emit({
      type: 'peer',
      message: {
        type: 'server-connect-response',
        connectResponse,
        nodeId: gcc.nodeId,
        tag: gcc.tag,
        result: gcc.result,
        userData,
      },
    })
    this.sendDomainPdu({ type: 'erect-domain-request', subHeight: 0, subInterval: 0 })
    this.sendDomainPdu({ type: 'attach-user-request' })
  }

  protected onDomainPdu(pdu: DomainPdu): void {
    if (this.state !== 'ChannelConnection' || !this.layout) this.unexpected(`MCS ${pdu.type}`)
    switch (pdu.type) {
      case 'attach-user-confirm': {
        if (pdu.result !== 0 || pdu.userId === undefined || this.layout.userId !== 0) {
          this.unexpected(`attach user confirm (result ${pdu.result})`)
        }
        this.layout = { ...this.layout, userId: pdu.userId }
        this.emit({ type: 'channels', layout: this.layout })
        this.#pendingJoins = [
          pdu.userId,
          this.layout.ioChannelId,
          ...this.layout.channels.filter((channel) => channel.id !== 0).map((channel) => channel.id),
        ]
        this.#joinNext()
        return
      }
      case 'channel-join-confirm': {
        const expected = this.#pendingJoins.shift()
        if (pdu.result !== 0 || expected === undefined || pdu.requested !== expected) {
          this.unexpected(`channel join confirm for ${pdu.requested} (result ${pdu.result})`)
        }
        if (this.#pendingJoins.length > 0) {
          this.#joinNext()
          return
        }
        this.#finishChannelConnection()
        return
      }
      default:
        this.unexpected(`MCS ${pdu.type}`)
    }
  }

  protected onSlowPath(channelId: number, payload: SlowPathBody): void {
    if (this.state === 'SecurityExchange') {
      if (payload.flags & SecurityFlag.LicensePkt) {
        this.#onLicense(payload)
        return
      }
      if (!this.licensingComplete) this.unexpected('slow-path PDU during licensing')
      const pdu = decodeSharePdu(payload.body)
      if (pdu.type !== 'demand-active') this.unexpected(`share ${pdu.type} PDU`)
      this.report('demand-active', {
        shareId: pdu.shareId,
        capabilities: pdu.capabilities.map((set) => set.type),
      })
      this.emit({ type: 'peer', message: { type: 'demand-active', data: payload.body } })
      this.transition('CapabilityExchange')
      return
    }
    if (this.state === 'CapabilityExchange') {
      const pdu = decodeSharePdu(payload.body)
      if (pdu.type !== 'data') this.unexpected(`share ${pdu.type} PDU`)
      // Monitor layout and similar data PDUs may precede the client's confirm.
      this.emit({
        type: 'application-data',
        message: {
          kind: 'slow-path',
          channelId,
          flags: payload.flags,
          data: payload.body,
        },
      })
      return
    }
    this.unexpected('slow-path PDU')
  }

  protected onPeerMessage(message: PeerMessage): void {
    switch (message.type) {
      case 'client-connection-request':
        this.#sendConnectionRequest(message.request)
        return
      case 'client-connect-initial':
        this.#sendConnectInitial(message.connectInitial, message.userData)
        return
      case 'client-info':
        if (this.#pendingClientInfo || this.#clientInfoSent) this.unexpected('second client info')
        this.#pendingClientInfo = message.info
        if (this.#joinsComplete) this.#sendClientInfo()
        return
      case 'license':
        if (message.origin !== 'client' || this.state !== 'SecurityExchange') {
          this.unexpected('peer license message')
        }
        this.sendSlowPath(
          this.requireLayout().ioChannelId,
          { flags: message.flags | SecurityFlag.LicensePkt, body: message.body },
          true,
        )
        return
      case 'confirm-active': {
        if (this.state !== 'CapabilityExchange') this.unexpected('peer confirm active')
        const pdu = decodeSharePdu(message.data)
        if (pdu.type === 'confirm-active') {
          this.emit({
            type: 'chunk-size',
            size: readVirtualChannelChunkSize(
              findCapability(pdu.capabilities, CapabilitySetType.VirtualChannel),
            ),
          })
        }
        this.sendSlowPath(
          this.requireLayout().ioChannelId,
          { flags: 0, body: message.data },
          this.security.encrypting,
        )
        this.transition('Active')
        return
      }
      default:
        this.unexpected(`peer ${message.type}`)
    }
  }

  protected sendDataPdu(channelId: number, payload: Uint8Array): DomainPdu {
    return {
      type: 'send-data-request',
      userId: this.requireLayout().userId,
      channelId,
      priority: MCS_SEND_PRIORITY,
      payload,
    }
  }

  #sendConnectionRequest(request: ConnectionRequest): void {
    if (this.state !== 'Idle') this.unexpected('peer connection request')
    const negotiation = request.negotiation
      ? {
          flags: request.negotiation.flags,
          requestedProtocols: filterRequestedProtocols(
            request.negotiation.requestedProtocols,
            this.#tlsAvailable,
          ),
        }
      : undefined
    this.sendTpkt(
      encodeConnectionRequest({
        ...(request.cookie === undefined ? {} : { cookie: request.cookie }),
        ...(negotiation ? { negotiation } : {}),
        ...(request.trailing ? { trailing: request.trailing } : {}),
      }),
    )
    this.transition('TransportHandshake')
    this.report('connection-request', {
      requestedProtocols: describeProtocols(negotiation?.requestedProtocols ?? Protocol.Rdp),
    })
  }

  #sendConnectInitial(connectInitial: ConnectInitial, userData: ReadonlyArray<UserDataBlock>): void {
    if (this.state !== 'ChannelConnection' || this.#connectInitialSent) {
      this.unexpected('peer connect initial')
    }
    const forwarded = userData.map((block): UserDataBlock => {
      switch (block.type) {
        case 'client-core': {
          let flags = block.data.earlyCapabilityFlags
          if (flags !== undefined) {
            flags &= ~EarlyCapabilityFlag.SupportSkipChannelJoin
            if (this.#downgrade) flags &= ~EarlyCapabilityFlag.SupportDynvcGfxProtocol
          }
          return {
            type: 'client-core',
            data: {
              ...block.data,
              ...(flags === undefined ? {} : { earlyCapabilityFlags: flags }),
              serverSelectedProtocol: this.#selectedProtocol,
            },
          }
        }
        case 'client-security':
          return {
            type: 'client-security',
            data: {
              encryptionMethods: block.data.encryptionMethods & EncryptionMethod.Bit128,
              extEncryptionMethods: 0,
            },
          }
        case 'client-network':
          this.#clientChannels = block.data.channels
          return block
        default:
          return block
      }
    })
    this.sendMcs(
      encodeConnectInitial({
        ...connectInitial,
        userData: encodeConferenceCreateRequest(encodeUserData(forwarded)),
      }),
    )
    this.#connectInitialSent = true
    this.report('connect-initial', {
      serverSelectedProtocol: this.#selectedProtocol,
      downgrade: this.#downgrade,
    })
  }

  #joinNext(): void {
    const channelId = this.#pendingJoins[0]
    if (channelId === undefined) return
    this.sendDomainPdu({
      type: 'channel-join-request',
      userId: this.requireLayout().userId,
      channelId,
    })
  }

  #finishChannelConnection(): void {
    this.#joinsComplete = true
    this.transition('SecurityExchange')
    const standard = this.#standard
    if (standard) {
      const serverKey = this.#serverKey
      const serverRandom = this.#serverRandom
      if (!serverKey || !serverRandom) this.unexpected('key exchange without a server key')
      const clientRandom = this.randomBytes(CLIENT_RANDOM_LENGTH)
      this.sendSlowPath(
        this.requireLayout().ioChannelId,
        {
          flags: SecurityFlag.Exchange,
          body: encodeSecurityExchange(encryptClientRandom(clientRandom, serverKey)),
        },
        true,
      )
      standard.activate(new StandardCipher(deriveSessionKeys(clientRandom, serverRandom), 'client'))
      this.report('security-exchange', { encryptionMethod: '128-bit' })
    }
    if (this.#pendingClientInfo) this.#sendClientInfo()
  }

  #sendClientInfo(): void {
    const original = this.#pendingClientInfo
    if (!original) return
    this.#pendingClientInfo = undefined
    this.#clientInfoSent = true
    const replacement = this.#replacement
    const replaced =
      replacement?.username !== undefined ||
      replacement?.password !== undefined ||
      replacement?.domain !== undefined
    const forwarded: ClientInfo = replaced
      ? {
          ...original,
          flags: original.flags | InfoFlag.Autologon,
          domain: replacement?.domain ?? original.domain,
          username: replacement?.username ?? original.username,
          password: replacement?.password ?? original.password,
        }
      : original
    this.sendSlowPath(
      this.requireLayout().ioChannelId,
      { flags: SecurityFlag.InfoPkt, body: encodeClientInfo(forwarded) },
      true,
    )
    this.emit({ type: 'client-info', original, forwarded })
  }

  #onLicense(payload: SlowPathBody): void {
    const preamble = decodeLicensePreamble(payload.body)
    const final =
      isValidClientLicense(payload.body) ||
      preamble.messageType === LicenseMessageType.NewLicense ||
      preamble.messageType === LicenseMessageType.UpgradeLicense
    this.report('license', { messageType: preamble.messageType, final })
    this.emit({
      type: 'peer',
      message: { type: 'license', origin: 'server', flags: payload.flags, body: payload.body, final },
    })
    if (final) this.licensingComplete = true
  }
}
