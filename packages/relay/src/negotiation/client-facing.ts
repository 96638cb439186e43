import { randomBytes as nodeRandomBytes } from 'node:crypto'

import type { RsaPrivateKey } from '../internal/crypto/rsa'
import { deriveSessionKeys, StandardCipher } from '../internal/crypto/session-keys'
import {
  type ChannelDefinition,
  decodeConferenceCreateRequest,
  decodeUserData,
  EncryptionMethod,
  encodeConferenceCreateResponse,
  encodeUserData,
  findBlock,
  type UserDataBlock,
} from '../pdu/gcc'
import {
  decodeConnectInitial,
  type DomainPdu,
  encodeConnectResponse,
  MCS_GLOBAL_CHANNEL_ID,
  MCS_SERVER_USER_ID,
} from '../pdu/mcs'
import {
  type CertificateSigningKey,
  decodeClientInfo,
  decryptClientRandom,
  decodeSecurityExchange,
  encodeProprietaryCertificate,
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
  encodeConnectionConfirm,
  Protocol,
} from '../pdu/x224'
import { ConnectionEngine, type EngineOptions, MCS_SEND_PRIORITY } from './engine'
import type { ChannelLayout, NegotiatedChannel, PeerMessage } from './messages'
import {
  PlainSecurityLayer,
  type SlowPathBody,
  StandardSecurityLayer,
} from './security-layer'

const SERVER_RANDOM_LENGTH = 32
const FIRST_STATIC_CHANNEL_ID = MCS_GLOBAL_CHANNEL_ID + 1
const MCS_RESULT_NO_SUCH_CHANNEL = 14

export interface ClientFacingOptions extends EngineOptions {
  /** Key presented to the client in the proprietary certificate. */
  readonly rsaKey: RsaPrivateKey
  readonly certificateSigningKey?: CertificateSigningKey
}

/**
 * Terminates the real client's handshake. Every value it presents comes
 * either from the relay (ids, random, certificate) or from the server-facing
 * engine's peer messages.
 */
export class ClientFacingEngine extends ConnectionEngine {
  readonly side = 'client'
  readonly #rsaKey: RsaPrivateKey
  readonly #signingKey: CertificateSigningKey | undefined
  #request: ConnectionRequest | undefined
  #clientUserData: ReadonlyArray<UserDataBlock> = []
  #serverRandom: Uint8Array | undefined
  #standard: StandardSecurityLayer | undefined

  constructor(options: ClientFacingOptions) {
    super(options, (length) => new Uint8Array(nodeRandomBytes(length)))
    this.#rsaKey = options.rsaKey
    this.#signingKey = options.certificateSigningKey
  }

  protected onConnectionPdu(pdu: ConnectionRequest | ConnectionConfirm): void {
    if (pdu.type !== 'connection-request' || this.state !== 'Idle') {
      this.unexpected(`X.224 ${pdu.type}`)
    }
    this.#request = pdu
    this.transition('TransportHandshake')
    const requested = pdu.negotiation?.requestedProtocols ?? Protocol.Rdp
    this.report('connection-request', {
      cookie: pdu.cookie ?? null,
      requestedProtocols: describeProtocols(requested),
    })
    this.emit({ type: 'peer', message: { type: 'client-connection-request', request: pdu } })
  }

  protected onMcsConnect(payload: Uint8Array): void {
    if (this.#clientUserData.length > 0) this.unexpected('second MCS Connect Initial')
    const connectInitial = decodeConnectInitial(payload)
    const userData = decodeUserData(decodeConferenceCreateRequest(connectInitial.userData))
    this.#clientUserData = userData
    const core = findBlock(userData, 'client-core')?.data
    const security = findBlock(userData, 'client-security')?.data
    this.report('connect-initial', {
      desktopWidth: core?.desktopWidth ?? null,
      desktopHeight: core?.desktopHeight ?? null,
      highColorDepth: core?.highColorDepth ?? null,
      clientName: core?.clientName ?? null,
      encryptionMethods: security?.encryptionMethods ?? null,
      channels: this.#clientChannels().map((channel) => channel.name),
    })
    this.emit({
      type: 'peer',
      message: { type: 'client-connect-initial', connectInitial, userData },
    })
  }

  protected onDomainPdu(pdu: DomainPdu): void {
    if (this.state !== 'ChannelConnection') this.unexpected(`MCS ${pdu.type}`)
    switch (pdu.type) {
      case 'erect-domain-request':
        return
      case 'attach-user-request':
        this.sendDomainPdu({
          type: 'attach-user-confirm',
          result: 0,
          userId: this.requireLayout().userId,
        })
        return
      case 'channel-join-request': {
        const layout = this.requireLayout()
        const known =
          pdu.channelId === layout.userId ||
          pdu.channelId === layout.ioChannelId ||
          layout.channels.some((channel) => channel.id !== 0 && channel.id === pdu.channelId)
        this.sendDomainPdu(
          known
            ? {
                type: 'channel-join-confirm',
                result: 0,
                userId: pdu.userId,
                requested: pdu.channelId,
                channelId: pdu.channelId,
              }
            : {
                type: 'channel-join-confirm',
                result: MCS_RESULT_NO_SUCH_CHANNEL,
                userId: pdu.userId,
                requested: pdu.channelId,
              },
        )
        return
      }
      default:
        this.unexpected(`MCS ${pdu.type}`)
    }
  }

  protected onSlowPath(_channelId: number, payload: SlowPathBody): void {
    if (this.state === 'ChannelConnection') {
      if (!(payload.flags & (SecurityFlag.Exchange | SecurityFlag.InfoPkt))) {
        this.unexpected('slow-path PDU before the security exchange')
      }
      this.transition('SecurityExchange')
    }
    if (this.state === 'SecurityExchange') {
      this.#onSecurityPdu(payload)
      return
    }
    if (this.state === 'CapabilityExchange') {
      const pdu = decodeSharePdu(payload.body)
      if (pdu.type !== 'confirm-active') this.unexpected(`share ${pdu.type} PDU`)
      this.report('confirm-active', {
        capabilities: pdu.capabilities.map((set) => set.type),
      })
      this.emit({ type: 'peer', message: { type: 'confirm-active', data: payload.body } })
      this.transition('Active')
      return
    }
    this.unexpected('slow-path PDU')
  }

  protected onPeerMessage(message: PeerMessage): void {
    switch (message.type) {
      case 'server-connection-confirm':
        this.#confirmConnection(message.selectedProtocol, message.flags, message.negotiated)
        return
      case 'server-connection-failure':
        if (this.state !== 'TransportHandshake') this.unexpected('peer connection failure')
        this.sendTpkt(
          encodeConnectionConfirm({ failure: { flags: message.flags, code: message.code } }),
        )
        this.report('connection-failure', { code: message.code })
        this.close('server refused the protocol negotiation')
        return
      case 'server-connect-response':
        this.#sendConnectResponse(message)
        return
      case 'license':
        if (message.origin !== 'server' || this.state !== 'SecurityExchange') {
          this.unexpected('peer license message')
        }
        this.sendSlowPath(
          this.requireLayout().ioChannelId,
          { flags: message.flags | SecurityFlag.LicensePkt, body: message.body },
          true,
        )
        if (message.final) this.licensingComplete = true
        return
      case 'demand-active': {
        if (this.state !== 'SecurityExchange') this.unexpected('peer demand active')
        this.licensingComplete = true
        const pdu = decodeSharePdu(message.data)
        if (pdu.type === 'demand-active') {
          const size = readVirtualChannelChunkSize(
            findCapability(pdu.capabilities, CapabilitySetType.VirtualChannel),
          )
          this.emit({ type: 'chunk-size', size })
        }
        this.sendSlowPath(
          this.requireLayout().ioChannelId,
          { flags: 0, body: message.data },
          this.security.encrypting,
        )
        this.transition('CapabilityExchange')
        return
      }
      default:
        this.unexpected(`peer ${message.type}`)
    }
  }

  protected sendDataPdu(channelId: number, payload: Uint8Array): DomainPdu {
    return {
      type: 'send-data-indication',
      userId: MCS_SERVER_USER_ID,
      channelId,
      priority: MCS_SEND_PRIORITY,
      payload,
    }
  }

  #confirmConnection(selectedProtocol: number, flags: number, negotiated: boolean): void {
    if (this.state !== 'TransportHandshake') this.unexpected('peer connection confirm')
    const clientNegotiated = this.#request?.negotiation !== undefined
    this.sendTpkt(
      encodeConnectionConfirm(
        clientNegotiated && negotiated ? { response: { flags, selectedProtocol } } : {},
      ),
    )
    this.transition('ChannelConnection')
    if (selectedProtocol & Protocol.Ssl) {
      this.security = new PlainSecurityLayer('tls')
      this.emit({ type: 'start-tls', role: 'server' })
    }
    this.report('connection-confirm', { selectedProtocols: describeProtocols(selectedProtocol) })
  }

  #sendConnectResponse(message: Extract<PeerMessage, { type: 'server-connect-response' }>): void {
    if (this.state !== 'ChannelConnection' || this.#clientUserData.length === 0) {
      this.unexpected('peer connect response')
    }
    const clientChannels = this.#clientChannels()
    const serverNetwork = findBlock(message.userData, 'server-network')?.data
    const channels: NegotiatedChannel[] = clientChannels.map((channel, index) => ({
      name: channel.name,
      options: channel.options,
      id: (serverNetwork?.channelIds[index] ?? 0) !== 0 ? FIRST_STATIC_CHANNEL_ID + index : 0,
    }))
    const layout: ChannelLayout = {
      userId: FIRST_STATIC_CHANNEL_ID + clientChannels.length,
      ioChannelId: MCS_GLOBAL_CHANNEL_ID,
      channels,
    }
    const requestedProtocols = this.#request?.negotiation?.requestedProtocols ?? Protocol.Rdp
    const userData = message.userData.map((block): UserDataBlock => {
      switch (block.type) {
        case 'server-core':
          return {
            type: 'server-core',
            data: { ...block.data, clientRequestedProtocols: requestedProtocols },
          }
        case 'server-security':
          return { type: 'server-security', data: this.#serverSecurity(block.data) }
        case 'server-network':
          return {
            type: 'server-network',
            data: {
              ioChannelId: layout.ioChannelId,
              channelIds: channels.map((channel) => channel.id),
            },
          }
        default:
          return block
      }
    })
    this.layout = layout
    this.sendMcs(
      encodeConnectResponse({
        ...message.connectResponse,
        userData: encodeConferenceCreateResponse({
          nodeId: message.nodeId,
          tag: message.tag,
          result: message.result,
          userData: encodeUserData(userData),
        }),
      }),
    )
    this.emit({ type: 'channels', layout })
    this.report('connect-response', {
      encryption: this.security.variant,
      channels: channels.map((channel) => `${channel.name}:${channel.id}`),
    })
  }

  #serverSecurity(server: {
    readonly encryptionMethod: number
    readonly encryptionLevel: number
  }): {
    encryptionMethod: number
    encryptionLevel: number
    serverRandom?: Uint8Array
    serverCertificate?: Uint8Array
  } {
    if (server.encryptionMethod === EncryptionMethod.None) {
      return { encryptionMethod: EncryptionMethod.None, encryptionLevel: server.encryptionLevel }
    }
    const serverRandom = this.randomBytes(SERVER_RANDOM_LENGTH)
    this.#serverRandom = serverRandom
    this.#standard = new StandardSecurityLayer()
    this.security = this.#standard
    return {
      encryptionMethod: EncryptionMethod.Bit128,
      encryptionLevel: server.encryptionLevel,
      serverRandom,
      serverCertificate: encodeProprietaryCertificate(this.#rsaKey, this.#signingKey),
    }
  }

  #onSecurityPdu(payload: SlowPathBody): void {
    if (payload.flags & SecurityFlag.Exchange) {
      const standard = this.#standard
      const serverRandom = this.#serverRandom
      if (!standard || !serverRandom || standard.active) {
        this.unexpected('Security Exchange PDU')
      }
      const clientRandom = decryptClientRandom(decodeSecurityExchange(payload.body), this.#rsaKey)
      standard.activate(new StandardCipher(deriveSessionKeys(clientRandom, serverRandom), 'server'))
      this.report('security-exchange', { encryptionMethod: '128-bit' })
      return
    }
    if (this.#standard && !this.#standard.active) {
      this.unexpected('PDU before the Security Exchange')
    }
    if (payload.flags & SecurityFlag.InfoPkt) {
      const info = decodeClientInfo(payload.body)
      this.emit({ type: 'peer', message: { type: 'client-info', info } })
      this.report('client-info', { domain: info.domain, username: info.username })
      return
    }
    if (payload.flags & SecurityFlag.LicensePkt) {
      this.emit({
        type: 'peer',
        message: {
          type: 'license',
          origin: 'client',
          flags: payload.flags,
          body: payload.body,
          final: false,
        },
      })
      return
    }
    this.unexpected('slow-path PDU during the security exchange')
  }

  #clientChannels(): ReadonlyArray<ChannelDefinition> {
    return findBlock(this.#clientUserData, 'client-network')?.data.channels ?? []
  }
}
