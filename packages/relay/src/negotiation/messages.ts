import type { ConnectInitial, ConnectResponse } from '../pdu/mcs'
import type { UserDataBlock } from '../pdu/gcc'
import type { ClientInfo } from '../pdu/security'
import type { ConnectionRequest } from '../pdu/x224'
import type { ConnectionState } from './states'

/** The real endpoint a connection engine talks to. */
export type EngineSide = 'client' | 'server'

export interface NegotiatedChannel {
  readonly name: string
  /** MCS channel id on this connection; 0 when the channel was not accepted. */
  readonly id: number
  readonly options: number
}

/** MCS ids in use on one connection once the connect response is known. */
export interface ChannelLayout {
  readonly userId: number
  readonly ioChannelId: number
  readonly channels: ReadonlyArray<NegotiatedChannel>
}

/** A post-handshake PDU body, decrypted, still in its channel's wire form. */
export type ApplicationMessage =
  | {
      readonly kind: 'slow-path'
      readonly channelId: number
      /** Security header flags, without encryption bits. */
      readonly flags: number
      readonly data: Uint8Array
    }
  | {
      readonly kind: 'fast-path'
      /** Header byte without its security bits. */
      readonly header: number
      readonly data: Uint8Array
    }

/**
 * What one engine tells the other. Engines never read each other's state;
 * everything crosses over as one of these.
 */
export type PeerMessage =
  | { readonly type: 'client-connection-request'; readonly request: ConnectionRequest }
  | {
      readonly type: 'server-connection-confirm'
      readonly selectedProtocol: number
      readonly flags: number
      /** False when the server answered without a negotiation response. */
      readonly negotiated: boolean
    }
  | { readonly type: 'server-connection-failure'; readonly code: number; readonly flags: number }
  | {
      readonly type: 'client-connect-initial'
      readonly connectInitial: ConnectInitial
      readonly userData: ReadonlyArray<UserDataBlock>
    }
  | {
      readonly type: 'server-connect-response'
      readonly connectResponse: ConnectResponse
      readonly nodeId: number
      readonly tag: Uint8Array
      readonly result: number
      readonly userData: ReadonlyArray<UserDataBlock>
    }
  | { readonly type: 'client-info'; readonly info: ClientInfo }
  | {
      readonly type: 'license'
      readonly origin: EngineSide
      readonly flags: number
      readonly body: Uint8Array
      /** Set on the server message that ends licensing. */
      readonly final: boolean
    }
  | { readonly type: 'demand-active'; readonly data: Uint8Array }
  | { readonly type: 'confirm-active'; readonly data: Uint8Array }

export type EngineOutput =
  | { readonly type: 'send'; readonly data: Uint8Array }
  | { readonly type: 'peer'; readonly message: PeerMessage }
  | { readonly type: 'start-tls'; readonly role: 'server' | 'client' }
  | { readonly type: 'state'; readonly from: ConnectionState; readonly to: ConnectionState }
  | {
      readonly type: 'negotiation'
      readonly stage: string
      readonly detail: Readonly<Record<string, unknown>>
    }
  | {
      readonly type: 'client-info'
      readonly original: ClientInfo
      readonly forwarded: ClientInfo
    }
  | { readonly type: 'channels'; readonly layout: ChannelLayout }
  | { readonly type: 'chunk-size'; readonly size: number }
  | { readonly type: 'application-data'; readonly message: ApplicationMessage }
  | { readonly type: 'closed'; readonly reason: string }
