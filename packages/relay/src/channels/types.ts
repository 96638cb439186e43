import type { Direction } from '@rdp-relay/recording'

export type { Direction }

/** Name the multiplexer uses for the I/O channel and fast-path traffic. */
export const IO_CHANNEL = 'io'

/** Informational finding a handler reports about a decoded message. */
export interface ChannelNotice {
  readonly kind: 'opaque'
  readonly channel: string
  readonly channelId: number
  readonly reason: string
}

/**
 * Codec for one static channel type. Instances are per session and may keep
 * state across directions; the multiplexer owns reassembly and chunking.
 */
export interface ChannelHandler<TEvent = unknown> {
  readonly type: string
  decode(data: Uint8Array, direction: Direction): TEvent
  /** Decodes without touching handler state; used to re-read hook replacements. */
  peek?(data: Uint8Array, direction: Direction): TEvent
  encode(event: TEvent, direction: Direction): Uint8Array
  notices?(event: TEvent, direction: Direction): ReadonlyArray<ChannelNotice>
}

export type ChannelHandlerFactory = () => ChannelHandler

export function oppositeDirection(direction: Direction): Direction {
  return direction === 'client-to-server' ? 'server-to-client' : 'client-to-server'
}
