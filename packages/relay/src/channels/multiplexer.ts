import { ChannelDecodeError, RdpDecodeError, RelayInvariantViolation } from '../errors'
import type { ApplicationMessage, ChannelLayout, EngineSide } from '../negotiation/messages'
import type { MessageCodec } from '../relay/hooks'
import { DEFAULT_VC_CHUNK_SIZE } from '../pdu/share'
import {
  ChannelFlag,
  type ChannelChunk,
  ChannelReassembler,
  chunkChannelMessage,
  decodeChannelChunk,
  DEFAULT_MAX_CHANNEL_MESSAGE_SIZE,
} from '../pdu/virtual-channel'
import { decodeIoMessage, encodeIoEvent, isIoEvent } from './handlers/io'
import { type ChannelRegistry, normalizeChannelName } from './registry'
import {
  type ChannelHandler,
  type ChannelNotice,
  type Direction,
  IO_CHANNEL,
} from './types'

export const OPAQUE_CHANNEL_TYPE = 'opaque'

/** A complete channel message, ready for hooks. */
export interface ChannelMessage {
  readonly direction: Direction
  /** 'io', a static channel name, or `#<id>` for ids no layout names. */
  readonly channel: string
  readonly channelId: number
  /** Handler type, 'io', or 'opaque'. */
  readonly channelType: string
  /**
   * Reassembled channel payload. For opaque channels this is the chunk as
   * received, channel header included.
   */
  readonly data: Uint8Array
  readonly event?: unknown
  /** Wire messages that carried this message, forwarded as-is on pass. */
  readonly originals: ReadonlyArray<ApplicationMessage>
  readonly opaqueReason?: string
  readonly decodeError?: ChannelDecodeError
  readonly notices: ReadonlyArray<ChannelNotice>
}

export type InboundResult =
  | { readonly status: 'pending' }
  | { readonly status: 'complete'; readonly message: ChannelMessage }

export type Replacement = { readonly event: unknown } | { readonly data: Uint8Array }

export interface ChannelMultiplexerOptions {
  /** Largest reassembled channel message; larger ones are relayed undecoded. */
  readonly maxMessageSize?: number
}

interface SideState {
  readonly layout: ChannelLayout
  readonly byId: ReadonlyMap<number, string>
  readonly byName: ReadonlyMap<string, number>
  chunkSize: number
}

interface PendingReassembly {
  readonly reassembler: ChannelReassembler
  originals: ApplicationMessage[]
}

const CHANNEL_OPTION_SHOW_PROTOCOL = 0x00200000

function sourceOf(direction: Direction): EngineSide {
  return direction === 'client-to-server' ? 'client' : 'server'
}

function destinationOf(direction: Direction): EngineSide {
  return direction === 'client-to-server' ? 'server' : 'client'
}

/**
 * Maps channel ids between the two legs, reassembles and re-chunks virtual
 * channel traffic, and dispatches complete messages to channel handlers.
 * Anything it cannot name or decode is relayed unchanged.
 */
export class ChannelMultiplexer {
  readonly #registry: ChannelRegistry
  readonly #sides = new Map<EngineSide, SideState>()
  readonly #handlers = new Map<string, ChannelHandler>()
  readonly #pending = new Map<string, PendingReassembly>()
  readonly #maxMessageSize: number

  constructor(registry: ChannelRegistry, options: ChannelMultiplexerOptions = {}) {
    this.#registry = registry
    this.#maxMessageSize = options.maxMessageSize ?? DEFAULT_MAX_CHANNEL_MESSAGE_SIZE
  }

  get ready(): boolean {
    return this.#sides.has('client') && this.#sides.has('server')
  }

  configure(side: EngineSide, layout: ChannelLayout): void {
    const byId = new Map<number, string>([[layout.ioChannelId, IO_CHANNEL]])
    const byName = new Map<string, number>([[IO_CHANNEL, layout.ioChannelId]])
    for (const channel of layout.channels) {
      if (channel.id === 0) continue
      const name = normalizeChannelName(channel.name)
      byId.set(channel.id, name)
      byName.set(name, channel.id)
      if (!this.#handlers.has(name)) {
        const handler = this.#registry.create(name)
        if (handler) this.#handlers.set(name, handler)
      }
    }
    const previous = this.#sides.get(side)
    this.#sides.set(side, {
      layout,
      byId,
      byName,
      chunkSize: previous?.chunkSize ?? DEFAULT_VC_CHUNK_SIZE,
    })
  }

  setChunkSize(side: EngineSide, size: number): void {
    const state = this.#requireSide(side)
    state.chunkSize = size
  }

  handler(channel: string): ChannelHandler | undefined {
    return this.#handlers.get(normalizeChannelName(channel))
  }

  /** Channel names usable on both legs, io included. */
  channels(): string[] {
    const client = this.#sides.get('client')
    const server = this.#sides.get('server')
    if (!client || !server) return []
    return [...client.byName.keys()].filter((name) => server.byName.has(name))
  }

  inbound(direction: Direction, message: ApplicationMessage): InboundResult {
    const source = this.#requireSide(sourceOf(direction))
    if (message.kind === 'fast-path') {
      return complete(this.#decodeIo(direction, source.layout.ioChannelId, message))
    }
    const name = source.byId.get(message.channelId)
    if (name === IO_CHANNEL) {
      return complete(this.#decodeIo(direction, message.channelId, message))
    }
    if (name === undefined) {
      return complete(
        this.#opaque(direction, `#${message.channelId}`, message, 'unknown channel id'),
      )
    }
    let chunk: ChannelChunk
    try {
      chunk = decodeChannelChunk(message.data)
    } catch (error) {
      return complete(
        this.#failed(direction, name, message.channelId, OPAQUE_CHANNEL_TYPE, message.data, [message], error),
      )
    }
    if (chunk.flags & ChannelFlag.PacketCompressed) {
      return complete(this.#opaque(direction, name, message, 'compressed channel data'))
    }
    const handler = this.#handlers.get(name)
    if (!handler) {
      return complete(this.#opaque(direction, name, message, 'no handler for channel'))
    }

    const key = `${direction}:${name}`
    let pending = this.#pending.get(key)
    if (!pending) {
      pending = { reassembler: new ChannelReassembler(this.#maxMessageSize), originals: [] }
      this.#pending.set(key, pending)
    }
    pending.originals.push(message)
    let data: Uint8Array | undefined
    try {
      data = pending.reassembler.push(chunk)
    } catch (error) {
      const originals = pending.originals
      pending.originals = []
      return complete(
        this.#failed(direction, name, message.channelId, handler.type, chunk.data, originals, error),
      )
    }
    if (data === undefined) {
      return { status: 'pending' }
    }
    const originals = pending.originals
    pending.originals = []
    let event: unknown
    let notices: ReadonlyArray<ChannelNotice>
    try {
      event = handler.decode(data, direction)
      notices = handler.notices?.(event, direction) ?? []
    } catch (error) {
      return complete(
        this.#failed(direction, name, message.channelId, handler.type, data, originals, error),
      )
    }
    return complete({
      direction,
      channel: name,
      channelId: message.channelId,
      channelType: handler.type,
      data,
      event,
      originals,
      notices,
    })
  }

  /** The wire messages of `message` with channel ids of the destination leg. */
  forward(message: ChannelMessage): ApplicationMessage[] {
    const destination = this.#requireSide(destinationOf(message.direction))
    const targetId = destination.byName.get(message.channel)
    return message.originals.map((original) =>
      original.kind === 'slow-path' && targetId !== undefined
        ? { ...original, channelId: targetId }
        : original,
    )
  }

  /** Encodes a hook replacement of `message` for the destination leg. */
  replace(message: ChannelMessage, replacement: Replacement): ApplicationMessage[] {
    const template = message.originals[0]
    if (message.channel === IO_CHANNEL) {
      return [this.#buildIo(message.direction, replacement, template)]
    }
    const data = this.encode(message.channel, message.direction, replacement)
    if (message.channelType === OPAQUE_CHANNEL_TYPE) {
      return this.forward({ ...message, originals: [withData(template, data)] })
    }
    const firstFlags = template?.kind === 'slow-path' ? firstChunkFlags(template.data) : 0
    return this.#chunk(message.direction, message.channel, data, firstFlags, template)
  }

  /** Builds wire messages for a relay-originated channel message. */
  compose(direction: Direction, channel: string, replacement: Replacement): ApplicationMessage[] {
    const name = normalizeChannelName(channel)
    if (name === IO_CHANNEL) {
      return [this.#buildIo(direction, replacement, undefined)]
    }
    const destination = this.#requireSide(destinationOf(direction))
    const definition = destination.layout.channels.find(
      (candidate) => normalizeChannelName(candidate.name) === name,
    )
    const showProtocol =
      definition !== undefined && (definition.options & CHANNEL_OPTION_SHOW_PROTOCOL) !== 0
    const data = this.encode(name, direction, replacement)
    const messages = this.#chunk(
      direction,
      name,
      data,
      showProtocol ? ChannelFlag.ShowProtocol : 0,
      undefined,
    )
    // Injected events update handler state so that replies to them decode.
    if ('event' in replacement) this.#handlers.get(name)?.decode(data, direction)
    return messages
  }

  /** Converts between bytes and events for hooks working on `message`. */
  codecFor(message: ChannelMessage): MessageCodec {
    const { direction, channel } = message
    const template = message.originals[0]
    if (channel === IO_CHANNEL) {
      return {
        encode: (event) => this.#buildIo(direction, { event }, template).data,
        decode: (data) =>
          decodeIoMessage(
            template?.kind === 'fast-path'
              ? { kind: 'fast-path', header: template.header, data }
              : { kind: 'slow-path', channelId: message.channelId, flags: 0, data },
            direction,
          ),
      }
    }
    const handler = this.#handlers.get(channel)
    if (message.channelType === OPAQUE_CHANNEL_TYPE || !handler) {
      return {
        encode: () => {
          throw new RelayInvariantViolation(`Channel ${channel} is relayed opaquely`)
        },
        decode: () => undefined,
      }
    }
    return {
      encode: (event) => handler.encode(event, direction),
      decode: (data) => (handler.peek ? handler.peek(data, direction) : handler.decode(data, direction)),
    }
  }

  encode(channel: string, direction: Direction, replacement: Replacement): Uint8Array {
    if ('data' in replacement) return replacement.data
    const handler = this.#handlers.get(normalizeChannelName(channel))
    if (!handler) {
      throw new RelayInvariantViolation(`Channel ${channel} has no handler to encode an event`)
    }
    return handler.encode(replacement.event, direction)
  }

  #buildIo(
    direction: Direction,
    replacement: Replacement,
    template: ApplicationMessage | undefined,
  ): ApplicationMessage {
    const ioChannelId = this.#requireSide(destinationOf(direction)).layout.ioChannelId
    if ('event' in replacement) {
      if (!isIoEvent(replacement.event)) {
        throw new RelayInvariantViolation('Replacement for the io channel is not an io event')
      }
      const encoded = encodeIoEvent(replacement.event)
      return encoded.kind === 'fast-path'
        ? encoded
        : {
            kind: 'slow-path',
            channelId: ioChannelId,
            flags: template?.kind === 'slow-path' ? template.flags : 0,
            data: encoded.data,
          }
    }
    if (template?.kind === 'fast-path') {
      return { kind: 'fast-path', header: template.header, data: replacement.data }
    }
    return {
      kind: 'slow-path',
      channelId: ioChannelId,
      flags: template?.flags ?? 0,
      data: replacement.data,
    }
  }

  #chunk(
    direction: Direction,
    channel: string,
    data: Uint8Array,
    firstFlags: number,
    template: ApplicationMessage | undefined,
  ): ApplicationMessage[] {
    const destination = this.#requireSide(destinationOf(direction))
    const channelId = destination.byName.get(channel)
    if (channelId === undefined) {
      throw new RelayInvariantViolation(`Channel ${channel} is not open on the ${destinationOf(direction)} leg`)
    }
    const flags = template?.kind === 'slow-path' ? template.flags : 0
    return chunkChannelMessage(data, destination.chunkSize, firstFlags & ChannelFlag.ShowProtocol).map(
      (chunk) => ({ kind: 'slow-path', channelId, flags, data: chunk }),
    )
  }

  #decodeIo(direction: Direction, channelId: number, message: ApplicationMessage): ChannelMessage {
    try {
      return {
        direction,
        channel: IO_CHANNEL,
        channelId,
        channelType: IO_CHANNEL,
        data: message.data,
        event: decodeIoMessage(message, direction),
        originals: [message],
        notices: [],
      }
    } catch (error) {
      return this.#failed(direction, IO_CHANNEL, channelId, IO_CHANNEL, message.data, [message], error)
    }
  }

  #opaque(
    direction: Direction,
    channel: string,
    message: Extract<ApplicationMessage, { kind: 'slow-path' }>,
    reason: string,
  ): ChannelMessage {
    return {
      direction,
      channel,
      channelId: message.channelId,
      channelType: OPAQUE_CHANNEL_TYPE,
      data: message.data,
      originals: [message],
      opaqueReason: reason,
      notices: [],
    }
  }

  #failed(
    direction: Direction,
    channel: string,
    channelId: number,
    channelType: string,
    data: Uint8Array,
    originals: ReadonlyArray<ApplicationMessage>,
    error: unknown,
  ): ChannelMessage {
    if (error instanceof RelayInvariantViolation) {
      throw error
    }
    const reason =
      error instanceof RdpDecodeError
        ? error.message
        : `Channel handler failed: ${error instanceof Error ? error.message : String(error)}`
    return {
      direction,
      channel,
      channelId,
      channelType,
      data,
      originals,
      decodeError: new ChannelDecodeError(reason, channel, { cause: error }),
      notices: [],
    }
  }

  #requireSide(side: EngineSide): SideState {
    const state = this.#sides.get(side)
    if (!state) {
      throw new RelayInvariantViolation(`No channel layout for the ${side} leg`)
    }
    return state
  }
}

function complete(message: ChannelMessage): InboundResult {
  return { status: 'complete', message }
}

function withData(template: ApplicationMessage | undefined, data: Uint8Array): ApplicationMessage {
  if (!template) {
    throw new RelayInvariantViolation('Opaque replacement without an original message')
  }
  return { ...template, data }
}

function firstChunkFlags(data: Uint8Array): number {
  return data.length >= 8 ? decodeChannelChunk(data).flags : 0
}
