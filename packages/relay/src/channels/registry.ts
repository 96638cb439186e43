import type { ChannelHandler, ChannelHandlerFactory } from './types'
import { createClipboardHandler } from './handlers/cliprdr'
import { createDeviceRedirectionHandler } from './handlers/rdpdr'
import { createDynamicChannelHandler } from './handlers/drdynvc'

/**
 * Channel handler factories keyed by static channel name. Names with no
 * entry are relayed opaquely.
 */
export class ChannelRegistry {
  readonly #factories = new Map<string, ChannelHandlerFactory>()

  register(channelName: string, factory: ChannelHandlerFactory): this {
    this.#factories.set(normalizeChannelName(channelName), factory)
    return this
  }

  unregister(channelName: string): boolean {
    return this.#factories.delete(normalizeChannelName(channelName))
  }

  has(channelName: string): boolean {
    return this.#factories.has(normalizeChannelName(channelName))
  }

  create(channelName: string): ChannelHandler | undefined {
    return this.#factories.get(normalizeChannelName(channelName))?.()
  }
}

export function normalizeChannelName(name: string): string {
  return name.toLowerCase()
}

export function createDefaultRegistry(): ChannelRegistry {
  return new ChannelRegistry()
    .register('cliprdr', createClipboardHandler)
    .register('rdpdr', createDeviceRedirectionHandler)
    .register('drdynvc', createDynamicChannelHandler)
}
