import type { Socket } from 'node:net'
import { connect as tlsConnect, type PeerCertificate, TLSSocket } from 'node:tls'

import { RelayInvariantViolation } from '../../errors'
import type { RelayTransport } from '../../relay/session'

export interface SocketTransportOptions {
  /** PEM material presented when this leg upgrades in the server role. */
  readonly tls?: { readonly certificate: string; readonly privateKey: string }
  /** Time allowed for a graceful end before the socket is destroyed. */
  readonly closeGraceMs: number
  /** Called with the certificate the real server presented on a client-role upgrade. */
  readonly onPeerCertificate?: (certificate: PeerCertificate) => void
}

/**
 * `RelayTransport` over a TCP socket. `startTls` swaps the socket for a TLS
 * socket wrapping it; listeners stay registered across the swap.
 */
export class SocketTransport implements RelayTransport {
  readonly #options: SocketTransportOptions
  readonly #dataListeners = new Set<(payload: Uint8Array) => void>()
  readonly #closeListeners = new Set<(reason: string | undefined) => void>()
  readonly #errorListeners = new Set<(error: unknown) => void>()
  #socket: Socket
  #detach: () => void
  #closing = false
  #closeEmitted = false
  #lastError: Error | undefined

  constructor(socket: Socket, options: SocketTransportOptions) {
    this.#options = options
    this.#socket = socket
    this.#detach = this.#attach(socket)
  }

  get socket(): Socket {
    return this.#socket
  }

  send(payload: Uint8Array): void {
    if (this.#closing || this.#socket.destroyed) return
    this.#socket.write(payload)
  }

  onData(listener: (payload: Uint8Array) => void): () => void {
    this.#dataListeners.add(listener)
    return () => {
      this.#dataListeners.delete(listener)
    }
  }

  onClose(listener: (reason: string | undefined) => void): () => void {
    this.#closeListeners.add(listener)
    return () => {
      this.#closeListeners.delete(listener)
    }
  }

  onError(listener: (error: unknown) => void): () => void {
    this.#errorListeners.add(listener)
    return () => {
      this.#errorListeners.delete(listener)
    }
  }

  startTls(role: 'server' | 'client'): void {
    const raw = this.#socket
    this.#detach()
    raw.on('error', (error) => {
      this.#lastError = error
    })
    let upgraded: TLSSocket
    if (role === 'server') {
      const material = this.#options.tls
      if (!material) {
        throw new RelayInvariantViolation('No TLS certificate is configured for the client-facing leg')
      }
      upgraded = new TLSSocket(raw, {
        isServer: true,
        cert: material.certificate,
        key: material.privateKey,
      })
    } else {
      upgraded = tlsConnect({ socket: raw, rejectUnauthorized: false })
      upgraded.once('secureConnect', () => {
        this.#options.onPeerCertificate?.(upgraded.getPeerCertificate())
      })
    }
    this.#socket = upgraded
    this.#detach = this.#attach(upgraded)
  }

  close(): void {
    if (this.#closing) return
    this.#closing = true
    const socket = this.#socket
    socket.end()
    const timer = setTimeout(() => socket.destroy(), this.#options.closeGraceMs)
    timer.unref()
    socket.once('close', () => clearTimeout(timer))
  }

  #attach(socket: Socket): () => void {
    const onData = (chunk: Buffer) => {
      for (const listener of [...this.#dataListeners]) listener(chunk)
    }
    const onError = (error: Error) => {
      this.#lastError = error
      for (const listener of [...this.#errorListeners]) listener(error)
    }
    const onClose = () => this.#emitClose()
    socket.on('data', onData)
    socket.on('error', onError)
    socket.on('close', onClose)
    return () => {
      socket.off('data', onData)
      socket.off('error', onError)
      socket.off('close', onClose)
    }
  }

  #emitClose(): void {
    if (this.#closeEmitted) return
    this.#closeEmitted = true
    const reason = this.#lastError?.message
    for (const listener of [...this.#closeListeners]) listener(reason)
  }
}
