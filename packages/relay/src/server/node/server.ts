import { randomUUID } from 'node:crypto'
import { type AddressInfo, connect, createServer, type Server, type Socket } from 'node:net'
import { join } from 'node:path'

import { RecordingEncoder, SessionRecorder } from '@rdp-relay/recording'
import { createFileSink } from '@rdp-relay/recording/node'
import type pino from 'pino'

import type { ChannelRegistry } from '../../channels/registry'
import type { RelayConfig } from '../../config'
import { Diagnostics } from '../../diagnostics'
import { installActiveClipboard } from '../../features/active-clipboard'
import { installClipboardCapture } from '../../features/clipboard'
import { installCredentialCapture } from '../../features/credentials'
import { installPayloadInjection } from '../../features/payload'
import { generateRsaKey, type RsaPrivateKey, rsaKeyFromPem } from '../../internal/crypto/rsa'
import { type CertificateSigningKey, parseSigningKey } from '../../pdu/security'
import { RelaySession } from '../../relay/session'
import { createLoggerSink, createRootLogger } from './logger'
import { SocketTransport } from './socket-transport'

export const RECORDING_EXTENSION = '.rdprec'

export interface RelayServerOptions {
  readonly logger?: pino.Logger
  readonly registry?: ChannelRegistry
  readonly features?: { readonly credentials?: boolean; readonly clipboard?: boolean }
  /** Opens the server-facing socket; defaults to a TCP connection to the target. */
  readonly connectTarget?: (target: { host: string; port: number }) => Socket
  readonly onSession?: (session: RelaySession) => void
}

export interface RelayServer {
  readonly sessions: ReadonlyMap<string, RelaySession>
  listen(): Promise<AddressInfo>
  close(): Promise<void>
}

interface ServerKeys {
  readonly rsaKey: RsaPrivateKey
  readonly signingKey: CertificateSigningKey | undefined
}

function loadKeys(config: RelayConfig): ServerKeys {
  return {
    rsaKey: config.rsaKeyPem ? rsaKeyFromPem(config.rsaKeyPem) : generateRsaKey(),
    signingKey: config.certificateSigningKey
      ? parseSigningKey(
          config.certificateSigningKey.modulus,
          config.certificateSigningKey.privateExponent,
        )
      : undefined,
  }
}

/**
 * Accepts client connections and relays each one to the configured target
 * as its own `RelaySession`.
 */
export function createRelayServer(
  config: RelayConfig,
  options: RelayServerOptions = {},
): RelayServer {
  const logger = options.logger ?? createRootLogger(config.log.level)
  const keys = loadKeys(config)
  const sessions = new Map<string, RelaySession>()
  const connectTarget =
    options.connectTarget ?? ((target) => connect({ host: target.host, port: target.port }))
  let server: Server | undefined

  const openRecorder = async (sessionId: string) => {
    if (!config.recording.enabled) return undefined
    const sink = await createFileSink(
      join(config.recording.directory, `${sessionId}${RECORDING_EXTENSION}`),
    )
    const encoder = new RecordingEncoder(sink)
    return { encoder, recorder: new SessionRecorder(encoder, sessionId) }
  }

  const handleConnection = async (clientSocket: Socket) => {
    clientSocket.pause()
    const sessionId = randomUUID()
    const sessionLogger = logger.child({ sessionId })
    const sink = createLoggerSink(sessionLogger)
    const diagnostics = new Diagnostics(sink, 'features')
    const onEarlyError = (error: Error) => {
      sessionLogger.warn({ err: error }, 'Client socket failed before the session started')
    }
    clientSocket.on('error', onEarlyError)
    const recording = await openRecorder(sessionId)
    clientSocket.off('error', onEarlyError)
    if (clientSocket.destroyed) {
      await recording?.encoder.close()
      return
    }

    const session = new RelaySession({
      sessionId,
      rsaKey: keys.rsaKey,
      ...(keys.signingKey ? { certificateSigningKey: keys.signingKey } : {}),
      tlsAvailable: config.tls !== undefined,
      downgrade: config.downgrade,
      ...(config.replacementCredentials
        ? { replacementCredentials: config.replacementCredentials }
        : {}),
      hookTimeoutMs: config.hookTimeoutMs,
      maxPduSize: config.maxPduSize,
      maxChannelMessageSize: config.maxChannelMessageSize,
      target: { host: config.target.host, port: config.target.port },
      ...(clientSocket.remoteAddress && clientSocket.remotePort !== undefined
        ? { client: { address: clientSocket.remoteAddress, port: clientSocket.remotePort } }
        : {}),
      ...(config.sensorId ? { sensorId: config.sensorId } : {}),
      ...(recording ? { recorder: recording.recorder } : {}),
      ...(options.registry ? { registry: options.registry } : {}),
      diagnostics: sink,
    })
    sessions.set(sessionId, session)

    if (options.features?.credentials ?? true) {
      installCredentialCapture(session, { diagnostics })
    }
    if (options.features?.clipboard ?? true) {
      installClipboardCapture(session, { diagnostics })
    }
    if (config.activeClipboard) {
      installActiveClipboard(session, { diagnostics })
    }
    if (config.payload) {
      installPayloadInjection(session, { ...config.payload, diagnostics })
    }

    session.subscribe((event) => {
      if (event.type !== 'closed') return
      sessions.delete(sessionId)
      sessionLogger.info({ reason: event.reason }, 'Session closed')
      recording?.encoder.close().catch((error: unknown) => {
        sessionLogger.error({ err: error }, 'Failed to finalize recording')
      })
    })

    const transportOptions = {
      closeGraceMs: config.closeGraceMs,
      ...(config.tls ? { tls: config.tls } : {}),
    }
    const clientTransport = new SocketTransport(clientSocket, transportOptions)
    const serverTransport = new SocketTransport(connectTarget(config.target), {
      ...transportOptions,
      onPeerCertificate: (certificate) => {
        const detail = {
          subject: certificate.subject?.CN ?? '',
          issuer: certificate.issuer?.CN ?? '',
          fingerprint256: certificate.fingerprint256,
        }
        sessionLogger.info(detail, 'Server presented a TLS certificate')
        session.record((recorder) =>
          recorder.negotiation({ side: 'server', stage: 'tls-certificate', detail }),
        )
      },
    })
    sessionLogger.info(
      { client: clientSocket.remoteAddress, target: config.target },
      'Session started',
    )
    options.onSession?.(session)
    session.start(clientTransport, serverTransport)
    clientSocket.resume()
  }

  return {
    sessions,
    listen() {
      return new Promise((resolve, reject) => {
        const listening = createServer((socket) => {
          handleConnection(socket).catch((error: unknown) => {
            logger.error({ err: error }, 'Failed to set up a relay session')
            socket.destroy()
          })
        })
        server = listening
        listening.once('error', reject)
        listening.listen(config.listen.port, config.listen.host, () => {
          listening.off('error', reject)
          const address = listening.address()
          if (address === null || typeof address === 'string') {
            reject(new Error(`Unexpected listen address ${String(address)}`))
            return
          }
          logger.info({ address, target: config.target }, 'Relay listening')
          resolve(address)
        })
      })
    },
    close() {
      for (const session of [...sessions.values()]) {
        session.close('relay shutting down')
      }
      return new Promise((resolve, reject) => {
        if (!server) {
          resolve()
          return
        }
        server.close((error) => (error ? reject(error) : resolve()))
      })
    },
  }
}
