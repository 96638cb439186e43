import { z } from 'zod'

import { RelayInvariantViolation } from './errors'
import { DEFAULT_MAX_CHANNEL_MESSAGE_SIZE } from './pdu/virtual-channel'
import { TPKT_MAX_LENGTH } from './transport/framer'

export const DEFAULT_RDP_PORT = 3389

const PortSchema = z.number().int().min(1).max(0xffff)

const HexSchema = z
  .string()
  .transform((value) => value.replace(/\s+/g, ''))
  .pipe(z.string().regex(/^(?:[0-9a-fA-F]{2})+$/, 'expected hex bytes'))

const OptionalTrimmedStringSchema = z.preprocess((value) => {
  if (typeof value !== 'string') {
    return value
  }
  const trimmed = value.trim()
  return trimmed.length > 0 ? trimmed : undefined
}, z.string().optional())

const EndpointSchema = z.object({
  host: z.string().min(1),
  port: PortSchema.default(DEFAULT_RDP_PORT),
})

export const RelayConfigSchema = z.object({
  listen: EndpointSchema.default({ host: '0.0.0.0', port: DEFAULT_RDP_PORT }),
  target: EndpointSchema,
  tls: z
    .object({
      certificate: z.string().min(1),
      privateKey: z.string().min(1),
    })
    .optional(),
  /** PEM of the key presented in proprietary certificates; generated per process when absent. */
  rsaKeyPem: OptionalTrimmedStringSchema,
  certificateSigningKey: z
    .object({ modulus: HexSchema, privateExponent: HexSchema })
    .optional(),
  replacementCredentials: z
    .object({
      username: OptionalTrimmedStringSchema,
      password: z.string().optional(),
      domain: OptionalTrimmedStringSchema,
    })
    .optional(),
  recording: z
    .object({
      enabled: z.boolean().default(true),
      directory: z.string().min(1).default('recordings'),
    })
    .default({}),
  downgrade: z.boolean().default(true),
  hookTimeoutMs: z.number().int().positive().default(1000),
  maxPduSize: z.number().int().min(7).max(TPKT_MAX_LENGTH).default(TPKT_MAX_LENGTH),
  maxChannelMessageSize: z.number().int().positive().default(DEFAULT_MAX_CHANNEL_MESSAGE_SIZE),
  closeGraceMs: z.number().int().nonnegative().default(2000),
  /** Ask the client for its clipboard text whenever it announces new content. */
  activeClipboard: z.boolean().default(true),
  sensorId: OptionalTrimmedStringSchema,
  log: z
    .object({
      level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
    })
    .default({}),
  payload: z
    .object({
      command: z.string().min(1),
      delayMs: z.number().int().nonnegative().default(2000),
      blockDurationMs: z.number().int().nonnegative().default(5000),
    })
    .optional(),
})

export type RelayConfigInput = z.input<typeof RelayConfigSchema>
export type RelayConfig = Readonly<z.output<typeof RelayConfigSchema>>

/**
 * Validates `input` against the schema defaults and freezes the result. The
 * returned object is shared by every session of a server.
 */
export function buildRelayConfig(input: RelayConfigInput): RelayConfig {
  const parsed = RelayConfigSchema.safeParse(input)
  if (!parsed.success) {
    throw new RelayInvariantViolation(
      `Invalid relay configuration: ${parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ')}`,
      { cause: parsed.error },
    )
  }
  return deepFreeze(parsed.data)
}

/** Parses `host`, `host:port` and `[v6]:port`. */
export function parseTarget(
  value: string,
  defaultPort = DEFAULT_RDP_PORT,
): { host: string; port: number } {
  const trimmed = value.trim()
  const bracketed = /^\[([^\]]+)\](?::(\d+))?$/.exec(trimmed)
  if (bracketed) {
    return { host: bracketed[1] ?? '', port: parsePort(bracketed[2], defaultPort, value) }
  }
  const separator = trimmed.lastIndexOf(':')
  if (separator === -1 || trimmed.indexOf(':') !== separator) {
    if (trimmed.length === 0) {
      throw new RelayInvariantViolation(`Invalid target "${value}"`)
    }
    return { host: trimmed, port: defaultPort }
  }
  const host = trimmed.slice(0, separator)
  if (host.length === 0) {
    throw new RelayInvariantViolation(`Invalid target "${value}"`)
  }
  return { host, port: parsePort(trimmed.slice(separator + 1), defaultPort, value) }
}

function parsePort(raw: string | undefined, fallback: number, value: string): number {
  if (raw === undefined) return fallback
  const port = Number.parseInt(raw, 10)
  const result = PortSchema.safeParse(port)
  if (!/^\d+$/.test(raw) || !result.success) {
    throw new RelayInvariantViolation(`Invalid port in target "${value}"`)
  }
  return result.data
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child)
    }
    Object.freeze(value)
  }
  return value
}
