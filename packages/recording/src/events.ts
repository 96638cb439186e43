import { z } from 'zod'

import { RecordingError } from './errors'
import {
  EventKind,
  type EventKindName,
  eventKindName,
  type RecordedEvent,
} from './format'

const UTF8_ENCODER = new TextEncoder()
const UTF8_DECODER = new TextDecoder('utf-8', { fatal: true })

export type Direction = 'client-to-server' | 'server-to-client'

/**
 * Raised when a well-framed record carries a payload its kind cannot parse.
 */
export class PayloadDecodeError extends RecordingError {
  readonly kind: number

  constructor(message: string, kind: number, options?: ErrorOptions) {
    super(message, options)
    this.name = 'PayloadDecodeError'
    this.kind = kind
  }
}

const directionSchema = z.enum(['client-to-server', 'server-to-client'])

export const sessionStartSchema = z.object({
  startedAt: z.string(),
  sensorId: z.string().optional(),
  client: z.object({ address: z.string(), port: z.number().int() }).optional(),
  target: z.object({ host: z.string(), port: z.number().int() }),
})

export const sessionEndSchema = z.object({
  reason: z.string(),
  detail: z.string().optional(),
})

export const negotiationSchema = z.object({
  side: z.enum(['client', 'server']),
  stage: z.string(),
  detail: z.record(z.unknown()),
})

export const clientInfoSchema = z.object({
  domain: z.string(),
  username: z.string(),
  password: z.string(),
  replaced: z.boolean(),
  forwardedUsername: z.string().optional(),
})

export const channelOpaqueSchema = z.object({
  direction: directionSchema,
  channel: z.string(),
  channelId: z.number().int(),
  reason: z.string(),
})

export const channelDecodeErrorSchema = z.object({
  direction: directionSchema,
  channel: z.string(),
  message: z.string(),
})

export const hookTimeoutSchema = z.object({
  direction: directionSchema,
  channel: z.string(),
  hookId: z.number().int(),
  budgetMs: z.number(),
})

export const inputEventSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('scancode'),
    code: z.number().int(),
    released: z.boolean(),
    extended: z.boolean(),
  }),
  z.object({
    type: z.literal('unicode'),
    code: z.number().int(),
    released: z.boolean(),
  }),
  z.object({
    type: z.literal('mouse'),
    x: z.number().int(),
    y: z.number().int(),
    flags: z.number().int(),
  }),
  z.object({ type: z.literal('sync'), flags: z.number().int() }),
])

export const inputSchema = z.object({
  direction: directionSchema,
  source: z.enum(['slow-path', 'fast-path', 'injected']),
  events: z.array(inputEventSchema),
})

export const clipboardSchema = z.object({
  direction: directionSchema,
  formatId: z.number().int(),
  text: z.string(),
})

export type SessionStartPayload = z.infer<typeof sessionStartSchema>
export type SessionEndPayload = z.infer<typeof sessionEndSchema>
export type NegotiationPayload = z.infer<typeof negotiationSchema>
export type ClientInfoPayload = z.infer<typeof clientInfoSchema>
export type ChannelOpaquePayload = z.infer<typeof channelOpaqueSchema>
export type ChannelDecodeErrorPayload = z.infer<typeof channelDecodeErrorSchema>
export type HookTimeoutPayload = z.infer<typeof hookTimeoutSchema>
export type InputEventRecord = z.infer<typeof inputEventSchema>
export type InputPayload = z.infer<typeof inputSchema>
export type ClipboardPayload = z.infer<typeof clipboardSchema>

/**
 * Binary body shared by PDU and channel-message events: which way the bytes
 * travelled, a short tag (framing or channel name) and the bytes themselves.
 */
export interface TaggedBytes {
  readonly direction: Direction
  readonly tag: string
  readonly data: Uint8Array
}

export function encodeTaggedBytes(value: TaggedBytes): Uint8Array {
  const tag = UTF8_ENCODER.encode(value.tag)
  if (tag.length > 0xff) {
    throw new RecordingError(`Tag "${value.tag}" is longer than 255 bytes`)
  }
  const out = new Uint8Array(2 + tag.length + value.data.length)
  out[0] = value.direction === 'client-to-server' ? 0 : 1
  out[1] = tag.length
  out.set(tag, 2)
  out.set(value.data, 2 + tag.length)
  return out
}

export function decodeTaggedBytes(payload: Uint8Array, kind: number): TaggedBytes {
  const directionByte = payload[0]
  const tagLength = payload[1]
  if (directionByte === undefined || tagLength === undefined) {
    throw new PayloadDecodeError('Tagged payload is missing its header', kind)
  }
  if (directionByte > 1) {
    throw new PayloadDecodeError(`Unknown direction ${directionByte}`, kind)
  }
  if (payload.length < 2 + tagLength) {
    throw new PayloadDecodeError('Tagged payload tag is truncated', kind)
  }
  let tag: string
  try {
    tag = UTF8_DECODER.decode(payload.subarray(2, 2 + tagLength))
  } catch (error) {
    throw new PayloadDecodeError('Tag is not valid UTF-8', kind, {
      cause: error,
    })
  }
  return {
    direction: directionByte === 0 ? 'client-to-server' : 'server-to-client',
    tag,
    data: payload.slice(2 + tagLength),
  }
}

export function encodeJsonPayload(value: unknown): Uint8Array {
  return UTF8_ENCODER.encode(JSON.stringify(value))
}

function decodeJsonPayload<S extends z.ZodTypeAny>(
  schema: S,
  payload: Uint8Array,
  kind: number,
): z.infer<S> {
  let raw: unknown
  try {
    raw = JSON.parse(UTF8_DECODER.decode(payload))
  } catch (error) {
    throw new PayloadDecodeError('Payload is not valid JSON', kind, {
      cause: error,
    })
  }
  const parsed = schema.safeParse(raw)
  if (!parsed.success) {
    throw new PayloadDecodeError(
      `Payload does not match ${eventKindName(kind) ?? kind}: ${parsed.error.message}`,
      kind,
      { cause: parsed.error },
    )
  }
  return parsed.data
}

export type DecodedEventPayload =
  | { readonly kind: 'SessionStart'; readonly value: SessionStartPayload }
  | { readonly kind: 'SessionEnd'; readonly value: SessionEndPayload }
  | { readonly kind: 'Pdu'; readonly value: TaggedBytes }
  | { readonly kind: 'Negotiation'; readonly value: NegotiationPayload }
  | { readonly kind: 'ClientInfo'; readonly value: ClientInfoPayload }
  | { readonly kind: 'ChannelObserved'; readonly value: TaggedBytes }
  | { readonly kind: 'ChannelModified'; readonly value: TaggedBytes }
  | { readonly kind: 'ChannelSuppressed'; readonly value: TaggedBytes }
  | { readonly kind: 'ChannelOpaque'; readonly value: ChannelOpaquePayload }
  | {
      readonly kind: 'ChannelDecodeError'
      readonly value: ChannelDecodeErrorPayload
    }
  | { readonly kind: 'HookTimeout'; readonly value: HookTimeoutPayload }
  | { readonly kind: 'Input'; readonly value: InputPayload }
  | { readonly kind: 'Clipboard'; readonly value: ClipboardPayload }
  | {
      readonly kind: 'unknown'
      readonly code: number
      readonly payload: Uint8Array
    }

/**
 * Interprets the payload of a recorded event. Kinds this decoder does not know
 * come back as `unknown` with their bytes untouched.
 */
export function decodeEventPayload(event: RecordedEvent): DecodedEventPayload {
  const { kind, payload } = event
  const name: EventKindName | undefined = eventKindName(kind)
  switch (name) {
    case 'SessionStart':
      return { kind: name, value: decodeJsonPayload(sessionStartSchema, payload, kind) }
    case 'SessionEnd':
      return { kind: name, value: decodeJsonPayload(sessionEndSchema, payload, kind) }
    case 'Negotiation':
      return { kind: name, value: decodeJsonPayload(negotiationSchema, payload, kind) }
    case 'ClientInfo':
      return { kind: name, value: decodeJsonPayload(clientInfoSchema, payload, kind) }
    case 'ChannelOpaque':
      return { kind: name, value: decodeJsonPayload(channelOpaqueSchema, payload, kind) }
    case 'ChannelDecodeError':
      return {
        kind: name,
        value: decodeJsonPayload(channelDecodeErrorSchema, payload, kind),
      }
    case 'HookTimeout':
      return { kind: name, value: decodeJsonPayload(hookTimeoutSchema, payload, kind) }
    case 'Input':
      return { kind: name, value: decodeJsonPayload(inputSchema, payload, kind) }
    case 'Clipboard':
      return { kind: name, value: decodeJsonPayload(clipboardSchema, payload, kind) }
    case 'Pdu':
    case 'ChannelObserved':
    case 'ChannelModified':
    case 'ChannelSuppressed':
      return { kind: name, value: decodeTaggedBytes(payload, kind) }
    case undefined:
      return { kind: 'unknown', code: kind, payload }
  }
}

export { EventKind }
