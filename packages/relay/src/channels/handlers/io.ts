import type { ApplicationMessage } from '../../negotiation/messages'
import {
  decodeFastPathInput,
  decodeFastPathOutput,
  encodeFastPathInput,
  encodeFastPathOutput,
  type FastPathInputEvent,
  type FastPathUpdate,
} from '../../pdu/fast-path'
import {
  decodeSharePdu,
  decodeSlowPathInput,
  encodeSharePdu,
  encodeSlowPathInput,
  ShareDataType,
  type SharePdu,
  type SlowPathInputEvent,
} from '../../pdu/share'
import type { Direction } from '../types'

const PACKET_COMPRESSED = 0x20
const FAST_PATH_COUNT_MASK = 0x3c

export type IoEvent =
  | {
      readonly type: 'share'
      readonly pdu: SharePdu
      /** Decoded when the PDU is an uncompressed input PDU. */
      readonly input?: ReadonlyArray<SlowPathInputEvent>
    }
  | {
      readonly type: 'fast-path-input'
      readonly header: number
      readonly events: ReadonlyArray<FastPathInputEvent>
    }
  | {
      readonly type: 'fast-path-output'
      readonly header: number
      readonly updates: ReadonlyArray<FastPathUpdate>
    }

export function isIoEvent(value: unknown): value is IoEvent {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    (value.type === 'share' || value.type === 'fast-path-input' || value.type === 'fast-path-output')
  )
}

export function decodeIoMessage(message: ApplicationMessage, direction: Direction): IoEvent {
  if (message.kind === 'fast-path') {
    return direction === 'client-to-server'
      ? {
          type: 'fast-path-input',
          header: message.header,
          events: decodeFastPathInput(message.header, message.data),
        }
      : { type: 'fast-path-output', header: message.header, updates: decodeFastPathOutput(message.data) }
  }
  const pdu = decodeSharePdu(message.data)
  if (
    pdu.type === 'data' &&
    pdu.dataType === ShareDataType.Input &&
    (pdu.compressedType & PACKET_COMPRESSED) === 0
  ) {
    return { type: 'share', pdu, input: decodeSlowPathInput(pdu.body) }
  }
  return { type: 'share', pdu }
}

/** Encoded form of an I/O event: a slow-path body or a fast-path header and body. */
export type EncodedIo =
  | { readonly kind: 'slow-path'; readonly data: Uint8Array }
  | { readonly kind: 'fast-path'; readonly header: number; readonly data: Uint8Array }

export function encodeIoEvent(event: IoEvent): EncodedIo {
  switch (event.type) {
    case 'share': {
      const pdu =
        event.input && event.pdu.type === 'data'
          ? { ...event.pdu, body: encodeSlowPathInput(event.input) }
          : event.pdu
      return { kind: 'slow-path', data: encodeSharePdu(pdu) }
    }
    case 'fast-path-input': {
      const { header, body } = encodeFastPathInput(event.events)
      return {
        kind: 'fast-path',
        header: (event.header & ~FAST_PATH_COUNT_MASK) | header,
        data: body,
      }
    }
    case 'fast-path-output':
      return { kind: 'fast-path', header: event.header, data: encodeFastPathOutput(event.updates) }
  }
}
