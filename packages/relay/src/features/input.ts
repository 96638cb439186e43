import type { InputEventRecord, InputPayload } from '@rdp-relay/recording'

import { type IoEvent, isIoEvent } from '../channels/handlers/io'
import type { FastPathInputEvent } from '../pdu/fast-path'
import { FastPathKeyboardFlag } from '../pdu/fast-path'
import { KeyboardFlag, type SlowPathInputEvent } from '../pdu/share'

export interface InputBatch {
  readonly source: InputPayload['source']
  readonly events: InputEventRecord[]
}

/** Input carried by an io event, in recording form. Undefined when it carries none. */
export function inputFromIoEvent(event: unknown): InputBatch | undefined {
  if (!isIoEvent(event)) return undefined
  return inputFromIo(event)
}

function inputFromIo(event: IoEvent): InputBatch | undefined {
  if (event.type === 'fast-path-input') {
    return { source: 'fast-path', events: event.events.flatMap(fromFastPath) }
  }
  if (event.type === 'share' && event.input) {
    return { source: 'slow-path', events: event.input.flatMap(fromSlowPath) }
  }
  return undefined
}

export function fromFastPath(event: FastPathInputEvent): InputEventRecord[] {
  switch (event.type) {
    case 'scancode':
      return [
        {
          type: 'scancode',
          code: event.keyCode,
          released: (event.flags & FastPathKeyboardFlag.Release) !== 0,
          extended: (event.flags & FastPathKeyboardFlag.Extended) !== 0,
        },
      ]
    case 'unicode':
      return [
        {
          type: 'unicode',
          code: event.unicode,
          released: (event.flags & FastPathKeyboardFlag.Release) !== 0,
        },
      ]
    case 'mouse':
    case 'mousex':
      return [{ type: 'mouse', x: event.x, y: event.y, flags: event.pointerFlags }]
    case 'sync':
      return [{ type: 'sync', flags: event.flags }]
    case 'relative-mouse':
    case 'qoe':
      return []
  }
}

function fromSlowPath(event: SlowPathInputEvent): InputEventRecord[] {
  switch (event.type) {
    case 'scancode':
      return [
        {
          type: 'scancode',
          code: event.keyCode,
          released: (event.flags & KeyboardFlag.Release) !== 0,
          extended: (event.flags & KeyboardFlag.Extended) !== 0,
        },
      ]
    case 'unicode':
      return [
        {
          type: 'unicode',
          code: event.unicode,
          released: (event.flags & KeyboardFlag.Release) !== 0,
        },
      ]
    case 'mouse':
    case 'mousex':
      return [{ type: 'mouse', x: event.x, y: event.y, flags: event.flags }]
    case 'sync':
      return [{ type: 'sync', flags: event.toggleFlags }]
    case 'other':
      return []
  }
}
