import { isClipboardPdu } from '../channels/handlers/cliprdr'
import type { Diagnostics } from '../diagnostics'
import type { RelaySession } from '../relay/session'

export interface ClipboardCaptureOptions {
  readonly diagnostics?: Diagnostics
}

/** Records every text clipboard transfer, in either direction. */
export function installClipboardCapture(
  session: RelaySession,
  options: ClipboardCaptureOptions = {},
): () => void {
  return session.registerHook(
    (message) => message.channelType === 'cliprdr',
    (message) => {
      const pdu = message.event
      if (!isClipboardPdu(pdu) || pdu.type !== 'format-data-response') return
      const { formatId, text } = pdu
      if (text === undefined || formatId === undefined) return
      session.record((recorder) =>
        recorder.clipboard({ direction: message.direction, formatId, text }),
      )
      options.diagnostics?.info('clipboard', 'Clipboard text transferred', {
        sessionId: session.sessionId,
        direction: message.direction,
        length: text.length,
      })
    },
  )
}
