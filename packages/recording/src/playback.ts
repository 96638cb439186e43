import type { RecordedEvent } from './format'
import { matchesQuery, type RecordingQuery } from './query'

export interface PlaybackOptions extends RecordingQuery {
  /** 2 plays twice as fast; values <= 0 disable waiting. */
  readonly speed?: number
  /** Upper bound on any single wait, in milliseconds of wall time. */
  readonly maxGapMs?: number
  readonly signal?: AbortSignal
  readonly sleep?: (ms: number, signal?: AbortSignal) => Promise<void>
}

export function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve()
      return
    }
    const timer = setTimeout(done, ms)
    function done(): void {
      clearTimeout(timer)
      signal?.removeEventListener('abort', done)
      resolve()
    }
    signal?.addEventListener('abort', done, { once: true })
  })
}

/**
 * Re-emits recorded events spaced by their original capture gaps. Stops
 * without error when the signal aborts.
 */
export async function* playRecording(
  events: Iterable<RecordedEvent>,
  options: PlaybackOptions = {},
): AsyncGenerator<RecordedEvent, void, undefined> {
  const speed = options.speed ?? 1
  const sleep = options.sleep ?? defaultSleep
  let previous: number | undefined
  for (const event of events) {
    if (options.signal?.aborted) {
      return
    }
    if (!matchesQuery(event, options)) {
      continue
    }
    if (previous !== undefined && speed > 0) {
      let waitMs = Math.max(0, event.timestamp - previous) / 1000 / speed
      if (options.maxGapMs !== undefined) {
        waitMs = Math.min(waitMs, options.maxGapMs)
      }
      if (waitMs > 0) {
        await sleep(waitMs, options.signal)
        if (options.signal?.aborted) {
          return
        }
      }
    }
    previous = event.timestamp
    yield event
  }
}
