import { describe, expect, it } from 'vitest'

import type { RecordedEvent } from '../src/format'
import { playRecording } from '../src/playback'

const event = (sessionId: string, timestamp: number): RecordedEvent => ({
  sessionId,
  timestamp,
  kind: 0x10,
  payload: new Uint8Array(0),
})

async function collect(
  iterable: AsyncIterable<RecordedEvent>,
): Promise<RecordedEvent[]> {
  const out: RecordedEvent[] = []
  for await (const item of iterable) {
    out.push(item)
  }
  return out
}

describe('playRecording', () => {
  const events = [event('a', 0), event('a', 1_000_000), event('a', 1_500_000)]

  it('waits the recorded gaps scaled by speed', async () => {
    const waits: number[] = []
    const played = await collect(
      playRecording(events, {
        speed: 2,
        sleep: async (ms) => {
          waits.push(ms)
        },
      }),
    )

    expect(played).toEqual(events)
    expect(waits).toEqual([500, 250])
  })

  it('caps long gaps', async () => {
    const waits: number[] = []
    await collect(
      playRecording(events, {
        maxGapMs: 300,
        sleep: async (ms) => {
          waits.push(ms)
        },
      }),
    )

    expect(waits).toEqual([300, 300])
  })

  it('does not wait when speed is zero', async () => {
    const waits: number[] = []
    const played = await collect(
      playRecording(events, {
        speed: 0,
        sleep: async (ms) => {
          waits.push(ms)
        },
      }),
    )

    expect(played).toHaveLength(3)
    expect(waits).toEqual([])
  })

  it('stops when the signal aborts', async () => {
    const controller = new AbortController()
    const played = await collect(
      playRecording(events, {
        signal: controller.signal,
        sleep: async () => {
          controller.abort()
        },
      }),
    )

    expect(played).toEqual([events[0]])
  })

  it('applies session filters before timing', async () => {
    const waits: number[] = []
    const mixed = [event('a', 0), event('b', 10_000), event('a', 20_000)]
    const played = await collect(
      playRecording(mixed, {
        sessionId: 'a',
        sleep: async (ms) => {
          waits.push(ms)
        },
      }),
    )

    expect(played.map((e) => e.timestamp)).toEqual([0, 20_000])
    expect(waits).toEqual([20])
  })
})
