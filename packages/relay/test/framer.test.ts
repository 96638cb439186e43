import fc from 'fast-check'
import { describe, expect, it } from 'vitest'

import { MalformedFrameError } from '../src/errors'
import { type Frame, TransportFramer } from '../src/transport/framer'

function feedAll(framer: TransportFramer, chunks: ReadonlyArray<Uint8Array>): Frame[] {
  const frames: Frame[] = []
  for (const chunk of chunks) {
    frames.push(...framer.feed(chunk))
  }
  return frames
}

const frameArb: fc.Arbitrary<Frame> = fc.oneof(
  fc
    .uint8Array({ minLength: 3, maxLength: 300 })
    .map((payload): Frame => ({ kind: 'tpkt', payload })),
  fc
    .tuple(fc.integer({ min: 0, max: 63 }), fc.uint8Array({ minLength: 0, maxLength: 300 }))
    .map(([bits, payload]): Frame => ({ kind: 'fast-path', header: bits << 2, payload })),
)

describe('TransportFramer', () => {
  it('wraps a TPKT payload behind a four byte header', () => {
    const framer = new TransportFramer()
    expect(framer.wrap({ kind: 'tpkt', payload: Uint8Array.of(0x02, 0xf0, 0x80) })).toEqual(
      Uint8Array.of(0x03, 0x00, 0x00, 0x07, 0x02, 0xf0, 0x80),
    )
  })

  it('uses the one byte fast-path length while it fits', () => {
    const framer = new TransportFramer()
    expect(framer.wrap({ kind: 'fast-path', header: 0x04, payload: Uint8Array.of(1, 2, 3) })).toEqual(
      Uint8Array.of(0x04, 0x05, 1, 2, 3),
    )
    const long = framer.wrap({ kind: 'fast-path', header: 0x00, payload: new Uint8Array(200) })
    expect(long.length).toBe(203)
    expect(Array.from(long.subarray(0, 3))).toEqual([0x00, 0x80, 203])
  })

  it('yields the same frames however the stream is split', () => {
    fc.assert(
      fc.property(
        fc.array(frameArb, { minLength: 1, maxLength: 8 }),
        fc.array(fc.integer({ min: 1, max: 64 }), { minLength: 1, maxLength: 40 }),
        (frames, cuts) => {
          const writer = new TransportFramer()
          const stream = Uint8Array.from(frames.flatMap((frame) => Array.from(writer.wrap(frame))))
          const chunks: Uint8Array[] = []
          let offset = 0
          for (let i = 0; offset < stream.length; i += 1) {
            const size = cuts[i % cuts.length] ?? 1
            chunks.push(stream.subarray(offset, offset + size))
            offset += size
          }
          const reader = new TransportFramer()
          expect(feedAll(reader, chunks)).toEqual(frames)
          expect(reader.buffered).toBe(0)
        },
      ),
    )
  })

  it('keeps a partial frame buffered until it completes', () => {
    const framer = new TransportFramer()
    expect(feedAll(framer, [Uint8Array.of(0x03, 0x00, 0x00, 0x08, 0xaa)])).toEqual([])
    expect(framer.buffered).toBe(5)
    expect(feedAll(framer, [Uint8Array.of(0xbb, 0xcc, 0xdd)])).toEqual([
      { kind: 'tpkt', payload: Uint8Array.of(0xaa, 0xbb, 0xcc, 0xdd) },
    ])
  })

  it('rejects a TPKT length below the minimum and stays failed', () => {
    const framer = new TransportFramer()
    expect(() => feedAll(framer, [Uint8Array.of(0x03, 0x00, 0x00, 0x05, 0x00)])).toThrow(
      new MalformedFrameError('TPKT length 5 is below the minimum of 7'),
    )
    expect(() => feedAll(framer, [Uint8Array.of(0x03, 0x00, 0x00, 0x07, 0x02, 0xf0, 0x80)])).toThrow(
      MalformedFrameError,
    )
  })

  it('rejects a TPKT longer than the configured maximum', () => {
    const framer = new TransportFramer({ maxPduSize: 100 })
    expect(() => feedAll(framer, [Uint8Array.of(0x03, 0x00, 0x00, 200)])).toThrow(
      'TPKT length 200 exceeds the maximum of 100',
    )
  })

  it('rejects a fast-path length shorter than its header', () => {
    const framer = new TransportFramer()
    expect(() => feedAll(framer, [Uint8Array.of(0x00, 0x80, 0x02)])).toThrow(
      'Fast-path length 2 is below its 3-byte header',
    )
  })

  it('rejects an unknown first byte', () => {
    const framer = new TransportFramer()
    expect(() => feedAll(framer, [Uint8Array.of(0x01, 0x02)])).toThrow(
      'Unknown frame header byte 0x01',
    )
  })

  it('refuses to wrap a fast-path header with action bits', () => {
    const framer = new TransportFramer()
    expect(() => framer.wrap({ kind: 'fast-path', header: 0x03, payload: new Uint8Array(0) })).toThrow(
      MalformedFrameError,
    )
  })

  it('unwraps exactly one frame', () => {
    const framer = new TransportFramer()
    expect(framer.unwrap(Uint8Array.of(0x08, 0x03, 0xff))).toEqual({
      kind: 'fast-path',
      header: 0x08,
      payload: Uint8Array.of(0xff),
    })
    expect(() => framer.unwrap(Uint8Array.of(0x08, 0x03, 0xff, 0x00))).toThrow(
      'Frame declares 3 bytes but 4 were given',
    )
    expect(() => framer.unwrap(Uint8Array.of(0x08, 0x05, 0xff))).toThrow(
      'Frame is shorter than its declared length',
    )
  })
})
