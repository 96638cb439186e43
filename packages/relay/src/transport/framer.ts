import { MalformedFrameError } from '../errors'
import { concatBytes, EMPTY_BYTES } from '../internal/bytes'

export const TPKT_VERSION = 3
export const TPKT_HEADER_LENGTH = 4
/** TPKT header plus the shortest X.224 data header. */
export const TPKT_MIN_LENGTH = 7
export const TPKT_MAX_LENGTH = 0xffff
export const FAST_PATH_MIN_LENGTH = 2
export const FAST_PATH_MAX_LENGTH = 0x7fff

export type Frame =
  | {
      readonly kind: 'tpkt'
      readonly payload: Uint8Array
    }
  | {
      readonly kind: 'fast-path'
      /** First byte: action bits, event count and security flags. */
      readonly header: number
      readonly payload: Uint8Array
    }

export interface FramerOptions {
  /** Upper bound for a declared TPKT length. */
  readonly maxPduSize?: number
}

type FrameResult =
  | { readonly status: 'frame'; readonly frame: Frame; readonly length: number }
  | { readonly status: 'incomplete' }

/**
 * Stateful, per-connection reassembly of TPKT and fast-path frames. Once a
 * malformed length is seen the framer refuses all further input.
 */
export class TransportFramer {
  readonly #maxTpktLength: number
  #buffer: Uint8Array = EMPTY_BYTES
  #failure: MalformedFrameError | null = null

  constructor(options: FramerOptions = {}) {
    this.#maxTpktLength = Math.min(
      options.maxPduSize ?? TPKT_MAX_LENGTH,
      TPKT_MAX_LENGTH,
    )
  }

  get buffered(): number {
    return this.#buffer.length
  }

  /**
   * Buffers `chunk` and returns the frames it completes. Frames not pulled
   * from the iterator stay buffered for the next call.
   */
  feed(chunk: Uint8Array): Generator<Frame, void, undefined> {
    if (this.#failure) {
      throw this.#failure
    }
    if (chunk.length > 0) {
      this.#buffer =
        this.#buffer.length === 0 ? chunk.slice() : concatBytes(this.#buffer, chunk)
    }
    return this.#drain()
  }

  wrap(frame: Frame): Uint8Array {
    if (frame.kind === 'tpkt') {
      const length = TPKT_HEADER_LENGTH + frame.payload.length
      if (length < TPKT_MIN_LENGTH || length > this.#maxTpktLength) {
        throw new MalformedFrameError(
          `TPKT length ${length} is outside ${TPKT_MIN_LENGTH}..${this.#maxTpktLength}`,
        )
      }
      const out = new Uint8Array(length)
      out[0] = TPKT_VERSION
      out[1] = 0
      out[2] = length >>> 8
      out[3] = length & 0xff
      out.set(frame.payload, TPKT_HEADER_LENGTH)
      return out
    }

    if ((frame.header & 0x03) !== 0) {
      throw new MalformedFrameError(
        `Fast-path header 0x${frame.header.toString(16)} has a non-zero action`,
      )
    }
    const short = frame.payload.length + 2 <= 0x7f
    const length = frame.payload.length + (short ? 2 : 3)
    if (length > FAST_PATH_MAX_LENGTH) {
      throw new MalformedFrameError(
        `Fast-path length ${length} exceeds ${FAST_PATH_MAX_LENGTH}`,
      )
    }
    const headerLength = short ? 2 : 3
    const out = new Uint8Array(length)
    out[0] = frame.header
    if (short) {
      out[1] = length
    } else {
      out[1] = 0x80 | (length >>> 8)
      out[2] = length & 0xff
    }
    out.set(frame.payload, headerLength)
    return out
  }

  /** Decodes exactly one frame that must span all of `bytes`. */
  unwrap(bytes: Uint8Array): Frame {
    const result = this.#parse(bytes)
    if (result.status === 'incomplete') {
      throw new MalformedFrameError('Frame is shorter than its declared length')
    }
    if (result.length !== bytes.length) {
      throw new MalformedFrameError(
        `Frame declares ${result.length} bytes but ${bytes.length} were given`,
      )
    }
    return result.frame
  }

  *#drain(): Generator<Frame, void, undefined> {
    while (this.#buffer.length > 0) {
      let result: FrameResult
      try {
        result = this.#parse(this.#buffer)
      } catch (error) {
        if (error instanceof MalformedFrameError) {
          this.#failure = error
          this.#buffer = EMPTY_BYTES
        }
        throw error
      }
      if (result.status === 'incomplete') {
        return
      }
      this.#buffer = this.#buffer.subarray(result.length)
      yield result.frame
    }
  }

  #parse(bytes: Uint8Array): FrameResult {
    const first = bytes[0]
    if (first === undefined) {
      return { status: 'incomplete' }
    }

    if (first === TPKT_VERSION) {
      if (bytes.length < TPKT_HEADER_LENGTH) {
        return { status: 'incomplete' }
      }
      const length = ((bytes[2] ?? 0) << 8) | (bytes[3] ?? 0)
      if (length < TPKT_MIN_LENGTH) {
        throw new MalformedFrameError(
          `TPKT length ${length} is below the minimum of ${TPKT_MIN_LENGTH}`,
        )
      }
      if (length > this.#maxTpktLength) {
        throw new MalformedFrameError(
          `TPKT length ${length} exceeds the maximum of ${this.#maxTpktLength}`,
        )
      }
      if (bytes.length < length) {
        return { status: 'incomplete' }
      }
      return {
        status: 'frame',
        length,
        frame: { kind: 'tpkt', payload: bytes.slice(TPKT_HEADER_LENGTH, length) },
      }
    }

    if ((first & 0x03) === 0) {
      const lengthByte = bytes[1]
      if (lengthByte === undefined) {
        return { status: 'incomplete' }
      }
      let length = lengthByte
      let headerLength = 2
      if (lengthByte & 0x80) {
        const low = bytes[2]
        if (low === undefined) {
          return { status: 'incomplete' }
        }
        length = ((lengthByte & 0x7f) << 8) | low
        headerLength = 3
      }
      if (length < Math.max(FAST_PATH_MIN_LENGTH, headerLength)) {
        throw new MalformedFrameError(
          `Fast-path length ${length} is below its ${headerLength}-byte header`,
        )
      }
      if (bytes.length < length) {
        return { status: 'incomplete' }
      }
      return {
        status: 'frame',
        length,
        frame: {
          kind: 'fast-path',
          header: first,
          payload: bytes.slice(headerLength, length),
        },
      }
    }

    throw new MalformedFrameError(
      `Unknown frame header byte 0x${first.toString(16).padStart(2, '0')}`,
    )
  }
}
