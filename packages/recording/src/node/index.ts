import { createWriteStream, type WriteStream } from 'node:fs'
import { mkdir, readFile } from 'node:fs/promises'
import { dirname } from 'node:path'

import type { RecordingSink } from '../encoder'
import { RecordingClosedError, RecordingError } from '../errors'
import { RecordingReader } from '../query'

export const DEFAULT_MAX_BUFFERED_BYTES = 64 * 1024 * 1024

export interface FileRecordingSinkOptions {
  /** Bytes the stream may hold ahead of the disk before writes fail. */
  readonly maxBufferedBytes?: number
}

/**
 * Append-only sink over a file write stream. A stream error is kept and
 * surfaced by the next `write` or by `close`. Writes fail once more than
 * `maxBufferedBytes` are waiting for the disk.
 */
export class FileRecordingSink implements RecordingSink {
  readonly path: string
  readonly #maxBufferedBytes: number
  #stream: WriteStream
  #error: Error | null = null
  #closed = false

  constructor(path: string, options: FileRecordingSinkOptions = {}) {
    this.path = path
    this.#maxBufferedBytes = options.maxBufferedBytes ?? DEFAULT_MAX_BUFFERED_BYTES
    this.#stream = createWriteStream(path, { flags: 'a' })
    this.#stream.on('error', (error) => {
      this.#error = error
    })
  }

  get closed(): boolean {
    return this.#closed
  }

  write(chunk: Uint8Array): void {
    if (this.#closed) {
      throw new RecordingClosedError(`Recording ${this.path} is closed`)
    }
    this.#throwIfFailed()
    const buffered = this.#stream.writableLength
    if (buffered + chunk.length > this.#maxBufferedBytes) {
      throw new RecordingError(
        `Recording ${this.path} has ${buffered} bytes waiting for the disk, limit is ${this.#maxBufferedBytes}`,
      )
    }
    this.#stream.write(chunk)
  }

  async close(): Promise<void> {
    if (this.#closed) return
    this.#closed = true
    if (this.#error) {
      this.#stream.destroy()
      this.#throwIfFailed()
    }
    const stream = this.#stream
    try {
      await new Promise<void>((resolve, reject) => {
        stream.once('error', reject)
        stream.end(() => {
          stream.off('error', reject)
          resolve()
        })
      })
    } catch (error) {
      throw new RecordingError(`Failed to finalize recording ${this.path}`, {
        cause: error,
      })
    }
  }

  #throwIfFailed(): void {
    if (this.#error) {
      throw new RecordingError(`Recording ${this.path} failed`, {
        cause: this.#error,
      })
    }
  }
}

export async function createFileSink(
  path: string,
  options: FileRecordingSinkOptions = {},
): Promise<FileRecordingSink> {
  await mkdir(dirname(path), { recursive: true })
  return new FileRecordingSink(path, options)
}

export async function openRecordingFile(path: string): Promise<RecordingReader> {
  const bytes = await readFile(path)
  return new RecordingReader(
    new Uint8Array(bytes.buffer, bytes.byteOffset, bytes.byteLength),
  )
}

export * from '../index'
