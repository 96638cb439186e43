/**
 * Base error class for recording faults.
 */
export class RecordingError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'RecordingError'
  }
}

/**
 * Raised by the decoder for one malformed record. Decoding resumes at the next
 * record boundary, so this never ends a replay on its own.
 */
export class CorruptRecordError extends RecordingError {
  readonly offset: number

  constructor(message: string, offset: number, options?: ErrorOptions) {
    super(message, options)
    this.name = 'CorruptRecordError'
    this.offset = offset
  }
}

/**
 * Raised when an append would break the append-only contract of a recording,
 * for example after a session-end event was written.
 */
export class RecordingClosedError extends RecordingError {
  constructor(message: string) {
    super(message)
    this.name = 'RecordingClosedError'
  }
}
