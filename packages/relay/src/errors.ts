/**
 * Base error class for relay faults.
 */
export class RelayError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'RelayError'
  }
}

/**
 * Raised by codecs when bytes cannot be parsed. Never leaves a connection
 * boundary as-is: it is translated into one of the errors below.
 */
export class RdpDecodeError extends RelayError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'RdpDecodeError'
  }
}

/**
 * A declared frame length is inconsistent with the framing rules. The
 * connection that produced it must be torn down.
 */
export class MalformedFrameError extends RelayError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'MalformedFrameError'
  }
}

/**
 * A PDU arrived that the negotiation state does not accept. Fatal to the
 * whole session.
 */
export class UnexpectedPduError extends RelayError {
  readonly state: string

  constructor(message: string, state: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'UnexpectedPduError'
    this.state = state
  }
}

/**
 * A channel handler could not decode a message. Local to that message, which
 * is still forwarded opaquely.
 */
export class ChannelDecodeError extends RelayError {
  readonly channel: string

  constructor(message: string, channel: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'ChannelDecodeError'
    this.channel = channel
  }
}

export class HookTimeoutError extends RelayError {
  readonly hookId: number
  readonly budgetMs: number

  constructor(hookId: number, budgetMs: number) {
    super(`Hook ${hookId} exceeded its ${budgetMs}ms budget`)
    this.name = 'HookTimeoutError'
    this.hookId = hookId
    this.budgetMs = budgetMs
  }
}

/**
 * Expected terminal condition: one side went away. Propagated to the peer,
 * not reported as a failure.
 */
export class ConnectionClosedError extends RelayError {
  readonly side: 'client' | 'server'

  constructor(
    side: 'client' | 'server',
    message = `${side} connection closed`,
    options?: ErrorOptions,
  ) {
    super(message, options)
    this.name = 'ConnectionClosedError'
    this.side = side
  }
}

/**
 * Raised when an invariant internal to the relay is violated. These indicate
 * implementation defects rather than peer behaviour.
 */
export class RelayInvariantViolation extends RelayError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'RelayInvariantViolation'
  }
}
