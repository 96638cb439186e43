import { RelayInvariantViolation } from '../errors'

export const CONNECTION_STATES = [
  'Idle',
  'TransportHandshake',
  'ChannelConnection',
  'SecurityExchange',
  'CapabilityExchange',
  'Active',
  'Closed',
] as const

export type ConnectionState = (typeof CONNECTION_STATES)[number]

export function stateIndex(state: ConnectionState): number {
  return CONNECTION_STATES.indexOf(state)
}

/** States only move forward; any state may close. */
export function canTransition(from: ConnectionState, to: ConnectionState): boolean {
  if (from === 'Closed') return false
  if (to === 'Closed') return true
  return stateIndex(to) > stateIndex(from)
}

export function assertTransition(from: ConnectionState, to: ConnectionState): void {
  if (!canTransition(from, to)) {
    throw new RelayInvariantViolation(`Illegal state transition ${from} -> ${to}`)
  }
}
