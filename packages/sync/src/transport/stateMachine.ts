/**
 * The transport session's connection lifecycle as a pure state machine.
 *
 * `transitionTable` lists every accepted (status, input) pair and the status
 * it leads to; inputs missing from a row are ignored in that status.
 * `transition` applies the table and carries the retry bookkeeping
 * (attempt counter, error reason) into the next state.
 */

import type { ConnectionStatus, TransportState } from '../core/types.js'

export type TransportInput =
  /** Caller asked to connect. */
  | { readonly type: 'connect' }
  /** Server acknowledged the join. */
  | { readonly type: 'start' }
  /** Server refused the join. Not retried. */
  | { readonly type: 'abort'; readonly reason: string }
  /** Negotiation failed (socket error, refresh unreachable). Retried. */
  | { readonly type: 'fail'; readonly reason: string }
  /** The socket closed without being asked to. */
  | { readonly type: 'close' }
  /** A scheduled back-off delay elapsed. */
  | { readonly type: 'retry' }
  /** Reopen immediately, e.g. with a refreshed token. */
  | { readonly type: 'reconnect' }
  /** Caller closed the session. */
  | { readonly type: 'disconnect' }
  /** The auth session expired; nothing more will be attempted. */
  | { readonly type: 'expire' }

export type TransportInputType = TransportInput['type']

export const transitionTable = {
  disconnected: {
    connect: 'connecting',
    retry: 'connecting',
    reconnect: 'connecting',
    abort: 'errored',
    disconnect: 'disconnected',
    expire: 'disconnected',
  },
  connecting: {
    start: 'connected',
    abort: 'errored',
    fail: 'errored',
    close: 'errored',
    reconnect: 'connecting',
    disconnect: 'disconnected',
    expire: 'disconnected',
  },
  connected: {
    abort: 'errored',
    fail: 'errored',
    close: 'disconnected',
    reconnect: 'connecting',
    disconnect: 'disconnected',
    expire: 'disconnected',
  },
  errored: {
    connect: 'connecting',
    retry: 'connecting',
    reconnect: 'connecting',
    abort: 'errored',
    disconnect: 'disconnected',
    expire: 'disconnected',
  },
} as const satisfies Record<
  ConnectionStatus,
  Partial<Record<TransportInputType, ConnectionStatus>>
>

export const initialTransportState: TransportState = {
  status: 'disconnected',
  attempt: 0,
}

function attemptOf(state: TransportState): number {
  return state.status === 'connected' ? 0 : state.attempt
}

/** Whether the state is waiting for a back-off retry. */
export function isRetryPending(state: TransportState): boolean {
  switch (state.status) {
    case 'disconnected':
      return state.attempt > 0
    case 'errored':
      return state.retryable
    default:
      return false
  }
}

export function transition(
  state: TransportState,
  input: TransportInput,
): TransportState {
  const row: Partial<Record<TransportInputType, ConnectionStatus>> =
    transitionTable[state.status]
  const target = row[input.type]
  if (target === undefined) return state

  // Retries and token-driven reconnects only apply while a retry is pending;
  // an explicit disconnect stays closed.
  if (input.type === 'retry' && !isRetryPending(state)) return state
  if (
    input.type === 'reconnect' &&
    state.status === 'disconnected' &&
    state.attempt === 0
  ) {
    return state
  }

  switch (target) {
    case 'connected':
      return { status: 'connected' }

    case 'connecting':
      return {
        status: 'connecting',
        attempt:
          input.type === 'retry' ? attemptOf(state) : 0,
      }

    case 'disconnected':
      // An unexpected close schedules the first reconnect attempt.
      return { status: 'disconnected', attempt: input.type === 'close' ? 1 : 0 }

    case 'errored': {
      if (input.type === 'abort') {
        return { status: 'errored', reason: input.reason, retryable: false, attempt: 0 }
      }
      return {
        status: 'errored',
        reason: input.type === 'fail' ? input.reason : 'closed before start',
        retryable: true,
        attempt: attemptOf(state) + 1,
      }
    }
  }
}
