import type { Store } from '@tanstack/store'

// ---------------------------------------------------------------------------
// Logging
// ---------------------------------------------------------------------------

/**
 * Minimal logging surface used by every component. Defaults to `console`;
 * pass a custom implementation to route or silence diagnostics.
 */
export interface SyncLogger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
}

// ---------------------------------------------------------------------------
// Connection state
// ---------------------------------------------------------------------------

/**
 * Connection status of the transport session.
 *
 * - `'disconnected'`: no socket. Either `connect()` was never called, the
 *   session was closed explicitly, or the socket dropped and a reconnect is
 *   scheduled.
 * - `'connecting'`: a socket is open or opening and the `join` handshake
 *   has not been acknowledged yet.
 * - `'connected'`: the server acknowledged the join with `start`.
 * - `'errored'`: negotiation failed. When `retryable` is true a reconnect
 *   is scheduled with back-off; otherwise the session stays here until
 *   `connect()` is called again.
 */
export type ConnectionStatus =
  | 'disconnected'
  | 'connecting'
  | 'connected'
  | 'errored'

export type TransportState =
  | { readonly status: 'disconnected'; readonly attempt: number }
  | { readonly status: 'connecting'; readonly attempt: number }
  | { readonly status: 'connected' }
  | {
      readonly status: 'errored'
      readonly reason: string
      readonly retryable: boolean
      readonly attempt: number
    }

/** Auth session state. Owned by the transport session, mirrored by the shell. */
export interface Session {
  readonly token: string
  /** Set while a token refresh is in flight. */
  readonly needsRefresh: boolean
  /** Terminal: the server-side session is gone and the user must sign in again. */
  readonly expired: boolean
}

// ---------------------------------------------------------------------------
// Socket abstraction
// ---------------------------------------------------------------------------

export interface SocketMessageEvent {
  readonly data: unknown
}

/**
 * The subset of the WHATWG `WebSocket` API the session relies on. Both the
 * browser `WebSocket` and the `ws` package satisfy it.
 */
export interface SocketLike {
  readonly readyState: number
  send(data: string): void
  close(code?: number, reason?: string): void
  addEventListener(type: 'open', listener: () => void): void
  addEventListener(type: 'close', listener: () => void): void
  addEventListener(type: 'error', listener: () => void): void
  addEventListener(
    type: 'message',
    listener: (event: SocketMessageEvent) => void,
  ): void
}

/** Same value as `WebSocket.OPEN`. */
export const SOCKET_OPEN = 1

export type SocketFactory = (url: string) => SocketLike

// ---------------------------------------------------------------------------
// Observable state helpers
// ---------------------------------------------------------------------------

/** Anything exposing a TanStack Store. */
export interface HasStore<T> {
  readonly store: Store<T>
}
