import { Store } from '@tanstack/store'
import type {
  Session,
  SocketFactory,
  SocketLike,
  SyncLogger,
  TransportState,
} from '../core/types.js'
import { SOCKET_OPEN } from '../core/types.js'
import { AuthError, SessionExpiredError, TransportError } from '../core/errors.js'
import { resolveLogger, safeInvoke } from '../core/logger.js'
import { computeBackoff } from './backoff.js'
import type { BackoffOptions } from './backoff.js'
import { decodeFrame, encodeFrame } from './frames.js'
import type { InboundFrame, OutboundFrame } from './frames.js'
import {
  initialTransportState,
  isRetryPending,
  transition,
} from './stateMachine.js'
import type { TransportInput } from './stateMachine.js'

// ---------------------------------------------------------------------------
// Auth collaborator
// ---------------------------------------------------------------------------

export type RefreshResult =
  | { readonly ok: true; readonly token: string }
  | { readonly ok: false; readonly reason: 'expired' }

/**
 * The auth/session service. `refresh` resolves with a new token, or with
 * `{ ok: false, reason: 'expired' }` when the underlying session is gone.
 * A rejected promise means the service could not be reached.
 */
export interface AuthService {
  refresh(token: string): Promise<RefreshResult>
}

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface TransportSessionOptions extends BackoffOptions {
  /** Socket endpoint, e.g. `"wss://chat.example.com/socket"`. */
  url: string
  /** Token sent with every `join`. */
  token: string
  auth: AuthService
  /** Creates the underlying socket. See `@huddle/sync-preset-node`. */
  createSocket: SocketFactory
  /** Sent with `join`; the server aborts joins from incompatible clients. @default '1' */
  protocolVersion?: string
  /** Randomness for back-off jitter. @default Math.random */
  random?: () => number
  /**
   * How long a joined connection must go without an auth error before the
   * next token refresh rejoins immediately again, in ms. Until then rejoins
   * after a refresh wait out the back-off delay.
   * @default 10000
   */
  stableAfter?: number
  logger?: SyncLogger
}

export interface TransportSession {
  /** TanStack Store holding the connection state machine's current state. */
  readonly store: Store<TransportState>

  /** TanStack Store holding the auth session (current token, refresh/expiry flags). */
  readonly sessionStore: Store<Session>

  /**
   * Open the connection. Resolves once the server acknowledges the join.
   * While a connect or back-off cycle is already running, returns a Promise
   * that settles with it instead of opening a second socket.
   *
   * Rejects with {@link SessionExpiredError} once the session has expired and
   * with {@link TransportError} when the join is aborted or `disconnect()` is
   * called first.
   */
  connect(): Promise<void>

  /** Close the connection. No reconnect is attempted until `connect()`. */
  disconnect(): void

  /**
   * Receive `result` payloads for `topic`. The server is told about the topic
   * when it gains its first listener, and again after every reconnect.
   */
  subscribe(topic: string, onResult: (payload: unknown) => void): () => void

  /** Receive `presence` payloads for `topic`. Counts as interest in the topic. */
  onPresence(topic: string, onPayload: (payload: unknown) => void): () => void

  /** Ask the server for the full presence state of `topic`. */
  requestPresence(topic: string): void

  /** Called with each refreshed token, e.g. to persist it for the next page load. */
  onTokenRefreshed(callback: (token: string) => void): () => void

  /** Called exactly once, when the session expires. */
  onSessionExpired(callback: (error: SessionExpiredError) => void): () => void
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

type Listeners<T> = Map<string, Set<(value: T) => void>>

function addListener<T>(map: Listeners<T>, key: string, cb: (value: T) => void): Set<(value: T) => void> {
  let set = map.get(key)
  if (!set) {
    set = new Set()
    map.set(key, set)
  }
  set.add(cb)
  return set
}

/**
 * Creates the transport session: owns the socket, the `join` handshake, topic
 * subscriptions, back-off reconnects and the token refresh cycle.
 *
 * On an `error` frame the socket is kept and the token is refreshed through
 * `auth`. A new token is announced via `onTokenRefreshed` and the session
 * rejoins with it; an expired session is announced once via
 * `onSessionExpired` and nothing is retried after that.
 *
 * @example
 * const session = createTransportSession({
 *   url: 'wss://chat.example.com/socket',
 *   token: bootstrap.token,
 *   auth: { refresh: (token) => api.refreshToken(token) },
 *   createSocket: nodeSocket(),
 * })
 * session.onSessionExpired(() => redirectToSignIn())
 * await session.connect()
 */
export function createTransportSession(
  options: TransportSessionOptions,
): TransportSession {
  const {
    url,
    auth,
    createSocket,
    protocolVersion = '1',
    random = Math.random,
    stableAfter = 10_000,
    initialDelay,
    maxDelay,
    jitter,
  } = options
  const logger = resolveLogger(options.logger)

  const store = new Store<TransportState>(initialTransportState)
  const sessionStore = new Store<Session>({
    token: options.token,
    needsRefresh: false,
    expired: false,
  })

  const resultListeners: Listeners<unknown> = new Map()
  const presenceListeners: Listeners<unknown> = new Map()
  const refreshedListeners = new Set<(token: string) => void>()
  const expiredListeners = new Set<(error: SessionExpiredError) => void>()

  let socket: SocketLike | null = null
  let retryTimer: ReturnType<typeof setTimeout> | null = null
  let refreshing = false
  /** Token refreshes since the last connection that stayed up for `stableAfter`. */
  let authRetries = 0
  let stableTimer: ReturnType<typeof setTimeout> | null = null

  // --------------------------------------------------------------------------
  // State machine plumbing
  // --------------------------------------------------------------------------

  function dispatch(input: TransportInput): TransportState {
    const prev = store.state
    const next = transition(prev, input)
    if (next !== prev) {
      store.setState(() => next)
      logger.debug(`[sync:session] ${prev.status} -(${input.type})-> ${next.status}`)
    }
    if (isRetryPending(next)) scheduleRetry(next)
    return next
  }

  function scheduleRetry(state: TransportState): void {
    if (retryTimer !== null) return
    const attempt = Math.max(1, state.status === 'connected' ? 1 : state.attempt, authRetries - 1)
    const delay = computeBackoff(attempt, { initialDelay, maxDelay, jitter }, random)
    retryTimer = setTimeout(() => {
      retryTimer = null
      if (sessionStore.state.expired) return
      if (dispatch({ type: 'retry' }).status === 'connecting') openSocket()
    }, delay)
  }

  function cancelRetry(): void {
    if (retryTimer !== null) {
      clearTimeout(retryTimer)
      retryTimer = null
    }
  }

  function cancelStable(): void {
    if (stableTimer !== null) {
      clearTimeout(stableTimer)
      stableTimer = null
    }
  }

  function markStableLater(): void {
    cancelStable()
    stableTimer = setTimeout(() => {
      stableTimer = null
      authRetries = 0
    }, stableAfter)
  }

  // --------------------------------------------------------------------------
  // Socket
  // --------------------------------------------------------------------------

  function send(frame: OutboundFrame): void {
    if (socket?.readyState === SOCKET_OPEN) {
      socket.send(encodeFrame(frame))
    }
  }

  function interested(topic: string): boolean {
    return (
      (resultListeners.get(topic)?.size ?? 0) > 0 ||
      (presenceListeners.get(topic)?.size ?? 0) > 0
    )
  }

  function topics(): Set<string> {
    const all = new Set<string>()
    for (const [topic, set] of resultListeners) if (set.size > 0) all.add(topic)
    for (const [topic, set] of presenceListeners) if (set.size > 0) all.add(topic)
    return all
  }

  function resubscribeAll(): void {
    for (const topic of topics()) {
      send({ type: 'subscribe', topic })
    }
    // Presence may have changed while we were away; ask for full state.
    for (const [topic, set] of presenceListeners) {
      if (set.size > 0) send({ type: 'presence:request', topic })
    }
  }

  /** Detach and close the current socket; its late events are ignored. */
  function dropSocket(): void {
    cancelStable()
    const old = socket
    socket = null
    old?.close()
  }

  function openSocket(): void {
    dropSocket()
    let ws: SocketLike
    try {
      ws = createSocket(url)
    } catch (err) {
      logger.error('[sync:session] could not create socket', err)
      dispatch({ type: 'fail', reason: err instanceof Error ? err.message : String(err) })
      return
    }
    socket = ws

    ws.addEventListener('open', () => {
      if (socket !== ws) return
      send({ type: 'join', token: sessionStore.state.token, protocolVersion })
    })

    ws.addEventListener('close', () => {
      if (socket !== ws) return
      socket = null
      cancelStable()
      if (store.state.status === 'connected') {
        dispatch({ type: 'close' })
      } else {
        dispatch({ type: 'fail', reason: 'socket closed before start' })
      }
    })

    ws.addEventListener('error', () => {
      // 'close' always follows 'error'; recovery lives there.
    })

    ws.addEventListener('message', (event) => {
      if (socket !== ws) return
      handleFrame(decodeFrame(event.data))
    })
  }

  function handleFrame(frame: InboundFrame): void {
    switch (frame.kind) {
      case 'start':
        dispatch({ type: 'start' })
        markStableLater()
        resubscribeAll()
        break

      case 'abort':
        logger.warn(`[sync:session] join aborted: ${frame.reason}`)
        cancelRetry()
        dropSocket()
        dispatch({ type: 'abort', reason: frame.reason })
        break

      case 'error':
        cancelStable()
        logger.info('[sync:session] auth error', new AuthError(`[sync:session] ${frame.reason}`))
        void refreshToken()
        break

      case 'result': {
        const set = resultListeners.get(frame.topic)
        if (set) {
          for (const cb of set) safeInvoke(logger, '[sync:session]', cb, frame.payload)
        }
        break
      }

      case 'presence': {
        const set = presenceListeners.get(frame.topic)
        if (set) {
          for (const cb of set) safeInvoke(logger, '[sync:session]', cb, frame.payload)
        }
        break
      }

      case 'unknown':
        logger.debug('[sync:session] ignoring unrecognised frame', frame.raw)
        break
    }
  }

  // --------------------------------------------------------------------------
  // Token lifecycle
  // --------------------------------------------------------------------------

  async function refreshToken(): Promise<void> {
    if (refreshing || sessionStore.state.expired) return
    refreshing = true
    authRetries++
    sessionStore.setState((s) => ({ ...s, needsRefresh: true }))

    let result: RefreshResult
    try {
      result = await auth.refresh(sessionStore.state.token)
    } catch (err) {
      refreshing = false
      sessionStore.setState((s) => ({ ...s, needsRefresh: false }))
      logger.warn('[sync:session] token refresh failed', err)
      if (store.state.status === 'disconnected' && store.state.attempt === 0) return
      dropSocket()
      dispatch({ type: 'fail', reason: 'token refresh failed' })
      return
    }
    refreshing = false

    if (!result.ok) {
      expire()
      return
    }

    const { token } = result
    sessionStore.setState(() => ({ token, needsRefresh: false, expired: false }))
    for (const cb of refreshedListeners) {
      safeInvoke(logger, '[sync:session]', cb, token)
    }

    // disconnect() while the refresh was in flight: keep the token, stay closed.
    if (store.state.status === 'disconnected' && store.state.attempt === 0) return

    if (authRetries > 1) {
      // The server keeps rejecting fresh tokens; rejoin on the back-off schedule.
      dropSocket()
      dispatch({ type: 'fail', reason: 'rejected after token refresh' })
      return
    }
    cancelRetry()
    if (dispatch({ type: 'reconnect' }).status === 'connecting') openSocket()
  }

  function expire(): void {
    if (sessionStore.state.expired) return
    sessionStore.setState((s) => ({ ...s, needsRefresh: false, expired: true }))
    cancelRetry()
    dropSocket()
    dispatch({ type: 'expire' })
    const error = new SessionExpiredError()
    logger.warn('[sync:session] session expired')
    for (const cb of expiredListeners) safeInvoke(logger, '[sync:session]', cb, error)
  }

  // --------------------------------------------------------------------------
  // Connection promise
  // --------------------------------------------------------------------------

  function settledError(state: TransportState): Error | null {
    if (sessionStore.state.expired) return new SessionExpiredError()
    if (state.status === 'disconnected' && state.attempt === 0) {
      return new TransportError('[sync:session] Connection closed')
    }
    if (state.status === 'errored' && !state.retryable) {
      return new TransportError(`[sync:session] Join aborted: ${state.reason}`)
    }
    return null
  }

  function awaitConnection(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const sub = store.subscribe((state) => {
        if (state.status === 'connected') {
          sub.unsubscribe()
          resolve()
          return
        }
        const error = settledError(state)
        if (error) {
          sub.unsubscribe()
          reject(error)
        }
      })
    })
  }

  // --------------------------------------------------------------------------
  // Public interface
  // --------------------------------------------------------------------------

  return {
    store,
    sessionStore,

    async connect() {
      if (sessionStore.state.expired) throw new SessionExpiredError()

      const current = store.state
      if (current.status === 'connected') return
      if (current.status === 'connecting' || isRetryPending(current)) {
        return awaitConnection()
      }

      if (dispatch({ type: 'connect' }).status === 'connecting') openSocket()
      return awaitConnection()
    },

    disconnect() {
      cancelRetry()
      authRetries = 0
      dropSocket()
      dispatch({ type: 'disconnect' })
    },

    subscribe(topic, onResult) {
      const isNew = !interested(topic)
      const set = addListener(resultListeners, topic, onResult)
      if (isNew && store.state.status === 'connected') {
        send({ type: 'subscribe', topic })
      }

      return () => {
        set.delete(onResult)
        if (set.size === 0 && resultListeners.get(topic) === set) {
          resultListeners.delete(topic)
        }
        if (!interested(topic) && store.state.status === 'connected') {
          send({ type: 'unsubscribe', topic })
        }
      }
    },

    onPresence(topic, onPayload) {
      const isNew = !interested(topic)
      const set = addListener(presenceListeners, topic, onPayload)
      if (isNew && store.state.status === 'connected') {
        send({ type: 'subscribe', topic })
      }

      return () => {
        set.delete(onPayload)
        if (set.size === 0 && presenceListeners.get(topic) === set) {
          presenceListeners.delete(topic)
        }
        if (!interested(topic) && store.state.status === 'connected') {
          send({ type: 'unsubscribe', topic })
        }
      }
    },

    requestPresence(topic) {
      if (store.state.status === 'connected') {
        send({ type: 'presence:request', topic })
      }
    },

    onTokenRefreshed(callback) {
      refreshedListeners.add(callback)
      return () => {
        refreshedListeners.delete(callback)
      }
    },

    onSessionExpired(callback) {
      expiredListeners.add(callback)
      return () => {
        expiredListeners.delete(callback)
      }
    },
  }
}
