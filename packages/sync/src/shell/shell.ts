import { Store } from '@tanstack/store'
import type { ConnectionStatus, Session, SyncLogger, TransportState } from '../core/types.js'
import type { SessionExpiredError } from '../core/errors.js'
import { resolveLogger, safeInvoke } from '../core/logger.js'
import { createEntityCache } from '../cache/entityCache.js'
import type { EntityCache } from '../cache/entityCache.js'
import { createPresenceTracker } from '../presence/presenceTracker.js'
import type { PresenceTracker, PresentActor } from '../presence/presenceTracker.js'
import type { TransportSession } from '../transport/session.js'
import { createEventDispatcher } from '../events/dispatcher.js'
import type { EventDispatcher } from '../events/dispatcher.js'
import { createGenerationGuard } from './generation.js'
import type { GenerationGuard } from './generation.js'
import { pushSubscriptionSchema } from './types.js'
import type {
  PushService,
  PushSubscriptionDescriptor,
  QueryResult,
  QueryService,
  RequestOutcome,
  ViewContext,
  ViewController,
} from './types.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SyncShellOptions {
  session: TransportSession
  queries: QueryService
  /** @default a new empty cache */
  cache?: EntityCache
  /** @default a new tracker */
  presence?: PresenceTracker
  /** Without one, `registerPush` resolves `false`. */
  push?: PushService
  /**
   * Topics whose events the shell receives for its whole lifetime, e.g. the
   * signed-in user's own topic and the current space's.
   */
  topics?: ReadonlyArray<string>
  /** Called with each refreshed token so the next page load can reuse it. */
  persistToken?: (token: string) => void
  /** Called once when the session can no longer be refreshed. */
  onSessionExpired?: (error: SessionExpiredError) => void
  logger?: SyncLogger
}

export interface ShellState {
  readonly status: ConnectionStatus
  /** Copy of the transport session's auth state. */
  readonly session: Session
  readonly generation: number
  /** Name of the mounted view. */
  readonly activeView: string | null
}

export interface SyncShell {
  /** TanStack Store holding connection status, session copy and the active view. */
  readonly store: Store<ShellState>
  readonly cache: EntityCache
  readonly presence: PresenceTracker
  readonly session: TransportSession
  readonly dispatcher: EventDispatcher
  readonly generation: GenerationGuard

  /**
   * Subscribe the configured topics and connect. Rejects like
   * {@link TransportSession.connect}.
   */
  start(): Promise<void>

  /** Unmount the view, drop topic subscriptions and close the connection. */
  stop(): void

  /**
   * Replace the active view. Advances the generation, so responses and events
   * addressed to the previous view are no longer delivered. Resolves once the
   * view's `onMount` has settled; a failing `onMount` is logged.
   */
  mount(view: ViewController): Promise<void>

  unmount(): void

  activeView(): ViewController | null

  /**
   * Run a query operation. Entity snapshots in a successful response are
   * merged into the cache in every case; the view-level result is `stale`
   * when `generation` is no longer current by the time it completes.
   */
  request<T>(
    operation: () => Promise<QueryResult<T>>,
    generation?: number,
  ): Promise<RequestOutcome<T>>

  /**
   * Track presence on `topic`. Requests a fresh snapshot from the server.
   * Returns a function that stops tracking.
   */
  watchPresence(
    topic: string,
    callback: (actors: ReadonlyArray<PresentActor>) => void,
  ): () => void

  /**
   * Send a push subscription to the server. Invalid descriptors and
   * endpoints already registered by this shell are not sent. Never rejects.
   */
  registerPush(descriptor: unknown): Promise<boolean>
}

interface InboxItem {
  readonly payload: unknown
  readonly generation: number
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Create the application shell: the single owner of the entity cache, the
 * presence tracker and the transport session, and the host of one view at a
 * time.
 *
 * Inbound events are queued as they arrive, stamped with the view generation
 * current at that moment, and drained in order on a microtask.
 *
 * @example
 * const shell = createSyncShell({
 *   session,
 *   queries,
 *   topics: [topicFor('user', me.id), topicFor('space', space.id)],
 *   persistToken: (token) => localStorage.setItem('token', token),
 *   onSessionExpired: () => location.assign('/login'),
 * })
 * await shell.start()
 * await shell.mount(createPostView({ postId }))
 */
export function createSyncShell(options: SyncShellOptions): SyncShell {
  const { session, queries, push, topics = [], persistToken, onSessionExpired } = options
  const logger = resolveLogger(options.logger)
  const cache = options.cache ?? createEntityCache({ logger })
  const presence = options.presence ?? createPresenceTracker({ logger })
  const generation = createGenerationGuard()

  let view: ViewController | null = null
  let viewContext: ViewContext | null = null
  let viewCleanups: Array<() => void> = []
  let topicCleanups: Array<() => void> = []
  let started = false

  const dispatcher = createEventDispatcher({
    cache,
    generation,
    activeView: () => view,
    logger,
  })

  const store = new Store<ShellState>({
    status: session.store.state.status,
    session: session.sessionStore.state,
    generation: generation.current(),
    activeView: null,
  })

  // --------------------------------------------------------------------------
  // Inbox
  // --------------------------------------------------------------------------

  const inbox: InboxItem[] = []
  let drainScheduled = false

  function enqueue(payload: unknown): void {
    inbox.push({ payload, generation: generation.current() })
    if (drainScheduled) return
    drainScheduled = true
    queueMicrotask(drain)
  }

  function drain(): void {
    drainScheduled = false
    let item = inbox.shift()
    while (item !== undefined) {
      dispatcher.dispatch(item.payload, item.generation)
      item = inbox.shift()
    }
  }

  // --------------------------------------------------------------------------
  // View hooks
  // --------------------------------------------------------------------------

  async function runHook(label: string, hook: () => unknown): Promise<void> {
    try {
      await hook()
    } catch (err) {
      logger.error(`[sync:shell] ${label} failed`, err)
    }
  }

  function teardownView(): void {
    const previous = view
    const cleanups = viewCleanups
    view = null
    viewContext = null
    viewCleanups = []
    for (const cleanup of cleanups) cleanup()
    if (previous?.onUnmount) {
      safeInvoke(logger, '[sync:shell]', () => previous.onUnmount?.())
    }
  }

  // --------------------------------------------------------------------------
  // Session mirrors
  // --------------------------------------------------------------------------

  let everConnected = false
  let interrupted = false

  function onTransportState(state: TransportState): void {
    store.setState((s) => ({ ...s, status: state.status }))

    if (state.status !== 'connected') {
      if (everConnected) interrupted = true
      return
    }
    everConnected = true
    if (!interrupted) return
    interrupted = false

    const current = view
    const ctx = viewContext
    if (current?.onReconnect && ctx) {
      logger.info(`[sync:shell] connection recovered, refreshing ${current.name}`)
      void runHook(`${current.name} reconnect`, () => current.onReconnect?.(ctx))
    }
  }

  session.store.subscribe((state) => onTransportState(state))
  session.sessionStore.subscribe((next) => {
    store.setState((s) => ({ ...s, session: next }))
  })

  session.onTokenRefreshed((token) => {
    if (persistToken) safeInvoke(logger, '[sync:shell]', persistToken, token)
  })

  session.onSessionExpired((error) => {
    inbox.length = 0
    if (onSessionExpired) safeInvoke(logger, '[sync:shell]', onSessionExpired, error)
  })

  // --------------------------------------------------------------------------
  // Operations
  // --------------------------------------------------------------------------

  async function request<T>(
    operation: () => Promise<QueryResult<T>>,
    issuedUnder = generation.current(),
  ): Promise<RequestOutcome<T>> {
    let result: QueryResult<T>
    try {
      result = await operation()
    } catch (err) {
      logger.warn('[sync:shell] request failed', err)
      result = {
        ok: false,
        error: {
          kind: 'Transport',
          message: err instanceof Error ? err.message : String(err),
        },
      }
    }

    if (result.ok) cache.putBatch(result.snapshot.entities)

    if (!generation.isCurrent(issuedUnder)) {
      logger.debug(`[sync:shell] discarding response for generation ${issuedUnder}`)
      return { status: 'stale' }
    }
    if (!result.ok) return { status: 'error', error: result.error }
    return { status: 'ok', data: result.snapshot.data }
  }

  // One feed per topic feeds the tracker; watchers only add callbacks.
  const presenceFeeds = new Map<string, { off: () => void; watchers: number }>()

  function watchPresence(
    topic: string,
    callback: (actors: ReadonlyArray<PresentActor>) => void,
  ): () => void {
    const offTracker = presence.subscribe(topic, callback)
    let feed = presenceFeeds.get(topic)
    if (!feed) {
      feed = {
        off: session.onPresence(topic, (raw) => {
          presence.receive(topic, raw)
        }),
        watchers: 0,
      }
      presenceFeeds.set(topic, feed)
    }
    feed.watchers++
    const ownFeed = feed
    session.requestPresence(topic)

    let stopped = false
    return () => {
      if (stopped) return
      stopped = true
      ownFeed.watchers--
      if (ownFeed.watchers === 0 && presenceFeeds.get(topic) === ownFeed) {
        presenceFeeds.delete(topic)
        ownFeed.off()
      }
      offTracker()
    }
  }

  const registered = new Set<string>()
  const pendingRegistrations = new Map<string, Promise<boolean>>()

  async function sendRegistration(
    service: PushService,
    descriptor: PushSubscriptionDescriptor,
  ): Promise<boolean> {
    try {
      const ok = await service.register(descriptor)
      if (ok) registered.add(descriptor.endpoint)
      else logger.warn('[sync:shell] push subscription was not accepted')
      return ok
    } catch (err) {
      logger.warn('[sync:shell] push registration failed', err)
      return false
    }
  }

  return {
    store,
    cache,
    presence,
    session,
    dispatcher,
    generation,

    start() {
      if (!started) {
        started = true
        topicCleanups = topics.map((topic) => session.subscribe(topic, enqueue))
      }
      return session.connect()
    },

    stop() {
      teardownView()
      const next = generation.advance()
      for (const cleanup of topicCleanups) cleanup()
      topicCleanups = []
      started = false
      inbox.length = 0
      session.disconnect()
      store.setState((s) => ({ ...s, generation: next, activeView: null }))
    },

    async mount(next) {
      teardownView()
      const mountedUnder = generation.advance()
      const cleanups: Array<() => void> = []
      view = next
      viewCleanups = cleanups

      const ctx: ViewContext = {
        generation: mountedUnder,
        cache,
        queries,
        logger,
        request: (operation) => request(operation, mountedUnder),
        listen(topic) {
          if (!generation.isCurrent(mountedUnder)) return
          cleanups.push(session.subscribe(topic, enqueue))
        },
        watchPresence(topic, callback) {
          if (!generation.isCurrent(mountedUnder)) return
          cleanups.push(watchPresence(topic, callback))
        },
      }
      viewContext = ctx
      store.setState((s) => ({ ...s, generation: mountedUnder, activeView: next.name }))

      if (next.onMount) {
        await runHook(`${next.name} mount`, () => next.onMount?.(ctx))
      }
    },

    unmount() {
      teardownView()
      const next = generation.advance()
      store.setState((s) => ({ ...s, generation: next, activeView: null }))
    },

    activeView() {
      return view
    },

    request,
    watchPresence,

    async registerPush(descriptor) {
      if (!push) {
        logger.debug('[sync:shell] no push service configured')
        return false
      }
      const parsed = pushSubscriptionSchema.safeParse(descriptor)
      if (!parsed.success) {
        logger.warn('[sync:shell] invalid push subscription', parsed.error.issues[0]?.message)
        return false
      }
      const { endpoint } = parsed.data
      if (registered.has(endpoint)) return true

      const pending = pendingRegistrations.get(endpoint)
      if (pending) return pending

      const registration = sendRegistration(push, parsed.data)
      pendingRegistrations.set(endpoint, registration)
      void registration.then(() => {
        pendingRegistrations.delete(endpoint)
      })
      return registration
    },
  }
}
