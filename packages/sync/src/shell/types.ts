import { z } from 'zod'
import type { EntityBatch, Post, Reply } from '../cache/entities.js'
import type { EntityCache } from '../cache/entityCache.js'
import type { PageArgs } from '../pagination/connection.js'
import type { PresentActor } from '../presence/presenceTracker.js'
import type { SyncLogger } from '../core/types.js'
import type { EventSink } from '../events/dispatcher.js'

// ---------------------------------------------------------------------------
// Query operations
// ---------------------------------------------------------------------------

export type QueryErrorKind = 'NotFound' | 'Unauthorized' | 'Expired' | 'Transport'

export interface QueryError {
  readonly kind: QueryErrorKind
  readonly message: string
}

/**
 * What a query operation returns on success: the view-level `data` and every
 * entity snapshot the response carried, to be merged into the cache.
 */
export interface QuerySnapshot<T> {
  readonly data: T
  readonly entities: EntityBatch
}

export type QueryResult<T> =
  | { readonly ok: true; readonly snapshot: QuerySnapshot<T> }
  | { readonly ok: false; readonly error: QueryError }

/** A window of nodes as reported by the server, with its page flags. */
export interface PageWindow<T> {
  readonly nodes: ReadonlyArray<T>
  readonly hasPreviousPage: boolean
  readonly hasNextPage: boolean
}

/**
 * Request/response operations backed by the server. Implementations never
 * throw for expected failures; they resolve with `{ ok: false, error }`.
 * A rejected promise is treated as a `Transport` error.
 */
export interface QueryService {
  /** Posts of a space, newest first. */
  feed(spaceId: string, args: PageArgs): Promise<QueryResult<PageWindow<Post>>>
  post(postId: string): Promise<QueryResult<Post>>
  /** Replies of a post, oldest first. */
  replies(postId: string, args: PageArgs): Promise<QueryResult<PageWindow<Reply>>>
}

/** Result of a request issued through the shell. */
export type RequestOutcome<T> =
  | { readonly status: 'ok'; readonly data: T }
  | { readonly status: 'error'; readonly error: QueryError }
  /** The view that issued the request is gone; the result was discarded. */
  | { readonly status: 'stale' }

// ---------------------------------------------------------------------------
// Push notifications
// ---------------------------------------------------------------------------

export const pushSubscriptionSchema = z.object({
  endpoint: z.string().url(),
  keys: z.object({
    p256dh: z.string().min(1),
    auth: z.string().min(1),
  }),
  expirationTime: z.number().nullable().optional(),
})

/** The JSON form of a browser `PushSubscription`. */
export type PushSubscriptionDescriptor = z.infer<typeof pushSubscriptionSchema>

export interface PushService {
  /** Resolves `true` when the server stored the subscription. */
  register(descriptor: PushSubscriptionDescriptor): Promise<boolean>
}

// ---------------------------------------------------------------------------
// Views
// ---------------------------------------------------------------------------

/** Handed to a view while it is mounted. Bound to the view's generation. */
export interface ViewContext {
  readonly generation: number
  readonly cache: EntityCache
  readonly queries: QueryService
  readonly logger: SyncLogger

  /** Run a query; the outcome is `stale` once this view has been unmounted. */
  request<T>(operation: () => Promise<QueryResult<T>>): Promise<RequestOutcome<T>>

  /**
   * Receive events published on `topic` for as long as the view is mounted.
   * Events still go through the canonical merge before reaching the view.
   */
  listen(topic: string): void

  /**
   * Track presence on `topic` for as long as the view is mounted. A fresh
   * snapshot is requested from the server every time the watch starts.
   */
  watchPresence(
    topic: string,
    callback: (actors: ReadonlyArray<PresentActor>) => void,
  ): void
}

/**
 * A page-level view. Views own query-shaped state (ordered lists, loaded
 * pages) and react to events after the shell has merged them into the cache.
 */
export interface ViewController extends EventSink {
  readonly name: string
  onMount?(ctx: ViewContext): void | Promise<void>
  onUnmount?(): void
  /**
   * Called after the connection recovers from an interruption, so the view
   * can refetch what it may have missed.
   */
  onReconnect?(ctx: ViewContext): void | Promise<void>
}
