/**
 * Event dispatcher: turns inbound event payloads into cache writes and view
 * updates.
 *
 * Each event is applied in two stages:
 *
 * 1. **Canonical merge.** Snapshots carried by the event are written to the
 *    entity cache. This happens for every decoded event regardless of which
 *    view is showing. "Removal" events (unbookmark, unsubscribe, dismiss)
 *    carry the updated snapshot and are merged like any other update;
 *    nothing is ever evicted from the cache.
 * 2. **View notification.** The event is then handed to the active view,
 *    which owns query-shaped state the cache cannot express (ordered reply
 *    lists, expanded threads). Delivery is skipped when the view generation
 *    the event was received under is no longer current.
 *
 * Undecodable payloads become `unknown` events and are ignored by both
 * stages.
 */

import type { SyncLogger } from '../core/types.js'
import { resolveLogger } from '../core/logger.js'
import type { EntityCache, EntityCacheState } from '../cache/entityCache.js'
import type { SpaceUser, User } from '../cache/entities.js'
import type { GenerationGuard } from '../shell/generation.js'
import { decodeEvent } from './events.js'
import type { KnownSyncEvent, SyncEvent } from './events.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** The part of a view the dispatcher talks to. */
export interface EventSink {
  handleEvent?(event: KnownSyncEvent): void
}

export interface DispatchResult {
  readonly event: SyncEvent
  /** Whether the canonical merge changed the cache. */
  readonly merged: boolean
  /** Whether the event reached a view. */
  readonly delivered: boolean
}

export interface EventDispatcherOptions {
  cache: EntityCache
  generation: GenerationGuard
  /** Returns the view currently mounted, if any. */
  activeView: () => EventSink | null
  logger?: SyncLogger
}

export interface EventDispatcher {
  /**
   * Decode and apply one payload.
   *
   * @param generation - The view generation current when the frame arrived.
   *   Defaults to the generation current now.
   */
  dispatch(raw: unknown, generation?: number): DispatchResult

  /** Apply an already decoded event. */
  apply(event: SyncEvent, generation?: number): DispatchResult
}

// ---------------------------------------------------------------------------
// Canonical merge
// ---------------------------------------------------------------------------

/** Copy a user's profile fields onto one of their space memberships. */
function mirrorProfile(spaceUser: SpaceUser, user: User): SpaceUser {
  return {
    ...spaceUser,
    firstName: user.firstName,
    lastName: user.lastName,
    handle: user.handle,
    avatarUrl: user.avatarUrl,
  }
}

/**
 * Write the snapshots an event carries into the cache. Returns the cache
 * state after the merge.
 */
export function mergeEvent(cache: EntityCache, event: KnownSyncEvent): EntityCacheState {
  switch (event.type) {
    case 'group.bookmarked':
    case 'group.unbookmarked':
      return cache.put('group', event.group)

    case 'group.membership.updated':
      return cache.putBatch({
        group: [event.group],
        groupMembership: [event.membership],
      })

    case 'post.created':
    case 'post.updated':
    case 'mention.dismissed':
      return cache.put('post', event.post)

    case 'posts.subscribed':
    case 'posts.unsubscribed':
    case 'posts.marked_as_read':
    case 'posts.marked_as_unread':
    case 'posts.dismissed':
      return cache.putMany('post', event.posts)

    case 'reply.created':
      return cache.put('reply', event.reply)

    case 'space.updated':
      return cache.put('space', event.space)

    case 'space_user.updated':
      return cache.put('spaceUser', event.spaceUser)

    case 'user.updated': {
      const { user } = event
      const memberships = cache
        .all('spaceUser')
        .filter((spaceUser) => spaceUser.userId === user.id)
        .map((spaceUser) => mirrorProfile(spaceUser, user))
      return cache.putBatch({ user: [user], spaceUser: memberships })
    }
  }
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Create an event dispatcher.
 *
 * @example
 * const dispatcher = createEventDispatcher({
 *   cache,
 *   generation,
 *   activeView: () => shell.activeView(),
 * })
 * session.subscribe('user:u1', (payload) => dispatcher.dispatch(payload))
 */
export function createEventDispatcher(
  options: EventDispatcherOptions,
): EventDispatcher {
  const { cache, generation, activeView } = options
  const logger = resolveLogger(options.logger)

  function apply(event: SyncEvent, issuedUnder = generation.current()): DispatchResult {
    if (event.type === 'unknown') {
      logger.debug('[sync:dispatcher] ignoring unknown event', event.error)
      return { event, merged: false, delivered: false }
    }

    const before = cache.store.state
    const merged = mergeEvent(cache, event) !== before

    if (!generation.isCurrent(issuedUnder)) {
      logger.debug(
        `[sync:dispatcher] dropping ${event.type} for stale view generation ${issuedUnder}`,
      )
      return { event, merged, delivered: false }
    }

    const view = activeView()
    if (!view?.handleEvent) return { event, merged, delivered: false }

    try {
      view.handleEvent(event)
    } catch (err) {
      logger.error(`[sync:dispatcher] view failed to handle ${event.type}`, err)
      return { event, merged, delivered: false }
    }
    return { event, merged, delivered: true }
  }

  return {
    dispatch(raw, issuedUnder) {
      return apply(decodeEvent(raw), issuedUnder)
    },

    apply,
  }
}
