/**
 * Presence tracker: per-topic sets of actors that are currently "here"
 * (e.g. everyone viewing a post), maintained from join/leave diffs.
 *
 * An actor can be present through several connections at once (two tabs,
 * phone and laptop), so each join adds a reference and each leave removes
 * one; the actor disappears when the count reaches zero.
 *
 * The tracker knows nothing about views: whoever cares about a topic
 * subscribes to it, and the topic's state is dropped when the last
 * subscriber leaves.
 */

import { Store } from '@tanstack/store'
import { z } from 'zod'
import type { SyncLogger } from '../core/types.js'
import { resolveLogger, safeInvoke } from '../core/logger.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type PresenceMeta = Readonly<Record<string, unknown>>

export interface PresenceJoin {
  readonly id: string
  readonly meta: PresenceMeta
}

/** A connection going away. `meta` identifies which of the actor's connections left. */
export interface PresenceLeave {
  readonly id: string
  readonly meta?: PresenceMeta
}

export type PresenceEvent =
  | {
      readonly type: 'diff'
      readonly joins: ReadonlyArray<PresenceJoin>
      readonly leaves: ReadonlyArray<PresenceLeave>
    }
  /** Full replacement of the topic's state (sent on presence:request). */
  | { readonly type: 'state'; readonly actors: ReadonlyArray<PresenceJoin> }
  | { readonly type: 'unknown'; readonly raw: unknown }

export interface PresentActor {
  readonly id: string
  /** Number of live connections for this actor. */
  readonly refs: number
  /** Millisecond timestamp of the join that made the actor present. */
  readonly onlineSince: number
  /** Metadata per connection, oldest first. */
  readonly metas: ReadonlyArray<PresenceMeta>
}

export type PresenceState = { readonly [topic: string]: ReadonlyArray<PresentActor> }

export interface PresenceTrackerOptions {
  /** Clock used for `onlineSince`. @default Date.now */
  now?: () => number
  logger?: SyncLogger
}

export interface PresenceTracker {
  /** TanStack Store holding the present actors of every tracked topic. */
  readonly store: Store<PresenceState>

  /** Decode a raw payload. Never throws; unrecognised shapes become `unknown`. */
  decode(raw: unknown): PresenceEvent

  /** Apply a decoded event to `topic`. `unknown` events change nothing. */
  apply(topic: string, event: PresenceEvent): ReadonlyArray<PresentActor>

  /** Decode and apply a raw payload. */
  receive(topic: string, raw: unknown): PresenceEvent

  /** Actors currently present in `topic`, in join order. */
  present(topic: string): ReadonlyArray<PresentActor>

  /**
   * Subscribe to changes for `topic`. The callback fires after every applied
   * event. Returns an unsubscribe function; removing the last subscriber
   * discards the topic's state.
   */
  subscribe(
    topic: string,
    callback: (actors: ReadonlyArray<PresentActor>) => void,
  ): () => void

  /** Drop all presence state and subscribers. */
  clear(): void
}

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

const actorRef = z.union([
  z.string().min(1).transform((id) => ({ id, meta: {} })),
  z.object({
    id: z.string().min(1),
    meta: z.record(z.unknown()).default({}),
  }),
])

const leaveRef = z.union([
  z.string().min(1).transform((id) => ({ id })),
  z.object({
    id: z.string().min(1),
    meta: z.record(z.unknown()).optional(),
  }),
])

const stateSchema = z.object({
  type: z.literal('state'),
  actors: z.array(actorRef),
})

const diffSchema = z
  .object({
    type: z.literal('diff').optional(),
    joins: z.array(actorRef).optional(),
    leaves: z.array(leaveRef).optional(),
  })
  .refine((d) => d.joins !== undefined || d.leaves !== undefined, {
    message: 'diff needs joins or leaves',
  })

export function decodePresence(raw: unknown): PresenceEvent {
  const state = stateSchema.safeParse(raw)
  if (state.success) {
    return { type: 'state', actors: state.data.actors }
  }
  const diff = diffSchema.safeParse(raw)
  if (diff.success) {
    return {
      type: 'diff',
      joins: diff.data.joins ?? [],
      leaves: diff.data.leaves ?? [],
    }
  }
  return { type: 'unknown', raw }
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

function sameMeta(a: PresenceMeta, b: PresenceMeta): boolean {
  const keys = Object.keys(a)
  return keys.length === Object.keys(b).length && keys.every((key) => a[key] === b[key])
}

interface MutableActor {
  refs: number
  onlineSince: number
  metas: PresenceMeta[]
}

/**
 * Create a presence tracker.
 *
 * @example
 * const presence = createPresenceTracker()
 * const stop = presence.subscribe('post:p1', (actors) => {
 *   renderViewers(actors.map((a) => a.id))
 * })
 * presence.receive('post:p1', { joins: ['u1', 'u2'] })
 * presence.receive('post:p1', { leaves: ['u1'] })
 * presence.present('post:p1') // → [{ id: 'u2', refs: 1, ... }]
 */
export function createPresenceTracker(
  options: PresenceTrackerOptions = {},
): PresenceTracker {
  const { now = Date.now } = options
  const logger = resolveLogger(options.logger)

  const store = new Store<PresenceState>({})
  const topics = new Map<string, Map<string, MutableActor>>()
  const listeners = new Map<
    string,
    Set<(actors: ReadonlyArray<PresentActor>) => void>
  >()

  function snapshot(topic: string): ReadonlyArray<PresentActor> {
    const actors = topics.get(topic)
    if (!actors) return []
    const result: PresentActor[] = []
    for (const [id, actor] of actors) {
      result.push({
        id,
        refs: actor.refs,
        onlineSince: actor.onlineSince,
        metas: [...actor.metas],
      })
    }
    return result
  }

  function publish(topic: string): ReadonlyArray<PresentActor> {
    const actors = snapshot(topic)
    store.setState((prev) => {
      const next: Record<string, ReadonlyArray<PresentActor>> = { ...prev }
      if (topics.has(topic)) next[topic] = actors
      else delete next[topic]
      return next
    })
    const cbs = listeners.get(topic)
    if (cbs) {
      for (const cb of cbs) safeInvoke(logger, '[sync:presence]', cb, actors)
    }
    return actors
  }

  function join(actors: Map<string, MutableActor>, entry: PresenceJoin, at: number): void {
    const existing = actors.get(entry.id)
    if (existing) {
      existing.refs++
      existing.metas.push(entry.meta)
    } else {
      actors.set(entry.id, { refs: 1, onlineSince: at, metas: [entry.meta] })
    }
  }

  function apply(topic: string, event: PresenceEvent): ReadonlyArray<PresentActor> {
    switch (event.type) {
      case 'unknown':
        return snapshot(topic)

      case 'state': {
        const at = now()
        const previous = topics.get(topic)
        const actors = new Map<string, MutableActor>()
        for (const entry of event.actors) join(actors, entry, at)
        // Actors that were already present keep their original timestamp.
        if (previous) {
          for (const [id, actor] of actors) {
            const before = previous.get(id)
            if (before) actor.onlineSince = before.onlineSince
          }
        }
        topics.set(topic, actors)
        return publish(topic)
      }

      case 'diff': {
        let actors = topics.get(topic)
        if (!actors) {
          actors = new Map()
          topics.set(topic, actors)
        }
        const at = now()
        for (const entry of event.joins) join(actors, entry, at)
        for (const leave of event.leaves) {
          const actor = actors.get(leave.id)
          if (!actor) continue
          actor.refs--
          const { meta } = leave
          const idx = meta ? actor.metas.findIndex((m) => sameMeta(m, meta)) : -1
          if (idx >= 0) actor.metas.splice(idx, 1)
          else actor.metas.pop()
          if (actor.refs <= 0) actors.delete(leave.id)
        }
        return publish(topic)
      }
    }
  }

  function dropTopic(topic: string): void {
    if (!topics.delete(topic)) return
    store.setState((prev) => {
      const next: Record<string, ReadonlyArray<PresentActor>> = { ...prev }
      delete next[topic]
      return next
    })
  }

  return {
    store,

    decode: decodePresence,

    apply,

    receive(topic, raw) {
      const event = decodePresence(raw)
      if (event.type === 'unknown') {
        logger.debug(`[sync:presence] ignoring undecodable payload on "${topic}"`)
        return event
      }
      apply(topic, event)
      return event
    },

    present: snapshot,

    subscribe(topic, callback) {
      let set = listeners.get(topic)
      if (!set) {
        set = new Set()
        listeners.set(topic, set)
      }
      set.add(callback)
      const own = set

      return () => {
        own.delete(callback)
        if (own.size === 0 && listeners.get(topic) === own) {
          listeners.delete(topic)
          dropTopic(topic)
        }
      }
    },

    clear() {
      topics.clear()
      listeners.clear()
      store.setState(() => ({}))
    },
  }
}
