/**
 * Entity cache: the client's normalized copy of every server entity it has
 * seen, one snapshot per (kind, id).
 *
 * State lives in a TanStack Store so framework adapters can observe it. Each
 * write produces a new state object; snapshots and untouched kind tables are
 * shared with the previous state, so holders of an older state never see it
 * change underneath them.
 */

import { Store } from '@tanstack/store'
import type { SyncLogger } from '../core/types.js'
import { resolveLogger, safeInvoke } from '../core/logger.js'
import type { EntityBatch, EntityKind, EntityMap } from './entities.js'
import { entityKinds } from './entities.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type EntityTable<T> = { readonly [id: string]: T }

type EntityTables = { [K in EntityKind]: EntityTable<EntityMap[K]> }

export type EntityCacheState = Readonly<EntityTables>

/** Returns a comparable version for a snapshot, or `undefined` when it has none. */
export type VersionFn<T> = (snapshot: T) => number | undefined

export type VersionFns = { [K in EntityKind]?: VersionFn<EntityMap[K]> }

/** Which snapshots a write actually replaced. */
export interface EntityChange {
  readonly kind: EntityKind
  readonly ids: ReadonlyArray<string>
}

export interface EntityCacheOptions {
  /**
   * Per-kind ordering metadata. For a kind listed here, a write whose version
   * is older than or equal to the cached snapshot's version is ignored. Kinds
   * without an entry (or snapshots without a version) are last-write-wins.
   *
   * @default { user: updatedAt, space: updatedAt, reply: updatedAt }
   */
  versionOf?: VersionFns
  /** Initial contents, e.g. from a server-rendered bootstrap payload. */
  initial?: EntityBatch
  logger?: SyncLogger
}

export interface EntityCache {
  /** TanStack Store holding the full cache state. */
  readonly store: Store<EntityCacheState>

  /** Latest snapshot for `id`, or `undefined` when not loaded yet. */
  get<K extends EntityKind>(kind: K, id: string): EntityMap[K] | undefined

  /** Loaded snapshots for `ids`, in the given order. Missing ids are skipped. */
  getMany<K extends EntityKind>(
    kind: K,
    ids: ReadonlyArray<string>,
  ): Array<EntityMap[K]>

  /** Every cached snapshot of a kind. */
  all<K extends EntityKind>(kind: K): Array<EntityMap[K]>

  put<K extends EntityKind>(kind: K, snapshot: EntityMap[K]): EntityCacheState

  putMany<K extends EntityKind>(
    kind: K,
    snapshots: ReadonlyArray<EntityMap[K]>,
  ): EntityCacheState

  /** Merge snapshots of several kinds in one store update. */
  putBatch(batch: EntityBatch): EntityCacheState

  /** Subscribe to replaced snapshots. Returns an unsubscribe function. */
  onChange(listener: (change: EntityChange) => void): () => void
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Version from an ISO-8601 `updatedAt` field. */
export function updatedAtVersion<T extends { updatedAt?: string }>(
  snapshot: T,
): number | undefined {
  if (snapshot.updatedAt === undefined) return undefined
  const ms = Date.parse(snapshot.updatedAt)
  return Number.isNaN(ms) ? undefined : ms
}

export const defaultVersionFns: VersionFns = {
  user: updatedAtVersion,
  space: updatedAtVersion,
  reply: updatedAtVersion,
}

export function emptyCacheState(): EntityCacheState {
  return {
    user: {},
    space: {},
    spaceUser: {},
    group: {},
    groupMembership: {},
    post: {},
    reply: {},
  }
}

function valueEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((v, i) => valueEqual(v, b[i]))
  }
  if (
    typeof a === 'object' &&
    a !== null &&
    typeof b === 'object' &&
    b !== null &&
    !Array.isArray(a) &&
    !Array.isArray(b)
  ) {
    const aKeys = Object.keys(a)
    const bKeys = Object.keys(b)
    if (aKeys.length !== bKeys.length) return false
    const aRec: Record<string, unknown> = { ...a }
    const bRec: Record<string, unknown> = { ...b }
    return aKeys.every((k) => k in bRec && valueEqual(aRec[k], bRec[k]))
  }
  return false
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Create an entity cache.
 *
 * @example
 * const cache = createEntityCache()
 * cache.put('post', post)
 * cache.get('post', post.id) // → post
 * cache.get('post', 'unknown') // → undefined (not loaded yet)
 */
export function createEntityCache(options: EntityCacheOptions = {}): EntityCache {
  const { versionOf = defaultVersionFns, initial } = options
  const logger = resolveLogger(options.logger)

  const store = new Store<EntityCacheState>(emptyCacheState())
  const listeners = new Set<(change: EntityChange) => void>()

  /**
   * Merge `snapshots` into `table`. Returns the new table and the ids that
   * were written, or `null` when nothing changed.
   */
  function mergeTable<K extends EntityKind>(
    kind: K,
    table: EntityTable<EntityMap[K]>,
    snapshots: ReadonlyArray<EntityMap[K]>,
  ): { table: EntityTable<EntityMap[K]>; ids: string[] } | null {
    const versionFn = versionOf[kind]
    let next: Record<string, EntityMap[K]> | null = null
    const ids: string[] = []

    for (const snapshot of snapshots) {
      const current = (next ?? table)[snapshot.id]
      if (current !== undefined) {
        if (current === snapshot || valueEqual(current, snapshot)) continue
        if (versionFn) {
          const incomingVersion = versionFn(snapshot)
          const currentVersion = versionFn(current)
          if (
            incomingVersion !== undefined &&
            currentVersion !== undefined &&
            incomingVersion <= currentVersion
          ) {
            logger.debug(
              `[sync:cache] ignoring stale ${kind} snapshot ${snapshot.id}`,
            )
            continue
          }
        }
      }
      if (next === null) next = { ...table }
      next[snapshot.id] = snapshot
      if (!ids.includes(snapshot.id)) ids.push(snapshot.id)
    }

    return next === null ? null : { table: next, ids }
  }

  function notify(changes: ReadonlyArray<EntityChange>): void {
    for (const change of changes) {
      for (const listener of listeners) {
        safeInvoke(logger, '[sync:cache]', listener, change)
      }
    }
  }

  function writeKind<K extends EntityKind>(
    state: { [P in K]: EntityTable<EntityMap[P]> },
    kind: K,
    snapshots: ReadonlyArray<EntityMap[K]> | undefined,
    changes: EntityChange[],
  ): void {
    if (!snapshots || snapshots.length === 0) return
    const merged = mergeTable(kind, state[kind], snapshots)
    if (merged === null) return
    state[kind] = merged.table
    changes.push({ kind, ids: merged.ids })
  }

  function commit(build: (draft: EntityTables, changes: EntityChange[]) => void): EntityCacheState {
    const draft: EntityTables = { ...store.state }
    const changes: EntityChange[] = []
    build(draft, changes)
    if (changes.length === 0) return store.state
    store.setState(() => draft)
    notify(changes)
    return store.state
  }

  function putBatch(batch: EntityBatch): EntityCacheState {
    return commit((draft, changes) => {
      for (const kind of entityKinds) {
        switch (kind) {
          case 'user':
            writeKind(draft, kind, batch.user, changes)
            break
          case 'space':
            writeKind(draft, kind, batch.space, changes)
            break
          case 'spaceUser':
            writeKind(draft, kind, batch.spaceUser, changes)
            break
          case 'group':
            writeKind(draft, kind, batch.group, changes)
            break
          case 'groupMembership':
            writeKind(draft, kind, batch.groupMembership, changes)
            break
          case 'post':
            writeKind(draft, kind, batch.post, changes)
            break
          case 'reply':
            writeKind(draft, kind, batch.reply, changes)
            break
        }
      }
    })
  }

  if (initial) putBatch(initial)

  return {
    store,

    get(kind, id) {
      return store.state[kind][id]
    },

    getMany(kind, ids) {
      const table = store.state[kind]
      const result: Array<EntityMap[typeof kind]> = []
      for (const id of ids) {
        const snapshot = table[id]
        if (snapshot !== undefined) result.push(snapshot)
      }
      return result
    },

    all(kind) {
      return Object.values(store.state[kind])
    },

    put(kind, snapshot) {
      return commit((draft, changes) => writeKind(draft, kind, [snapshot], changes))
    },

    putMany(kind, snapshots) {
      return commit((draft, changes) => writeKind(draft, kind, snapshots, changes))
    },

    putBatch,

    onChange(listener) {
      listeners.add(listener)
      return () => {
        listeners.delete(listener)
      }
    },
  }
}
