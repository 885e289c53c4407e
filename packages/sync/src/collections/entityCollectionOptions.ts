import type { CollectionConfig, SyncConfig } from '@tanstack/db'
import type { StandardSchemaV1 } from '@standard-schema/spec'
import type { EntityCache } from '../cache/entityCache.js'
import type { EntityKind, EntityMap } from '../cache/entities.js'

export interface EntityCollectionConfig<
  K extends EntityKind,
  TSchema extends StandardSchemaV1 = never,
> {
  /** The entity cache to mirror. */
  cache: EntityCache
  /** Which entity kind the collection holds. */
  kind: K
  /** Collection id: must be unique across all collections. @default `entities:<kind>` */
  id?: string
  /** Zod / Standard Schema for type validation. */
  schema?: TSchema
}

/**
 * Creates a TanStack DB `CollectionConfig` that mirrors one entity kind of
 * the cache, so live queries can join and filter cached entities.
 *
 * The collection is read-only: the cache stays the single writer. Snapshots
 * already cached are written when sync starts; every later change to the
 * kind is written as an insert (first sighting) or a full-row update.
 *
 * @example
 * export const postsCollection = createCollection(
 *   entityCollectionOptions({ cache: shell.cache, kind: 'post', schema: postSchema }),
 * )
 *
 * const { data: unread } = useLiveQuery((q) =>
 *   q.from({ post: postsCollection })
 *     .where(({ post }) => eq(post.inboxState, 'UNREAD')),
 * )
 */
export function entityCollectionOptions<
  K extends EntityKind,
  TSchema extends StandardSchemaV1 = never,
>(
  config: EntityCollectionConfig<K, TSchema>,
): CollectionConfig<EntityMap[K], string, TSchema> {
  const { cache, kind, id = `entities:${kind}`, schema } = config

  const sync: SyncConfig<EntityMap[K], string> = {
    // The cache holds complete snapshots, never diffs.
    rowUpdateMode: 'full',

    sync({ begin, write, commit, markReady }) {
      const known = new Set<string>()

      begin()
      for (const snapshot of cache.all(kind)) {
        write({ type: 'insert', value: snapshot })
        known.add(snapshot.id)
      }
      commit()
      markReady()

      const unsubscribe = cache.onChange((change) => {
        if (change.kind !== kind) return
        const snapshots = cache.getMany(kind, change.ids)
        if (snapshots.length === 0) return

        begin({ immediate: true })
        for (const snapshot of snapshots) {
          write({ type: known.has(snapshot.id) ? 'update' : 'insert', value: snapshot })
          known.add(snapshot.id)
        }
        commit()
      })

      return () => {
        unsubscribe()
      }
    },
  }

  return {
    id,
    ...(schema && { schema }),
    getKey: (snapshot) => snapshot.id,
    sync,
  }
}
