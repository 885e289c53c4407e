import { use } from 'react'
import { useStore } from '@tanstack/react-store'
import type { EntityKind, EntityMap } from '@huddle/sync'
import { SyncContext, requireShell } from './context.js'

/**
 * The cached snapshot of one entity, reactive. `undefined` means the entity
 * has not been loaded yet.
 *
 * @example
 * const author = useEntity('spaceUser', post.authorId)
 * return <span>{author ? author.handle : '…'}</span>
 */
export function useEntity<K extends EntityKind>(
  kind: K,
  id: string | null | undefined,
): EntityMap[K] | undefined {
  const shell = requireShell(use(SyncContext), 'useEntity')
  const { cache } = shell
  return useStore(cache.store, () => (id ? cache.get(kind, id) : undefined))
}
