import type { Post } from '../cache/entities.js'
import type { KnownSyncEvent } from '../events/events.js'
import { fromWindow, insert } from '../pagination/connection.js'
import type { Connection, KeysetOrder } from '../pagination/connection.js'
import type { PageWindow } from '../shell/types.js'

export type ViewStatus = 'loading' | 'ready' | 'error'

/** Post snapshots carried by an event, if any. */
export function postsOf(event: KnownSyncEvent): ReadonlyArray<Post> {
  switch (event.type) {
    case 'post.created':
    case 'post.updated':
    case 'mention.dismissed':
      return [event.post]
    case 'posts.subscribed':
    case 'posts.unsubscribed':
    case 'posts.marked_as_read':
    case 'posts.marked_as_unread':
    case 'posts.dismissed':
      return event.posts
    default:
      return []
  }
}

/**
 * Fold a freshly fetched window into what the view already shows. The first
 * load takes the window as is; later loads (after a reconnect) insert each
 * node at its sorted position so pages loaded since are kept.
 */
export function mergeWindow<T, K>(
  current: Connection<T>,
  page: PageWindow<T>,
  order: KeysetOrder<T, K>,
): Connection<T> {
  if (current.edges.length === 0) return fromWindow(page.nodes, page, order)
  return page.nodes.reduce((conn, node) => insert(conn, node, order), current)
}
