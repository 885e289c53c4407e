import { Store } from '@tanstack/store'
import type { Post } from '../cache/entities.js'
import { topicFor } from '../core/topics.js'
import type { KnownSyncEvent } from '../events/events.js'
import {
  concatPage,
  emptyConnection,
  fromWindow,
  insert,
  mapNodes,
  timestampOrder,
} from '../pagination/connection.js'
import type { Connection } from '../pagination/connection.js'
import type { QueryError, ViewContext, ViewController } from '../shell/types.js'
import { mergeWindow, postsOf } from './shared.js'
import type { ViewStatus } from './shared.js'

export interface FeedViewState {
  readonly status: ViewStatus
  readonly posts: Connection<Post>
  readonly error: QueryError | null
}

export interface FeedViewOptions {
  spaceId: string
  /** Posts per page. @default 20 */
  pageSize?: number
}

export interface FeedView extends ViewController {
  readonly store: Store<FeedViewState>
  /** Load the page of posts following the oldest one shown. */
  loadMore(): Promise<void>
}

export const postOrder = timestampOrder<Post>('postedAt', 'desc')

/**
 * A space's posts, newest first. New posts are inserted live; updates to
 * shown posts replace them in place.
 */
export function createFeedView(options: FeedViewOptions): FeedView {
  const { spaceId, pageSize = 20 } = options

  const store = new Store<FeedViewState>({
    status: 'loading',
    posts: emptyConnection<Post>(),
    error: null,
  })

  let context: ViewContext | null = null

  async function loadFirstPage(ctx: ViewContext): Promise<void> {
    const outcome = await ctx.request(() => ctx.queries.feed(spaceId, { first: pageSize }))
    if (outcome.status === 'stale') return
    if (outcome.status === 'error') {
      store.setState((s) => ({ ...s, status: 'error', error: outcome.error }))
      return
    }
    store.setState((s) => ({
      status: 'ready',
      posts: mergeWindow(s.posts, outcome.data, postOrder),
      error: null,
    }))
  }

  function handleEvent(event: KnownSyncEvent): void {
    if (event.type === 'post.created') {
      const { post } = event
      if (post.spaceId !== spaceId) return
      store.setState((s) => ({ ...s, posts: insert(s.posts, post, postOrder) }))
      return
    }

    const updates = new Map(postsOf(event).map((post): [string, Post] => [post.id, post]))
    if (updates.size === 0) return
    store.setState((s) => ({
      ...s,
      posts: mapNodes(s.posts, (post) => updates.get(post.id) ?? post),
    }))
  }

  return {
    name: `feed:${spaceId}`,
    store,

    async onMount(ctx) {
      context = ctx
      ctx.listen(topicFor('space', spaceId))
      await loadFirstPage(ctx)
    },

    onUnmount() {
      context = null
    },

    async onReconnect(ctx) {
      await loadFirstPage(ctx)
    },

    handleEvent,

    async loadMore() {
      const ctx = context
      const { pageInfo } = store.state.posts
      if (!ctx || !pageInfo.hasNextPage || pageInfo.endCursor === null) return

      const after = pageInfo.endCursor
      const outcome = await ctx.request(() =>
        ctx.queries.feed(spaceId, { first: pageSize, after }),
      )
      if (outcome.status === 'stale') return
      if (outcome.status === 'error') {
        store.setState((s) => ({ ...s, error: outcome.error }))
        return
      }

      const page = fromWindow(outcome.data.nodes, outcome.data, postOrder)
      store.setState((s) => ({
        ...s,
        posts: concatPage(s.posts, page, 'after', postOrder),
      }))
    },
  }
}
