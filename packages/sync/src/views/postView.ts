/**
 * Post view: a single post with its replies (oldest first, newest page
 * loaded) and the actors currently viewing it.
 */

import { Store } from '@tanstack/store'
import type { Post, Reply } from '../cache/entities.js'
import { topicFor } from '../core/topics.js'
import type { KnownSyncEvent } from '../events/events.js'
import {
  concatPage,
  emptyConnection,
  fromWindow,
  insert,
  timestampOrder,
} from '../pagination/connection.js'
import type { Connection } from '../pagination/connection.js'
import type { PresentActor } from '../presence/presenceTracker.js'
import type { QueryError, ViewContext, ViewController } from '../shell/types.js'
import { mergeWindow, postsOf } from './shared.js'
import type { ViewStatus } from './shared.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PostViewState {
  readonly status: ViewStatus
  readonly post: Post | null
  readonly replies: Connection<Reply>
  /** Actors currently viewing the post. */
  readonly viewers: ReadonlyArray<PresentActor>
  readonly error: QueryError | null
}

export interface PostViewOptions {
  postId: string
  /** Replies per page. @default 20 */
  pageSize?: number
}

export interface PostView extends ViewController {
  readonly store: Store<PostViewState>
  /** Load the page of replies preceding the oldest one shown. */
  loadOlder(): Promise<void>
}

export const replyOrder = timestampOrder<Reply>('postedAt', 'asc')

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * @example
 * const view = createPostView({ postId: 'p1' })
 * await shell.mount(view)
 * view.store.subscribe((state) => render(state))
 */
export function createPostView(options: PostViewOptions): PostView {
  const { postId, pageSize = 20 } = options
  const topic = topicFor('post', postId)

  const store = new Store<PostViewState>({
    status: 'loading',
    post: null,
    replies: emptyConnection<Reply>(),
    viewers: [],
    error: null,
  })

  let context: ViewContext | null = null

  async function loadLatest(ctx: ViewContext): Promise<void> {
    const [post, replies] = await Promise.all([
      ctx.request(() => ctx.queries.post(postId)),
      ctx.request(() => ctx.queries.replies(postId, { last: pageSize })),
    ])
    if (post.status === 'stale' || replies.status === 'stale') return

    if (post.status === 'error') {
      store.setState((s) => ({ ...s, status: 'error', error: post.error }))
      return
    }
    if (replies.status === 'error') {
      store.setState((s) => ({ ...s, status: 'error', error: replies.error }))
      return
    }

    store.setState((s) => ({
      ...s,
      status: 'ready',
      post: post.data,
      replies: mergeWindow(s.replies, replies.data, replyOrder),
      error: null,
    }))
  }

  function handleEvent(event: KnownSyncEvent): void {
    if (event.type === 'reply.created') {
      const { reply } = event
      if (reply.postId !== postId) return
      store.setState((s) => ({ ...s, replies: insert(s.replies, reply, replyOrder) }))
      return
    }

    const updated = postsOf(event).find((post) => post.id === postId)
    if (updated) store.setState((s) => ({ ...s, post: updated }))
  }

  return {
    name: `post:${postId}`,
    store,

    async onMount(ctx) {
      context = ctx
      ctx.listen(topic)
      ctx.watchPresence(topic, (viewers) => {
        store.setState((s) => ({ ...s, viewers }))
      })
      await loadLatest(ctx)
    },

    onUnmount() {
      context = null
    },

    async onReconnect(ctx) {
      await loadLatest(ctx)
    },

    handleEvent,

    async loadOlder() {
      const ctx = context
      const { pageInfo } = store.state.replies
      if (!ctx || !pageInfo.hasPreviousPage || pageInfo.startCursor === null) return

      const before = pageInfo.startCursor
      const outcome = await ctx.request(() =>
        ctx.queries.replies(postId, { last: pageSize, before }),
      )
      if (outcome.status === 'stale') return
      if (outcome.status === 'error') {
        store.setState((s) => ({ ...s, error: outcome.error }))
        return
      }

      const page = fromWindow(outcome.data.nodes, outcome.data, replyOrder)
      store.setState((s) => ({
        ...s,
        replies: concatPage(s.replies, page, 'before', replyOrder),
      }))
    },
  }
}
