import { z } from 'zod'
import { DecodeError } from '../core/errors.js'
import {
  groupMembershipSchema,
  groupSchema,
  postSchema,
  replySchema,
  spaceSchema,
  spaceUserSchema,
  userSchema,
} from '../cache/entities.js'

// ---------------------------------------------------------------------------
// Event taxonomy
// ---------------------------------------------------------------------------

const postBatch = z.object({ posts: z.array(postSchema) })

export const eventSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('group.bookmarked'), group: groupSchema }),
  z.object({ type: z.literal('group.unbookmarked'), group: groupSchema }),
  z.object({
    type: z.literal('group.membership.updated'),
    group: groupSchema,
    membership: groupMembershipSchema,
  }),
  z.object({ type: z.literal('post.created'), post: postSchema }),
  z.object({ type: z.literal('post.updated'), post: postSchema }),
  postBatch.extend({ type: z.literal('posts.subscribed') }),
  postBatch.extend({ type: z.literal('posts.unsubscribed') }),
  postBatch.extend({ type: z.literal('posts.marked_as_read') }),
  postBatch.extend({ type: z.literal('posts.marked_as_unread') }),
  postBatch.extend({ type: z.literal('posts.dismissed') }),
  z.object({ type: z.literal('reply.created'), reply: replySchema }),
  z.object({ type: z.literal('mention.dismissed'), post: postSchema }),
  z.object({ type: z.literal('space.updated'), space: spaceSchema }),
  z.object({ type: z.literal('space_user.updated'), spaceUser: spaceUserSchema }),
  z.object({ type: z.literal('user.updated'), user: userSchema }),
])

/** An event this client understands. */
export type KnownSyncEvent = z.infer<typeof eventSchema>

/**
 * Fallback for payloads that are malformed or come from a newer server.
 * Ignored by every stage of the pipeline.
 */
export interface UnknownSyncEvent {
  readonly type: 'unknown'
  readonly raw: unknown
  /** Why decoding failed, for diagnostics. */
  readonly reason: string
  readonly error: DecodeError
}

export type SyncEvent = KnownSyncEvent | UnknownSyncEvent

export type SyncEventType = KnownSyncEvent['type']

/** Narrow a decoded event to one variant. */
export type SyncEventOf<T extends SyncEventType> = Extract<KnownSyncEvent, { type: T }>

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

/**
 * Decode an untyped payload. Never throws: anything that does not match a
 * known variant becomes an {@link UnknownSyncEvent}.
 *
 * @example
 * decodeEvent({ type: 'post.created', post })   // → { type: 'post.created', post }
 * decodeEvent({ type: 'reaction.added', ... })  // → { type: 'unknown', ... }
 */
export function decodeEvent(raw: unknown): SyncEvent {
  const result = eventSchema.safeParse(raw)
  if (result.success) return result.data
  const issue = result.error.issues[0]
  const reason = issue
    ? `${issue.path.join('.') || '(root)'}: ${issue.message}`
    : 'invalid payload'
  return { type: 'unknown', raw, reason, error: new DecodeError(reason, { cause: result.error }) }
}

export function isKnownEvent(event: SyncEvent): event is KnownSyncEvent {
  return event.type !== 'unknown'
}
