import { z } from 'zod'

// ---------------------------------------------------------------------------
// Entity schemas
// ---------------------------------------------------------------------------

const id = z.string().min(1)
const timestamp = z.string().min(1)

export const userSchema = z.object({
  id,
  firstName: z.string(),
  lastName: z.string(),
  handle: z.string(),
  avatarUrl: z.string().nullable().default(null),
  updatedAt: timestamp.optional(),
})

export const spaceSchema = z.object({
  id,
  name: z.string(),
  slug: z.string(),
  avatarUrl: z.string().nullable().default(null),
  updatedAt: timestamp.optional(),
})

export const spaceUserSchema = z.object({
  id,
  spaceId: id,
  userId: id,
  firstName: z.string(),
  lastName: z.string(),
  handle: z.string(),
  avatarUrl: z.string().nullable().default(null),
  role: z.enum(['OWNER', 'ADMIN', 'MEMBER']),
  state: z.enum(['ACTIVE', 'DISABLED']),
  updatedAt: timestamp.optional(),
})

const membershipState = z.enum(['NOT_SUBSCRIBED', 'SUBSCRIBED'])

export const groupSchema = z.object({
  id,
  spaceId: id,
  name: z.string(),
  description: z.string().nullable().default(null),
  isPrivate: z.boolean(),
  isBookmarked: z.boolean(),
  membershipState,
  updatedAt: timestamp.optional(),
})

export const groupMembershipSchema = z.object({
  id,
  groupId: id,
  spaceUserId: id,
  state: membershipState,
})

export const postSchema = z.object({
  id,
  spaceId: id,
  groupIds: z.array(id),
  authorId: id,
  body: z.string(),
  postedAt: timestamp,
  updatedAt: timestamp.optional(),
  subscriptionState: z.enum([
    'NOT_SUBSCRIBED',
    'SUBSCRIBED',
    'IMPLICITLY_SUBSCRIBED',
  ]),
  inboxState: z.enum(['EXCLUDED', 'DISMISSED', 'READ', 'UNREAD']),
  hasUnreadMentions: z.boolean().default(false),
})

export const replySchema = z.object({
  id,
  postId: id,
  spaceId: id,
  authorId: id,
  body: z.string(),
  postedAt: timestamp,
  updatedAt: timestamp.optional(),
})

export type User = z.infer<typeof userSchema>
export type Space = z.infer<typeof spaceSchema>
export type SpaceUser = z.infer<typeof spaceUserSchema>
export type Group = z.infer<typeof groupSchema>
export type GroupMembership = z.infer<typeof groupMembershipSchema>
export type Post = z.infer<typeof postSchema>
export type Reply = z.infer<typeof replySchema>

// ---------------------------------------------------------------------------
// Kind registry
// ---------------------------------------------------------------------------

/** Every entity kind the cache stores, keyed by kind name. */
export interface EntityMap {
  user: User
  space: Space
  spaceUser: SpaceUser
  group: Group
  groupMembership: GroupMembership
  post: Post
  reply: Reply
}

export type EntityKind = keyof EntityMap

export const entityKinds: ReadonlyArray<EntityKind> = [
  'user',
  'space',
  'spaceUser',
  'group',
  'groupMembership',
  'post',
  'reply',
]

/** Snapshots of several kinds, as returned alongside a query result. */
export type EntityBatch = {
  readonly [K in EntityKind]?: ReadonlyArray<EntityMap[K]>
}
