/**
 * Shared test fixtures: entity factories, an in-memory socket and a
 * configurable query service.
 */

import { vi } from 'vitest'
import { SOCKET_OPEN } from '@huddle/sync'
import type {
  EntityBatch,
  Group,
  GroupMembership,
  PageWindow,
  Post,
  QueryResult,
  QueryService,
  Reply,
  SocketFactory,
  SocketLike,
  SocketMessageEvent,
  SpaceUser,
  User,
} from '@huddle/sync'

// ---------------------------------------------------------------------------
// Entities
// ---------------------------------------------------------------------------

export function makeUser(overrides: Partial<User> = {}): User {
  return {
    id: 'u1',
    firstName: 'Ada',
    lastName: 'Lovelace',
    handle: 'ada',
    avatarUrl: null,
    ...overrides,
  }
}

export function makeSpaceUser(overrides: Partial<SpaceUser> = {}): SpaceUser {
  return {
    id: 'su1',
    spaceId: 's1',
    userId: 'u1',
    firstName: 'Ada',
    lastName: 'Lovelace',
    handle: 'ada',
    avatarUrl: null,
    role: 'MEMBER',
    state: 'ACTIVE',
    ...overrides,
  }
}

export function makeGroup(overrides: Partial<Group> = {}): Group {
  return {
    id: 'g1',
    spaceId: 's1',
    name: 'general',
    description: null,
    isPrivate: false,
    isBookmarked: false,
    membershipState: 'SUBSCRIBED',
    ...overrides,
  }
}

export function makeMembership(overrides: Partial<GroupMembership> = {}): GroupMembership {
  return {
    id: 'gm1',
    groupId: 'g1',
    spaceUserId: 'su1',
    state: 'SUBSCRIBED',
    ...overrides,
  }
}

export function makePost(overrides: Partial<Post> = {}): Post {
  return {
    id: 'p1',
    spaceId: 's1',
    groupIds: ['g1'],
    authorId: 'su1',
    body: 'Hello there',
    postedAt: '2024-03-01T10:00:00.000Z',
    subscriptionState: 'SUBSCRIBED',
    inboxState: 'UNREAD',
    hasUnreadMentions: false,
    ...overrides,
  }
}

export function makeReply(overrides: Partial<Reply> = {}): Reply {
  return {
    id: 'r1',
    postId: 'p1',
    spaceId: 's1',
    authorId: 'su1',
    body: 'A reply',
    postedAt: '2024-03-01T10:00:01.000Z',
    ...overrides,
  }
}

/** Replies r1…rN, one second apart, oldest first. */
export function makeReplies(count: number, postId = 'p1'): Reply[] {
  return Array.from({ length: count }, (_, i) =>
    makeReply({
      id: `r${i + 1}`,
      postId,
      postedAt: new Date(Date.UTC(2024, 2, 1, 10, 0, i + 1)).toISOString(),
    }),
  )
}

// ---------------------------------------------------------------------------
// Sockets
// ---------------------------------------------------------------------------

export interface FakeSocket extends SocketLike {
  readonly url: string
  /** Frames sent by the client, JSON-decoded. */
  readonly sent: unknown[]
  readonly closed: boolean
  /** Simulate the connection opening. */
  open(): void
  /** Deliver a server frame (JSON-encoded on the way in). */
  receive(frame: unknown): void
  /** Simulate the server closing the connection. */
  serverClose(): void
}

export function createFakeSocket(url: string): FakeSocket {
  const listeners = new Map<string, Set<(event: SocketMessageEvent) => void>>()
  const sent: unknown[] = []
  let readyState = 0
  let closed = false

  function emit(type: string, event: SocketMessageEvent): void {
    const cbs = listeners.get(type)
    if (cbs) for (const cb of cbs) cb(event)
  }

  return {
    url,
    sent,
    get readyState() {
      return readyState
    },
    get closed() {
      return closed
    },
    send(data) {
      sent.push(JSON.parse(data))
    },
    close() {
      closed = true
      readyState = 3
    },
    addEventListener(type: string, listener: (event: SocketMessageEvent) => void) {
      let set = listeners.get(type)
      if (!set) {
        set = new Set()
        listeners.set(type, set)
      }
      set.add(listener)
    },
    open() {
      readyState = SOCKET_OPEN
      emit('open', { data: undefined })
    },
    receive(frame) {
      emit('message', { data: JSON.stringify(frame) })
    },
    serverClose() {
      closed = true
      readyState = 3
      emit('close', { data: undefined })
    },
  }
}

export interface FakeSockets {
  readonly factory: SocketFactory
  readonly sockets: FakeSocket[]
  /** The most recently created socket. */
  last(): FakeSocket
}

export function createFakeSockets(): FakeSockets {
  const sockets: FakeSocket[] = []
  return {
    sockets,
    factory(url) {
      const socket = createFakeSocket(url)
      sockets.push(socket)
      return socket
    },
    last() {
      const socket = sockets[sockets.length - 1]
      if (!socket) throw new Error('no socket created yet')
      return socket
    },
  }
}

// ---------------------------------------------------------------------------
// Queries
// ---------------------------------------------------------------------------

export function okResult<T>(data: T, entities: EntityBatch = {}): QueryResult<T> {
  return { ok: true, snapshot: { data, entities } }
}

export function notFound<T>(message = 'not found'): QueryResult<T> {
  return { ok: false, error: { kind: 'NotFound', message } }
}

export function pageOf<T>(
  nodes: ReadonlyArray<T>,
  flags: { hasPreviousPage?: boolean; hasNextPage?: boolean } = {},
): PageWindow<T> {
  return {
    nodes,
    hasPreviousPage: flags.hasPreviousPage ?? false,
    hasNextPage: flags.hasNextPage ?? false,
  }
}

/** A query service whose operations all resolve NotFound unless overridden. */
export function createFakeQueries(overrides: Partial<QueryService> = {}): QueryService {
  return {
    feed: vi.fn(async () => notFound<PageWindow<Post>>()),
    post: vi.fn(async () => notFound<Post>()),
    replies: vi.fn(async () => notFound<PageWindow<Reply>>()),
    ...overrides,
  }
}

// ---------------------------------------------------------------------------
// Async helpers
// ---------------------------------------------------------------------------

/** Let pending promise callbacks and microtasks run. */
export async function flushMicrotasks(rounds = 10): Promise<void> {
  for (let i = 0; i < rounds; i++) await Promise.resolve()
}

/** A manually-resolved promise. */
export function deferred<T>() {
  let resolve: (value: T) => void = () => {}
  let reject: (reason?: unknown) => void = () => {}
  const promise = new Promise<T>((res, rej) => {
    resolve = res
    reject = rej
  })
  return { promise, resolve, reject }
}
