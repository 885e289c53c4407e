/**
 * @huddle/sync
 *
 * Client-side real-time synchronization runtime: entity cache, live event
 * dispatch, transport session, presence and cursor pagination.
 *
 * For React bindings, use @huddle/react-sync.
 * For the Node.js / browser socket factory, use @huddle/sync-preset-node.
 */

// Core
export type {
  ConnectionStatus,
  HasStore,
  Session,
  SocketFactory,
  SocketLike,
  SocketMessageEvent,
  SyncLogger,
  TransportState,
} from './core/types.js'
export { SOCKET_OPEN } from './core/types.js'
export {
  AuthError,
  DecodeError,
  SessionExpiredError,
  SyncError,
  TransportError,
} from './core/errors.js'
export type { SyncErrorCode } from './core/errors.js'
export { silentLogger } from './core/logger.js'
export { topicFor, parseTopic } from './core/topics.js'
export type { ParsedTopic } from './core/topics.js'

// Entity cache
export {
  entityKinds,
  groupMembershipSchema,
  groupSchema,
  postSchema,
  replySchema,
  spaceSchema,
  spaceUserSchema,
  userSchema,
} from './cache/entities.js'
export type {
  EntityBatch,
  EntityKind,
  EntityMap,
  Group,
  GroupMembership,
  Post,
  Reply,
  Space,
  SpaceUser,
  User,
} from './cache/entities.js'
export {
  createEntityCache,
  defaultVersionFns,
  emptyCacheState,
  updatedAtVersion,
} from './cache/entityCache.js'
export type {
  EntityCache,
  EntityCacheOptions,
  EntityCacheState,
  EntityChange,
  EntityTable,
  VersionFn,
  VersionFns,
} from './cache/entityCache.js'

// Pagination
export {
  append,
  concatPage,
  emptyConnection,
  fromWindow,
  insert,
  jsonCursorCodec,
  mapNodes,
  nodesOf,
  paginate,
  prepend,
  remove,
  timestampOrder,
} from './pagination/connection.js'
export type {
  Connection,
  CursorCodec,
  Edge,
  KeysetOrder,
  PageArgs,
  PageDirection,
  PageInfo,
  TimestampKey,
} from './pagination/connection.js'

// Presence
export { createPresenceTracker, decodePresence } from './presence/presenceTracker.js'
export type {
  PresenceEvent,
  PresenceJoin,
  PresenceLeave,
  PresenceMeta,
  PresenceState,
  PresenceTracker,
  PresenceTrackerOptions,
  PresentActor,
} from './presence/presenceTracker.js'

// Transport
export { createTransportSession } from './transport/session.js'
export type {
  AuthService,
  RefreshResult,
  TransportSession,
  TransportSessionOptions,
} from './transport/session.js'
export {
  initialTransportState,
  isRetryPending,
  transition,
  transitionTable,
} from './transport/stateMachine.js'
export type { TransportInput, TransportInputType } from './transport/stateMachine.js'
export { computeBackoff } from './transport/backoff.js'
export type { BackoffOptions } from './transport/backoff.js'
export { decodeFrame, encodeFrame } from './transport/frames.js'
export type { InboundFrame, OutboundFrame } from './transport/frames.js'

// Events
export { decodeEvent, eventSchema, isKnownEvent } from './events/events.js'
export type {
  KnownSyncEvent,
  SyncEvent,
  SyncEventOf,
  SyncEventType,
  UnknownSyncEvent,
} from './events/events.js'
export { createEventDispatcher, mergeEvent } from './events/dispatcher.js'
export type {
  DispatchResult,
  EventDispatcher,
  EventDispatcherOptions,
  EventSink,
} from './events/dispatcher.js'

// Shell
export { createGenerationGuard } from './shell/generation.js'
export type { GenerationGuard } from './shell/generation.js'
export { createSyncShell } from './shell/shell.js'
export type { ShellState, SyncShell, SyncShellOptions } from './shell/shell.js'
export { pushSubscriptionSchema } from './shell/types.js'
export type {
  PageWindow,
  PushService,
  PushSubscriptionDescriptor,
  QueryError,
  QueryErrorKind,
  QueryResult,
  QueryService,
  QuerySnapshot,
  RequestOutcome,
  ViewContext,
  ViewController,
} from './shell/types.js'

// Views
export { createPostView, replyOrder } from './views/postView.js'
export type { PostView, PostViewOptions, PostViewState } from './views/postView.js'
export { createFeedView, postOrder } from './views/feedView.js'
export type { FeedView, FeedViewOptions, FeedViewState } from './views/feedView.js'
export type { ViewStatus } from './views/shared.js'

// Collection sources
export { entityCollectionOptions } from './collections/entityCollectionOptions.js'
export type { EntityCollectionConfig } from './collections/entityCollectionOptions.js'
