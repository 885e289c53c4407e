/**
 * @huddle/react-sync
 *
 * React provider and hooks for @huddle/sync.
 */

export { SyncProvider } from './SyncProvider.js'
export type { SyncProviderProps } from './SyncProvider.js'

export { SyncContext } from './context.js'

export { useSync } from './useSync.js'
export type { UseSyncResult } from './useSync.js'

export { useConnectionStatus } from './useConnectionStatus.js'

export { useEntity } from './useEntity.js'

export { usePresence } from './usePresence.js'
export type { UsePresenceResult } from './usePresence.js'
