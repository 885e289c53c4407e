import { use, useCallback } from 'react'
import { useStore } from '@tanstack/react-store'
import type { ConnectionStatus, Session, SyncShell } from '@huddle/sync'
import { SyncContext, requireShell } from './context.js'

export interface UseSyncResult {
  /** Current connection status, reactive. */
  status: ConnectionStatus
  /** Auth session copy (token, refresh and expiry flags), reactive. */
  session: Session
  /** Name of the mounted view, reactive. */
  activeView: string | null
  start(): Promise<void>
  stop(): void
  /** The full shell for advanced use cases. */
  shell: SyncShell
}

/**
 * Returns reactive shell state and control functions.
 * Must be used inside `<SyncProvider>`.
 *
 * @example
 * function SignOutBanner() {
 *   const { session } = useSync()
 *   if (!session.expired) return null
 *   return <a href="/login">Your session expired. Sign in again.</a>
 * }
 */
export function useSync(): UseSyncResult {
  const shell = requireShell(use(SyncContext), 'useSync')
  const status = useStore(shell.store, (s) => s.status)
  const session = useStore(shell.store, (s) => s.session)
  const activeView = useStore(shell.store, (s) => s.activeView)

  const start = useCallback(() => shell.start(), [shell])
  const stop = useCallback(() => shell.stop(), [shell])

  return { status, session, activeView, start, stop, shell }
}
