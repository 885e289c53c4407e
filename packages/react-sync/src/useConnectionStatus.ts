import { use } from 'react'
import { useStore } from '@tanstack/react-store'
import type { ConnectionStatus } from '@huddle/sync'
import { SyncContext, requireShell } from './context.js'

/** The transport's connection status, reactive. */
export function useConnectionStatus(): ConnectionStatus {
  const shell = requireShell(use(SyncContext), 'useConnectionStatus')
  return useStore(shell.store, (s) => s.status)
}
