import { createContext } from 'react'
import type { SyncShell } from '@huddle/sync'

export const SyncContext = createContext<SyncShell | null>(null)

export function requireShell(shell: SyncShell | null, hook: string): SyncShell {
  if (!shell) {
    throw new Error(`[sync] ${hook} must be used inside <SyncProvider>.`)
  }
  return shell
}
