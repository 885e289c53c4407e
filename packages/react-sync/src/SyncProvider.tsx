import { type ReactNode, useEffect } from 'react'
import type { SyncShell } from '@huddle/sync'
import { SyncContext } from './context.js'

export interface SyncProviderProps {
  /** The shell created with `createSyncShell`. */
  shell: SyncShell
  /**
   * Call `shell.stop()` when the provider unmounts, closing the connection.
   * @default false
   */
  stopOnUnmount?: boolean
  children: ReactNode
}

/**
 * Provides a `SyncShell` to the component tree. All hooks from
 * `@huddle/react-sync` must be descendants of this provider.
 *
 * The provider does not connect; call `shell.start()` once the user is
 * signed in.
 *
 * @example
 * const shell = createSyncShell({ session, queries })
 * await shell.start()
 *
 * <SyncProvider shell={shell}>
 *   <App />
 * </SyncProvider>
 */
export function SyncProvider({ shell, stopOnUnmount = false, children }: SyncProviderProps) {
  useEffect(() => {
    return () => {
      if (stopOnUnmount) shell.stop()
    }
  }, [shell, stopOnUnmount])

  return <SyncContext.Provider value={shell}>{children}</SyncContext.Provider>
}
