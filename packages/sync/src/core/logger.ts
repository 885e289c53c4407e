import type { SyncLogger } from './types.js'

/** Logger that discards everything. Handy in tests. */
export const silentLogger: SyncLogger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
}

export function resolveLogger(logger: SyncLogger | undefined): SyncLogger {
  return logger ?? console
}

/** Run a listener, logging anything it throws instead of rethrowing. */
export function safeInvoke<TArgs extends unknown[]>(
  logger: SyncLogger,
  label: string,
  fn: (...args: TArgs) => void,
  ...args: TArgs
): void {
  try {
    fn(...args)
  } catch (err) {
    logger.error(`${label} listener error`, err)
  }
}
