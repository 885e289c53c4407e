export interface BackoffOptions {
  /** Delay before the first retry, in ms. @default 1000 */
  initialDelay?: number
  /** Upper bound for any single delay, in ms. @default 30000 */
  maxDelay?: number
  /** Jitter factor applied to each delay, between 0 and 1. @default 0.25 */
  jitter?: number
}

/**
 * Exponential back-off with jitter: `initialDelay · 2^(attempt-1)`, capped at
 * `maxDelay`, then spread by ±`jitter`. The result never exceeds
 * `maxDelay · (1 + jitter)`.
 *
 * @param attempt - 1 for the first retry.
 * @param random - Source of randomness in [0, 1). Injectable for tests.
 */
export function computeBackoff(
  attempt: number,
  options: BackoffOptions = {},
  random: () => number = Math.random,
): number {
  const { initialDelay = 1000, maxDelay = 30000, jitter = 0.25 } = options
  const exponent = Math.max(0, attempt - 1)
  const base = Math.min(initialDelay * 2 ** exponent, maxDelay)
  return base * (1 + jitter * (random() * 2 - 1))
}
