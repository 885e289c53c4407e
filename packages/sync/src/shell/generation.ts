/**
 * Monotonic counter naming the currently active view instance.
 *
 * Every asynchronous request is stamped with the generation it was issued
 * under; when it completes, the result is applied only if that generation is
 * still current. Navigating away advances the counter, so late responses
 * addressed to the previous view are dropped.
 */
export interface GenerationGuard {
  current(): number
  /** Start a new generation and return it. */
  advance(): number
  isCurrent(generation: number): boolean
  /**
   * Run `fn` only if `generation` is still current. Returns whether it ran.
   */
  run(generation: number, fn: () => void): boolean
}

export function createGenerationGuard(start = 0): GenerationGuard {
  let generation = start

  return {
    current() {
      return generation
    },

    advance() {
      generation++
      return generation
    },

    isCurrent(candidate) {
      return candidate === generation
    },

    run(candidate, fn) {
      if (candidate !== generation) return false
      fn()
      return true
    },
  }
}
