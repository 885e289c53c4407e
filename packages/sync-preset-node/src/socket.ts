import { WebSocket as NodeWebSocket } from 'ws'
import type { SocketFactory, SocketLike } from '@huddle/sync'

export interface NodeSocketOptions {
  /**
   * Which WebSocket implementation to use.
   *
   * - `'auto'`: the global `WebSocket` when the runtime has one (browsers,
   *   newer Node.js), otherwise the `ws` package.
   * - `'ws'`: always the `ws` package.
   * - `'native'`: always the global `WebSocket`; throws where there is none.
   *
   * @default 'auto'
   */
  implementation?: 'auto' | 'ws' | 'native'
}

function nativeWebSocket(): typeof WebSocket | undefined {
  const candidate = globalThis.WebSocket
  return typeof candidate === 'function' ? candidate : undefined
}

/**
 * Creates a `SocketFactory` for `createTransportSession`.
 *
 * @example
 * const session = createTransportSession({
 *   url: 'ws://localhost:4000/socket',
 *   token,
 *   auth,
 *   createSocket: nodeSocket(),
 * })
 */
export function nodeSocket(options: NodeSocketOptions = {}): SocketFactory {
  const { implementation = 'auto' } = options

  return (url): SocketLike => {
    if (implementation !== 'ws') {
      const Native = nativeWebSocket()
      if (Native) return new Native(url)
      if (implementation === 'native') {
        throw new Error('[sync:node] This runtime has no global WebSocket.')
      }
    }
    return new NodeWebSocket(url)
  }
}
