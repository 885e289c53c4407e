import { createTransportSession, TransportError } from '@huddle/sync'
import type { TransportSession, TransportSessionOptions } from '@huddle/sync'
import { nodeSocket } from './socket.js'
import type { NodeSocketOptions } from './socket.js'

export interface NodeSessionOptions
  extends Omit<TransportSessionOptions, 'url' | 'createSocket'>,
    NodeSocketOptions {
  /**
   * Base server URL, e.g. `"ws://localhost:4000"`. The `path` option is
   * appended to form the final URL.
   *
   * Required in Node.js. In a browser it can be omitted: the URL is derived
   * from `window.location` (`wss:` over HTTPS, `ws:` over HTTP).
   */
  url?: string
  /** Socket endpoint path appended to `url`. @default '/socket' */
  path?: string
}

export function resolveSocketUrl(url: string | undefined, path: string): string {
  if (url) return url.replace(/\/?$/, '') + path
  if (typeof window !== 'undefined') {
    const proto = window.location.protocol === 'https:' ? 'wss:' : 'ws:'
    return `${proto}//${window.location.host}${path}`
  }
  throw new TransportError(
    '[sync:node] No WebSocket URL provided. Pass `url` to nodeSession().',
  )
}

/**
 * A transport session wired to {@link nodeSocket}.
 *
 * @example
 * import { nodeSession } from '@huddle/sync-preset-node'
 *
 * const session = nodeSession({
 *   url: 'ws://localhost:4000',
 *   token: bootstrap.token,
 *   auth: { refresh: (token) => api.refreshToken(token) },
 * })
 */
export function nodeSession(options: NodeSessionOptions): TransportSession {
  const { url, path = '/socket', implementation, ...sessionOptions } = options
  return createTransportSession({
    ...sessionOptions,
    url: resolveSocketUrl(url, path),
    createSocket: nodeSocket({ implementation }),
  })
}
