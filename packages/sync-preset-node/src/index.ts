/**
 * @huddle/sync-preset-node
 *
 * WebSocket factory for `@huddle/sync` backed by the `ws` package in Node.js
 * and the global `WebSocket` elsewhere.
 */

export { nodeSocket } from './socket.js'
export type { NodeSocketOptions } from './socket.js'
export { nodeSession, resolveSocketUrl } from './session.js'
export type { NodeSessionOptions } from './session.js'
