import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { WebSocketServer } from 'ws'
import type { RawData } from 'ws'
import { TransportError, silentLogger } from '@huddle/sync'
import type { TransportSession } from '@huddle/sync'
import { nodeSession, nodeSocket, resolveSocketUrl } from '@huddle/sync-preset-node'
import { makePost } from './fixtures.js'

// ---------------------------------------------------------------------------
// In-process server
// ---------------------------------------------------------------------------

function frameType(data: RawData): { type: string; token?: string; topic?: string } | null {
  const frame: unknown = JSON.parse(data.toString())
  if (typeof frame !== 'object' || frame === null || !('type' in frame)) return null
  if (typeof frame.type !== 'string') return null
  return {
    type: frame.type,
    token: 'token' in frame && typeof frame.token === 'string' ? frame.token : undefined,
    topic: 'topic' in frame && typeof frame.topic === 'string' ? frame.topic : undefined,
  }
}

let server: WebSocketServer
let baseUrl: string
let session: TransportSession | null = null

beforeEach(async () => {
  server = new WebSocketServer({ host: '127.0.0.1', port: 0 })
  await new Promise<void>((resolve) => server.once('listening', () => resolve()))
  const address = server.address()
  if (address === null || typeof address === 'string') throw new Error('server has no port')
  baseUrl = `ws://127.0.0.1:${address.port}`

  server.on('connection', (socket) => {
    socket.on('message', (data) => {
      const frame = frameType(data)
      if (frame?.type === 'join') {
        socket.send(JSON.stringify(frame.token === 'test-token' ? { type: 'start' } : { type: 'error' }))
      }
      if (frame?.type === 'subscribe' && frame.topic) {
        socket.send(
          JSON.stringify({
            type: 'result',
            topic: frame.topic,
            payload: { type: 'post.created', post: makePost() },
          }),
        )
      }
    })
  })
})

afterEach(async () => {
  session?.disconnect()
  session = null
  for (const client of server.clients) client.terminate()
  await new Promise<void>((resolve) => server.close(() => resolve()))
  vi.unstubAllGlobals()
})

function connectSession(): TransportSession {
  session = nodeSession({
    url: baseUrl,
    implementation: 'ws',
    token: 'test-token',
    auth: { refresh: async () => ({ ok: false, reason: 'expired' }) },
    logger: silentLogger,
  })
  return session
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('nodeSession', () => {
  it('connects over the ws package', async () => {
    const live = connectSession()
    await live.connect()
    expect(live.store.state.status).toBe('connected')
  })

  it('receives results for subscribed topics', async () => {
    const live = connectSession()
    const received = new Promise<unknown>((resolve) => {
      live.subscribe('space:s1', resolve)
    })

    await live.connect()

    expect(await received).toEqual({ type: 'post.created', post: makePost() })
  })
})

describe('nodeSocket', () => {
  it('prefers the global WebSocket when there is one', () => {
    class GlobalSocket {
      constructor(readonly url: string) {}
    }
    vi.stubGlobal('WebSocket', GlobalSocket)

    expect(nodeSocket()('ws://sync.test/socket')).toBeInstanceOf(GlobalSocket)
  })

  it('throws for the native implementation where there is none', () => {
    vi.stubGlobal('WebSocket', undefined)

    expect(() => nodeSocket({ implementation: 'native' })('ws://sync.test/socket')).toThrow(
      '[sync:node] This runtime has no global WebSocket.',
    )
  })
})

describe('resolveSocketUrl', () => {
  it('appends the path to the base URL', () => {
    expect(resolveSocketUrl('ws://localhost:4000', '/socket')).toBe('ws://localhost:4000/socket')
    expect(resolveSocketUrl('ws://localhost:4000/', '/socket')).toBe('ws://localhost:4000/socket')
  })

  it('requires a URL outside the browser', () => {
    expect(() => resolveSocketUrl(undefined, '/socket')).toThrow(TransportError)
  })
})
