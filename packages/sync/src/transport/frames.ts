import { z } from 'zod'

// ---------------------------------------------------------------------------
// Server → client
// ---------------------------------------------------------------------------

/**
 * The four inbound signals of the socket protocol, plus presence frames and
 * an `unknown` fallback for anything this client version does not recognise.
 *
 * - `abort`: the server refused the join (e.g. stale protocol version).
 * - `start`: the join was accepted; the connection is usable.
 * - `result`: a domain event for a subscribed topic.
 * - `error`: the token was rejected mid-stream.
 */
export type InboundFrame =
  | { readonly kind: 'start' }
  | { readonly kind: 'abort'; readonly reason: string }
  | { readonly kind: 'error'; readonly reason: string }
  | { readonly kind: 'result'; readonly topic: string; readonly payload: unknown }
  | { readonly kind: 'presence'; readonly topic: string; readonly payload: unknown }
  | { readonly kind: 'unknown'; readonly raw: unknown }

const inboundSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('start') }),
  z.object({ type: z.literal('abort'), reason: z.string().default('aborted') }),
  z.object({ type: z.literal('error'), reason: z.string().default('unauthorized') }),
  z.object({ type: z.literal('result'), topic: z.string(), payload: z.unknown() }),
  z.object({ type: z.literal('presence'), topic: z.string(), payload: z.unknown() }),
])

function parseJson(data: unknown): unknown {
  if (typeof data !== 'string') return data
  try {
    return JSON.parse(data)
  } catch {
    return undefined
  }
}

/**
 * Decode a socket message. Accepts the raw JSON text or an already-parsed
 * value. Never throws.
 */
export function decodeFrame(data: unknown): InboundFrame {
  const parsed = parseJson(data)
  const result = inboundSchema.safeParse(parsed)
  if (!result.success) return { kind: 'unknown', raw: data }

  const frame = result.data
  switch (frame.type) {
    case 'start':
      return { kind: 'start' }
    case 'abort':
      return { kind: 'abort', reason: frame.reason }
    case 'error':
      return { kind: 'error', reason: frame.reason }
    case 'result':
      return { kind: 'result', topic: frame.topic, payload: frame.payload }
    case 'presence':
      return { kind: 'presence', topic: frame.topic, payload: frame.payload }
  }
}

// ---------------------------------------------------------------------------
// Client → server
// ---------------------------------------------------------------------------

export type OutboundFrame =
  | { readonly type: 'join'; readonly token: string; readonly protocolVersion: string }
  | { readonly type: 'subscribe'; readonly topic: string }
  | { readonly type: 'unsubscribe'; readonly topic: string }
  | { readonly type: 'presence:request'; readonly topic: string }

export function encodeFrame(frame: OutboundFrame): string {
  return JSON.stringify(frame)
}
