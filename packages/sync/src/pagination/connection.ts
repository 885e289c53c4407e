/**
 * Cursor pagination over ordered node lists.
 *
 * Cursors encode the sort key of the node they were issued for (keyset
 * pagination), so a cursor keeps pointing at the same position in the order
 * no matter how many nodes are inserted before or after it.
 *
 * All operations are pure: they return a new `Connection` and never modify
 * their input.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PageInfo {
  readonly hasPreviousPage: boolean
  readonly hasNextPage: boolean
  readonly startCursor: string | null
  readonly endCursor: string | null
}

export interface Edge<T> {
  readonly node: T
  readonly cursor: string
}

export interface Connection<T> {
  readonly edges: ReadonlyArray<Edge<T>>
  readonly pageInfo: PageInfo
}

export interface CursorCodec<K> {
  encode(key: K): string
  /** Returns `undefined` for cursors this codec did not produce. */
  decode(cursor: string): K | undefined
}

/** Describes the server's order for one kind of node. */
export interface KeysetOrder<T, K> {
  getId(node: T): string
  /** Sort key. Must be unique per node (include the id as a tie-breaker). */
  key(node: T): K
  /** Negative when `a` precedes `b` in the order. */
  compare(a: K, b: K): number
  codec: CursorCodec<K>
}

export type PageArgs =
  | { first: number; after?: string; last?: never; before?: string }
  | { last: number; before?: string; first?: never; after?: string }
  | { first?: never; last?: never; after?: string; before?: string }

export type PageDirection = 'after' | 'before'

// ---------------------------------------------------------------------------
// Orders
// ---------------------------------------------------------------------------

/** Creates a codec that serializes keys as URI-encoded JSON. */
export function jsonCursorCodec<K>(
  isKey: (value: unknown) => value is K,
): CursorCodec<K> {
  return {
    encode(key) {
      return encodeURIComponent(JSON.stringify(key))
    },
    decode(cursor) {
      try {
        const parsed: unknown = JSON.parse(decodeURIComponent(cursor))
        return isKey(parsed) ? parsed : undefined
      } catch {
        return undefined
      }
    },
  }
}

export type TimestampKey = readonly [number, string]

function isTimestampKey(value: unknown): value is TimestampKey {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    typeof value[0] === 'number' &&
    Number.isFinite(value[0]) &&
    typeof value[1] === 'string'
  )
}

const timestampCodec = jsonCursorCodec(isTimestampKey)

/**
 * Order nodes by an ISO-8601 timestamp field, ties broken by id.
 *
 * @example
 * const newestFirst = timestampOrder<Post>('postedAt', 'desc')
 * const oldestFirst = timestampOrder<Reply>('postedAt', 'asc')
 */
export function timestampOrder<
  T extends { id: string } & Record<F, string>,
  F extends string = 'postedAt',
>(field: F, direction: 'asc' | 'desc' = 'asc'): KeysetOrder<T, TimestampKey> {
  const sign = direction === 'asc' ? 1 : -1
  return {
    getId: (node) => node.id,
    key: (node) => [Date.parse(node[field]), node.id],
    compare(a, b) {
      if (a[0] !== b[0]) return (a[0] - b[0]) * sign
      if (a[1] === b[1]) return 0
      return (a[1] < b[1] ? -1 : 1) * sign
    },
    codec: timestampCodec,
  }
}

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

export function emptyConnection<T>(): Connection<T> {
  return {
    edges: [],
    pageInfo: {
      hasPreviousPage: false,
      hasNextPage: false,
      startCursor: null,
      endCursor: null,
    },
  }
}

function toEdge<T, K>(order: KeysetOrder<T, K>, node: T): Edge<T> {
  return { node, cursor: order.codec.encode(order.key(node)) }
}

function withEdges<T>(
  edges: ReadonlyArray<Edge<T>>,
  flags: { hasPreviousPage: boolean; hasNextPage: boolean },
): Connection<T> {
  return {
    edges,
    pageInfo: {
      hasPreviousPage: flags.hasPreviousPage,
      hasNextPage: flags.hasNextPage,
      startCursor: edges[0]?.cursor ?? null,
      endCursor: edges[edges.length - 1]?.cursor ?? null,
    },
  }
}

/** Index of the first sorted node whose key satisfies `pred`, or `length`. */
function findIndex<T, K>(
  sorted: ReadonlyArray<T>,
  order: KeysetOrder<T, K>,
  pred: (cmp: number) => boolean,
  anchor: K,
): number {
  const idx = sorted.findIndex((node) => pred(order.compare(order.key(node), anchor)))
  return idx === -1 ? sorted.length : idx
}

/**
 * Materialize a page window from a complete, locally known node list.
 *
 * `after` keeps nodes strictly following the cursor, `before` nodes strictly
 * preceding it; `first`/`last` then trim the window from the front/back.
 * `hasPreviousPage`/`hasNextPage` report whether nodes exist beyond the
 * window. A cursor the order's codec cannot decode yields an empty page.
 *
 * @example
 * const page1 = paginate(replies, oldestFirst, { first: 20 })
 * const page2 = paginate(replies, oldestFirst, {
 *   first: 20,
 *   after: page1.pageInfo.endCursor ?? undefined,
 * })
 */
export function paginate<T, K>(
  nodes: ReadonlyArray<T>,
  order: KeysetOrder<T, K>,
  args: PageArgs = {},
): Connection<T> {
  const sorted = [...nodes].sort((a, b) => order.compare(order.key(a), order.key(b)))

  let lower = 0
  let upper = sorted.length

  if (args.after !== undefined) {
    const anchor = order.codec.decode(args.after)
    if (anchor === undefined) return emptyConnection()
    lower = findIndex(sorted, order, (cmp) => cmp > 0, anchor)
  }
  if (args.before !== undefined) {
    const anchor = order.codec.decode(args.before)
    if (anchor === undefined) return emptyConnection()
    upper = findIndex(sorted, order, (cmp) => cmp >= 0, anchor)
  }
  if (upper < lower) upper = lower

  let start = lower
  let end = upper
  if (args.first !== undefined) end = Math.min(end, start + Math.max(0, args.first))
  if (args.last !== undefined) start = Math.max(start, end - Math.max(0, args.last))

  return withEdges(
    sorted.slice(start, end).map((node) => toEdge(order, node)),
    { hasPreviousPage: start > 0, hasNextPage: end < sorted.length },
  )
}

/**
 * Wrap a window returned by the server. The nodes are kept in the order
 * given; the page flags are the ones the query reported.
 */
export function fromWindow<T, K>(
  nodes: ReadonlyArray<T>,
  flags: { hasPreviousPage: boolean; hasNextPage: boolean },
  order: KeysetOrder<T, K>,
): Connection<T> {
  return withEdges(
    nodes.map((node) => toEdge(order, node)),
    flags,
  )
}

// ---------------------------------------------------------------------------
// Structural updates
// ---------------------------------------------------------------------------

export function nodesOf<T>(connection: Connection<T>): Array<T> {
  return connection.edges.map((edge) => edge.node)
}

function withoutId<T, K>(
  edges: ReadonlyArray<Edge<T>>,
  order: KeysetOrder<T, K>,
  id: string,
): Array<Edge<T>> {
  return edges.filter((edge) => order.getId(edge.node) !== id)
}

/** Put `node` at the start of the window, replacing any node with the same id. */
export function prepend<T, K>(
  connection: Connection<T>,
  node: T,
  order: KeysetOrder<T, K>,
): Connection<T> {
  const rest = withoutId(connection.edges, order, order.getId(node))
  return withEdges([toEdge(order, node), ...rest], connection.pageInfo)
}

/** Put `node` at the end of the window, replacing any node with the same id. */
export function append<T, K>(
  connection: Connection<T>,
  node: T,
  order: KeysetOrder<T, K>,
): Connection<T> {
  const rest = withoutId(connection.edges, order, order.getId(node))
  return withEdges([...rest, toEdge(order, node)], connection.pageInfo)
}

/**
 * Insert `node` at its sorted position, replacing any node with the same id.
 *
 * A node that sorts beyond either edge of the window while more pages exist
 * in that direction is not inserted: it belongs to a page that has not been
 * loaded, and will arrive with it. A copy already in the window is removed.
 */
export function insert<T, K>(
  connection: Connection<T>,
  node: T,
  order: KeysetOrder<T, K>,
): Connection<T> {
  const edges = withoutId(connection.edges, order, order.getId(node))
  const key = order.key(node)

  // A loaded copy that moved out of the window is dropped, not kept stale.
  const outside = (): Connection<T> =>
    edges.length === connection.edges.length ? connection : withEdges(edges, connection.pageInfo)

  const first = edges[0]
  const last = edges[edges.length - 1]
  if (
    first !== undefined &&
    connection.pageInfo.hasPreviousPage &&
    order.compare(key, order.key(first.node)) < 0
  ) {
    return outside()
  }
  if (
    last !== undefined &&
    connection.pageInfo.hasNextPage &&
    order.compare(key, order.key(last.node)) > 0
  ) {
    return outside()
  }

  const idx = edges.findIndex((edge) => order.compare(order.key(edge.node), key) > 0)
  const at = idx === -1 ? edges.length : idx
  const next = [...edges.slice(0, at), toEdge(order, node), ...edges.slice(at)]
  return withEdges(next, connection.pageInfo)
}

export function remove<T, K>(
  connection: Connection<T>,
  id: string,
  order: KeysetOrder<T, K>,
): Connection<T> {
  const edges = withoutId(connection.edges, order, id)
  if (edges.length === connection.edges.length) return connection
  return withEdges(edges, connection.pageInfo)
}

/** Replace nodes in place. Cursors are kept: they describe positions, not content. */
export function mapNodes<T>(
  connection: Connection<T>,
  fn: (node: T) => T,
): Connection<T> {
  return {
    edges: connection.edges.map((edge) => ({ node: fn(edge.node), cursor: edge.cursor })),
    pageInfo: connection.pageInfo,
  }
}

/**
 * Merge a page fetched relative to this window. `'after'` pages (fetched
 * with `endCursor`) are appended, `'before'` pages (fetched with
 * `startCursor`) are prepended. Nodes already in the window win over
 * duplicates in the page.
 */
export function concatPage<T, K>(
  connection: Connection<T>,
  page: Connection<T>,
  direction: PageDirection,
  order: KeysetOrder<T, K>,
): Connection<T> {
  const seen = new Set(connection.edges.map((edge) => order.getId(edge.node)))
  const fresh = page.edges.filter((edge) => !seen.has(order.getId(edge.node)))

  if (direction === 'after') {
    return withEdges([...connection.edges, ...fresh], {
      hasPreviousPage: connection.pageInfo.hasPreviousPage,
      hasNextPage: page.pageInfo.hasNextPage,
    })
  }
  return withEdges([...fresh, ...connection.edges], {
    hasPreviousPage: page.pageInfo.hasPreviousPage,
    hasNextPage: connection.pageInfo.hasNextPage,
  })
}
