import { describe, it, expect, vi } from 'vitest'
import { createEntityCache, silentLogger, updatedAtVersion } from '@huddle/sync'
import type { EntityChange } from '@huddle/sync'
import { makePost, makeSpaceUser, makeUser } from './fixtures.js'

describe('createEntityCache', () => {
  it('returns undefined for entities that were never loaded', () => {
    const cache = createEntityCache({ logger: silentLogger })
    expect(cache.get('post', 'p1')).toBeUndefined()
    expect(cache.all('post')).toEqual([])
  })

  it('keeps only the last snapshot written per id', () => {
    const cache = createEntityCache({ logger: silentLogger })
    cache.put('post', makePost({ body: 'first' }))
    cache.put('post', makePost({ body: 'second' }))

    expect(cache.get('post', 'p1')?.body).toBe('second')
    expect(cache.all('post')).toHaveLength(1)
  })

  it('treats a repeated put as a no-op', () => {
    const cache = createEntityCache({ logger: silentLogger })
    const changes: EntityChange[] = []
    cache.onChange((change) => changes.push(change))

    const afterFirst = cache.put('post', makePost())
    const afterSecond = cache.put('post', makePost())

    expect(afterSecond).toBe(afterFirst)
    expect(changes).toEqual([{ kind: 'post', ids: ['p1'] }])
  })

  it('never mutates a previous state', () => {
    const cache = createEntityCache({ logger: silentLogger })
    const before = cache.store.state
    const after = cache.put('post', makePost())

    expect(after).not.toBe(before)
    expect(before.post).toEqual({})
    expect(after.user).toBe(before.user)
  })

  it('ignores older or equal versions of versioned kinds', () => {
    const cache = createEntityCache({ logger: silentLogger })
    cache.put('user', makeUser({ firstName: 'Newer', updatedAt: '2024-01-02T00:00:00.000Z' }))
    cache.put('user', makeUser({ firstName: 'Older', updatedAt: '2024-01-01T00:00:00.000Z' }))
    cache.put('user', makeUser({ firstName: 'Same', updatedAt: '2024-01-02T00:00:00.000Z' }))

    expect(cache.get('user', 'u1')?.firstName).toBe('Newer')

    cache.put('user', makeUser({ firstName: 'Latest', updatedAt: '2024-01-03T00:00:00.000Z' }))
    expect(cache.get('user', 'u1')?.firstName).toBe('Latest')
  })

  it('falls back to last-write-wins for unversioned kinds', () => {
    const cache = createEntityCache({ logger: silentLogger })
    cache.put('post', makePost({ body: 'edited', updatedAt: '2024-01-02T00:00:00.000Z' }))
    cache.put('post', makePost({ body: 'read', updatedAt: '2024-01-01T00:00:00.000Z' }))

    expect(cache.get('post', 'p1')?.body).toBe('read')
  })

  it('accepts custom version functions', () => {
    const cache = createEntityCache({
      logger: silentLogger,
      versionOf: { post: updatedAtVersion },
    })
    cache.put('post', makePost({ body: 'edited', updatedAt: '2024-01-02T00:00:00.000Z' }))
    cache.put('post', makePost({ body: 'stale', updatedAt: '2024-01-01T00:00:00.000Z' }))

    expect(cache.get('post', 'p1')?.body).toBe('edited')
  })

  it('writes snapshots without a version', () => {
    const cache = createEntityCache({ logger: silentLogger })
    cache.put('user', makeUser({ firstName: 'Versioned', updatedAt: '2024-01-02T00:00:00.000Z' }))
    cache.put('user', makeUser({ firstName: 'Unversioned' }))

    expect(cache.get('user', 'u1')?.firstName).toBe('Unversioned')
  })

  it('getMany returns loaded snapshots in the order asked, skipping missing ids', () => {
    const cache = createEntityCache({ logger: silentLogger })
    cache.putMany('post', [makePost({ id: 'p1' }), makePost({ id: 'p2' })])

    const ids = cache.getMany('post', ['p2', 'missing', 'p1']).map((post) => post.id)
    expect(ids).toEqual(['p2', 'p1'])
  })

  it('putBatch merges several kinds and reports each', () => {
    const cache = createEntityCache({ logger: silentLogger })
    const changes: EntityChange[] = []
    cache.onChange((change) => changes.push(change))

    cache.putBatch({ post: [makePost()], user: [makeUser()] })

    expect(cache.get('post', 'p1')).toEqual(makePost())
    expect(cache.get('user', 'u1')).toEqual(makeUser())
    expect(changes).toEqual([
      { kind: 'user', ids: ['u1'] },
      { kind: 'post', ids: ['p1'] },
    ])
  })

  it('loads initial contents', () => {
    const cache = createEntityCache({
      logger: silentLogger,
      initial: { spaceUser: [makeSpaceUser()] },
    })
    expect(cache.get('spaceUser', 'su1')).toEqual(makeSpaceUser())
  })

  it('reports only the snapshots that changed', () => {
    const cache = createEntityCache({ logger: silentLogger })
    cache.putMany('post', [makePost({ id: 'p1' }), makePost({ id: 'p2' })])

    const changes: EntityChange[] = []
    cache.onChange((change) => changes.push(change))
    cache.putMany('post', [makePost({ id: 'p1' }), makePost({ id: 'p2', body: 'changed' })])

    expect(changes).toEqual([{ kind: 'post', ids: ['p2'] }])
  })

  it('keeps notifying other listeners when one throws', () => {
    const logger = { ...silentLogger, error: vi.fn() }
    const cache = createEntityCache({ logger })
    const healthy = vi.fn()
    cache.onChange(() => {
      throw new Error('listener failed')
    })
    cache.onChange(healthy)

    cache.put('post', makePost())

    expect(healthy).toHaveBeenCalledTimes(1)
    expect(logger.error).toHaveBeenCalledTimes(1)
  })

  it('stops notifying after unsubscribe', () => {
    const cache = createEntityCache({ logger: silentLogger })
    const listener = vi.fn()
    const off = cache.onChange(listener)
    off()

    cache.put('post', makePost())
    expect(listener).not.toHaveBeenCalled()
  })
})
