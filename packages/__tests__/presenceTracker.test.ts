import { describe, it, expect, vi } from 'vitest'
import { createPresenceTracker, decodePresence, silentLogger } from '@huddle/sync'
import type { PresenceTracker } from '@huddle/sync'

const topic = 'post:p1'

function presentIds(tracker: PresenceTracker, key = topic): string[] {
  return tracker.present(key).map((actor) => actor.id)
}

describe('decodePresence', () => {
  it('decodes diffs with bare ids', () => {
    expect(decodePresence({ joins: ['u1'], leaves: ['u2'] })).toEqual({
      type: 'diff',
      joins: [{ id: 'u1', meta: {} }],
      leaves: [{ id: 'u2' }],
    })
  })

  it('decodes leaves carrying metadata', () => {
    expect(decodePresence({ leaves: [{ id: 'u1', meta: { device: 'phone' } }] })).toEqual({
      type: 'diff',
      joins: [],
      leaves: [{ id: 'u1', meta: { device: 'phone' } }],
    })
  })

  it('decodes joins carrying metadata', () => {
    expect(decodePresence({ joins: [{ id: 'u1', meta: { device: 'phone' } }] })).toEqual({
      type: 'diff',
      joins: [{ id: 'u1', meta: { device: 'phone' } }],
      leaves: [],
    })
  })

  it('decodes full state snapshots', () => {
    expect(decodePresence({ type: 'state', actors: ['u1'] })).toEqual({
      type: 'state',
      actors: [{ id: 'u1', meta: {} }],
    })
  })

  it('falls back to unknown for anything else', () => {
    expect(decodePresence({ foo: 1 })).toEqual({ type: 'unknown', raw: { foo: 1 } })
    expect(decodePresence('garbage')).toEqual({ type: 'unknown', raw: 'garbage' })
    expect(decodePresence({ joins: [42] })).toEqual({ type: 'unknown', raw: { joins: [42] } })
  })
})

describe('createPresenceTracker', () => {
  it('applies joins then leaves', () => {
    const tracker = createPresenceTracker({ logger: silentLogger })
    tracker.receive(topic, { joins: ['A', 'B'] })
    tracker.receive(topic, { leaves: ['A'] })

    expect(presentIds(tracker)).toEqual(['B'])
  })

  it('counts one reference per join', () => {
    const tracker = createPresenceTracker({ logger: silentLogger })
    tracker.receive(topic, { joins: ['A'] })
    tracker.receive(topic, { joins: ['A'] })
    expect(tracker.present(topic)[0]?.refs).toBe(2)

    tracker.receive(topic, { leaves: ['A'] })
    expect(tracker.present(topic)[0]?.refs).toBe(1)

    tracker.receive(topic, { leaves: ['A'] })
    expect(presentIds(tracker)).toEqual([])
  })

  it('records onlineSince at the first join and keeps metas per join', () => {
    const now = vi.fn().mockReturnValueOnce(100).mockReturnValueOnce(200)
    const tracker = createPresenceTracker({ now, logger: silentLogger })

    tracker.receive(topic, { joins: [{ id: 'A', meta: { device: 'laptop' } }] })
    tracker.receive(topic, { joins: [{ id: 'A', meta: { device: 'phone' } }] })

    expect(tracker.present(topic)).toEqual([
      {
        id: 'A',
        refs: 2,
        onlineSince: 100,
        metas: [{ device: 'laptop' }, { device: 'phone' }],
      },
    ])
  })

  it('removes the metadata of the connection that left', () => {
    const tracker = createPresenceTracker({ logger: silentLogger })
    tracker.receive(topic, {
      joins: [
        { id: 'A', meta: { device: 'laptop' } },
        { id: 'A', meta: { device: 'phone' } },
      ],
    })

    tracker.receive(topic, { leaves: [{ id: 'A', meta: { device: 'laptop' } }] })

    expect(tracker.present(topic)[0]).toMatchObject({ refs: 1, metas: [{ device: 'phone' }] })
  })

  it('ignores leaves for actors that are not present', () => {
    const tracker = createPresenceTracker({ logger: silentLogger })
    tracker.receive(topic, { joins: ['A'] })
    tracker.receive(topic, { leaves: ['Z'] })

    expect(presentIds(tracker)).toEqual(['A'])
  })

  it('replaces the topic on a state snapshot, keeping onlineSince of known actors', () => {
    const now = vi.fn().mockReturnValueOnce(100).mockReturnValueOnce(500)
    const tracker = createPresenceTracker({ now, logger: silentLogger })

    tracker.receive(topic, { joins: ['A', 'B'] })
    tracker.receive(topic, { type: 'state', actors: ['B', 'C'] })

    expect(tracker.present(topic).map((actor) => [actor.id, actor.onlineSince])).toEqual([
      ['B', 100],
      ['C', 500],
    ])
  })

  it('leaves state unchanged for undecodable payloads', () => {
    const tracker = createPresenceTracker({ logger: silentLogger })
    tracker.receive(topic, { joins: ['A'] })
    const before = tracker.store.state

    const event = tracker.receive(topic, { nonsense: true })

    expect(event.type).toBe('unknown')
    expect(tracker.store.state).toBe(before)
  })

  it('keeps topics independent', () => {
    const tracker = createPresenceTracker({ logger: silentLogger })
    tracker.receive('post:p1', { joins: ['A'] })
    tracker.receive('post:p2', { joins: ['B'] })

    expect(presentIds(tracker, 'post:p1')).toEqual(['A'])
    expect(presentIds(tracker, 'post:p2')).toEqual(['B'])
  })

  it('notifies subscribers after each applied event', () => {
    const tracker = createPresenceTracker({ logger: silentLogger })
    const seen: string[][] = []
    tracker.subscribe(topic, (actors) => seen.push(actors.map((actor) => actor.id)))

    tracker.receive(topic, { joins: ['A', 'B'] })
    tracker.receive(topic, { leaves: ['B'] })

    expect(seen).toEqual([['A', 'B'], ['A']])
  })

  it('drops the topic when its last subscriber leaves', () => {
    const tracker = createPresenceTracker({ logger: silentLogger })
    const first = tracker.subscribe(topic, () => {})
    const second = tracker.subscribe(topic, () => {})
    tracker.receive(topic, { joins: ['A'] })

    first()
    expect(presentIds(tracker)).toEqual(['A'])

    second()
    expect(presentIds(tracker)).toEqual([])
    expect(topic in tracker.store.state).toBe(false)
  })

  it('logs subscriber errors and keeps delivering', () => {
    const logger = { ...silentLogger, error: vi.fn() }
    const tracker = createPresenceTracker({ logger })
    const healthy = vi.fn()
    tracker.subscribe(topic, () => {
      throw new Error('render failed')
    })
    tracker.subscribe(topic, healthy)

    tracker.receive(topic, { joins: ['A'] })

    expect(healthy).toHaveBeenCalledTimes(1)
    expect(logger.error).toHaveBeenCalledTimes(1)
  })

  it('clear drops everything', () => {
    const tracker = createPresenceTracker({ logger: silentLogger })
    tracker.receive(topic, { joins: ['A'] })
    tracker.clear()

    expect(presentIds(tracker)).toEqual([])
    expect(tracker.store.state).toEqual({})
  })
})
