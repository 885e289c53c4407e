import { describe, it, expect } from 'vitest'
import { initialTransportState, isRetryPending, transition } from '@huddle/sync'
import type { TransportInput, TransportState } from '@huddle/sync'

function run(state: TransportState, ...inputs: TransportInput[]): TransportState {
  return inputs.reduce(transition, state)
}

const connecting: TransportState = { status: 'connecting', attempt: 0 }
const connected: TransportState = { status: 'connected' }

describe('transition', () => {
  it('connects through the join handshake', () => {
    const state = run(initialTransportState, { type: 'connect' }, { type: 'start' })
    expect(state).toEqual({ status: 'connected' })
  })

  it('schedules the first reconnect when a live connection closes', () => {
    expect(transition(connected, { type: 'close' })).toEqual({ status: 'disconnected', attempt: 1 })
  })

  it('counts failed attempts while negotiating', () => {
    const state = run(
      connecting,
      { type: 'close' },
      { type: 'retry' },
      { type: 'fail', reason: 'socket error' },
    )
    expect(state).toEqual({ status: 'errored', reason: 'socket error', retryable: true, attempt: 2 })
  })

  it('describes a close before start', () => {
    expect(transition(connecting, { type: 'close' })).toEqual({
      status: 'errored',
      reason: 'closed before start',
      retryable: true,
      attempt: 1,
    })
  })

  it('carries the attempt into the retry and resets it on start', () => {
    const errored: TransportState = { status: 'errored', reason: 'x', retryable: true, attempt: 3 }
    const retrying = transition(errored, { type: 'retry' })
    expect(retrying).toEqual({ status: 'connecting', attempt: 3 })
    expect(transition(retrying, { type: 'start' })).toEqual({ status: 'connected' })
  })

  it('makes abort terminal until connect', () => {
    const aborted = transition(connecting, { type: 'abort', reason: 'protocol mismatch' })
    expect(aborted).toEqual({ status: 'errored', reason: 'protocol mismatch', retryable: false, attempt: 0 })
    expect(transition(aborted, { type: 'retry' })).toBe(aborted)
    expect(transition(aborted, { type: 'connect' })).toEqual({ status: 'connecting', attempt: 0 })
  })

  it('ignores retries after an explicit disconnect', () => {
    const closed = transition(connected, { type: 'disconnect' })
    expect(closed).toEqual({ status: 'disconnected', attempt: 0 })
    expect(transition(closed, { type: 'retry' })).toBe(closed)
    expect(transition(closed, { type: 'reconnect' })).toBe(closed)
  })

  it('lets a pending reconnect run early with a fresh token', () => {
    const dropped: TransportState = { status: 'disconnected', attempt: 1 }
    expect(transition(dropped, { type: 'reconnect' })).toEqual({ status: 'connecting', attempt: 0 })
  })

  it('returns the same state for inputs the status does not accept', () => {
    expect(transition(connected, { type: 'start' })).toBe(connected)
    expect(transition(connected, { type: 'connect' })).toBe(connected)
    expect(transition(initialTransportState, { type: 'close' })).toBe(initialTransportState)
  })

  it('closes from any status on expiry', () => {
    for (const state of [initialTransportState, connecting, connected]) {
      expect(transition(state, { type: 'expire' })).toEqual({ status: 'disconnected', attempt: 0 })
    }
  })
})

describe('isRetryPending', () => {
  it('is true only while a back-off retry is scheduled', () => {
    expect(isRetryPending(initialTransportState)).toBe(false)
    expect(isRetryPending({ status: 'disconnected', attempt: 1 })).toBe(true)
    expect(isRetryPending({ status: 'errored', reason: 'x', retryable: true, attempt: 1 })).toBe(true)
    expect(isRetryPending({ status: 'errored', reason: 'x', retryable: false, attempt: 0 })).toBe(false)
    expect(isRetryPending(connected)).toBe(false)
  })
})
