/**
 * Call Tracker Tests
 */

import { describe, it, expect } from 'vitest'
import { createCallTracker } from './calls.js'
import { Errors } from '../errors/factories.js'

describe('CallTracker', () => {
  it('should move a call through its lifecycle', () => {
    const tracker = createCallTracker()
    const call = tracker.begin('req-1', 'svc.Unary', 'unary', new AbortController().signal)

    expect(call.state).toBe('pending')
    call.activate()
    expect(call.state).toBe('active')
    expect(tracker.active().map((snapshot) => snapshot.id)).toEqual(['req-1'])

    call.settle({})
    expect(call.state).toBe('completed')
    expect(call.terminal).toBe(true)
    expect(tracker.size).toBe(0)
  })

  it('should never leave a terminal state', () => {
    const tracker = createCallTracker()
    const call = tracker.begin('req-1', 'svc.Unary', 'unary', new AbortController().signal)

    call.settle({ error: Errors.timeout().toJSON() })
    call.settle({})
    call.activate()

    expect(call.state).toBe('failed')
    expect(call.snapshot().error?.code).toBe('TIMEOUT')
  })

  it('should classify CANCELLED as cancelled', () => {
    const tracker = createCallTracker()
    const call = tracker.begin('req-1', 'svc.Stream', 'server-stream', new AbortController().signal)

    call.settle({ error: Errors.cancelled().toJSON() })
    expect(call.state).toBe('cancelled')
  })

  it('should abort the call signal when the transport signal aborts', () => {
    const transport = new AbortController()
    const call = createCallTracker().begin('req-1', 'svc.Unary', 'unary', transport.signal)

    transport.abort()
    expect(call.signal.aborted).toBe(true)
    expect(call.signal.reason).toMatchObject({ code: 'CANCELLED', message: 'Call cancelled by client' })
  })

  it('should start aborted when the transport signal already is', () => {
    const transport = new AbortController()
    transport.abort()

    const call = createCallTracker().begin('req-1', 'svc.Unary', 'unary', transport.signal)
    expect(call.signal.aborted).toBe(true)
  })

  it('should abort every open call on cancelAll', () => {
    const tracker = createCallTracker()
    const first = tracker.begin('req-1', 'svc.A', 'unary', new AbortController().signal)
    const second = tracker.begin('req-2', 'svc.B', 'bidi-stream', new AbortController().signal)
    second.settle({})

    expect(tracker.cancelAll('maintenance')).toBe(1)
    expect(first.signal.reason).toMatchObject({ code: 'CANCELLED', message: 'maintenance' })
    expect(second.signal.aborted).toBe(false)
  })
})
