/**
 * Registry Tests
 */

import { describe, it, expect } from 'vitest'
import { createRegistry } from './registry.js'

describe('Registry', () => {
  it('should register handlers of every kind', () => {
    const registry = createRegistry()
    registry.unary('svc.Unary', () => 'ok', { timeoutMs: 100 })
    registry.serverStream('svc.Stream', async function* () {
      yield 1
    })
    registry.bidiStream('svc.Bidi', (input) => input)

    expect(registry.get('svc.Unary')?.kind).toBe('unary')
    expect(registry.get('svc.Unary')?.meta.timeoutMs).toBe(100)
    expect(registry.has('svc.Stream')).toBe(true)
    expect(registry.list().map((meta) => meta.method)).toEqual(['svc.Unary', 'svc.Stream', 'svc.Bidi'])
    expect(registry.listByKind('bidi-stream')).toEqual([
      { kind: 'bidi-stream', method: 'svc.Bidi', description: undefined },
    ])
  })

  it('should reject duplicate methods', () => {
    const registry = createRegistry()
    registry.unary('svc.Unary', () => 'ok')
    expect(() => registry.serverStream('svc.Unary', async function* () {})).toThrow(
      "Handler 'svc.Unary' already registered"
    )
  })

  it('should reject empty names and non-positive timeouts', () => {
    const registry = createRegistry()
    expect(() => registry.unary('', () => 'ok')).toThrow('Method name must not be empty')
    expect(() => registry.unary('svc.Unary', () => 'ok', { timeoutMs: 0 })).toThrow(
      "Handler 'svc.Unary': timeoutMs must be positive"
    )
  })

  it('should return undefined for unknown methods', () => {
    expect(createRegistry().get('svc.Missing')).toBeUndefined()
  })
})
