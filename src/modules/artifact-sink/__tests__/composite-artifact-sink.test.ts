/**
 * Unit tests for CompositeArtifactSink
 */

import { describe, it, expect, vi } from 'vitest'
import { PersistenceError } from '../../../core/errors.js'
import type { ArtifactSink, RunArtifacts } from '../artifact-sink.js'
import { CompositeArtifactSink } from '../composite-artifact-sink.js'
import { makeArtifacts } from '../../../../test/helpers/run-fixtures.js'

vi.mock('../../../utils/logger.js', async () => {
  const { default: pino } = await import('pino')
  return { createLogger: () => pino({ level: 'silent' }) }
})

function sinkNamed(name: string, emit: (a: RunArtifacts) => Promise<void>) {
  const sink = { name, emit: vi.fn(emit) }
  return sink satisfies ArtifactSink
}

describe('CompositeArtifactSink', () => {
  it('joins the names of its sinks', () => {
    const sink = new CompositeArtifactSink([
      sinkNamed('file', () => Promise.resolve()),
      sinkNamed('sqlite', () => Promise.resolve()),
    ])
    expect(sink.name).toBe('file+sqlite')
  })

  it('emits to every sink in order', async () => {
    const order: string[] = []
    const a = sinkNamed('a', () => {
      order.push('a')
      return Promise.resolve()
    })
    const b = sinkNamed('b', () => {
      order.push('b')
      return Promise.resolve()
    })
    const artifacts = makeArtifacts()

    await new CompositeArtifactSink([a, b]).emit(artifacts)

    expect(order).toEqual(['a', 'b'])
    expect(b.emit).toHaveBeenCalledWith(artifacts)
  })

  it('keeps going after a failure and reports every failed sink', async () => {
    const a = sinkNamed('a', () => Promise.reject(new Error('disk full')))
    const b = sinkNamed('b', () => Promise.resolve())
    const c = sinkNamed('c', () => Promise.reject(new Error('locked')))

    const promise = new CompositeArtifactSink([a, b, c]).emit(makeArtifacts())

    await expect(promise).rejects.toBeInstanceOf(PersistenceError)
    await expect(promise).rejects.toThrow('2 of 3 artifact sink(s) failed: a: disk full; c: locked')
    expect(b.emit).toHaveBeenCalledTimes(1)
  })
})
