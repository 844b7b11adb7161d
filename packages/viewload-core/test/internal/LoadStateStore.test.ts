import { describe } from 'vitest'
import { it, expect } from '@effect/vitest'
import { makeLoadStateStore } from '../../src/internal/state/LoadStateStore.js'
import { Progress } from '../../src/internal/state/Progress.js'

describe('LoadStateStore', () => {
  it('keeps one state per (owner, key)', () => {
    const store = makeLoadStateStore()
    const owner = {}
    const other = {}
    const url = new URL('https://img.test/a.png')

    store.set(owner, 'main', { url, progress: undefined })

    expect(store.get(owner, 'main')?.url).toBe(url)
    expect(store.get(owner, 'thumb')).toBeUndefined()
    expect(store.get(other, 'main')).toBeUndefined()
  })

  it('reads a missing key as no state', () => {
    const store = makeLoadStateStore()
    const owner = {}
    store.set(owner, 'main', { url: undefined, progress: undefined })

    expect(store.get(owner, undefined)).toBeUndefined()
  })

  it('replaces and removes entries', () => {
    const store = makeLoadStateStore()
    const owner = {}
    const progress = new Progress()

    store.set(owner, 'main', { url: new URL('https://img.test/a.png'), progress })
    store.set(owner, 'main', { url: new URL('https://img.test/b.png'), progress })
    expect(store.get(owner, 'main')?.url?.href).toBe('https://img.test/b.png')
    expect(store.get(owner, 'main')?.progress).toBe(progress)

    store.remove(owner, 'main')
    store.remove(owner, 'main')
    expect(store.get(owner, 'main')).toBeUndefined()
  })
})

describe('Progress', () => {
  it('derives the completed fraction', () => {
    const progress = new Progress()
    expect(progress.fractionCompleted).toBe(0)

    progress.totalUnitCount = 200
    progress.completedUnitCount = 50
    expect(progress.fractionCompleted).toBe(0.25)

    progress.completedUnitCount = 300
    expect(progress.fractionCompleted).toBe(1)

    progress.totalUnitCount = -1
    expect(progress.fractionCompleted).toBe(0)
  })

  it('tells "never started" from "done without byte counts"', () => {
    const progress = new Progress()
    expect(progress.isPristine).toBe(true)

    progress.markUnknownComplete()
    expect(progress.isPristine).toBe(false)
    expect(progress.fractionCompleted).toBe(1)

    progress.reset()
    expect([progress.totalUnitCount, progress.completedUnitCount]).toEqual([0, 0])
  })
})
