import { describe } from 'vitest'
import { it, expect } from '@effect/vitest'
import { makeHarness } from './testkit/harness.js'
import { makeRecordingIndicator, PhotoView } from './testkit/owners.js'

const A = 'https://img.test/a.png'
const B = 'https://img.test/b.png'

describe('LoadOrchestrator (supersession)', () => {
  it('shows the last-issued result when the older request completes last', () => {
    const h = makeHarness()
    const view = new PhotoView()

    h.loader.request({ owner: view, target: A, placeholder: 'ph', onCompleted: h.onCompleted })
    h.loader.request({ owner: view, target: B, placeholder: 'ph', onCompleted: h.onCompleted })
    const [loadA, loadB] = h.fake.loads

    loadB?.succeed('img:b')
    h.flush()
    loadA?.succeed('img:a')
    h.flush()

    // A's placeholder was already stale when the queue drained.
    expect(view.history).toEqual(['ph', 'img:b'])
    expect(view.layouts).toBe(1)
    expect(h.results.map((result) => result.image)).toEqual(['img:b', 'img:a'])
    expect(h.results.map((result) => result.url?.href)).toEqual([B, A])
  })

  it('shows the last-issued result when the older request completes first', () => {
    const h = makeHarness()
    const view = new PhotoView()

    h.loader.request({ owner: view, target: A, placeholder: 'ph', onCompleted: h.onCompleted })
    h.loader.request({ owner: view, target: B, placeholder: 'ph', onCompleted: h.onCompleted })
    const [loadA, loadB] = h.fake.loads

    loadA?.succeed('img:a')
    h.flush()
    expect(view.history).toEqual(['ph'])

    loadB?.succeed('img:b')
    h.flush()
    expect(view.history).toEqual(['ph', 'img:b'])
    expect(h.results.map((result) => result.image)).toEqual(['img:a', 'img:b'])
  })

  it('cancels exactly one previous handle before issuing the next fetch', () => {
    let previousAliveAtIssue: boolean | undefined
    let previousCancelled: (() => boolean) | undefined
    const h = makeHarness({
      respondSync: (url) => {
        if (url.href === B) previousAliveAtIssue = previousCancelled?.() === false
        return undefined
      },
    })
    const view = new PhotoView()

    h.loader.request({ owner: view, target: A })
    previousCancelled = h.fake.loads[0]?.cancelled
    h.loader.request({ owner: view, target: B })

    expect(previousAliveAtIssue).toBe(false)
    expect(h.fake.loads[0]?.cancelled()).toBe(true)
    expect(h.fake.loads[1]?.cancelled()).toBe(false)
    expect(h.eventsOf('load:cancelled')).toEqual([{ type: 'load:cancelled', key: 'PhotoView' }])
  })

  it('keeps the previous fetch alive while the next one is issued under avoidAutoCancelPrevious', () => {
    let previousAliveAtIssue: boolean | undefined
    let previousCancelled: (() => boolean) | undefined
    const h = makeHarness({
      respondSync: (url) => {
        if (url.href === B) previousAliveAtIssue = previousCancelled?.() === false
        return undefined
      },
    })
    const view = new PhotoView()

    h.loader.request({ owner: view, target: A })
    previousCancelled = h.fake.loads[0]?.cancelled
    h.loader.request({ owner: view, target: B, options: { avoidAutoCancelPrevious: true } })

    expect(previousAliveAtIssue).toBe(true)
    // Registering B's handle still evicts A's: one live handle per key.
    expect(h.fake.loads[0]?.cancelled()).toBe(true)
    expect(h.eventsOf('load:cancelled').length).toBe(1)
  })

  it('does not let a finished request evict its successor from the registry', () => {
    const h = makeHarness()
    const view = new PhotoView()

    h.loader.request({ owner: view, target: A, options: { avoidAutoCancelPrevious: true } })
    h.loader.request({ owner: view, target: B, options: { avoidAutoCancelPrevious: true } })
    h.fake.loads[0]?.succeed('img:a')

    expect(h.loader.cancel(view, 'PhotoView')).toBe(true)
    expect(h.fake.loads[1]?.cancelled()).toBe(true)
  })

  it('releases the registry entry on the final delivery', () => {
    const h = makeHarness()
    const view = new PhotoView()

    h.loader.request({ owner: view, target: A })
    h.fake.last().succeed('img:a')

    expect(h.loader.cancelLatest(view)).toBe(false)
    expect(h.fake.last().cancelled()).toBe(false)
  })

  it('treats cancelling an idle key as a no-op', () => {
    const h = makeHarness()
    const view = new PhotoView()

    expect(h.loader.cancel(view, 'PhotoView')).toBe(false)
    expect(h.loader.cancelLatest(view)).toBe(false)

    h.loader.request({ owner: view, target: A })
    expect(h.loader.cancelLatest(view)).toBe(true)
    expect(h.loader.cancelLatest(view)).toBe(false)
    expect(h.fake.last().cancelled()).toBe(true)
  })

  it('drops a cancelled request that still delivers, but reports its completion', () => {
    const h = makeHarness()
    const view = new PhotoView()

    h.loader.request({ owner: view, target: A, placeholder: 'ph', onCompleted: h.onCompleted })
    h.flush()
    h.loader.request({ owner: view, target: B, placeholder: 'ph2' })
    h.flush()

    h.fake.loads[0]?.succeed('img:a')
    h.flush()

    expect(view.history).toEqual(['ph', 'ph2'])
    expect(h.results.map((result) => result.image)).toEqual(['img:a'])
    expect(h.eventsOf('load:stale').map((event) => event.step)).toEqual(['presentation'])
  })

  it('keeps a request on another key from touching the owner', () => {
    const h = makeHarness()
    const view = new PhotoView()

    h.loader.request({ owner: view, target: A, placeholder: 'ph' })
    h.loader.request({
      owner: view,
      target: B,
      context: { operationKey: 'thumbnail' },
      setImage: (image) => {
        view.image = image
      },
    })
    h.flush()

    h.fake.loads[0]?.succeed('img:a')
    h.flush()

    // The first key is no longer the owner's latest key.
    expect(view.history).toEqual([undefined])
    expect(h.fake.loads[0]?.cancelled()).toBe(false)
    expect(h.loader.latestKey(view)).toBe('thumbnail')
  })

  it('skips progress writes once a newer request owns the slot progress', () => {
    const h = makeHarness()
    const view = new PhotoView()

    h.loader.request({ owner: view, target: A })
    h.loader.request({ owner: view, target: B })
    const progress = h.loader.imageProgress(view)

    h.fake.loads[0]?.progress(40, 100)
    h.fake.loads[0]?.succeed('img:a')

    expect(progress.isPristine).toBe(true)

    h.fake.loads[1]?.progress(10, 100)
    expect(progress.completedUnitCount).toBe(10)
  })

  it('guards indicator steps against supersession', () => {
    const h = makeHarness()
    const view = new PhotoView()
    const { indicator, calls } = makeRecordingIndicator()
    h.loader.setIndicator(view, indicator)

    h.loader.request({ owner: view, target: A })
    h.fake.loads[0]?.progress(50, 100)
    h.loader.request({ owner: view, target: B })
    h.flush()

    h.fake.loads[1]?.progress(25, 100)
    h.fake.loads[1]?.succeed('img:b')
    h.flush()

    expect(calls).toEqual(['attach', 'start', 'progress:0.25', 'stop'])
  })

  it('forwards raw samples to the observer even after supersession', () => {
    const h = makeHarness()
    const view = new PhotoView()
    const samples: Array<[number, number, string | undefined]> = []

    h.loader.request({
      owner: view,
      target: A,
      onProgress: (received, expected, url) => samples.push([received, expected, url?.href]),
    })
    h.loader.request({ owner: view, target: B })
    h.fake.loads[0]?.progress(5, 10)

    expect(samples).toEqual([[5, 10, A]])
  })
})
