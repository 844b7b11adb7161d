import { describe } from 'vitest'
import { it, expect } from '@effect/vitest'
import { Buttons, ImageViews } from '../src/Surfaces.js'
import { makeHarness } from './testkit/harness.js'
import { ActionButton, makeRecordingIndicator, PhotoView } from './testkit/owners.js'

const A = 'https://img.test/a.png'
const B = 'https://img.test/b.png'

describe('Surfaces', () => {
  it('loads the image and highlighted image of a view on separate keys', () => {
    const h = makeHarness()
    const view = new PhotoView()

    ImageViews.load(h.loader, view, A, { placeholder: 'ph' })
    ImageViews.loadHighlighted(h.loader, view, B, { placeholder: 'ph-hl' })
    h.flush()

    const [main, highlighted] = h.fake.loads
    expect(main?.cancelled()).toBe(false)
    expect(highlighted?.context.operationKey).toBe('highlightedImage')

    highlighted?.succeed('img:b')
    main?.succeed('img:a')
    h.flush()

    // The main image belongs to a key that is no longer the latest one.
    expect(view.history).toEqual([])
    expect(view.highlightedImage).toBe('img:b')
    expect(ImageViews.imageUrl(h.loader, view)?.href).toBe(B)
    expect(ImageViews.highlightedImageUrl(h.loader, view)?.href).toBe(B)
    expect(h.loader.loadState(view, 'PhotoView')?.url?.href).toBe(A)
  })

  it('cancels the highlighted slot only', () => {
    const h = makeHarness()
    const view = new PhotoView()

    ImageViews.load(h.loader, view, A)
    ImageViews.loadHighlighted(h.loader, view, B)

    expect(ImageViews.cancelHighlighted(h.loader, view)).toBe(true)
    expect(h.fake.loads[0]?.cancelled()).toBe(false)
    expect(h.fake.loads[1]?.cancelled()).toBe(true)
  })

  it('keeps one slot per button state', () => {
    const h = makeHarness()
    const button = new ActionButton()

    Buttons.load(h.loader, button, 'normal', A)
    Buttons.load(h.loader, button, 'selected', B)
    Buttons.loadBackground(h.loader, button, 'normal', B)

    expect(h.fake.loads.map((load) => load.context.operationKey)).toEqual([
      'buttonImage:normal',
      'buttonImage:selected',
      'buttonBackgroundImage:normal',
    ])
    expect(h.fake.loads.some((load) => load.cancelled())).toBe(false)

    h.fake.loads[2]?.succeed('bg:b')
    h.flush()

    expect(button.backgrounds.get('normal')).toBe('bg:b')
    expect(Buttons.imageUrl(h.loader, button, 'selected')?.href).toBe(B)
    expect(Buttons.backgroundImageUrl(h.loader, button, 'normal')?.href).toBe(B)
    expect(Buttons.imageUrl(h.loader, button, 'disabled')).toBeUndefined()
    expect(Buttons.cancel(h.loader, button, 'normal')).toBe(true)
    expect(Buttons.cancelBackground(h.loader, button, 'normal')).toBe(false)
  })

  it('presents only the state issued last, while every state completes', () => {
    const h = makeHarness()
    const button = new ActionButton()

    Buttons.load(h.loader, button, 'normal', A, { onCompleted: h.onCompleted })
    Buttons.load(h.loader, button, 'highlighted', B, { onCompleted: h.onCompleted })
    h.fake.loads[0]?.succeed('img:n')
    h.fake.loads[1]?.succeed('img:h')
    h.flush()

    expect([...button.images]).toEqual([['highlighted', 'img:h']])
    expect(h.results.map((result) => result.image)).toEqual(['img:n', 'img:h'])
    expect(h.fake.loads[0]?.cancelled()).toBe(false)
  })

  it('sets the requested state on the button', () => {
    const h = makeHarness()
    const button = new ActionButton()

    Buttons.load(h.loader, button, 'highlighted', A)
    h.fake.last().succeed('img:a')
    h.flush()

    expect(button.images.get('highlighted')).toBe('img:a')
    expect(button.images.has('normal')).toBe(false)
    expect(button.layouts).toBe(1)
  })
})

describe('Indicator attachment', () => {
  it('detaches the previous indicator and attaches the next', () => {
    const h = makeHarness()
    const view = new PhotoView()
    const first = makeRecordingIndicator()
    const second = makeRecordingIndicator()

    h.loader.setIndicator(view, first.indicator)
    h.loader.setIndicator(view, first.indicator)
    h.loader.setIndicator(view, second.indicator)
    h.loader.setIndicator(view, undefined)

    expect(first.calls).toEqual(['attach', 'detach'])
    expect(second.calls).toEqual(['attach', 'detach'])
    expect(h.loader.indicator(view)).toBeUndefined()
  })

  it('stops the indicator for an invalid target', () => {
    const h = makeHarness()
    const view = new PhotoView()
    const { indicator, calls } = makeRecordingIndicator()
    h.loader.setIndicator(view, indicator)

    h.loader.request({ owner: view, target: undefined })
    h.flush()

    expect(calls).toEqual(['attach', 'stop'])
  })
})
