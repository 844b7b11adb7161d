import { describe } from 'vitest'
import { it, expect } from '@effect/vitest'
import { selectPresentation } from '../../src/internal/presentation/PresentationStrategy.js'
import { ActionButton, Canvas, PhotoView } from '../testkit/owners.js'

const url = new URL('https://img.test/a.png')

describe('PresentationStrategy', () => {
  it('selects by declared surface kind', () => {
    expect(selectPresentation<string>(new PhotoView(), undefined).kind).toBe('image')
    expect(selectPresentation<string>(new ActionButton(), undefined).kind).toBe('button')
    expect(selectPresentation<string>(new Canvas(), undefined).kind).toBe('none')
    expect(selectPresentation<string>(new PhotoView(), () => {}).kind).toBe('custom')
  })

  it('sets the image of an image surface', () => {
    const view = new PhotoView()
    const strategy = selectPresentation<string>(view, undefined)

    strategy.apply('img:a', undefined, 'none', url)
    strategy.layout()

    expect(view.image).toBe('img:a')
    expect(view.layouts).toBe(1)
  })

  it('sets the normal-state image of a button', () => {
    const button = new ActionButton()
    const strategy = selectPresentation<string>(button, undefined)

    strategy.apply('img:a', undefined, 'none', url)

    expect([...button.images]).toEqual([['normal', 'img:a']])
  })

  it('lets a custom setter replace the surface setter but keeps its layout', () => {
    const view = new PhotoView()
    const calls: Array<[string | undefined, string]> = []
    const strategy = selectPresentation<string>(view, (image, _data, cacheTier) => calls.push([image, cacheTier]))

    strategy.apply('img:a', undefined, 'disk', url)
    strategy.layout()

    expect(calls).toEqual([['img:a', 'disk']])
    expect(view.history).toEqual([])
    expect(view.layouts).toBe(1)
  })
})
