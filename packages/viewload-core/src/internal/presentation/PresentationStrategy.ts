import { isButtonSurface, isImageSurface, type SetImageFn, type Surface } from '../../Surface.js'

export type PresentationKind = 'custom' | 'image' | 'button' | 'none'

/**
 * How a result reaches the owner; chosen once per request from the owner's
 * declared `surfaceKind` (or the caller's setter). Surfaces are held weakly:
 * the strategy travels inside the Manager's completion closure.
 */
export interface PresentationStrategy<I> {
  readonly kind: PresentationKind
  readonly apply: SetImageFn<I>
  readonly layout: () => void
}

const noop = (): void => {}

const surfaceLayout = <I>(ref: WeakRef<Surface<I>>) => (): void => {
  ref.deref()?.setNeedsLayout?.()
}

export const selectPresentation = <I>(owner: object, setImage: SetImageFn<I> | undefined): PresentationStrategy<I> => {
  const surface = isImageSurface<I>(owner) || isButtonSurface<I>(owner) ? new WeakRef<Surface<I>>(owner) : undefined
  const layout = surface ? surfaceLayout(surface) : noop

  if (setImage) {
    return { kind: 'custom', apply: setImage, layout }
  }

  if (isImageSurface<I>(owner)) {
    const ref = new WeakRef(owner)
    return {
      kind: 'image',
      apply: (image) => {
        const view = ref.deref()
        if (view) view.image = image
      },
      layout,
    }
  }

  if (isButtonSurface<I>(owner)) {
    const ref = new WeakRef(owner)
    return {
      kind: 'button',
      apply: (image) => ref.deref()?.setImage(image, 'normal'),
      layout,
    }
  }

  return { kind: 'none', apply: noop, layout }
}
