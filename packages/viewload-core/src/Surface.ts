import type { CacheTier } from './Manager.js'

/** Caller-supplied presentation setter; replaces the surface's own. */
export type SetImageFn<I> = (
  image: I | undefined,
  data: Uint8Array | undefined,
  cacheTier: CacheTier,
  url: URL | undefined,
) => void

export type ControlState = 'normal' | 'highlighted' | 'disabled' | 'selected'

/** Single-image owner (an image view). */
export interface ImageSurface<I> {
  readonly surfaceKind: 'image'
  image: I | undefined
  highlightedImage?: I | undefined
  setNeedsLayout?: () => void
}

/** Multi-state control owner (a button). */
export interface ButtonSurface<I> {
  readonly surfaceKind: 'button'
  setImage: (image: I | undefined, state: ControlState) => void
  setBackgroundImage?: (image: I | undefined, state: ControlState) => void
  setNeedsLayout?: () => void
}

export type Surface<I> = ImageSurface<I> | ButtonSurface<I>

const surfaceKindOf = (owner: object): unknown => ('surfaceKind' in owner ? owner.surfaceKind : undefined)

export const isImageSurface = <I>(owner: object): owner is ImageSurface<I> => surfaceKindOf(owner) === 'image'

export const isButtonSurface = <I>(owner: object): owner is ButtonSurface<I> => surfaceKindOf(owner) === 'button'
