import type { CancelHandle } from './Manager.js'
import type { LoadOrchestrator, LoadRequest, LoadTarget } from './internal/orchestrator/LoadOrchestrator.js'
import type { ButtonSurface, ControlState, ImageSurface } from './Surface.js'

/** Everything a convenience loader forwards except what it fills in itself. */
export type SlotLoadArgs<I> = Omit<LoadRequest<I>, 'owner' | 'target' | 'setImage'>

export const HIGHLIGHTED_IMAGE_KEY = 'highlightedImage'

export const buttonImageKey = (state: ControlState): string => `buttonImage:${state}`

export const buttonBackgroundImageKey = (state: ControlState): string => `buttonBackgroundImage:${state}`

/*
 * Slots of one owner have separate keys, so they never cancel each other's
 * fetch. Presentation still follows the owner's latest key: after two slots
 * are issued back to back, only the later one is presented; the earlier one
 * reports its completion without touching the owner.
 */
const withKey = <I>(args: SlotLoadArgs<I> | undefined, operationKey: string): SlotLoadArgs<I> => ({
  ...args,
  context: { ...args?.context, operationKey },
})

export const ImageViews = {
  /** Loads into `view.image` under the view's default key. */
  load<I>(
    loader: LoadOrchestrator<I>,
    view: ImageSurface<I>,
    target: LoadTarget,
    args?: SlotLoadArgs<I>,
  ): CancelHandle | undefined {
    return loader.request({ ...args, owner: view, target })
  },

  loadHighlighted<I>(
    loader: LoadOrchestrator<I>,
    view: ImageSurface<I>,
    target: LoadTarget,
    args?: SlotLoadArgs<I>,
  ): CancelHandle | undefined {
    const ref = new WeakRef(view)
    return loader.request({
      ...withKey(args, HIGHLIGHTED_IMAGE_KEY),
      owner: view,
      target,
      setImage: (image) => {
        const current = ref.deref()
        if (current) current.highlightedImage = image
      },
    })
  },

  imageUrl<I>(loader: LoadOrchestrator<I>, view: ImageSurface<I>): URL | undefined {
    return loader.imageUrl(view)
  },

  highlightedImageUrl<I>(loader: LoadOrchestrator<I>, view: ImageSurface<I>): URL | undefined {
    return loader.loadState(view, HIGHLIGHTED_IMAGE_KEY)?.url
  },

  cancelHighlighted<I>(loader: LoadOrchestrator<I>, view: ImageSurface<I>): boolean {
    return loader.cancel(view, HIGHLIGHTED_IMAGE_KEY)
  },
}

export const Buttons = {
  /**
   * One slot per control state. Loads for different states never cancel each
   * other, but only the state issued last is presented (see above).
   */
  load<I>(
    loader: LoadOrchestrator<I>,
    button: ButtonSurface<I>,
    state: ControlState,
    target: LoadTarget,
    args?: SlotLoadArgs<I>,
  ): CancelHandle | undefined {
    const ref = new WeakRef(button)
    return loader.request({
      ...withKey(args, buttonImageKey(state)),
      owner: button,
      target,
      setImage: (image) => ref.deref()?.setImage(image, state),
    })
  },

  loadBackground<I>(
    loader: LoadOrchestrator<I>,
    button: ButtonSurface<I>,
    state: ControlState,
    target: LoadTarget,
    args?: SlotLoadArgs<I>,
  ): CancelHandle | undefined {
    const ref = new WeakRef(button)
    return loader.request({
      ...withKey(args, buttonBackgroundImageKey(state)),
      owner: button,
      target,
      setImage: (image) => ref.deref()?.setBackgroundImage?.(image, state),
    })
  },

  imageUrl<I>(loader: LoadOrchestrator<I>, button: ButtonSurface<I>, state: ControlState): URL | undefined {
    return loader.loadState(button, buttonImageKey(state))?.url
  },

  backgroundImageUrl<I>(loader: LoadOrchestrator<I>, button: ButtonSurface<I>, state: ControlState): URL | undefined {
    return loader.loadState(button, buttonBackgroundImageKey(state))?.url
  },

  cancel<I>(loader: LoadOrchestrator<I>, button: ButtonSurface<I>, state: ControlState): boolean {
    return loader.cancel(button, buttonImageKey(state))
  },

  cancelBackground<I>(loader: LoadOrchestrator<I>, button: ButtonSurface<I>, state: ControlState): boolean {
    return loader.cancel(button, buttonBackgroundImageKey(state))
  },
}
