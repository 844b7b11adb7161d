import type { CallbackQueue } from './internal/runtime/CallbackQueue.js'
import type { ImageManager } from './Manager.js'

/** Composable request flags; every flag defaults to off. */
export interface LoadOptions {
  /** Keep the key's previous fetch running instead of cancelling it first. */
  readonly avoidAutoCancelPrevious?: boolean
  /** Do not show the placeholder while loading; show it only if the fetch yields no image. */
  readonly delayPlaceholder?: boolean
  /** Deliver the result to the completion callback without presenting it. */
  readonly avoidAutoApplyResult?: boolean
  /** Use the owner's transition whatever tier the image came from. */
  readonly forceTransition?: boolean
  /** Fire the completion callback only after the transition has completed. */
  readonly waitForTransition?: boolean
  readonly querySyncMemory?: boolean
  readonly querySyncDisk?: boolean
}

export interface LoadContext<I> {
  /** Explicit slot key; when absent the key is derived from the owner's type. */
  readonly operationKey?: string
  /** Queue for every presentation step and callback of this request (default: the home queue). */
  readonly callbackQueue?: CallbackQueue
  /** Manager for this request only; never forwarded to the Manager itself. */
  readonly customManager?: ImageManager<I>
  readonly [extra: string]: unknown
}

/** Context as handed to the Manager: key echoed in, custom manager removed. */
export const toDownstreamContext = <I>(context: LoadContext<I>, operationKey: string): LoadContext<I> => {
  const { customManager: _customManager, ...rest } = context
  return { ...rest, operationKey }
}
