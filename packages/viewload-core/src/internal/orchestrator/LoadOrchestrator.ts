import { InvalidTargetError } from '../../errors.js'
import type { Indicator } from '../../Indicator.js'
import type { CacheTier, CancelHandle, ImageManager, LoadDelivery, ProgressCallback } from '../../Manager.js'
import { toDownstreamContext, type LoadContext, type LoadOptions } from '../../Options.js'
import type { SetImageFn } from '../../Surface.js'
import type { TransitionSpec } from '../../Transition.js'
import { DEFAULT_CONFIG, type ViewLoaderConfigShape } from '../config.js'
import type { LoadDebugEvent, StaleStep } from '../debug/DebugSink.js'
import { toSerializableErrorSummary } from '../errorSummary.js'
import { resolveOperationKey } from '../operation/OperationKeyResolver.js'
import { makeOperationRegistry } from '../operation/OperationRegistry.js'
import { makeOwnerSideTable } from '../owner/OwnerSideTable.js'
import { selectPresentation } from '../presentation/PresentationStrategy.js'
import { makeTransitionCoordinator } from '../presentation/TransitionCoordinator.js'
import { makeProgressBridge } from '../progress/ProgressBridge.js'
import { getHomeCallbackQueue, type CallbackQueue } from '../runtime/CallbackQueue.js'
import { getGlobalHostScheduler, type HostScheduler } from '../runtime/HostScheduler.js'
import { makeLoadStateStore, type LoadState } from '../state/LoadStateStore.js'
import { Progress } from '../state/Progress.js'
import { makeSupersessionLedger } from './supersession.js'

export type LoadTarget = string | URL | undefined

/** What the completion callback receives. `url` is the URL that was requested. */
export interface LoadResult<I> {
  readonly image: I | undefined
  readonly data: Uint8Array | undefined
  readonly error: unknown
  readonly cacheTier: CacheTier
  readonly isFinal: boolean
  readonly url: URL | undefined
}

export type CompletedCallback<I> = (result: LoadResult<I>) => void

export interface LoadRequest<I> {
  readonly owner: object
  readonly target: LoadTarget
  readonly placeholder?: I
  readonly options?: LoadOptions
  readonly context?: LoadContext<I>
  /** Replaces the surface's own setter for this request. */
  readonly setImage?: SetImageFn<I>
  /** Raw samples, called on the fetch's own context. */
  readonly onProgress?: ProgressCallback
  /** Called on the request's callback queue. */
  readonly onCompleted?: CompletedCallback<I>
}

export interface LoadOrchestrator<I> {
  /** Returns the Manager's handle, or undefined when the target was not a valid URL. */
  readonly request: (request: LoadRequest<I>) => CancelHandle | undefined
  readonly cancel: (owner: object, key: string | undefined) => boolean
  readonly cancelLatest: (owner: object) => boolean
  /** Cancels `handle` if it is still the live request under `key`; a finished or replaced one is left alone. */
  readonly cancelRequest: (owner: object, key: string, handle: CancelHandle) => boolean
  readonly latestKey: (owner: object) => string | undefined
  readonly imageUrl: (owner: object) => URL | undefined
  readonly imageProgress: (owner: object) => Progress
  readonly setImageProgress: (owner: object, progress: Progress) => void
  readonly loadState: (owner: object, key: string) => LoadState | undefined
  readonly setLoadState: (owner: object, key: string, state: LoadState) => void
  readonly removeLoadState: (owner: object, key: string) => void
  readonly transition: (owner: object) => TransitionSpec<I> | undefined
  readonly setTransition: (owner: object, transition: TransitionSpec<I> | undefined) => void
  readonly indicator: (owner: object) => Indicator | undefined
  readonly setIndicator: (owner: object, indicator: Indicator | undefined) => void
}

export interface LoadOrchestratorDeps<I> {
  readonly manager: ImageManager<I>
  readonly hostScheduler?: HostScheduler
  /** Queue used when a request's context names none. */
  readonly homeQueue?: CallbackQueue
  readonly config?: ViewLoaderConfigShape
  readonly trace?: (event: LoadDebugEvent) => void
}

interface OwnerAttachments<I> {
  transition?: TransitionSpec<I>
  indicator?: Indicator
}

/** Accepts absolute URLs only; anything else reads as "no target". */
export const normalizeTarget = (target: LoadTarget): URL | undefined => {
  if (target === undefined) return undefined
  // Copied: the caller may keep mutating its URL after the request is issued.
  if (target instanceof URL) return new URL(target.href)
  if (target.length === 0) return undefined
  try {
    return new URL(target)
  } catch {
    return undefined
  }
}

/**
 * Fresh network loads animate; memory hits never do; disk hits do unless the
 * caller asked for a synchronous cache query.
 */
export const shouldUseTransition = (cacheTier: CacheTier, options: LoadOptions): boolean => {
  if (options.forceTransition) return true
  switch (cacheTier) {
    case 'none':
      return true
    case 'memory':
      return false
    case 'disk':
      return !(options.querySyncMemory || options.querySyncDisk)
  }
}

/**
 * Request lifecycle for one (owner, key) slot:
 * KeyResolved → PreviousCancelled → StateReset → PlaceholderApplied → Fetching → Delivered.
 *
 * Every deferred step captures a supersession token at issue time and re-checks
 * it before touching the owner; a superseded request still reaches its own
 * completion callback.
 */
export const makeLoadOrchestrator = <I>(deps: LoadOrchestratorDeps<I>): LoadOrchestrator<I> => {
  const hostScheduler = deps.hostScheduler ?? getGlobalHostScheduler()
  const config = deps.config ?? DEFAULT_CONFIG
  const trace = deps.trace ?? (() => {})

  const ledger = makeSupersessionLedger()
  const store = makeLoadStateStore()
  const registry = makeOperationRegistry({
    latestKeyOf: ledger.latestKey,
    onCancel: (_owner, key) => trace({ type: 'load:cancelled', key }),
  })
  const attachments = makeOwnerSideTable<OwnerAttachments<I>>(() => ({}))
  const coordinator = makeTransitionCoordinator({ hostScheduler })

  const request = (req: LoadRequest<I>): CancelHandle | undefined => {
    const { placeholder, onCompleted } = req
    const options = req.options ?? {}
    const context = req.context ?? {}
    const url = normalizeTarget(req.target)

    const key = resolveOperationKey(req.owner, context.operationKey)
    const token = ledger.issue(req.owner, key)
    trace({ type: 'load:issued', key, generation: token.generation, url: url?.href })

    if (!options.avoidAutoCancelPrevious) {
      registry.cancel(req.owner, key)
    }

    const progress = store.get(req.owner, key)?.progress ?? new Progress()
    store.set(req.owner, key, { url, progress })

    const manager = context.customManager ?? deps.manager
    const downstreamContext = toDownstreamContext(context, key)
    const queue = context.callbackQueue ?? deps.homeQueue ?? getHomeCallbackQueue()
    const strategy = selectPresentation<I>(req.owner, req.setImage)
    const indicator = attachments.peek(req.owner)?.indicator

    // Nothing below holds the owner strongly: closures outlive this call inside the Manager.
    const ownerRef = new WeakRef(req.owner)
    const isAuthoritative = (): boolean => {
      const owner = ownerRef.deref()
      return owner !== undefined && ledger.isAuthoritative(owner, token)
    }
    const ownsSlot = (): boolean => {
      const owner = ownerRef.deref()
      return owner !== undefined && ledger.ownsSlot(owner, token)
    }
    const guarded =
      (step: StaleStep, body: () => void) =>
      (): void => {
        if (!isAuthoritative()) {
          trace({ type: 'load:stale', key, generation: token.generation, step })
          return
        }
        body()
      }

    if (!options.delayPlaceholder) {
      const peek = manager.cachePeek
      if (url && peek && config.peekMemoryOnPlaceholder) {
        peek.peekMemory(peek.cacheKeyFor(url, downstreamContext))
      }
      queue.async(guarded('placeholder', () => strategy.apply(placeholder, undefined, 'none', url)))
    }

    if (!url) {
      trace({ type: 'load:invalid-target', key })
      if (indicator) {
        queue.async(guarded('indicator', () => indicator.stopAnimating()))
      }
      if (onCompleted) {
        const error = new InvalidTargetError(key)
        queue.async(() =>
          onCompleted({ image: undefined, data: undefined, error, cacheTier: 'none', isFinal: true, url: undefined }),
        )
      }
      return undefined
    }

    progress.reset()
    if (indicator) {
      queue.async(guarded('indicator', () => indicator.startAnimating()))
    }

    const onProgress = makeProgressBridge({
      progress,
      queue,
      indicator,
      ownsProgress: ownsSlot,
      isAuthoritative,
      observer: req.onProgress,
      onSample: (receivedUnits, expectedUnits) => trace({ type: 'load:progress', key, receivedUnits, expectedUnits }),
    })

    let handle: CancelHandle | undefined
    let finished = false

    const reconcile = (delivery: LoadDelivery<I>): void => {
      const image = delivery.image

      if (delivery.isFinal) {
        finished = true
        const owner = ownerRef.deref()
        if (owner && handle) registry.release(owner, key, handle)
        if (delivery.error === undefined && progress.isPristine && ownsSlot()) {
          progress.markUnknownComplete()
        }
        if (indicator) {
          queue.async(guarded('indicator', () => indicator.stopAnimating()))
        }
      }

      trace({
        type: 'load:completed',
        key,
        generation: token.generation,
        cacheTier: delivery.cacheTier,
        isFinal: delivery.isFinal,
        hasImage: image !== undefined,
        ...(delivery.error === undefined ? {} : { error: toSerializableErrorSummary(delivery.error) }),
      })

      const shouldCallCompleted = delivery.isFinal || options.avoidAutoApplyResult === true
      // avoidAutoApplyResult keeps a delayed placeholder off the owner as well.
      const shouldNotApply =
        options.avoidAutoApplyResult === true || (image === undefined && options.delayPlaceholder !== true)

      const settle = (): void => {
        if (!shouldNotApply && isAuthoritative()) strategy.layout()
        if (onCompleted && shouldCallCompleted) {
          onCompleted({
            image,
            data: delivery.data,
            error: delivery.error,
            cacheTier: delivery.cacheTier,
            isFinal: delivery.isFinal,
            url,
          })
        }
      }

      if (shouldNotApply) {
        queue.async(settle)
        return
      }

      // No image but a delayed placeholder: the placeholder goes up now.
      const targetImage = image ?? placeholder
      const targetData = image !== undefined ? delivery.data : undefined
      const owner = ownerRef.deref()
      const transition =
        owner && delivery.isFinal && shouldUseTransition(delivery.cacheTier, options)
          ? attachments.peek(owner)?.transition
          : undefined

      queue.async(() => {
        const current = ownerRef.deref()
        if (!current || !isAuthoritative()) {
          trace({ type: 'load:stale', key, generation: token.generation, step: 'presentation' })
          settle()
          return
        }
        coordinator.present({
          owner: current,
          strategy,
          image: targetImage,
          data: targetData,
          cacheTier: delivery.cacheTier,
          url: delivery.url ?? url,
          transition,
          waitForTransition: options.waitForTransition === true,
          queue,
          isAuthoritative,
          onSettled: settle,
          onPhase: (phase, transitionName) => trace({ type: 'transition:phase', key, phase, transition: transitionName }),
        })
      })
    }

    const loaded = manager.loadImage(url, options, downstreamContext, onProgress, reconcile)
    handle = loaded
    // A Manager that answered synchronously leaves nothing to cancel.
    if (!finished) {
      registry.set(req.owner, key, loaded)
    }
    return loaded
  }

  const imageProgress = (owner: object): Progress => {
    const key = ledger.latestKey(owner)
    if (key === undefined) return new Progress()
    const state = store.get(owner, key)
    if (state?.progress) return state.progress
    const progress = new Progress()
    store.set(owner, key, { url: state?.url, progress })
    return progress
  }

  const setImageProgress = (owner: object, progress: Progress): void => {
    const key = ledger.latestKey(owner)
    if (key === undefined) return
    store.set(owner, key, { url: store.get(owner, key)?.url, progress })
  }

  const setIndicator = (owner: object, indicator: Indicator | undefined): void => {
    const entry = attachments.get(owner)
    const previous = entry.indicator
    if (previous === indicator) return
    previous?.detach?.(owner)
    entry.indicator = indicator
    indicator?.attach?.(owner)
  }

  return {
    request,
    cancel: registry.cancel,
    cancelLatest: registry.cancelLatest,
    cancelRequest: registry.cancelHandle,
    latestKey: ledger.latestKey,
    imageUrl: (owner) => store.get(owner, ledger.latestKey(owner))?.url,
    imageProgress,
    setImageProgress,
    loadState: (owner, key) => store.get(owner, key),
    setLoadState: store.set,
    removeLoadState: store.remove,
    transition: (owner) => attachments.peek(owner)?.transition,
    setTransition: (owner, transition) => {
      attachments.get(owner).transition = transition
    },
    indicator: (owner) => attachments.peek(owner)?.indicator,
    setIndicator,
  }
}
