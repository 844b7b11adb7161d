import type { QueryClient } from '@tanstack/query-core'
import {
  noopCancelHandle,
  type CachePeek,
  type CancelHandle,
  type ImageManager,
  type LoadContext,
  type LoadDelivery,
  type ProgressCallback,
} from '@viewload/core'
import { Cause, Effect, Exit } from 'effect'
import { makeImageQueryKey, peekFresh } from './internal/tanstack.js'

export interface FetchedImage<I> {
  readonly image: I
  readonly data?: Uint8Array
}

export interface FetchImageArgs<I> {
  /** Aborted when every load waiting on the fetch has been cancelled. */
  readonly signal: AbortSignal
  readonly onProgress: (receivedUnits: number, expectedUnits: number) => void
  /** Context of the load that started the fetch. */
  readonly context: LoadContext<I>
}

export type FetchImage<I> = (url: URL, args: FetchImageArgs<I>) => Promise<FetchedImage<I>>

export interface QueryManagerConfig<I> {
  readonly fetchImage: FetchImage<I>
  /** How long an unobserved image stays in the query cache (default 5 minutes). */
  readonly gcTime?: number
  /** Age after which a cached image is fetched again (default: never). */
  readonly staleTime?: number
  readonly cacheKeyFor?: (url: URL, context: LoadContext<I>) => string
}

export interface QueryImageManager<I> extends ImageManager<I> {
  readonly cachePeek: CachePeek<I>
  /** Drops the cached image for `url`; the next load fetches again. */
  readonly evict: (url: URL, context?: LoadContext<I>) => void
  /** Number of distinct fetches currently running. */
  readonly inflightCount: () => number
}

interface Waiter<I> {
  readonly onProgress: ProgressCallback
  readonly onCompleted: (delivery: LoadDelivery<I>) => void
}

interface Inflight<I> {
  readonly waiters: Set<Waiter<I>>
}

const DEFAULT_GC_TIME_MS = 5 * 60 * 1000

/**
 * ImageManager over a TanStack QueryClient:
 * - hits answer from the query cache with tier `memory`;
 * - misses go through `fetchQuery` and answer with tier `none`;
 * - loads of the same cache key share one fetch; the query is cancelled once nobody waits on it.
 */
export const make = <I>(queryClient: QueryClient, config: QueryManagerConfig<I>): QueryImageManager<I> => {
  const gcTime = config.gcTime ?? DEFAULT_GC_TIME_MS
  const staleTime = config.staleTime ?? Infinity
  const cacheKeyFor = config.cacheKeyFor ?? ((url: URL) => url.href)
  const inflight = new Map<string, Inflight<I>>()

  const settle = (cacheKey: string, entry: Inflight<I>, url: URL, exit: Exit.Exit<FetchedImage<I>, unknown>): void => {
    if (inflight.get(cacheKey) === entry) inflight.delete(cacheKey)
    const waiters = [...entry.waiters]
    entry.waiters.clear()

    const delivery: LoadDelivery<I> = Exit.isSuccess(exit)
      ? { image: exit.value.image, data: exit.value.data, error: undefined, cacheTier: 'none', isFinal: true, url }
      : { image: undefined, data: undefined, error: Cause.squash(exit.cause), cacheTier: 'none', isFinal: true, url }

    for (const waiter of waiters) {
      waiter.onCompleted(delivery)
    }
  }

  const start = (cacheKey: string, url: URL, context: LoadContext<I>): Inflight<I> => {
    const entry: Inflight<I> = { waiters: new Set() }
    inflight.set(cacheKey, entry)

    const fetch = Effect.tryPromise({
      try: () =>
        queryClient.fetchQuery({
          queryKey: makeImageQueryKey(cacheKey),
          queryFn: ({ signal }) =>
            config.fetchImage(url, {
              signal,
              context,
              onProgress: (receivedUnits, expectedUnits) => {
                for (const waiter of entry.waiters) {
                  waiter.onProgress(receivedUnits, expectedUnits, url)
                }
              },
            }),
          gcTime,
          staleTime,
        }),
      catch: (cause) => cause,
    })

    Effect.runFork(
      fetch.pipe(
        Effect.exit,
        Effect.flatMap((exit) => Effect.sync(() => settle(cacheKey, entry, url, exit))),
      ),
    )
    return entry
  }

  const loadImage: ImageManager<I>['loadImage'] = (url, options, context, onProgress, onCompleted) => {
    const cacheKey = cacheKeyFor(url, context)
    const cached = peekFresh<I>(queryClient, cacheKey, staleTime)

    if (cached) {
      const delivery: LoadDelivery<I> = {
        image: cached.image,
        data: cached.data,
        error: undefined,
        cacheTier: 'memory',
        isFinal: true,
        url,
      }
      if (options.querySyncMemory) {
        onCompleted(delivery)
        return noopCancelHandle
      }
      let cancelled = false
      queueMicrotask(() => {
        if (!cancelled) onCompleted(delivery)
      })
      return {
        cancel: () => {
          cancelled = true
        },
      }
    }

    const entry = inflight.get(cacheKey) ?? start(cacheKey, url, context)
    const waiter: Waiter<I> = { onProgress, onCompleted }
    entry.waiters.add(waiter)

    const handle: CancelHandle = {
      cancel: () => {
        if (!entry.waiters.delete(waiter)) return
        if (entry.waiters.size > 0 || inflight.get(cacheKey) !== entry) return
        inflight.delete(cacheKey)
        Effect.runFork(Effect.promise(() => queryClient.cancelQueries({ queryKey: makeImageQueryKey(cacheKey) })))
      },
    }
    return handle
  }

  const cachePeek: CachePeek<I> = {
    cacheKeyFor,
    peekMemory: (cacheKey) => peekFresh<I>(queryClient, cacheKey, staleTime)?.image,
  }

  return {
    loadImage,
    cachePeek,
    evict: (url, context) => {
      queryClient.removeQueries({ queryKey: makeImageQueryKey(cacheKeyFor(url, context ?? {})), exact: true })
    },
    inflightCount: () => inflight.size,
  }
}
