import type { LoadContext, LoadOptions } from './Options.js'

/** Where a delivered image came from; drives the transition policy. */
export type CacheTier = 'none' | 'memory' | 'disk'

/** Opaque token for one in-flight fetch. Cancelling is advisory. */
export interface CancelHandle {
  readonly cancel: () => void
}

export const noopCancelHandle: CancelHandle = { cancel: () => {} }

/**
 * Raw byte counts from the fetch subsystem. Called on whatever context the
 * fetch runs on; `expectedUnits` may be 0 or negative when the size is unknown.
 */
export type ProgressCallback = (receivedUnits: number, expectedUnits: number, targetUrl: URL | undefined) => void

/**
 * One delivery from the Manager. Progressive loads deliver several times;
 * only the last one carries `isFinal: true`.
 */
export interface LoadDelivery<I> {
  readonly image: I | undefined
  readonly data: Uint8Array | undefined
  readonly error: unknown
  readonly cacheTier: CacheTier
  readonly isFinal: boolean
  /** The URL the Manager actually resolved (after redirects or rewriting). */
  readonly url: URL | undefined
}

/**
 * Read-only fast path into the Manager's memory tier. Must not trigger IO;
 * querying it may warm secondary cache layers as a side effect.
 */
export interface CachePeek<I> {
  readonly cacheKeyFor: (url: URL, context: LoadContext<I>) => string
  readonly peekMemory: (cacheKey: string) => I | undefined
}

export interface ImageManager<I> {
  readonly loadImage: (
    url: URL,
    options: LoadOptions,
    context: LoadContext<I>,
    onProgress: ProgressCallback,
    onCompleted: (delivery: LoadDelivery<I>) => void,
  ) => CancelHandle
  readonly cachePeek?: CachePeek<I>
}
