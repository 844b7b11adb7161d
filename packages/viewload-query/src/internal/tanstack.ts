import type { QueryClient } from '@tanstack/query-core'
import type { FetchedImage } from '../QueryManager.js'

export const IMAGE_QUERY_SCOPE = 'viewload/image'

export const makeImageQueryKey = (cacheKey: string) => [IMAGE_QUERY_SCOPE, cacheKey] as const

export type ImageQueryKey = ReturnType<typeof makeImageQueryKey>

/**
 * Read-only look into the query cache: no fetch, no observer.
 * Stale or invalidated entries read as misses.
 */
export const peekFresh = <I>(queryClient: QueryClient, cacheKey: string, staleTime: number): FetchedImage<I> | undefined => {
  const query = queryClient.getQueryCache().find<FetchedImage<I>>({ queryKey: makeImageQueryKey(cacheKey), exact: true })
  const data = query?.state.data
  if (!query || data === undefined) return undefined
  return query.isStaleByTime(staleTime) ? undefined : data
}
