// Public barrel for @viewload/query
// Recommended usage:
//   import * as ViewLoadQuery from "@viewload/query"
//   const manager = ViewLoadQuery.make(new QueryClient(), { fetchImage })

export { make } from './QueryManager.js'
export type * from './QueryManager.js'

export { IMAGE_QUERY_SCOPE, makeImageQueryKey } from './internal/tanstack.js'
export type { ImageQueryKey } from './internal/tanstack.js'
