import { makeOwnerSideTable } from '../owner/OwnerSideTable.js'
import type { Progress } from './Progress.js'

export interface LoadState {
  /** URL of the most recently issued request for the slot, set before the fetch starts. */
  readonly url: URL | undefined
  readonly progress: Progress | undefined
}

/**
 * Per-owner map from operation key to LoadState.
 * - No eviction: entries live until removed or until the owner is collected.
 * - A missing key (no latest key yet) reads as "no state".
 */
export interface LoadStateStore {
  readonly get: (owner: object, key: string | undefined) => LoadState | undefined
  readonly set: (owner: object, key: string, state: LoadState) => void
  readonly remove: (owner: object, key: string) => void
}

export const makeLoadStateStore = (): LoadStateStore => {
  const table = makeOwnerSideTable(() => new Map<string, LoadState>())

  return {
    get: (owner, key) => (key === undefined ? undefined : table.peek(owner)?.get(key)),
    set: (owner, key, state) => {
      table.get(owner).set(key, state)
    },
    remove: (owner, key) => {
      const states = table.peek(owner)
      if (!states) return
      states.delete(key)
      if (states.size === 0) table.delete(owner)
    },
  }
}
