import { makeOwnerSideTable } from '../owner/OwnerSideTable.js'

/** Captured when a request is issued; every deferred step is checked against it. */
export interface SupersessionToken {
  readonly key: string
  readonly generation: number
}

/** Pure form of the check: the slot's latest key and the key's current generation. */
export const isAuthoritativeToken = (
  token: SupersessionToken,
  latestKey: string | undefined,
  currentGeneration: number | undefined,
): boolean => latestKey === token.key && currentGeneration === token.generation

interface OwnerLedger {
  latestKey: string | undefined
  readonly generations: Map<string, number>
}

export interface SupersessionLedger {
  /** Makes `key` the owner's latest key and opens a new generation on it. */
  readonly issue: (owner: object, key: string) => SupersessionToken
  readonly latestKey: (owner: object) => string | undefined
  /**
   * The request may still touch presentation: its key is the owner's latest
   * key and no newer request has been issued on that key.
   */
  readonly isAuthoritative: (owner: object, token: SupersessionToken) => boolean
  /** No newer request has been issued on the token's key (other keys ignored). */
  readonly ownsSlot: (owner: object, token: SupersessionToken) => boolean
}

export const makeSupersessionLedger = (): SupersessionLedger => {
  const table = makeOwnerSideTable<OwnerLedger>(() => ({ latestKey: undefined, generations: new Map() }))

  const ownsSlot = (owner: object, token: SupersessionToken): boolean =>
    table.peek(owner)?.generations.get(token.key) === token.generation

  return {
    issue: (owner, key) => {
      const ledger = table.get(owner)
      const generation = (ledger.generations.get(key) ?? 0) + 1
      ledger.generations.set(key, generation)
      ledger.latestKey = key
      return { key, generation }
    },
    latestKey: (owner) => table.peek(owner)?.latestKey,
    isAuthoritative: (owner, token) => {
      const ledger = table.peek(owner)
      return isAuthoritativeToken(token, ledger?.latestKey, ledger?.generations.get(token.key))
    },
    ownsSlot,
  }
}
