/**
 * State attached to an owner without touching the owner's own fields.
 * Keyed by identity through a WeakMap, so an entry never outlives its owner.
 */
export interface OwnerSideTable<V> {
  /** Returns the owner's entry, creating it on first access. */
  readonly get: (owner: object) => V
  readonly peek: (owner: object) => V | undefined
  readonly delete: (owner: object) => void
}

export const makeOwnerSideTable = <V>(create: () => V): OwnerSideTable<V> => {
  const entries = new WeakMap<object, V>()

  return {
    get: (owner) => {
      let entry = entries.get(owner)
      if (entry === undefined) {
        entry = create()
        entries.set(owner, entry)
      }
      return entry
    },
    peek: (owner) => entries.get(owner),
    delete: (owner) => {
      entries.delete(owner)
    },
  }
}
