import type { CancelHandle } from '../../Manager.js'
import { makeOwnerSideTable } from '../owner/OwnerSideTable.js'

/**
 * At most one live CancelHandle per (owner, key).
 *
 * - set: cancels whatever the key holds before registering the new handle;
 * - cancel: idempotent, a key with no handle is a no-op;
 * - release: drops the entry without cancelling, only if it still holds `handle`
 *   (a finished request must not evict its successor);
 * - cancelHandle: cancel, only if the entry still holds `handle`.
 */
export interface OperationRegistry {
  readonly set: (owner: object, key: string, handle: CancelHandle) => void
  readonly get: (owner: object, key: string) => CancelHandle | undefined
  readonly cancel: (owner: object, key: string | undefined) => boolean
  readonly cancelLatest: (owner: object) => boolean
  readonly release: (owner: object, key: string, handle: CancelHandle) => void
  readonly cancelHandle: (owner: object, key: string, handle: CancelHandle) => boolean
}

export const makeOperationRegistry = (args: {
  readonly latestKeyOf: (owner: object) => string | undefined
  readonly onCancel?: (owner: object, key: string) => void
}): OperationRegistry => {
  const table = makeOwnerSideTable(() => new Map<string, CancelHandle>())

  const cancel = (owner: object, key: string | undefined): boolean => {
    if (key === undefined) return false
    const handles = table.peek(owner)
    const handle = handles?.get(key)
    if (!handles || !handle) return false
    handles.delete(key)
    handle.cancel()
    args.onCancel?.(owner, key)
    return true
  }

  return {
    set: (owner, key, handle) => {
      cancel(owner, key)
      table.get(owner).set(key, handle)
    },
    get: (owner, key) => table.peek(owner)?.get(key),
    cancel,
    cancelLatest: (owner) => cancel(owner, args.latestKeyOf(owner)),
    release: (owner, key, handle) => {
      const handles = table.peek(owner)
      if (handles?.get(key) === handle) handles.delete(key)
    },
    cancelHandle: (owner, key, handle) => table.peek(owner)?.get(key) === handle && cancel(owner, key),
  }
}
