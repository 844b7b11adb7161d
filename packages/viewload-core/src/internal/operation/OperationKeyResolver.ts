/** Key used when the owner's prototype carries no constructor name. */
export const ANONYMOUS_OWNER_KEY = 'Object'

/**
 * Default slot key: the name of the owner's runtime class.
 * Stable for every instance of the same class.
 */
export const defaultOperationKey = (owner: object): string => {
  const proto: unknown = Object.getPrototypeOf(owner)
  if (proto === null || typeof proto !== 'object') return ANONYMOUS_OWNER_KEY
  const ctor: unknown = proto.constructor
  if (typeof ctor === 'function' && ctor.name.length > 0) return ctor.name
  return ANONYMOUS_OWNER_KEY
}

/** An explicit key wins unchanged; otherwise the key comes from the owner's type. */
export const resolveOperationKey = (owner: object, explicitKey: string | undefined): string =>
  explicitKey ?? defaultOperationKey(owner)
