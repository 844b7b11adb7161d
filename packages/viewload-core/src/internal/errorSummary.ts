import { Cause } from 'effect'

export type DowngradeReason = 'non_serializable' | 'oversized' | 'unknown'

/**
 * JSON-safe digest of a Manager error or of something a caller hook threw.
 * Only diagnostics see it; callbacks keep receiving the original value.
 */
export interface SerializableErrorSummary {
  readonly message: string
  readonly name?: string
  readonly code?: string
  readonly hint?: string
  readonly downgrade?: DowngradeReason
}

const UNKNOWN_MESSAGE = 'Unknown error'

const readField = (value: object, key: 'message' | 'name' | 'code' | 'hint'): string | undefined => {
  const field: unknown = Reflect.get(value, key)
  if (typeof field === 'string') return field.length > 0 ? field : undefined
  if (typeof field === 'number' && Number.isFinite(field)) return String(field)
  return undefined
}

const messageOf = (cause: unknown): string => {
  switch (typeof cause) {
    case 'string':
      return cause
    case 'number':
    case 'boolean':
    case 'bigint':
      return String(cause)
    case 'object':
      if (cause === null) return UNKNOWN_MESSAGE
      if (cause instanceof Error) return cause.message || cause.name || 'Error'
      if (Cause.isCause(cause)) return Cause.pretty(cause, { renderErrorCause: true })
      return readField(cause, 'message') ?? UNKNOWN_MESSAGE
    default:
      return UNKNOWN_MESSAGE
  }
}

const survivesJson = (value: unknown): boolean => {
  try {
    JSON.stringify(value)
    return true
  } catch {
    return false
  }
}

export const toSerializableErrorSummary = (
  cause: unknown,
  options?: { readonly maxMessageLength?: number },
): SerializableErrorSummary => {
  const limit = options?.maxMessageLength ?? 256
  const full = messageOf(cause)
  const message = full.length > limit ? full.slice(0, limit) : full

  const fields = typeof cause === 'object' && cause !== null ? cause : undefined
  const name = fields && readField(fields, 'name')
  const code = fields && readField(fields, 'code')
  const hint = fields && readField(fields, 'hint')

  const downgrade: DowngradeReason | undefined =
    message.length < full.length
      ? 'oversized'
      : !(cause instanceof Error) && !survivesJson(cause)
        ? 'non_serializable'
        : message === UNKNOWN_MESSAGE
          ? 'unknown'
          : undefined

  return {
    message,
    ...(name !== undefined && name !== 'Error' ? { name } : {}),
    ...(code !== undefined ? { code } : {}),
    ...(hint !== undefined ? { hint } : {}),
    ...(downgrade !== undefined ? { downgrade } : {}),
  }
}
