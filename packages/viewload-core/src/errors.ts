export type ViewLoadErrorTag = 'InvalidTarget' | 'FetchFailed'

abstract class ViewLoadErrorBase extends Error {
  abstract readonly _tag: ViewLoadErrorTag
  readonly operationKey: string
  readonly hint?: string

  protected constructor(params: { readonly message: string; readonly operationKey: string; readonly hint?: string }) {
    super(params.message)
    this.operationKey = params.operationKey
    this.hint = params.hint
  }

  toJSON(): Record<string, unknown> {
    return {
      _tag: this._tag,
      name: this.name,
      message: this.message,
      operationKey: this.operationKey,
      hint: this.hint,
    }
  }
}

/** The request had no URL, or its target did not parse as one. Never retried. */
export class InvalidTargetError extends ViewLoadErrorBase {
  readonly _tag = 'InvalidTarget' as const
  readonly code = 'invalid_target' as const

  constructor(operationKey: string) {
    super({
      message: '[viewload] Image URL is missing or invalid',
      operationKey,
      hint: 'Pass an absolute URL (or a string that parses as one); relative paths are rejected.',
    })
    this.name = 'InvalidTargetError'
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), code: this.code }
  }
}

/**
 * The Manager reported an error on the final delivery. Only produced by the
 * Effect-returning `load`; callback consumers get the Manager's error as is.
 */
export class FetchFailedError extends ViewLoadErrorBase {
  readonly _tag = 'FetchFailed' as const
  readonly url: URL
  readonly reason: unknown

  constructor(operationKey: string, url: URL, reason: unknown) {
    super({
      message: `[viewload] Fetch failed for ${url.href}`,
      operationKey,
      hint: 'Retries belong to the Manager; inspect `reason` for the transport or decode failure.',
    })
    this.name = 'FetchFailedError'
    this.url = url
    this.reason = reason
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), url: this.url.href }
  }
}

export type LoadFailure = InvalidTargetError | FetchFailedError
