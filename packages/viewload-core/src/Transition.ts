import type { CacheTier } from './Manager.js'

export type TransitionCurve = 'linear' | 'ease-in' | 'ease-out' | 'ease-in-out'

export interface TransitionTiming {
  readonly durationMs: number
  readonly curve: TransitionCurve
}

/**
 * Presentation effect applied when a fetched result is shown. Read, never
 * mutated, by the loader. Hooks run on the request's callback queue.
 */
export interface TransitionSpec<I> {
  /** Free-form label carried into diagnostics (e.g. "fade"). */
  readonly name?: string
  readonly durationMs: number
  readonly curve?: TransitionCurve
  /** The animate hook applies the image itself; the loader does not. */
  readonly avoidAutoSetImage?: boolean
  /** Zero-duration phase; the placeholder is still on screen. */
  readonly prepare?: (
    owner: object,
    image: I | undefined,
    data: Uint8Array | undefined,
    cacheTier: CacheTier,
    url: URL | undefined,
  ) => void
  readonly animate?: (owner: object, image: I | undefined, timing: TransitionTiming) => void
  readonly complete?: (finished: boolean) => void
}

export const timingOf = <I>(spec: TransitionSpec<I>): TransitionTiming => ({
  durationMs: Math.max(spec.durationMs, 0),
  curve: spec.curve ?? 'ease-in-out',
})

/** Cross-dissolve preset; rendering is left to the `animate` hook. */
export const fade = <I>(
  durationMs = 500,
  hooks?: Pick<TransitionSpec<I>, 'prepare' | 'animate' | 'complete'>,
): TransitionSpec<I> => ({
  name: 'fade',
  durationMs,
  curve: 'ease-in-out',
  ...hooks,
})
