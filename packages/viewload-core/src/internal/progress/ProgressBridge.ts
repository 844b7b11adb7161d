import type { Indicator } from '../../Indicator.js'
import type { ProgressCallback } from '../../Manager.js'
import type { CallbackQueue } from '../runtime/CallbackQueue.js'
import type { Progress } from '../state/Progress.js'

/** `received / expected` clamped to [0, 1]; an expected size of 0 reads as 0. */
export const progressRatio = (receivedUnits: number, expectedUnits: number): number => {
  if (expectedUnits === 0) return 0
  return Math.max(Math.min(receivedUnits / expectedUnits, 1), 0)
}

export interface ProgressBridgeArgs {
  readonly progress: Progress
  readonly queue: CallbackQueue
  readonly indicator: Indicator | undefined
  /** False once a newer request on the same key has taken over `progress`. */
  readonly ownsProgress: () => boolean
  /** Guard for the queued indicator update. */
  readonly isAuthoritative: () => boolean
  readonly observer?: ProgressCallback
  readonly onSample?: (receivedUnits: number, expectedUnits: number) => void
}

/**
 * Fans one raw sample out three ways:
 * 1. field writes on the Progress entity, inline;
 * 2. the normalized ratio to the indicator, via the callback queue;
 * 3. the raw sample to the caller's observer, inline on the sampling context.
 */
export const makeProgressBridge = (args: ProgressBridgeArgs): ProgressCallback => {
  const indicator = args.indicator

  return (receivedUnits, expectedUnits, targetUrl) => {
    if (args.ownsProgress()) {
      args.progress.totalUnitCount = expectedUnits
      args.progress.completedUnitCount = receivedUnits
    }
    args.onSample?.(receivedUnits, expectedUnits)

    if (indicator?.updateProgress) {
      const ratio = progressRatio(receivedUnits, expectedUnits)
      args.queue.async(() => {
        if (!args.isAuthoritative()) return
        indicator.updateProgress?.(ratio)
      })
    }

    args.observer?.(receivedUnits, expectedUnits, targetUrl)
  }
}
