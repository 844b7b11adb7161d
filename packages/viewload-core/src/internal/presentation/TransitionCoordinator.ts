import type { CacheTier } from '../../Manager.js'
import { timingOf, type TransitionSpec } from '../../Transition.js'
import type { CallbackQueue } from '../runtime/CallbackQueue.js'
import type { HostScheduler } from '../runtime/HostScheduler.js'
import type { PresentationStrategy } from './PresentationStrategy.js'

export type TransitionPhase = 'none' | 'prepared' | 'animated' | 'completed' | 'abandoned'

export interface PresentArgs<I> {
  readonly owner: object
  readonly strategy: PresentationStrategy<I>
  readonly image: I | undefined
  readonly data: Uint8Array | undefined
  readonly cacheTier: CacheTier
  readonly url: URL | undefined
  readonly transition: TransitionSpec<I> | undefined
  readonly waitForTransition: boolean
  readonly queue: CallbackQueue
  /** Re-checked at every phase boundary. */
  readonly isAuthoritative: () => boolean
  /** Outer completion; fires exactly once. */
  readonly onSettled: () => void
  readonly onPhase?: (phase: TransitionPhase, transitionName: string | undefined) => void
}

export interface TransitionCoordinator {
  /** Must be called on `args.queue`. */
  readonly present: <I>(args: PresentArgs<I>) => void
}

/**
 * Presentation state machine: none → prepared → animated → completed.
 *
 * - No transition: apply now, settle now.
 * - prepared: runs one frame later so the placeholder gets painted, then the `prepare` hook.
 * - animated: applies the image (unless the transition applies it itself) and runs `animate`.
 * - completed: after `durationMs`, runs `complete(true)`.
 * - Outer completion fires on entry (default) or after `completed` (`waitForTransition`).
 *   A request superseded between phases stops there; a still-pending outer completion
 *   fires at that point.
 */
export const makeTransitionCoordinator = (deps: { readonly hostScheduler: HostScheduler }): TransitionCoordinator => {
  const present = <I>(args: PresentArgs<I>): void => {
    const { transition, queue } = args

    if (!transition) {
      args.strategy.apply(args.image, args.data, args.cacheTier, args.url)
      args.onPhase?.('none', undefined)
      args.onSettled()
      return
    }

    const label = transition.name
    const timing = timingOf(transition)
    let settled = false
    const settle = (): void => {
      if (settled) return
      settled = true
      args.onSettled()
    }

    // Each phase re-validates; once superseded nothing else touches the owner.
    const phase = (name: TransitionPhase, body: () => void, next?: () => void) => (): void => {
      if (!args.isAuthoritative()) {
        args.onPhase?.('abandoned', label)
        settle()
        return
      }
      body()
      args.onPhase?.(name, label)
      next?.()
    }

    const complete = phase('completed', () => {
      transition.complete?.(true)
      if (args.waitForTransition) settle()
    })

    const animate = phase(
      'animated',
      () => {
        if (!transition.avoidAutoSetImage) {
          args.strategy.apply(args.image, args.data, args.cacheTier, args.url)
        }
        transition.animate?.(args.owner, args.image, timing)
      },
      () => {
        deps.hostScheduler.scheduleTimeout(timing.durationMs, () => queue.async(complete))
      },
    )

    const prepare = phase(
      'prepared',
      () => {
        transition.prepare?.(args.owner, args.image, args.data, args.cacheTier, args.url)
      },
      () => {
        deps.hostScheduler.scheduleMacrotask(() => queue.async(animate))
      },
    )

    deps.hostScheduler.scheduleAnimationFrame(() => queue.async(prepare))

    if (!args.waitForTransition) settle()
  }

  return { present }
}
