import { Context, Effect, Layer, Option } from 'effect'
import type { CacheTier } from '../../Manager.js'
import type { SerializableErrorSummary } from '../errorSummary.js'
import type { TransitionPhase } from '../presentation/TransitionCoordinator.js'

export type StaleStep = 'placeholder' | 'indicator' | 'presentation'

export type LoadDebugEvent =
  | {
      readonly type: 'load:issued'
      readonly key: string
      readonly generation: number
      readonly url: string | undefined
    }
  | { readonly type: 'load:cancelled'; readonly key: string }
  | {
      readonly type: 'load:progress'
      readonly key: string
      readonly receivedUnits: number
      readonly expectedUnits: number
    }
  | {
      readonly type: 'load:completed'
      readonly key: string
      readonly generation: number
      readonly cacheTier: CacheTier
      readonly isFinal: boolean
      readonly hasImage: boolean
      readonly error?: SerializableErrorSummary
    }
  | { readonly type: 'load:stale'; readonly key: string; readonly generation: number; readonly step: StaleStep }
  | { readonly type: 'load:invalid-target'; readonly key: string }
  | {
      readonly type: 'transition:phase'
      readonly key: string
      readonly phase: TransitionPhase
      readonly transition: string | undefined
    }
  | { readonly type: 'queue:error'; readonly queue: string; readonly error: SerializableErrorSummary }

/** Events only recorded at trace level "full". */
export const isVerboseEvent = (event: LoadDebugEvent): boolean =>
  event.type === 'load:progress' || event.type === 'transition:phase'

export interface DebugSink {
  readonly record: (event: LoadDebugEvent) => Effect.Effect<void>
}

export const DebugSinkTag = Context.GenericTag<DebugSink>('@viewload/core/DebugSink')

export const NoopDebugSinkLayer = Layer.succeed(DebugSinkTag, {
  record: () => Effect.void,
})

export const ConsoleDebugLayer = Layer.succeed(DebugSinkTag, {
  record: (event: LoadDebugEvent) => Effect.logDebug({ loadEvent: event }),
})

/** Records into the sink in scope; without one the event goes to the debug log. */
export const record = (event: LoadDebugEvent): Effect.Effect<void> =>
  Effect.serviceOption(DebugSinkTag).pipe(
    Effect.flatMap((maybeSink) =>
      Option.match(maybeSink, {
        onSome: (sink) => sink.record(event),
        onNone: () => Effect.logDebug({ loadEvent: event }),
      }),
    ),
  )
