import { Cause, Effect, Exit, Option, Runtime, type ConfigError } from 'effect'
import { FetchFailedError, InvalidTargetError, type LoadFailure } from './errors.js'
import type { ImageManager } from './Manager.js'
import { resolveViewLoaderConfig, type ViewLoaderConfigShape } from './internal/config.js'
import { isVerboseEvent, record, type LoadDebugEvent } from './internal/debug/DebugSink.js'
import { resolveOperationKey } from './internal/operation/OperationKeyResolver.js'
import {
  makeLoadOrchestrator,
  type LoadOrchestrator,
  type LoadRequest,
  type LoadResult,
} from './internal/orchestrator/LoadOrchestrator.js'
import { toSerializableErrorSummary } from './internal/errorSummary.js'
import { makeCallbackQueue, type CallbackQueue } from './internal/runtime/CallbackQueue.js'
import type { HostScheduler } from './internal/runtime/HostScheduler.js'

export type { LoadRequest, LoadResult, LoadTarget, CompletedCallback } from './internal/orchestrator/LoadOrchestrator.js'

export type LoadEffectRequest<I> = Omit<LoadRequest<I>, 'onCompleted'>

export interface ViewLoaderService<I> extends LoadOrchestrator<I> {
  readonly config: ViewLoaderConfigShape
  /**
   * The request as an Effect: succeeds with the final delivery, fails with a
   * LoadFailure. Interrupting the fiber cancels the request through the
   * registry, unless it has already finished or been replaced.
   */
  readonly load: (request: LoadEffectRequest<I>) => Effect.Effect<LoadResult<I>, LoadFailure>
}

export interface MakeOptions {
  readonly hostScheduler?: HostScheduler
  /** Default: a queue owned by this loader that reports task failures as `queue:error`. */
  readonly homeQueue?: CallbackQueue
}

const shouldTrace = (config: ViewLoaderConfigShape, event: LoadDebugEvent): boolean => {
  switch (config.traceLevel) {
    case 'off':
      return false
    case 'light':
      return !isVerboseEvent(event)
    case 'full':
      return true
  }
}

/**
 * Builds a loader bound to the current runtime: debug events go to the
 * DebugSink in scope (or the debug log), filtered by `traceLevel`.
 */
export const make = <I>(
  manager: ImageManager<I>,
  options?: MakeOptions,
): Effect.Effect<ViewLoaderService<I>, ConfigError.ConfigError> =>
  Effect.gen(function* () {
    const config = yield* resolveViewLoaderConfig
    const runtime = yield* Effect.runtime<never>()
    const runSyncExit = Runtime.runSyncExit(runtime)
    const runFork = Runtime.runFork(runtime)

    // Diagnostics never abort a request: a sink that suspends finishes on its
    // own fiber, one that dies is reported as a warning.
    const emit = (effect: Effect.Effect<void>): void => {
      const exit = runSyncExit(effect)
      if (Exit.isSuccess(exit)) return
      const defect = Cause.dieOption(exit.cause)
      if (Option.isSome(defect) && Runtime.isAsyncFiberException(defect.value)) return
      runFork(Effect.logWarning('[viewload] debug sink failed', exit.cause))
    }

    const trace = (event: LoadDebugEvent): void => {
      if (shouldTrace(config, event)) emit(record(event))
    }

    const homeQueue =
      options?.homeQueue ??
      makeCallbackQueue({
        name: 'viewload',
        hostScheduler: options?.hostScheduler,
        onError: (cause, queue) => {
          emit(Effect.logError(`[CallbackQueue:${queue}] task failed`, cause))
          trace({ type: 'queue:error', queue, error: toSerializableErrorSummary(cause) })
        },
      })

    const orchestrator = makeLoadOrchestrator<I>({
      manager,
      hostScheduler: options?.hostScheduler,
      homeQueue,
      config,
      trace,
    })

    const load = (request: LoadEffectRequest<I>): Effect.Effect<LoadResult<I>, LoadFailure> =>
      Effect.async<LoadResult<I>, LoadFailure>((resume) => {
        const operationKey = resolveOperationKey(request.owner, request.context?.operationKey)
        const handle = orchestrator.request({
          ...request,
          onCompleted: (result) => {
            if (!result.isFinal) return
            if (result.error instanceof InvalidTargetError) {
              resume(Effect.fail(result.error))
            } else if (result.error !== undefined) {
              resume(
                Effect.fail(
                  result.url
                    ? new FetchFailedError(operationKey, result.url, result.error)
                    : new InvalidTargetError(operationKey),
                ),
              )
            } else {
              resume(Effect.succeed(result))
            }
          },
        })
        if (handle) {
          return Effect.sync(() => {
            orchestrator.cancelRequest(request.owner, operationKey, handle)
          })
        }
      })

    return { ...orchestrator, config, load }
  })
