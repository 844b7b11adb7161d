import { Config, Context, Effect, Layer, Option, type ConfigError } from 'effect'

export type TraceLevel = 'off' | 'light' | 'full'

export interface ViewLoaderConfigShape {
  /** off: nothing; light: lifecycle events; full: also progress samples and transition phases. */
  readonly traceLevel: TraceLevel
  /** Peek the Manager's memory tier when the placeholder goes up (warms secondary caches). */
  readonly peekMemoryOnPlaceholder: boolean
}

export class ViewLoaderConfigTag extends Context.Tag('@viewload/core/ViewLoaderConfig')<
  ViewLoaderConfigTag,
  ViewLoaderConfigShape
>() {}

export const DEFAULT_CONFIG: ViewLoaderConfigShape = {
  traceLevel: 'light',
  peekMemoryOnPlaceholder: true,
}

export const ViewLoaderConfig = {
  tag: ViewLoaderConfigTag,

  /**
   * Overlays a partial config on the one in scope (or on the defaults), the
   * same way Logger.replace layers work.
   */
  replace(config: Partial<ViewLoaderConfigShape>) {
    return Layer.effect(
      ViewLoaderConfigTag,
      Effect.gen(function* () {
        const current = yield* Effect.serviceOption(ViewLoaderConfigTag)
        const base = Option.isSome(current) ? current.value : DEFAULT_CONFIG
        return {
          ...base,
          ...config,
        }
      }),
    )
  },
}

const ViewLoaderConfigFromEnv = {
  traceLevel: Config.literal('off', 'light', 'full')('viewload.trace_level').pipe(
    Config.withDefault(DEFAULT_CONFIG.traceLevel),
  ),
  peekMemoryOnPlaceholder: Config.boolean('viewload.peek_memory_on_placeholder').pipe(
    Config.withDefault(DEFAULT_CONFIG.peekMemoryOnPlaceholder),
  ),
}

/**
 * Effective config: the tag in scope wins, otherwise values come from the
 * ConfigProvider (env by default) with the defaults above.
 */
export const resolveViewLoaderConfig: Effect.Effect<ViewLoaderConfigShape, ConfigError.ConfigError> = Effect.gen(
  function* () {
    const override = yield* Effect.serviceOption(ViewLoaderConfigTag)
    if (Option.isSome(override)) {
      return override.value
    }
    const traceLevel = yield* ViewLoaderConfigFromEnv.traceLevel
    const peekMemoryOnPlaceholder = yield* ViewLoaderConfigFromEnv.peekMemoryOnPlaceholder
    return { traceLevel, peekMemoryOnPlaceholder }
  },
)
