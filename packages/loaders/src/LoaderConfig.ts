import { Config, Context, Effect, Layer, LogLevel, Option } from 'effect'

export interface LoaderConfigShape {
  /** Time every collaborator call and log its cost at Debug level. */
  readonly trace: boolean
  /** Minimum level applied by `Diagnostics.layer`. */
  readonly logLevel: LogLevel.LogLevel
}

export interface LoaderConfigSnapshot extends LoaderConfigShape {
  readonly source: 'runtime' | 'config' | 'default'
}

// Runtime-grade override; wins over anything the ConfigProvider supplies.
export class LoaderConfigTag extends Context.Tag('@cache-reconcile/loaders/LoaderConfig')<
  LoaderConfigTag,
  LoaderConfigShape
>() {}

export const DEFAULT_CONFIG: LoaderConfigShape = {
  trace: false,
  logLevel: LogLevel.Info,
}

/**
 * Keys read from the ambient ConfigProvider (with the default env provider: RECONCILE_TRACE and
 * RECONCILE_LOG_LEVEL).
 */
const LoaderConfigFromProvider = Config.all({
  trace: Config.boolean('TRACE').pipe(Config.withDefault(DEFAULT_CONFIG.trace)),
  logLevel: Config.logLevel('LOG_LEVEL').pipe(Config.withDefault(DEFAULT_CONFIG.logLevel)),
}).pipe(Config.nested('RECONCILE'))

const isDefault = (config: LoaderConfigShape): boolean =>
  config.trace === DEFAULT_CONFIG.trace && config.logLevel === DEFAULT_CONFIG.logLevel

/**
 * Resolves the effective config. An unreadable configured value is reported once as a warning
 * and replaced by the defaults; loading never fails a loader.
 */
const load: Effect.Effect<LoaderConfigSnapshot> = Effect.gen(function* () {
  const override = yield* Effect.serviceOption(LoaderConfigTag)
  if (Option.isSome(override)) {
    return { ...override.value, source: 'runtime' } satisfies LoaderConfigSnapshot
  }

  const fromProvider = yield* LoaderConfigFromProvider.pipe(
    Effect.map(Option.some),
    Effect.catchAll((configError) =>
      Effect.logWarning(`[LoaderConfig] invalid configuration, using defaults: ${String(configError)}`).pipe(
        Effect.as(Option.none<LoaderConfigShape>()),
      ),
    ),
  )

  if (Option.isSome(fromProvider) && !isDefault(fromProvider.value)) {
    return { ...fromProvider.value, source: 'config' } satisfies LoaderConfigSnapshot
  }

  return { ...DEFAULT_CONFIG, source: 'default' } satisfies LoaderConfigSnapshot
})

export const LoaderConfig = {
  tag: LoaderConfigTag,

  /**
   * Overlays a partial config on top of the current one:
   * - an existing LoaderConfigTag in the environment is the base;
   * - otherwise DEFAULT_CONFIG is.
   */
  replace(config: Partial<LoaderConfigShape>): Layer.Layer<LoaderConfigTag> {
    return Layer.effect(
      LoaderConfigTag,
      Effect.gen(function* () {
        const current = yield* Effect.serviceOption(LoaderConfigTag)
        const base = Option.isSome(current) ? current.value : DEFAULT_CONFIG
        return { ...base, ...config }
      }),
    )
  },

  load,
}
