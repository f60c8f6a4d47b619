import { Effect, Layer, Logger } from 'effect'
import type { LogLevel } from 'effect'
import { LoaderConfig } from './LoaderConfig.js'

export interface DiagnosticsLayerOptions {
  /** Overrides the configured minimum level (RECONCILE_LOG_LEVEL / LoaderConfig.logLevel). */
  readonly logLevel?: LogLevel.LogLevel
  /** Swap the default logger for Effect's pretty logger. */
  readonly pretty?: boolean
}

/**
 * Logging setup for loader diagnostics.
 *
 * Loaders log every step at Debug with `requestId` / `strategy` annotations; recovered remote
 * problems at Warning; local read and cache write failures at Warning / Error. The default
 * minimum level (Info) keeps the Debug trail out of production output.
 *
 *   const program = CacheFirst.make(options).pipe(
 *     Stream.runCollect,
 *     Effect.provide(Diagnostics.layer({ pretty: true })),
 *   )
 */
export const layer = (options: DiagnosticsLayerOptions = {}): Layer.Layer<never> =>
  Layer.unwrapEffect(
    Effect.gen(function* () {
      const config = yield* LoaderConfig.load
      const minimum = Logger.minimumLogLevel(options.logLevel ?? config.logLevel)
      return options.pretty ? Layer.merge(minimum, prettyLogger()) : minimum
    }),
  )

export type PrettyLoggerOptions = Parameters<typeof Logger.prettyLogger>[0]

/** Equivalent to Logger.replace(Logger.defaultLogger, Logger.prettyLogger(options)). */
export const prettyLogger = (options?: PrettyLoggerOptions): Layer.Layer<never> =>
  Logger.replace(Logger.defaultLogger, Logger.prettyLogger(options))

/** Merges the pretty logger into an existing layer. */
export const withPrettyLogger = <ROut, E, RIn>(
  base: Layer.Layer<ROut, E, RIn>,
  options?: PrettyLoggerOptions,
): Layer.Layer<ROut, E, RIn> => Layer.merge(base, prettyLogger(options))
