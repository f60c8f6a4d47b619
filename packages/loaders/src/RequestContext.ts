import { randomUUID } from 'node:crypto'
import { Context, Duration, Effect, Exit, Layer, Option } from 'effect'
import { LoaderConfig } from './LoaderConfig.js'

export type Strategy = 'cache-first' | 'cache-first-reactive' | 'network-first' | 'network-first-reactive'

/**
 * Per-invocation diagnostics context. Created when a loader starts, dropped when it ends; it only
 * feeds log annotations and error fields and never steers control flow.
 */
export interface RequestContext {
  readonly requestId: string
  readonly strategy: Strategy
  readonly trace: boolean
}

export interface RequestIdGeneratorService {
  readonly next: Effect.Effect<string>
}

export class RequestIdGenerator extends Context.Tag('@cache-reconcile/loaders/RequestIdGenerator')<
  RequestIdGenerator,
  RequestIdGeneratorService
>() {
  static layer(next: Effect.Effect<string>): Layer.Layer<RequestIdGenerator> {
    return Layer.succeed(RequestIdGenerator, { next })
  }
}

const randomRequestId = Effect.sync(() => randomUUID().slice(-8))

export const make = (strategy: Strategy): Effect.Effect<RequestContext> =>
  Effect.gen(function* () {
    const generator = yield* Effect.serviceOption(RequestIdGenerator)
    const requestId = yield* Option.match(generator, {
      onNone: () => randomRequestId,
      onSome: (service) => service.next,
    })
    const config = yield* LoaderConfig.load
    return { requestId, strategy, trace: config.trace }
  })

export const annotate =
  (ctx: RequestContext) =>
  <A, E, R>(self: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
    Effect.annotateLogs(self, { requestId: ctx.requestId, strategy: ctx.strategy })

const describeExit = <A, E>(exit: Exit.Exit<A, E>): string =>
  Exit.match(exit, {
    onFailure: (cause) => (Exit.isInterrupted(exit) ? 'interrupted' : `failure=${String(cause)}`),
    onSuccess: (value) => `result=${String(value)}`,
  })

/**
 * Collaborator tracing: with `trace` enabled, logs the cost and outcome of `self` at Debug level.
 * Otherwise `self` runs untouched.
 */
export const trace =
  (ctx: RequestContext, label: string) =>
  <A, E, R>(self: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> => {
    if (!ctx.trace) return self
    return Effect.gen(function* () {
      const [duration, exit] = yield* Effect.timed(Effect.exit(self))
      yield* Effect.logDebug(`[trace] ${label} cost=${Duration.toMillis(duration)}ms ${describeExit(exit)}`)
      return yield* exit
    }).pipe(annotate(ctx))
  }
