import { Cause, Effect, Either, Option, Stream } from 'effect'
import * as RequestContext from '../RequestContext.js'
import type { CacheWriter, LocalSource, RemoteSource } from '../Sources.js'

/**
 * Runs a collaborator effect and reports its outcome as data:
 * - failures and defects become `Either.left` carrying the original error;
 * - interruption is not an outcome and keeps propagating.
 */
export const attempt = <A, E>(self: Effect.Effect<A, E>): Effect.Effect<Either.Either<A, unknown>> =>
  Effect.matchCauseEffect(self, {
    onFailure: (cause) =>
      Cause.isInterruptedOnly(cause) ? Effect.interrupt : Effect.succeed(Either.left(Cause.squash(cause))),
    onSuccess: (value) => Effect.succeed(Either.right(value)),
  })

/**
 * Local read. A failed read is logged and reported as `Left`; callers that do not care about the
 * difference between "failed" and "nothing cached" collapse it with `orNone`.
 */
export const readLocal = <A>(
  ctx: RequestContext.RequestContext,
  local: LocalSource<A>,
): Effect.Effect<Either.Either<Option.Option<A>, unknown>> =>
  attempt(local.read.pipe(RequestContext.trace(ctx, 'local.read'))).pipe(
    Effect.tap((result) =>
      Either.isLeft(result)
        ? Effect.logWarning('Local read failed, treating as absent.', Cause.fail(result.left))
        : Effect.logDebug(`Local read: ${Option.isSome(result.right) ? 'present' : 'absent'}`),
    ),
    RequestContext.annotate(ctx),
  )

export const orNone = <A>(result: Either.Either<Option.Option<A>, unknown>): Option.Option<A> =>
  Either.getOrElse(result, () => Option.none<A>())

/** First value of an observed local stream; an empty or failing stream counts as absent. */
export const readFirst = <A>(
  ctx: RequestContext.RequestContext,
  observe: Stream.Stream<Option.Option<A>, unknown>,
): Effect.Effect<Option.Option<A>> =>
  attempt(Stream.runHead(observe).pipe(Effect.map(Option.flatten), RequestContext.trace(ctx, 'local.first'))).pipe(
    Effect.flatMap((result) =>
      Either.isLeft(result)
        ? Effect.logError('Initial local read failed, treating as absent.', Cause.fail(result.left)).pipe(
            Effect.as(Option.none<A>()),
          )
        : Effect.succeed(result.right),
    ),
    RequestContext.annotate(ctx),
  )

export const fetchRemote = <A>(
  ctx: RequestContext.RequestContext,
  remote: RemoteSource<A>,
): Effect.Effect<Either.Either<Option.Option<A>, unknown>> =>
  Effect.logDebug('Fetching remote.').pipe(
    Effect.zipRight(attempt(remote.fetch.pipe(RequestContext.trace(ctx, 'remote.fetch')))),
    RequestContext.annotate(ctx),
  )

/**
 * Writes a fetched value to the cache. Once started the write is not interrupted, so a cancelled
 * loader never leaves a half-written entry behind. A failed write is logged and otherwise ignored.
 */
export const persist = <A>(
  ctx: RequestContext.RequestContext,
  cache: CacheWriter<A> | undefined,
  value: A,
): Effect.Effect<void> => {
  if (!cache) return Effect.void
  return attempt(cache.write(value).pipe(RequestContext.trace(ctx, 'cache.write'))).pipe(
    Effect.flatMap((result) =>
      Either.isLeft(result)
        ? Effect.logError('Cache write failed; the fetched value is still reported.', Cause.fail(result.left))
        : Effect.logDebug('Cache write complete.'),
    ),
    Effect.uninterruptible,
    RequestContext.annotate(ctx),
  )
}

/** A stream of the value inside `Some`, or of nothing for `None`. */
export const fromOption = <A, E, R>(self: Effect.Effect<Option.Option<A>, E, R>): Stream.Stream<A, E, R> =>
  Stream.flatMap(Stream.fromEffect(self), (option) => Stream.fromIterable(Option.toArray(option)))
