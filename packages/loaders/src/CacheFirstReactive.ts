import { Equal, Effect, Either, Option, Stream } from 'effect'
import type { Equivalence } from 'effect'
import * as Collaborators from './internal/collaborators.js'
import * as InitialLoadError from './InitialLoadError.js'
import * as Policy from './Policy.js'
import * as RequestContext from './RequestContext.js'
import type { CacheWriter, ConnectivityProbe, ObservableLocalSource, RemoteSource } from './Sources.js'

export interface CacheFirstReactiveOptions<A> {
  readonly local: ObservableLocalSource<A>
  readonly remote: RemoteSource<A>
  /** Must write into the store `local.observe` watches: it is the only way remote data is shown. */
  readonly cache: CacheWriter<A>
  readonly connectivity: ConnectivityProbe
  readonly shouldFetch?: Policy.FetchPolicy<A>
  /** Consecutive observed values that are equivalent are emitted once. Default: `Equal.equals`. */
  readonly equivalence?: Equivalence.Equivalence<A>
}

/**
 * Cache-first, long-lived. The stream never completes on its own; the consumer ends it by
 * interrupting it (or by taking what it needs).
 *
 * Phases:
 * 1. Initial snapshot: the first value of `local.observe`, used only to decide about the sync.
 * 2. Observation: every distinct non-empty local value reaches the consumer. This is the only
 *    emission path.
 * 3. One-time remote sync, concurrently with 2: the fetched value is written to the cache and
 *    reaches the consumer by being observed (single source of truth). Fails the stream only when
 *    there was no snapshot.
 * 4. Teardown: observation and an in-flight sync are released exactly once on every exit path.
 *    A cache write that already started runs to completion.
 */
export const make = <A>(options: CacheFirstReactiveOptions<A>): Stream.Stream<A, InitialLoadError.InitialLoadError> =>
  Stream.unwrap(
    Effect.gen(function* () {
      const ctx = yield* RequestContext.make('cache-first-reactive')
      const annotate = RequestContext.annotate(ctx)

      yield* Effect.logDebug('>>>>> cache-first-reactive start').pipe(annotate)
      const snapshot = yield* Collaborators.readFirst(ctx, options.local.observe)

      const fetchPolicy: Policy.FetchPolicy<A> = options.shouldFetch ?? Policy.always
      const shouldFetch = Option.isNone(snapshot) || fetchPolicy(snapshot)
      yield* Effect.logDebug(
        `Remote sync decision: shouldFetch=${shouldFetch} hasSnapshot=${Option.isSome(snapshot)}`,
      ).pipe(annotate)

      const sync = shouldFetch ? syncOnce(ctx, options, snapshot) : Effect.void

      return Stream.merge(observe(ctx, options), Stream.drain(Stream.fromEffect(sync))).pipe(
        Stream.ensuring(Effect.logDebug('<<<<< cache-first-reactive released').pipe(annotate)),
      )
    }),
  )

/**
 * Persistent observation: distinct, non-empty local values. A failing local stream ends the
 * observation (logged) but not the loader, which keeps waiting for cancellation.
 */
const observe = <A>(
  ctx: RequestContext.RequestContext,
  options: CacheFirstReactiveOptions<A>,
): Stream.Stream<A> => {
  const equivalence = options.equivalence ?? Equal.equivalence<A>()
  const observed = options.local.observe.pipe(
    Stream.changesWith(Option.getEquivalence(equivalence)),
    Stream.filterMap((value) => value),
    Stream.tap((value) =>
      Effect.logDebug(`Local observer emitting: ${String(value)}`).pipe(RequestContext.annotate(ctx)),
    ),
    Stream.catchAllCause((cause) =>
      Stream.fromEffect(
        Effect.logError('Local observation failed; no further local updates.', cause).pipe(
          RequestContext.annotate(ctx),
        ),
      ).pipe(Stream.drain),
    ),
  )
  return Stream.concat(observed, Stream.never)
}

const syncOnce = <A>(
  ctx: RequestContext.RequestContext,
  options: CacheFirstReactiveOptions<A>,
  snapshot: Option.Option<A>,
): Effect.Effect<void, InitialLoadError.InitialLoadError> =>
  Effect.gen(function* () {
    if (!options.connectivity.isOnline()) {
      if (Option.isSome(snapshot)) {
        yield* Effect.logWarning('Remote sync skipped: offline.')
        return
      }
      const error = InitialLoadError.networkUnavailable(ctx.requestId)
      yield* Effect.logError('Offline with no cache. Failing the stream.', error)
      return yield* Effect.fail(error)
    }

    const fetched = yield* Collaborators.fetchRemote(ctx, options.remote)

    if (Either.isLeft(fetched)) {
      if (Option.isSome(snapshot)) {
        yield* Effect.logWarning('Remote fetch failed, proceeding with stale cache.', fetched.left)
        return
      }
      const error = InitialLoadError.remoteFailed(ctx.requestId, fetched.left)
      yield* Effect.logError('Remote fetch failed with no cache. Failing the stream.', error)
      return yield* Effect.fail(error)
    }

    const remote = fetched.right
    if (Option.isNone(remote)) {
      if (Option.isSome(snapshot)) {
        yield* Effect.logWarning('Remote returned nothing, keeping stale cache.')
        return
      }
      const error = InitialLoadError.remoteEmpty(ctx.requestId)
      yield* Effect.logError('Remote returned nothing with no cache. Failing the stream.', error)
      return yield* Effect.fail(error)
    }

    yield* Collaborators.persist(ctx, options.cache, remote.value)
    yield* Effect.logDebug('Remote value cached; the local observer will emit it.')
  }).pipe(RequestContext.annotate(ctx))
