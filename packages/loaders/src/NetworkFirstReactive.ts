import { Effect, Either, Equal, Option, Stream } from 'effect'
import type { Equivalence } from 'effect'
import * as Collaborators from './internal/collaborators.js'
import * as InitialLoadError from './InitialLoadError.js'
import * as RequestContext from './RequestContext.js'
import * as ResultState from './ResultState.js'
import type { CacheWriter, ConnectivityProbe, LocalSource, ObservableLocalSource, RemoteSource } from './Sources.js'
import { suppressTransientErrors } from './State.js'

export interface NetworkFirstReactiveOptions<A> {
  /** An observable source keeps the stream open for later local changes; a plain one is read once. */
  readonly local: LocalSource<A> | ObservableLocalSource<A>
  readonly remote: RemoteSource<A>
  readonly cache?: CacheWriter<A>
  readonly connectivity: ConnectivityProbe
  /**
   * Connectivity updates. Each distinct value restarts the load and cancels the previous one.
   * Default: a single reading of `connectivity`.
   */
  readonly connectivityChanges?: Stream.Stream<boolean>
  readonly equivalence?: Equivalence.Equivalence<A>
}

type States<A> = Stream.Stream<ResultState.ResultState<A, InitialLoadError.RemoteFailed>>

/**
 * Network-first, state-emitting and connectivity-aware. For every distinct connectivity value:
 *
 * - `Loading`;
 * - online: fetch once; a value is cached before local observation starts, a failure is
 *   reported as `Error(RemoteFailed)`;
 * - then the local source, `Success` for a value and `Empty` for nothing.
 *
 * An Error followed by any local observation, `Empty` included, is transient and never reaches
 * the consumer.
 */
export const make = <A>(options: NetworkFirstReactiveOptions<A>): States<A> => {
  const connectivity = options.connectivityChanges ?? Stream.sync(() => options.connectivity.isOnline())
  return connectivity.pipe(
    Stream.changes,
    Stream.flatMap((online) => loadFor(options, online), { switch: true }),
    suppressTransientErrors,
  )
}

const loadFor = <A>(options: NetworkFirstReactiveOptions<A>, online: boolean): States<A> =>
  Stream.unwrap(
    Effect.gen(function* () {
      const ctx = yield* RequestContext.make('network-first-reactive')
      const annotate = RequestContext.annotate(ctx)
      yield* Effect.logDebug(`>>>>> network-first-reactive start online=${online}`).pipe(annotate)

      const afterFetch = online
        ? Stream.unwrap(fetchThenObserve(ctx, options))
        : observeStates(ctx, options)

      return Stream.concat(Stream.succeed(ResultState.loading), afterFetch).pipe(
        Stream.ensuring(Effect.logDebug('<<<<< network-first-reactive released').pipe(annotate)),
      )
    }),
  )

const fetchThenObserve = <A>(
  ctx: RequestContext.RequestContext,
  options: NetworkFirstReactiveOptions<A>,
): Effect.Effect<States<A>> =>
  Effect.gen(function* () {
    const fetched = yield* Collaborators.fetchRemote(ctx, options.remote)

    if (Either.isLeft(fetched)) {
      const error = InitialLoadError.remoteFailed(ctx.requestId, fetched.left)
      yield* Effect.logWarning('Remote fetch failed, falling back to local.', error)
      return Stream.concat(Stream.succeed(ResultState.error(error)), observeStates(ctx, options))
    }

    if (Option.isSome(fetched.right)) {
      yield* Collaborators.persist(ctx, options.cache, fetched.right.value)
    } else {
      yield* Effect.logDebug('Remote returned nothing, showing local.')
    }
    return observeStates(ctx, options)
  }).pipe(RequestContext.annotate(ctx))

const localChanges = <A>(local: LocalSource<A> | ObservableLocalSource<A>): Stream.Stream<Option.Option<A>, unknown> =>
  'observe' in local ? local.observe : Stream.fromEffect(local.read)

/** A failing local source counts as absent. */
const observeStates = <A>(
  ctx: RequestContext.RequestContext,
  options: NetworkFirstReactiveOptions<A>,
): States<A> => {
  const equivalence = options.equivalence ?? Equal.equivalence<A>()
  return localChanges(options.local).pipe(
    Stream.changesWith(Option.getEquivalence(equivalence)),
    Stream.catchAllCause((cause) =>
      Stream.fromEffect(
        Effect.logError('Local observation failed, treating as absent.', cause).pipe(
          RequestContext.annotate(ctx),
          Effect.as(Option.none<A>()),
        ),
      ),
    ),
    Stream.map(
      (value): ResultState.ResultState<A, InitialLoadError.RemoteFailed> =>
        Option.match(value, {
          onNone: () => ResultState.empty,
          onSome: (a) => ResultState.success(a),
        }),
    ),
  )
}
