import { Effect, Either, Option, Stream } from 'effect'
import * as Collaborators from './internal/collaborators.js'
import * as InitialLoadError from './InitialLoadError.js'
import * as Policy from './Policy.js'
import * as RequestContext from './RequestContext.js'
import type { CacheWriter, ConnectivityProbe, LocalSource, RemoteSource } from './Sources.js'

export interface CacheFirstOptions<A> {
  readonly local: LocalSource<A>
  readonly remote: RemoteSource<A>
  readonly cache?: CacheWriter<A>
  readonly connectivity: ConnectivityProbe
  /** Asked only when a local value exists; a missing local value always triggers a fetch. */
  readonly shouldFetch?: Policy.FetchPolicy<A>
  readonly shouldEmitRemote?: Policy.EmitPolicy<A>
}

/**
 * Cache-first, one-shot.
 *
 * Emits the cached value (if any) right away, then, when the fetch policy asks for it and the
 * device is online, fetches once, writes the result to the cache and emits it (subject to
 * `shouldEmitRemote`). Completes after at most two values.
 *
 * Fails with an InitialLoadError only when there was no local value to fall back to:
 * - offline → NetworkUnavailable;
 * - remote returned nothing → RemoteEmpty;
 * - remote failed → RemoteFailed (original error as `cause`).
 */
export const make = <A>(options: CacheFirstOptions<A>): Stream.Stream<A, InitialLoadError.InitialLoadError> =>
  Stream.unwrap(
    Effect.gen(function* () {
      const ctx = yield* RequestContext.make('cache-first')
      const annotate = RequestContext.annotate(ctx)

      yield* Effect.logDebug('>>>>> cache-first start').pipe(annotate)
      const local = Collaborators.orNone(yield* Collaborators.readLocal(ctx, options.local))

      return Stream.concat(
        Stream.fromIterable(Option.toArray(local)),
        Collaborators.fromOption(refresh(ctx, options, local)),
      ).pipe(Stream.ensuring(Effect.logDebug('<<<<< cache-first end').pipe(annotate)))
    }),
  )

const refresh = <A>(
  ctx: RequestContext.RequestContext,
  options: CacheFirstOptions<A>,
  local: Option.Option<A>,
): Effect.Effect<Option.Option<A>, InitialLoadError.InitialLoadError> =>
  Effect.gen(function* () {
    const fetchPolicy: Policy.FetchPolicy<A> = options.shouldFetch ?? Policy.always
    const emitPolicy: Policy.EmitPolicy<A> = options.shouldEmitRemote ?? Policy.emitAlways

    const shouldFetch = Option.isNone(local) || fetchPolicy(local)
    if (!shouldFetch) {
      yield* Effect.logDebug('Remote skipped by fetch policy.')
      return Option.none<A>()
    }

    if (!options.connectivity.isOnline()) {
      if (Option.isSome(local)) {
        yield* Effect.logDebug('Remote skipped: offline, keeping local.')
        return Option.none<A>()
      }
      const error = InitialLoadError.networkUnavailable(ctx.requestId)
      yield* Effect.logError('Offline with no local data.', error)
      return yield* Effect.fail(error)
    }

    const fetched = yield* Collaborators.fetchRemote(ctx, options.remote)

    if (Either.isLeft(fetched)) {
      if (Option.isSome(local)) {
        yield* Effect.logWarning('Remote fetch failed, keeping stale local.', fetched.left)
        return Option.none<A>()
      }
      const error = InitialLoadError.remoteFailed(ctx.requestId, fetched.left)
      yield* Effect.logError('Remote fetch failed with no local data.', error)
      return yield* Effect.fail(error)
    }

    const remote = fetched.right
    if (Option.isNone(remote)) {
      if (Option.isSome(local)) {
        yield* Effect.logWarning('Remote returned nothing, keeping stale local.')
        return Option.none<A>()
      }
      const error = InitialLoadError.remoteEmpty(ctx.requestId)
      yield* Effect.logError('Remote returned nothing with no local data.', error)
      return yield* Effect.fail(error)
    }

    yield* Collaborators.persist(ctx, options.cache, remote.value)

    if (!emitPolicy(local, remote.value)) {
      yield* Effect.logDebug('Remote value cached but not emitted (emit policy).')
      return Option.none<A>()
    }
    return remote
  }).pipe(RequestContext.annotate(ctx))
