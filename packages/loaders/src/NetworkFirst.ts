import { Effect, Either, Option, Stream } from 'effect'
import * as Collaborators from './internal/collaborators.js'
import * as InitialLoadError from './InitialLoadError.js'
import * as Policy from './Policy.js'
import * as RequestContext from './RequestContext.js'
import type { CacheWriter, ConnectivityProbe, LocalSource, RemoteSource } from './Sources.js'

export interface NetworkFirstOptions<A> {
  readonly local: LocalSource<A>
  readonly remote: RemoteSource<A>
  readonly cache?: CacheWriter<A>
  readonly connectivity: ConnectivityProbe
  /** Whether a cached value may stand in for a missing or failed remote result. */
  readonly shouldEmitLocal?: Policy.LocalEmitPolicy<A>
}

/**
 * Network-first, one-shot: emits exactly one `Option` and completes.
 *
 * - Offline: the local value, or `None`. Never fails, never touches the remote.
 * - Remote value: written to the cache, then emitted.
 * - Remote returned nothing: the local value if the policy allows it, else `None`.
 * - Remote failed: the local value if the policy allows it; `None` when the local read worked but
 *   found nothing (or the policy refused it); RemoteFailed when the local read itself failed.
 */
export const make = <A>(
  options: NetworkFirstOptions<A>,
): Stream.Stream<Option.Option<A>, InitialLoadError.RemoteFailed> =>
  Stream.fromEffect(
    Effect.gen(function* () {
      const ctx = yield* RequestContext.make('network-first')
      return yield* load(ctx, options).pipe(
        Effect.ensuring(Effect.logDebug('<<<<< network-first end')),
        RequestContext.annotate(ctx),
      )
    }),
  )

const load = <A>(
  ctx: RequestContext.RequestContext,
  options: NetworkFirstOptions<A>,
): Effect.Effect<Option.Option<A>, InitialLoadError.RemoteFailed> =>
  Effect.gen(function* () {
    yield* Effect.logDebug('>>>>> network-first start')
    const shouldEmitLocal: Policy.LocalEmitPolicy<A> = options.shouldEmitLocal ?? Policy.emitLocalAlways

    if (!options.connectivity.isOnline()) {
      yield* Effect.logDebug('Offline, falling back to local.')
      return Collaborators.orNone(yield* Collaborators.readLocal(ctx, options.local))
    }

    const fetched = yield* Collaborators.fetchRemote(ctx, options.remote)

    if (Either.isRight(fetched)) {
      const remote = fetched.right
      if (Option.isSome(remote)) {
        yield* Collaborators.persist(ctx, options.cache, remote.value)
        return remote
      }
      yield* Effect.logWarning('Remote returned nothing, falling back to local.')
      const local = Collaborators.orNone(yield* Collaborators.readLocal(ctx, options.local))
      return Option.filter(local, shouldEmitLocal)
    }

    yield* Effect.logWarning('Remote fetch failed, falling back to local.', fetched.left)
    const localResult = yield* Collaborators.readLocal(ctx, options.local)

    if (Either.isLeft(localResult)) {
      const error = InitialLoadError.remoteFailed(ctx.requestId, fetched.left)
      yield* Effect.logError('Remote and local both failed.', error)
      return yield* Effect.fail(error)
    }

    // A local read that worked but found nothing is a legitimate "not found", not a fault.
    return Option.filter(localResult.right, shouldEmitLocal)
  })
