// InitialLoadError: the closed set of failures meaning "no data could be produced at all".
//
// A member is only ever constructed when no local value was available as a fallback. With local
// data present, every remote problem is downgraded to a logged warning and the local value wins.

import { Data, Effect, Stream } from 'effect'

export class NetworkUnavailable extends Data.TaggedError('NetworkUnavailable')<{
  readonly requestId: string
  readonly message: string
}> {}

export class RemoteEmpty extends Data.TaggedError('RemoteEmpty')<{
  readonly requestId: string
  readonly message: string
}> {}

/**
 * The remote call failed. `cause` is the remote error exactly as the RemoteSource reported it, so
 * the underlying transport error stays inspectable.
 */
export class RemoteFailed extends Data.TaggedError('RemoteFailed')<{
  readonly requestId: string
  readonly message: string
  readonly cause: unknown
}> {}

export type InitialLoadError = NetworkUnavailable | RemoteEmpty | RemoteFailed

export type InitialLoadErrorTag = InitialLoadError['_tag']

const causeName = (cause: unknown): string => {
  if (cause instanceof Error) return cause.name
  if (cause === null) return 'null'
  return typeof cause
}

export const networkUnavailable = (requestId: string): NetworkUnavailable =>
  new NetworkUnavailable({
    requestId,
    message: `Network is unavailable and no cached data is available [req=${requestId}]`,
  })

export const remoteEmpty = (requestId: string): RemoteEmpty =>
  new RemoteEmpty({
    requestId,
    message: `Remote source returned empty data and no cache is available [req=${requestId}]`,
  })

export const remoteFailed = (requestId: string, cause: unknown): RemoteFailed =>
  new RemoteFailed({
    requestId,
    cause,
    message: `Remote request failed and no cache is available [req=${requestId}][cause=${causeName(cause)}]`,
  })

export const isInitialLoadError = (u: unknown): u is InitialLoadError =>
  u instanceof NetworkUnavailable || u instanceof RemoteEmpty || u instanceof RemoteFailed

export interface InitialLoadErrorCases<R> {
  readonly NetworkUnavailable: (error: NetworkUnavailable) => R
  readonly RemoteEmpty: (error: RemoteEmpty) => R
  readonly RemoteFailed: (error: RemoteFailed) => R
}

export const match = <R>(error: InitialLoadError, cases: InitialLoadErrorCases<R>): R => {
  switch (error._tag) {
    case 'NetworkUnavailable':
      return cases.NetworkUnavailable(error)
    case 'RemoteEmpty':
      return cases.RemoteEmpty(error)
    case 'RemoteFailed':
      return cases.RemoteFailed(error)
  }
}

export type InitialLoadErrorHandlers<R> = Partial<InitialLoadErrorCases<Effect.Effect<void, never, R>>>

/**
 * Ends a loader stream quietly on a taxonomy failure, running the matching handler first.
 * Kinds without a handler are swallowed as well; defects and interruption pass through.
 */
export const handle = <A, R, R2 = never>(
  self: Stream.Stream<A, InitialLoadError, R>,
  handlers: InitialLoadErrorHandlers<R2> = {},
): Stream.Stream<A, never, R | R2> =>
  Stream.catchAll(self, (error) =>
    Stream.drain(
      Stream.fromEffect(
        match<Effect.Effect<void, never, R2>>(error, {
          NetworkUnavailable: (e) => handlers.NetworkUnavailable?.(e) ?? Effect.void,
          RemoteEmpty: (e) => handlers.RemoteEmpty?.(e) ?? Effect.void,
          RemoteFailed: (e) => handlers.RemoteFailed?.(e) ?? Effect.void,
        }),
      ),
    ),
  )
