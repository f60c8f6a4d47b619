// State: adapters from raw loader streams to ResultState streams.
//
// - fromValues / fromOptions: Loading first, values as Success, absence as Empty, a typed failure
//   as a terminal Error. Defects and interruption are not states and keep propagating.
// - suppressTransientErrors: hold an Error back until it is known to be the last word.
// - successes / selectSuccess / tapState: consumer-side helpers.

import { Effect, Equal, Option, Stream } from 'effect'
import type { Equivalence } from 'effect'
import * as CacheFirst from './CacheFirst.js'
import * as CacheFirstReactive from './CacheFirstReactive.js'
import type { InitialLoadError, RemoteFailed } from './InitialLoadError.js'
import * as NetworkFirst from './NetworkFirst.js'
import * as ResultState from './ResultState.js'

type StateStream<A, E, E2 = never, R = never> = Stream.Stream<ResultState.ResultState<A, E>, E2, R>

type Pending<E> = Option.Option<ResultState.Failure<E>>

// `None` marks normal completion of the wrapped stream; failure never reaches it.
const withEndMarker = <A, E, R>(self: Stream.Stream<A, E, R>): Stream.Stream<Option.Option<A>, E, R> =>
  Stream.concat(Stream.map(self, Option.some), Stream.succeed(Option.none<A>()))

const adapt = <A, B, E, R>(
  self: Stream.Stream<A, E, R>,
  toState: (value: A) => ResultState.ResultState<B, E>,
): StateStream<B, E, never, R> => {
  const states = withEndMarker(self).pipe(
    Stream.mapAccum(false, (seen, event): readonly [boolean, ReadonlyArray<ResultState.ResultState<B, E>>] => {
      if (Option.isSome(event)) return [true, [toState(event.value)]]
      return [seen, seen ? [] : [ResultState.empty]]
    }),
    Stream.flattenIterables,
  )

  return Stream.concat(Stream.succeed<ResultState.ResultState<B, E>>(ResultState.loading), states).pipe(
    Stream.catchAll((error) => Stream.succeed(ResultState.error(error))),
  )
}

/** Every value becomes `Success`; a stream that completes without any value yields `Empty`. */
export const fromValues = <A, E, R>(self: Stream.Stream<A, E, R>): StateStream<A, E, never, R> =>
  adapt(self, (value) => ResultState.success(value))

/** `Some` becomes `Success`, `None` becomes `Empty`. */
export const fromOptions = <A, E, R>(self: Stream.Stream<Option.Option<A>, E, R>): StateStream<A, E, never, R> =>
  adapt(self, (value) =>
    Option.match(value, {
      onNone: () => ResultState.empty,
      onSome: (a) => ResultState.success(a),
    }),
  )

/**
 * Holds at most one pending `Error` instead of emitting it:
 * - `Loading` clears it (a fresh attempt started);
 * - `Success` / `Empty` discard it (it was transient);
 * - a later `Error` replaces it;
 * - normal completion emits it as the final state;
 * - abnormal termination drops it and propagates.
 *
 * A loader may report a remote error and then recover through a local emission; this keeps the
 * error from flashing on screen in between.
 */
export const suppressTransientErrors = <A, E, E2, R>(self: StateStream<A, E, E2, R>): StateStream<A, E, E2, R> =>
  withEndMarker(self).pipe(
    Stream.mapAccum(
      Option.none<ResultState.Failure<E>>(),
      (pending, event): readonly [Pending<E>, ReadonlyArray<ResultState.ResultState<A, E>>] => {
        if (Option.isNone(event)) {
          return [Option.none(), Option.toArray(pending)]
        }
        const state = event.value
        switch (state._tag) {
          case 'Error':
            return [Option.some(state), []]
          case 'Loading':
          case 'Success':
          case 'Empty':
            return [Option.none(), [state]]
        }
      },
    ),
    Stream.flattenIterables,
  )

export const cacheFirst = <A>(
  options: CacheFirst.CacheFirstOptions<A>,
): StateStream<A, InitialLoadError> => fromValues(CacheFirst.make(options))

/** Long-lived like the underlying loader; a terminal Error is shown only if nothing supersedes it. */
export const cacheFirstReactive = <A>(
  options: CacheFirstReactive.CacheFirstReactiveOptions<A>,
): StateStream<A, InitialLoadError> => suppressTransientErrors(fromValues(CacheFirstReactive.make(options)))

export const networkFirst = <A>(options: NetworkFirst.NetworkFirstOptions<A>): StateStream<A, RemoteFailed> =>
  fromOptions(NetworkFirst.make(options))

/** Success values only, emitted when they change. */
export const successes = <A, E, E2, R>(
  self: StateStream<A, E, E2, R>,
  equivalence: Equivalence.Equivalence<A> = Equal.equivalence<A>(),
): Stream.Stream<A, E2, R> =>
  self.pipe(
    Stream.filterMap((state) => (ResultState.isSuccess(state) ? Option.some(state.value) : Option.none())),
    Stream.changesWith(equivalence),
  )

/**
 * A projection of the success value, emitted only when the projection changes, e.g. re-render a
 * title only when `user.name` changes. Return a tuple to watch several fields at once, with an
 * equivalence such as `Equivalence.tuple(...)`.
 */
export const selectSuccess = <A, B, E, E2, R>(
  self: StateStream<A, E, E2, R>,
  select: (value: A) => B,
  equivalence: Equivalence.Equivalence<B> = Equal.equivalence<B>(),
): Stream.Stream<B, E2, R> =>
  self.pipe(
    Stream.filterMap((state) => (ResultState.isSuccess(state) ? Option.some(select(state.value)) : Option.none())),
    Stream.changesWith(equivalence),
  )

export interface StateHandlers<A, E, R> {
  readonly onLoading?: () => Effect.Effect<void, never, R>
  readonly onSuccess?: (value: A) => Effect.Effect<void, never, R>
  readonly onEmpty?: () => Effect.Effect<void, never, R>
  readonly onError?: (error: E) => Effect.Effect<void, never, R>
}

/** Runs the handler matching each state; states pass through unchanged. */
export const tapState = <A, E, E2, R, R2 = never>(
  self: StateStream<A, E, E2, R>,
  handlers: StateHandlers<A, E, R2>,
): StateStream<A, E, E2, R | R2> =>
  Stream.tap(self, (state) =>
    ResultState.match<A, E, Effect.Effect<void, never, R2>>(state, {
      onLoading: () => handlers.onLoading?.() ?? Effect.void,
      onSuccess: (value) => handlers.onSuccess?.(value) ?? Effect.void,
      onEmpty: () => handlers.onEmpty?.() ?? Effect.void,
      onError: (error) => handlers.onError?.(error) ?? Effect.void,
    }),
  )
