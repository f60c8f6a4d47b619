import type { InitialLoadError } from './InitialLoadError.js'

/**
 * ResultState: what a state-emitting loader reports to its consumer.
 *
 * - `Loading` is always the first state of a stream;
 * - afterwards any number of `Success` / `Empty`;
 * - at most one `Error`, and only as the last state.
 */
export type ResultState<A, E = InitialLoadError> = Loading | Success<A> | Empty | Failure<E>

export interface Loading {
  readonly _tag: 'Loading'
}

export interface Success<A> {
  readonly _tag: 'Success'
  readonly value: A
}

/** The load finished and there is legitimately nothing to show ("not found"). */
export interface Empty {
  readonly _tag: 'Empty'
}

export interface Failure<E> {
  readonly _tag: 'Error'
  readonly error: E
}

export type ResultStateTag = ResultState<unknown, unknown>['_tag']

export const loading: Loading = { _tag: 'Loading' }

export const empty: Empty = { _tag: 'Empty' }

export const success = <A>(value: A): Success<A> => ({ _tag: 'Success', value })

export const error = <E>(error: E): Failure<E> => ({ _tag: 'Error', error })

export const isLoading = <A, E>(state: ResultState<A, E>): state is Loading => state._tag === 'Loading'

export const isSuccess = <A, E>(state: ResultState<A, E>): state is Success<A> => state._tag === 'Success'

export const isEmpty = <A, E>(state: ResultState<A, E>): state is Empty => state._tag === 'Empty'

export const isError = <A, E>(state: ResultState<A, E>): state is Failure<E> => state._tag === 'Error'

export interface ResultStateCases<A, E, R> {
  readonly onLoading: () => R
  readonly onSuccess: (value: A) => R
  readonly onEmpty: () => R
  readonly onError: (error: E) => R
}

export const match = <A, E, R>(state: ResultState<A, E>, cases: ResultStateCases<A, E, R>): R => {
  switch (state._tag) {
    case 'Loading':
      return cases.onLoading()
    case 'Success':
      return cases.onSuccess(state.value)
    case 'Empty':
      return cases.onEmpty()
    case 'Error':
      return cases.onError(state.error)
  }
}

/** Maps the success value; every other state is returned as is. */
export const map = <A, B, E>(state: ResultState<A, E>, f: (value: A) => B): ResultState<B, E> =>
  state._tag === 'Success' ? success(f(state.value)) : state

export const getOrUndefined = <A, E>(state: ResultState<A, E>): A | undefined =>
  state._tag === 'Success' ? state.value : undefined
