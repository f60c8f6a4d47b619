// Sources: the collaborators a loader reconciles.
// - LocalSource / ObservableLocalSource: cached data (database, key-value store, memory);
// - RemoteSource: a single fetch from the network;
// - CacheWriter: persists a fetched value back into the local source;
// - ConnectivityProbe: synchronous "is the device online" check.
//
// All collaborators are owned by the caller. Loaders never write to the local source except via
// CacheWriter, and hold no long-lived resources beyond the lifetime of the stream they return.

import { Effect, Option, Stream, SubscriptionRef } from 'effect'

export interface LocalSource<A> {
  /** A single read of the cached value; `None` when nothing is cached. */
  readonly read: Effect.Effect<Option.Option<A>, unknown>
}

export interface ObservableLocalSource<A> extends LocalSource<A> {
  /**
   * Current value followed by every later change. Each run of the stream is one subscription and
   * must release its resources when interrupted.
   */
  readonly observe: Stream.Stream<Option.Option<A>, unknown>
}

export interface RemoteSource<A> {
  /**
   * One fetch attempt. Failures are reported in the error channel; cancellation is interruption
   * and is never reported as a value or an error.
   */
  readonly fetch: Effect.Effect<Option.Option<A>, unknown>
}

export interface CacheWriter<A> {
  readonly write: (value: A) => Effect.Effect<void, unknown>
}

export interface ConnectivityProbe {
  readonly isOnline: () => boolean
}

type Nullable<A> = A | null | undefined

export const LocalSource = {
  make: <A>(read: Effect.Effect<Option.Option<A>, unknown>): LocalSource<A> => ({ read }),

  /** Adapts an effect that yields `null`/`undefined` for "not cached". */
  fromNullable: <A>(read: Effect.Effect<Nullable<A>, unknown>): LocalSource<A> => ({
    read: Effect.map(read, Option.fromNullable),
  }),

  fromPromise: <A>(read: () => PromiseLike<Nullable<A>>): LocalSource<A> => ({
    read: Effect.tryPromise({
      try: () => Promise.resolve(read()),
      catch: (cause) => cause,
    }).pipe(Effect.map(Option.fromNullable)),
  }),
}

const makeObservable = <A>(options: {
  readonly observe: Stream.Stream<Option.Option<A>, unknown>
  readonly read?: Effect.Effect<Option.Option<A>, unknown>
}): ObservableLocalSource<A> => ({
  observe: options.observe,
  // Without a dedicated read, the first observed value stands in for it.
  read: options.read ?? Stream.runHead(options.observe).pipe(Effect.map(Option.flatten)),
})

export const ObservableLocalSource = {
  make: makeObservable,

  /** A stream of nullable values, e.g. a query that re-emits whenever its table changes. */
  fromNullableStream: <A>(observe: Stream.Stream<Nullable<A>, unknown>): ObservableLocalSource<A> =>
    makeObservable({ observe: Stream.map(observe, Option.fromNullable) }),

  /** An in-memory store: `changes` replays the current value to every new subscriber. */
  fromSubscriptionRef: <A>(ref: SubscriptionRef.SubscriptionRef<Option.Option<A>>): ObservableLocalSource<A> => ({
    read: SubscriptionRef.get(ref),
    observe: ref.changes,
  }),
}

export const RemoteSource = {
  make: <A>(fetch: Effect.Effect<Option.Option<A>, unknown>): RemoteSource<A> => ({ fetch }),

  fromNullable: <A>(fetch: Effect.Effect<Nullable<A>, unknown>): RemoteSource<A> => ({
    fetch: Effect.map(fetch, Option.fromNullable),
  }),

  /**
   * Adapts a promise-returning client call. The `AbortSignal` is aborted when the loader is
   * cancelled, so HTTP clients can drop the in-flight request.
   */
  fromPromise: <A>(fetch: (signal: AbortSignal) => PromiseLike<Nullable<A>>): RemoteSource<A> => ({
    fetch: Effect.tryPromise({
      try: (signal) => Promise.resolve(fetch(signal)),
      catch: (cause) => cause,
    }).pipe(Effect.map(Option.fromNullable)),
  }),
}

export const CacheWriter = {
  make: <A>(write: (value: A) => Effect.Effect<void, unknown>): CacheWriter<A> => ({ write }),

  fromPromise: <A>(write: (value: A) => PromiseLike<unknown>): CacheWriter<A> => ({
    write: (value) =>
      Effect.tryPromise({
        try: () => Promise.resolve(write(value)),
        catch: (cause) => cause,
      }).pipe(Effect.asVoid),
  }),

  fromSubscriptionRef: <A>(ref: SubscriptionRef.SubscriptionRef<Option.Option<A>>): CacheWriter<A> => ({
    write: (value) => SubscriptionRef.set(ref, Option.some(value)),
  }),

  noop: <A>(): CacheWriter<A> => ({ write: () => Effect.void }),
}

export const Connectivity = {
  online: { isOnline: () => true } satisfies ConnectivityProbe,
  offline: { isOnline: () => false } satisfies ConnectivityProbe,
  make: (isOnline: () => boolean): ConnectivityProbe => ({ isOnline }),
}
