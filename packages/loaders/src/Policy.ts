import { Equal, Option } from 'effect'
import type { Equivalence } from 'effect'

/**
 * Decides whether the remote source is consulted even though local data exists.
 * Evaluated at most once per invocation, before any remote call; loaders always fetch when the
 * local value is missing and do not ask the policy in that case.
 */
export type FetchPolicy<A> = (local: Option.Option<A>) => boolean

/**
 * Decides whether a freshly fetched remote value is surfaced to the consumer. The value is written
 * to the cache either way.
 */
export type EmitPolicy<A> = (local: Option.Option<A>, remote: A) => boolean

/** Consulted by network-first loaders before falling back to a cached value. */
export type LocalEmitPolicy<A> = (local: A) => boolean

export const always: FetchPolicy<unknown> = () => true

export const never: FetchPolicy<unknown> = () => false

export const whenMissing: FetchPolicy<unknown> = Option.isNone

/** Refresh only when the cached value is considered stale, e.g. older than a TTL. */
export const whenStale =
  <A>(isStale: (local: A) => boolean): FetchPolicy<A> =>
  (local) =>
    Option.match(local, { onNone: () => true, onSome: isStale })

export const emitAlways: EmitPolicy<unknown> = () => true

/** Skip emitting the remote value when it equals what the consumer has already seen. */
export const emitWhenChanged =
  <A>(equivalence: Equivalence.Equivalence<A> = Equal.equivalence<A>()): EmitPolicy<A> =>
  (local, remote) =>
    Option.match(local, { onNone: () => true, onSome: (value) => !equivalence(value, remote) })

export const emitLocalAlways: LocalEmitPolicy<unknown> = () => true
