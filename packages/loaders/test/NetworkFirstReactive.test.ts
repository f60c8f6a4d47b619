import { describe } from 'vitest'
import { it, expect } from '@effect/vitest'
import { Chunk, Deferred, Effect, Option, Stream } from 'effect'
import * as InitialLoadError from '../src/InitialLoadError.js'
import * as NetworkFirstReactive from '../src/NetworkFirstReactive.js'
import * as ResultState from '../src/ResultState.js'
import { Connectivity } from '../src/Sources.js'
import { localOf, makeKeyValue, makeStore, remoteFailure, remoteNothing, remoteValue } from './support/fakes.js'
import { fixedRequestIds } from './support/logs.js'

const collect = <A, E>(stream: Stream.Stream<A, E>) => Stream.runCollect(stream).pipe(Effect.map(Chunk.toReadonlyArray))

describe('NetworkFirstReactive.make', () => {
  it.effect('caches the fetched value and shows it through the local source', () =>
    Effect.gen(function* () {
      const store = yield* makeStore<string>(Option.none())

      const states = yield* collect(
        NetworkFirstReactive.make({
          local: store.source,
          remote: remoteValue('fresh').source,
          cache: store.writer,
          connectivity: Connectivity.online,
        }).pipe(Stream.take(2)),
      )

      expect(states).toEqual([ResultState.loading, ResultState.success('fresh')])
      expect(store.writes).toEqual(['fresh'])
      expect(store.subscriptions.active).toBe(0)
    }),
  )

  it.effect('hides a remote error that local data supersedes', () =>
    Effect.gen(function* () {
      const store = yield* makeStore(Option.some('cached'))

      const states = yield* collect(
        NetworkFirstReactive.make({
          local: store.source,
          remote: remoteFailure<string>(new Error('timeout')).source,
          connectivity: Connectivity.online,
        }).pipe(Stream.take(2)),
      )

      expect(states).toEqual([ResultState.loading, ResultState.success('cached')])
    }),
  )

  it.effect('settles on Empty when the remote fails and the local store is empty', () =>
    Effect.gen(function* () {
      const store = yield* makeStore<string>(Option.none())

      const states = yield* collect(
        NetworkFirstReactive.make({
          local: store.source,
          remote: remoteFailure<string>(new Error('timeout')).source,
          connectivity: Connectivity.online,
        }).pipe(Stream.take(2)),
      )

      expect(states).toEqual([ResultState.loading, ResultState.empty])
      expect(store.subscriptions.active).toBe(0)
    }),
  )

  it.effect('settles on Empty when the remote fails and a plain local read finds nothing', () =>
    Effect.gen(function* () {
      const states = yield* collect(
        NetworkFirstReactive.make({
          local: localOf<string>(Option.none()),
          remote: remoteFailure<string>(new Error('timeout')).source,
          connectivity: Connectivity.online,
        }),
      )

      expect(states).toEqual([ResultState.loading, ResultState.empty])
    }),
  )

  it.effect('ends with the remote error when local observation completes without a value', () =>
    Effect.gen(function* () {
      const original = new Error('timeout')

      const states = yield* collect(
        NetworkFirstReactive.make({
          local: { read: Effect.succeed(Option.none<string>()), observe: Stream.empty },
          remote: remoteFailure<string>(original).source,
          connectivity: Connectivity.online,
        }),
      )

      expect(states.length).toBe(2)
      expect(states[0]).toEqual(ResultState.loading)
      const last = states[1]
      expect(last?._tag).toBe('Error')
      if (last?._tag !== 'Error') return
      expect(last.error).toBeInstanceOf(InitialLoadError.RemoteFailed)
      expect(last.error.cause).toBe(original)
      expect(last.error.requestId).toBe('req00020')
    }).pipe(Effect.provide(fixedRequestIds('req00020'))),
  )

  it.effect('shows Empty when the remote and the local source have nothing', () =>
    Effect.gen(function* () {
      const states = yield* collect(
        NetworkFirstReactive.make({
          local: localOf<string>(Option.none()),
          remote: remoteNothing<string>().source,
          connectivity: Connectivity.online,
        }),
      )

      expect(states).toEqual([ResultState.loading, ResultState.empty])
    }),
  )

  it.effect('only reads locally while offline', () =>
    Effect.gen(function* () {
      const remote = remoteValue('fresh')

      const states = yield* collect(
        NetworkFirstReactive.make({
          local: localOf(Option.some('cached')),
          remote: remote.source,
          connectivity: Connectivity.offline,
        }),
      )

      expect(states).toEqual([ResultState.loading, ResultState.success('cached')])
      expect(remote.calls()).toBe(0)
    }),
  )

  it.effect('restarts the load when connectivity comes back', () =>
    Effect.gen(function* () {
      const keyValue = yield* makeKeyValue(Option.some('cached'))
      const remote = remoteValue('fresh')
      const shown = yield* Deferred.make<void>()

      const states = yield* collect(
        NetworkFirstReactive.make({
          local: keyValue.source,
          remote: remote.source,
          cache: keyValue.writer,
          connectivity: Connectivity.offline,
          connectivityChanges: Stream.concat(
            Stream.make(false, false),
            Stream.fromEffect(Deferred.await(shown).pipe(Effect.as(true))),
          ),
        }).pipe(
          Stream.tap((state) => (ResultState.isSuccess(state) ? Deferred.succeed(shown, undefined) : Effect.void)),
          Stream.take(4),
        ),
      )

      expect(states).toEqual([
        ResultState.loading,
        ResultState.success('cached'),
        ResultState.loading,
        ResultState.success('fresh'),
      ])
      expect(remote.calls()).toBe(1)
      expect(keyValue.writes).toEqual(['fresh'])
    }),
  )
})
