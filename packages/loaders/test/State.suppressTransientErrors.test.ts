import { describe } from 'vitest'
import { it, expect } from '@effect/vitest'
import { Chunk, Effect, Stream } from 'effect'
import * as ResultState from '../src/ResultState.js'
import { suppressTransientErrors } from '../src/State.js'

type S = ResultState.ResultState<string, string>

const run = (...states: ReadonlyArray<S>) =>
  Stream.runCollect(suppressTransientErrors(Stream.fromIterable(states))).pipe(Effect.map(Chunk.toReadonlyArray))

describe('State.suppressTransientErrors', () => {
  it.effect('drops an Error that is followed by Success', () =>
    Effect.gen(function* () {
      const out = yield* run(ResultState.loading, ResultState.error('offline'), ResultState.success('cached'))
      expect(out).toEqual([ResultState.loading, ResultState.success('cached')])
    }),
  )

  it.effect('drops an Error that is followed by Empty', () =>
    Effect.gen(function* () {
      const out = yield* run(ResultState.loading, ResultState.error('offline'), ResultState.empty)
      expect(out).toEqual([ResultState.loading, ResultState.empty])
    }),
  )

  it.effect('emits the pending Error when the stream completes', () =>
    Effect.gen(function* () {
      const out = yield* run(ResultState.loading, ResultState.error('offline'))
      expect(out).toEqual([ResultState.loading, ResultState.error('offline')])
    }),
  )

  it.effect('keeps only the latest pending Error', () =>
    Effect.gen(function* () {
      const out = yield* run(ResultState.loading, ResultState.error('first'), ResultState.error('second'))
      expect(out).toEqual([ResultState.loading, ResultState.error('second')])
    }),
  )

  it.effect('clears the pending Error on Loading', () =>
    Effect.gen(function* () {
      const out = yield* run(
        ResultState.loading,
        ResultState.error('offline'),
        ResultState.loading,
        ResultState.success('fresh'),
      )
      expect(out).toEqual([ResultState.loading, ResultState.loading, ResultState.success('fresh')])
    }),
  )

  it.effect('passes non-error states through unchanged', () =>
    Effect.gen(function* () {
      const out = yield* run(ResultState.loading, ResultState.success('a'), ResultState.empty, ResultState.success('b'))
      expect(out).toEqual([ResultState.loading, ResultState.success('a'), ResultState.empty, ResultState.success('b')])
    }),
  )

  it.effect('discards the pending Error when the stream fails', () =>
    Effect.gen(function* () {
      const emitted: Array<S> = []
      const upstream = Stream.concat(
        Stream.make<[S, S]>(ResultState.loading, ResultState.error('offline')),
        Stream.fail('broken'),
      )

      const failure = yield* suppressTransientErrors(upstream).pipe(
        Stream.runForEach((state) =>
          Effect.sync(() => {
            emitted.push(state)
          }),
        ),
        Effect.flip,
      )

      expect(failure).toBe('broken')
      expect(emitted).toEqual([ResultState.loading])
    }),
  )
})
