import { describe, it, expect } from '@effect/vitest'
import * as ResultState from '../src/ResultState.js'

describe('ResultState', () => {
  const describeState = (state: ResultState.ResultState<number, string>) =>
    ResultState.match(state, {
      onLoading: () => 'loading',
      onSuccess: (value) => `success:${value}`,
      onEmpty: () => 'empty',
      onError: (error) => `error:${error}`,
    })

  it('matches every variant', () => {
    expect(describeState(ResultState.loading)).toBe('loading')
    expect(describeState(ResultState.success(3))).toBe('success:3')
    expect(describeState(ResultState.empty)).toBe('empty')
    expect(describeState(ResultState.error('boom'))).toBe('error:boom')
  })

  it('maps only the success value', () => {
    expect(ResultState.map(ResultState.success(2), (n) => n * 10)).toEqual(ResultState.success(20))
    expect(ResultState.map(ResultState.empty, (n: number) => n * 10)).toBe(ResultState.empty)
    const failure = ResultState.error('boom')
    expect(ResultState.map(failure, (n: number) => n * 10)).toBe(failure)
  })

  it('narrows with the guards', () => {
    const state: ResultState.ResultState<number, string> = ResultState.success(1)
    expect(ResultState.isSuccess(state)).toBe(true)
    expect(ResultState.isLoading(state)).toBe(false)
    expect(ResultState.isEmpty(ResultState.empty)).toBe(true)
    expect(ResultState.isError(ResultState.error('x'))).toBe(true)
  })

  it('reads the success value or undefined', () => {
    expect(ResultState.getOrUndefined(ResultState.success('v'))).toBe('v')
    expect(ResultState.getOrUndefined(ResultState.loading)).toBeUndefined()
  })
})
