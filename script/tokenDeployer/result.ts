/**
 * Outcome of a step that can fail in a known way. Failures the caller is
 * expected to handle travel as `Left`, so they never need a try/catch.
 */
export type Result<E, T> = Left<E> | Right<T>

export interface Left<E> {
  readonly _type: 'Left'
  readonly error: E
}

export interface Right<T> {
  readonly _type: 'Right'
  readonly data: T
}

export const left = <E, T = never>(error: E): Result<E, T> => ({
  _type: 'Left',
  error,
})

export const right = <T, E = never>(data: T): Result<E, T> => ({
  _type: 'Right',
  data,
})

export const isLeft = <E, T>(result: Result<E, T>): result is Left<E> =>
  result._type === 'Left'

export const isRight = <E, T>(result: Result<E, T>): result is Right<T> =>
  result._type === 'Right'
