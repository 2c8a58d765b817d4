// Success-or-failure values returned by the parser and the lowering pass

export type Ok<T> = { t: "ok"; v: T }
export type Err<E> = { t: "err"; error: E }
export type Result<T, E> = Ok<T> | Err<E>

export const ok = <T>(v: T): Ok<T> => ({ t: "ok", v })
export const err = <E>(error: E): Err<E> => ({ t: "err", error })

export const isOk = <T, E>(r: Result<T, E>): r is Ok<T> => r.t === "ok"
export const isErr = <T, E>(r: Result<T, E>): r is Err<E> => r.t === "err"

export const andThen = <A, B, E>(r: Result<A, E>, f: (a: A) => Result<B, E>): Result<B, E> =>
  isOk(r) ? f(r.v) : r

export const match = <T, E, R>(r: Result<T, E>, arms: { ok: (v: T) => R; err: (e: E) => R }): R =>
  isOk(r) ? arms.ok(r.v) : arms.err(r.error)
