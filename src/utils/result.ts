import { ResultAsync } from 'neverthrow'

/**
 * Normalises a caught value into an `Error`.
 *
 * Effect runners and listeners may throw strings or plain objects; the store
 * and executor only ever log or report `Error` instances.
 */
export function toError(thrown: unknown): Error {
  if (thrown instanceof Error) return thrown
  if (typeof thrown === 'string') return new Error(thrown)
  return new Error(String(thrown))
}

/**
 * Runs blocking file I/O inside a {@link ResultAsync} so session reads and
 * writes compose with the forge calls. A throw becomes `err(Error)`.
 */
export function syncToResultAsync<T>(work: () => T): ResultAsync<T, Error> {
  return ResultAsync.fromPromise(Promise.resolve().then(work), toError)
}
