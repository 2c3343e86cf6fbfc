/**
 * Bounds how many `gh` subprocesses run at once.
 *
 * The GitHub provider fetches one status per pull request and one log per CI
 * job. Requests beyond the bound wait in FIFO order; a waiting request whose
 * signal aborts leaves the queue without ever spawning.
 *
 * @module Utilities
 */

/**
 * Runs `task` once a slot is free. Rejects without running it when `signal`
 * aborts first.
 */
export type Limiter = <T>(task: () => Promise<T>, signal?: AbortSignal) => Promise<T>

/** @category Utilities */
export function createLimiter(maxRunning: number): Limiter {
  let running = 0
  const waiting: Array<() => void> = []

  const release = () => {
    running--
    waiting.shift()?.()
  }

  const acquire = (signal?: AbortSignal): Promise<void> => {
    if (signal?.aborted) {
      return Promise.reject(new Error('request cancelled before it started'))
    }
    if (running < maxRunning) {
      running++
      return Promise.resolve()
    }
    return new Promise<void>((resolve, reject) => {
      const grant = () => {
        signal?.removeEventListener('abort', onAbort)
        running++
        resolve()
      }
      const onAbort = () => {
        const index = waiting.indexOf(grant)
        if (index !== -1) waiting.splice(index, 1)
        reject(new Error('request cancelled before it started'))
      }
      signal?.addEventListener('abort', onAbort, { once: true })
      waiting.push(grant)
    })
  }

  return async <T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> => {
    await acquire(signal)
    try {
      return await task()
    } finally {
      release()
    }
  }
}
