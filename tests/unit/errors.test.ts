import { describe, expect, it } from 'vitest'
import { ForgeError, InvariantViolationError } from '@/errors'

describe('ForgeError', () => {
  it('marks network and rate-limit failures as transient', () => {
    expect(new ForgeError('network', 'socket hang up').transient).toBe(true)
    expect(new ForgeError('rate-limited', 'API rate limit exceeded').transient).toBe(true)
  })

  it('treats other kinds as permanent', () => {
    for (const kind of ['not-found', 'auth-failed', 'conflict', 'invalid-response'] as const) {
      expect(new ForgeError(kind, kind).transient).toBe(false)
    }
  })

  it('keeps the kind and cause', () => {
    const cause = new Error('exit 1')
    const error = new ForgeError('conflict', 'merge conflict', cause)
    expect(error.kind).toBe('conflict')
    expect(error.cause).toBe(cause)
    expect(error.name).toBe('ForgeError')
    expect(error).toBeInstanceOf(Error)
  })
})

describe('InvariantViolationError', () => {
  it('prefixes the message with its source', () => {
    const error = new InvariantViolationError('logs', 'path [9] is outside the tree')
    expect(error.message).toBe('logs: path [9] is outside the tree')
    expect(error.source).toBe('logs')
  })
})
