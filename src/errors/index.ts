/**
 * Domain error classes — typed errors for prdash's core operations.
 *
 * prdash uses neverthrow's `Result`/`ResultAsync` for error handling throughout
 * the codebase, so these errors appear in `err()` values rather than being
 * thrown. Inside the dispatch loop they are reduced to messages carried by
 * failure actions; the CLI boundary (`src/index.ts`) is the only place that
 * catches and displays them.
 *
 * @module Configuration
 */

/**
 * Classification of a failed forge (GitHub) call.
 *
 * @category Forge
 */
export type ForgeErrorKind =
  | 'not-found'
  | 'rate-limited'
  | 'auth-failed'
  | 'conflict'
  | 'network'
  | 'invalid-response'

const TRANSIENT_KINDS: ReadonlySet<ForgeErrorKind> = new Set([
  'network',
  'rate-limited',
])

/**
 * Wraps failures from forge provider operations (listing pull requests,
 * fetching logs, merging, rebasing).
 *
 * `transient` is true for kinds that are expected to succeed on a later
 * attempt; the repository slice shows those as warnings rather than errors.
 *
 * @category Forge
 */
export class ForgeError extends Error {
  readonly transient: boolean

  constructor(
    readonly kind: ForgeErrorKind,
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message)
    this.name = 'ForgeError'
    this.transient = TRANSIENT_KINDS.has(kind)
  }
}

/**
 * Raised when a reducer is asked to act on a value that cannot exist in a
 * consistent state, such as a log tree path outside the tree.
 *
 * Never thrown by reducers. The executor builds one from a
 * `reportInvariantViolation` effect and, when `strictInvariants` is set,
 * hands it to the store's fatal handler.
 *
 * @category Store
 */
export class InvariantViolationError extends Error {
  constructor(
    readonly source: string,
    message: string,
  ) {
    super(`${source}: ${message}`)
    this.name = 'InvariantViolationError'
  }
}
