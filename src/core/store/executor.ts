/**
 * Effect executor — runs effect descriptors and turns their outcome into
 * follow-up actions.
 *
 * Many effects may be in flight at once. Each one ends in at most one
 * dispatched action; a failure becomes a failure action carrying the error
 * message, never a rejection. Effects belong to a subsystem (see
 * {@link subsystemOf}); cancelling a subsystem aborts its requests, clears its
 * timers and drops any result that arrives afterwards.
 *
 * @module Store
 */
import type { ResultAsync } from 'neverthrow'
import type { ForgeProvider } from '@/core/forge/base'
import { saveSession as writeSession } from '@/core/session'
import { ForgeError, InvariantViolationError } from '@/errors'
import type { Config, Session } from '@/types'
import { captureException, recordMergeBotOperation } from '@/utils/sentry'
import { createLogger } from '@/utils/logger'
import { toError } from '@/utils/result'
import type { Action, ActionError } from './actions'
import { type Effect, type MergeBotTimer, type Subsystem, subsystemOf } from './effects'

const logger = createLogger('executor')

/** @category Store */
export interface ExecutorOptions {
  config: Config
  provider: ForgeProvider
  dispatch: (action: Action) => void
  /** Clock stamped onto executor actions. Defaults to `Date.now`. */
  now?: () => number
  /** Session writer. Defaults to `{stateDir}/session.json`. */
  saveSession?: (session: Session) => ResultAsync<void, Error>
  /** Receives invariant violations when `strictInvariants` is set. */
  onFatal?: (error: Error) => void
}

/** Reduces any failure to the detail carried by failure actions. */
export function toActionError(error: unknown): ActionError {
  if (error instanceof ForgeError) {
    return { message: error.message, kind: error.kind, transient: error.transient }
  }
  return { message: toError(error).message, kind: 'unknown', transient: false }
}

/** @category Store */
export class EffectExecutor {
  private controllers = new Map<Subsystem, AbortController>()
  private timers = new Map<Subsystem, Set<ReturnType<typeof setTimeout>>>()
  private pending = 0
  private idleWaiters: Array<() => void> = []
  private readonly now: () => number

  constructor(private options: ExecutorOptions) {
    this.now = options.now ?? Date.now
  }

  /** Number of requests and timers still outstanding. */
  get inFlight(): number {
    return this.pending
  }

  run(effects: readonly Effect[]): void {
    for (const effect of effects) {
      this.execute(effect)
    }
  }

  /** Resolves once no request or timer is outstanding. */
  whenIdle(): Promise<void> {
    if (this.pending === 0) {
      return Promise.resolve()
    }
    return new Promise((resolve) => this.idleWaiters.push(resolve))
  }

  /** Aborts the requests and clears the timers of one subsystem. */
  cancel(subsystem: Subsystem): void {
    this.controllers.get(subsystem)?.abort()
    this.controllers.delete(subsystem)
    const timers = this.timers.get(subsystem)
    if (timers) {
      for (const timer of timers) {
        clearTimeout(timer)
        this.settle()
      }
      this.timers.delete(subsystem)
    }
    logger.debug({ subsystem }, 'subsystem cancelled')
  }

  /** Cancels every subsystem. */
  dispose(): void {
    for (const subsystem of ['repos', 'logs', 'mergeBot'] as const) {
      this.cancel(subsystem)
    }
  }

  // ── Bookkeeping ────────────────────────────────────────────────────────────

  private signalFor(subsystem: Subsystem): AbortSignal {
    let controller = this.controllers.get(subsystem)
    if (!controller) {
      controller = new AbortController()
      this.controllers.set(subsystem, controller)
    }
    return controller.signal
  }

  private settle(): void {
    this.pending--
    if (this.pending === 0) {
      const waiters = this.idleWaiters
      this.idleWaiters = []
      for (const resolve of waiters) {
        resolve()
      }
    }
  }

  /** Runs `work` and dispatches its action unless the subsystem was cancelled meanwhile. */
  private track(subsystem: Subsystem, work: (signal: AbortSignal) => Promise<Action>): void {
    const signal = this.signalFor(subsystem)
    this.pending++
    void work(signal)
      .then((action) => {
        if (signal.aborted) {
          logger.debug({ action: action.type }, 'dropped result of cancelled effect')
          return
        }
        this.options.dispatch(action)
      })
      .catch((e: unknown) => {
        logger.error({ err: toError(e) }, 'effect crashed')
        captureException(e)
      })
      .finally(() => this.settle())
  }

  private schedule(delayMs: number, timer: MergeBotTimer): void {
    const subsystem: Subsystem = 'mergeBot'
    const timers = this.timers.get(subsystem) ?? new Set()
    this.timers.set(subsystem, timers)
    this.pending++
    const handle = setTimeout(() => {
      timers.delete(handle)
      this.options.dispatch(this.timerAction(timer))
      this.settle()
    }, delayMs)
    timers.add(handle)
  }

  private timerAction(timer: MergeBotTimer): Action {
    const at = this.now()
    switch (timer.kind) {
      case 'tick':
        return { type: 'mergeBot/tick', runId: timer.runId, at }
      case 'ciPoll':
        return { type: 'mergeBot/pollDue', runId: timer.runId, entryId: timer.entryId, at }
      case 'retry':
        return { type: 'mergeBot/retryDue', runId: timer.runId, entryId: timer.entryId, at }
    }
  }

  // ── Effects ────────────────────────────────────────────────────────────────

  private execute(effect: Effect): void {
    const { provider, config } = this.options
    const subsystem = subsystemOf(effect)
    logger.debug({ effect: effect.type, subsystem }, 'effect started')

    switch (effect.type) {
      case 'loadPullRequests':
        this.track('repos', (signal) =>
          provider.listPullRequests(effect.repository, { signal }).match(
            (pullRequests): Action => ({
              type: 'repos/loaded',
              repository: effect.repository,
              requestId: effect.requestId,
              pullRequests,
              at: this.now(),
            }),
            (e): Action => {
              logger.warn({ err: e, repository: effect.repository }, 'loading pull requests failed')
              return {
                type: 'repos/loadFailed',
                repository: effect.repository,
                requestId: effect.requestId,
                error: toActionError(e),
                at: this.now(),
              }
            },
          ),
        )
        return

      case 'fetchBuildLogs':
        this.track('logs', (signal) =>
          provider.fetchBuildLogs(effect.repository, effect.prNumber, { signal }).match(
            (jobs): Action => ({
              type: 'logs/loaded',
              requestId: effect.requestId,
              jobs,
              at: this.now(),
            }),
            (e): Action => ({
              type: 'logs/loadFailed',
              requestId: effect.requestId,
              error: toActionError(e),
              at: this.now(),
            }),
          ),
        )
        return

      case 'mergeBot/fetchStatus':
        this.track('mergeBot', (signal) =>
          provider.fetchPullRequestStatus(effect.repository, effect.prNumber, { signal }).match(
            (status): Action => ({
              type: 'mergeBot/statusChecked',
              runId: effect.runId,
              entryId: effect.entryId,
              status,
              at: this.now(),
            }),
            (e): Action => ({
              type: 'mergeBot/statusCheckFailed',
              runId: effect.runId,
              entryId: effect.entryId,
              error: toActionError(e),
              at: this.now(),
            }),
          ),
        )
        return

      case 'mergeBot/rebase':
        recordMergeBotOperation('rebase', effect.repository, effect.prNumber)
        this.track('mergeBot', (signal) =>
          provider.rebasePullRequest(effect, { signal }).match(
            (): Action => ({
              type: 'mergeBot/rebased',
              runId: effect.runId,
              entryId: effect.entryId,
              at: this.now(),
            }),
            (e): Action => ({
              type: 'mergeBot/rebaseFailed',
              runId: effect.runId,
              entryId: effect.entryId,
              error: toActionError(e),
              at: this.now(),
            }),
          ),
        )
        return

      case 'mergeBot/merge':
        recordMergeBotOperation('merge', effect.repository, effect.prNumber)
        this.track('mergeBot', (signal) =>
          provider
            .mergePullRequest(effect.repository, effect.prNumber, effect.method, { signal })
            .match(
              (): Action => ({
                type: 'mergeBot/merged',
                runId: effect.runId,
                entryId: effect.entryId,
                at: this.now(),
              }),
              (e): Action => ({
                type: 'mergeBot/mergeFailed',
                runId: effect.runId,
                entryId: effect.entryId,
                error: toActionError(e),
                at: this.now(),
              }),
            ),
        )
        return

      case 'mergeBot/rerunFailedJobs':
        recordMergeBotOperation('rerun', effect.repository, effect.prNumber)
        this.track('mergeBot', (signal) =>
          provider.rerunFailedJobs(effect.repository, effect.prNumber, { signal }).match(
            (): Action => ({
              type: 'mergeBot/rerunStarted',
              runId: effect.runId,
              entryId: effect.entryId,
              at: this.now(),
            }),
            (e): Action => ({
              type: 'mergeBot/rerunFailed',
              runId: effect.runId,
              entryId: effect.entryId,
              error: toActionError(e),
              at: this.now(),
            }),
          ),
        )
        return

      case 'scheduleTimer':
        this.schedule(effect.delayMs, effect.timer)
        return

      case 'cancelSubsystem':
        this.cancel(effect.subsystem)
        return

      case 'pullRequestOperation': {
        const run = (signal: AbortSignal): ResultAsync<void, ForgeError> => {
          switch (effect.operation) {
            case 'merge':
              return provider.mergePullRequest(effect.repository, effect.prNumber, effect.method, {
                signal,
              })
            case 'rebase':
              return provider.rebasePullRequest(effect, { signal })
            case 'rerunFailedJobs':
              return provider.rerunFailedJobs(effect.repository, effect.prNumber, { signal })
          }
        }
        this.track('repos', (signal) =>
          run(signal).match(
            (): Action => ({
              type: 'pr/operationCompleted',
              operation: effect.operation,
              repository: effect.repository,
              prNumber: effect.prNumber,
              error: null,
              at: this.now(),
            }),
            (e): Action => ({
              type: 'pr/operationCompleted',
              operation: effect.operation,
              repository: effect.repository,
              prNumber: effect.prNumber,
              error: toActionError(e),
              at: this.now(),
            }),
          ),
        )
        return
      }

      case 'saveSession': {
        const save =
          this.options.saveSession ?? ((session: Session) => writeSession(config.stateDir, session))
        this.pending++
        void save(effect.session)
          .match(
            () => logger.debug('session saved'),
            (e) => logger.warn({ err: e }, 'saving session failed'),
          )
          .finally(() => this.settle())
        return
      }

      case 'reportInvariantViolation': {
        const error = new InvariantViolationError(effect.source, effect.message)
        logger.warn({ source: effect.source }, error.message)
        captureException(error)
        if (config.strictInvariants) {
          this.options.onFatal?.(error)
        }
        return
      }

      default: {
        const exhaustive: never = effect
        logger.error({ effect: exhaustive }, 'unknown effect')
      }
    }
  }
}
