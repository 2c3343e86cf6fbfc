/**
 * Effect descriptors — asynchronous work requested by reducers.
 *
 * An effect carries everything the executor needs to perform it and to build
 * the follow-up action, including the merge-bot run id and entry id. Reducers
 * only ever return these values; `executor.ts` is the only place they are run.
 *
 * @module Store
 */
import type { MergeMethod, Repository, Session } from '@/types'

/** Background subsystems whose outstanding work can be cancelled as a unit. */
export type Subsystem = 'repos' | 'logs' | 'mergeBot'

/** Timers the merge bot schedules. Each fires a single follow-up action. */
export type MergeBotTimer =
  | { kind: 'tick'; runId: number }
  | { kind: 'ciPoll'; runId: number; entryId: string }
  | { kind: 'retry'; runId: number; entryId: string }

/** Operations a user can run directly on selected pull requests. */
export type PullRequestOperation = 'merge' | 'rebase' | 'rerunFailedJobs'

/** Pull request fields a rebase needs to pick its strategy. */
export interface RebaseTarget {
  repository: Repository
  prNumber: number
  author: string
  conflicted: boolean
}

/** @category Store */
export type Effect =
  | { type: 'loadPullRequests'; repository: Repository; requestId: number }
  | {
      type: 'fetchBuildLogs'
      repository: Repository
      prNumber: number
      requestId: number
    }
  | {
      type: 'mergeBot/fetchStatus'
      runId: number
      entryId: string
      repository: Repository
      prNumber: number
    }
  | ({ type: 'mergeBot/rebase'; runId: number; entryId: string } & RebaseTarget)
  | {
      type: 'mergeBot/merge'
      runId: number
      entryId: string
      repository: Repository
      prNumber: number
      method: MergeMethod
    }
  | {
      type: 'mergeBot/rerunFailedJobs'
      runId: number
      entryId: string
      repository: Repository
      prNumber: number
    }
  | { type: 'scheduleTimer'; delayMs: number; timer: MergeBotTimer }
  | { type: 'cancelSubsystem'; subsystem: Subsystem }
  | ({
      type: 'pullRequestOperation'
      operation: PullRequestOperation
      method: MergeMethod
    } & RebaseTarget)
  | { type: 'saveSession'; session: Session }
  | { type: 'reportInvariantViolation'; source: string; message: string }

/** @category Store */
export type EffectType = Effect['type']

/** Subsystem an effect belongs to, used for cancellation. */
export function subsystemOf(effect: Effect): Subsystem | null {
  switch (effect.type) {
    case 'loadPullRequests':
    case 'pullRequestOperation':
      return 'repos'
    case 'fetchBuildLogs':
      return 'logs'
    case 'mergeBot/fetchStatus':
    case 'mergeBot/rebase':
    case 'mergeBot/merge':
    case 'mergeBot/rerunFailedJobs':
    case 'scheduleTimer':
      return 'mergeBot'
    case 'cancelSubsystem':
    case 'saveSession':
    case 'reportInvariantViolation':
      return null
    default: {
      const exhaustive: never = effect
      return exhaustive
    }
  }
}
