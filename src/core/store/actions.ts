/**
 * Action set — every event that may change {@link AppState}.
 *
 * Actions are plain data. The ones produced by the executor carry `at`
 * (epoch milliseconds at completion) so reducers never read the clock.
 *
 * @module Store
 */
import type {
  JobLogInput,
  PrFilter,
  PullRequest,
  PullRequestStatus,
  Repository,
  Session,
  ThemeName,
} from '@/types'
import type { ForgeErrorKind } from '@/errors'
import type { Direction, Path } from '@/core/log/navigator'
import type { PullRequestOperation } from './effects'

/** Error detail carried by failure actions. */
export interface ActionError {
  message: string
  kind: ForgeErrorKind | 'unknown'
  transient: boolean
}

/** Pull request identity the log panel and merge bot display. */
export interface PullRequestRef {
  number: number
  title: string
  author: string
}

// ── Application & UI ─────────────────────────────────────────────────────────

export type UiAction =
  | { type: 'session/restore'; session: Session }
  | { type: 'app/shutdown' }
  | { type: 'ui/setTheme'; theme: ThemeName }
  | { type: 'ui/resize'; viewportHeight: number }
  | { type: 'ui/dismissStatus' }

// ── Repositories & pull requests ─────────────────────────────────────────────

export type ReposAction =
  | { type: 'repos/add'; repository: Repository }
  | { type: 'repos/remove'; index: number }
  | { type: 'repos/select'; index: number }
  | { type: 'repos/reload' }
  | { type: 'repos/reloadAll' }
  | {
      type: 'repos/loaded'
      repository: Repository
      requestId: number
      pullRequests: readonly PullRequest[]
      at: number
    }
  | {
      type: 'repos/loadFailed'
      repository: Repository
      requestId: number
      error: ActionError
      at: number
    }
  | { type: 'repos/moveCursor'; delta: number }
  | { type: 'repos/toggleSelection' }
  | { type: 'repos/selectAll' }
  | { type: 'repos/clearSelection' }
  | { type: 'repos/cycleFilter' }
  | { type: 'repos/setFilter'; filter: PrFilter }
  | { type: 'pr/run'; operation: PullRequestOperation }
  | {
      type: 'pr/operationCompleted'
      operation: PullRequestOperation
      repository: Repository
      prNumber: number
      error: ActionError | null
      at: number
    }

// ── Log panel ────────────────────────────────────────────────────────────────

export type LogPanelAction =
  | { type: 'logs/open'; repository: Repository; pullRequest: PullRequestRef }
  | { type: 'logs/openSelected' }
  | {
      type: 'logs/loaded'
      requestId: number
      jobs: readonly JobLogInput[]
      at: number
    }
  | { type: 'logs/loadFailed'; requestId: number; error: ActionError; at: number }
  | { type: 'logs/close' }
  | { type: 'logs/moveCursor'; delta: number }
  | { type: 'logs/setCursor'; path: Path }
  | { type: 'logs/toggle' }
  | { type: 'logs/toggleAt'; path: Path }
  | { type: 'logs/expandAll' }
  | { type: 'logs/collapseAll' }
  | { type: 'logs/jumpToError'; direction: Direction }
  | { type: 'logs/scrollHorizontal'; delta: number }
  | { type: 'logs/toggleTimestamps' }

// ── Merge bot ────────────────────────────────────────────────────────────────

export type MergeBotAction =
  | { type: 'mergeBot/start' }
  | { type: 'mergeBot/stop' }
  | {
      type: 'mergeBot/add'
      items: readonly { repository: Repository; pullRequest: PullRequestRef }[]
    }
  | { type: 'mergeBot/addSelected' }
  | { type: 'mergeBot/remove'; entryId: string }
  | { type: 'mergeBot/dismiss'; entryId: string }
  | { type: 'mergeBot/tick'; runId: number; at: number }
  | {
      type: 'mergeBot/statusChecked'
      runId: number
      entryId: string
      status: PullRequestStatus
      at: number
    }
  | {
      type: 'mergeBot/statusCheckFailed'
      runId: number
      entryId: string
      error: ActionError
      at: number
    }
  | { type: 'mergeBot/rebased'; runId: number; entryId: string; at: number }
  | {
      type: 'mergeBot/rebaseFailed'
      runId: number
      entryId: string
      error: ActionError
      at: number
    }
  | { type: 'mergeBot/merged'; runId: number; entryId: string; at: number }
  | {
      type: 'mergeBot/mergeFailed'
      runId: number
      entryId: string
      error: ActionError
      at: number
    }
  | { type: 'mergeBot/rerunStarted'; runId: number; entryId: string; at: number }
  | {
      type: 'mergeBot/rerunFailed'
      runId: number
      entryId: string
      error: ActionError
      at: number
    }
  | { type: 'mergeBot/pollDue'; runId: number; entryId: string; at: number }
  | { type: 'mergeBot/retryDue'; runId: number; entryId: string; at: number }

/** @category Store */
export type Action = UiAction | ReposAction | LogPanelAction | MergeBotAction

/** @category Store */
export type ActionType = Action['type']
