/**
 * Application state — four slices, each owned by one reducer.
 *
 * Slices are replaced, never mutated. A slice that feeds a display carries its
 * cached `viewModel`, which is `null` until there is data to show.
 *
 * @module Store
 */
import type {
  Config,
  JobMetadata,
  PrFilter,
  PullRequest,
  PullRequestStatus,
  Repository,
  ThemeName,
} from '@/types'
import type { ExpansionSet, Path } from '@/core/log/navigator'
import type { LogTree } from '@/core/log/tree'
import type { LogPanelViewModel } from '@/core/view-models/log-panel'
import type { MergeBotViewModel } from '@/core/view-models/merge-bot'
import type { PullRequestTableViewModel } from '@/core/view-models/pull-requests'
import type { PullRequestRef } from './actions'

// ── UI ───────────────────────────────────────────────────────────────────────

/** @category Store */
export interface StatusMessage {
  level: 'info' | 'success' | 'warning' | 'error'
  text: string
}

/** @category Store */
export interface UiState {
  theme: ThemeName
  viewportHeight: number
  status: StatusMessage | null
}

// ── Repositories ─────────────────────────────────────────────────────────────

/** @category Store */
export type LoadState = 'idle' | 'loading' | 'loaded' | 'error'

/** Pull request data of one repository. */
export interface RepositoryData {
  loadState: LoadState
  requestId: number
  pullRequests: readonly PullRequest[]
  error: string | null
  loadedAt: number | null
  cursor: number
  scrollOffset: number
  selected: ReadonlySet<number>
}

/** @category Store */
export interface ReposState {
  repositories: readonly Repository[]
  selectedRepository: number
  /** Keyed by `repoKey(repository)`. */
  data: Readonly<Record<string, RepositoryData>>
  filter: PrFilter
  nextRequestId: number
  viewportHeight: number
  viewModel: PullRequestTableViewModel | null
}

// ── Log panel ────────────────────────────────────────────────────────────────

/** @category Store */
export interface LogPanelState {
  repository: Repository | null
  pullRequest: PullRequestRef | null
  loadState: LoadState
  requestId: number
  error: string | null
  tree: LogTree | null
  metadata: ReadonlyMap<string, JobMetadata>
  expansion: ExpansionSet
  cursor: Path
  scrollOffset: number
  horizontalScroll: number
  showTimestamps: boolean
  viewportHeight: number
  /** Result of the last error jump that found nothing. */
  notice: string | null
  viewModel: LogPanelViewModel | null
}

// ── Merge bot ────────────────────────────────────────────────────────────────

/** @category Merge Bot */
export type EntryState =
  | 'queued'
  | 'needsRebase'
  | 'rebasing'
  | 'waitingForCi'
  | 'readyToMerge'
  | 'merging'
  | 'merged'
  | 'failed'

/** Outstanding effect of an entry. At most one at a time. */
export type PendingOperation =
  | 'statusCheck'
  | 'rebase'
  | 'merge'
  | 'rerun'
  | 'poll'
  | 'retry'

/** What sent an entry to `failed`; decides where a retry resumes. */
export type FailureKind =
  | 'statusCheckFailed'
  | 'rebaseFailed'
  | 'ciFailed'
  | 'ciTimedOut'
  | 'mergeFailed'

/** @category Merge Bot */
export interface MergeQueueEntry {
  id: string
  repository: Repository
  prNumber: number
  title: string
  author: string
  state: EntryState
  attempts: number
  lastError: string | null
  failure: FailureKind | null
  pending: PendingOperation | null
  ciPolls: number
  retryAt: number | null
  permanent: boolean
  lastStatus: PullRequestStatus | null
  /** Removed by the user while a request was out; dropped when its result arrives. */
  removing: boolean
}

/** @category Merge Bot */
export interface MergedRecord {
  entryId: string
  repository: Repository
  prNumber: number
  title: string
  mergedAt: number
}

/** @category Merge Bot */
export interface MergeBotState {
  running: boolean
  runId: number
  nextEntryId: number
  entries: readonly MergeQueueEntry[]
  merged: readonly MergedRecord[]
  /** Time of the last executor action, used for countdowns. */
  clock: number
  viewModel: MergeBotViewModel | null
}

// ── Root ─────────────────────────────────────────────────────────────────────

/** @category Store */
export interface AppState {
  ui: UiState
  repos: ReposState
  logPanel: LogPanelState
  mergeBot: MergeBotState
}

export function repoKey(repository: Repository): string {
  return `${repository.org}/${repository.repo}@${repository.branch}`
}

/** State a store starts from before any session is restored. */
export function initialState(config: Config): AppState {
  return {
    ui: {
      theme: config.theme,
      viewportHeight: config.viewportHeight,
      status: null,
    },
    repos: {
      repositories: [],
      selectedRepository: 0,
      data: {},
      filter: 'all',
      nextRequestId: 1,
      viewportHeight: config.viewportHeight,
      viewModel: null,
    },
    logPanel: {
      repository: null,
      pullRequest: null,
      loadState: 'idle',
      requestId: 0,
      error: null,
      tree: null,
      metadata: new Map(),
      expansion: new Set(),
      cursor: [],
      scrollOffset: 0,
      horizontalScroll: 0,
      showTimestamps: false,
      viewportHeight: config.viewportHeight,
      notice: null,
      viewModel: null,
    },
    mergeBot: {
      running: false,
      runId: 0,
      nextEntryId: 1,
      entries: [],
      merged: [],
      clock: 0,
      viewModel: null,
    },
  }
}
