/**
 * Pull request table view model — repository tabs plus the visible window of
 * the current repository's (filtered) pull requests.
 *
 * @module View Models
 */
import type { PullRequestStatus, ThemeName } from '@/types'
import {
  filterLabel,
  filterPullRequests,
  statusDisplay,
} from '@/core/pull-requests'
import { type LoadState, type ReposState, repoKey } from '@/core/store/state'
import { resolveTheme, type ThemeColors } from '@/utils/themes'
import { windowOf } from './format'

/** @category View Models */
export interface RepositoryTabViewModel {
  label: string
  isActive: boolean
  loadState: LoadState
}

/** @category View Models */
export interface PullRequestRowViewModel {
  number: number
  numberText: string
  title: string
  author: string
  comments: number
  statusIcon: string
  statusLabel: string
  statusColor: string
  isCursor: boolean
  isSelected: boolean
}

/** @category View Models */
export interface PullRequestTableViewModel {
  tabs: readonly RepositoryTabViewModel[]
  filterText: string
  loadState: LoadState
  error: string | null
  rows: readonly PullRequestRowViewModel[]
  totalRows: number
  cursorRow: number
  scrollOffset: number
  viewportHeight: number
  selectedCount: number
  headerColor: string
  mutedColor: string
  selectionColor: string
}

function statusColor(status: PullRequestStatus, colors: ThemeColors): string {
  switch (status.mergeable) {
    case 'ready':
      return colors.statusSuccess
    case 'conflicted':
    case 'buildFailed':
      return colors.statusError
    case 'needsRebase':
    case 'buildInProgress':
      return colors.statusWarning
    default:
      return status.ciStatus === 'failure' ? colors.statusError : colors.textMuted
  }
}

/**
 * Rebuilds the table for the selected repository.
 *
 * @returns `null` when no repository is configured.
 * @category View Models
 */
export function recomputePullRequests(
  repos: ReposState,
  theme: ThemeName,
): PullRequestTableViewModel | null {
  const current = repos.repositories[repos.selectedRepository]
  if (current === undefined) {
    return null
  }
  const colors = resolveTheme(theme)
  const data = repos.data[repoKey(current)]

  const tabs = repos.repositories.map((repository, index) => ({
    label: `${repository.org}/${repository.repo}`,
    isActive: index === repos.selectedRepository,
    loadState: repos.data[repoKey(repository)]?.loadState ?? 'idle',
  }))

  const visible = filterPullRequests(data?.pullRequests ?? [], repos.filter)
  const scrollOffset = data?.scrollOffset ?? 0
  const cursor = data?.cursor ?? 0
  const selected = data?.selected ?? new Set<number>()
  const { start, end } = windowOf(scrollOffset, repos.viewportHeight)

  const rows = visible.slice(start, end).map((pr, offset) => {
    const { icon, label } = statusDisplay(pr.status.mergeable)
    return {
      number: pr.number,
      numberText: `#${pr.number}`,
      title: pr.title,
      author: pr.author,
      comments: pr.comments,
      statusIcon: icon,
      statusLabel: label,
      statusColor: statusColor(pr.status, colors),
      isCursor: start + offset === cursor,
      isSelected: selected.has(pr.number),
    }
  })

  return {
    tabs,
    filterText: filterLabel(repos.filter),
    loadState: data?.loadState ?? 'idle',
    error: data?.error ?? null,
    rows,
    totalRows: visible.length,
    cursorRow: visible.length === 0 ? -1 : cursor,
    scrollOffset,
    viewportHeight: repos.viewportHeight,
    selectedCount: selected.size,
    headerColor: colors.statusInfo,
    mutedColor: colors.textMuted,
    selectionColor: colors.selection,
  }
}
