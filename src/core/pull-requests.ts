/**
 * Pull request helpers shared by the repository reducer and its view model.
 *
 * @module Pull Requests
 */
import type { MergeableStatus, PrFilter, PullRequest } from '@/types'

const FILTER_CYCLE: readonly PrFilter[] = ['all', 'feat', 'fix', 'chore']

/** `all → feat → fix → chore → all`. */
export function nextFilter(filter: PrFilter): PrFilter {
  const index = FILTER_CYCLE.indexOf(filter)
  return FILTER_CYCLE[(index + 1) % FILTER_CYCLE.length] ?? 'all'
}

/** Pull requests whose title contains the filter word, case-insensitively. */
export function filterPullRequests(
  pullRequests: readonly PullRequest[],
  filter: PrFilter,
): readonly PullRequest[] {
  if (filter === 'all') {
    return pullRequests
  }
  return pullRequests.filter((pr) => pr.title.toLowerCase().includes(filter))
}

export function filterLabel(filter: PrFilter): string {
  return filter === 'all' ? 'All' : filter.charAt(0).toUpperCase() + filter.slice(1)
}

const STATUS_DISPLAY: Record<MergeableStatus, { icon: string; label: string }> = {
  unknown: { icon: '?', label: 'Unknown' },
  ready: { icon: '✓', label: 'Ready' },
  needsRebase: { icon: '↻', label: 'Needs Rebase' },
  conflicted: { icon: '✗', label: 'Conflicted' },
  buildInProgress: { icon: '⋯', label: 'Building' },
  buildFailed: { icon: '✗', label: 'Build Failed' },
  blocked: { icon: '⊗', label: 'Blocked' },
}

export function statusDisplay(status: MergeableStatus): { icon: string; label: string } {
  return STATUS_DISPLAY[status]
}

/** Dependabot rebases through a comment instead of the update-branch endpoint. */
export function isDependabot(author: string): boolean {
  return author === 'dependabot[bot]' || author === 'dependabot'
}
