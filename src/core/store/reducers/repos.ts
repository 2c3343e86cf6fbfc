import type { PullRequest, Repository } from '@/types'
import { scrollToCursor } from '@/core/log/navigator'
import { filterPullRequests, nextFilter } from '@/core/pull-requests'
import { recomputePullRequests } from '@/core/view-models/pull-requests'
import type { Action } from '../actions'
import type { Effect } from '../effects'
import { type ReposState, type RepositoryData, repoKey } from '../state'
import {
  type SliceContext,
  type SliceResult,
  themeChanged,
  unchanged,
  violation,
  withEffects,
} from './context'

function emptyData(): RepositoryData {
  return {
    loadState: 'idle',
    requestId: 0,
    pullRequests: [],
    error: null,
    loadedAt: null,
    cursor: 0,
    scrollOffset: 0,
    selected: new Set(),
  }
}

function sameRepository(a: Repository, b: Repository): boolean {
  return repoKey(a) === repoKey(b)
}

function recompute(repos: ReposState, ctx: SliceContext): ReposState {
  return { ...repos, viewModel: recomputePullRequests(repos, ctx.theme) }
}

/** Marks the given repositories as loading and requests their pull requests. */
function startLoads(
  repos: ReposState,
  repositories: readonly Repository[],
): { repos: ReposState; effects: Effect[] } {
  const data = { ...repos.data }
  const effects: Effect[] = []
  let nextRequestId = repos.nextRequestId
  for (const repository of repositories) {
    const key = repoKey(repository)
    const requestId = nextRequestId++
    data[key] = { ...(data[key] ?? emptyData()), loadState: 'loading', requestId }
    effects.push({ type: 'loadPullRequests', repository, requestId })
  }
  return { repos: { ...repos, data, nextRequestId }, effects }
}

function currentData(repos: ReposState): { key: string; data: RepositoryData } | null {
  const repository = repos.repositories[repos.selectedRepository]
  if (repository === undefined) {
    return null
  }
  const key = repoKey(repository)
  return { key, data: repos.data[key] ?? emptyData() }
}

function updateCurrent(repos: ReposState, update: (data: RepositoryData) => RepositoryData): ReposState {
  const current = currentData(repos)
  if (current === null) {
    return repos
  }
  const next = update(current.data)
  return next === current.data ? repos : { ...repos, data: { ...repos.data, [current.key]: next } }
}

/** Pull requests of the selected repository after filtering. */
export function visiblePullRequests(repos: ReposState): readonly PullRequest[] {
  return filterPullRequests(currentData(repos)?.data.pullRequests ?? [], repos.filter)
}

/**
 * Pull requests a direct operation applies to: the selected ones, or the one
 * under the cursor when nothing is selected.
 */
export function operationTargets(repos: ReposState): readonly PullRequest[] {
  const current = currentData(repos)
  if (current === null) {
    return []
  }
  const visible = visiblePullRequests(repos)
  if (current.data.selected.size > 0) {
    return current.data.pullRequests.filter((pr) => current.data.selected.has(pr.number))
  }
  const atCursor = visible[current.data.cursor]
  return atCursor ? [atCursor] : []
}

function moveCursor(data: RepositoryData, length: number, delta: number, height: number): RepositoryData {
  if (length === 0) {
    return data
  }
  const cursor = Math.min(length - 1, Math.max(0, data.cursor + delta))
  const scrollOffset = scrollToCursor(data.scrollOffset, cursor, height)
  return cursor === data.cursor && scrollOffset === data.scrollOffset
    ? data
    : { ...data, cursor, scrollOffset }
}

/**
 * Repositories, their pull requests, filter, cursor and selection.
 *
 * @category Store
 */
export function reduceRepos(
  repos: ReposState,
  action: Action,
  ctx: SliceContext,
): SliceResult<ReposState> {
  switch (action.type) {
    case 'session/restore': {
      const { session } = action
      const data: Record<string, RepositoryData> = {}
      for (const repository of session.repositories) {
        const selected = session.selections[repoKey(repository)] ?? []
        data[repoKey(repository)] = { ...emptyData(), selected: new Set(selected) }
      }
      const restored: ReposState = {
        ...repos,
        repositories: session.repositories,
        selectedRepository: Math.min(
          session.selectedRepository,
          Math.max(0, session.repositories.length - 1),
        ),
        filter: session.filter,
        data,
      }
      const loads = startLoads(restored, session.repositories)
      return withEffects(recompute(loads.repos, ctx), loads.effects)
    }

    case 'repos/add': {
      if (repos.repositories.some((r) => sameRepository(r, action.repository))) {
        return unchanged(repos)
      }
      const added: ReposState = {
        ...repos,
        repositories: [...repos.repositories, action.repository],
      }
      const loads = startLoads(added, [action.repository])
      return withEffects(recompute(loads.repos, ctx), loads.effects)
    }

    case 'repos/remove': {
      const target = repos.repositories[action.index]
      if (target === undefined) {
        return violation(repos, 'repos', `no repository at index ${action.index}`)
      }
      const repositories = repos.repositories.filter((_, i) => i !== action.index)
      const data = { ...repos.data }
      delete data[repoKey(target)]
      const selectedRepository =
        repos.selectedRepository > action.index
          ? repos.selectedRepository - 1
          : Math.min(repos.selectedRepository, Math.max(0, repositories.length - 1))
      return unchanged(recompute({ ...repos, repositories, data, selectedRepository }, ctx))
    }

    case 'repos/select':
      if (repos.repositories[action.index] === undefined) {
        return violation(repos, 'repos', `no repository at index ${action.index}`)
      }
      return action.index === repos.selectedRepository
        ? unchanged(repos)
        : unchanged(recompute({ ...repos, selectedRepository: action.index }, ctx))

    case 'repos/reload': {
      const repository = repos.repositories[repos.selectedRepository]
      if (repository === undefined) {
        return unchanged(repos)
      }
      const loads = startLoads(repos, [repository])
      return withEffects(recompute(loads.repos, ctx), loads.effects)
    }

    case 'repos/reloadAll': {
      if (repos.repositories.length === 0) {
        return unchanged(repos)
      }
      const loads = startLoads(repos, repos.repositories)
      return withEffects(recompute(loads.repos, ctx), loads.effects)
    }

    case 'repos/loaded': {
      const key = repoKey(action.repository)
      const data = repos.data[key]
      if (data === undefined || data.requestId !== action.requestId) {
        return unchanged(repos)
      }
      const numbers = new Set(action.pullRequests.map((pr) => pr.number))
      // The cursor indexes the filtered rows, not the full list.
      const visible = filterPullRequests(action.pullRequests, repos.filter).length
      const cursor = Math.min(data.cursor, Math.max(0, visible - 1))
      const loaded: RepositoryData = {
        ...data,
        loadState: 'loaded',
        pullRequests: action.pullRequests,
        error: null,
        loadedAt: action.at,
        cursor,
        scrollOffset: scrollToCursor(Math.min(data.scrollOffset, cursor), cursor, repos.viewportHeight),
        selected: new Set([...data.selected].filter((n) => numbers.has(n))),
      }
      return unchanged(recompute({ ...repos, data: { ...repos.data, [key]: loaded } }, ctx))
    }

    case 'repos/loadFailed': {
      const key = repoKey(action.repository)
      const data = repos.data[key]
      if (data === undefined || data.requestId !== action.requestId) {
        return unchanged(repos)
      }
      const failed: RepositoryData = { ...data, loadState: 'error', error: action.error.message }
      return unchanged(recompute({ ...repos, data: { ...repos.data, [key]: failed } }, ctx))
    }

    case 'repos/moveCursor': {
      const length = visiblePullRequests(repos).length
      const next = updateCurrent(repos, (data) =>
        moveCursor(data, length, action.delta, repos.viewportHeight),
      )
      return next === repos ? unchanged(repos) : unchanged(recompute(next, ctx))
    }

    case 'repos/toggleSelection': {
      const current = currentData(repos)
      const pr = current ? visiblePullRequests(repos)[current.data.cursor] : undefined
      if (pr === undefined) {
        return unchanged(repos)
      }
      const next = updateCurrent(repos, (data) => {
        const selected = new Set(data.selected)
        if (selected.has(pr.number)) {
          selected.delete(pr.number)
        } else {
          selected.add(pr.number)
        }
        return { ...data, selected }
      })
      return unchanged(recompute(next, ctx))
    }

    case 'repos/selectAll': {
      const visible = visiblePullRequests(repos)
      if (visible.length === 0) {
        return unchanged(repos)
      }
      const next = updateCurrent(repos, (data) => ({
        ...data,
        selected: new Set([...data.selected, ...visible.map((pr) => pr.number)]),
      }))
      return unchanged(recompute(next, ctx))
    }

    case 'repos/clearSelection': {
      const next = updateCurrent(repos, (data) =>
        data.selected.size === 0 ? data : { ...data, selected: new Set() },
      )
      return next === repos ? unchanged(repos) : unchanged(recompute(next, ctx))
    }

    case 'repos/cycleFilter':
    case 'repos/setFilter': {
      const filter = action.type === 'repos/cycleFilter' ? nextFilter(repos.filter) : action.filter
      if (filter === repos.filter) {
        return unchanged(repos)
      }
      const next = updateCurrent({ ...repos, filter }, (data) => ({
        ...data,
        cursor: 0,
        scrollOffset: 0,
      }))
      return unchanged(recompute(next, ctx))
    }

    case 'pr/run': {
      const repository = repos.repositories[repos.selectedRepository]
      if (repository === undefined) {
        return unchanged(repos)
      }
      const effects = operationTargets(repos).map((pr): Effect => ({
        type: 'pullRequestOperation',
        operation: action.operation,
        method: ctx.config.mergeMethod,
        repository,
        prNumber: pr.number,
        author: pr.author,
        conflicted: pr.status.mergeable === 'conflicted',
      }))
      return withEffects(repos, effects)
    }

    case 'pr/operationCompleted': {
      if (action.error !== null) {
        return unchanged(repos)
      }
      const repository = repos.repositories.find((r) => sameRepository(r, action.repository))
      if (repository === undefined) {
        return unchanged(repos)
      }
      const loads = startLoads(repos, [repository])
      return withEffects(recompute(loads.repos, ctx), loads.effects)
    }

    case 'ui/setTheme':
      return themeChanged(ctx) ? unchanged(recompute(repos, ctx)) : unchanged(repos)

    case 'ui/resize':
      return action.viewportHeight === repos.viewportHeight || action.viewportHeight < 1
        ? unchanged(repos)
        : unchanged(recompute({ ...repos, viewportHeight: action.viewportHeight }, ctx))

    default:
      return unchanged(repos)
  }
}
