import type { Session } from '@/types'
import type { Action } from '../actions'
import { type AppState, repoKey, type UiState } from '../state'
import { type SliceContext, type SliceResult, unchanged, withEffects } from './context'
import { operationTargets } from './repos'

const OPERATION_VERB = {
  merge: 'Merging',
  rebase: 'Rebasing',
  rerunFailedJobs: 'Re-running failed jobs of',
} as const

const OPERATION_DONE = {
  merge: 'Merged',
  rebase: 'Rebased',
  rerunFailedJobs: 'Re-ran failed jobs of',
} as const

/** Session snapshot written on shutdown. */
export function sessionOf(state: AppState): Session {
  const selections: Record<string, number[]> = {}
  for (const repository of state.repos.repositories) {
    const key = repoKey(repository)
    const selected = state.repos.data[key]?.selected
    if (selected && selected.size > 0) {
      selections[key] = [...selected]
    }
  }
  return {
    repositories: [...state.repos.repositories],
    selectedRepository: state.repos.selectedRepository,
    filter: state.repos.filter,
    theme: state.ui.theme,
    selections,
  }
}

/**
 * UI chrome: theme, viewport height and the status bar.
 *
 * @category Store
 */
export function reduceUi(
  ui: UiState,
  action: Action,
  ctx: SliceContext,
): SliceResult<UiState> {
  switch (action.type) {
    case 'session/restore':
      return action.session.theme && action.session.theme !== ui.theme
        ? unchanged({ ...ui, theme: action.session.theme })
        : unchanged(ui)

    case 'app/shutdown':
      return withEffects(ui, [{ type: 'saveSession', session: sessionOf(ctx.state) }])

    case 'ui/setTheme':
      return action.theme === ui.theme ? unchanged(ui) : unchanged({ ...ui, theme: action.theme })

    case 'ui/resize':
      return action.viewportHeight === ui.viewportHeight || action.viewportHeight < 1
        ? unchanged(ui)
        : unchanged({ ...ui, viewportHeight: action.viewportHeight })

    case 'ui/dismissStatus':
      return ui.status === null ? unchanged(ui) : unchanged({ ...ui, status: null })

    case 'repos/loadFailed': {
      const current = ctx.state.repos.data[repoKey(action.repository)]
      if (current === undefined || current.requestId !== action.requestId) {
        return unchanged(ui)
      }
      const name = `${action.repository.org}/${action.repository.repo}`
      return unchanged({
        ...ui,
        status: {
          level: action.error.transient ? 'warning' : 'error',
          text: `Failed to load ${name}: ${action.error.message}`,
        },
      })
    }

    case 'pr/run': {
      const targets = operationTargets(ctx.state.repos)
      if (targets.length === 0) {
        return unchanged({ ...ui, status: { level: 'warning', text: 'No pull request selected' } })
      }
      const numbers = targets.map((pr) => `#${pr.number}`).join(', ')
      return unchanged({
        ...ui,
        status: { level: 'info', text: `${OPERATION_VERB[action.operation]} ${numbers}` },
      })
    }

    case 'pr/operationCompleted':
      return unchanged({
        ...ui,
        status: action.error
          ? {
              level: 'error',
              text: `#${action.prNumber}: ${action.error.message}`,
            }
          : {
              level: 'success',
              text: `${OPERATION_DONE[action.operation]} #${action.prNumber}`,
            },
      })

    case 'mergeBot/start':
      return ctx.state.mergeBot.running
        ? unchanged(ui)
        : unchanged({ ...ui, status: { level: 'info', text: 'Merge bot started' } })

    case 'mergeBot/stop':
      return ctx.state.mergeBot.running
        ? unchanged({ ...ui, status: { level: 'info', text: 'Merge bot stopped' } })
        : unchanged(ui)

    default:
      return unchanged(ui)
  }
}
