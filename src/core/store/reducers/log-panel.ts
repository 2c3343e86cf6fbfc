import {
  defaultExpansion,
  type ExpansionSet,
  findNextError,
  isValidPath,
  moveCursor,
  type Path,
  pathKey,
  pathsEqual,
  revealPath,
  ROOT_PATH,
  scrollToCursor,
  toggle,
  visibleIndexOf,
} from '@/core/log/navigator'
import { buildLogTree, childrenOf, type LogNode } from '@/core/log/tree'
import { recomputeLogPanel } from '@/core/view-models/log-panel'
import type { Action } from '../actions'
import { type LogPanelState, repoKey } from '../state'
import { visiblePullRequests } from './repos'
import {
  type SliceContext,
  type SliceResult,
  themeChanged,
  unchanged,
  violation,
  withEffects,
} from './context'

const NO_FURTHER_ERRORS = 'No further errors'

function recompute(panel: LogPanelState, ctx: SliceContext): LogPanelState {
  return { ...panel, viewModel: recomputeLogPanel(panel, ctx.theme) }
}

/** Places the cursor, keeping it inside the viewport. */
function withCursor(panel: LogPanelState, cursor: Path, expansion: ExpansionSet): LogPanelState {
  if (panel.tree === null) {
    return panel
  }
  const row = visibleIndexOf(panel.tree, expansion, cursor)
  return {
    ...panel,
    cursor,
    expansion,
    notice: null,
    scrollOffset: scrollToCursor(panel.scrollOffset, row, panel.viewportHeight),
  }
}

function isAncestor(ancestor: Path, path: Path): boolean {
  return ancestor.length < path.length && ancestor.every((index, i) => index === path[i])
}

function expandAll(node: LogNode, path: Path, keys: Set<string>): void {
  const children = childrenOf(node)
  if (children.length === 0) {
    return
  }
  if (path.length > 0) {
    keys.add(pathKey(path))
  }
  children.forEach((child, i) => expandAll(child, [...path, i], keys))
}

/**
 * Build log panel: loading, expansion, cursor, scrolling and the error jump.
 *
 * @category Store
 */
export function reduceLogPanel(
  panel: LogPanelState,
  action: Action,
  ctx: SliceContext,
): SliceResult<LogPanelState> {
  switch (action.type) {
    case 'logs/open':
    case 'logs/openSelected': {
      let target = action.type === 'logs/open' ? action : null
      if (target === null) {
        const repos = ctx.state.repos
        const repository = repos.repositories[repos.selectedRepository]
        const cursor = repository ? repos.data[repoKey(repository)]?.cursor : undefined
        const pr = cursor === undefined ? undefined : visiblePullRequests(repos)[cursor]
        if (repository === undefined || pr === undefined) {
          return unchanged(panel)
        }
        target = {
          type: 'logs/open',
          repository,
          pullRequest: { number: pr.number, title: pr.title, author: pr.author },
        }
      }
      const requestId = panel.requestId + 1
      const opened: LogPanelState = {
        ...panel,
        repository: target.repository,
        pullRequest: target.pullRequest,
        loadState: 'loading',
        requestId,
        error: null,
        tree: null,
        metadata: new Map(),
        expansion: new Set(),
        cursor: ROOT_PATH,
        scrollOffset: 0,
        horizontalScroll: 0,
        notice: null,
        viewModel: null,
      }
      return withEffects(opened, [
        {
          type: 'fetchBuildLogs',
          repository: target.repository,
          prNumber: target.pullRequest.number,
          requestId,
        },
      ])
    }

    case 'logs/loaded': {
      if (action.requestId !== panel.requestId || panel.loadState !== 'loading') {
        return unchanged(panel)
      }
      const { tree, metadata } = buildLogTree(action.jobs)
      const loaded: LogPanelState = {
        ...panel,
        loadState: 'loaded',
        tree,
        metadata,
        expansion: defaultExpansion(tree),
        cursor: tree.workflows.length > 0 ? [0] : ROOT_PATH,
        scrollOffset: 0,
      }
      return unchanged(recompute(loaded, ctx))
    }

    case 'logs/loadFailed':
      if (action.requestId !== panel.requestId || panel.loadState !== 'loading') {
        return unchanged(panel)
      }
      return unchanged({ ...panel, loadState: 'error', error: action.error.message })

    case 'logs/close': {
      if (panel.loadState === 'idle') {
        return unchanged(panel)
      }
      const closed: LogPanelState = {
        ...panel,
        repository: null,
        pullRequest: null,
        loadState: 'idle',
        error: null,
        tree: null,
        metadata: new Map(),
        expansion: new Set(),
        cursor: ROOT_PATH,
        scrollOffset: 0,
        horizontalScroll: 0,
        notice: null,
        viewModel: null,
      }
      return panel.loadState === 'loading'
        ? withEffects(closed, [{ type: 'cancelSubsystem', subsystem: 'logs' }])
        : unchanged(closed)
    }

    case 'ui/setTheme':
    case 'session/restore':
      return themeChanged(ctx) && panel.tree !== null
        ? unchanged(recompute(panel, ctx))
        : unchanged(panel)

    case 'ui/resize':
      return action.viewportHeight === panel.viewportHeight || action.viewportHeight < 1
        ? unchanged(panel)
        : unchanged(recompute({ ...panel, viewportHeight: action.viewportHeight }, ctx))

    default:
      return reduceNavigation(panel, action, ctx)
  }
}

function reduceNavigation(
  panel: LogPanelState,
  action: Action,
  ctx: SliceContext,
): SliceResult<LogPanelState> {
  const { tree } = panel
  if (tree === null) {
    return unchanged(panel)
  }

  switch (action.type) {
    case 'logs/moveCursor': {
      const cursor = moveCursor(tree, panel.expansion, panel.cursor, action.delta)
      const moved = withCursor(panel, cursor, panel.expansion)
      if (
        pathsEqual(cursor, panel.cursor) &&
        moved.scrollOffset === panel.scrollOffset &&
        panel.notice === null
      ) {
        return unchanged(panel)
      }
      return unchanged(recompute(moved, ctx))
    }

    case 'logs/setCursor': {
      if (!isValidPath(tree, action.path) || action.path.length === 0) {
        return violation(
          panel,
          'logPanel',
          `cursor path [${action.path.join(', ')}] is outside the tree`,
        )
      }
      const expansion = revealPath(panel.expansion, action.path)
      return unchanged(recompute(withCursor(panel, action.path, expansion), ctx))
    }

    case 'logs/toggle':
    case 'logs/toggleAt': {
      const path = action.type === 'logs/toggleAt' ? action.path : panel.cursor
      if (!isValidPath(tree, path)) {
        return violation(
          panel,
          'logPanel',
          `toggle path [${path.join(', ')}] is outside the tree`,
        )
      }
      const expansion = toggle(tree, panel.expansion, path)
      if (expansion === panel.expansion) {
        return unchanged(panel)
      }
      const hidesCursor = isAncestor(path, panel.cursor) && !expansion.has(pathKey(path))
      const cursor = hidesCursor ? path : panel.cursor
      return unchanged(recompute(withCursor(panel, cursor, expansion), ctx))
    }

    case 'logs/expandAll': {
      const keys = new Set<string>()
      expandAll(tree, ROOT_PATH, keys)
      return unchanged(recompute({ ...panel, expansion: keys }, ctx))
    }

    case 'logs/collapseAll': {
      if (panel.expansion.size === 0) {
        return unchanged(panel)
      }
      const cursor = panel.cursor.length > 1 ? panel.cursor.slice(0, 1) : panel.cursor
      return unchanged(recompute(withCursor(panel, cursor, new Set()), ctx))
    }

    case 'logs/jumpToError': {
      const target = findNextError(tree, panel.cursor, action.direction)
      if (target === null) {
        return panel.notice === NO_FURTHER_ERRORS
          ? unchanged(panel)
          : unchanged(recompute({ ...panel, notice: NO_FURTHER_ERRORS }, ctx))
      }
      const expansion = revealPath(panel.expansion, target)
      return unchanged(recompute(withCursor(panel, target, expansion), ctx))
    }

    case 'logs/scrollHorizontal': {
      const horizontalScroll = Math.max(0, panel.horizontalScroll + action.delta)
      return horizontalScroll === panel.horizontalScroll
        ? unchanged(panel)
        : unchanged(recompute({ ...panel, horizontalScroll }, ctx))
    }

    case 'logs/toggleTimestamps':
      return unchanged(recompute({ ...panel, showTimestamps: !panel.showTimestamps }, ctx))

    default:
      return unchanged(panel)
  }
}
