/**
 * Log panel view model — the visible window of the build log tree.
 *
 * @module View Models
 */
import type { JobMetadata, JobStatus, ThemeName } from '@/types'
import { flattenVisible, nodeAt, type Path, pathKey, pathsEqual } from '@/core/log/navigator'
import { jobKey, type LogNode, type LogTree } from '@/core/log/tree'
import type { LogPanelState } from '@/core/store/state'
import { resolveTheme, type ThemeColors } from '@/utils/themes'
import { formatDuration, formatErrorCount, windowOf } from './format'

/** @category View Models */
export type RowStyle = 'normal' | 'error' | 'success'

/** @category View Models */
export interface TreeRowViewModel {
  text: string
  indentLevel: number
  isCursor: boolean
  style: RowStyle
  color: string
  path: Path
  nodeType: Exclude<LogNode['kind'], 'root'>
}

/** @category View Models */
export interface LogPanelViewModel {
  header: {
    numberText: string
    title: string
    authorText: string
    numberColor: string
    titleColor: string
    authorColor: string
  }
  rows: readonly TreeRowViewModel[]
  totalRows: number
  /** Index of the cursor among all visible rows, -1 when it is not visible. */
  cursorRow: number
  scrollOffset: number
  viewportHeight: number
  notice: string | null
  selectionColor: string
}

const JOB_STATUS_ICON: Record<JobStatus, string> = {
  success: '✓',
  failure: '✗',
  cancelled: '⊘',
  skipped: '⊝',
  inProgress: '⋯',
  unknown: '?',
}

function expander(expanded: boolean, hasChildren: boolean): string {
  if (!hasChildren) {
    return ' '
  }
  return expanded ? '▼' : '▶'
}

function styleColor(style: RowStyle, colors: ThemeColors): string {
  switch (style) {
    case 'error':
      return colors.statusError
    case 'success':
      return colors.statusSuccess
    case 'normal':
      return colors.textPrimary
  }
}

function jobStatus(metadata: JobMetadata | undefined, errorCount: number): JobStatus {
  if (metadata) {
    return metadata.status
  }
  return errorCount > 0 ? 'failure' : 'success'
}

function buildRow(
  panel: LogPanelState,
  tree: LogTree,
  path: Path,
  colors: ThemeColors,
): TreeRowViewModel | null {
  const node = nodeAt(tree, path)
  const workflow = tree.workflows[path[0] ?? -1]
  if (node === null || workflow === undefined) {
    return null
  }
  const indentLevel = path.length - 1
  const indent = '  '.repeat(indentLevel)
  const expanded = panel.expansion.has(pathKey(path))

  let text: string
  let style: RowStyle
  switch (node.kind) {
    case 'workflow':
      text = `${indent}${expander(expanded, node.jobs.length > 0)} ${node.hasFailures ? '✗' : '✓'} ${node.name}${formatErrorCount(node.errorCount)}`
      style = node.hasFailures ? 'error' : 'success'
      break
    case 'job': {
      const metadata = panel.metadata.get(jobKey(workflow.name, node.name))
      const status = jobStatus(metadata, node.errorCount)
      const duration =
        metadata && metadata.durationMs !== null
          ? `, ${formatDuration(metadata.durationMs)}`
          : ''
      text = `${indent}├─ ${expander(expanded, node.steps.length > 0)} ${JOB_STATUS_ICON[status]} ${node.name}${formatErrorCount(node.errorCount)}${duration}`
      style = status === 'failure' ? 'error' : status === 'success' ? 'success' : 'normal'
      break
    }
    case 'step':
      text = `${indent}│  ├─ ${expander(expanded, node.lines.length > 0)} ${node.hasFailures ? '✗' : '✓'} ${node.name}${formatErrorCount(node.errorCount)}`
      style = node.hasFailures ? 'error' : 'normal'
      break
    case 'line': {
      const timestamp = panel.showTimestamps && node.timestamp ? `[${node.timestamp}] ` : ''
      text = `${indent}│     ${timestamp}${node.text.slice(panel.horizontalScroll)}`
      style = node.isError ? 'error' : 'normal'
      break
    }
    default:
      return null
  }

  return {
    text,
    indentLevel,
    isCursor: pathsEqual(path, panel.cursor),
    style,
    color: styleColor(style, colors),
    path,
    nodeType: node.kind,
  }
}

/**
 * Rebuilds the log panel view model. Only rows inside
 * `[scrollOffset, scrollOffset + viewportHeight)` are materialised.
 *
 * @returns `null` while no tree is loaded.
 * @category View Models
 */
export function recomputeLogPanel(
  panel: LogPanelState,
  theme: ThemeName,
): LogPanelViewModel | null {
  const { tree, pullRequest } = panel
  if (tree === null || pullRequest === null) {
    return null
  }
  const colors = resolveTheme(theme)
  const { start, end } = windowOf(panel.scrollOffset, panel.viewportHeight)

  const rows: TreeRowViewModel[] = []
  let totalRows = 0
  let cursorRow = -1
  for (const path of flattenVisible(tree, panel.expansion)) {
    if (pathsEqual(path, panel.cursor)) {
      cursorRow = totalRows
    }
    if (totalRows >= start && totalRows < end) {
      const row = buildRow(panel, tree, path, colors)
      if (row) {
        rows.push(row)
      }
    }
    totalRows++
  }

  return {
    header: {
      numberText: `#${pullRequest.number}`,
      title: pullRequest.title,
      authorText: `by ${pullRequest.author}`,
      numberColor: colors.statusInfo,
      titleColor: colors.textPrimary,
      authorColor: colors.textMuted,
    },
    rows,
    totalRows,
    cursorRow,
    scrollOffset: panel.scrollOffset,
    viewportHeight: panel.viewportHeight,
    notice: panel.notice,
    selectionColor: colors.selection,
  }
}
