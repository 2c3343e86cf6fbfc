/**
 * Log navigator — pure operations over a {@link LogTree}, an expansion set and
 * a cursor path.
 *
 * A {@link Path} is the sequence of child indices from the root: `[]` is the
 * root, `[w]` a workflow, `[w, j]` a job, `[w, j, s]` a step and
 * `[w, j, s, l]` a log line. The root is always expanded; every other node
 * shows its children only while its {@link pathKey} is in the expansion set.
 *
 * @module Log Navigator
 */
import { childrenOf, type LogNode, type LogTree } from './tree'

/** @category Log Navigator */
export type Path = readonly number[]

/** @category Log Navigator */
export type ExpansionSet = ReadonlySet<string>

/** @category Log Navigator */
export type Direction = 'forward' | 'backward'

export const ROOT_PATH: Path = []

export function pathKey(path: Path): string {
  return path.join(':')
}

export function pathsEqual(a: Path, b: Path): boolean {
  return a.length === b.length && a.every((index, i) => index === b[i])
}

/** Returns the node addressed by `path`, or `null` when any index is out of range. */
export function nodeAt(tree: LogTree, path: Path): LogNode | null {
  let node: LogNode = tree
  for (const index of path) {
    const child: LogNode | undefined = childrenOf(node)[index]
    if (child === undefined) {
      return null
    }
    node = child
  }
  return node
}

export function isValidPath(tree: LogTree, path: Path): boolean {
  return nodeAt(tree, path) !== null
}

// ── Visibility ───────────────────────────────────────────────────────────────

function* walkVisible(
  node: LogNode,
  path: Path,
  expansion: ExpansionSet,
): Generator<Path> {
  const children = childrenOf(node)
  for (let i = 0; i < children.length; i++) {
    const child = children[i]
    if (child === undefined) {
      continue
    }
    const childPath = [...path, i]
    yield childPath
    if (expansion.has(pathKey(childPath))) {
      yield* walkVisible(child, childPath, expansion)
    }
  }
}

/**
 * Visible rows in depth-first pre-order.
 *
 * The returned iterable is lazy and restartable: every iteration walks the
 * tree again from the root.
 *
 * @category Log Navigator
 */
export function flattenVisible(tree: LogTree, expansion: ExpansionSet): Iterable<Path> {
  return {
    [Symbol.iterator]: () => walkVisible(tree, ROOT_PATH, expansion),
  }
}

/**
 * Flips the expansion of the node at `path`.
 *
 * Returns the same set when the path is invalid or the node has no children.
 *
 * @category Log Navigator
 */
export function toggle(tree: LogTree, expansion: ExpansionSet, path: Path): ExpansionSet {
  const node = nodeAt(tree, path)
  if (node === null || path.length === 0 || childrenOf(node).length === 0) {
    return expansion
  }
  const key = pathKey(path)
  const next = new Set(expansion)
  if (next.has(key)) {
    next.delete(key)
  } else {
    next.add(key)
  }
  return next
}

/**
 * Expands every ancestor of `path` so that the node becomes visible.
 * Returns the same set when nothing had to change.
 */
export function revealPath(expansion: ExpansionSet, path: Path): ExpansionSet {
  const missing: string[] = []
  for (let depth = 1; depth < path.length; depth++) {
    const key = pathKey(path.slice(0, depth))
    if (!expansion.has(key)) {
      missing.push(key)
    }
  }
  if (missing.length === 0) {
    return expansion
  }
  return new Set([...expansion, ...missing])
}

/**
 * Expansion a freshly loaded tree opens with: every workflow, plus every job
 * and step that contains an error.
 */
export function defaultExpansion(tree: LogTree): ExpansionSet {
  const keys = new Set<string>()
  tree.workflows.forEach((workflow, w) => {
    keys.add(pathKey([w]))
    workflow.jobs.forEach((job, j) => {
      if (!job.hasFailures) {
        return
      }
      keys.add(pathKey([w, j]))
      job.steps.forEach((step, s) => {
        if (step.hasFailures) {
          keys.add(pathKey([w, j, s]))
        }
      })
    })
  })
  return keys
}

// ── Cursor ───────────────────────────────────────────────────────────────────

/**
 * Moves the cursor `delta` visible rows up (negative) or down (positive),
 * clamped to the first and last row. A cursor that is not on a visible row
 * (the root, or a node inside a collapsed parent) moves to the first row.
 *
 * @returns The new cursor, or `ROOT_PATH` when nothing is visible.
 */
export function moveCursor(
  tree: LogTree,
  expansion: ExpansionSet,
  cursor: Path,
  delta: number,
): Path {
  const rows = [...flattenVisible(tree, expansion)]
  if (rows.length === 0) {
    return ROOT_PATH
  }
  const current = rows.findIndex((row) => pathsEqual(row, cursor))
  const target =
    current === -1 ? 0 : Math.min(rows.length - 1, Math.max(0, current + delta))
  return rows[target] ?? ROOT_PATH
}

/** Index of `path` among the visible rows, or -1. */
export function visibleIndexOf(tree: LogTree, expansion: ExpansionSet, path: Path): number {
  let index = 0
  for (const row of flattenVisible(tree, expansion)) {
    if (pathsEqual(row, path)) {
      return index
    }
    index++
  }
  return -1
}

/** Smallest change to `scrollOffset` that keeps `cursorRow` inside the viewport. */
export function scrollToCursor(
  scrollOffset: number,
  cursorRow: number,
  viewportHeight: number,
): number {
  if (cursorRow < 0) {
    return scrollOffset
  }
  if (cursorRow < scrollOffset) {
    return cursorRow
  }
  if (cursorRow >= scrollOffset + viewportHeight) {
    return cursorRow - viewportHeight + 1
  }
  return scrollOffset
}

// ── Smart error jump ─────────────────────────────────────────────────────────

function firstErrorIn(node: LogNode, path: Path): Path | null {
  if (node.kind === 'line') {
    return node.isError ? path : null
  }
  const children = childrenOf(node)
  for (let i = 0; i < children.length; i++) {
    const child = children[i]
    if (child?.hasFailures) {
      const found = firstErrorIn(child, [...path, i])
      if (found) {
        return found
      }
    }
  }
  return null
}

function lastErrorIn(node: LogNode, path: Path): Path | null {
  if (node.kind === 'line') {
    return node.isError ? path : null
  }
  const children = childrenOf(node)
  for (let i = children.length - 1; i >= 0; i--) {
    const child = children[i]
    if (child?.hasFailures) {
      const found = lastErrorIn(child, [...path, i])
      if (found) {
        return found
      }
    }
  }
  return null
}

/**
 * Finds the next error line from `cursor` in `direction`.
 *
 * The search widens one level at a time: lines of the current step, then
 * sibling steps in the job, sibling jobs in the workflow and finally sibling
 * workflows. Forward from a non-line node searches that node's own lines
 * first. A failing sibling is entered at its first (forward) or last
 * (backward) error line. The visiting order is exactly document order, so no
 * error line between the cursor and the result is skipped.
 *
 * @returns The error line's path, or `null` when there are no further errors
 *   (including when `cursor` is not a valid path).
 * @category Log Navigator
 */
export function findNextError(
  tree: LogTree,
  cursor: Path,
  direction: Direction,
): Path | null {
  const current = nodeAt(tree, cursor)
  if (current === null) {
    return null
  }

  if (direction === 'forward' && current.kind !== 'line') {
    const own = firstErrorIn(current, cursor)
    if (own) {
      return own
    }
  }

  for (let depth = cursor.length - 1; depth >= 0; depth--) {
    const parentPath = cursor.slice(0, depth)
    const parent = nodeAt(tree, parentPath)
    const position = cursor[depth]
    if (parent === null || position === undefined) {
      return null
    }
    const siblings = childrenOf(parent)
    const step = direction === 'forward' ? 1 : -1
    for (let i = position + step; i >= 0 && i < siblings.length; i += step) {
      const sibling = siblings[i]
      if (!sibling?.hasFailures) {
        continue
      }
      const siblingPath = [...parentPath, i]
      const found =
        direction === 'forward'
          ? firstErrorIn(sibling, siblingPath)
          : lastErrorIn(sibling, siblingPath)
      if (found) {
        return found
      }
    }
  }
  return null
}
