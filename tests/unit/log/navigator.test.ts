import { describe, expect, it } from 'vitest'
import {
  defaultExpansion,
  findNextError,
  flattenVisible,
  isValidPath,
  moveCursor,
  nodeAt,
  type Path,
  pathKey,
  revealPath,
  scrollToCursor,
  toggle,
  visibleIndexOf,
} from '@/core/log/navigator'
import { childrenOf, type LogNode, type LogTree } from '@/core/log/tree'
import { sampleTree, treeOf } from '@tests/fixtures/log-tree'

/** Every node path except the root, in document order. */
function allPaths(node: LogNode, path: Path = []): Path[] {
  return childrenOf(node).flatMap((child, i) => [[...path, i], ...allPaths(child, [...path, i])])
}

function isErrorLine(tree: LogTree, path: Path): boolean {
  const node = nodeAt(tree, path)
  return node?.kind === 'line' && node.isError
}

describe('nodeAt', () => {
  it('resolves paths and rejects out-of-range indices', () => {
    const tree = sampleTree()
    expect(nodeAt(tree, [])).toBe(tree)
    const line = nodeAt(tree, [0, 0, 1, 1])
    expect(line?.kind === 'line' && line.text).toBe('E1')
    expect(isValidPath(tree, [0, 5])).toBe(false)
    expect(isValidPath(tree, [0, 0, 0, 0, 0])).toBe(false)
  })
})

describe('flattenVisible', () => {
  it('shows only workflows when nothing is expanded', () => {
    expect([...flattenVisible(sampleTree(), new Set())]).toEqual([[0], [1]])
  })

  it('descends into expanded nodes in pre-order', () => {
    const rows = [...flattenVisible(sampleTree(), new Set(['0']))]
    expect(rows).toEqual([[0], [0, 0], [0, 1], [1]])
  })

  it('hides children of a collapsed parent even when they are expanded', () => {
    const rows = [...flattenVisible(sampleTree(), new Set(['0:0']))]
    expect(rows).toEqual([[0], [1]])
  })

  it('is restartable', () => {
    const rows = flattenVisible(sampleTree(), new Set(['1']))
    expect([...rows]).toEqual([...rows])
  })
})

describe('defaultExpansion', () => {
  it('opens workflows and the failing jobs and steps', () => {
    const expansion = defaultExpansion(sampleTree())
    expect([...expansion].sort()).toEqual(['0', '0:0', '0:0:1', '0:1', '0:1:0', '1', '1:0', '1:0:0'])
    expect([...flattenVisible(sampleTree(), expansion)]).toHaveLength(16)
  })
})

describe('toggle', () => {
  it('flips a node with children', () => {
    const tree = sampleTree()
    const opened = toggle(tree, new Set(), [0])
    expect([...opened]).toEqual(['0'])
    expect([...toggle(tree, opened, [0])]).toEqual([])
  })

  it('returns the same set for lines, the root and invalid paths', () => {
    const tree = sampleTree()
    const expansion = new Set(['0'])
    expect(toggle(tree, expansion, [0, 0, 1, 1])).toBe(expansion)
    expect(toggle(tree, expansion, [])).toBe(expansion)
    expect(toggle(tree, expansion, [7])).toBe(expansion)
  })
})

describe('revealPath', () => {
  it('expands every ancestor', () => {
    expect([...revealPath(new Set(), [0, 1, 0, 0])]).toEqual(['0', '0:1', '0:1:0'])
  })

  it('returns the same set when the path is already visible', () => {
    const expansion = new Set(['0', '0:1', '0:1:0'])
    expect(revealPath(expansion, [0, 1, 0, 0])).toBe(expansion)
  })
})

describe('moveCursor', () => {
  const tree = sampleTree()
  const collapsed = new Set<string>()

  it('moves by visible rows and clamps', () => {
    expect(moveCursor(tree, collapsed, [0], 1)).toEqual([1])
    expect(moveCursor(tree, collapsed, [0], 5)).toEqual([1])
    expect(moveCursor(tree, collapsed, [1], -3)).toEqual([0])
  })

  it('puts a cursor that is not visible on the first row', () => {
    expect(moveCursor(tree, collapsed, [], 1)).toEqual([0])
    expect(moveCursor(tree, collapsed, [0, 1], 1)).toEqual([0])
  })

  it('returns the root for an empty tree', () => {
    expect(moveCursor(treeOf({}), collapsed, [], 1)).toEqual([])
  })
})

describe('visibleIndexOf', () => {
  it('finds the row of a visible path and -1 otherwise', () => {
    const tree = sampleTree()
    expect(visibleIndexOf(tree, new Set(['0']), [0, 1])).toBe(2)
    expect(visibleIndexOf(tree, new Set(), [0, 1])).toBe(-1)
  })
})

describe('scrollToCursor', () => {
  it('scrolls the minimum needed to keep the cursor visible', () => {
    expect(scrollToCursor(0, 25, 20)).toBe(6)
    expect(scrollToCursor(10, 5, 20)).toBe(5)
    expect(scrollToCursor(3, 5, 20)).toBe(3)
  })

  it('leaves the offset alone when the cursor is not visible', () => {
    expect(scrollToCursor(3, -1, 20)).toBe(3)
  })
})

describe('findNextError', () => {
  it('walks every error forward in document order', () => {
    const tree = sampleTree()
    const visited: Path[] = []
    let cursor: Path | null = []
    for (;;) {
      cursor = findNextError(tree, cursor, 'forward')
      if (cursor === null) {
        break
      }
      visited.push(cursor)
    }
    expect(visited).toEqual([
      [0, 0, 1, 1],
      [0, 0, 1, 3],
      [0, 1, 0, 0],
      [1, 0, 0, 1],
    ])
  })

  it('walks backward from the last error', () => {
    const tree = sampleTree()
    expect(findNextError(tree, [1, 0, 0, 1], 'backward')).toEqual([0, 1, 0, 0])
    expect(findNextError(tree, [0, 1, 0, 0], 'backward')).toEqual([0, 0, 1, 3])
    expect(findNextError(tree, [0, 0, 1, 3], 'backward')).toEqual([0, 0, 1, 1])
    expect(findNextError(tree, [0, 0, 1, 1], 'backward')).toBeNull()
  })

  it('searches a step node before its later siblings', () => {
    const tree = sampleTree()
    expect(findNextError(tree, [0, 0, 0], 'forward')).toEqual([0, 0, 1, 1])
    expect(findNextError(tree, [0, 0, 1], 'forward')).toEqual([0, 0, 1, 1])
  })

  it('enters a failing sibling job at its last error going backward', () => {
    expect(findNextError(sampleTree(), [0, 1], 'backward')).toEqual([0, 0, 1, 3])
  })

  it('returns null for an invalid cursor', () => {
    expect(findNextError(sampleTree(), [9, 9], 'forward')).toBeNull()
  })

  it('stops after the only failing step when later jobs are clean', () => {
    const tree = treeOf({
      WorkflowA: {
        JobX: { Step1: ['ok'], Step2: ['!failed'] },
        JobY: { Step3: ['ok'] },
      },
    })
    const first = findNextError(tree, [], 'forward')
    expect(first).toEqual([0, 0, 1, 0])
    expect(first && findNextError(tree, first, 'forward')).toBeNull()
  })

  it('agrees with a document-order scan from every node', () => {
    const tree = sampleTree()
    const order = allPaths(tree)
    const errors = order.filter((p) => isErrorLine(tree, p))

    order.forEach((path, index) => {
      const after = order.slice(index + 1).find((p) => isErrorLine(tree, p)) ?? null
      const before =
        order
          .slice(0, index)
          .filter((p) => isErrorLine(tree, p))
          .at(-1) ?? null
      expect(findNextError(tree, path, 'forward'), `forward from ${pathKey(path)}`).toEqual(after)
      expect(findNextError(tree, path, 'backward'), `backward from ${pathKey(path)}`).toEqual(
        before,
      )
    })
    expect(errors).toHaveLength(4)
  })
})
