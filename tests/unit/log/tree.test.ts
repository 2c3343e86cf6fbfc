import { describe, expect, it } from 'vitest'
import type { JobLogInput } from '@/types'
import { buildLogTree, childrenOf, jobKey, type LogNode, makeLine } from '@/core/log/tree'
import { sampleTree } from '@tests/fixtures/log-tree'

function job(workflowName: string, jobName: string, log: string): JobLogInput {
  return {
    log,
    metadata: { workflowName, jobName, status: 'success', durationMs: 1000, htmlUrl: '' },
  }
}

/** Every node's errorCount equals the sum of its children's. */
function checkAggregates(node: LogNode): void {
  const children = childrenOf(node)
  if (node.kind === 'line') {
    expect(node.errorCount).toBe(node.isError ? 1 : 0)
    return
  }
  expect(node.errorCount).toBe(children.reduce((sum, c) => sum + c.errorCount, 0))
  expect(node.hasFailures).toBe(children.some((c) => c.hasFailures))
  children.forEach(checkAggregates)
}

describe('makeLine', () => {
  it('derives the level from isError', () => {
    expect(makeLine('boom', { isError: true }).level).toBe('error')
    expect(makeLine('fine').level).toBe('info')
  })
})

describe('sampleTree aggregates', () => {
  it('sums error counts bottom-up', () => {
    const tree = sampleTree()
    expect(tree.errorCount).toBe(4)
    checkAggregates(tree)
  })
})

describe('buildLogTree', () => {
  it('orders failing workflows first, then by name, and jobs by name', () => {
    const { tree } = buildLogTree([
      job('Alpha', 'lint', '##[group]run\nok\n'),
      job('Zeta', 'test', '##[group]run\n##[error]boom\n'),
      job('Zeta', 'build', '##[group]run\nok\n'),
    ])

    expect(tree.workflows.map((w) => w.name)).toEqual(['Zeta', 'Alpha'])
    expect(tree.workflows[0]?.jobs.map((j) => j.name)).toEqual(['build', 'test'])
    expect(tree.errorCount).toBe(1)
    checkAggregates(tree)
  })

  it('drops empty system jobs', () => {
    const { tree, metadata } = buildLogTree([
      job('CI', 'build', 'compiling\n'),
      job('CI', 'build/system', ''),
    ])
    expect(tree.workflows[0]?.jobs.map((j) => j.name)).toEqual(['build'])
    expect([...metadata.keys()]).toEqual([jobKey('CI', 'build')])
  })

  it('keeps empty jobs that are not system jobs', () => {
    const { tree } = buildLogTree([job('CI', 'skipped', '')])
    expect(tree.workflows[0]?.jobs[0]?.steps).toEqual([])
  })
})
