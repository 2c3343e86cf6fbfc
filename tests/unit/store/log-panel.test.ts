import { beforeEach, describe, expect, it } from 'vitest'
import type { Action } from '@/core/store/actions'
import { reduce } from '@/core/store/reducer'
import { type AppState, initialState } from '@/core/store/state'
import type { JobLogInput } from '@/types'
import { resolveTheme } from '@/utils/themes'
import { makeConfig, makeRepository } from '@tests/fixtures/forge'

const config = makeConfig()
const repository = makeRepository()

const jobs: JobLogInput[] = [
  {
    log: '##[group]Unit\npass\n',
    metadata: { workflowName: 'CI', jobName: 'test', status: 'success', durationMs: 42_000, htmlUrl: '' },
  },
  {
    log: '##[group]Compile\nok\n##[error]E1\n',
    metadata: { workflowName: 'CI', jobName: 'build', status: 'failure', durationMs: 65_000, htmlUrl: '' },
  },
]

function apply(state: AppState, ...actions: Action[]): AppState {
  return actions.reduce((s, action) => reduce(s, action, { config }).state, state)
}

function rowTexts(state: AppState): string[] {
  return state.logPanel.viewModel?.rows.map((r) => r.text) ?? []
}

describe('log panel reducer', () => {
  let loaded: AppState

  beforeEach(() => {
    loaded = apply(
      initialState(config),
      { type: 'logs/open', repository, pullRequest: { number: 7, title: 'fix: flaky', author: 'octocat' } },
      { type: 'logs/loaded', requestId: 1, jobs, at: 100 },
    )
  })

  it('requests the build logs when opened', () => {
    const { state, effects } = reduce(
      initialState(config),
      { type: 'logs/open', repository, pullRequest: { number: 7, title: 'fix: flaky', author: 'octocat' } },
      { config },
    )
    expect(state.logPanel.loadState).toBe('loading')
    expect(effects).toEqual([{ type: 'fetchBuildLogs', repository, prNumber: 7, requestId: 1 }])
  })

  it('builds the tree and opens failing nodes', () => {
    const panel = loaded.logPanel
    expect(panel.loadState).toBe('loaded')
    expect(panel.cursor).toEqual([0])
    expect(rowTexts(loaded)).toEqual([
      '▼ ✗ CI (1 error)',
      '  ├─ ▼ ✗ build (1 error), 1m 5s',
      '    │  ├─ ▼ ✗ Compile (1 error)',
      '      │     ok',
      '      │     E1',
      '  ├─ ▶ ✓ test, 42s',
    ])
    expect(panel.viewModel?.header).toMatchObject({
      numberText: '#7',
      title: 'fix: flaky',
      authorText: 'by octocat',
    })
    expect(panel.viewModel?.cursorRow).toBe(0)
  })

  it('ignores a stale load result', () => {
    const stale = reduce(loaded, { type: 'logs/loaded', requestId: 0, jobs: [], at: 200 }, { config })
    expect(stale.state).toBe(loaded)
  })

  it('jumps to the next error and reports when there is none', () => {
    const first = apply(loaded, { type: 'logs/jumpToError', direction: 'forward' })
    expect(first.logPanel.cursor).toEqual([0, 0, 0, 1])
    expect(first.logPanel.viewModel?.cursorRow).toBe(4)

    const none = apply(first, { type: 'logs/jumpToError', direction: 'forward' })
    expect(none.logPanel.cursor).toEqual([0, 0, 0, 1])
    expect(none.logPanel.notice).toBe('No further errors')

    const moved = apply(none, { type: 'logs/moveCursor', delta: -1 })
    expect(moved.logPanel.cursor).toEqual([0, 0, 0, 0])
    expect(moved.logPanel.notice).toBeNull()
  })

  it('moves the cursor to a collapsed ancestor', () => {
    const state = apply(
      loaded,
      { type: 'logs/setCursor', path: [0, 0, 0, 0] },
      { type: 'logs/toggleAt', path: [0, 0] },
    )
    expect(state.logPanel.cursor).toEqual([0, 0])
    expect(rowTexts(state)).toEqual([
      '▼ ✗ CI (1 error)',
      '  ├─ ▶ ✗ build (1 error), 1m 5s',
      '  ├─ ▶ ✓ test, 42s',
    ])
  })

  it('reveals a cursor set inside a collapsed node', () => {
    const state = apply(loaded, { type: 'logs/setCursor', path: [0, 1, 0, 0] })
    expect(rowTexts(state)).toContain('      │     pass')
    expect(state.logPanel.viewModel?.cursorRow).toBe(7)
  })

  it('reports an invariant violation for a path outside the tree', () => {
    const { state, effects } = reduce(loaded, { type: 'logs/setCursor', path: [9] }, { config })
    expect(state).toBe(loaded)
    expect(effects).toEqual([
      {
        type: 'reportInvariantViolation',
        source: 'logPanel',
        message: 'cursor path [9] is outside the tree',
      },
    ])
  })

  it('expands and collapses everything', () => {
    const expanded = apply(loaded, { type: 'logs/expandAll' })
    expect(expanded.logPanel.viewModel?.totalRows).toBe(8)

    const collapsed = apply(expanded, { type: 'logs/collapseAll' })
    expect(rowTexts(collapsed)).toEqual(['▶ ✗ CI (1 error)'])
  })

  it('scrolls log lines horizontally', () => {
    const state = apply(loaded, { type: 'logs/scrollHorizontal', delta: 1 })
    expect(rowTexts(state)[3]).toBe('      │     k')
    const back = apply(state, { type: 'logs/scrollHorizontal', delta: -5 })
    expect(back.logPanel.horizontalScroll).toBe(0)
  })

  it('materialises only the rows inside the viewport', () => {
    const state = apply(loaded, { type: 'ui/resize', viewportHeight: 2 })
    expect(state.logPanel.viewModel?.rows).toHaveLength(2)
    expect(state.logPanel.viewModel?.totalRows).toBe(6)
  })

  it('recolours rows when the theme changes', () => {
    const state = apply(loaded, { type: 'ui/setTheme', theme: 'gotham' })
    expect(state.logPanel.viewModel?.rows[0]?.color).toBe(resolveTheme('gotham').statusError)
  })

  it('cancels an outstanding fetch on close', () => {
    const loading = apply(initialState(config), {
      type: 'logs/open',
      repository,
      pullRequest: { number: 7, title: 'fix: flaky', author: 'octocat' },
    })
    const { state, effects } = reduce(loading, { type: 'logs/close' }, { config })
    expect(state.logPanel.loadState).toBe('idle')
    expect(effects).toEqual([{ type: 'cancelSubsystem', subsystem: 'logs' }])
  })
})
