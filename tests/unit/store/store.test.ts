import { errAsync, okAsync, ResultAsync } from 'neverthrow'
import { describe, expect, it, vi } from 'vitest'
import { summarize } from '@/core/merge-bot/machine'
import { type AppState, repoKey, Store } from '@/core/store'
import { ForgeError, InvariantViolationError } from '@/errors'
import type { JobLogInput } from '@/types'
import {
  FakeForgeProvider,
  makeConfig,
  makePullRequest,
  makeRepository,
  makeStatus,
} from '@tests/fixtures/forge'

const repository = makeRepository()
const session = {
  repositories: [repository],
  selectedRepository: 0,
  filter: 'all' as const,
  selections: {},
}

function waitFor(store: Store, predicate: (state: AppState) => boolean): Promise<void> {
  return new Promise((resolve) => {
    if (predicate(store.currentState())) {
      resolve()
      return
    }
    const unsubscribe = store.subscribe((state) => {
      if (predicate(state)) {
        unsubscribe()
        resolve()
      }
    })
  })
}

describe('Store', () => {
  it('loads pull requests of the restored repositories', async () => {
    const provider = new FakeForgeProvider({
      listPullRequests: () => okAsync([makePullRequest({ number: 12 })]),
    })
    const store = new Store({ config: makeConfig(), provider })

    store.dispatch({ type: 'session/restore', session })
    await store.whenIdle()

    const data = store.currentState().repos.data[repoKey(repository)]
    expect(data?.loadState).toBe('loaded')
    expect(data?.pullRequests.map((pr) => pr.number)).toEqual([12])
    expect(provider.calls).toEqual(['listPullRequests acme/widgets'])
  })

  it('turns a forge error into a failure action', async () => {
    const provider = new FakeForgeProvider({
      listPullRequests: () => errAsync(new ForgeError('rate-limited', 'API rate limit exceeded')),
    })
    const store = new Store({ config: makeConfig(), provider })

    store.dispatch({ type: 'session/restore', session })
    await store.whenIdle()

    const state = store.currentState()
    expect(state.repos.data[repoKey(repository)]?.error).toBe('API rate limit exceeded')
    expect(state.ui.status).toEqual({
      level: 'warning',
      text: 'Failed to load acme/widgets: API rate limit exceeded',
    })
  })

  it('drops the result of a cancelled fetch', async () => {
    let release: (jobs: JobLogInput[]) => void = () => undefined
    const pending = new Promise<JobLogInput[]>((resolve) => {
      release = resolve
    })
    const provider = new FakeForgeProvider({
      fetchBuildLogs: () => ResultAsync.fromSafePromise(pending),
    })
    const store = new Store({ config: makeConfig(), provider })

    store.dispatch({
      type: 'logs/open',
      repository,
      pullRequest: { number: 3, title: 'fix: flaky', author: 'octocat' },
    })
    store.dispatch({ type: 'logs/close' })
    release([])
    await store.whenIdle()

    expect(store.currentState().logPanel.loadState).toBe('idle')
    expect(store.currentState().logPanel.tree).toBeNull()
  })

  it('runs the merge bot until every entry is merged', async () => {
    const provider = new FakeForgeProvider({
      fetchPullRequestStatus: () => okAsync(makeStatus()),
      mergePullRequest: () => okAsync(undefined),
    })
    const store = new Store({ config: makeConfig(), provider })

    store.dispatch({
      type: 'mergeBot/add',
      items: [
        { repository, pullRequest: { number: 1, title: 'feat: one', author: 'octocat' } },
        { repository, pullRequest: { number: 2, title: 'feat: two', author: 'octocat' } },
      ],
    })
    const settled = waitFor(store, (state) => summarize(state.mergeBot).settled)
    store.dispatch({ type: 'mergeBot/start' })
    await settled
    store.dispatch({ type: 'mergeBot/stop' })
    await store.whenIdle()

    const bot = store.currentState().mergeBot
    expect(bot.merged.map((m) => m.prNumber).sort()).toEqual([1, 2])
    expect(bot.viewModel?.statusText).toBe('Stopped: 2 merged, 0 failed, 0 remaining')
    expect(provider.calls.filter((c) => c.startsWith('mergePullRequest')).sort()).toEqual([
      'mergePullRequest #1',
      'mergePullRequest #2',
    ])
  })

  it('dispatches nothing from the merge bot after it is stopped mid-run', async () => {
    let releaseMerge: () => void = () => undefined
    const mergeGate = new Promise<void>((resolve) => {
      releaseMerge = resolve
    })
    const provider = new FakeForgeProvider({
      fetchPullRequestStatus: (_repository, prNumber) => {
        if (prNumber === 1) {
          return okAsync(makeStatus({ mergeable: 'buildInProgress', ciStatus: 'pending' }))
        }
        if (prNumber === 2) {
          return okAsync(makeStatus())
        }
        return errAsync(new ForgeError('network', 'socket hang up'))
      },
      mergePullRequest: () => ResultAsync.fromSafePromise(mergeGate),
    })
    const store = new Store({ config: makeConfig(), provider })

    store.dispatch({
      type: 'mergeBot/add',
      items: [1, 2, 3].map((number) => ({
        repository,
        pullRequest: { number, title: `PR ${number}`, author: 'octocat' },
      })),
    })
    // e1 waits on a CI poll timer, e2 on its merge request, e3 on a retry timer.
    const busy = waitFor(store, (state) =>
      state.mergeBot.entries.map((e) => e.pending).join() === 'poll,merge,retry',
    )
    store.dispatch({ type: 'mergeBot/start' })
    await busy

    store.dispatch({ type: 'mergeBot/stop' })
    const afterStop: string[] = []
    store.subscribe((_state, action) => {
      afterStop.push(action.type)
    })
    releaseMerge()
    await store.whenIdle()

    expect(afterStop).toEqual([])
    expect(store.currentState().mergeBot.entries.map((e) => [e.id, e.state])).toEqual([
      ['e1', 'waitingForCi'],
      ['e2', 'merging'],
      ['e3', 'failed'],
    ])
    expect(provider.calls.filter((c) => c.startsWith('mergePullRequest'))).toEqual([
      'mergePullRequest #2',
    ])
  })

  it('hands invariant violations to onFatal when strict', async () => {
    const onFatal = vi.fn()
    const store = new Store({
      config: makeConfig({ strictInvariants: true }),
      provider: new FakeForgeProvider(),
      onFatal,
    })

    store.dispatch({ type: 'repos/remove', index: 3 })

    expect(onFatal).toHaveBeenCalledTimes(1)
    const [error] = onFatal.mock.calls[0] ?? []
    expect(error).toBeInstanceOf(InvariantViolationError)
    expect(error).toHaveProperty('message', 'repos: no repository at index 3')
  })

  it('only logs invariant violations when not strict', () => {
    const onFatal = vi.fn()
    const store = new Store({ config: makeConfig(), provider: new FakeForgeProvider(), onFatal })
    store.dispatch({ type: 'repos/select', index: 1 })
    expect(onFatal).not.toHaveBeenCalled()
  })

  it('saves the session on shutdown', async () => {
    const saveSession = vi.fn(() => okAsync<void, Error>(undefined))
    const store = new Store({ config: makeConfig(), provider: new FakeForgeProvider(), saveSession })

    store.dispatch({ type: 'ui/setTheme', theme: 'gotham' })
    store.dispatch({ type: 'app/shutdown' })
    await store.whenIdle()

    expect(saveSession).toHaveBeenCalledWith({
      repositories: [],
      selectedRepository: 0,
      filter: 'all',
      theme: 'gotham',
      selections: {},
    })
  })

  it('applies actions dispatched by a listener after the current one', () => {
    const store = new Store({ config: makeConfig(), provider: new FakeForgeProvider() })
    const seen: string[] = []
    store.subscribe((state, action) => {
      seen.push(`${action.type}:${state.ui.viewportHeight}`)
      if (action.type === 'ui/resize' && action.viewportHeight === 10) {
        store.dispatch({ type: 'ui/resize', viewportHeight: 30 })
        seen.push('dispatched')
      }
    })

    store.dispatch({ type: 'ui/resize', viewportHeight: 10 })

    expect(seen).toEqual(['ui/resize:10', 'dispatched', 'ui/resize:30'])
  })

  it('reports a throwing listener to onFatal and keeps going', () => {
    const onFatal = vi.fn()
    const store = new Store({ config: makeConfig(), provider: new FakeForgeProvider(), onFatal })
    store.subscribe(() => {
      throw new Error('listener broke')
    })

    store.dispatch({ type: 'ui/setTheme', theme: 'catppuccin' })

    expect(onFatal).toHaveBeenCalledWith(new Error('listener broke'))
    expect(store.currentState().ui.theme).toBe('catppuccin')
  })
})
