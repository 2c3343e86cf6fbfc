import { describe, expect, it } from 'vitest'
import {
  applyStatus,
  classifyStatus,
  failEntry,
  type MachineContext,
  makeEntry,
  retryDelay,
  retryDue,
  schedule,
  summarize,
} from '@/core/merge-bot/machine'
import type { MergeBotState, MergeQueueEntry } from '@/core/store/state'
import type { Config } from '@/types'
import { makeConfig, makeRepository, makeStatus } from '@tests/fixtures/forge'

const entryOf = (id: string, overrides: Partial<MergeQueueEntry> = {}): MergeQueueEntry => ({
  ...makeEntry(id, makeRepository(), { number: Number(id.slice(1)), title: `PR ${id}`, author: 'octocat' }),
  ...overrides,
})

const ctxOf = (config: Partial<Config> = {}, now = 1000): MachineContext => ({
  config: makeConfig(config),
  runId: 7,
  now,
})

describe('classifyStatus', () => {
  it('checks merged, then rebase, then CI, then readiness', () => {
    expect(classifyStatus(makeStatus({ merged: true, behind: true }))).toBe('merged')
    expect(classifyStatus(makeStatus({ behind: true, ciStatus: 'failure' }))).toBe('needsRebase')
    expect(classifyStatus(makeStatus({ mergeable: 'conflicted' }))).toBe('needsRebase')
    expect(classifyStatus(makeStatus({ mergeable: 'buildFailed', ciStatus: 'failure' }))).toBe(
      'ciFailed',
    )
    expect(classifyStatus(makeStatus())).toBe('ready')
    expect(classifyStatus(makeStatus({ mergeable: 'buildInProgress', ciStatus: 'pending' }))).toBe(
      'waiting',
    )
    expect(classifyStatus(makeStatus({ mergeable: 'blocked' }))).toBe('waiting')
  })
})

describe('retryDelay', () => {
  it('doubles from the base and caps at the maximum', () => {
    const config = makeConfig({ mergeBotRetryBackoffMs: 30_000, mergeBotMaxBackoffMs: 300_000 })
    expect([1, 2, 3, 4, 5].map((n) => retryDelay(n, config))).toEqual([
      30_000, 60_000, 120_000, 240_000, 300_000,
    ])
  })
})

describe('failEntry', () => {
  it('schedules a retry while within the budget', () => {
    const { entry, effects } = failEntry(entryOf('e1'), 'mergeFailed', 'boom', ctxOf())
    expect(entry).toMatchObject({
      state: 'failed',
      attempts: 1,
      failure: 'mergeFailed',
      lastError: 'boom',
      pending: 'retry',
      retryAt: 31_000,
      permanent: false,
    })
    expect(effects).toEqual([
      { type: 'scheduleTimer', delayMs: 30_000, timer: { kind: 'retry', runId: 7, entryId: 'e1' } },
    ])
  })

  it('fails permanently once the budget is spent', () => {
    const { entry, effects } = failEntry(
      entryOf('e1', { attempts: 3 }),
      'rebaseFailed',
      'conflict',
      ctxOf({ mergeBotMaxRetries: 3 }),
    )
    expect(entry).toMatchObject({ state: 'failed', attempts: 4, permanent: true, pending: null })
    expect(effects).toEqual([])
  })
})

describe('applyStatus', () => {
  it('starts polling CI when a queued entry is not ready yet', () => {
    const pending = makeStatus({ mergeable: 'buildInProgress', ciStatus: 'pending' })
    const { entry, effects } = applyStatus(
      entryOf('e1', { pending: 'statusCheck' }),
      pending,
      ctxOf({ ciPollIntervalMs: 5000 }),
    )
    expect(entry).toMatchObject({ state: 'waitingForCi', pending: 'poll', ciPolls: 0, lastStatus: pending })
    expect(effects).toEqual([
      { type: 'scheduleTimer', delayMs: 5000, timer: { kind: 'ciPoll', runId: 7, entryId: 'e1' } },
    ])
  })

  it('times out after the configured number of polls', () => {
    const { entry } = applyStatus(
      entryOf('e1', { state: 'waitingForCi', pending: 'statusCheck', ciPolls: 3 }),
      makeStatus({ mergeable: 'buildInProgress', ciStatus: 'pending' }),
      ctxOf({ maxCiPolls: 3 }),
    )
    expect(entry).toMatchObject({
      state: 'failed',
      failure: 'ciTimedOut',
      lastError: 'CI still pending after 3 polls',
    })
  })

  it('marks a ready pull request ready to merge without effects', () => {
    const { entry, effects } = applyStatus(entryOf('e1'), makeStatus(), ctxOf())
    expect(entry.state).toBe('readyToMerge')
    expect(effects).toEqual([])
  })
})

describe('retryDue', () => {
  it('sends a failed rebase back to needsRebase', () => {
    const failed = entryOf('e1', { state: 'failed', failure: 'rebaseFailed', pending: 'retry' })
    const { entry, effects } = retryDue(failed, ctxOf())
    expect(entry).toMatchObject({ state: 'needsRebase', pending: null, retryAt: null })
    expect(effects).toEqual([])
  })

  it('re-runs failed jobs after a red CI', () => {
    const failed = entryOf('e1', { state: 'failed', failure: 'ciFailed', pending: 'retry' })
    const { entry, effects } = retryDue(failed, ctxOf())
    expect(entry).toMatchObject({ state: 'waitingForCi', pending: 'rerun', ciPolls: 0 })
    expect(effects).toEqual([
      {
        type: 'mergeBot/rerunFailedJobs',
        runId: 7,
        entryId: 'e1',
        repository: makeRepository(),
        prNumber: 1,
      },
    ])
  })

  it('only waits for CI when re-running is disabled', () => {
    const failed = entryOf('e1', { state: 'failed', failure: 'ciFailed', pending: 'retry' })
    const { entry } = retryDue(failed, ctxOf({ rerunFailedJobs: false }))
    expect(entry).toMatchObject({ state: 'waitingForCi', pending: 'poll' })
  })

  it('starts over with a status check after other failures', () => {
    const failed = entryOf('e1', { state: 'failed', failure: 'mergeFailed', pending: 'retry' })
    const { entry, effects } = retryDue(failed, ctxOf())
    expect(entry).toMatchObject({ state: 'queued', pending: 'statusCheck' })
    expect(effects.map((e) => e.type)).toEqual(['mergeBot/fetchStatus'])
  })
})

describe('schedule', () => {
  it('starts work in queue order up to the concurrency limit', () => {
    const entries = [
      entryOf('e1', { state: 'readyToMerge' }),
      entryOf('e2', { state: 'needsRebase', lastStatus: makeStatus({ mergeable: 'conflicted' }) }),
      entryOf('e3', { state: 'readyToMerge' }),
    ]
    const result = schedule(entries, ctxOf({ mergeBotConcurrency: 2, mergeMethod: 'rebase' }))

    expect(result.entries.map((e) => e.state)).toEqual(['merging', 'rebasing', 'readyToMerge'])
    expect(result.effects).toEqual([
      {
        type: 'mergeBot/merge',
        runId: 7,
        entryId: 'e1',
        repository: makeRepository(),
        prNumber: 1,
        method: 'rebase',
      },
      {
        type: 'mergeBot/rebase',
        runId: 7,
        entryId: 'e2',
        repository: makeRepository(),
        prNumber: 2,
        author: 'octocat',
        conflicted: true,
      },
    ])
  })

  it('counts entries already in flight', () => {
    const entries = [
      entryOf('e1', { state: 'merging', pending: 'merge' }),
      entryOf('e2', { state: 'readyToMerge' }),
    ]
    const result = schedule(entries, ctxOf({ mergeBotConcurrency: 1 }))
    expect(result.entries).toBe(entries)
    expect(result.effects).toEqual([])
  })
})

describe('summarize', () => {
  it('counts merged, permanently failed and unsettled entries', () => {
    const bot: MergeBotState = {
      running: true,
      runId: 1,
      nextEntryId: 4,
      entries: [
        entryOf('e1', { state: 'failed', permanent: true }),
        entryOf('e2', { state: 'failed', permanent: false }),
        entryOf('e3', { state: 'waitingForCi' }),
      ],
      merged: [
        { entryId: 'e0', repository: makeRepository(), prNumber: 9, title: 'done', mergedAt: 1 },
      ],
      clock: 0,
      viewModel: null,
    }
    expect(summarize(bot)).toEqual({ merged: 1, failed: 1, remaining: 2, settled: false })
  })
})
