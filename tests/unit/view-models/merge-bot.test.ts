import { describe, expect, it } from 'vitest'
import { makeEntry } from '@/core/merge-bot/machine'
import { initialState, type MergeBotState, type MergeQueueEntry } from '@/core/store/state'
import { recomputeMergeBot } from '@/core/view-models/merge-bot'
import { makeConfig, makeRepository } from '@tests/fixtures/forge'

const repository = makeRepository()

function entry(
  id: string,
  prNumber: number,
  title: string,
  overrides: Partial<MergeQueueEntry> = {},
): MergeQueueEntry {
  return {
    ...makeEntry(id, repository, { number: prNumber, title, author: 'octocat' }),
    ...overrides,
  }
}

function makeBot(overrides: Partial<MergeBotState> = {}): MergeBotState {
  return { ...initialState(makeConfig()).mergeBot, ...overrides }
}

describe('recomputeMergeBot', () => {
  it('returns null for an empty queue with no history', () => {
    expect(recomputeMergeBot(makeBot(), 'tokyo-night', 3)).toBeNull()
  })

  it('summarises a running queue', () => {
    const bot = makeBot({
      running: true,
      clock: 1_000,
      entries: [
        entry('m1', 1, 'feat: add widget'),
        entry('m2', 2, 'fix: crash', {
          state: 'failed',
          attempts: 1,
          lastError: 'merge conflict',
          retryAt: 31_000,
        }),
        entry('m3', 3, 'chore: bump deps', {
          state: 'failed',
          attempts: 4,
          lastError: 'CI failed',
          permanent: true,
        }),
      ],
      merged: [{ entryId: 'm0', repository, prNumber: 9, title: 'docs: readme', mergedAt: 500 }],
    })
    const vm = recomputeMergeBot(bot, 'tokyo-night', 3)

    expect(vm?.statusText).toBe('Running: 1 merged, 1 failed, 2 remaining')
    expect(vm?.statusColor).toBe('#7AA2F7')
    expect(vm?.merged).toEqual(['acme/widgets#9 docs: readme'])
    expect(vm?.entries).toEqual([
      {
        id: 'm1',
        text: 'acme/widgets#1 feat: add widget',
        stateLabel: 'Queued',
        stateColor: '#A9B1D6',
        attemptsText: '0/3',
        detail: '',
        dismissible: false,
      },
      {
        id: 'm2',
        text: 'acme/widgets#2 fix: crash',
        stateLabel: 'Failed',
        stateColor: '#E0AF68',
        attemptsText: '1/3',
        detail: 'merge conflict, retry 1/3 in 30s',
        dismissible: false,
      },
      {
        id: 'm3',
        text: 'acme/widgets#3 chore: bump deps',
        stateLabel: 'Failed',
        stateColor: '#F7768E',
        attemptsText: '4/3',
        detail: 'CI failed (gave up after 4 attempts)',
        dismissible: true,
      },
    ])
  })

  it('shows the poll count while waiting for CI', () => {
    const bot = makeBot({ entries: [entry('m1', 1, 'feat: add widget', { state: 'waitingForCi', ciPolls: 2 })] })
    const [row] = recomputeMergeBot(bot, 'tokyo-night', 3)?.entries ?? []
    expect(row?.stateLabel).toBe('Waiting for CI')
    expect(row?.detail).toBe('poll 2')
    expect(row?.stateColor).toBe('#7AA2F7')
  })

  it('keeps the merged history visible once the queue drains', () => {
    const bot = makeBot({
      merged: [{ entryId: 'm1', repository, prNumber: 1, title: 'feat: add widget', mergedAt: 10 }],
    })
    const vm = recomputeMergeBot(bot, 'tokyo-night', 3)
    expect(vm?.statusText).toBe('Stopped: 1 merged, 0 failed, 0 remaining')
    expect(vm?.statusColor).toBe('#A9B1D6')
    expect(vm?.entries).toEqual([])
  })
})
