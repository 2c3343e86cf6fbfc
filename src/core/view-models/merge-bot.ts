/**
 * Merge bot view model — queue entries with their state, attempts and the
 * countdown of a pending retry.
 *
 * @module View Models
 */
import type { ThemeName } from '@/types'
import { summarize } from '@/core/merge-bot/machine'
import type { EntryState, MergeBotState, MergeQueueEntry } from '@/core/store/state'
import { resolveTheme, type ThemeColors } from '@/utils/themes'
import { formatCountdown } from './format'

/** @category View Models */
export interface MergeBotEntryViewModel {
  id: string
  text: string
  stateLabel: string
  stateColor: string
  attemptsText: string
  detail: string
  dismissible: boolean
}

/** @category View Models */
export interface MergeBotViewModel {
  statusText: string
  statusColor: string
  entries: readonly MergeBotEntryViewModel[]
  merged: readonly string[]
}

const STATE_LABEL: Record<EntryState, string> = {
  queued: 'Queued',
  needsRebase: 'Needs Rebase',
  rebasing: 'Rebasing...',
  waitingForCi: 'Waiting for CI',
  readyToMerge: 'Ready',
  merging: 'Merging...',
  merged: 'Merged',
  failed: 'Failed',
}

function stateColor(entry: MergeQueueEntry, colors: ThemeColors): string {
  switch (entry.state) {
    case 'merged':
    case 'readyToMerge':
      return colors.statusSuccess
    case 'failed':
      return entry.permanent ? colors.statusError : colors.statusWarning
    case 'rebasing':
    case 'merging':
    case 'waitingForCi':
      return colors.statusInfo
    default:
      return colors.textMuted
  }
}

function detailOf(entry: MergeQueueEntry, now: number, maxRetries: number): string {
  if (entry.removing) {
    return 'removing once the current request finishes'
  }
  if (entry.state === 'failed') {
    const reason = entry.lastError ?? 'failed'
    if (entry.permanent) {
      return `${reason} (gave up after ${entry.attempts} attempts)`
    }
    return entry.retryAt === null
      ? reason
      : `${reason}, retry ${entry.attempts}/${maxRetries} in ${formatCountdown(entry.retryAt, now)}`
  }
  if (entry.state === 'waitingForCi' && entry.ciPolls > 0) {
    return `poll ${entry.ciPolls}`
  }
  return ''
}

/**
 * Rebuilds the merge bot view model.
 *
 * @returns `null` while the queue and the merged history are both empty.
 * @category View Models
 */
export function recomputeMergeBot(
  bot: MergeBotState,
  theme: ThemeName,
  maxRetries: number,
): MergeBotViewModel | null {
  if (bot.entries.length === 0 && bot.merged.length === 0) {
    return null
  }
  const colors = resolveTheme(theme)
  const summary = summarize(bot)
  const prefix = bot.running ? 'Running' : 'Stopped'

  return {
    statusText: `${prefix}: ${summary.merged} merged, ${summary.failed} failed, ${summary.remaining} remaining`,
    statusColor: bot.running ? colors.statusInfo : colors.textMuted,
    entries: bot.entries.map((entry) => ({
      id: entry.id,
      text: `${entry.repository.org}/${entry.repository.repo}#${entry.prNumber} ${entry.title}`,
      stateLabel: STATE_LABEL[entry.state],
      stateColor: stateColor(entry, colors),
      attemptsText: `${entry.attempts}/${maxRetries}`,
      detail: detailOf(entry, bot.clock, maxRetries),
      dismissible: entry.state === 'failed' && entry.permanent,
    })),
    merged: bot.merged.map(
      (record) =>
        `${record.repository.org}/${record.repository.repo}#${record.prNumber} ${record.title}`,
    ),
  }
}
