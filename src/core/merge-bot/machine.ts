/**
 * Merge-bot queue entry state machine.
 *
 * ```
 * queued → needsRebase → rebasing → waitingForCi → readyToMerge → merging → merged
 *                           ↘            ↘                          ↙
 *                                        failed
 * ```
 *
 * Every function here is pure: it takes an entry (or the whole queue) and
 * returns the next entry plus the effects to run. `pending` records the one
 * outstanding effect of an entry; results that do not match it are stale and
 * are dropped by the reducer before they reach this module.
 *
 * @module Merge Bot
 */
import type { Config, PullRequestStatus, Repository } from '@/types'
import type { PullRequestRef } from '@/core/store/actions'
import type { Effect } from '@/core/store/effects'
import type {
  EntryState,
  FailureKind,
  MergeBotState,
  MergeQueueEntry,
  PendingOperation,
} from '@/core/store/state'

/** @category Merge Bot */
export interface Transition {
  entry: MergeQueueEntry
  effects: Effect[]
}

/** Inputs every transition needs besides the entry itself. */
export interface MachineContext {
  config: Config
  runId: number
  now: number
}

/** Where a status check says an entry stands. */
export type Readiness = 'merged' | 'needsRebase' | 'ciFailed' | 'ready' | 'waiting'

const IN_FLIGHT: ReadonlySet<EntryState> = new Set(['rebasing', 'merging'])

export function makeEntry(
  id: string,
  repository: Repository,
  pullRequest: PullRequestRef,
): MergeQueueEntry {
  return {
    id,
    repository,
    prNumber: pullRequest.number,
    title: pullRequest.title,
    author: pullRequest.author,
    state: 'queued',
    attempts: 0,
    lastError: null,
    failure: null,
    pending: null,
    ciPolls: 0,
    retryAt: null,
    permanent: false,
    lastStatus: null,
    removing: false,
  }
}

/**
 * Maps a pull request status onto the next step of the bot.
 *
 * A branch that is behind or conflicted is rebased before CI matters; a red
 * CI wins over anything short of that.
 */
export function classifyStatus(status: PullRequestStatus): Readiness {
  if (status.merged) {
    return 'merged'
  }
  if (
    status.behind ||
    status.mergeable === 'needsRebase' ||
    status.mergeable === 'conflicted'
  ) {
    return 'needsRebase'
  }
  if (status.ciStatus === 'failure' || status.mergeable === 'buildFailed') {
    return 'ciFailed'
  }
  if (status.mergeable === 'ready') {
    return 'ready'
  }
  return 'waiting'
}

/** Backoff before retry number `attempts` (1-based), capped at the configured maximum. */
export function retryDelay(attempts: number, config: Config): number {
  const exponent = Math.max(0, attempts - 1)
  return Math.min(
    config.mergeBotMaxBackoffMs,
    config.mergeBotRetryBackoffMs * 2 ** exponent,
  )
}

export function isInFlight(entry: MergeQueueEntry): boolean {
  return IN_FLIGHT.has(entry.state)
}

const REQUESTS: ReadonlySet<PendingOperation> = new Set(['statusCheck', 'rebase', 'merge', 'rerun'])

/** Whether the entry waits on a forge request, as opposed to a timer or nothing. */
export function awaitsResponse(entry: MergeQueueEntry): boolean {
  return entry.pending !== null && REQUESTS.has(entry.pending)
}

/** Entries the bot still has work to do for. */
export function isUnsettled(entry: MergeQueueEntry): boolean {
  return entry.state !== 'merged' && !(entry.state === 'failed' && entry.permanent)
}

// ── Entry transitions ────────────────────────────────────────────────────────

function fetchStatus(entry: MergeQueueEntry, runId: number): Effect {
  return {
    type: 'mergeBot/fetchStatus',
    runId,
    entryId: entry.id,
    repository: entry.repository,
    prNumber: entry.prNumber,
  }
}

function waitForCi(entry: MergeQueueEntry, ctx: MachineContext, ciPolls: number): Transition {
  return {
    entry: { ...entry, state: 'waitingForCi', pending: 'poll', ciPolls },
    effects: [
      {
        type: 'scheduleTimer',
        delayMs: ctx.config.ciPollIntervalMs,
        timer: { kind: 'ciPoll', runId: ctx.runId, entryId: entry.id },
      },
    ],
  }
}

/** Puts an entry back to `queued` and asks for its current status. */
export function beginStatusCheck(entry: MergeQueueEntry, ctx: MachineContext): Transition {
  return {
    entry: { ...entry, state: 'queued', pending: 'statusCheck', retryAt: null },
    effects: [fetchStatus(entry, ctx.runId)],
  }
}

/**
 * Moves an entry to `failed` and spends one attempt of its retry budget.
 * Within the budget a backoff timer is scheduled; past it the entry stays
 * failed until the user dismisses it.
 */
export function failEntry(
  entry: MergeQueueEntry,
  failure: FailureKind,
  message: string,
  ctx: MachineContext,
): Transition {
  const attempts = entry.attempts + 1
  const failed: MergeQueueEntry = {
    ...entry,
    state: 'failed',
    attempts,
    failure,
    lastError: message,
  }
  if (attempts > ctx.config.mergeBotMaxRetries) {
    return {
      entry: { ...failed, pending: null, retryAt: null, permanent: true },
      effects: [],
    }
  }
  const delayMs = retryDelay(attempts, ctx.config)
  return {
    entry: { ...failed, pending: 'retry', retryAt: ctx.now + delayMs, permanent: false },
    effects: [
      {
        type: 'scheduleTimer',
        delayMs,
        timer: { kind: 'retry', runId: ctx.runId, entryId: entry.id },
      },
    ],
  }
}

/** Applies the result of a status check (first check or CI poll). */
export function applyStatus(
  entry: MergeQueueEntry,
  status: PullRequestStatus,
  ctx: MachineContext,
): Transition {
  const checked: MergeQueueEntry = { ...entry, lastStatus: status, pending: null }
  switch (classifyStatus(status)) {
    case 'merged':
      return { entry: { ...checked, state: 'merged' }, effects: [] }
    case 'needsRebase':
      return { entry: { ...checked, state: 'needsRebase' }, effects: [] }
    case 'ready':
      return { entry: { ...checked, state: 'readyToMerge' }, effects: [] }
    case 'ciFailed':
      return failEntry({ ...checked, state: 'waitingForCi' }, 'ciFailed', 'CI failed', ctx)
    case 'waiting': {
      if (entry.state !== 'waitingForCi') {
        return waitForCi(checked, ctx, 0)
      }
      if (entry.ciPolls >= ctx.config.maxCiPolls) {
        return failEntry(
          checked,
          'ciTimedOut',
          `CI still pending after ${entry.ciPolls} polls`,
          ctx,
        )
      }
      return waitForCi(checked, ctx, entry.ciPolls)
    }
  }
}

/** A CI poll timer fired: count the poll and check the status again. */
export function pollDue(entry: MergeQueueEntry, ctx: MachineContext): Transition {
  return {
    entry: { ...entry, pending: 'statusCheck', ciPolls: entry.ciPolls + 1 },
    effects: [fetchStatus(entry, ctx.runId)],
  }
}

export function rebaseSucceeded(entry: MergeQueueEntry, ctx: MachineContext): Transition {
  return waitForCi({ ...entry, pending: null }, ctx, 0)
}

export function rerunStarted(entry: MergeQueueEntry, ctx: MachineContext): Transition {
  return waitForCi({ ...entry, pending: null }, ctx, 0)
}

export function mergeSucceeded(entry: MergeQueueEntry): Transition {
  return { entry: { ...entry, state: 'merged', pending: null }, effects: [] }
}

/**
 * The backoff of a failed entry elapsed. A failed rebase goes back to
 * `needsRebase`, a red CI re-runs its failed jobs (when enabled) and waits
 * again, anything else starts over with a status check.
 */
export function retryDue(entry: MergeQueueEntry, ctx: MachineContext): Transition {
  const resumed: MergeQueueEntry = { ...entry, pending: null, retryAt: null }
  switch (entry.failure) {
    case 'rebaseFailed':
      return { entry: { ...resumed, state: 'needsRebase' }, effects: [] }
    case 'ciFailed':
      if (!ctx.config.rerunFailedJobs) {
        return waitForCi(resumed, ctx, 0)
      }
      return {
        entry: { ...resumed, state: 'waitingForCi', pending: 'rerun', ciPolls: 0 },
        effects: [
          {
            type: 'mergeBot/rerunFailedJobs',
            runId: ctx.runId,
            entryId: entry.id,
            repository: entry.repository,
            prNumber: entry.prNumber,
          },
        ],
      }
    default:
      return beginStatusCheck(resumed, ctx)
  }
}

/**
 * Entry state after the bot (re)starts. Permanently failed entries stay as
 * they are; every other entry starts over with a fresh status check.
 */
export function resume(entry: MergeQueueEntry, ctx: MachineContext): Transition {
  if (!isUnsettled(entry)) {
    return { entry, effects: [] }
  }
  return beginStatusCheck({ ...entry, ciPolls: 0 }, ctx)
}

// ── Queue scheduler ──────────────────────────────────────────────────────────

/**
 * Starts rebases and merges for idle entries in queue order while fewer than
 * `mergeBotConcurrency` entries are rebasing or merging.
 */
export function schedule(
  entries: readonly MergeQueueEntry[],
  ctx: MachineContext,
): { entries: readonly MergeQueueEntry[]; effects: Effect[] } {
  let inFlight = entries.filter(isInFlight).length
  const effects: Effect[] = []
  let changed = false

  const next = entries.map((entry): MergeQueueEntry => {
    if (inFlight >= ctx.config.mergeBotConcurrency || entry.pending !== null) {
      return entry
    }
    if (entry.state === 'needsRebase') {
      inFlight++
      changed = true
      effects.push({
        type: 'mergeBot/rebase',
        runId: ctx.runId,
        entryId: entry.id,
        repository: entry.repository,
        prNumber: entry.prNumber,
        author: entry.author,
        conflicted: entry.lastStatus?.mergeable === 'conflicted',
      })
      return { ...entry, state: 'rebasing', pending: 'rebase' }
    }
    if (entry.state === 'readyToMerge') {
      inFlight++
      changed = true
      effects.push({
        type: 'mergeBot/merge',
        runId: ctx.runId,
        entryId: entry.id,
        repository: entry.repository,
        prNumber: entry.prNumber,
        method: ctx.config.mergeMethod,
      })
      return { ...entry, state: 'merging', pending: 'merge' }
    }
    return entry
  })

  return { entries: changed ? next : entries, effects }
}

// ── Summary ──────────────────────────────────────────────────────────────────

/** @category Merge Bot */
export interface MergeBotSummary {
  merged: number
  failed: number
  remaining: number
  settled: boolean
}

/** Counts for the bot status line; `settled` once no entry has work left. */
export function summarize(bot: MergeBotState): MergeBotSummary {
  const failed = bot.entries.filter((e) => e.state === 'failed' && e.permanent).length
  const remaining = bot.entries.filter(isUnsettled).length
  return { merged: bot.merged.length, failed, remaining, settled: remaining === 0 }
}
