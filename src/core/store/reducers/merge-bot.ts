import type { Repository } from '@/types'
import {
  applyStatus,
  awaitsResponse,
  beginStatusCheck,
  failEntry,
  type MachineContext,
  makeEntry,
  mergeSucceeded,
  pollDue,
  rebaseSucceeded,
  rerunStarted,
  resume,
  retryDue,
  schedule,
  type Transition,
} from '@/core/merge-bot/machine'
import { recomputeMergeBot } from '@/core/view-models/merge-bot'
import type { Action, MergeBotAction, PullRequestRef } from '../actions'
import type { Effect } from '../effects'
import {
  type MergeBotState,
  type MergeQueueEntry,
  type MergedRecord,
  type PendingOperation,
  repoKey,
} from '../state'
import { operationTargets } from './repos'
import {
  type SliceContext,
  type SliceResult,
  themeChanged,
  unchanged,
  withEffects,
} from './context'

/** Interval of the bot's clock tick while it is running. */
export const TICK_INTERVAL_MS = 1000

type EntryResultAction = Extract<MergeBotAction, { entryId: string; at: number }>

const EXPECTED_PENDING: Record<EntryResultAction['type'], PendingOperation> = {
  'mergeBot/statusChecked': 'statusCheck',
  'mergeBot/statusCheckFailed': 'statusCheck',
  'mergeBot/rebased': 'rebase',
  'mergeBot/rebaseFailed': 'rebase',
  'mergeBot/merged': 'merge',
  'mergeBot/mergeFailed': 'merge',
  'mergeBot/rerunStarted': 'rerun',
  'mergeBot/rerunFailed': 'rerun',
  'mergeBot/pollDue': 'poll',
  'mergeBot/retryDue': 'retry',
}

function recompute(bot: MergeBotState, ctx: SliceContext): MergeBotState {
  return {
    ...bot,
    viewModel: recomputeMergeBot(bot, ctx.theme, ctx.config.mergeBotMaxRetries),
  }
}

function machineContext(bot: MergeBotState, ctx: SliceContext, now: number): MachineContext {
  return { config: ctx.config, runId: bot.runId, now }
}

/** Runs the scheduler when the bot is running and recomputes the view model. */
function finish(
  bot: MergeBotState,
  effects: readonly Effect[],
  ctx: SliceContext,
): SliceResult<MergeBotState> {
  if (!bot.running) {
    return withEffects(recompute(bot, ctx), effects)
  }
  const scheduled = schedule(bot.entries, machineContext(bot, ctx, bot.clock))
  const next = scheduled.entries === bot.entries ? bot : { ...bot, entries: scheduled.entries }
  return withEffects(recompute(next, ctx), [...effects, ...scheduled.effects])
}

function tickTimer(runId: number): Effect {
  return { type: 'scheduleTimer', delayMs: TICK_INTERVAL_MS, timer: { kind: 'tick', runId } }
}

function addEntries(
  bot: MergeBotState,
  items: readonly { repository: Repository; pullRequest: PullRequestRef }[],
  ctx: SliceContext,
): SliceResult<MergeBotState> {
  const known = new Set(bot.entries.map((e) => `${repoKey(e.repository)}#${e.prNumber}`))
  const entries = [...bot.entries]
  const effects: Effect[] = []
  let nextEntryId = bot.nextEntryId
  let revived = false

  for (const { repository, pullRequest } of items) {
    const key = `${repoKey(repository)}#${pullRequest.number}`
    if (known.has(key)) {
      // Adding back an entry whose removal is pending keeps it in the queue.
      const index = entries.findIndex(
        (e) =>
          e.removing &&
          e.prNumber === pullRequest.number &&
          repoKey(e.repository) === repoKey(repository),
      )
      const pending = entries[index]
      if (pending !== undefined) {
        entries[index] = { ...pending, removing: false }
        revived = true
      }
      continue
    }
    known.add(key)
    const entry = makeEntry(`e${nextEntryId++}`, repository, pullRequest)
    if (bot.running) {
      const started = beginStatusCheck(entry, machineContext(bot, ctx, bot.clock))
      entries.push(started.entry)
      effects.push(...started.effects)
    } else {
      entries.push(entry)
    }
  }

  if (nextEntryId === bot.nextEntryId && !revived) {
    return unchanged(bot)
  }
  return finish({ ...bot, entries, nextEntryId }, effects, ctx)
}

function applyToEntry(
  bot: MergeBotState,
  action: EntryResultAction,
  ctx: SliceContext,
): SliceResult<MergeBotState> {
  if (!bot.running || action.runId !== bot.runId) {
    return unchanged(bot)
  }
  const entry = bot.entries.find((e) => e.id === action.entryId)
  if (entry === undefined || entry.pending !== EXPECTED_PENDING[action.type]) {
    return unchanged(bot)
  }

  if (entry.removing) {
    const entries = bot.entries.filter((e) => e.id !== entry.id)
    return finish({ ...bot, entries, clock: action.at }, [], ctx)
  }

  const mctx = machineContext(bot, ctx, action.at)
  const transition = transitionFor(entry, action, mctx)
  let entries: readonly MergeQueueEntry[]
  let merged: readonly MergedRecord[] = bot.merged
  if (transition.entry.state === 'merged') {
    entries = bot.entries.filter((e) => e.id !== entry.id)
    merged = [
      ...bot.merged,
      {
        entryId: entry.id,
        repository: entry.repository,
        prNumber: entry.prNumber,
        title: entry.title,
        mergedAt: action.at,
      },
    ]
  } else {
    entries = bot.entries.map((e) => (e.id === entry.id ? transition.entry : e))
  }
  return finish({ ...bot, entries, merged, clock: action.at }, transition.effects, ctx)
}

function transitionFor(
  entry: MergeQueueEntry,
  action: EntryResultAction,
  mctx: MachineContext,
): Transition {
  switch (action.type) {
    case 'mergeBot/statusChecked':
      return applyStatus(entry, action.status, mctx)
    case 'mergeBot/statusCheckFailed':
      return failEntry(entry, 'statusCheckFailed', action.error.message, mctx)
    case 'mergeBot/rebased':
      return rebaseSucceeded(entry, mctx)
    case 'mergeBot/rebaseFailed':
      return failEntry(entry, 'rebaseFailed', action.error.message, mctx)
    case 'mergeBot/merged':
      return mergeSucceeded(entry)
    case 'mergeBot/mergeFailed':
      return failEntry(entry, 'mergeFailed', action.error.message, mctx)
    case 'mergeBot/rerunStarted':
      return rerunStarted(entry, mctx)
    case 'mergeBot/rerunFailed':
      return failEntry(entry, 'ciFailed', action.error.message, mctx)
    case 'mergeBot/pollDue':
      return pollDue(entry, mctx)
    case 'mergeBot/retryDue':
      return retryDue(entry, mctx)
  }
}

/**
 * Merge bot queue. Results carrying a run id other than the current one, or
 * addressed to an entry that is not waiting for them, are ignored.
 *
 * @category Store
 */
export function reduceMergeBot(
  bot: MergeBotState,
  action: Action,
  ctx: SliceContext,
): SliceResult<MergeBotState> {
  switch (action.type) {
    case 'mergeBot/start': {
      if (bot.running) {
        return unchanged(bot)
      }
      const started: MergeBotState = { ...bot, running: true, runId: bot.runId + 1 }
      const mctx = machineContext(started, ctx, bot.clock)
      const effects: Effect[] = [tickTimer(started.runId)]
      const entries = started.entries.map((entry) => {
        const resumed = resume(entry, mctx)
        effects.push(...resumed.effects)
        return resumed.entry
      })
      return finish({ ...started, entries }, effects, ctx)
    }

    case 'mergeBot/stop':
      if (!bot.running) {
        return unchanged(bot)
      }
      return withEffects(
        recompute(
          {
            ...bot,
            running: false,
            runId: bot.runId + 1,
            entries: bot.entries.filter((e) => !e.removing),
          },
          ctx,
        ),
        [{ type: 'cancelSubsystem', subsystem: 'mergeBot' }],
      )

    case 'mergeBot/add':
      return addEntries(bot, action.items, ctx)

    case 'mergeBot/addSelected': {
      const repos = ctx.state.repos
      const repository = repos.repositories[repos.selectedRepository]
      if (repository === undefined) {
        return unchanged(bot)
      }
      const items = operationTargets(repos).map((pr) => ({
        repository,
        pullRequest: { number: pr.number, title: pr.title, author: pr.author },
      }))
      return addEntries(bot, items, ctx)
    }

    case 'mergeBot/remove': {
      const target = bot.entries.find((e) => e.id === action.entryId)
      if (target === undefined || target.removing) {
        return unchanged(bot)
      }
      // A request that is out keeps its slot until its result comes back.
      if (bot.running && awaitsResponse(target)) {
        const entries = bot.entries.map((e) => (e === target ? { ...e, removing: true } : e))
        return unchanged(recompute({ ...bot, entries }, ctx))
      }
      return finish({ ...bot, entries: bot.entries.filter((e) => e !== target) }, [], ctx)
    }

    case 'mergeBot/dismiss': {
      const entries = bot.entries.filter(
        (e) => !(e.id === action.entryId && e.state === 'failed' && e.permanent),
      )
      return entries.length === bot.entries.length
        ? unchanged(bot)
        : unchanged(recompute({ ...bot, entries }, ctx))
    }

    case 'mergeBot/tick':
      if (!bot.running || action.runId !== bot.runId) {
        return unchanged(bot)
      }
      return finish({ ...bot, clock: action.at }, [tickTimer(bot.runId)], ctx)

    case 'mergeBot/statusChecked':
    case 'mergeBot/statusCheckFailed':
    case 'mergeBot/rebased':
    case 'mergeBot/rebaseFailed':
    case 'mergeBot/merged':
    case 'mergeBot/mergeFailed':
    case 'mergeBot/rerunStarted':
    case 'mergeBot/rerunFailed':
    case 'mergeBot/pollDue':
    case 'mergeBot/retryDue':
      return applyToEntry(bot, action, ctx)

    case 'ui/setTheme':
    case 'session/restore':
      return themeChanged(ctx) && bot.viewModel !== null
        ? unchanged(recompute(bot, ctx))
        : unchanged(bot)

    default:
      return unchanged(bot)
  }
}
