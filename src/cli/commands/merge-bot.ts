/** @module CLI Commands */
import { focusRepository, openStore, parseRepository } from '@/cli/bootstrap'
import { renderMergeBot } from '@/cli/render'
import type { ForgeProvider } from '@/core/forge/base'
import { summarize } from '@/core/merge-bot/machine'
import { type PullRequestRef, repoKey, type Store } from '@/core/store'
import type { Config } from '@/types'
import { createLogger } from '@/utils/logger'

const logger = createLogger('merge-bot')

/**
 * Resolves once every entry is merged or has permanently failed, or on
 * Ctrl-C. Both listeners are removed when it resolves.
 */
export function whenSettled(store: Store): Promise<void> {
  return new Promise((resolve) => {
    let lastStatus = ''
    const finish = () => {
      unsubscribe()
      process.off('SIGINT', onInterrupt)
      resolve()
    }
    const onInterrupt = () => {
      logger.warn('interrupted, stopping merge bot')
      finish()
    }
    const unsubscribe = store.subscribe((state) => {
      const status = state.mergeBot.viewModel?.statusText ?? ''
      if (status !== lastStatus) {
        lastStatus = status
        logger.info(status)
      }
      if (summarize(state.mergeBot).settled) {
        finish()
      }
    })
    process.once('SIGINT', onInterrupt)
  })
}

/**
 * Queues pull requests in the merge bot and runs it until every one of them
 * is merged or has exhausted its retries.
 *
 * Pull requests that are not open in the repository are skipped. Exits with
 * code 1 when nothing could be queued or any entry failed.
 *
 * @param slug - `org/repo` or `org/repo@branch`.
 */
export async function mergeBotCommand(
  provider: ForgeProvider,
  opts: { slug: string; prs: number[] },
  config: Config,
): Promise<void> {
  const repository = parseRepository(opts.slug).match(
    (r) => r,
    (e) => {
      logger.error(e.message)
      process.exit(1)
    },
  )

  const store = await openStore(config, provider)
  focusRepository(store, repository)
  await store.whenIdle()

  const open = store.currentState().repos.data[repoKey(repository)]?.pullRequests ?? []
  const items: { repository: typeof repository; pullRequest: PullRequestRef }[] = []
  for (const number of opts.prs) {
    const pr = open.find((p) => p.number === number)
    if (pr === undefined) {
      logger.warn({ pr: number, repository: repoKey(repository) }, 'pull request is not open, skipping')
      continue
    }
    items.push({ repository, pullRequest: { number: pr.number, title: pr.title, author: pr.author } })
  }
  if (items.length === 0) {
    logger.error('No pull requests to merge.')
    process.exit(1)
  }

  store.dispatch({ type: 'mergeBot/add', items })
  const settled = whenSettled(store)
  store.dispatch({ type: 'mergeBot/start' })
  await settled

  store.dispatch({ type: 'mergeBot/stop' })
  await store.whenIdle()

  const bot = store.currentState().mergeBot
  if (bot.viewModel) {
    for (const line of renderMergeBot(bot.viewModel)) {
      console.log(line)
    }
  }
  const summary = summarize(bot)
  if (summary.failed > 0 || summary.remaining > 0) {
    process.exit(1)
  }
}
