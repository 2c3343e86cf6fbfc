/** @module CLI Commands */
import { parseRepository, restoreSession } from '@/cli/bootstrap'
import { saveSession } from '@/core/session'
import { type AppState, initialState, reduce, repoKey, sessionOf } from '@/core/store'
import type { Config, Repository } from '@/types'
import { createLogger } from '@/utils/logger'

const logger = createLogger('repos')

async function restoredState(config: Config): Promise<AppState> {
  const session = await restoreSession(config)
  return reduce(initialState(config), { type: 'session/restore', session }, { config }).state
}

async function persist(config: Config, state: AppState): Promise<void> {
  const saved = await saveSession(config.stateDir, sessionOf(state))
  if (saved.isErr()) {
    logger.error({ err: saved.error }, saved.error.message)
    process.exit(1)
  }
}

function parseOrExit(slug: string): Repository {
  return parseRepository(slug).match(
    (repository) => repository,
    (e) => {
      logger.error(e.message)
      process.exit(1)
    },
  )
}

/**
 * Adds a repository to the tracked set in the session file.
 *
 * The store's reducer does the bookkeeping; its load effects are discarded
 * since nothing is fetched here.
 *
 * @param config - Loaded prdash configuration.
 * @param slug - `org/repo` or `org/repo@branch`.
 */
export async function reposAddCommand(config: Config, slug: string): Promise<void> {
  const repository = parseOrExit(slug)
  const state = await restoredState(config)
  const next = reduce(state, { type: 'repos/add', repository }, { config }).state
  if (next === state) {
    logger.info({ repository: repoKey(repository) }, 'Repository already tracked')
    return
  }
  await persist(config, next)
  logger.info({ repository: repoKey(repository) }, 'Repository added')
}

/** Removes a tracked repository. Exits with code 1 when it is not tracked. */
export async function reposRemoveCommand(config: Config, slug: string): Promise<void> {
  const repository = parseOrExit(slug)
  const state = await restoredState(config)
  const index = state.repos.repositories.findIndex((r) => repoKey(r) === repoKey(repository))
  if (index === -1) {
    logger.error({ repository: repoKey(repository) }, 'Repository is not tracked')
    process.exit(1)
  }
  const next = reduce(state, { type: 'repos/remove', index }, { config }).state
  await persist(config, next)
  logger.info({ repository: repoKey(repository) }, 'Repository removed')
}

/** Prints the tracked repositories, marking the selected one. */
export async function reposListCommand(config: Config): Promise<void> {
  const state = await restoredState(config)
  const { repositories, selectedRepository } = state.repos
  if (repositories.length === 0) {
    logger.info('No repositories tracked.')
    return
  }
  repositories.forEach((repository, index) => {
    const marker = index === selectedRepository ? '*' : ' '
    console.log(`${marker} ${repoKey(repository)}`)
  })
}
