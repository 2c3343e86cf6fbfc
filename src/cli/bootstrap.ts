/**
 * Shared wiring for the CLI commands: repository slugs, session restore and
 * store construction.
 *
 * @module CLI Commands
 */
import { err, ok, type Result } from 'neverthrow'
import type { ForgeProvider } from '@/core/forge/base'
import { createForgeProvider } from '@/core/forge/factory'
import { loadSession } from '@/core/session'
import { type AppState, repoKey, Store } from '@/core/store'
import { type Config, type Repository, type Session, SessionSchema } from '@/types'
import { createLogger } from '@/utils/logger'

const logger = createLogger('cli')

const SLUG_RE = /^([\w.-]+)\/([\w.-]+)(?:@(.+))?$/

/**
 * Parses `org/repo` or `org/repo@branch`. The branch defaults to `main`.
 *
 * @category CLI Commands
 */
export function parseRepository(slug: string): Result<Repository, Error> {
  const match = SLUG_RE.exec(slug.trim())
  if (!match?.[1] || !match[2]) {
    return err(new Error(`Invalid repository "${slug}", expected org/repo[@branch]`))
  }
  return ok({ org: match[1], repo: match[2], branch: match[3] ?? 'main' })
}

/** Session from disk, or an empty one when the file is unreadable. */
export async function restoreSession(config: Config): Promise<Session> {
  return loadSession(config.stateDir).match(
    (session) => session,
    (e) => {
      logger.warn({ err: e }, 'ignoring unreadable session file')
      return SessionSchema.parse({})
    },
  )
}

/**
 * Creates a store and restores the persisted session into it, which starts
 * loading every tracked repository.
 *
 * @category CLI Commands
 */
export async function openStore(
  config: Config,
  provider: ForgeProvider = createForgeProvider(config),
): Promise<Store> {
  const session = await restoreSession(config)
  const store = new Store({ config, provider })
  store.dispatch({ type: 'session/restore', session })
  return store
}

/**
 * Makes sure `repository` is tracked in memory and selected. The session
 * file is left alone.
 */
export function focusRepository(store: Store, repository: Repository): void {
  const index = indexOf(store.currentState(), repository)
  if (index === -1) {
    store.dispatch({ type: 'repos/add', repository })
  }
  const selected = indexOf(store.currentState(), repository)
  store.dispatch({ type: 'repos/select', index: selected })
}

function indexOf(state: AppState, repository: Repository): number {
  const key = repoKey(repository)
  return state.repos.repositories.findIndex((r) => repoKey(r) === key)
}
