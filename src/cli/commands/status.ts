/** @module CLI Commands */
import { openStore } from '@/cli/bootstrap'
import { renderPullRequestTable } from '@/cli/render'
import type { ForgeProvider } from '@/core/forge/base'
import { repoKey } from '@/core/store'
import type { Config } from '@/types'
import { createLogger } from '@/utils/logger'

const logger = createLogger('status')

/**
 * Loads every tracked repository and prints its open pull requests.
 *
 * **text format (default):** one table per repository, honouring the saved filter.
 * **json format:** the loaded pull requests of every repository as a JSON array.
 *
 * Exits with code 1 if any repository failed to load.
 *
 * @param provider - Forge provider to query.
 * @param opts - `format`: output format — `'text'` or `'json'`.
 */
export async function statusCommand(
  provider: ForgeProvider,
  opts: { format: 'text' | 'json' },
  config: Config,
): Promise<void> {
  const store = await openStore(config, provider)
  await store.whenIdle()

  const initial = store.currentState().repos
  if (initial.repositories.length === 0) {
    logger.info('No repositories tracked. Add one with `prdash repos add <org/repo>`.')
    return
  }

  const failed = initial.repositories.filter(
    (repository) => initial.data[repoKey(repository)]?.loadState === 'error',
  )

  if (opts.format === 'json') {
    const report = initial.repositories.map((repository) => {
      const data = initial.data[repoKey(repository)]
      return {
        repository,
        loadState: data?.loadState ?? 'idle',
        error: data?.error ?? null,
        pullRequests: data?.pullRequests ?? [],
      }
    })
    console.log(JSON.stringify(report, null, 2))
  } else {
    initial.repositories.forEach((repository, index) => {
      store.dispatch({ type: 'repos/select', index })
      const vm = store.currentState().repos.viewModel
      console.log(repoKey(repository))
      if (vm) {
        for (const line of renderPullRequestTable(vm)) {
          console.log(`  ${line}`)
        }
      }
    })
    store.dispatch({ type: 'repos/select', index: initial.selectedRepository })
  }

  store.dispatch({ type: 'app/shutdown' })
  await store.whenIdle()

  if (failed.length > 0) {
    process.exit(1)
  }
}
