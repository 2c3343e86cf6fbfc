/** @module CLI Commands */
import { focusRepository, openStore, parseRepository } from '@/cli/bootstrap'
import { renderLogPanel } from '@/cli/render'
import type { ForgeProvider } from '@/core/forge/base'
import { flattenVisible, nodeAt, type Path, pathsEqual } from '@/core/log/navigator'
import type { LogTree } from '@/core/log/tree'
import { type PullRequestRef, repoKey, type Store } from '@/core/store'
import type { Config } from '@/types'
import { createLogger } from '@/utils/logger'

const logger = createLogger('logs')

/** `Workflow › Job › Step: line` for an error line path. */
export function describeErrorLine(tree: LogTree, path: Path): string {
  const names: string[] = []
  for (let depth = 1; depth < path.length; depth++) {
    const node = nodeAt(tree, path.slice(0, depth))
    if (node && node.kind !== 'root' && node.kind !== 'line') {
      names.push(node.name)
    }
  }
  const line = nodeAt(tree, path)
  const text = line?.kind === 'line' ? line.text : ''
  return `${names.join(' › ')}: ${text}`
}

/** Walks every error with the smart jump, in document order. */
function collectErrors(store: Store): Path[] {
  const found: Path[] = []
  for (;;) {
    const before = store.currentState().logPanel.cursor
    store.dispatch({ type: 'logs/jumpToError', direction: 'forward' })
    const panel = store.currentState().logPanel
    if (panel.notice !== null || pathsEqual(before, panel.cursor)) {
      return found
    }
    found.push(panel.cursor)
  }
}

/**
 * Fetches the build logs of one pull request and prints them as a tree.
 *
 * With `errors`, prints only the error lines with their workflow, job and
 * step. With `all`, every node is expanded first.
 *
 * Exits with code 1 if the logs cannot be fetched.
 *
 * @param slug - `org/repo` or `org/repo@branch`.
 */
export async function logsCommand(
  provider: ForgeProvider,
  opts: { slug: string; pr: number; errors: boolean; all: boolean },
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

  const loaded = store.currentState().repos.data[repoKey(repository)]?.pullRequests ?? []
  const match = loaded.find((pr) => pr.number === opts.pr)
  const pullRequest: PullRequestRef = match
    ? { number: match.number, title: match.title, author: match.author }
    : { number: opts.pr, title: '', author: '' }

  store.dispatch({ type: 'logs/open', repository, pullRequest })
  await store.whenIdle()

  const panel = store.currentState().logPanel
  if (panel.loadState === 'error' || panel.tree === null) {
    logger.error({ pr: opts.pr }, panel.error ?? 'failed to load build logs')
    process.exit(1)
  }

  if (opts.errors) {
    const errors = collectErrors(store)
    if (errors.length === 0) {
      logger.info('No errors found.')
      return
    }
    for (const path of errors) {
      console.log(describeErrorLine(panel.tree, path))
    }
    return
  }

  if (opts.all) {
    store.dispatch({ type: 'logs/expandAll' })
  }
  const { tree, expansion } = store.currentState().logPanel
  if (tree) {
    const rows = [...flattenVisible(tree, expansion)].length
    store.dispatch({ type: 'ui/resize', viewportHeight: Math.max(1, rows) })
  }
  const vm = store.currentState().logPanel.viewModel
  if (vm) {
    for (const line of renderLogPanel(vm)) {
      console.log(line)
    }
  }
}
