/**
 * Error monitoring for prdash.
 *
 * Every export may be called before or without {@link initSentry}; with no
 * DSN configured the SDK never starts and drops whatever it is given.
 *
 * @module Utilities
 */
import * as Sentry from '@sentry/node'
import type { Config, Repository } from '@/types'
import { createLogger } from '@/utils/logger'

const logger = createLogger('sentry')

let started = false

/**
 * Starts the SDK from the `SENTRY_*` settings. Later calls are ignored.
 *
 * @category Utilities
 */
export function initSentry(config: Config): void {
  if (started || !config.sentryDsn) return

  Sentry.init({
    dsn: config.sentryDsn,
    environment: config.sentryEnvironment,
    tracesSampleRate: config.sentryTracesSampleRate,
    release: `prdash@${process.env.npm_package_version ?? '0.1.0'}`,
  })
  started = true
  logger.debug({ environment: config.sentryEnvironment }, 'sentry started')
}

/**
 * Leaves a breadcrumb for a write the merge bot makes against GitHub and
 * points the scope at that pull request, so a later crash report names it.
 *
 * @category Utilities
 */
export function recordMergeBotOperation(
  operation: 'rebase' | 'merge' | 'rerun',
  repository: Repository,
  prNumber: number,
): void {
  const slug = `${repository.org}/${repository.repo}`
  Sentry.setContext('pullRequest', { repository: slug, branch: repository.branch, number: prNumber })
  Sentry.addBreadcrumb({
    category: 'merge-bot',
    message: `${operation} ${slug}#${prNumber}`,
    level: 'info',
  })
}

/** @category Utilities */
export const captureException: typeof Sentry.captureException =
  Sentry.captureException.bind(Sentry)

/**
 * Waits for queued events before the process exits.
 *
 * @returns `true` when everything was sent within `timeoutMs`.
 * @category Utilities
 */
export function flushSentry(timeoutMs = 2000): Promise<boolean> {
  return Sentry.flush(timeoutMs)
}
