/**
 * Configuration schema — runtime settings for prdash.
 *
 * Loaded from `.prdashrc` (KEY=VALUE format) via `loadConfig` in `core/config.ts`.
 * `ConfigSchema.parse({})` returns a fully-populated config object; partial
 * configs are merged with defaults at parse time, not at runtime.
 *
 * @module Configuration
 */
import { z } from 'zod'

/** Merge strategies accepted by the GitHub merge endpoint. */
export const MergeMethodSchema = z.enum(['merge', 'squash', 'rebase'])
/** @category Configuration */
export type MergeMethod = z.infer<typeof MergeMethodSchema>

/** Colour themes bundled with prdash. */
export const ThemeNameSchema = z.enum([
  'tokyo-night',
  'catppuccin',
  'gotham',
  'adventure-time',
])
/** @category Configuration */
export type ThemeName = z.infer<typeof ThemeNameSchema>

/**
 * Runtime configuration for prdash.
 *
 * Configuration groups:
 * - **Merge bot**: `mergeBotConcurrency`, `mergeBotMaxRetries`, `mergeBotRetryBackoffMs`,
 *   `mergeBotMaxBackoffMs`, `ciPollIntervalMs`, `maxCiPolls`, `mergeMethod`, `rerunFailedJobs`
 * - **Display**: `viewportHeight`, `theme`
 * - **Storage**: `stateDir`
 * - **GitHub**: `ghBinary`
 * - **Diagnostics**: `strictInvariants`, `logFile`, `logLevel`, `logPretty`, `sentry*`
 *
 * @category Configuration
 * @group Configuration
 */
export const ConfigSchema = z.object({
  /** Upper bound on rebase/merge operations in flight across the whole merge-bot queue. */
  mergeBotConcurrency: z.number().int().positive().default(2),
  /** Failures tolerated per queue entry before it is failed permanently. */
  mergeBotMaxRetries: z.number().int().nonnegative().default(3),
  /** Base delay before a failed entry is re-queued; doubles with each attempt. */
  mergeBotRetryBackoffMs: z.number().int().nonnegative().default(30_000),
  /** Ceiling for the exponential retry delay. */
  mergeBotMaxBackoffMs: z.number().int().nonnegative().default(300_000),
  /** Interval between CI status polls while an entry waits for CI. */
  ciPollIntervalMs: z.number().int().nonnegative().default(15_000),
  /** Polls after which an entry still waiting for CI is failed as timed out. */
  maxCiPolls: z.number().int().positive().default(60),
  /** Merge strategy passed to GitHub. */
  mergeMethod: MergeMethodSchema.default('squash'),
  /** Re-run failed CI jobs when retrying an entry whose CI failed. */
  rerunFailedJobs: z.boolean().default(true),
  /** Rows materialised per view model window. */
  viewportHeight: z.number().int().positive().default(20),
  /** Colour theme used by view models. */
  theme: ThemeNameSchema.default('tokyo-night'),
  /** Directory for prdash state (session file, logs). */
  stateDir: z.string().default('.prdash'),
  /** `gh` executable used by the GitHub provider. */
  ghBinary: z.string().default('gh'),
  /** Treat invariant violations as fatal instead of logging and ignoring them. */
  strictInvariants: z.boolean().default(false),
  /** Path to the pino log file. */
  logFile: z.string().default('.prdash/prdash.jsonl'),
  /** Pino log level (trace, debug, info, warn, error, fatal, silent). */
  logLevel: z.string().default('info'),
  /** Enable pretty-printed log output (for development). */
  logPretty: z.boolean().default(false),
  /** Sentry DSN for error monitoring. Empty means disabled. */
  sentryDsn: z.string().default(''),
  /** Sentry environment tag (e.g. 'production', 'development'). */
  sentryEnvironment: z.string().default('development'),
  /** Sentry traces sample rate (0.0–1.0). */
  sentryTracesSampleRate: z.coerce.number().min(0).max(1).default(0.2),
})

/**
 * Validated prdash runtime configuration. Derived from {@link ConfigSchema}.
 *
 * @category Configuration
 * @group Configuration
 */
export type Config = z.infer<typeof ConfigSchema>
