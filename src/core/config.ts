import { readFileSync } from 'fs'
import { err, ok, type Result } from 'neverthrow'
import { join, resolve } from 'path'
import { z } from 'zod'
import { type Config, ConfigSchema } from '@/types/index'

const KEY_MAP: Record<string, keyof Config> = {
  MERGE_BOT_CONCURRENCY: 'mergeBotConcurrency',
  MERGE_BOT_MAX_RETRIES: 'mergeBotMaxRetries',
  MERGE_BOT_RETRY_BACKOFF_MS: 'mergeBotRetryBackoffMs',
  MERGE_BOT_MAX_BACKOFF_MS: 'mergeBotMaxBackoffMs',
  CI_POLL_INTERVAL_MS: 'ciPollIntervalMs',
  MAX_CI_POLLS: 'maxCiPolls',
  MERGE_METHOD: 'mergeMethod',
  RERUN_FAILED_JOBS: 'rerunFailedJobs',
  VIEWPORT_HEIGHT: 'viewportHeight',
  THEME: 'theme',
  STATE_DIR: 'stateDir',
  GH_BINARY: 'ghBinary',
  STRICT_INVARIANTS: 'strictInvariants',
  LOG_FILE: 'logFile',
  LOG_LEVEL: 'logLevel',
  LOG_PRETTY: 'logPretty',
  SENTRY_DSN: 'sentryDsn',
  SENTRY_ENVIRONMENT: 'sentryEnvironment',
  SENTRY_TRACES_SAMPLE_RATE: 'sentryTracesSampleRate',
}

const booleanFlag = (fallback: boolean) =>
  z
    .preprocess(
      (v) => (typeof v === 'string' ? v === '1' || v === 'true' : v),
      z.boolean(),
    )
    .default(fallback)

// Zod schema that coerces string values (all .prdashrc values are strings)
const RawConfigSchema = ConfigSchema.extend({
  mergeBotConcurrency: z.coerce.number().int().positive().default(2),
  mergeBotMaxRetries: z.coerce.number().int().nonnegative().default(3),
  mergeBotRetryBackoffMs: z.coerce.number().int().nonnegative().default(30_000),
  mergeBotMaxBackoffMs: z.coerce.number().int().nonnegative().default(300_000),
  ciPollIntervalMs: z.coerce.number().int().nonnegative().default(15_000),
  maxCiPolls: z.coerce.number().int().positive().default(60),
  viewportHeight: z.coerce.number().int().positive().default(20),
  rerunFailedJobs: booleanFlag(true),
  strictInvariants: booleanFlag(false),
  logPretty: booleanFlag(false),
})

/**
 * Parses a `.prdashrc` KEY=VALUE string into a validated {@link Config}.
 *
 * Only recognises keys listed in the internal KEY_MAP; unknown keys are silently ignored.
 *
 * @param content - Raw `.prdashrc` file contents.
 * @returns `ok(Config)` on success, `err(ZodError)` if a field fails validation.
 * @category Configuration
 */
export function parsePrdashrc(content: string): Result<Config, z.ZodError> {
  const raw: Record<string, string> = {}
  for (const line of content.split('\n')) {
    const trimmed = line.trim()
    if (!trimmed || trimmed.startsWith('#')) {
      continue
    }
    const eq = trimmed.indexOf('=')
    if (eq === -1) {
      continue
    }
    const key = trimmed.slice(0, eq).trim()
    const val = trimmed.slice(eq + 1).trim()
    const mapped = KEY_MAP[key]
    if (mapped) {
      raw[mapped] = val
    }
  }
  const parsed = RawConfigSchema.safeParse(raw)
  return parsed.success ? ok(parsed.data) : err(parsed.error)
}

/**
 * Loads prdash configuration from a `.prdashrc` file.
 *
 * Falls back to schema defaults if the file is missing or cannot be parsed.
 * Never throws — invalid config is silently replaced with defaults.
 *
 * @param rcPath - Path to the `.prdashrc` file. Defaults to `<cwd>/.prdashrc`.
 * @category Configuration
 */
export function loadConfig(rcPath?: string): Config {
  const filePath = rcPath ? resolve(rcPath) : join(process.cwd(), '.prdashrc')
  try {
    const content = readFileSync(filePath, 'utf8')
    return parsePrdashrc(content).match(
      (c) => c,
      () => ConfigSchema.parse({}),
    )
  } catch {
    return ConfigSchema.parse({})
  }
}
