import pino from 'pino'
import type { Config } from '@/types/index'

/** Subset of {@link Config} consumed by the logger. */
type LoggerConfig = Pick<Config, 'logFile' | 'logLevel' | 'logPretty'>

interface LoggerSettings {
  level: string
  pretty: boolean
  logFile: string
}

/** `gh auth token` output and request headers never reach the log file. */
const REDACT_PATHS = ['token', 'auth', 'headers.authorization', 'env.GH_TOKEN']

let _loggerConfig: LoggerConfig | null = null

/**
 * Injects runtime config into the logger subsystem.
 *
 * Called from the `preAction` hook after `--cwd` has been applied, so that a
 * relative `LOG_FILE` lands in the project directory. Loggers that were
 * already touched keep the settings they were built with.
 *
 * @param config - Logger-relevant slice of the loaded {@link Config}.
 */
export function setLoggerConfig(config: LoggerConfig): void {
  _loggerConfig = config
}

/** Config value → environment variable → built-in default. */
function resolveSettings(): LoggerSettings {
  return {
    level: _loggerConfig?.logLevel ?? process.env.LOG_LEVEL ?? 'info',
    pretty: _loggerConfig?.logPretty ?? process.env.LOG_PRETTY === '1',
    logFile: _loggerConfig?.logFile ?? process.env.PRDASH_LOG_FILE ?? '.prdash/prdash.jsonl',
  }
}

function buildLogger(name: string): pino.Logger {
  const { level, pretty, logFile } = resolveSettings()
  const options: pino.LoggerOptions = { name, level, redact: REDACT_PATHS }

  if (pretty) {
    try {
      return pino(
        options,
        pino.transport({ target: 'pino-pretty', options: { colorize: true, destination: 2 } }),
      )
    } catch {
      // pino-pretty missing from the install, use JSON output
    }
  }

  // The dashboard owns the terminal, so stderr only gets JSON when redirected.
  const destinations: pino.StreamEntry[] = [
    { stream: pino.destination({ dest: logFile, mkdir: true, sync: false }) },
  ]
  if (!process.stderr.isTTY) {
    destinations.push({ stream: pino.destination(2) })
  }
  return pino(options, pino.multistream(destinations))
}

/**
 * Create a named logger. The pino instance behind it is built on first use,
 * after the CLI has loaded `.prdashrc`.
 *
 * Environment overrides: `LOG_LEVEL`, `LOG_PRETTY=1`, `PRDASH_LOG_FILE=/abs/path`.
 *
 * @category Utilities
 */
export function createLogger(name: string): pino.Logger {
  let instance: pino.Logger | null = null
  const get = () => (instance ??= buildLogger(name))
  return new Proxy({} as pino.Logger, {
    get: (_t, prop) => {
      const val = get()[prop as keyof pino.Logger]
      return typeof val === 'function' ? (val as Function).bind(get()) : val
    },
  })
}

/**
 * Root logger for src/index.ts and top-level use.
 *
 * @category Utilities
 */
export const logger = createLogger('prdash')
