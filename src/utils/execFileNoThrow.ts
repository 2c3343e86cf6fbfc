import { execFile } from 'node:child_process'

/**
 * Output captured from a subprocess spawned by {@link execFileNoThrow}.
 * `status` is the process exit code (0 = success). Errors appear in `stderr`; the function never throws.
 *
 * @category Utilities
 */
export interface ExecResult {
  stdout: string
  stderr: string
  status: number
}

/** @category Utilities */
export interface ExecOptions {
  /** Kills the child when aborted; the result then has a non-zero status. */
  signal?: AbortSignal
}

/** Largest stdout accepted from a child; job logs can be several megabytes. */
const MAX_BUFFER = 64 * 1024 * 1024

/**
 * Runs a subprocess without a shell — args are passed as an array, preventing
 * shell injection. Never throws; errors surface as non-zero status + stderr.
 *
 * A binary that cannot be spawned at all (ENOENT), or a child killed through
 * `options.signal`, reports status 127.
 *
 * @category Utilities
 */
export function execFileNoThrow(
  file: string,
  args: string[] = [],
  options: ExecOptions = {},
): Promise<ExecResult> {
  return new Promise(resolve => {
    const execOptions = { maxBuffer: MAX_BUFFER, encoding: 'utf8' as const, signal: options.signal }
    execFile(file, args, execOptions, (error, stdout, stderr) => {
      if (!error) {
        resolve({ stdout, stderr, status: 0 })
        return
      }
      const status = typeof error.code === 'number' ? error.code : 127
      resolve({ stdout, stderr: stderr || error.message, status })
    })
  })
}
