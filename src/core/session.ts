/**
 * Session persistence — `{stateDir}/session.json`.
 *
 * Written on shutdown, read at bootstrap. A missing file is an empty session;
 * a corrupt one is an error the caller may log and ignore.
 *
 * @module Configuration
 */
import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'fs'
import { dirname, join } from 'path'
import type { ResultAsync } from 'neverthrow'
import { type Session, SessionSchema } from '@/types'
import { syncToResultAsync } from '@/utils/result'

export const SESSION_FILE = 'session.json'

export function sessionPath(stateDir: string): string {
  return join(stateDir, SESSION_FILE)
}

/**
 * Reads and validates the session file.
 *
 * @returns `ok(Session)` (defaults when the file does not exist), `err(Error)`
 *   when it cannot be read or fails validation.
 * @category Configuration
 */
export function loadSession(stateDir: string): ResultAsync<Session, Error> {
  return syncToResultAsync(() => {
    const file = sessionPath(stateDir)
    if (!existsSync(file)) {
      return SessionSchema.parse({})
    }
    return SessionSchema.parse(JSON.parse(readFileSync(file, 'utf8')))
  })
}

/**
 * Writes the session atomically (temp file + rename).
 *
 * @category Configuration
 */
export function saveSession(stateDir: string, session: Session): ResultAsync<void, Error> {
  return syncToResultAsync(() => {
    const file = sessionPath(stateDir)
    mkdirSync(dirname(file), { recursive: true })
    const tmp = `${file}.tmp`
    writeFileSync(tmp, `${JSON.stringify(session, null, 2)}\n`)
    renameSync(tmp, file)
  })
}
