/**
 * GitHub Actions job log parser.
 *
 * Turns the raw text of one job log into a list of steps. A step starts at
 * every group command (`##[group]Title` or `::group::Title`); lines before the
 * first group land in a leading `Job output` step. Group markers themselves are
 * not kept as lines.
 *
 * @module Log Navigator
 */

/** Severity a log line was emitted with. */
export type LineLevel = 'error' | 'warning' | 'notice' | 'debug' | 'info'

/** @category Log Navigator */
export interface ParsedLine {
  text: string
  timestamp: string | null
  level: LineLevel
  isError: boolean
}

/** @category Log Navigator */
export interface ParsedStep {
  name: string
  lines: ParsedLine[]
}

type WorkflowCommand =
  | { kind: 'group'; message: string }
  | { kind: 'endgroup'; message: string }
  | { kind: 'error' | 'warning' | 'notice' | 'debug'; message: string }

const PREAMBLE_STEP = 'Job output'

const ANSI_PATTERN = /\x1b\[[0-9;?]*[ -/]*[@-~]/g
const TIMESTAMP_PATTERN = /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d+)?Z)(?: |$)/
const HASH_BRACKET_PATTERN = /^##\[([a-zA-Z-]+)\](.*)$/
const LEGACY_PATTERN = /^::([a-zA-Z-]+)(?:\s+([^:]+?))?::(.*)$/

/** Removes ANSI colour and cursor escape sequences. */
export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '')
}

/**
 * Splits the ISO-8601 timestamp GitHub prefixes to every log line.
 *
 * @returns The timestamp (or `null`) and the remaining content.
 */
export function extractTimestamp(line: string): {
  timestamp: string | null
  content: string
} {
  const match = TIMESTAMP_PATTERN.exec(line)
  if (!match?.[1]) {
    return { timestamp: null, content: line }
  }
  return { timestamp: match[1], content: line.slice(match[0].length) }
}

function toCommand(name: string, message: string): WorkflowCommand | null {
  switch (name.toLowerCase()) {
    case 'group':
      return { kind: 'group', message }
    case 'endgroup':
      return { kind: 'endgroup', message }
    case 'error':
      return { kind: 'error', message }
    case 'warning':
      return { kind: 'warning', message }
    case 'notice':
      return { kind: 'notice', message }
    case 'debug':
      return { kind: 'debug', message }
    default:
      return null
  }
}

/**
 * Recognises `##[command]message` and `::command params::message` syntax.
 * Unknown commands are treated as plain text.
 */
export function parseCommand(text: string): WorkflowCommand | null {
  const trimmed = text.trim()
  const hash = HASH_BRACKET_PATTERN.exec(trimmed)
  if (hash?.[1] !== undefined) {
    return toCommand(hash[1], (hash[2] ?? '').trim())
  }
  const legacy = LEGACY_PATTERN.exec(trimmed)
  if (legacy?.[1] !== undefined) {
    return toCommand(legacy[1], legacy[3] ?? '')
  }
  return null
}

function levelOf(command: WorkflowCommand | null): LineLevel {
  if (command === null) {
    return 'info'
  }
  switch (command.kind) {
    case 'error':
    case 'warning':
    case 'notice':
    case 'debug':
      return command.kind
    default:
      return 'info'
  }
}

/**
 * Parses one job's raw log text into steps.
 *
 * A line is an error when it carries an `error` command, or when its text
 * contains `error:` (case-insensitive).
 *
 * @category Log Navigator
 */
export function parseJobLog(raw: string): ParsedStep[] {
  const steps: ParsedStep[] = []
  let current: ParsedStep | null = null

  const rawLines = raw.split(/\r?\n/)
  if (rawLines.at(-1) === '') {
    rawLines.pop()
  }

  for (const rawLine of rawLines) {
    const { timestamp, content } = extractTimestamp(rawLine)
    const plain = stripAnsi(content.startsWith('[command]') ? content.slice(9) : content)
    const command = parseCommand(plain)

    if (command?.kind === 'group') {
      current = { name: command.message, lines: [] }
      steps.push(current)
      continue
    }
    if (command?.kind === 'endgroup' && command.message === '') {
      continue
    }
    if (command?.kind === 'debug' && command.message === '') {
      continue
    }

    const text = command ? command.message : plain
    if (current === null) {
      current = { name: PREAMBLE_STEP, lines: [] }
      steps.push(current)
    }

    const level = levelOf(command)
    current.lines.push({
      text,
      timestamp,
      level,
      isError: level === 'error' || text.toLowerCase().includes('error:'),
    })
  }
  return steps
}
