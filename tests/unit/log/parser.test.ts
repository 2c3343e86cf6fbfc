import { describe, expect, it } from 'vitest'
import { extractTimestamp, parseCommand, parseJobLog, stripAnsi } from '@/core/log/parser'

describe('stripAnsi', () => {
  it('removes colour escapes', () => {
    expect(stripAnsi('\x1b[31mred\x1b[0m plain')).toBe('red plain')
  })
})

describe('extractTimestamp', () => {
  it('splits the ISO prefix from the content', () => {
    expect(extractTimestamp('2026-03-01T10:00:00.1234567Z npm ci')).toEqual({
      timestamp: '2026-03-01T10:00:00.1234567Z',
      content: 'npm ci',
    })
  })

  it('leaves lines without a timestamp untouched', () => {
    expect(extractTimestamp('no stamp here')).toEqual({ timestamp: null, content: 'no stamp here' })
  })
})

describe('parseCommand', () => {
  it('parses ##[command] syntax', () => {
    expect(parseCommand('##[group]Run tests')).toEqual({ kind: 'group', message: 'Run tests' })
    expect(parseCommand('##[error]Process completed with exit code 1.')).toEqual({
      kind: 'error',
      message: 'Process completed with exit code 1.',
    })
  })

  it('parses ::command params::message syntax', () => {
    expect(parseCommand('::error file=src/a.ts,line=3::boom')).toEqual({
      kind: 'error',
      message: 'boom',
    })
    expect(parseCommand('::endgroup::')).toEqual({ kind: 'endgroup', message: '' })
  })

  it('treats unknown commands as plain text', () => {
    expect(parseCommand('##[section]Starting')).toBeNull()
    expect(parseCommand('just text')).toBeNull()
  })
})

describe('parseJobLog', () => {
  it('splits steps at group starts and drops the markers', () => {
    const raw = [
      '2026-03-01T10:00:00Z ##[group]Install',
      '2026-03-01T10:00:01Z npm ci',
      '2026-03-01T10:00:02Z ##[endgroup]',
      '2026-03-01T10:00:03Z ##[group]Test',
      '2026-03-01T10:00:04Z ok 1',
      '',
    ].join('\n')

    const steps = parseJobLog(raw)

    expect(steps.map((s) => s.name)).toEqual(['Install', 'Test'])
    expect(steps[0]?.lines).toEqual([
      { text: 'npm ci', timestamp: '2026-03-01T10:00:01Z', level: 'info', isError: false },
    ])
    expect(steps[1]?.lines.map((l) => l.text)).toEqual(['ok 1'])
  })

  it('puts lines before the first group into a Job output step', () => {
    const steps = parseJobLog('Runner setup\n::group::Build\nmake\n')
    expect(steps.map((s) => [s.name, s.lines.map((l) => l.text)])).toEqual([
      ['Job output', ['Runner setup']],
      ['Build', ['make']],
    ])
  })

  it('flags error commands and error: text', () => {
    const steps = parseJobLog(
      '##[group]Test\n##[error]exit code 1\nTypeError: x is undefined\n##[warning]slow\nall good\n',
    )
    expect(steps[0]?.lines.map((l) => [l.text, l.level, l.isError])).toEqual([
      ['exit code 1', 'error', true],
      ['TypeError: x is undefined', 'info', true],
      ['slow', 'warning', false],
      ['all good', 'info', false],
    ])
  })

  it('strips ANSI escapes and the [command] prefix', () => {
    const steps = parseJobLog('##[group]Run\n[command]/usr/bin/git \x1b[1mfetch\x1b[0m\n')
    expect(steps[0]?.lines[0]?.text).toBe('/usr/bin/git fetch')
  })

  it('returns no steps for an empty log', () => {
    expect(parseJobLog('')).toEqual([])
  })
})
