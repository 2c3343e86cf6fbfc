import { describe, expect, it } from 'vitest'
import { parseRepository } from '@/cli/bootstrap'
import { describeErrorLine } from '@/cli/commands/logs'
import { sampleTree } from '@tests/fixtures/log-tree'

describe('parseRepository', () => {
  it('defaults the branch to main', () => {
    expect(parseRepository('acme/widgets')._unsafeUnwrap()).toEqual({
      org: 'acme',
      repo: 'widgets',
      branch: 'main',
    })
  })

  it('reads the branch after @', () => {
    expect(parseRepository('acme/widgets@release/2.x')._unsafeUnwrap()).toEqual({
      org: 'acme',
      repo: 'widgets',
      branch: 'release/2.x',
    })
  })

  it('accepts dots and dashes and trims whitespace', () => {
    expect(parseRepository('  my-org/site.io ')._unsafeUnwrap()).toEqual({
      org: 'my-org',
      repo: 'site.io',
      branch: 'main',
    })
  })

  it.each(['widgets', 'acme/', '/widgets', 'acme/widgets/extra', 'acme/widgets@'])(
    'rejects %s',
    (slug) => {
      expect(parseRepository(slug)._unsafeUnwrapErr().message).toBe(
        `Invalid repository "${slug}", expected org/repo[@branch]`,
      )
    },
  )
})

describe('describeErrorLine', () => {
  it('names the workflow, job and step of an error line', () => {
    expect(describeErrorLine(sampleTree(), [0, 0, 1, 1])).toBe('CI › build › compile: E1')
    expect(describeErrorLine(sampleTree(), [1, 0, 0, 1])).toBe('Lint › eslint › run: E4')
  })
})
