/** @module CLI Commands */
import { resolve } from 'path'
import { Command, InvalidArgumentError } from 'commander'
import {
  logsCommand,
  mergeBotCommand,
  reposAddCommand,
  reposListCommand,
  reposRemoveCommand,
  statusCommand,
} from '@/cli/commands'
import { loadConfig } from '@/core/config'
import { createForgeProvider } from '@/core/forge/factory'
import { logger, setLoggerConfig } from '@/utils/logger'
import { captureException, flushSentry, initSentry } from '@/utils/sentry'

function parsePrNumber(value: string): number {
  const n = Number(value)
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError(`"${value}" is not a pull request number.`)
  }
  return n
}

const program = new Command()
program
  .name('prdash')
  .description('Pull request dashboard: status, build logs and a merge bot')
  .version('0.1.0')
  .option('--cwd <path>', 'Project directory (default: current directory)')
  .option('--config <path>', 'Path to .prdashrc config file (default: <cwd>/.prdashrc)')
  .hook('preAction', () => {
    const opts = program.opts()
    // Resolve --config before chdir so it is not re-read relative to --cwd
    if (opts.config) {
      program.setOptionValue('config', resolve(opts.config))
    }
    if (opts.cwd) {
      process.chdir(resolve(opts.cwd))
    }
    const config = loadConfig(program.opts().config)
    setLoggerConfig(config)
    initSentry(config)
  })

const repos = program.command('repos').description('Manage tracked repositories')

repos
  .command('add <repository>')
  .description('Track a repository (org/repo[@branch])')
  .action(async (slug: string) => {
    await reposAddCommand(loadConfig(program.opts().config), slug)
  })

repos
  .command('remove <repository>')
  .description('Stop tracking a repository')
  .action(async (slug: string) => {
    await reposRemoveCommand(loadConfig(program.opts().config), slug)
  })

repos
  .command('list')
  .description('List tracked repositories')
  .action(async () => {
    await reposListCommand(loadConfig(program.opts().config))
  })

program
  .command('status')
  .description('List open pull requests of every tracked repository')
  .option('--format <fmt>', 'Output format: text | json', 'text')
  .action(async (opts: { format: string }) => {
    const config = loadConfig(program.opts().config)
    const format = opts.format === 'json' ? 'json' : 'text'
    await statusCommand(createForgeProvider(config), { format }, config)
  })

program
  .command('logs <repository> <pr>')
  .description('Show the build logs of a pull request as a tree')
  .option('--errors', 'Only print error lines', false)
  .option('--all', 'Expand every workflow, job and step', false)
  .action(async (slug: string, pr: string, opts: { errors: boolean; all: boolean }) => {
    const config = loadConfig(program.opts().config)
    await logsCommand(
      createForgeProvider(config),
      { slug, pr: parsePrNumber(pr), errors: opts.errors, all: opts.all },
      config,
    )
  })

program
  .command('merge-bot <repository> <prs...>')
  .description('Merge pull requests one after another, rebasing and retrying as needed')
  .action(async (slug: string, prs: string[]) => {
    const config = loadConfig(program.opts().config)
    await mergeBotCommand(
      createForgeProvider(config),
      { slug, prs: prs.map(parsePrNumber) },
      config,
    )
  })

program.parseAsync(process.argv).catch(async (error: unknown) => {
  logger.fatal({ err: error }, 'unhandled CLI error')
  captureException(error)
  await flushSentry()
  process.exit(1)
})
