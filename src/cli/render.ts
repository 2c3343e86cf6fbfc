/**
 * Plain-text printer for view models, used by the CLI commands.
 *
 * Every function returns lines instead of writing them so callers decide
 * where output goes. Colours come from the view model; `ink` decides whether
 * they are emitted.
 *
 * @module CLI Commands
 */
import chalk, { type ChalkInstance } from 'chalk'
import type { LogPanelViewModel } from '@/core/view-models/log-panel'
import type { MergeBotViewModel } from '@/core/view-models/merge-bot'
import type { PullRequestTableViewModel } from '@/core/view-models/pull-requests'

export function renderPullRequestTable(
  vm: PullRequestTableViewModel,
  ink: ChalkInstance = chalk,
): string[] {
  const tabs = vm.tabs
    .map((tab) => (tab.isActive ? ink.bold(`[${tab.label}]`) : ` ${tab.label} `))
    .join(' ')
  const lines = [tabs, ink.hex(vm.mutedColor)(`Filter: ${vm.filterText}`)]

  if (vm.loadState === 'loading') {
    lines.push(ink.hex(vm.mutedColor)('Loading...'))
  }
  if (vm.error !== null) {
    lines.push(ink.red(`Error: ${vm.error}`))
  }
  if (vm.totalRows === 0 && vm.loadState === 'loaded') {
    lines.push(ink.hex(vm.mutedColor)('No open pull requests'))
  }
  for (const row of vm.rows) {
    const marker = row.isSelected ? '●' : ' '
    const status = ink.hex(row.statusColor)(`${row.statusIcon} ${row.statusLabel}`)
    lines.push(`${marker} ${ink.hex(vm.headerColor)(row.numberText)} ${row.title} (${row.author}) ${status}`)
  }
  return lines
}

export function renderLogPanel(vm: LogPanelViewModel, ink: ChalkInstance = chalk): string[] {
  const header = [
    ink.hex(vm.header.numberColor)(vm.header.numberText),
    ink.hex(vm.header.titleColor)(vm.header.title),
    ink.hex(vm.header.authorColor)(vm.header.authorText),
  ].join(' ')
  const lines = [header]
  for (const row of vm.rows) {
    lines.push(ink.hex(row.color)(row.text))
  }
  if (vm.notice !== null) {
    lines.push(vm.notice)
  }
  return lines
}

export function renderMergeBot(vm: MergeBotViewModel, ink: ChalkInstance = chalk): string[] {
  const lines = [ink.hex(vm.statusColor)(vm.statusText)]
  for (const entry of vm.entries) {
    const detail = entry.detail ? ` ${entry.detail}` : ''
    lines.push(`${entry.text} ${ink.hex(entry.stateColor)(entry.stateLabel)} [${entry.attemptsText}]${detail}`)
  }
  for (const merged of vm.merged) {
    lines.push(ink.green(`✓ ${merged}`))
  }
  return lines
}
