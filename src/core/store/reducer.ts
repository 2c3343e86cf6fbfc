/**
 * Root reducer — composes the slice reducers.
 *
 * `reduce` is total and pure: every action yields a state and a (possibly
 * empty) list of effects, and an action a slice does not handle returns that
 * slice by reference. When no slice changes, the very same state object comes
 * back.
 *
 * @module Store
 */
import type { Action } from './actions'
import type { Effect } from './effects'
import type { ReducerContext, SliceContext } from './reducers/context'
import { reduceLogPanel } from './reducers/log-panel'
import { reduceMergeBot } from './reducers/merge-bot'
import { reduceRepos } from './reducers/repos'
import { reduceUi } from './reducers/ui'
import type { AppState } from './state'

export type { ReducerContext } from './reducers/context'

/** @category Store */
export interface ReduceResult {
  state: AppState
  effects: readonly Effect[]
}

/** @category Store */
export function reduce(state: AppState, action: Action, context: ReducerContext): ReduceResult {
  // The theme an action produces is the one every other slice renders with.
  const ui = reduceUi(state.ui, action, { ...context, theme: state.ui.theme, state })
  const ctx: SliceContext = { ...context, theme: ui.state.theme, state }

  const repos = reduceRepos(state.repos, action, ctx)
  const logPanel = reduceLogPanel(state.logPanel, action, ctx)
  const mergeBot = reduceMergeBot(state.mergeBot, action, ctx)

  const effects = [...ui.effects, ...repos.effects, ...logPanel.effects, ...mergeBot.effects]
  if (
    ui.state === state.ui &&
    repos.state === state.repos &&
    logPanel.state === state.logPanel &&
    mergeBot.state === state.mergeBot
  ) {
    return { state, effects }
  }
  return {
    state: {
      ui: ui.state,
      repos: repos.state,
      logPanel: logPanel.state,
      mergeBot: mergeBot.state,
    },
    effects,
  }
}
