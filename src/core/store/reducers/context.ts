import type { Config, ThemeName } from '@/types'
import type { Effect } from '../effects'
import type { AppState } from '../state'

/**
 * Explicit context every reducer call receives.
 *
 * @category Store
 */
export interface ReducerContext {
  config: Config
}

/**
 * What a slice reducer sees besides its own slice: the theme in effect after
 * the action and a read-only snapshot of the whole state before it.
 */
export interface SliceContext extends ReducerContext {
  theme: ThemeName
  state: AppState
}

/** @category Store */
export interface SliceResult<S> {
  state: S
  effects: readonly Effect[]
}

/** Whether the action being reduced switches the theme. */
export function themeChanged(ctx: SliceContext): boolean {
  return ctx.theme !== ctx.state.ui.theme
}

const NO_EFFECTS: readonly Effect[] = []

export function unchanged<S>(state: S): SliceResult<S> {
  return { state, effects: NO_EFFECTS }
}

export function withEffects<S>(state: S, effects: readonly Effect[]): SliceResult<S> {
  return { state, effects }
}

/** Leaves the slice untouched and reports the broken invariant. */
export function violation<S>(state: S, source: string, message: string): SliceResult<S> {
  return {
    state,
    effects: [{ type: 'reportInvariantViolation', source, message }],
  }
}
