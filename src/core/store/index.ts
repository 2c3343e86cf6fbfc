export type { Action, ActionError, PullRequestRef } from './actions'
export type { Effect, Subsystem } from './effects'
export { EffectExecutor, toActionError } from './executor'
export { reduce, type ReduceResult, type ReducerContext } from './reducer'
export { sessionOf } from './reducers/ui'
export { type AppState, initialState, repoKey } from './state'
export { Store, type StoreOptions } from './store'
