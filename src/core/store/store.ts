/**
 * Store — the single writer of {@link AppState}.
 *
 * `dispatch` appends to a queue; the queue is drained one action at a time,
 * each through {@link reduce}, and the resulting effects are handed to the
 * {@link EffectExecutor}. A dispatch made while the queue is draining (from a
 * listener, or synchronously from an effect) is applied after the current
 * action, never interleaved with it.
 *
 * @module Store
 */
import type { ResultAsync } from 'neverthrow'
import type { ForgeProvider } from '@/core/forge/base'
import type { Config, Session } from '@/types'
import { createLogger } from '@/utils/logger'
import { captureException } from '@/utils/sentry'
import { toError } from '@/utils/result'
import type { Action } from './actions'
import { EffectExecutor } from './executor'
import { reduce } from './reducer'
import { type AppState, initialState } from './state'

const logger = createLogger('store')

/** @category Store */
export type Listener = (state: AppState, action: Action) => void

/** @category Store */
export interface StoreOptions {
  config: Config
  provider: ForgeProvider
  initial?: AppState
  now?: () => number
  saveSession?: (session: Session) => ResultAsync<void, Error>
  /**
   * Called with invariant violations when `strictInvariants` is set, and with
   * errors thrown by listeners. Defaults to logging.
   */
  onFatal?: (error: Error) => void
}

/** @category Store */
export class Store {
  private state: AppState
  private queue: Action[] = []
  private draining = false
  private listeners = new Set<Listener>()
  private executor: EffectExecutor
  private readonly config: Config
  private readonly onFatal: (error: Error) => void

  constructor(options: StoreOptions) {
    this.config = options.config
    this.state = options.initial ?? initialState(options.config)
    this.onFatal =
      options.onFatal ?? ((error) => logger.fatal({ err: error }, 'fatal store error'))
    this.executor = new EffectExecutor({
      config: options.config,
      provider: options.provider,
      dispatch: (action) => this.dispatch(action),
      now: options.now,
      saveSession: options.saveSession,
      onFatal: this.onFatal,
    })
  }

  /** Read-only snapshot of the current state. */
  currentState(): AppState {
    return this.state
  }

  dispatch(action: Action): void {
    this.queue.push(action)
    if (this.draining) {
      return
    }
    this.draining = true
    try {
      let next = this.queue.shift()
      while (next !== undefined) {
        this.apply(next)
        next = this.queue.shift()
      }
    } finally {
      this.draining = false
    }
  }

  /** Registers a listener called after every applied action. Returns the unsubscribe function. */
  subscribe(listener: Listener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  /**
   * Resolves once the action queue is empty and no effect or timer is
   * outstanding. Never resolves while the merge bot is running, since its
   * clock tick keeps a timer scheduled.
   */
  async whenIdle(): Promise<void> {
    while (this.executor.inFlight > 0) {
      await this.executor.whenIdle()
    }
  }

  /** Cancels every outstanding effect. Results still in flight are dropped. */
  dispose(): void {
    this.executor.dispose()
  }

  private apply(action: Action): void {
    const { state, effects } = reduce(this.state, action, { config: this.config })
    this.state = state
    for (const listener of this.listeners) {
      try {
        listener(state, action)
      } catch (e) {
        const error = toError(e)
        captureException(error)
        this.onFatal(error)
      }
    }
    this.executor.run(effects)
  }
}
