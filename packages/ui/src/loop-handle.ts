import { getLogger, type Logger } from "@logtape/logtape"
import {
  createInjectionFeedback,
  type Disposer,
  type Feedback,
  type Loop,
  type LoopStartOptions,
  type LoopStatus,
} from "@spindle/core"
import {
  type Binding,
  type BindingEvent,
  createBinding,
  toEventFactory,
} from "./binding.js"
import { createSyncStore, type SyncStore } from "./create-sync-store.js"

export type LoopHandleOptions = {
  logger?: Logger
}

export type Renderer<State> = (state: State) => void

/**
 * LoopHandle - the surface a view talks to
 *
 * Wraps a loop definition with an injection feedback, so that user input can
 * be sent as events, and keeps the latest state for rendering. The wrapped
 * loop is used as a definition only: the handle runs its own copy with the
 * injection feedback appended.
 *
 * @example
 * ```typescript
 * const handle = new LoopHandle(searchLoop)
 *
 * const query = handle.binding(
 *   state => state.query,
 *   query => ({ type: "QUERY_CHANGED", query }),
 * )
 *
 * handle.render(state => view.update(state))
 * handle.start({ signal: owner.signal })
 *
 * query.value = "spindle" // emits QUERY_CHANGED
 * ```
 */
export class LoopHandle<State, Event> {
  readonly loop: Loop<State, Event>
  readonly store: SyncStore<State>
  readonly logger: Logger

  readonly #inject: (event: Event) => boolean
  readonly #listeners = new Set<() => void>()
  #state: State

  constructor(loop: Loop<State, Event>, { logger }: LoopHandleOptions = {}) {
    const injection = createInjectionFeedback<State, Event>()

    this.loop = loop.withFeedbacks(injection.feedback)
    this.logger = (logger ?? getLogger(["spindle", "ui"])).with({
      loop: loop.name,
    })
    this.#inject = injection.emit
    this.#state = this.loop.initialState

    this.loop.observe(state => {
      this.#state = state
      for (const listener of [...this.#listeners]) this.#call(listener)
    })

    this.store = createSyncStore(
      () => this.#state,
      onChange => this.#subscribe(onChange),
      { logger: this.logger },
    )
  }

  /**
   * The handle's feedbacks: the definition's, then the injection feedback.
   */
  get feedbacks(): readonly Feedback<State, Event>[] {
    return this.loop.feedbacks
  }

  /**
   * The latest state delivered to the handle. Before start, the initial
   * state.
   */
  get state(): State {
    return this.#state
  }

  get status(): LoopStatus {
    return this.loop.status
  }

  /**
   * Calls `renderer` with the current state now, then after every state
   * change until the returned disposer runs. A throwing renderer is logged
   * and keeps its subscription.
   */
  render(renderer: Renderer<State>): Disposer {
    const draw = () => renderer(this.#state)
    this.#call(draw)
    return this.#subscribe(draw)
  }

  /**
   * Sends an event to the reducer. Returns false, and drops the event, when
   * the loop is not running.
   */
  emit(event: Event): boolean {
    if (!this.loop.isRunning) {
      this.logger.warn("ui/emit-dropped loop is {status}", {
        status: this.loop.status,
      })
      return false
    }
    return this.#inject(event)
  }

  /**
   * A two-way binding: `value` reads `select(state)`, assigning to it emits
   * `event` (or `event(value)` when it is a function).
   */
  binding<Value>(
    select: (state: State) => Value,
    event: BindingEvent<Value, Event>,
  ): Binding<Value> {
    const toEvent = toEventFactory(event)
    return createBinding(
      () => select(this.#state),
      value => {
        this.emit(toEvent(value))
      },
    )
  }

  start(options?: LoopStartOptions): void {
    this.loop.start(options)
  }

  stop(): void {
    this.loop.stop()
  }

  #call(listener: () => void): void {
    try {
      listener()
    } catch (error) {
      this.logger.error("ui/listener-failed {error}", { error })
    }
  }

  #subscribe(listener: () => void): Disposer {
    this.#listeners.add(listener)
    return () => {
      this.#listeners.delete(listener)
    }
  }
}
