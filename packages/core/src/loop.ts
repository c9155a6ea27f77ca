import type { Logger } from "@logtape/logtape"
import Emittery from "emittery"
import { ConfigurationError, LoopStoppedError } from "./errors.js"
import type { Feedback, FeedbackKind } from "./feedback.js"
import { createLoopOptions, type LoopOptions } from "./options.js"
import { assertReducer, type Reducer } from "./reducer.js"
import { Relay } from "./relay.js"
import { catchError, empty, merge } from "./streams.js"
import type {
  Disposer,
  EventStream,
  ExecutionContext,
  LoopStatus,
  StateListener,
  Subscription,
} from "./types.js"

// ═══════════════════════════════════════════════════════════════════════════
// Spindle - Loop
// ═══════════════════════════════════════════════════════════════════════════
//
// The loop is the imperative shell around the pure parts:
//
//   relay ──state──▶ feedbacks ──events──▶ merge ──▶ reducer ──state──┐
//     ▲                                                               │
//     └───────────────────────────────────────────────────────────────┘
//
// Reducer applications run on one serialization context. Feedbacks are
// isolated: a failing effect ends that feedback only.

export type StopReason = "requested" | "aborted" | "failed"

export type LoopEvents<State, Event> = {
  started: { name: string }
  stopped: { name: string; reason: StopReason }
  transition: { previous: State; event: Event; next: State }
  "effect-failed": { index: number; kind: FeedbackKind; error: unknown }
  failed: { error: unknown }
}

export interface LoopDefinition<State, Event> extends LoopOptions {
  initialState: State
  reducer: Reducer<State, Event>
  feedbacks: readonly Feedback<State, Event>[]
}

export type LoopStartOptions = {
  /** Ties the loop to an owner's lifetime: aborting stops the loop. */
  signal?: AbortSignal
}

/**
 * A running feedback loop over an initial state, an ordered list of
 * feedbacks and a reducer.
 *
 * Lifecycle: constructed → running → stopped. Stopped is terminal; use
 * `withFeedbacks()` or the same definition to build a fresh loop.
 *
 * @example
 * ```typescript
 * const loop = createLoop({
 *   initialState: { count: 0 },
 *   reducer: createReducer((state, _event: "INCREMENT") => ({
 *     count: state.count + 1,
 *   })),
 *   feedbacks: [
 *     Feedback.effect(state =>
 *       state.count < 3 ? just("INCREMENT" as const) : empty(),
 *     ),
 *   ],
 * })
 *
 * loop.observe(state => console.log(state.count))
 * loop.start()
 * // 0, 1, 2, 3
 * ```
 */
export class Loop<State, Event> {
  readonly name: string
  readonly initialState: State
  readonly reducer: Reducer<State, Event>
  readonly feedbacks: readonly Feedback<State, Event>[]
  readonly context: ExecutionContext
  readonly logger: Logger

  readonly emitter = new Emittery<LoopEvents<State, Event>>()

  readonly #options: LoopOptions
  readonly #relay: Relay<State>
  #status: LoopStatus = "constructed"
  #subscription: Subscription | undefined
  #cancelStart: Disposer | undefined
  #detachSignal: Disposer | undefined

  constructor(definition: LoopDefinition<State, Event>) {
    const { initialState, reducer, feedbacks, ...options } = definition

    assertReducer(reducer)
    if (!Array.isArray(feedbacks) || feedbacks.length === 0) {
      throw new ConfigurationError(
        "no-feedbacks",
        "a loop needs at least one feedback to produce events",
      )
    }

    const { name, context, logger } = createLoopOptions(options)

    this.name = name
    this.initialState = initialState
    this.reducer = reducer
    this.feedbacks = [...feedbacks]
    this.context = context
    this.logger = logger
    this.#options = options
    this.#relay = new Relay(initialState, { logger })

    logger.debug("loop/constructed {name} with {count} feedbacks", {
      name,
      count: this.feedbacks.length,
    })
  }

  get status(): LoopStatus {
    return this.#status
  }

  get isRunning(): boolean {
    return this.#status === "running"
  }

  /**
   * The current state (pull). Before start, the initial state.
   */
  get state(): State {
    return this.#relay.value
  }

  /**
   * Push observation of every broadcast state. Listeners registered after
   * the first broadcast immediately receive the last broadcast state.
   */
  observe(listener: StateListener<State>): Disposer {
    return this.#relay.observe(listener)
  }

  /**
   * A fresh, not yet started loop with `extra` feedbacks appended after this
   * loop's feedbacks. Options are carried over.
   */
  withFeedbacks(...extra: Feedback<State, Event>[]): Loop<State, Event> {
    return new Loop<State, Event>({
      ...this.#options,
      initialState: this.initialState,
      reducer: this.reducer,
      feedbacks: [...this.feedbacks, ...extra],
    })
  }

  /**
   * Subscribes the feedbacks and broadcasts the initial state.
   *
   * Calling start() on a running loop does nothing. Calling it on a stopped
   * loop throws LoopStoppedError.
   */
  start({ signal }: LoopStartOptions = {}): void {
    if (this.#status === "running") {
      this.logger.debug("loop/start-ignored {name} already running", {
        name: this.name,
      })
      return
    }
    if (this.#status === "stopped") {
      throw new LoopStoppedError(this.name)
    }

    this.#status = "running"

    if (signal) {
      if (signal.aborted) {
        this.stop("aborted")
        return
      }
      const onAbort = () => this.stop("aborted")
      signal.addEventListener("abort", onAbort, { once: true })
      this.#detachSignal = () => signal.removeEventListener("abort", onAbort)
    }

    // Subscribing and seeding run as one unit of work on the reducer's
    // context, so events emitted while subscribing are reduced after the
    // initial state went out, and against it.
    let seeded = false
    const cancel = this.#reducerContext.schedule(() => {
      seeded = true
      this.#cancelStart = undefined
      if (this.#status !== "running") return

      const events = merge(
        ...this.feedbacks.map((feedback, index) =>
          this.#isolate(feedback, index),
        ),
      )
      const subscription = events.subscribe({
        next: event => this.#dispatch(event),
        complete: () => {
          this.logger.debug("loop/feedbacks-finished {name}", {
            name: this.name,
          })
        },
      })
      if (this.#status !== "running") {
        subscription.unsubscribe()
        return
      }
      this.#subscription = subscription

      this.logger.debug("loop/started {name}", { name: this.name })
      void this.emitter.emit("started", { name: this.name })

      this.#relay.publish(this.initialState)
    })
    if (!seeded) this.#cancelStart = cancel
  }

  /**
   * Unsubscribes every feedback (aborting in-flight activations), drops
   * queued states and moves to stopped. Safe to call more than once.
   */
  stop(reason: StopReason = "requested"): void {
    if (this.#status === "stopped") return
    this.#status = "stopped"

    this.#detachSignal?.()
    this.#detachSignal = undefined
    this.#cancelStart?.()
    this.#cancelStart = undefined

    const subscription = this.#subscription
    this.#subscription = undefined
    subscription?.unsubscribe()

    this.#relay.dispose()

    this.logger.debug("loop/stopped {name} ({reason})", {
      name: this.name,
      reason,
    })
    void this.emitter.emit("stopped", { name: this.name, reason })
  }

  get #reducerContext(): ExecutionContext {
    return this.reducer.context ?? this.context
  }

  #isolate(
    feedback: Feedback<State, Event>,
    index: number,
  ): EventStream<Event> {
    const kind = feedback.kind
    const onFailure = (error: unknown): EventStream<Event> => {
      this.logger.warn(
        "loop/effect-failed feedback #{index} ({kind}): {error}",
        { index, kind, error },
      )
      void this.emitter.emit("effect-failed", { index, kind, error })
      return empty()
    }

    let events: EventStream<Event>
    try {
      events = feedback.connect(this.#relay, this.context)
    } catch (error) {
      return onFailure(error)
    }
    return catchError(events, onFailure)
  }

  #dispatch(event: Event): void {
    this.#reducerContext.schedule(() => this.#apply(event))
  }

  #apply(event: Event): void {
    if (this.#status !== "running") return

    const previous = this.#relay.value
    let next: State
    try {
      next = this.reducer.reduce(previous, event)
    } catch (error) {
      this.logger.error("loop/reducer-failed {name}: {error}", {
        name: this.name,
        error,
      })
      void this.emitter.emit("failed", { error })
      this.stop("failed")
      return
    }

    void this.emitter.emit("transition", { previous, event, next })
    this.#relay.publish(next)
  }
}

export function createLoop<State, Event>(
  definition: LoopDefinition<State, Event>,
): Loop<State, Event> {
  return new Loop(definition)
}
