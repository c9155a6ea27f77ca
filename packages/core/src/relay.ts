import { getLogger, type Logger } from "@logtape/logtape"
import { createStream } from "./streams.js"
import type {
  Disposer,
  EventStream,
  Observer,
  PartialObserver,
  StateListener,
  Subscription,
} from "./types.js"
import { WorkQueue } from "./work-queue.js"

type RelayParams = {
  logger?: Logger
}

/**
 * Relay - re-entrancy-safe broadcaster of the current state
 *
 * The relay closes the loop: feedbacks subscribe to it, and every state the
 * reducer produces is published back into it. Publishing while a broadcast
 * is in progress (a feedback synchronously produced an event that was
 * synchronously reduced) appends the state to a FIFO queue instead of
 * recursing. Queued states are broadcast one after another once the
 * current broadcast returns.
 *
 * The relay holds the single authoritative current state (`value`). It is
 * updated as soon as a state is published, even if that state is still
 * waiting for its broadcast.
 *
 * @example
 * ```typescript
 * const relay = new Relay(0)
 * relay.subscribe(state => {
 *   if (state < 3) relay.publish(state + 1)
 * })
 * relay.publish(0)
 * // subscriber saw 0, 1, 2, 3 without nesting
 * ```
 */
export class Relay<State> implements EventStream<State> {
  readonly logger: Logger

  readonly #queue = new WorkQueue()
  readonly #subscribers = new Set<Observer<State>>()
  #value: State
  #delivered: State
  #hasDelivered = false
  #disposed = false

  constructor(initialState: State, { logger }: RelayParams = {}) {
    this.logger = (logger ?? getLogger(["spindle"])).getChild("relay")
    this.#value = initialState
    this.#delivered = initialState
  }

  /**
   * The current state: the last one published, or the initial state.
   */
  get value(): State {
    return this.#value
  }

  /**
   * The last state handed to subscribers.
   */
  get delivered(): State {
    return this.#delivered
  }

  get isBroadcasting(): boolean {
    return this.#queue.isProcessing
  }

  get pendingCount(): number {
    return this.#queue.size
  }

  get disposed(): boolean {
    return this.#disposed
  }

  get subscriberCount(): number {
    return this.#subscribers.size
  }

  publish(state: State): void {
    if (this.#disposed) return

    this.#value = state
    this.#queue.enqueue(() => this.#broadcast(state))
  }

  subscribe(
    observerOrNext?: PartialObserver<State> | ((value: State) => void),
  ): Subscription {
    return createStream<State>(observer => {
      if (this.#disposed) {
        observer.complete()
        return
      }
      this.#subscribers.add(observer)
      return () => {
        this.#subscribers.delete(observer)
      }
    }).subscribe(observerOrNext)
  }

  /**
   * Push observation for consumers that join late: replays the last
   * delivered state (if any broadcast happened yet), then follows every
   * subsequent broadcast. A throwing listener is logged, the same as
   * during a broadcast.
   */
  observe(listener: StateListener<State>): Disposer {
    if (this.#hasDelivered && !this.#disposed) {
      try {
        listener(this.#delivered)
      } catch (error) {
        this.logger.error("relay/subscriber-failed {error}", { error })
      }
    }
    const subscription = this.subscribe(listener)
    return () => subscription.unsubscribe()
  }

  /**
   * Drop queued states and complete every subscriber. Idempotent.
   */
  dispose(): void {
    if (this.#disposed) return
    this.#disposed = true
    this.#queue.clear()

    const subscribers = [...this.#subscribers]
    this.#subscribers.clear()
    for (const observer of subscribers) observer.complete()

    this.logger.debug("relay/disposed")
  }

  #broadcast(state: State): void {
    if (this.#disposed) return

    this.#delivered = state
    this.#hasDelivered = true

    // Snapshot: subscribers added during this broadcast wait for the next one
    for (const observer of [...this.#subscribers]) {
      if (this.#disposed) return
      if (!this.#subscribers.has(observer)) continue
      try {
        observer.next(state)
      } catch (error) {
        this.logger.error("relay/subscriber-failed {error}", { error })
      }
    }
  }
}
