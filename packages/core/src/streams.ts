import type {
  Disposer,
  EventStream,
  ExecutionContext,
  Observer,
  PartialObserver,
  Subscription,
} from "./types.js"

// ═══════════════════════════════════════════════════════════════════════════
// Spindle - Event Streams
// ═══════════════════════════════════════════════════════════════════════════
//
// A small push-stream implementation of the EventStream capability, with
// just the operators the loop needs: map, filter, merge, switchMap, mergeMap,
// catchError, deferOn and observeOn. Operators are data-first functions.
//
// Producers run synchronously on subscribe. Teardown runs exactly once, on
// unsubscribe, error or complete, whichever comes first.

export type Producer<T> = (observer: Observer<T>) => Disposer | void

/**
 * What an effect may return: a stream, a promise of a single event, or an
 * async iterable of events.
 */
export type EffectOutput<T> = EventStream<T> | PromiseLike<T> | AsyncIterable<T>

function reportUnhandledError(error: unknown): void {
  setTimeout(() => {
    throw error
  }, 0)
}

function toPartialObserver<T>(
  observerOrNext?: PartialObserver<T> | ((value: T) => void),
): PartialObserver<T> {
  if (typeof observerOrNext === "function") return { next: observerOrNext }
  return observerOrNext ?? {}
}

class StreamSubscriber<T> implements Observer<T>, Subscription {
  readonly #destination: PartialObserver<T>
  #teardown: Disposer | undefined
  #closed = false

  constructor(destination: PartialObserver<T>) {
    this.#destination = destination
  }

  get closed(): boolean {
    return this.#closed
  }

  next(value: T): void {
    if (this.#closed) return
    this.#destination.next?.(value)
  }

  error(error: unknown): void {
    if (this.#closed) return
    this.#closed = true
    try {
      if (this.#destination.error) {
        this.#destination.error(error)
      } else {
        reportUnhandledError(error)
      }
    } finally {
      this.#runTeardown()
    }
  }

  complete(): void {
    if (this.#closed) return
    this.#closed = true
    try {
      this.#destination.complete?.()
    } finally {
      this.#runTeardown()
    }
  }

  unsubscribe(): void {
    if (this.#closed) return
    this.#closed = true
    this.#runTeardown()
  }

  setTeardown(teardown: Disposer): void {
    if (this.#closed) {
      teardown()
    } else {
      this.#teardown = teardown
    }
  }

  #runTeardown(): void {
    const teardown = this.#teardown
    this.#teardown = undefined
    teardown?.()
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// Creation
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Creates a cold stream from a producer function.
 *
 * @example
 * ```typescript
 * const ticks = createStream<number>(observer => {
 *   let n = 0
 *   const id = setInterval(() => observer.next(n++), 1000)
 *   return () => clearInterval(id)
 * })
 * ```
 */
export function createStream<T>(producer: Producer<T>): EventStream<T> {
  return {
    subscribe(observerOrNext) {
      const subscriber = new StreamSubscriber(toPartialObserver(observerOrNext))
      try {
        const teardown = producer(subscriber)
        if (teardown) subscriber.setTeardown(teardown)
      } catch (error) {
        subscriber.error(error)
      }
      return subscriber
    },
  }
}

export function just<T>(...values: T[]): EventStream<T> {
  return createStream(observer => {
    for (const value of values) observer.next(value)
    observer.complete()
  })
}

export function empty<T = never>(): EventStream<T> {
  return createStream(observer => observer.complete())
}

export function never<T = never>(): EventStream<T> {
  return createStream(() => {})
}

export function fail<T = never>(error: unknown): EventStream<T> {
  return createStream(observer => observer.error(error))
}

/**
 * A single-value stream from a promise. Unsubscribing does not cancel the
 * promise; its outcome is simply ignored.
 */
export function fromPromise<T>(promise: PromiseLike<T>): EventStream<T> {
  return createStream(observer => {
    Promise.resolve(promise)
      .then(
        value => {
          observer.next(value)
          observer.complete()
        },
        error => observer.error(error),
      )
      .catch(reportUnhandledError)
  })
}

/**
 * A stream over an async iterable. Unsubscribing calls the iterator's
 * `return()`, which runs the `finally` blocks of an async generator.
 */
export function fromAsyncIterable<T>(
  iterable: AsyncIterable<T>,
): EventStream<T> {
  return createStream(observer => {
    const iterator = iterable[Symbol.asyncIterator]()
    let finished = false

    const pull = (): void => {
      iterator
        .next()
        .then(
          result => {
            if (finished) return
            if (result.done) {
              finished = true
              observer.complete()
              return
            }
            observer.next(result.value)
            pull()
          },
          error => {
            if (finished) return
            finished = true
            observer.error(error)
          },
        )
        .catch(reportUnhandledError)
    }
    pull()

    return () => {
      if (finished) return
      finished = true
      if (iterator.return) {
        Promise.resolve(iterator.return()).catch(reportUnhandledError)
      }
    }
  })
}

export function isEventStream<T>(
  output: EffectOutput<T>,
): output is EventStream<T> {
  return "subscribe" in output && typeof output.subscribe === "function"
}

/**
 * Normalizes anything an effect may return into an EventStream.
 */
export function toEventStream<T>(output: EffectOutput<T>): EventStream<T> {
  if (isEventStream(output)) return output
  if ("then" in output) return fromPromise(output)
  return fromAsyncIterable(output)
}

// ═══════════════════════════════════════════════════════════════════════════
// Subject
// ═══════════════════════════════════════════════════════════════════════════

/**
 * A hot stream fed by hand. Values pushed while nobody is subscribed are
 * dropped.
 */
export class Subject<T> implements EventStream<T> {
  readonly #observers = new Set<Observer<T>>()
  #stopped = false

  get observed(): boolean {
    return this.#observers.size > 0
  }

  get stopped(): boolean {
    return this.#stopped
  }

  subscribe(
    observerOrNext?: PartialObserver<T> | ((value: T) => void),
  ): Subscription {
    return createStream<T>(observer => {
      if (this.#stopped) {
        observer.complete()
        return
      }
      this.#observers.add(observer)
      return () => {
        this.#observers.delete(observer)
      }
    }).subscribe(observerOrNext)
  }

  next(value: T): void {
    if (this.#stopped) return
    for (const observer of [...this.#observers]) observer.next(value)
  }

  error(error: unknown): void {
    if (this.#stopped) return
    this.#stopped = true
    for (const observer of [...this.#observers]) observer.error(error)
  }

  complete(): void {
    if (this.#stopped) return
    this.#stopped = true
    for (const observer of [...this.#observers]) observer.complete()
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// Operators
// ═══════════════════════════════════════════════════════════════════════════

export function map<T, R>(
  source: EventStream<T>,
  project: (value: T) => R,
): EventStream<R> {
  return createStream(observer => {
    const subscription = source.subscribe({
      next: value => {
        let result: R
        try {
          result = project(value)
        } catch (error) {
          observer.error(error)
          return
        }
        observer.next(result)
      },
      error: error => observer.error(error),
      complete: () => observer.complete(),
    })
    return () => subscription.unsubscribe()
  })
}

export function filter<T>(
  source: EventStream<T>,
  predicate: (value: T) => boolean,
): EventStream<T> {
  return createStream(observer => {
    const subscription = source.subscribe({
      next: value => {
        let accepted: boolean
        try {
          accepted = predicate(value)
        } catch (error) {
          observer.error(error)
          return
        }
        if (accepted) observer.next(value)
      },
      error: error => observer.error(error),
      complete: () => observer.complete(),
    })
    return () => subscription.unsubscribe()
  })
}

/**
 * Non-cancelling union. Sources are subscribed in argument order, so values
 * emitted synchronously by several sources for the same upstream
 * notification keep that order. Completes once every source has completed.
 */
export function merge<T>(...sources: EventStream<T>[]): EventStream<T> {
  return createStream(observer => {
    if (sources.length === 0) {
      observer.complete()
      return
    }

    let remaining = sources.length
    const subscriptions: Subscription[] = []

    for (const source of sources) {
      subscriptions.push(
        source.subscribe({
          next: value => observer.next(value),
          error: error => observer.error(error),
          complete: () => {
            remaining--
            if (remaining === 0) observer.complete()
          },
        }),
      )
    }

    return () => {
      for (const subscription of subscriptions) subscription.unsubscribe()
    }
  })
}

/**
 * Maps each value to an inner stream, cancelling the previous inner stream.
 * Values from a superseded inner stream are never forwarded.
 */
export function switchMap<T, R>(
  source: EventStream<T>,
  project: (value: T) => EventStream<R>,
): EventStream<R> {
  return createStream(observer => {
    let inner: Subscription | undefined
    let innerActive = false
    let outerDone = false
    let generation = 0

    const outer = source.subscribe({
      next: value => {
        inner?.unsubscribe()
        inner = undefined
        const current = ++generation
        innerActive = true

        let stream: EventStream<R>
        try {
          stream = project(value)
        } catch (error) {
          observer.error(error)
          return
        }

        const subscription = stream.subscribe({
          next: result => {
            if (current === generation) observer.next(result)
          },
          error: error => {
            if (current === generation) observer.error(error)
          },
          complete: () => {
            if (current !== generation) return
            innerActive = false
            if (outerDone) observer.complete()
          },
        })

        // A newer value may have arrived while subscribing
        if (current === generation) {
          inner = subscription
        } else {
          subscription.unsubscribe()
        }
      },
      error: error => observer.error(error),
      complete: () => {
        outerDone = true
        if (!innerActive) observer.complete()
      },
    })

    return () => {
      outer.unsubscribe()
      inner?.unsubscribe()
    }
  })
}

/**
 * Maps each value to an inner stream and runs all inner streams
 * concurrently. Completes when the source and every inner stream have.
 */
export function mergeMap<T, R>(
  source: EventStream<T>,
  project: (value: T) => EventStream<R>,
): EventStream<R> {
  return createStream(observer => {
    const inners = new Set<Subscription>()
    let outerDone = false

    const outer = source.subscribe({
      next: value => {
        let stream: EventStream<R>
        try {
          stream = project(value)
        } catch (error) {
          observer.error(error)
          return
        }

        let subscription: Subscription | undefined
        subscription = stream.subscribe({
          next: result => observer.next(result),
          error: error => observer.error(error),
          complete: () => {
            if (subscription) inners.delete(subscription)
            if (outerDone && inners.size === 0) observer.complete()
          },
        })
        if (!subscription.closed) inners.add(subscription)
      },
      error: error => observer.error(error),
      complete: () => {
        outerDone = true
        if (inners.size === 0) observer.complete()
      },
    })

    return () => {
      outer.unsubscribe()
      for (const subscription of inners) subscription.unsubscribe()
      inners.clear()
    }
  })
}

/**
 * On error, continues with the stream returned by `handler`.
 */
export function catchError<T>(
  source: EventStream<T>,
  handler: (error: unknown) => EventStream<T>,
): EventStream<T> {
  return createStream(observer => {
    let fallback: Subscription | undefined
    const subscription = source.subscribe({
      next: value => observer.next(value),
      error: error => {
        let next: EventStream<T>
        try {
          next = handler(error)
        } catch (handlerError) {
          observer.error(handlerError)
          return
        }
        fallback = next.subscribe(observer)
      },
      complete: () => observer.complete(),
    })
    return () => {
      subscription.unsubscribe()
      fallback?.unsubscribe()
    }
  })
}

/**
 * Creates the inner stream on `context`, when that context gets to it.
 *
 * The factory receives an AbortSignal that is aborted when the subscription
 * is cancelled before the inner stream settled, so effects can release
 * timers and requests synchronously with cancellation.
 * Unsubscribing before the context ran the work drops the work.
 */
export function deferOn<T>(
  context: ExecutionContext,
  factory: (signal: AbortSignal) => EventStream<T>,
): EventStream<T> {
  return createStream(observer => {
    const controller = new AbortController()
    let inner: Subscription | undefined
    let settled = false

    const cancelScheduled = context.schedule(() => {
      if (controller.signal.aborted) return
      let stream: EventStream<T>
      try {
        stream = factory(controller.signal)
      } catch (error) {
        settled = true
        observer.error(error)
        return
      }
      inner = stream.subscribe({
        next: value => observer.next(value),
        error: error => {
          settled = true
          observer.error(error)
        },
        complete: () => {
          settled = true
          observer.complete()
        },
      })
    })

    // Only a cancelled activation sees its signal abort
    return () => {
      cancelScheduled()
      if (!settled) controller.abort()
      inner?.unsubscribe()
    }
  })
}

/**
 * Re-delivers every notification of `source` through `context`, preserving
 * order for contexts that run work in FIFO order.
 */
export function observeOn<T>(
  source: EventStream<T>,
  context: ExecutionContext,
): EventStream<T> {
  return createStream(observer => {
    const pending = new Set<Disposer>()

    const deliver = (notify: () => void): void => {
      let cancel: Disposer | undefined
      let ran = false
      cancel = context.schedule(() => {
        ran = true
        if (cancel) pending.delete(cancel)
        notify()
      })
      if (!ran) pending.add(cancel)
    }

    const subscription = source.subscribe({
      next: value => deliver(() => observer.next(value)),
      error: error => deliver(() => observer.error(error)),
      complete: () => deliver(() => observer.complete()),
    })

    return () => {
      subscription.unsubscribe()
      for (const cancel of pending) cancel()
      pending.clear()
    }
  })
}
