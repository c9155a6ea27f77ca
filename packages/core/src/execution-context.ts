import type { Disposer, ExecutionContext } from "./types.js"

const noop: Disposer = () => {}

/**
 * Runs work inline, on the caller's stack. Nothing is left to cancel by the
 * time `schedule` returns.
 */
export const immediateContext: ExecutionContext = {
  name: "immediate",
  schedule(work) {
    work()
    return noop
  },
}

/**
 * Runs work in a microtask, after the current synchronous code finishes.
 */
export function createMicrotaskContext(name = "microtask"): ExecutionContext {
  return {
    name,
    schedule(work) {
      let cancelled = false
      queueMicrotask(() => {
        if (!cancelled) work()
      })
      return () => {
        cancelled = true
      }
    },
  }
}

/**
 * Runs work in a timer task after `delayMs` milliseconds.
 */
export function createTimeoutContext(
  delayMs = 0,
  name = `timeout(${delayMs})`,
): ExecutionContext {
  return {
    name,
    schedule(work) {
      const timer = setTimeout(work, delayMs)
      return () => clearTimeout(timer)
    },
  }
}

/**
 * SerialContext - FIFO, non-reentrant context over another context
 *
 * Work scheduled while a previous item is still running is queued and run
 * after it, never nested inside it. This is what makes reducer applications
 * strictly sequential even when events arrive re-entrantly from feedbacks
 * running on the same stack.
 *
 * Every item goes through one pending list, drained by a single hand-off to
 * the target, so items run in the order they were scheduled even when the
 * target defers the hand-off.
 *
 * @example
 * ```typescript
 * const serial = new SerialContext(immediateContext)
 *
 * serial.schedule(() => {
 *   serial.schedule(() => console.log("second"))
 *   console.log("first")
 * })
 * ```
 */
export class SerialContext implements ExecutionContext {
  readonly name: string
  readonly #target: ExecutionContext
  readonly #pending: Array<() => void> = []
  #running = false
  #handOffRequested = false

  constructor(target: ExecutionContext, name = `serial(${target.name})`) {
    this.#target = target
    this.name = name
  }

  get isRunning(): boolean {
    return this.#running
  }

  schedule(work: () => void): Disposer {
    let cancelled = false
    this.#pending.push(() => {
      if (!cancelled) work()
    })

    if (!this.#running && !this.#handOffRequested) {
      this.#handOffRequested = true
      this.#target.schedule(() => {
        this.#handOffRequested = false
        this.#drain()
      })
    }

    return () => {
      cancelled = true
    }
  }

  // A throwing item leaves the rest pending for the next hand-off
  #drain(): void {
    if (this.#running) return

    this.#running = true
    try {
      let work = this.#pending.shift()
      while (work) {
        work()
        work = this.#pending.shift()
      }
    } finally {
      this.#running = false
    }
  }
}

/**
 * The default serialization context for a loop: serial over immediate.
 *
 * Build one per process (or per group of loops that should share a
 * serialization point) and pass it through `LoopOptions.context`.
 */
export function createDefaultContext(name = "default"): SerialContext {
  return new SerialContext(immediateContext, name)
}
