/**
 * WorkQueue - FIFO trampoline for re-entrant work
 *
 * Work enqueued while the queue is already processing is appended and run
 * by the outer processing loop once the current item returns, instead of
 * being run inline. Chains of work that enqueue more work therefore run
 * iteratively, and the call stack stays flat no matter how long the chain.
 *
 * @example
 * ```typescript
 * const queue = new WorkQueue()
 *
 * queue.enqueue(() => {
 *   log.push("first")
 *   queue.enqueue(() => log.push("third"))
 *   log.push("second")
 * })
 * // log: ["first", "second", "third"]
 * ```
 */
export class WorkQueue {
  #queue: Array<() => void> = []
  #isProcessing = false

  /**
   * Enqueue work to be processed.
   *
   * If not currently processing, starts processing immediately and returns
   * once the queue is empty. If already processing, the work runs after
   * everything enqueued before it.
   */
  enqueue(work: () => void): void {
    this.#queue.push(work)
    this.#processUntilEmpty()
  }

  /**
   * Drop all pending work. Work that is currently running is not affected.
   */
  clear(): void {
    this.#queue = []
  }

  get isProcessing(): boolean {
    return this.#isProcessing
  }

  /**
   * Number of items waiting behind the one currently running.
   */
  get size(): number {
    return this.#queue.length
  }

  #processUntilEmpty(): void {
    if (this.#isProcessing) return

    this.#isProcessing = true
    try {
      let work = this.#queue.shift()
      while (work) {
        work()
        work = this.#queue.shift()
      }
    } finally {
      this.#isProcessing = false
    }
  }
}
