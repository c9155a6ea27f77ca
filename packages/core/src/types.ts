// ═══════════════════════════════════════════════════════════════════════════
// Spindle - Shared Types
// ═══════════════════════════════════════════════════════════════════════════
//
// The core only depends on the minimal stream capability declared here.
// Anything with a compatible `subscribe` (including RxJS observables) can be
// returned from an effect.

export type Disposer = () => void

export type Observer<T> = {
  next: (value: T) => void
  error: (error: unknown) => void
  complete: () => void
}

export type PartialObserver<T> = Partial<Observer<T>>

export interface Subscription {
  unsubscribe(): void
  readonly closed: boolean
}

/**
 * A push-based sequence of values.
 *
 * Subscribing starts the sequence; unsubscribing releases whatever the
 * producer holds. A sequence ends with at most one `error` or `complete`.
 */
export interface EventStream<T> {
  subscribe(observer?: PartialObserver<T> | ((value: T) => void)): Subscription
}

/**
 * What happens to an in-flight effect activation when a newer state arrives.
 */
export const ExecutionPolicy = {
  CancelOnNewState: "cancel-on-new-state",
  ContinueOnNewState: "continue-on-new-state",
} as const

export type ExecutionPolicy =
  (typeof ExecutionPolicy)[keyof typeof ExecutionPolicy]

/**
 * Somewhere work can be scheduled.
 *
 * `schedule` returns a disposer that cancels the work if it has not run yet.
 */
export interface ExecutionContext {
  readonly name: string
  schedule(work: () => void): Disposer
}

export type LoopStatus = "constructed" | "running" | "stopped"

export type StateListener<State> = (state: State) => void
