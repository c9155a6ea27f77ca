import { ConfigurationError } from "./errors.js"
import type { ExecutionContext } from "./types.js"

/**
 * Pure transition function: `(state, event) → state'`.
 *
 * Must not perform side effects or read anything besides its arguments.
 * This is a contract only; the loop cannot check it.
 */
export type ReduceFn<State, Event> = (state: State, event: Event) => State

/**
 * A reducer and the context its applications are serialized on. Without a
 * context, the loop's default serialization context is used.
 */
export type Reducer<State, Event> = {
  readonly reduce: ReduceFn<State, Event>
  readonly context?: ExecutionContext
}

export type ReducerOptions = {
  on?: ExecutionContext
}

/**
 * @example
 * ```typescript
 * const reducer = createReducer<Counter, CounterEvent>((state, event) => {
 *   switch (event.type) {
 *     case "INCREMENT":
 *       return { ...state, count: state.count + 1 }
 *     case "RESET":
 *       return { ...state, count: 0 }
 *   }
 * })
 * ```
 */
export function createReducer<State, Event>(
  reduce: ReduceFn<State, Event>,
  { on }: ReducerOptions = {},
): Reducer<State, Event> {
  assertReducer({ reduce })
  return on ? { reduce, context: on } : { reduce }
}

export function assertReducer(reducer: unknown): void {
  if (
    typeof reducer !== "object" ||
    reducer === null ||
    !("reduce" in reducer) ||
    typeof reducer.reduce !== "function"
  ) {
    throw new ConfigurationError(
      "no-reducer",
      "a reducer with a reduce function is required",
    )
  }
}
