/**
 * @spindle/core
 *
 * A feedback-loop engine: an initial state, a set of independently scheduled
 * feedbacks and a pure reducer, composed into a self-feeding sequence of
 * states.
 *
 * @example
 * ```typescript
 * import { createLoop, createReducer, Feedback, just } from "@spindle/core"
 *
 * const loop = createLoop({
 *   initialState: "",
 *   reducer: createReducer((state: string, event: string) => state + event),
 *   feedbacks: [
 *     Feedback.effect((state: string) => just(state.length < 3 ? "x" : "")),
 *   ],
 * })
 *
 * loop.observe(state => render(state))
 * loop.start()
 * // ...
 * loop.stop()
 * ```
 *
 * @packageDocumentation
 */

// Construction
export { LoopBuilder, loopBuilder } from "./builder.js"
export {
  createLoop,
  Loop,
  type LoopDefinition,
  type LoopEvents,
  type LoopStartOptions,
  type StopReason,
} from "./loop.js"
export {
  createLoopOptions,
  DEFAULT_LOOP_NAME,
  type LoopOptions,
  type ResolvedLoopOptions,
} from "./options.js"
// Feedbacks and reducers
export {
  Feedback,
  type FeedbackKind,
  type FeedbackOptions,
  type StateEffect,
  type StreamEffect,
  type StreamFeedbackOptions,
} from "./feedback.js"
export { createInjectionFeedback, type InjectionFeedback } from "./injection.js"
export {
  assertReducer,
  createReducer,
  type Reducer,
  type ReducerOptions,
  type ReduceFn,
} from "./reducer.js"
// Execution
export {
  createDefaultContext,
  createMicrotaskContext,
  createTimeoutContext,
  immediateContext,
  SerialContext,
} from "./execution-context.js"
export { Relay } from "./relay.js"
export { WorkQueue } from "./work-queue.js"
// Logging
export { getJsonLinesFormatter } from "./utils/get-json-lines-formatter.js"
// Streams
export {
  catchError,
  createStream,
  deferOn,
  type EffectOutput,
  empty,
  fail,
  filter,
  fromAsyncIterable,
  fromPromise,
  isEventStream,
  just,
  map,
  merge,
  mergeMap,
  never,
  observeOn,
  type Producer,
  Subject,
  switchMap,
  toEventStream,
} from "./streams.js"
// Errors
export {
  ConfigurationError,
  type ConfigurationErrorReason,
  LoopStoppedError,
} from "./errors.js"
// Types
export {
  type Disposer,
  type EventStream,
  type ExecutionContext,
  ExecutionPolicy,
  type LoopStatus,
  type Observer,
  type PartialObserver,
  type StateListener,
  type Subscription,
} from "./types.js"
