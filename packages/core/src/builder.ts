import type { Feedback } from "./feedback.js"
import { createLoop, type Loop } from "./loop.js"
import type { LoopOptions } from "./options.js"
import type { Reducer } from "./reducer.js"

/**
 * Builder form of loop construction. Accumulates feedbacks in call order;
 * `reducer()` closes the builder and returns the same Loop that
 * `createLoop` would build from the same parts.
 *
 * Each step returns a new builder, so a partially built chain can be reused.
 */
export class LoopBuilder<State, Event> {
  readonly initialState: State
  readonly feedbacks: readonly Feedback<State, Event>[]

  constructor(
    initialState: State,
    feedbacks: readonly Feedback<State, Event>[],
  ) {
    this.initialState = initialState
    this.feedbacks = feedbacks
  }

  feedback(feedback: Feedback<State, Event>): LoopBuilder<State, Event> {
    return new LoopBuilder(this.initialState, [...this.feedbacks, feedback])
  }

  reducer(
    reducer: Reducer<State, Event>,
    options: LoopOptions = {},
  ): Loop<State, Event> {
    return createLoop({
      ...options,
      initialState: this.initialState,
      reducer,
      feedbacks: this.feedbacks,
    })
  }
}

/**
 * First stage of the builder: the event type is taken from the first
 * feedback.
 *
 * @example
 * ```typescript
 * const loop = loopBuilder("initialState")
 *   .feedback(feedbackA)
 *   .feedback(feedbackB)
 *   .reducer(reducer)
 * ```
 */
export function loopBuilder<State>(initialState: State) {
  return {
    feedback<Event>(
      feedback: Feedback<State, Event>,
    ): LoopBuilder<State, Event> {
      return new LoopBuilder<State, Event>(initialState, [feedback])
    },
    // Throws ConfigurationError, same as createLoop with no feedbacks
    reducer<Event>(
      reducer: Reducer<State, Event>,
      options: LoopOptions = {},
    ): Loop<State, Event> {
      return new LoopBuilder<State, Event>(initialState, []).reducer(
        reducer,
        options,
      )
    },
  }
}
