import { ConfigurationError } from "./errors.js"
import {
  deferOn,
  type EffectOutput,
  filter,
  map,
  mergeMap,
  observeOn,
  switchMap,
  toEventStream,
} from "./streams.js"
import {
  type EventStream,
  type ExecutionContext,
  ExecutionPolicy,
} from "./types.js"

// ═══════════════════════════════════════════════════════════════════════════
// Spindle - Feedbacks
// ═══════════════════════════════════════════════════════════════════════════
//
// A feedback turns the stream of states into a stream of events. Two shapes:
//
// - state effects run once per (accepted) state, under an ExecutionPolicy
// - stream effects receive the whole state stream and own their scheduling
//
// Feedbacks are immutable descriptions. Nothing runs until a loop connects
// them to its relay.

/**
 * An effect run once per accepted state. The signal is aborted when the
 * activation is cancelled (by a newer state, under cancel-on-new-state) or
 * when the loop stops.
 */
export type StateEffect<Value, Event> = (
  value: Value,
  signal: AbortSignal,
) => EffectOutput<Event>

export type StreamEffect<State, Event> = (
  states: EventStream<State>,
) => EventStream<Event>

export type FeedbackKind = "state" | "stream"

export type FeedbackOptions<Value> = {
  /** Overlap rule for activations. Defaults to cancel-on-new-state. */
  policy?: ExecutionPolicy
  /** Where the effect runs. Defaults to the loop's context. */
  on?: ExecutionContext
  /** States (or extracted sub-states) rejected here trigger no work. */
  filter?: (value: Value) => boolean
}

export type StreamFeedbackOptions = {
  on?: ExecutionContext
}

type Connect<State, Event> = (
  states: EventStream<State>,
  context: ExecutionContext,
  policy: ExecutionPolicy,
) => EventStream<Event>

type FeedbackParams<State, Event> = {
  kind: FeedbackKind
  policy: ExecutionPolicy
  context: ExecutionContext | undefined
  connect: Connect<State, Event>
}

function assertEffect(effect: unknown): void {
  if (typeof effect !== "function") {
    throw new ConfigurationError(
      "invalid-feedback",
      `expected an effect function, received ${typeof effect}`,
    )
  }
}

/**
 * A single effect producer with its filtering rule, overlap policy and
 * execution context.
 *
 * @example
 * ```typescript
 * // Load a user whenever the state asks for one; a newer request cancels
 * // the previous fetch through the abort signal.
 * const loadUser = Feedback.effect<State, Event>(
 *   async (state, signal) => {
 *     const user = await api.user(state.userId, { signal })
 *     return { type: "USER_LOADED", user }
 *   },
 *   { filter: state => state.status === "loading" },
 * )
 * ```
 */
export class Feedback<State, Event> {
  readonly kind: FeedbackKind
  readonly policy: ExecutionPolicy
  readonly context: ExecutionContext | undefined
  readonly #connect: Connect<State, Event>

  private constructor({
    kind,
    policy,
    context,
    connect,
  }: FeedbackParams<State, Event>) {
    this.kind = kind
    this.policy = policy
    this.context = context
    this.#connect = connect
  }

  /**
   * A feedback whose effect runs for every accepted state.
   */
  static effect<State, Event>(
    effect: StateEffect<State, Event>,
    options: FeedbackOptions<State> = {},
  ): Feedback<State, Event> {
    return Feedback.lensed<State, State, Event>(state => state, effect, options)
  }

  /**
   * A feedback whose effect only sees the sub-state returned by `extract`.
   * When a filter is given, it is applied to the sub-state.
   */
  static lensed<State, SubState, Event>(
    extract: (state: State) => SubState,
    effect: StateEffect<SubState, Event>,
    options: FeedbackOptions<SubState> = {},
  ): Feedback<State, Event> {
    assertEffect(effect)
    const {
      policy = ExecutionPolicy.CancelOnNewState,
      on,
      filter: accept,
    } = options

    return new Feedback<State, Event>({
      kind: "state",
      policy,
      context: on,
      connect: (states, context, policy) => {
        const values = map(states, extract)
        const accepted = accept ? filter(values, accept) : values
        const activate = (value: SubState) =>
          deferOn(context, signal => toEventStream(effect(value, signal)))

        return policy === ExecutionPolicy.CancelOnNewState
          ? switchMap(accepted, activate)
          : mergeMap(accepted, activate)
      },
    })
  }

  /**
   * A feedback whose effect transforms the whole state stream. The states
   * are delivered on the feedback's context; the effect decides itself how
   * to handle overlapping work.
   */
  static stream<State, Event>(
    effect: StreamEffect<State, Event>,
    options: StreamFeedbackOptions = {},
  ): Feedback<State, Event> {
    assertEffect(effect)
    return new Feedback<State, Event>({
      kind: "stream",
      policy: ExecutionPolicy.ContinueOnNewState,
      context: options.on,
      connect: (states, context) => effect(observeOn(states, context)),
    })
  }

  /**
   * A copy of this feedback that runs on `context`.
   */
  executeOn(context: ExecutionContext): Feedback<State, Event> {
    return new Feedback<State, Event>({
      kind: this.kind,
      policy: this.policy,
      context,
      connect: this.#connect,
    })
  }

  /**
   * A copy of this feedback with another overlap rule. Stream feedbacks
   * schedule their own work, so for them this only changes `policy`.
   */
  withPolicy(policy: ExecutionPolicy): Feedback<State, Event> {
    return new Feedback<State, Event>({
      kind: this.kind,
      policy,
      context: this.context,
      connect: this.#connect,
    })
  }

  /**
   * Wires this feedback to a state stream. `defaultContext` is used when the
   * feedback was not given a context of its own.
   */
  connect(
    states: EventStream<State>,
    defaultContext: ExecutionContext,
  ): EventStream<Event> {
    return this.#connect(states, this.context ?? defaultContext, this.policy)
  }
}
