import { describe, expect, it, vi } from "vitest"
import { ConfigurationError } from "./errors.js"
import {
  createMicrotaskContext,
  immediateContext,
} from "./execution-context.js"
import { Feedback } from "./feedback.js"
import { createStream, just, map, Subject } from "./streams.js"
import { type EventStream, ExecutionPolicy } from "./types.js"

type State = { query: string; page: number }

function collect<Event>(
  feedback: Feedback<State, Event>,
  states: Subject<State>,
) {
  const events: Event[] = []
  const subscription = feedback
    .connect(states, immediateContext)
    .subscribe(event => events.push(event))
  return { events, subscription }
}

describe("Feedback.effect", () => {
  it("runs the effect for every state and forwards its events", () => {
    const states = new Subject<State>()
    const effect = vi.fn((state: State) => just(`${state.query}:${state.page}`))
    const { events } = collect(Feedback.effect(effect), states)

    states.next({ query: "a", page: 1 })
    states.next({ query: "b", page: 2 })

    expect(events).toEqual(["a:1", "b:2"])
    expect(effect).toHaveBeenCalledTimes(2)
  })

  it("defaults to cancel-on-new-state with no context of its own", () => {
    const feedback = Feedback.effect<State, string>(() => just("x"))

    expect(feedback.kind).toBe("state")
    expect(feedback.policy).toBe(ExecutionPolicy.CancelOnNewState)
    expect(feedback.context).toBeUndefined()
  })

  it("does no work for states the filter rejects", () => {
    const states = new Subject<State>()
    const effect = vi.fn((state: State) => just(state.query))
    const { events } = collect(
      Feedback.effect(effect, { filter: state => state.page > 1 }),
      states,
    )

    states.next({ query: "skip", page: 1 })
    states.next({ query: "keep", page: 2 })

    expect(events).toEqual(["keep"])
    expect(effect).toHaveBeenCalledTimes(1)
  })

  it("keeps the running activation for a state the filter rejects", () => {
    const states = new Subject<State>()
    const signals: AbortSignal[] = []
    collect(
      Feedback.effect(
        (_state: State, signal) => {
          signals.push(signal)
          return new Subject<string>()
        },
        { filter: state => state.page > 0 },
      ),
      states,
    )

    states.next({ query: "a", page: 1 })
    states.next({ query: "a", page: 0 })

    expect(signals).toHaveLength(1)
    expect(signals[0]?.aborted).toBe(false)
  })

  it("passes promise results through as single events", async () => {
    const states = new Subject<State>()
    const { events } = collect(
      Feedback.effect(async (state: State) => state.query.toUpperCase()),
      states,
    )

    states.next({ query: "hello", page: 1 })
    await new Promise(resolve => setTimeout(resolve, 0))

    expect(events).toEqual(["HELLO"])
  })

  it("rejects anything that is not an effect function", () => {
    expect(() => Reflect.apply(Feedback.effect, Feedback, [42])).toThrow(
      ConfigurationError,
    )
    expect(() =>
      Reflect.apply(Feedback.stream, Feedback, ["not a function"]),
    ).toThrow(expect.objectContaining({ reason: "invalid-feedback" }))
  })
})

describe("execution policies", () => {
  function activations(policy: ExecutionPolicy) {
    const states = new Subject<State>()
    const inners: Subject<string>[] = []
    const signals: AbortSignal[] = []
    const { events } = collect(
      Feedback.effect(
        (_state: State, signal) => {
          const inner = new Subject<string>()
          inners.push(inner)
          signals.push(signal)
          return inner
        },
        { policy },
      ),
      states,
    )
    return { states, inners, signals, events }
  }

  it("cancel-on-new-state aborts the previous activation", () => {
    const { states, inners, signals, events } = activations(
      ExecutionPolicy.CancelOnNewState,
    )

    states.next({ query: "a", page: 1 })
    states.next({ query: "b", page: 1 })
    inners[0]?.next("from-first")
    inners[1]?.next("from-second")

    expect(signals.map(signal => signal.aborted)).toEqual([true, false])
    expect(events).toEqual(["from-second"])
  })

  it("continue-on-new-state lets every activation finish", () => {
    const { states, inners, signals, events } = activations(
      ExecutionPolicy.ContinueOnNewState,
    )

    states.next({ query: "a", page: 1 })
    states.next({ query: "b", page: 1 })
    inners[0]?.next("from-first")
    inners[1]?.next("from-second")

    expect(signals.map(signal => signal.aborted)).toEqual([false, false])
    expect(events).toEqual(["from-first", "from-second"])
  })

  it("withPolicy switches the overlap rule of a copy", () => {
    const states = new Subject<State>()
    const signals: AbortSignal[] = []
    const cancelling = Feedback.effect((_state: State, signal) => {
      signals.push(signal)
      return new Subject<string>()
    })
    const continuing = cancelling.withPolicy(ExecutionPolicy.ContinueOnNewState)
    collect(continuing, states)

    states.next({ query: "a", page: 1 })
    states.next({ query: "b", page: 1 })

    expect(cancelling.policy).toBe(ExecutionPolicy.CancelOnNewState)
    expect(continuing.policy).toBe(ExecutionPolicy.ContinueOnNewState)
    expect(signals.map(signal => signal.aborted)).toEqual([false, false])
  })

  it("does not abort activations that already completed", () => {
    const states = new Subject<State>()
    const signals: AbortSignal[] = []
    collect(
      Feedback.effect((state: State, signal) => {
        signals.push(signal)
        return just(state.query)
      }),
      states,
    )

    states.next({ query: "a", page: 1 })
    states.next({ query: "b", page: 1 })

    expect(signals.map(signal => signal.aborted)).toEqual([false, false])
  })

  it("aborts running activations on unsubscribe", () => {
    const states = new Subject<State>()
    const signals: AbortSignal[] = []
    const { subscription } = collect(
      Feedback.effect(
        (_state: State, signal) => {
          signals.push(signal)
          return new Subject<string>()
        },
        { policy: ExecutionPolicy.ContinueOnNewState },
      ),
      states,
    )

    states.next({ query: "a", page: 1 })
    states.next({ query: "b", page: 1 })
    subscription.unsubscribe()

    expect(signals.map(signal => signal.aborted)).toEqual([true, true])
    expect(states.observed).toBe(false)
  })
})

describe("Feedback.lensed", () => {
  it("hands the extracted sub-state to the effect and filter", () => {
    const states = new Subject<State>()
    const seen: string[] = []
    const { events } = collect(
      Feedback.lensed(
        (state: State) => state.query,
        (query: string) => {
          seen.push(query)
          return just(query.length)
        },
        { filter: query => query.length > 0 },
      ),
      states,
    )

    states.next({ query: "", page: 1 })
    states.next({ query: "abc", page: 2 })

    expect(seen).toEqual(["abc"])
    expect(events).toEqual([3])
  })
})

describe("Feedback.stream", () => {
  it("transforms the whole state stream", () => {
    const states = new Subject<State>()
    const { events } = collect(
      Feedback.stream((input: EventStream<State>) =>
        map(input, state => state.page * 2),
      ),
      states,
    )

    states.next({ query: "a", page: 1 })
    states.next({ query: "a", page: 5 })

    expect(events).toEqual([2, 10])
  })

  it("reports itself as a stream feedback", () => {
    const feedback = Feedback.stream<State, number>(() =>
      createStream(() => {}),
    )

    expect(feedback.kind).toBe("stream")
  })
})

describe("contexts", () => {
  it("runs on the default context when none is set", async () => {
    const states = new Subject<State>()
    const effect = vi.fn(() => just("x"))
    const events: string[] = []

    Feedback.effect<State, string>(effect)
      .connect(states, createMicrotaskContext())
      .subscribe(event => events.push(event))

    states.next({ query: "a", page: 1 })
    expect(effect).not.toHaveBeenCalled()

    await Promise.resolve()

    expect(effect).toHaveBeenCalledTimes(1)
    expect(events).toEqual(["x"])
  })

  it("prefers the context given through executeOn", async () => {
    const states = new Subject<State>()
    const effect = vi.fn(() => just("x"))
    const own = createMicrotaskContext("own")
    const feedback = Feedback.effect<State, string>(effect).executeOn(own)

    expect(feedback.context).toBe(own)

    feedback.connect(states, immediateContext).subscribe(() => {})
    states.next({ query: "a", page: 1 })
    expect(effect).not.toHaveBeenCalled()

    await Promise.resolve()
    expect(effect).toHaveBeenCalledTimes(1)
  })

  it("keeps kind and policy when moved to another context", () => {
    const feedback = Feedback.effect<State, string>(() => just("x"), {
      policy: ExecutionPolicy.ContinueOnNewState,
    }).executeOn(immediateContext)

    expect(feedback.kind).toBe("state")
    expect(feedback.policy).toBe(ExecutionPolicy.ContinueOnNewState)
  })
})
