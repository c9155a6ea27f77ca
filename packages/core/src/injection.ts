import { Feedback } from "./feedback.js"
import { Subject } from "./streams.js"

export type InjectionFeedback<State, Event> = {
  /** Append this to a loop's feedbacks before starting it. */
  feedback: Feedback<State, Event>
  /**
   * Sends an event straight to the reducer. Returns false (and drops the
   * event) when no running loop is connected to the feedback.
   */
  emit: (event: Event) => boolean
}

/**
 * A feedback whose effect ignores states and replays whatever is pushed
 * through `emit`. This is how events from outside the loop (user input,
 * bindings) get into the reducer.
 */
export function createInjectionFeedback<State, Event>(): InjectionFeedback<
  State,
  Event
> {
  const injected = new Subject<Event>()

  const feedback = Feedback.stream<State, Event>(() => injected)

  const emit = (event: Event): boolean => {
    if (!injected.observed) return false
    injected.next(event)
    return true
  }

  return { feedback, emit }
}
