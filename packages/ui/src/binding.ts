/**
 * A two-way view of one value: reading selects it from the latest state,
 * writing turns it into an event.
 */
export interface Binding<Value> {
  value: Value
}

/**
 * What a binding sends when it is written: a constant event, or a function
 * from the written value to an event. Events themselves must not be
 * functions.
 */
export type BindingEvent<Value, Event> = Event | ((value: Value) => Event)

function isEventFactory<Value, Event>(
  event: BindingEvent<Value, Event>,
): event is (value: Value) => Event {
  return typeof event === "function"
}

export function toEventFactory<Value, Event>(
  event: BindingEvent<Value, Event>,
): (value: Value) => Event {
  return isEventFactory(event) ? event : () => event
}

export function createBinding<Value>(
  read: () => Value,
  write: (value: Value) => void,
): Binding<Value> {
  return {
    get value() {
      return read()
    },
    set value(next: Value) {
      write(next)
    },
  }
}
