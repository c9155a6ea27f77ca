import {
  type JsonLinesFormatterOptions,
  type LogRecord,
  getJsonLinesFormatter as originalGetJsonLinesFormatter,
} from "@logtape/logtape"

/**
 * Recursively converts Map and Set values to plain objects and arrays so
 * they survive JSON serialization, and Error values to their name, message
 * and stack.
 */
function toJsonFriendly(value: unknown): unknown {
  if (value instanceof Map) {
    const obj: Record<string, unknown> = {}
    for (const [key, val] of value.entries()) {
      obj[String(key)] = toJsonFriendly(val)
    }
    return obj
  }

  if (value instanceof Set) {
    return [...value].map(toJsonFriendly)
  }

  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack }
  }

  if (Array.isArray(value)) {
    return value.map(toJsonFriendly)
  }

  if (
    value !== null &&
    typeof value === "object" &&
    value.constructor === Object
  ) {
    const obj: Record<string, unknown> = {}
    for (const [key, val] of Object.entries(value)) {
      obj[key] = toJsonFriendly(val)
    }
    return obj
  }

  return value
}

/**
 * LogTape's JSON Lines formatter, with Map, Set and Error values in
 * properties and message arguments converted first.
 */
export function getJsonLinesFormatter(options?: JsonLinesFormatterOptions) {
  const baseFormatter = originalGetJsonLinesFormatter(options)

  return (record: LogRecord): string => {
    const properties: Record<string, unknown> = {}
    for (const [key, val] of Object.entries(record.properties)) {
      properties[key] = toJsonFriendly(val)
    }

    return baseFormatter({
      ...record,
      properties,
      // Odd positions hold the interpolated values
      message: record.message.map((part, i) =>
        i % 2 === 1 ? toJsonFriendly(part) : part,
      ),
    })
  }
}
