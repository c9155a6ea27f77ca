import { getLogger, type Logger } from "@logtape/logtape"
import { createDefaultContext } from "./execution-context.js"
import type { ExecutionContext } from "./types.js"

export interface LoopOptions {
  /** Used in log records and error messages. */
  name?: string
  /**
   * Default context for the reducer and for feedbacks without a context of
   * their own. Pass the same context to several loops to make them share
   * one serialization point. When omitted, the loop builds its own
   * serial context.
   */
  context?: ExecutionContext
  logger?: Logger
}

export type ResolvedLoopOptions = {
  name: string
  context: ExecutionContext
  logger: Logger
}

export const DEFAULT_LOOP_NAME = "loop"

export function createLoopOptions(
  options: LoopOptions = {},
): ResolvedLoopOptions {
  const name = options.name ?? DEFAULT_LOOP_NAME
  return {
    name,
    context: options.context ?? createDefaultContext(`${name}/serial`),
    logger: (options.logger ?? getLogger(["spindle", "loop"])).with({
      loop: name,
    }),
  }
}
