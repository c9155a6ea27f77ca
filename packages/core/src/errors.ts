export type ConfigurationErrorReason =
  | "no-feedbacks"
  | "no-reducer"
  | "invalid-feedback"

/**
 * Error thrown when a loop is assembled from parts that cannot run.
 */
export class ConfigurationError extends Error {
  constructor(
    public readonly reason: ConfigurationErrorReason,
    detail?: string,
  ) {
    super(
      `Cannot construct loop (${reason})` + (detail ? `: ${detail}` : "."),
    )
    this.name = "ConfigurationError"
  }
}

/**
 * Error thrown when start() is called on a loop that was already stopped.
 * Stopped loops are terminal; build a new one to run again.
 */
export class LoopStoppedError extends Error {
  constructor(public readonly loopName: string) {
    super(
      `Loop '${loopName}' has been stopped and cannot be restarted. ` +
        `Construct a new loop from the same definition instead.`,
    )
    this.name = "LoopStoppedError"
  }
}
