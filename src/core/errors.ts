/**
 * Core error types with categorization
 * Errors are categorized to determine handling strategy:
 * - logical: Bad item data or a failing stage, may be skipped under the "skip" policy
 * - fatal: Configuration, source or sink failures, always stop the run
 */

export type ErrorCategory = "logical" | "fatal"

/**
 * Pipeline stage kinds, in execution order
 */
export type StageKind = "processor" | "filter" | "mapper"

/**
 * Base error class for all components
 */
export abstract class ComponentError extends Error {
  abstract readonly _tag: string
  abstract readonly category: ErrorCategory

  constructor(
    message: string,
    readonly cause?: unknown
  ) {
    super(message)
    this.name = this.constructor.name

    // Maintain proper stack trace for where our error was thrown (only in V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Check if error is fatal (should stop the run regardless of policy)
   */
  get isFatal(): boolean {
    return this.category === "fatal"
  }

  /**
   * Get appropriate log level for this error
   */
  get logLevel(): "warning" | "error" {
    switch (this.category) {
      case "logical":
        return "warning"  // Rejected items are expected under the skip policy
      case "fatal":
        return "error"
    }
  }
}

/**
 * Invalid or missing feed configuration, raised before any item is pulled
 */
export class ConfigurationError extends ComponentError {
  readonly _tag = "ConfigurationError"
  readonly category: ErrorCategory = "fatal"

  constructor(message: string, cause?: unknown) {
    super(message, cause)
  }
}

/**
 * A product is missing a required field (or holds an invalid one) at serialization time
 */
export class ValidationError extends ComponentError {
  readonly _tag = "ValidationError"
  readonly category: ErrorCategory = "logical"

  constructor(
    message: string,
    readonly field: string,
    readonly ordinal: number,
    cause?: unknown
  ) {
    super(message, cause)
  }
}

/**
 * A stage raised, or a processor returned no value
 */
export class PipelineStageError extends ComponentError {
  readonly _tag = "PipelineStageError"
  readonly category: ErrorCategory = "logical"

  constructor(
    message: string,
    readonly stage: StageKind,
    readonly index: number,
    readonly stageName: string,
    readonly ordinal: number,
    cause?: unknown
  ) {
    super(message, cause)
  }
}

export type SinkOperation = "open" | "write" | "flush" | "close" | "discard"

/**
 * The destination sink cannot be opened, written, flushed or closed
 */
export class IOError extends ComponentError {
  readonly _tag = "IOError"
  readonly category: ErrorCategory = "fatal"

  constructor(
    message: string,
    readonly operation: SinkOperation,
    readonly destination: string,
    cause?: unknown
  ) {
    super(message, cause)
  }
}

/**
 * The item source raised while being iterated
 */
export class SourceError extends ComponentError {
  readonly _tag = "SourceError"
  readonly category: ErrorCategory = "fatal"

  constructor(
    message: string,
    readonly ordinal: number,
    cause?: unknown
  ) {
    super(message, cause)
  }
}

/**
 * Every error a feed run can fail with
 */
export type FeedError =
  | ConfigurationError
  | ValidationError
  | PipelineStageError
  | IOError
  | SourceError

/**
 * Errors that may be skipped under the "skip" error policy
 */
export type ItemError = ValidationError | PipelineStageError

/**
 * Render an unknown cause as a single line. JSONata raises plain objects
 * carrying a `message`, so those are unwrapped too.
 */
export const describeCause = (cause: unknown): string => {
  if (cause instanceof Error) {
    return cause.message
  }
  if (
    typeof cause === "object" &&
    cause !== null &&
    "message" in cause &&
    typeof cause.message === "string"
  ) {
    return cause.message
  }
  return String(cause)
}
