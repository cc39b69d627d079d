/**
 * Feed configuration and its resolution into a runnable setup
 */
import { Effect, LogLevel } from "effect"
import * as Schema from "effect/Schema"
import { ConfigurationError } from "./errors.js"
import type { Scalar } from "./product.js"
import type { FeedMetadata, FeedSink } from "./types.js"
import {
  AttributeMap,
  DestinationDescriptor,
  NonEmptyString,
  validate,
} from "./validation.js"
import { DEFAULT_DESTINATION, resolveDestination } from "../outputs/destination.js"

export type ErrorPolicy = "abort" | "skip"
export type AbortPolicy = "keep" | "delete"
export type FeedLogLevel = "debug" | "info" | "warning" | "error" | "none"

export interface FeedConfig {
  /**
   * URI-like descriptor (`file:...`, `stdout:`) or a sink instance.
   * Defaults to standard output.
   */
  readonly destination?: string | FeedSink
  readonly platform?: {
    readonly name: string
    readonly version?: string
  }
  readonly attributes?: Readonly<Record<string, Scalar>>
  /**
   * "abort" (default) stops the run on the first item error;
   * "skip" records the item as rejected and moves on.
   */
  readonly errorPolicy?: ErrorPolicy
  /**
   * What to do with a partially written destination when the run fails
   * (default: "keep")
   */
  readonly onAbort?: AbortPolicy
  readonly fsync?: boolean
  /**
   * Emit a metrics log line every N products; 0 disables periodic metrics
   * (default: 1000)
   */
  readonly metricsInterval?: number
  /**
   * Maximum rejected items kept in the result (default: 100)
   */
  readonly maxRejected?: number
  readonly logLevel?: FeedLogLevel
}

/**
 * Validation schema for everything in FeedConfig except the destination
 */
export const FeedOptionsSchema = Schema.Struct({
  platform: Schema.optional(
    Schema.Struct({
      name: NonEmptyString,
      version: Schema.optional(NonEmptyString),
    })
  ),
  attributes: Schema.optional(AttributeMap),
  errorPolicy: Schema.optional(Schema.Literal("abort", "skip")),
  onAbort: Schema.optional(Schema.Literal("keep", "delete")),
  fsync: Schema.optional(Schema.Boolean),
  metricsInterval: Schema.optional(Schema.Int.pipe(Schema.nonNegative())),
  maxRejected: Schema.optional(Schema.Int.pipe(Schema.nonNegative())),
  logLevel: Schema.optional(
    Schema.Literal("debug", "info", "warning", "error", "none")
  ),
})

/**
 * Fully validated configuration for one run
 */
export interface ResolvedFeedConfig {
  readonly sink: FeedSink
  readonly metadata: FeedMetadata
  readonly errorPolicy: ErrorPolicy
  readonly onAbort: AbortPolicy
  readonly metricsInterval: number
  readonly maxRejected: number
}

/**
 * Validate a feed configuration and resolve its destination
 */
export const resolveFeedConfig = (
  config: FeedConfig
): Effect.Effect<ResolvedFeedConfig, ConfigurationError> =>
  Effect.gen(function* () {
    const { destination, ...rest } = config
    const options = yield* validate(FeedOptionsSchema, rest, "feed configuration")

    const sink =
      destination === undefined || typeof destination === "string"
        ? yield* Effect.flatMap(
            validate(
              DestinationDescriptor,
              destination ?? DEFAULT_DESTINATION,
              "destination"
            ),
            (descriptor) => resolveDestination(descriptor, { fsync: options.fsync })
          )
        : destination

    const onAbort = options.onAbort ?? "keep"
    if (onAbort === "delete" && sink.discard === undefined) {
      return yield* Effect.fail(
        new ConfigurationError(
          `onAbort "delete" is not supported by ${sink.name} (${sink.destination})`
        )
      )
    }

    return {
      sink,
      metadata: {
        platform: options.platform,
        attributes: Object.entries(options.attributes ?? {}),
      },
      errorPolicy: options.errorPolicy ?? "abort",
      onAbort,
      metricsInterval: options.metricsInterval ?? 1000,
      maxRejected: options.maxRejected ?? 100,
    }
  })

/**
 * Map a configured log level to Effect's LogLevel
 */
export const toLogLevel = (level: FeedLogLevel = "info"): LogLevel.LogLevel => {
  switch (level) {
    case "debug":
      return LogLevel.Debug
    case "info":
      return LogLevel.Info
    case "warning":
      return LogLevel.Warning
    case "error":
      return LogLevel.Error
    case "none":
      return LogLevel.None
    default:
      return LogLevel.Info
  }
}
