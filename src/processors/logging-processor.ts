/**
 * Logging Processor - Logs items passing through the pipeline
 */
import { Effect, LogLevel } from "effect"
import * as Schema from "effect/Schema"
import type { EffectProcessorFn, StageDefinition } from "../core/types.js"
import { validateSync } from "../core/validation.js"

export interface LoggingProcessorConfig {
  readonly level?: "debug" | "info" | "warn" | "error"
  readonly includeItem?: boolean
}

/**
 * Validation schema for Logging Processor configuration
 */
export const LoggingProcessorConfigSchema = Schema.Struct({
  level: Schema.optional(Schema.Literal("debug", "info", "warn", "error")),
  includeItem: Schema.optional(Schema.Boolean),
})

const levels = {
  debug: LogLevel.Debug,
  info: LogLevel.Info,
  warn: LogLevel.Warning,
  error: LogLevel.Error,
} as const

/**
 * Create a logging processor
 * Logs every item and passes it on unchanged. The item ordinal comes from
 * the feed's log annotations.
 */
export const createLoggingProcessor = (
  config: LoggingProcessorConfig = {}
): StageDefinition<EffectProcessorFn<unknown>> => {
  const { level = "info", includeItem = true } = validateSync(
    LoggingProcessorConfigSchema,
    config,
    "logging processor configuration"
  )
  const logLevel = levels[level]

  return {
    name: "logging-processor",
    run: (item) =>
      Effect.logWithLevel(
        logLevel,
        includeItem ? `Processing item: ${JSON.stringify(item)}` : "Processing item"
      ).pipe(Effect.as(item)),
  }
}
