/**
 * Configuration loader and validator using Effect Schema
 */
import { Effect, pipe } from "effect"
import * as Schema from "effect/Schema"
import * as yaml from "yaml"
import * as fs from "node:fs/promises"
import { ComponentError, ConfigurationError, type ErrorCategory } from "./errors.js"
import { AttributeMap, NonEmptyString } from "./validation.js"

/**
 * Custom errors for config loading
 */
export class FileReadError extends ComponentError {
  readonly _tag = "FileReadError"
  readonly category: ErrorCategory = "fatal"

  constructor(readonly path: string, cause: unknown) {
    super(`Failed to read config file ${path}`, cause)
  }
}

export class YamlParseError extends ComponentError {
  readonly _tag = "YamlParseError"
  readonly category: ErrorCategory = "fatal"

  constructor(message: string, cause?: unknown) {
    super(message, cause)
  }
}

/**
 * Schema for NDJSON Input configuration
 */
const NdjsonInputSchema = Schema.Struct({
  path: Schema.Union(NonEmptyString, Schema.Array(NonEmptyString).pipe(Schema.minItems(1))),
  cwd: Schema.optional(Schema.String),
})

/**
 * Schema for Generate Input configuration
 */
const GenerateInputSchema = Schema.Struct({
  count: Schema.Int.pipe(Schema.nonNegative()),
  template: Schema.Record({ key: Schema.String, value: Schema.Unknown }),
  start_index: Schema.optional(Schema.Int.pipe(Schema.nonNegative())),
  pad_index: Schema.optional(Schema.Int.pipe(Schema.nonNegative())),
})

/**
 * Input configuration - detects type by key
 */
const InputConfigSchema = Schema.Struct({
  ndjson: Schema.optional(NdjsonInputSchema),
  generate: Schema.optional(GenerateInputSchema),
})

const Bindings = Schema.optional(Schema.Record({ key: Schema.String, value: Schema.Unknown }))

/**
 * Schema for Logging Processor
 */
const LogProcessorSchema = Schema.Struct({
  level: Schema.optional(Schema.Literal("debug", "info", "warn", "error")),
  include_item: Schema.optional(Schema.Boolean),
})

/**
 * Schema for Mapping Processor (JSONata-based transformations)
 */
const MappingProcessorSchema = Schema.Struct({
  expression: NonEmptyString,
  bindings: Bindings,
})

/**
 * Schema shared by the expression filter and the expression mapper
 */
const ExpressionStageSchema = Schema.Struct({
  expression: NonEmptyString,
  bindings: Bindings,
})

/**
 * Processor configuration - each processor is an object with its type as key
 */
const ProcessorConfigSchema = Schema.Struct({
  log: Schema.optional(LogProcessorSchema),
  mapping: Schema.optional(MappingProcessorSchema),
})

const FilterConfigSchema = Schema.Struct({
  expression: Schema.optional(ExpressionStageSchema),
})

const MapperConfigSchema = Schema.Struct({
  expression: Schema.optional(ExpressionStageSchema),
})

/**
 * Feed section: where and how the document is written
 */
const FeedSectionSchema = Schema.Struct({
  name: Schema.optional(NonEmptyString),
  destination: Schema.optional(NonEmptyString),
  platform: Schema.optional(
    Schema.Struct({
      name: NonEmptyString,
      version: Schema.optional(Schema.Union(NonEmptyString, Schema.Number)),
    })
  ),
  attributes: Schema.optional(AttributeMap),
  error_policy: Schema.optional(Schema.Literal("abort", "skip")),
  on_abort: Schema.optional(Schema.Literal("keep", "delete")),
  fsync: Schema.optional(Schema.Boolean),
  metrics_interval: Schema.optional(Schema.Int.pipe(Schema.nonNegative())),
  max_rejected: Schema.optional(Schema.Int.pipe(Schema.nonNegative())),
  log_level: Schema.optional(Schema.Literal("debug", "info", "warning", "error", "none")),
})

/**
 * Complete feed configuration schema
 */
export const FeedFileConfigSchema = Schema.Struct({
  feed: Schema.optional(FeedSectionSchema),
  input: InputConfigSchema,
  pipeline: Schema.optional(
    Schema.Struct({
      processors: Schema.optional(Schema.Array(ProcessorConfigSchema)),
      filters: Schema.optional(Schema.Array(FilterConfigSchema)),
      mappers: Schema.optional(Schema.Array(MapperConfigSchema)),
    })
  ),
})

/**
 * TypeScript types inferred from schema
 */
export type FeedFileConfig = Schema.Schema.Type<typeof FeedFileConfigSchema>
export type FeedSectionConfig = Schema.Schema.Type<typeof FeedSectionSchema>
export type InputConfig = Schema.Schema.Type<typeof InputConfigSchema>
export type ProcessorConfig = Schema.Schema.Type<typeof ProcessorConfigSchema>
export type FilterConfig = Schema.Schema.Type<typeof FilterConfigSchema>
export type MapperConfig = Schema.Schema.Type<typeof MapperConfigSchema>

/**
 * Interpolate environment variables in strings
 * Supports ${VAR_NAME} syntax; unset variables become empty strings
 */
export const interpolateEnvVars = (
  value: unknown,
  env: NodeJS.ProcessEnv = process.env
): unknown => {
  if (typeof value === "string") {
    return value.replace(/\$\{([^}]+)\}/g, (_, varName: string) => env[varName] ?? "")
  }

  if (Array.isArray(value)) {
    return value.map((item) => interpolateEnvVars(item, env))
  }

  if (value !== null && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, interpolateEnvVars(v, env)])
    )
  }

  return value
}

/**
 * Parse and validate YAML text
 */
export const parseConfig = (
  content: string,
  env: NodeJS.ProcessEnv = process.env
): Effect.Effect<FeedFileConfig, YamlParseError | ConfigurationError> =>
  Effect.gen(function* () {
    const rawConfig: unknown = yield* Effect.try({
      try: () => yaml.parse(content),
      catch: (error) =>
        new YamlParseError(
          `Failed to parse YAML: ${error instanceof Error ? error.message : String(error)}`,
          error
        ),
    })

    const interpolated = interpolateEnvVars(rawConfig, env)

    return yield* pipe(
      Schema.decodeUnknown(FeedFileConfigSchema)(interpolated),
      Effect.mapError(
        (error) =>
          new ConfigurationError(`Schema validation failed: ${error.message}`, error)
      )
    )
  })

/**
 * Load and parse YAML configuration file
 */
export const loadConfig = (
  path: string
): Effect.Effect<FeedFileConfig, FileReadError | YamlParseError | ConfigurationError> =>
  Effect.gen(function* () {
    const content = yield* Effect.tryPromise({
      try: () => fs.readFile(path, "utf-8"),
      catch: (error) => new FileReadError(path, error),
    })

    return yield* parseConfig(content)
  })
